import 'dotenv/config';
import { createMockHmdaApp } from './app.js';

const PORT = Number(process.env.MOCK_HMDA_PORT || 4010);

const { app } = createMockHmdaApp();

app.listen(PORT, () => {
  console.log(`🚀 Mock Data Browser running on port ${PORT}`);
  console.log(`   GET /view/aggregations - JSON aggregations`);
  console.log(`   GET /view/csv - CSV loan records`);
  console.log(`   GET /view/filers - JSON filing institutions`);
  console.log(`   GET /health - Health check`);
  console.log(`   Point the client at it with HMDA_API_URL=http://localhost:${PORT}`);
});
