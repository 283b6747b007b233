/**
 * HMDA Data Browser client
 *
 * Typed access to the aggregations, loan records (CSV) and filing
 * institutions endpoints of the HMDA Data Browser API.
 *
 * ```typescript
 * import { getLoans, Action, Race } from 'hmda-browser-client';
 *
 * const table = await getLoans({
 *   year: 2019,
 *   states: 'dc',
 *   actions: [Action.INCOMPLETE],
 *   races: [Race.BLACK, Race.WHITE]
 * });
 * ```
 */

export { HmdaClient, getAggregations, getInstitutions, getLoans } from './hmda-client/client.js';
export type { HmdaClientOptions, InstitutionsQuery } from './hmda-client/client.js';
export { resolveConfig, DEFAULT_BASE_URL, DEFAULT_MAX_YEAR, DEFAULT_MIN_YEAR } from './hmda-client/config.js';
export type { HmdaClientConfig } from './hmda-client/config.js';
export { HttpFetcher } from './hmda-client/fetcher.js';
export type { BodyFetcher, HttpFetcherOptions } from './hmda-client/fetcher.js';
export { ALL_ACTION_TOKENS, ENDPOINT_PATHS, buildQuery, buildUrl, validateQuery } from './hmda-client/params.js';
export { createMockHmdaApp } from './mock-hmda/app.js';
export type { MockHmdaOptions, MockHmdaServer } from './mock-hmda/app.js';
export { parseCsvTable } from './utils/csv.js';
export { parseJsonTable } from './utils/json.js';
export { ConfigError, ErrorCode, HmdaError, HttpError, InvalidParameterError, ParseError, TransportError } from './utils/errors.js';
export * from './types/hmda.js';
