import express from 'express';
import type { Express, Request, Response } from 'express';
import { LOAN_COLUMNS, mockInstitutions, mockLoans } from './data.js';
import type { MockInstitution, MockLoan } from './data.js';

export interface CannedResponse {
  status: number;
  body: string;
  contentType?: string;
}

export interface MockHmdaOptions {
  loans?: MockLoan[];
  institutions?: MockInstitution[];
  /** Replace the handler for a path ('/view/csv', ...) with a fixed response */
  responses?: Record<string, CannedResponse>;
}

export interface MockHmdaServer {
  app: Express;
  /** Original URL of every request received, in order */
  requests: string[];
}

// Query field -> loan column it filters on
const FILTER_FIELDS: [string, keyof MockLoan][] = [
  ['actions_taken', 'action_taken'],
  ['races', 'derived_race'],
  ['ethnicities', 'derived_ethnicity'],
  ['sexes', 'derived_sex'],
  ['loan_types', 'loan_type'],
  ['loan_purposes', 'loan_purpose'],
  ['lien_statuses', 'lien_status']
];

function listParam(req: Request, name: string): string[] {
  const value = req.query[name];
  if (typeof value !== 'string' || value === '') return [];
  return value.split(',').map((item) => item.trim());
}

function requireLocation(req: Request, res: Response): { states: string[]; year: number } | null {
  const states = listParam(req, 'states').map((state) => state.toUpperCase());
  const years = listParam(req, 'years');
  if (states.length === 0 || years.length !== 1) {
    res.status(400).json({ errorType: 'provide-states-and-one-year', message: 'Provide states and a single year' });
    return null;
  }
  return { states, year: Number(years[0]) };
}

function requestedFilters(req: Request): [string, keyof MockLoan, string[]][] {
  return FILTER_FIELDS.map(([field, column]): [string, keyof MockLoan, string[]] => [
    field,
    column,
    listParam(req, field)
  ]).filter(([, , values]) => values.length > 0);
}

function matchingLoans(loans: MockLoan[], req: Request, res: Response): MockLoan[] | null {
  const location = requireLocation(req, res);
  if (!location) return null;

  const filters = requestedFilters(req);
  if (filters.length === 0) {
    res.status(400).json({ errorType: 'provide-atleast-one-filter-criteria', message: 'Provide at least one filter' });
    return null;
  }

  return loans.filter(
    (loan) =>
      loan.activity_year === location.year &&
      location.states.includes(loan.state_code) &&
      filters.every(([, column, values]) => values.includes(String(loan[column])))
  );
}

function csvCell(value: string | number): string {
  if (typeof value === 'number') return String(value);
  return `"${value.replace(/"/g, '""')}"`;
}

function combinations(lists: string[][]): string[][] {
  return lists.reduce<string[][]>(
    (acc, values) => acc.flatMap((prefix) => values.map((value) => [...prefix, value])),
    [[]]
  );
}

/**
 * Express app that mimics the Data Browser's aggregations, csv and filers
 * endpoints over fixture data
 */
export function createMockHmdaApp(options: MockHmdaOptions = {}): MockHmdaServer {
  const loans = options.loans ?? mockLoans;
  const institutions = options.institutions ?? mockInstitutions;
  const responses = options.responses ?? {};
  const requests: string[] = [];
  const app = express();

  app.use((req, res, next) => {
    requests.push(req.originalUrl);
    const canned = responses[req.path];
    if (canned) {
      res.status(canned.status).type(canned.contentType ?? 'text/plain').send(canned.body);
      return;
    }
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'mock-hmda' });
  });

  app.get('/view/csv', (req, res) => {
    const matched = matchingLoans(loans, req, res);
    if (!matched) return;

    const header = LOAN_COLUMNS.join(',');
    const rows = matched.map((loan) => LOAN_COLUMNS.map((column) => csvCell(loan[column])).join(','));

    res.setHeader('Content-Type', 'text/csv');
    res.setHeader('Content-Disposition', 'attachment; filename="hmda.csv"');
    res.send([header, ...rows].join('\n'));
  });

  app.get('/view/aggregations', (req, res) => {
    const matched = matchingLoans(loans, req, res);
    if (!matched) return;

    const filters = requestedFilters(req);
    const aggregations = combinations(filters.map(([, , values]) => values)).map((combo) => {
      const group = matched.filter((loan) =>
        filters.every(([, column], index) => String(loan[column]) === combo[index])
      );
      const entry: Record<string, string | number> = {
        count: group.length,
        sum: group.reduce((total, loan) => total + loan.loan_amount, 0)
      };
      filters.forEach(([field], index) => {
        entry[field] = combo[index];
      });
      return entry;
    });

    res.json({
      parameters: Object.fromEntries(
        Object.entries(req.query).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
      ),
      aggregations
    });
  });

  app.get('/view/filers', (req, res) => {
    const location = requireLocation(req, res);
    if (!location) return;

    res.json({
      institutions: institutions
        .filter(
          (institution) =>
            institution.period === location.year &&
            institution.states.some((state) => location.states.includes(state))
        )
        .map(({ lei, name, period }) => ({ lei, name, period }))
    });
  });

  return { app, requests };
}
