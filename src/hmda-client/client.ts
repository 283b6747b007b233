import type { Endpoint, HmdaQuery, Table } from '../types/hmda.js';
import { parseCsvTable } from '../utils/csv.js';
import { parseJsonTable } from '../utils/json.js';
import { resolveConfig } from './config.js';
import type { HmdaClientConfig } from './config.js';
import { HttpFetcher } from './fetcher.js';
import type { BodyFetcher } from './fetcher.js';
import { buildUrl, validateQuery } from './params.js';

export type InstitutionsQuery = Pick<HmdaQuery, 'year' | 'states'>;

export interface HmdaClientOptions extends Partial<HmdaClientConfig> {
  fetcher?: BodyFetcher;
}

/**
 * Client for the HMDA Data Browser API. Each call validates its parameters,
 * issues one GET and parses the body into a table; nothing is shared between
 * calls.
 */
export class HmdaClient {
  private config: HmdaClientConfig;
  private fetcher: BodyFetcher;

  constructor(options: HmdaClientOptions = {}) {
    const { fetcher, ...overrides } = options;
    this.config = resolveConfig(overrides);
    this.fetcher =
      fetcher ?? new HttpFetcher({ timeoutMs: this.config.timeoutMs, verbose: this.config.verbose });
  }

  /**
   * Validate a query and return the URL it would be sent to
   *
   * @throws InvalidParameterError
   */
  buildUrl(endpoint: Endpoint, query: HmdaQuery): string {
    const validated = validateQuery(query, endpoint, this.config);
    return buildUrl(this.config.baseUrl, endpoint, validated);
  }

  /** Loan counts and amount sums, grouped by the requested filter values */
  async getAggregations(query: HmdaQuery): Promise<Table> {
    const body = await this.fetcher.fetchText(this.buildUrl('aggregations', query));
    return this.report('aggregations', parseJsonTable(body, 'aggregations'));
  }

  /** Loan/application records from the modified LAR, one row per record */
  async getLoans(query: HmdaQuery): Promise<Table> {
    const body = await this.fetcher.fetchText(this.buildUrl('loans', query));
    return this.report('loans', parseCsvTable(body));
  }

  /** Institutions that filed HMDA data for the given year and states */
  async getInstitutions(query: InstitutionsQuery): Promise<Table> {
    const body = await this.fetcher.fetchText(this.buildUrl('institutions', query));
    return this.report('institutions', parseJsonTable(body, 'institutions'));
  }

  private report(endpoint: Endpoint, table: Table): Table {
    if (this.config.verbose) {
      console.log(`✅ Parsed ${table.rows.length} ${endpoint} rows (${table.columns.length} columns)`);
    }
    return table;
  }
}

export function getAggregations(query: HmdaQuery, options?: HmdaClientOptions): Promise<Table> {
  return new HmdaClient(options).getAggregations(query);
}

export function getLoans(query: HmdaQuery, options?: HmdaClientOptions): Promise<Table> {
  return new HmdaClient(options).getLoans(query);
}

export function getInstitutions(query: InstitutionsQuery, options?: HmdaClientOptions): Promise<Table> {
  return new HmdaClient(options).getInstitutions(query);
}
