/**
 * Parameter validation and query construction for the Data Browser endpoints
 */

import { z } from 'zod';
import {
  Action,
  Ethnicity,
  LienStatus,
  LoanPurpose,
  LoanType,
  Race,
  Sex,
  ACTION_TOKENS,
  ETHNICITY_TOKENS,
  LIEN_STATUS_TOKENS,
  LOAN_PURPOSE_TOKENS,
  LOAN_TYPE_TOKENS,
  RACE_TOKENS,
  SEX_TOKENS
} from '../types/hmda.js';
import type { Endpoint, ValidatedQuery } from '../types/hmda.js';
import { InvalidParameterError } from '../utils/errors.js';
import { STATE_CODES } from './config.js';

export const ENDPOINT_PATHS: Readonly<Record<Endpoint, string>> = {
  aggregations: '/view/aggregations',
  loans: '/view/csv',
  institutions: '/view/filers'
};

const FILTER_KEYS = [
  'actions',
  'races',
  'ethnicities',
  'sexes',
  'loanTypes',
  'loanPurposes',
  'lienStatuses'
] as const;

function toList(value: unknown): unknown {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function dedupe<T>(values: readonly T[], keyOf: (value: T) => string = String): T[] {
  const seen = new Set<string>();
  return values.filter((value) => {
    const key = keyOf(value);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function filterSchema<E extends Record<string, string>>(values: E, label: string) {
  return z.preprocess(
    toList,
    z.array(
      z.nativeEnum(values, {
        errorMap: (_issue, ctx) => ({
          message: `${JSON.stringify(ctx.data)} is not a valid ${label}`
        })
      })
    )
  );
}

const stateCode = z
  .string({ invalid_type_error: 'state must be a string' })
  .transform((code) => code.replace(/\s+/g, ''))
  .superRefine((code, ctx) => {
    if (!STATE_CODES.has(code.toUpperCase())) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `'${code}' is not a valid two-letter state abbreviation`
      });
    }
  });

export interface YearRange {
  minYear: number;
  maxYear: number;
}

function querySchema({ minYear, maxYear }: YearRange) {
  const rangeMessage = `year must be between ${minYear} and ${maxYear}`;
  return z
    .object({
      year: z
        .number({ required_error: 'year is required', invalid_type_error: 'year must be a number' })
        .int('year must be an integer')
        .min(minYear, rangeMessage)
        .max(maxYear, rangeMessage),
      states: z.preprocess(toList, z.array(stateCode).min(1, 'at least one state is required')),
      actions: filterSchema(Action, 'Action'),
      races: filterSchema(Race, 'Race'),
      ethnicities: filterSchema(Ethnicity, 'Ethnicity'),
      sexes: filterSchema(Sex, 'Sex'),
      loanTypes: filterSchema(LoanType, 'LoanType'),
      loanPurposes: filterSchema(LoanPurpose, 'LoanPurpose'),
      lienStatuses: filterSchema(LienStatus, 'LienStatus')
    })
    .strict();
}

function valueAt(input: unknown, path: (string | number)[]): unknown {
  let current: unknown = input;
  for (const segment of path) {
    if (typeof segment === 'number') {
      current = Array.isArray(current) ? current[segment] : current;
    } else if (typeof current === 'object' && current !== null) {
      current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    } else {
      return undefined;
    }
  }
  return current;
}

function toInvalidParameter(issue: z.ZodIssue, input: unknown): InvalidParameterError {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const [key = 'query'] = issue.keys;
    return new InvalidParameterError(key, valueAt(input, [key]), `Unknown parameter '${key}'`);
  }

  const [head] = issue.path;
  const parameter = head === undefined ? 'query' : String(head);
  const value = valueAt(input, issue.path);
  const position = typeof issue.path[1] === 'number' ? ` (index ${issue.path[1]})` : '';
  return new InvalidParameterError(parameter, value, `Invalid ${parameter}${position}: ${issue.message}`);
}

/**
 * Check caller-supplied parameters and normalize them. Single values become
 * one-element lists and an omitted or empty filter stays empty, meaning the
 * field is not filtered. Institutions only take `year` and `states`.
 *
 * @throws InvalidParameterError on the first invalid parameter
 */
export function validateQuery(input: unknown, endpoint: Endpoint, range: YearRange): ValidatedQuery {
  const result = querySchema(range).safeParse(input);
  if (!result.success) {
    const [issue] = result.error.issues;
    throw issue
      ? toInvalidParameter(issue, input)
      : new InvalidParameterError('query', input, 'Invalid query');
  }

  const data = result.data;
  if (endpoint === 'institutions') {
    const filtered = FILTER_KEYS.find((key) => data[key].length > 0);
    if (filtered) {
      throw new InvalidParameterError(
        filtered,
        valueAt(input, [filtered]),
        `Invalid ${filtered}: the institutions endpoint only filters by year and states`
      );
    }
  }

  return Object.freeze({
    year: data.year,
    states: Object.freeze(dedupe(data.states, (code) => code.toUpperCase())),
    actions: Object.freeze(dedupe(data.actions)),
    races: Object.freeze(dedupe(data.races)),
    ethnicities: Object.freeze(dedupe(data.ethnicities)),
    sexes: Object.freeze(dedupe(data.sexes)),
    loanTypes: Object.freeze(dedupe(data.loanTypes)),
    loanPurposes: Object.freeze(dedupe(data.loanPurposes)),
    lienStatuses: Object.freeze(dedupe(data.lienStatuses))
  });
}

// Remote field name and wire tokens for each filter, in query order
function filterTokens(query: ValidatedQuery): [string, string[]][] {
  return [
    ['actions_taken', query.actions.map((value) => ACTION_TOKENS[value])],
    ['races', query.races.map((value) => RACE_TOKENS[value])],
    ['ethnicities', query.ethnicities.map((value) => ETHNICITY_TOKENS[value])],
    ['sexes', query.sexes.map((value) => SEX_TOKENS[value])],
    ['loan_types', query.loanTypes.map((value) => LOAN_TYPE_TOKENS[value])],
    ['loan_purposes', query.loanPurposes.map((value) => LOAN_PURPOSE_TOKENS[value])],
    ['lien_statuses', query.lienStatuses.map((value) => LIEN_STATUS_TOKENS[value])]
  ];
}

/** Every action_taken code, which the API treats the same as no filter */
export const ALL_ACTION_TOKENS: readonly string[] = Object.values(Action).map(
  (action) => ACTION_TOKENS[action]
);

/**
 * Build the query string for an endpoint. Aggregations and loans need at least
 * one filter variable, so an unfiltered request asks for every action code.
 */
export function buildQuery(endpoint: Endpoint, query: ValidatedQuery): URLSearchParams {
  const params = new URLSearchParams();
  params.set('states', query.states.join(','));
  params.set('years', String(query.year));

  if (endpoint === 'institutions') {
    return params;
  }

  const filters = filterTokens(query).filter(([, tokens]) => tokens.length > 0);
  if (filters.length === 0) {
    params.set('actions_taken', ALL_ACTION_TOKENS.join(','));
    return params;
  }

  for (const [field, tokens] of filters) {
    params.set(field, tokens.join(','));
  }
  return params;
}

export function buildUrl(baseUrl: string, endpoint: Endpoint, query: ValidatedQuery): string {
  return `${baseUrl}${ENDPOINT_PATHS[endpoint]}?${buildQuery(endpoint, query).toString()}`;
}
