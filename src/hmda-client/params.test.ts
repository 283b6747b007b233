import { describe, it, expect } from 'vitest';
import { ALL_ACTION_TOKENS, buildQuery, buildUrl, validateQuery } from './params.js';
import { Action, LoanPurpose, Race, Sex } from '../types/hmda.js';
import { InvalidParameterError } from '../utils/errors.js';

const range = { minYear: 2018, maxYear: 2024 };

function invalidParameter(fn: () => unknown): InvalidParameterError {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidParameterError) return error;
    throw error;
  }
  throw new Error('expected InvalidParameterError');
}

describe('validateQuery', () => {
  it('normalizes single values to lists and leaves omitted filters empty', () => {
    const query = validateQuery({ year: 2019, states: 'dc', races: Race.ASIAN }, 'loans', range);

    expect(query).toEqual({
      year: 2019,
      states: ['dc'],
      actions: [],
      races: [Race.ASIAN],
      ethnicities: [],
      sexes: [],
      loanTypes: [],
      loanPurposes: [],
      lienStatuses: []
    });
    expect(Object.isFrozen(query)).toBe(true);
    expect(Object.isFrozen(query.states)).toBe(true);
  });

  it('strips whitespace from state codes and keeps their casing', () => {
    const query = validateQuery({ year: 2020, states: ['ny ', 'PA', 'vA', ' Fl'] }, 'institutions', range);

    expect(query.states).toEqual(['ny', 'PA', 'vA', 'Fl']);
  });

  it('drops duplicate states and filter values', () => {
    const query = validateQuery(
      { year: 2020, states: ['DC', 'dc'], actions: [Action.DENIED, Action.DENIED, Action.ORIGINATED] },
      'loans',
      range
    );

    expect(query.states).toEqual(['DC']);
    expect(query.actions).toEqual([Action.DENIED, Action.ORIGINATED]);
  });

  it.each([2017, 2025, 1990])('rejects year %i outside the published range', (year) => {
    const error = invalidParameter(() => validateQuery({ year, states: 'DC' }, 'loans', range));

    expect(error.parameter).toBe('year');
    expect(error.value).toBe(year);
    expect(error.message).toBe('Invalid year: year must be between 2018 and 2024');
  });

  it('rejects a fractional or missing year', () => {
    expect(invalidParameter(() => validateQuery({ year: 2019.5, states: 'DC' }, 'loans', range)).message).toBe(
      'Invalid year: year must be an integer'
    );
    expect(invalidParameter(() => validateQuery({ states: 'DC' }, 'loans', range)).message).toBe(
      'Invalid year: year is required'
    );
  });

  it.each(['XY', 'Virginia', 'DC,MD,VA', ''])('rejects state %j', (state) => {
    const error = invalidParameter(() => validateQuery({ year: 2019, states: state }, 'loans', range));

    expect(error.parameter).toBe('states');
    expect(error.value).toBe(state);
  });

  it('reports the position of a bad state in a list', () => {
    const error = invalidParameter(() =>
      validateQuery({ year: 2019, states: ['DC', 'MD', 'VA', 'XY'] }, 'institutions', range)
    );

    expect(error.value).toBe('XY');
    expect(error.message).toBe("Invalid states (index 3): 'XY' is not a valid two-letter state abbreviation");
  });

  it('requires at least one state', () => {
    expect(invalidParameter(() => validateQuery({ year: 2019, states: [] }, 'loans', range)).message).toBe(
      'Invalid states: at least one state is required'
    );
  });

  it('rejects values that are not enum members', () => {
    const error = invalidParameter(() =>
      validateQuery({ year: 2019, states: 'DC', actions: [Action.APPROVED, 'Withdrawn'] }, 'loans', range)
    );

    expect(error.parameter).toBe('actions');
    expect(error.value).toBe('Withdrawn');
    expect(error.message).toBe('Invalid actions (index 1): "Withdrawn" is not a valid Action');
  });

  it('rejects unknown parameters', () => {
    const error = invalidParameter(() =>
      validateQuery({ year: 2019, states: 'DC', race: Race.WHITE }, 'loans', range)
    );

    expect(error.parameter).toBe('race');
    expect(error.message).toBe("Unknown parameter 'race'");
  });

  it('rejects loan filters for the institutions endpoint', () => {
    const error = invalidParameter(() =>
      validateQuery({ year: 2019, states: 'DC', races: [Race.WHITE] }, 'institutions', range)
    );

    expect(error.parameter).toBe('races');
    expect(error.message).toBe('Invalid races: the institutions endpoint only filters by year and states');
  });

  it('accepts empty filter lists for the institutions endpoint', () => {
    expect(validateQuery({ year: 2019, states: 'DC', races: [] }, 'institutions', range).races).toEqual([]);
  });

  it('rejects a query that is not an object', () => {
    expect(invalidParameter(() => validateQuery(null, 'loans', range)).parameter).toBe('query');
  });
});

describe('buildQuery', () => {
  it('encodes fields with the remote names and comma-joined values', () => {
    const query = validateQuery(
      { year: 2019, states: 'dc', actions: [Action.INCOMPLETE], races: [Race.BLACK, Race.WHITE] },
      'loans',
      range
    );

    expect(buildQuery('loans', query).toString()).toBe(
      'states=dc&years=2019&actions_taken=5&races=Black+or+African+American%2CWhite'
    );
  });

  it('returns the same query for the same inputs', () => {
    const input = {
      year: 2021,
      states: ['DC', 'MD'],
      races: [Race.JOINT, Race.ASIAN],
      actions: [Action.PREAPPROVED, Action.ORIGINATED]
    };

    const first = buildQuery('aggregations', validateQuery(input, 'aggregations', range)).toString();
    const second = buildQuery('aggregations', validateQuery(input, 'aggregations', range)).toString();

    expect(first).toBe(second);
    expect(first).toBe('states=DC%2CMD&years=2021&actions_taken=8%2C1&races=Joint%2CAsian');
  });

  it('writes filters in a fixed order regardless of input order', () => {
    const query = validateQuery(
      {
        loanPurposes: [LoanPurpose.REFINANCING, LoanPurpose.CASH_OUT_REFINANCING],
        sexes: Sex.FEMALE,
        year: 2022,
        states: 'VA'
      },
      'aggregations',
      range
    );

    expect(buildQuery('aggregations', query).toString()).toBe(
      'states=VA&years=2022&sexes=Female&loan_purposes=31%2C32'
    );
  });

  it('asks for every action code when no filter is given', () => {
    const query = validateQuery({ year: 2019, states: 'DC', actions: [], races: [] }, 'loans', range);
    const params = buildQuery('loans', query);

    expect(ALL_ACTION_TOKENS).toEqual(['1', '2', '3', '4', '5', '6', '7', '8']);
    expect(params.get('actions_taken')).toBe('1,2,3,4,5,6,7,8');
    expect(params.has('races')).toBe(false);
  });

  it('sends only location and year to the institutions endpoint', () => {
    const query = validateQuery({ year: 2018, states: ['DC', 'Md', 'va'] }, 'institutions', range);

    expect(buildQuery('institutions', query).toString()).toBe('states=DC%2CMd%2Cva&years=2018');
  });
});

describe('buildUrl', () => {
  it('joins the endpoint path and query', () => {
    const query = validateQuery({ year: 2020, states: 'DC', races: Race.UNAVAILABLE }, 'aggregations', range);

    expect(buildUrl('http://hmda.test', 'aggregations', query)).toBe(
      'http://hmda.test/view/aggregations?states=DC&years=2020&races=Race+Not+Available'
    );
    expect(buildUrl('http://hmda.test', 'loans', query)).toBe(
      'http://hmda.test/view/csv?states=DC&years=2020&races=Race+Not+Available'
    );
  });
});
