// Values match the labels the Data Browser API accepts for `races`
export enum Race {
  ASIAN = 'ASIAN',
  PACIFIC_ISLANDER = 'PACIFIC_ISLANDER',
  FREE_FORM = 'FREE_FORM',
  UNAVAILABLE = 'UNAVAILABLE',
  NATIVE_AMERICAN = 'NATIVE_AMERICAN',
  BLACK = 'BLACK',
  MIXED_MINORITY = 'MIXED_MINORITY',
  WHITE = 'WHITE',
  JOINT = 'JOINT'
}

export enum Action {
  ORIGINATED = 'ORIGINATED',
  APPROVED = 'APPROVED',
  DENIED = 'DENIED',
  WITHDRAWN = 'WITHDRAWN',
  INCOMPLETE = 'INCOMPLETE',
  PURCHASED = 'PURCHASED',
  PREDENIED = 'PREDENIED',
  PREAPPROVED = 'PREAPPROVED'
}

export enum Ethnicity {
  HISPANIC = 'HISPANIC',
  NOT_HISPANIC = 'NOT_HISPANIC',
  JOINT = 'JOINT',
  UNAVAILABLE = 'UNAVAILABLE',
  FREE_FORM = 'FREE_FORM'
}

export enum Sex {
  MALE = 'MALE',
  FEMALE = 'FEMALE',
  JOINT = 'JOINT',
  UNAVAILABLE = 'UNAVAILABLE'
}

export enum LoanType {
  CONVENTIONAL = 'CONVENTIONAL',
  FHA = 'FHA',
  VA = 'VA',
  RHS_FSA = 'RHS_FSA'
}

export enum LoanPurpose {
  HOME_PURCHASE = 'HOME_PURCHASE',
  HOME_IMPROVEMENT = 'HOME_IMPROVEMENT',
  REFINANCING = 'REFINANCING',
  CASH_OUT_REFINANCING = 'CASH_OUT_REFINANCING',
  OTHER = 'OTHER',
  NOT_APPLICABLE = 'NOT_APPLICABLE'
}

export enum LienStatus {
  FIRST_LIEN = 'FIRST_LIEN',
  SUBORDINATE_LIEN = 'SUBORDINATE_LIEN'
}

export const RACE_TOKENS: Readonly<Record<Race, string>> = {
  [Race.ASIAN]: 'Asian',
  [Race.PACIFIC_ISLANDER]: 'Native Hawaiian or Other Pacific Islander',
  [Race.FREE_FORM]: 'Free Form Text Only',
  [Race.UNAVAILABLE]: 'Race Not Available',
  [Race.NATIVE_AMERICAN]: 'American Indian or Alaska Native',
  [Race.BLACK]: 'Black or African American',
  [Race.MIXED_MINORITY]: '2 or more minority races',
  [Race.WHITE]: 'White',
  [Race.JOINT]: 'Joint'
};

// action_taken codes from the HMDA filing instructions
export const ACTION_TOKENS: Readonly<Record<Action, string>> = {
  [Action.ORIGINATED]: '1',
  [Action.APPROVED]: '2',
  [Action.DENIED]: '3',
  [Action.WITHDRAWN]: '4',
  [Action.INCOMPLETE]: '5',
  [Action.PURCHASED]: '6',
  [Action.PREDENIED]: '7',
  [Action.PREAPPROVED]: '8'
};

export const ETHNICITY_TOKENS: Readonly<Record<Ethnicity, string>> = {
  [Ethnicity.HISPANIC]: 'Hispanic or Latino',
  [Ethnicity.NOT_HISPANIC]: 'Not Hispanic or Latino',
  [Ethnicity.JOINT]: 'Joint',
  [Ethnicity.UNAVAILABLE]: 'Ethnicity Not Available',
  [Ethnicity.FREE_FORM]: 'Free Form Text Only'
};

export const SEX_TOKENS: Readonly<Record<Sex, string>> = {
  [Sex.MALE]: 'Male',
  [Sex.FEMALE]: 'Female',
  [Sex.JOINT]: 'Joint',
  [Sex.UNAVAILABLE]: 'Sex Not Available'
};

export const LOAN_TYPE_TOKENS: Readonly<Record<LoanType, string>> = {
  [LoanType.CONVENTIONAL]: '1',
  [LoanType.FHA]: '2',
  [LoanType.VA]: '3',
  [LoanType.RHS_FSA]: '4'
};

export const LOAN_PURPOSE_TOKENS: Readonly<Record<LoanPurpose, string>> = {
  [LoanPurpose.HOME_PURCHASE]: '1',
  [LoanPurpose.HOME_IMPROVEMENT]: '2',
  [LoanPurpose.REFINANCING]: '31',
  [LoanPurpose.CASH_OUT_REFINANCING]: '32',
  [LoanPurpose.OTHER]: '4',
  [LoanPurpose.NOT_APPLICABLE]: '5'
};

export const LIEN_STATUS_TOKENS: Readonly<Record<LienStatus, string>> = {
  [LienStatus.FIRST_LIEN]: '1',
  [LienStatus.SUBORDINATE_LIEN]: '2'
};

export type Endpoint = 'aggregations' | 'loans' | 'institutions';

type OneOrMany<T> = T | readonly T[];

export interface HmdaQuery {
  year: number;
  states: OneOrMany<string>;
  actions?: OneOrMany<Action>;
  races?: OneOrMany<Race>;
  ethnicities?: OneOrMany<Ethnicity>;
  sexes?: OneOrMany<Sex>;
  loanTypes?: OneOrMany<LoanType>;
  loanPurposes?: OneOrMany<LoanPurpose>;
  lienStatuses?: OneOrMany<LienStatus>;
}

/**
 * Output of validation. Every list is de-duplicated; an empty list means
 * the field is not filtered.
 */
export interface ValidatedQuery {
  readonly year: number;
  readonly states: readonly string[];
  readonly actions: readonly Action[];
  readonly races: readonly Race[];
  readonly ethnicities: readonly Ethnicity[];
  readonly sexes: readonly Sex[];
  readonly loanTypes: readonly LoanType[];
  readonly loanPurposes: readonly LoanPurpose[];
  readonly lienStatuses: readonly LienStatus[];
}

export type CellValue = string | number | boolean | null;

export type TableRow = Record<string, CellValue>;

export interface Table {
  columns: string[];
  rows: TableRow[];
}

// Shapes returned by the JSON endpoints
export interface AggregationRecord {
  count: number;
  sum: number;
  [filter: string]: CellValue;
}

export interface InstitutionRecord {
  lei: string;
  name: string;
  period: number;
}

export interface AggregationsResponse {
  parameters: Record<string, string>;
  aggregations: AggregationRecord[];
}

export interface InstitutionsResponse {
  institutions: InstitutionRecord[];
}
