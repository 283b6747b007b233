// Made-up records shaped like the Data Browser's modified LAR export
export interface MockLoan {
  activity_year: number;
  lei: string;
  state_code: string;
  county_code: string;
  derived_ethnicity: string;
  derived_race: string;
  derived_sex: string;
  action_taken: number;
  loan_type: number;
  loan_purpose: number;
  lien_status: number;
  loan_amount: number;
  interest_rate: string;
}

export interface MockInstitution {
  lei: string;
  name: string;
  period: number;
  states: string[];
}

export const LOAN_COLUMNS: (keyof MockLoan)[] = [
  'activity_year',
  'lei',
  'state_code',
  'county_code',
  'derived_ethnicity',
  'derived_race',
  'derived_sex',
  'action_taken',
  'loan_type',
  'loan_purpose',
  'lien_status',
  'loan_amount',
  'interest_rate'
];

const CAPITOL = 'TESTLEI0CAPITOL00001';
const POTOMAC = 'TESTLEI0POTOMAC00002';
const CHESAPEAKE = 'TESTLEI0CHESAPEAKE03';

export const mockLoans: MockLoan[] = [
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'White',
    derived_sex: 'Male',
    action_taken: 1,
    loan_type: 1,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 455000,
    interest_rate: '3.875'
  },
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'Black or African American',
    derived_sex: 'Female',
    action_taken: 5,
    loan_type: 2,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 305000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: POTOMAC,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Hispanic or Latino',
    derived_race: 'White',
    derived_sex: 'Joint',
    action_taken: 5,
    loan_type: 1,
    loan_purpose: 31,
    lien_status: 1,
    loan_amount: 625000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: POTOMAC,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'Asian',
    derived_sex: 'Female',
    action_taken: 3,
    loan_type: 1,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 515000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'Black or African American',
    derived_sex: 'Male',
    action_taken: 1,
    loan_type: 2,
    loan_purpose: 32,
    lien_status: 1,
    loan_amount: 275000,
    interest_rate: '4.25'
  },
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Ethnicity Not Available',
    derived_race: 'Race Not Available',
    derived_sex: 'Sex Not Available',
    action_taken: 8,
    loan_type: 1,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 185000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Joint',
    derived_race: 'Joint',
    derived_sex: 'Joint',
    action_taken: 4,
    loan_type: 1,
    loan_purpose: 2,
    lien_status: 2,
    loan_amount: 95000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: CAPITOL,
    state_code: 'MD',
    county_code: '24031',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'Black or African American',
    derived_sex: 'Female',
    action_taken: 5,
    loan_type: 1,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 385000,
    interest_rate: 'NA'
  },
  {
    activity_year: 2019,
    lei: POTOMAC,
    state_code: 'VA',
    county_code: '51013',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'White',
    derived_sex: 'Male',
    action_taken: 1,
    loan_type: 3,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 705000,
    interest_rate: '3.5'
  },
  {
    activity_year: 2020,
    lei: CHESAPEAKE,
    state_code: 'DC',
    county_code: '11001',
    derived_ethnicity: 'Not Hispanic or Latino',
    derived_race: 'White',
    derived_sex: 'Female',
    action_taken: 1,
    loan_type: 1,
    loan_purpose: 1,
    lien_status: 1,
    loan_amount: 500000,
    interest_rate: '2.99'
  }
];

export const mockInstitutions: MockInstitution[] = [
  { lei: CAPITOL, name: 'Capitol Test Bank', period: 2019, states: ['DC', 'MD'] },
  { lei: POTOMAC, name: 'Potomac Test Credit Union', period: 2019, states: ['DC', 'VA'] },
  { lei: CHESAPEAKE, name: 'Chesapeake Test Mortgage', period: 2020, states: ['DC'] }
];
