// Column names the pipeline reads or writes. Every other column is carried through untouched.
export const QUESTION_ID = 'Question ID';
export const OBSERVATION = 'Observation';
export const BASELINE_EVIDENCE = 'Baseline Evidence';
export const CONFORMITY_LEVEL = 'Conformity Level';

export const CONFORMITY_LEVELS = [
  'Full Conformity',
  'Partial Conformity',
  'No Conformity',
  'N/A',
] as const;

export type ConformityLevel = (typeof CONFORMITY_LEVELS)[number];

/** Key a record without a `Conformity Level` is counted under when summarising. */
export const DEFAULT_SUMMARY_LEVEL: ConformityLevel = 'N/A';

/** Header row plus 1-based numbering: record 0 sits on spreadsheet row 2. */
export const HEADER_ROW_OFFSET = 2;

export const MISSING_BASELINE_EVIDENCE = 'Missing Baseline Evidence';
