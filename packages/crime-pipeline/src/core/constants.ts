/**
 * Column names and default file layout
 */

export const COLUMNS = {
  crimeId: 'Crime ID',
  crimeType: 'Crime type',
  latitude: 'Latitude',
  longitude: 'Longitude',
  lastOutcomeCategory: 'Last outcome category',
  outcomeType: 'Outcome type',
  finalOutcome: 'Final Outcome',
  broadOutcomeCategory: 'Broad Outcome Category',
  locationSum: 'Location Sum',
  count: 'Count',
} as const;

/**
 * Columns removed during staging. Their information survives only in
 * `Broad Outcome Category`.
 */
export const STAGING_DROP_COLUMNS: readonly string[] = [
  'Reported by',
  'Context',
  'Location',
  COLUMNS.lastOutcomeCategory,
  COLUMNS.outcomeType,
  COLUMNS.finalOutcome,
];

/**
 * Columns always read as text, even when every value looks numeric
 */
export const TEXT_COLUMNS: readonly string[] = [COLUMNS.crimeId];

export const DEFAULT_FILE_NAMES = {
  raw: '2022-01-cheshire-street.csv',
  outcomes: '2022-01-cheshire-outcomes.csv',
  staged: 'staged_cheshire_street.csv',
  primary: 'primary_cheshire_street.csv',
  reporting: 'reporting_cheshire_street.csv',
  log: 'pipeline.log',
} as const;
