/**
 * Stager
 *
 * Staging layer: joins incidents to their recorded outcomes, derives the
 * final outcome, classifies it, and drops the columns it was derived from.
 *
 * Every function here is pure and throws PipelineError (TransformError) on
 * missing required columns.
 */

import { COLUMNS, STAGING_DROP_COLUMNS } from '../core/constants.js';
import { transformError } from '../core/errors.js';
import type { CellValue, OutcomeCategoryRule, Row, Table } from '../core/types.js';
import { categorizeOutcome, DEFAULT_OUTCOME_CATEGORY_RULES } from './outcome-categories.js';

const STAGE = 'stage';

function requireColumns(table: Table, required: readonly string[], label: string): void {
  const missing = required.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    throw transformError(
      `${label} table is missing required column(s): ${missing.join(', ')}`,
      STAGE
    );
  }
}

/**
 * Join key for a Crime ID cell. Null and empty IDs never match.
 */
function joinKey(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  const key = String(value);
  return key === '' ? null : key;
}

/**
 * Left-join incidents to outcomes on `Crime ID`, taking only `Outcome type`
 *
 * Incident order is preserved. An incident with several matching outcomes
 * is repeated once per match, in outcome order; an incident with none gets
 * `Outcome type = null`.
 */
export function mergeOutcomes(incidents: Table, outcomes: Table): Table {
  requireColumns(incidents, [COLUMNS.crimeId], 'Incidents');
  requireColumns(outcomes, [COLUMNS.crimeId, COLUMNS.outcomeType], 'Outcomes');

  const outcomesById = new Map<string, CellValue[]>();
  for (const row of outcomes.rows) {
    const key = joinKey(row[COLUMNS.crimeId]);
    if (key === null) continue;
    const matches = outcomesById.get(key) ?? [];
    matches.push(row[COLUMNS.outcomeType] ?? null);
    outcomesById.set(key, matches);
  }

  const rows: Row[] = [];
  for (const row of incidents.rows) {
    const key = joinKey(row[COLUMNS.crimeId]);
    const matches = key === null ? undefined : outcomesById.get(key);

    if (!matches) {
      rows.push({ ...row, [COLUMNS.outcomeType]: null });
      continue;
    }
    for (const outcomeType of matches) {
      rows.push({ ...row, [COLUMNS.outcomeType]: outcomeType });
    }
  }

  const columns = incidents.columns.includes(COLUMNS.outcomeType)
    ? incidents.columns
    : [...incidents.columns, COLUMNS.outcomeType];

  return { columns, rows };
}

function appendColumn(columns: readonly string[], column: string): readonly string[] {
  return columns.includes(column) ? columns : [...columns, column];
}

/**
 * Add `Final Outcome`: `Outcome type` when present, else `Last outcome category`
 */
export function deriveFinalOutcome(table: Table): Table {
  requireColumns(table, [COLUMNS.outcomeType, COLUMNS.lastOutcomeCategory], 'Merged');

  return {
    columns: appendColumn(table.columns, COLUMNS.finalOutcome),
    rows: table.rows.map((row) => {
      const outcomeType = row[COLUMNS.outcomeType] ?? null;
      return {
        ...row,
        [COLUMNS.finalOutcome]:
          outcomeType !== null ? outcomeType : (row[COLUMNS.lastOutcomeCategory] ?? null),
      };
    }),
  };
}

/**
 * Add `Broad Outcome Category` from `Final Outcome`
 */
export function applyCategorization(
  table: Table,
  rules: readonly OutcomeCategoryRule[] = DEFAULT_OUTCOME_CATEGORY_RULES
): Table {
  requireColumns(table, [COLUMNS.finalOutcome], 'Merged');

  return {
    columns: appendColumn(table.columns, COLUMNS.broadOutcomeCategory),
    rows: table.rows.map((row) => ({
      ...row,
      [COLUMNS.broadOutcomeCategory]: categorizeOutcome(row[COLUMNS.finalOutcome], rules),
    })),
  };
}

/**
 * Remove a set of columns. Columns that are not present are ignored.
 */
export function dropColumns(table: Table, drop: readonly string[]): Table {
  const dropSet = new Set(drop);
  const columns = table.columns.filter((column) => !dropSet.has(column));

  return {
    columns,
    rows: table.rows.map((row) => {
      const kept: Record<string, CellValue> = {};
      for (const column of columns) {
        kept[column] = row[column] ?? null;
      }
      return kept;
    }),
  };
}

/**
 * Drop the staging columns
 */
export function dropStagingColumns(table: Table): Table {
  return dropColumns(table, STAGING_DROP_COLUMNS);
}

/**
 * Full staging transform: merge → final outcome → categorize → drop
 */
export function stage(
  incidents: Table,
  outcomes: Table,
  rules: readonly OutcomeCategoryRule[] = DEFAULT_OUTCOME_CATEGORY_RULES
): Table {
  requireColumns(
    incidents,
    [COLUMNS.crimeId, COLUMNS.lastOutcomeCategory],
    'Incidents'
  );

  const merged = mergeOutcomes(incidents, outcomes);
  const withFinal = deriveFinalOutcome(merged);
  const categorized = applyCategorization(withFinal, rules);
  return dropStagingColumns(categorized);
}
