/**
 * Reporting Aggregator
 *
 * Reporting layer: count of primary rows per (`Crime type`,
 * `Broad Outcome Category`). Only observed pairs are emitted, sorted
 * lexicographically by crime type then category; a null crime type forms
 * its own group and sorts last.
 */

import { COLUMNS } from '../core/constants.js';
import { transformError } from '../core/errors.js';
import type { CellValue, Row, Table } from '../core/types.js';

export const REPORTING_COLUMNS: readonly string[] = [
  COLUMNS.crimeType,
  COLUMNS.broadOutcomeCategory,
  COLUMNS.count,
];

interface Group {
  readonly crimeType: string | null;
  readonly category: string | null;
  count: number;
}

function label(value: CellValue | undefined): string | null {
  return value === null || value === undefined ? null : String(value);
}

function compareLabels(a: string | null, b: string | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

/**
 * Aggregate primary rows into reporting counts
 */
export function aggregate(primary: Table): Table {
  for (const column of [COLUMNS.crimeType, COLUMNS.broadOutcomeCategory]) {
    if (!primary.columns.includes(column)) {
      throw transformError(`Primary table is missing grouping column: ${column}`, 'reporting');
    }
  }

  const groups = new Map<string, Group>();
  for (const row of primary.rows) {
    const crimeType = label(row[COLUMNS.crimeType]);
    const category = label(row[COLUMNS.broadOutcomeCategory]);
    const key = JSON.stringify([crimeType, category]);

    const group = groups.get(key);
    if (group) {
      group.count++;
    } else {
      groups.set(key, { crimeType, category, count: 1 });
    }
  }

  const rows: Row[] = [...groups.values()]
    .sort(
      (a, b) =>
        compareLabels(a.crimeType, b.crimeType) || compareLabels(a.category, b.category)
    )
    .map((group) => ({
      [COLUMNS.crimeType]: group.crimeType,
      [COLUMNS.broadOutcomeCategory]: group.category,
      [COLUMNS.count]: group.count,
    }));

  return { columns: REPORTING_COLUMNS, rows };
}
