/**
 * Primary Transformer
 *
 * Primary layer: validates the categorical columns against their bounded
 * label sets and derives `Location Sum` when both coordinates exist.
 * Cell values of the categorical columns are not changed.
 */

import { COLUMNS } from '../core/constants.js';
import { transformError } from '../core/errors.js';
import {
  BROAD_OUTCOME_CATEGORIES,
  type BroadOutcomeCategory,
  type CellValue,
  type PrimaryTable,
  type Table,
} from '../core/types.js';

const STAGE = 'primary';

function isBroadOutcomeCategory(value: string): value is BroadOutcomeCategory {
  return BROAD_OUTCOME_CATEGORIES.some((category) => category === value);
}

/**
 * Sorted distinct non-null labels of a column
 */
function labelsOf(table: Table, column: string): string[] {
  const labels = new Set<string>();
  for (const row of table.rows) {
    const value = row[column];
    if (value !== null && value !== undefined) {
      labels.add(String(value));
    }
  }
  return [...labels].sort();
}

/**
 * Numeric value of a coordinate cell, null when absent
 */
function coordinate(value: CellValue | undefined, column: string, rowIndex: number): number | null {
  if (value === null || value === undefined) return null;
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (!Number.isFinite(num)) {
    throw transformError(
      `Non-numeric ${column} value "${String(value)}" in row ${rowIndex + 1}`,
      STAGE
    );
  }
  return num;
}

/**
 * Apply primary transformations to a staged table
 */
export function transformPrimary(staged: Table): PrimaryTable {
  for (const column of [COLUMNS.crimeType, COLUMNS.broadOutcomeCategory]) {
    if (!staged.columns.includes(column)) {
      throw transformError(`Staged table is missing categorical column: ${column}`, STAGE);
    }
  }

  const outcomeLabels = labelsOf(staged, COLUMNS.broadOutcomeCategory);
  const outcomeCategories = outcomeLabels.filter(isBroadOutcomeCategory);
  if (outcomeCategories.length !== outcomeLabels.length) {
    const invalid = outcomeLabels.filter((label) => !isBroadOutcomeCategory(label));
    throw transformError(
      `Unrecognised ${COLUMNS.broadOutcomeCategory} label(s): ${invalid.join(', ')}`,
      STAGE
    );
  }

  const categories = {
    crimeTypes: labelsOf(staged, COLUMNS.crimeType),
    outcomeCategories,
  };

  const hasCoordinates =
    staged.columns.includes(COLUMNS.latitude) && staged.columns.includes(COLUMNS.longitude);

  if (!hasCoordinates) {
    return { columns: staged.columns, rows: staged.rows, categories };
  }

  const rows = staged.rows.map((row, i) => {
    const lat = coordinate(row[COLUMNS.latitude], COLUMNS.latitude, i);
    const lon = coordinate(row[COLUMNS.longitude], COLUMNS.longitude, i);
    return {
      ...row,
      [COLUMNS.locationSum]: lat === null || lon === null ? null : lat + lon,
    };
  });

  const columns = staged.columns.includes(COLUMNS.locationSum)
    ? staged.columns
    : [...staged.columns, COLUMNS.locationSum];

  return { columns, rows, categories };
}
