/**
 * CSV Codec
 *
 * Reads and writes the comma-delimited, header-first files exchanged between
 * pipeline layers.
 *
 * Reading:
 * - Quoted fields may contain delimiters, doubled quotes and line breaks
 * - Blank lines are skipped
 * - Rows shorter than the header are padded with null; longer rows are a ParseError
 * - Columns whose every non-null value is numeric become number columns
 *
 * Writing:
 * - `\n` line endings, null written as an empty field
 * - Fields containing `,`, `"`, `\r` or `\n` are quoted
 */

import { parseError } from '../core/errors.js';
import type { CellValue, Row, Table } from '../core/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ParseCsvOptions {
  /** Columns kept as text regardless of content */
  readonly textColumns?: readonly string[];
  /** Source path, carried into ParseError details */
  readonly path?: string;
}

/**
 * Raw record with the line it started on (1-based)
 */
interface RawRecord {
  readonly line: number;
  readonly fields: readonly string[];
  readonly blank: boolean;
}

// ============================================================================
// Constants
// ============================================================================

/**
 * Field values read as null
 */
const NULL_TOKENS: ReadonlySet<string> = new Set([
  '',
  'NA',
  'N/A',
  'NaN',
  'nan',
  'NULL',
  'null',
  '<NA>',
]);

const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Split CSV content into records, honouring quoted fields
 */
function tokenize(content: string, path?: string): RawRecord[] {
  const records: RawRecord[] = [];
  let fields: string[] = [];
  let current = '';
  let inQuotes = false;
  let quotedRecord = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = (): void => {
    fields.push(current);
    const blank = fields.length === 1 && fields[0] === '' && !quotedRecord;
    records.push({ line: recordLine, fields, blank });
    fields = [];
    current = '';
    quotedRecord = false;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (char === '\n') line++;
        current += char;
      }
      continue;
    }

    if (char === '"' && current === '') {
      inQuotes = true;
      quotedRecord = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') i++;
      endRecord();
      line++;
      recordLine = line;
    } else {
      current += char;
    }
  }

  if (inQuotes) {
    throw parseError(`Unterminated quoted field starting on line ${recordLine}`, path);
  }

  // Final record without trailing newline
  if (current !== '' || fields.length > 0 || quotedRecord) {
    endRecord();
  }

  return records;
}

/**
 * Convert a field to a cell, honouring the null tokens
 */
function toCell(field: string): string | null {
  return NULL_TOKENS.has(field) ? null : field;
}

/**
 * Decide which columns hold numbers
 */
function inferNumericColumns(
  columns: readonly string[],
  rows: readonly (readonly (string | null)[])[],
  textColumns: readonly string[]
): Set<number> {
  const numeric = new Set<number>();

  columns.forEach((column, index) => {
    if (textColumns.includes(column)) return;

    let sawValue = false;
    for (const row of rows) {
      const value = row[index];
      if (value === null || value === undefined) continue;
      if (!NUMBER_PATTERN.test(value.trim())) return;
      sawValue = true;
    }

    if (sawValue) numeric.add(index);
  });

  return numeric;
}

/**
 * Parse CSV content into a table
 *
 * @throws PipelineError (ParseError) on empty content, over-long rows,
 *   duplicate header names or an unterminated quote
 */
export function parseCsv(content: string, options: ParseCsvOptions = {}): Table {
  const { textColumns = [], path } = options;
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  const records = tokenize(text, path).filter((record) => !record.blank);
  const header = records[0];
  if (!header) {
    throw parseError('No columns to parse from file', path);
  }

  const columns = header.fields;
  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column)) {
      throw parseError(`Duplicate column name in header: "${column}"`, path);
    }
    seen.add(column);
  }

  const cells: (string | null)[][] = [];
  for (const record of records.slice(1)) {
    if (record.fields.length > columns.length) {
      throw parseError(
        `Expected ${columns.length} fields in line ${record.line}, saw ${record.fields.length}`,
        path
      );
    }
    const row = columns.map((_, i) => {
      const field = record.fields[i];
      return field === undefined ? null : toCell(field);
    });
    cells.push(row);
  }

  const numeric = inferNumericColumns(columns, cells, textColumns);

  const rows: Row[] = cells.map((values) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      const value = values[i] ?? null;
      row[column] = value !== null && numeric.has(i) ? Number(value.trim()) : value;
    });
    return row;
  });

  return { columns, rows };
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return escapeCSV(String(value));
}

/**
 * Format a table as CSV with a header row
 */
export function formatCsv(table: Table): string {
  const headerRow = table.columns.map((c) => escapeCSV(c)).join(',');

  const dataRows = table.rows.map((row) => {
    const line = table.columns.map((column) => formatCell(row[column])).join(',');
    // A lone empty field would otherwise read back as a blank line
    return table.columns.length === 1 && line === '' ? '""' : line;
  });

  return [headerRow, ...dataRows].join('\n') + '\n';
}
