/**
 * Output Formatting for CLI Commands
 *
 * Human-readable tables and JSON summaries of pipeline results.
 *
 * @module cli/lib/output
 */

import type { PipelineError } from '../../core/errors.js';
import type { Table } from '../../core/types.js';
import type { PipelineRunResult, StageReport } from '../../pipeline/orchestrator.js';

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly align?: 'left' | 'right';
}

/**
 * Format rows as an aligned text table
 */
export function formatTable(
  data: readonly Readonly<Record<string, unknown>>[],
  columns: readonly TableColumn[]
): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cell = (value: unknown): string => (value === null || value === undefined ? '-' : String(value));

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...data.map((row) => cell(row[col.key]).length))
  );

  const pad = (value: string, width: number, align: 'left' | 'right' = 'left'): string =>
    align === 'right' ? value.padStart(width) : value.padEnd(width);

  const headerRow = columns.map((col, i) => pad(col.header, widths[i] ?? 0, col.align)).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => pad(cell(row[col.key]), widths[i] ?? 0, col.align)).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Format a pipeline table using its own columns
 */
export function formatDataTable(table: Table): string {
  return formatTable(
    table.rows,
    table.columns.map((column) => ({ key: column, header: column }))
  );
}

function errorSummary(error: PipelineError): Record<string, unknown> {
  return error.toLogMetadata();
}

/**
 * JSON-safe form of a run result
 */
export function serializeRunResult(result: PipelineRunResult): Record<string, unknown> {
  return {
    status: result.status,
    durationMs: result.durationMs,
    stages: result.stages.map((report) => ({
      stage: report.stage,
      ok: report.ok,
      ...(report.rows !== undefined && { rows: report.rows }),
      ...(report.path !== undefined && { path: report.path }),
      ...(report.error && { error: errorSummary(report.error) }),
    })),
    ...(result.error && { error: errorSummary(result.error) }),
  };
}

/**
 * Human-readable summary of a run
 */
export function formatRunSummary(result: PipelineRunResult): string {
  const rows = result.stages.map((report: StageReport) => ({
    stage: report.stage,
    status: report.ok ? 'ok' : 'failed',
    rows: report.rows,
    path: report.path,
  }));

  const lines = [
    `Pipeline ${result.status} in ${result.durationMs}ms`,
    '',
    formatTable(rows, [
      { key: 'stage', header: 'Stage' },
      { key: 'status', header: 'Status' },
      { key: 'rows', header: 'Rows', align: 'right' },
      { key: 'path', header: 'Path' },
    ]),
  ];

  if (result.error) {
    lines.push('', `Error (${result.error.kind}): ${result.error.message}`);
  }

  return lines.join('\n');
}
