/**
 * CLI Output Formatting Tests
 */

import { describe, it, expect } from 'vitest';
import { notFound, transformError } from '../../../core/errors.js';
import type { PipelineRunResult } from '../../../pipeline/orchestrator.js';
import {
  formatDataTable,
  formatRunSummary,
  formatTable,
  serializeRunResult,
} from '../../../cli/lib/output.js';
import { table } from '../../utils/fixtures.js';

describe('formatTable', () => {
  it('pads columns to their widest value', () => {
    const output = formatTable(
      [
        { name: 'Theft', count: 3 },
        { name: 'Anti-social behaviour', count: 12 },
      ],
      [
        { key: 'name', header: 'Crime type' },
        { key: 'count', header: 'Count', align: 'right' },
      ]
    );

    expect(output.split('\n')).toEqual([
      `${'Crime type'.padEnd(21)} | Count`,
      `${'-'.repeat(21)}-+-${'-'.repeat(5)}`,
      `${'Theft'.padEnd(21)} |     3`,
      'Anti-social behaviour |    12',
    ]);
  });

  it('shows missing values as a dash', () => {
    const output = formatDataTable(table(['a', 'b'], [{ a: null, b: 'x' }]));

    expect(output.split('\n')).toEqual(['a | b', '--+--', '- | x']);
  });

  it('reports an empty table', () => {
    expect(formatTable([], [{ key: 'a', header: 'A' }])).toBe('No entries found.');
  });
});

describe('run summaries', () => {
  const error = transformError('Incidents table is missing required column(s): Crime ID', 'stage');
  const failed: PipelineRunResult = {
    status: 'failed',
    durationMs: 12,
    stages: [
      { stage: 'ingest', ok: true, rows: 3, path: '/d/raw.csv' },
      { stage: 'stage', ok: false, error },
    ],
    error,
  };

  it('formats a human-readable summary', () => {
    expect(formatRunSummary(failed).split('\n')).toEqual([
      'Pipeline failed in 12ms',
      '',
      `Stage  | Status | Rows | ${'Path'.padEnd(10)}`,
      `${'-'.repeat(6)}-+-${'-'.repeat(6)}-+-${'-'.repeat(4)}-+-${'-'.repeat(10)}`,
      'ingest | ok     |    3 | /d/raw.csv',
      `stage  | failed |    - | ${'-'.padEnd(10)}`,
      '',
      'Error (TransformError): Incidents table is missing required column(s): Crime ID',
    ]);
  });

  it('serializes errors as plain objects', () => {
    expect(serializeRunResult(failed)).toEqual({
      status: 'failed',
      durationMs: 12,
      stages: [
        { stage: 'ingest', ok: true, rows: 3, path: '/d/raw.csv' },
        {
          stage: 'stage',
          ok: false,
          error: {
            kind: 'TransformError',
            error: 'Incidents table is missing required column(s): Crime ID',
            stage: 'stage',
          },
        },
      ],
      error: {
        kind: 'TransformError',
        error: 'Incidents table is missing required column(s): Crime ID',
        stage: 'stage',
      },
    });
  });

  it('keeps the path of a missing input', () => {
    const missing = notFound('/d/raw.csv');
    const serialized = serializeRunResult({
      status: 'skipped',
      durationMs: 1,
      stages: [{ stage: 'ingest', ok: false, path: '/d/raw.csv', error: missing }],
      error: missing,
    });

    expect(serialized.error).toEqual({
      kind: 'NotFound',
      error: 'File not found: /d/raw.csv',
      path: '/d/raw.csv',
    });
  });
});
