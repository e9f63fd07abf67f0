/**
 * Test fixtures: table builders, temp directories and a quiet logger
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CellValue, Row, Table } from '../../core/types.js';
import { createLogger, type Logger } from '../../core/utils/logger.js';

/**
 * Street export columns, in file order
 */
export const INCIDENT_COLUMNS: readonly string[] = [
  'Crime ID',
  'Month',
  'Reported by',
  'Falls within',
  'Longitude',
  'Latitude',
  'Location',
  'LSOA code',
  'LSOA name',
  'Crime type',
  'Last outcome category',
  'Context',
];

export const OUTCOME_COLUMNS: readonly string[] = ['Crime ID', 'Month', 'Outcome type'];

export function table(columns: readonly string[], rows: readonly Row[]): Table {
  return { columns, rows };
}

/**
 * Incident row with every street export column filled in
 */
export function incident(overrides: Readonly<Record<string, CellValue>> = {}): Row {
  return {
    'Crime ID': 'c-000',
    Month: '2022-01',
    'Reported by': 'Test Constabulary',
    'Falls within': 'Test Constabulary',
    Longitude: -2.5,
    Latitude: 53.25,
    Location: 'On or near Park Road',
    'LSOA code': 'E01000001',
    'LSOA name': 'Test 001A',
    'Crime type': 'Theft',
    'Last outcome category': 'Under investigation',
    Context: null,
    ...overrides,
  };
}

export function outcome(crimeId: CellValue, outcomeType: CellValue): Row {
  return { 'Crime ID': crimeId, Month: '2022-01', 'Outcome type': outcomeType };
}

/**
 * Logger that writes nowhere but the optional log file
 */
export function quietLogger(logFile?: string): Logger {
  return createLogger({ level: 'debug', pretty: false, silent: true, logFile });
}

export interface LogLine {
  readonly level: string;
  readonly message: string;
  readonly [key: string]: unknown;
}

/**
 * Read back a JSON log file written by quietLogger
 */
export async function readLogLines(logFile: string): Promise<LogLine[]> {
  const content = await readFile(logFile, 'utf-8');
  return content
    .split('\n')
    .filter((line) => line.trim() !== '')
    .map((line): LogLine => {
      const parsed: unknown = JSON.parse(line);
      if (
        typeof parsed !== 'object' ||
        parsed === null ||
        !('level' in parsed) ||
        !('message' in parsed) ||
        typeof parsed.level !== 'string' ||
        typeof parsed.message !== 'string'
      ) {
        throw new Error(`Unexpected log line: ${line}`);
      }
      return { ...parsed, level: parsed.level, message: parsed.message };
    });
}

export function createTempDir(prefix = 'crime-pipeline-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function exists(path: string): Promise<boolean> {
  try {
    await readFile(path);
    return true;
  } catch {
    return false;
  }
}
