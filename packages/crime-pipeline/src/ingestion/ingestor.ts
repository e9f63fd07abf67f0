/**
 * Ingestor
 *
 * Reads one CSV file into an in-memory table. Failures come back as tagged
 * results (NotFound, ParseError) and are never thrown past this boundary;
 * the caller decides whether to continue.
 */

import { readFile } from 'node:fs/promises';
import { TEXT_COLUMNS } from '../core/constants.js';
import { PipelineError, notFound, parseError, errorMessage } from '../core/errors.js';
import { fail, ok, type IngestResult } from '../core/types.js';
import { logger as defaultLogger, type Logger } from '../core/utils/logger.js';
import { parseCsv } from './csv.js';

export interface IngestOptions {
  readonly logger?: Logger;
  readonly textColumns?: readonly string[];
}

/**
 * Ingest a CSV file
 *
 * @returns the table, or a NotFound / ParseError failure
 */
export async function ingest(path: string, options: IngestOptions = {}): Promise<IngestResult> {
  const log = options.logger ?? defaultLogger;
  log.info(`Starting data ingestion from ${path}`);

  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    const failure = notFound(path, error);
    log.error(failure.message, { reason: errorMessage(error) });
    return fail(failure);
  }

  try {
    const table = parseCsv(content, {
      path,
      textColumns: options.textColumns ?? TEXT_COLUMNS,
    });
    log.info(`Data ingestion from ${path} completed successfully`, {
      rows: table.rows.length,
      columns: table.columns.length,
    });
    return ok(table);
  } catch (error) {
    const failure =
      error instanceof PipelineError ? error : parseError(errorMessage(error), path, error);
    log.error(`Error reading the CSV file ${path}: ${failure.message}`);
    return fail(failure);
  }
}
