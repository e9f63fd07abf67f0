/**
 * Table writer
 *
 * Materializes a table as a CSV checkpoint. Write failures are returned as
 * WriteError results.
 */

import { writeError } from '../core/errors.js';
import { fail, ok, type StageResult, type Table } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';
import { formatCsv } from './csv.js';

/**
 * Write a table to `path`
 *
 * @returns the path written
 */
export async function writeTable(path: string, table: Table): Promise<StageResult<string>> {
  try {
    await atomicWriteFile(path, formatCsv(table));
    return ok(path);
  } catch (error) {
    return fail(writeError(path, error));
  }
}
