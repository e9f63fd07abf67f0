/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a checkpoint file holds either the previous
 * content or the new content, never a partial write.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('./data/staged_street.csv', formatCsv(table));
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    // Best effort: the write or rename error is the one reported
    await unlink(tempPath).catch(() => {
      /* ignore cleanup errors */
    });
    throw error;
  }
}
