/**
 * Atomic Write Utilities
 *
 * Report files are published with write-to-temp-then-rename so a reader at
 * the published location sees either the previous report or the new one,
 * never a partial file.
 */

import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

/**
 * Atomically write string data to file
 *
 * @example
 * ```typescript
 * await atomicWriteFile('./reports/2024-05-01.xml', xml);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keep concurrent writers off each other's temp files
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file already gone */
    });
    throw error;
  }
}
