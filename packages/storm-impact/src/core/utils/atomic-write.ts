/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename, so a crash mid-write leaves either the old file
 * or the new one, never a partial file.
 */

import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Atomically write string data to a file, creating parent directories
 *
 * @throws Error if write or rename fails
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  // PID + timestamp keeps concurrent writers apart
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
