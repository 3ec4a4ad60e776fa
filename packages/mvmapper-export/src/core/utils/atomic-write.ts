/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename: a target file holds either its previous content
 * or the complete new content. The temp file sits beside the target so the
 * rename stays on one filesystem.
 */

import { renameSync, rmSync, writeFileSync } from 'node:fs';

/**
 * Synchronously and atomically write string data to a file.
 *
 * The parent directory must already exist. On failure the temp file is
 * removed, the target is left as it was, and the write error is rethrown.
 *
 * @example
 * ```typescript
 * atomicWriteFileSync('/tmp/out/data.csv', 'key,PC1\nA,0.5\n');
 * ```
 */
export function atomicWriteFileSync(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): void {
  // PID + timestamp keep concurrent writers from sharing a temp file
  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    writeFileSync(tempPath, data, encoding);
    renameSync(tempPath, filePath);
  } catch (error) {
    // force: the temp file may never have been created
    rmSync(tempPath, { force: true });
    throw error;
  }
}
