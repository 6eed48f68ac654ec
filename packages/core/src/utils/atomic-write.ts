import fs from 'graceful-fs';
import { FileSystemError, describeError } from '../errors.js';

const fsPromises = fs.promises;

export interface AtomicWriteOptions {
  /** File mode of the written file (default: process umask applied to 0o666) */
  mode?: number;
}

/**
 * Atomically writes content to a file using a temporary file + rename pattern.
 * The temporary file lives in the same directory so the rename never
 * crosses a filesystem; a failure at any point leaves the target untouched.
 *
 * @param filePath - Target file path
 * @param content - String content to write
 * @throws {FileSystemError} If the write or rename operation fails
 */
export async function atomicWrite(
  filePath: string,
  content: string,
  options: AtomicWriteOptions = {},
): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await fsPromises.writeFile(tmpPath, content, { encoding: 'utf-8', mode: options.mode });
    await fsPromises.rename(tmpPath, filePath);
  } catch (err) {
    await fsPromises.rm(tmpPath, { force: true });
    throw new FileSystemError(`Atomic write failed for ${filePath}: ${describeError(err)}`, filePath, err);
  }
}
