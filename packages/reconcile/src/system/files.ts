import { dirname } from 'node:path';
import fs from 'graceful-fs';
import { atomicWrite, hasErrnoCode } from '@nodeconf/core';

const fsPromises = fs.promises;

/** Read a text file, or `undefined` when it does not exist. */
export async function readOptional(filePath: string): Promise<string | undefined> {
  try {
    return await fsPromises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return undefined;
    throw err;
  }
}

/** Replace a regular file atomically, creating its directory. */
export async function writeSystemFile(filePath: string, content: string, mode?: number): Promise<void> {
  await fsPromises.mkdir(dirname(filePath), { recursive: true });
  let fileMode = mode;
  if (fileMode === undefined) {
    try {
      fileMode = (await fsPromises.stat(filePath)).mode & 0o777;
    } catch (err) {
      if (!hasErrnoCode(err, 'ENOENT')) throw err;
    }
  }
  await atomicWrite(filePath, content, { mode: fileMode });
}

/**
 * Write into an existing attribute file such as a sysfs node, which cannot
 * be replaced by rename.
 */
export async function writeInPlace(filePath: string, content: string): Promise<void> {
  await fsPromises.writeFile(filePath, content, 'utf-8');
}

/** Entry names of a directory; empty when it does not exist. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return (await fsPromises.readdir(dirPath)).sort();
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return [];
    throw err;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fsPromises.access(filePath);
    return true;
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return false;
    throw err;
  }
}
