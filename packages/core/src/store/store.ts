import { dirname } from 'node:path';
import fs from 'graceful-fs';
import { FileSystemError, NotFoundError, describeError } from '../errors.js';
import { decodeModel } from '../model/decode.js';
import type { ConfigModel } from '../model/schema.js';
import { assertValidModel } from '../model/validate.js';
import { atomicWrite } from '../utils/atomic-write.js';
import { hasErrnoCode } from '../utils/errno.js';
import { withFileLock } from '../utils/file-lock.js';
import type { LockOptions } from '../utils/file-lock.js';
import { renderCanonical, renderModel } from './render.js';
import { parseToml } from './toml.js';

const fsPromises = fs.promises;

/** Mode for a newly created store file; it holds wifi passphrases. */
const NEW_FILE_MODE = 0o600;

export interface SaveOptions {
  lock?: LockOptions;
  /**
   * Ignore the current file content and write a canonical render
   * (used to recreate a store that no longer parses).
   */
  overwrite?: boolean;
}

export interface SaveResult {
  /** False when the file already held exactly the rendered text */
  written: boolean;
  path: string;
}

async function readIfExists(filePath: string): Promise<string | undefined> {
  try {
    return await fsPromises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return undefined;
    throw new FileSystemError(`Failed to read ${filePath}: ${describeError(err)}`, filePath, err);
  }
}

async function modeOf(filePath: string): Promise<number> {
  try {
    const stats = await fsPromises.stat(filePath);
    return stats.mode & 0o7777;
  } catch (err) {
    if (hasErrnoCode(err, 'ENOENT')) return NEW_FILE_MODE;
    throw new FileSystemError(`Failed to stat ${filePath}: ${describeError(err)}`, filePath, err);
  }
}

/**
 * Load the config model stored at `filePath`.
 *
 * @throws {NotFoundError} if the file does not exist (callers may fall back to defaults)
 * @throws {ParseError} if the file is not well-formed TOML
 * @throws {ValidationError} if a value has the wrong type
 */
export async function loadModel(filePath: string): Promise<ConfigModel> {
  const text = await readIfExists(filePath);
  if (text === undefined) {
    throw new NotFoundError(`Config store not found: ${filePath}`, 'config', filePath);
  }
  return decodeModel(parseToml(text, filePath));
}

/**
 * Validate `model` and write it to `filePath`, preserving comments and
 * unknown keys of the current file. Runs under an exclusive lock on the
 * file; the write itself is atomic. Nothing is written when the rendered
 * text equals the current content.
 *
 * @throws {ValidationError} if the model is invalid (the file is not touched)
 * @throws {ParseError} if the current file is not well-formed TOML
 * @throws {LockTimeoutError} if the lock cannot be acquired
 * @throws {FileSystemError} if the file cannot be read or written
 */
export async function saveModel(
  filePath: string,
  model: ConfigModel,
  options: SaveOptions = {},
): Promise<SaveResult> {
  assertValidModel(model);

  const dir = dirname(filePath);
  try {
    await fsPromises.mkdir(dir, { recursive: true });
  } catch (err) {
    throw new FileSystemError(`Failed to create ${dir}: ${describeError(err)}`, dir, err);
  }

  return withFileLock(
    filePath,
    async () => {
      const current = await readIfExists(filePath);
      let rendered: string;
      if (options.overwrite || current === undefined) {
        rendered = renderCanonical(model);
      } else {
        parseToml(current, filePath);
        rendered = renderModel(model, current);
      }

      if (rendered === current) {
        return { written: false, path: filePath };
      }
      await atomicWrite(filePath, rendered, { mode: await modeOf(filePath) });
      return { written: true, path: filePath };
    },
    options.lock,
  );
}
