/**
 * Atomic file replacement.
 *
 * @module core/storage/atomic
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { describeError, errorCode, StorageError } from '../types.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('storage');

/**
 * Replaces a file's contents so that readers see either the old or the new
 * contents, never a partial write.
 *
 * The data goes to a temp file in the same directory which is then renamed
 * over the target. On failure the temp file is removed.
 *
 * @throws {StorageError} If the write or rename fails
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  const tempPath = `${filePath}.${process.pid}.tmp`;

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (err) {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupErr) {
      logger.warn(`Could not remove ${tempPath}`, cleanupErr);
    }
    throw new StorageError(`Failed to write ${filePath}: ${describeError(err)}`, filePath);
  }
}

/**
 * Reads a file, or returns null when it does not exist.
 *
 * @throws {StorageError} On any other read failure
 */
export async function readFileIfExists(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return null;
    }
    throw new StorageError(`Failed to read ${filePath}: ${describeError(err)}`, filePath);
  }
}

/**
 * Removes a file, treating a missing file as already removed.
 *
 * @throws {StorageError} On any failure other than a missing file
 */
export async function removeIfExists(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errorCode(err) !== 'ENOENT') {
      throw new StorageError(`Failed to remove ${filePath}: ${describeError(err)}`, filePath);
    }
  }
}
