import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  readFileIfExists,
  removeIfExists,
  writeFileAtomic,
} from '../../../src/core/storage/atomic.js';
import { StorageError } from '../../../src/core/types.js';
import { makeTempDir, removeTempDir } from '../../helpers/tempdir.js';

describe('atomic storage helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should create missing parent directories and leave no temp file behind', async () => {
    const target = path.join(dir, 'nested', 'deeper', 'state.bin');

    await writeFileAtomic(target, 'hello');

    expect(await fs.readFile(target, 'utf-8')).toBe('hello');
    expect(await fs.readdir(path.dirname(target))).toEqual(['state.bin']);
  });

  it('should replace existing contents', async () => {
    const target = path.join(dir, 'state.bin');
    await writeFileAtomic(target, 'old');

    await writeFileAtomic(target, Buffer.from('new'));

    expect(await fs.readFile(target, 'utf-8')).toBe('new');
  });

  it('should raise StorageError when the target cannot be written', async () => {
    const blocker = path.join(dir, 'file');
    await fs.writeFile(blocker, 'x');

    await expect(writeFileAtomic(path.join(blocker, 'child'), 'data')).rejects.toBeInstanceOf(
      StorageError
    );
  });

  it('should return null for a missing file', async () => {
    expect(await readFileIfExists(path.join(dir, 'missing'))).toBeNull();
  });

  it('should raise StorageError when reading a directory', async () => {
    await expect(readFileIfExists(dir)).rejects.toBeInstanceOf(StorageError);
  });

  it('should treat removing a missing file as done', async () => {
    const target = path.join(dir, 'gone');
    await fs.writeFile(target, 'x');

    await removeIfExists(target);
    await removeIfExists(target);

    expect(await readFileIfExists(target)).toBeNull();
  });
});
