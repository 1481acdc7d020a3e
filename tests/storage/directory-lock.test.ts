import { readFile, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DataDirectoryLockedError } from '../../src/lib/errors.js';
import { DirectoryLock, LOCK_FILENAME } from '../../src/storage/directory-lock.js';
import { createDataDir } from '../helpers/test-keys.js';

describe('DirectoryLock', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await createDataDir();
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('should write the owning pid and remove it on release', async () => {
    const lock = await DirectoryLock.acquire(dataDir);
    expect(await readFile(join(dataDir, LOCK_FILENAME), 'utf-8')).toBe(String(process.pid));

    await lock.release();
    await expect(stat(join(dataDir, LOCK_FILENAME))).rejects.toThrow();
  });

  it('should create the directory when missing', async () => {
    const nested = join(dataDir, 'fresh');
    const lock = await DirectoryLock.acquire(nested);
    expect((await stat(nested)).isDirectory()).toBe(true);
    await lock.release();
  });

  it('should refuse a directory held by a live process', async () => {
    const lock = await DirectoryLock.acquire(dataDir);

    await expect(DirectoryLock.acquire(dataDir)).rejects.toThrow(DataDirectoryLockedError);
    await lock.release();
  });

  it('should take over a lock left by a dead process', async () => {
    await writeFile(join(dataDir, LOCK_FILENAME), '999999999');

    const lock = await DirectoryLock.acquire(dataDir);
    expect(await readFile(join(dataDir, LOCK_FILENAME), 'utf-8')).toBe(String(process.pid));
    await lock.release();
  });

  it('should take over a lock with unreadable contents', async () => {
    await writeFile(join(dataDir, LOCK_FILENAME), 'garbage');

    const lock = await DirectoryLock.acquire(dataDir);
    await lock.release();
  });

  it('should allow release to be called twice', async () => {
    const lock = await DirectoryLock.acquire(dataDir);
    await lock.release();
    await expect(lock.release()).resolves.toBeUndefined();
  });
});
