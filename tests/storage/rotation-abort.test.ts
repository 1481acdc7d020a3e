import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DecryptionFailureError } from '../../src/lib/errors.js';
import { SALT_FILENAME, SecureStorage } from '../../src/storage/secure-storage.js';
import { createDataDir } from '../helpers/test-keys.js';

const tempWrites = vi.hoisted(() => ({ allowed: Number.POSITIVE_INFINITY, count: 0 }));

vi.mock('node:fs/promises', async importOriginal => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    writeFile: vi.fn((...args: Parameters<typeof actual.writeFile>) => {
      const [file] = args;
      if (typeof file === 'string' && file.endsWith('.tmp')) {
        tempWrites.count++;
        if (tempWrites.count > tempWrites.allowed) {
          return Promise.reject(new Error('disk full'));
        }
      }
      return actual.writeFile(...args);
    })
  };
});

describe('SecureStorage rotation commit', () => {
  let basePath: string;
  let storage: SecureStorage;

  beforeEach(async () => {
    basePath = await createDataDir();
    storage = new SecureStorage({ basePath });
    await storage.setMasterPassword('pw-one');
    await storage.save('alpha.json', { value: 'a' });
    await storage.save('nested/beta.json', [1, 2, 3]);
  });

  afterEach(async () => {
    tempWrites.allowed = Number.POSITIVE_INFINITY;
    tempWrites.count = 0;
    storage.close();
    await rm(basePath, { recursive: true, force: true });
  });

  it('should rename nothing when a temp write fails', async () => {
    const alphaBefore = await readFile(join(basePath, 'alpha.json'), 'utf-8');
    const betaBefore = await readFile(join(basePath, 'nested', 'beta.json'), 'utf-8');

    tempWrites.count = 0;
    tempWrites.allowed = 1;
    await expect(storage.rotatePassword('pw-one', 'pw-two')).rejects.toThrow('disk full');
    tempWrites.allowed = Number.POSITIVE_INFINITY;

    expect(await readFile(join(basePath, 'alpha.json'), 'utf-8')).toBe(alphaBefore);
    expect(await readFile(join(basePath, 'nested', 'beta.json'), 'utf-8')).toBe(betaBefore);
    expect(await storage.listAllFiles()).toEqual([SALT_FILENAME, 'alpha.json', 'nested/beta.json']);
  });

  it('should keep the old session key after an aborted rotation', async () => {
    tempWrites.count = 0;
    tempWrites.allowed = 0;
    await expect(storage.rotatePassword('pw-one', 'pw-two')).rejects.toThrow('disk full');
    tempWrites.allowed = Number.POSITIVE_INFINITY;

    expect(storage.isInitialized()).toBe(true);
    expect(await storage.load('alpha.json', {})).toEqual({ value: 'a' });

    const stale = new SecureStorage({ basePath });
    await expect(stale.setMasterPassword('pw-two')).rejects.toThrow(DecryptionFailureError);

    const reopened = new SecureStorage({ basePath });
    await reopened.setMasterPassword('pw-one');
    expect(await reopened.load('nested/beta.json', [])).toEqual([1, 2, 3]);
    reopened.close();
  });
});
