import { randomBytes } from 'node:crypto';
import { rm } from 'node:fs/promises';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createArmor } from '../../src/crypto/armor.js';
import { pbkdf2Sha256 } from '../../src/crypto/primitives.js';
import { encryptToken } from '../../src/crypto/token.js';
import { createBackup, restoreBackup } from '../../src/keys/backup.js';
import { KeyStore } from '../../src/keys/key-store.js';
import { DecryptionFailureError } from '../../src/lib/errors.js';
import { SecureStorage } from '../../src/storage/secure-storage.js';
import { armorBody, createDataDir, TEST_KEY_BITS } from '../helpers/test-keys.js';

async function openKeyStore(basePath: string): Promise<{ storage: SecureStorage; keyStore: KeyStore }> {
  const storage = new SecureStorage({ basePath });
  await storage.setMasterPassword('test-secret');
  const keyStore = new KeyStore(storage);
  await keyStore.load();
  return { storage, keyStore };
}

function sealBackup(document: unknown, password: string): string {
  const salt = randomBytes(16);
  const token = encryptToken(pbkdf2Sha256(password, salt), Buffer.from(JSON.stringify(document), 'utf-8'));
  return Buffer.concat([salt, Buffer.from(token, 'ascii')]).toString('base64');
}

describe('Key backup', () => {
  const directories: string[] = [];
  let source: { storage: SecureStorage; keyStore: KeyStore };
  let aliceFingerprint: string;

  beforeEach(async () => {
    const dir = await createDataDir();
    directories.push(dir);
    source = await openKeyStore(dir);
    ({ fingerprint: aliceFingerprint } = await source.keyStore.generateKey(
      'Alice',
      'a@x.com',
      'pw1',
      TEST_KEY_BITS
    ));
  });

  afterEach(async () => {
    source.storage.close();
    await Promise.all(directories.splice(0).map(dir => rm(dir, { recursive: true, force: true })));
  });

  it('should pack salt and token into one base64 blob', () => {
    const backup = createBackup(source.keyStore, 'backup-pass', 'pw1');
    const raw = Buffer.from(backup.encryptedBackup, 'base64');

    expect(backup.publicCount).toBe(1);
    expect(backup.privateCount).toBe(1);
    expect(backup.skippedPrivate).toEqual([]);
    expect(raw.subarray(16).toString('ascii').startsWith('gAAAAA')).toBe(true);
  });

  it('should restore every key into another data directory', async () => {
    const backup = createBackup(source.keyStore, 'backup-pass', 'pw1');

    const dir = await createDataDir();
    directories.push(dir);
    const target = await openKeyStore(dir);
    const restored = await restoreBackup(target.keyStore, backup.encryptedBackup, 'backup-pass', 'new-pass');

    expect(restored).toEqual({ importedPublic: 1, importedPrivate: 1, failed: [] });
    expect(target.keyStore.listKeys().map(key => key.fingerprint)).toEqual([aliceFingerprint]);
    expect(target.keyStore.verifyPassphrase(aliceFingerprint, 'new-pass')).toBe(true);
    expect(target.keyStore.verifyPassphrase(aliceFingerprint, 'pw1')).toBe(false);
    target.storage.close();
  });

  it('should collect entries that fail and restore the rest', async () => {
    const blob = sealBackup(
      {
        version: '1.0',
        created: 1700000000,
        public_keys: [
          { fingerprint: 'BROKEN', key_data: createArmor(armorBody('not a key'), 'PUBLIC KEY BLOCK') },
          { fingerprint: aliceFingerprint, key_data: source.keyStore.exportPublicKey(aliceFingerprint) }
        ],
        private_keys: [{ fingerprint: 'NOT-ARMOR', key_data: 'plain text' }]
      },
      'backup-pass'
    );

    const dir = await createDataDir();
    directories.push(dir);
    const target = await openKeyStore(dir);
    const restored = await restoreBackup(target.keyStore, blob, 'backup-pass');

    expect(restored.importedPublic).toBe(1);
    expect(restored.importedPrivate).toBe(0);
    expect(restored.failed.map(failure => failure.fingerprint)).toEqual(['BROKEN', 'NOT-ARMOR']);
    expect(restored.failed[0].reason).toMatch(/^Could not load public key: /);
    expect(target.keyStore.listKeys().map(key => key.fingerprint)).toEqual([aliceFingerprint]);
    target.storage.close();
  });

  it('should skip private keys the passphrase does not unlock', async () => {
    const { fingerprint: bobFingerprint } = await source.keyStore.generateKey(
      'Bob',
      'b@x.com',
      'pw2',
      TEST_KEY_BITS
    );

    const backup = createBackup(source.keyStore, 'backup-pass', 'pw1');

    expect(backup.publicCount).toBe(2);
    expect(backup.privateCount).toBe(1);
    expect(backup.skippedPrivate).toEqual([bobFingerprint]);
  });

  it('should refuse the wrong backup password', async () => {
    const backup = createBackup(source.keyStore, 'backup-pass', 'pw1');

    await expect(restoreBackup(source.keyStore, backup.encryptedBackup, 'wrong')).rejects.toThrow(
      DecryptionFailureError
    );
    await expect(restoreBackup(source.keyStore, backup.encryptedBackup, 'wrong')).rejects.toThrow(
      'Failed to open backup'
    );
  });
});
