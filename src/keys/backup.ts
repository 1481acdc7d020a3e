import { randomBytes } from 'node:crypto';

import { z } from 'zod';

import { pbkdf2Sha256, zeroizeKey } from '../crypto/primitives.js';
import { decryptToken, encryptToken } from '../crypto/token.js';
import {
  DecryptionFailureError,
  EncryptionNotInitializedError,
  errorMessage,
  SealringError
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';

import type { KeyStore } from './key-store.js';

const log = logger.child({ module: 'backup' });

export const BACKUP_VERSION = '1.0';
const BACKUP_SALT_LENGTH = 16;

const BackupEntrySchema = z.object({
  fingerprint: z.string(),
  key_data: z.string()
});

const BackupDocumentSchema = z.object({
  version: z.string(),
  created: z.number(),
  public_keys: z.array(BackupEntrySchema),
  private_keys: z.array(BackupEntrySchema)
});

type BackupEntry = z.infer<typeof BackupEntrySchema>;
type BackupDocument = z.infer<typeof BackupDocumentSchema>;

export interface BackupResult {
  /** base64(salt | token) */
  encryptedBackup: string;
  publicCount: number;
  privateCount: number;
  /** Private keys left out because `keyPassphrase` did not unlock them */
  skippedPrivate: string[];
}

export interface RestoreResult {
  importedPublic: number;
  importedPrivate: number;
  failed: { fingerprint: string; reason: string }[];
}

/**
 * Export both rings into a single password-protected blob
 */
export function createBackup(keyStore: KeyStore, backupPassword: string, keyPassphrase: string): BackupResult {
  const document: BackupDocument = {
    version: BACKUP_VERSION,
    created: Math.floor(Date.now() / 1000),
    public_keys: [],
    private_keys: []
  };
  const skippedPrivate: string[] = [];

  for (const key of keyStore.listKeys(false)) {
    document.public_keys.push({
      fingerprint: key.fingerprint,
      key_data: keyStore.exportPublicKey(key.fingerprint)
    });
  }

  for (const record of keyStore.privateRecords()) {
    if (!keyStore.canUnlock(record, keyPassphrase)) {
      skippedPrivate.push(record.fingerprint);
      continue;
    }
    document.private_keys.push({
      fingerprint: record.fingerprint,
      key_data: keyStore.exportPrivateKey(record.fingerprint, keyPassphrase)
    });
  }

  const salt = randomBytes(BACKUP_SALT_LENGTH);
  const key = pbkdf2Sha256(backupPassword, salt);
  try {
    const token = encryptToken(key, Buffer.from(JSON.stringify(document), 'utf-8'));
    const encryptedBackup = Buffer.concat([salt, Buffer.from(token, 'ascii')]).toString('base64');

    log.info(
      {
        publicCount: document.public_keys.length,
        privateCount: document.private_keys.length,
        skipped: skippedPrivate.length
      },
      'Key backup created'
    );

    return {
      encryptedBackup,
      publicCount: document.public_keys.length,
      privateCount: document.private_keys.length,
      skippedPrivate
    };
  } finally {
    zeroizeKey(key);
  }
}

function openBackup(encryptedBackup: string, backupPassword: string): BackupDocument {
  const raw = Buffer.from(encryptedBackup, 'base64');
  const salt = raw.subarray(0, BACKUP_SALT_LENGTH);
  const token = raw.subarray(BACKUP_SALT_LENGTH).toString('ascii');
  const key = pbkdf2Sha256(backupPassword, salt);

  try {
    const parsed = BackupDocumentSchema.safeParse(JSON.parse(decryptToken(key, token).toString('utf-8')));
    if (!parsed.success) {
      throw new Error('backup document is malformed');
    }
    return parsed.data;
  } catch (error) {
    throw new DecryptionFailureError(`Failed to open backup: ${errorMessage(error)}`);
  } finally {
    zeroizeKey(key);
  }
}

/**
 * One entry failing never stops the rest; the failure is recorded on `result`
 */
async function restoreEntry(
  keyStore: KeyStore,
  entry: BackupEntry,
  passphrase: string | undefined,
  result: RestoreResult
): Promise<boolean> {
  try {
    await keyStore.importKey(entry.key_data, passphrase);
    return true;
  } catch (error) {
    if (error instanceof EncryptionNotInitializedError) {
      throw error;
    }
    if (error instanceof SealringError) {
      log.warn({ fingerprint: entry.fingerprint, code: error.code }, 'Skipping backup entry');
    } else {
      log.error({ fingerprint: entry.fingerprint, error }, 'Unexpected failure restoring backup entry');
    }
    result.failed.push({ fingerprint: entry.fingerprint, reason: errorMessage(error) });
    return false;
  }
}

/**
 * Import every key found in a backup blob. Private keys are re-wrapped with
 * `keyPassphrase` when one is given.
 */
export async function restoreBackup(
  keyStore: KeyStore,
  encryptedBackup: string,
  backupPassword: string,
  keyPassphrase?: string
): Promise<RestoreResult> {
  const document = openBackup(encryptedBackup, backupPassword);
  const result: RestoreResult = { importedPublic: 0, importedPrivate: 0, failed: [] };

  for (const entry of document.public_keys) {
    if (await restoreEntry(keyStore, entry, undefined, result)) {
      result.importedPublic++;
    }
  }

  for (const entry of document.private_keys) {
    if (await restoreEntry(keyStore, entry, keyPassphrase, result)) {
      result.importedPrivate++;
    }
  }

  log.info(
    {
      importedPublic: result.importedPublic,
      importedPrivate: result.importedPrivate,
      failed: result.failed.length
    },
    'Key backup restored'
  );
  return result;
}
