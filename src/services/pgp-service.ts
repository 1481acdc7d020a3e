import { env } from '../config/index.js';
import { createBackup, restoreBackup, type BackupResult, type RestoreResult } from '../keys/backup.js';
import { KeyStore, type GeneratedKey, type ImportedKey } from '../keys/key-store.js';
import { KeyNotFoundError, type Outcome, toFailure } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { decryptMessage, encryptMessage } from '../messages/envelope.js';
import { DirectoryLock } from '../storage/directory-lock.js';
import { SecureStorage } from '../storage/secure-storage.js';
import type { JsonValue, KeyInfo, MigrationResult, RotationResult } from '../types/index.js';

import { emergencyErase, type ErasureResult } from './emergency-erase.js';

/**
 * PGP Service
 * Public surface of the engine: every operation reports a result object instead of throwing
 */

const log = logger.child({ module: 'pgp-service' });

export interface PgpServiceOptions {
  /** Defaults to SEALRING_DATA_DIR */
  dataDir?: string;
  /** Opens the storage session and loads the key rings */
  masterPassword?: string;
  /** Hold `<dataDir>/.lock` while open; defaults to SEALRING_LOCK_DATA_DIR */
  lock?: boolean;
}

export class PgpService {
  private closed = false;

  private constructor(
    readonly storage: SecureStorage,
    readonly keyStore: KeyStore,
    private readonly lock: DirectoryLock | null
  ) {}

  /**
   * Open a data directory. Unlike the operations below this throws, e.g.
   * `DataDirectoryLockedError` when another live process owns the directory.
   */
  static async open(options: PgpServiceOptions = {}): Promise<PgpService> {
    const dataDir = options.dataDir ?? env.SEALRING_DATA_DIR;
    const lock = (options.lock ?? env.SEALRING_LOCK_DATA_DIR) ? await DirectoryLock.acquire(dataDir) : null;

    const storage = new SecureStorage({ basePath: dataDir });
    const service = new PgpService(storage, new KeyStore(storage), lock);

    if (options.masterPassword !== undefined) {
      try {
        await service.unlock(options.masterPassword);
      } catch (error) {
        await service.close();
        throw error;
      }
    }

    log.info({ dataDir, locked: lock !== null }, 'PGP service opened');
    return service;
  }

  isInitialized(): boolean {
    return this.storage.isInitialized();
  }

  setMasterPassword(password: string): Promise<Outcome<MigrationResult>> {
    return this.run('setMasterPassword', () => this.unlock(password));
  }

  generateKey(name: string, email: string, passphrase: string, bits?: number): Promise<Outcome<GeneratedKey>> {
    return this.run('generateKey', () => this.keyStore.generateKey(name, email, passphrase, bits));
  }

  listKeys(secret = false): Promise<Outcome<{ keys: KeyInfo[] }>> {
    return this.run('listKeys', () => ({ keys: this.keyStore.listKeys(secret) }));
  }

  getKeyInfo(fingerprint: string, secret = false): Promise<Outcome<{ key: KeyInfo }>> {
    return this.run('getKeyInfo', () => {
      const key = this.keyStore.getKeyInfo(fingerprint, secret);
      if (!key) {
        throw new KeyNotFoundError(fingerprint, secret);
      }
      return { key };
    });
  }

  exportPublicKey(fingerprint: string): Promise<Outcome<{ publicKey: string }>> {
    return this.run('exportPublicKey', () => ({ publicKey: this.keyStore.exportPublicKey(fingerprint) }));
  }

  exportPrivateKey(fingerprint: string, passphrase: string): Promise<Outcome<{ privateKey: string }>> {
    return this.run('exportPrivateKey', () => ({
      privateKey: this.keyStore.exportPrivateKey(fingerprint, passphrase)
    }));
  }

  verifyPassphrase(fingerprint: string, passphrase: string): Promise<Outcome<{ valid: boolean }>> {
    return this.run('verifyPassphrase', () => ({
      valid: this.keyStore.verifyPassphrase(fingerprint, passphrase)
    }));
  }

  importKey(armored: string, passphrase?: string): Promise<Outcome<ImportedKey>> {
    return this.run('importKey', () => this.keyStore.importKey(armored, passphrase));
  }

  deleteKey(fingerprint: string, secret = false): Promise<Outcome> {
    return this.run('deleteKey', async () => {
      await this.keyStore.deleteKey(fingerprint, secret);
      return {};
    });
  }

  encryptMessage(message: string, recipients: readonly string[]): Promise<Outcome<{ encryptedMessage: string }>> {
    return this.run('encryptMessage', () => ({
      encryptedMessage: encryptMessage(this.keyStore, message, recipients)
    }));
  }

  decryptMessage(armored: string, passphrase: string): Promise<Outcome<{ decryptedMessage: string }>> {
    return this.run('decryptMessage', () => ({
      decryptedMessage: decryptMessage(this.keyStore, armored, passphrase)
    }));
  }

  createBackup(backupPassword: string, keyPassphrase: string): Promise<Outcome<BackupResult>> {
    return this.run('createBackup', () => createBackup(this.keyStore, backupPassword, keyPassphrase));
  }

  restoreBackup(
    encryptedBackup: string,
    backupPassword: string,
    keyPassphrase?: string
  ): Promise<Outcome<RestoreResult>> {
    return this.run('restoreBackup', () =>
      restoreBackup(this.keyStore, encryptedBackup, backupPassword, keyPassphrase)
    );
  }

  emergencyErase(): Promise<Outcome<ErasureResult>> {
    return this.run('emergencyErase', () => emergencyErase(this.storage, this.keyStore));
  }

  saveData(filename: string, data: JsonValue): Promise<Outcome> {
    return this.run('saveData', async () => {
      await this.storage.save(filename, data);
      return {};
    });
  }

  loadData(filename: string, defaultValue: JsonValue = null): Promise<Outcome<{ data: JsonValue }>> {
    return this.run('loadData', async () => ({ data: await this.storage.load(filename, defaultValue) }));
  }

  migrate(filename: string): Promise<Outcome<{ migrated: boolean }>> {
    return this.run('migrate', async () => ({ migrated: await this.storage.migrate(filename) }));
  }

  migrateDirectory(): Promise<Outcome<MigrationResult>> {
    return this.run('migrateDirectory', () => this.storage.migrateDirectory());
  }

  secureDelete(filename: string): Promise<Outcome<{ deleted: boolean }>> {
    return this.run('secureDelete', async () => ({ deleted: await this.storage.secureDelete(filename) }));
  }

  rotatePassword(oldPassword: string, newPassword: string): Promise<Outcome<RotationResult>> {
    return this.run('rotatePassword', () => this.storage.rotatePassword(oldPassword, newPassword));
  }

  /**
   * Drop the session key and release the directory lock
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.storage.close();
    await this.lock?.release();
    log.info({ dataDir: this.storage.basePath }, 'PGP service closed');
  }

  private async unlock(password: string): Promise<MigrationResult> {
    const migration = await this.storage.setMasterPassword(password);
    await this.keyStore.load();
    return migration;
  }

  private run<T extends object>(operation: string, task: () => T | Promise<T>): Promise<Outcome<T>> {
    return Promise.resolve()
      .then(task)
      .then(
        (value): Outcome<T> => ({ success: true as const, ...value }),
        (error: unknown): Outcome<T> => {
          const failure = toFailure(error);
          if (failure.code === 'InternalError') {
            log.error({ operation, error }, 'Unexpected failure');
          } else {
            log.warn({ operation, code: failure.code, reason: failure.error }, 'Operation failed');
          }
          return failure;
        }
      );
  }
}
