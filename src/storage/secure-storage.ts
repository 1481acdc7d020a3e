/**
 * Master-password protected record storage
 *
 * Every persisted JSON artifact in the data directory goes through this layer:
 * 1. A 32-byte salt is created once per data directory (`.encryption_salt`)
 * 2. The master password is stretched with PBKDF2 into the session key
 * 3. Records are serialised to JSON and sealed in an authenticated token
 * 4. Files carry an explicit `encrypted` flag so legacy plaintext files keep loading
 *
 * Storage Layout:
 * data_storage/
 * ├── .encryption_salt        raw salt bytes
 * ├── .lock                   owning process id
 * ├── public_keys.json        { version, encrypted, data }
 * └── private_keys.json       { version, encrypted, data }
 */

import { randomBytes, timingSafeEqual } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { mkdir, open, readdir, readFile, rename, rm, unlink, writeFile, type FileHandle } from 'node:fs/promises';
import { basename, dirname, join, relative, sep } from 'node:path';

import type { z } from 'zod';

import { env } from '../config/index.js';
import { decryptToken, encryptToken } from '../crypto/token.js';
import { pbkdf2Sha256, zeroizeKey } from '../crypto/primitives.js';
import {
  CorruptRecordError,
  DecryptionFailureError,
  EncryptionNotInitializedError,
  errnoCode,
  errorMessage,
  InvalidArgumentError
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { Mutex } from '../lib/mutex.js';
import { EncryptedFileRecordSchema, isPlainObject, validateStorageFilename } from '../lib/validation.js';
import type { EncryptedFileRecord, FileFailure, JsonValue, MigrationResult, RotationResult } from '../types/index.js';

const log = logger.child({ module: 'secure-storage' });

export const FILE_FORMAT_VERSION = '2.1';
export const SALT_FILENAME = '.encryption_salt';
const SALT_LENGTH = 32;
const SECURE_DELETE_PASSES = 3;
const VERIFICATION_RECORD = { test: 'verification', timestamp: 12345 };

/**
 * Configuration for secure storage
 */
export interface SecureStorageConfig {
  /** Data directory holding the salt and every record file */
  basePath: string;
  /** Whether to create directories automatically */
  autoCreateDirs?: boolean;
}

type ParsedFile = { kind: 'encrypted'; record: EncryptedFileRecord } | { kind: 'legacy'; payload: JsonValue };

function isSweepCandidate(file: string): boolean {
  const name = basename(file);
  return name.endsWith('.json') && !name.startsWith('.');
}

export class SecureStorage {
  private config: Required<SecureStorageConfig>;
  private encryptionKey: Buffer | null = null;
  /** Serialises record I/O against password rotation */
  private readonly mutex = new Mutex();

  constructor(config?: Partial<SecureStorageConfig>) {
    this.config = {
      basePath: config?.basePath ?? env.SEALRING_DATA_DIR,
      autoCreateDirs: config?.autoCreateDirs ?? true
    };
  }

  get basePath(): string {
    return this.config.basePath;
  }

  isInitialized(): boolean {
    return this.encryptionKey !== null;
  }

  /**
   * Derive a storage key from a password and this directory's salt
   */
  public async deriveKey(password: string): Promise<Buffer> {
    const salt = await this.getOrCreateSalt();
    return pbkdf2Sha256(password, salt);
  }

  /**
   * Open a session with the master password, then migrate any plaintext records.
   * A password that opens none of the existing encrypted records is rejected.
   */
  public async setMasterPassword(password: string): Promise<MigrationResult> {
    const key = await this.deriveKey(password);
    if (!(await this.opensExistingRecords(key))) {
      zeroizeKey(key);
      throw new DecryptionFailureError('Master password is incorrect');
    }
    zeroizeKey(this.encryptionKey);
    this.encryptionKey = key;
    log.info({ basePath: this.config.basePath }, 'Storage encryption initialized');

    return this.migrateDirectory();
  }

  public encryptRecord(key: Buffer, data: unknown): string {
    const json = JSON.stringify(data);
    if (json === undefined) {
      throw new InvalidArgumentError('Record is not JSON serialisable');
    }
    const token = encryptToken(key, Buffer.from(json, 'utf-8'));
    return Buffer.from(token, 'ascii').toString('base64');
  }

  public decryptRecord(key: Buffer, stored: string): JsonValue {
    try {
      const token = Buffer.from(stored, 'base64').toString('ascii');
      const plaintext = decryptToken(key, token);
      return JSON.parse(plaintext.toString('utf-8'));
    } catch (error) {
      throw new DecryptionFailureError(`Failed to decrypt data: ${errorMessage(error)}`);
    }
  }

  /**
   * Round trip of synthetic data under `key`
   */
  public verifyKey(key: Buffer): boolean {
    try {
      const decrypted = this.decryptRecord(key, this.encryptRecord(key, VERIFICATION_RECORD));
      return JSON.stringify(decrypted) === JSON.stringify(VERIFICATION_RECORD);
    } catch (error) {
      log.debug({ error: errorMessage(error) }, 'Storage key verification failed');
      return false;
    }
  }

  public async save(filename: string, data: unknown): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const key = this.requireKey();
      await this.writeAtomic(this.resolve(filename), this.serialize(key, data));
    });
    log.debug({ filename }, 'Record saved');
  }

  /**
   * Load a record. A missing file yields `defaultValue`; a legacy plaintext file yields its
   * raw payload; a corrupt or undecryptable file is an error.
   */
  public async load(filename: string): Promise<JsonValue | undefined>;
  public async load<T>(filename: string, defaultValue: T): Promise<JsonValue | T>;
  public async load<T>(filename: string, defaultValue: T, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T>;
  public async load<T>(
    filename: string,
    defaultValue?: T,
    schema?: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<JsonValue | T | undefined> {
    const value = await this.mutex.runExclusive(async () => {
      const key = this.requireKey();
      const parsed = await this.readFileRecord(this.resolve(filename));
      if (parsed === undefined) {
        return undefined;
      }
      return parsed.kind === 'encrypted' ? this.decryptRecord(key, parsed.record.data) : parsed.payload;
    });
    if (value === undefined) {
      return defaultValue;
    }
    if (!schema) {
      return value;
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      throw new CorruptRecordError(filename, result.error.errors.map(issue => issue.message).join('; '));
    }
    return result.data;
  }

  public async exists(filename: string): Promise<boolean> {
    return (await this.readText(this.resolve(filename))) !== undefined;
  }

  public async isEncrypted(filename: string): Promise<boolean> {
    try {
      const parsed = await this.readFileRecord(this.resolve(filename));
      return parsed?.kind === 'encrypted';
    } catch (error) {
      if (error instanceof CorruptRecordError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Rewrite a plaintext file in encrypted form; `load` returns the same value before and after
   */
  public async migrate(filename: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const key = this.requireKey();
      const filePath = this.resolve(filename);
      const parsed = await this.readFileRecord(filePath);
      if (parsed === undefined || parsed.kind === 'encrypted') {
        return false;
      }

      await this.writeAtomic(filePath, this.serialize(key, parsed.payload));
      log.info({ filename }, 'Migrated plaintext record to encrypted storage');
      return true;
    });
  }

  /**
   * Encrypt every plaintext `*.json` file under the data directory
   */
  public async migrateDirectory(): Promise<MigrationResult> {
    this.requireKey();
    const migrated: string[] = [];
    const failed: FileFailure[] = [];

    for (const file of await this.listCandidateFiles()) {
      try {
        if (await this.migrate(file)) {
          migrated.push(file);
        }
      } catch (error) {
        log.warn({ file, error: errorMessage(error) }, 'Failed to migrate record');
        failed.push({ file, reason: errorMessage(error) });
      }
    }

    return { migrated, failed };
  }

  /**
   * Overwrite the file with random bytes (three passes, each synced), then unlink
   */
  public async secureDelete(filename: string): Promise<boolean> {
    const filePath = this.resolve(filename);
    return this.mutex.runExclusive(() => this.overwriteAndUnlink(filePath, filename));
  }

  private async overwriteAndUnlink(filePath: string, filename: string): Promise<boolean> {

    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r+');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }

    try {
      const { size } = await handle.stat();
      for (let pass = 0; pass < SECURE_DELETE_PASSES; pass++) {
        await handle.write(randomBytes(size), 0, size, 0);
        await handle.sync();
      }
    } finally {
      await handle.close();
    }

    await unlink(filePath);
    log.debug({ filename }, 'File securely deleted');
    return true;
  }

  /**
   * Re-encrypt every encrypted record under a new master password.
   *
   * Phase 1 decrypts everything with the old key into memory; files that fail are reported
   * and left untouched. Phase 2 writes every staged record to a temp file under the new key
   * and only renames once all temp files are written. Record I/O waits until rotation ends.
   */
  public async rotatePassword(oldPassword: string, newPassword: string): Promise<RotationResult> {
    return this.mutex.runExclusive(() => this.rotateUnderLock(oldPassword, newPassword));
  }

  private async rotateUnderLock(oldPassword: string, newPassword: string): Promise<RotationResult> {
    const oldKey = await this.deriveKey(oldPassword);
    const accepted =
      this.encryptionKey !== null
        ? timingSafeEqual(oldKey, this.encryptionKey)
        : await this.opensExistingRecords(oldKey);
    if (!this.verifyKey(oldKey) || !accepted) {
      zeroizeKey(oldKey);
      throw new DecryptionFailureError('Old password is incorrect');
    }

    const staged = new Map<string, JsonValue>();
    const failed: FileFailure[] = [];

    for (const file of await this.listEncryptedFiles()) {
      try {
        const parsed = await this.readFileRecord(this.resolve(file));
        if (parsed?.kind !== 'encrypted') {
          continue;
        }
        staged.set(file, this.decryptRecord(oldKey, parsed.record.data));
      } catch (error) {
        log.warn({ file, error: errorMessage(error) }, 'Skipping record that failed to decrypt during rotation');
        failed.push({ file, reason: errorMessage(error) });
      }
    }

    const newKey = await this.deriveKey(newPassword);
    const pending: { tempPath: string; target: string }[] = [];

    try {
      for (const [file, data] of staged) {
        const target = this.resolve(file);
        const tempPath = await this.writeTemp(target, this.serialize(newKey, data));
        pending.push({ tempPath, target });
      }
    } catch (error) {
      await Promise.all(pending.map(({ tempPath }) => rm(tempPath, { force: true })));
      zeroizeKey(oldKey);
      zeroizeKey(newKey);
      log.error({ error: errorMessage(error) }, 'Password rotation aborted before commit');
      throw error;
    }

    for (const { tempPath, target } of pending) {
      await rename(tempPath, target);
    }

    zeroizeKey(oldKey);
    zeroizeKey(this.encryptionKey);
    this.encryptionKey = newKey;

    const rotated = [...staged.keys()];
    log.info({ rotated: rotated.length, failed: failed.length }, 'Master password rotated');
    return { rotated, failed };
  }

  /**
   * Relative paths of every record file encrypted under some key
   */
  public async listEncryptedFiles(): Promise<string[]> {
    const encrypted: string[] = [];
    for (const file of await this.listCandidateFiles()) {
      if (await this.isEncrypted(file)) {
        encrypted.push(file);
      }
    }
    return encrypted;
  }

  /**
   * Relative paths of every regular file under the data directory
   */
  public async listAllFiles(): Promise<string[]> {
    return this.walk(this.config.basePath);
  }

  /**
   * Drop the session key from memory
   */
  public close(): void {
    zeroizeKey(this.encryptionKey);
    this.encryptionKey = null;
  }

  /**
   * True when the directory holds no encrypted record or `key` opens at least one
   */
  private async opensExistingRecords(key: Buffer): Promise<boolean> {
    const files = await this.listEncryptedFiles();
    for (const file of files) {
      const parsed = await this.readFileRecord(this.resolve(file));
      if (parsed?.kind !== 'encrypted') {
        continue;
      }
      try {
        this.decryptRecord(key, parsed.record.data);
        return true;
      } catch (error) {
        log.debug({ file, error: errorMessage(error) }, 'Record did not open under candidate key');
      }
    }
    return files.length === 0;
  }

  private requireKey(): Buffer {
    if (!this.encryptionKey) {
      throw new EncryptionNotInitializedError();
    }
    return this.encryptionKey;
  }

  private resolve(filename: string): string {
    if (!validateStorageFilename(filename)) {
      throw new InvalidArgumentError(`Invalid storage filename: ${filename}`);
    }
    return join(this.config.basePath, filename);
  }

  private serialize(key: Buffer, data: unknown): string {
    const record: EncryptedFileRecord = {
      version: FILE_FORMAT_VERSION,
      encrypted: true,
      data: this.encryptRecord(key, data)
    };
    return JSON.stringify(record);
  }

  private async getOrCreateSalt(): Promise<Buffer> {
    const saltPath = join(this.config.basePath, SALT_FILENAME);

    try {
      const salt = await readFile(saltPath);
      if (salt.length === 0) {
        throw new CorruptRecordError(SALT_FILENAME, 'salt file is empty');
      }
      return salt;
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw error;
      }
    }

    await this.ensureDirectory(saltPath);
    const salt = randomBytes(SALT_LENGTH);
    try {
      await writeFile(saltPath, salt, { flag: 'wx' });
      log.info({ basePath: this.config.basePath }, 'Created storage salt');
      return salt;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return readFile(saltPath);
      }
      throw error;
    }
  }

  private async readText(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  private async readFileRecord(filePath: string): Promise<ParsedFile | undefined> {
    const text = await this.readText(filePath);
    if (text === undefined) {
      return undefined;
    }

    let parsed: JsonValue;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new CorruptRecordError(relative(this.config.basePath, filePath), errorMessage(error));
    }

    if (isPlainObject(parsed) && parsed.encrypted === true) {
      const record = EncryptedFileRecordSchema.safeParse(parsed);
      if (!record.success) {
        throw new CorruptRecordError(relative(this.config.basePath, filePath), 'malformed encrypted record');
      }
      return { kind: 'encrypted', record: record.data };
    }

    if (isPlainObject(parsed) && 'data' in parsed) {
      return { kind: 'legacy', payload: parsed.data };
    }
    return { kind: 'legacy', payload: parsed };
  }

  private async listCandidateFiles(): Promise<string[]> {
    return (await this.walk(this.config.basePath)).filter(isSweepCandidate);
  }

  private async walk(directory: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = join(directory, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.walk(fullPath)));
      } else if (entry.isFile()) {
        files.push(relative(this.config.basePath, fullPath).split(sep).join('/'));
      }
    }
    return files.sort();
  }

  private async ensureDirectory(path: string): Promise<void> {
    if (this.config.autoCreateDirs) {
      await mkdir(dirname(path), { recursive: true });
    }
  }

  private async writeTemp(target: string, content: string): Promise<string> {
    await this.ensureDirectory(target);
    const tempPath = `${target}.${randomBytes(6).toString('hex')}.tmp`;
    try {
      await writeFile(tempPath, content, 'utf-8');
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
    return tempPath;
  }

  private async writeAtomic(target: string, content: string): Promise<void> {
    const tempPath = await this.writeTemp(target, content);
    try {
      await rename(tempPath, target);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
