/**
 * Key rings persisted through secure storage.
 *
 * Two insertion-ordered maps keyed by fingerprint live in memory and are written to
 * `public_keys.json` / `private_keys.json` after every mutation. Mutations are serialised
 * through a mutex so a ring is never persisted half-updated.
 */

import { createPrivateKey, createPublicKey, type KeyObject } from 'node:crypto';

import { env } from '../config/index.js';
import { createArmor, parseArmor } from '../crypto/armor.js';
import { computeFingerprint, keyIdFromFingerprint, normalizeFingerprint } from '../crypto/fingerprint.js';
import {
  classifyPrivateKeyPayload,
  recoverPrivateKeyPem,
  unwrapPrivateKey,
  wrapPrivateKey
} from '../crypto/key-wrap.js';
import { generateRsaKeyPair } from '../crypto/primitives.js';
import {
  CorruptKeyDataError,
  DecryptionFailureError,
  EncryptionNotInitializedError,
  errorMessage,
  InvalidArgumentError,
  InvalidArmorFormatError,
  KeyNotFoundError,
  SealringError
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { Mutex } from '../lib/mutex.js';
import {
  KeyGenerationInputSchema,
  LegacyKeyFileSchema,
  PublicKeyRingSchema,
  StoredPrivateKeyRingSchema,
  type LegacyKeyFile,
  type StoredPrivateKeyRecord,
  type StoredPrivateKeyRing
} from '../lib/validation.js';
import type { SecureStorage } from '../storage/secure-storage.js';
import type {
  KeyIdentity,
  KeyInfo,
  PrivateKeyRecord,
  PrivateKeyRing,
  PublicKeyRecord,
  PublicKeyRing
} from '../types/index.js';

const log = logger.child({ module: 'key-store' });

export const PUBLIC_KEYS_FILE = 'public_keys.json';
export const PRIVATE_KEYS_FILE = 'private_keys.json';
export const LEGACY_KEYS_FILE = 'keys/keys.json';
export const IMPORTED_KEY_UID = 'Imported Key';

export interface GeneratedKey {
  fingerprint: string;
  keyId: string;
}

export interface ImportedKey {
  fingerprint: string;
  keyId: string;
  isPrivate: boolean;
}

function toKeyInfo(record: KeyIdentity): KeyInfo {
  return {
    fingerprint: record.fingerprint,
    keyId: record.keyid,
    uids: [...record.uids],
    length: record.length,
    algorithm: record.algo,
    created: new Date(record.created * 1000),
    expires: record.expires,
    trust: record.trust
  };
}

function tagPrivateRecord(record: StoredPrivateKeyRecord): PrivateKeyRecord {
  return {
    ...record,
    key_format: record.key_format ?? classifyPrivateKeyPayload(record.private_key)
  };
}

function canonicalPublicPem(key: KeyObject): string {
  try {
    const publicKey = key.type === 'public' ? key : createPublicKey(key);
    return publicKey.export({ type: 'spki', format: 'pem' }).toString();
  } catch (error) {
    throw new CorruptKeyDataError(`Could not export public key: ${errorMessage(error)}`);
  }
}

function rsaModulusLength(key: KeyObject): number {
  if (key.asymmetricKeyType !== 'rsa') {
    throw new CorruptKeyDataError(`Unsupported key type: ${key.asymmetricKeyType ?? 'unknown'}`);
  }
  const bits = key.asymmetricKeyDetails?.modulusLength;
  if (bits === undefined) {
    throw new CorruptKeyDataError('Could not determine RSA modulus length');
  }
  return bits;
}

function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export class KeyStore {
  private publicKeys = new Map<string, PublicKeyRecord>();
  private privateKeys = new Map<string, PrivateKeyRecord>();
  private readonly mutex = new Mutex();

  constructor(private readonly storage: SecureStorage) {}

  /**
   * Load both rings from storage. Missing files mean an empty ring.
   */
  async load(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.requireSession();

      const publicRing = await this.storage.load<PublicKeyRing>(PUBLIC_KEYS_FILE, {}, PublicKeyRingSchema);
      const privateRing = await this.storage.load<StoredPrivateKeyRing>(
        PRIVATE_KEYS_FILE,
        {},
        StoredPrivateKeyRingSchema
      );

      this.publicKeys = new Map(Object.entries(publicRing));
      this.privateKeys = new Map(
        Object.entries(privateRing).map(([fingerprint, record]) => [fingerprint, tagPrivateRecord(record)])
      );

      await this.importLegacyRing();

      log.info(
        { publicKeys: this.publicKeys.size, privateKeys: this.privateKeys.size },
        'Key rings loaded'
      );
    });
  }

  async generateKey(
    name: string,
    email: string,
    passphrase: string,
    bits: number = env.SEALRING_DEFAULT_KEY_BITS
  ): Promise<GeneratedKey> {
    const input = KeyGenerationInputSchema.safeParse({ name, email, passphrase, bits });
    if (!input.success) {
      throw new InvalidArgumentError(input.error.errors.map(issue => issue.message).join('; '));
    }
    this.requireSession();

    const { privateKeyPem, publicKeyPem } = generateRsaKeyPair(input.data.bits);
    const fingerprint = computeFingerprint(publicKeyPem);
    const identity: KeyIdentity = {
      fingerprint,
      keyid: keyIdFromFingerprint(fingerprint),
      uids: [`${input.data.name} <${input.data.email}>`],
      length: input.data.bits,
      algo: 'RSA',
      created: nowSeconds(),
      expires: '',
      trust: 'ultimate'
    };

    await this.mutate(() => {
      this.putPublic({ ...identity, public_key: publicKeyPem });
      this.putPrivate({
        ...identity,
        private_key: wrapPrivateKey(privateKeyPem, passphrase),
        key_format: 'wrapped'
      });
    });

    log.info({ fingerprint, bits: input.data.bits }, 'Key pair generated');
    return { fingerprint, keyId: identity.keyid };
  }

  listKeys(secret = false): KeyInfo[] {
    const ring = secret ? this.privateKeys : this.publicKeys;
    return [...ring.values()].map(toKeyInfo);
  }

  getKeyInfo(fingerprint: string, secret = false): KeyInfo | undefined {
    const ring = secret ? this.privateKeys : this.publicKeys;
    const record = ring.get(normalizeFingerprint(fingerprint));
    return record ? toKeyInfo(record) : undefined;
  }

  getPublicKeyPem(fingerprint: string): string {
    const record = this.publicKeys.get(normalizeFingerprint(fingerprint));
    if (!record) {
      throw new KeyNotFoundError(fingerprint);
    }
    return record.public_key;
  }

  /**
   * Snapshot of the private ring in insertion order
   */
  privateRecords(): PrivateKeyRecord[] {
    return [...this.privateKeys.values()].map(record => ({ ...record, uids: [...record.uids] }));
  }

  exportPublicKey(fingerprint: string): string {
    const pem = this.getPublicKeyPem(fingerprint);
    return createArmor(Buffer.from(pem, 'utf-8').toString('base64'), 'PUBLIC KEY BLOCK');
  }

  exportPrivateKey(fingerprint: string, passphrase: string): string {
    const record = this.privateKeys.get(normalizeFingerprint(fingerprint));
    if (!record) {
      throw new KeyNotFoundError(fingerprint, true);
    }

    const pem = recoverPrivateKeyPem(record.key_format, record.private_key, passphrase);
    return createArmor(Buffer.from(pem, 'utf-8').toString('base64'), 'PRIVATE KEY BLOCK');
  }

  verifyPassphrase(fingerprint: string, passphrase: string): boolean {
    try {
      this.exportPrivateKey(fingerprint, passphrase);
      return true;
    } catch (error) {
      if (error instanceof DecryptionFailureError) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Import an armored public or private key block.
   *
   * A private key imported without a passphrase is stored base64-encoded, not encrypted.
   */
  async importKey(armored: string, passphrase?: string): Promise<ImportedKey> {
    this.requireSession();

    const { type, data } = parseArmor(armored);
    const isPrivate = type.includes('PRIVATE KEY');
    if (!isPrivate && !type.includes('PUBLIC KEY')) {
      throw new InvalidArmorFormatError(`Armor block is not a key: ${type}`);
    }

    const pem = Buffer.from(data, 'base64').toString('utf-8');
    let keyObject: KeyObject;
    try {
      keyObject = isPrivate ? createPrivateKey({ key: pem, format: 'pem' }) : createPublicKey({ key: pem, format: 'pem' });
    } catch (error) {
      throw new CorruptKeyDataError(`Could not load ${isPrivate ? 'private' : 'public'} key: ${errorMessage(error)}`);
    }

    const length = rsaModulusLength(keyObject);
    const publicPem = canonicalPublicPem(keyObject);
    const fingerprint = computeFingerprint(publicPem);
    const identity: KeyIdentity = {
      fingerprint,
      keyid: keyIdFromFingerprint(fingerprint),
      uids: [IMPORTED_KEY_UID],
      length,
      algo: 'RSA',
      created: nowSeconds(),
      expires: '',
      trust: 'unknown'
    };

    await this.mutate(() => {
      this.putPublic({ ...identity, public_key: publicPem });

      if (isPrivate) {
        if (passphrase) {
          this.putPrivate({ ...identity, private_key: wrapPrivateKey(pem, passphrase), key_format: 'wrapped' });
        } else {
          log.warn({ fingerprint }, 'Imported private key has no passphrase; storing it unencrypted');
          this.putPrivate({
            ...identity,
            private_key: Buffer.from(pem, 'utf-8').toString('base64'),
            key_format: 'encoded_pem'
          });
        }
      }
    });

    log.info({ fingerprint, isPrivate }, 'Key imported');
    return { fingerprint, keyId: identity.keyid, isPrivate };
  }

  async deleteKey(fingerprint: string, secret = false): Promise<void> {
    const canonical = normalizeFingerprint(fingerprint);
    await this.mutate(() => {
      const ring = secret ? this.privateKeys : this.publicKeys;
      if (!ring.delete(canonical)) {
        throw new KeyNotFoundError(fingerprint, secret);
      }
    });
    log.info({ fingerprint: canonical, secret }, 'Key deleted');
  }

  /**
   * Empty both rings and persist the empty state
   */
  async clear(): Promise<void> {
    await this.mutate(() => {
      this.publicKeys.clear();
      this.privateKeys.clear();
    });
  }

  /**
   * Confirm a wrapped private key can be opened; used by the backup exporter
   */
  canUnlock(record: PrivateKeyRecord, passphrase: string): boolean {
    if (record.key_format !== 'wrapped') {
      return true;
    }
    try {
      unwrapPrivateKey(record.private_key, passphrase);
      return true;
    } catch (error) {
      if (error instanceof SealringError) {
        return false;
      }
      throw error;
    }
  }

  private requireSession(): void {
    if (!this.storage.isInitialized()) {
      throw new EncryptionNotInitializedError();
    }
  }

  private putPublic(record: PublicKeyRecord): void {
    if (this.publicKeys.has(record.fingerprint)) {
      log.warn({ fingerprint: record.fingerprint }, 'Replacing existing public key with the same fingerprint');
    }
    this.publicKeys.set(record.fingerprint, record);
  }

  private putPrivate(record: PrivateKeyRecord): void {
    if (this.privateKeys.has(record.fingerprint)) {
      log.warn({ fingerprint: record.fingerprint }, 'Replacing existing private key with the same fingerprint');
    }
    this.privateKeys.set(record.fingerprint, record);
  }

  /**
   * Apply a ring change and persist both rings under the mutex; the in-memory rings
   * are restored if persisting fails.
   */
  private async mutate(change: () => void): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.requireSession();
      const previousPublic = new Map(this.publicKeys);
      const previousPrivate = new Map(this.privateKeys);

      try {
        change();
        await this.persist();
      } catch (error) {
        this.publicKeys = previousPublic;
        this.privateKeys = previousPrivate;
        throw error;
      }
    });
  }

  private async persist(): Promise<void> {
    const publicRing: PublicKeyRing = Object.fromEntries(this.publicKeys);
    const privateRing: PrivateKeyRing = Object.fromEntries(this.privateKeys);
    await this.storage.save(PUBLIC_KEYS_FILE, publicRing);
    await this.storage.save(PRIVATE_KEYS_FILE, privateRing);
  }

  /**
   * Pull keys out of the pre-encryption `keys/keys.json` ring file, then erase it.
   * Only a directory without ring files is upgraded.
   */
  private async importLegacyRing(): Promise<void> {
    if (!(await this.storage.exists(LEGACY_KEYS_FILE))) {
      return;
    }
    if ((await this.storage.exists(PUBLIC_KEYS_FILE)) || (await this.storage.exists(PRIVATE_KEYS_FILE))) {
      log.warn({ file: LEGACY_KEYS_FILE }, 'Ignoring legacy key ring; ring files already exist');
      return;
    }

    const legacy = await this.storage.load<LegacyKeyFile>(
      LEGACY_KEYS_FILE,
      { public_keys: {}, private_keys: {} },
      LegacyKeyFileSchema
    );

    let imported = 0;
    for (const [fingerprint, record] of Object.entries(legacy.public_keys)) {
      if (!this.publicKeys.has(fingerprint)) {
        this.publicKeys.set(fingerprint, record);
        imported++;
      }
    }
    for (const [fingerprint, record] of Object.entries(legacy.private_keys)) {
      if (!this.privateKeys.has(fingerprint)) {
        this.privateKeys.set(fingerprint, tagPrivateRecord(record));
        imported++;
      }
    }

    await this.persist();
    await this.storage.secureDelete(LEGACY_KEYS_FILE);
    log.info({ imported }, 'Imported legacy key ring');
  }
}
