// Core type definitions for the sealring engine

export type KeyTrust = 'ultimate' | 'unknown';

/**
 * How a private key payload is stored:
 * - wrapped: base64(salt | iv | AES-CBC(PKCS7(PEM))), passphrase protected
 * - pem: raw PEM text
 * - encoded_pem: base64 of the PEM text, no passphrase
 */
export type PrivateKeyFormat = 'wrapped' | 'pem' | 'encoded_pem';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Identity fields shared by both rings. Persisted with these exact names.
 */
export interface KeyIdentity {
  fingerprint: string;
  keyid: string;
  uids: string[];
  length: number;
  algo: string;
  /** Epoch seconds */
  created: number;
  /** Stored for compatibility, never enforced */
  expires: string;
  trust: KeyTrust;
}

export interface PublicKeyRecord extends KeyIdentity {
  /** SubjectPublicKeyInfo PEM */
  public_key: string;
}

export interface PrivateKeyRecord extends KeyIdentity {
  private_key: string;
  key_format: PrivateKeyFormat;
}

export type PublicKeyRing = Record<string, PublicKeyRecord>;
export type PrivateKeyRing = Record<string, PrivateKeyRecord>;

/**
 * Listing view of a ring entry, without key material
 */
export interface KeyInfo {
  fingerprint: string;
  keyId: string;
  uids: string[];
  length: number;
  algorithm: string;
  created: Date;
  expires: string;
  trust: KeyTrust;
}

export interface MessageEnvelope {
  version: string;
  /** One base64 RSA-OAEP ciphertext per recipient, in recipient order */
  encrypted_keys: string[];
  /** Base64, 16 bytes */
  iv: string;
  /** Base64 AES-CBC ciphertext of the padded plaintext */
  encrypted_message: string;
}

export interface EncryptedFileRecord {
  version: string;
  encrypted: true;
  data: string;
}

export interface FileFailure {
  file: string;
  reason: string;
}

export interface MigrationResult {
  migrated: string[];
  failed: FileFailure[];
}

export interface RotationResult {
  rotated: string[];
  failed: FileFailure[];
}

export type DecryptAttemptOutcome =
  | 'matched'
  | 'passphrase_rejected'
  | 'corrupt_key'
  | 'no_matching_recipient';

export interface DecryptAttempt {
  fingerprint: string;
  outcome: DecryptAttemptOutcome;
}
