/**
 * Primitive adapter
 *
 * Thin, stateless wrappers over `node:crypto` for the building blocks the rest of the
 * engine composes:
 * - RSA key generation and RSA-OAEP (SHA-256 hash and MGF1) key wrapping
 * - Raw AES-CBC with explicit PKCS7 padding (no implicit padding by the cipher)
 * - PBKDF2-HMAC-SHA256 key derivation
 *
 * Higher layers never call `node:crypto` ciphers directly.
 */

import {
  constants,
  createCipheriv,
  createDecipheriv,
  generateKeyPairSync,
  pbkdf2Sync,
  privateDecrypt,
  publicEncrypt,
  randomBytes,
  type KeyLike
} from 'node:crypto';

export const BLOCK_SIZE = 16;
export const SYMMETRIC_KEY_LENGTH = 32; // 256 bits
export const IV_LENGTH = 16;
export const PBKDF2_ITERATIONS = 100000;
export const RSA_PUBLIC_EXPONENT = 65537;

/**
 * PEM-encoded RSA key pair
 */
export interface RsaKeyPair {
  /** PKCS#8 private key */
  privateKeyPem: string;
  /** SubjectPublicKeyInfo public key */
  publicKeyPem: string;
}

export class PaddingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PaddingError';
  }
}

export function generateRsaKeyPair(bits: number): RsaKeyPair {
  const { privateKey, publicKey } = generateKeyPairSync('rsa', {
    modulusLength: bits,
    publicExponent: RSA_PUBLIC_EXPONENT,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs8', format: 'pem' }
  });

  return { privateKeyPem: privateKey, publicKeyPem: publicKey };
}

export function rsaOaepWrap(publicKey: KeyLike, payload: Buffer): Buffer {
  return publicEncrypt(
    {
      key: publicKey,
      padding: constants.RSA_PKCS1_OAEP_PADDING,
      oaepHash: 'sha256'
    },
    payload
  );
}

export function rsaOaepUnwrap(privateKey: KeyLike, ciphertext: Buffer): Buffer {
  return privateDecrypt(
    {
      key: privateKey,
      padding: constants.RSA_PKCS1_OAEP_PADDING,
      oaepHash: 'sha256'
    },
    ciphertext
  );
}

function cbcAlgorithm(key: Buffer): string {
  if (key.length !== 16 && key.length !== 24 && key.length !== 32) {
    throw new Error(`Invalid AES key length: ${key.length} bytes`);
  }
  return `aes-${key.length * 8}-cbc`;
}

/**
 * Encrypt already-padded plaintext with AES-CBC
 */
export function aesCbcEncrypt(key: Buffer, iv: Buffer, padded: Buffer): Buffer {
  const cipher = createCipheriv(cbcAlgorithm(key), key, iv);
  cipher.setAutoPadding(false);
  return Buffer.concat([cipher.update(padded), cipher.final()]);
}

/**
 * Decrypt AES-CBC ciphertext; the result still carries its PKCS7 padding
 */
export function aesCbcDecrypt(key: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
  const decipher = createDecipheriv(cbcAlgorithm(key), key, iv);
  decipher.setAutoPadding(false);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

export function pbkdf2Sha256(
  password: string,
  salt: Buffer,
  iterations: number = PBKDF2_ITERATIONS,
  length: number = SYMMETRIC_KEY_LENGTH
): Buffer {
  return pbkdf2Sync(Buffer.from(password, 'utf-8'), salt, iterations, length, 'sha256');
}

export function pkcs7Pad(data: Buffer): Buffer {
  const paddingLength = BLOCK_SIZE - (data.length % BLOCK_SIZE);
  return Buffer.concat([data, Buffer.alloc(paddingLength, paddingLength)]);
}

export function pkcs7Unpad(data: Buffer): Buffer {
  if (data.length === 0) {
    throw new PaddingError('Cannot unpad empty data');
  }

  const paddingLength = data[data.length - 1];
  if (paddingLength === 0 || paddingLength > BLOCK_SIZE || paddingLength > data.length) {
    throw new PaddingError(`Invalid padding length: ${paddingLength}`);
  }

  for (let i = data.length - paddingLength; i < data.length; i++) {
    if (data[i] !== paddingLength) {
      throw new PaddingError('Inconsistent padding bytes');
    }
  }

  return data.subarray(0, data.length - paddingLength);
}

export function generateSymmetricKey(): Buffer {
  return randomBytes(SYMMETRIC_KEY_LENGTH);
}

export function generateIv(): Buffer {
  return randomBytes(IV_LENGTH);
}

/**
 * Securely zero out a key in memory
 * This helps prevent key material from lingering in memory
 */
export function zeroizeKey(key: Buffer | null | undefined): void {
  if (key && key.length > 0) {
    key.fill(0);
  }
}
