/**
 * Authenticated symmetric tokens (Fernet layout)
 *
 * Token bytes: 0x80 | timestamp (u64 BE) | IV (16) | AES-128-CBC ciphertext | HMAC-SHA256 (32)
 * encoded as URL-safe base64 with padding. The 32-byte key splits into a 16-byte signing
 * key followed by a 16-byte encryption key.
 *
 * Used only by the at-rest storage layer.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

import { aesCbcDecrypt, aesCbcEncrypt, generateIv, IV_LENGTH, pkcs7Pad, pkcs7Unpad } from './primitives.js';

export const TOKEN_KEY_LENGTH = 32;
const TOKEN_VERSION = 0x80;
const TIMESTAMP_LENGTH = 8;
const HMAC_LENGTH = 32;
const HEADER_LENGTH = 1 + TIMESTAMP_LENGTH + IV_LENGTH;
// header + at least one cipher block + MAC
const MIN_TOKEN_LENGTH = HEADER_LENGTH + 16 + HMAC_LENGTH;

export class TokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

function splitKey(key: Buffer): { signingKey: Buffer; encryptionKey: Buffer } {
  if (key.length !== TOKEN_KEY_LENGTH) {
    throw new TokenError(`Token key must be ${TOKEN_KEY_LENGTH} bytes, got ${key.length}`);
  }
  return {
    signingKey: key.subarray(0, 16),
    encryptionKey: key.subarray(16, 32)
  };
}

function toUrlSafeBase64(buffer: Buffer): string {
  return buffer.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

export function encryptToken(key: Buffer, payload: Buffer, now: Date = new Date()): string {
  const { signingKey, encryptionKey } = splitKey(key);
  const iv = generateIv();

  const header = Buffer.alloc(HEADER_LENGTH);
  header.writeUInt8(TOKEN_VERSION, 0);
  header.writeBigUInt64BE(BigInt(Math.floor(now.getTime() / 1000)), 1);
  iv.copy(header, 1 + TIMESTAMP_LENGTH);

  const ciphertext = aesCbcEncrypt(encryptionKey, iv, pkcs7Pad(payload));
  const signed = Buffer.concat([header, ciphertext]);
  const mac = createHmac('sha256', signingKey).update(signed).digest();

  return toUrlSafeBase64(Buffer.concat([signed, mac]));
}

export function decryptToken(key: Buffer, token: string): Buffer {
  const { signingKey, encryptionKey } = splitKey(key);

  if (!/^[A-Za-z0-9_-]+={0,2}$/.test(token)) {
    throw new TokenError('Token is not URL-safe base64');
  }

  const raw = Buffer.from(token, 'base64url');
  if (raw.length < MIN_TOKEN_LENGTH || (raw.length - HEADER_LENGTH - HMAC_LENGTH) % 16 !== 0) {
    throw new TokenError('Token has an invalid length');
  }
  if (raw[0] !== TOKEN_VERSION) {
    throw new TokenError(`Unsupported token version: ${raw[0]}`);
  }

  const signed = raw.subarray(0, raw.length - HMAC_LENGTH);
  const mac = raw.subarray(raw.length - HMAC_LENGTH);
  const expected = createHmac('sha256', signingKey).update(signed).digest();
  if (!timingSafeEqual(mac, expected)) {
    throw new TokenError('Token signature mismatch');
  }

  const iv = signed.subarray(1 + TIMESTAMP_LENGTH, HEADER_LENGTH);
  const ciphertext = signed.subarray(HEADER_LENGTH);

  try {
    return pkcs7Unpad(aesCbcDecrypt(encryptionKey, iv, ciphertext));
  } catch (error) {
    throw new TokenError(`Token payload is malformed: ${error instanceof Error ? error.message : String(error)}`);
  }
}

