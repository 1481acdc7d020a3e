/**
 * Passphrase protection for private keys at rest.
 *
 * Wrapped form: base64(salt[16] | iv[16] | AES-256-CBC(PKCS7(PEM))) with the AES key
 * derived by PBKDF2-HMAC-SHA256 (100000 iterations) from the passphrase and salt.
 * This KDF call is independent of the master-password one: own salt, own purpose.
 */

import { createPrivateKey, randomBytes, type KeyObject } from 'node:crypto';

import { CorruptKeyDataError, DecryptionFailureError, errorMessage } from '../lib/errors.js';
import type { PrivateKeyFormat } from '../types/index.js';
import {
  aesCbcDecrypt,
  aesCbcEncrypt,
  generateIv,
  IV_LENGTH,
  pbkdf2Sha256,
  pkcs7Pad,
  pkcs7Unpad,
  zeroizeKey
} from './primitives.js';

const SALT_LENGTH = 16;
const PEM_MARKER = '-----';

export function wrapPrivateKey(privateKeyPem: string, passphrase: string): string {
  const salt = randomBytes(SALT_LENGTH);
  const iv = generateIv();
  const key = pbkdf2Sha256(passphrase, salt);

  try {
    const ciphertext = aesCbcEncrypt(key, iv, pkcs7Pad(Buffer.from(privateKeyPem, 'utf-8')));
    return Buffer.concat([salt, iv, ciphertext]).toString('base64');
  } finally {
    zeroizeKey(key);
  }
}

export function unwrapPrivateKey(wrapped: string, passphrase: string): string {
  const raw = Buffer.from(wrapped, 'base64');
  const ciphertext = raw.subarray(SALT_LENGTH + IV_LENGTH);
  if (ciphertext.length === 0 || ciphertext.length % 16 !== 0) {
    throw new CorruptKeyDataError('Wrapped private key has an invalid length');
  }

  const salt = raw.subarray(0, SALT_LENGTH);
  const iv = raw.subarray(SALT_LENGTH, SALT_LENGTH + IV_LENGTH);
  const key = pbkdf2Sha256(passphrase, salt);

  try {
    const pem = pkcs7Unpad(aesCbcDecrypt(key, iv, ciphertext)).toString('utf-8');
    if (!pem.startsWith(PEM_MARKER)) {
      throw new Error('unwrapped data is not PEM');
    }
    return pem;
  } catch (error) {
    throw new DecryptionFailureError(`Failed to decrypt private key: ${errorMessage(error)}`);
  } finally {
    zeroizeKey(key);
  }
}

function decodedPem(payload: string): string | null {
  if (!/^[A-Za-z0-9+/]+={0,2}$/.test(payload.replace(/\s+/g, ''))) {
    return null;
  }
  const text = Buffer.from(payload, 'base64').toString('utf-8');
  return text.startsWith(`${PEM_MARKER}BEGIN`) ? text : null;
}

/**
 * Shape check for private-key payloads stored without a format tag
 */
export function classifyPrivateKeyPayload(payload: string): PrivateKeyFormat {
  if (payload.startsWith(PEM_MARKER)) {
    return 'pem';
  }
  if (decodedPem(payload) !== null) {
    return 'encoded_pem';
  }
  return 'wrapped';
}

/**
 * Recover the PEM text of a stored payload according to its format tag
 */
export function recoverPrivateKeyPem(format: PrivateKeyFormat, payload: string, passphrase: string): string {
  switch (format) {
    case 'wrapped':
      return unwrapPrivateKey(payload, passphrase);
    case 'pem':
      return payload;
    case 'encoded_pem': {
      const pem = decodedPem(payload);
      if (pem === null) {
        throw new CorruptKeyDataError('Stored private key is not base64-encoded PEM');
      }
      return pem;
    }
  }
}

export function loadPrivateKey(pem: string): KeyObject {
  try {
    return createPrivateKey({ key: pem, format: 'pem' });
  } catch (error) {
    throw new CorruptKeyDataError(`Stored private key is not a valid PEM key: ${errorMessage(error)}`);
  }
}
