/**
 * Hybrid message encryption.
 *
 * The body is AES-256-CBC encrypted once under a fresh session key; the session key is
 * RSA-OAEP wrapped once per recipient. Decryption walks the local private ring in order
 * and stops at the first key that unwraps any of the envelope's session keys.
 */

import type { KeyObject } from 'node:crypto';

import { createArmor, parseArmor } from '../crypto/armor.js';
import { loadPrivateKey, recoverPrivateKeyPem } from '../crypto/key-wrap.js';
import {
  aesCbcDecrypt,
  aesCbcEncrypt,
  generateIv,
  generateSymmetricKey,
  pkcs7Pad,
  pkcs7Unpad,
  rsaOaepUnwrap,
  rsaOaepWrap,
  SYMMETRIC_KEY_LENGTH,
  zeroizeKey
} from '../crypto/primitives.js';
import {
  DecryptionFailureError,
  errorMessage,
  InvalidMessageFormatError,
  NoRecipientsError,
  SealringError
} from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { MessageEnvelopeSchema } from '../lib/validation.js';
import type { KeyStore } from '../keys/key-store.js';
import type { DecryptAttempt, MessageEnvelope, PrivateKeyRecord } from '../types/index.js';

const log = logger.child({ module: 'envelope' });

export const ENVELOPE_VERSION = '1.0';
export const MESSAGE_ARMOR_TYPE = 'MESSAGE';

export interface SessionMaterial {
  key: Buffer;
  iv: Buffer;
}

export function sealEnvelope(
  plaintext: Buffer,
  publicKeys: readonly string[],
  material: SessionMaterial
): MessageEnvelope {
  const ciphertext = aesCbcEncrypt(material.key, material.iv, pkcs7Pad(plaintext));

  return {
    version: ENVELOPE_VERSION,
    encrypted_keys: publicKeys.map(publicKey => rsaOaepWrap(publicKey, material.key).toString('base64')),
    iv: material.iv.toString('base64'),
    encrypted_message: ciphertext.toString('base64')
  };
}

export function encryptMessage(
  keyStore: KeyStore,
  plaintext: string | Buffer,
  recipients: readonly string[]
): string {
  if (recipients.length === 0) {
    throw new NoRecipientsError();
  }

  // Resolve every recipient before any key material exists
  const publicKeys = recipients.map(fingerprint => keyStore.getPublicKeyPem(fingerprint));
  const material: SessionMaterial = { key: generateSymmetricKey(), iv: generateIv() };

  try {
    const body = typeof plaintext === 'string' ? Buffer.from(plaintext, 'utf-8') : plaintext;
    const envelope = sealEnvelope(body, publicKeys, material);

    log.debug({ recipients: recipients.length, bytes: body.length }, 'Message encrypted');
    return createArmor(
      Buffer.from(JSON.stringify(envelope), 'utf-8').toString('base64'),
      MESSAGE_ARMOR_TYPE
    );
  } finally {
    zeroizeKey(material.key);
  }
}

function decodeEnvelope(data: string): MessageEnvelope {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(data, 'base64').toString('utf-8'));
  } catch (error) {
    throw new InvalidMessageFormatError(`Message payload is not an envelope: ${errorMessage(error)}`);
  }

  const parsed = MessageEnvelopeSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new InvalidMessageFormatError(
      `Message envelope is malformed: ${parsed.error.errors.map(issue => issue.message).join('; ')}`
    );
  }
  return parsed.data;
}

function unlockCandidate(record: PrivateKeyRecord, passphrase: string): KeyObject {
  return loadPrivateKey(recoverPrivateKeyPem(record.key_format, record.private_key, passphrase));
}

/**
 * First wrapped entry this key opens, or null
 */
function unwrapSessionKey(privateKey: KeyObject, wrappedKeys: readonly Buffer[]): Buffer | null {
  for (const wrapped of wrappedKeys) {
    let sessionKey: Buffer;
    try {
      sessionKey = rsaOaepUnwrap(privateKey, wrapped);
    } catch (error) {
      log.trace({ reason: errorMessage(error) }, 'Wrapped key did not open');
      continue;
    }
    if (sessionKey.length === SYMMETRIC_KEY_LENGTH) {
      return sessionKey;
    }
    zeroizeKey(sessionKey);
  }
  return null;
}

/**
 * Ordered search over `candidates`: the first private key that opens a wrapped
 * session key decrypts the body.
 */
export function openEnvelope(
  envelope: MessageEnvelope,
  candidates: readonly PrivateKeyRecord[],
  passphrase: string
): Buffer {
  const wrappedKeys = envelope.encrypted_keys.map(entry => Buffer.from(entry, 'base64'));
  const iv = Buffer.from(envelope.iv, 'base64');
  const ciphertext = Buffer.from(envelope.encrypted_message, 'base64');

  const attempts: DecryptAttempt[] = [];
  let available = 0;

  for (const record of candidates) {
    let privateKey: KeyObject;
    try {
      privateKey = unlockCandidate(record, passphrase);
    } catch (error) {
      if (!(error instanceof SealringError)) {
        throw error;
      }
      attempts.push({
        fingerprint: record.fingerprint,
        outcome: error instanceof DecryptionFailureError ? 'passphrase_rejected' : 'corrupt_key'
      });
      continue;
    }
    available++;

    const sessionKey = unwrapSessionKey(privateKey, wrappedKeys);
    if (sessionKey === null) {
      attempts.push({ fingerprint: record.fingerprint, outcome: 'no_matching_recipient' });
      continue;
    }
    attempts.push({ fingerprint: record.fingerprint, outcome: 'matched' });

    try {
      const plaintext = pkcs7Unpad(aesCbcDecrypt(sessionKey, iv, ciphertext));
      log.debug({ fingerprint: record.fingerprint, attempted: attempts.length }, 'Message decrypted');
      return plaintext;
    } catch (error) {
      throw new DecryptionFailureError(`Failed to decrypt message body: ${errorMessage(error)}`, {
        fingerprint: record.fingerprint
      });
    } finally {
      zeroizeKey(sessionKey);
    }
  }

  const details = { attempted: attempts.length, available, attempts };
  if (available === 0) {
    throw new DecryptionFailureError(
      `No private keys available for decryption (0 available, ${attempts.length} tried)`,
      details
    );
  }
  throw new DecryptionFailureError(
    `Could not decrypt message with any of the ${available} available private keys (${attempts.length} tried)`,
    details
  );
}

export function decryptMessage(keyStore: KeyStore, armored: string, passphrase: string): string {
  const { type, data } = parseArmor(armored);
  if (type !== MESSAGE_ARMOR_TYPE) {
    throw new InvalidMessageFormatError(`Expected a ${MESSAGE_ARMOR_TYPE} block, found ${type}`);
  }

  const envelope = decodeEnvelope(data);
  return openEnvelope(envelope, keyStore.privateRecords(), passphrase).toString('utf-8');
}
