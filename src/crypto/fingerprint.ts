import { createHash } from 'node:crypto';

import { InvalidArgumentError } from '../lib/errors.js';

const FINGERPRINT_HEX_LENGTH = 40;
const KEY_ID_LENGTH = 16;

function group(hex: string): string {
  return (hex.match(/.{1,4}/g) ?? []).join(' ').toUpperCase();
}

/**
 * First 40 hex digits of SHA-256 over the PEM text, uppercase, in blocks of four
 */
export function computeFingerprint(publicKeyPem: string): string {
  const digest = createHash('sha256').update(publicKeyPem, 'utf-8').digest('hex');
  return group(digest.substring(0, FINGERPRINT_HEX_LENGTH));
}

export function keyIdFromFingerprint(fingerprint: string): string {
  return fingerprint.replace(/\s+/g, '').slice(-KEY_ID_LENGTH);
}

/**
 * Accepts grouped or compact, any case; returns the canonical grouped form
 */
export function normalizeFingerprint(input: string): string {
  const compact = input.replace(/\s+/g, '');
  if (!/^[0-9a-fA-F]{40}$/.test(compact)) {
    throw new InvalidArgumentError(`Not a valid fingerprint: ${input}`);
  }
  return group(compact);
}
