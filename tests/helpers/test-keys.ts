/**
 * Test Key Material
 *
 * Shared RSA key pairs and scratch data directories for tests.
 * RSA generation is slow, so pairs are created once per test file and reused.
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { generateRsaKeyPair, type RsaKeyPair } from '../../src/crypto/primitives.js';

/** Smallest size the key store accepts; keeps generation fast */
export const TEST_KEY_BITS = 1024;

const pairs: RsaKeyPair[] = [];

/**
 * Key pair number `index`, generated on first use
 */
export function testKeyPair(index = 0): RsaKeyPair {
  while (pairs.length <= index) {
    pairs.push(generateRsaKeyPair(TEST_KEY_BITS));
  }
  return pairs[index];
}

export async function createDataDir(prefix = 'sealring-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export function armorBody(pem: string): string {
  return Buffer.from(pem, 'utf-8').toString('base64');
}
