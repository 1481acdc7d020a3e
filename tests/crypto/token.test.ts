import { createDecipheriv, createHmac } from 'node:crypto';

import { describe, it, expect } from 'vitest';

import { generateSymmetricKey } from '../../src/crypto/primitives.js';
import { decryptToken, encryptToken, TokenError } from '../../src/crypto/token.js';

function tamper(token: string, index: number): string {
  const raw = Buffer.from(token, 'base64url');
  raw[index] ^= 0x01;
  return raw.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
}

describe('Authenticated token', () => {
  it('should decrypt what it encrypts', () => {
    const key = generateSymmetricKey();
    const token = encryptToken(key, Buffer.from('{"hello":"world"}'));

    expect(decryptToken(key, token).toString()).toBe('{"hello":"world"}');
  });

  it('should use the URL-safe alphabet', () => {
    const token = encryptToken(generateSymmetricKey(), Buffer.alloc(100, 0xff));
    expect(token).toMatch(/^[A-Za-z0-9_-]+=*$/);
  });

  it('should lay out version, timestamp, IV, ciphertext and MAC', () => {
    const key = generateSymmetricKey();
    const token = encryptToken(key, Buffer.from('payload'), new Date(1700000000000));
    const raw = Buffer.from(token, 'base64url');

    // 1 + 8 + 16 + one block + 32
    expect(raw.length).toBe(73);
    expect(raw[0]).toBe(0x80);
    expect(raw.readBigUInt64BE(1)).toBe(1700000000n);

    const signed = raw.subarray(0, 41);
    const mac = createHmac('sha256', key.subarray(0, 16)).update(signed).digest();
    expect(raw.subarray(41).equals(mac)).toBe(true);

    const decipher = createDecipheriv('aes-128-cbc', key.subarray(16, 32), raw.subarray(9, 25));
    const plaintext = Buffer.concat([decipher.update(raw.subarray(25, 41)), decipher.final()]);
    expect(plaintext.toString()).toBe('payload');
  });

  it('should produce a different token each time', () => {
    const key = generateSymmetricKey();
    const payload = Buffer.from('same');
    expect(encryptToken(key, payload)).not.toBe(encryptToken(key, payload));
  });

  it('should reject a token under the wrong key', () => {
    const token = encryptToken(generateSymmetricKey(), Buffer.from('secret'));
    expect(() => decryptToken(generateSymmetricKey(), token)).toThrow('Token signature mismatch');
  });

  it('should reject a tampered ciphertext', () => {
    const key = generateSymmetricKey();
    const token = encryptToken(key, Buffer.from('secret'));
    expect(() => decryptToken(key, tamper(token, 30))).toThrow('Token signature mismatch');
  });

  it('should reject an unknown version byte', () => {
    const key = generateSymmetricKey();
    const token = encryptToken(key, Buffer.from('secret'));
    expect(() => decryptToken(key, tamper(token, 0))).toThrow('Unsupported token version: 129');
  });

  it('should reject text that is not URL-safe base64', () => {
    expect(() => decryptToken(generateSymmetricKey(), 'not a token!')).toThrow(
      'Token is not URL-safe base64'
    );
  });

  it('should reject a truncated token', () => {
    const key = generateSymmetricKey();
    const token = encryptToken(key, Buffer.from('secret'));
    expect(() => decryptToken(key, token.slice(0, 40))).toThrow('Token has an invalid length');
  });

  it('should require a 32-byte key', () => {
    expect(() => encryptToken(Buffer.alloc(16), Buffer.from('x'))).toThrow(TokenError);
  });
});
