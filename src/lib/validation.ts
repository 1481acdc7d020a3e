import { z } from 'zod';

import type {
  EncryptedFileRecord,
  MessageEnvelope,
  PublicKeyRecord
} from '../types/index.js';

/**
 * Validation schemas for persisted and wire data
 */

export const FingerprintSchema = z
  .string()
  .regex(/^([0-9A-F]{4} ){9}[0-9A-F]{4}$/, 'Fingerprint must be 10 groups of 4 uppercase hex digits');

export const KeyIdSchema = z.string().regex(/^[0-9A-F]{16}$/, 'Key ID must be 16 uppercase hex digits');

export const Base64Schema = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'Must be base64');

const KeyIdentitySchema = z.object({
  fingerprint: FingerprintSchema,
  keyid: KeyIdSchema,
  uids: z.array(z.string()),
  // older ring files store the bit length as a string
  length: z.coerce.number().int().positive(),
  algo: z.string().min(1),
  created: z.number().int().nonnegative(),
  expires: z.string().default(''),
  trust: z.enum(['ultimate', 'unknown'])
});

export const PublicKeyRecordSchema: z.ZodType<PublicKeyRecord, z.ZodTypeDef, unknown> =
  KeyIdentitySchema.extend({
    public_key: z.string().startsWith('-----BEGIN PUBLIC KEY-----')
  });

/**
 * Private record as found on disk; `key_format` is absent in files written before tagging
 */
export const StoredPrivateKeyRecordSchema = KeyIdentitySchema.extend({
  private_key: z.string().min(1),
  key_format: z.enum(['wrapped', 'pem', 'encoded_pem']).optional()
});

export type StoredPrivateKeyRecord = z.infer<typeof StoredPrivateKeyRecordSchema>;

export const PublicKeyRingSchema = z.record(z.string(), PublicKeyRecordSchema);

export const StoredPrivateKeyRingSchema = z.record(z.string(), StoredPrivateKeyRecordSchema);

export type StoredPrivateKeyRing = z.infer<typeof StoredPrivateKeyRingSchema>;

export const LegacyKeyFileSchema = z.object({
  public_keys: PublicKeyRingSchema.default({}),
  private_keys: StoredPrivateKeyRingSchema.default({})
});

export type LegacyKeyFile = z.infer<typeof LegacyKeyFileSchema>;

export const MessageEnvelopeSchema: z.ZodType<MessageEnvelope, z.ZodTypeDef, unknown> = z.object({
  version: z.string().min(1),
  encrypted_keys: z.array(Base64Schema.min(1)).min(1, 'Envelope carries no wrapped keys'),
  iv: Base64Schema.refine(value => Buffer.from(value, 'base64').length === 16, {
    message: 'IV must decode to 16 bytes'
  }),
  encrypted_message: Base64Schema.refine(
    value => {
      const length = Buffer.from(value, 'base64').length;
      return length > 0 && length % 16 === 0;
    },
    { message: 'Ciphertext must be a non-empty multiple of the AES block size' }
  )
});

export const EncryptedFileRecordSchema: z.ZodType<EncryptedFileRecord, z.ZodTypeDef, unknown> = z.object({
  version: z.string(),
  encrypted: z.literal(true),
  data: z.string().min(1)
});

export const KeyGenerationInputSchema = z.object({
  name: z.string().trim().min(1, 'Name is required'),
  email: z.string().trim().email('Email must be valid'),
  passphrase: z.string().min(1, 'Passphrase is required'),
  bits: z
    .number()
    .int()
    .min(1024, 'Key length must be at least 1024 bits')
    .max(16384, 'Key length must be at most 16384 bits')
    .refine(bits => bits % 8 === 0, { message: 'Key length must be a multiple of 8' })
});

/**
 * Utility functions for validation
 */

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Storage filenames are relative to the data directory and may not climb out of it
 */
export function validateStorageFilename(filename: string): boolean {
  if (filename.length === 0 || filename.startsWith('/') || filename.startsWith('\\')) {
    return false;
  }
  return !filename.split(/[\\/]/).some(part => part === '..' || part === '');
}
