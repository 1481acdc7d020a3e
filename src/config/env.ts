import { join } from 'node:path';

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

export const KEY_SIZE_OPTIONS = [2048, 3072, 4096] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  SEALRING_DATA_DIR: z
    .string()
    .min(1, 'SEALRING_DATA_DIR must not be empty')
    .default(join(process.cwd(), 'data_storage')),
  SEALRING_DEFAULT_KEY_BITS: z
    .string()
    .default('2048')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .refine(
          (bits): bits is (typeof KEY_SIZE_OPTIONS)[number] =>
            KEY_SIZE_OPTIONS.some(option => option === bits),
          { message: `SEALRING_DEFAULT_KEY_BITS must be one of ${KEY_SIZE_OPTIONS.join(', ')}` }
        )
    ),
  SEALRING_LOCK_DATA_DIR: z
    .string()
    .default('true')
    .transform(value => value === 'true')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
