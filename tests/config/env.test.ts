import { describe, it, expect } from 'vitest';

import { env, KEY_SIZE_OPTIONS } from '../../src/config/index.js';

describe('Environment', () => {
  it('should run in test mode', () => {
    expect(env.NODE_ENV).toBe('test');
    expect(env.isTest).toBe(true);
    expect(env.isDevelopment).toBe(false);
  });

  it('should parse the default key size as a number', () => {
    expect(env.SEALRING_DEFAULT_KEY_BITS).toBe(2048);
    expect(KEY_SIZE_OPTIONS).toContain(env.SEALRING_DEFAULT_KEY_BITS);
  });

  it('should parse the lock flag as a boolean', () => {
    expect(env.SEALRING_LOCK_DATA_DIR).toBe(true);
  });

  it('should default the data directory', () => {
    expect(env.SEALRING_DATA_DIR.length).toBeGreaterThan(0);
  });
});
