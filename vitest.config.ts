import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      SEALRING_DEFAULT_KEY_BITS: '2048',
      SEALRING_LOCK_DATA_DIR: 'true'
    },
    // RSA key generation and PBKDF2 dominate test time
    testTimeout: 60000,
    hookTimeout: 60000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
      ],
    },
    include: ['tests/**/*.{test,spec}.{ts,tsx}'],
  },
});
