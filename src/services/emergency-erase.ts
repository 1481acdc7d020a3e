import { rm } from 'node:fs/promises';

import { errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type { KeyStore } from '../keys/key-store.js';
import { LOCK_FILENAME } from '../storage/directory-lock.js';
import type { SecureStorage } from '../storage/secure-storage.js';
import type { FileFailure } from '../types/index.js';

/**
 * Emergency Erase
 * Destroys every key and record in a data directory
 */

const log = logger.child({ module: 'emergency-erase' });

export interface ErasureResult {
  filesErased: string[];
  failed: FileFailure[];
  erasedAt: Date;
}

/**
 * Clear both key rings, overwrite-and-unlink every file in the data directory, then
 * remove the directory itself. The session key is dropped afterwards.
 */
export async function emergencyErase(storage: SecureStorage, keyStore: KeyStore): Promise<ErasureResult> {
  log.warn({ basePath: storage.basePath }, 'Starting emergency erase');

  if (storage.isInitialized()) {
    await keyStore.clear();
  }

  const filesErased: string[] = [];
  const failed: FileFailure[] = [];

  for (const file of await storage.listAllFiles()) {
    // The lock goes with the directory
    if (file === LOCK_FILENAME) {
      continue;
    }

    try {
      if (await storage.secureDelete(file)) {
        filesErased.push(file);
      }
    } catch (error) {
      log.error({ file, error: errorMessage(error) }, 'Failed to erase file');
      failed.push({ file, reason: errorMessage(error) });
    }
  }

  storage.close();
  await rm(storage.basePath, { recursive: true, force: true });

  const erasedAt = new Date();
  log.warn(
    { basePath: storage.basePath, filesErased: filesErased.length, failed: failed.length },
    'Emergency erase completed'
  );

  return { filesErased, failed, erasedAt };
}
