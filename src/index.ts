export { env, KEY_SIZE_OPTIONS, type AppEnvironment } from './config/index.js';
export { logger } from './lib/logger.js';
export * from './lib/errors.js';
export { Mutex } from './lib/mutex.js';
export * from './types/index.js';

export * from './crypto/index.js';
export * from './storage/index.js';

export {
  KeyStore,
  IMPORTED_KEY_UID,
  LEGACY_KEYS_FILE,
  PRIVATE_KEYS_FILE,
  PUBLIC_KEYS_FILE,
  type GeneratedKey,
  type ImportedKey
} from './keys/key-store.js';
export {
  BACKUP_VERSION,
  createBackup,
  restoreBackup,
  type BackupResult,
  type RestoreResult
} from './keys/backup.js';
export {
  ENVELOPE_VERSION,
  MESSAGE_ARMOR_TYPE,
  decryptMessage,
  encryptMessage,
  openEnvelope,
  sealEnvelope,
  type SessionMaterial
} from './messages/envelope.js';

export { emergencyErase, type ErasureResult } from './services/emergency-erase.js';
export { PgpService, type PgpServiceOptions } from './services/pgp-service.js';
