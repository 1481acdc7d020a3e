/**
 * Storage module - master-password protected records and the data directory lock
 */

export {
  FILE_FORMAT_VERSION,
  SALT_FILENAME,
  SecureStorage,
  type SecureStorageConfig
} from './secure-storage.js';
export { DirectoryLock, LOCK_FILENAME } from './directory-lock.js';
