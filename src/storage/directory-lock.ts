import { mkdir, open, readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';

import { DataDirectoryLockedError, errnoCode } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

const log = logger.child({ module: 'directory-lock' });

export const LOCK_FILENAME = '.lock';

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === 'EPERM';
  }
}

async function readLockOwner(lockPath: string): Promise<number> {
  try {
    return Number.parseInt(await readFile(lockPath, 'utf-8'), 10);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return Number.NaN;
    }
    throw error;
  }
}

/**
 * Exclusive ownership of a data directory by one process, via `<dir>/.lock`
 */
export class DirectoryLock {
  private released = false;

  private constructor(
    readonly dataDir: string,
    private readonly lockPath: string
  ) {}

  static async acquire(dataDir: string): Promise<DirectoryLock> {
    await mkdir(dataDir, { recursive: true });
    const lockPath = join(dataDir, LOCK_FILENAME);

    // Two attempts: the second follows removal of a stale lock
    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const handle = await open(lockPath, 'wx');
        try {
          await handle.writeFile(String(process.pid), 'utf-8');
        } finally {
          await handle.close();
        }
        log.debug({ dataDir, pid: process.pid }, 'Data directory lock acquired');
        return new DirectoryLock(dataDir, lockPath);
      } catch (error) {
        if (errnoCode(error) !== 'EEXIST') {
          throw error;
        }
      }

      const owner = await readLockOwner(lockPath);
      if (Number.isInteger(owner) && owner > 0 && isProcessAlive(owner)) {
        throw new DataDirectoryLockedError(dataDir, owner);
      }

      log.warn({ dataDir, stalePid: owner }, 'Removing stale data directory lock');
      await unlink(lockPath).catch((error: unknown) => {
        if (errnoCode(error) !== 'ENOENT') {
          throw error;
        }
      });
    }

    throw new DataDirectoryLockedError(dataDir, -1);
  }

  async release(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;

    try {
      await unlink(this.lockPath);
      log.debug({ dataDir: this.dataDir }, 'Data directory lock released');
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }
}
