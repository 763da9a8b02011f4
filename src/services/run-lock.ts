import { mkdir, open, readFile, rm, stat } from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { AlreadyRunningError } from '../utils/errors.js';
import { isErrnoException } from '../utils/json-file.js';

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to another user.
    return isErrnoException(error) && error.code === 'EPERM';
  }
}

// A lock file still without a PID after this long was left by a run killed
// between creating and writing it.
export const EMPTY_LOCK_STALE_MS = 5000;

async function isFreshEmptyLock(lockPath: string): Promise<boolean> {
  const info = await stat(lockPath).catch(() => null);
  return info !== null && Date.now() - info.mtimeMs < EMPTY_LOCK_STALE_MS;
}

async function readHolderPid(lockPath: string): Promise<number | null> {
  const raw = await readFile(lockPath, 'utf-8').catch(() => '');
  const pid = parseInt(raw.trim(), 10);
  return Number.isInteger(pid) && pid > 0 ? pid : null;
}

/**
 * Cross-process, non-blocking exclusive lock. The lock file holds the owner's
 * PID; a file whose owner is no longer alive (a killed run) is treated as stale
 * and taken over. A file with no PID yet is held while it is recent.
 */
export class RunLock {
  private released = false;

  private constructor(
    readonly lockPath: string,
    private readonly handle: FileHandle
  ) {}

  static async acquire(lockPath: string): Promise<RunLock> {
    await mkdir(path.dirname(lockPath), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
      let handle: FileHandle;
      try {
        handle = await open(lockPath, 'wx');
      } catch (error) {
        if (!isErrnoException(error) || error.code !== 'EEXIST') throw error;

        const holderPid = await readHolderPid(lockPath);
        const held = holderPid === null ? await isFreshEmptyLock(lockPath) : isProcessAlive(holderPid);
        if (held || attempt > 0) {
          throw new AlreadyRunningError(lockPath, holderPid);
        }
        await rm(lockPath, { force: true });
        continue;
      }

      try {
        await handle.writeFile(String(process.pid), 'utf-8');
        await handle.sync();
      } catch (error) {
        await handle.close();
        await rm(lockPath, { force: true });
        throw error;
      }
      return new RunLock(lockPath, handle);
    }

    throw new AlreadyRunningError(lockPath, await readHolderPid(lockPath));
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    try {
      await this.handle.close();
    } finally {
      await rm(this.lockPath, { force: true });
    }
  }
}

/** Run `fn` while holding the lock; the lock is released on every exit path. */
export async function withRunLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const lock = await RunLock.acquire(lockPath);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
