// src/file_lock.ts
import { copyFile, open, rm, stat } from 'node:fs/promises';
import { hostname } from 'node:os';
import { differenceInSeconds } from 'date-fns';
import { LockHeldError } from './errors.js';
import { getLogger, type Logger } from './logger.js';

export const DEFAULT_LOCK_TIMEOUT_SEC = 600;

export interface SharedFileSyncOptions {
  sharedPath: string;
  localPath: string;
  lockTimeoutSec?: number;
  logger?: Logger;
  now?: () => Date;
}

function hasCode(e: unknown, code: string): boolean {
  return e instanceof Error && 'code' in e && e.code === code;
}

function isMissing(e: unknown): boolean {
  return hasCode(e, 'ENOENT');
}

function whoAmI(): string {
  const user = process.env.USER || process.env.USERNAME || 'unknown';
  return `${user}@${hostname()} pid ${process.pid}`;
}

/**
 * Advisory lock around a database file on a shared drive. Writers copy the
 * shared file to a local path, mutate it there and copy it back while
 * `<shared>.lock` exists. A lock older than the timeout is treated as left
 * over by a crashed writer and removed.
 */
export class SharedFileSync {
  readonly sharedPath: string;
  readonly localPath: string;
  readonly lockPath: string;
  private readonly timeoutSec: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(opts: SharedFileSyncOptions) {
    this.sharedPath = opts.sharedPath;
    this.localPath = opts.localPath;
    this.lockPath = `${opts.sharedPath}.lock`;
    this.timeoutSec = opts.lockTimeoutSec ?? DEFAULT_LOCK_TIMEOUT_SEC;
    this.logger = opts.logger ?? getLogger();
    this.now = opts.now ?? (() => new Date());
  }

  async isLocked(): Promise<boolean> {
    let mtime: Date;
    try {
      mtime = (await stat(this.lockPath)).mtime;
    } catch (e) {
      if (isMissing(e)) return false;
      throw e;
    }
    const age = differenceInSeconds(this.now(), mtime);
    if (age > this.timeoutSec) {
      this.logger.warn({ lockPath: this.lockPath, ageSec: age }, 'stale lock removed');
      await rm(this.lockPath, { force: true });
      return false;
    }
    return true;
  }

  async acquireLock(): Promise<void> {
    if (await this.isLocked()) throw new LockHeldError(this.lockPath, await this.holder());

    // wx: another writer may have created it since the check
    const handle = await open(this.lockPath, 'wx').catch(async (e: unknown) => {
      if (hasCode(e, 'EEXIST')) throw new LockHeldError(this.lockPath, await this.holder());
      throw e;
    });
    try {
      await handle.writeFile(`locked by ${whoAmI()} at ${this.now().toISOString()}`, 'utf8');
    } finally {
      await handle.close();
    }
  }

  async releaseLock(): Promise<void> {
    await rm(this.lockPath, { force: true });
  }

  async download(): Promise<void> {
    await copyFile(this.sharedPath, this.localPath);
  }

  async upload(): Promise<void> {
    await copyFile(this.localPath, this.sharedPath);
  }

  /** acquire, download, write(localPath), upload, release; the lock is released on failure too */
  async safeWrite<T>(write: (localPath: string) => Promise<T> | T): Promise<T> {
    await this.acquireLock();
    try {
      await this.download();
      const result = await write(this.localPath);
      await this.upload();
      this.logger.info({ sharedPath: this.sharedPath }, 'shared file updated');
      return result;
    } finally {
      await this.releaseLock();
    }
  }

  private async holder(): Promise<string> {
    try {
      const handle = await open(this.lockPath, 'r');
      try {
        return (await handle.readFile('utf8')).trim();
      } finally {
        await handle.close();
      }
    } catch (e) {
      if (isMissing(e)) return '';
      throw e;
    }
  }
}
