import { mkdir, open, readFile, unlink } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { hasErrorCode, LockHeldError } from './errors.js';

export const LOCK_FILENAME = '.lock';

const lockFileSchema = z.object({
  pid: z.number().int(),
  acquiredAt: z.string()
});

export type LockRecord = z.output<typeof lockFileSchema>;

export interface CacheLockOptions {
  staleMs: number;
  pid?: number;
  now?: () => Date;
  isProcessAlive?: (pid: number) => boolean;
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return hasErrorCode(error, 'EPERM');
  }
}

async function readLockRecord(lockPath: string): Promise<LockRecord | null> {
  try {
    const parsed = lockFileSchema.safeParse(JSON.parse(await readFile(lockPath, 'utf8')));
    return parsed.success ? parsed.data : null;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT') || error instanceof SyntaxError) {
      return null;
    }
    throw error;
  }
}

/** Exclusive `<cache>/.lock`; a lock left by a dead or long-gone process is taken over. */
export class CacheLock {
  readonly lockPath: string;
  private held = false;

  constructor(
    cacheDir: string,
    private readonly options: CacheLockOptions
  ) {
    this.lockPath = path.join(cacheDir, LOCK_FILENAME);
  }

  async acquire(): Promise<void> {
    await mkdir(path.dirname(this.lockPath), { recursive: true });

    if (await this.tryCreate()) {
      return;
    }

    const existing = await readLockRecord(this.lockPath);
    if (existing && !this.isStale(existing)) {
      throw new LockHeldError(this.lockPath, existing.pid);
    }

    await unlink(this.lockPath).catch((error: unknown) => {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    });

    if (!(await this.tryCreate())) {
      const winner = await readLockRecord(this.lockPath);
      throw new LockHeldError(this.lockPath, winner?.pid ?? -1);
    }
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    this.held = false;
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }

  private isStale(record: LockRecord): boolean {
    const alive = this.options.isProcessAlive ?? isProcessAlive;
    if (!alive(record.pid)) {
      return true;
    }
    const acquiredAt = new Date(record.acquiredAt).getTime();
    const now = (this.options.now ?? (() => new Date()))().getTime();
    return Number.isNaN(acquiredAt) || now - acquiredAt > this.options.staleMs;
  }

  private async tryCreate(): Promise<boolean> {
    const record: LockRecord = {
      pid: this.options.pid ?? process.pid,
      acquiredAt: (this.options.now ?? (() => new Date()))().toISOString()
    };

    try {
      const handle = await open(this.lockPath, 'wx');
      try {
        await handle.writeFile(JSON.stringify(record), 'utf8');
      } finally {
        await handle.close();
      }
      this.held = true;
      return true;
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return false;
      }
      throw error;
    }
  }
}
