/**
 * Root-scoped advisory lock held for the duration of an apply.
 *
 * The lock file <root>/.term-coder/apply.lock holds `{ pid, createdAt }` and is
 * created with exclusive-create. A lock whose owner process is gone, or that
 * is older than the stale age, is taken over. Takeovers are serialized through
 * a sibling `apply.lock.takeover` marker, and only the exact lock judged stale
 * is ever removed.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { DEFAULT_LOCK_STALE_MS, LOCK_FILE_NAME, STATE_DIR_NAME } from '../config/constants.js';
import { PatchEngineError, errnoCode, mapSystemErrorToPatchError } from '../errors/index.js';
import type { PatchEngineCallbacks } from './callbacks.js';

const LockContentSchema = z.object({
  pid: z.number().int(),
  createdAt: z.number(),
});

export type LockContent = z.infer<typeof LockContentSchema>;

export interface ApplyLockOptions {
  /** Age in milliseconds after which a lock is abandoned (default 10 minutes) */
  staleMs?: number;
  callbacks?: PatchEngineCallbacks;
  /** Clock for createdAt and staleness (defaults to Date.now) */
  now?: () => number;
}

/** A lock file as read from disk; content is undefined when malformed */
interface LockFileState {
  raw: string;
  content: LockContent | undefined;
}

/**
 * A held lock. Call release() when the apply finishes.
 */
export interface LockHandle {
  readonly content: LockContent;
  release(): Promise<void>;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === 'EPERM';
  }
}

export class ApplyLock {
  readonly lockPath: string;
  private readonly takeoverPath: string;
  private readonly staleMs: number;
  private readonly callbacks?: PatchEngineCallbacks;
  private readonly now: () => number;

  constructor(root: string, options: ApplyLockOptions = {}) {
    this.lockPath = path.join(path.resolve(root), STATE_DIR_NAME, LOCK_FILE_NAME);
    this.takeoverPath = `${this.lockPath}.takeover`;
    this.staleMs = options.staleMs ?? DEFAULT_LOCK_STALE_MS;
    this.callbacks = options.callbacks;
    this.now = options.now ?? Date.now;
  }

  /**
   * Read a lock-shaped file. Returns null when absent.
   */
  private async readLockFile(filePath: string): Promise<LockFileState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
    try {
      const parsed = LockContentSchema.safeParse(JSON.parse(raw));
      return { raw, content: parsed.success ? parsed.data : undefined };
    } catch {
      return { raw, content: undefined };
    }
  }

  private isStale(holder: LockContent | undefined): boolean {
    if (holder === undefined) {
      return true;
    }
    return this.now() - holder.createdAt > this.staleMs || !isProcessAlive(holder.pid);
  }

  private async tryCreate(filePath: string, content: LockContent): Promise<boolean> {
    try {
      await fs.writeFile(filePath, JSON.stringify(content), { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error) {
      if (errnoCode(error) === 'EEXIST') {
        return false;
      }
      const mapped = mapSystemErrorToPatchError(error);
      throw new PatchEngineError(mapped.message, mapped.code, filePath, error);
    }
  }

  /**
   * Remove the lock file if it still holds exactly `stale`. Only the holder
   * of the takeover marker may do this; a contender that loses the marker
   * gives up, and an abandoned marker is cleared for the next attempt.
   * @returns true when the stale lock is gone
   */
  private async takeOver(stale: LockFileState, content: LockContent): Promise<boolean> {
    if (!(await this.tryCreate(this.takeoverPath, content))) {
      const marker = await this.readLockFile(this.takeoverPath);
      if (marker !== null && this.isStale(marker.content)) {
        this.callbacks?.onDebug?.('Clearing abandoned lock takeover', marker.content ?? {});
        await fs.rm(this.takeoverPath, { force: true });
      }
      return false;
    }

    try {
      const current = await this.readLockFile(this.lockPath);
      if (current !== null && current.raw !== stale.raw) {
        return false;
      }
      await fs.rm(this.lockPath, { force: true });
      return true;
    } finally {
      await fs.rm(this.takeoverPath, { force: true });
    }
  }

  /**
   * Try to take the lock.
   * @returns The handle, or null when a live owner holds it
   */
  async acquire(): Promise<LockHandle | null> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    const content: LockContent = { pid: process.pid, createdAt: this.now() };

    // Two attempts: the second follows removal of a stale lock
    for (let attempt = 0; attempt < 2; attempt++) {
      if (await this.tryCreate(this.lockPath, content)) {
        this.callbacks?.onTrace?.('Apply lock acquired', { lockPath: this.lockPath, ...content });
        return this.createHandle(content);
      }

      const holder = await this.readLockFile(this.lockPath);
      if (holder === null) {
        continue;
      }
      if (!this.isStale(holder.content)) {
        this.callbacks?.onDebug?.('Apply lock held by another process', holder.content ?? {});
        return null;
      }
      this.callbacks?.onDebug?.(
        'Taking over stale apply lock',
        holder.content ?? { malformed: true }
      );
      if (!(await this.takeOver(holder, content))) {
        this.callbacks?.onDebug?.('Stale apply lock taken over by another process');
        return null;
      }
    }
    return null;
  }

  private createHandle(content: LockContent): LockHandle {
    let released = false;
    return {
      content,
      release: async (): Promise<void> => {
        if (released) {
          return;
        }
        released = true;
        const holder = (await this.readLockFile(this.lockPath))?.content;
        if (holder?.pid === content.pid && holder.createdAt === content.createdAt) {
          await fs.rm(this.lockPath, { force: true });
          this.callbacks?.onTrace?.('Apply lock released', { lockPath: this.lockPath });
        }
      },
    };
  }
}
