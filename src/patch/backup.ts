/**
 * Snapshots of files under the project root, restorable by backup id.
 *
 * Layout: <root>/.term-coder/backups/<backupId>/<relativePath>
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { BACKUPS_DIR_NAME, STATE_DIR_NAME } from '../config/constants.js';
import { errnoCode, mapSystemErrorToPatchError } from '../errors/index.js';
import {
  isDirectory,
  isRegularFile,
  resolveWithinRoot,
  resolveWithinRootSafe,
  toRelativePosix,
} from '../workspace/paths.js';
import type { PatchEngineCallbacks } from './callbacks.js';
import { nodePatchFileSystem, type PatchFileSystem } from './fs.js';
import type { BackupResult, FileFailure, RollbackResult } from './types.js';

export interface BackupManagerOptions {
  callbacks?: PatchEngineCallbacks;
  fileSystem?: PatchFileSystem;
  /** Clock for backup ids (defaults to Date.now) */
  now?: () => number;
}

function failureMessage(error: unknown): string {
  return mapSystemErrorToPatchError(error).message;
}

/**
 * List regular files under a directory, as paths relative to it.
 */
async function walkFiles(dir: string, prefix = ''): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const relative = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
    if (entry.isDirectory()) {
      files.push(...(await walkFiles(path.join(dir, entry.name), relative)));
    } else if (entry.isFile()) {
      files.push(relative);
    }
  }
  return files.sort();
}

/**
 * A backup id names a single directory entry: no separators, no dot segments.
 */
export function isValidBackupId(backupId: string): boolean {
  return (
    backupId !== '' &&
    backupId !== '.' &&
    backupId !== '..' &&
    !backupId.includes('/') &&
    !backupId.includes('\\') &&
    !backupId.includes('\0')
  );
}

export class BackupManager {
  private readonly root: string;
  private readonly backupsDir: string;
  private readonly callbacks?: PatchEngineCallbacks;
  private readonly fileSystem: PatchFileSystem;
  private readonly now: () => number;

  constructor(root: string, options: BackupManagerOptions = {}) {
    this.root = path.resolve(root);
    this.backupsDir = path.join(this.root, STATE_DIR_NAME, BACKUPS_DIR_NAME);
    this.callbacks = options.callbacks;
    this.fileSystem = options.fileSystem ?? nodePatchFileSystem;
    this.now = options.now ?? Date.now;
  }

  getBackupDir(backupId: string): string {
    return path.join(this.backupsDir, backupId);
  }

  /**
   * Reserve a fresh backup directory. Ids are millisecond timestamps; an id
   * whose directory exists is bumped by one until a free one is found.
   */
  private async reserveBackupId(): Promise<string> {
    await fs.mkdir(this.backupsDir, { recursive: true });
    let stamp = this.now();
    for (;;) {
      const backupId = String(stamp);
      try {
        await fs.mkdir(this.getBackupDir(backupId));
        return backupId;
      } catch (error) {
        if (errnoCode(error) === 'EEXIST') {
          stamp++;
          continue;
        }
        throw error;
      }
    }
  }

  /**
   * Copy each existing regular file under the root into a new snapshot.
   * Missing paths are skipped; copy failures are collected, not thrown.
   */
  async createBackup(relativePaths: readonly string[]): Promise<BackupResult> {
    const backupId = await this.reserveBackupId();
    const backupDir = this.getBackupDir(backupId);
    const copied: string[] = [];
    const failed: FileFailure[] = [];

    for (const relativePath of relativePaths) {
      const source = await resolveWithinRootSafe(this.root, relativePath);
      if (source === null || !(await isRegularFile(source))) {
        continue;
      }

      const normalized = toRelativePosix(this.root, source);
      const destination = path.join(backupDir, normalized);
      try {
        await this.fileSystem.mkdir(path.dirname(destination));
        await this.fileSystem.copyFile(source, destination);
        copied.push(relativePath);
      } catch (error) {
        failed.push({ path: relativePath, message: failureMessage(error) });
      }
    }

    const result: BackupResult = { backupId, copied, failed };
    this.callbacks?.onTrace?.('Backup created', result);
    if (failed.length > 0) {
      this.callbacks?.onDebug?.(`Backup ${backupId}: ${failed.length} file(s) failed to copy`, failed);
    }
    this.callbacks?.onBackupCreated?.(result);
    return result;
  }

  /**
   * Restore every file in a snapshot to its original location.
   * All restores are attempted; success requires all of them to succeed.
   */
  async rollback(backupId: string): Promise<RollbackResult> {
    const restored: string[] = [];
    const failed: FileFailure[] = [];

    const backupDir = this.getBackupDir(backupId);
    if (!isValidBackupId(backupId) || !(await isDirectory(backupDir))) {
      this.callbacks?.onDebug?.('Rollback target missing', { backupId });
      const missing: RollbackResult = { success: false, restored, failed };
      this.callbacks?.onRolledBack?.(backupId, missing);
      return missing;
    }

    for (const relativePath of await walkFiles(backupDir)) {
      const destination = resolveWithinRoot(this.root, relativePath);
      if (destination === null) {
        failed.push({ path: relativePath, message: 'Resolves outside the project root' });
        continue;
      }
      try {
        await this.fileSystem.mkdir(path.dirname(destination));
        await this.fileSystem.copyFile(path.join(backupDir, relativePath), destination);
        restored.push(relativePath);
      } catch (error) {
        failed.push({ path: relativePath, message: failureMessage(error) });
      }
    }

    const result: RollbackResult = { success: failed.length === 0, restored, failed };
    this.callbacks?.onRolledBack?.(backupId, result);
    return result;
  }

  /**
   * Existing backup ids, oldest first.
   */
  async listBackups(): Promise<string[]> {
    if (!(await isDirectory(this.backupsDir))) {
      return [];
    }
    const entries = await fs.readdir(this.backupsDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort((a, b) => Number(a) - Number(b) || a.localeCompare(b));
  }
}
