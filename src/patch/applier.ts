/**
 * Applies a proposal's whole-file contents to the working tree.
 *
 * Order of operations: candidate selection, root lock, backup, two-phase
 * write (temporaries first, then renames), formatters, lock release.
 */

import * as path from 'node:path';

import { DEFAULT_CREATE_BACKUPS } from '../config/constants.js';
import { FormattersConfigSchema, type FormattersConfig } from '../config/schema.js';
import { PatchEngineError, mapSystemErrorToPatchError } from '../errors/index.js';
import type { SpawnFn } from '../runtime/subprocess.js';
import { pathExists, resolveWithinRootSafe } from '../workspace/paths.js';
import { BackupManager } from './backup.js';
import type { PatchEngineCallbacks } from './callbacks.js';
import { runFormatters } from './formatters.js';
import { nodePatchFileSystem, type PatchFileSystem } from './fs.js';
import { ApplyLock } from './lock.js';
import type { ApplyFailureReason, ApplyOptions, ApplyResult, PatchProposal } from './types.js';

export interface PatchApplierOptions {
  backupManager?: BackupManager;
  lock?: ApplyLock;
  /** Default for ApplyOptions.createBackup */
  createBackups?: boolean;
  formatters?: FormattersConfig;
  spawn?: SpawnFn;
  fileSystem?: PatchFileSystem;
  callbacks?: PatchEngineCallbacks;
}

interface Candidate {
  relativePath: string;
  absolutePath: string;
  existed: boolean;
}

interface PlannedWrite extends Candidate {
  content: string;
  tempPath: string;
}

function tempPathFor(absolutePath: string, stamp: string): string {
  return path.join(path.dirname(absolutePath), `.${path.basename(absolutePath)}.tmp.${stamp}`);
}

export class PatchApplier {
  private readonly root: string;
  private readonly backupManager: BackupManager;
  private readonly lock: ApplyLock;
  private readonly createBackups: boolean;
  private readonly formatters: FormattersConfig;
  private readonly spawn?: SpawnFn;
  private readonly fileSystem: PatchFileSystem;
  private readonly callbacks?: PatchEngineCallbacks;

  constructor(root: string, options: PatchApplierOptions = {}) {
    this.root = path.resolve(root);
    this.callbacks = options.callbacks;
    this.fileSystem = options.fileSystem ?? nodePatchFileSystem;
    this.backupManager =
      options.backupManager ??
      new BackupManager(this.root, { callbacks: this.callbacks, fileSystem: this.fileSystem });
    this.lock = options.lock ?? new ApplyLock(this.root, { callbacks: this.callbacks });
    this.createBackups = options.createBackups ?? DEFAULT_CREATE_BACKUPS;
    this.formatters = options.formatters ?? FormattersConfigSchema.parse({});
    this.spawn = options.spawn;
  }

  /**
   * Apply a proposal. Ordinary refusals come back as `reason`; I/O failures
   * during the write phases throw PatchEngineError('IO_ERROR').
   */
  async applyPatch(proposal: PatchProposal, options: ApplyOptions = {}): Promise<ApplyResult> {
    const candidates = await this.selectCandidates(proposal, options);
    if (candidates.length === 0) {
      return this.finish({ success: false, backupId: null, written: [], reason: 'NOTHING_TO_APPLY' });
    }

    const handle = await this.lock.acquire();
    if (handle === null) {
      return this.finish({ success: false, backupId: null, written: [], reason: 'LOCKED' });
    }

    try {
      return this.finish(await this.applyLocked(proposal, candidates, options));
    } finally {
      await handle.release();
    }
  }

  private finish(result: ApplyResult): ApplyResult {
    if (result.reason !== undefined) {
      this.callbacks?.onDebug?.(`Apply declined: ${result.reason}`, result);
    }
    this.callbacks?.onApplied?.(result);
    return result;
  }

  private async selectCandidates(
    proposal: PatchProposal,
    options: ApplyOptions
  ): Promise<Candidate[]> {
    const pick = options.pickFiles ?? null;
    const seen = new Set<string>();
    const candidates: Candidate[] = [];

    for (const relativePath of proposal.affectedFiles) {
      if (pick !== null && !pick.includes(relativePath)) {
        continue;
      }

      const absolutePath = await resolveWithinRootSafe(this.root, relativePath);
      if (absolutePath === null) {
        this.callbacks?.onDebug?.('Skipping path outside project root', { path: relativePath });
        continue;
      }
      // Spellings of one file ("a.txt", "./a.txt") share a candidate; the first wins
      if (seen.has(absolutePath)) {
        this.callbacks?.onDebug?.('Skipping duplicate path', { path: relativePath });
        continue;
      }
      seen.add(absolutePath);
      const existed = await pathExists(absolutePath);
      if (!existed && options.unsafe !== true) {
        this.callbacks?.onDebug?.('Skipping missing file (unsafe mode off)', { path: relativePath });
        continue;
      }
      candidates.push({ relativePath, absolutePath, existed });
    }
    return candidates;
  }

  private async applyLocked(
    proposal: PatchProposal,
    candidates: Candidate[],
    options: ApplyOptions
  ): Promise<ApplyResult> {
    let backupId: string | null = null;
    if (options.createBackup ?? this.createBackups) {
      const backup = await this.backupManager.createBackup(candidates.map((c) => c.relativePath));
      backupId = backup.backupId;
      if (backup.failed.length > 0) {
        return { success: false, backupId, written: [], reason: 'BACKUP_FAILED' };
      }
    }

    const missing = (reason: ApplyFailureReason): ApplyResult => ({
      success: false,
      backupId,
      written: [],
      reason,
    });

    const newContents = proposal.newContents;
    if (newContents === undefined) {
      return missing('MISSING_REPLACEMENT_CONTENT');
    }

    const stamp = backupId ?? String(Date.now());
    const planned: PlannedWrite[] = [];
    for (const candidate of candidates) {
      const content = Object.hasOwn(newContents, candidate.relativePath)
        ? newContents[candidate.relativePath]
        : undefined;
      if (content === undefined) {
        if ((options.missingContent ?? 'skip') === 'fail') {
          return missing('MISSING_REPLACEMENT_CONTENT');
        }
        this.callbacks?.onDebug?.('No replacement content; skipping', {
          path: candidate.relativePath,
        });
        continue;
      }
      planned.push({ ...candidate, content, tempPath: tempPathFor(candidate.absolutePath, stamp) });
    }

    await this.writeTemporaries(planned);
    await this.commitTemporaries(planned, backupId);

    const written = planned.map((write) => write.relativePath);
    if (options.runFormatters ?? true) {
      await runFormatters(written, {
        root: this.root,
        formatters: this.formatters,
        spawn: this.spawn,
        callbacks: this.callbacks,
      });
    }

    return { success: true, backupId, written };
  }

  /**
   * Phase one: every file's content goes to a temporary sibling. Any failure
   * removes the temporaries written so far; no target has changed.
   */
  private async writeTemporaries(planned: PlannedWrite[]): Promise<void> {
    const created: string[] = [];
    for (const write of planned) {
      try {
        await this.fileSystem.mkdir(path.dirname(write.tempPath));
        await this.fileSystem.writeFile(write.tempPath, write.content);
        created.push(write.tempPath);
      } catch (error) {
        await this.removeFiles(created);
        const mapped = mapSystemErrorToPatchError(error);
        throw new PatchEngineError(
          `Failed to write ${write.relativePath}: ${mapped.message}`,
          'IO_ERROR',
          write.relativePath,
          error
        );
      }
    }
  }

  /**
   * Phase two: rename temporaries into place. On failure the remaining
   * temporaries are removed, files created by this apply are deleted and the
   * backup (when there is one) is restored.
   */
  private async commitTemporaries(planned: PlannedWrite[], backupId: string | null): Promise<void> {
    for (let index = 0; index < planned.length; index++) {
      const write = planned[index];
      if (write === undefined) {
        continue;
      }
      try {
        await this.fileSystem.rename(write.tempPath, write.absolutePath);
      } catch (error) {
        await this.removeFiles(planned.slice(index).map((w) => w.tempPath));
        await this.removeFiles(
          planned
            .slice(0, index)
            .filter((w) => !w.existed)
            .map((w) => w.absolutePath)
        );
        if (backupId !== null) {
          const restore = await this.backupManager.rollback(backupId);
          this.callbacks?.onDebug?.('Restored backup after failed rename', restore);
        }
        const mapped = mapSystemErrorToPatchError(error);
        throw new PatchEngineError(
          `Failed to move ${write.relativePath} into place: ${mapped.message}`,
          'IO_ERROR',
          write.relativePath,
          error
        );
      }
    }
  }

  private async removeFiles(paths: string[]): Promise<void> {
    for (const filePath of paths) {
      try {
        await this.fileSystem.unlink(filePath);
      } catch (error) {
        this.callbacks?.onDebug?.('Could not remove file during cleanup', {
          path: filePath,
          message: mapSystemErrorToPatchError(error).message,
        });
      }
    }
  }
}
