/**
 * PatchSystem facade: propose from changes or from a diff, apply, roll back.
 */

import * as path from 'node:path';

import { getDefaultConfig, type PatchkitConfig } from '../config/schema.js';
import {
  errorResponse,
  getUserFriendlyMessage,
  mapSystemErrorToPatchError,
  PatchEngineError,
  successResponse,
  type PatchResponse,
} from '../errors/index.js';
import type { SpawnFn } from '../runtime/subprocess.js';
import {
  ATTR_PATCHKIT_APPLY_REASON,
  ATTR_PATCHKIT_BACKUP_ID,
  ATTR_PATCHKIT_FILES_CHANGED,
  ATTR_PATCHKIT_FILES_WRITTEN,
  ATTR_PATCHKIT_LINES_ADDED,
  ATTR_PATCHKIT_LINES_REMOVED,
  ATTR_PATCHKIT_ROOT,
  ATTR_PATCHKIT_SAFETY_SCORE,
} from '../telemetry/conventions.js';
import { withPatchSpan } from '../telemetry/spans.js';
import { PatchApplier } from './applier.js';
import { BackupManager } from './backup.js';
import type { PatchEngineCallbacks } from './callbacks.js';
import { analyzeDiff } from './diff-analyzer.js';
import { DiffBuilder } from './diff-builder.js';
import type { PatchFileSystem } from './fs.js';
import { ApplyLock } from './lock.js';
import { SafetyScorer } from './safety.js';
import {
  createProposal,
  type ApplyOptions,
  type ApplyResult,
  type BackupResult,
  type PatchProposal,
  type RollbackResult,
} from './types.js';

export const DEFAULT_CHANGES_RATIONALE = 'Proposed changes derived from explicit edits.';
export const DEFAULT_DIFF_RATIONALE = 'Proposed changes derived from a unified diff.';

export interface PatchSystemOptions {
  root: string;
  /** Loaded project config (defaults to schema defaults) */
  config?: PatchkitConfig;
  callbacks?: PatchEngineCallbacks;
  /** Subprocess spawner for formatters */
  spawn?: SpawnFn;
  fileSystem?: PatchFileSystem;
}

export class PatchSystem {
  readonly root: string;
  readonly config: PatchkitConfig;
  private readonly callbacks?: PatchEngineCallbacks;
  private readonly diffBuilder: DiffBuilder;
  private readonly scorer: SafetyScorer;
  private readonly backupManager: BackupManager;
  private readonly applier: PatchApplier;

  constructor(options: PatchSystemOptions) {
    this.root = path.resolve(options.root);
    this.config = options.config ?? getDefaultConfig();
    this.callbacks = options.callbacks;

    this.diffBuilder = new DiffBuilder(this.root, this.callbacks);
    this.scorer = new SafetyScorer({
      maxFiles: this.config.safety.maxFiles,
      maxLines: this.config.safety.maxLines,
    });
    this.backupManager = new BackupManager(this.root, {
      callbacks: this.callbacks,
      fileSystem: options.fileSystem,
    });
    this.applier = new PatchApplier(this.root, {
      backupManager: this.backupManager,
      lock: new ApplyLock(this.root, {
        staleMs: this.config.safety.lockStaleMs,
        callbacks: this.callbacks,
      }),
      createBackups: this.config.safety.createBackups,
      formatters: this.config.formatters,
      spawn: options.spawn,
      fileSystem: options.fileSystem,
      callbacks: this.callbacks,
    });
  }

  /**
   * Build a proposal from whole-file contents. Reads the current files but
   * writes nothing.
   */
  async proposeFromChanges(
    instruction: string,
    changes: Readonly<Record<string, string>>,
    rationale: string = DEFAULT_CHANGES_RATIONALE
  ): Promise<PatchProposal> {
    return withPatchSpan('propose', { [ATTR_PATCHKIT_ROOT]: this.root }, async (span) => {
      const diff = await this.diffBuilder.build(changes, this.config.diff.contextLines);
      const proposal = this.scoreDiff(instruction, diff, rationale, changes);
      span.setAttributes({
        [ATTR_PATCHKIT_FILES_CHANGED]: proposal.estimatedImpact.filesChanged,
        [ATTR_PATCHKIT_LINES_ADDED]: proposal.estimatedImpact.linesAdded,
        [ATTR_PATCHKIT_LINES_REMOVED]: proposal.estimatedImpact.linesRemoved,
        [ATTR_PATCHKIT_SAFETY_SCORE]: proposal.safetyScore,
      });
      return proposal;
    });
  }

  /**
   * Build a proposal from diff text alone. It carries no replacement content,
   * so applying it yields MISSING_REPLACEMENT_CONTENT.
   */
  proposeFromDiff(
    instruction: string,
    diff: string,
    rationale: string = DEFAULT_DIFF_RATIONALE
  ): PatchProposal {
    return this.scoreDiff(instruction, diff, rationale);
  }

  private scoreDiff(
    instruction: string,
    diff: string,
    rationale: string,
    newContents?: Readonly<Record<string, string>>
  ): PatchProposal {
    const { affectedFiles, impact } = analyzeDiff(diff);
    return createProposal({
      instruction,
      diff,
      rationale,
      affectedFiles,
      safetyScore: this.scorer.score(impact),
      estimatedImpact: impact,
      newContents,
    });
  }

  async applyPatch(proposal: PatchProposal, options: ApplyOptions = {}): Promise<ApplyResult> {
    return withPatchSpan('apply', { [ATTR_PATCHKIT_ROOT]: this.root }, async (span) => {
      const result = await this.applier.applyPatch(proposal, options);
      span.setAttribute(ATTR_PATCHKIT_FILES_WRITTEN, result.written.length);
      if (result.backupId !== null) {
        span.setAttribute(ATTR_PATCHKIT_BACKUP_ID, result.backupId);
      }
      if (result.reason !== undefined) {
        span.setAttribute(ATTR_PATCHKIT_APPLY_REASON, result.reason);
      }
      return result;
    });
  }

  /**
   * applyPatch at a response boundary: refusals and thrown I/O errors both
   * come back as error responses.
   */
  async safeApply(
    proposal: PatchProposal,
    options: ApplyOptions = {}
  ): Promise<PatchResponse<ApplyResult>> {
    try {
      const result = await this.applyPatch(proposal, options);
      if (result.success) {
        return successResponse(result, `Applied ${result.written.length} file(s)`);
      }
      switch (result.reason) {
        case 'LOCKED':
        case 'BACKUP_FAILED':
        case 'MISSING_REPLACEMENT_CONTENT':
          return errorResponse(result.reason, getUserFriendlyMessage(result.reason));
        default:
          return errorResponse(
            'MISSING_TARGET_FILE',
            'Nothing to apply: no affected file exists under the project root'
          );
      }
    } catch (error) {
      const mapped = mapSystemErrorToPatchError(error);
      return errorResponse(
        mapped.code,
        mapped.message,
        error instanceof PatchEngineError ? error.path : undefined
      );
    }
  }

  async rollback(backupId: string): Promise<RollbackResult> {
    return withPatchSpan(
      'rollback',
      { [ATTR_PATCHKIT_ROOT]: this.root, [ATTR_PATCHKIT_BACKUP_ID]: backupId },
      () => this.backupManager.rollback(backupId)
    );
  }

  createBackup(relativePaths: readonly string[]): Promise<BackupResult> {
    return this.backupManager.createBackup(relativePaths);
  }

  listBackups(): Promise<string[]> {
    return this.backupManager.listBackups();
  }
}
