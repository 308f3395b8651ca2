/**
 * Token-exact symbol rename across a project, packaged as a reviewable plan.
 */

import * as path from 'node:path';
import fg from 'fast-glob';

import { DEFAULT_EXCLUDE_DIRS } from '../config/constants.js';
import { getDefaultConfig, type PatchkitConfig } from '../config/schema.js';
import { PatchEngineError } from '../errors/index.js';
import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import { PatchSystem } from '../patch/system.js';
import {
  ATTR_PATCHKIT_FILES_CHANGED,
  ATTR_PATCHKIT_REPLACEMENTS,
  ATTR_PATCHKIT_ROOT,
  ATTR_PATCHKIT_SAFETY_SCORE,
  ATTR_PATCHKIT_SYMBOL_NEW,
  ATTR_PATCHKIT_SYMBOL_OLD,
} from '../telemetry/conventions.js';
import { withPatchSpan } from '../telemetry/spans.js';
import { readTextFile } from '../workspace/paths.js';
import { renameInSource } from './renamer.js';
import { TOKENIZED_EXTENSIONS } from './tokenizers/index.js';
import type {
  FileChangeStat,
  RefactorPlan,
  SafetyReport,
  ValidateOptions,
  ValidateResult,
} from './types.js';
import { applyAndValidate } from './validate.js';

export const RENAME_RATIONALE =
  'Rename applied to identifier tokens only; strings and comments left unchanged.';

/** Every extension with a tokenizer */
export const DEFAULT_INCLUDE_GLOBS: readonly string[] = [
  `**/*.{${TOKENIZED_EXTENSIONS.join(',')}}`,
];

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export interface RenameOptions {
  include?: readonly string[];
  exclude?: readonly string[];
  /** Abort once more files than this would change (default from config) */
  maxFiles?: number;
}

export interface RefactorEngineOptions {
  config?: PatchkitConfig;
  callbacks?: PatchEngineCallbacks;
  /** Facade used to build the proposal (defaults to one over the same root) */
  patchSystem?: PatchSystem;
}

export class RefactorEngine {
  readonly root: string;
  private readonly config: PatchkitConfig;
  private readonly callbacks?: PatchEngineCallbacks;
  private readonly patchSystem: PatchSystem;

  constructor(root: string, options: RefactorEngineOptions = {}) {
    this.root = path.resolve(root);
    this.config = options.config ?? getDefaultConfig();
    this.callbacks = options.callbacks;
    this.patchSystem =
      options.patchSystem ??
      new PatchSystem({ root: this.root, config: this.config, callbacks: this.callbacks });
  }

  /**
   * Rename `oldName` to `newName` in every matching file. Nothing is written;
   * the plan's proposal carries the new contents.
   *
   * @throws PatchEngineError('VALIDATION_ERROR') when either name is not an identifier
   */
  async renameSymbol(
    oldName: string,
    newName: string,
    options: RenameOptions = {}
  ): Promise<RefactorPlan> {
    for (const name of [oldName, newName]) {
      if (!IDENTIFIER.test(name)) {
        throw new PatchEngineError(`Not a valid identifier: "${name}"`, 'VALIDATION_ERROR');
      }
    }

    const include = [...(options.include ?? DEFAULT_INCLUDE_GLOBS)];
    const exclude = [...(options.exclude ?? [])];
    const maxFiles = options.maxFiles ?? this.config.refactor.maxFiles;

    return withPatchSpan(
      'rename',
      {
        [ATTR_PATCHKIT_ROOT]: this.root,
        [ATTR_PATCHKIT_SYMBOL_OLD]: oldName,
        [ATTR_PATCHKIT_SYMBOL_NEW]: newName,
      },
      async (span) => {
        const files = await this.listFiles(include, exclude);
        const changes: Record<string, string> = {};
        const changeStats: FileChangeStat[] = [];
        const notes: string[] = [];

        for (const relativePath of files) {
          const source = await readTextFile(path.join(this.root, relativePath));
          if (source === null) {
            this.callbacks?.onTrace?.('Skipping unreadable or binary file', { path: relativePath });
            continue;
          }

          const outcome = renameInSource(relativePath, source, oldName, newName, this.callbacks);
          if (outcome.replacements === 0) {
            continue;
          }
          changes[relativePath] = outcome.content;
          changeStats.push({
            path: relativePath,
            replacements: outcome.replacements,
            strategy: outcome.strategy,
          });

          if (changeStats.length > maxFiles) {
            notes.push(`Aborting: exceeded max_files limit ${maxFiles}.`);
            break;
          }
        }

        const totalReplacements = changeStats.reduce((sum, stat) => sum + stat.replacements, 0);
        const safety: SafetyReport = {
          filesChanged: changeStats.length,
          totalReplacements,
          maxFilesAllowed: maxFiles,
          ok: changeStats.length > 0 && changeStats.length <= maxFiles,
          notes,
        };

        const proposal = await this.patchSystem.proposeFromChanges(
          `Rename symbol ${oldName} -> ${newName}`,
          changes,
          RENAME_RATIONALE
        );

        span.setAttributes({
          [ATTR_PATCHKIT_FILES_CHANGED]: safety.filesChanged,
          [ATTR_PATCHKIT_REPLACEMENTS]: totalReplacements,
          [ATTR_PATCHKIT_SAFETY_SCORE]: proposal.safetyScore,
        });
        this.callbacks?.onDebug?.(`Rename ${oldName} -> ${newName}`, safety);

        return {
          template: 'rename_symbol',
          old: oldName,
          new: newName,
          include,
          exclude,
          changes,
          changeStats,
          safety,
          proposal,
        };
      }
    );
  }

  /**
   * Apply the plan's proposal (creating files as needed), then run the tests
   * and roll back if any fail.
   */
  applyAndValidate(plan: RefactorPlan, options: ValidateOptions = {}): Promise<ValidateResult> {
    return applyAndValidate(this.patchSystem, plan, { ...options, callbacks: this.callbacks });
  }

  /**
   * Files matching `include`, minus `exclude` and the default excluded
   * directories, as sorted POSIX paths relative to the root.
   */
  private async listFiles(include: string[], exclude: string[]): Promise<string[]> {
    const ignore = [...exclude, ...DEFAULT_EXCLUDE_DIRS.map((dir) => `**/${dir}/**`)];
    const files = await fg(include, {
      cwd: this.root,
      ignore,
      onlyFiles: true,
      followSymbolicLinks: false,
      unique: true,
    });
    return files.sort();
  }
}
