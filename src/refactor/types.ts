/**
 * Refactor plan types.
 */

import type { PatchProposal } from '../patch/types.js';
import type { RenameStrategy } from './renamer.js';

export interface FileChangeStat {
  path: string;
  replacements: number;
  strategy: RenameStrategy;
}

export interface SafetyReport {
  filesChanged: number;
  totalReplacements: number;
  maxFilesAllowed: number;
  /** True only when 0 < filesChanged <= maxFilesAllowed */
  ok: boolean;
  notes: string[];
}

export type RefactorTemplate = 'rename_symbol';

export interface RefactorPlan {
  template: RefactorTemplate;
  old: string;
  new: string;
  include: string[];
  exclude: string[];
  /** Relative path to whole-file new content */
  changes: Record<string, string>;
  changeStats: FileChangeStat[];
  safety: SafetyReport;
  proposal?: PatchProposal;
}

/**
 * Counts the validate loop needs from a test run.
 */
export interface TestOutcome {
  failed: number;
  passed: number;
}

export type TestRunnerFn = () => Promise<TestOutcome>;

export interface ValidateOptions {
  /** Default true */
  runTests?: boolean;
  /** Defaults to the project's detected test command */
  testRunner?: TestRunnerFn;
}

export interface ValidateResult {
  applied: boolean;
  backupId: string | null;
  testResult: TestOutcome | null;
}
