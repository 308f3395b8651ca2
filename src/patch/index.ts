/**
 * Patch engine: diff, analysis, safety scoring, backups and atomic apply.
 */

export { PatchSystem, DEFAULT_CHANGES_RATIONALE, DEFAULT_DIFF_RATIONALE } from './system.js';
export type { PatchSystemOptions } from './system.js';

export { DiffBuilder, renderFileDiff } from './diff-builder.js';
export { analyzeDiff } from './diff-analyzer.js';
export { SafetyScorer, SAFETY_SCORE_FLOOR } from './safety.js';
export type { SafetyThresholds } from './safety.js';
export { BackupManager, isValidBackupId } from './backup.js';
export type { BackupManagerOptions } from './backup.js';
export { ApplyLock } from './lock.js';
export type { ApplyLockOptions, LockContent, LockHandle } from './lock.js';
export { runFormatters, languageForPath } from './formatters.js';
export type { FormatterRunOptions, FormatterFailure } from './formatters.js';
export { PatchApplier } from './applier.js';
export type { PatchApplierOptions } from './applier.js';
export { nodePatchFileSystem } from './fs.js';
export type { PatchFileSystem } from './fs.js';
export type { PatchEngineCallbacks } from './callbacks.js';

export { createProposal, ImpactAssessmentSchema, PatchProposalSchema } from './types.js';
export type {
  ApplyFailureReason,
  ApplyOptions,
  ApplyResult,
  BackupResult,
  DiffAnalysis,
  FileFailure,
  ImpactAssessment,
  MissingContentPolicy,
  PatchProposal,
  ProposalFields,
  RollbackResult,
} from './types.js';
