/**
 * Core patch engine types.
 * Proposal shapes are inferred from zod schemas; result shapes are plain interfaces.
 */

import { z } from 'zod';

// -----------------------------------------------------------------------------
// Proposal
// -----------------------------------------------------------------------------

/**
 * Impact derived from unified diff text.
 */
export const ImpactAssessmentSchema = z
  .object({
    filesChanged: z.number().int().nonnegative(),
    linesAdded: z.number().int().nonnegative(),
    linesRemoved: z.number().int().nonnegative(),
  })
  .readonly();

export type ImpactAssessment = z.infer<typeof ImpactAssessmentSchema>;

/**
 * A reviewable, safety-scored change set.
 * `newContents` holds whole-file replacement content; without it a proposal
 * can be shown but not applied.
 */
export const PatchProposalSchema = z
  .object({
    instruction: z.string(),
    diff: z.string(),
    rationale: z.string(),
    affectedFiles: z.array(z.string()).readonly(),
    safetyScore: z.number().min(0).max(1),
    estimatedImpact: ImpactAssessmentSchema,
    newContents: z.record(z.string(), z.string()).readonly().optional(),
  })
  .readonly();

export type PatchProposal = z.infer<typeof PatchProposalSchema>;

/**
 * Fields accepted by createProposal.
 */
export interface ProposalFields {
  instruction: string;
  diff: string;
  rationale: string;
  affectedFiles: readonly string[];
  safetyScore: number;
  estimatedImpact: ImpactAssessment;
  newContents?: Readonly<Record<string, string>>;
}

/**
 * Build a frozen proposal. Arrays and maps are copied so later mutation of the
 * inputs cannot reach the proposal.
 */
export function createProposal(fields: ProposalFields): PatchProposal {
  const proposal: PatchProposal = {
    instruction: fields.instruction,
    diff: fields.diff,
    rationale: fields.rationale,
    affectedFiles: Object.freeze([...fields.affectedFiles]),
    safetyScore: fields.safetyScore,
    estimatedImpact: Object.freeze({ ...fields.estimatedImpact }),
    ...(fields.newContents !== undefined && {
      newContents: Object.freeze({ ...fields.newContents }),
    }),
  };
  return Object.freeze(proposal);
}

// -----------------------------------------------------------------------------
// Diff Analysis
// -----------------------------------------------------------------------------

export interface DiffAnalysis {
  /** Paths from `+++ b/<path>` headers, first-appearance order, deduplicated */
  affectedFiles: string[];
  impact: ImpactAssessment;
}

// -----------------------------------------------------------------------------
// Backup
// -----------------------------------------------------------------------------

export interface FileFailure {
  path: string;
  message: string;
}

export interface BackupResult {
  backupId: string;
  /** Relative paths copied into the snapshot */
  copied: string[];
  /** Paths that existed but could not be copied */
  failed: FileFailure[];
}

export interface RollbackResult {
  /** True only when the backup exists and every file was restored */
  success: boolean;
  restored: string[];
  failed: FileFailure[];
}

// -----------------------------------------------------------------------------
// Apply
// -----------------------------------------------------------------------------

/**
 * What to do when `newContents` lacks an entry for a candidate file.
 */
export type MissingContentPolicy = 'skip' | 'fail';

export interface ApplyOptions {
  /** Restrict the apply to these paths (intersected with affectedFiles) */
  pickFiles?: readonly string[] | null;
  /** Snapshot candidates before writing (default true) */
  createBackup?: boolean;
  /** Run configured formatters on written files (default true) */
  runFormatters?: boolean;
  /** Allow creating files that don't exist yet (default false) */
  unsafe?: boolean;
  /** Default 'skip' */
  missingContent?: MissingContentPolicy;
}

export type ApplyFailureReason =
  | 'NOTHING_TO_APPLY'
  | 'LOCKED'
  | 'BACKUP_FAILED'
  | 'MISSING_REPLACEMENT_CONTENT';

export interface ApplyResult {
  success: boolean;
  backupId: string | null;
  /** Relative paths written, in candidate order */
  written: string[];
  reason?: ApplyFailureReason;
}
