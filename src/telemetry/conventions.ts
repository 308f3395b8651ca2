/**
 * Span attribute names for patch engine operations.
 * Project attributes live in the `patchkit.*` namespace; errors use the
 * standard OTel `error.type`.
 */

// -----------------------------------------------------------------------------
// Operation Attributes
// -----------------------------------------------------------------------------

/** The patch engine operation being performed */
export const ATTR_PATCHKIT_OPERATION = 'patchkit.operation';

/** Project root the operation runs against */
export const ATTR_PATCHKIT_ROOT = 'patchkit.root';

// -----------------------------------------------------------------------------
// Proposal Attributes
// -----------------------------------------------------------------------------

export const ATTR_PATCHKIT_FILES_CHANGED = 'patchkit.files_changed';
export const ATTR_PATCHKIT_LINES_ADDED = 'patchkit.lines_added';
export const ATTR_PATCHKIT_LINES_REMOVED = 'patchkit.lines_removed';
export const ATTR_PATCHKIT_SAFETY_SCORE = 'patchkit.safety_score';

// -----------------------------------------------------------------------------
// Apply / Rollback Attributes
// -----------------------------------------------------------------------------

export const ATTR_PATCHKIT_BACKUP_ID = 'patchkit.backup_id';
export const ATTR_PATCHKIT_FILES_WRITTEN = 'patchkit.files_written';

/** Reason code when an apply declines without throwing */
export const ATTR_PATCHKIT_APPLY_REASON = 'patchkit.apply.reason';

// -----------------------------------------------------------------------------
// Refactor / Validate Attributes
// -----------------------------------------------------------------------------

export const ATTR_PATCHKIT_SYMBOL_OLD = 'patchkit.symbol.old';
export const ATTR_PATCHKIT_SYMBOL_NEW = 'patchkit.symbol.new';
export const ATTR_PATCHKIT_REPLACEMENTS = 'patchkit.replacements';
export const ATTR_PATCHKIT_TESTS_FAILED = 'patchkit.tests.failed';
export const ATTR_PATCHKIT_TESTS_PASSED = 'patchkit.tests.passed';

/** Error type or exception name */
export const ATTR_ERROR_TYPE = 'error.type';

// -----------------------------------------------------------------------------
// Well-Known Operation Names
// -----------------------------------------------------------------------------

export const PATCHKIT_OPERATION = {
  PROPOSE: 'propose',
  APPLY: 'apply',
  ROLLBACK: 'rollback',
  RENAME: 'rename',
  VALIDATE: 'validate',
} as const;

export type PatchkitOperationName = (typeof PATCHKIT_OPERATION)[keyof typeof PATCHKIT_OPERATION];
