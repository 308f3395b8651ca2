/**
 * Telemetry module - OpenTelemetry setup and span helpers.
 *
 * This module provides:
 * - initializeTelemetry() for one-time OTel setup
 * - getTracer() for creating tracers
 * - withPatchSpan() around propose/apply/rollback/rename/validate
 * - Zero overhead when disabled (no-op implementations)
 */

// ─── Types ───────────────────────────────────────────────────────────────────
export type {
  TelemetryErrorCode,
  TelemetrySuccessResponse,
  TelemetryErrorResponse,
  TelemetryResponse,
  ExporterType,
  TelemetryOptions,
  TelemetryInitResult,
  TelemetryHelpers,
} from './types.js';

// ─── Type Guards ─────────────────────────────────────────────────────────────
export { isTelemetrySuccess, isTelemetryError } from './types.js';

// ─── Setup Functions ─────────────────────────────────────────────────────────
export {
  initializeTelemetry,
  getTracer,
  isEnabled,
  getConfig,
  shutdown,
  telemetryHelpers,
} from './setup.js';

// ─── Span Helpers ────────────────────────────────────────────────────────────
export { startPatchSpan, endPatchSpan, withPatchSpan, getActiveSpan } from './spans.js';

// ─── Attribute Conventions ───────────────────────────────────────────────────
export {
  ATTR_PATCHKIT_OPERATION,
  ATTR_PATCHKIT_ROOT,
  ATTR_PATCHKIT_FILES_CHANGED,
  ATTR_PATCHKIT_LINES_ADDED,
  ATTR_PATCHKIT_LINES_REMOVED,
  ATTR_PATCHKIT_SAFETY_SCORE,
  ATTR_PATCHKIT_BACKUP_ID,
  ATTR_PATCHKIT_FILES_WRITTEN,
  ATTR_PATCHKIT_APPLY_REASON,
  ATTR_PATCHKIT_SYMBOL_OLD,
  ATTR_PATCHKIT_SYMBOL_NEW,
  ATTR_PATCHKIT_REPLACEMENTS,
  ATTR_PATCHKIT_TESTS_FAILED,
  ATTR_PATCHKIT_TESTS_PASSED,
  ATTR_ERROR_TYPE,
  PATCHKIT_OPERATION,
} from './conventions.js';
export type { PatchkitOperationName } from './conventions.js';
