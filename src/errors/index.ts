/**
 * Structured error types for the patch engine.
 * Provides typed error responses for programmatic handling.
 *
 * Follows the discriminated union pattern: operations that can fail for
 * ordinary reasons encode the failure in their return value, while
 * PatchEngineError is reserved for exceptional I/O and invalid arguments.
 */

// -----------------------------------------------------------------------------
// Error Codes
// -----------------------------------------------------------------------------

/**
 * Error codes for patch engine operations.
 */
export type PatchErrorCode =
  // Generic errors
  | 'VALIDATION_ERROR' // Invalid input parameters
  | 'IO_ERROR' // File system errors
  | 'CONFIG_ERROR' // Configuration issues
  | 'PERMISSION_DENIED' // Access denied
  | 'NOT_FOUND' // Resource not found
  // Engine-specific errors
  | 'PATH_TRAVERSAL_REJECTED' // Path resolves outside the project root
  | 'MISSING_TARGET_FILE' // File absent and unsafe mode off
  | 'MISSING_REPLACEMENT_CONTENT' // Proposal carries no whole-file content
  | 'BACKUP_FAILED' // A required backup copy could not be written
  | 'FORMATTER_FAILED' // Post-write formatter failed (non-fatal)
  | 'TEST_VALIDATION_FAILED' // Tests failed after apply, rolled back
  | 'ROLLBACK_TARGET_MISSING' // Unknown backup id
  | 'LOCKED' // Another apply holds the root lock
  | 'UNKNOWN'; // Unexpected errors

// -----------------------------------------------------------------------------
// Response Types
// -----------------------------------------------------------------------------

/**
 * Success response from an engine operation.
 */
export interface PatchSuccessResponse<T = unknown> {
  success: true;
  result: T;
  message: string;
}

/**
 * Error response from an engine operation.
 */
export interface PatchErrorResponse {
  success: false;
  error: PatchErrorCode;
  message: string;
  /** Path the failure relates to, when there is one */
  path?: string;
}

/**
 * Discriminated union for engine responses at public boundaries.
 */
export type PatchResponse<T = unknown> = PatchSuccessResponse<T> | PatchErrorResponse;

// -----------------------------------------------------------------------------
// Helper Functions
// -----------------------------------------------------------------------------

/**
 * Create a success response.
 */
export function successResponse<T>(result: T, message: string): PatchSuccessResponse<T> {
  return { success: true, result, message };
}

/**
 * Create an error response.
 *
 * @param error - Error code from PatchErrorCode
 * @param message - Human-readable error message
 * @param path - Optional path the error relates to
 */
export function errorResponse(
  error: PatchErrorCode,
  message: string,
  path?: string
): PatchErrorResponse {
  const response: PatchErrorResponse = { success: false, error, message };
  if (path !== undefined) {
    response.path = path;
  }
  return response;
}

// -----------------------------------------------------------------------------
// Type Guards
// -----------------------------------------------------------------------------

export function isPatchSuccess<T>(response: PatchResponse<T>): response is PatchSuccessResponse<T> {
  return response.success;
}

export function isPatchError(response: PatchResponse): response is PatchErrorResponse {
  return !response.success;
}

// -----------------------------------------------------------------------------
// Error Class
// -----------------------------------------------------------------------------

/**
 * Error thrown for exceptional failures (disk full, permission errors during a
 * write that was expected to succeed) and for invalid arguments.
 */
export class PatchEngineError extends Error {
  public readonly code: PatchErrorCode;
  public readonly path?: string;
  public override readonly cause?: unknown;

  constructor(message: string, code: PatchErrorCode, path?: string, cause?: unknown) {
    super(message);
    this.name = 'PatchEngineError';
    this.code = code;
    this.path = path;
    this.cause = cause;

    // Maintain proper stack trace in V8
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, PatchEngineError);
    }
  }
}

// -----------------------------------------------------------------------------
// System Error Mapping
// -----------------------------------------------------------------------------

/**
 * The errno code (`ENOENT`, `EEXIST`, ...) carried by a system error.
 * Checks the shape rather than `instanceof Error`: errors raised by Node's
 * own modules may come from another realm.
 */
export function errnoCode(error: unknown): string | undefined {
  return typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
    ? error.code
    : undefined;
}

/**
 * Map Node.js system errors to patch error codes.
 */
export function mapSystemErrorToPatchError(error: unknown): {
  code: PatchErrorCode;
  message: string;
} {
  if (error instanceof PatchEngineError) {
    return { code: error.code, message: error.message };
  }

  if (error !== null && error !== undefined && typeof error === 'object') {
    const code = errnoCode(error);
    const message =
      error instanceof Error
        ? error.message
        : 'message' in error && typeof error.message === 'string'
          ? error.message
          : 'Unknown error';

    // Matches "ENOENT:", "Error: ENOENT:", etc.
    const messageCode = message.match(
      /(ENOENT|EACCES|EPERM|EISDIR|ENOTDIR|EMFILE|ENFILE|ENOSPC):/
    )?.[1];
    const effectiveCode = code ?? messageCode;

    switch (effectiveCode) {
      case 'ENOENT':
        return { code: 'NOT_FOUND', message };
      case 'EACCES':
      case 'EPERM':
        return { code: 'PERMISSION_DENIED', message };
      case 'EISDIR':
      case 'ENOTDIR':
        return { code: 'VALIDATION_ERROR', message };
      case 'EMFILE':
      case 'ENFILE':
      case 'ENOSPC':
        return { code: 'IO_ERROR', message };
      default:
        if (error instanceof Error || code !== undefined) {
          return { code: 'IO_ERROR', message };
        }
    }
  }
  return { code: 'UNKNOWN', message: String(error) };
}

/**
 * Generate a user-friendly message for an error code, for CLI feedback.
 */
export function getUserFriendlyMessage(error: PatchErrorCode, path?: string): string {
  const target = path ?? 'the file';

  switch (error) {
    case 'PATH_TRAVERSAL_REJECTED':
      return `Refusing to touch ${target}: it resolves outside the project root.`;
    case 'MISSING_TARGET_FILE':
      return `${target} does not exist. Re-run with unsafe mode to allow creating new files.`;
    case 'MISSING_REPLACEMENT_CONTENT':
      return 'The proposal carries no whole-file content; partial hunks cannot be applied.';
    case 'BACKUP_FAILED':
      return `Could not back up ${target}; nothing was written.`;
    case 'FORMATTER_FAILED':
      return `A formatter failed on ${target}. The change itself was applied.`;
    case 'TEST_VALIDATION_FAILED':
      return 'Tests failed after applying the change; it was rolled back.';
    case 'ROLLBACK_TARGET_MISSING':
      return 'No backup exists with that id.';
    case 'LOCKED':
      return 'Another apply is in progress for this project.';
    case 'VALIDATION_ERROR':
      return 'Invalid input parameters provided.';
    case 'IO_ERROR':
      return `An I/O error occurred while writing ${target}.`;
    case 'CONFIG_ERROR':
      return 'Configuration error. Please check .term-coder/config.yaml.';
    case 'PERMISSION_DENIED':
      return `Permission denied for ${target}.`;
    case 'NOT_FOUND':
      return `${target} was not found.`;
    default:
      return 'An unexpected error occurred.';
  }
}
