/**
 * TypeScript interfaces and types for configuration management.
 * Provides abstractions for file system, environment, and callbacks.
 */

import type { PatchkitConfig } from './schema.js';
import type { IEnvReader } from './env.js';

export type { IEnvReader } from './env.js';

// -----------------------------------------------------------------------------
// File System Abstraction
// -----------------------------------------------------------------------------

/**
 * Interface for the file operations the config manager needs.
 * Enables dependency injection for testing.
 */
export interface IConfigFileSystem {
  /**
   * Read file contents as string.
   * @throws Error if file doesn't exist or can't be read
   */
  readFile(path: string): Promise<string>;

  /**
   * Write string contents to a file.
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Check if a file or directory exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Create a directory and any necessary parent directories.
   */
  mkdir(path: string): Promise<void>;
}

// -----------------------------------------------------------------------------
// Callback Interfaces
// -----------------------------------------------------------------------------

/**
 * Source of configuration data.
 */
export type ConfigSource = 'defaults' | 'merged';

/**
 * Callbacks for configuration events.
 */
export interface ConfigCallbacks {
  onConfigLoad?: (config: PatchkitConfig, source: ConfigSource) => void;
  onConfigSave?: (config: PatchkitConfig, path: string) => void;
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

// -----------------------------------------------------------------------------
// Error Types
// -----------------------------------------------------------------------------

/**
 * Validation error details for a specific field.
 */
export interface ConfigValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Error codes for configuration errors.
 */
export type ConfigErrorCode =
  | 'VALIDATION_FAILED'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'PARSE_ERROR';

/**
 * Custom error class for configuration failures.
 */
export class ConfigError extends Error {
  public readonly code: ConfigErrorCode;
  public readonly path?: string;
  public readonly details?: ConfigValidationError[];

  constructor(
    message: string,
    code: ConfigErrorCode,
    path?: string,
    details?: ConfigValidationError[]
  ) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.path = path;
    this.details = details;

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

// -----------------------------------------------------------------------------
// Response Pattern
// -----------------------------------------------------------------------------

/**
 * Structured response for configuration operations.
 */
export type ConfigResponse<T> =
  | { success: true; result: T; message: string }
  | { success: false; error: ConfigErrorCode; message: string; details?: ConfigValidationError[] };

export function successResponse<T>(result: T, message: string): ConfigResponse<T> {
  return { success: true, result, message };
}

export function errorResponse<T>(
  error: ConfigErrorCode,
  message: string,
  details?: ConfigValidationError[]
): ConfigResponse<T> {
  return details === undefined
    ? { success: false, error, message }
    : { success: false, error, message, details };
}

// -----------------------------------------------------------------------------
// Config Manager Options
// -----------------------------------------------------------------------------

export interface ConfigManagerOptions {
  /** File system implementation (defaults to NodeConfigFileSystem) */
  fileSystem?: IConfigFileSystem;
  /** Environment reader implementation (defaults to ProcessEnvReader) */
  envReader?: IEnvReader;
  /** Callbacks for configuration events */
  callbacks?: ConfigCallbacks;
}
