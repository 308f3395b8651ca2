/**
 * Configuration module public API.
 *
 * @module config
 *
 * @example
 * import { loadConfig } from './config/index.js';
 *
 * const result = await loadConfig(projectRoot);
 * if (result.success) {
 *   console.log('Max files:', result.result.safety.maxFiles);
 * }
 */

export {
  STATE_DIR_NAME,
  CONFIG_FILE_NAME,
  PENDING_EDIT_FILE_NAME,
  BACKUPS_DIR_NAME,
  LOCK_FILE_NAME,
  LAST_TEST_FILE_NAME,
  DEFAULT_SAFETY_MAX_FILES,
  DEFAULT_SAFETY_MAX_LINES,
  DEFAULT_CREATE_BACKUPS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_REFACTOR_MAX_FILES,
  DEFAULT_TEST_TIMEOUT_MS,
  DEFAULT_FORMATTERS,
  DEFAULT_EXCLUDE_DIRS,
  TEST_FRAMEWORKS,
  FORMATTER_LANGUAGES,
} from './constants.js';
export type { TestFramework, FormatterLanguage } from './constants.js';

export {
  PatchkitConfigSchema,
  SafetyConfigSchema,
  DiffConfigSchema,
  RefactorConfigSchema,
  FormattersConfigSchema,
  TestingConfigSchema,
  TelemetryConfigSchema,
  getDefaultConfig,
  parseConfig,
} from './schema.js';
export type {
  PatchkitConfig,
  SafetyConfig,
  DiffConfig,
  RefactorConfig,
  FormattersConfig,
  TestingConfig,
  TelemetryConfig,
} from './schema.js';

export { ProcessEnvReader, readEnvConfig } from './env.js';
export type { IEnvReader } from './env.js';

export { ConfigManager, NodeConfigFileSystem, deepMerge, loadConfig } from './manager.js';

export { ConfigError, successResponse, errorResponse } from './types.js';
export type {
  ConfigCallbacks,
  ConfigSource,
  ConfigValidationError,
  ConfigErrorCode,
  ConfigResponse,
  ConfigManagerOptions,
  IConfigFileSystem,
} from './types.js';
