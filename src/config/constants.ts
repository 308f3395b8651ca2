/**
 * Default configuration values for the patch engine.
 * These constants provide defaults for all configuration sections.
 */

// State directory and file names (relative to the project root)
export const STATE_DIR_NAME = '.term-coder' as const;
export const CONFIG_FILE_NAME = 'config.yaml' as const;
export const PENDING_EDIT_FILE_NAME = 'pending_edit.json' as const;
export const BACKUPS_DIR_NAME = 'backups' as const;
export const LOCK_FILE_NAME = 'apply.lock' as const;
export const LAST_TEST_FILE_NAME = 'last_test.json' as const;

// Safety scoring
export const DEFAULT_SAFETY_MAX_FILES = 50;
export const DEFAULT_SAFETY_MAX_LINES = 2000;
export const DEFAULT_CREATE_BACKUPS = true;
export const DEFAULT_LOCK_STALE_MS = 10 * 60 * 1000; // 10 minutes

// Diff rendering
export const DEFAULT_CONTEXT_LINES = 3;

// Refactoring
export const DEFAULT_REFACTOR_MAX_FILES = 200;

// Test runner
export const DEFAULT_TEST_TIMEOUT_MS = 600_000; // 10 minutes

export const TEST_FRAMEWORKS = ['pytest', 'jest', 'gotest'] as const;
export type TestFramework = (typeof TEST_FRAMEWORKS)[number];

// Formatter groups keyed by language family
export const FORMATTER_LANGUAGES = ['python', 'javascript', 'go'] as const;
export type FormatterLanguage = (typeof FORMATTER_LANGUAGES)[number];

/**
 * Default formatter argv prefixes per language family. Each one rewrites the
 * file named by the path appended to it.
 */
export const DEFAULT_FORMATTERS: Record<FormatterLanguage, string[][]> = {
  python: [['black'], ['isort']],
  javascript: [['prettier', '--write']],
  go: [['gofmt', '-w']],
};

/**
 * Directories never walked when enumerating source files.
 */
export const DEFAULT_EXCLUDE_DIRS = [
  '.git',
  '.hg',
  '.svn',
  '.idea',
  '.vscode',
  'node_modules',
  '.venv',
  'venv',
  'dist',
  'build',
  '__pycache__',
  STATE_DIR_NAME,
] as const;

/** Binary detection sample size */
export const BINARY_CHECK_SIZE = 8192;
