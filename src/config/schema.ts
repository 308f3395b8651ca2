/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  DEFAULT_SAFETY_MAX_FILES,
  DEFAULT_SAFETY_MAX_LINES,
  DEFAULT_CREATE_BACKUPS,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_CONTEXT_LINES,
  DEFAULT_REFACTOR_MAX_FILES,
  DEFAULT_TEST_TIMEOUT_MS,
  DEFAULT_FORMATTERS,
  TEST_FRAMEWORKS,
} from './constants.js';

// -----------------------------------------------------------------------------
// Section Schemas
// -----------------------------------------------------------------------------

/**
 * Safety configuration: scoring thresholds, backups and the apply lock.
 */
export const SafetyConfigSchema = z.object({
  maxFiles: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SAFETY_MAX_FILES)
    .describe('File count at which the file factor of the safety score reaches zero'),
  maxLines: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_SAFETY_MAX_LINES)
    .describe('Changed line count at which the line factor reaches zero'),
  createBackups: z
    .boolean()
    .default(DEFAULT_CREATE_BACKUPS)
    .describe('Snapshot affected files before every apply'),
  lockStaleMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_LOCK_STALE_MS)
    .describe('Age after which an apply lock is considered abandoned'),
});

export type SafetyConfig = z.infer<typeof SafetyConfigSchema>;

/**
 * Diff rendering configuration.
 */
export const DiffConfigSchema = z.object({
  contextLines: z.number().int().min(0).default(DEFAULT_CONTEXT_LINES),
});

export type DiffConfig = z.infer<typeof DiffConfigSchema>;

/**
 * Refactoring configuration.
 */
export const RefactorConfigSchema = z.object({
  maxFiles: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_REFACTOR_MAX_FILES)
    .describe('Maximum number of files a rename may touch'),
});

export type RefactorConfig = z.infer<typeof RefactorConfigSchema>;

/**
 * Formatter commands per language family, as argv arrays.
 * The absolute file path is appended to each one.
 */
const FormatterArgvSchema = z.array(z.string().min(1)).min(1);

export const FormattersConfigSchema = z.object({
  python: z
    .array(FormatterArgvSchema)
    .default(() => DEFAULT_FORMATTERS.python.map((argv) => [...argv])),
  javascript: z
    .array(FormatterArgvSchema)
    .default(() => DEFAULT_FORMATTERS.javascript.map((argv) => [...argv])),
  go: z.array(FormatterArgvSchema).default(() => DEFAULT_FORMATTERS.go.map((argv) => [...argv])),
});

export type FormattersConfig = z.infer<typeof FormattersConfigSchema>;

/**
 * Test runner configuration.
 */
export const TestingConfigSchema = z.object({
  command: z.string().optional().describe('Override the detected test command'),
  framework: z.enum(TEST_FRAMEWORKS).optional().describe('Override framework detection'),
  timeoutMs: z.number().int().positive().default(DEFAULT_TEST_TIMEOUT_MS),
});

export type TestingConfig = z.infer<typeof TestingConfigSchema>;

/**
 * Telemetry configuration.
 */
export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(false).describe('Export OpenTelemetry spans'),
  otlpEndpoint: z.url().optional().describe('OTLP HTTP endpoint for trace export'),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

// -----------------------------------------------------------------------------
// Root Schema
// -----------------------------------------------------------------------------

/**
 * Root configuration schema.
 */
export const PatchkitConfigSchema = z.object({
  safety: SafetyConfigSchema.default(() => SafetyConfigSchema.parse({})).describe(
    'Safety scoring, backup and lock configuration'
  ),
  diff: DiffConfigSchema.default(() => DiffConfigSchema.parse({})).describe('Diff rendering'),
  refactor: RefactorConfigSchema.default(() => RefactorConfigSchema.parse({})).describe(
    'Refactoring limits'
  ),
  formatters: FormattersConfigSchema.default(() => FormattersConfigSchema.parse({})).describe(
    'Post-write formatters'
  ),
  testing: TestingConfigSchema.default(() => TestingConfigSchema.parse({})).describe(
    'Test runner used to validate refactors'
  ),
  telemetry: TelemetryConfigSchema.default(() => TelemetryConfigSchema.parse({})).describe(
    'OpenTelemetry export'
  ),
});

export type PatchkitConfig = z.infer<typeof PatchkitConfigSchema>;

/**
 * Get the default configuration with all schema defaults applied.
 */
export function getDefaultConfig(): PatchkitConfig {
  return PatchkitConfigSchema.parse({});
}

/**
 * Parse and validate a configuration object.
 */
export function parseConfig(input: unknown): z.ZodSafeParseResult<PatchkitConfig> {
  return PatchkitConfigSchema.safeParse(input);
}
