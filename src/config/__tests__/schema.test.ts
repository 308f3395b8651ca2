/**
 * Tests for Zod schema validation.
 */

import { describe, expect, it } from '@jest/globals';

import {
  DiffConfigSchema,
  FormattersConfigSchema,
  RefactorConfigSchema,
  SafetyConfigSchema,
  TelemetryConfigSchema,
  TestingConfigSchema,
  getDefaultConfig,
  parseConfig,
} from '../schema.js';
import {
  DEFAULT_CONTEXT_LINES,
  DEFAULT_LOCK_STALE_MS,
  DEFAULT_REFACTOR_MAX_FILES,
  DEFAULT_SAFETY_MAX_FILES,
  DEFAULT_SAFETY_MAX_LINES,
  DEFAULT_TEST_TIMEOUT_MS,
} from '../constants.js';

describe('SafetyConfigSchema', () => {
  it('applies defaults', () => {
    expect(SafetyConfigSchema.parse({})).toEqual({
      maxFiles: DEFAULT_SAFETY_MAX_FILES,
      maxLines: DEFAULT_SAFETY_MAX_LINES,
      createBackups: true,
      lockStaleMs: DEFAULT_LOCK_STALE_MS,
    });
  });

  it('rejects non-positive thresholds', () => {
    expect(SafetyConfigSchema.safeParse({ maxFiles: 0 }).success).toBe(false);
    expect(SafetyConfigSchema.safeParse({ maxLines: -5 }).success).toBe(false);
    expect(SafetyConfigSchema.safeParse({ maxFiles: 1.5 }).success).toBe(false);
  });
});

describe('DiffConfigSchema', () => {
  it('allows zero context lines', () => {
    expect(DiffConfigSchema.parse({ contextLines: 0 })).toEqual({ contextLines: 0 });
    expect(DiffConfigSchema.parse({})).toEqual({ contextLines: DEFAULT_CONTEXT_LINES });
    expect(DiffConfigSchema.safeParse({ contextLines: -1 }).success).toBe(false);
  });
});

describe('RefactorConfigSchema', () => {
  it('defaults the file limit', () => {
    expect(RefactorConfigSchema.parse({})).toEqual({ maxFiles: DEFAULT_REFACTOR_MAX_FILES });
  });
});

describe('FormattersConfigSchema', () => {
  it('defaults each language family', () => {
    expect(FormattersConfigSchema.parse({})).toEqual({
      python: [['black'], ['isort']],
      javascript: [['prettier', '--write']],
      go: [['gofmt', '-w']],
    });
  });

  it('returns fresh default arrays', () => {
    const first = FormattersConfigSchema.parse({});
    first.python.push(['ruff', 'format']);
    first.javascript[0]?.push('--check');

    const second = FormattersConfigSchema.parse({});
    expect(second.python).toEqual([['black'], ['isort']]);
    expect(second.javascript).toEqual([['prettier', '--write']]);
  });

  it('rejects a bare command string and an empty argv', () => {
    expect(FormattersConfigSchema.safeParse({ go: ['gofmt'] }).success).toBe(false);
    expect(FormattersConfigSchema.safeParse({ go: [[]] }).success).toBe(false);
  });

  it('accepts an empty list to disable a family', () => {
    expect(FormattersConfigSchema.parse({ go: [] }).go).toEqual([]);
  });
});

describe('TestingConfigSchema', () => {
  it('leaves command and framework unset by default', () => {
    expect(TestingConfigSchema.parse({})).toEqual({ timeoutMs: DEFAULT_TEST_TIMEOUT_MS });
  });

  it('restricts the framework', () => {
    expect(TestingConfigSchema.safeParse({ framework: 'jest' }).success).toBe(true);
    expect(TestingConfigSchema.safeParse({ framework: 'mocha' }).success).toBe(false);
  });
});

describe('TelemetryConfigSchema', () => {
  it('is disabled by default', () => {
    expect(TelemetryConfigSchema.parse({})).toEqual({ enabled: false });
  });

  it('requires a URL endpoint', () => {
    expect(TelemetryConfigSchema.safeParse({ otlpEndpoint: 'not a url' }).success).toBe(false);
    expect(
      TelemetryConfigSchema.safeParse({ otlpEndpoint: 'http://localhost:4318/v1/traces' }).success
    ).toBe(true);
  });
});

describe('getDefaultConfig', () => {
  it('fills every section', () => {
    const config = getDefaultConfig();

    expect(config.safety.maxFiles).toBe(DEFAULT_SAFETY_MAX_FILES);
    expect(config.diff.contextLines).toBe(DEFAULT_CONTEXT_LINES);
    expect(config.refactor.maxFiles).toBe(DEFAULT_REFACTOR_MAX_FILES);
    expect(config.formatters.javascript).toEqual([['prettier', '--write']]);
    expect(config.testing.timeoutMs).toBe(DEFAULT_TEST_TIMEOUT_MS);
    expect(config.telemetry.enabled).toBe(false);
  });
});

describe('parseConfig', () => {
  it('merges partial sections with defaults', () => {
    const result = parseConfig({ safety: { maxFiles: 5 } });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.safety).toEqual({
        maxFiles: 5,
        maxLines: DEFAULT_SAFETY_MAX_LINES,
        createBackups: true,
        lockStaleMs: DEFAULT_LOCK_STALE_MS,
      });
    }
  });

  it('reports the failing path', () => {
    const result = parseConfig({ refactor: { maxFiles: 'many' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['refactor', 'maxFiles']);
    }
  });
});
