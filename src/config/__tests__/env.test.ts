/**
 * Tests for environment variable parsing.
 */

import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';

import { ProcessEnvReader, readEnvConfig, type IEnvReader } from '../env.js';

// Mock environment reader for testing
class MockEnvReader implements IEnvReader {
  private env: Map<string, string> = new Map();

  get(name: string): string | undefined {
    return this.env.get(name);
  }

  getBoolean(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const lower = value.toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
    return undefined;
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }

  set(name: string, value: string): void {
    this.env.set(name, value);
  }
}

describe('ProcessEnvReader', () => {
  const originalEnv = process.env;
  let reader: ProcessEnvReader;

  beforeEach(() => {
    process.env = { ...originalEnv };
    reader = new ProcessEnvReader();
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('reads strings', () => {
    process.env.PATCHKIT_TEST_COMMAND = 'make test';
    expect(reader.get('PATCHKIT_TEST_COMMAND')).toBe('make test');
    expect(reader.get('PATCHKIT_UNSET_FOR_TEST')).toBeUndefined();
  });

  it('coerces booleans', () => {
    process.env.PATCHKIT_CREATE_BACKUPS = 'YES';
    expect(reader.getBoolean('PATCHKIT_CREATE_BACKUPS')).toBe(true);
    process.env.PATCHKIT_CREATE_BACKUPS = '0';
    expect(reader.getBoolean('PATCHKIT_CREATE_BACKUPS')).toBe(false);
    process.env.PATCHKIT_CREATE_BACKUPS = 'maybe';
    expect(reader.getBoolean('PATCHKIT_CREATE_BACKUPS')).toBeUndefined();
  });

  it('coerces numbers', () => {
    process.env.PATCHKIT_SAFETY_MAX_FILES = '12';
    expect(reader.getNumber('PATCHKIT_SAFETY_MAX_FILES')).toBe(12);
    process.env.PATCHKIT_SAFETY_MAX_FILES = 'twelve';
    expect(reader.getNumber('PATCHKIT_SAFETY_MAX_FILES')).toBeUndefined();
  });
});

describe('readEnvConfig', () => {
  let env: MockEnvReader;

  beforeEach(() => {
    env = new MockEnvReader();
  });

  it('returns an empty object when nothing is set', () => {
    expect(readEnvConfig(env)).toEqual({});
  });

  it('maps variables onto config sections', () => {
    env.set('PATCHKIT_SAFETY_MAX_FILES', '10');
    env.set('PATCHKIT_SAFETY_MAX_LINES', '500');
    env.set('PATCHKIT_CREATE_BACKUPS', 'false');
    env.set('PATCHKIT_REFACTOR_MAX_FILES', '25');
    env.set('PATCHKIT_TEST_COMMAND', 'pytest -x');
    env.set('PATCHKIT_TEST_FRAMEWORK', 'gotest');
    env.set('PATCHKIT_TELEMETRY_ENABLED', 'true');
    env.set('OTEL_EXPORTER_OTLP_ENDPOINT', 'http://localhost:4318/v1/traces');

    expect(readEnvConfig(env)).toEqual({
      safety: { maxFiles: 10, maxLines: 500, createBackups: false },
      refactor: { maxFiles: 25 },
      testing: { command: 'pytest -x', framework: 'gotest' },
      telemetry: { enabled: true, otlpEndpoint: 'http://localhost:4318/v1/traces' },
    });
  });

  it('drops invalid values', () => {
    env.set('PATCHKIT_SAFETY_MAX_FILES', '0');
    env.set('PATCHKIT_SAFETY_MAX_LINES', '2.5');
    env.set('PATCHKIT_REFACTOR_MAX_FILES', 'lots');
    env.set('PATCHKIT_TEST_FRAMEWORK', 'mocha');
    env.set('PATCHKIT_CREATE_BACKUPS', 'perhaps');

    expect(readEnvConfig(env)).toEqual({});
  });

  it('ignores empty strings', () => {
    env.set('PATCHKIT_TEST_COMMAND', '');
    expect(readEnvConfig(env)).toEqual({});
  });
});
