/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config paths with type coercion.
 */

import { TEST_FRAMEWORKS, type TestFramework } from './constants.js';
import type { PatchkitConfig } from './schema.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a boolean environment variable with coercion.
   * Recognizes 'true', '1', 'yes' as true; 'false', '0', 'no' as false.
   */
  getBoolean(name: string): boolean | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
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
}

/**
 * Validator function type for env values.
 */
type EnvValidator = (value: string) => boolean;

/**
 * Environment variable to config path mappings.
 */
interface EnvMapping {
  envVar: string;
  path: [keyof PatchkitConfig, string];
  type: 'string' | 'boolean' | 'number';
  /** Optional validator - if provided and returns false, the value is dropped */
  validate?: EnvValidator;
}

/**
 * Positive integer validator.
 * Validates raw string value before number coercion.
 */
function isPositiveInteger(value: string): boolean {
  const num = Number(value);
  return !Number.isNaN(num) && Number.isInteger(num) && num > 0;
}

function isTestFramework(value: string): value is TestFramework {
  return TEST_FRAMEWORKS.some((framework) => framework === value);
}

/**
 * Static environment variable mappings.
 * Invalid values are silently dropped (fall back to file config or defaults).
 */
const ENV_MAPPINGS: EnvMapping[] = [
  {
    envVar: 'PATCHKIT_SAFETY_MAX_FILES',
    path: ['safety', 'maxFiles'],
    type: 'number',
    validate: isPositiveInteger,
  },
  {
    envVar: 'PATCHKIT_SAFETY_MAX_LINES',
    path: ['safety', 'maxLines'],
    type: 'number',
    validate: isPositiveInteger,
  },
  { envVar: 'PATCHKIT_CREATE_BACKUPS', path: ['safety', 'createBackups'], type: 'boolean' },
  {
    envVar: 'PATCHKIT_REFACTOR_MAX_FILES',
    path: ['refactor', 'maxFiles'],
    type: 'number',
    validate: isPositiveInteger,
  },
  { envVar: 'PATCHKIT_TEST_COMMAND', path: ['testing', 'command'], type: 'string' },
  {
    envVar: 'PATCHKIT_TEST_FRAMEWORK',
    path: ['testing', 'framework'],
    type: 'string',
    validate: isTestFramework,
  },
  { envVar: 'PATCHKIT_TELEMETRY_ENABLED', path: ['telemetry', 'enabled'], type: 'boolean' },
  { envVar: 'OTEL_EXPORTER_OTLP_ENDPOINT', path: ['telemetry', 'otlpEndpoint'], type: 'string' },
];

/**
 * Set a value at a two-level path, creating the section object as needed.
 */
function setSectionValue(
  obj: Record<string, Record<string, unknown>>,
  [section, key]: [string, string],
  value: unknown
): void {
  const current = obj[section] ?? {};
  current[key] = value;
  obj[section] = current;
}

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present in environment variables.
 */
export function readEnvConfig(
  envReader: IEnvReader = new ProcessEnvReader()
): Record<string, Record<string, unknown>> {
  const config: Record<string, Record<string, unknown>> = {};

  for (const mapping of ENV_MAPPINGS) {
    const rawValue = envReader.get(mapping.envVar);
    if (rawValue === undefined || rawValue === '') {
      continue;
    }

    if (mapping.validate !== undefined && !mapping.validate(rawValue)) {
      continue;
    }

    let value: string | boolean | number | undefined;
    switch (mapping.type) {
      case 'boolean':
        value = envReader.getBoolean(mapping.envVar);
        break;
      case 'number':
        value = envReader.getNumber(mapping.envVar);
        break;
      default:
        value = rawValue;
    }

    if (value !== undefined) {
      setSectionValue(config, mapping.path, value);
    }
  }

  return config;
}
