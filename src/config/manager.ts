/**
 * Configuration manager for loading, validating, and saving config.
 * Implements hierarchical config merging: defaults < project < env
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml, YAMLParseError } from 'yaml';
import type { ZodError } from 'zod';

import { CONFIG_FILE_NAME, STATE_DIR_NAME } from './constants.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import { PatchkitConfigSchema, getDefaultConfig, type PatchkitConfig } from './schema.js';
import type {
  ConfigCallbacks,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigValidationError,
  IConfigFileSystem,
} from './types.js';
import { ConfigError, errorResponse, successResponse } from './types.js';

// -----------------------------------------------------------------------------
// Deep Merge Utility
// -----------------------------------------------------------------------------

/**
 * Check if a value is a plain object (not null, array, or other special types).
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Deep merge two objects, with source values overriding target values.
 * Arrays are replaced (not concatenated).
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// -----------------------------------------------------------------------------
// Node.js File System Implementation
// -----------------------------------------------------------------------------

/**
 * Default file system implementation using Node.js fs module.
 */
export class NodeConfigFileSystem implements IConfigFileSystem {
  async readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.writeFile(filePath, content, 'utf-8');
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

// -----------------------------------------------------------------------------
// Config Manager
// -----------------------------------------------------------------------------

/**
 * ConfigManager handles loading, validating, and saving configuration.
 *
 * Config hierarchy (highest to lowest priority):
 * 1. Environment variables (PATCHKIT_*)
 * 2. Project config (<root>/.term-coder/config.yaml)
 * 3. Schema defaults
 */
export class ConfigManager {
  private readonly fileSystem: IConfigFileSystem;
  private readonly envReader: IEnvReader;
  private readonly callbacks?: ConfigCallbacks;

  constructor(options: ConfigManagerOptions = {}) {
    this.fileSystem = options.fileSystem ?? new NodeConfigFileSystem();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks;
  }

  getDefaults(): PatchkitConfig {
    return getDefaultConfig();
  }

  /**
   * Get the project config file path.
   */
  getProjectConfigPath(root: string): string {
    return path.join(root, STATE_DIR_NAME, CONFIG_FILE_NAME);
  }

  /**
   * Load configuration from a YAML file.
   * @returns Parsed object, or undefined if the file doesn't exist or is empty
   */
  private async loadConfigFile(filePath: string): Promise<Record<string, unknown> | undefined> {
    if (!(await this.fileSystem.exists(filePath))) {
      return undefined;
    }

    let parsed: unknown;
    try {
      const content = await this.fileSystem.readFile(filePath);
      parsed = parseYaml(content);
    } catch (error) {
      if (error instanceof YAMLParseError) {
        throw new ConfigError(`Invalid YAML in config file: ${filePath}`, 'PARSE_ERROR', filePath);
      }
      throw error;
    }

    if (parsed === null || parsed === undefined) {
      return undefined;
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigError(
        `Config file must contain a mapping at the top level: ${filePath}`,
        'PARSE_ERROR',
        filePath
      );
    }
    return parsed;
  }

  /**
   * Load and merge configuration from all sources.
   *
   * @param root - Project root containing the .term-coder directory
   */
  async load(root: string): Promise<ConfigResponse<PatchkitConfig>> {
    try {
      let merged: Record<string, unknown> = { ...this.getDefaults() };
      this.callbacks?.onConfigLoad?.(this.getDefaults(), 'defaults');

      const projectConfig = await this.loadConfigFile(this.getProjectConfigPath(root));
      if (projectConfig) {
        merged = deepMerge(merged, projectConfig);
      }

      const envConfig = readEnvConfig(this.envReader);
      if (Object.keys(envConfig).length > 0) {
        merged = deepMerge(merged, envConfig);
      }

      return this.validate(merged, 'Configuration loaded successfully');
    } catch (error) {
      if (error instanceof ConfigError) {
        return errorResponse(error.code, error.message, error.details);
      }
      const message = error instanceof Error ? error.message : 'Unknown error loading config';
      return errorResponse('FILE_READ_ERROR', message);
    }
  }

  /**
   * Validate a configuration object.
   */
  validate(
    config: unknown,
    successMessage = 'Configuration is valid'
  ): ConfigResponse<PatchkitConfig> {
    const validation = PatchkitConfigSchema.safeParse(config);

    if (!validation.success) {
      const errors = this.formatZodErrors(validation.error);
      this.callbacks?.onValidationError?.(errors);
      return errorResponse(
        'VALIDATION_FAILED',
        `Config validation failed: ${errors[0]?.path ?? ''} ${errors[0]?.message ?? 'Unknown error'}`.trim(),
        errors
      );
    }

    this.callbacks?.onConfigLoad?.(validation.data, 'merged');
    return successResponse(validation.data, successMessage);
  }

  /**
   * Save configuration to the project config file as YAML.
   */
  async save(config: PatchkitConfig, root: string): Promise<ConfigResponse<string>> {
    const validation = PatchkitConfigSchema.safeParse(config);
    if (!validation.success) {
      const errors = this.formatZodErrors(validation.error);
      return errorResponse('VALIDATION_FAILED', 'Refusing to save invalid configuration', errors);
    }

    const targetPath = this.getProjectConfigPath(root);
    try {
      await this.fileSystem.mkdir(path.dirname(targetPath));
      await this.fileSystem.writeFile(targetPath, stringifyYaml(validation.data));
      this.callbacks?.onConfigSave?.(validation.data, targetPath);
      return successResponse(targetPath, `Configuration saved to ${targetPath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error saving config';
      return errorResponse('FILE_WRITE_ERROR', message);
    }
  }

  private formatZodErrors(error: ZodError): ConfigValidationError[] {
    return error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
      code: issue.code,
    }));
  }
}

/**
 * Convenience function to load config with default options.
 */
export async function loadConfig(root: string): Promise<ConfigResponse<PatchkitConfig>> {
  const manager = new ConfigManager();
  return manager.load(root);
}
