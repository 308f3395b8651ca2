/**
 * patchkit public API.
 *
 * @example
 * ```typescript
 * import { PatchSystem, RefactorEngine, loadConfig } from 'patchkit';
 *
 * const config = await loadConfig(root);
 * const system = new PatchSystem({ root, config: config.success ? config.result : undefined });
 * const plan = await new RefactorEngine(root, { patchSystem: system }).renameSymbol('foo', 'bar');
 * if (plan.safety.ok && plan.proposal !== undefined) {
 *   await system.applyPatch(plan.proposal);
 * }
 * ```
 */

export * from './errors/index.js';
export * from './patch/index.js';
export * from './refactor/index.js';
export * from './staging/index.js';
export * from './testing/index.js';
export * from './workspace/index.js';
export * from './runtime/index.js';
export * from './telemetry/index.js';
export {
  ConfigManager,
  ConfigError,
  NodeConfigFileSystem,
  ProcessEnvReader,
  PatchkitConfigSchema,
  getDefaultConfig,
  loadConfig,
  parseConfig,
  readEnvConfig,
} from './config/index.js';
export type {
  ConfigCallbacks,
  ConfigErrorCode,
  ConfigResponse,
  IConfigFileSystem,
  IEnvReader,
  PatchkitConfig,
} from './config/index.js';
