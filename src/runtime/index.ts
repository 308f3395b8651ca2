/**
 * Runtime boundary module.
 *
 * Subprocess spawning lives behind this module so engine components take an
 * injectable SpawnFn and tests never start real processes.
 */

export { spawnProcess } from './subprocess.js';
export type { SpawnFn, SpawnOptions, SubprocessResult } from './subprocess.js';
