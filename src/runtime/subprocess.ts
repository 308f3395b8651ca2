/**
 * Runtime boundary for subprocess execution.
 *
 * Formatters and the default test runner spawn external commands through this
 * module. Callers accept a `SpawnFn` so tests can inject a fake without
 * touching child_process.
 */

import { spawn as nodeSpawn } from 'node:child_process';

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

/**
 * Options for spawning a subprocess.
 */
export interface SpawnOptions {
  /** Working directory */
  cwd?: string;
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;
  /** Timeout in milliseconds (best-effort) */
  timeoutMs?: number;
  /** Run through the platform shell (needed for command strings like "npm test --silent") */
  shell?: boolean;
}

/**
 * Result of a subprocess execution.
 */
export interface SubprocessResult {
  /** Exit code (0 = success, -1 = failed to start or timed out) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** True when the process was killed by the timeout */
  timedOut?: boolean;
}

/**
 * Signature shared by spawnProcess and injected fakes.
 */
export type SpawnFn = (cmd: string[], options?: SpawnOptions) => Promise<SubprocessResult>;

// -----------------------------------------------------------------------------
// Subprocess Execution
// -----------------------------------------------------------------------------

/**
 * Spawn a subprocess and wait for completion.
 * Never rejects: spawn errors (e.g. ENOENT for a missing binary) resolve with
 * exitCode -1 and the error message on stderr.
 *
 * @param cmd - Command and arguments array
 * @param options - Spawn options
 *
 * @example
 * ```typescript
 * const result = await spawnProcess(['prettier', '--write', 'src/app.ts']);
 * if (result.exitCode !== 0) {
 *   onDebug?.('prettier failed', { stderr: result.stderr });
 * }
 * ```
 */
export function spawnProcess(cmd: string[], options: SpawnOptions = {}): Promise<SubprocessResult> {
  const command = cmd[0];
  if (command === undefined || command === '') {
    return Promise.resolve({
      exitCode: -1,
      stdout: '',
      stderr: 'No command provided',
    });
  }

  const args = cmd.slice(1);

  return new Promise((resolve) => {
    let settled = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const finalize = (result: SubprocessResult): void => {
      if (settled) return;
      settled = true;
      if (timeoutId) clearTimeout(timeoutId);
      resolve(result);
    };

    const proc = nodeSpawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : undefined,
      shell: options.shell ?? false,
    });

    let stdout = '';
    let stderr = '';

    proc.stdout.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    if (typeof options.timeoutMs === 'number' && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        try {
          proc.kill();
        } finally {
          finalize({
            exitCode: -1,
            stdout: stdout.trim(),
            stderr: 'Command timed out',
            timedOut: true,
          });
        }
      }, options.timeoutMs);
    }

    proc.on('error', (error) => {
      finalize({
        exitCode: -1,
        stdout: '',
        stderr: error.message,
      });
    });

    proc.on('close', (code) => {
      finalize({
        exitCode: code ?? -1,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
      });
    });
  });
}

