/**
 * Best-effort formatter runs after an apply.
 * Each configured argv is spawned with the absolute file path appended;
 * failures are reported and never abort the apply.
 */

import * as path from 'node:path';

import type { FormatterLanguage } from '../config/constants.js';
import type { FormattersConfig } from '../config/schema.js';
import { spawnProcess, type SpawnFn } from '../runtime/subprocess.js';
import type { PatchEngineCallbacks } from './callbacks.js';

const EXTENSION_LANGUAGES: Readonly<Record<string, FormatterLanguage>> = {
  '.py': 'python',
  '.pyi': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.ts': 'javascript',
  '.tsx': 'javascript',
  '.mts': 'javascript',
  '.cts': 'javascript',
  '.go': 'go',
};

export function languageForPath(filePath: string): FormatterLanguage | undefined {
  return EXTENSION_LANGUAGES[path.extname(filePath).toLowerCase()];
}

export interface FormatterRunOptions {
  root: string;
  formatters: FormattersConfig;
  spawn?: SpawnFn;
  callbacks?: PatchEngineCallbacks;
}

export interface FormatterFailure {
  path: string;
  command: string;
  message: string;
}

/**
 * Run the formatters configured for each file's language, sequentially.
 * @returns The failures, already reported through the callbacks
 */
export async function runFormatters(
  relativePaths: readonly string[],
  options: FormatterRunOptions
): Promise<FormatterFailure[]> {
  const spawn = options.spawn ?? spawnProcess;
  const failures: FormatterFailure[] = [];

  for (const relativePath of relativePaths) {
    const language = languageForPath(relativePath);
    if (language === undefined) {
      continue;
    }

    const absolutePath = path.resolve(options.root, relativePath);
    for (const argv of options.formatters[language]) {
      const command = argv.join(' ');
      const result = await spawn([...argv, absolutePath], { cwd: options.root });
      if (result.exitCode === 0) {
        options.callbacks?.onTrace?.('Formatter succeeded', { command, path: relativePath });
        continue;
      }

      const message = result.stderr !== '' ? result.stderr : `exited with code ${result.exitCode}`;
      failures.push({ path: relativePath, command, message });
      options.callbacks?.onDebug?.(`Formatter ${command} failed on ${relativePath}`, { message });
      options.callbacks?.onFormatterFailed?.(relativePath, command, message);
    }
  }

  return failures;
}
