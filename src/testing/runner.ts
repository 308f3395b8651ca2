/**
 * Default test runner: detects the project's framework, runs its test
 * command and parses the counts out of the output.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import fg from 'fast-glob';

import {
  DEFAULT_TEST_TIMEOUT_MS,
  LAST_TEST_FILE_NAME,
  STATE_DIR_NAME,
  type TestFramework,
} from '../config/constants.js';
import { mapSystemErrorToPatchError } from '../errors/index.js';
import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import { spawnProcess, type SpawnFn } from '../runtime/subprocess.js';
import { pathExists } from '../workspace/paths.js';

export interface TestCaseFailure {
  /** e.g. tests/test_file.py::TestClass::test_method */
  testId: string;
  message: string;
}

export interface TestCounts {
  passed: number;
  failed: number;
  skipped: number;
  failures: TestCaseFailure[];
}

export interface TestReport extends TestCounts {
  framework: TestFramework;
  command: string;
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunTestsOptions {
  root: string;
  /** Overrides the framework's default command */
  command?: string;
  /** Overrides detection */
  framework?: TestFramework;
  spawn?: SpawnFn;
  timeoutMs?: number;
  callbacks?: PatchEngineCallbacks;
}

const DEFAULT_COMMANDS: Record<TestFramework, string> = {
  pytest: 'pytest -q',
  jest: 'npm test --silent',
  gotest: 'go test ./...',
};

export function defaultCommandFor(framework: TestFramework): string {
  return DEFAULT_COMMANDS[framework];
}

/**
 * Guess the test framework from marker files at the root. Defaults to pytest.
 */
export async function detectFramework(root: string): Promise<TestFramework> {
  const has = (name: string): Promise<boolean> => pathExists(path.join(root, name));

  if ((await has('pyproject.toml')) || (await has('pytest.ini'))) {
    return 'pytest';
  }
  const pythonTests = await fg('tests/test_*.py', { cwd: root, onlyFiles: true });
  if (pythonTests.length > 0) {
    return 'pytest';
  }
  if ((await has('package.json')) || (await has('jest.config.js'))) {
    return 'jest';
  }
  if (await has('go.mod')) {
    return 'gotest';
  }
  return 'pytest';
}

function emptyCounts(): TestCounts {
  return { passed: 0, failed: 0, skipped: 0, failures: [] };
}

/**
 * Apply every `N failed|passed|skipped` pair in `text`; later pairs win.
 */
function applySummaryCounts(counts: TestCounts, text: string): void {
  for (const match of text.matchAll(/(\d+)\s+(failed|passed|skipped)/g)) {
    const value = Number(match[1]);
    switch (match[2]) {
      case 'failed':
        counts.failed = value;
        break;
      case 'passed':
        counts.passed = value;
        break;
      case 'skipped':
        counts.skipped = value;
        break;
    }
  }
}

export function parsePytestOutput(output: string): TestCounts {
  const counts = emptyCounts();
  applySummaryCounts(counts, output);
  for (const line of output.split('\n')) {
    const match = /^FAILED\s+(.+?)\s+-\s+(.*)$/.exec(line.trim());
    if (match?.[1] !== undefined) {
      counts.failures.push({ testId: match[1], message: match[2] ?? '' });
    }
  }
  return counts;
}

export function parseJestOutput(output: string): TestCounts {
  const counts = emptyCounts();
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('Tests:')) {
      applySummaryCounts(counts, trimmed);
    } else if (trimmed.startsWith('FAIL ')) {
      counts.failures.push({ testId: trimmed.slice(5).trim(), message: 'Failed suite' });
    }
  }
  return counts;
}

export function parseGoTestOutput(output: string): TestCounts {
  const counts = emptyCounts();
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (trimmed.startsWith('--- FAIL:')) {
      counts.failed++;
      const testId = trimmed.split(/\s+/)[2];
      if (testId !== undefined) {
        counts.failures.push({ testId, message: '' });
      }
    } else if (trimmed.startsWith('--- PASS:')) {
      counts.passed++;
    } else if (trimmed.startsWith('--- SKIP:')) {
      counts.skipped++;
    }
  }
  return counts;
}

export function parseTestOutput(framework: TestFramework, stdout: string, stderr: string): TestCounts {
  const output = `${stdout}\n${stderr}`;
  switch (framework) {
    case 'pytest':
      return parsePytestOutput(output);
    case 'jest':
      return parseJestOutput(output);
    case 'gotest':
      return parseGoTestOutput(output);
  }
}

async function writeLastTest(root: string, report: TestReport): Promise<void> {
  const target = path.join(root, STATE_DIR_NAME, LAST_TEST_FILE_NAME);
  const record = {
    framework: report.framework,
    command: report.command,
    passed: report.passed,
    failed: report.failed,
    skipped: report.skipped,
    failures: report.failures.map((f) => ({ test_id: f.testId, message: f.message })),
  };
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, JSON.stringify(record, null, 2), 'utf-8');
}

/**
 * Run the project's tests through the platform shell and record the report
 * in `.term-coder/last_test.json`.
 */
export async function runTests(options: RunTestsOptions): Promise<TestReport> {
  const root = path.resolve(options.root);
  const framework = options.framework ?? (await detectFramework(root));
  const command = options.command ?? defaultCommandFor(framework);
  const spawn = options.spawn ?? spawnProcess;

  options.callbacks?.onDebug?.('Running tests', { framework, command });
  const result = await spawn([command], {
    cwd: root,
    shell: true,
    timeoutMs: options.timeoutMs ?? DEFAULT_TEST_TIMEOUT_MS,
  });

  const report: TestReport = {
    framework,
    command,
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut === true,
    ...parseTestOutput(framework, result.stdout, result.stderr),
  };

  try {
    await writeLastTest(root, report);
  } catch (error) {
    options.callbacks?.onDebug?.('Could not record last test report', {
      message: mapSystemErrorToPatchError(error).message,
    });
  }

  options.callbacks?.onTrace?.('Tests finished', {
    exitCode: report.exitCode,
    passed: report.passed,
    failed: report.failed,
    skipped: report.skipped,
  });
  return report;
}
