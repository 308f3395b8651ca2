/**
 * Apply a refactor plan, run the tests, and roll back when any fail.
 */

import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import type { PatchSystem } from '../patch/system.js';
import type { SpawnFn } from '../runtime/subprocess.js';
import {
  ATTR_PATCHKIT_BACKUP_ID,
  ATTR_PATCHKIT_ROOT,
  ATTR_PATCHKIT_TESTS_FAILED,
  ATTR_PATCHKIT_TESTS_PASSED,
} from '../telemetry/conventions.js';
import { withPatchSpan } from '../telemetry/spans.js';
import { runTests, type TestReport } from '../testing/runner.js';
import type { RefactorPlan, TestOutcome, TestRunnerFn, ValidateOptions, ValidateResult } from './types.js';

/**
 * Reduce a report to the loop's counts. A run that exits non-zero without
 * reporting a failed test (collection error, timeout, missing binary) counts
 * as one failure.
 */
export function toTestOutcome(report: TestReport): TestOutcome {
  const failed = report.failed === 0 && report.exitCode !== 0 ? 1 : report.failed;
  return { failed, passed: report.passed };
}

/**
 * The project's own test command, as configured or detected.
 */
export function createDefaultTestRunner(
  patchSystem: PatchSystem,
  options: { spawn?: SpawnFn; callbacks?: PatchEngineCallbacks } = {}
): TestRunnerFn {
  const testing = patchSystem.config.testing;
  return async () =>
    toTestOutcome(
      await runTests({
        root: patchSystem.root,
        command: testing.command,
        framework: testing.framework,
        timeoutMs: testing.timeoutMs,
        spawn: options.spawn,
        callbacks: options.callbacks,
      })
    );
}

export async function applyAndValidate(
  patchSystem: PatchSystem,
  plan: RefactorPlan,
  options: ValidateOptions & { callbacks?: PatchEngineCallbacks } = {}
): Promise<ValidateResult> {
  const proposal = plan.proposal;
  if (proposal === undefined || Object.keys(plan.changes).length === 0) {
    return { applied: false, backupId: null, testResult: null };
  }

  return withPatchSpan('validate', { [ATTR_PATCHKIT_ROOT]: patchSystem.root }, async (span) => {
    // Rollback needs a snapshot whatever safety.createBackups says
    const applied = await patchSystem.applyPatch(proposal, { unsafe: true, createBackup: true });
    const backupId = applied.backupId;
    if (backupId !== null) {
      span.setAttribute(ATTR_PATCHKIT_BACKUP_ID, backupId);
    }
    if (!applied.success) {
      return { applied: false, backupId, testResult: null };
    }
    if (options.runTests === false) {
      return { applied: true, backupId, testResult: null };
    }

    const runner =
      options.testRunner ?? createDefaultTestRunner(patchSystem, { callbacks: options.callbacks });
    const testResult = await runner();
    span.setAttributes({
      [ATTR_PATCHKIT_TESTS_FAILED]: testResult.failed,
      [ATTR_PATCHKIT_TESTS_PASSED]: testResult.passed,
    });

    if (testResult.failed > 0) {
      if (backupId === null) {
        options.callbacks?.onDebug?.('Tests failed but no backup exists to restore', testResult);
      } else {
        const restore = await patchSystem.rollback(backupId);
        if (!restore.success) {
          options.callbacks?.onDebug?.(`Rollback of ${backupId} incomplete`, restore);
        }
      }
      return { applied: false, backupId, testResult };
    }
    return { applied: true, backupId, testResult };
  });
}
