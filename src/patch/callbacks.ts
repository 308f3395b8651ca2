/**
 * Callback interface for patch engine events.
 * The library never writes to the console; hosts observe it through these.
 */

import type { ApplyResult, BackupResult, RollbackResult } from './types.js';

/**
 * Callbacks for patch engine events. All are optional.
 */
export interface PatchEngineCallbacks {
  // ─── Lifecycle ───────────────────────────────────────────────────────
  /** Called after a snapshot is written (including partially failed ones) */
  onBackupCreated?: (result: BackupResult) => void;
  /** Called after every applyPatch, successful or not */
  onApplied?: (result: ApplyResult) => void;
  /** Called after a rollback attempt */
  onRolledBack?: (backupId: string, result: RollbackResult) => void;
  /** Called when a formatter exits non-zero or cannot start */
  onFormatterFailed?: (path: string, command: string, message: string) => void;

  // ─── Debug/Logging ───────────────────────────────────────────────────
  /** Debug-level logging */
  onDebug?: (message: string, data?: unknown) => void;
  /** Trace-level logging (verbose) */
  onTrace?: (message: string, data?: unknown) => void;
}
