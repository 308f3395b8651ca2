/**
 * Single-slot store for the most recent unapplied proposal.
 *
 * The slot lives at <root>/.term-coder/pending_edit.json in snake_case JSON.
 * Every save replaces the whole file through a temporary sibling and a rename.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { PENDING_EDIT_FILE_NAME, STATE_DIR_NAME } from '../config/constants.js';
import { PatchEngineError, errnoCode, mapSystemErrorToPatchError } from '../errors/index.js';
import type { PatchEngineCallbacks } from '../patch/callbacks.js';
import { createProposal, type PatchProposal } from '../patch/types.js';

// -----------------------------------------------------------------------------
// Persisted Shape
// -----------------------------------------------------------------------------

const PersistedProposalSchema = z.object({
  instruction: z.string(),
  diff: z.string(),
  rationale: z.string(),
  affected_files: z.array(z.string()),
  safety_score: z.number().min(0).max(1),
  estimated_impact: z.object({
    files_changed: z.number().int().nonnegative(),
    lines_added: z.number().int().nonnegative(),
    lines_removed: z.number().int().nonnegative(),
  }),
  new_contents: z.record(z.string(), z.string()).optional(),
});

export const PersistedPendingEditSchema = z.object({
  instruction: z.string(),
  proposal: PersistedProposalSchema,
});

export type PersistedPendingEdit = z.infer<typeof PersistedPendingEditSchema>;

export interface PendingEdit {
  instruction: string;
  proposal: PatchProposal;
}

export function toPersisted(edit: PendingEdit): PersistedPendingEdit {
  const { proposal } = edit;
  return {
    instruction: edit.instruction,
    proposal: {
      instruction: proposal.instruction,
      diff: proposal.diff,
      rationale: proposal.rationale,
      affected_files: [...proposal.affectedFiles],
      safety_score: proposal.safetyScore,
      estimated_impact: {
        files_changed: proposal.estimatedImpact.filesChanged,
        lines_added: proposal.estimatedImpact.linesAdded,
        lines_removed: proposal.estimatedImpact.linesRemoved,
      },
      ...(proposal.newContents !== undefined && { new_contents: { ...proposal.newContents } }),
    },
  };
}

export function fromPersisted(persisted: PersistedPendingEdit): PendingEdit {
  const { proposal } = persisted;
  return {
    instruction: persisted.instruction,
    proposal: createProposal({
      instruction: proposal.instruction,
      diff: proposal.diff,
      rationale: proposal.rationale,
      affectedFiles: proposal.affected_files,
      safetyScore: proposal.safety_score,
      estimatedImpact: {
        filesChanged: proposal.estimated_impact.files_changed,
        linesAdded: proposal.estimated_impact.lines_added,
        linesRemoved: proposal.estimated_impact.lines_removed,
      },
      newContents: proposal.new_contents,
    }),
  };
}

// -----------------------------------------------------------------------------
// Store
// -----------------------------------------------------------------------------

export interface PendingEditStoreOptions {
  callbacks?: PatchEngineCallbacks;
}

export class PendingEditStore {
  readonly filePath: string;
  private readonly callbacks?: PatchEngineCallbacks;

  constructor(root: string, options: PendingEditStoreOptions = {}) {
    this.filePath = path.join(path.resolve(root), STATE_DIR_NAME, PENDING_EDIT_FILE_NAME);
    this.callbacks = options.callbacks;
  }

  /**
   * Replace the slot with `edit`.
   * @throws PatchEngineError when the file cannot be written
   */
  async save(edit: PendingEdit): Promise<void> {
    const tempPath = `${this.filePath}.tmp.${process.pid}.${Date.now()}`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, JSON.stringify(toPersisted(edit), null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      const mapped = mapSystemErrorToPatchError(error);
      throw new PatchEngineError(
        `Failed to save pending edit: ${mapped.message}`,
        mapped.code,
        this.filePath,
        error
      );
    }
    this.callbacks?.onTrace?.('Pending edit saved', { path: this.filePath });
  }

  /**
   * The stored edit, or null when the slot is empty or unreadable as an edit.
   */
  async load(): Promise<PendingEdit | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      const mapped = mapSystemErrorToPatchError(error);
      throw new PatchEngineError(mapped.message, mapped.code, this.filePath, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.callbacks?.onDebug?.('Pending edit is not valid JSON', {
        message: error instanceof Error ? error.message : String(error),
      });
      return null;
    }

    const parsed = PersistedPendingEditSchema.safeParse(data);
    if (!parsed.success) {
      this.callbacks?.onDebug?.('Pending edit does not match the expected shape', {
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.map(String).join('.')}: ${issue.message}`
        ),
      });
      return null;
    }
    return fromPersisted(parsed.data);
  }

  /**
   * Empty the slot. An already empty slot is fine.
   */
  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
    this.callbacks?.onTrace?.('Pending edit cleared', { path: this.filePath });
  }
}
