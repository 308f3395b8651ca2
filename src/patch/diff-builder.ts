/**
 * Unified diff rendering from (on-disk content, proposed content) pairs.
 */

import { structuredPatch } from 'diff';
import type { Hunk } from 'diff';

import { DEFAULT_CONTEXT_LINES } from '../config/constants.js';
import { readTextFile, resolveWithinRootSafe } from '../workspace/paths.js';
import type { PatchEngineCallbacks } from './callbacks.js';

/**
 * Render the `@@ -l,s +l,s @@` header for a hunk.
 * Empty ranges start one line earlier, so a file created from nothing reads `-0,0`.
 */
function formatHunkHeader(hunk: Hunk): string {
  const oldStart = hunk.oldLines === 0 ? hunk.oldStart - 1 : hunk.oldStart;
  const newStart = hunk.newLines === 0 ? hunk.newStart - 1 : hunk.newStart;
  return `@@ -${oldStart},${hunk.oldLines} +${newStart},${hunk.newLines} @@`;
}

/**
 * Render one file's unified diff, or '' when the contents are identical.
 */
export function renderFileDiff(
  relativePath: string,
  original: string,
  updated: string,
  contextLines: number = DEFAULT_CONTEXT_LINES
): string {
  if (original === updated) {
    return '';
  }

  const patch = structuredPatch(
    `a/${relativePath}`,
    `b/${relativePath}`,
    original,
    updated,
    undefined,
    undefined,
    { context: contextLines }
  );
  if (patch.hunks.length === 0) {
    return '';
  }

  const lines = [`--- a/${relativePath}`, `+++ b/${relativePath}`];
  for (const hunk of patch.hunks) {
    lines.push(formatHunkHeader(hunk), ...hunk.lines);
  }
  return lines.join('\n');
}

/**
 * Builds unified diffs for a change set against the files under a root.
 */
export class DiffBuilder {
  private readonly root: string;
  private readonly callbacks?: PatchEngineCallbacks;

  constructor(root: string, callbacks?: PatchEngineCallbacks) {
    this.root = root;
    this.callbacks = callbacks;
  }

  /**
   * Render a unified diff for every changed path, in insertion order.
   * Paths outside the root are skipped. Missing, non-regular or binary files
   * are diffed against empty content.
   */
  async build(
    changes: Readonly<Record<string, string>>,
    contextLines: number = DEFAULT_CONTEXT_LINES
  ): Promise<string> {
    const sections: string[] = [];

    for (const [relativePath, updated] of Object.entries(changes)) {
      const absolutePath = await resolveWithinRootSafe(this.root, relativePath);
      if (absolutePath === null) {
        this.callbacks?.onDebug?.('Skipping path outside project root', { path: relativePath });
        continue;
      }

      const original = (await readTextFile(absolutePath)) ?? '';
      const section = renderFileDiff(relativePath, original, updated, contextLines);
      if (section !== '') {
        sections.push(section);
      }
    }

    return sections.join('\n\n');
  }
}
