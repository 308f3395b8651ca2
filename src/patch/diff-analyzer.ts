/**
 * Parses unified diff text into affected files and line counts.
 */

import type { DiffAnalysis } from './types.js';

const NEW_FILE_HEADER = /^\+\+\+ b\/(.+)$/;

/**
 * Analyze unified diff text.
 *
 * `+++ b/<path>` headers set the current file. Header and hunk marker lines
 * never count; other `+`/`-` lines count once a file header has been seen.
 */
export function analyzeDiff(diffText: string): DiffAnalysis {
  const affectedFiles: string[] = [];
  const seen = new Set<string>();
  let linesAdded = 0;
  let linesRemoved = 0;
  let currentFile: string | null = null;

  for (const line of diffText.split(/\r?\n/)) {
    const header = NEW_FILE_HEADER.exec(line);
    if (header?.[1] !== undefined) {
      currentFile = header[1];
      if (!seen.has(currentFile)) {
        seen.add(currentFile);
        affectedFiles.push(currentFile);
      }
      continue;
    }

    if (line.startsWith('+++') || line.startsWith('---') || line.startsWith('@@')) {
      continue;
    }
    if (currentFile === null) {
      continue;
    }

    if (line.startsWith('+')) {
      linesAdded++;
    } else if (line.startsWith('-')) {
      linesRemoved++;
    }
  }

  return {
    affectedFiles,
    impact: {
      filesChanged: affectedFiles.length,
      linesAdded,
      linesRemoved,
    },
  };
}
