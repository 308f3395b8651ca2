/**
 * Safety scoring for proposals.
 */

import { DEFAULT_SAFETY_MAX_FILES, DEFAULT_SAFETY_MAX_LINES } from '../config/constants.js';
import { PatchEngineError } from '../errors/index.js';
import type { ImpactAssessment } from './types.js';

export interface SafetyThresholds {
  /** File count at which the file factor reaches zero */
  maxFiles: number;
  /** Changed-line count at which the line factor reaches zero */
  maxLines: number;
}

/** Lowest score any proposal can receive */
export const SAFETY_SCORE_FLOOR = 0.2;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Scores an impact summary into [0.2, 1]; 1 means no change at all.
 * The score falls linearly with file count and with changed lines, each
 * carrying half the weight above the floor.
 */
export class SafetyScorer {
  readonly thresholds: Readonly<SafetyThresholds>;

  constructor(thresholds: Partial<SafetyThresholds> = {}) {
    const maxFiles = thresholds.maxFiles ?? DEFAULT_SAFETY_MAX_FILES;
    const maxLines = thresholds.maxLines ?? DEFAULT_SAFETY_MAX_LINES;

    if (!(maxFiles > 0) || !(maxLines > 0)) {
      throw new PatchEngineError(
        `Safety thresholds must be positive (maxFiles=${maxFiles}, maxLines=${maxLines})`,
        'VALIDATION_ERROR'
      );
    }
    this.thresholds = Object.freeze({ maxFiles, maxLines });
  }

  score(impact: ImpactAssessment): number {
    const { maxFiles, maxLines } = this.thresholds;
    const fileFactor = Math.max(0, 1 - impact.filesChanged / maxFiles);
    const lineFactor = Math.max(0, 1 - (impact.linesAdded + impact.linesRemoved) / maxLines);
    const raw = SAFETY_SCORE_FLOOR + 0.8 * (0.5 * fileFactor + 0.5 * lineFactor);
    return clamp(raw, 0, 1);
  }
}
