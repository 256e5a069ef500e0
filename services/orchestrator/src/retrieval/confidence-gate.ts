/**
 * Confidence Gate
 * Decides whether internal evidence is strong enough to answer without augmentation
 */

import type { EvidenceItem } from '@medrag/shared-types';

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.5;

export interface ConfidenceDecision {
  needsAugmentation: boolean;
  /** Best non-null score, null when nothing is scored */
  maxScore: number | null;
  threshold: number;
}

export function evaluateConfidence(
  items: readonly EvidenceItem[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): ConfidenceDecision {
  let maxScore: number | null = null;
  for (const item of items) {
    if (item.score === null) continue;
    if (maxScore === null || item.score > maxScore) {
      maxScore = item.score;
    }
  }

  return {
    needsAugmentation: maxScore === null || maxScore < threshold,
    maxScore,
    threshold,
  };
}

export function needsAugmentation(
  items: readonly EvidenceItem[],
  threshold: number = DEFAULT_CONFIDENCE_THRESHOLD
): boolean {
  return evaluateConfidence(items, threshold).needsAugmentation;
}
