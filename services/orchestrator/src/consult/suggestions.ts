/**
 * Answer post-processing for the consult response
 */

import type { EvidenceItem, EvidencePreview } from '@medrag/shared-types';
import { previewContent } from '../retrieval/evidence.js';

const MAX_SUGGESTIONS = 5;
const SOURCE_PREVIEW_LENGTH = 200;

const LIST_ITEM = /^[0-9\-•]/;
const LIST_PREFIX = /^[0-9.\-•]+/;

/**
 * Structured advice lines: those starting with a digit, "-" or "•",
 * with the list prefix removed. At most five.
 */
export function extractSuggestions(answer: string): string[] {
  const suggestions: string[] = [];

  for (const rawLine of answer.split('\n')) {
    const line = rawLine.trim();
    if (!LIST_ITEM.test(line)) continue;

    const suggestion = line.replace(LIST_PREFIX, '').trim();
    if (suggestion) {
      suggestions.push(suggestion);
    }
  }

  return suggestions.slice(0, MAX_SUGGESTIONS);
}

export function toEvidencePreview(item: EvidenceItem): EvidencePreview {
  return {
    origin: item.origin,
    content: previewContent(item.content, SOURCE_PREVIEW_LENGTH),
    score: item.score,
    metadata: { ...item.metadata },
  };
}
