/**
 * Evidence Fusion
 * Merges path outputs in priority order and drops duplicate content
 */

import { createHash } from 'crypto';
import type { EvidenceItem } from '@medrag/shared-types';

/**
 * SHA-256 of the full content text, hex encoded
 */
export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Concatenate in argument order (vector, lexical, rule) keeping the first
 * occurrence of each distinct content
 */
export function fuseEvidence(...lists: ReadonlyArray<readonly EvidenceItem[]>): EvidenceItem[] {
  const seen = new Set<string>();
  const fused: EvidenceItem[] = [];

  for (const list of lists) {
    for (const item of list) {
      const key = contentHash(item.content);
      if (seen.has(key)) continue;
      seen.add(key);
      fused.push(item);
    }
  }

  return fused;
}
