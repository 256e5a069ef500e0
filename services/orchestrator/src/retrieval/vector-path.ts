/**
 * Vector Path
 * Semantic nearest-neighbor search over the embedded knowledge base
 */

import type { EvidenceItem } from '@medrag/shared-types';
import { getErrorMessage, withTimeout } from '../utils/errors.js';
import { createLogger, type RetrievalLogger } from '../utils/logger.js';
import { documentToEvidence } from './evidence.js';
import type { EmbeddingProvider, VectorStore } from './types.js';

export interface VectorPathDeps {
  embeddings: EmbeddingProvider;
  store: VectorStore;
  /** Minimum similarity kept (default 0.7) */
  similarityThreshold?: number;
  embeddingTimeoutMs?: number;
  searchTimeoutMs?: number;
  logger?: RetrievalLogger;
}

/**
 * Map a non-negative distance onto (0, 1]; 0 distance is similarity 1
 */
export function distanceToSimilarity(distance: number): number {
  return 1 / (1 + Math.max(0, distance));
}

export class VectorPath {
  private readonly embeddings: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly similarityThreshold: number;
  private readonly embeddingTimeoutMs: number;
  private readonly searchTimeoutMs: number;
  private readonly logger: RetrievalLogger;

  constructor(deps: VectorPathDeps) {
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.similarityThreshold = deps.similarityThreshold ?? 0.7;
    this.embeddingTimeoutMs = deps.embeddingTimeoutMs ?? 5000;
    this.searchTimeoutMs = deps.searchTimeoutMs ?? 5000;
    this.logger = deps.logger ?? createLogger('Vector Path');
  }

  /**
   * Candidates at or above the similarity threshold, in store order.
   * Returns [] on any embedding or store failure.
   */
  async search(query: string, topK: number): Promise<EvidenceItem[]> {
    if (!query.trim() || topK <= 0) {
      return [];
    }

    try {
      const vector = await withTimeout(
        this.embeddings.embed(query),
        this.embeddingTimeoutMs,
        'Query embedding'
      );
      const hits = await withTimeout(
        this.store.nearestNeighbors(vector, topK),
        this.searchTimeoutMs,
        'Vector search'
      );

      const results: EvidenceItem[] = [];
      for (const hit of hits) {
        if (!Number.isFinite(hit.distance)) continue;
        const similarity = distanceToSimilarity(hit.distance);
        if (similarity < this.similarityThreshold) continue;
        results.push(documentToEvidence(hit.document, 'vector', similarity));
      }

      this.logger.debug('Vector search complete', {
        candidates: hits.length,
        kept: results.length,
        threshold: this.similarityThreshold,
      });
      return results;
    } catch (error) {
      this.logger.warn('Vector search failed, returning no candidates', {
        error: getErrorMessage(error),
      });
      return [];
    }
  }
}
