/**
 * Retrieval Boundary Types
 * Contracts between the retrieval engine and its external collaborators
 */

import type { CorpusDocument, EvidenceItem, RuleCategory } from '@medrag/shared-types';

/**
 * Text embedding service. Vectors share the dimensionality of the indexed corpus.
 */
export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
}

/**
 * One nearest-neighbor candidate in the store's native distance metric
 */
export interface NeighborHit {
  distance: number;
  document: CorpusDocument;
}

export interface VectorStore {
  nearestNeighbors(vector: number[], k: number): Promise<NeighborHit[]>;
}

/**
 * Paginated enumeration of every indexed document, used to build the lexical index
 */
export interface CorpusSnapshotProvider {
  fetchPage(offset: number, limit: number): Promise<CorpusDocument[]>;
}

export interface CompletionOptions {
  maxTokens?: number;
  temperature?: number;
  system?: string;
  timeoutMs?: number;
}

/**
 * Single-turn text completion. Empty output must surface as a rejected promise.
 */
export interface CompletionModel {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * External evidence source consulted when internal retrieval is not confident
 */
export interface AugmentationProvider {
  search(query: string): Promise<EvidenceItem[]>;
}

/**
 * Output of the rule path: a category signal plus any directly attached evidence.
 * `emergencyKeywords` is scanned on its own, so it is set even when an earlier
 * category wins `category`.
 */
export interface RuleMatch {
  evidence: EvidenceItem[];
  category: RuleCategory | null;
  matchedKeywords: string[];
  emergencyKeywords: string[];
}

export interface RetrievalStats {
  vectorCandidates: number;
  lexicalCandidates: number;
  ruleCandidates: number;
  fusedCount: number;
  reranked: boolean;
  latencyMs: number;
}

export interface RetrievalResult {
  evidence: EvidenceItem[];
  matchedCategory: RuleCategory | null;
  matchedKeywords: string[];
  emergencyKeywords: string[];
  stats: RetrievalStats;
}
