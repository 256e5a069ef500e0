/**
 * Multi-Path Retriever
 * Fans a query out to the vector, lexical and rule paths, fuses and reranks
 */

import type { EvidenceItem } from '@medrag/shared-types';
import { createLogger, logError, type RetrievalLogger } from '../utils/logger.js';
import { fuseEvidence } from './fusion.js';
import type { RetrievalResult, RuleMatch } from './types.js';

export interface SearchPath {
  search(query: string, topK: number): EvidenceItem[] | Promise<EvidenceItem[]>;
}

export interface RuleMatcher {
  match(query: string): RuleMatch | Promise<RuleMatch>;
}

export interface EvidenceReranker {
  rerank(query: string, items: EvidenceItem[], topK: number): Promise<EvidenceItem[]>;
}

export interface MultiPathRetrieverDeps {
  vectorPath: SearchPath;
  lexicalPath: SearchPath;
  rulePath: RuleMatcher;
  reranker: EvidenceReranker;
  logger?: RetrievalLogger;
  /** Candidates per path (default 10) */
  topKRetrieval?: number;
  /** Evidence kept after rerank (default 3) */
  topKRerank?: number;
}

export interface RetrieveOptions {
  topK?: number;
}

const NO_RULE_MATCH: RuleMatch = { evidence: [], category: null, matchedKeywords: [], emergencyKeywords: [] };

export class MultiPathRetriever {
  private readonly deps: MultiPathRetrieverDeps;
  private readonly logger: RetrievalLogger;
  private readonly topKRetrieval: number;
  private readonly topKRerank: number;

  constructor(deps: MultiPathRetrieverDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger('Retriever');
    this.topKRetrieval = deps.topKRetrieval ?? 10;
    this.topKRerank = deps.topKRerank ?? 3;
  }

  /**
   * Run a path, turning a throw or rejection into its fallback value
   */
  private async guard<T>(path: string, run: () => T | Promise<T>, fallback: T): Promise<T> {
    try {
      return await run();
    } catch (error) {
      logError(this.logger, `${path} path failed`, error);
      return fallback;
    }
  }

  async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
    const startTime = Date.now();
    const topK = options.topK ?? this.topKRerank;
    const perPath = this.topKRetrieval;

    const [vector, lexical, rule] = await Promise.all([
      this.guard('Vector', () => this.deps.vectorPath.search(query, perPath), []),
      this.guard('Lexical', () => this.deps.lexicalPath.search(query, perPath), []),
      this.guard('Rule', () => this.deps.rulePath.match(query), NO_RULE_MATCH),
    ]);

    const fused = fuseEvidence(vector, lexical, rule.evidence);
    const reranked = fused.length > topK;
    const evidence = await this.guard(
      'Rerank',
      () => this.deps.reranker.rerank(query, fused, topK),
      fused.slice(0, topK)
    );

    const stats = {
      vectorCandidates: vector.length,
      lexicalCandidates: lexical.length,
      ruleCandidates: rule.evidence.length,
      fusedCount: fused.length,
      reranked,
      latencyMs: Date.now() - startTime,
    };

    this.logger.info('Retrieval complete', {
      ...stats,
      returned: evidence.length,
      matchedCategory: rule.category,
    });

    return {
      evidence,
      matchedCategory: rule.category,
      matchedKeywords: rule.matchedKeywords,
      emergencyKeywords: rule.emergencyKeywords,
      stats,
    };
  }
}
