/**
 * Lexical Path
 * Owns the published BM25 index generation, rebuilds it from the corpus
 * snapshot and answers keyword queries against whatever generation is current.
 */

import type { CorpusDocument, EvidenceItem } from '@medrag/shared-types';
import type { LexicalConfig } from '../config/retrieval-config.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, logError, type RetrievalLogger } from '../utils/logger.js';
import { documentToEvidence } from './evidence.js';
import { LexicalIndex } from './lexical-index.js';
import { mapPartitioned } from './partition.js';
import { tokenize, type Tokenizer } from './tokenizer.js';
import type { CorpusSnapshotProvider } from './types.js';

export interface LexicalPathDeps {
  snapshot: CorpusSnapshotProvider;
  config: LexicalConfig;
  tokenizer?: Tokenizer;
  logger?: RetrievalLogger;
  /** Overrides os.availableParallelism() when planning partitions */
  parallelism?: number;
}

export type LexicalRebuildResult =
  | { status: 'published'; generation: number; documentCount: number; durationMs: number }
  | { status: 'empty'; generation: number; durationMs: number }
  | { status: 'superseded'; generation: number; publishedGeneration: number }
  | { status: 'failed'; generation: number; error: string };

export interface LexicalIndexStats {
  generation: number;
  documentCount: number;
  builtAt: number | null;
}

export class LexicalPath {
  private readonly snapshot: CorpusSnapshotProvider;
  private readonly config: LexicalConfig;
  private readonly tokenizer: Tokenizer;
  private readonly logger: RetrievalLogger;
  private readonly parallelism: number | undefined;

  private current: LexicalIndex | null = null;
  private publishedGeneration = 0;
  private lastGeneration = 0;

  constructor(deps: LexicalPathDeps) {
    this.snapshot = deps.snapshot;
    this.config = deps.config;
    this.tokenizer = deps.tokenizer ?? tokenize;
    this.logger = deps.logger ?? createLogger('Lexical Path');
    this.parallelism = deps.parallelism;
  }

  /**
   * Pull the whole corpus page by page until a short page or the document cap.
   * At the cap, one more document is requested to tell truncation apart from
   * a corpus of exactly `maxDocuments`.
   */
  async fetchSnapshot(): Promise<CorpusDocument[]> {
    const { batchSize, maxDocuments } = this.config;
    const documents: CorpusDocument[] = [];

    while (documents.length < maxDocuments) {
      const limit = Math.min(batchSize, maxDocuments - documents.length);
      const page = await this.snapshot.fetchPage(documents.length, limit);
      documents.push(...page.slice(0, limit));
      if (page.length < limit) {
        break;
      }
    }

    if (documents.length >= maxDocuments) {
      const overflow = await this.snapshot.fetchPage(maxDocuments, 1);
      if (overflow.length > 0) {
        this.logger.warn('Corpus snapshot hit document cap', { maxDocuments });
      }
    }
    return documents;
  }

  /**
   * Build a new generation and publish it unless a newer one got there first.
   * Failures keep the prior generation and are reported, not thrown.
   */
  async rebuild(): Promise<LexicalRebuildResult> {
    const generation = ++this.lastGeneration;
    const startTime = Date.now();

    let index: LexicalIndex | null;
    try {
      const documents = await this.fetchSnapshot();
      const tokenized = await mapPartitioned(
        documents,
        (document) => this.tokenizer(document.content),
        {
          parallelThreshold: this.config.parallelThreshold,
          maxWorkers: this.config.maxWorkers,
          parallelism: this.parallelism,
        }
      );
      index = LexicalIndex.fromTokens(generation, documents, tokenized, {
        k1: this.config.k1,
        b: this.config.b,
      });
    } catch (error) {
      logError(this.logger, 'Lexical index rebuild failed, keeping previous generation', error, {
        generation,
        publishedGeneration: this.publishedGeneration,
      });
      return { status: 'failed', generation, error: getErrorMessage(error) };
    }

    if (generation < this.publishedGeneration) {
      this.logger.info('Discarding superseded lexical index build', {
        generation,
        publishedGeneration: this.publishedGeneration,
      });
      return { status: 'superseded', generation, publishedGeneration: this.publishedGeneration };
    }

    this.current = index;
    this.publishedGeneration = generation;
    const durationMs = Date.now() - startTime;

    if (!index) {
      this.logger.warn('Corpus is empty, lexical path disabled', { generation });
      return { status: 'empty', generation, durationMs };
    }

    this.logger.info('Lexical index published', {
      generation,
      documentCount: index.size,
      durationMs,
    });
    return { status: 'published', generation, documentCount: index.size, durationMs };
  }

  /**
   * Keyword search against the generation current at call time
   */
  search(query: string, topK: number): EvidenceItem[] {
    const index = this.current;
    if (!index) {
      return [];
    }

    const tokens = this.tokenizer(query);
    return index
      .search(tokens, topK)
      .map((hit) => documentToEvidence(hit.document, 'lexical', hit.score));
  }

  stats(): LexicalIndexStats {
    const index = this.current;
    return {
      generation: this.publishedGeneration,
      documentCount: index?.size ?? 0,
      builtAt: index?.builtAt ?? null,
    };
  }
}
