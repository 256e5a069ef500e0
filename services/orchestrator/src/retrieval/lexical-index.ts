/**
 * Lexical Index
 * Immutable BM25 index over a frozen corpus snapshot. A rebuild creates a new
 * instance; nothing here is mutated after construction.
 */

import type { CorpusDocument } from '@medrag/shared-types';

export interface Bm25Params {
  k1: number;
  b: number;
}

export interface LexicalHit {
  document: CorpusDocument;
  score: number;
  /** Position in the corpus snapshot */
  position: number;
}

export class LexicalIndex {
  readonly documents: readonly CorpusDocument[];
  private readonly termFrequencies: ReadonlyArray<ReadonlyMap<string, number>>;
  private readonly documentLengths: readonly number[];
  private readonly idf: ReadonlyMap<string, number>;
  private readonly averageLength: number;

  private constructor(
    readonly generation: number,
    documents: CorpusDocument[],
    tokenized: string[][],
    private readonly params: Bm25Params,
    readonly builtAt: number
  ) {
    this.documents = Object.freeze([...documents]);

    const termFrequencies: Map<string, number>[] = [];
    const documentFrequency = new Map<string, number>();
    let totalLength = 0;

    for (const tokens of tokenized) {
      const tf = new Map<string, number>();
      for (const token of tokens) {
        tf.set(token, (tf.get(token) ?? 0) + 1);
      }
      for (const term of tf.keys()) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
      termFrequencies.push(tf);
      totalLength += tokens.length;
    }

    const n = tokenized.length;
    const idf = new Map<string, number>();
    for (const [term, df] of documentFrequency) {
      // Non-negative variant: ln(1 + (N - df + 0.5) / (df + 0.5))
      idf.set(term, Math.log(1 + (n - df + 0.5) / (df + 0.5)));
    }

    this.termFrequencies = termFrequencies;
    this.documentLengths = tokenized.map((tokens) => tokens.length);
    this.idf = idf;
    this.averageLength = n > 0 ? totalLength / n : 0;
  }

  /**
   * Build from documents and their token lists (same order, same length).
   * Returns null for an empty corpus.
   */
  static fromTokens(
    generation: number,
    documents: CorpusDocument[],
    tokenized: string[][],
    params: Bm25Params,
    builtAt: number = Date.now()
  ): LexicalIndex | null {
    if (documents.length !== tokenized.length) {
      throw new Error(
        `Token lists (${tokenized.length}) do not match documents (${documents.length})`
      );
    }
    if (documents.length === 0) {
      return null;
    }
    return new LexicalIndex(generation, documents, tokenized, params, builtAt);
  }

  get size(): number {
    return this.documents.length;
  }

  /**
   * BM25 score of every document, in corpus order
   */
  scoreAll(queryTokens: readonly string[]): number[] {
    const { k1, b } = this.params;
    const scores = new Array<number>(this.documents.length).fill(0);

    for (const term of queryTokens) {
      const idf = this.idf.get(term);
      if (idf === undefined) continue;

      for (let i = 0; i < this.termFrequencies.length; i++) {
        const tf = this.termFrequencies[i]?.get(term) ?? 0;
        if (tf === 0) continue;

        const length = this.documentLengths[i] ?? 0;
        const norm = k1 * (1 - b + (b * length) / this.averageLength);
        scores[i] = (scores[i] ?? 0) + (idf * (tf * (k1 + 1))) / (tf + norm);
      }
    }

    return scores;
  }

  /**
   * Top documents with score > 0, highest first, ties in corpus order
   */
  search(queryTokens: readonly string[], topK: number): LexicalHit[] {
    if (topK <= 0 || queryTokens.length === 0) {
      return [];
    }

    const scores = this.scoreAll(queryTokens);
    const hits: LexicalHit[] = [];
    scores.forEach((score, position) => {
      const document = this.documents[position];
      if (score > 0 && document) {
        hits.push({ document, score, position });
      }
    });

    hits.sort((a, b) => b.score - a.score || a.position - b.position);
    return hits.slice(0, topK);
  }
}
