import { describe, it, expect, vi } from 'vitest';
import type { EvidenceItem } from '@medrag/shared-types';
import { MultiPathRetriever } from '../multi-path-retriever.js';
import type { RuleMatch } from '../types.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function item(origin: EvidenceItem['origin'], content: string, score: number | null): EvidenceItem {
  return { origin, content, score, metadata: {} };
}

const noRule: RuleMatch = { evidence: [], category: null, matchedKeywords: [], emergencyKeywords: [] };

function createReranker() {
  return {
    rerank: vi.fn(async (_query: string, items: EvidenceItem[], topK: number) => items.slice(0, topK)),
  };
}

describe('MultiPathRetriever', () => {
  it('should fuse path outputs and rerank to topK', async () => {
    const vectorA = item('vector', '感冒', 0.92);
    const lexicalA = item('lexical', '感冒', 3.1);
    const lexicalB = item('lexical', '流感', 2.4);
    const lexicalC = item('lexical', '咽炎', 1.2);
    const reranker = createReranker();
    const vectorPath = { search: vi.fn(async () => [vectorA]) };
    const lexicalPath = { search: vi.fn(() => [lexicalA, lexicalB, lexicalC]) };
    const retriever = new MultiPathRetriever({
      vectorPath,
      lexicalPath,
      rulePath: {
        match: () => ({
          evidence: [],
          category: 'symptom' as const,
          matchedKeywords: ['发热'],
          emergencyKeywords: ['抽搐'],
        }),
      },
      reranker,
      logger: createMockLogger(),
      topKRetrieval: 10,
      topKRerank: 2,
    });

    const result = await retriever.retrieve('感冒发热');

    expect(vectorPath.search).toHaveBeenCalledWith('感冒发热', 10);
    expect(lexicalPath.search).toHaveBeenCalledWith('感冒发热', 10);
    expect(reranker.rerank).toHaveBeenCalledWith('感冒发热', [vectorA, lexicalB, lexicalC], 2);
    expect(result.evidence).toEqual([vectorA, lexicalB]);
    expect(result.matchedCategory).toBe('symptom');
    expect(result.matchedKeywords).toEqual(['发热']);
    expect(result.emergencyKeywords).toEqual(['抽搐']);
    expect(result.stats).toMatchObject({
      vectorCandidates: 1,
      lexicalCandidates: 3,
      ruleCandidates: 0,
      fusedCount: 3,
      reranked: true,
    });
  });

  it('should treat a failing path as empty', async () => {
    const logger = createMockLogger();
    const lexicalB = item('lexical', '流感', 2.4);
    const retriever = new MultiPathRetriever({
      vectorPath: {
        search: async () => {
          throw new Error('embedding service down');
        },
      },
      lexicalPath: {
        search: () => {
          throw new Error('tokenizer exploded');
        },
      },
      rulePath: { match: () => ({ evidence: [lexicalB], category: null, matchedKeywords: [], emergencyKeywords: [] }) },
      reranker: createReranker(),
      logger,
    });

    const result = await retriever.retrieve('发热', { topK: 3 });

    expect(result.evidence).toEqual([lexicalB]);
    expect(result.stats).toMatchObject({ vectorCandidates: 0, lexicalCandidates: 0, reranked: false });
    expect(logger.error).toHaveBeenCalledTimes(2);
  });

  it('should fall back to the fused order if the reranker throws', async () => {
    const a = item('vector', 'a', 0.9);
    const b = item('vector', 'b', 0.8);
    const retriever = new MultiPathRetriever({
      vectorPath: { search: async () => [a, b] },
      lexicalPath: { search: () => [] },
      rulePath: { match: () => noRule },
      reranker: {
        rerank: async () => {
          throw new Error('unexpected');
        },
      },
      logger: createMockLogger(),
    });

    const result = await retriever.retrieve('q', { topK: 1 });

    expect(result.evidence).toEqual([a]);
  });

  it('should return empty evidence when every path is empty', async () => {
    const retriever = new MultiPathRetriever({
      vectorPath: { search: async () => [] },
      lexicalPath: { search: () => [] },
      rulePath: { match: () => noRule },
      reranker: createReranker(),
      logger: createMockLogger(),
    });

    const result = await retriever.retrieve('天气');

    expect(result.evidence).toEqual([]);
    expect(result.matchedCategory).toBeNull();
    expect(result.stats.fusedCount).toBe(0);
  });
});
