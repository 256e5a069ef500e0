import { describe, it, expect, vi } from 'vitest';
import type { CorpusDocument } from '@medrag/shared-types';
import type { EmbeddingProvider, NeighborHit, VectorStore } from '../types.js';
import { distanceToSimilarity, VectorPath } from '../vector-path.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function doc(id: string, content: string): CorpusDocument {
  return { id, content, fields: { cure_department: '内科' } };
}

function createEmbeddings(embed: (text: string) => Promise<number[]> = async () => [0.1, 0.2]) {
  return { embed: vi.fn(embed) } satisfies EmbeddingProvider;
}

function createStore(hits: NeighborHit[]) {
  return { nearestNeighbors: vi.fn(async () => hits) } satisfies VectorStore;
}

describe('distanceToSimilarity', () => {
  it('should map distance 0 to 1 and shrink with distance', () => {
    expect(distanceToSimilarity(0)).toBe(1);
    expect(distanceToSimilarity(1)).toBe(0.5);
    expect(distanceToSimilarity(3)).toBe(0.25);
  });
});

describe('VectorPath', () => {
  it('should drop candidates below the similarity threshold', async () => {
    const store = createStore([
      { distance: 0, document: doc('exact', '感冒') },
      { distance: 1 / 0.3 - 1, document: doc('far', '骨折') },
      { distance: 0.25, document: doc('near', '流感') },
    ]);
    const embeddings = createEmbeddings();
    const path = new VectorPath({ embeddings, store, similarityThreshold: 0.7, logger: createMockLogger() });

    const results = await path.search('发热', 10);

    expect(results.map((r) => r.metadata['documentId'])).toEqual(['exact', 'near']);
    expect(results[0]?.score).toBe(1);
    expect(results[1]?.score).toBeCloseTo(0.8, 10);
    expect(results[1]).toMatchObject({
      origin: 'vector',
      content: '流感',
      metadata: { retrievalType: 'vector', cure_department: '内科' },
    });
    expect(embeddings.embed).toHaveBeenCalledWith('发热');
    expect(store.nearestNeighbors).toHaveBeenCalledWith([0.1, 0.2], 10);
  });

  it('should return nothing when embedding fails', async () => {
    const logger = createMockLogger();
    const path = new VectorPath({
      embeddings: createEmbeddings(async () => {
        throw new Error('Voyage API error 503: unavailable');
      }),
      store: createStore([]),
      logger,
    });

    expect(await path.search('发热', 10)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Vector search failed, returning no candidates', {
      error: 'Voyage API error 503: unavailable',
    });
  });

  it('should return nothing when the store does not answer in time', async () => {
    const store = { nearestNeighbors: vi.fn(() => new Promise<NeighborHit[]>(() => {})) };
    const path = new VectorPath({
      embeddings: createEmbeddings(),
      store,
      searchTimeoutMs: 20,
      logger: createMockLogger(),
    });

    expect(await path.search('发热', 10)).toEqual([]);
  });

  it('should skip blank queries and non-finite distances', async () => {
    const embeddings = createEmbeddings();
    const path = new VectorPath({
      embeddings,
      store: createStore([{ distance: Number.NaN, document: doc('bad', 'x') }]),
      logger: createMockLogger(),
    });

    expect(await path.search('  ', 10)).toEqual([]);
    expect(embeddings.embed).not.toHaveBeenCalled();
    expect(await path.search('发热', 10)).toEqual([]);
  });
});
