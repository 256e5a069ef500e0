import { describe, it, expect, vi } from 'vitest';
import { parseVoyageResponse, VoyageEmbeddingClient, type VoyageClientConfig } from '../voyage-client.js';

const config: VoyageClientConfig = {
  apiKey: 'test-key',
  model: 'voyage-3',
  dimension: 3,
  timeoutMs: 1000,
  cacheTtlSeconds: 300,
};

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

function createCache(initial: Record<string, string> = {}) {
  const storage = new Map(Object.entries(initial));
  return {
    get: vi.fn(async (key: string) => storage.get(key) ?? null),
    setex: vi.fn(async (key: string, _seconds: number, value: string) => {
      storage.set(key, value);
      return 'OK';
    }),
  };
}

function okResponse(embedding: number[]) {
  return new Response(JSON.stringify({ data: [{ embedding, index: 0 }], usage: { total_tokens: 7 } }), {
    status: 200,
  });
}

describe('parseVoyageResponse', () => {
  it('should read the first embedding and token usage', () => {
    expect(parseVoyageResponse({ data: [{ embedding: [1, 2] }], usage: { total_tokens: 4 } })).toEqual({
      embedding: [1, 2],
      tokensUsed: 4,
    });
  });

  it('should reject bodies without an embedding', () => {
    expect(() => parseVoyageResponse({ data: [] })).toThrow('No embedding returned from Voyage API');
    expect(() => parseVoyageResponse('nope')).toThrow('Malformed Voyage API response');
  });
});

describe('VoyageEmbeddingClient', () => {
  it('should embed a query and cache the vector', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => okResponse([0.1, 0.2, 0.3]));
    const cache = createCache();
    const client = new VoyageEmbeddingClient(config, { fetch: fetchMock, cache, logger: createMockLogger() });
    expect(client.isConfigured()).toBe(true);

    const embedding = await client.embed('发热');

    expect(embedding).toEqual([0.1, 0.2, 0.3]);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toEqual({ model: 'voyage-3', input: ['发热'], input_type: 'query' });
    expect(cache.setex).toHaveBeenCalledWith(expect.stringMatching(/^EMB:query:voyage-3:[0-9a-f]{16}$/), 300, '[0.1,0.2,0.3]');
  });

  it('should serve cached vectors without calling the API', async () => {
    const fetchMock = vi.fn(async () => okResponse([9, 9, 9]));
    const writer = createCache();
    const first = new VoyageEmbeddingClient(config, {
      fetch: vi.fn(async () => okResponse([1, 2, 3])),
      cache: writer,
      logger: createMockLogger(),
    });
    await first.embed('头痛');

    const stored = writer.setex.mock.calls[0];
    const key = stored?.[0] ?? '';
    const value = stored?.[2] ?? '';
    const client = new VoyageEmbeddingClient(config, {
      fetch: fetchMock,
      cache: createCache({ [key]: value }),
      logger: createMockLogger(),
    });

    expect(await client.embedQuery('头痛')).toEqual({ embedding: [1, 2, 3], fromCache: true, tokensUsed: 0 });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should reject vectors of the wrong dimension', async () => {
    const client = new VoyageEmbeddingClient(config, {
      fetch: vi.fn(async () => okResponse([0.1, 0.2])),
      logger: createMockLogger(),
    });

    await expect(client.embed('发热')).rejects.toThrow('Voyage embedding has 2 dimensions, expected 3');
  });

  it('should open the circuit breaker after repeated failures', async () => {
    const fetchMock = vi.fn(async () => new Response('unavailable', { status: 503 }));
    const client = new VoyageEmbeddingClient(config, { fetch: fetchMock, logger: createMockLogger() });

    for (let i = 0; i < 5; i++) {
      await expect(client.embed(`q${i}`)).rejects.toThrow('Voyage API error 503: unavailable');
    }

    await expect(client.embed('q5')).rejects.toThrow('Voyage API circuit breaker is open');
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(client.getCircuitBreakerStatus()).toMatchObject({ failures: 5, isOpen: true });

    client.resetCircuitBreaker();
    expect(client.getCircuitBreakerStatus()).toEqual({ failures: 0, lastFailure: 0, isOpen: false });
  });

  it('should fail fast without an API key', async () => {
    const fetchMock = vi.fn(async () => okResponse([1, 2, 3]));
    const client = new VoyageEmbeddingClient({ ...config, apiKey: '' }, { fetch: fetchMock, logger: createMockLogger() });

    expect(client.isConfigured()).toBe(false);
    await expect(client.embed('发热')).rejects.toThrow('VOYAGE_API_KEY not configured');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
