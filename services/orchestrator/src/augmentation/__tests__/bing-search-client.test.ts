import { describe, it, expect, vi } from 'vitest';
import { BingSearchClient, parseWebPages } from '../bing-search-client.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

const body = {
  webPages: {
    value: [
      { name: '发热的处理方法', url: 'https://example.com/fever', snippet: '成人发热可多饮水并注意休息。' },
      { name: '空摘要', url: 'https://example.com/empty', snippet: '' },
    ],
  },
};

describe('parseWebPages', () => {
  it('should tolerate bodies without web pages', () => {
    expect(parseWebPages({})).toEqual([]);
    expect(parseWebPages({ webPages: { value: 'x' } })).toEqual([]);
    expect(parseWebPages(null)).toEqual([]);
  });
});

describe('BingSearchClient', () => {
  it('should return snippets as unscored external evidence', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) => new Response(JSON.stringify(body), { status: 200 })
    );
    const client = new BingSearchClient(
      { apiKey: 'test-key', timeoutMs: 1000 },
      { fetch: fetchMock, logger: createMockLogger() }
    );

    const results = await client.search('发热');

    expect(client.isConfigured()).toBe(true);
    expect(results).toEqual([
      {
        origin: 'external',
        content: '成人发热可多饮水并注意休息。',
        score: null,
        metadata: { retrievalType: 'web_search', title: '发热的处理方法', url: 'https://example.com/fever' },
      },
    ]);

    const requestUrl = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(requestUrl.origin + requestUrl.pathname).toBe('https://api.bing.microsoft.com/v7.0/search');
    expect(requestUrl.searchParams.get('q')).toBe('发热 医疗健康');
    expect(requestUrl.searchParams.get('mkt')).toBe('zh-CN');
    expect(requestUrl.searchParams.get('count')).toBe('3');
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({ 'Ocp-Apim-Subscription-Key': 'test-key' });
  });

  it('should skip the search without an API key', async () => {
    const fetchMock = vi.fn(async () => new Response('{}'));
    const logger = createMockLogger();
    const client = new BingSearchClient({ apiKey: '', timeoutMs: 1000 }, { fetch: fetchMock, logger });

    expect(client.isConfigured()).toBe(false);
    expect(await client.search('发热')).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('Bing API key not configured, skipping web search');
  });

  it('should return nothing on HTTP errors', async () => {
    const logger = createMockLogger();
    const client = new BingSearchClient(
      { apiKey: 'test-key', timeoutMs: 1000 },
      { fetch: vi.fn(async () => new Response('denied', { status: 401 })), logger }
    );

    expect(await client.search('发热')).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('Web search failed', { error: 'Bing API error 401' });
  });
});
