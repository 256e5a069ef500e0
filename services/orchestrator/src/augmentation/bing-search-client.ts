/**
 * Bing Web Search Client
 * External evidence for questions the knowledge base cannot answer confidently
 */

import type { EvidenceItem } from '@medrag/shared-types';
import type { AugmentationProvider } from '../retrieval/types.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, logAPICall, type RetrievalLogger } from '../utils/logger.js';

export const BING_SEARCH_ENDPOINT = 'https://api.bing.microsoft.com/v7.0/search';

/** Appended to every query to keep results on medical topics */
export const MEDICAL_QUERY_SUFFIX = ' 医疗健康';

export interface BingSearchConfig {
  apiKey: string;
  endpoint?: string;
  /** Results requested per query (default 3) */
  count?: number;
  timeoutMs: number;
}

export interface BingSearchDeps {
  fetch?: typeof fetch;
  logger?: RetrievalLogger;
}

interface WebPage {
  name: string;
  url: string;
  snippet: string;
}

function readString(obj: Record<string, unknown>, key: string): string {
  const value = obj[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Web page results from a Bing v7 response body; anything malformed is skipped
 */
export function parseWebPages(body: unknown): WebPage[] {
  if (typeof body !== 'object' || body === null) return [];
  const webPages = (body as Record<string, unknown>)['webPages'];
  if (typeof webPages !== 'object' || webPages === null) return [];
  const value = (webPages as Record<string, unknown>)['value'];
  if (!Array.isArray(value)) return [];

  return value.flatMap((entry: unknown) => {
    if (typeof entry !== 'object' || entry === null) return [];
    const page = entry as Record<string, unknown>;
    return [{ name: readString(page, 'name'), url: readString(page, 'url'), snippet: readString(page, 'snippet') }];
  });
}

export class BingSearchClient implements AugmentationProvider {
  private readonly config: BingSearchConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: RetrievalLogger;

  constructor(config: BingSearchConfig, deps: BingSearchDeps = {}) {
    this.config = config;
    this.fetchImpl = deps.fetch ?? fetch;
    this.logger = deps.logger ?? createLogger('Web Search');
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  /**
   * Search the web. Returns [] when unconfigured or on any failure.
   */
  async search(query: string): Promise<EvidenceItem[]> {
    if (!this.config.apiKey) {
      this.logger.warn('Bing API key not configured, skipping web search');
      return [];
    }

    const url = new URL(this.config.endpoint ?? BING_SEARCH_ENDPOINT);
    const count = this.config.count ?? 3;
    url.searchParams.set('q', `${query}${MEDICAL_QUERY_SUFFIX}`);
    url.searchParams.set('count', String(count));
    url.searchParams.set('mkt', 'zh-CN');
    url.searchParams.set('responseFilter', 'Webpages');

    const startTime = Date.now();
    try {
      const response = await this.fetchImpl(url, {
        headers: { 'Ocp-Apim-Subscription-Key': this.config.apiKey },
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      logAPICall('bing-search', 'GET', response.ok, Date.now() - startTime, { status: response.status });
      if (!response.ok) {
        throw new Error(`Bing API error ${response.status}`);
      }

      const results: EvidenceItem[] = parseWebPages(await response.json())
        .slice(0, count)
        .filter((page) => page.snippet)
        .map((page) => ({
          origin: 'external',
          content: page.snippet,
          score: null,
          metadata: { retrievalType: 'web_search', title: page.name, url: page.url },
        }));

      this.logger.info('Web search complete', { results: results.length });
      return results;
    } catch (error) {
      this.logger.warn('Web search failed', { error: getErrorMessage(error) });
      return [];
    }
  }
}
