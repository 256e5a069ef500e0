/**
 * Voyage AI Embedding Client
 * Query embeddings for the vector path, with a Redis cache and circuit breaker
 */

import { createHash } from 'crypto';
import type { EmbeddingProvider } from '../retrieval/types.js';
import { getErrorMessage } from '../utils/errors.js';
import { createLogger, logAPICall, type RetrievalLogger } from '../utils/logger.js';

export const VOYAGE_API_URL = 'https://api.voyageai.com/v1/embeddings';

const CACHE_KEY_PREFIX = 'EMB:query:';

// Circuit breaker configuration
const CIRCUIT_BREAKER_THRESHOLD = 5;
const CIRCUIT_BREAKER_RESET_MS = 60000; // 1 minute

/**
 * Subset of the ioredis API used for caching
 */
export interface EmbeddingCache {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export interface VoyageClientConfig {
  apiKey: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  /** 0 disables caching */
  cacheTtlSeconds: number;
  apiUrl?: string;
}

export interface VoyageClientDeps {
  cache?: EmbeddingCache;
  fetch?: typeof fetch;
  logger?: RetrievalLogger;
}

export interface EmbeddingResult {
  embedding: number[];
  fromCache: boolean;
  tokensUsed: number;
}

export interface CircuitBreakerState {
  failures: number;
  lastFailure: number;
  isOpen: boolean;
}

function closedBreaker(): CircuitBreakerState {
  return { failures: 0, lastFailure: 0, isOpen: false };
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((n) => typeof n === 'number' && Number.isFinite(n));
}

/**
 * Pull the first embedding and token usage out of a Voyage response body
 */
export function parseVoyageResponse(body: unknown): { embedding: number[]; tokensUsed: number } {
  if (typeof body !== 'object' || body === null) {
    throw new Error('Malformed Voyage API response');
  }
  const obj = body as Record<string, unknown>;
  const data = obj['data'];
  const first: unknown = Array.isArray(data) ? data[0] : undefined;
  const embedding =
    typeof first === 'object' && first !== null
      ? (first as Record<string, unknown>)['embedding']
      : undefined;

  if (!isNumberArray(embedding) || embedding.length === 0) {
    throw new Error('No embedding returned from Voyage API');
  }

  const usage = obj['usage'];
  const totalTokens =
    typeof usage === 'object' && usage !== null
      ? (usage as Record<string, unknown>)['total_tokens']
      : undefined;

  return { embedding, tokensUsed: typeof totalTokens === 'number' ? totalTokens : 0 };
}

export class VoyageEmbeddingClient implements EmbeddingProvider {
  private readonly config: VoyageClientConfig;
  private readonly cache: EmbeddingCache | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: RetrievalLogger;
  private circuitBreaker: CircuitBreakerState = closedBreaker();

  constructor(config: VoyageClientConfig, deps: VoyageClientDeps = {}) {
    this.config = config;
    this.cache = config.cacheTtlSeconds > 0 ? deps.cache : undefined;
    this.fetchImpl = deps.fetch ?? fetch;
    this.logger = deps.logger ?? createLogger('Voyage Client');
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  async embed(text: string): Promise<number[]> {
    const result = await this.embedQuery(text);
    return result.embedding;
  }

  /**
   * Embed a query string. Cached embeddings skip the API entirely.
   */
  async embedQuery(text: string): Promise<EmbeddingResult> {
    const cacheKey = this.getCacheKey(text);

    const cached = await this.readCache(cacheKey);
    if (cached) {
      return { embedding: cached, fromCache: true, tokensUsed: 0 };
    }

    if (!this.checkCircuitBreaker()) {
      throw new Error('Voyage API circuit breaker is open');
    }
    if (!this.config.apiKey) {
      throw new Error('VOYAGE_API_KEY not configured');
    }

    const startTime = Date.now();

    try {
      const response = await this.fetchImpl(this.config.apiUrl ?? VOYAGE_API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.config.model,
          input: [text],
          input_type: 'query',
        }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      logAPICall('voyage-embeddings', 'POST', response.ok, Date.now() - startTime, {
        status: response.status,
      });
      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Voyage API error ${response.status}: ${errorText}`);
      }

      const { embedding, tokensUsed } = parseVoyageResponse(await response.json());
      if (embedding.length !== this.config.dimension) {
        throw new Error(
          `Voyage embedding has ${embedding.length} dimensions, expected ${this.config.dimension}`
        );
      }

      this.logger.debug('Embedding generated', { tokensUsed, dimension: embedding.length });
      this.recordSuccess();

      await this.writeCache(cacheKey, embedding);
      return { embedding, fromCache: false, tokensUsed };
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  getCircuitBreakerStatus(): CircuitBreakerState {
    return { ...this.circuitBreaker };
  }

  resetCircuitBreaker(): void {
    this.circuitBreaker = closedBreaker();
    this.logger.info('Circuit breaker manually reset');
  }

  private getCacheKey(text: string): string {
    const hash = createHash('sha256').update(text).digest('hex').substring(0, 16);
    return `${CACHE_KEY_PREFIX}${this.config.model}:${hash}`;
  }

  private async readCache(key: string): Promise<number[] | null> {
    if (!this.cache) return null;
    try {
      const cached = await this.cache.get(key);
      if (!cached) return null;
      const parsed: unknown = JSON.parse(cached);
      return isNumberArray(parsed) ? parsed : null;
    } catch (error) {
      // Cache errors fall through to the API
      this.logger.warn('Embedding cache read error', { error: getErrorMessage(error) });
      return null;
    }
  }

  private async writeCache(key: string, embedding: number[]): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.setex(key, this.config.cacheTtlSeconds, JSON.stringify(embedding));
    } catch (error) {
      this.logger.warn('Embedding cache write error', { error: getErrorMessage(error) });
    }
  }

  private checkCircuitBreaker(): boolean {
    if (!this.circuitBreaker.isOpen) {
      return true;
    }

    if (Date.now() - this.circuitBreaker.lastFailure > CIRCUIT_BREAKER_RESET_MS) {
      this.logger.info('Circuit breaker reset');
      this.circuitBreaker = closedBreaker();
      return true;
    }

    return false;
  }

  private recordFailure(): void {
    this.circuitBreaker.failures++;
    this.circuitBreaker.lastFailure = Date.now();

    if (this.circuitBreaker.failures >= CIRCUIT_BREAKER_THRESHOLD && !this.circuitBreaker.isOpen) {
      this.circuitBreaker.isOpen = true;
      this.logger.warn('Circuit breaker opened', { failures: this.circuitBreaker.failures });
    }
  }

  private recordSuccess(): void {
    if (this.circuitBreaker.failures > 0) {
      this.circuitBreaker = closedBreaker();
    }
  }
}
