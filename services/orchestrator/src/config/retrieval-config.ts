/**
 * Retrieval Configuration
 * Typed settings for query optimization, the three retrieval paths, reranking and external clients
 */

import { parseBoolEnv, parseFloatEnv, parseIntEnv } from '@medrag/shared-types';
import { ConfigurationError } from '../utils/errors.js';

export interface QueryOptimizationConfig {
  /** LLM rewrite of the question before retrieval */
  rewrite: boolean;
  /** Colloquial-to-standard term substitution */
  normalize: boolean;
  /** Most recent dialogue turns passed to the rewrite prompt */
  historyTurns: number;
}

export interface LexicalConfig {
  /** Documents per snapshot page */
  batchSize: number;
  /** Hard cap on documents pulled into the index */
  maxDocuments: number;
  /** Below this many documents tokenization runs in one pass */
  parallelThreshold: number;
  /** Upper bound on tokenization partitions */
  maxWorkers: number;
  /** BM25 term-frequency saturation */
  k1: number;
  /** BM25 length normalization */
  b: number;
}

export interface TimeoutConfig {
  embeddingMs: number;
  vectorSearchMs: number;
  rewriteMs: number;
  rerankMs: number;
  answerMs: number;
  augmentationMs: number;
}

export interface ModelConfig {
  anthropicApiKey: string;
  /** Fast model for rewrite and rerank */
  utilityModel: string;
  /** Model for answer generation */
  answerModel: string;
  voyageApiKey: string;
  voyageModel: string;
  embeddingDimension: number;
}

export interface StoreConfig {
  falkordbHost: string;
  falkordbPort: number;
  falkordbPassword: string | undefined;
  graphName: string;
  redisHost: string;
  redisPort: number;
  redisPassword: string | undefined;
  /** Embedding cache TTL; 0 disables the cache */
  embeddingCacheTtlSeconds: number;
}

export interface AugmentationConfig {
  bingApiKey: string;
  bingEndpoint: string;
  resultCount: number;
}

export interface RetrievalConfig {
  /** Candidates requested from each path */
  topKRetrieval: number;
  /** Evidence kept after rerank (display budget) */
  topKRerank: number;
  /** Minimum vector similarity, 1 / (1 + distance) */
  similarityThreshold: number;
  /** Minimum best score before augmentation is skipped */
  confidenceThreshold: number;
  /** Characters of each candidate shown to the reranker */
  rerankPreviewLength: number;
  queryOptimization: QueryOptimizationConfig;
  lexical: LexicalConfig;
  timeouts: TimeoutConfig;
  models: ModelConfig;
  stores: StoreConfig;
  augmentation: AugmentationConfig;
  httpPort: number;
}

/**
 * Build configuration from the environment, falling back to defaults
 */
export function loadRetrievalConfig(): RetrievalConfig {
  return {
    topKRetrieval: parseIntEnv('TOP_K_RETRIEVAL', 10),
    topKRerank: parseIntEnv('TOP_K_RERANK', 3),
    similarityThreshold: parseFloatEnv('SIMILARITY_THRESHOLD', 0.7),
    confidenceThreshold: parseFloatEnv('CONFIDENCE_THRESHOLD', 0.5),
    rerankPreviewLength: parseIntEnv('RERANK_PREVIEW_LENGTH', 200),

    queryOptimization: {
      rewrite: parseBoolEnv('ENABLE_QUERY_REWRITE', true),
      normalize: parseBoolEnv('ENABLE_QUERY_NORMALIZE', true),
      historyTurns: parseIntEnv('HISTORY_TURNS', 6),
    },

    lexical: {
      batchSize: parseIntEnv('LEXICAL_BATCH_SIZE', 2000),
      maxDocuments: parseIntEnv('LEXICAL_MAX_DOCUMENTS', 50000),
      parallelThreshold: parseIntEnv('LEXICAL_PARALLEL_THRESHOLD', 100),
      maxWorkers: parseIntEnv('LEXICAL_MAX_WORKERS', 8),
      k1: parseFloatEnv('BM25_K1', 1.5),
      b: parseFloatEnv('BM25_B', 0.75),
    },

    timeouts: {
      embeddingMs: parseIntEnv('EMBEDDING_TIMEOUT_MS', 10000),
      vectorSearchMs: parseIntEnv('VECTOR_SEARCH_TIMEOUT_MS', 5000),
      rewriteMs: parseIntEnv('REWRITE_TIMEOUT_MS', 8000),
      rerankMs: parseIntEnv('RERANK_TIMEOUT_MS', 8000),
      answerMs: parseIntEnv('ANSWER_TIMEOUT_MS', 60000),
      augmentationMs: parseIntEnv('AUGMENTATION_TIMEOUT_MS', 10000),
    },

    models: {
      anthropicApiKey: process.env['ANTHROPIC_API_KEY'] || '',
      utilityModel: process.env['UTILITY_MODEL'] || 'claude-3-5-haiku-latest',
      answerModel: process.env['ANSWER_MODEL'] || 'claude-3-5-sonnet-latest',
      voyageApiKey: process.env['VOYAGE_API_KEY'] || '',
      voyageModel: process.env['VOYAGE_MODEL'] || 'voyage-3',
      embeddingDimension: parseIntEnv('EMBEDDING_DIMENSION', 1024),
    },

    stores: {
      falkordbHost: process.env['FALKORDB_HOST'] || 'localhost',
      falkordbPort: parseIntEnv('FALKORDB_PORT', 6379),
      falkordbPassword: process.env['FALKORDB_PASSWORD'] || undefined,
      graphName: process.env['FALKORDB_GRAPH'] || 'medical_knowledge',
      redisHost: process.env['REDIS_HOST'] || 'localhost',
      redisPort: parseIntEnv('REDIS_PORT', 6380),
      redisPassword: process.env['REDIS_PASSWORD'] || undefined,
      embeddingCacheTtlSeconds: parseIntEnv('EMBEDDING_CACHE_TTL_SECONDS', 300),
    },

    augmentation: {
      bingApiKey: process.env['BING_SEARCH_API_KEY'] || '',
      bingEndpoint: process.env['BING_SEARCH_ENDPOINT'] || 'https://api.bing.microsoft.com/v7.0/search',
      resultCount: parseIntEnv('BING_RESULT_COUNT', 3),
    },

    httpPort: parseIntEnv('ORCHESTRATOR_PORT', 3002),
  };
}

function requirePositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}

function requireUnitInterval(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${name} must be within [0, 1], got ${value}`);
  }
}

/**
 * Fail fast on settings the engine cannot run with
 */
export function validateRetrievalConfig(config: RetrievalConfig): void {
  requirePositiveInt('topKRetrieval', config.topKRetrieval);
  requirePositiveInt('topKRerank', config.topKRerank);
  requirePositiveInt('rerankPreviewLength', config.rerankPreviewLength);
  requireUnitInterval('similarityThreshold', config.similarityThreshold);
  requireUnitInterval('confidenceThreshold', config.confidenceThreshold);
  requireUnitInterval('lexical.b', config.lexical.b);

  if (!Number.isInteger(config.queryOptimization.historyTurns) || config.queryOptimization.historyTurns < 0) {
    throw new ConfigurationError(
      `queryOptimization.historyTurns must be a non-negative integer, got ${config.queryOptimization.historyTurns}`
    );
  }

  requirePositiveInt('lexical.batchSize', config.lexical.batchSize);
  requirePositiveInt('lexical.maxDocuments', config.lexical.maxDocuments);
  requirePositiveInt('lexical.parallelThreshold', config.lexical.parallelThreshold);
  requirePositiveInt('lexical.maxWorkers', config.lexical.maxWorkers);
  if (!Number.isFinite(config.lexical.k1) || config.lexical.k1 < 0) {
    throw new ConfigurationError(`lexical.k1 must be non-negative, got ${config.lexical.k1}`);
  }

  const { timeouts } = config;
  requirePositiveInt('timeouts.embeddingMs', timeouts.embeddingMs);
  requirePositiveInt('timeouts.vectorSearchMs', timeouts.vectorSearchMs);
  requirePositiveInt('timeouts.rewriteMs', timeouts.rewriteMs);
  requirePositiveInt('timeouts.rerankMs', timeouts.rerankMs);
  requirePositiveInt('timeouts.answerMs', timeouts.answerMs);
  requirePositiveInt('timeouts.augmentationMs', timeouts.augmentationMs);

  requirePositiveInt('models.embeddingDimension', config.models.embeddingDimension);
  requirePositiveInt('augmentation.resultCount', config.augmentation.resultCount);
}
