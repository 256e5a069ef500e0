/**
 * Medical Consultation Service
 * Entry point: wires the retrieval engine, consult workflow and HTTP API
 */

import { config } from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

// Load environment variables from project root
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, '../../../.env') });

import type { Server } from 'http';
import { AnthropicCompletionClient } from './anthropic/completion-client.js';
import { BingSearchClient } from './augmentation/bing-search-client.js';
import { loadRetrievalConfig, validateRetrievalConfig } from './config/retrieval-config.js';
import { ConsultService, createConsultWorkflow } from './consult/index.js';
import { VoyageEmbeddingClient } from './embeddings/index.js';
import { GraphClient } from './falkordb/client.js';
import { FalkorDocumentStore } from './falkordb/document-store.js';
import { createApp } from './http/app.js';
import { QueryOptimizer } from './query/query-optimizer.js';
import { loadSynonymTable } from './query/synonym-table.js';
import { createRedisConnection } from './redis/client.js';
import {
  LexicalPath,
  LlmReranker,
  MultiPathRetriever,
  RulePath,
  VectorPath,
  loadRuleTable,
} from './retrieval/index.js';
import { createLogger, logError } from './utils/logger.js';

const logger = createLogger('Service');

const settings = loadRetrievalConfig();
validateRetrievalConfig(settings);

const falkorConnection = createRedisConnection('FalkorDB', {
  host: settings.stores.falkordbHost,
  port: settings.stores.falkordbPort,
  password: settings.stores.falkordbPassword,
  commandTimeout: settings.timeouts.vectorSearchMs,
});
const cacheConnection = createRedisConnection('Embedding Cache', {
  host: settings.stores.redisHost,
  port: settings.stores.redisPort,
  password: settings.stores.redisPassword,
});

const graph = new GraphClient({ connection: falkorConnection, graphName: settings.stores.graphName });
const documentStore = new FalkorDocumentStore(graph);

const utilityModel = new AnthropicCompletionClient({
  apiKey: settings.models.anthropicApiKey,
  model: settings.models.utilityModel,
  timeoutMs: settings.timeouts.rerankMs,
});
const answerModel = new AnthropicCompletionClient({
  apiKey: settings.models.anthropicApiKey,
  model: settings.models.answerModel,
  timeoutMs: settings.timeouts.answerMs,
  maxTokens: 2000,
});

const embeddings = new VoyageEmbeddingClient(
  {
    apiKey: settings.models.voyageApiKey,
    model: settings.models.voyageModel,
    dimension: settings.models.embeddingDimension,
    timeoutMs: settings.timeouts.embeddingMs,
    cacheTtlSeconds: settings.stores.embeddingCacheTtlSeconds,
  },
  { cache: cacheConnection }
);
if (!embeddings.isConfigured()) {
  logger.warn('VOYAGE_API_KEY not set, vector path will return no candidates');
}

const webSearch = new BingSearchClient({
  apiKey: settings.augmentation.bingApiKey,
  endpoint: settings.augmentation.bingEndpoint,
  count: settings.augmentation.resultCount,
  timeoutMs: settings.timeouts.augmentationMs,
});
if (!webSearch.isConfigured()) {
  logger.warn('BING_SEARCH_API_KEY not set, low-confidence answers will not be augmented');
}

const lexicalPath = new LexicalPath({ snapshot: documentStore, config: settings.lexical });

const retriever = new MultiPathRetriever({
  vectorPath: new VectorPath({
    embeddings,
    store: documentStore,
    similarityThreshold: settings.similarityThreshold,
    embeddingTimeoutMs: settings.timeouts.embeddingMs,
    searchTimeoutMs: settings.timeouts.vectorSearchMs,
  }),
  lexicalPath,
  rulePath: new RulePath({ table: loadRuleTable() }),
  reranker: new LlmReranker({
    model: utilityModel,
    previewLength: settings.rerankPreviewLength,
    timeoutMs: settings.timeouts.rerankMs,
  }),
  topKRetrieval: settings.topKRetrieval,
  topKRerank: settings.topKRerank,
});

const optimizer = new QueryOptimizer({
  model: utilityModel,
  synonyms: loadSynonymTable(),
  historyTurns: settings.queryOptimization.historyTurns,
  timeoutMs: settings.timeouts.rewriteMs,
});

const workflow = createConsultWorkflow({
  optimizer,
  retriever,
  answerModel,
  augmentation: webSearch.isConfigured() ? webSearch : undefined,
  optimizeOptions: {
    rewrite: settings.queryOptimization.rewrite,
    normalize: settings.queryOptimization.normalize,
  },
  confidenceThreshold: settings.confidenceThreshold,
  answerTimeoutMs: settings.timeouts.answerMs,
  augmentationTimeoutMs: settings.timeouts.augmentationMs,
});

const app = createApp({ consult: new ConsultService(workflow), lexical: lexicalPath });
let server: Server | undefined;

async function startService(): Promise<void> {
  try {
    logger.info('Starting medical consultation service...');

    await Promise.all([falkorConnection.connect(), cacheConnection.connect()]);
    await graph.connect();

    const rebuild = await lexicalPath.rebuild();
    logger.info('Initial lexical index build finished', { ...rebuild });

    server = app.listen(settings.httpPort, () => {
      logger.info('HTTP server listening', { port: settings.httpPort });
    });
  } catch (error) {
    logError(logger, 'Failed to start service', error);
    process.exit(1);
  }
}

// Graceful shutdown
async function shutdown(): Promise<void> {
  logger.info('Shutting down gracefully...');

  try {
    server?.close();
    await Promise.all([graph.quit(), cacheConnection.quit()]);
    logger.info('Service shut down');
    process.exit(0);
  } catch (error) {
    logError(logger, 'Error during shutdown', error);
    process.exit(1);
  }
}

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());

void startService();
