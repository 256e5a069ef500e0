/**
 * Embeddings Module
 */

export {
  VoyageEmbeddingClient,
  parseVoyageResponse,
  VOYAGE_API_URL,
  type EmbeddingCache,
  type VoyageClientConfig,
  type VoyageClientDeps,
  type EmbeddingResult,
  type CircuitBreakerState,
} from './voyage-client.js';
