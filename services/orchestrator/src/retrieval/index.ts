/**
 * Retrieval Module
 * Multi-path evidence retrieval: vector, lexical and rule paths, fusion, rerank and gating
 */

export { tokenize, type Tokenizer } from './tokenizer.js';
export { mapPartitioned, planPartitions, type PartitionOptions } from './partition.js';
export { LexicalIndex, type Bm25Params, type LexicalHit } from './lexical-index.js';
export {
  LexicalPath,
  type LexicalPathDeps,
  type LexicalRebuildResult,
  type LexicalIndexStats,
} from './lexical-path.js';
export { VectorPath, distanceToSimilarity, type VectorPathDeps } from './vector-path.js';
export {
  RulePath,
  loadRuleTable,
  parseRuleTable,
  DEFAULT_RULES_PATH,
  type RuleTable,
  type RuleEntry,
} from './rule-path.js';
export { fuseEvidence, contentHash } from './fusion.js';
export { LlmReranker, parseRerankIndices, sortByScore, type LlmRerankerDeps } from './reranker.js';
export {
  evaluateConfidence,
  needsAugmentation,
  DEFAULT_CONFIDENCE_THRESHOLD,
  type ConfidenceDecision,
} from './confidence-gate.js';
export {
  MultiPathRetriever,
  type MultiPathRetrieverDeps,
  type RetrieveOptions,
  type SearchPath,
  type RuleMatcher,
  type EvidenceReranker,
} from './multi-path-retriever.js';
export { documentToEvidence, previewContent, formatDocumentContent } from './evidence.js';
export type * from './types.js';
