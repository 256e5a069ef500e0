/**
 * Shared Evidence Types
 * The unit exchanged between retrieval paths, the consult workflow and API clients
 */

/**
 * Where a piece of evidence came from.
 * vector/lexical/rule are internal knowledge-base paths, external is augmentation.
 */
export type EvidenceOrigin = 'vector' | 'lexical' | 'rule' | 'external';

/**
 * A single retrieved evidence item.
 *
 * `score` is local to the path that produced it: vector similarity is bounded
 * in (0, 1], BM25 is unbounded, external results carry no score at all.
 */
export interface EvidenceItem {
  readonly origin: EvidenceOrigin;
  readonly content: string;
  readonly score: number | null;
  readonly metadata: Readonly<Record<string, unknown>>;
}

/**
 * Document as stored in the knowledge base (vector store and corpus snapshot)
 */
export interface CorpusDocument {
  /** Stable document identifier */
  id: string;
  /** Primary text used for embedding and lexical scoring */
  content: string;
  /** Disease or entry name, used for display */
  name?: string;
  /** Auxiliary fields (category, symptoms, department, ...) */
  fields: Record<string, unknown>;
}

/**
 * Rule categories fired by keyword matching
 */
export type RuleCategory = 'symptom' | 'disease' | 'medication' | 'diagnostic' | 'emergency';

export const RULE_CATEGORIES: readonly RuleCategory[] = [
  'symptom',
  'disease',
  'medication',
  'diagnostic',
  'emergency',
];

/**
 * Internal origins are labeled as knowledge-base sources in prompts and responses
 */
export function isInternalOrigin(origin: EvidenceOrigin): boolean {
  return origin !== 'external';
}
