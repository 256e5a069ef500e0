/**
 * Consultation API Types
 * Request/response contract of the consult endpoint
 */

import type { ConversationMessage } from './history.js';
import type { EvidenceItem, RuleCategory } from './evidence.js';

/**
 * Incoming consultation request
 */
export interface ConsultRequest {
  /** User's description of symptoms or question */
  question: string;
  /** Recent dialogue turns, oldest first */
  history?: ConversationMessage[];
  /** Optional caller identifier, only used for logging */
  userId?: string;
}

/**
 * Evidence as returned to API clients (content preview, provenance kept)
 */
export interface EvidencePreview {
  origin: EvidenceItem['origin'];
  content: string;
  score: number | null;
  metadata: Record<string, unknown>;
}

/**
 * Consultation response
 */
export interface ConsultResponse {
  answer: string;
  sources: EvidencePreview[];
  suggestions: string[];
  /** True when external augmentation was consulted */
  augmented: boolean;
  matchedCategory: RuleCategory | null;
  isEmergency: boolean;
}
