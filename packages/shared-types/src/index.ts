/**
 * Shared Types Package
 * Exports all shared types for the consultation services
 */

// Evidence types
export type { EvidenceOrigin, EvidenceItem, CorpusDocument, RuleCategory } from './evidence.js';

export { RULE_CATEGORIES, isInternalOrigin } from './evidence.js';

// History types
export type { ConversationMessage } from './history.js';

// Consultation API types
export type { ConsultRequest, ConsultResponse, EvidencePreview } from './consult.js';

// Environment variable utilities
export { parseIntEnv, parseFloatEnv, parseBoolEnv } from './env-utils.js';

// Runtime type guards
export {
  isConversationMessage,
  isConsultRequest,
  isEvidenceOrigin,
  isRuleCategory,
  isEvidenceItem,
} from './guards.js';
