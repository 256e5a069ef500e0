/**
 * Runtime Type Guards
 * Validates data structures at runtime to catch malformed data from external sources
 */

import type { ConversationMessage } from './history.js';
import type { ConsultRequest } from './consult.js';
import type { EvidenceItem, EvidenceOrigin, RuleCategory } from './evidence.js';
import { RULE_CATEGORIES } from './evidence.js';

/**
 * Type guard for ConversationMessage
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a valid ConversationMessage
 */
export function isConversationMessage(obj: unknown): obj is ConversationMessage {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const msg = obj as Record<string, unknown>;

  return (
    (msg['role'] === 'user' || msg['role'] === 'assistant') &&
    typeof msg['content'] === 'string'
  );
}

/**
 * Type guard for ConsultRequest
 * Used by the HTTP layer on parsed JSON bodies
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a valid ConsultRequest
 */
export function isConsultRequest(obj: unknown): obj is ConsultRequest {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const req = obj as Record<string, unknown>;
  const history = req['history'];

  return (
    typeof req['question'] === 'string' &&
    // Optional fields
    (history === undefined || (Array.isArray(history) && history.every(isConversationMessage))) &&
    (req['userId'] === undefined || typeof req['userId'] === 'string')
  );
}

export function isEvidenceOrigin(value: unknown): value is EvidenceOrigin {
  return value === 'vector' || value === 'lexical' || value === 'rule' || value === 'external';
}

export function isRuleCategory(value: unknown): value is RuleCategory {
  return RULE_CATEGORIES.some((category) => category === value);
}

/**
 * Type guard for EvidenceItem
 * Augmentation providers return loosely-typed records; this checks the shape
 *
 * @param obj - Unknown object to validate
 * @returns true if obj is a valid EvidenceItem
 */
export function isEvidenceItem(obj: unknown): obj is EvidenceItem {
  if (typeof obj !== 'object' || obj === null) {
    return false;
  }

  const item = obj as Record<string, unknown>;
  const score = item['score'];
  const metadata = item['metadata'];

  return (
    isEvidenceOrigin(item['origin']) &&
    typeof item['content'] === 'string' &&
    (score === null || (typeof score === 'number' && Number.isFinite(score))) &&
    typeof metadata === 'object' &&
    metadata !== null &&
    !Array.isArray(metadata)
  );
}
