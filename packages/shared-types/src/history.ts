/**
 * Shared History Types
 * Dialogue turns supplied with a consultation request
 */

/**
 * One prior dialogue turn
 */
export interface ConversationMessage {
  role: 'user' | 'assistant';
  content: string;
}
