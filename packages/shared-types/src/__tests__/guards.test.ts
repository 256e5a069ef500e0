/**
 * Consultation Type Guards Tests
 * Unit tests for request and evidence runtime type guards
 */

import { describe, it, expect } from 'vitest';
import {
  isConsultRequest,
  isConversationMessage,
  isEvidenceItem,
  isRuleCategory,
} from '../guards.js';

describe('isConversationMessage', () => {
  it('should accept user and assistant turns', () => {
    expect(isConversationMessage({ role: 'user', content: '头痛三天了' })).toBe(true);
    expect(isConversationMessage({ role: 'assistant', content: '有没有发热？' })).toBe(true);
  });

  it('should reject unknown roles and missing content', () => {
    expect(isConversationMessage({ role: 'system', content: 'x' })).toBe(false);
    expect(isConversationMessage({ role: 'user' })).toBe(false);
    expect(isConversationMessage(null)).toBe(false);
    expect(isConversationMessage('user')).toBe(false);
  });
});

describe('isConsultRequest', () => {
  it('should accept a bare question', () => {
    expect(isConsultRequest({ question: '我发烧了怎么办' })).toBe(true);
  });

  it('should accept history and userId', () => {
    expect(
      isConsultRequest({
        question: '这个药饭后吃吗',
        history: [
          { role: 'user', content: '布洛芬怎么吃' },
          { role: 'assistant', content: '一般一次一片' },
        ],
        userId: 'user-1',
      })
    ).toBe(true);
  });

  it('should reject malformed history entries', () => {
    expect(isConsultRequest({ question: 'q', history: [{ role: 'bot', content: 'x' }] })).toBe(false);
    expect(isConsultRequest({ question: 'q', history: 'not-a-list' })).toBe(false);
  });

  it('should reject a missing or non-string question', () => {
    expect(isConsultRequest({})).toBe(false);
    expect(isConsultRequest({ question: 42 })).toBe(false);
    expect(isConsultRequest({ question: 'q', userId: 7 })).toBe(false);
  });
});

describe('isEvidenceItem', () => {
  const valid = {
    origin: 'external',
    content: '发热时多喝水',
    score: null,
    metadata: { url: 'https://example.com' },
  };

  it('should accept scored and unscored items', () => {
    expect(isEvidenceItem(valid)).toBe(true);
    expect(isEvidenceItem({ ...valid, origin: 'lexical', score: 2.4 })).toBe(true);
  });

  it('should reject unknown origins, NaN scores and array metadata', () => {
    expect(isEvidenceItem({ ...valid, origin: 'bing' })).toBe(false);
    expect(isEvidenceItem({ ...valid, score: Number.NaN })).toBe(false);
    expect(isEvidenceItem({ ...valid, score: undefined })).toBe(false);
    expect(isEvidenceItem({ ...valid, metadata: [] })).toBe(false);
  });
});

describe('isRuleCategory', () => {
  it('should only accept known categories', () => {
    expect(isRuleCategory('emergency')).toBe(true);
    expect(isRuleCategory('diagnostic')).toBe(true);
    expect(isRuleCategory('surgery')).toBe(false);
    expect(isRuleCategory(undefined)).toBe(false);
  });
});
