import { describe, it, expect, vi } from 'vitest';
import { ConfigurationError } from '../../utils/errors.js';
import { loadRuleTable, parseRuleTable, RulePath } from '../rule-path.js';

function createMockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('parseRuleTable', () => {
  it('should order categories canonically regardless of file order', () => {
    const table = parseRuleTable({
      categories: [
        { category: 'emergency', keywords: ['昏迷'] },
        { category: 'symptom', keywords: ['发热'] },
      ],
    });

    expect(table.map((entry) => entry.category)).toEqual(['symptom', 'emergency']);
  });

  it('should reject unknown or duplicate categories', () => {
    expect(() => parseRuleTable({ categories: [{ category: 'lifestyle', keywords: ['运动'] }] })).toThrow(
      'Unknown rule category: lifestyle'
    );
    expect(() =>
      parseRuleTable({
        categories: [
          { category: 'symptom', keywords: ['发热'] },
          { category: 'symptom', keywords: ['咳嗽'] },
        ],
      })
    ).toThrow(ConfigurationError);
  });

  it('should reject empty keywords', () => {
    expect(() => parseRuleTable({ categories: [{ category: 'symptom', keywords: [''] }] })).toThrow(
      'Rule category "symptom" needs non-empty string keywords'
    );
  });
});

describe('RulePath', () => {
  const table = loadRuleTable();

  it('should classify a symptom query', () => {
    const logger = createMockLogger();
    const path = new RulePath({ table, logger });

    expect(path.match('我发热了')).toEqual({
      evidence: [],
      category: 'symptom',
      matchedKeywords: ['发热'],
      emergencyKeywords: [],
    });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should let the first category in table order win', () => {
    const path = new RulePath({ table, logger: createMockLogger() });

    const match = path.match('感冒发热');

    expect(match.category).toBe('symptom');
    expect(match.matchedKeywords).toEqual(['发热']);
  });

  it('should flag emergencies with a warning', () => {
    const logger = createMockLogger();
    const path = new RulePath({ table, logger });

    const match = path.match('突然胸痛伴呼吸困难');

    expect(match).toEqual({
      evidence: [],
      category: 'emergency',
      matchedKeywords: ['胸痛', '呼吸困难'],
      emergencyKeywords: ['胸痛', '呼吸困难'],
    });
    expect(logger.warn).toHaveBeenCalledWith('Emergency keywords detected', {
      matchedKeywords: ['胸痛', '呼吸困难'],
    });
  });

  it('should report emergency keywords when an earlier category wins', () => {
    const logger = createMockLogger();
    const path = new RulePath({ table, logger });

    const overdose = path.match('吃了很多安眠药现在昏迷');
    const seizure = path.match('发热后抽搐意识不清');

    expect(overdose).toEqual({
      evidence: [],
      category: 'medication',
      matchedKeywords: ['药'],
      emergencyKeywords: ['昏迷'],
    });
    expect(seizure.category).toBe('symptom');
    expect(seizure.emergencyKeywords).toEqual(['抽搐', '意识不清']);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenLastCalledWith('Emergency keywords detected', {
      matchedKeywords: ['抽搐', '意识不清'],
    });
  });

  it('should report no category when nothing matches', () => {
    const path = new RulePath({ table, logger: createMockLogger() });

    expect(path.match('今天天气不错')).toEqual({
      evidence: [],
      category: null,
      matchedKeywords: [],
      emergencyKeywords: [],
    });
  });
});
