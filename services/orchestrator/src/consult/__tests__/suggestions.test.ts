import { describe, it, expect } from 'vitest';
import { extractSuggestions, toEvidencePreview } from '../suggestions.js';

describe('extractSuggestions', () => {
  it('should collect list lines with their prefixes removed', () => {
    const answer = [
      '根据您的描述，可能是普通感冒。',
      '1. 多喝水',
      '2. 注意休息',
      '- 监测体温',
      '• 如持续高热请就医',
      '普通说明文字',
      '3. ',
    ].join('\n');

    expect(extractSuggestions(answer)).toEqual(['多喝水', '注意休息', '监测体温', '如持续高热请就医']);
  });

  it('should return at most five suggestions', () => {
    const answer = ['1. 一', '2. 二', '3. 三', '4. 四', '5. 五', '6. 六'].join('\n');

    expect(extractSuggestions(answer)).toEqual(['一', '二', '三', '四', '五']);
  });

  it('should return nothing for unstructured answers', () => {
    expect(extractSuggestions('请多休息，必要时就医。')).toEqual([]);
  });
});

describe('toEvidencePreview', () => {
  it('should truncate long content to 200 characters', () => {
    const preview = toEvidencePreview({
      origin: 'vector',
      content: '热'.repeat(201),
      score: 0.8,
      metadata: { name: '发热' },
    });

    expect(preview).toEqual({ origin: 'vector', content: `${'热'.repeat(200)}...`, score: 0.8, metadata: { name: '发热' } });
  });

  it('should keep short content as is', () => {
    expect(toEvidencePreview({ origin: 'external', content: '短', score: null, metadata: {} }).content).toBe('短');
  });
});
