import { describe, it, expect } from 'vitest';
import type { EvidenceItem } from '@medrag/shared-types';
import { contentHash, fuseEvidence } from '../fusion.js';

function item(origin: EvidenceItem['origin'], content: string, score: number | null): EvidenceItem {
  return { origin, content, score, metadata: {} };
}

describe('contentHash', () => {
  it('should be the hex SHA-256 of the content', () => {
    expect(contentHash('abc')).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });
});

describe('fuseEvidence', () => {
  it('should keep the first occurrence in path priority order', () => {
    const vectorA = item('vector', '感冒', 0.9);
    const lexicalA = item('lexical', '感冒', 4.2);
    const lexicalB = item('lexical', '流感', 2.1);
    const ruleC = item('rule', '发热处理', null);

    const fused = fuseEvidence([vectorA], [lexicalA, lexicalB], [ruleC]);

    expect(fused).toEqual([vectorA, lexicalB, ruleC]);
    expect(fused[0]).toBe(vectorA);
  });

  it('should collapse duplicates within a single path', () => {
    const first = item('lexical', '咳嗽', 1);

    expect(fuseEvidence([first, item('lexical', '咳嗽', 2)], [], [])).toEqual([first]);
  });

  it('should never grow beyond its inputs and keep hashes unique', () => {
    const lists = [
      [item('vector', 'a', 0.8), item('vector', 'b', 0.75)],
      [item('lexical', 'b', 3), item('lexical', 'c', 1)],
      [],
    ];

    const fused = fuseEvidence(...lists);
    const hashes = fused.map((e) => contentHash(e.content));

    expect(fused.length).toBeLessThanOrEqual(4);
    expect(new Set(hashes).size).toBe(fused.length);
    expect(fused.map((e) => e.content)).toEqual(['a', 'b', 'c']);
  });

  it('should return an empty list for empty inputs', () => {
    expect(fuseEvidence([], [], [])).toEqual([]);
  });
});
