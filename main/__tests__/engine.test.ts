import { describe, it, expect } from 'vitest';
import { defaultConfig } from '../config';
import { DiffEngine } from '../diff/engine';
import { ResourceLimitExceeded } from '../errors';

describe('DiffEngine', () => {
  const engine = new DiffEngine({ maxInputLength: 100 });

  it('should assemble a complete result', () => {
    const result = engine.compare('kitten', 'sitting');

    expect(result.previewA).toBe('kitten');
    expect(result.previewB).toBe('sitting');
    expect(result.granularity).toBe('char');
    expect(result.similarity).toBe(0.6154);
    expect(result.segments).toHaveLength(5);
    expect(result.summary).toEqual({
      insertions: 3,
      deletions: 2,
      replacements: 2,
      unchangedChars: 4,
      totalChanges: 5,
    });
    expect(result.html).toContain('itt');
  });

  it('should truncate long previews', () => {
    const result = engine.compare('a'.repeat(60), 'b');

    expect(result.previewA).toBe(`${'a'.repeat(50)}...`);
    expect(result.previewB).toBe('b');
  });

  it('should compare line by line on request', () => {
    const result = engine.compare('a\nb\n', 'a\nc\n', 'line');

    expect(result.granularity).toBe('line');
    expect(result.similarity).toBe(0.5);
    expect(result.segments.map((segment) => segment.kind)).toEqual(['equal', 'replace']);
  });

  it('should return one equal segment for identical text', () => {
    const result = engine.compare('same', 'same');

    expect(result.segments).toEqual([
      { kind: 'equal', original: 'same', modified: 'same', startPos: 0, endPos: 4 },
    ]);
    expect(result.similarity).toBe(1);
  });

  describe('input limit', () => {
    const limited = new DiffEngine({ maxInputLength: 10 });

    it('should reject text over the limit', () => {
      expect(() => limited.compare('x'.repeat(11), 'y')).toThrow(ResourceLimitExceeded);
    });

    it('should report which side is over and by how much', () => {
      try {
        limited.compare('ok', 'y'.repeat(12));
        expect.unreachable('compare should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ResourceLimitExceeded);
        if (error instanceof ResourceLimitExceeded) {
          expect(error.code).toBe('RESOURCE_LIMIT_EXCEEDED');
          expect(error.message).toBe('Text B is 12 characters; the limit is 10');
          expect(error.details).toEqual({ side: 'b', length: 12, limit: 10 });
        }
      }
    });

    it('should measure the limit in code points', () => {
      const result = limited.compare('😀'.repeat(10), '😀');

      expect(result.summary.unchangedChars).toBe(1);
      expect(result.summary.deletions).toBe(9);
    });

    it('should accept text exactly at the limit', () => {
      expect(limited.compare('x'.repeat(10), 'x'.repeat(10)).similarity).toBe(1);
    });
  });

  describe('at the default input limit', () => {
    const limit = defaultConfig.maxCompareLength;
    const limited = new DiffEngine({ maxInputLength: limit });
    const words = ['the', 'quick', 'revision', 'of', 'a', 'document', 'changes', 'each', 'line', 'and', 'word'];

    function prose(length: number): string {
      let seed = 7;
      let text = '';
      while (text.length < length) {
        seed = (seed * 75 + 74) % 65537;
        text += `${words[seed % words.length]} `;
      }
      return text.slice(0, length);
    }

    it('should align alternating text against its shifted copy in bounded time', () => {
      const textA = 'ab'.repeat(limit / 2);
      const textB = 'ba'.repeat(limit / 2);

      const startTime = performance.now();
      const result = limited.compare(textA, textB);
      const elapsed = performance.now() - startTime;

      expect(result.summary.unchangedChars).toBe(limit - 1);
      expect(result.summary.totalChanges).toBe(2);
      expect(elapsed).toBeLessThan(5000);
    }, 30_000);

    it('should align prose against its reverse in bounded time', () => {
      const textA = prose(limit);
      const textB = Array.from(textA).reverse().join('');

      const startTime = performance.now();
      const result = limited.compare(textA, textB);
      const elapsed = performance.now() - startTime;

      expect(result.segments.map((segment) => segment.original).join('')).toBe(textA);
      expect(result.segments.map((segment) => segment.modified).join('')).toBe(textB);
      expect(elapsed).toBeLessThan(5000);
    }, 30_000);
  });
});
