import { describe, it, expect } from 'vitest';
import { lengthsCanMatch, similarityRatio } from './similarity';

describe('similarityRatio', () => {
  it('scores identical strings 100', () => {
    expect(similarityRatio('google', 'google')).toBe(100);
    expect(similarityRatio('', '')).toBe(100);
  });

  it('scores disjoint strings 0', () => {
    expect(similarityRatio('abc', '')).toBe(0);
    expect(similarityRatio('abc', 'xyz')).toBe(0);
  });

  it('uses twice the common subsequence over the total length', () => {
    // LCS "gogle" = 5 of 6 + 5 characters
    expect(similarityRatio('google', 'gogle')).toBeCloseTo(1000 / 11, 6);
    // LCS "ittn" = 4 of 6 + 7 characters
    expect(similarityRatio('kitten', 'sitting')).toBeCloseTo(800 / 13, 6);
  });

  it('is symmetric', () => {
    expect(similarityRatio('acme labs', 'acme lab')).toBe(similarityRatio('acme lab', 'acme labs'));
  });

  it('counts code points rather than UTF-16 units', () => {
    expect(similarityRatio('caf\u{1d11e}', 'caf')).toBeCloseTo(600 / 7, 6);
  });
});

describe('lengthsCanMatch', () => {
  it('allows a gap within (1 - t/100) of the total length', () => {
    expect(lengthsCanMatch(10, 12, 90)).toBe(true);
    expect(lengthsCanMatch(10, 13, 90)).toBe(false);
    expect(lengthsCanMatch(0, 0, 90)).toBe(true);
  });

  it('never excludes a pair that reaches the threshold', () => {
    const pairs: Array<[string, string]> = [
      ['google', 'gogle'],
      ['microsoft', 'microsoftt'],
      ['acme', 'acme labs'],
    ];
    for (const threshold of [50, 70, 90]) {
      for (const [a, b] of pairs) {
        if (similarityRatio(a, b) >= threshold) {
          expect(lengthsCanMatch(a.length, b.length, threshold)).toBe(true);
        }
      }
    }
  });
});
