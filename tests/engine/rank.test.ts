import { describe, it, expect } from 'vitest';
import { dot, rank, compareScoresDesc } from '../../src/engine/rank.js';
import { DimensionMismatchError } from '../../src/errors.js';
import type { KeyedVector } from '../../src/types.js';

const v = (...xs: number[]) => new Float32Array(xs);

describe('dot', () => {
  it('multiplies component-wise and sums', () => {
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
  });

  it('throws on dimension mismatch', () => {
    expect(() => dot([1, 0], [1, 0, 0])).toThrow(DimensionMismatchError);
    expect(() => dot([1, 0], [1, 0, 0])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});

describe('rank', () => {
  it('orders candidates by descending similarity', () => {
    const candidates: KeyedVector[] = [
      ['c', v(-1, 0)],
      ['a', v(1, 0)],
      ['b', v(0, 1)],
    ];
    expect(rank(v(1, 0), candidates)).toEqual([
      { key: 'a', score: 1 },
      { key: 'b', score: 0 },
      { key: 'c', score: -1 },
    ]);
  });

  it('returns an empty list for no candidates', () => {
    expect(rank(v(1, 0), [])).toEqual([]);
  });

  it('keeps input order for identical scores', () => {
    const candidates: KeyedVector[] = [
      ['z', v(0, 1)],
      ['y', v(1, 0)],
      ['x', v(0, 1)],
      ['w', v(0, 1)],
    ];
    const first = rank(v(0, 1), candidates).map(r => r.key);
    expect(first).toEqual(['z', 'x', 'w', 'y']);
    expect(rank(v(0, 1), candidates).map(r => r.key)).toEqual(first);
  });

  it('does not normalize inputs', () => {
    const [hit] = rank(v(2, 0), [['a', v(3, 0)]]);
    expect(hit.score).toBe(6);
  });

  it('puts NaN scores last', () => {
    const result = rank(v(1, 0), [['nan', v(NaN, 0)], ['neg', v(-1, 0)], ['pos', v(1, 0)]]);
    expect(result.map(r => r.key)).toEqual(['pos', 'neg', 'nan']);
  });

  it('does not mutate the candidate list', () => {
    const candidates: KeyedVector[] = [['b', v(0, 1)], ['a', v(1, 0)]];
    rank(v(1, 0), candidates);
    expect(candidates.map(([k]) => k)).toEqual(['b', 'a']);
  });
});

describe('compareScoresDesc', () => {
  it('sorts higher first and treats equal as 0', () => {
    expect(compareScoresDesc(2, 1)).toBe(-1);
    expect(compareScoresDesc(1, 2)).toBe(1);
    expect(compareScoresDesc(1, 1)).toBe(0);
    expect(compareScoresDesc(NaN, NaN)).toBe(0);
    expect(compareScoresDesc(NaN, -5)).toBe(1);
  });
});
