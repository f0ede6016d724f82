/* packages/core/test/semantics.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  fallbackAnd, fallbackCompare, fallbackNot, fallbackOr, fallbackXor,
  floorDivide, floorMod, divide, kleeneAnd, kleeneOr, strictNot, strictXor,
  referenceAggregate, referenceHorizontal,
} from '../src';

describe('Kleene logic', () => {
  it('and: false dominates, then null', () => {
    expect(kleeneAnd(true, true)).toBe(true);
    expect(kleeneAnd(true, false)).toBe(false);
    expect(kleeneAnd(true, null)).toBe(null);
    expect(kleeneAnd(false, false)).toBe(false);
    expect(kleeneAnd(false, null)).toBe(false);
    expect(kleeneAnd(null, null)).toBe(null);
  });

  it('or: true dominates, then null', () => {
    expect(kleeneOr(true, true)).toBe(true);
    expect(kleeneOr(true, false)).toBe(true);
    expect(kleeneOr(true, null)).toBe(true);
    expect(kleeneOr(false, false)).toBe(false);
    expect(kleeneOr(false, null)).toBe(null);
    expect(kleeneOr(null, null)).toBe(null);
  });

  it('xor and not propagate null strictly', () => {
    expect(strictXor(true, null)).toBe(null);
    expect(strictXor(true, false)).toBe(true);
    expect(strictXor(true, true)).toBe(false);
    expect(strictNot(null)).toBe(null);
    expect(strictNot(false)).toBe(true);
  });

  it('is commutative', () => {
    const vals = [true, false, null];
    for (const a of vals) for (const b of vals) {
      expect(kleeneAnd(a, b)).toBe(kleeneAnd(b, a));
      expect(kleeneOr(a, b)).toBe(kleeneOr(b, a));
    }
  });
});

describe('boolean fallback (null read as false)', () => {
  it('never returns null', () => {
    expect(fallbackAnd(true, null)).toBe(false);
    expect(fallbackOr(false, null)).toBe(false);
    expect(fallbackOr(null, null)).toBe(false);
    expect(fallbackXor(true, null)).toBe(true);
    expect(fallbackNot(null)).toBe(true);
    expect(fallbackCompare(null)).toBe(false);
  });
});

describe('arithmetic edge cases', () => {
  it('divides by zero into null', () => {
    expect(divide(1, 0)).toBe(null);
    expect(floorDivide(7, 0)).toBe(null);
    expect(floorMod(7, 0)).toBe(null);
  });

  it('uses floored division and modulo', () => {
    expect(floorDivide(-7, 2)).toBe(-4);
    expect(floorMod(-7, 2)).toBe(1);
    expect(floorMod(7, -2)).toBe(-1);
    expect(floorMod(6, 3)).toBe(0);
  });
});

describe('reference aggregations', () => {
  it('skips nulls and returns null on degenerate input', () => {
    expect(referenceAggregate('sum', [1, null, 2])).toBe(3);
    expect(referenceAggregate('sum', [null, null])).toBe(null);
    expect(referenceAggregate('mean', [])).toBe(null);
    expect(referenceAggregate('max', [null])).toBe(null);
    expect(referenceAggregate('count', [null, null])).toBe(0);
    expect(referenceAggregate('len', [null, null])).toBe(2);
    expect(referenceAggregate('null_count', [1, null, null])).toBe(2);
  });

  it('counts null as one distinct value', () => {
    expect(referenceAggregate('n_unique', [1, 1, null, 2, null])).toBe(3);
  });

  it('computes spread with ddof', () => {
    expect(referenceAggregate('var', [1, 2, 3, 4])).toBeCloseTo(5 / 3);
    expect(referenceAggregate('var', [1, 2, 3, 4], { ddof: 0 })).toBeCloseTo(1.25);
    expect(referenceAggregate('std', [5])).toBe(null);
    expect(referenceAggregate('median', [3, 1, 4, 2])).toBe(2.5);
  });

  it('any/all ignore nulls', () => {
    expect(referenceAggregate('any', [null, false])).toBe(false);
    expect(referenceAggregate('all', [null, true])).toBe(true);
    expect(referenceAggregate('all', [null])).toBe(true);
  });
});

describe('horizontal reductions', () => {
  it('Kleene row-wise any/all without ignoreNulls', () => {
    expect(referenceHorizontal('any', [false, null], false)).toBe(null);
    expect(referenceHorizontal('any', [true, null], false)).toBe(true);
    expect(referenceHorizontal('all', [true, null], false)).toBe(null);
    expect(referenceHorizontal('all', [false, null], false)).toBe(false);
  });

  it('drops nulls with ignoreNulls and yields identities on empty rows', () => {
    expect(referenceHorizontal('any', [false, null], true)).toBe(false);
    expect(referenceHorizontal('any', [null, null], true)).toBe(false);
    expect(referenceHorizontal('all', [null, null], true)).toBe(true);
    expect(referenceHorizontal('sum', [null, null], true)).toBe(0);
    expect(referenceHorizontal('min', [null, null], true)).toBe(null);
    expect(referenceHorizontal('max', [3, null, 7], true)).toBe(7);
  });

  it('propagates nulls through sum/min/max without ignoreNulls', () => {
    expect(referenceHorizontal('sum', [1, null], false)).toBe(null);
    expect(referenceHorizontal('sum', [1, 2.5], false)).toBe(3.5);
    expect(referenceHorizontal('min', [4, 2], false)).toBe(2);
  });
});
