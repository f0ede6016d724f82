/* tests/helpers.spec.ts */
import { describe, it, expect } from 'vitest';
import { rowsOf, sortedBy } from './helpers';

describe('test helpers', () => {
  it('turns columns into rows', () => {
    expect(rowsOf({ a: [1, 2], b: ['x', null] })).toEqual([{ a: 1, b: 'x' }, { a: 2, b: null }]);
    expect(rowsOf({})).toEqual([]);
  });

  it('sorts every column by one key, nulls first', () => {
    expect(sortedBy({ k: [3, null, 1], v: ['c', 'n', 'a'] }, 'k')).toEqual({ k: [null, 1, 3], v: ['n', 'a', 'c'] });
  });
});
