// packages/core/src/semantics/reference.ts
// Reference evaluators: the answers every adapter has to reproduce.
import type { AggregationKind, HorizontalKind } from '../expr/nodes';
import { kleeneAnd, kleeneOr, type Tri } from './kleene';

export function isMissing(v: unknown): v is null | undefined {
  return v === null || v === undefined;
}

/** Order key for min/max/sort over mixed JS values. */
export function toComparable(v: unknown): number | string {
  if (typeof v === 'number') return v;
  if (typeof v === 'string') return v;
  if (typeof v === 'bigint') return Number(v);
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (v instanceof Date) return v.getTime();
  return String(v);
}

/** -1/0/1 with nulls first and NaN after every number. */
export function compareValues(a: unknown, b: unknown): number {
  if (isMissing(a)) return isMissing(b) ? 0 : -1;
  if (isMissing(b)) return 1;
  const x = toComparable(a);
  const y = toComparable(b);
  const xNaN = typeof x === 'number' && Number.isNaN(x);
  const yNaN = typeof y === 'number' && Number.isNaN(y);
  if (xNaN || yNaN) return xNaN === yNaN ? 0 : (xNaN ? 1 : -1);
  return x < y ? -1 : x > y ? 1 : 0;
}

function toNumber(v: unknown): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'bigint') return Number(v);
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (v instanceof Date) return v.getTime();
  return Number(v);
}

// ---------- scalar arithmetic (null in → null out, x/0 → null) ----------
export function divide(a: number, b: number): number | null {
  return b === 0 ? null : a / b;
}

export function floorDivide(a: number, b: number): number | null {
  return b === 0 ? null : Math.floor(a / b);
}

/** Floored modulo: the result takes the sign of the divisor. */
export function floorMod(a: number, b: number): number | null {
  if (b === 0) return null;
  const r = a % b;
  return r !== 0 && (r < 0) !== (b < 0) ? r + b : r;
}

// ---------- aggregations ----------
export interface AggregateOptions {
  ddof?: number;
}

function variance(nums: readonly number[], ddof: number): number | null {
  const n = nums.length;
  if (n - ddof <= 0) return null;
  const mean = nums.reduce((s, x) => s + x, 0) / n;
  const ss = nums.reduce((s, x) => s + (x - mean) * (x - mean), 0);
  return ss / (n - ddof);
}

/**
 * Nulls are skipped. sum/mean/min/max/median over no values are null;
 * count/len/n_unique/null_count never are; n_unique counts null once.
 */
export function referenceAggregate(kind: AggregationKind, values: readonly unknown[], opts: AggregateOptions = {}): unknown {
  const present = values.filter(v => !isMissing(v));
  switch (kind) {
    case 'len': return values.length;
    case 'count': return present.length;
    case 'null_count': return values.length - present.length;
    case 'n_unique': {
      const keys = new Set(values.map(v => (isMissing(v) ? null : v instanceof Date ? v.getTime() : v)));
      return keys.size;
    }
    case 'any': return present.some(v => v === true);
    case 'all': return present.every(v => v === true);
    case 'min':
    case 'max': {
      if (present.length === 0) return null;
      const notNaN = present.filter(v => !(typeof v === 'number' && Number.isNaN(v)));
      const pool = notNaN.length ? notNaN : present;
      let best = pool[0];
      for (const v of pool.slice(1)) {
        const c = compareValues(v, best);
        if (kind === 'min' ? c < 0 : c > 0) best = v;
      }
      return best;
    }
    default:
      break;
  }
  if (present.length === 0) return null;
  const nums = present.map(toNumber);
  switch (kind) {
    case 'sum': return nums.reduce((s, x) => s + x, 0);
    case 'mean': return nums.reduce((s, x) => s + x, 0) / nums.length;
    case 'median': {
      const sorted = [...nums].sort((a, b) => a - b);
      const mid = Math.floor(sorted.length / 2);
      return sorted.length % 2 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
    }
    case 'var': return variance(nums, opts.ddof ?? 1);
    case 'std': {
      const v = variance(nums, opts.ddof ?? 1);
      return v === null ? null : Math.sqrt(v);
    }
  }
  return null;
}

// ---------- horizontal reductions ----------
/**
 * Row-wise reduction. With ignoreNulls, nulls are dropped and an empty row
 * gives the identity (any → false, all → true, sum → 0, min/max → null).
 * Without it, any/all follow Kleene logic and sum/min/max are null as soon
 * as one operand is.
 */
export function referenceHorizontal(kind: HorizontalKind, row: readonly unknown[], ignoreNulls: boolean): unknown {
  if (kind === 'any' || kind === 'all') {
    const vals: Tri[] = row.map(v => (isMissing(v) ? null : v === true));
    if (ignoreNulls) {
      const present = vals.filter((v): v is boolean => v !== null);
      return kind === 'any' ? present.some(v => v) : present.every(v => v);
    }
    return kind === 'any' ? vals.reduce<Tri>(kleeneOr, false) : vals.reduce<Tri>(kleeneAnd, true);
  }
  if (!ignoreNulls && row.some(isMissing)) return null;
  const present = row.filter(v => !isMissing(v));
  if (kind === 'sum') return present.map(toNumber).reduce((s, x) => s + x, 0);
  return referenceAggregate(kind, present);
}
