// packages/expr-arrow/src/kernels.ts
// Eager evaluation of IR trees over JS values read from Arrow vectors.
import {
  InvalidOperationError, compareValues, divide, floorDivide, floorMod, inferDtype, isMissing, kleeneAnd, kleeneOr,
  referenceAggregate, referenceHorizontal, millisToTicks, safeInteger, strictNot, strictXor, ticksToMillis,
  type BinaryOp, type DType, type ExprNode, type Tri, type UnaryOp, type WindowFunction, type WindowOptions,
} from '@framebridge/core';
import { groupRows, keyOf, orderRows, type FrameData } from './frame-data';

/** A computed column: one value per row, or a single value when `scalar`. */
export interface Col {
  values: unknown[];
  scalar: boolean;
}

const scalarCol = (v: unknown): Col => ({ values: [v], scalar: true });

export function broadcast(col: Col, length: number): unknown[] {
  return col.scalar ? new Array<unknown>(length).fill(col.values[0]) : col.values;
}

function num(v: unknown): number {
  if (typeof v === 'number') return v;
  if (typeof v === 'boolean') return v ? 1 : 0;
  if (v instanceof Date) return v.getTime();
  return Number(v);
}

function tri(v: unknown): Tri {
  return isMissing(v) ? null : v === true;
}

function zip(l: Col, r: Col, length: number, fn: (a: unknown, b: unknown) => unknown): Col {
  if (l.scalar && r.scalar) return scalarCol(fn(l.values[0], r.values[0]));
  const a = broadcast(l, length);
  const b = broadcast(r, length);
  return { values: a.map((x, i) => fn(x, b[i])), scalar: false };
}

function mapCol(c: Col, fn: (v: unknown) => unknown): Col {
  return { values: c.values.map(fn), scalar: c.scalar };
}

// ---------- elementwise ----------
function unary(node: UnaryOp, c: Col): Col {
  switch (node.op) {
    case 'is_null': return mapCol(c, isMissing);
    case 'is_not_null': return mapCol(c, v => !isMissing(v));
    case 'not': return mapCol(c, v => strictNot(tri(v)));
    default:
      break;
  }
  return mapCol(c, v => {
    if (isMissing(v)) return null;
    const x = num(v);
    switch (node.op) {
      case 'negate': return -x;
      case 'is_nan': return Number.isNaN(x);
      case 'abs': return Math.abs(x);
      case 'sqrt': return Math.sqrt(x);
      case 'exp': return Math.exp(x);
      case 'floor': return Math.floor(x);
      case 'ceil': return Math.ceil(x);
      case 'round': return roundHalfAway(x, node.arg ?? 0);
      case 'log': return Math.log(x) / Math.log(node.arg ?? Math.E);
    }
    return null;
  });
}

function roundHalfAway(x: number, decimals: number): number {
  if (!Number.isFinite(x)) return x;
  const f = Math.pow(10, decimals);
  const r = Math.round(Math.abs(x) * f) / f;
  return x < 0 && r !== 0 ? -r : r;
}

function compare(op: BinaryOp['op'], a: unknown, b: unknown): Tri {
  if (isMissing(a) || isMissing(b)) return null;
  const c = compareValues(a, b);
  switch (op) {
    case 'eq': return c === 0;
    case 'neq': return c !== 0;
    case 'lt': return c < 0;
    case 'lte': return c <= 0;
    case 'gt': return c > 0;
    case 'gte': return c >= 0;
  }
  return null;
}

function arithmetic(op: BinaryOp['op'], a: unknown, b: unknown): unknown {
  if (isMissing(a) || isMissing(b)) return null;
  if (op === 'add' && typeof a === 'string' && typeof b === 'string') return a + b;
  const x = num(a);
  const y = num(b);
  // instant ± duration stays an instant; instant - instant is a duration
  const instant = (a instanceof Date) !== (b instanceof Date);
  switch (op) {
    case 'add': return instant ? new Date(x + y) : x + y;
    case 'sub': return instant ? new Date(x - y) : x - y;
    case 'mul': return x * y;
    case 'div': return divide(x, y);
    case 'floor_div': return floorDivide(x, y);
    case 'mod': return floorMod(x, y);
    case 'pow': return Math.pow(x, y);
  }
  return null;
}

function binary(node: BinaryOp, l: Col, r: Col, length: number): Col {
  switch (node.op) {
    case 'and': return zip(l, r, length, (a, b) => kleeneAnd(tri(a), tri(b)));
    case 'or': return zip(l, r, length, (a, b) => kleeneOr(tri(a), tri(b)));
    case 'xor': return zip(l, r, length, (a, b) => strictXor(tri(a), tri(b)));
    case 'eq':
    case 'neq':
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
      return zip(l, r, length, (a, b) => compare(node.op, a, b));
    default:
      return zip(l, r, length, (a, b) => arithmetic(node.op, a, b));
  }
}

/** Durations are carried as milliseconds; integers cast to or from one count ticks of its unit. */
function castValue(v: unknown, dtype: DType, from: DType): unknown {
  if (isMissing(v)) return null;
  switch (dtype.kind) {
    case 'int': {
      const x = from.kind === 'duration' ? millisToTicks(num(v), from.unit) : num(v);
      return Number.isFinite(x) ? Math.trunc(x) : null;
    }
    case 'duration':
      return from.kind === 'duration' ? num(v) : ticksToMillis(num(v), dtype.unit);
    case 'float':
    case 'decimal':
      return num(v);
    case 'boolean':
      return typeof v === 'string' ? v === 'true' : num(v) !== 0;
    case 'string':
    case 'categorical':
    case 'enum':
      return v instanceof Date ? v.toISOString() : String(v);
    case 'date':
    case 'datetime':
      return v instanceof Date ? v : new Date(typeof v === 'string' ? v : num(v));
    default:
      return v;
  }
}

// ---------- windows ----------
/** Running fold over non-null values; null positions stay null. */
function cumulative(values: readonly unknown[], step: (acc: unknown, v: unknown) => unknown): unknown[] {
  const out: unknown[] = new Array(values.length);
  let acc: unknown = null;
  values.forEach((v, i) => {
    if (isMissing(v)) {
      out[i] = null;
      return;
    }
    acc = isMissing(acc) ? step(null, v) : step(acc, v);
    out[i] = acc;
  });
  return out;
}

function rank(values: readonly unknown[], opts: WindowOptions): unknown[] {
  const method = opts.method ?? 'average';
  const present = values.map((_, i) => i).filter(i => !isMissing(values[i]));
  const sorted = [...present].sort((x, y) => {
    const c = compareValues(values[x], values[y]);
    return opts.descending ? -c : c;
  });
  const out: unknown[] = new Array(values.length).fill(null);
  let dense = 0;
  for (let start = 0; start < sorted.length;) {
    let end = start;
    while (end + 1 < sorted.length && compareValues(values[sorted[end + 1]], values[sorted[start]]) === 0) end++;
    dense++;
    for (let k = start; k <= end; k++) {
      switch (method) {
        case 'average': out[sorted[k]] = (start + end) / 2 + 1; break;
        case 'min': out[sorted[k]] = start + 1; break;
        case 'max': out[sorted[k]] = end + 1; break;
        case 'dense': out[sorted[k]] = dense; break;
        case 'ordinal': out[sorted[k]] = k + 1; break;
      }
    }
    start = end + 1;
  }
  return out;
}

type RollingStat = 'sum' | 'mean' | 'var' | 'std';

function rolling(values: readonly unknown[], opts: WindowOptions, stat: RollingStat): unknown[] {
  const size = opts.windowSize ?? 1;
  const minSamples = opts.minSamples ?? size;
  const ddof = opts.ddof ?? 1;
  return values.map((_, i) => {
    const start = opts.center ? i - Math.floor(size / 2) : i - size + 1;
    const window: number[] = [];
    for (let k = Math.max(0, start); k <= Math.min(values.length - 1, start + size - 1); k++) {
      if (!isMissing(values[k])) window.push(num(values[k]));
    }
    if (window.length === 0 || window.length < minSamples) return null;
    const total = window.reduce((s, x) => s + x, 0);
    if (stat === 'sum') return total;
    const mean = total / window.length;
    if (stat === 'mean') return mean;
    if (window.length <= ddof) return null;
    const variance = window.reduce((s, x) => s + (x - mean) * (x - mean), 0) / (window.length - ddof);
    return stat === 'var' ? variance : Math.sqrt(variance);
  });
}

/** True where the value occurs once in the partition; null counts as a value. */
function uniqueFlags(values: readonly unknown[]): boolean[] {
  const counts = new Map<string, number>();
  const keys = values.map(keyOf);
  keys.forEach(k => counts.set(k, (counts.get(k) ?? 0) + 1));
  return keys.map(k => counts.get(k) === 1);
}

/** True at the first occurrence of each value, in partition order. */
function firstFlags(values: readonly unknown[]): boolean[] {
  const seen = new Set<string>();
  return values.map(v => {
    const k = keyOf(v);
    if (seen.has(k)) return false;
    seen.add(k);
    return true;
  });
}

/** Apply an order-dependent window function to one (already ordered) partition. */
function applyWindow(node: WindowFunction, values: readonly unknown[]): unknown[] {
  const opts = node.options;
  const seq = opts.reverse ? [...values].reverse() : values;
  let out: unknown[] = [];
  switch (node.fn) {
    case 'over': return [...values];
    case 'cum_sum': out = cumulative(seq, (acc, v) => num(acc ?? 0) + num(v)); break;
    case 'cum_prod': out = cumulative(seq, (acc, v) => num(acc ?? 1) * num(v)); break;
    case 'cum_min': out = cumulative(seq, (acc, v) => (isMissing(acc) || compareValues(v, acc) < 0 ? v : acc)); break;
    case 'cum_max': out = cumulative(seq, (acc, v) => (isMissing(acc) || compareValues(v, acc) > 0 ? v : acc)); break;
    case 'cum_count': {
      let n = 0;
      out = seq.map(v => (isMissing(v) ? n : ++n));
      break;
    }
    case 'shift': {
      const n = opts.n ?? 1;
      return values.map((_, i) => (i - n >= 0 && i - n < values.length ? values[i - n] : null));
    }
    case 'diff': {
      const n = opts.n ?? 1;
      return values.map((v, i) => {
        const prev = i - n >= 0 && i - n < values.length ? values[i - n] : null;
        return isMissing(v) || isMissing(prev) ? null : num(v) - num(prev);
      });
    }
    case 'rank': return rank(values, opts);
    case 'rolling_sum': return rolling(values, opts, 'sum');
    case 'rolling_mean': return rolling(values, opts, 'mean');
    case 'rolling_var': return rolling(values, opts, 'var');
    case 'rolling_std': return rolling(values, opts, 'std');
    case 'is_unique': return uniqueFlags(values);
    case 'is_first_distinct': return firstFlags(values);
    case 'is_last_distinct': return firstFlags([...values].reverse()).reverse();
  }
  return opts.reverse ? out.reverse() : out;
}

function window(node: WindowFunction, data: FrameData): Col {
  const length = data.length;
  const all = Array.from({ length }, (_, i) => i);
  const partitions = node.partitionBy.length
    ? groupRows(node.partitionBy.map(c => data.column(c)), length)
    : [all];
  const orderCols = node.orderBy.map(c => data.column(c));
  const out: unknown[] = new Array(length).fill(null);
  for (const rows of partitions) {
    const ordered = orderCols.length ? orderRows(rows, orderCols) : rows;
    const part = evaluate(node.operand, data.subset(ordered));
    const result = applyWindow(node, broadcast(part, ordered.length));
    ordered.forEach((row, k) => { out[row] = result[k]; });
  }
  return { values: out, scalar: false };
}

// ---------- entry ----------
/**
 * Post-order evaluation of one tree. Aggregations reduce `data` (a whole
 * frame or one group) to a scalar; windows evaluate their operand per
 * partition and scatter the results back to row positions.
 */
export function evaluate(node: ExprNode, data: FrameData): Col {
  const length = data.length;
  switch (node.kind) {
    case 'column': return { values: data.column(node.name), scalar: false };
    case 'literal': return scalarCol(typeof node.value === 'bigint' ? safeInteger(node.value, 'arrow') : node.value);
    case 'alias':
    case 'name':
      return evaluate(node.operand, data);
    case 'unary': return unary(node, evaluate(node.operand, data));
    case 'binary': return binary(node, evaluate(node.left, data), evaluate(node.right, data), length);
    case 'cast': {
      const from = inferDtype(node.operand, data.schema);
      return mapCol(evaluate(node.operand, data), v => castValue(v, node.dtype, from));
    }
    case 'fill_null':
      return zip(evaluate(node.operand, data), evaluate(node.value, data), length, (v, f) => (isMissing(v) ? f : v));
    case 'when': {
      const cond = evaluate(node.condition, data);
      const then = evaluate(node.then, data);
      const otherwise = evaluate(node.otherwise, data);
      if (cond.scalar && then.scalar && otherwise.scalar) {
        return scalarCol(cond.values[0] === true ? then.values[0] : otherwise.values[0]);
      }
      const c = broadcast(cond, length);
      const t = broadcast(then, length);
      const o = broadcast(otherwise, length);
      return { values: c.map((v, i) => (v === true ? t[i] : o[i])), scalar: false };
    }
    case 'aggregation': {
      const operand = evaluate(node.operand, data);
      return scalarCol(referenceAggregate(node.fn, broadcast(operand, length), { ddof: node.ddof }));
    }
    case 'window': return window(node, data);
    case 'horizontal': {
      const cols = node.operands.map(o => evaluate(o, data));
      if (cols.every(c => c.scalar)) {
        return scalarCol(referenceHorizontal(node.fn, cols.map(c => c.values[0]), node.ignoreNulls));
      }
      const rows = cols.map(c => broadcast(c, length));
      return {
        values: Array.from({ length }, (_, i) => referenceHorizontal(node.fn, rows.map(r => r[i]), node.ignoreNulls)),
        scalar: false,
      };
    }
    case 'columns':
    case 'all':
      throw new InvalidOperationError('Multi-column selectors must be expanded before evaluation');
  }
}
