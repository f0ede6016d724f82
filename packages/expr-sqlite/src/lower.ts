// packages/expr-sqlite/src/lower.ts
// IR → SQL fragments, built with kysely's `sql` template so identifiers and
// literals are always quoted by the compiler.
import { sql, type RawBuilder } from 'kysely';
import {
  UnsupportedOperationError, containsAggregation, containsWindow, inferDtype, isInteger, isTemporal,
  type Aggregation, type BinaryOp, type DType, type ExprNode, type HorizontalReduction, type RankMethod, type Schema,
  type SemanticsNote, type WindowFunction,
} from '@framebridge/core';
import { castTarget } from './dtypes';

export type Fragment = RawBuilder<unknown>;

export interface LowerContext {
  schema: Schema;
  /**
   * OVER clause appended to aggregate calls. null means plain aggregates
   * (GROUP BY, or a projection that reduces to one row).
   */
  over: Fragment | null;
  /** notes raised while lowering (NaN literals, ...) */
  notes: SemanticsNote[];
}

const BACKEND = 'sqlite';

const COMPARISON_SQL: Partial<Record<BinaryOp['op'], string>> = {
  eq: '=', neq: '<>', lt: '<', lte: '<=', gt: '>', gte: '>=',
};

export function identifier(name: string): Fragment {
  return sql`${sql.id(name)}`;
}

function literal(value: unknown, ctx: LowerContext): Fragment {
  if (value === null || value === undefined) return sql`NULL`;
  if (typeof value === 'boolean') return sql.lit(value ? 1 : 0);
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      ctx.notes.push({ kind: 'nan-as-null', backend: BACKEND, feature: 'literal', message: 'sqlite cannot store NaN; NaN literals become NULL' });
      return sql`NULL`;
    }
    if (!Number.isFinite(value)) return sql.raw(value > 0 ? '9e999' : '-9e999');
    return sql.lit(value);
  }
  if (typeof value === 'bigint') return sql.lit(value);
  if (value instanceof Date) return sql.lit(value.toISOString());
  return sql.lit(String(value));
}

function isNullish(x: Fragment): Fragment {
  return sql`(${x} IS NULL)`;
}

// ---------- temporal ----------
// instants are stored as ISO-8601 text, durations as milliseconds
function isInstant(d: DType): boolean {
  return d.kind === 'date' || d.kind === 'datetime';
}

function epochMillis(x: Fragment): Fragment {
  return sql`ROUND(unixepoch(${x}, 'subsec') * 1000)`;
}

function shiftInstant(at: Fragment, millis: Fragment, negate: boolean, result: DType): Fragment {
  const seconds = negate ? sql`-(${millis}) / 1000.0` : sql`(${millis}) / 1000.0`;
  const modifier = sql`format('%+.3f seconds', ${seconds})`;
  const shifted = result.kind === 'date'
    ? sql`date(${at}, ${modifier})`
    : sql`strftime('%Y-%m-%dT%H:%M:%fZ', ${at}, ${modifier})`;
  // format() prints NULL as zero
  return sql`(CASE WHEN ${millis} IS NULL THEN NULL ELSE ${shifted} END)`;
}

function lowerTemporal(node: BinaryOp, l: Fragment, r: Fragment, lt: DType, rt: DType, ctx: LowerContext): Fragment {
  if (node.op === 'sub' && isInstant(lt) && isInstant(rt)) return sql`(${epochMillis(l)} - ${epochMillis(r)})`;
  if ((node.op === 'add' || node.op === 'sub') && isInstant(lt) && rt.kind === 'duration') {
    return shiftInstant(l, r, node.op === 'sub', inferDtype(node, ctx.schema));
  }
  if (node.op === 'add' && lt.kind === 'duration' && isInstant(rt)) return shiftInstant(r, l, false, inferDtype(node, ctx.schema));
  if (lt.kind === 'duration' || rt.kind === 'duration') return lowerArithmetic(node, l, r, ctx);
  throw new UnsupportedOperationError(`binary:${node.op}`, BACKEND, `no SQL for ${lt.kind} ${node.op} ${rt.kind}`);
}

// ---------- windows ----------
function windowSpec(node: WindowFunction, order: Fragment | null, frame = ''): Fragment {
  const parts: Fragment[] = [];
  if (node.partitionBy.length) parts.push(sql`PARTITION BY ${sql.join(node.partitionBy.map(identifier))}`);
  if (order) parts.push(sql`ORDER BY ${order}`);
  if (frame) parts.push(sql.raw(frame));
  return parts.length ? sql`OVER (${sql.join(parts, sql` `)})` : sql`OVER ()`;
}

function orderByColumns(node: WindowFunction): Fragment | null {
  if (!node.orderBy.length) return null;
  const dir = node.options.reverse ? sql` DESC` : sql``;
  return sql.join(node.orderBy.map(c => sql`${identifier(c)}${dir}`));
}

function rankOf(method: RankMethod, spec: Fragment, tieSpec: Fragment): Fragment {
  switch (method) {
    case 'min': return sql`RANK() ${spec}`;
    case 'dense': return sql`DENSE_RANK() ${spec}`;
    case 'ordinal': return sql`ROW_NUMBER() ${spec}`;
    case 'max': return sql`(RANK() ${spec} + COUNT(*) ${tieSpec} - 1)`;
    case 'average': return sql`(RANK() ${spec} + (COUNT(*) ${tieSpec} - 1) / 2.0)`;
  }
}

function lowerRank(node: WindowFunction, x: Fragment): Fragment {
  const dir = node.options.descending ? sql` DESC` : sql``;
  // nulls sort after every value so they never take a rank
  const spec = windowSpec(node, sql`(${x} IS NULL), ${x}${dir}`);
  const tieSpec = sql`OVER (PARTITION BY ${sql.join([...node.partitionBy.map(identifier), x])})`;
  return sql`CASE WHEN ${x} IS NULL THEN NULL ELSE ${rankOf(node.options.method ?? 'average', spec, tieSpec)} END`;
}

function lowerWindow(node: WindowFunction, ctx: LowerContext): Fragment {
  if (node.fn === 'over') {
    return lowerNode(node.operand, { ...ctx, over: windowSpec(node, null) });
  }
  if (containsAggregation(node.operand) || containsWindow(node.operand)) {
    throw new UnsupportedOperationError(`window:${node.fn}`, BACKEND, 'the operand of an order-dependent window must be elementwise');
  }
  const x = lowerNode(node.operand, ctx);
  const order = orderByColumns(node);
  const running = windowSpec(node, order, 'ROWS BETWEEN UNBOUNDED PRECEDING AND CURRENT ROW');
  const keepNull = (agg: Fragment) => sql`CASE WHEN ${x} IS NULL THEN NULL ELSE ${agg} END`;
  const opts = node.options;
  switch (node.fn) {
    case 'cum_sum': return keepNull(sql`SUM(${x}) ${running}`);
    case 'cum_min': return keepNull(sql`MIN(${x}) ${running}`);
    case 'cum_max': return keepNull(sql`MAX(${x}) ${running}`);
    case 'cum_count': return sql`COUNT(${x}) ${running}`;
    case 'shift': {
      const n = opts.n ?? 1;
      const fn = n >= 0 ? sql`LAG` : sql`LEAD`;
      return sql`${fn}(${x}, ${sql.lit(Math.abs(n))}) ${windowSpec(node, order)}`;
    }
    case 'diff': {
      const n = opts.n ?? 1;
      const prev = sql`LAG(${x}, ${sql.lit(n)}) ${windowSpec(node, order)}`;
      return isInstant(inferDtype(node.operand, ctx.schema))
        ? sql`(${epochMillis(x)} - ${epochMillis(prev)})`
        : sql`(${x} - ${prev})`;
    }
    case 'rank': return lowerRank(node, x);
    case 'rolling_sum':
    case 'rolling_mean': {
      const size = opts.windowSize ?? 1;
      const before = opts.center ? Math.floor(size / 2) : size - 1;
      const after = size - 1 - before;
      const spec = windowSpec(node, order, `ROWS BETWEEN ${before} PRECEDING AND ${after} FOLLOWING`);
      const agg = node.fn === 'rolling_sum' ? sql`SUM(${x}) ${spec}` : sql`AVG(${x}) ${spec}`;
      return sql`CASE WHEN COUNT(${x}) ${spec} >= ${sql.lit(opts.minSamples ?? size)} THEN ${agg} END`;
    }
    case 'rolling_var':
    case 'rolling_std': {
      const size = opts.windowSize ?? 1;
      const before = opts.center ? Math.floor(size / 2) : size - 1;
      const after = size - 1 - before;
      const spec = windowSpec(node, order, `ROWS BETWEEN ${before} PRECEDING AND ${after} FOLLOWING`);
      const n = sql`COUNT(${x}) ${spec}`;
      const s = sql`SUM(${x}) ${spec}`;
      const ss = sql`SUM(${x} * ${x} * 1.0) ${spec}`;
      const ddof = sql.lit(opts.ddof ?? 1);
      const variance = sql`CASE WHEN ${n} >= ${sql.lit(opts.minSamples ?? size)} AND ${n} > ${ddof} THEN (${ss} - ${s} * ${s} * 1.0 / ${n}) / (${n} - ${ddof}) END`;
      return node.fn === 'rolling_var' ? variance : sql`sqrt(${variance})`;
    }
    case 'is_unique':
      return sql`(COUNT(*) OVER (PARTITION BY ${sql.join([...node.partitionBy.map(identifier), x])}) = 1)`;
    case 'is_first_distinct':
    case 'is_last_distinct': {
      const dir = node.fn === 'is_last_distinct' ? sql` DESC` : sql``;
      const ordered = sql.join(node.orderBy.map(c => sql`${identifier(c)}${dir}`));
      return sql`(ROW_NUMBER() OVER (PARTITION BY ${sql.join([...node.partitionBy.map(identifier), x])} ORDER BY ${ordered}) = 1)`;
    }
    default:
      throw new UnsupportedOperationError(`window:${node.fn}`, BACKEND);
  }
}

// ---------- aggregations ----------
function lowerAggregation(node: Aggregation, ctx: LowerContext): Fragment {
  const x = lowerNode(node.operand, { ...ctx, over: null });
  const over = ctx.over ? sql` ${ctx.over}` : sql``;
  if (ctx.over && node.fn === 'n_unique') {
    throw new UnsupportedOperationError('aggregation:n_unique', BACKEND, 'DISTINCT is not available in window functions');
  }
  const agg = (fn: Fragment) => sql`${fn}${over}`;
  switch (node.fn) {
    case 'sum': return agg(sql`SUM(${x})`);
    case 'mean': return agg(sql`AVG(${x})`);
    case 'min': return agg(sql`MIN(${x})`);
    case 'max': return agg(sql`MAX(${x})`);
    case 'count': return agg(sql`COUNT(${x})`);
    case 'len': return agg(sql`COUNT(*)`);
    case 'null_count': return sql`(${agg(sql`COUNT(*)`)} - ${agg(sql`COUNT(${x})`)})`;
    case 'n_unique': return sql`(COUNT(DISTINCT ${x}) + COALESCE(MAX(${x} IS NULL), 0))`;
    case 'any': return sql`COALESCE(${agg(sql`MAX(${x})`)}, 0)`;
    case 'all': return sql`COALESCE(${agg(sql`MIN(${x})`)}, 1)`;
    case 'var':
    case 'std': {
      const n = agg(sql`COUNT(${x})`);
      const s = agg(sql`SUM(${x})`);
      const ss = agg(sql`SUM(${x} * ${x} * 1.0)`);
      const ddof = sql.lit(node.ddof);
      const variance = sql`CASE WHEN ${n} - ${ddof} > 0 THEN (${ss} - ${s} * ${s} * 1.0 / ${n}) / (${n} - ${ddof}) END`;
      return node.fn === 'var' ? variance : sql`sqrt(${variance})`;
    }
    default:
      throw new UnsupportedOperationError(`aggregation:${node.fn}`, BACKEND);
  }
}

// ---------- row-wise ----------
function lowerHorizontal(node: HorizontalReduction, ctx: LowerContext): Fragment {
  const xs = node.operands.map(o => lowerNode(o, ctx));
  if (xs.length === 1 && (node.fn === 'min' || node.fn === 'max')) return xs[0];
  switch (node.fn) {
    case 'sum': {
      const terms = node.ignoreNulls ? xs.map(x => sql`COALESCE(${x}, 0)`) : xs;
      return sql`(${sql.join(terms, sql` + `)})`;
    }
    case 'any': {
      const terms = node.ignoreNulls ? xs.map(x => sql`COALESCE(${x}, 0)`) : xs;
      return sql`(${sql.join(terms, sql` OR `)})`;
    }
    case 'all': {
      const terms = node.ignoreNulls ? xs.map(x => sql`COALESCE(${x}, 1)`) : xs;
      return sql`(${sql.join(terms, sql` AND `)})`;
    }
    case 'min':
    case 'max': {
      const fn = node.fn === 'min' ? sql`MIN` : sql`MAX`;
      // multi-argument MIN/MAX is null as soon as one argument is: put every
      // other operand behind each one so only an all-null row stays null
      const args = node.ignoreNulls
        ? xs.map((x, i) => sql`COALESCE(${sql.join([x, ...xs.filter((_, k) => k !== i)])})`)
        : xs;
      return sql`${fn}(${sql.join(args)})`;
    }
  }
}

function lowerBinary(node: BinaryOp, ctx: LowerContext): Fragment {
  const l = lowerNode(node.left, ctx);
  const r = lowerNode(node.right, ctx);
  const cmp = COMPARISON_SQL[node.op];
  if (cmp) return sql`(${l} ${sql.raw(cmp)} ${r})`;
  switch (node.op) {
    case 'and': return sql`(${l} AND ${r})`;
    case 'or': return sql`(${l} OR ${r})`;
    case 'xor': return sql`(CASE WHEN ${l} IS NULL OR ${r} IS NULL THEN NULL ELSE ${l} <> ${r} END)`;
    default:
      break;
  }
  const lt = inferDtype(node.left, ctx.schema);
  const rt = inferDtype(node.right, ctx.schema);
  if (isTemporal(lt) || isTemporal(rt)) return lowerTemporal(node, l, r, lt, rt, ctx);
  if (node.op === 'add' && lt.kind === 'string' && rt.kind === 'string') return sql`(${l} || ${r})`;
  return lowerArithmetic(node, l, r, ctx);
}

function lowerArithmetic(node: BinaryOp, l: Fragment, r: Fragment, ctx: LowerContext): Fragment {
  const integral = isInteger(inferDtype(node, ctx.schema));
  const asInt = (f: Fragment) => (integral ? sql`CAST(${f} AS INTEGER)` : f);
  switch (node.op) {
    case 'add': return sql`(${l} + ${r})`;
    case 'sub': return sql`(${l} - ${r})`;
    case 'mul': return sql`(${l} * ${r})`;
    case 'div': return sql`(CAST(${l} AS REAL) / NULLIF(${r}, 0))`;
    case 'floor_div': return asInt(sql`floor(CAST(${l} AS REAL) / NULLIF(${r}, 0))`);
    case 'mod': return asInt(sql`(${l} - ${r} * floor(CAST(${l} AS REAL) / NULLIF(${r}, 0)))`);
    case 'pow': return asInt(sql`pow(${l}, ${r})`);
    default:
      throw new UnsupportedOperationError(`binary:${node.op}`, BACKEND);
  }
}

function lowerCast(target: DType, x: Fragment): Fragment {
  if (target.kind === 'boolean') return sql`(CASE WHEN ${x} IS NULL THEN NULL WHEN ${x} THEN 1 ELSE 0 END)`;
  const t = castTarget(target);
  if (!t) throw new UnsupportedOperationError('cast', BACKEND, `no SQLite storage class for ${target.kind}`);
  return sql`CAST(${x} AS ${sql.raw(t)})`;
}

/** Post-order lowering of one (naming-free) tree. */
export function lowerNode(node: ExprNode, ctx: LowerContext): Fragment {
  switch (node.kind) {
    case 'column':
      ctx.schema.get(node.name);
      return identifier(node.name);
    case 'literal': return literal(node.value, ctx);
    case 'alias':
    case 'name':
      return lowerNode(node.operand, ctx);
    case 'unary': {
      const x = lowerNode(node.operand, ctx);
      switch (node.op) {
        case 'negate': return sql`(-${x})`;
        case 'not': return sql`(NOT ${x})`;
        case 'is_null': return isNullish(x);
        case 'is_not_null': return sql`(${x} IS NOT NULL)`;
        // NaN cannot be stored, so no stored value is NaN
        case 'is_nan': return sql`(${x} <> ${x})`;
        case 'abs': return sql`abs(${x})`;
        case 'sqrt': return sql`sqrt(${x})`;
        case 'exp': return sql`exp(${x})`;
        case 'floor': return sql`floor(${x})`;
        case 'ceil': return sql`ceil(${x})`;
        case 'round': return sql`round(${x}, ${sql.lit(node.arg ?? 0)})`;
        case 'log': {
          // ln() is NULL at zero; the limit is -inf
          const ln = node.arg === undefined || node.arg === Math.E ? sql`ln(${x})` : sql`(ln(${x}) / ln(${sql.lit(node.arg)}))`;
          return sql`(CASE WHEN ${x} = 0 THEN -9e999 ELSE ${ln} END)`;
        }
      }
      throw new UnsupportedOperationError(`unary:${node.op}`, BACKEND);
    }
    case 'binary': return lowerBinary(node, ctx);
    case 'aggregation': return lowerAggregation(node, ctx);
    case 'window': return lowerWindow(node, ctx);
    case 'horizontal': return lowerHorizontal(node, ctx);
    case 'cast': return lowerCast(node.dtype, lowerNode(node.operand, ctx));
    case 'fill_null': return sql`COALESCE(${lowerNode(node.operand, ctx)}, ${lowerNode(node.value, ctx)})`;
    case 'when':
      return sql`(CASE WHEN ${lowerNode(node.condition, ctx)} THEN ${lowerNode(node.then, ctx)} ELSE ${lowerNode(node.otherwise, ctx)} END)`;
    case 'columns':
    case 'all':
      throw new UnsupportedOperationError(node.kind, BACKEND, 'multi-column selectors must be expanded first');
  }
}
