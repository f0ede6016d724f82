// packages/expr-mongo/src/lower.ts
// IR → aggregation-pipeline expressions. Aggregations and windows become
// temporaries (`__fb_acc_N`) filled by $group / $setWindowFields stages that
// run before the stage using them.
import { Long, type Document } from 'mongodb';
import {
  UnsupportedOperationError, containsAggregation, containsWindow, inferDtype,
  type Aggregation, type BinaryOp, type BooleanStrategy, type DType, type ExprNode, type HorizontalReduction,
  type Schema, type UnaryOp, type WindowFunction,
} from '@framebridge/core';

export type MongoExpr = Document | string;

const BACKEND = 'mongodb';
export const TEMP_PREFIX = '__fb_acc_';

/**
 * Where aggregations land: `group` fills the accumulators of a $group stage;
 * `window` adds a $setWindowFields stage over the given partition.
 */
export type AccScope = { kind: 'group' } | { kind: 'window'; partitionBy: readonly string[] };

export interface PipelineContext {
  schema: Schema;
  strategy: BooleanStrategy;
  scope: AccScope;
  /** $group accumulators (group scope) */
  accumulators: Document;
  /** $setWindowFields stages to run first (window scope, windows) */
  stages: Document[];
  /** temporaries to $unset afterwards */
  temps: string[];
}

export function newContext(schema: Schema, strategy: BooleanStrategy, scope: AccScope): PipelineContext {
  return { schema, strategy, scope, accumulators: {}, stages: [], temps: [] };
}

export function fieldRef(name: string): MongoExpr {
  if (name.includes('.') || name.startsWith('$')) {
    return { $getField: { field: { $literal: name }, input: '$$CURRENT' } };
  }
  return `$${name}`;
}

function literal(value: unknown): MongoExpr {
  if (typeof value === 'bigint') return { $literal: Long.fromBigInt(value) };
  return { $literal: value ?? null };
}

export function isNullExpr(x: MongoExpr): Document {
  return { $eq: [{ $ifNull: [x, null] }, null] };
}

function anyNull(xs: readonly MongoExpr[]): Document {
  return xs.length === 1 ? isNullExpr(xs[0]) : { $or: xs.map(isNullExpr) };
}

// ---------- temporaries ----------
function temp(ctx: PipelineContext): string {
  const name = `${TEMP_PREFIX}${ctx.temps.length}`;
  ctx.temps.push(name);
  return name;
}

function partitionSpec(keys: readonly string[]): Document {
  if (keys.length === 1) return { partitionBy: fieldRef(keys[0]) };
  if (keys.length === 0) return {};
  return { partitionBy: Object.fromEntries(keys.map(k => [k, fieldRef(k)])) };
}

function sortSpec(node: WindowFunction): Document {
  const dir = node.options.reverse ? -1 : 1;
  return { sortBy: Object.fromEntries(node.orderBy.map(c => [c, dir])) };
}

/** Register an accumulator in the current scope; returns a reference to its result. */
function accumulate(spec: Document, ctx: PipelineContext): string {
  const name = temp(ctx);
  if (ctx.scope.kind === 'group') {
    ctx.accumulators[name] = spec;
  } else {
    ctx.stages.push({ $setWindowFields: { ...partitionSpec(ctx.scope.partitionBy), output: { [name]: spec } } });
  }
  return `$${name}`;
}

function windowed(node: WindowFunction, spec: Document, ctx: PipelineContext): string {
  const name = temp(ctx);
  ctx.stages.push({
    $setWindowFields: { ...partitionSpec(node.partitionBy), ...sortSpec(node), output: { [name]: spec } },
  });
  return `$${name}`;
}

// ---------- booleans ----------
function kleene(op: 'and' | 'or', xs: readonly MongoExpr[]): Document {
  const dominant = op === 'and' ? false : true;
  return {
    $switch: {
      branches: [
        { case: { $in: [dominant, xs] }, then: dominant },
        { case: anyNull(xs), then: null },
      ],
      default: !dominant,
    },
  };
}

/** Comparison guarded for null operands: null when emulating, false otherwise. */
function guarded(x: Document, operands: readonly MongoExpr[], ctx: PipelineContext): Document {
  return { $cond: [anyNull(operands), ctx.strategy === 'upcast' ? null : false, x] };
}

// ---------- lowering ----------
function lowerUnary(node: UnaryOp, ctx: PipelineContext): MongoExpr {
  const x = lowerExpr(node.operand, ctx);
  switch (node.op) {
    case 'is_null': return isNullExpr(x);
    case 'is_not_null': return { $not: [isNullExpr(x)] };
    case 'not':
      return ctx.strategy === 'upcast' ? { $cond: [isNullExpr(x), null, { $not: [x] }] } : { $not: [x] };
    case 'is_nan': return guarded({ $eq: [x, { $literal: NaN }] }, [x], ctx);
    case 'negate': return { $multiply: [-1, x] };
    case 'abs': return { $abs: x };
    case 'sqrt': return { $cond: [isNullExpr(x), null, { $cond: [{ $lt: [x, 0] }, { $literal: NaN }, { $sqrt: x }] }] };
    case 'exp': return { $exp: x };
    case 'floor': return { $floor: x };
    case 'ceil': return { $ceil: x };
    case 'round': {
      // $round rounds half to even
      const f = Math.pow(10, node.arg ?? 0);
      const magnitude = { $divide: [{ $floor: { $add: [{ $multiply: [{ $abs: x }, f] }, 0.5] } }, f] };
      return { $cond: [isNullExpr(x), null, { $multiply: [{ $cond: [{ $lt: [x, 0] }, -1, 1] }, magnitude] }] };
    }
    case 'log': {
      const base = node.arg ?? Math.E;
      return {
        $switch: {
          branches: [
            { case: isNullExpr(x), then: null },
            { case: { $lt: [x, 0] }, then: { $literal: NaN } },
            { case: { $eq: [x, 0] }, then: { $literal: -Infinity } },
          ],
          default: base === Math.E ? { $ln: x } : { $log: [x, base] },
        },
      };
    }
  }
}

function lowerBinary(node: BinaryOp, ctx: PipelineContext): MongoExpr {
  const l = lowerExpr(node.left, ctx);
  const r = lowerExpr(node.right, ctx);
  const upcast = ctx.strategy === 'upcast';
  switch (node.op) {
    case 'eq':
    case 'neq':
    case 'lt':
    case 'lte':
    case 'gt':
    case 'gte':
      return guarded({ [`$${node.op === 'neq' ? 'ne' : node.op}`]: [l, r] }, [l, r], ctx);
    case 'and': return upcast ? kleene('and', [l, r]) : { $and: [l, r] };
    case 'or': return upcast ? kleene('or', [l, r]) : { $or: [l, r] };
    case 'xor': {
      const truthy = (x: MongoExpr) => ({ $eq: [x, true] });
      return upcast ? { $cond: [anyNull([l, r]), null, { $ne: [l, r] }] } : { $ne: [truthy(l), truthy(r)] };
    }
    case 'add': {
      const lt = inferDtype(node.left, ctx.schema);
      return lt.kind === 'string' ? { $concat: [l, r] } : { $add: [l, r] };
    }
    case 'sub': return { $subtract: [l, r] };
    case 'mul': return { $multiply: [l, r] };
    case 'pow': return { $pow: [l, r] };
    case 'div': return { $cond: [{ $eq: [r, 0] }, null, { $divide: [l, r] }] };
    case 'floor_div': return { $cond: [{ $eq: [r, 0] }, null, { $floor: { $divide: [l, r] } }] };
    case 'mod':
      return { $cond: [{ $eq: [r, 0] }, null, { $subtract: [l, { $multiply: [r, { $floor: { $divide: [l, r] } }] }] }] };
  }
}

function lowerAggregation(node: Aggregation, ctx: PipelineContext): MongoExpr {
  const x = lowerExpr(node.operand, ctx);
  const present = { $cond: [isNullExpr(x), 0, 1] };
  switch (node.fn) {
    case 'sum': {
      // $sum of no values is 0; count them so the empty case comes out null
      const total = accumulate({ $sum: x }, ctx);
      const n = accumulate({ $sum: present }, ctx);
      return { $cond: [{ $eq: [n, 0] }, null, total] };
    }
    case 'mean': return accumulate({ $avg: x }, ctx);
    case 'min': return accumulate({ $min: x }, ctx);
    case 'max': return accumulate({ $max: x }, ctx);
    case 'count': return accumulate({ $sum: present }, ctx);
    case 'len': return accumulate({ $sum: 1 }, ctx);
    case 'null_count': return accumulate({ $sum: { $cond: [isNullExpr(x), 1, 0] } }, ctx);
    case 'n_unique': return { $size: accumulate({ $addToSet: { $ifNull: [x, null] } }, ctx) };
    case 'any': return { $ifNull: [accumulate({ $max: x }, ctx), false] };
    case 'all': return { $ifNull: [accumulate({ $min: x }, ctx), true] };
    case 'std':
    case 'var': {
      if (node.ddof !== 0 && node.ddof !== 1) {
        throw new UnsupportedOperationError(`aggregation:${node.fn}`, BACKEND, `ddof=${node.ddof} (only 0 and 1)`);
      }
      const std = accumulate({ [node.ddof === 1 ? '$stdDevSamp' : '$stdDevPop']: x }, ctx);
      return node.fn === 'std' ? std : { $pow: [std, 2] };
    }
    case 'median':
      throw new UnsupportedOperationError('aggregation:median', BACKEND);
  }
}

function lowerWindow(node: WindowFunction, ctx: PipelineContext): MongoExpr {
  if (node.fn === 'over') {
    return lowerExpr(node.operand, { ...ctx, scope: { kind: 'window', partitionBy: node.partitionBy } });
  }
  if (containsAggregation(node.operand) || containsWindow(node.operand)) {
    throw new UnsupportedOperationError(`window:${node.fn}`, BACKEND, 'the operand of an order-dependent window must be elementwise');
  }
  const x = lowerExpr(node.operand, ctx);
  const running = { window: { documents: ['unbounded', 'current'] } };
  const keepNull = (ref: MongoExpr) => ({ $cond: [isNullExpr(x), null, ref] });
  switch (node.fn) {
    case 'cum_sum': return keepNull(windowed(node, { $sum: x, ...running }, ctx));
    case 'cum_min': return keepNull(windowed(node, { $min: x, ...running }, ctx));
    case 'cum_max': return keepNull(windowed(node, { $max: x, ...running }, ctx));
    case 'cum_count': return windowed(node, { $sum: { $cond: [isNullExpr(x), 0, 1] }, ...running }, ctx);
    case 'shift': return windowed(node, { $shift: { output: x, by: -(node.options.n ?? 1), default: null } }, ctx);
    default:
      throw new UnsupportedOperationError(`window:${node.fn}`, BACKEND);
  }
}

function lowerHorizontal(node: HorizontalReduction, ctx: PipelineContext): MongoExpr {
  const xs = node.operands.map(o => lowerExpr(o, ctx));
  const nonNull = { $filter: { input: xs, cond: { $ne: ['$$this', null] } } };
  switch (node.fn) {
    case 'sum':
      return node.ignoreNulls ? { $sum: xs } : { $cond: [anyNull(xs), null, { $add: xs }] };
    case 'min':
      return node.ignoreNulls ? { $min: xs } : { $cond: [anyNull(xs), null, { $min: xs }] };
    case 'max':
      return node.ignoreNulls ? { $max: xs } : { $cond: [anyNull(xs), null, { $max: xs }] };
    case 'any':
      if (node.ignoreNulls || ctx.strategy !== 'upcast') return { $anyElementTrue: [xs] };
      return kleene('or', xs);
    case 'all':
      if (node.ignoreNulls) return { $allElementsTrue: [nonNull] };
      if (ctx.strategy !== 'upcast') return { $allElementsTrue: [xs] };
      return kleene('and', xs);
  }
}

function lowerCast(target: DType, x: MongoExpr): MongoExpr {
  switch (target.kind) {
    case 'int': return target.bits === 64 ? { $toLong: x } : { $toInt: x };
    case 'float': return { $toDouble: x };
    case 'decimal': return { $toDecimal: x };
    case 'boolean': return { $toBool: x };
    case 'string':
    case 'categorical':
    case 'enum':
      return { $toString: x };
    case 'date':
    case 'datetime':
      return { $toDate: x };
    default:
      throw new UnsupportedOperationError('cast', BACKEND, `no conversion to ${target.kind}`);
  }
}

/** Post-order lowering of one (naming-free) tree. */
export function lowerExpr(node: ExprNode, ctx: PipelineContext): MongoExpr {
  switch (node.kind) {
    case 'column':
      ctx.schema.get(node.name);
      return fieldRef(node.name);
    case 'literal': return literal(node.value);
    case 'alias':
    case 'name':
      return lowerExpr(node.operand, ctx);
    case 'unary': return lowerUnary(node, ctx);
    case 'binary': return lowerBinary(node, ctx);
    case 'aggregation': return lowerAggregation(node, ctx);
    case 'window': return lowerWindow(node, ctx);
    case 'horizontal': return lowerHorizontal(node, ctx);
    case 'cast': return lowerCast(node.dtype, lowerExpr(node.operand, ctx));
    case 'fill_null': return { $ifNull: [lowerExpr(node.operand, ctx), lowerExpr(node.value, ctx)] };
    case 'when':
      return {
        $cond: [
          { $eq: [lowerExpr(node.condition, ctx), true] },
          lowerExpr(node.then, ctx),
          lowerExpr(node.otherwise, ctx),
        ],
      };
    case 'columns':
    case 'all':
      throw new UnsupportedOperationError(node.kind, BACKEND, 'multi-column selectors must be expanded first');
  }
}
