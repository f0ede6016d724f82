// packages/core/src/expr/builder.ts
// Fluent sugar over the IR. Every method returns a new Expr wrapping a new node.
import type { DType } from '../dtypes';
import { InvalidOperationError } from '../errors';
import { encodeNode } from '../schemas';
import {
  aggregation, alias, allColumns, binaryOp, cast, columnRef, columns, fillNull, horizontal,
  literalOf, nameTransform, unaryOp, whenNode, windowFunction,
  type AggregationKind, type BinaryKind, type ExprNode, type HorizontalKind, type RankMethod,
  type Scalar, type UnaryKind, type WindowKind, type WindowOptions,
} from './nodes';

/** Operand of a binary operation: another expression or a plain value (strings are literals here). */
export type ExprLike = Expr | Scalar;
/** Item of select/with_columns: an expression or a column name. */
export type IntoExpr = Expr | string;

export function toNode(x: ExprLike): ExprNode {
  return x instanceof Expr ? x.node : literalOf(x);
}

function asExpr(x: ExprLike): Expr {
  return x instanceof Expr ? x : new Expr(literalOf(x));
}

export function intoNode(x: IntoExpr): ExprNode {
  return typeof x === 'string' ? columnRef(x) : x.node;
}

export interface OverOptions {
  orderBy?: string | readonly string[];
}

export interface RollingOptions {
  minSamples?: number;
  center?: boolean;
}

export interface RollingVarOptions extends RollingOptions {
  ddof?: number;
}

function asList(x: string | readonly string[] | undefined): string[] {
  if (x === undefined) return [];
  return typeof x === 'string' ? [x] : [...x];
}

class NameNamespace {
  constructor(private readonly expr: Expr) {}
  keep(): Expr { return new Expr(nameTransform(this.expr.node, 'keep')); }
  toUppercase(): Expr { return new Expr(nameTransform(this.expr.node, 'to_uppercase')); }
  toLowercase(): Expr { return new Expr(nameTransform(this.expr.node, 'to_lowercase')); }
  prefix(p: string): Expr { return new Expr(nameTransform(this.expr.node, 'prefix', p)); }
  suffix(s: string): Expr { return new Expr(nameTransform(this.expr.node, 'suffix', s)); }
}

export class Expr {
  constructor(readonly node: ExprNode) {}

  private unary(op: UnaryKind, arg?: number): Expr { return new Expr(unaryOp(op, this.node, arg)); }
  private binary(op: BinaryKind, other: ExprLike): Expr { return new Expr(binaryOp(op, this.node, toNode(other))); }
  private agg(fn: AggregationKind, ddof = 1): Expr { return new Expr(aggregation(fn, this.node, ddof)); }
  private win(fn: WindowKind, options: WindowOptions = {}): Expr { return new Expr(windowFunction(fn, this.node, [], [], options)); }

  // arithmetic
  add(other: ExprLike): Expr { return this.binary('add', other); }
  sub(other: ExprLike): Expr { return this.binary('sub', other); }
  mul(other: ExprLike): Expr { return this.binary('mul', other); }
  truediv(other: ExprLike): Expr { return this.binary('div', other); }
  floordiv(other: ExprLike): Expr { return this.binary('floor_div', other); }
  mod(other: ExprLike): Expr { return this.binary('mod', other); }
  pow(other: ExprLike): Expr { return this.binary('pow', other); }
  neg(): Expr { return this.unary('negate'); }
  abs(): Expr { return this.unary('abs'); }
  sqrt(): Expr { return this.unary('sqrt'); }
  exp(): Expr { return this.unary('exp'); }
  floor(): Expr { return this.unary('floor'); }
  ceil(): Expr { return this.unary('ceil'); }
  /** Half away from zero. */
  round(decimals = 0): Expr {
    if (!Number.isInteger(decimals) || decimals < 0) {
      throw new InvalidOperationError(`round() needs a non-negative integer number of decimals, got ${decimals}`);
    }
    return this.unary('round', decimals);
  }
  /** NaN below zero, -inf at zero. */
  log(base = Math.E): Expr { return this.unary('log', base); }
  /** Bound values to [lower, upper]; a missing bound leaves that side open. Nulls stay null. */
  clip(lower?: ExprLike, upper?: ExprLike): Expr {
    let out: Expr = this;
    if (upper !== undefined && upper !== null) out = minHorizontal([out, asExpr(upper)], { ignoreNulls: false });
    if (lower !== undefined && lower !== null) out = maxHorizontal([out, asExpr(lower)], { ignoreNulls: false });
    return out;
  }

  // comparison
  eq(other: ExprLike): Expr { return this.binary('eq', other); }
  neq(other: ExprLike): Expr { return this.binary('neq', other); }
  lt(other: ExprLike): Expr { return this.binary('lt', other); }
  lte(other: ExprLike): Expr { return this.binary('lte', other); }
  gt(other: ExprLike): Expr { return this.binary('gt', other); }
  gte(other: ExprLike): Expr { return this.binary('gte', other); }

  // logic
  and(other: ExprLike): Expr { return this.binary('and', other); }
  or(other: ExprLike): Expr { return this.binary('or', other); }
  xor(other: ExprLike): Expr { return this.binary('xor', other); }
  not(): Expr { return this.unary('not'); }
  isNull(): Expr { return this.unary('is_null'); }
  isNotNull(): Expr { return this.unary('is_not_null'); }
  isNan(): Expr { return this.unary('is_nan'); }

  // aggregations
  sum(): Expr { return this.agg('sum'); }
  mean(): Expr { return this.agg('mean'); }
  median(): Expr { return this.agg('median'); }
  min(): Expr { return this.agg('min'); }
  max(): Expr { return this.agg('max'); }
  count(): Expr { return this.agg('count'); }
  len(): Expr { return this.agg('len'); }
  nUnique(): Expr { return this.agg('n_unique'); }
  nullCount(): Expr { return this.agg('null_count'); }
  std(ddof = 1): Expr { return this.agg('std', ddof); }
  var(ddof = 1): Expr { return this.agg('var', ddof); }
  any(): Expr { return this.agg('any'); }
  all(): Expr { return this.agg('all'); }

  // windows (frame order until .over() supplies partition/order)
  cumSum(opts: { reverse?: boolean } = {}): Expr { return this.win('cum_sum', opts); }
  cumCount(opts: { reverse?: boolean } = {}): Expr { return this.win('cum_count', opts); }
  cumMin(opts: { reverse?: boolean } = {}): Expr { return this.win('cum_min', opts); }
  cumMax(opts: { reverse?: boolean } = {}): Expr { return this.win('cum_max', opts); }
  cumProd(opts: { reverse?: boolean } = {}): Expr { return this.win('cum_prod', opts); }
  shift(n = 1): Expr { return this.win('shift', { n }); }
  diff(n = 1): Expr { return this.win('diff', { n }); }
  rank(opts: { method?: RankMethod; descending?: boolean } = {}): Expr {
    return this.win('rank', { method: opts.method ?? 'average', descending: opts.descending ?? false });
  }
  rollingSum(windowSize: number, opts: RollingOptions = {}): Expr {
    return this.win('rolling_sum', { windowSize, minSamples: opts.minSamples ?? windowSize, center: opts.center ?? false });
  }
  rollingMean(windowSize: number, opts: RollingOptions = {}): Expr {
    return this.win('rolling_mean', { windowSize, minSamples: opts.minSamples ?? windowSize, center: opts.center ?? false });
  }
  rollingVar(windowSize: number, opts: RollingVarOptions = {}): Expr {
    return this.win('rolling_var', { windowSize, minSamples: opts.minSamples ?? windowSize, center: opts.center ?? false, ddof: opts.ddof ?? 1 });
  }
  rollingStd(windowSize: number, opts: RollingVarOptions = {}): Expr {
    return this.win('rolling_std', { windowSize, minSamples: opts.minSamples ?? windowSize, center: opts.center ?? false, ddof: opts.ddof ?? 1 });
  }
  isUnique(): Expr { return this.win('is_unique'); }
  isFirstDistinct(): Expr { return this.win('is_first_distinct'); }
  isLastDistinct(): Expr { return this.win('is_last_distinct'); }

  /**
   * Scope to partitions. Order-dependent window functions pick up
   * partition/order in place; anything else is evaluated per partition and
   * broadcast back to its rows.
   */
  over(partitionBy: string | readonly string[] = [], opts: OverOptions = {}): Expr {
    const parts = asList(partitionBy);
    const order = asList(opts.orderBy);
    const n = this.node;
    if (n.kind === 'window' && n.fn !== 'over' && n.partitionBy.length === 0 && n.orderBy.length === 0) {
      return new Expr(windowFunction(n.fn, n.operand, parts, order, n.options));
    }
    return new Expr(windowFunction('over', n, parts, order));
  }

  // misc
  alias(name: string): Expr { return new Expr(alias(this.node, name)); }
  cast(dtype: DType): Expr { return new Expr(cast(this.node, dtype)); }
  fillNull(value: ExprLike): Expr { return new Expr(fillNull(this.node, toNode(value))); }
  get name(): NameNamespace { return new NameNamespace(this); }

  toJSON(): unknown { return encodeNode(this.node); }
}

// ---------- namespace functions ----------
export function col(...names: string[]): Expr {
  return new Expr(names.length === 1 ? columnRef(names[0]) : columns(names));
}

export function lit(value: Scalar, dtype?: DType): Expr {
  return new Expr(literalOf(value, dtype));
}

export function all(): Expr {
  return new Expr(allColumns());
}

export interface HorizontalOptions {
  ignoreNulls?: boolean;
}

function horizontalOf(fn: HorizontalKind, exprs: readonly IntoExpr[], opts: HorizontalOptions, defaultIgnore: boolean): Expr {
  return new Expr(horizontal(fn, exprs.map(intoNode), opts.ignoreNulls ?? defaultIgnore));
}

/** Kleene row-wise OR unless ignoreNulls. */
export function anyHorizontal(exprs: readonly IntoExpr[], opts: HorizontalOptions = {}): Expr {
  return horizontalOf('any', exprs, opts, false);
}

export function allHorizontal(exprs: readonly IntoExpr[], opts: HorizontalOptions = {}): Expr {
  return horizontalOf('all', exprs, opts, false);
}

export function sumHorizontal(exprs: readonly IntoExpr[], opts: HorizontalOptions = {}): Expr {
  return horizontalOf('sum', exprs, opts, true);
}

export function minHorizontal(exprs: readonly IntoExpr[], opts: HorizontalOptions = {}): Expr {
  return horizontalOf('min', exprs, opts, true);
}

export function maxHorizontal(exprs: readonly IntoExpr[], opts: HorizontalOptions = {}): Expr {
  return horizontalOf('max', exprs, opts, true);
}

class WhenThen {
  constructor(private readonly condition: ExprNode, private readonly value: ExprNode) {}
  otherwise(value: ExprLike): Expr {
    return new Expr(whenNode(this.condition, this.value, toNode(value)));
  }
  /** without otherwise(): rows failing the condition are null */
  end(): Expr {
    return new Expr(whenNode(this.condition, this.value, literalOf(null)));
  }
}

export function when(condition: Expr) {
  return {
    then: (value: ExprLike) => new WhenThen(condition.node, toNode(value)),
  };
}
