// packages/frame/src/series.ts
// One named column of an eager backend. Operations run through the same
// adapter calls as frames, over a one- or two-column table.
import { Table, type DataType, type Vector } from 'apache-arrow';
import {
  InvalidOperationError, col,
  type BackendName, type DType, type Expr, type ExprLike, type Scalar,
} from '@framebridge/core';
import { ArrowAdapter, buildVector, inferValuesDtype, tableToColumns } from '@framebridge/expr-arrow';
import { DataFrame } from './dataframe';

const SELF = '__self';
const OTHER = '__other';

export type SeriesOperand = Series | Scalar;

export class Series {
  constructor(
    readonly name: string,
    private readonly vector: Vector<DataType>,
    private readonly adapter: ArrowAdapter
  ) {}

  get dtype(): DType { return this.adapter.resolveSchema(this.table()).get(SELF); }
  get length(): number { return this.vector.length; }
  get implementation(): BackendName { return this.adapter.name; }

  toNative(): Vector<DataType> { return this.vector; }

  toArray(): unknown[] {
    const table = this.table();
    return tableToColumns(table, this.adapter.resolveSchema(table))[SELF];
  }

  toFrame(): DataFrame {
    return DataFrame.wrap(this.adapter, new Table({ [this.name]: this.vector }));
  }

  alias(name: string): Series { return new Series(name, this.vector, this.adapter); }

  // elementwise
  add(other: SeriesOperand): Series { return this.binary((l, r) => l.add(r), other); }
  sub(other: SeriesOperand): Series { return this.binary((l, r) => l.sub(r), other); }
  mul(other: SeriesOperand): Series { return this.binary((l, r) => l.mul(r), other); }
  truediv(other: SeriesOperand): Series { return this.binary((l, r) => l.truediv(r), other); }
  floordiv(other: SeriesOperand): Series { return this.binary((l, r) => l.floordiv(r), other); }
  mod(other: SeriesOperand): Series { return this.binary((l, r) => l.mod(r), other); }
  pow(other: SeriesOperand): Series { return this.binary((l, r) => l.pow(r), other); }
  eq(other: SeriesOperand): Series { return this.binary((l, r) => l.eq(r), other); }
  neq(other: SeriesOperand): Series { return this.binary((l, r) => l.neq(r), other); }
  lt(other: SeriesOperand): Series { return this.binary((l, r) => l.lt(r), other); }
  lte(other: SeriesOperand): Series { return this.binary((l, r) => l.lte(r), other); }
  gt(other: SeriesOperand): Series { return this.binary((l, r) => l.gt(r), other); }
  gte(other: SeriesOperand): Series { return this.binary((l, r) => l.gte(r), other); }
  and(other: SeriesOperand): Series { return this.binary((l, r) => l.and(r), other); }
  or(other: SeriesOperand): Series { return this.binary((l, r) => l.or(r), other); }
  xor(other: SeriesOperand): Series { return this.binary((l, r) => l.xor(r), other); }
  not(): Series { return this.map(e => e.not()); }
  neg(): Series { return this.map(e => e.neg()); }
  abs(): Series { return this.map(e => e.abs()); }
  isNull(): Series { return this.map(e => e.isNull()); }
  isNotNull(): Series { return this.map(e => e.isNotNull()); }
  fillNull(value: Scalar): Series { return this.map(e => e.fillNull(value)); }
  cast(dtype: DType): Series { return this.map(e => e.cast(dtype)); }
  cumSum(): Series { return this.map(e => e.cumSum()); }
  shift(n = 1): Series { return this.map(e => e.shift(n)); }

  // reductions
  sum(): unknown { return this.reduce(e => e.sum()); }
  mean(): unknown { return this.reduce(e => e.mean()); }
  median(): unknown { return this.reduce(e => e.median()); }
  min(): unknown { return this.reduce(e => e.min()); }
  max(): unknown { return this.reduce(e => e.max()); }
  count(): unknown { return this.reduce(e => e.count()); }
  nUnique(): unknown { return this.reduce(e => e.nUnique()); }
  nullCount(): unknown { return this.reduce(e => e.nullCount()); }
  std(ddof = 1): unknown { return this.reduce(e => e.std(ddof)); }
  var(ddof = 1): unknown { return this.reduce(e => e.var(ddof)); }
  any(): unknown { return this.reduce(e => e.any()); }
  all(): unknown { return this.reduce(e => e.all()); }

  // --- helpers ---
  private table(other?: Series): Table {
    if (!other) return new Table({ [SELF]: this.vector });
    if (other.length !== this.length) {
      throw new InvalidOperationError(`Series lengths differ: ${this.length} and ${other.length}`);
    }
    return new Table({ [SELF]: this.vector, [OTHER]: other.vector });
  }

  private binary(op: (l: Expr, r: ExprLike) => Expr, other: SeriesOperand): Series {
    if (other instanceof Series) return this.map(e => op(e, col(OTHER)), other);
    return this.map(e => op(e, other));
  }

  private compute(expr: Expr, other?: Series) {
    const frame = this.adapter.wrap(this.table(other));
    return this.adapter.applyColumns([{ name: SELF, node: expr.node }], frame, 'project');
  }

  private map(f: (self: Expr) => Expr, other?: Series): Series {
    const out = this.compute(f(col(SELF)), other).native.getChild(SELF);
    if (!out) throw new InvalidOperationError(`Series '${this.name}' produced no column`);
    return new Series(this.name, out, this.adapter);
  }

  private reduce(f: (self: Expr) => Expr): unknown {
    const out = this.compute(f(col(SELF)));
    return tableToColumns(out.native, out.schema)[SELF][0];
  }
}

const arrow = new ArrowAdapter();

export interface NewSeriesOptions {
  backend?: BackendName;
}

/** Build a native series from JS values; without a dtype one is inferred (integral numbers → Int64). */
export function newSeries(name: string, values: readonly unknown[], dtype?: DType, options: NewSeriesOptions = {}): Series {
  const backend = options.backend ?? 'arrow';
  if (backend !== 'arrow') {
    throw new InvalidOperationError(`newSeries() needs an eager backend; ${backend} is lazy`, { backend });
  }
  return new Series(name, buildVector(values, dtype ?? inferValuesDtype(values)), arrow);
}
