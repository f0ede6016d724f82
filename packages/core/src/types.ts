// packages/core/src/types.ts
import type { DType } from './dtypes';
import type {
  AggregationKind, BinaryKind, ExprNode, HorizontalKind, NamedExpr, NodeKind, UnaryKind, WindowKind,
} from './expr/nodes';
import type { Schema } from './schema';
import type { ExplainResult, SemanticsNote } from './trace';

// --------------------
// Backends & capabilities
// --------------------
export type BackendName = 'arrow' | 'sqlite' | 'mongodb';

export type ApproximationPolicy = 'allow' | 'warn' | 'error';

export interface GroupKeyBehavior {
  nulls: 'own-group' | 'dropped';
  nan: 'own-group' | 'merged-with-null' | 'dropped';
}

/**
 * What a backend can lower. Trees are checked against these sets before
 * lowering, so unsupported features fail at the call that introduces them.
 */
export interface BackendCapabilities {
  lazy: boolean;
  /** engine has a boolean type that can be null and does Kleene and/or */
  nullableBoolean: boolean;
  /** engine can emulate a nullable boolean (e.g. via conditionals) */
  booleanUpcast: boolean;
  nodes: ReadonlySet<NodeKind>;
  unary: ReadonlySet<UnaryKind>;
  binary: ReadonlySet<BinaryKind>;
  aggregations: ReadonlySet<AggregationKind>;
  windows: ReadonlySet<WindowKind>;
  horizontal: ReadonlySet<HorizontalKind>;
  groupKeys: GroupKeyBehavior;
  /** order-dependent windows need an explicit order_by */
  windowsNeedOrder: boolean;
}

// --------------------
// Frames
// --------------------
export interface FrameHandle<TNative> {
  readonly native: TNative;
  readonly schema: Schema;
  readonly notes: readonly SemanticsNote[];
}

/** extend = with_columns (keep existing, replace/append); project = select */
export type ApplyMode = 'extend' | 'project';

export interface SortOptions {
  descending?: boolean | readonly boolean[];
  nullsLast?: boolean;
}

/** Materialized result: column name → values, in schema order. */
export type ColumnData = Record<string, unknown[]>;

// --------------------
// Adapter
// --------------------
/**
 * One per engine, shared by every frame of that engine. TColumn is the
 * adapter's lowered column: a native vector, a SQL fragment, a pipeline
 * expression.
 */
export interface Adapter<TNative = unknown, TColumn = unknown> {
  readonly name: BackendName;
  readonly capabilities: BackendCapabilities;

  resolveSchema(native: TNative, hint?: Schema): Schema;
  wrap(native: TNative, hint?: Schema): FrameHandle<TNative>;

  /** Post-order translation of one tree against a frame. */
  lower(node: ExprNode, frame: FrameHandle<TNative>): TColumn;
  /** Throws UnknownDtype when the native type has no dtype. */
  dtypeOf(column: TColumn): DType;

  applyColumns(exprs: readonly NamedExpr[], frame: FrameHandle<TNative>, mode: ApplyMode): FrameHandle<TNative>;
  filter(predicate: ExprNode, frame: FrameHandle<TNative>): FrameHandle<TNative>;
  aggregate(exprs: readonly NamedExpr[], keys: readonly string[], frame: FrameHandle<TNative>): FrameHandle<TNative>;
  sort(by: readonly string[], options: SortOptions, frame: FrameHandle<TNative>): FrameHandle<TNative>;
  head(n: number, frame: FrameHandle<TNative>): FrameHandle<TNative>;

  explain(frame: FrameHandle<TNative>): ExplainResult;
  collect(frame: FrameHandle<TNative>): Promise<ColumnData>;
}
