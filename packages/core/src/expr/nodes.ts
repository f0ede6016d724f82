// packages/core/src/expr/nodes.ts
// Expression IR: immutable, engine-independent node tree.
import { DT, type DType } from '../dtypes';

export type Scalar = number | bigint | string | boolean | Date | null;

export type UnaryKind =
  | 'negate' | 'not' | 'is_null' | 'is_not_null' | 'is_nan'
  | 'abs' | 'sqrt' | 'exp' | 'floor' | 'ceil' | 'round' | 'log';

export type ArithmeticKind = 'add' | 'sub' | 'mul' | 'div' | 'floor_div' | 'mod' | 'pow';
export type ComparisonKind = 'eq' | 'neq' | 'lt' | 'lte' | 'gt' | 'gte';
export type LogicalKind = 'and' | 'or' | 'xor';
export type BinaryKind = ArithmeticKind | ComparisonKind | LogicalKind;

export type AggregationKind =
  | 'sum' | 'mean' | 'min' | 'max' | 'median'
  | 'count' | 'len' | 'n_unique' | 'null_count'
  | 'std' | 'var' | 'any' | 'all';

export type WindowKind =
  | 'over'
  | 'cum_sum' | 'cum_count' | 'cum_min' | 'cum_max' | 'cum_prod'
  | 'shift' | 'diff' | 'rank'
  | 'rolling_sum' | 'rolling_mean' | 'rolling_var' | 'rolling_std'
  | 'is_unique' | 'is_first_distinct' | 'is_last_distinct';

export type HorizontalKind = 'any' | 'all' | 'sum' | 'min' | 'max';
export type NameTransformKind = 'keep' | 'to_uppercase' | 'to_lowercase' | 'prefix' | 'suffix';
export type RankMethod = 'average' | 'min' | 'max' | 'dense' | 'ordinal';

export const ARITHMETIC_KINDS: readonly ArithmeticKind[] = ['add', 'sub', 'mul', 'div', 'floor_div', 'mod', 'pow'];
export const COMPARISON_KINDS: readonly ComparisonKind[] = ['eq', 'neq', 'lt', 'lte', 'gt', 'gte'];
export const LOGICAL_KINDS: readonly LogicalKind[] = ['and', 'or', 'xor'];

export interface ColumnRef { readonly kind: 'column'; readonly name: string }

export interface Literal {
  readonly kind: 'literal';
  readonly value: Scalar;
  readonly dtype: DType;
  /** dtype was guessed from the JS value, so it yields to a typed partner */
  readonly dynamic: boolean;
}

export interface UnaryOp {
  readonly kind: 'unary';
  readonly op: UnaryKind;
  readonly operand: ExprNode;
  /** decimals for `round`, base for `log` */
  readonly arg?: number;
}

export interface BinaryOp {
  readonly kind: 'binary';
  readonly op: BinaryKind;
  readonly left: ExprNode;
  readonly right: ExprNode;
}

export interface Aggregation {
  readonly kind: 'aggregation';
  readonly fn: AggregationKind;
  readonly operand: ExprNode;
  readonly ddof: number;
}

export interface WindowOptions {
  readonly n?: number;
  readonly reverse?: boolean;
  readonly windowSize?: number;
  readonly minSamples?: number;
  readonly center?: boolean;
  readonly method?: RankMethod;
  readonly descending?: boolean;
  /** rolling_var / rolling_std */
  readonly ddof?: number;
}

export interface WindowFunction {
  readonly kind: 'window';
  readonly fn: WindowKind;
  readonly operand: ExprNode;
  readonly partitionBy: readonly string[];
  readonly orderBy: readonly string[];
  readonly options: WindowOptions;
}

export interface HorizontalReduction {
  readonly kind: 'horizontal';
  readonly fn: HorizontalKind;
  readonly operands: readonly ExprNode[];
  readonly ignoreNulls: boolean;
}

export interface Alias { readonly kind: 'alias'; readonly operand: ExprNode; readonly name: string }
export interface Cast { readonly kind: 'cast'; readonly operand: ExprNode; readonly dtype: DType }
export interface FillNull { readonly kind: 'fill_null'; readonly operand: ExprNode; readonly value: ExprNode }

export interface When {
  readonly kind: 'when';
  readonly condition: ExprNode;
  readonly then: ExprNode;
  readonly otherwise: ExprNode;
}

export interface NameTransform {
  readonly kind: 'name';
  readonly operand: ExprNode;
  readonly transform: NameTransformKind;
  readonly affix: string;
}

/** `col('a', 'b')`; expanded against a schema before lowering */
export interface Columns { readonly kind: 'columns'; readonly names: readonly string[] }
/** `all()`; expanded against a schema before lowering */
export interface AllColumns { readonly kind: 'all' }

export type ExprNode =
  | ColumnRef | Literal | UnaryOp | BinaryOp | Aggregation | WindowFunction
  | HorizontalReduction | Alias | Cast | FillNull | When | NameTransform
  | Columns | AllColumns;

export type NodeKind = ExprNode['kind'];

export const NODE_KINDS: readonly NodeKind[] = [
  'column', 'literal', 'unary', 'binary', 'aggregation', 'window',
  'horizontal', 'alias', 'cast', 'fill_null', 'when', 'name', 'columns', 'all',
];

/** One output column: the name it lands under and the (expanded) tree producing it. */
export interface NamedExpr {
  readonly name: string;
  readonly node: ExprNode;
}

// ---------- constructors ----------
function frozen<T extends ExprNode>(n: T): T {
  Object.freeze(n);
  return n;
}

export function columnRef(name: string): ColumnRef {
  return frozen<ColumnRef>({ kind: 'column', name });
}

export function literalOf(value: Scalar, dtype?: DType): Literal {
  if (dtype) return frozen<Literal>({ kind: 'literal', value, dtype, dynamic: false });
  return frozen<Literal>({ kind: 'literal', value, dtype: dtypeOfValue(value), dynamic: true });
}

export function dtypeOfValue(value: Scalar): DType {
  if (value === null) return DT.Unknown;
  if (typeof value === 'boolean') return DT.Boolean;
  if (typeof value === 'bigint') return DT.Int64;
  if (typeof value === 'number') return Number.isInteger(value) ? DT.Int64 : DT.Float64;
  if (typeof value === 'string') return DT.String;
  return DT.Datetime('ms', null);
}

export function unaryOp(op: UnaryKind, operand: ExprNode, arg?: number): UnaryOp {
  return frozen<UnaryOp>(arg === undefined ? { kind: 'unary', op, operand } : { kind: 'unary', op, operand, arg });
}

export function binaryOp(op: BinaryKind, left: ExprNode, right: ExprNode): BinaryOp {
  return frozen<BinaryOp>({ kind: 'binary', op, left, right });
}

export function aggregation(fn: AggregationKind, operand: ExprNode, ddof = 1): Aggregation {
  return frozen<Aggregation>({ kind: 'aggregation', fn, operand, ddof });
}

export function windowFunction(
  fn: WindowKind,
  operand: ExprNode,
  partitionBy: readonly string[] = [],
  orderBy: readonly string[] = [],
  options: WindowOptions = {}
): WindowFunction {
  return frozen<WindowFunction>({
    kind: 'window',
    fn,
    operand,
    partitionBy: Object.freeze([...partitionBy]),
    orderBy: Object.freeze([...orderBy]),
    options: Object.freeze({ ...options }),
  });
}

export function horizontal(fn: HorizontalKind, operands: readonly ExprNode[], ignoreNulls: boolean): HorizontalReduction {
  return frozen<HorizontalReduction>({ kind: 'horizontal', fn, operands: Object.freeze([...operands]), ignoreNulls });
}

export function alias(operand: ExprNode, name: string): Alias {
  return frozen<Alias>({ kind: 'alias', operand, name });
}

export function cast(operand: ExprNode, dtype: DType): Cast {
  return frozen<Cast>({ kind: 'cast', operand, dtype });
}

export function fillNull(operand: ExprNode, value: ExprNode): FillNull {
  return frozen<FillNull>({ kind: 'fill_null', operand, value });
}

export function whenNode(condition: ExprNode, then: ExprNode, otherwise: ExprNode): When {
  return frozen<When>({ kind: 'when', condition, then, otherwise });
}

export function nameTransform(operand: ExprNode, transform: NameTransformKind, affix = ''): NameTransform {
  return frozen<NameTransform>({ kind: 'name', operand, transform, affix });
}

export function columns(names: readonly string[]): Columns {
  return frozen<Columns>({ kind: 'columns', names: Object.freeze([...names]) });
}

export function allColumns(): AllColumns {
  return frozen<AllColumns>({ kind: 'all' });
}
