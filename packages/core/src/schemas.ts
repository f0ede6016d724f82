// packages/core/src/schemas.ts
// JSON form of dtypes and IR trees, validated with zod on the way back in.
import { z } from 'zod';
import { DT, type DType } from './dtypes';
import {
  aggregation, alias, allColumns, binaryOp, cast, columnRef, columns, fillNull, horizontal,
  literalOf, nameTransform, unaryOp, whenNode, windowFunction,
  type ExprNode, type Scalar,
} from './expr/nodes';

export const TimeUnitEnum = z.enum(['s', 'ms', 'us', 'ns']);

export const DTypeSchema: z.ZodType<DType, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('int'), bits: z.union([z.literal(8), z.literal(16), z.literal(32), z.literal(64)]), signed: z.boolean() })
      .transform(v => DT.Int(v.bits, v.signed)),
    z.object({ kind: z.literal('float'), bits: z.union([z.literal(32), z.literal(64)]) })
      .transform(v => DT.Float(v.bits)),
    z.object({ kind: z.literal('decimal'), precision: z.number().int().min(1).max(38), scale: z.number().int().min(0) })
      .transform(v => DT.Decimal(v.precision, v.scale)),
    z.object({ kind: z.literal('enum'), categories: z.array(z.string()) })
      .transform(v => DT.Enum(v.categories)),
    z.object({ kind: z.literal('datetime'), unit: TimeUnitEnum, timezone: z.string().nullable() })
      .transform(v => DT.Datetime(v.unit, v.timezone)),
    z.object({ kind: z.literal('duration'), unit: TimeUnitEnum })
      .transform(v => DT.Duration(v.unit)),
    z.object({ kind: z.literal('list'), inner: DTypeSchema })
      .transform(v => DT.List(v.inner)),
    z.object({ kind: z.literal('struct'), fields: z.array(z.object({ name: z.string(), dtype: DTypeSchema })) })
      .transform(v => DT.Struct(v.fields)),
    z.object({ kind: z.enum(['boolean', 'string', 'categorical', 'binary', 'date', 'time', 'unknown']) })
      .transform(v => SIMPLE_DTYPES[v.kind]),
  ])
);

const SIMPLE_DTYPES = {
  boolean: DT.Boolean,
  string: DT.String,
  categorical: DT.Categorical,
  binary: DT.Binary,
  date: DT.Date,
  time: DT.Time,
  unknown: DT.Unknown,
} satisfies Record<string, DType>;

// NaN, ±Infinity, bigint and Date have no plain JSON form
export const ScalarSchema: z.ZodType<Scalar, z.ZodTypeDef, unknown> = z.union([
  z.number(),
  z.string(),
  z.boolean(),
  z.null(),
  z.object({ $date: z.string().datetime({ offset: true }) }).strict().transform(v => new Date(v.$date)),
  z.object({ $bigint: z.string().regex(/^-?\d+$/) }).strict().transform(v => BigInt(v.$bigint)),
  z.object({ $float: z.enum(['NaN', 'Infinity', '-Infinity']) }).strict().transform(v => Number(v.$float)),
]);

export const UnaryKindEnum = z.enum(['negate', 'not', 'is_null', 'is_not_null', 'is_nan', 'abs', 'sqrt', 'exp', 'floor', 'ceil', 'round', 'log']);
export const BinaryKindEnum = z.enum([
  'add', 'sub', 'mul', 'div', 'floor_div', 'mod', 'pow',
  'eq', 'neq', 'lt', 'lte', 'gt', 'gte',
  'and', 'or', 'xor',
]);
export const AggregationKindEnum = z.enum([
  'sum', 'mean', 'min', 'max', 'median', 'count', 'len', 'n_unique', 'null_count', 'std', 'var', 'any', 'all',
]);
export const WindowKindEnum = z.enum([
  'over', 'cum_sum', 'cum_count', 'cum_min', 'cum_max', 'cum_prod',
  'shift', 'diff', 'rank', 'rolling_sum', 'rolling_mean', 'rolling_var', 'rolling_std',
  'is_unique', 'is_first_distinct', 'is_last_distinct',
]);

const WindowOptionsSchema = z.object({
  n: z.number().int().optional(),
  reverse: z.boolean().optional(),
  windowSize: z.number().int().positive().optional(),
  minSamples: z.number().int().min(0).optional(),
  center: z.boolean().optional(),
  method: z.enum(['average', 'min', 'max', 'dense', 'ordinal']).optional(),
  descending: z.boolean().optional(),
  ddof: z.number().int().min(0).optional(),
}).strict();

export const ExprNodeSchema: z.ZodType<ExprNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.union([
    z.object({ kind: z.literal('column'), name: z.string() }).strict()
      .transform(v => columnRef(v.name)),
    z.object({ kind: z.literal('literal'), value: ScalarSchema, dtype: DTypeSchema, dynamic: z.boolean() }).strict()
      .transform(v => (v.dynamic ? literalOf(v.value) : literalOf(v.value, v.dtype))),
    z.object({ kind: z.literal('unary'), op: UnaryKindEnum, operand: ExprNodeSchema, arg: z.number().optional() }).strict()
      .transform(v => unaryOp(v.op, v.operand, v.arg)),
    z.object({ kind: z.literal('binary'), op: BinaryKindEnum, left: ExprNodeSchema, right: ExprNodeSchema }).strict()
      .transform(v => binaryOp(v.op, v.left, v.right)),
    z.object({ kind: z.literal('aggregation'), fn: AggregationKindEnum, operand: ExprNodeSchema, ddof: z.number().int().min(0) }).strict()
      .transform(v => aggregation(v.fn, v.operand, v.ddof)),
    z.object({
      kind: z.literal('window'),
      fn: WindowKindEnum,
      operand: ExprNodeSchema,
      partitionBy: z.array(z.string()),
      orderBy: z.array(z.string()),
      options: WindowOptionsSchema,
    }).strict()
      .transform(v => windowFunction(v.fn, v.operand, v.partitionBy, v.orderBy, v.options)),
    z.object({ kind: z.literal('horizontal'), fn: z.enum(['any', 'all', 'sum', 'min', 'max']), operands: z.array(ExprNodeSchema).min(1), ignoreNulls: z.boolean() }).strict()
      .transform(v => horizontal(v.fn, v.operands, v.ignoreNulls)),
    z.object({ kind: z.literal('alias'), operand: ExprNodeSchema, name: z.string() }).strict()
      .transform(v => alias(v.operand, v.name)),
    z.object({ kind: z.literal('cast'), operand: ExprNodeSchema, dtype: DTypeSchema }).strict()
      .transform(v => cast(v.operand, v.dtype)),
    z.object({ kind: z.literal('fill_null'), operand: ExprNodeSchema, value: ExprNodeSchema }).strict()
      .transform(v => fillNull(v.operand, v.value)),
    z.object({ kind: z.literal('when'), condition: ExprNodeSchema, then: ExprNodeSchema, otherwise: ExprNodeSchema }).strict()
      .transform(v => whenNode(v.condition, v.then, v.otherwise)),
    z.object({ kind: z.literal('name'), operand: ExprNodeSchema, transform: z.enum(['keep', 'to_uppercase', 'to_lowercase', 'prefix', 'suffix']), affix: z.string() }).strict()
      .transform(v => nameTransform(v.operand, v.transform, v.affix)),
    z.object({ kind: z.literal('columns'), names: z.array(z.string()).min(1) }).strict()
      .transform(v => columns(v.names)),
    z.object({ kind: z.literal('all') }).strict()
      .transform(() => allColumns()),
  ])
);

/** Validate JSON (already parsed, or text) into an IR tree; throws ZodError on bad input. */
export function parseExprNode(json: unknown): ExprNode {
  return ExprNodeSchema.parse(typeof json === 'string' ? JSON.parse(json) : json);
}

function encodeScalar(v: Scalar): unknown {
  if (v instanceof Date) return { $date: v.toISOString() };
  if (typeof v === 'bigint') return { $bigint: v.toString() };
  if (typeof v === 'number' && !Number.isFinite(v)) return { $float: String(v) };
  return v;
}

/** Plain-JSON form of a tree; inverse of parseExprNode. */
export function encodeNode(node: ExprNode): unknown {
  switch (node.kind) {
    case 'column':
    case 'columns':
    case 'all':
      return { ...node };
    case 'literal':
      return { ...node, value: encodeScalar(node.value) };
    case 'binary':
      return { ...node, left: encodeNode(node.left), right: encodeNode(node.right) };
    case 'horizontal':
      return { ...node, operands: node.operands.map(encodeNode) };
    case 'fill_null':
      return { ...node, operand: encodeNode(node.operand), value: encodeNode(node.value) };
    case 'when':
      return {
        ...node,
        condition: encodeNode(node.condition),
        then: encodeNode(node.then),
        otherwise: encodeNode(node.otherwise),
      };
    default:
      return { ...node, operand: encodeNode(node.operand) };
  }
}
