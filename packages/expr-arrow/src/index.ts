// packages/expr-arrow/src/index.ts
import { Table, type DataType, type Vector } from 'apache-arrow';
import {
  DT, DtypeMismatchError, InvalidOperationError, Schema, UnknownDtypeError, backendLogger, dtypeOfValue, inferDtype, isMissing, isUnsupported,
  promoteAll, stripNaming,
  type Adapter, type ApplyMode, type BackendCapabilities, type ColumnData, type DType, type ExplainResult,
  type ExprNode, type FrameHandle, type NamedExpr, type NodeKind, type Scalar, type SortOptions,
} from '@framebridge/core';
import { arrowToDtype } from './dtypes';
import { broadcast, evaluate, type Col } from './kernels';
import { FrameData, buildVector, groupRows, orderRows, tableToColumns, takeTable, takeVector } from './frame-data';

export { arrowToDtype, dtypeToArrow } from './dtypes';
export { buildVector, tableToColumns } from './frame-data';

/** A lowered Arrow column; `scalar` vectors hold one value for the whole frame. */
export interface ArrowColumn {
  vector: Vector<DataType>;
  scalar: boolean;
}

const log = backendLogger('arrow');

const ALL_NODES: NodeKind[] = [
  'column', 'literal', 'unary', 'binary', 'aggregation', 'window',
  'horizontal', 'alias', 'cast', 'fill_null', 'when', 'name',
];

export const ARROW_CAPABILITIES: BackendCapabilities = Object.freeze<BackendCapabilities>({
  lazy: false,
  nullableBoolean: true,
  booleanUpcast: false,
  nodes: new Set(ALL_NODES),
  unary: new Set(['negate', 'not', 'is_null', 'is_not_null', 'is_nan', 'abs', 'sqrt', 'exp', 'floor', 'ceil', 'round', 'log'] as const),
  binary: new Set([
    'add', 'sub', 'mul', 'div', 'floor_div', 'mod', 'pow',
    'eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'and', 'or', 'xor',
  ] as const),
  aggregations: new Set([
    'sum', 'mean', 'min', 'max', 'median', 'count', 'len', 'n_unique', 'null_count', 'std', 'var', 'any', 'all',
  ] as const),
  windows: new Set([
    'over', 'cum_sum', 'cum_count', 'cum_min', 'cum_max', 'cum_prod',
    'shift', 'diff', 'rank', 'rolling_sum', 'rolling_mean', 'rolling_var', 'rolling_std',
    'is_unique', 'is_first_distinct', 'is_last_distinct',
  ] as const),
  horizontal: new Set(['any', 'all', 'sum', 'min', 'max'] as const),
  groupKeys: { nulls: 'own-group', nan: 'own-group' },
  windowsNeedOrder: false,
});

/** Dtype of a JS column: integral numbers are Int64, mixed numbers Float64, all-null Unknown. */
export function inferValuesDtype(values: readonly unknown[]): DType {
  const seen: DType[] = [];
  for (const v of values) {
    if (isMissing(v)) continue;
    if (typeof v === 'number' || typeof v === 'bigint' || typeof v === 'string' || typeof v === 'boolean' || v instanceof Date) {
      const scalar: Scalar = v;
      seen.push(dtypeOfValue(scalar));
    } else {
      throw new InvalidOperationError(`Cannot infer a dtype for value of type ${typeof v}`);
    }
  }
  const dtype = promoteAll(seen);
  if (isUnsupported(dtype)) throw new DtypeMismatchError('Cannot build a column from values of mixed types');
  return dtype;
}

/** Build a table from JS arrays; dtypes not given are inferred from the values. */
export function tableFromColumns(columns: ColumnData, dtypes: Record<string, DType> = {}): Table {
  const vectors: Record<string, Vector<DataType>> = {};
  for (const [name, values] of Object.entries(columns)) {
    vectors[name] = buildVector(values, dtypes[name] ?? inferValuesDtype(values));
  }
  return new Table(vectors);
}

export class ArrowAdapter implements Adapter<Table, ArrowColumn> {
  name: 'arrow' = 'arrow';
  readonly capabilities = ARROW_CAPABILITIES;

  resolveSchema(table: Table): Schema {
    return new Schema(table.schema.fields.map(f => [f.name, this.schemaDtype(f.type)] as const));
  }

  wrap(table: Table): FrameHandle<Table> {
    return this.handle(table, this.resolveSchema(table), []);
  }

  lower(node: ExprNode, frame: FrameHandle<Table>): ArrowColumn {
    const bare = stripNaming(node);
    if (bare.kind === 'column') {
      frame.schema.get(bare.name);
      const vector = frame.native.getChild(bare.name);
      if (vector) return { vector, scalar: false };
    }
    const col = evaluate(bare, new FrameData(frame.native, frame.schema));
    return { vector: buildVector(col.values, this.resultDtype(bare, frame.schema)), scalar: col.scalar };
  }

  dtypeOf(column: ArrowColumn): DType {
    return arrowToDtype(column.vector.type);
  }

  // --- frame operations ---
  applyColumns(exprs: readonly NamedExpr[], frame: FrameHandle<Table>, mode: ApplyMode): FrameHandle<Table> {
    const data = new FrameData(frame.native, frame.schema);
    // every expression sees the input frame, never a sibling's output
    const computed = exprs.map(e => ({ name: e.name, node: stripNaming(e.node), col: evaluate(stripNaming(e.node), data) }));
    const allScalar = computed.every(c => c.col.scalar);
    const length = mode === 'project' && allScalar ? 1 : data.length;

    const vectors = new Map<string, Vector<DataType>>();
    if (mode === 'extend') {
      for (const f of frame.native.schema.fields) {
        const v = frame.native.getChild(f.name);
        if (v) vectors.set(f.name, v);
      }
    }
    for (const c of computed) {
      vectors.set(c.name, this.materialize(c.node, c.col, length, frame));
    }
    log.debug({ mode, columns: computed.map(c => c.name) }, 'apply-columns');
    return this.fromVectors(vectors, frame.notes);
  }

  filter(predicate: ExprNode, frame: FrameHandle<Table>): FrameHandle<Table> {
    const data = new FrameData(frame.native, frame.schema);
    const mask = broadcast(evaluate(stripNaming(predicate), data), data.length);
    const keep: number[] = [];
    mask.forEach((v, i) => { if (v === true) keep.push(i); });
    return this.handle(takeTable(frame.native, keep), frame.schema, frame.notes);
  }

  aggregate(exprs: readonly NamedExpr[], keys: readonly string[], frame: FrameHandle<Table>): FrameHandle<Table> {
    if (keys.length === 0) return this.applyColumns(exprs, frame, 'project');
    const data = new FrameData(frame.native, frame.schema);
    const groups = groupRows(keys.map(k => data.column(k)), data.length);

    const vectors = new Map<string, Vector<DataType>>();
    const firstRows = groups.map(g => g[0]);
    for (const k of keys) {
      const v = frame.native.getChild(k);
      if (v) vectors.set(k, takeVector(v, firstRows));
    }
    for (const e of exprs) {
      const node = stripNaming(e.node);
      const values = groups.map(rows => {
        const col = evaluate(node, data.subset(rows));
        if (!col.scalar) {
          throw new InvalidOperationError(`Expression '${e.name}' does not reduce to one value per group`, { name: e.name });
        }
        return col.values[0];
      });
      vectors.set(e.name, buildVector(values, this.resultDtype(node, frame.schema)));
    }
    return this.fromVectors(vectors, frame.notes);
  }

  sort(by: readonly string[], options: SortOptions, frame: FrameHandle<Table>): FrameHandle<Table> {
    const data = new FrameData(frame.native, frame.schema);
    const flag = options.descending;
    const descending = typeof flag === 'boolean' || flag === undefined ? by.map(() => flag === true) : flag;
    const all = Array.from({ length: data.length }, (_, i) => i);
    const order = orderRows(all, by.map(c => data.column(c)), descending, options.nullsLast ?? false);
    return this.handle(takeTable(frame.native, order), frame.schema, frame.notes);
  }

  head(n: number, frame: FrameHandle<Table>): FrameHandle<Table> {
    return this.handle(frame.native.slice(0, Math.max(0, n)), frame.schema, frame.notes);
  }

  explain(frame: FrameHandle<Table>): ExplainResult {
    return {
      backend: this.name,
      lazy: false,
      plan: { rows: frame.native.numRows, columns: frame.schema.names() },
      notes: frame.notes,
    };
  }

  async collect(frame: FrameHandle<Table>): Promise<ColumnData> {
    return tableToColumns(frame.native, frame.schema);
  }

  // --- helpers ---
  // an unmappable native type stays in the schema as Unknown
  private schemaDtype(type: DataType): DType {
    try {
      return arrowToDtype(type);
    } catch (e) {
      if (!(e instanceof UnknownDtypeError)) throw e;
      log.debug({ type: String(type) }, 'unknown-dtype');
      return DT.Unknown;
    }
  }

  private handle(table: Table, schema: Schema, notes: FrameHandle<Table>['notes']): FrameHandle<Table> {
    return Object.freeze({ native: table, schema, notes });
  }

  private fromVectors(vectors: Map<string, Vector<DataType>>, notes: FrameHandle<Table>['notes']): FrameHandle<Table> {
    const table = new Table(Object.fromEntries(vectors));
    const schema = new Schema([...vectors].map(([name, v]) => [name, this.schemaDtype(v.type)] as const));
    return this.handle(table, schema, notes);
  }

  private resultDtype(node: ExprNode, schema: Schema): DType {
    return inferDtype(node, schema, { strict: true });
  }

  private materialize(node: ExprNode, col: Col, length: number, frame: FrameHandle<Table>): Vector<DataType> {
    if (node.kind === 'column' && !col.scalar && length === frame.native.numRows) {
      const v = frame.native.getChild(node.name);
      if (v) return v;
    }
    const dtype = this.resultDtype(node, frame.schema);
    return buildVector(broadcast(col, length), dtype);
  }
}
