// packages/expr-mongo/src/index.ts
import { AggregationCursor, Collection, Decimal128, Long, type Document } from 'mongodb';
import {
  InvalidOperationError, Schema, UnsupportedOperationError, backendLogger, booleanFallbackNote, getConfig,
  groupKeyDivergence, inferDtype, isScalar, mergeNotes, nullableBooleanFeatures, planBooleanSemantics,
  resolveApproximation, stripNaming, withBackendErrors, withBackendErrorsAsync,
  type Adapter, type ApplyMode, type ApproximationPolicy, type BackendCapabilities, type BooleanStrategy,
  type ColumnData, type DType, type ExplainResult, type ExprNode, type FrameHandle, type NamedExpr,
  type NodeKind, type SemanticsNote, type SortOptions,
} from '@framebridge/core';
import { fieldRef, lowerExpr, newContext, type AccScope, type MongoExpr, type PipelineContext } from './lower';

export { fieldRef, lowerExpr, newContext, TEMP_PREFIX, type AccScope, type MongoExpr, type PipelineContext } from './lower';

export type MongoNative = Collection<Document> | AggregationCursor<Document>;

/** A lowered pipeline expression plus the stages that must run before it. */
export interface MongoColumn {
  expr: MongoExpr;
  stages: Document[];
  dtype: DType;
  scalar: boolean;
}

export interface MongoAdapterOptions {
  /** emulate Kleene booleans with $switch/$cond instead of the null-as-False fallback */
  emulateNullableBoolean?: boolean;
  /** overrides FRAMEBRIDGE_APPROXIMATIONS for this adapter */
  approximations?: ApproximationPolicy;
}

const log = backendLogger('mongodb');

// group keys travel under these names in _id, so dotted column names stay whole
const KEY_PREFIX = '__fb_key_';

/** What each accumulator yields over no documents. */
function emptyAccumulators(accumulators: Document): Document {
  const out: Document = {};
  for (const [name, spec] of Object.entries(accumulators)) {
    const op = typeof spec === 'object' && spec !== null ? Object.keys(spec)[0] : undefined;
    out[name] = op === '$sum' ? 0 : op === '$addToSet' ? [] : null;
  }
  return out;
}

const NODES: NodeKind[] = [
  'column', 'literal', 'unary', 'binary', 'aggregation', 'window',
  'horizontal', 'alias', 'cast', 'fill_null', 'when', 'name',
];

export function mongoCapabilities(emulateNullableBoolean: boolean): BackendCapabilities {
  return Object.freeze<BackendCapabilities>({
    lazy: true,
    nullableBoolean: false,
    booleanUpcast: emulateNullableBoolean,
    nodes: new Set(NODES),
    unary: new Set(['negate', 'not', 'is_null', 'is_not_null', 'is_nan', 'abs', 'sqrt', 'exp', 'floor', 'ceil', 'round', 'log'] as const),
    binary: new Set([
      'add', 'sub', 'mul', 'div', 'floor_div', 'mod', 'pow',
      'eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'and', 'or', 'xor',
    ] as const),
    aggregations: new Set([
      'sum', 'mean', 'min', 'max', 'count', 'len', 'n_unique', 'null_count', 'std', 'var', 'any', 'all',
    ] as const),
    windows: new Set(['over', 'cum_sum', 'cum_count', 'cum_min', 'cum_max', 'shift'] as const),
    horizontal: new Set(['any', 'all', 'sum', 'min', 'max'] as const),
    groupKeys: { nulls: 'own-group', nan: 'own-group' },
    windowsNeedOrder: true,
  });
}

/** BSON value → JS value; missing fields read as null. */
function fromBson(v: unknown): unknown {
  if (v === undefined || v === null) return null;
  if (v instanceof Long) return v.toNumber();
  if (v instanceof Decimal128) return Number(v.toString());
  return v;
}

export class MongoAdapter implements Adapter<MongoNative, MongoColumn> {
  name: 'mongodb' = 'mongodb';
  readonly capabilities: BackendCapabilities;
  private readonly strategy: BooleanStrategy;

  constructor(private readonly options: MongoAdapterOptions = {}) {
    this.capabilities = mongoCapabilities(options.emulateNullableBoolean === true);
    this.strategy = planBooleanSemantics(this.capabilities);
  }

  /** Collections carry no schema: a hint closes it, otherwise unknown names read as Unknown. */
  resolveSchema(_native: MongoNative, hint?: Schema): Schema {
    return hint ? new Schema(hint.entries()) : new Schema([], true);
  }

  wrap(native: MongoNative, hint?: Schema): FrameHandle<MongoNative> {
    return this.handle(native, this.resolveSchema(native, hint), []);
  }

  lower(node: ExprNode, frame: FrameHandle<MongoNative>): MongoColumn {
    const bare = stripNaming(node);
    const ctx = newContext(frame.schema, this.strategy, { kind: 'window', partitionBy: [] });
    const expr = lowerExpr(bare, ctx);
    return { expr, stages: ctx.stages, dtype: inferDtype(bare, frame.schema, { strict: true }), scalar: isScalar(bare) };
  }

  dtypeOf(column: MongoColumn): DType {
    return column.dtype;
  }

  // ---------- frame operations ----------
  applyColumns(exprs: readonly NamedExpr[], frame: FrameHandle<MongoNative>, mode: ApplyMode): FrameHandle<MongoNative> {
    if (exprs.length === 0 && mode === 'project') throw new InvalidOperationError('select() needs at least one expression');
    const reduces = mode === 'project' && exprs.every(e => isScalar(e.node));
    const scope: AccScope = reduces ? { kind: 'group' } : { kind: 'window', partitionBy: [] };
    const ctx = newContext(frame.schema, this.strategy, scope);
    const notes = this.approximations(exprs.map(e => e.node));
    const fields: Document = {};
    let schema = mode === 'extend' ? frame.schema : new Schema([]);
    for (const e of exprs) {
      const bare = stripNaming(e.node);
      fields[e.name] = lowerExpr(bare, ctx);
      schema = schema.with(e.name, inferDtype(bare, frame.schema, { strict: true }));
    }

    const stages: Document[] = [...ctx.stages];
    if (reduces) {
      // $group emits nothing for an empty input; a reduction still has its one row
      stages.push(
        { $facet: { rows: [{ $group: { _id: null, ...ctx.accumulators } }] } },
        { $replaceRoot: { newRoot: { $ifNull: [{ $arrayElemAt: ['$rows', 0] }, { $literal: emptyAccumulators(ctx.accumulators) }] } } },
      );
    }
    if (mode === 'extend') {
      stages.push({ $addFields: fields });
      if (ctx.temps.length > 0) stages.push({ $unset: ctx.temps });
    } else {
      stages.push({ $project: { _id: 0, ...fields } });
    }
    return this.derive(stages, frame, schema, notes);
  }

  filter(predicate: ExprNode, frame: FrameHandle<MongoNative>): FrameHandle<MongoNative> {
    const ctx = newContext(frame.schema, this.strategy, { kind: 'window', partitionBy: [] });
    const notes = this.approximations([predicate]);
    const cond = lowerExpr(stripNaming(predicate), ctx);
    const stages: Document[] = [...ctx.stages, { $match: { $expr: cond } }];
    if (ctx.temps.length > 0) stages.push({ $unset: ctx.temps });
    return this.derive(stages, frame, frame.schema, notes);
  }

  aggregate(exprs: readonly NamedExpr[], keys: readonly string[], frame: FrameHandle<MongoNative>): FrameHandle<MongoNative> {
    if (keys.length === 0) return this.applyColumns(exprs, frame, 'project');
    const ctx = newContext(frame.schema, this.strategy, { kind: 'group' });
    const notes: SemanticsNote[] = [...this.approximations(exprs.map(e => e.node))];
    const fields: Document = {};
    keys.forEach((k, i) => {
      frame.schema.get(k);
      fields[k] = `$_id.${KEY_PREFIX}${i}`;
    });
    const items = exprs.map(e => {
      const bare = stripNaming(e.node);
      if (!isScalar(bare)) {
        throw new InvalidOperationError(`Expression '${e.name}' does not reduce to one value per group`, { name: e.name });
      }
      fields[e.name] = lowerExpr(bare, ctx);
      return [e.name, inferDtype(bare, frame.schema, { strict: true })] as const;
    });
    const id = Object.fromEntries(keys.map((k, i) => [`${KEY_PREFIX}${i}`, fieldRef(k)]));
    const stages: Document[] = [...ctx.stages, { $group: { _id: id, ...ctx.accumulators } }, { $project: { _id: 0, ...fields } }];
    const divergence = groupKeyDivergence(this.name, this.capabilities);
    if (divergence) {
      log.warn({ note: divergence, keys }, 'group-key-divergence');
      notes.push(divergence);
    }
    const schema = new Schema([...keys.map(k => [k, frame.schema.get(k)] as const), ...items]);
    return this.derive(stages, frame, schema, notes);
  }

  sort(by: readonly string[], options: SortOptions, frame: FrameHandle<MongoNative>): FrameHandle<MongoNative> {
    const flag = options.descending;
    const spec: Document = {};
    by.forEach((c, i) => {
      frame.schema.get(c);
      const desc = typeof flag === 'boolean' || flag === undefined ? flag === true : flag[i] === true;
      // BSON order puts null first ascending and last descending; nothing else is expressible
      if (options.nullsLast && !desc) {
        throw new UnsupportedOperationError('sort', this.name, 'nulls_last on an ascending key');
      }
      spec[c] = desc ? -1 : 1;
    });
    return this.derive([{ $sort: spec }], frame, frame.schema, []);
  }

  head(n: number, frame: FrameHandle<MongoNative>): FrameHandle<MongoNative> {
    const stage = n > 0 ? { $limit: Math.floor(n) } : { $match: { $expr: false } };
    return this.derive([stage], frame, frame.schema, []);
  }

  explain(frame: FrameHandle<MongoNative>): ExplainResult {
    return { backend: this.name, lazy: true, plan: pipelineOf(frame.native), notes: frame.notes };
  }

  async collect(frame: FrameHandle<MongoNative>): Promise<ColumnData> {
    const native = frame.native;
    // a cursor iterates once; run a fresh copy so the frame stays collectable
    const docs = await withBackendErrorsAsync(this.name, () =>
      native instanceof Collection ? native.find({}).toArray() : native.clone().toArray());
    const names = frame.schema.names();
    if (frame.schema.open) {
      const known = new Set(names);
      for (const doc of docs) {
        for (const key of Object.keys(doc)) {
          if (key === '_id' || known.has(key)) continue;
          known.add(key);
          names.push(key);
        }
      }
    }
    const out: ColumnData = Object.fromEntries(names.map(n => [n, []]));
    for (const doc of docs) {
      for (const n of names) out[n].push(fromBson(doc[n]));
    }
    return out;
  }

  // ---------- helpers ----------
  private handle(native: MongoNative, schema: Schema, notes: readonly SemanticsNote[]): FrameHandle<MongoNative> {
    return Object.freeze({ native, schema, notes });
  }

  private approximations(nodes: readonly ExprNode[]): SemanticsNote[] {
    if (this.strategy !== 'approximate') return [];
    const policy = this.options.approximations ?? getConfig().approximations;
    const features = new Set(nodes.flatMap(nullableBooleanFeatures));
    return [...features].map(f => resolveApproximation(booleanFallbackNote(this.name, f), policy, log));
  }

  /** A new cursor on the same collection with the stages appended; nothing is sent yet. */
  private derive(
    stages: readonly Document[],
    frame: FrameHandle<MongoNative>,
    schema: Schema,
    notes: readonly SemanticsNote[]
  ): FrameHandle<MongoNative> {
    const pipeline = [...pipelineOf(frame.native), ...stages];
    log.debug({ pipeline }, 'lowered-pipeline');
    const collection = collectionOf(frame.native);
    const cursor = withBackendErrors(this.name, () => collection.aggregate<Document>(pipeline));
    return this.handle(cursor, schema, mergeNotes(frame.notes, notes));
  }
}

export function pipelineOf(native: MongoNative): Document[] {
  return native instanceof Collection ? [] : [...native.pipeline];
}

function collectionOf(native: MongoNative): Collection<Document> {
  if (native instanceof Collection) return native;
  const ns = native.namespace;
  if (ns.collection === undefined) {
    throw new InvalidOperationError('Database-level aggregation cursors cannot be extended', { db: ns.db });
  }
  return native.client.db(ns.db).collection(ns.collection);
}
