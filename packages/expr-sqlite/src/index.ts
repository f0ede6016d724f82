// packages/expr-sqlite/src/index.ts
import { Kysely, SqliteDialect, sql } from 'kysely';
import type Database from 'better-sqlite3';
import {
  DT, InvalidOperationError, Schema, UnknownDtypeError, backendLogger, containsAggregation, containsWindow, groupKeyDivergence,
  inferDtype, isScalar, mergeNotes, safeInteger, stripNaming, withBackendErrors,
  type Adapter, type ApplyMode, type BackendCapabilities, type ColumnData, type DType, type ExplainResult,
  type ExprNode, type FrameHandle, type NamedExpr, type NodeKind, type SemanticsNote, type SortOptions,
} from '@framebridge/core';
import { declTypeToDtype } from './dtypes';
import { identifier, lowerNode, type Fragment, type LowerContext } from './lower';

export { declTypeToDtype, castTarget } from './dtypes';
export { lowerNode, type Fragment, type LowerContext } from './lower';

export type SqliteStatement = Database.Statement<unknown[], unknown>;

/** A lowered SQL expression; its dtype comes from the tree, since SQLite types values, not columns. */
export interface SqlColumn {
  sql: Fragment;
  dtype: DType;
  scalar: boolean;
}

const log = backendLogger('sqlite');

const NODES: NodeKind[] = [
  'column', 'literal', 'unary', 'binary', 'aggregation', 'window',
  'horizontal', 'alias', 'cast', 'fill_null', 'when', 'name',
];

export const SQLITE_CAPABILITIES: BackendCapabilities = Object.freeze<BackendCapabilities>({
  lazy: true,
  nullableBoolean: true,
  booleanUpcast: false,
  nodes: new Set(NODES),
  unary: new Set(['negate', 'not', 'is_null', 'is_not_null', 'is_nan', 'abs', 'sqrt', 'exp', 'floor', 'ceil', 'round', 'log'] as const),
  binary: new Set([
    'add', 'sub', 'mul', 'div', 'floor_div', 'mod', 'pow',
    'eq', 'neq', 'lt', 'lte', 'gt', 'gte', 'and', 'or', 'xor',
  ] as const),
  aggregations: new Set([
    'sum', 'mean', 'min', 'max', 'count', 'len', 'n_unique', 'null_count', 'std', 'var', 'any', 'all',
  ] as const),
  windows: new Set([
    'over', 'cum_sum', 'cum_count', 'cum_min', 'cum_max', 'shift', 'diff', 'rank',
    'rolling_sum', 'rolling_mean', 'rolling_var', 'rolling_std', 'is_unique', 'is_first_distinct', 'is_last_distinct',
  ] as const),
  horizontal: new Set(['any', 'all', 'sum', 'min', 'max'] as const),
  groupKeys: { nulls: 'own-group', nan: 'merged-with-null' },
  windowsNeedOrder: true,
});

function isRow(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/** SQLite storage value → JS value of the column's dtype. */
function fromStorage(v: unknown, dtype: DType): unknown {
  if (v === null || v === undefined) return null;
  if (typeof v === 'bigint') return safeInteger(v, 'sqlite');
  switch (dtype.kind) {
    case 'boolean': return typeof v === 'number' ? v !== 0 : v;
    case 'date':
    case 'datetime':
      return typeof v === 'string' || typeof v === 'number' ? new Date(v) : v;
    default: return v;
  }
}

// placeholders outside string literals, quoted identifiers and comments
const QUOTED = /'(?:[^']|'')*'|"(?:[^"]|"")*"|`[^`]*`|\[[^\]]*\]|--[^\n]*|\/\*[\s\S]*?\*\//g;
const PARAMETER = /\?\d*|[:@$][A-Za-z_]\w*/;

function hasParameters(text: string): boolean {
  return PARAMETER.test(text.replace(QUOTED, ' '));
}

// an unmappable declared type stays in the schema as Unknown
function schemaDtype(declType: string | null): DType {
  try {
    return declTypeToDtype(declType);
  } catch (e) {
    if (!(e instanceof UnknownDtypeError)) throw e;
    log.debug({ declType }, 'unknown-dtype');
    return DT.Unknown;
  }
}

export class SQLiteAdapter implements Adapter<SqliteStatement, SqlColumn> {
  name: 'sqlite' = 'sqlite';
  readonly capabilities = SQLITE_CAPABILITIES;
  private readonly compilers = new WeakMap<Database.Database, Kysely<Record<string, never>>>();

  resolveSchema(stmt: SqliteStatement, hint?: Schema): Schema {
    if (!stmt.reader) throw new InvalidOperationError('Statement does not return rows', { source: stmt.source });
    // composed statements are re-prepared from the text, which would drop bound values
    if (hasParameters(stmt.source)) {
      throw new InvalidOperationError('Statement has parameters; inline the values before wrapping it', { source: stmt.source });
    }
    const columns = withBackendErrors(this.name, () => stmt.columns());
    return new Schema(columns.map(c => [c.name, hint?.has(c.name) ? hint.get(c.name) : schemaDtype(c.type)] as const));
  }

  wrap(stmt: SqliteStatement, hint?: Schema): FrameHandle<SqliteStatement> {
    return this.handle(stmt, this.resolveSchema(stmt, hint), []);
  }

  lower(node: ExprNode, frame: FrameHandle<SqliteStatement>): SqlColumn {
    const bare = stripNaming(node);
    const fragment = lowerNode(bare, this.context(frame, isScalar(bare) ? null : sql`OVER ()`, []));
    return { sql: fragment, dtype: inferDtype(bare, frame.schema, { strict: true }), scalar: isScalar(bare) };
  }

  dtypeOf(column: SqlColumn): DType {
    return column.dtype;
  }

  // --- frame operations ---
  applyColumns(exprs: readonly NamedExpr[], frame: FrameHandle<SqliteStatement>, mode: ApplyMode): FrameHandle<SqliteStatement> {
    if (exprs.length === 0 && mode === 'project') throw new InvalidOperationError('select() needs at least one expression');
    // a projection of scalars reduces to one row; anything else keeps every row,
    // so aggregates become window aggregates over the whole frame
    const reduces = mode === 'project' && exprs.every(e => isScalar(e.node));
    const notes: SemanticsNote[] = [];
    const ctx = this.context(frame, reduces ? null : sql`OVER ()`, notes);
    const computed = new Map(exprs.map(e => {
      const bare = stripNaming(e.node);
      return [e.name, { sql: lowerNode(bare, ctx), dtype: inferDtype(bare, frame.schema, { strict: true }) }] as const;
    }));

    const items: Array<[string, Fragment, DType]> = [];
    if (mode === 'extend') {
      for (const [name, dtype] of frame.schema.entries()) {
        const c = computed.get(name);
        items.push(c ? [name, c.sql, c.dtype] : [name, identifier(name), dtype]);
        computed.delete(name);
      }
    }
    for (const [name, c] of computed) items.push([name, c.sql, c.dtype]);

    const list = sql.join(items.map(([name, x]) => sql`${x} AS ${sql.id(name)}`));
    const needsSource = !reduces || exprs.some(e => containsAggregation(e.node));
    const query = needsSource ? sql`SELECT ${list} FROM ${this.source(frame)}` : sql`SELECT ${list}`;
    const schema = new Schema(items.map(([name, , dtype]) => [name, dtype] as const));
    return this.derive(query, frame, schema, notes);
  }

  filter(predicate: ExprNode, frame: FrameHandle<SqliteStatement>): FrameHandle<SqliteStatement> {
    const notes: SemanticsNote[] = [];
    const bare = stripNaming(predicate);
    const cond = lowerNode(bare, this.context(frame, sql`OVER ()`, notes));
    // window and aggregate calls are not allowed in WHERE: compute the mask first
    const query = containsAggregation(bare) || containsWindow(bare)
      ? sql`SELECT ${sql.join(frame.schema.names().map(identifier))} FROM (SELECT *, ${cond} AS ${sql.id('__fb_keep')} FROM ${this.source(frame)}) AS ${sql.id('t1')} WHERE ${sql.id('__fb_keep')}`
      : sql`SELECT * FROM ${this.source(frame)} WHERE ${cond}`;
    return this.derive(query, frame, frame.schema, notes);
  }

  aggregate(exprs: readonly NamedExpr[], keys: readonly string[], frame: FrameHandle<SqliteStatement>): FrameHandle<SqliteStatement> {
    if (keys.length === 0) return this.applyColumns(exprs, frame, 'project');
    const notes: SemanticsNote[] = [];
    const ctx = this.context(frame, null, notes);
    const keyList = keys.map(k => { frame.schema.get(k); return identifier(k); });
    const items = exprs.map(e => {
      const bare = stripNaming(e.node);
      if (!isScalar(bare)) {
        throw new InvalidOperationError(`Expression '${e.name}' does not reduce to one value per group`, { name: e.name });
      }
      return { name: e.name, sql: lowerNode(bare, ctx), dtype: inferDtype(bare, frame.schema, { strict: true }) };
    });
    const list = sql.join([...keyList, ...items.map(i => sql`${i.sql} AS ${sql.id(i.name)}`)]);
    const query = sql`SELECT ${list} FROM ${this.source(frame)} GROUP BY ${sql.join(keyList)}`;
    const divergence = groupKeyDivergence(this.name, this.capabilities);
    if (divergence) {
      log.warn({ note: divergence, keys }, 'group-key-divergence');
      notes.push(divergence);
    }
    const schema = new Schema([
      ...keys.map(k => [k, frame.schema.get(k)] as const),
      ...items.map(i => [i.name, i.dtype] as const),
    ]);
    return this.derive(query, frame, schema, notes);
  }

  sort(by: readonly string[], options: SortOptions, frame: FrameHandle<SqliteStatement>): FrameHandle<SqliteStatement> {
    const flag = options.descending;
    const order = by.map((c, i) => {
      frame.schema.get(c);
      const desc = typeof flag === 'boolean' || flag === undefined ? flag === true : flag[i] === true;
      return sql`${identifier(c)}${desc ? sql` DESC` : sql``}${options.nullsLast ? sql` NULLS LAST` : sql``}`;
    });
    return this.derive(sql`SELECT * FROM ${this.source(frame)} ORDER BY ${sql.join(order)}`, frame, frame.schema, []);
  }

  head(n: number, frame: FrameHandle<SqliteStatement>): FrameHandle<SqliteStatement> {
    return this.derive(sql`SELECT * FROM ${this.source(frame)} LIMIT ${sql.lit(Math.max(0, n))}`, frame, frame.schema, []);
  }

  explain(frame: FrameHandle<SqliteStatement>): ExplainResult {
    return { backend: this.name, lazy: true, plan: frame.native.source, notes: frame.notes };
  }

  async collect(frame: FrameHandle<SqliteStatement>): Promise<ColumnData> {
    const rows = withBackendErrors(this.name, () => frame.native.all());
    const names = frame.schema.names();
    const out: ColumnData = Object.fromEntries(names.map(n => [n, []]));
    for (const row of rows) {
      if (!isRow(row)) continue;
      for (const n of names) out[n].push(fromStorage(row[n], frame.schema.get(n)));
    }
    return out;
  }

  // --- helpers ---
  private handle(stmt: SqliteStatement, schema: Schema, notes: readonly SemanticsNote[]): FrameHandle<SqliteStatement> {
    return Object.freeze({ native: stmt, schema, notes });
  }

  private context(frame: FrameHandle<SqliteStatement>, over: Fragment | null, notes: SemanticsNote[]): LowerContext {
    return { schema: frame.schema, over, notes };
  }

  /** The frame's statement as a derived table. */
  private source(frame: FrameHandle<SqliteStatement>): Fragment {
    const text = frame.native.source.trim().replace(/;+\s*$/, '');
    return sql`(${sql.raw(text)}) AS ${sql.id('t0')}`;
  }

  private compiler(db: Database.Database): Kysely<Record<string, never>> {
    let k = this.compilers.get(db);
    if (!k) {
      k = new Kysely<Record<string, never>>({ dialect: new SqliteDialect({ database: db }) });
      this.compilers.set(db, k);
    }
    return k;
  }

  /** Compile and prepare a query on the frame's database; nothing runs until collect. */
  private derive(
    query: Fragment,
    frame: FrameHandle<SqliteStatement>,
    schema: Schema,
    notes: readonly SemanticsNote[]
  ): FrameHandle<SqliteStatement> {
    const db = frame.native.database;
    const compiled = query.compile(this.compiler(db));
    log.debug({ sql: compiled.sql }, 'lowered-statement');
    const stmt: SqliteStatement = withBackendErrors(this.name, () => db.prepare<unknown[], unknown>(compiled.sql));
    return this.handle(stmt, schema, mergeNotes(frame.notes, notes));
  }
}
