/* packages/expr-sqlite/test/adapter.spec.ts */
import { describe, it, beforeEach, afterEach, expect } from 'vitest';
import Database from 'better-sqlite3';
import {
  DT, Schema, allHorizontal, anyHorizontal, assertSupported, col, lit, sumHorizontal, toNamedExprs,
  NativeEngineError, UnknownDtypeError, UnsupportedOperationError,
  type ColumnData, type Expr, type FrameHandle,
} from '@framebridge/core';
import { SQLITE_CAPABILITIES, SQLiteAdapter, declTypeToDtype, type SqliteStatement } from '../src';

const adapter = new SQLiteAdapter();
let db: Database.Database;

beforeEach(() => { db = new Database(':memory:'); });
afterEach(() => { db.close(); });

function frame(ddl: string, ...inserts: string[]): FrameHandle<SqliteStatement> {
  db.exec(ddl);
  inserts.forEach(i => db.exec(i));
  return adapter.wrap(db.prepare('SELECT * FROM t'));
}

function named(f: FrameHandle<SqliteStatement>, ...exprs: Expr[]) {
  return toNamedExprs(exprs.map(e => e.node), f.schema);
}

/** Collect after ordering by `id`, so assertions do not lean on SQLite's scan order. */
async function byId(f: FrameHandle<SqliteStatement>): Promise<ColumnData> {
  return adapter.collect(adapter.sort(['id'], {}, f));
}

describe('SQLite adapter: schema', () => {
  it('maps declared column types', () => {
    const f = frame('CREATE TABLE t (id INTEGER, a REAL, s TEXT, flag BOOLEAN, ts DATETIME, d DATE)');
    expect(f.schema.equals(Schema.from({
      id: DT.Int64, a: DT.Float64, s: DT.String, flag: DT.Boolean, ts: DT.Datetime('ms'), d: DT.Date,
    }))).toBe(true);
  });

  it('reads computed columns as Unknown and refuses unknown declared types', () => {
    db.exec('CREATE TABLE t (a INTEGER)');
    const f = adapter.wrap(db.prepare('SELECT a, a * 2 AS b FROM t'));
    expect(f.schema.get('b')).toEqual(DT.Unknown);
    expect(() => declTypeToDtype('JSON')).toThrow(UnknownDtypeError);
  });

  it('keeps an unmappable declared type in the schema as Unknown', () => {
    db.exec('CREATE TABLE t (a INTEGER, doc JSON)');
    const f = adapter.wrap(db.prepare('SELECT * FROM t'));
    expect(f.schema.get('doc')).toEqual(DT.Unknown);
  });

  it('refuses statements with parameters', () => {
    db.exec('CREATE TABLE t (a INTEGER, s TEXT)');
    expect(() => adapter.wrap(db.prepare('SELECT * FROM t WHERE a > ?')))
      .toThrow('Statement has parameters; inline the values before wrapping it');
    expect(() => adapter.wrap(db.prepare('SELECT * FROM t WHERE a = :a'))).toThrow('Statement has parameters');
    expect(adapter.wrap(db.prepare("SELECT * FROM t WHERE s <> '?' -- :not_a_parameter")).schema.names()).toEqual(['a', 's']);
  });

  it('refuses 64-bit integers a number cannot hold', async () => {
    db.exec('CREATE TABLE t (a INTEGER)');
    db.exec('INSERT INTO t VALUES (5), (1152921504606846976)');
    const f = adapter.wrap(db.prepare('SELECT * FROM t').safeIntegers());
    await expect(adapter.collect(f)).rejects.toThrow(NativeEngineError);
    await expect(adapter.collect(f)).rejects.toThrow('[sqlite] integer 1152921504606846976 does not fit in a float64 without rounding');
    const small = adapter.wrap(db.prepare('SELECT * FROM t WHERE a < 10').safeIntegers());
    expect(await adapter.collect(small)).toEqual({ a: [5] });
  });

  it('takes dtypes from a schema hint', () => {
    db.exec('CREATE TABLE t (a INTEGER)');
    const f = adapter.wrap(db.prepare('SELECT a, a > 0 AS pos FROM t'), Schema.from({ pos: DT.Boolean }));
    expect(f.schema.get('pos')).toEqual(DT.Boolean);
  });
});

describe('SQLite adapter: expressions', () => {
  it('propagates nulls through arithmetic and comparison', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, a REAL)', 'INSERT INTO t VALUES (1, 1.4), (2, NULL), (3, 4.2)');
    const out = await byId(adapter.applyColumns(
      named(f, col('id'), col('a').mul(2).alias('double'), col('a').gt(2).alias('big')), f, 'project'));
    expect(out).toEqual({ id: [1, 2, 3], double: [2.8, null, 8.4], big: [false, null, true] });
  });

  it('keeps SQL three-valued logic for and/or', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, p BOOLEAN, q BOOLEAN)', 'INSERT INTO t VALUES (1, 1, NULL), (2, 0, NULL), (3, NULL, NULL)');
    const out = await byId(adapter.applyColumns(
      named(f, col('p').and(col('q')).alias('and'), col('p').or(col('q')).alias('or')), f, 'extend'));
    expect(out.and).toEqual([null, false, null]);
    expect(out.or).toEqual([true, null, null]);
  });

  it('matches the full Kleene tables for and/or', async () => {
    const f = frame(
      'CREATE TABLE t (id INTEGER, p BOOLEAN, q BOOLEAN)',
      'INSERT INTO t VALUES (1, 1, 1), (2, 1, 0), (3, 1, NULL), (4, 0, 1), (5, 0, 0), (6, 0, NULL), (7, NULL, 1), (8, NULL, 0), (9, NULL, NULL)',
    );
    const out = await byId(adapter.applyColumns(
      named(f, col('p').and(col('q')).alias('and'), col('p').or(col('q')).alias('or')), f, 'extend'));
    expect(out.and).toEqual([true, false, null, false, false, false, null, false, null]);
    expect(out.or).toEqual([true, true, true, true, false, null, true, null, null]);
  });

  it('skips nulls in any/all_horizontal only when asked to', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, p BOOLEAN, q BOOLEAN)', 'INSERT INTO t VALUES (1, 1, NULL), (2, 0, NULL), (3, NULL, NULL)');
    const out = await byId(adapter.applyColumns(named(
      f,
      col('id'),
      anyHorizontal(['p', 'q'], { ignoreNulls: true }).alias('any_skip'),
      allHorizontal(['p', 'q'], { ignoreNulls: true }).alias('all_skip'),
      anyHorizontal(['p', 'q']).alias('any'),
      allHorizontal(['p', 'q']).alias('all'),
    ), f, 'project'));
    expect(out.any_skip).toEqual([true, false, false]);
    expect(out.all_skip).toEqual([true, false, true]);
    expect(out.any).toEqual([true, null, null]);
    expect(out.all).toEqual([null, false, null]);
  });

  it('rounds half away from zero and takes logarithms', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, x REAL)', 'INSERT INTO t VALUES (1, 1.25), (2, -1.25), (3, 2.5), (4, NULL)');
    const out = await byId(adapter.applyColumns(
      named(f, col('id'), col('x').round(1).alias('r1'), col('x').round().alias('r0')), f, 'project'));
    expect(out.r1).toEqual([1.3, -1.3, 2.5, null]);
    expect(out.r0).toEqual([1, -1, 3, null]);

    db.exec('CREATE TABLE u (id INTEGER, x REAL)');
    db.exec('INSERT INTO u VALUES (1, 8), (2, 1), (3, 0), (4, NULL)');
    const g = adapter.wrap(db.prepare('SELECT * FROM u'));
    const logs = await byId(adapter.applyColumns(named(g, col('id'), col('x').log(2).alias('l')), g, 'project'));
    expect(logs.l[0]).toBeCloseTo(3);
    expect(logs.l.slice(1)).toEqual([0, -Infinity, null]);
  });

  it('answers null for division by zero and floors modulo', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, a INTEGER, b INTEGER)', 'INSERT INTO t VALUES (1, 1, 0), (2, 2, 1), (3, -7, 3)');
    const out = await byId(adapter.applyColumns(named(
      f,
      col('id'),
      col('a').truediv(col('b')).alias('div'),
      col('a').floordiv(col('b')).alias('fdiv'),
      col('a').mod(col('b')).alias('mod'),
    ), f, 'project'));
    expect(out.div).toEqual([null, 2, -7 / 3]);
    expect(out.fdiv).toEqual([null, 2, -3]);
    expect(out.mod).toEqual([null, 0, 2]);
  });

  it('sums horizontally, treating an all-null row as 0', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, a INTEGER, b INTEGER)', 'INSERT INTO t VALUES (1, 1, 2), (2, NULL, NULL)');
    const out = await byId(adapter.applyColumns(named(f, col('id'), sumHorizontal(['a', 'b']).alias('total')), f, 'project'));
    expect(out.total).toEqual([3, 0]);
  });

  it('turns NaN literals into NULL and notes it', () => {
    const f = frame('CREATE TABLE t (id INTEGER)');
    const next = adapter.applyColumns(named(f, lit(NaN).alias('n')), f, 'extend');
    expect(next.notes.map(n => n.kind)).toEqual(['nan-as-null']);
  });

  it('refuses median', () => {
    const f = frame('CREATE TABLE t (id INTEGER, a REAL)');
    expect(() => adapter.applyColumns(named(f, col('a').median()), f, 'project'))
      .toThrow("'aggregation:median' is not supported by the sqlite backend");
  });
});

describe('SQLite adapter: frames', () => {
  it('evaluates with_columns against the input frame', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, a INTEGER)', 'INSERT INTO t VALUES (1, 1), (2, 2)');
    const next = adapter.applyColumns(named(f, col('a').add(1).alias('a'), col('a').mul(10).alias('b')), f, 'extend');
    expect(next.schema.names()).toEqual(['id', 'a', 'b']);
    expect(await byId(next)).toEqual({ id: [1, 2], a: [2, 3], b: [10, 20] });
  });

  it('reduces an all-scalar projection to one row', async () => {
    const f = frame('CREATE TABLE t (a INTEGER)', 'INSERT INTO t VALUES (1), (2), (3)');
    const out = await adapter.collect(adapter.applyColumns(named(f, col('a').sum().alias('total'), col('a').mean().alias('avg')), f, 'project'));
    expect(out).toEqual({ total: [6], avg: [2] });
  });

  it('returns null for a sum over no values', async () => {
    const f = frame('CREATE TABLE t (a INTEGER)', 'INSERT INTO t VALUES (1), (2)');
    const empty = adapter.filter(col('a').gt(5).node, f);
    const out = await adapter.collect(adapter.applyColumns(named(empty, col('a').sum()), empty, 'project'));
    expect(out).toEqual({ a: [null] });
  });

  it('filters on a windowed predicate through a subquery', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, a INTEGER)', 'INSERT INTO t VALUES (1, 1), (2, 5), (3, 3)');
    const out = await byId(adapter.filter(col('a').gt(col('a').mean()).node, f));
    expect(out).toEqual({ id: [2], a: [5] });
  });

  it('merges NaN keys with null keys and flags the divergence', async () => {
    const f = frame('CREATE TABLE t (k REAL, v INTEGER)');
    const insert = db.prepare('INSERT INTO t VALUES (?, ?)');
    insert.run(1, 1);
    insert.run(NaN, 2);
    insert.run(null, 3);
    insert.run(1, 4);
    const grouped = adapter.aggregate(named(f, col('v').sum()), ['k'], f);
    expect(await adapter.collect(adapter.sort(['k'], {}, grouped))).toEqual({ k: [null, 1], v: [5, 5] });
    expect(grouped.notes).toEqual([{
      kind: 'group-key-divergence',
      backend: 'sqlite',
      message: 'sqlite grouping: NaN keys are merged with null keys',
    }]);
  });

  it('composes sort and head without running anything', () => {
    const f = frame('CREATE TABLE t (x INTEGER)');
    const sorted = adapter.sort(['x'], { descending: true, nullsLast: true }, f);
    expect(adapter.explain(sorted)).toEqual({
      backend: 'sqlite',
      lazy: true,
      plan: 'SELECT * FROM (SELECT * FROM t) AS "t0" ORDER BY "x" DESC NULLS LAST',
      notes: [],
    });
    expect(adapter.explain(adapter.head(2, f)).plan).toBe('SELECT * FROM (SELECT * FROM t) AS "t0" LIMIT 2');
  });
});

describe('SQLite adapter: windows', () => {
  it('runs a cumulative sum per partition in order', async () => {
    const f = frame(
      'CREATE TABLE t (id INTEGER, g TEXT, tm INTEGER, x INTEGER)',
      "INSERT INTO t VALUES (1, 'a', 2, 10), (2, 'b', 1, 20), (3, 'a', 1, 30), (4, 'b', 2, 40)",
    );
    const out = await byId(adapter.applyColumns(named(f, col('id'), col('x').cumSum().over('g', { orderBy: 'tm' })), f, 'project'));
    expect(out.x).toEqual([40, 20, 30, 60]);
  });

  it('ranks with ties averaged and nulls left null', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, x INTEGER)', 'INSERT INTO t VALUES (1, 3), (2, 1), (3, 3), (4, NULL)');
    const out = await byId(adapter.applyColumns(named(f, col('id'), col('x').rank()), f, 'project'));
    expect(out.x).toEqual([2.5, 1, 2.5, null]);
  });

  it('computes rolling variance and standard deviation over present values', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, x REAL)', 'INSERT INTO t VALUES (1, 1), (2, 2), (3, 4), (4, NULL), (5, 6)');
    const out = await byId(adapter.applyColumns(named(
      f,
      col('id'),
      col('x').rollingVar(2).over([], { orderBy: 'id' }).alias('var'),
      col('x').rollingStd(2).over([], { orderBy: 'id' }).alias('std'),
    ), f, 'project'));
    expect(out.var).toEqual([null, 0.5, 2, null, null]);
    expect(out.std).toEqual([null, Math.sqrt(0.5), Math.sqrt(2), null, null]);
  });

  it('flags unique, first and last distinct values', async () => {
    const f = frame('CREATE TABLE t (id INTEGER, x INTEGER)', 'INSERT INTO t VALUES (1, 1), (2, 2), (3, 1), (4, 1), (5, NULL)');
    const out = await byId(adapter.applyColumns(named(
      f,
      col('id'),
      col('x').isUnique().alias('unique'),
      col('x').isFirstDistinct().over([], { orderBy: 'id' }).alias('first'),
      col('x').isLastDistinct().over([], { orderBy: 'id' }).alias('last'),
    ), f, 'project'));
    expect(out.unique).toEqual([false, true, false, false, true]);
    expect(out.first).toEqual([true, true, false, false, true]);
    expect(out.last).toEqual([false, true, false, true, true]);
  });

  it('needs an explicit order for order-dependent windows', () => {
    expect(() => assertSupported(col('x').cumSum().node, 'sqlite', SQLITE_CAPABILITIES))
      .toThrow(UnsupportedOperationError);
    expect(() => assertSupported(col('x').cumProd().over([], { orderBy: 'id' }).node, 'sqlite', SQLITE_CAPABILITIES))
      .toThrow("'window:cum_prod' is not supported by the sqlite backend");
  });
});

describe('SQLite adapter: temporal arithmetic', () => {
  function timeline(): FrameHandle<SqliteStatement> {
    db.exec('CREATE TABLE t (id INTEGER, start DATETIME, stop DATETIME, step INTEGER)');
    db.exec(`INSERT INTO t VALUES
      (1, '2024-01-01T00:00:00.000Z', '2024-01-01T00:01:30.000Z', 2000),
      (2, NULL, '2024-01-01T00:00:05.000Z', 3000),
      (3, '2024-01-01T00:00:10.000Z', '2024-01-01T00:00:40.000Z', NULL)`);
    return adapter.wrap(db.prepare('SELECT * FROM t'), Schema.from({ step: DT.Duration('ms') }));
  }

  it('subtracts datetimes into millisecond durations', async () => {
    const f = timeline();
    const next = adapter.applyColumns(named(f, col('id'), col('stop').sub(col('start')).alias('gap')), f, 'project');
    expect(next.schema.get('gap')).toEqual(DT.Duration('ms'));
    expect((await byId(next)).gap).toEqual([90000, null, 30000]);
  });

  it('shifts datetimes by durations', async () => {
    const f = timeline();
    const out = await byId(adapter.applyColumns(named(
      f,
      col('id'),
      col('start').add(col('step')).alias('later'),
      col('stop').sub(col('step')).alias('earlier'),
    ), f, 'project'));
    expect(out.later).toEqual([new Date('2024-01-01T00:00:02.000Z'), null, null]);
    expect(out.earlier).toEqual([new Date('2024-01-01T00:01:28.000Z'), new Date('2024-01-01T00:00:02.000Z'), null]);
  });

  it('diffs a datetime column in order', async () => {
    const f = timeline();
    const out = await byId(adapter.applyColumns(named(f, col('id'), col('stop').diff().over([], { orderBy: 'id' })), f, 'project'));
    expect(out.stop).toEqual([null, -85000, 35000]);
  });
});
