/* packages/expr-mongo/test/adapter.spec.ts */
import { describe, it, afterAll, expect } from 'vitest';
import { MongoClient, type Document } from 'mongodb';
import {
  DT, Schema, assertSupported, col, toNamedExprs, UnsupportedOperationError,
  type Expr, type FrameHandle,
} from '@framebridge/core';
import { MongoAdapter, mongoCapabilities, pipelineOf, type MongoNative } from '../src';

// never connected: building cursors sends nothing to the server
const client = new MongoClient('mongodb://127.0.0.1:27017');
const events = client.db('fb_test').collection<Document>('events');

afterAll(async () => { await client.close(); });

const fallback = new MongoAdapter({ approximations: 'allow' });
const exact = new MongoAdapter({ emulateNullableBoolean: true });

const isNull = (x: unknown) => ({ $eq: [{ $ifNull: [x, null] }, null] });

function named(f: FrameHandle<MongoNative>, ...exprs: Expr[]) {
  return toNamedExprs(exprs.map(e => e.node), f.schema);
}

describe('MongoDB adapter: schema', () => {
  it('leaves a collection without hint open', () => {
    const f = fallback.wrap(events);
    expect(f.schema.open).toBe(true);
    expect(f.schema.get('anything')).toEqual(DT.Unknown);
    expect(fallback.explain(f)).toEqual({ backend: 'mongodb', lazy: true, plan: [], notes: [] });
  });

  it('closes the schema with a hint', () => {
    const f = fallback.wrap(events, Schema.from({ k: DT.Int64, v: DT.Float64 }));
    expect(f.schema.open).toBe(false);
    expect(f.schema.names()).toEqual(['k', 'v']);
    expect(() => f.schema.get('w')).toThrow("Column 'w' not found");
  });

  it('lowers a column expression with its dtype', () => {
    const f = fallback.wrap(events, Schema.from({ a: DT.Int32 }));
    const lowered = fallback.lower(col('a').add(1).node, f);
    expect(lowered.expr).toEqual({ $add: ['$a', { $literal: 1 }] });
    expect(fallback.dtypeOf(lowered)).toEqual(DT.Int32);
    expect(lowered.scalar).toBe(false);
  });
});

describe('MongoDB adapter: boolean semantics', () => {
  it('reads null as false by default and notes it', () => {
    const f = fallback.filter(col('a').gt(2).node, fallback.wrap(events));
    expect(pipelineOf(f.native)).toEqual([{
      $match: {
        $expr: { $cond: [{ $or: [isNull('$a'), isNull({ $literal: 2 })] }, false, { $gt: ['$a', { $literal: 2 }] }] },
      },
    }]);
    expect(f.notes).toEqual([{
      kind: 'boolean-null-fallback',
      backend: 'mongodb',
      feature: 'binary:gt',
      message: "mongodb has no nullable boolean: 'binary:gt' reads null as false and never returns null",
    }]);
  });

  it('emulates Kleene and with $switch when asked to', () => {
    const f = exact.wrap(events);
    const next = exact.applyColumns(named(f, col('p').and(col('q')).alias('both')), f, 'extend');
    expect(pipelineOf(next.native)).toEqual([{
      $addFields: {
        both: {
          $switch: {
            branches: [
              { case: { $in: [false, ['$p', '$q']] }, then: false },
              { case: { $or: [isNull('$p'), isNull('$q')] }, then: null },
            ],
            default: true,
          },
        },
      },
    }]);
    expect(next.notes).toEqual([]);
  });

  it('reads null as false for and/or/not by default and notes each', () => {
    const f = fallback.wrap(events);
    const next = fallback.applyColumns(
      named(f, col('p').and(col('q')).alias('both'), col('p').or(col('q')).alias('either'), col('p').not().alias('neither')),
      f,
      'extend',
    );
    expect(pipelineOf(next.native)).toEqual([{
      $addFields: { both: { $and: ['$p', '$q'] }, either: { $or: ['$p', '$q'] }, neither: { $not: ['$p'] } },
    }]);
    expect(next.notes.map(n => n.feature)).toEqual(['binary:and', 'binary:or', 'unary:not']);
  });

  it('refuses the fallback when approximations are disabled', () => {
    const strict = new MongoAdapter({ approximations: 'error' });
    const f = strict.wrap(events);
    expect(() => strict.applyColumns(named(f, col('p').or(col('q'))), f, 'extend'))
      .toThrow("'binary:or' is not supported by the mongodb backend: exact null semantics are unavailable and approximations are disabled");
  });
});

describe('MongoDB adapter: pipelines', () => {
  it('groups with a null-safe sum', () => {
    const f = fallback.wrap(events, Schema.from({ k: DT.Int64, v: DT.Int64 }));
    const grouped = fallback.aggregate(named(f, col('v').sum()), ['k'], f);
    expect(pipelineOf(grouped.native)).toEqual([
      {
        $group: {
          _id: { __fb_key_0: '$k' },
          __fb_acc_0: { $sum: '$v' },
          __fb_acc_1: { $sum: { $cond: [isNull('$v'), 0, 1] } },
        },
      },
      {
        $project: {
          _id: 0,
          k: '$_id.__fb_key_0',
          v: { $cond: [{ $eq: ['$__fb_acc_1', 0] }, null, '$__fb_acc_0'] },
        },
      },
    ]);
    expect(grouped.schema.equals(Schema.from({ k: DT.Int64, v: DT.Int64 }))).toBe(true);
  });

  it('keeps dotted key names whole inside _id', () => {
    const f = fallback.wrap(events, Schema.from({ 'a.b': DT.String, v: DT.Int64 }));
    const grouped = fallback.aggregate(named(f, col('v').max()), ['a.b'], f);
    expect(pipelineOf(grouped.native)).toEqual([
      {
        $group: {
          _id: { __fb_key_0: { $getField: { field: { $literal: 'a.b' }, input: '$$CURRENT' } } },
          __fb_acc_0: { $max: '$v' },
        },
      },
      { $project: { _id: 0, 'a.b': '$_id.__fb_key_0', v: '$__fb_acc_0' } },
    ]);
  });

  it('still yields one row when a global reduction sees no documents', () => {
    const f = fallback.wrap(events, Schema.from({ v: DT.Int64, flag: DT.Boolean }));
    const reduced = fallback.applyColumns(
      named(f, col('v').sum(), col('v').count().alias('n'), col('flag').any().alias('anyflag'), col('v').nUnique().alias('distinct')),
      f,
      'project',
    );
    const present = { $sum: { $cond: [isNull('$v'), 0, 1] } };
    expect(pipelineOf(reduced.native)).toEqual([
      {
        $facet: {
          rows: [{
            $group: {
              _id: null,
              __fb_acc_0: { $sum: '$v' },
              __fb_acc_1: present,
              __fb_acc_2: present,
              __fb_acc_3: { $max: '$flag' },
              __fb_acc_4: { $addToSet: { $ifNull: ['$v', null] } },
            },
          }],
        },
      },
      {
        $replaceRoot: {
          newRoot: {
            $ifNull: [
              { $arrayElemAt: ['$rows', 0] },
              { $literal: { __fb_acc_0: 0, __fb_acc_1: 0, __fb_acc_2: 0, __fb_acc_3: null, __fb_acc_4: [] } },
            ],
          },
        },
      },
      {
        $project: {
          _id: 0,
          v: { $cond: [{ $eq: ['$__fb_acc_1', 0] }, null, '$__fb_acc_0'] },
          n: '$__fb_acc_2',
          anyflag: { $ifNull: ['$__fb_acc_3', false] },
          distinct: { $size: '$__fb_acc_4' },
        },
      },
    ]);
  });

  it('rounds half away from zero instead of using $round', () => {
    const f = fallback.wrap(events, Schema.from({ x: DT.Float64 }));
    const lowered = fallback.lower(col('x').round(1).node, f);
    expect(lowered.expr).toEqual({
      $cond: [
        isNull('$x'),
        null,
        { $multiply: [{ $cond: [{ $lt: ['$x', 0] }, -1, 1] }, { $divide: [{ $floor: { $add: [{ $multiply: [{ $abs: '$x' }, 10] }, 0.5] } }, 10] }] },
      ],
    });
  });

  it('runs cumulative windows through $setWindowFields', () => {
    const f = fallback.wrap(events, Schema.from({ g: DT.String, t: DT.Int64, x: DT.Int64 }));
    const next = fallback.applyColumns(named(f, col('x').cumSum().over('g', { orderBy: 't' })), f, 'extend');
    expect(pipelineOf(next.native)).toEqual([
      {
        $setWindowFields: {
          partitionBy: '$g',
          sortBy: { t: 1 },
          output: { __fb_acc_0: { $sum: '$x', window: { documents: ['unbounded', 'current'] } } },
        },
      },
      { $addFields: { x: { $cond: [isNull('$x'), null, '$__fb_acc_0'] } } },
      { $unset: ['__fb_acc_0'] },
    ]);
  });

  it('appends sort and limit to an existing cursor', () => {
    const f = fallback.wrap(events.aggregate([{ $match: { a: 1 } }]));
    const out = fallback.head(2, fallback.sort(['x'], { descending: true }, f));
    expect(fallback.explain(out).plan).toEqual([{ $match: { a: 1 } }, { $sort: { x: -1 } }, { $limit: 2 }]);
    expect(pipelineOf(f.native)).toEqual([{ $match: { a: 1 } }]);
  });

  it('cannot put nulls last on an ascending sort', () => {
    const f = fallback.wrap(events);
    expect(() => fallback.sort(['x'], { nullsLast: true }, f)).toThrow(UnsupportedOperationError);
  });

  it('declares rank and median unsupported and needs an order for cumulative windows', () => {
    const caps = mongoCapabilities(false);
    expect(() => assertSupported(col('x').rank().node, 'mongodb', caps))
      .toThrow("'window:rank' is not supported by the mongodb backend");
    expect(() => assertSupported(col('x').median().node, 'mongodb', caps)).toThrow(UnsupportedOperationError);
    expect(() => assertSupported(col('x').cumSum().node, 'mongodb', caps)).toThrow(UnsupportedOperationError);
  });

  it('only computes std with ddof 0 or 1', () => {
    const f = fallback.wrap(events);
    expect(() => fallback.applyColumns(named(f, col('x').std(2)), f, 'project'))
      .toThrow("'aggregation:std' is not supported by the mongodb backend: ddof=2 (only 0 and 1)");
  });
});
