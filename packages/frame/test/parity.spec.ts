/* packages/frame/test/parity.spec.ts */
import { describe, it, beforeAll, afterAll, expect } from 'vitest';
import Database from 'better-sqlite3';
import { DT, type ColumnData } from '@framebridge/core';
import { tableFromColumns } from '@framebridge/expr-arrow';
import { anyHorizontal, col, fromNative, sumHorizontal, when, type DataFrame } from '../src';
import { seedSqlite, sortedBy } from '../../../tests/helpers';

const data: ColumnData = {
  id: [1, 2, 3, 4],
  a: [1.4, null, 4.2, -3],
  b: [2, 0, null, 5],
  g: ['x', 'y', 'x', 'y'],
  p: [true, null, false, true],
};

let db: Database.Database;
let arrow: DataFrame;
let sqlite: DataFrame;

beforeAll(() => {
  db = new Database(':memory:');
  arrow = fromNative(tableFromColumns(data, { id: DT.Int64, a: DT.Float64, b: DT.Int64, g: DT.String, p: DT.Boolean }));
  sqlite = fromNative(seedSqlite(db, 'm', { id: 'INTEGER', a: 'REAL', b: 'INTEGER', g: 'TEXT', p: 'BOOLEAN' }, data));
});

afterAll(() => { db.close(); });

const exprs = () => [
  col('id'),
  col('a').mul(2).alias('double'),
  col('a').gt(2).alias('big'),
  col('b').floordiv(2).alias('half'),
  col('b').mod(3).alias('rem'),
  col('p').and(col('a').gt(0)).alias('both'),
  col('p').or(col('a').gt(0)).alias('either'),
  col('a').fillNull(0).alias('filled'),
  when(col('b').gt(1)).then(col('a')).otherwise(col('b')).alias('pick'),
  col('a').isNull().alias('missing'),
  sumHorizontal(['a', 'b']).alias('total'),
  anyHorizontal([col('p'), col('a').gt(0)]).alias('any_pos'),
  col('b').sum().over('g').alias('group_sum'),
  col('b').mean().over('g').alias('group_mean'),
  col('b').cumSum().over('g', { orderBy: 'id' }).alias('running'),
];

describe('arrow and sqlite agree', () => {
  it('on the same select, value for value', async () => {
    const expected = {
      id: [1, 2, 3, 4],
      double: [2.8, null, 8.4, -6],
      big: [false, null, true, false],
      half: [1, 0, null, 2],
      rem: [2, 0, null, 2],
      both: [true, null, false, false],
      either: [true, null, true, true],
      filled: [1.4, 0, 4.2, -3],
      pick: [1.4, 0, null, -3],
      missing: [false, true, false, false],
      total: [1.4 + 2, 0, 4.2, 2],
      any_pos: [true, null, true, true],
      group_sum: [2, 5, 2, 5],
      group_mean: [2, 2.5, 2, 2.5],
      running: [2, 0, null, 5],
    };
    expect(sortedBy(await arrow.select(...exprs()).collect(), 'id')).toEqual(expected);
    expect(sortedBy(await sqlite.select(...exprs()).collect(), 'id')).toEqual(expected);
  });

  it('on rounding, clipping and distinctness', async () => {
    const more = (df: DataFrame) => df.select(
      col('id'),
      col('a').round().alias('rounded'),
      col('a').clip(0, 3).alias('clipped'),
      col('b').isUnique().alias('unique'),
      col('g').isFirstDistinct().over([], { orderBy: 'id' }).alias('first'),
    ).collect();
    const expected = {
      id: [1, 2, 3, 4],
      rounded: [1, null, 4, -3],
      clipped: [1.4, null, 3, 0],
      unique: [true, true, true, true],
      first: [true, true, false, false],
    };
    expect(sortedBy(await more(arrow), 'id')).toEqual(expected);
    expect(sortedBy(await more(sqlite), 'id')).toEqual(expected);
  });

  it('on schemas', () => {
    expect(sqlite.schema.equals(arrow.schema)).toBe(true);
    expect(sqlite.select(...exprs()).schema.equals(arrow.select(...exprs()).schema)).toBe(true);
  });

  it('on filters', async () => {
    const keep = (df: DataFrame) => df.filter(col('a').gt(0)).select('id').collect();
    expect(sortedBy(await keep(arrow), 'id')).toEqual({ id: [1, 3] });
    expect(sortedBy(await keep(sqlite), 'id')).toEqual({ id: [1, 3] });
  });

  it('on grouped aggregates', async () => {
    const agg = (df: DataFrame) =>
      df.groupBy('g').agg(col('b').sum(), col('a').count().alias('n'), col('b').max().alias('hi')).collect();
    const expected = { g: ['x', 'y'], b: [2, 5], n: [2, 1], hi: [2, 5] };
    expect(sortedBy(await agg(arrow), 'g')).toEqual(expected);
    expect(sortedBy(await agg(sqlite), 'g')).toEqual(expected);
  });
});
