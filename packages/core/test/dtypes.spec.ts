/* packages/core/test/dtypes.spec.ts */
import { describe, it, expect } from 'vitest';
import {
  DT, dtypeEquals, formatDtype, isNumeric, isTemporal, isUnsupported, promote, promoteAll, type DType,
} from '../src';

const SAMPLE: DType[] = [
  DT.Int8, DT.Int16, DT.Int32, DT.Int64, DT.UInt8, DT.UInt16, DT.UInt32, DT.UInt64,
  DT.Float32, DT.Float64, DT.Decimal(10, 2), DT.Decimal(20, 4),
  DT.Boolean, DT.String, DT.Categorical, DT.Enum(['a', 'b']), DT.Enum(['c']),
  DT.Binary, DT.Date, DT.Time, DT.Datetime('ms'), DT.Datetime('ns'), DT.Datetime('us', 'UTC'),
  DT.Duration('s'), DT.Duration('us'),
  DT.List(DT.Int32), DT.List(DT.Float64), DT.List(DT.String),
  DT.Struct({ a: DT.Int8, b: DT.String }), DT.Struct({ a: DT.Int64, b: DT.String }), DT.Struct({ b: DT.String, a: DT.Int8 }),
  DT.Unknown,
];

describe('dtype promotion', () => {
  it('is total and commutative over the sample', () => {
    for (const a of SAMPLE) {
      for (const b of SAMPLE) {
        const ab = promote(a, b);
        const ba = promote(b, a);
        if (isUnsupported(ab)) {
          expect(isUnsupported(ba)).toBe(true);
        } else {
          expect(isUnsupported(ba)).toBe(false);
          if (!isUnsupported(ba)) expect(dtypeEquals(ab, ba)).toBe(true);
        }
      }
    }
  });

  it('widens integers of the same signedness', () => {
    expect(promote(DT.Int8, DT.Int32)).toEqual(DT.Int32);
    expect(promote(DT.UInt16, DT.UInt64)).toEqual(DT.UInt64);
  });

  it('mixes signedness into the next signed width, or Float64 past 64 bits', () => {
    expect(promote(DT.Int64, DT.UInt32)).toEqual(DT.Int64);
    expect(promote(DT.Int8, DT.UInt8)).toEqual(DT.Int16);
    expect(promote(DT.Int32, DT.UInt32)).toEqual(DT.Int64);
    expect(promote(DT.Int64, DT.UInt64)).toEqual(DT.Float64);
  });

  it('promotes ints with floats', () => {
    expect(promote(DT.Int16, DT.Float32)).toEqual(DT.Float32);
    expect(promote(DT.Int32, DT.Float32)).toEqual(DT.Float64);
    expect(promote(DT.Boolean, DT.Float32)).toEqual(DT.Float32);
    expect(promote(DT.Boolean, DT.Int8)).toEqual(DT.Int8);
  });

  it('combines decimals by integral digits and scale', () => {
    expect(promote(DT.Decimal(10, 2), DT.Decimal(20, 4))).toEqual(DT.Decimal(20, 4));
    expect(promote(DT.Decimal(38, 0), DT.Decimal(10, 5))).toEqual(DT.Decimal(38, 5));
    expect(promote(DT.Decimal(10, 2), DT.Int64)).toEqual(DT.Decimal(10, 2));
    expect(promote(DT.Decimal(10, 2), DT.Float32)).toEqual(DT.Float64);
  });

  it('handles temporal, string-like and nested dtypes', () => {
    expect(promote(DT.Date, DT.Datetime('ms'))).toEqual(DT.Datetime('ms'));
    expect(promote(DT.Datetime('ms'), DT.Datetime('ns'))).toEqual(DT.Datetime('ns'));
    expect(isUnsupported(promote(DT.Datetime('us', 'UTC'), DT.Datetime('us')))).toBe(true);
    expect(promote(DT.Categorical, DT.String)).toEqual(DT.String);
    expect(promote(DT.Enum(['a']), DT.Enum(['b']))).toEqual(DT.Categorical);
    expect(promote(DT.List(DT.Int32), DT.List(DT.Float64))).toEqual(DT.List(DT.Float64));
    expect(promote(DT.Struct({ a: DT.Int8, b: DT.String }), DT.Struct({ a: DT.Int64, b: DT.String })))
      .toEqual(DT.Struct({ a: DT.Int64, b: DT.String }));
    expect(isUnsupported(promote(DT.Struct({ a: DT.Int8, b: DT.String }), DT.Struct({ b: DT.String, a: DT.Int8 })))).toBe(true);
  });

  it('treats Unknown as the top element and rejects unrelated pairs', () => {
    expect(promote(DT.String, DT.Unknown)).toEqual(DT.Unknown);
    expect(isUnsupported(promote(DT.String, DT.Int64))).toBe(true);
    expect(isUnsupported(promote(DT.Boolean, DT.String))).toBe(true);
  });

  it('folds many dtypes', () => {
    expect(promoteAll([DT.Int8, DT.UInt8, DT.Float32])).toEqual(DT.Float32);
    expect(promoteAll([])).toEqual(DT.Unknown);
  });
});

describe('dtype predicates and display', () => {
  it('classifies dtypes', () => {
    expect(isNumeric(DT.Decimal(5, 1))).toBe(true);
    expect(isNumeric(DT.Boolean)).toBe(false);
    expect(isTemporal(DT.Duration('ms'))).toBe(true);
  });

  it('formats dtypes like dataframe libraries print them', () => {
    expect(formatDtype(DT.UInt32)).toBe('UInt32');
    expect(formatDtype(DT.Datetime('us', null))).toBe("Datetime(time_unit='us', time_zone=None)");
    expect(formatDtype(DT.List(DT.Struct({ x: DT.Float64 })))).toBe("List(Struct({'x': Float64}))");
  });
});
