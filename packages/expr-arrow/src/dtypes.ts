// packages/expr-arrow/src/dtypes.ts
// Arrow DataType <-> framebridge dtype.
import {
  Binary, Bool, DataType, DateDay, Dictionary, Duration, Field, Float32, Float64,
  Int16, Int32, Int64, Int8, List, Precision, Struct, TimeMillisecond, TimeUnit as ArrowTimeUnit,
  Timestamp, Uint16, Uint32, Uint64, Uint8, Utf8,
} from 'apache-arrow';
import { DT, UnknownDtypeError, UnsupportedOperationError, type DType, type TimeUnit } from '@framebridge/core';

const UNIT_FROM_ARROW: Record<ArrowTimeUnit, TimeUnit> = {
  [ArrowTimeUnit.SECOND]: 's',
  [ArrowTimeUnit.MILLISECOND]: 'ms',
  [ArrowTimeUnit.MICROSECOND]: 'us',
  [ArrowTimeUnit.NANOSECOND]: 'ns',
};

export const UNIT_TO_ARROW: Record<TimeUnit, ArrowTimeUnit> = {
  s: ArrowTimeUnit.SECOND,
  ms: ArrowTimeUnit.MILLISECOND,
  us: ArrowTimeUnit.MICROSECOND,
  ns: ArrowTimeUnit.NANOSECOND,
};

/** Throws UnknownDtypeError for Arrow types with no dtype (maps, unions, intervals...). */
export function arrowToDtype(type: DataType): DType {
  if (DataType.isNull(type)) return DT.Unknown;
  if (DataType.isInt(type)) return DT.Int(type.bitWidth, type.isSigned);
  if (DataType.isFloat(type)) return type.precision === Precision.DOUBLE ? DT.Float64 : DT.Float32;
  if (DataType.isBool(type)) return DT.Boolean;
  if (DataType.isUtf8(type) || DataType.isLargeUtf8(type)) return DT.String;
  if (DataType.isDictionary(type)) {
    if (DataType.isUtf8(type.dictionary)) return DT.Categorical;
    throw new UnknownDtypeError(String(type), 'arrow');
  }
  if (DataType.isDate(type)) return DT.Date;
  if (DataType.isTimestamp(type)) return DT.Datetime(UNIT_FROM_ARROW[type.unit], type.timezone ?? null);
  if (DataType.isDuration(type)) return DT.Duration(UNIT_FROM_ARROW[type.unit]);
  if (DataType.isTime(type)) return DT.Time;
  if (DataType.isDecimal(type)) return DT.Decimal(type.precision, type.scale);
  if (DataType.isBinary(type)) return DT.Binary;
  if (DataType.isList(type)) return DT.List(arrowToDtype(type.children[0].type));
  if (DataType.isStruct(type)) {
    return DT.Struct(type.children.map(f => ({ name: f.name, dtype: arrowToDtype(f.type) })));
  }
  throw new UnknownDtypeError(String(type), 'arrow');
}

/** Arrow type to build a result vector with; null means "let Arrow infer it". */
export function dtypeToArrow(dtype: DType): DataType | null {
  switch (dtype.kind) {
    case 'int':
      switch (dtype.bits) {
        case 8: return dtype.signed ? new Int8() : new Uint8();
        case 16: return dtype.signed ? new Int16() : new Uint16();
        case 32: return dtype.signed ? new Int32() : new Uint32();
        case 64: return dtype.signed ? new Int64() : new Uint64();
      }
      break;
    case 'float': return dtype.bits === 32 ? new Float32() : new Float64();
    case 'boolean': return new Bool();
    case 'string': return new Utf8();
    case 'categorical':
    case 'enum':
      return new Dictionary(new Utf8(), new Int32());
    case 'binary': return new Binary();
    case 'date': return new DateDay();
    case 'time': return new TimeMillisecond();
    case 'datetime': return new Timestamp(UNIT_TO_ARROW[dtype.unit], dtype.timezone);
    case 'duration': return new Duration(UNIT_TO_ARROW[dtype.unit]);
    case 'list': {
      const inner = dtypeToArrow(dtype.inner);
      return inner ? new List(new Field('item', inner, true)) : null;
    }
    case 'struct': {
      const fields: Field[] = [];
      for (const f of dtype.fields) {
        const t = dtypeToArrow(f.dtype);
        if (!t) return null;
        fields.push(new Field(f.name, t, true));
      }
      return new Struct(fields);
    }
    case 'decimal':
      throw new UnsupportedOperationError('decimal result', 'arrow', 'computed decimal columns cannot be built; cast to Float64');
    case 'unknown':
      return null;
  }
  return null;
}
