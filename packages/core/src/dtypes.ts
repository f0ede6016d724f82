// packages/core/src/dtypes.ts
// Backend-neutral dtype lattice.

export type IntBits = 8 | 16 | 32 | 64;
export type FloatBits = 32 | 64;
export type TimeUnit = 's' | 'ms' | 'us' | 'ns';

export interface StructField {
  readonly name: string;
  readonly dtype: DType;
}

export type DType =
  | { readonly kind: 'int'; readonly bits: IntBits; readonly signed: boolean }
  | { readonly kind: 'float'; readonly bits: FloatBits }
  | { readonly kind: 'decimal'; readonly precision: number; readonly scale: number }
  | { readonly kind: 'boolean' }
  | { readonly kind: 'string' }
  | { readonly kind: 'categorical' }
  | { readonly kind: 'enum'; readonly categories: readonly string[] }
  | { readonly kind: 'binary' }
  | { readonly kind: 'date' }
  | { readonly kind: 'time' }
  | { readonly kind: 'datetime'; readonly unit: TimeUnit; readonly timezone: string | null }
  | { readonly kind: 'duration'; readonly unit: TimeUnit }
  | { readonly kind: 'list'; readonly inner: DType }
  | { readonly kind: 'struct'; readonly fields: readonly StructField[] }
  | { readonly kind: 'unknown' };

export type DTypeKind = DType['kind'];

export type Promotion = DType | { readonly kind: 'unsupported' };

export const UNSUPPORTED: Promotion = freeze({ kind: 'unsupported' });

function freeze<T extends Promotion>(d: T): T {
  Object.freeze(d);
  return d;
}

// ---------- constructors ----------
function Int(bits: IntBits, signed = true): DType {
  return freeze<DType>({ kind: 'int', bits, signed });
}

function Float(bits: FloatBits): DType {
  return freeze<DType>({ kind: 'float', bits });
}

function Decimal(precision = 38, scale = 0): DType {
  return freeze<DType>({ kind: 'decimal', precision, scale });
}

function Enum(categories: readonly string[]): DType {
  return freeze<DType>({ kind: 'enum', categories: Object.freeze([...categories]) });
}

function Datetime(unit: TimeUnit = 'us', timezone: string | null = null): DType {
  return freeze<DType>({ kind: 'datetime', unit, timezone });
}

function Duration(unit: TimeUnit = 'us'): DType {
  return freeze<DType>({ kind: 'duration', unit });
}

function List(inner: DType): DType {
  return freeze<DType>({ kind: 'list', inner });
}

function Struct(fields: readonly StructField[] | Record<string, DType>): DType {
  const list: readonly StructField[] = isFieldList(fields)
    ? fields
    : Object.entries(fields).map(([name, dtype]) => ({ name, dtype }));
  return freeze<DType>({ kind: 'struct', fields: Object.freeze(list.map(f => Object.freeze({ ...f }))) });
}

function isFieldList(f: readonly StructField[] | Record<string, DType>): f is readonly StructField[] {
  return Array.isArray(f);
}

const Float64 = Float(64);
const Float32 = Float(32);
const Unknown = freeze<DType>({ kind: 'unknown' });
const StringType = freeze<DType>({ kind: 'string' });
const Categorical = freeze<DType>({ kind: 'categorical' });

/** Dtype constructors, named the way dataframe users spell them. */
export const DT = Object.freeze({
  Int8: Int(8), Int16: Int(16), Int32: Int(32), Int64: Int(64),
  UInt8: Int(8, false), UInt16: Int(16, false), UInt32: Int(32, false), UInt64: Int(64, false),
  Float32, Float64,
  Boolean: freeze<DType>({ kind: 'boolean' }),
  String: StringType,
  Categorical,
  Binary: freeze<DType>({ kind: 'binary' }),
  Date: freeze<DType>({ kind: 'date' }),
  Time: freeze<DType>({ kind: 'time' }),
  Unknown,
  Int, Float, Decimal, Enum, Datetime, Duration, List, Struct,
});

// ---------- predicates ----------
export function isInteger(d: DType): boolean { return d.kind === 'int'; }
export function isSignedInteger(d: DType): boolean { return d.kind === 'int' && d.signed; }
export function isUnsignedInteger(d: DType): boolean { return d.kind === 'int' && !d.signed; }
export function isFloat(d: DType): boolean { return d.kind === 'float'; }
export function isDecimal(d: DType): boolean { return d.kind === 'decimal'; }
export function isNumeric(d: DType): boolean { return d.kind === 'int' || d.kind === 'float' || d.kind === 'decimal'; }
export function isTemporal(d: DType): boolean {
  return d.kind === 'date' || d.kind === 'time' || d.kind === 'datetime' || d.kind === 'duration';
}
export function isNested(d: DType): boolean { return d.kind === 'list' || d.kind === 'struct'; }
export function isStringLike(d: DType): boolean {
  return d.kind === 'string' || d.kind === 'categorical' || d.kind === 'enum';
}
export function isUnsupported(p: Promotion): p is { readonly kind: 'unsupported' } {
  return p.kind === 'unsupported';
}

export function dtypeEquals(a: DType, b: DType): boolean {
  switch (a.kind) {
    case 'int': return b.kind === 'int' && a.bits === b.bits && a.signed === b.signed;
    case 'float': return b.kind === 'float' && a.bits === b.bits;
    case 'decimal': return b.kind === 'decimal' && a.precision === b.precision && a.scale === b.scale;
    case 'enum':
      return b.kind === 'enum'
        && a.categories.length === b.categories.length
        && a.categories.every((c, i) => c === b.categories[i]);
    case 'datetime': return b.kind === 'datetime' && a.unit === b.unit && a.timezone === b.timezone;
    case 'duration': return b.kind === 'duration' && a.unit === b.unit;
    case 'list': return b.kind === 'list' && dtypeEquals(a.inner, b.inner);
    case 'struct':
      return b.kind === 'struct'
        && a.fields.length === b.fields.length
        && a.fields.every((f, i) => f.name === b.fields[i].name && dtypeEquals(f.dtype, b.fields[i].dtype));
    default:
      return a.kind === b.kind;
  }
}

export function formatDtype(d: Promotion): string {
  switch (d.kind) {
    case 'int': return `${d.signed ? 'Int' : 'UInt'}${d.bits}`;
    case 'float': return `Float${d.bits}`;
    case 'decimal': return `Decimal(precision=${d.precision}, scale=${d.scale})`;
    case 'boolean': return 'Boolean';
    case 'string': return 'String';
    case 'categorical': return 'Categorical';
    case 'enum': return `Enum(categories=[${d.categories.map(c => `'${c}'`).join(', ')}])`;
    case 'binary': return 'Binary';
    case 'date': return 'Date';
    case 'time': return 'Time';
    case 'datetime': return `Datetime(time_unit='${d.unit}', time_zone=${d.timezone === null ? 'None' : `'${d.timezone}'`})`;
    case 'duration': return `Duration(time_unit='${d.unit}')`;
    case 'list': return `List(${formatDtype(d.inner)})`;
    case 'struct': return `Struct({${d.fields.map(f => `'${f.name}': ${formatDtype(f.dtype)}`).join(', ')}})`;
    case 'unknown': return 'Unknown';
    case 'unsupported': return 'Unsupported';
  }
}

// ---------- promotion ----------
const UNIT_RANK: Record<TimeUnit, number> = { s: 0, ms: 1, us: 2, ns: 3 };

function finerUnit(a: TimeUnit, b: TimeUnit): TimeUnit {
  return UNIT_RANK[a] >= UNIT_RANK[b] ? a : b;
}

function promoteInts(a: { bits: IntBits; signed: boolean }, b: { bits: IntBits; signed: boolean }): DType {
  if (a.signed === b.signed) return Int(a.bits >= b.bits ? a.bits : b.bits, a.signed);
  const s = a.signed ? a : b;
  const u = a.signed ? b : a;
  if (s.bits > u.bits) return Int(s.bits, true);
  if (u.bits < 64) return Int(doubled(u.bits), true);
  return Float64;
}

function doubled(bits: IntBits): IntBits {
  switch (bits) {
    case 8: return 16;
    case 16: return 32;
    default: return 64;
  }
}

/**
 * Least upper bound of two dtypes. Total and commutative: pairs with no common
 * supertype come back as the `unsupported` marker instead of throwing.
 */
export function promote(a: DType, b: DType): Promotion {
  if (dtypeEquals(a, b)) return a;
  if (a.kind === 'unknown' || b.kind === 'unknown') return Unknown;

  // order the pair so each rule below only needs to look one way
  const rank = (d: DType) => PROMOTE_ORDER.indexOf(d.kind);
  const [x, y] = rank(a) <= rank(b) ? [a, b] : [b, a];

  switch (x.kind) {
    case 'boolean':
      if (y.kind === 'int' || y.kind === 'float' || y.kind === 'decimal') return y;
      return UNSUPPORTED;
    case 'int':
      if (y.kind === 'int') return promoteInts(x, y);
      if (y.kind === 'float') return x.bits <= 16 && y.bits === 32 ? Float32 : Float64;
      if (y.kind === 'decimal') return y;
      return UNSUPPORTED;
    case 'float':
      if (y.kind === 'float') return x.bits >= y.bits ? x : y;
      if (y.kind === 'decimal') return Float64;
      return UNSUPPORTED;
    case 'decimal':
      if (y.kind === 'decimal') {
        const scale = Math.max(x.scale, y.scale);
        const integral = Math.max(x.precision - x.scale, y.precision - y.scale);
        return Decimal(Math.min(38, integral + scale), scale);
      }
      return UNSUPPORTED;
    case 'string':
      return y.kind === 'categorical' || y.kind === 'enum' ? StringType : UNSUPPORTED;
    case 'categorical':
      return y.kind === 'enum' ? Categorical : UNSUPPORTED;
    case 'enum':
      // two enums reaching here have different categories
      return y.kind === 'enum' ? Categorical : UNSUPPORTED;
    case 'date':
      return y.kind === 'datetime' ? y : UNSUPPORTED;
    case 'datetime':
      if (y.kind === 'datetime' && x.timezone === y.timezone) return Datetime(finerUnit(x.unit, y.unit), x.timezone);
      return UNSUPPORTED;
    case 'duration':
      return y.kind === 'duration' ? Duration(finerUnit(x.unit, y.unit)) : UNSUPPORTED;
    case 'list': {
      if (y.kind !== 'list') return UNSUPPORTED;
      const inner = promote(x.inner, y.inner);
      return isUnsupported(inner) ? UNSUPPORTED : List(inner);
    }
    case 'struct': {
      if (y.kind !== 'struct' || x.fields.length !== y.fields.length) return UNSUPPORTED;
      const fields: StructField[] = [];
      for (let i = 0; i < x.fields.length; i++) {
        if (x.fields[i].name !== y.fields[i].name) return UNSUPPORTED;
        const p = promote(x.fields[i].dtype, y.fields[i].dtype);
        if (isUnsupported(p)) return UNSUPPORTED;
        fields.push({ name: x.fields[i].name, dtype: p });
      }
      return Struct(fields);
    }
    default:
      return UNSUPPORTED;
  }
}

const PROMOTE_ORDER: readonly DTypeKind[] = [
  'boolean', 'int', 'float', 'decimal',
  'string', 'categorical', 'enum',
  'date', 'datetime', 'duration', 'time',
  'binary', 'list', 'struct', 'unknown',
];

/** promote() that folds over many dtypes; empty input is Unknown. */
export function promoteAll(dtypes: readonly DType[]): Promotion {
  if (dtypes.length === 0) return Unknown;
  let acc: Promotion = dtypes[0];
  for (const d of dtypes.slice(1)) {
    if (isUnsupported(acc)) return acc;
    acc = promote(acc, d);
  }
  return acc;
}

// ---------- time units ----------
// durations travel between backends as milliseconds

/** Milliseconds in `ticks` of `unit`. */
export function ticksToMillis(ticks: number, unit: TimeUnit): number {
  switch (unit) {
    case 's': return ticks * 1_000;
    case 'ms': return ticks;
    case 'us': return ticks / 1_000;
    case 'ns': return ticks / 1_000_000;
  }
}

/** Ticks of `unit` in `millis` milliseconds, unrounded. */
export function millisToTicks(millis: number, unit: TimeUnit): number {
  switch (unit) {
    case 's': return millis / 1_000;
    case 'ms': return millis;
    case 'us': return millis * 1_000;
    case 'ns': return millis * 1_000_000;
  }
}
