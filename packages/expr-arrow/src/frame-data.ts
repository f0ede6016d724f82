// packages/expr-arrow/src/frame-data.ts
// Row-oriented access to an Arrow table for the kernels.
import {
  DataType, Duration, Table, Timestamp, makeData, makeVector, vectorFromArray, type Vector,
} from 'apache-arrow';
import {
  ColumnNotFoundError, compareValues, isMissing, millisToTicks, safeInteger, ticksToMillis, type DType, type Schema, type TimeUnit,
} from '@framebridge/core';
import { UNIT_TO_ARROW, arrowToDtype, dtypeToArrow } from './dtypes';

/** JS value of a cell. 64-bit integers come back as numbers and must be exact. */
export function normalizeValue(v: unknown): unknown {
  if (v === undefined) return null;
  if (typeof v === 'bigint') return safeInteger(v, 'arrow');
  return v;
}

function isInstant(dtype: DType): boolean {
  return dtype.kind === 'date' || dtype.kind === 'datetime';
}

/**
 * Cell values as JS values. Date and datetime cells come back as Date,
 * durations as a count of milliseconds whatever their unit.
 */
export function readValues(vector: Vector<DataType>, dtype: DType): unknown[] {
  const out: unknown[] = new Array(vector.length);
  const instant = isInstant(dtype);
  for (let i = 0; i < vector.length; i++) {
    const raw: unknown = vector.get(i);
    if (dtype.kind === 'duration' && (typeof raw === 'bigint' || typeof raw === 'number')) {
      out[i] = ticksToMillis(Number(raw), dtype.unit);
      continue;
    }
    const v = normalizeValue(raw);
    out[i] = instant && typeof v === 'number' ? new Date(v) : v;
  }
  return out;
}

/** Materialize every column of a table. */
export function tableToColumns(table: Table, schema: Schema): Record<string, unknown[]> {
  const out: Record<string, unknown[]> = {};
  for (const [name, dtype] of schema.entries()) {
    const vector = table.getChild(name);
    out[name] = vector ? readValues(vector, dtype) : [];
  }
  return out;
}

function millisOf(v: unknown): number | null {
  if (v instanceof Date) return v.getTime();
  if (isMissing(v)) return null;
  const n = Number(v);
  return Number.isNaN(n) ? null : n;
}

/** 64-bit tick counts written straight into the buffer, so every unit keeps its precision. */
function ticks(values: readonly unknown[], unit: TimeUnit): { data: BigInt64Array; nullBitmap: Uint8Array; nullCount: number } {
  const data = new BigInt64Array(values.length);
  const nullBitmap = new Uint8Array(Math.ceil(values.length / 8));
  let nullCount = 0;
  values.forEach((v, i) => {
    const ms = millisOf(v);
    if (ms === null) {
      nullCount++;
      return;
    }
    data[i] = BigInt(Math.round(millisToTicks(ms, unit)));
    nullBitmap[i >> 3] |= 1 << (i & 7);
  });
  return { data, nullBitmap, nullCount };
}

/** Build a vector of `dtype` from JS values; Unknown lets Arrow infer the type. */
export function buildVector(values: readonly unknown[], dtype: DType): Vector<DataType> {
  if (dtype.kind === 'datetime') {
    const type = new Timestamp(UNIT_TO_ARROW[dtype.unit], dtype.timezone);
    return makeVector(makeData({ type, length: values.length, ...ticks(values, dtype.unit) }));
  }
  if (dtype.kind === 'duration') {
    const type = new Duration(UNIT_TO_ARROW[dtype.unit]);
    return makeVector(makeData({ type, length: values.length, ...ticks(values, dtype.unit) }));
  }
  const type = dtypeToArrow(dtype);
  if (!type) return vectorFromArray([...values]);
  if (dtype.kind === 'int' && dtype.bits === 64) {
    return vectorFromArray(values.map(v => (isMissing(v) ? null : BigInt(Math.trunc(Number(v))))), type);
  }
  if (dtype.kind === 'int') {
    return vectorFromArray(values.map(v => (isMissing(v) ? null : Math.trunc(Number(v)))), type);
  }
  if (dtype.kind === 'date') {
    return vectorFromArray(values.map(millisOf), type);
  }
  return vectorFromArray([...values], type);
}

/** Pick rows of a vector, keeping its Arrow type. */
export function takeVector(vector: Vector<DataType>, indices: readonly number[]): Vector<DataType> {
  if (DataType.isTimestamp(vector.type) || DataType.isDuration(vector.type)) {
    const dtype = arrowToDtype(vector.type);
    const all = readValues(vector, dtype);
    return buildVector(indices.map(i => all[i]), dtype);
  }
  return vectorFromArray(indices.map(i => vector.get(i)), vector.type);
}

export function takeTable(table: Table, indices: readonly number[]): Table {
  const cols: Record<string, Vector<DataType>> = {};
  for (const f of table.schema.fields) {
    const v = table.getChild(f.name);
    if (v) cols[f.name] = takeVector(v, indices);
  }
  return new Table(cols);
}

/**
 * A table (or a subset of its rows) plus the dtype schema. Whole columns are
 * decoded once and shared by every subset taken from the same frame.
 */
export class FrameData {
  private readonly cache = new Map<string, unknown[]>();

  constructor(
    readonly table: Table,
    readonly schema: Schema,
    private readonly rows: readonly number[] | null = null,
    private readonly decoded = new Map<string, unknown[]>()
  ) {}

  get length(): number {
    return this.rows ? this.rows.length : this.table.numRows;
  }

  column(name: string): unknown[] {
    const hit = this.cache.get(name);
    if (hit) return hit;
    const all = this.full(name);
    const values = this.rows ? this.rows.map(i => all[i]) : all;
    this.cache.set(name, values);
    return values;
  }

  /** Same table restricted to `indices` (positions within this frame). */
  subset(indices: readonly number[]): FrameData {
    const base = this.rows;
    return new FrameData(this.table, this.schema, base ? indices.map(i => base[i]) : [...indices], this.decoded);
  }

  private full(name: string): unknown[] {
    const hit = this.decoded.get(name);
    if (hit) return hit;
    const vector = this.table.getChild(name);
    if (!vector) throw new ColumnNotFoundError(name, this.schema.names());
    const all = readValues(vector, this.schema.get(name));
    this.decoded.set(name, all);
    return all;
  }
}

// ---------- grouping ----------
/** Hash key of a cell: null and NaN are distinct keys of their own. */
export function keyOf(v: unknown): string {
  if (isMissing(v)) return 'null';
  if (typeof v === 'number') return Number.isNaN(v) ? 'nan' : `n:${v}`;
  if (typeof v === 'string') return `s:${v}`;
  if (typeof v === 'boolean') return `b:${v}`;
  if (v instanceof Date) return `d:${v.getTime()}`;
  return `o:${String(v)}`;
}

/** Row positions per distinct key tuple, groups in order of first appearance. */
export function groupRows(keyColumns: ReadonlyArray<readonly unknown[]>, length: number): number[][] {
  const groups = new Map<string, number[]>();
  for (let i = 0; i < length; i++) {
    const key = keyColumns.map(c => keyOf(c[i])).join('\u0000');
    const g = groups.get(key);
    if (g) g.push(i);
    else groups.set(key, [i]);
  }
  return [...groups.values()];
}

/** Stable order of `rows` by the given columns (ascending, nulls first). */
export function orderRows(
  rows: readonly number[],
  by: ReadonlyArray<readonly unknown[]>,
  descending: readonly boolean[] = [],
  nullsLast = false
): number[] {
  return [...rows].sort((x, y) => {
    for (let k = 0; k < by.length; k++) {
      const a = by[k][x];
      const b = by[k][y];
      if (nullsLast && isMissing(a) !== isMissing(b)) return isMissing(a) ? 1 : -1;
      const c = compareValues(a, b);
      if (c !== 0) return descending[k] ? -c : c;
    }
    return 0;
  });
}
