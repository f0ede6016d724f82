// packages/frame/src/namespace.ts
// Top-level entry points: wrap a native object, and the expression constructors.
import type { DataType, Table, Vector } from 'apache-arrow';
import type { MongoNative } from '@framebridge/expr-mongo';
import type { SqliteStatement } from '@framebridge/expr-sqlite';
import type { DataFrame } from './dataframe';
import { defaultRegistry, type OpenOptions, type Registry } from './registry';
import type { Series } from './series';

export {
  all, allHorizontal, anyHorizontal, col, lit, maxHorizontal, minHorizontal, sumHorizontal, when,
} from '@framebridge/core';

export interface FromNativeOptions extends OpenOptions {
  registry?: Registry;
}

/** Wrap an engine object; throws UnrecognizedNativeType when no registry entry claims it. */
export function fromNative(native: Vector<DataType>, options?: FromNativeOptions): Series;
export function fromNative(native: Table | SqliteStatement | MongoNative, options?: FromNativeOptions): DataFrame;
export function fromNative(native: unknown, options?: FromNativeOptions): DataFrame | Series;
export function fromNative(native: unknown, options: FromNativeOptions = {}): DataFrame | Series {
  const { registry = defaultRegistry, ...open } = options;
  return registry.open(native, open);
}
