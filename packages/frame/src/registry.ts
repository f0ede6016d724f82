// packages/frame/src/registry.ts
// Native object → adapter. Entries are checked in order; the first one that
// recognizes the object wins, and its factory runs once.
import { Table, Vector } from 'apache-arrow';
import { AggregationCursor, Collection } from 'mongodb';
import { UnrecognizedNativeTypeError, type Adapter, type BackendName, type Schema } from '@framebridge/core';
import { ArrowAdapter } from '@framebridge/expr-arrow';
import { MongoAdapter, type MongoNative } from '@framebridge/expr-mongo';
import { SQLiteAdapter, type SqliteStatement } from '@framebridge/expr-sqlite';
import { DataFrame } from './dataframe';
import { Series } from './series';

export interface OpenOptions {
  /** dtypes for engines that cannot report them (schemaless collections, computed SQL columns) */
  schema?: Schema;
  /** name of a series built from a bare vector */
  name?: string;
}

export interface RegistryEntry {
  readonly name: string;
  readonly backend: BackendName;
  /** null when the object is not this entry's native type */
  open(native: unknown, options: OpenOptions): DataFrame | Series | null;
}

function once<T>(factory: () => T): () => T {
  let made: T | undefined;
  return () => {
    if (made === undefined) made = factory();
    return made;
  };
}

/** An entry whose objects become DataFrames bound to the factory's adapter. */
export function frameEntry<T>(
  name: string,
  backend: BackendName,
  recognize: (native: unknown) => native is T,
  factory: () => Adapter<T>
): RegistryEntry {
  const adapter = once(factory);
  return Object.freeze({
    name,
    backend,
    open(native: unknown, options: OpenOptions) {
      return recognize(native) ? DataFrame.wrap(adapter(), native, options.schema) : null;
    },
  });
}

/** An entry for Arrow vectors, opened as Series. */
export function seriesEntry(name: string, factory: () => ArrowAdapter): RegistryEntry {
  const adapter = once(factory);
  return Object.freeze({
    name,
    backend: 'arrow' as const,
    open(native: unknown, options: OpenOptions) {
      return native instanceof Vector ? new Series(options.name ?? '', native, adapter()) : null;
    },
  });
}

export class Registry {
  constructor(readonly entries: readonly RegistryEntry[]) {}

  open(native: unknown, options: OpenOptions = {}): DataFrame | Series {
    for (const entry of this.entries) {
      const opened = entry.open(native, options);
      if (opened) return opened;
    }
    throw new UnrecognizedNativeTypeError(typeName(native));
  }
}

export function createRegistry(entries: readonly RegistryEntry[]): Registry {
  return Object.freeze(new Registry(Object.freeze([...entries])));
}

// ---------- recognizers ----------
export function isArrowTable(x: unknown): x is Table {
  return x instanceof Table;
}

/** better-sqlite3 does not export its Statement class; recognize one by shape. */
export function isSqliteStatement(x: unknown): x is SqliteStatement {
  return typeof x === 'object' && x !== null
    && 'source' in x && typeof x.source === 'string'
    && 'reader' in x && typeof x.reader === 'boolean'
    && 'database' in x
    && 'all' in x && typeof x.all === 'function';
}

// both narrow to the adapter's native union so the two entries can share one adapter
export function isMongoCursor(x: unknown): x is MongoNative {
  return x instanceof AggregationCursor;
}

export function isMongoCollection(x: unknown): x is MongoNative {
  return x instanceof Collection;
}

function typeName(x: unknown): string {
  if (x === null) return 'null';
  if (typeof x !== 'object') return typeof x;
  return typeof x.constructor === 'function' && x.constructor.name ? x.constructor.name : 'Object';
}

const mongo = once(() => new MongoAdapter());

/** Built once at load and frozen; pass a custom registry to fromNative instead of changing it. */
export const defaultRegistry: Registry = createRegistry([
  frameEntry('arrow-table', 'arrow', isArrowTable, () => new ArrowAdapter()),
  seriesEntry('arrow-vector', () => new ArrowAdapter()),
  frameEntry('sqlite-statement', 'sqlite', isSqliteStatement, () => new SQLiteAdapter()),
  frameEntry('mongo-cursor', 'mongodb', isMongoCursor, mongo),
  frameEntry('mongo-collection', 'mongodb', isMongoCollection, mongo),
]);
