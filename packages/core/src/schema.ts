// packages/core/src/schema.ts
import { DT, dtypeEquals, formatDtype, type DType } from './dtypes';
import { ColumnNotFoundError, InvalidOperationError } from './errors';

/**
 * Ordered, unique column name → dtype mapping. Immutable; every edit returns a
 * new Schema. An open schema belongs to an engine that cannot list its columns
 * (a collection without a schema hint), so unknown names resolve to Unknown.
 */
export class Schema {
  private readonly byName: ReadonlyMap<string, DType>;

  constructor(entries: Iterable<readonly [string, DType]> = [], readonly open = false) {
    const m = new Map<string, DType>();
    for (const [name, dtype] of entries) {
      if (m.has(name)) throw new InvalidOperationError(`Duplicate column name '${name}'`, { column: name });
      m.set(name, dtype);
    }
    this.byName = m;
  }

  static from(record: Record<string, DType>, open = false): Schema {
    return new Schema(Object.entries(record), open);
  }

  get size(): number { return this.byName.size; }

  names(): string[] { return [...this.byName.keys()]; }

  entries(): Array<[string, DType]> { return [...this.byName.entries()]; }

  has(name: string): boolean { return this.byName.has(name); }

  /** Dtype of a column; throws ColumnNotFound unless the schema is open. */
  get(name: string): DType {
    const d = this.byName.get(name);
    if (d !== undefined) return d;
    if (this.open) return DT.Unknown;
    throw new ColumnNotFoundError(name, this.names());
  }

  /** Replace in place, or append when new. */
  with(name: string, dtype: DType): Schema {
    if (this.byName.has(name)) {
      return new Schema(this.entries().map(([n, d]) => [n, n === name ? dtype : d] as const), this.open);
    }
    return new Schema([...this.entries(), [name, dtype]], this.open);
  }

  select(names: readonly string[]): Schema {
    return new Schema(names.map(n => [n, this.get(n)] as const), this.open);
  }

  drop(names: readonly string[]): Schema {
    for (const n of names) this.get(n);
    const gone = new Set(names);
    return new Schema(this.entries().filter(([n]) => !gone.has(n)), this.open);
  }

  rename(mapping: Record<string, string>): Schema {
    for (const n of Object.keys(mapping)) this.get(n);
    return new Schema(this.entries().map(([n, d]) => [mapping[n] ?? n, d] as const), this.open);
  }

  equals(other: Schema): boolean {
    if (other.size !== this.size) return false;
    const theirs = other.entries();
    return this.entries().every(([n, d], i) => theirs[i][0] === n && dtypeEquals(d, theirs[i][1]));
  }

  toJSON(): Record<string, string> {
    return Object.fromEntries(this.entries().map(([n, d]) => [n, formatDtype(d)]));
  }
}
