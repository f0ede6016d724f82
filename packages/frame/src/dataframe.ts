// packages/frame/src/dataframe.ts
import {
  DtypeMismatchError, Expr, InvalidOperationError, alias, assertSupported, binaryOp, columnRef, expand, formatDtype,
  inferDtype, intoNode, toNamedExprs, walk, withBackendErrors, withBackendErrorsAsync,
  type Adapter, type ApplyMode, type BackendName, type ColumnData, type ExplainResult, type ExprNode,
  type FrameHandle, type IntoExpr, type NamedExpr, type Schema, type SemanticsNote, type SortOptions,
} from '@framebridge/core';
import { GroupBy } from './group-by';

/** `{ name: expr }`: the keyword form of select/withColumns. */
export type NamedInputs = Record<string, IntoExpr>;
export type ColumnInput = IntoExpr | NamedInputs;

export function toNodes(inputs: readonly ColumnInput[]): ExprNode[] {
  return inputs.flatMap(input => {
    if (typeof input === 'string' || input instanceof Expr) return [intoNode(input)];
    return Object.entries(input).map(([name, e]) => alias(intoNode(e), name));
  });
}

/**
 * A native frame plus the adapter that owns it. Every transformation returns
 * a new DataFrame; the wrapped object is never changed.
 */
export class DataFrame {
  private constructor(
    private readonly adapter: Adapter,
    private readonly frame: FrameHandle<unknown>
  ) {}

  static wrap<T>(adapter: Adapter<T>, native: T, schema?: Schema): DataFrame {
    return new DataFrame(adapter, withBackendErrors(adapter.name, () => adapter.wrap(native, schema)));
  }

  get schema(): Schema { return this.frame.schema; }
  get columns(): string[] { return this.frame.schema.names(); }
  get implementation(): BackendName { return this.adapter.name; }
  get isLazy(): boolean { return this.adapter.capabilities.lazy; }
  /** where this frame's results may deviate from the reference semantics */
  get approximations(): readonly SemanticsNote[] { return this.frame.notes; }

  withColumns(...inputs: ColumnInput[]): DataFrame {
    return this.apply(inputs, 'extend');
  }

  select(...inputs: ColumnInput[]): DataFrame {
    return this.apply(inputs, 'project');
  }

  /** Keep rows where every predicate is true; null counts as false. */
  filter(...predicates: Expr[]): DataFrame {
    const nodes = predicates.flatMap(p => expand(p.node, this.schema));
    if (nodes.length === 0) throw new InvalidOperationError('filter() needs at least one predicate');
    const predicate = nodes.reduce((acc, n) => binaryOp('and', acc, n));
    const dtype = inferDtype(predicate, this.schema, { strict: true });
    if (dtype.kind !== 'boolean' && dtype.kind !== 'unknown') {
      throw new DtypeMismatchError(`filter() needs a Boolean predicate, got ${formatDtype(dtype)}`);
    }
    this.check(predicate);
    return this.derive(() => this.adapter.filter(predicate, this.frame));
  }

  groupBy(...keys: string[]): GroupBy {
    if (keys.length === 0) throw new InvalidOperationError('groupBy() needs at least one key');
    keys.forEach(k => this.schema.get(k));
    return new GroupBy(this, keys);
  }

  /** @internal used by GroupBy.agg */
  aggregateGroups(keys: readonly string[], inputs: readonly ColumnInput[]): DataFrame {
    const named = this.named(inputs);
    return this.derive(() => this.adapter.aggregate(named, keys, this.frame));
  }

  sort(by: string | readonly string[], options: SortOptions = {}): DataFrame {
    const keys = typeof by === 'string' ? [by] : [...by];
    keys.forEach(k => this.schema.get(k));
    const flag = options.descending;
    if (typeof flag === 'object' && flag.length !== keys.length) {
      throw new InvalidOperationError(`sort() got ${flag.length} descending flags for ${keys.length} keys`);
    }
    return this.derive(() => this.adapter.sort(keys, options, this.frame));
  }

  head(n = 5): DataFrame {
    if (!Number.isInteger(n)) throw new InvalidOperationError(`head() needs a whole number of rows, got ${n}`);
    return this.derive(() => this.adapter.head(n, this.frame));
  }

  drop(...names: string[]): DataFrame {
    const remaining = this.closedSchema('drop').drop(names).names();
    return this.project(remaining.map(n => ({ name: n, node: columnRef(n) })));
  }

  rename(mapping: Record<string, string>): DataFrame {
    this.closedSchema('rename').rename(mapping);
    return this.project(this.columns.map(n => ({ name: mapping[n] ?? n, node: columnRef(n) })));
  }

  explain(): ExplainResult {
    return this.adapter.explain(this.frame);
  }

  /** Run the plan (lazy backends) and return the columns as JS arrays. */
  async collect(): Promise<ColumnData> {
    return withBackendErrorsAsync(this.adapter.name, () => this.adapter.collect(this.frame));
  }

  /** The wrapped engine object; this DataFrame stays usable. */
  toNative(): unknown {
    return this.frame.native;
  }

  // --- helpers ---
  private apply(inputs: readonly ColumnInput[], mode: ApplyMode): DataFrame {
    const named = this.named(inputs);
    return this.derive(() => this.adapter.applyColumns(named, this.frame, mode));
  }

  private project(named: readonly NamedExpr[]): DataFrame {
    return this.derive(() => this.adapter.applyColumns(named, this.frame, 'project'));
  }

  /** Expand, name and check every input before the adapter sees any of them. */
  private named(inputs: readonly ColumnInput[]): NamedExpr[] {
    const named = toNamedExprs(toNodes(inputs), this.schema);
    named.forEach(e => this.check(e.node));
    return named;
  }

  private check(node: ExprNode): void {
    walk(node, n => {
      if (n.kind === 'horizontal' && n.operands.length === 0) {
        throw new InvalidOperationError(`${n.fn}_horizontal() needs at least one expression`);
      }
    });
    assertSupported(node, this.adapter.name, this.adapter.capabilities);
    inferDtype(node, this.schema, { strict: true });
  }

  private closedSchema(op: string): Schema {
    if (this.schema.open) {
      throw new InvalidOperationError(`${op}() needs the column list; wrap this ${this.implementation} object with a schema hint`);
    }
    return this.schema;
  }

  private derive(run: () => FrameHandle<unknown>): DataFrame {
    return new DataFrame(this.adapter, withBackendErrors(this.adapter.name, run));
  }
}
