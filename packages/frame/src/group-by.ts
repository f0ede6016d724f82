// packages/frame/src/group-by.ts
import type { ColumnInput, DataFrame } from './dataframe';

export class GroupBy {
  constructor(private readonly frame: DataFrame, readonly keys: readonly string[]) {}

  /** One row per distinct key combination; null and NaN keys group as the backend documents. */
  agg(...inputs: ColumnInput[]): DataFrame {
    return this.frame.aggregateGroups(this.keys, inputs);
  }
}
