// packages/frame/src/index.ts
export * from './namespace';
export { DataFrame, toNodes, type ColumnInput, type NamedInputs } from './dataframe';
export { GroupBy } from './group-by';
export { Series, newSeries, type NewSeriesOptions, type SeriesOperand } from './series';
export {
  Registry, createRegistry, defaultRegistry, frameEntry, seriesEntry,
  isArrowTable, isMongoCollection, isMongoCursor, isSqliteStatement,
  type OpenOptions, type RegistryEntry,
} from './registry';
