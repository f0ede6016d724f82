// packages/expr-sqlite/src/dtypes.ts
// Declared column types (decltype) → dtype, following SQLite's affinity rules.
import { DT, UnknownDtypeError, type DType } from '@framebridge/core';

/** `null` decltype means a computed column: its dtype comes from the tree that produced it. */
export function declTypeToDtype(declType: string | null): DType {
  if (declType === null || declType.trim() === '') return DT.Unknown;
  const t = declType.toUpperCase();
  if (t.includes('BOOL')) return DT.Boolean;
  if (t.includes('INT')) return DT.Int64;
  if (t.includes('CHAR') || t.includes('CLOB') || t.includes('TEXT')) return DT.String;
  if (t.includes('REAL') || t.includes('FLOA') || t.includes('DOUB')) return DT.Float64;
  if (t.includes('DATETIME') || t.includes('TIMESTAMP')) return DT.Datetime('ms');
  if (t.includes('DATE')) return DT.Date;
  if (t.includes('NUMERIC') || t.includes('DECIMAL')) return DT.Float64;
  if (t.includes('BLOB')) return DT.Binary;
  throw new UnknownDtypeError(declType, 'sqlite');
}

/** Target of CAST(... AS ...); null when SQLite has no storage class for it. */
export function castTarget(dtype: DType): string | null {
  switch (dtype.kind) {
    case 'int':
    case 'boolean':
      return 'INTEGER';
    case 'float':
    case 'decimal':
      return 'REAL';
    case 'string':
    case 'categorical':
    case 'enum':
      return 'TEXT';
    case 'binary':
      return 'BLOB';
    default:
      return null;
  }
}
