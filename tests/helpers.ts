/* tests/helpers.ts */
import type Database from 'better-sqlite3';
import { compareValues, type ColumnData } from '@framebridge/core';
import type { SqliteStatement } from '@framebridge/expr-sqlite';

/** better-sqlite3 binds no booleans; store them the way SQLite does. */
function toStorage(v: unknown): unknown {
  if (typeof v === 'boolean') return v ? 1 : 0;
  return v ?? null;
}

/**
 * Create `table` with the declared column types, fill it with `columns` and
 * return `SELECT * FROM table`, ready for fromNative.
 */
export function seedSqlite(
  db: Database.Database,
  table: string,
  declTypes: Record<string, string>,
  columns: ColumnData
): SqliteStatement {
  const names = Object.keys(declTypes);
  db.exec(`CREATE TABLE ${table} (${names.map(n => `"${n}" ${declTypes[n]}`).join(', ')})`);
  const insert = db.prepare(`INSERT INTO ${table} VALUES (${names.map(() => '?').join(', ')})`);
  const length = columns[names[0]]?.length ?? 0;
  for (let i = 0; i < length; i++) {
    insert.run(...names.map(n => toStorage(columns[n][i])));
  }
  return db.prepare(`SELECT * FROM ${table}`);
}

/** Column data → row objects. */
export function rowsOf(data: ColumnData): Array<Record<string, unknown>> {
  const names = Object.keys(data);
  const length = names.length ? data[names[0]].length : 0;
  return Array.from({ length }, (_, i) => Object.fromEntries(names.map(n => [n, data[n][i]])));
}

/** canonicalize row order for parity comparisons: stable sort on `key`, nulls first */
export function sortedBy(data: ColumnData, key: string): ColumnData {
  const order = data[key].map((_, i) => i).sort((a, b) => compareValues(data[key][a], data[key][b]));
  return Object.fromEntries(Object.entries(data).map(([n, values]) => [n, order.map(i => values[i])]));
}
