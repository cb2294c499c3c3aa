import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const SRC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

const cache = new Map<string, string>();

/** Reads a .sql file below src/, e.g. `features/garden/sql/garden_plants_all.sql`. */
export function readSqlFile(relativePath: string): string {
  let sql = cache.get(relativePath);
  if (sql === undefined) {
    sql = readFileSync(path.join(SRC_DIR, relativePath), 'utf-8').trim();
    cache.set(relativePath, sql);
  }
  return sql;
}
