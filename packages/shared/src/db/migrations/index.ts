import type { Database } from 'sql.js';
import { migration001 } from './001_initial.js';

export interface Migration {
  version: number;
  name: string;
  up(db: Database): void;
}

/**
 * 登録されているマイグレーション一覧（version 昇順）
 */
export const migrations: Migration[] = [migration001];

/**
 * 適用済みのバージョンを取得（管理テーブルがなければ空）
 */
function getAppliedVersions(db: Database): Set<number> {
  const tables = db.exec(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='schema_migrations'"
  );
  if (!tables[0]?.values.length) {
    return new Set();
  }
  const rows = db.exec('SELECT version FROM schema_migrations');
  return new Set(rows[0]?.values.map((row) => Number(row[0])) ?? []);
}

/**
 * 未適用のマイグレーションを順に実行する
 * @returns 今回適用したバージョン
 */
export function runMigrations(db: Database): number[] {
  const applied = getAppliedVersions(db);
  const pending = migrations.filter((migration) => !applied.has(migration.version));

  for (const migration of pending) {
    migration.up(db);
    db.run('INSERT INTO schema_migrations (version, name, applied_at) VALUES (?, ?, ?)', [
      migration.version,
      migration.name,
      new Date().toISOString(),
    ]);
  }

  return pending.map((migration) => migration.version);
}

/**
 * 現在のスキーマバージョンを取得
 */
export function getCurrentVersion(db: Database): number {
  const result = db.exec('SELECT MAX(version) FROM schema_migrations');
  const version = result[0]?.values[0]?.[0];
  return typeof version === 'number' ? version : 0;
}
