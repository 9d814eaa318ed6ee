import type { Database } from 'sql.js';
import type { Migration } from './index.js';

/**
 * マイグレーション: 初期スキーマ
 */
export const migration001: Migration = {
  version: 1,
  name: '001_initial',
  up(db: Database): void {
    // 評価キャッシュ
    db.run(`
      CREATE TABLE IF NOT EXISTS ratings (
        key TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        score REAL,
        imdb_id TEXT,
        plot TEXT,
        fetched_at TEXT NOT NULL
      )
    `);

    db.run('CREATE INDEX IF NOT EXISTS idx_ratings_fetched_at ON ratings(fetched_at)');

    // マイグレーションバージョン管理テーブル
    db.run(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL
      )
    `);
  },
};

export default migration001;
