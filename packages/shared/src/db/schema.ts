/**
 * SQLiteスキーマ定義
 */
export const SCHEMA_SQL = `
-- 評価キャッシュ（正規化タイトルごとに1件）
CREATE TABLE IF NOT EXISTS ratings (
  key TEXT PRIMARY KEY,
  title TEXT NOT NULL,
  score REAL,
  imdb_id TEXT,
  plot TEXT,
  fetched_at TEXT NOT NULL
);

-- インデックス
CREATE INDEX IF NOT EXISTS idx_ratings_fetched_at ON ratings(fetched_at);
`;
