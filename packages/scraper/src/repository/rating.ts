import type { Database, SqlValue } from 'sql.js';
import type { Rating } from '@luxinema/shared';

interface RatingRow {
  key: string;
  title: string;
  score: number | null;
  imdb_id: string | null;
  plot: string | null;
  fetched_at: string;
}

function toRatingRow(row: Record<string, SqlValue>): RatingRow {
  const text = (value: SqlValue | undefined): string | null =>
    typeof value === 'string' ? value : null;
  return {
    key: String(row['key']),
    title: String(row['title']),
    score: typeof row['score'] === 'number' ? row['score'] : null,
    imdb_id: text(row['imdb_id']),
    plot: text(row['plot']),
    fetched_at: String(row['fetched_at']),
  };
}

function toRating(row: RatingRow): Rating {
  return {
    key: row.key,
    title: row.title,
    score: row.score,
    imdbId: row.imdb_id,
    plot: row.plot,
    fetchedAt: row.fetched_at,
  };
}

/**
 * 評価をUPSERT（キーが存在すれば上書き）
 */
export function upsertRating(db: Database, rating: Rating): void {
  db.run(
    `INSERT INTO ratings (key, title, score, imdb_id, plot, fetched_at)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(key) DO UPDATE SET
       title = excluded.title,
       score = excluded.score,
       imdb_id = excluded.imdb_id,
       plot = excluded.plot,
       fetched_at = excluded.fetched_at`,
    [rating.key, rating.title, rating.score, rating.imdbId, rating.plot, rating.fetchedAt]
  );
}

/**
 * 全評価を取得
 */
export function getAllRatings(db: Database): Rating[] {
  const stmt = db.prepare('SELECT * FROM ratings ORDER BY key');

  const ratings: Rating[] = [];
  while (stmt.step()) {
    ratings.push(toRating(toRatingRow(stmt.getAsObject())));
  }
  stmt.free();

  return ratings;
}

/**
 * 評価を削除
 * @returns 削除された行数
 */
export function deleteRating(db: Database, key: string): number {
  db.run('DELETE FROM ratings WHERE key = ?', [key]);
  return countChanges(db);
}

/**
 * 全評価を削除
 * @returns 削除された行数
 */
export function deleteAllRatings(db: Database): number {
  db.run('DELETE FROM ratings');
  return countChanges(db);
}

function countChanges(db: Database): number {
  const changesStmt = db.prepare('SELECT changes() as count');
  changesStmt.step();
  const count = changesStmt.getAsObject()['count'];
  changesStmt.free();

  return typeof count === 'number' ? count : 0;
}
