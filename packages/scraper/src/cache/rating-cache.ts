import type { Database } from 'sql.js';
import type { Logger } from 'pino';
import {
  CacheIOError,
  closeDatabase,
  getDatabasePath,
  openDatabase,
  saveDatabase,
  toErrorMessage,
  type Rating,
} from '@luxinema/shared';
import {
  deleteAllRatings,
  deleteRating,
  getAllRatings,
  upsertRating,
} from '../repository/rating.js';

export interface RatingCacheOptions {
  /** DBファイルのパス（デフォルト: ~/.luxinema/ratings.db） */
  path?: string;
  logger: Logger;
}

/**
 * 正規化タイトル → 評価 のキャッシュ
 *
 * 起動時にDBファイルから全件読み込み、set のたびにDBへ書き込む。
 * ファイルへの書き出しは flush / close で行う。
 * path が null の場合はメモリ上のみ（flush は何もしない）。
 */
export class RatingCache {
  private ratings = new Map<string, Rating>();
  private dirty = false;
  private closed = false;

  private constructor(
    private db: Database,
    readonly path: string | null
  ) {
    for (const rating of getAllRatings(db)) {
      this.ratings.set(rating.key, rating);
    }
  }

  /**
   * キャッシュを開く
   * 読み込めない場合は警告を出して空のメモリキャッシュで続行する
   */
  static async open(options: RatingCacheOptions): Promise<RatingCache> {
    const path = options.path ?? getDatabasePath();
    try {
      const db = await openDatabase({ path });
      const cache = new RatingCache(db, path);
      options.logger.debug({ path, size: cache.size }, '評価キャッシュを読み込みました');
      return cache;
    } catch (error) {
      const cacheError = new CacheIOError(
        `failed to read rating cache: ${toErrorMessage(error)}`,
        path,
        'read',
        { cause: error }
      );
      options.logger.warn(
        { path, error: cacheError.message },
        '評価キャッシュを読み込めません。空のキャッシュで続行します'
      );
      return RatingCache.inMemory();
    }
  }

  /**
   * キャッシュファイルを空にする
   * 読み込めないファイルは空のDBで置き換える
   * @returns 削除された件数
   * @throws CacheIOError 書き込みに失敗した場合
   */
  static async reset(options: RatingCacheOptions): Promise<number> {
    const path = options.path ?? getDatabasePath();
    let db: Database;
    try {
      db = await openDatabase({ path });
    } catch (error) {
      options.logger.warn(
        { path, error: toErrorMessage(error) },
        '評価キャッシュを読み込めません。空のキャッシュで置き換えます'
      );
      db = await openDatabase({ inMemory: true });
    }

    try {
      const count = deleteAllRatings(db);
      saveDatabase(db, path);
      return count;
    } catch (error) {
      throw new CacheIOError(
        `failed to reset rating cache: ${toErrorMessage(error)}`,
        path,
        'write',
        { cause: error }
      );
    } finally {
      closeDatabase(db);
    }
  }

  /**
   * ファイルに保存しないキャッシュを作成する
   */
  static async inMemory(): Promise<RatingCache> {
    const db = await openDatabase({ inMemory: true });
    return new RatingCache(db, null);
  }

  get size(): number {
    return this.ratings.size;
  }

  get isPersistent(): boolean {
    return this.path !== null;
  }

  has(key: string): boolean {
    return this.ratings.has(key);
  }

  get(key: string): Rating | undefined {
    return this.ratings.get(key);
  }

  entries(): Rating[] {
    return [...this.ratings.values()];
  }

  /**
   * 評価を保存する（同じキーは上書き）
   */
  set(rating: Rating): void {
    this.ensureOpen();
    upsertRating(this.db, rating);
    this.ratings.set(rating.key, rating);
    this.dirty = true;
  }

  delete(key: string): boolean {
    this.ensureOpen();
    const removed = deleteRating(this.db, key) > 0;
    this.ratings.delete(key);
    if (removed) {
      this.dirty = true;
    }
    return removed;
  }

  /**
   * 全件削除
   * @returns 削除された件数
   */
  clear(): number {
    this.ensureOpen();
    const count = deleteAllRatings(this.db);
    this.ratings.clear();
    this.dirty = true;
    return count;
  }

  /**
   * 未保存の変更をファイルに書き出す
   * @throws CacheIOError 書き込みに失敗した場合
   */
  flush(): void {
    if (!this.path || !this.dirty || this.closed) {
      return;
    }
    try {
      saveDatabase(this.db, this.path);
      this.dirty = false;
    } catch (error) {
      throw new CacheIOError(
        `failed to write rating cache: ${toErrorMessage(error)}`,
        this.path,
        'write',
        { cause: error }
      );
    }
  }

  /**
   * 書き出してDBを閉じる
   * 書き込みに失敗してもDBは閉じる
   * @throws CacheIOError 書き込みに失敗した場合
   */
  close(): void {
    if (this.closed) {
      return;
    }
    try {
      this.flush();
    } finally {
      closeDatabase(this.db);
      this.closed = true;
    }
  }

  private ensureOpen(): void {
    if (this.closed) {
      throw new Error('rating cache is closed');
    }
  }
}
