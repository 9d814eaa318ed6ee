import type { Logger } from 'pino';
import {
  CacheIOError,
  RatingLookupError,
  cleanDisplayTitle,
  normalizeTitle,
  toErrorMessage,
  type Rating,
  type RatingLookup,
  type RatingLookupResult,
} from '@luxinema/shared';
import type { RatingCache } from '../cache/rating-cache.js';

export interface RatingResolverOptions {
  cache: RatingCache;
  lookup: RatingLookup;
  logger: Logger;
  /** キャッシュの有効期間（未指定なら期限なし） */
  maxAgeMs?: number | undefined;
  now?: () => Date;
}

export interface ResolverStats {
  hits: number;
  misses: number;
  lookups: number;
  failures: number;
}

/**
 * タイトル → 評価 の解決
 *
 * 同じ正規化キーに対する外部検索はキャッシュの有効期間中に1回まで。
 * 見つからなかった結果・失敗した結果も score: null としてキャッシュする。
 */
export class RatingResolver {
  private cache: RatingCache;
  private lookup: RatingLookup;
  private logger: Logger;
  private maxAgeMs: number | undefined;
  private now: () => Date;
  private flushWarned = false;
  private counters: ResolverStats = { hits: 0, misses: 0, lookups: 0, failures: 0 };

  constructor(options: RatingResolverOptions) {
    this.cache = options.cache;
    this.lookup = options.lookup;
    this.logger = options.logger;
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? (() => new Date());
  }

  async resolve(title: string): Promise<Rating> {
    const key = normalizeTitle(title);
    const cached = this.cache.get(key);
    if (cached && !this.isExpired(cached)) {
      this.counters.hits++;
      this.logger.debug({ title, key }, 'キャッシュヒット');
      return cached;
    }

    this.counters.misses++;
    const displayTitle = cleanDisplayTitle(title);
    const result = await this.lookupSafely(displayTitle);
    const rating = this.toRating(key, displayTitle, result);

    this.cache.set(rating);
    this.persist();

    return rating;
  }

  stats(): ResolverStats {
    return { ...this.counters };
  }

  private isExpired(rating: Rating): boolean {
    if (this.maxAgeMs === undefined) {
      return false;
    }
    const fetchedAt = Date.parse(rating.fetchedAt);
    if (Number.isNaN(fetchedAt)) {
      return true;
    }
    return this.now().getTime() - fetchedAt > this.maxAgeMs;
  }

  /**
   * 外部検索を呼び出す（例外は transient_error に変換）
   */
  private async lookupSafely(title: string): Promise<RatingLookupResult> {
    this.counters.lookups++;
    try {
      return await this.lookup.lookup(title);
    } catch (error) {
      const lookupError = new RatingLookupError(toErrorMessage(error), title, { cause: error });
      this.logger.debug({ err: lookupError }, '評価検索で例外が発生');
      return { kind: 'transient_error', reason: lookupError.message };
    }
  }

  private toRating(key: string, title: string, result: RatingLookupResult): Rating {
    const fetchedAt = this.now().toISOString();

    switch (result.kind) {
      case 'found':
        this.logger.debug({ title, score: result.score }, '評価を取得');
        return {
          key,
          title,
          score: result.score,
          imdbId: result.imdbId,
          plot: result.plot,
          fetchedAt,
        };
      case 'not_found':
        this.logger.info({ title }, '評価が見つかりません');
        return { key, title, score: null, imdbId: null, plot: null, fetchedAt };
      case 'transient_error':
        this.counters.failures++;
        this.logger.warn({ title, reason: result.reason }, '評価の取得に失敗');
        return { key, title, score: null, imdbId: null, plot: null, fetchedAt };
      default: {
        const unreachable: never = result;
        return unreachable;
      }
    }
  }

  /**
   * キャッシュをファイルに書き出す（失敗は一度だけ警告）
   */
  private persist(): void {
    try {
      this.cache.flush();
    } catch (error) {
      if (!(error instanceof CacheIOError)) {
        throw error;
      }
      if (!this.flushWarned) {
        this.flushWarned = true;
        this.logger.warn({ path: error.path, error: error.message }, '評価キャッシュを保存できません');
      }
    }
  }
}
