// @luxinema/scraper
// LUX Nijmegen schedule scraper + rating enrichment

import type { Logger } from 'pino';
import {
  CacheIOError,
  type ParseError,
  type RatingLookup,
  type RawScheduleEntry,
  type ScheduleEntry,
  type Showtime,
} from '@luxinema/shared';
import type { ScheduleFetcher } from './scraper/lux.js';
import { formatDateISO, tryParseShowtime } from './scraper/parser.js';
import { RatingCache } from './cache/rating-cache.js';
import { RatingResolver, type ResolverStats } from './ratings/resolver.js';
import { renderSchedule, type SortOrder } from './render/renderer.js';
import { getToday } from './config.js';

/**
 * 実行オプション
 */
export interface LuxinemaOptions {
  fetcher: ScheduleFetcher;
  lookup: RatingLookup;
  logger: Logger;
  /** 対象日（デフォルト: 実行時のローカル日付） */
  date?: Date;
  /** キャッシュを開く処理（デフォルト: ~/.luxinema/ratings.db） */
  openCache?: () => Promise<RatingCache>;
  cacheMaxAgeMs?: number | undefined;
  sortBy?: SortOrder;
  showUrl?: boolean;
  showPlot?: boolean;
  /** 1行ずつの出力先（デフォルト: 標準出力） */
  output?: (line: string) => void;
}

/**
 * 実行結果
 */
export interface LuxinemaResult {
  date: string;
  entries: ScheduleEntry[];
  lines: string[];
  skipped: ParseError[];
  stats: ResolverStats;
}

/**
 * 生エントリを全てパースする（不正なエントリはスキップ）
 */
export function parseEntries(
  rawEntries: Iterable<RawScheduleEntry>,
  date: Date,
  logger: Logger
): { showtimes: Showtime[]; skipped: ParseError[] } {
  const showtimes: Showtime[] = [];
  const skipped: ParseError[] = [];

  for (const raw of rawEntries) {
    const result = tryParseShowtime(raw, date);
    if (result.ok) {
      showtimes.push(result.value);
    } else {
      skipped.push(result.error);
      logger.info({ entry: raw, error: result.error.message }, 'エントリをスキップ');
    }
  }

  return { showtimes, skipped };
}

function writeToStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

/**
 * メインの実行関数
 * 取得 → パース → 評価解決 → 表示
 * @throws FetchError スケジュールを取得できない場合
 */
export async function runLuxinema(options: LuxinemaOptions): Promise<LuxinemaResult> {
  const {
    fetcher,
    lookup,
    logger,
    date = getToday(),
    openCache = () => RatingCache.open({ logger }),
    cacheMaxAgeMs,
    sortBy = 'schedule',
    showUrl = false,
    showPlot = false,
    output = writeToStdout,
  } = options;
  const dateStr = formatDateISO(date);

  logger.info({ date: dateStr }, 'スケジュール取得開始');
  const rawEntries = await fetcher.fetchSchedule(date);
  const { showtimes, skipped } = parseEntries(rawEntries, date, logger);
  logger.info({ date: dateStr, count: showtimes.length }, 'スケジュール取得完了');

  const cache = await openCache();
  try {
    const resolver = new RatingResolver({ cache, lookup, logger, maxAgeMs: cacheMaxAgeMs });
    const { entries, lines } = await renderSchedule(
      showtimes,
      (title) => resolver.resolve(title),
      { sortBy, showUrl, showPlot }
    );

    for (const line of lines) {
      output(line);
    }
    if (lines.length === 0) {
      logger.info({ date: dateStr }, '上映予定がありません');
    }
    if (skipped.length > 0) {
      logger.warn({ skipped: skipped.length }, '不正なエントリをスキップしました');
    }

    const stats = resolver.stats();
    logger.debug({ ...stats }, '評価解決の統計');

    return { date: dateStr, entries, lines, skipped, stats };
  } finally {
    closeCache(cache, logger);
  }
}

/**
 * キャッシュを閉じる（書き込み失敗は警告のみ）
 */
function closeCache(cache: RatingCache, logger: Logger): void {
  try {
    cache.close();
  } catch (error) {
    if (!(error instanceof CacheIOError)) {
      throw error;
    }
    logger.warn({ path: error.path, error: error.message }, '評価キャッシュを保存できません');
  }
}

// Re-export for convenience
export { LuxScheduleFetcher, createScheduleFetcher, parseSchedulePage, type ScheduleFetcher, type ScheduleFetcherConfig } from './scraper/lux.js';
export * from './scraper/parser.js';
export { OmdbClient, createOmdbClient, toLookupResult, type OmdbClientConfig } from './ratings/omdb.js';
export * from './ratings/resolver.js';
export * from './cache/rating-cache.js';
export * from './render/renderer.js';
export * from './repository/index.js';
export * from './config.js';
