#!/usr/bin/env tsx

import { Command } from 'commander';
import { pino } from 'pino';
import { CacheIOError, ConfigError, FetchError } from '@luxinema/shared';
import {
  ConfigSchema,
  DEFAULT_CONFIG,
  daysToMs,
  loadCacheConfig,
  loadUserConfig,
  resolveTargetDate,
} from './config.js';
import type { Config } from './config.js';
import { RatingCache } from './cache/rating-cache.js';
import { createScheduleFetcher } from './scraper/lux.js';
import { createOmdbClient } from './ratings/omdb.js';
import { formatDateISO } from './scraper/parser.js';
import { runLuxinema } from './index.js';

interface CliOptions {
  date?: string;
  tomorrow?: boolean;
  sort?: string;
  urls?: boolean;
  plot?: boolean;
  cache?: boolean;
  clearCache?: boolean;
  config?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('luxinema')
  .description('LUX Nijmegen の上映スケジュールを評価付きで表示する')
  .version('0.1.0')
  .option('-d, --date <date>', '対象日（YYYY-MM-DD、デフォルト: 今日）')
  .option('-t, --tomorrow', '明日のスケジュールを表示', false)
  .option('-s, --sort <order>', '並び順（schedule | rating）', DEFAULT_CONFIG.sort)
  .option('-u, --urls', 'IMDbのURLを表示', false)
  .option('-p, --plot', 'あらすじを表示', false)
  .option('--no-cache', '評価キャッシュを使わない')
  .option('--clear-cache', '評価キャッシュを削除して終了', false)
  .option('-c, --config <path>', '設定ファイルのパス（デフォルト: ~/.luxinema/config.yaml）')
  .option('-v, --verbose', '詳細ログを出力', false)
  .action(async (options: CliOptions) => {
    // ロガー設定（標準出力はスケジュール専用）
    const logger = pino({
      level: options.verbose ? 'debug' : (process.env.LOG_LEVEL ?? 'info'),
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
        },
      },
    });

    // 設定構築
    const parsed = ConfigSchema.safeParse({
      date: options.date,
      tomorrow: options.tomorrow ?? DEFAULT_CONFIG.tomorrow,
      sort: options.sort ?? DEFAULT_CONFIG.sort,
      urls: options.urls ?? DEFAULT_CONFIG.urls,
      plot: options.plot ?? DEFAULT_CONFIG.plot,
      cache: options.cache ?? DEFAULT_CONFIG.cache,
      clearCache: options.clearCache ?? DEFAULT_CONFIG.clearCache,
      configPath: options.config,
      verbose: options.verbose ?? DEFAULT_CONFIG.verbose,
    });
    if (!parsed.success) {
      logger.error({ issues: parsed.error.issues.map((i) => i.path.join('.')) }, '無効なオプションが指定されました');
      process.exit(1);
    }
    const config: Config = parsed.data;

    // 日付検証
    const date = resolveTargetDate(config);
    if (!date) {
      logger.error({ date: config.date }, '存在しない日付です');
      process.exit(1);
    }

    try {
      if (config.clearCache) {
        const { cachePath } = loadCacheConfig({ path: config.configPath });
        const count = await RatingCache.reset({ path: cachePath, logger });
        logger.info({ count }, '評価キャッシュを削除しました');
        return;
      }

      const userConfig = loadUserConfig({ path: config.configPath });

      const result = await runLuxinema({
        fetcher: createScheduleFetcher({
          ...(userConfig.scheduleUrl ? { baseUrl: userConfig.scheduleUrl } : {}),
        }),
        lookup: createOmdbClient({ apiKey: userConfig.omdbApiKey }),
        logger,
        date,
        openCache: config.cache
          ? () => RatingCache.open({ path: userConfig.cachePath, logger })
          : () => RatingCache.inMemory(),
        cacheMaxAgeMs:
          userConfig.cacheMaxAgeDays !== undefined ? daysToMs(userConfig.cacheMaxAgeDays) : undefined,
        sortBy: config.sort,
        showUrl: config.urls,
        showPlot: config.plot,
      });

      logger.info({
        date: formatDateISO(date),
        showtimes: result.lines.length,
        skipped: result.skipped.length,
        lookups: result.stats.lookups,
        cacheHits: result.stats.hits,
      }, '完了');
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error({ error: error.message }, '設定を読み込めません');
      } else if (error instanceof CacheIOError) {
        logger.error({ path: error.path, error: error.message }, '評価キャッシュを削除できません');
      } else if (error instanceof FetchError) {
        logger.error({ url: error.url, status: error.status, error: error.message }, 'スケジュールを取得できません');
      } else {
        logger.error({ error }, '予期しないエラーが発生しました');
      }
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
