import * as cheerio from 'cheerio';
import { FetchError, toErrorMessage, type RawScheduleEntry } from '@luxinema/shared';
import { formatDateYYYYMMDD } from './parser.js';

/**
 * スケジュール取得の設定
 */
export interface ScheduleFetcherConfig {
  baseUrl?: string;
  userAgent?: string;
  timeout?: number;
  fetch?: typeof fetch;
}

const DEFAULT_CONFIG: Required<Omit<ScheduleFetcherConfig, 'fetch'>> = {
  baseUrl: 'https://www.lux-nijmegen.nl/film/',
  userAgent: 'Luxinema/0.1.0',
  timeout: 30000,
};

/**
 * 上映スケジュールの取得元
 */
export interface ScheduleFetcher {
  fetchSchedule(date: Date): Promise<Iterable<RawScheduleEntry>>;
}

/**
 * LUXのHTMLから指定日の生エントリを取り出す
 * 一覧 (ul.items) が無い場合は null
 *
 * サイトは全日付を出力してクラスで隠しているため、
 * li[data-date] で対象日を絞り込む必要がある
 */
export function parseSchedulePage(html: string, date: Date): Iterable<RawScheduleEntry> | null {
  const $ = cheerio.load(html);
  const list = $('ul.items').first();
  if (list.length === 0) {
    return null;
  }

  const dateStr = formatDateYYYYMMDD(date);
  const items = list.find(`li[data-date="${dateStr}"]`).toArray();

  function* entries(): Generator<RawScheduleEntry> {
    for (const item of items) {
      const $item = $(item);
      const $content = $item.find('div.content-wrap').first();
      const $scope = $content.length > 0 ? $content : $item;

      const title = $scope.find('h3').first().text();
      const itemHall = $scope.find('.hall, .zaal').first().text().trim();

      // 時刻が無い作品は上映なしとして扱う
      for (const span of $scope.find('div.times span').toArray()) {
        const $span = $(span);
        const hall = $span.attr('data-hall')?.trim() || itemHall;
        yield {
          title: title.length > 0 ? title : undefined,
          time: $span.text(),
          hall: hall.length > 0 ? hall : undefined,
        };
      }
    }
  }

  return entries();
}

/**
 * LUX Nijmegen のスケジュール取得クラス
 */
export class LuxScheduleFetcher implements ScheduleFetcher {
  private config: Required<Omit<ScheduleFetcherConfig, 'fetch'>>;
  private fetchFn: typeof fetch;

  constructor(config: ScheduleFetcherConfig = {}) {
    const { fetch: fetchFn, ...rest } = config;
    this.config = { ...DEFAULT_CONFIG, ...rest };
    this.fetchFn = fetchFn ?? fetch;
  }

  /**
   * 日付からURLを生成する
   * 形式: ?filter=YYYYMMDD
   */
  getScheduleUrl(date: Date): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set('filter', formatDateYYYYMMDD(date));
    return url.toString();
  }

  /**
   * 指定日の生エントリを取得する
   * @throws FetchError ページを取得できない、または一覧が無い場合
   */
  async fetchSchedule(date: Date): Promise<Iterable<RawScheduleEntry>> {
    const url = this.getScheduleUrl(date);

    let html: string;
    try {
      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': this.config.userAgent },
        signal: AbortSignal.timeout(this.config.timeout),
      });
      if (!response.ok) {
        throw new FetchError(`schedule request failed with status ${response.status}`, url, {
          status: response.status,
        });
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(`schedule request failed: ${toErrorMessage(error)}`, url, {
        cause: error,
      });
    }

    const entries = parseSchedulePage(html, date);
    if (!entries) {
      throw new FetchError('schedule list not found in page', url);
    }
    return entries;
  }
}

export function createScheduleFetcher(config?: ScheduleFetcherConfig): LuxScheduleFetcher {
  return new LuxScheduleFetcher(config);
}
