import {
  getImdbUrl,
  type Rating,
  type ScheduleEntry,
  type Showtime,
} from '@luxinema/shared';

export type ResolveRating = (title: string) => Promise<Rating>;

export type SortOrder = 'schedule' | 'rating';

export interface RenderOptions {
  sortBy?: SortOrder;
  showUrl?: boolean;
  /** あらすじを末尾に付ける */
  showPlot?: boolean;
}

export const RATING_UNAVAILABLE = 'rating unavailable';

/**
 * 上映情報と評価を結合する
 * 入力順を保ち、同じタイトルの評価解決は1回だけ行う
 */
export async function buildScheduleEntries(
  showtimes: readonly Showtime[],
  resolve: ResolveRating
): Promise<ScheduleEntry[]> {
  const ratings = new Map<string, Rating>();
  const entries: ScheduleEntry[] = [];

  for (const showtime of showtimes) {
    let rating = ratings.get(showtime.key);
    if (!rating) {
      rating = await resolve(showtime.title);
      ratings.set(showtime.key, rating);
    }
    entries.push({ showtime, rating });
  }

  return entries;
}

export function formatScore(rating: Rating): string {
  return rating.score === null ? RATING_UNAVAILABLE : `★ ${rating.score.toFixed(1)}`;
}

/**
 * 1行分の表示文字列
 * 例: "10:00  Dune [Zaal 1]  ★ 8.6"
 * showUrl / showPlot で IMDb のURL・あらすじを追加する
 */
export function formatScheduleEntry(entry: ScheduleEntry, options: RenderOptions = {}): string {
  const { showtime, rating } = entry;
  const hall = showtime.hall ? ` [${showtime.hall}]` : '';
  const parts = [showtime.startTime, `${showtime.title}${hall}`, formatScore(rating)];
  if (options.showUrl && rating.imdbId) {
    parts.push(getImdbUrl(rating.imdbId));
  }
  if (options.showPlot && rating.plot) {
    parts.push(rating.plot);
  }
  return parts.join('  ');
}

/**
 * 評価の高い順に並べる（評価なしは末尾、同点は元の順）
 */
export function sortByRating(entries: readonly ScheduleEntry[]): ScheduleEntry[] {
  return [...entries].sort((a, b) => {
    const scoreA = a.rating.score ?? Number.NEGATIVE_INFINITY;
    const scoreB = b.rating.score ?? Number.NEGATIVE_INFINITY;
    if (scoreA === scoreB) {
      return 0;
    }
    return scoreB > scoreA ? 1 : -1;
  });
}

/**
 * 表示用の行を生成する
 */
export async function renderSchedule(
  showtimes: readonly Showtime[],
  resolve: ResolveRating,
  options: RenderOptions = {}
): Promise<{ entries: ScheduleEntry[]; lines: string[] }> {
  const built = await buildScheduleEntries(showtimes, resolve);
  const entries = options.sortBy === 'rating' ? sortByRating(built) : built;
  const lines = entries.map((entry) => formatScheduleEntry(entry, options));
  return { entries, lines };
}
