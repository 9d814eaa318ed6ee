import type { Showtime } from './showtime.js';

/**
 * 評価情報
 * score が null の場合は「見つからなかった」ことを表す
 */
export interface Rating {
  key: string;
  title: string;
  score: number | null;
  imdbId: string | null;
  plot: string | null;
  fetchedAt: string; // ISO 8601
}

/**
 * 外部評価APIの検索結果
 */
export type RatingLookupResult =
  | { kind: 'found'; score: number; imdbId: string | null; plot: string | null }
  | { kind: 'not_found' }
  | { kind: 'transient_error'; reason: string };

/**
 * 外部評価API
 */
export interface RatingLookup {
  lookup(title: string): Promise<RatingLookupResult>;
}

/**
 * 評価と上映情報の組
 */
export interface ScheduleEntry {
  showtime: Showtime;
  rating: Rating;
}

export function getImdbUrl(imdbId: string): string {
  return `https://imdb.com/title/${imdbId}`;
}
