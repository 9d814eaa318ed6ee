/**
 * スクレイピング直後の生の上映エントリ
 * 取得元のHTML構造に依存しない最小限の形
 */
export interface RawScheduleEntry {
  title?: string | undefined;
  time?: string | undefined;
  hall?: string | undefined;
}

/**
 * 上映情報（パース済み・不変）
 */
export interface Showtime {
  readonly title: string; // 表示用タイトル
  readonly key: string; // 正規化済みタイトル（キャッシュキー）
  readonly startTime: string; // HH:mm
  readonly date: string; // YYYY-MM-DD
  readonly hall: string | null;
}
