/**
 * タイトルを正規化（キャッシュキー用）
 * - Unicode NFKC
 * - 前後の空白除去・連続空白の圧縮
 * - 小文字化
 *
 * 正規化済みの文字列に再適用しても結果は変わらない
 */
export function normalizeTitle(title: string): string {
  return title.normalize('NFKC').replace(/\s+/g, ' ').trim().toLowerCase();
}

/**
 * 表示用タイトルを整形する（大文字小文字は保持）
 */
export function cleanDisplayTitle(title: string): string {
  return title.replace(/\s+/g, ' ').trim();
}
