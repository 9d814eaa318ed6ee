/**
 * Luxinema のエラー基底クラス
 */
export class LuxinemaError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * 上映スケジュールを取得できない（致命的）
 */
export class FetchError extends LuxinemaError {
  readonly status: number | null;

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, { cause: options?.cause });
    this.status = options?.status ?? null;
  }
}

/**
 * 生エントリを Showtime に変換できない（エントリ単位でスキップ）
 */
export class ParseError extends LuxinemaError {
  constructor(
    message: string,
    readonly field: 'title' | 'time'
  ) {
    super(message);
  }
}

/**
 * 評価の取得に失敗した（RatingResolver 内で回復する）
 */
export class RatingLookupError extends LuxinemaError {
  constructor(
    message: string,
    readonly title: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * キャッシュファイルの読み書きに失敗した
 */
export class CacheIOError extends LuxinemaError {
  constructor(
    message: string,
    readonly path: string,
    readonly operation: 'read' | 'write',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * 設定ファイルが無い、または不正（起動失敗）
 */
export class ConfigError extends LuxinemaError {}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
