import { z } from 'zod';
import { toErrorMessage, type RatingLookup, type RatingLookupResult } from '@luxinema/shared';

/**
 * OMDb のレスポンス（t= 検索）
 * 失敗時は Response: "False" と Error のみが返る
 */
const OmdbResponseSchema = z.discriminatedUnion('Response', [
  z.object({
    Response: z.literal('True'),
    Title: z.string(),
    imdbRating: z.string().optional(),
    imdbID: z.string().optional(),
    Plot: z.string().optional(),
  }),
  z.object({
    Response: z.literal('False'),
    Error: z.string().optional(),
  }),
]);

export type OmdbResponse = z.infer<typeof OmdbResponseSchema>;

/**
 * OMDb クライアント設定
 */
export interface OmdbClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  fetch?: typeof fetch;
}

const OMDB_BASE_URL = 'https://www.omdbapi.com/';

function optionalField(value: string | undefined): string | null {
  return value && value !== 'N/A' ? value : null;
}

/**
 * OMDb のレスポンスを検索結果に変換する
 */
export function toLookupResult(response: OmdbResponse): RatingLookupResult {
  if (response.Response === 'False') {
    // "Movie not found!" 以外（キー不正・上限超過）は一時的な失敗として扱う
    if (response.Error && !/not found/i.test(response.Error)) {
      return { kind: 'transient_error', reason: response.Error };
    }
    return { kind: 'not_found' };
  }

  const score = Number.parseFloat(response.imdbRating ?? '');
  if (Number.isNaN(score)) {
    return { kind: 'not_found' };
  }

  return {
    kind: 'found',
    score,
    imdbId: optionalField(response.imdbID),
    plot: optionalField(response.Plot),
  };
}

/**
 * OMDb API による評価検索
 * 失敗は例外にせず transient_error として返す
 */
export class OmdbClient implements RatingLookup {
  private apiKey: string;
  private baseUrl: string;
  private timeout: number;
  private fetchFn: typeof fetch;

  constructor(config: OmdbClientConfig) {
    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? OMDB_BASE_URL;
    this.timeout = config.timeout ?? 10000;
    this.fetchFn = config.fetch ?? fetch;
  }

  buildUrl(title: string): string {
    const url = new URL(this.baseUrl);
    url.searchParams.set('apikey', this.apiKey);
    url.searchParams.set('t', title);
    url.searchParams.set('type', 'movie');
    return url.toString();
  }

  async lookup(title: string): Promise<RatingLookupResult> {
    let body: unknown;
    try {
      const response = await this.fetchFn(this.buildUrl(title), {
        signal: AbortSignal.timeout(this.timeout),
      });
      if (!response.ok) {
        return { kind: 'transient_error', reason: `HTTP ${response.status}` };
      }
      body = await response.json();
    } catch (error) {
      return { kind: 'transient_error', reason: toErrorMessage(error) };
    }

    const parsed = OmdbResponseSchema.safeParse(body);
    if (!parsed.success) {
      return { kind: 'transient_error', reason: 'unexpected response shape' };
    }
    return toLookupResult(parsed.data);
  }
}

export function createOmdbClient(config: OmdbClientConfig): OmdbClient {
  return new OmdbClient(config);
}
