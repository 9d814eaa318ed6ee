import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, toErrorMessage } from '@luxinema/shared';
import { formatDateISO } from './scraper/parser.js';

/**
 * ユーザー設定ファイルのスキーマ（~/.luxinema/config.yaml）
 */
export const UserConfigSchema = z.object({
  omdbApiKey: z.string().min(1),
  cachePath: z.string().min(1).optional(),
  cacheMaxAgeDays: z.number().int().positive().optional(),
  scheduleUrl: z.string().url().optional(),
});

export type UserConfig = z.infer<typeof UserConfigSchema>;

/**
 * CLI設定スキーマ
 */
export const ConfigSchema = z.object({
  date: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/)
    .optional(),
  tomorrow: z.boolean(),
  sort: z.enum(['schedule', 'rating']),
  urls: z.boolean(),
  plot: z.boolean(),
  cache: z.boolean(),
  clearCache: z.boolean(),
  configPath: z.string().optional(),
  verbose: z.boolean(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * デフォルト設定
 */
export const DEFAULT_CONFIG: Config = {
  tomorrow: false,
  sort: 'schedule',
  urls: false,
  plot: false,
  cache: true,
  clearCache: false,
  verbose: false,
};

export function getDefaultConfigPath(): string {
  return join(homedir(), '.luxinema', 'config.yaml');
}

type ConfigEnv = Record<string, string | undefined>;

interface LoadConfigOptions {
  path?: string | undefined;
  env?: ConfigEnv;
}

function resolveConfigPath(path: string | undefined, env: ConfigEnv): string {
  return path ?? env['LUXINEMA_CONFIG'] ?? getDefaultConfigPath();
}

/**
 * 設定ファイルを読む（存在しなければ null）
 * @throws ConfigError YAMLとして読めない、またはオブジェクトでない場合
 */
function readConfigFile(path: string): object | null {
  if (!existsSync(path)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(path, 'utf-8')) ?? {};
  } catch (error) {
    throw new ConfigError(`設定ファイルを読み込めません: ${path}: ${toErrorMessage(error)}`, {
      cause: error,
    });
  }

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`設定ファイルの形式が不正です: ${path}`);
  }
  return raw;
}

function validateConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, path: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ConfigError(`設定ファイルが不正です (${fields}): ${path}`);
  }
  return result.data;
}

/**
 * ユーザー設定を読み込む
 * 環境変数 OMDB_API_KEY はファイルの値より優先する
 * @throws ConfigError APIキーが得られない、またはファイルが不正な場合
 */
export function loadUserConfig(options: LoadConfigOptions = {}): UserConfig {
  const env = options.env ?? process.env;
  const path = resolveConfigPath(options.path, env);
  const envApiKey = env['OMDB_API_KEY'];

  const raw = readConfigFile(path);
  if (raw === null && !envApiKey) {
    throw new ConfigError(`設定ファイルが見つかりません: ${path}`);
  }

  const fileConfig = raw ?? {};
  const merged = envApiKey ? { ...fileConfig, omdbApiKey: envApiKey } : fileConfig;
  return validateConfig(UserConfigSchema, merged, path);
}

/**
 * キャッシュ操作に必要な設定だけを読み込む（APIキー不要）
 */
export const CacheConfigSchema = UserConfigSchema.pick({ cachePath: true });

export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export function loadCacheConfig(options: LoadConfigOptions = {}): CacheConfig {
  const env = options.env ?? process.env;
  const path = resolveConfigPath(options.path, env);
  return validateConfig(CacheConfigSchema, readConfigFile(path) ?? {}, path);
}

/**
 * ローカル日付の0時を返す
 */
export function getToday(now: Date = new Date()): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate());
}

export function getTomorrow(now: Date = new Date()): Date {
  return new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
}

/**
 * YYYY-MM-DD をローカル日付として解釈する（存在しない日付は null）
 */
export function parseDateOption(value: string): Date | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match || !match[1] || !match[2] || !match[3]) {
    return null;
  }
  const date = new Date(
    parseInt(match[1], 10),
    parseInt(match[2], 10) - 1,
    parseInt(match[3], 10)
  );
  return formatDateISO(date) === value ? date : null;
}

/**
 * CLI設定から対象日を決める
 */
export function resolveTargetDate(config: Config, now: Date = new Date()): Date | null {
  if (config.date) {
    return parseDateOption(config.date);
  }
  return config.tomorrow ? getTomorrow(now) : getToday(now);
}

export function daysToMs(days: number): number {
  return days * 24 * 60 * 60 * 1000;
}
