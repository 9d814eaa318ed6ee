import initSqlJs, { type Database } from 'sql.js';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { SCHEMA_SQL } from './schema.js';
import { runMigrations } from './migrations/index.js';

const DB_DIR = join(homedir(), '.luxinema');
const DB_PATH = join(DB_DIR, 'ratings.db');

let SQL: Awaited<ReturnType<typeof initSqlJs>> | null = null;

/**
 * sql.jsを初期化する
 */
async function initSQL(): Promise<typeof SQL> {
  if (!SQL) {
    SQL = await initSqlJs();
  }
  return SQL;
}

/**
 * データベースを開く
 * @param options.path DBファイルのパス（デフォルト: ~/.luxinema/ratings.db）
 * @param options.inMemory メモリ上にDBを作成（デフォルト: false）
 */
export async function openDatabase(options?: {
  path?: string;
  inMemory?: boolean;
}): Promise<Database> {
  const sql = await initSQL();
  if (!sql) {
    throw new Error('Failed to initialize sql.js');
  }

  if (options?.inMemory) {
    const db = new sql.Database();
    db.run(SCHEMA_SQL);
    runMigrations(db);
    return db;
  }

  const path = options?.path ?? DB_PATH;

  let db: Database;
  if (existsSync(path)) {
    const buffer = readFileSync(path);
    db = new sql.Database(buffer);
    // 既存DBにマイグレーションを適用
    try {
      runMigrations(db);
    } catch (error) {
      db.close();
      throw error;
    }
  } else {
    db = new sql.Database();
    db.run(SCHEMA_SQL);
    // 新規DBにもマイグレーション記録を作成
    runMigrations(db);
  }

  return db;
}

/**
 * データベースをファイルに保存する
 */
export function saveDatabase(db: Database, path: string = DB_PATH): void {
  const data = db.export();
  const buffer = Buffer.from(data);

  // ディレクトリ作成
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  writeFileSync(path, buffer);
}

/**
 * データベースを閉じる
 */
export function closeDatabase(db: Database): void {
  db.close();
}

/**
 * デフォルトのデータベースファイルのパスを取得
 */
export function getDatabasePath(): string {
  return DB_PATH;
}
