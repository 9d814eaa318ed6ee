import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError } from '@luxinema/shared';
import {
  DEFAULT_CONFIG,
  daysToMs,
  getToday,
  getTomorrow,
  loadCacheConfig,
  loadUserConfig,
  parseDateOption,
  resolveTargetDate,
} from '../config.js';
import { formatDateISO } from '../scraper/parser.js';

describe('loadUserConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'luxinema-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read the api key and options from yaml', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'omdbApiKey: test-key\ncacheMaxAgeDays: 7\n');

    expect(loadUserConfig({ path, env: {} })).toEqual({
      omdbApiKey: 'test-key',
      cacheMaxAgeDays: 7,
    });
  });

  it('should fail when the file is missing', () => {
    const path = join(dir, 'missing.yaml');
    expect(() => loadUserConfig({ path, env: {} })).toThrow(ConfigError);
  });

  it('should accept the api key from the environment', () => {
    const path = join(dir, 'missing.yaml');
    expect(loadUserConfig({ path, env: { OMDB_API_KEY: 'env-key' } })).toEqual({
      omdbApiKey: 'env-key',
    });
  });

  it('should prefer the environment over the file', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'omdbApiKey: test-key\n');

    expect(loadUserConfig({ path, env: { OMDB_API_KEY: 'env-key' } }).omdbApiKey).toBe('env-key');
  });

  it('should use LUXINEMA_CONFIG when no path is given', () => {
    const path = join(dir, 'other.yaml');
    writeFileSync(path, 'omdbApiKey: other-key\n');

    expect(loadUserConfig({ env: { LUXINEMA_CONFIG: path } }).omdbApiKey).toBe('other-key');
  });

  it('should fail when the api key is missing', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'cacheMaxAgeDays: 7\n');

    expect(() => loadUserConfig({ path, env: {} })).toThrow('設定ファイルが不正です (omdbApiKey)');
  });

  it('should fail on a non-mapping document', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, '- a\n- b\n');

    expect(() => loadUserConfig({ path, env: {} })).toThrow(ConfigError);
  });
});

describe('loadCacheConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'luxinema-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should read the cache path without an api key', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'cachePath: /tmp/luxinema-test.db\n');

    expect(loadCacheConfig({ path, env: {} })).toEqual({ cachePath: '/tmp/luxinema-test.db' });
  });

  it('should use defaults when the file is missing', () => {
    expect(loadCacheConfig({ path: join(dir, 'missing.yaml'), env: {} })).toEqual({});
  });

  it('should still reject an invalid file', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'cachePath: ""\n');

    expect(() => loadCacheConfig({ path, env: {} })).toThrow('設定ファイルが不正です (cachePath)');
  });
});

describe('dates', () => {
  it('should use the local calendar date for today', () => {
    expect(formatDateISO(getToday(new Date(2026, 9, 19, 23, 30)))).toBe('2026-10-19');
  });

  it('should roll tomorrow over the month end', () => {
    expect(formatDateISO(getTomorrow(new Date(2026, 9, 31, 12, 0)))).toBe('2026-11-01');
  });

  it('should parse a valid date option', () => {
    const date = parseDateOption('2026-12-24');
    expect(date && formatDateISO(date)).toBe('2026-12-24');
  });

  it('should reject impossible dates', () => {
    expect(parseDateOption('2026-02-30')).toBeNull();
    expect(parseDateOption('24-12-2026')).toBeNull();
  });

  it('should resolve the target date from options', () => {
    const now = new Date(2026, 9, 19, 9, 0);
    const dateOf = (date: Date | null) => (date ? formatDateISO(date) : null);

    expect(dateOf(resolveTargetDate(DEFAULT_CONFIG, now))).toBe('2026-10-19');
    expect(dateOf(resolveTargetDate({ ...DEFAULT_CONFIG, tomorrow: true }, now))).toBe('2026-10-20');
    expect(dateOf(resolveTargetDate({ ...DEFAULT_CONFIG, date: '2026-12-24' }, now))).toBe('2026-12-24');
  });

  it('should convert days to milliseconds', () => {
    expect(daysToMs(2)).toBe(172_800_000);
  });
});
