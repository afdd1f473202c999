import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { buildConfig, defaultConfig, loadConfig } from '../config.js';
import { ConfigError } from '../../types/errors.js';

const ENV_KEYS = ['GETSONGBPM_API_KEY', 'MONGODB_URI', 'MONGODB_DATABASE', 'USE_SCRAPER', 'USE_BROWSER', 'CHROME_PATH'];

describe('buildConfig', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('uses the defaults without a file', () => {
    expect(buildConfig(undefined)).toEqual(defaultConfig());
  });

  test('overlays nested values and ignores unknown keys', () => {
    const cfg = buildConfig({
      cache: { driver: 'memory' },
      scraper: { maxCatalogPages: 5, browser: { enabled: true }, extra: 'ignored' },
      unknown: { anything: 1 },
    });

    expect(cfg.cache.driver).toBe('memory');
    expect(cfg.cache.collection).toBe('bpm_cache');
    expect(cfg.scraper.maxCatalogPages).toBe(5);
    expect(cfg.scraper.browser).toEqual({ enabled: true, chromePath: null, timeoutMs: 15000 });
    expect(Object.keys(cfg)).toEqual(['cache', 'api', 'scraper']);
  });

  test('lets the environment override the file', () => {
    vi.stubEnv('GETSONGBPM_API_KEY', ' test-key ');
    vi.stubEnv('MONGODB_URI', 'mongodb://db.internal:27017');
    vi.stubEnv('USE_SCRAPER', 'false');
    vi.stubEnv('USE_BROWSER', 'yes');
    vi.stubEnv('CHROME_PATH', '/opt/chrome/chrome');

    const cfg = buildConfig({ api: { apiKey: 'from-file' }, scraper: { enabled: true } });

    expect(cfg.api.apiKey).toBe('test-key');
    expect(cfg.cache.mongodbUri).toBe('mongodb://db.internal:27017');
    expect(cfg.scraper.enabled).toBe(false);
    expect(cfg.scraper.browser.enabled).toBe(true);
    expect(cfg.scraper.browser.chromePath).toBe('/opt/chrome/chrome');
  });

  test('returns a frozen object', () => {
    const cfg = buildConfig(undefined);
    expect(Object.isFrozen(cfg)).toBe(true);
    expect(Object.isFrozen(cfg.scraper.browser)).toBe(true);
  });

  test('rejects invalid values', () => {
    expect(() => buildConfig({ cache: { driver: 'redis' } })).toThrow(ConfigError);
    expect(() => buildConfig({ scraper: { maxCatalogPages: 0 } })).toThrow(
      'Invalid configuration: "scraper.maxCatalogPages" must be a positive number.'
    );
    expect(() => buildConfig({ api: { minTimeMs: -1 } })).toThrow(ConfigError);
    expect(() => buildConfig({ scraper: { maxCatalogPages: 100 } })).toThrow(
      'Invalid configuration: "scraper.maxCatalogPages" must not exceed 15.'
    );
    expect(() => buildConfig({ api: 'nope' })).toThrow('Invalid configuration: "api" must be a mapping.');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tempo-config-'));
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test('reads a YAML file', () => {
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, 'cache:\n  driver: memory\napi:\n  apiKey: test-key\n');

    const cfg = loadConfig(file);

    expect(cfg.cache.driver).toBe('memory');
    expect(cfg.api.apiKey).toBe('test-key');
  });

  test('throws when an explicit path does not exist', () => {
    expect(() => loadConfig(path.join(dir, 'missing.yaml'))).toThrow(ConfigError);
  });

  test('follows CONFIG_PATH', () => {
    const file = path.join(dir, 'other.yaml');
    fs.writeFileSync(file, 'scraper:\n  enabled: false\n');
    vi.stubEnv('CONFIG_PATH', file);

    expect(loadConfig().scraper.enabled).toBe(false);
  });

  test('rejects a non-mapping root', () => {
    const file = path.join(dir, 'list.yaml');
    fs.writeFileSync(file, '- a\n- b\n');
    expect(() => loadConfig(file)).toThrow('Invalid configuration: expected a YAML mapping at the root.');
  });

  test('treats an empty file as defaults', () => {
    const file = path.join(dir, 'empty.yaml');
    fs.writeFileSync(file, '');
    expect(loadConfig(file)).toEqual(defaultConfig());
  });
});
