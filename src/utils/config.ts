import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { ConfigError } from '../types/errors.js';

// A catalog scan never reads more pages than this
export const MAX_CATALOG_PAGES = 15;

export type CacheDriver = 'mongodb' | 'memory';

export interface CacheConfig {
  enabled: boolean;
  driver: CacheDriver;
  mongodbUri: string;
  database: string;
  collection: string;
}

export interface ApiConfig {
  baseUrl: string;
  // Empty key disables the API tier
  apiKey: string;
  timeoutMs: number;
  minTimeMs: number;
}

export interface BrowserConfig {
  enabled: boolean;
  chromePath: string | null;
  timeoutMs: number;
}

export interface ScraperConfig {
  enabled: boolean;
  baseUrl: string;
  timeoutMs: number;
  minTimeMs: number;
  maxCatalogPages: number;
  userAgent: string;
  browser: BrowserConfig;
}

export interface PipelineConfig {
  cache: CacheConfig;
  api: ApiConfig;
  scraper: ScraperConfig;
}

export type DeepReadonly<T> = {
  readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K];
};

export type ResolvedConfig = DeepReadonly<PipelineConfig>;

export function defaultConfig(): PipelineConfig {
  return {
    cache: {
      enabled: true,
      driver: 'mongodb',
      mongodbUri: 'mongodb://localhost:27017',
      database: 'metromatch',
      collection: 'bpm_cache',
    },
    api: {
      baseUrl: 'https://api.getsong.co',
      apiKey: '',
      timeoutMs: 10000,
      minTimeMs: 500,
    },
    scraper: {
      enabled: true,
      baseUrl: 'https://songbpm.com',
      timeoutMs: 10000,
      minTimeMs: 1500,
      maxCatalogPages: MAX_CATALOG_PAGES,
      userAgent: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36',
      browser: {
        enabled: false,
        chromePath: null,
        timeoutMs: 15000,
      },
    },
  };
}

function resolveConfigPath(): { path: string; explicit: boolean } {
  const fromEnv = process.env.CONFIG_PATH;
  if (fromEnv && fromEnv.trim().length > 0) {
    return { path: path.resolve(fromEnv), explicit: true };
  }
  // Assume the app is started from the project root
  return { path: path.resolve(process.cwd(), 'config', 'config.yaml'), explicit: false };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Overlay the YAML mapping onto the defaults, key by key, keeping the defaults' shape.
function merge<T extends object>(base: T, overlay: unknown, where: string): T {
  if (overlay === undefined || overlay === null) return base;
  if (!isRecord(overlay)) {
    throw new ConfigError(`Invalid configuration: "${where}" must be a mapping.`);
  }
  const out: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, value] of Object.entries(overlay)) {
    if (!(key in base)) continue;
    const current = out[key];
    out[key] = isRecord(current) ? merge(current, value, where ? `${where}.${key}` : key) : value;
  }
  // Same keys as base; values are checked by validate()
  return out as T;
}

function envFlag(name: string): boolean | null {
  const raw = (process.env[name] || '').trim().toLowerCase();
  if (!raw) return null;
  return raw === 'true' || raw === '1' || raw === 'yes' || raw === 'on';
}

function applyEnvOverrides(cfg: PipelineConfig): void {
  const apiKey = process.env.GETSONGBPM_API_KEY;
  if (apiKey && apiKey.trim().length > 0) cfg.api.apiKey = apiKey.trim();

  const mongoUri = process.env.MONGODB_URI;
  if (mongoUri && mongoUri.trim().length > 0) cfg.cache.mongodbUri = mongoUri.trim();

  const mongoDb = process.env.MONGODB_DATABASE;
  if (mongoDb && mongoDb.trim().length > 0) cfg.cache.database = mongoDb.trim();

  const useScraper = envFlag('USE_SCRAPER');
  if (useScraper !== null) cfg.scraper.enabled = useScraper;

  const useBrowser = envFlag('USE_BROWSER');
  if (useBrowser !== null) cfg.scraper.browser.enabled = useBrowser;

  const chromePath = process.env.CHROME_PATH;
  if (chromePath && chromePath.trim().length > 0) cfg.scraper.browser.chromePath = chromePath.trim();
}

function positive(value: unknown, field: string): void {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`Invalid configuration: "${field}" must be a positive number.`);
  }
}

function validate(cfg: PipelineConfig): void {
  if (typeof cfg.cache.enabled !== 'boolean') {
    throw new ConfigError('Invalid configuration: "cache.enabled" must be a boolean.');
  }
  if (cfg.cache.driver !== 'mongodb' && cfg.cache.driver !== 'memory') {
    throw new ConfigError('Invalid configuration: "cache.driver" must be "mongodb" or "memory".');
  }
  if (cfg.cache.enabled && cfg.cache.driver === 'mongodb' && typeof cfg.cache.mongodbUri !== 'string') {
    throw new ConfigError('Invalid configuration: "cache.mongodbUri" is required for the mongodb driver.');
  }
  if (typeof cfg.api.apiKey !== 'string') {
    throw new ConfigError('Invalid configuration: "api.apiKey" must be a string.');
  }
  if (typeof cfg.api.baseUrl !== 'string' || typeof cfg.scraper.baseUrl !== 'string') {
    throw new ConfigError('Invalid configuration: "api.baseUrl" and "scraper.baseUrl" must be strings.');
  }
  if (typeof cfg.scraper.enabled !== 'boolean' || typeof cfg.scraper.browser.enabled !== 'boolean') {
    throw new ConfigError('Invalid configuration: "scraper.enabled" and "scraper.browser.enabled" must be booleans.');
  }
  positive(cfg.api.timeoutMs, 'api.timeoutMs');
  positive(cfg.scraper.timeoutMs, 'scraper.timeoutMs');
  positive(cfg.scraper.browser.timeoutMs, 'scraper.browser.timeoutMs');
  positive(cfg.scraper.maxCatalogPages, 'scraper.maxCatalogPages');
  if (cfg.scraper.maxCatalogPages > MAX_CATALOG_PAGES) {
    throw new ConfigError(`Invalid configuration: "scraper.maxCatalogPages" must not exceed ${MAX_CATALOG_PAGES}.`);
  }
  if (typeof cfg.api.minTimeMs !== 'number' || cfg.api.minTimeMs < 0) {
    throw new ConfigError('Invalid configuration: "api.minTimeMs" must be a non-negative number.');
  }
  if (typeof cfg.scraper.minTimeMs !== 'number' || cfg.scraper.minTimeMs < 0) {
    throw new ConfigError('Invalid configuration: "scraper.minTimeMs" must be a non-negative number.');
  }
}

function deepFreeze(obj: object): void {
  for (const value of Object.values(obj)) {
    if (typeof value === 'object' && value !== null) deepFreeze(value);
  }
  Object.freeze(obj);
}

export function buildConfig(raw: unknown): ResolvedConfig {
  const cfg = merge(defaultConfig(), raw, '');
  applyEnvOverrides(cfg);
  validate(cfg);
  deepFreeze(cfg);
  return cfg;
}

export function loadConfig(filePath?: string): ResolvedConfig {
  const resolved = filePath ? { path: path.resolve(filePath), explicit: true } : resolveConfigPath();
  if (!fs.existsSync(resolved.path)) {
    if (resolved.explicit) {
      throw new ConfigError(`Configuration file not found at: ${resolved.path}`);
    }
    return buildConfig(undefined);
  }
  const file = fs.readFileSync(resolved.path, 'utf8');
  const raw: unknown = yaml.load(file);
  // Basic runtime shape check to surface obvious issues early
  if (raw !== undefined && raw !== null && !isRecord(raw)) {
    throw new ConfigError('Invalid configuration: expected a YAML mapping at the root.');
  }
  return buildConfig(raw);
}
