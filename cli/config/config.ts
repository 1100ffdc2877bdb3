import 'dotenv/config';
import os from 'node:os';
import path from 'node:path';
import { ConfigSchema, LOG_LEVELS, type AppConfig, type LogLevel, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/131.0.0.0 Safari/537.36';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const csvFromEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) return fallback;
  const items = value
    .split(',')
    .map((v) => v.trim().toLowerCase())
    .filter(Boolean);
  return items.length ? items : fallback;
};

const logLevelFromEnv = (value: string | undefined, fallback: LogLevel): LogLevel => {
  const normalized = (value || '').trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
};

const expandHome = (value: string): string =>
  value === '~' || value.startsWith('~/') ? path.join(os.homedir(), value.slice(1)) : value;

export const defaultOutputDir = (): string => path.join(os.homedir(), '.article-reader', 'articles');

export type { AppConfig, PublicConfig };

let cachedConfig: AppConfig | null = null;

const buildConfig = (): AppConfig => {
  const environment = (process.env.NODE_ENV || 'development').trim().toLowerCase();
  const rawDir = process.env.ARTICLE_READER_DIR?.trim() || defaultOutputDir();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    fetch: {
      timeoutMs: numberFromEnv(process.env.FETCH_TIMEOUT_MS, 30_000),
      retries: numberFromEnv(process.env.FETCH_RETRIES, 2),
      retryDelayMs: numberFromEnv(process.env.FETCH_RETRY_DELAY_MS, 1_000),
      userAgent: process.env.FETCH_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      acceptLanguage: process.env.FETCH_ACCEPT_LANGUAGE?.trim() || 'en-US,en;q=0.9',
    },
    extraction: {
      minContainerParagraphs: numberFromEnv(process.env.DOM_MIN_CONTAINER_PARAGRAPHS, 2),
      bylineScanDepth: numberFromEnv(process.env.DOM_BYLINE_SCAN_DEPTH, 8),
    },
    truncation: {
      minBodyChars: numberFromEnv(process.env.TRUNCATION_MIN_BODY_CHARS, 2_000),
      requireCutOffEnding: booleanFromEnv(process.env.TRUNCATION_REQUIRE_CUT_OFF_ENDING, true),
    },
    storage: {
      outputDir: path.resolve(expandHome(rawDir)),
      maxSlugLength: numberFromEnv(process.env.MAX_SLUG_LENGTH, 80),
    },
    expectedHosts: csvFromEnv(process.env.EXPECTED_HOSTS, ['medium.com']),
    observability: {
      logLevel: logLevelFromEnv(process.env.LOG_LEVEL, 'warn'),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);

export const refreshConfig = (): AppConfig => {
  cachedConfig = null;
  return loadConfig();
};

export interface CliOverrides {
  outputDir?: string;
  debug?: boolean;
}

export const applyCliOverrides = (base: AppConfig, overrides: CliOverrides): AppConfig => {
  const next: AppConfig = {
    ...base,
    storage: { ...base.storage },
    observability: { ...base.observability },
  };

  if (overrides.outputDir && overrides.outputDir.trim()) {
    next.storage.outputDir = path.resolve(expandHome(overrides.outputDir.trim()));
  }
  if (overrides.debug) {
    next.observability.logLevel = 'debug';
  }

  return ConfigSchema.parse(next);
};
