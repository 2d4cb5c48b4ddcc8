/**
 * OCR Jobs Service Configuration
 *
 * Loads configuration from environment variables. `loadConfig` validates the
 * values and throws on anything unusable; `config` is the instance the
 * service runs with.
 */

import path from 'path';
import type { LogFormat, LogLevel } from '@pageline/logger';
import { DEFAULT_OCR_URL, DEFAULT_TOKEN_URL } from './clients/BaiduOcrClient';
import { DEFAULT_LAYOUT_THRESHOLDS, LayoutThresholds } from './layout/thresholds';

export interface Config {
  // HTTP listener
  port: number;
  host: string;

  // Per-job workspace root (uploads, rendered pages, result tables)
  runsDir: string;
  maxUploadBytes: number;

  // Recognition service
  baiduTokenUrl: string;
  baiduOcrUrl: string;
  recognizerTimeoutMs: number;
  pageIntervalMs: number;

  // Rendering
  pdftoppmPath: string;
  defaultDpi: number;
  defaultLanguageType: string;

  // Reading-order heuristics
  layout: LayoutThresholds;

  // Environment
  nodeEnv: string;
  logLevel: LogLevel;
  logFormat?: LogFormat;
  logRotate: boolean;
  logDir: string;
}

type Env = Record<string, string | undefined>;

export const MIN_DPI = 72;
export const MAX_DPI = 600;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  return env[key] || defaultValue;
}

function getIntEnv(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`${key} must be an integer (got "${raw}")`);
  }
  return value;
}

function getNumberEnv(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (!raw) {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${key} must be a positive number (got "${raw}")`);
  }
  return value;
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${raw}")`);
  }
  return level;
}

function parseLogFormat(raw: string | undefined): LogFormat | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  if (raw !== 'json' && raw !== 'pretty') {
    throw new Error(`LOG_FORMAT must be json or pretty (got "${raw}")`);
  }
  return raw;
}

function loadLayoutThresholds(env: Env): LayoutThresholds {
  const d = DEFAULT_LAYOUT_THRESHOLDS;
  return {
    rowBucketMin: getNumberEnv(env, 'LAYOUT_ROW_BUCKET_MIN', d.rowBucketMin),
    rowBucketFactor: getNumberEnv(env, 'LAYOUT_ROW_BUCKET_FACTOR', d.rowBucketFactor),
    columnBucketMin: getNumberEnv(env, 'LAYOUT_COLUMN_BUCKET_MIN', d.columnBucketMin),
    columnBucketFactor: getNumberEnv(env, 'LAYOUT_COLUMN_BUCKET_FACTOR', d.columnBucketFactor),
    fallbackMedian: getNumberEnv(env, 'LAYOUT_FALLBACK_MEDIAN', d.fallbackMedian),
    verticalAspect: getNumberEnv(env, 'LAYOUT_VERTICAL_ASPECT', d.verticalAspect),
    verticalRatio: getNumberEnv(env, 'LAYOUT_VERTICAL_RATIO', d.verticalRatio),
    minBands: getIntEnv(env, 'LAYOUT_MIN_BANDS', d.minBands),
    bandMin: getNumberEnv(env, 'LAYOUT_BAND_MIN', d.bandMin),
    bandFactor: getNumberEnv(env, 'LAYOUT_BAND_FACTOR', d.bandFactor),
    bandFallback: getNumberEnv(env, 'LAYOUT_BAND_FALLBACK', d.bandFallback),
  };
}

export function loadConfig(env: Env = process.env): Config {
  const loaded: Config = {
    port: getIntEnv(env, 'PORT', 7860),
    host: getEnvOrDefault(env, 'HOST', '127.0.0.1'),

    runsDir: path.resolve(getEnvOrDefault(env, 'RUNS_DIR', 'runs')),
    maxUploadBytes: getIntEnv(env, 'MAX_UPLOAD_MB', 100) * 1024 * 1024,

    baiduTokenUrl: getEnvOrDefault(env, 'BAIDU_TOKEN_URL', DEFAULT_TOKEN_URL),
    baiduOcrUrl: getEnvOrDefault(env, 'BAIDU_OCR_URL', DEFAULT_OCR_URL),
    recognizerTimeoutMs: getIntEnv(env, 'RECOGNIZER_TIMEOUT_MS', 60000),
    pageIntervalMs: getIntEnv(env, 'PAGE_INTERVAL_MS', 0),

    pdftoppmPath: getEnvOrDefault(env, 'PDFTOPPM_PATH', 'pdftoppm'),
    defaultDpi: getIntEnv(env, 'DEFAULT_DPI', 300),
    defaultLanguageType: getEnvOrDefault(env, 'DEFAULT_LANGUAGE_TYPE', 'CHN_ENG'),

    layout: loadLayoutThresholds(env),

    nodeEnv: getEnvOrDefault(env, 'NODE_ENV', 'development'),
    logLevel: parseLogLevel(getEnvOrDefault(env, 'LOG_LEVEL', 'info')),
    logFormat: parseLogFormat(env.LOG_FORMAT),
    logRotate: getEnvOrDefault(env, 'LOG_ROTATE', 'false') === 'true',
    logDir: getEnvOrDefault(env, 'LOG_DIR', 'logs'),
  };

  if (loaded.port < 1 || loaded.port > 65535) {
    throw new Error('PORT must be between 1 and 65535');
  }

  if (loaded.maxUploadBytes <= 0) {
    throw new Error('MAX_UPLOAD_MB must be positive');
  }

  if (loaded.recognizerTimeoutMs <= 0) {
    throw new Error('RECOGNIZER_TIMEOUT_MS must be positive');
  }

  if (loaded.pageIntervalMs < 0) {
    throw new Error('PAGE_INTERVAL_MS cannot be negative');
  }

  if (loaded.defaultDpi < MIN_DPI || loaded.defaultDpi > MAX_DPI) {
    throw new Error(`DEFAULT_DPI must be between ${MIN_DPI} and ${MAX_DPI}`);
  }

  return loaded;
}

export const config: Config = loadConfig();
