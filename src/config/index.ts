import path from 'path';
import { ConfigError } from '../utils/errors';
import { isLogLevel, LogLevel } from '../utils/logger';

/**
 * Configuration for the application
 */
export interface Config {
  mistral: {
    apiKey: string;
    model: string;
    timeoutMs: number;
    maxRetries: number;
    retryDelayMs: number;
  };

  extraction: {
    confidenceThreshold: number;
    headerZoneHeight: number;
    footerZoneHeight: number;
    saveAnalysis: boolean;
  };

  paths: {
    catalogDir: string;
    outputDir: string;
    workDir: string;
  };

  logging: {
    level: LogLevel;
  };
}

/**
 * The part of the configuration an extraction run depends on.
 * Passed explicitly to the coordinator.
 */
export interface ExtractorConfig {
  confidenceThreshold: number;
  headerZoneHeight: number;
  footerZoneHeight: number;
  saveAnalysis: boolean;
  /** Root directory for per-catalog `<stem>_sheets` folders and summaries */
  outputDir: string;
  /** Stamped copies and analysis artifacts */
  workDir: string;
}

export type Env = Record<string, string | undefined>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = {
  mistral: {
    apiKey: '',
    model: 'mistral-small-latest',
    timeoutMs: 120000, // 2 minutes
    maxRetries: 3,
    retryDelayMs: 500,
  },
  extraction: {
    confidenceThreshold: 0.6,
    headerZoneHeight: 100,
    footerZoneHeight: 100,
    saveAnalysis: true,
  },
  paths: {
    catalogDir: path.join('data', 'catalogs'),
    outputDir: path.join('data', 'output'),
    workDir: path.join('data', 'work'),
  },
  logging: {
    level: 'info',
  },
};

function getNumber(env: Env, key: string, defaultValue: number, min?: number, max?: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`Invalid number for environment variable ${key}: ${raw}`);
  }
  if (min !== undefined && parsed < min) {
    throw new ConfigError(`Environment variable ${key} must be at least ${min}, got ${parsed}`);
  }
  if (max !== undefined && parsed > max) {
    throw new ConfigError(`Environment variable ${key} must be at most ${max}, got ${parsed}`);
  }
  return parsed;
}

function getInteger(env: Env, key: string, defaultValue: number, min?: number, max?: number): number {
  const value = getNumber(env, key, defaultValue, min, max);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`Environment variable ${key} must be an integer, got ${value}`);
  }
  return value;
}

function getBoolean(env: Env, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  return raw.toLowerCase() === 'true' || raw === '1';
}

function getString(env: Env, key: string, defaultValue: string): string {
  const raw = env[key];
  return raw === undefined || raw.trim() === '' ? defaultValue : raw.trim();
}

function getLogLevel(env: Env): LogLevel {
  const raw = getString(env, 'LOG_LEVEL', DEFAULT_CONFIG.logging.level).toLowerCase();
  if (!isLogLevel(raw)) {
    throw new ConfigError(`Unknown LOG_LEVEL "${raw}"`);
  }
  return raw;
}

/**
 * Load configuration from environment variables and merge with defaults
 */
export function loadConfig(env: Env = process.env): Config {
  return {
    mistral: {
      apiKey: getString(env, 'MISTRAL_API_KEY', DEFAULT_CONFIG.mistral.apiKey),
      model: getString(env, 'MISTRAL_MODEL_NAME', DEFAULT_CONFIG.mistral.model),
      timeoutMs: getInteger(env, 'MISTRAL_TIMEOUT', DEFAULT_CONFIG.mistral.timeoutMs, 1000, 600000),
      maxRetries: getInteger(env, 'MAX_RETRIES', DEFAULT_CONFIG.mistral.maxRetries, 0, 10),
      retryDelayMs: getInteger(env, 'RETRY_DELAY_MS', DEFAULT_CONFIG.mistral.retryDelayMs, 0, 60000),
    },
    extraction: {
      confidenceThreshold: getNumber(env, 'CONFIDENCE_THRESHOLD', DEFAULT_CONFIG.extraction.confidenceThreshold, 0, 1),
      headerZoneHeight: getNumber(env, 'HEADER_ZONE_HEIGHT', DEFAULT_CONFIG.extraction.headerZoneHeight, 0),
      footerZoneHeight: getNumber(env, 'FOOTER_ZONE_HEIGHT', DEFAULT_CONFIG.extraction.footerZoneHeight, 0),
      saveAnalysis: getBoolean(env, 'SAVE_ANALYSIS', DEFAULT_CONFIG.extraction.saveAnalysis),
    },
    paths: {
      catalogDir: getString(env, 'CATALOG_DIR', DEFAULT_CONFIG.paths.catalogDir),
      outputDir: getString(env, 'OUTPUT_DIR', DEFAULT_CONFIG.paths.outputDir),
      workDir: getString(env, 'WORK_DIR', DEFAULT_CONFIG.paths.workDir),
    },
    logging: {
      level: getLogLevel(env),
    },
  };
}

/**
 * Project the settings an extraction run needs
 */
export function toExtractorConfig(config: Config): ExtractorConfig {
  return {
    ...config.extraction,
    outputDir: config.paths.outputDir,
    workDir: config.paths.workDir,
  };
}

export default loadConfig;
