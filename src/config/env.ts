/**
 * Configuration centralisée des variables d'environnement
 * Supporte les formats booléens multiples et validation robuste
 */
import 'dotenv/config';
import { IANAZone } from 'luxon';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogFormat = 'pretty' | 'json';

type Env = Record<string, string | undefined>;

// Helpers pour parser les valeurs
export const toBool = (value: string | undefined, defaultValue: boolean = false): boolean => {
  if (value == null || value.trim() === '') return defaultValue;
  const s = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
};

export const toNumber = (value?: string, defaultValue: number = 0): number => {
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
};

export const toString = (value?: string, defaultValue: string = ''): string => {
  return value?.trim() || defaultValue;
};

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error', 'fatal'];

const toLogLevel = (value?: string): LogLevelName => {
  const s = toString(value, 'info').toLowerCase();
  return LOG_LEVELS.find(level => level === s) ?? 'info';
};

const toLogFormat = (value: string | undefined, isProd: boolean): LogFormat => {
  const s = toString(value, isProd ? 'json' : 'pretty').toLowerCase();
  return s === 'json' ? 'json' : 'pretty';
};

export interface AppConfig {
  NODE_ENV: string;
  IS_PROD: boolean;
  LOG_LEVEL: LogLevelName;
  LOG_FORMAT: LogFormat;

  // Flux
  FEED_BASE_URL: string;
  FEED_FILE_PREFIX: string;
  FEED_FILE_EXTENSION: string;
  FEED_TIMEZONE: string;

  // Téléchargement
  FETCH_MAX_ATTEMPTS: number;
  FETCH_RETRY_SECONDS: number;
  SAVE_ZIP_DIR: string;
  HTTP_USER_AGENT: string;
  INDEX_TIMEOUT_MS: number;
  PROBE_TIMEOUT_MS: number;
  DOWNLOAD_TIMEOUT_MS: number;

  // Catalogue
  SQLITE_PATH: string;
  MARK_SOLD: boolean;
  RUN_LOCK_ENABLED: boolean;
  RUN_LOCK_STALE_MS: number;

  // Export
  EXPORT_JSON_DIR: string;
}

export function buildConfig(env: Env = process.env): AppConfig {
  const isProd = env.NODE_ENV === 'production';

  return {
    NODE_ENV: toString(env.NODE_ENV, 'development'),
    IS_PROD: isProd,
    LOG_LEVEL: toLogLevel(env.LOG_LEVEL),
    LOG_FORMAT: toLogFormat(env.LOG_FORMAT, isProd),

    FEED_BASE_URL: toString(env.FEED_BASE_URL),
    FEED_FILE_PREFIX: toString(env.FEED_FILE_PREFIX, 'NOMADESMARKETING'),
    FEED_FILE_EXTENSION: toString(env.FEED_FILE_EXTENSION, 'zip'),
    FEED_TIMEZONE: toString(env.FEED_TIMEZONE, 'America/Toronto'),

    FETCH_MAX_ATTEMPTS: toNumber(env.FETCH_MAX_ATTEMPTS, 12),
    FETCH_RETRY_SECONDS: toNumber(env.FETCH_RETRY_SECONDS, 300), // 5 min entre tentatives
    SAVE_ZIP_DIR: toString(env.SAVE_ZIP_DIR),
    HTTP_USER_AGENT: toString(env.HTTP_USER_AGENT, 'listing-feed-sync/1.0'),
    INDEX_TIMEOUT_MS: toNumber(env.INDEX_TIMEOUT_MS, 20000),
    PROBE_TIMEOUT_MS: toNumber(env.PROBE_TIMEOUT_MS, 15000),
    DOWNLOAD_TIMEOUT_MS: toNumber(env.DOWNLOAD_TIMEOUT_MS, 60000),

    SQLITE_PATH: toString(env.SQLITE_PATH, './data/catalog.db'),
    MARK_SOLD: toBool(env.MARK_SOLD, true),
    RUN_LOCK_ENABLED: toBool(env.RUN_LOCK_ENABLED, true),
    RUN_LOCK_STALE_MS: toNumber(env.RUN_LOCK_STALE_MS, 6 * 60 * 60 * 1000), // 6h

    EXPORT_JSON_DIR: toString(env.EXPORT_JSON_DIR),
  };
}

// Configuration principale
export const CONFIG: AppConfig = buildConfig();

// Validation de la configuration
export function validateConfig(config: AppConfig): { isValid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.FEED_BASE_URL) {
    errors.push('FEED_BASE_URL manquant (ou --base-url)');
  } else if (!/^https?:\/\//i.test(config.FEED_BASE_URL)) {
    errors.push(`FEED_BASE_URL doit être une URL http(s): ${config.FEED_BASE_URL}`);
  }

  if (!Number.isInteger(config.FETCH_MAX_ATTEMPTS) || config.FETCH_MAX_ATTEMPTS < 1) {
    errors.push('FETCH_MAX_ATTEMPTS doit être un entier >= 1');
  }

  if (config.FETCH_RETRY_SECONDS < 0) {
    errors.push('FETCH_RETRY_SECONDS doit être >= 0');
  }

  if (!/^[A-Za-z0-9]+$/.test(config.FEED_FILE_EXTENSION)) {
    errors.push(`FEED_FILE_EXTENSION invalide: ${config.FEED_FILE_EXTENSION}`);
  }

  if (!IANAZone.isValidZone(config.FEED_TIMEZONE)) {
    errors.push(`FEED_TIMEZONE inconnu: ${config.FEED_TIMEZONE}`);
  }

  if (!config.MARK_SOLD) {
    warnings.push('MARK_SOLD=false - les inscriptions absentes du flux resteront ACTIVE');
  }

  if (!config.RUN_LOCK_ENABLED) {
    warnings.push('RUN_LOCK_ENABLED=false - deux imports simultanés pourraient se chevaucher');
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

// Résumé de la configuration pour le log de démarrage
export function getConfigSummary(config: AppConfig): Record<string, string | number | boolean> {
  return {
    NODE_ENV: config.NODE_ENV,
    FEED_BASE_URL: config.FEED_BASE_URL,
    FEED_FILE_PREFIX: config.FEED_FILE_PREFIX,
    FEED_TIMEZONE: config.FEED_TIMEZONE,
    FETCH_MAX_ATTEMPTS: config.FETCH_MAX_ATTEMPTS,
    FETCH_RETRY_SECONDS: config.FETCH_RETRY_SECONDS,
    SAVE_ZIP_DIR: config.SAVE_ZIP_DIR || '(désactivé)',
    EXPORT_JSON_DIR: config.EXPORT_JSON_DIR || '(désactivé)',
    SQLITE_PATH: config.SQLITE_PATH,
    MARK_SOLD: config.MARK_SOLD,
    RUN_LOCK_ENABLED: config.RUN_LOCK_ENABLED,
  };
}
