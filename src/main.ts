#!/usr/bin/env node
import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import { AppConfig, CONFIG, getConfigSummary, validateConfig } from './config/env';
import {
  ArchiveError,
  ConfigError,
  DiscoveryError,
  FetchError,
  ReconciliationError,
  RunLockError,
  describeError,
  toError
} from './core/errors';
import { HttpClient } from './core/HttpClient';
import { RunLock } from './core/RunLock';
import { createLogger, StructuredLogger } from './core/StructuredLogger';
import { JsonExporter } from './export/JsonExporter';
import { RecordExtractor } from './extract/RecordExtractor';
import { ArchiveDecoder } from './feed/ArchiveDecoder';
import { FeedDiscovery } from './feed/FeedDiscovery';
import { SnapshotFetcher } from './feed/SnapshotFetcher';
import { SqliteListingCatalog } from './store/ListingCatalog';
import { MigrationRunner } from './store/Migrations';
import { closeDatabase, openDatabase } from './store/sqlite';
import { formatSummary, ImportPipeline } from './sync/ImportPipeline';
import { ReconciliationEngine } from './sync/ReconciliationEngine';

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  FETCH: 2,
  RECONCILIATION: 3,
  RUN_LOCK: 4
} as const;

const USAGE = `Usage: listing-feed-sync [options]

  --base-url <url>          Dossier publié par le diffuseur (FEED_BASE_URL)
  --retries <n>             Nombre maximal de tentatives (FETCH_MAX_ATTEMPTS)
  --retry-seconds <s>       Délai entre tentatives (FETCH_RETRY_SECONDS)
  --save-zip-dir <dir>      Copie brute du bundle téléchargé (SAVE_ZIP_DIR)
  --export-json-dir <dir>   Export JSON des inscriptions (EXPORT_JSON_DIR)
  --db <path>               Fichier SQLite du catalogue (SQLITE_PATH)
  --no-mark-sold            Ne pas retirer les inscriptions absentes (MARK_SOLD=false)
  -h, --help                Affiche cette aide`;

/**
 * Les options de ligne de commande priment sur l'environnement
 */
export function applyCliOverrides(config: AppConfig, argv: string[]): { config: AppConfig; help: boolean } {
  const { values } = parseArgs({
    args: argv,
    options: {
      'base-url': { type: 'string' },
      retries: { type: 'string' },
      'retry-seconds': { type: 'string' },
      'save-zip-dir': { type: 'string' },
      'export-json-dir': { type: 'string' },
      db: { type: 'string' },
      'no-mark-sold': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    strict: true
  });

  const numeric = (flag: string, raw: string | undefined, fallback: number): number => {
    if (raw === undefined) return fallback;
    const parsed = Number(raw);
    if (raw.trim() === '' || !Number.isFinite(parsed)) {
      throw new ConfigError([`--${flag} attend un nombre: ${raw}`]);
    }
    return parsed;
  };

  return {
    help: values.help ?? false,
    config: {
      ...config,
      FEED_BASE_URL: values['base-url'] ?? config.FEED_BASE_URL,
      FETCH_MAX_ATTEMPTS: numeric('retries', values.retries, config.FETCH_MAX_ATTEMPTS),
      FETCH_RETRY_SECONDS: numeric('retry-seconds', values['retry-seconds'], config.FETCH_RETRY_SECONDS),
      SAVE_ZIP_DIR: values['save-zip-dir'] ?? config.SAVE_ZIP_DIR,
      EXPORT_JSON_DIR: values['export-json-dir'] ?? config.EXPORT_JSON_DIR,
      SQLITE_PATH: values.db ?? config.SQLITE_PATH,
      MARK_SOLD: values['no-mark-sold'] ? false : config.MARK_SOLD
    }
  };
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof FetchError || error instanceof DiscoveryError || error instanceof ArchiveError) {
    return EXIT_CODES.FETCH;
  }
  if (error instanceof ReconciliationError) return EXIT_CODES.RECONCILIATION;
  if (error instanceof RunLockError) return EXIT_CODES.RUN_LOCK;
  return EXIT_CODES.FAILURE;
}

async function runImport(config: AppConfig, logger: StructuredLogger): Promise<string> {
  if (config.SQLITE_PATH !== ':memory:') {
    await fs.promises.mkdir(path.dirname(config.SQLITE_PATH), { recursive: true });
  }

  const db = await openDatabase(config.SQLITE_PATH);
  try {
    await new MigrationRunner(db, logger).runMigrations();

    const http = new HttpClient({
      userAgent: config.HTTP_USER_AGENT,
      indexTimeoutMs: config.INDEX_TIMEOUT_MS,
      probeTimeoutMs: config.PROBE_TIMEOUT_MS,
      downloadTimeoutMs: config.DOWNLOAD_TIMEOUT_MS
    });
    const discovery = new FeedDiscovery(
      http,
      { baseUrl: config.FEED_BASE_URL, filePrefix: config.FEED_FILE_PREFIX, fileExtension: config.FEED_FILE_EXTENSION },
      logger
    );
    const fetcher = new SnapshotFetcher(discovery, http, logger, {
      maxAttempts: config.FETCH_MAX_ATTEMPTS,
      retryDelayMs: config.FETCH_RETRY_SECONDS * 1000,
      timeZone: config.FEED_TIMEZONE,
      ...(config.SAVE_ZIP_DIR ? { saveDir: config.SAVE_ZIP_DIR } : {})
    });

    const pipeline = new ImportPipeline({
      fetcher,
      decoder: new ArchiveDecoder(logger),
      engine: new ReconciliationEngine(new SqliteListingCatalog(db, logger), new RecordExtractor(logger), logger),
      logger,
      runLock: config.RUN_LOCK_ENABLED ? new RunLock(db, logger, { staleAfterMs: config.RUN_LOCK_STALE_MS }) : null,
      exporter: config.EXPORT_JSON_DIR ? new JsonExporter(config.EXPORT_JSON_DIR, logger) : null,
      retireMissing: config.MARK_SOLD
    });

    return formatSummary(await pipeline.run());
  } finally {
    await closeDatabase(db);
  }
}

/**
 * Point d'entrée: retourne le code de sortie, n'appelle jamais process.exit
 */
export async function main(argv: string[] = process.argv.slice(2), baseConfig: AppConfig = CONFIG): Promise<number> {
  let config: AppConfig;
  let help: boolean;
  try {
    ({ config, help } = applyCliOverrides(baseConfig, argv));
  } catch (error) {
    console.error(`❌ ${describeError(error)}\n\n${USAGE}`);
    return EXIT_CODES.FAILURE;
  }

  if (help) {
    console.log(USAGE);
    return EXIT_CODES.OK;
  }

  const logger = createLogger(config);
  const validation = validateConfig(config);
  for (const warning of validation.warnings) {
    logger.warn(`⚠️ ${warning}`, { component: 'config' });
  }
  if (!validation.isValid) {
    logger.fatal('❌ Configuration invalide', new ConfigError(validation.errors));
    return EXIT_CODES.FAILURE;
  }
  logger.info('⚙️ Configuration chargée', getConfigSummary(config));

  try {
    console.log(await runImport(config, logger));
    return EXIT_CODES.OK;
  } catch (error) {
    const context = error instanceof FetchError ? { attempts: error.attempts } : {};
    const cause = error instanceof Error && error.cause !== undefined ? describeError(error.cause) : undefined;
    logger.fatal('❌ Import échoué', toError(error), { ...context, ...(cause ? { cause } : {}) });
    return exitCodeFor(error);
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Erreur inattendue:', error);
      process.exitCode = EXIT_CODES.FAILURE;
    });
}
