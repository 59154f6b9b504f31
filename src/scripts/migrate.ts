#!/usr/bin/env node
// Applique les migrations du catalogue sans lancer d'import
import * as fs from 'fs';
import * as path from 'path';
import { CONFIG } from '../config/env';
import { describeError } from '../core/errors';
import { createLogger, StructuredLogger } from '../core/StructuredLogger';
import { MigrationRunner, MigrationStatus } from '../store/Migrations';
import { closeDatabase, openDatabase } from '../store/sqlite';

export async function migrateCatalog(dbPath: string, logger: StructuredLogger): Promise<MigrationStatus> {
  if (dbPath !== ':memory:') {
    await fs.promises.mkdir(path.dirname(dbPath), { recursive: true });
  }

  const db = await openDatabase(dbPath);
  try {
    const runner = new MigrationRunner(db, logger);
    await runner.runMigrations();
    return await runner.getMigrationStatus();
  } finally {
    await closeDatabase(db);
  }
}

export function formatMigrationStatus(status: MigrationStatus): string {
  return [
    '📊 Statut des migrations:',
    `  Total: ${status.total}`,
    `  Appliquées: ${status.applied}`,
    `  En attente: ${status.pending}`,
    ...(status.lastApplied ? [`  Dernière: ${status.lastApplied}`] : [])
  ].join('\n');
}

if (require.main === module) {
  const logger = createLogger(CONFIG);
  logger.info(`🗄️ Base de données: ${CONFIG.SQLITE_PATH}`, { component: 'migrate' });

  migrateCatalog(CONFIG.SQLITE_PATH, logger)
    .then(status => {
      console.log(formatMigrationStatus(status));
    })
    .catch((error: unknown) => {
      console.error(`❌ Erreur lors des migrations: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
