import { Database } from 'sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { StructuredLogger } from '../core/StructuredLogger';
import { all, exec, run } from './sqlite';

export interface Migration {
  id: string;
  name: string;
  sql: string;
}

export interface MigrationStatus {
  total: number;
  applied: number;
  pending: number;
  lastApplied?: string;
}

// migrations/ à la racine du dépôt, depuis src/store comme depuis dist/store
export const DEFAULT_MIGRATIONS_PATH = path.resolve(__dirname, '../../migrations');

export class MigrationRunner {
  constructor(
    private readonly db: Database,
    private readonly logger: StructuredLogger,
    private readonly migrationsPath: string = DEFAULT_MIGRATIONS_PATH
  ) {}

  async runMigrations(): Promise<number> {
    const context = { component: 'MigrationRunner' };
    this.logger.debug('🔄 Exécution des migrations...', context);

    try {
      await this.createMigrationsTable();

      const migrationFiles = await this.getMigrationFiles();
      const appliedMigrations = await this.getAppliedMigrations();
      const pendingMigrations = migrationFiles.filter(file => !appliedMigrations.includes(file.id));

      if (pendingMigrations.length === 0) {
        this.logger.debug('✅ Aucune migration en attente', { ...context, applied: appliedMigrations.length });
        return 0;
      }

      // Appliquer chaque migration dans l'ordre
      for (const migration of pendingMigrations) {
        await this.applyMigration(migration);
      }

      this.logger.info(`✅ ${pendingMigrations.length} migration(s) appliquée(s)`, context);
      return pendingMigrations.length;
    } catch (error) {
      this.logger.error('❌ Erreur lors de l\'exécution des migrations', error instanceof Error ? error : undefined, context);
      throw error;
    }
  }

  async getMigrationStatus(): Promise<MigrationStatus> {
    await this.createMigrationsTable();
    const migrationFiles = await this.getMigrationFiles();
    const appliedMigrations = await this.getAppliedMigrations();
    const lastApplied = appliedMigrations[appliedMigrations.length - 1];

    return {
      total: migrationFiles.length,
      applied: appliedMigrations.length,
      pending: migrationFiles.length - appliedMigrations.length,
      ...(lastApplied ? { lastApplied } : {})
    };
  }

  private async createMigrationsTable(): Promise<void> {
    await exec(this.db, `
      CREATE TABLE IF NOT EXISTS _migrations (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at_utc TEXT NOT NULL
      )
    `);
  }

  private async getMigrationFiles(): Promise<Migration[]> {
    const files = await fs.promises.readdir(this.migrationsPath);
    const migrations: Migration[] = [];

    for (const file of files) {
      // NNN_nom_de_migration.sql
      const idMatch = file.match(/^(\d+)_(.+)\.sql$/);
      if (!idMatch || !idMatch[1] || !idMatch[2]) continue;

      const sql = await fs.promises.readFile(path.join(this.migrationsPath, file), 'utf-8');
      migrations.push({ id: idMatch[1], name: idMatch[2].replace(/_/g, ' '), sql });
    }

    return migrations.sort((a, b) => parseInt(a.id, 10) - parseInt(b.id, 10));
  }

  private async getAppliedMigrations(): Promise<string[]> {
    const rows = await all<{ id: string }>(this.db, 'SELECT id FROM _migrations ORDER BY id');
    return rows.map(row => row.id);
  }

  private async applyMigration(migration: Migration): Promise<void> {
    this.logger.info(`🔄 Application de la migration ${migration.id}: ${migration.name}`, {
      component: 'MigrationRunner'
    });

    await exec(this.db, 'BEGIN TRANSACTION');
    try {
      await exec(this.db, migration.sql);
      await run(
        this.db,
        'INSERT INTO _migrations (id, name, applied_at_utc) VALUES (?, ?, ?)',
        [migration.id, migration.name, new Date().toISOString()]
      );
      await exec(this.db, 'COMMIT');
    } catch (error) {
      await exec(this.db, 'ROLLBACK');
      throw error;
    }
  }
}
