import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Database } from 'sqlite3';
import { formatMigrationStatus, migrateCatalog } from '../../scripts/migrate';
import { MigrationRunner } from '../../store/Migrations';
import { all, closeDatabase, openDatabase } from '../../store/sqlite';
import { createTestLogger } from '../helpers/testDb';

describe('MigrationRunner', () => {
  const logger = createTestLogger();
  let db: Database;

  beforeEach(async () => {
    db = await openDatabase(':memory:');
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('devrait appliquer toutes les migrations une seule fois', async () => {
    const runner = new MigrationRunner(db, logger);

    await expect(runner.runMigrations()).resolves.toBe(3);
    await expect(runner.runMigrations()).resolves.toBe(0);
    await expect(runner.getMigrationStatus()).resolves.toEqual({
      total: 3,
      applied: 3,
      pending: 0,
      lastApplied: '003'
    });

    const tables = await all<{ name: string }>(
      db,
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    );
    expect(tables.map(table => table.name)).toEqual(['_migrations', 'fetch_runs', 'listing_photos', 'listings', 'run_lock']);
  });

  it('should roll back a failing migration', async () => {
    const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'feed-migrations-'));
    try {
      await fs.promises.writeFile(path.join(dir, '001_ok.sql'), 'CREATE TABLE a (id INTEGER);');
      await fs.promises.writeFile(path.join(dir, '002_broken.sql'), 'CREATE TABLE b (id INTEGER); INSERT INTO absent VALUES (1);');
      const runner = new MigrationRunner(db, logger, dir);

      await expect(runner.runMigrations()).rejects.toThrow(/no such table: absent/);

      const status = await runner.getMigrationStatus();
      expect(status).toEqual({ total: 2, applied: 1, pending: 1, lastApplied: '001' });
      const tables = await all<{ name: string }>(db, "SELECT name FROM sqlite_master WHERE name = 'b'");
      expect(tables).toEqual([]);
    } finally {
      await fs.promises.rm(dir, { recursive: true, force: true });
    }
  });

  describe('script migrate', () => {
    it('devrait créer le dossier de la base et appliquer le schéma', async () => {
      const dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'feed-migrate-'));
      try {
        const dbPath = path.join(dir, 'nested', 'catalog.db');

        const status = await migrateCatalog(dbPath, logger);

        expect(status).toEqual({ total: 3, applied: 3, pending: 0, lastApplied: '003' });
        expect(fs.existsSync(dbPath)).toBe(true);
        await expect(migrateCatalog(dbPath, logger)).resolves.toEqual(status);
      } finally {
        await fs.promises.rm(dir, { recursive: true, force: true });
      }
    });

    it('should format the status report', () => {
      expect(formatMigrationStatus({ total: 3, applied: 2, pending: 1, lastApplied: '002' })).toBe(
        '📊 Statut des migrations:\n  Total: 3\n  Appliquées: 2\n  En attente: 1\n  Dernière: 002'
      );
      expect(formatMigrationStatus({ total: 0, applied: 0, pending: 0 })).toBe(
        '📊 Statut des migrations:\n  Total: 0\n  Appliquées: 0\n  En attente: 0'
      );
    });
  });
});
