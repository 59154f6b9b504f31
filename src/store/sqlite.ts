import { Database, RunResult } from 'sqlite3';

export type SqlParam = string | number | null;

export interface RunOutcome {
  changes: number;
  lastID: number;
}

/**
 * Ouvre la base et active les clés étrangères (cascade des photos)
 */
export async function openDatabase(filename: string): Promise<Database> {
  const db = await new Promise<Database>((resolve, reject) => {
    const handle = new Database(filename, (err) => {
      if (err) reject(err);
      else resolve(handle);
    });
  });

  await exec(db, 'PRAGMA foreign_keys = ON');
  await exec(db, 'PRAGMA busy_timeout = 5000');
  return db;
}

export function run(db: Database, sql: string, params: SqlParam[] = []): Promise<RunOutcome> {
  return new Promise((resolve, reject) => {
    db.run(sql, params, function (this: RunResult, err: Error | null) {
      if (err) reject(err);
      else resolve({ changes: this.changes, lastID: this.lastID });
    });
  });
}

export function get<T>(db: Database, sql: string, params: SqlParam[] = []): Promise<T | undefined> {
  return new Promise((resolve, reject) => {
    db.get<T | undefined>(sql, params, (err, row) => {
      if (err) reject(err);
      else resolve(row);
    });
  });
}

export function all<T>(db: Database, sql: string, params: SqlParam[] = []): Promise<T[]> {
  return new Promise((resolve, reject) => {
    db.all<T>(sql, params, (err, rows) => {
      if (err) reject(err);
      else resolve(rows);
    });
  });
}

export function exec(db: Database, sql: string): Promise<void> {
  return new Promise((resolve, reject) => {
    db.exec(sql, (err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

export function closeDatabase(db: Database): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err) => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/**
 * Base verrouillée par une autre connexion (busy_timeout écoulé)
 */
export function isBusyError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED');
}
