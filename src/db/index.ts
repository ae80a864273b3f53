import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import type { Logger } from 'pino';
import fs from 'fs';
import path from 'path';
import * as schema from './schema.js';

export type ReputationDb = BetterSQLite3Database<typeof schema>;

export interface DatabaseContext {
  db: ReputationDb;
  schema: typeof schema;
}

// Global state
let db: ReputationDb | null = null;
let sqlite: Database.Database | null = null;

/**
 * Create tables if not exist
 */
function runMigrations(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS reputation_scores (
      ip TEXT PRIMARY KEY,
      total_score INTEGER NOT NULL,
      attribute_scores TEXT NOT NULL,
      factors TEXT NOT NULL,
      computed_at TEXT NOT NULL,
      blacklisted INTEGER NOT NULL DEFAULT 0
    );

    CREATE INDEX IF NOT EXISTS idx_total_score ON reputation_scores(total_score);
    CREATE INDEX IF NOT EXISTS idx_computed_at ON reputation_scores(computed_at);
  `);
}

/**
 * Open the SQLite database. `:memory:` skips the data directory and WAL setup.
 */
export function initializeDatabase(dbPath: string, logger?: Logger): DatabaseContext {
  if (db) {
    closeDatabase();
  }

  const inMemory = dbPath === ':memory:';
  if (!inMemory) {
    // Ensure data directory exists with restrictive permissions
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
  }

  sqlite = new Database(dbPath);
  if (!inMemory) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('busy_timeout = 5000');

  runMigrations(sqlite);
  db = drizzle(sqlite, { schema });

  logger?.info({ path: dbPath }, 'Database initialized: SQLite');
  return { db, schema };
}

export function getDatabaseContext(): DatabaseContext {
  if (!db) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return { db, schema };
}

export function closeDatabase(): void {
  if (sqlite) {
    sqlite.close();
    sqlite = null;
    db = null;
  }
}

export { schema };
