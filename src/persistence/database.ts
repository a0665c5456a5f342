import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { join, dirname as pathDirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { mkdirSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = pathDirname(__filename);

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  const resolvedPath = dbPath || process.env.DATABASE_PATH || join(__dirname, '../../data', 'forecast.db');
  logger.info({ dbPath: resolvedPath }, 'Initializing database');

  mkdirSync(pathDirname(resolvedPath), { recursive: true });

  db = openDatabase(resolvedPath);
  return db;
}

/** Opens a connection and applies migrations. `:memory:` works for tests. */
export function openDatabase(path: string): Database.Database {
  const connection = new Database(path);
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');
  runMigrations(connection);
  return connection;
}

function runMigrations(db: Database.Database): void {
  logger.debug('Running database migrations');

  db.exec(`
    CREATE TABLE IF NOT EXISTS favourite_locations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL,
      admin1 TEXT,
      country TEXT,
      latitude REAL NOT NULL,
      longitude REAL NOT NULL,
      timezone TEXT,
      label TEXT NOT NULL UNIQUE,
      created_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_favourite_locations_created ON favourite_locations(created_at);
  `);

  logger.debug('Database migrations completed');
}

export function closeDatabase(): void {
  if (db) {
    logger.info('Closing database connection');
    db.close();
    db = null;
  }
}
