import Database from 'better-sqlite3';
import { createLogger } from '../utils/logger.js';
import { PersistenceError, errorMessage } from '../utils/errors.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';

const logger = createLogger({ component: 'database' });

export function openDatabase(dbPath: string): Database.Database {
  logger.info({ dbPath }, 'Initializing database');

  let db: Database.Database | undefined;
  try {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    db = new Database(dbPath);
    db.pragma('journal_mode = WAL');

    runMigrations(db);

    return db;
  } catch (error) {
    logger.error({ err: error, dbPath }, 'Failed to open database');
    db?.close();
    throw new PersistenceError(`Failed to open ${dbPath}: ${errorMessage(error)}`, { cause: error });
  }
}

export function runMigrations(db: Database.Database): void {
  logger.info('Running database migrations');

  // One row per (date_local, zip); created_at is written once by the default
  db.exec(`
    CREATE TABLE IF NOT EXISTS weather_daily (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      date_local TEXT NOT NULL,
      zip TEXT NOT NULL,
      lat REAL NOT NULL,
      lon REAL NOT NULL,
      condition TEXT NOT NULL,
      temp_high_f REAL NOT NULL,
      temp_low_f REAL NOT NULL,
      precip_mm REAL NOT NULL,
      wind_max_mph REAL NOT NULL,
      created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now')),
      updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%SZ', 'now')),
      UNIQUE (date_local, zip)
    );

    CREATE INDEX IF NOT EXISTS idx_weather_daily_zip ON weather_daily(zip);
  `);

  logger.info('Database migrations completed');
}
