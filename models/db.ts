import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';

/**
 * Opens a database connection at `dbPath` (or ':memory:'), creating the
 * parent directory when needed and enabling WAL mode for files.
 * Does NOT run migrations.
 */
export function initDb(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    ensureDirectoryExists(path.dirname(path.resolve(dbPath)));
  }

  logger.info(`[DB] Initializing new database connection at: ${dbPath}`);
  const db = new Database(dbPath);

  // WAL is not applicable to :memory:
  if (dbPath !== ':memory:') {
    try {
      db.pragma('journal_mode = WAL');
      logger.debug('[DB] WAL mode enabled.');
    } catch (walError) {
      // May fail on some network file systems
      logger.warn('[DB] Could not enable WAL mode: ', walError);
    }
  }
  db.pragma('foreign_keys = ON');

  return db;
}

function ensureDirectoryExists(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
    logger.info(`[DB] Created database directory: ${dirPath}`);
  }
}
