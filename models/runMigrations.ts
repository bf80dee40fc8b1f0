import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR_NAME = 'migrations';
const MIGRATIONS_TABLE_NAME = 'schema_migrations';

/**
 * Ensures the schema_migrations table exists on the given DB instance.
 */
function ensureMigrationsTableExists(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE_NAME} (
      version TEXT PRIMARY KEY,
      applied_at DATETIME DEFAULT (strftime('%Y-%m-%dT%H:%M:%S.000Z', 'now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  ensureMigrationsTableExists(db);
  const rows = db.prepare(`SELECT version FROM ${MIGRATIONS_TABLE_NAME}`).pluck().all();
  return new Set(rows.filter((v): v is string => typeof v === 'string'));
}

/**
 * Locate the migrations directory. SQL files are not copied by tsc, so a
 * build under dist/ reads them from the source tree.
 */
export function resolveMigrationsDir(): string | null {
  const candidates = [
    path.join(__dirname, MIGRATIONS_DIR_NAME),                  // source: models/
    path.resolve(__dirname, '..', '..', 'models', MIGRATIONS_DIR_NAME), // build: dist/models/
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? null;
}

/**
 * Reads migration filenames, sorted alphabetically (0001_.., 0002_..).
 */
function getMigrationFiles(migrationsPath: string): string[] {
  return fs.readdirSync(migrationsPath)
    .filter(file => file.endsWith('.sql'))
    .sort();
}

/**
 * Runs all pending migrations on the given DB instance.
 * @returns Versions applied by this call
 */
function runMigrations(db: Database.Database): string[] {
  logger.debug('[Migrations] Starting database migration check...');

  const migrationsPath = resolveMigrationsDir();
  if (!migrationsPath) {
    throw new Error(`Migrations directory not found next to ${__dirname}`);
  }

  const appliedVersions = getAppliedMigrations(db);
  const applied: string[] = [];

  for (const filename of getMigrationFiles(migrationsPath)) {
    const version = path.basename(filename, '.sql');

    if (appliedVersions.has(version)) {
      logger.debug(`[Migrations] Skipping already applied migration: ${version}`);
      continue;
    }

    logger.info(`[Migrations] Applying migration: ${version}...`);
    const sql = fs.readFileSync(path.join(migrationsPath, filename), 'utf8');

    const runMigrationTx = db.transaction(() => {
      db.exec(sql);
      db.prepare(`INSERT INTO ${MIGRATIONS_TABLE_NAME} (version) VALUES (?)`).run(version);
    });

    try {
      runMigrationTx();
      applied.push(version);
    } catch (migrationError) {
      logger.error(`[Migrations] FAILED to apply migration ${version}:`, migrationError);
      throw new Error(`Migration ${version} (${filename}) failed. Halting further migrations.`);
    }
  }

  if (applied.length > 0) {
    logger.info(`[Migrations] Applied ${applied.length} new migration(s).`);
  } else {
    logger.debug('[Migrations] Database schema is up to date.');
  }
  return applied;
}

export default runMigrations;
export { runMigrations };
