import Database from 'better-sqlite3';
import runMigrations from '../runMigrations';

export function setupTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

export function cleanTestDb(db: Database.Database) {
  // Clear tables in proper order to respect foreign keys
  db.exec(`
    DELETE FROM job_steps;
    DELETE FROM jobs;
    DELETE FROM vector_records;
    DELETE FROM vector_collections;
  `);
}
