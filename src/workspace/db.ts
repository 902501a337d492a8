import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

let _db: Database.Database | null = null;

export function openDb(dbPath: string): Database.Database {
  if (_db) return _db;
  if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
  _db = new Database(dbPath);
  _db.pragma('journal_mode = WAL');
  applySchema(_db);
  return _db;
}

export function applySchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS builds (
      build_id TEXT PRIMARY KEY,
      schema_version TEXT NOT NULL,
      repository TEXT NOT NULL,
      branch TEXT,
      commit_sha TEXT,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      success INTEGER NOT NULL CHECK (success IN (0,1)),
      canceled INTEGER NOT NULL CHECK (canceled IN (0,1)),
      risk_level INTEGER,
      gate TEXT CHECK (gate IS NULL OR gate IN ('proceed','block')),
      record_json TEXT NOT NULL,
      record_hash TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_builds_started ON builds(started_at);
    CREATE INDEX IF NOT EXISTS idx_builds_repository ON builds(repository);
  `);
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
