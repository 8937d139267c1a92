import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export interface ChecksumRow {
  path: string;
  size: number;
  mtimeMs: number;
  md5: string;
  sha512: string;
}

export function ensureSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS checksums (
      path TEXT PRIMARY KEY,
      size INTEGER NOT NULL,
      mtimeMs INTEGER NOT NULL,
      md5 TEXT NOT NULL,
      sha512 TEXT NOT NULL
    );
  `);
  db.prepare('INSERT OR REPLACE INTO meta (key, value) VALUES (?, ?)').run('schemaVersion', String(SCHEMA_VERSION));
}

export function hasChecksumTable(db: Database.Database): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get('checksums');
  return row !== undefined;
}
