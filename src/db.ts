// ── Database Layer ─────────────────────────────────────────────────────────

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { SCHEMA_VERSION } from './types.js';

export function getDefaultDir(): string {
  return process.env['REMINDCTL_DIR'] || path.join(os.homedir(), '.remindctl');
}

export function getDefaultDbPath(): string {
  return (
    process.env['REMINDCTL_DB'] || path.join(getDefaultDir(), 'reminders.db')
  );
}

export function getDb(dbPath?: string): Database.Database {
  const p = dbPath || getDefaultDbPath();
  if (!fs.existsSync(p)) {
    // First use of the CLI should not require `remindctl init`
    initDb(false, p);
  }
  const db = new Database(p);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

const versionRowSchema = z.object({ v: z.number().nullable() });

export function initDb(force: boolean = false, dbPath?: string): string {
  const p = dbPath || getDefaultDbPath();

  fs.mkdirSync(path.dirname(p), { recursive: true, mode: 0o700 });

  if (fs.existsSync(p)) {
    if (force) {
      const ts = new Date()
        .toISOString()
        .replace(/[:.]/g, '')
        .slice(0, 15)
        .replace('T', '-');
      const backup = `${p}.bak.${ts}`;
      fs.copyFileSync(p, backup);
      fs.unlinkSync(p);
      const result = createDb(p);
      return `Backed up existing database to ${backup}\n${result}`;
    }

    const version = readSchemaVersion(p);
    if (version !== null && version >= SCHEMA_VERSION) {
      return `Database already initialized at ${p} (schema v${version})`;
    }
  }

  return createDb(p);
}

function readSchemaVersion(p: string): number | null {
  const db = new Database(p);
  try {
    const hasTable = db
      .prepare("SELECT 1 FROM sqlite_master WHERE type='table' AND name='schema_version'")
      .get();
    if (!hasTable) return null;
    const row = versionRowSchema.parse(
      db.prepare('SELECT MAX(version) as v FROM schema_version').get(),
    );
    return row.v;
  } finally {
    db.close();
  }
}

function createDb(p: string): string {
  const db = new Database(p);
  db.pragma('journal_mode = WAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS lists (
      id                   TEXT PRIMARY KEY DEFAULT (lower(hex(randomblob(8)))),
      title                TEXT NOT NULL,
      allows_modifications INTEGER NOT NULL DEFAULT 1,
      created_at           INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS items (
      id             TEXT PRIMARY KEY DEFAULT (lower(hex(randomblob(8)))),
      list_id        TEXT NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
      title          TEXT,
      due_components TEXT,
      completed      INTEGER NOT NULL DEFAULT 0,
      created_at     INTEGER,
      completed_at   INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_items_list ON items(list_id, completed);

    CREATE TABLE IF NOT EXISTS schema_version (version INTEGER PRIMARY KEY);
  `);

  db.prepare('INSERT OR REPLACE INTO schema_version(version) VALUES (?)').run(
    SCHEMA_VERSION,
  );

  db.close();
  return `Initialized reminders database at ${p} (schema v${SCHEMA_VERSION})`;
}
