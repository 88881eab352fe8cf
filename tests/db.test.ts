import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import Database from 'better-sqlite3';
import { initDb, getDb, getDefaultDbPath } from '../src/db.js';

let tmpDir: string;
let dbPath: string;
let origDir: string | undefined;
let origDb: string | undefined;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remindctl-db-test-'));
  dbPath = path.join(tmpDir, 'reminders.db');
  origDir = process.env['REMINDCTL_DIR'];
  origDb = process.env['REMINDCTL_DB'];
  process.env['REMINDCTL_DIR'] = tmpDir;
  delete process.env['REMINDCTL_DB'];
});

afterEach(() => {
  if (origDir !== undefined) process.env['REMINDCTL_DIR'] = origDir;
  else delete process.env['REMINDCTL_DIR'];
  if (origDb !== undefined) process.env['REMINDCTL_DB'] = origDb;
  else delete process.env['REMINDCTL_DB'];
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function tableNames(p: string): string[] {
  const db = new Database(p);
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
    .all() as { name: string }[];
  db.close();
  return rows.map((r) => r.name);
}

// ── Paths ─────────────────────────────────────────────────────────────────────

describe('getDefaultDbPath', () => {
  it('lives under REMINDCTL_DIR', () => {
    expect(getDefaultDbPath()).toBe(path.join(tmpDir, 'reminders.db'));
  });

  it('prefers REMINDCTL_DB when set', () => {
    process.env['REMINDCTL_DB'] = path.join(tmpDir, 'other.db');
    expect(getDefaultDbPath()).toBe(path.join(tmpDir, 'other.db'));
  });
});

// ── initDb ────────────────────────────────────────────────────────────────────

describe('initDb', () => {
  it('creates the database with all tables', () => {
    const msg = initDb(false, dbPath);
    expect(msg).toBe(`Initialized reminders database at ${dbPath} (schema v1)`);
    expect(tableNames(dbPath)).toEqual(['items', 'lists', 'schema_version']);
  });

  it('records the schema version', () => {
    initDb(false, dbPath);
    const db = new Database(dbPath);
    const row = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number };
    db.close();
    expect(row.v).toBe(1);
  });

  it('is a no-op on an initialized database', () => {
    initDb(false, dbPath);
    expect(initDb(false, dbPath)).toBe(`Database already initialized at ${dbPath} (schema v1)`);
  });

  it('creates missing parent directories', () => {
    const nested = path.join(tmpDir, 'a', 'b', 'reminders.db');
    initDb(false, nested);
    expect(fs.existsSync(nested)).toBe(true);
  });

  it('backs up the existing file with --force', () => {
    initDb(false, dbPath);
    const msg = initDb(true, dbPath);
    expect(msg.startsWith(`Backed up existing database to ${dbPath}.bak.`)).toBe(true);
    const backups = fs.readdirSync(tmpDir).filter((f) => f.startsWith('reminders.db.bak.'));
    expect(backups).toHaveLength(1);
    expect(tableNames(dbPath)).toContain('items');
  });
});

// ── getDb ─────────────────────────────────────────────────────────────────────

describe('getDb', () => {
  it('auto-initializes a missing database at the default path', () => {
    const db = getDb();
    db.close();
    expect(fs.existsSync(path.join(tmpDir, 'reminders.db'))).toBe(true);
  });

  it('enables foreign keys', () => {
    const db = getDb(dbPath);
    const fk = db.pragma('foreign_keys', { simple: true });
    db.close();
    expect(fk).toBe(1);
  });
});
