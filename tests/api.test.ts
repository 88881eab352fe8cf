import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { openReminders, parseDueDate, type RemindersHandle } from '../src/api.js';

let tmpDir: string;
let origDir: string | undefined;
let origDb: string | undefined;
let handle: RemindersHandle | null;
let lines: string[];

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'remindctl-api-test-'));
  origDir = process.env['REMINDCTL_DIR'];
  origDb = process.env['REMINDCTL_DB'];
  process.env['REMINDCTL_DIR'] = tmpDir;
  delete process.env['REMINDCTL_DB'];
  handle = null;
  lines = [];
});

afterEach(() => {
  handle?.close();
  if (origDir !== undefined) process.env['REMINDCTL_DIR'] = origDir;
  else delete process.env['REMINDCTL_DIR'];
  if (origDb !== undefined) process.env['REMINDCTL_DB'] = origDb;
  else delete process.env['REMINDCTL_DB'];
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('openReminders', () => {
  it('creates the database at the default path on first use', () => {
    handle = openReminders();
    expect(fs.existsSync(path.join(tmpDir, 'reminders.db'))).toBe(true);
  });

  it('honours an explicit dbPath', () => {
    const dbPath = path.join(tmpDir, 'custom', 'todo.db');
    handle = openReminders({ dbPath });
    expect(fs.existsSync(dbPath)).toBe(true);
    expect(fs.existsSync(path.join(tmpDir, 'reminders.db'))).toBe(false);
  });

  it('grants access to the opened database', async () => {
    handle = openReminders({ print: (l) => lines.push(l) });
    expect(await handle.reminders.requestAccess()).toBe(true);
  });

  it('runs the add, show and complete cycle end to end', async () => {
    const now = new Date(2026, 5, 1, 12, 0, 0);
    handle = openReminders({ print: (l) => lines.push(l), now: () => now });
    handle.store.createList('Groceries');

    handle.reminders.addReminder('Eggs', 'groceries', parseDueDate('+1d', now));
    handle.reminders.addReminder('Bread', 'Groceries', null);
    await handle.reminders.showListItems(['GROCERIES']);
    await handle.reminders.complete(0, 'Groceries');
    await handle.reminders.showListItems(['Groceries']);

    expect(lines).toEqual([
      "Added 'Eggs' to 'Groceries'",
      "Added 'Bread' to 'Groceries'",
      '0: Eggs (in 1 day)',
      '1: Bread',
      "Completed 'Eggs'",
      '0: Bread',
    ]);
  });

  it('persists across handles', async () => {
    handle = openReminders({ print: (l) => lines.push(l) });
    handle.store.createList('Home');
    handle.reminders.addReminder('Water plants', 'Home', null);
    handle.close();

    handle = openReminders({ print: (l) => lines.push(l) });
    lines.length = 0;
    await handle.reminders.showListItems(['Home']);
    expect(lines).toEqual(['0: Water plants']);
  });
});
