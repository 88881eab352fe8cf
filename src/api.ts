// ── Programmatic API ──────────────────────────────────────────────────────
// import { openReminders } from 'remindctl'

import { getDb } from './db.js';
import { Reminders, type RemindersOptions } from './reminders.js';
import { SqliteReminderStore } from './store.js';

// ── Re-exports ─────────────────────────────────────────────────────────────

export { Reminders, toOutputRecord, formatItem } from './reminders.js';
export type { RemindersOptions } from './reminders.js';
export { SqliteReminderStore } from './store.js';
export type { ReminderStore, ItemPredicate } from './store.js';
export { parseDueDate, componentsToDate, fmtRelative, toEpochSeconds } from './date-parser.js';
export { initDb } from './db.js';
export {
  RemindersError,
  type DateComponents,
  type OutputFormat,
  type OutputRecord,
  type ReminderItem,
  type ReminderList,
} from './types.js';

export interface OpenOptions extends RemindersOptions {
  /** Defaults to $REMINDCTL_DB, then ~/.remindctl/reminders.db */
  dbPath?: string;
}

export interface RemindersHandle {
  reminders: Reminders;
  store: SqliteReminderStore;
  close(): void;
}

/**
 * Opens the reminders database (creating it on first use) and returns a
 * facade bound to it. Call `close()` when done.
 * @example
 *   const { reminders, close } = openReminders();
 *   await reminders.showListItems(['Home'], 'json');
 *   close();
 */
export function openReminders(opts: OpenOptions = {}): RemindersHandle {
  const store = new SqliteReminderStore(getDb(opts.dbPath));
  const reminders = new Reminders(store, { print: opts.print, now: opts.now });
  return {
    reminders,
    store,
    close: () => store.close(),
  };
}
