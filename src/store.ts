// ── Reminders Store ───────────────────────────────────────────────────────
// Callback-based store contract and its SQLite implementation.

import type Database from 'better-sqlite3';
import * as fs from 'node:fs';
import { z } from 'zod';
import {
  RemindersError,
  type DateComponents,
  type EntityType,
  type ReminderItem,
  type ReminderList,
} from './types.js';

export interface ItemPredicate {
  readonly listIds: readonly string[];
}

export type AccessCallback = (granted: boolean, error: Error | null) => void;
export type FetchCallback = (items: ReminderItem[] | null) => void;

export interface ReminderStore {
  requestAccess(entity: EntityType, callback: AccessCallback): void;
  listsForReminders(): ReminderList[];
  predicateForItems(lists: readonly ReminderList[]): ItemPredicate;
  fetchItems(predicate: ItemPredicate, callback: FetchCallback): void;
  newItem(list: ReminderList): ReminderItem;
  /** Throws when the item cannot be persisted. */
  save(item: ReminderItem, commit: boolean): void;
  /** Writes queued saves atomically. On failure the failing item is dropped and the rest stay queued. */
  commit(): void;
}

// ── Row schemas ───────────────────────────────────────────────────────────

const dateComponentsSchema = z.object({
  year: z.number().int(),
  month: z.number().int().min(1).max(12),
  day: z.number().int().min(1).max(31),
  hour: z.number().int().min(0).max(23).optional(),
  minute: z.number().int().min(0).max(59).optional(),
  second: z.number().int().min(0).max(59).optional(),
});

const listRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  allows_modifications: z.number(),
});

const itemRowSchema = z.object({
  id: z.string(),
  list_id: z.string(),
  title: z.string().nullable(),
  due_components: z.string().nullable(),
  completed: z.number(),
  created_at: z.number().nullable(),
});

const insertedRowSchema = z.object({ id: z.string() });

function toList(row: unknown): ReminderList {
  const r = listRowSchema.parse(row);
  return {
    id: r.id,
    title: r.title,
    allowsContentModifications: r.allows_modifications !== 0,
  };
}

function toItem(row: unknown): ReminderItem {
  const r = itemRowSchema.parse(row);
  return {
    id: r.id,
    listId: r.list_id,
    title: r.title,
    dueDateComponents: r.due_components
      ? dateComponentsSchema.parse(JSON.parse(r.due_components))
      : null,
    creationDate: r.created_at !== null ? new Date(r.created_at) : null,
    isCompleted: r.completed !== 0,
  };
}

function encodeComponents(c: DateComponents | null): string | null {
  return c ? JSON.stringify(dateComponentsSchema.parse(c)) : null;
}

// ── SQLite store ──────────────────────────────────────────────────────────

export interface CreateListOptions {
  allowsContentModifications?: boolean;
}

export class SqliteReminderStore implements ReminderStore {
  private pending: ReminderItem[] = [];

  constructor(private readonly db: Database.Database) {}

  requestAccess(entity: EntityType, callback: AccessCallback): void {
    if (entity !== 'reminder') {
      setImmediate(() => callback(false, new Error(`Access to ${entity} entities is not supported`)));
      return;
    }
    if (this.db.memory) {
      setImmediate(() => callback(true, null));
      return;
    }
    fs.access(this.db.name, fs.constants.R_OK | fs.constants.W_OK, (err) => {
      callback(err === null, err);
    });
  }

  listsForReminders(): ReminderList[] {
    return this.db
      .prepare('SELECT id, title, allows_modifications FROM lists ORDER BY rowid')
      .all()
      .map(toList);
  }

  predicateForItems(lists: readonly ReminderList[]): ItemPredicate {
    return { listIds: lists.map((l) => l.id) };
  }

  fetchItems(predicate: ItemPredicate, callback: FetchCallback): void {
    let items: ReminderItem[] = [];
    if (predicate.listIds.length > 0) {
      const placeholders = predicate.listIds.map(() => '?').join(',');
      items = this.db
        .prepare(
          `SELECT id, list_id, title, due_components, completed, created_at
           FROM items WHERE list_id IN (${placeholders}) ORDER BY rowid`,
        )
        .all(...predicate.listIds)
        .map(toItem);
    }
    setImmediate(() => callback(items));
  }

  newItem(list: ReminderList): ReminderItem {
    return {
      id: null,
      listId: list.id,
      title: null,
      dueDateComponents: null,
      creationDate: null,
      isCompleted: false,
    };
  }

  save(item: ReminderItem, commit: boolean): void {
    const row = this.db
      .prepare('SELECT id, title, allows_modifications FROM lists WHERE id = ?')
      .get(item.listId);
    if (!row) {
      throw new RemindersError(`List not found: ${item.listId}`);
    }
    const list = toList(row);
    if (!list.allowsContentModifications) {
      throw new RemindersError(`List '${list.title}' does not allow modifications`);
    }
    if (item.dueDateComponents) {
      const parsed = dateComponentsSchema.safeParse(item.dueDateComponents);
      if (!parsed.success) {
        throw new RemindersError(`Invalid due date components: ${parsed.error.issues[0].message}`);
      }
    }
    if (!this.pending.includes(item)) {
      this.pending.push(item);
    }
    if (commit) {
      this.commit();
    }
  }

  commit(): void {
    const batch = this.pending;
    this.pending = [];
    const now = Date.now();

    const insert = this.db.prepare(
      `INSERT INTO items(list_id, title, due_components, completed, created_at, completed_at)
       VALUES (?, ?, ?, ?, ?, ?) RETURNING id`,
    );
    const update = this.db.prepare(
      `UPDATE items SET list_id = ?, title = ?, due_components = ?, completed = ?,
         completed_at = CASE WHEN ? = 1 THEN COALESCE(completed_at, ?) ELSE NULL END
       WHERE id = ?`,
    );

    const inserted: Array<[ReminderItem, string]> = [];
    const progress: { current: ReminderItem | null } = { current: null };
    const apply = this.db.transaction((items: ReminderItem[]) => {
      for (const item of items) {
        progress.current = item;
        const completed = item.isCompleted ? 1 : 0;
        const due = encodeComponents(item.dueDateComponents);
        if (item.id === null) {
          const row = insertedRowSchema.parse(
            insert.get(item.listId, item.title, due, completed, now, completed ? now : null),
          );
          inserted.push([item, row.id]);
        } else {
          const info = update.run(item.listId, item.title, due, completed, completed, now, item.id);
          if (info.changes === 0) {
            throw new RemindersError(`Reminder not found: ${item.id}`);
          }
        }
      }
    });

    try {
      apply(batch);
    } catch (e) {
      // The batch rolled back; drop the item that failed and keep the rest queued
      const failed = progress.current;
      this.pending = [...batch.filter((i) => i !== failed), ...this.pending];
      throw e;
    }

    // Only hand out ids once the transaction has landed
    for (const [item, id] of inserted) {
      item.id = id;
      item.creationDate = new Date(now);
    }
  }

  createList(title: string, opts: CreateListOptions = {}): ReminderList {
    const trimmed = title.trim();
    if (!trimmed) {
      throw new RemindersError('List title must not be empty');
    }
    const clash = this.listsForReminders().find(
      (l) => l.title.toLowerCase() === trimmed.toLowerCase(),
    );
    if (clash) {
      throw new RemindersError(`A list named '${clash.title}' already exists`);
    }
    const allows = opts.allowsContentModifications ?? true;
    const row = this.db
      .prepare(
        `INSERT INTO lists(title, allows_modifications, created_at) VALUES (?, ?, ?)
         RETURNING id, title, allows_modifications`,
      )
      .get(trimmed, allows ? 1 : 0, Date.now());
    return toList(row);
  }

  close(): void {
    this.db.close();
  }
}
