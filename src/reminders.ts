// ── Reminders Facade ──────────────────────────────────────────────────────
// Resolves lists, fetches open items and commits changes against a store.
// Fatal conditions throw RemindersError; only the CLI exits the process.

import { componentsToDate, fmtRelative, toEpochSeconds } from './date-parser.js';
import type { ReminderStore } from './store.js';
import {
  RemindersError,
  type DateComponents,
  type OutputFormat,
  type OutputRecord,
  type ReminderItem,
  type ReminderList,
} from './types.js';

export interface RemindersOptions {
  /** Receives every output line. Defaults to console.log. */
  print?: (line: string) => void;
  now?: () => Date;
}

/** Issues one callback-style request and resolves with its single completion value. */
function once<T>(issue: (done: (value: T) => void) => void): Promise<T> {
  return new Promise<T>((resolve) => issue(resolve));
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

// ── Formatting ────────────────────────────────────────────────────────────

export function toOutputRecord(item: ReminderItem, now: Date = new Date()): OutputRecord {
  const record: OutputRecord = { title: item.title };
  if (item.dueDateComponents) {
    const due = componentsToDate(item.dueDateComponents);
    record.dueDateHumanReadable = fmtRelative(due, now);
    record.dueDateEpoch = toEpochSeconds(due);
  }
  if (item.creationDate) {
    record.creationDate = item.creationDate.getTime() / 1000;
  }
  return record;
}

export function formatItem(item: ReminderItem, index: number, now: Date = new Date()): string {
  const dateString = item.dueDateComponents
    ? ` (${fmtRelative(componentsToDate(item.dueDateComponents), now)})`
    : '';
  return `${index}: ${item.title ?? '<unknown>'}${dateString}`;
}

// ── Facade ────────────────────────────────────────────────────────────────

export class Reminders {
  private readonly print: (line: string) => void;
  private readonly now: () => Date;

  constructor(
    private readonly store: ReminderStore,
    opts: RemindersOptions = {},
  ) {
    this.print = opts.print ?? ((line) => console.log(line));
    this.now = opts.now ?? (() => new Date());
  }

  requestAccess(): Promise<boolean> {
    return once<boolean>((done) => {
      this.store.requestAccess('reminder', (granted) => done(granted));
    });
  }

  showLists(): void {
    for (const list of this.writableLists()) {
      this.print(list.title);
    }
  }

  async showListItems(
    names: Iterable<string>,
    format: OutputFormat = 'plainText',
    dueDateOnly: boolean = false,
  ): Promise<void> {
    const lists = this.listsNamed(names);
    if (lists.length === 0) return;

    const items = await this.openItems(lists);
    const filtered = dueDateOnly ? items.filter((i) => i.dueDateComponents !== null) : items;
    const now = this.now();

    if (format === 'json') {
      let encoded: string;
      try {
        encoded = JSON.stringify(filtered.map((i) => toOutputRecord(i, now)));
      } catch (e) {
        throw new RemindersError(`Failed to encode reminders as JSON: ${errorMessage(e)}`);
      }
      this.print(encoded);
      return;
    }

    filtered.forEach((item, i) => this.print(formatItem(item, i, now)));
  }

  async complete(index: number, listName: string): Promise<void> {
    const list = this.listNamed(listName);
    const items = await this.openItems([list]);

    const item = Number.isInteger(index) && index >= 0 ? items[index] : undefined;
    if (!item) {
      throw new RemindersError(`No reminder at index ${index} on ${listName}`);
    }

    item.isCompleted = true;
    this.saveOrFail(item);
    this.print(`Completed '${item.title ?? '<unknown>'}'`);
  }

  addReminder(title: string, listName: string, dueDate: DateComponents | null = null): void {
    const list = this.listNamed(listName);
    const item = this.store.newItem(list);
    item.title = title;
    item.dueDateComponents = dueDate;

    this.saveOrFail(item);
    this.print(`Added '${title}' to '${list.title}'`);
  }

  // ── Helpers ───────────────────────────────────────────────────────────

  private saveOrFail(item: ReminderItem): void {
    try {
      this.store.save(item, true);
    } catch (e) {
      throw new RemindersError(`Failed to save reminder with error: ${errorMessage(e)}`);
    }
  }

  private async openItems(lists: readonly ReminderList[]): Promise<ReminderItem[]> {
    const predicate = this.store.predicateForItems(lists);
    const items = await once<ReminderItem[] | null>((done) => {
      this.store.fetchItems(predicate, done);
    });
    return (items ?? []).filter((i) => !i.isCompleted);
  }

  private listNamed(name: string): ReminderList {
    const wanted = name.toLowerCase();
    const list = this.writableLists().find((l) => l.title.toLowerCase() === wanted);
    if (!list) {
      throw new RemindersError(`No reminders list matching ${name}`);
    }
    return list;
  }

  private listsNamed(names: Iterable<string>): ReminderList[] {
    const wanted = new Set(Array.from(names, (n) => n.toLowerCase()));
    return this.writableLists().filter((l) => wanted.has(l.title.toLowerCase()));
  }

  private writableLists(): ReminderList[] {
    return this.store.listsForReminders().filter((l) => l.allowsContentModifications);
  }
}
