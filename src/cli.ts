// ── CLI ───────────────────────────────────────────────────────────────────
// Commands and the single boundary that maps errors to exit codes.

import { Command, CommanderError } from 'commander';
import { z } from 'zod';
import { VERSION, RemindersError } from './types.js';
import { initDb } from './db.js';
import { parseDueDate } from './date-parser.js';
import { openReminders, type OpenOptions, type RemindersHandle } from './api.js';
import type { Reminders } from './reminders.js';
import type { SqliteReminderStore } from './store.js';

export interface CliIo {
  print: (line: string) => void;
  printError: (line: string) => void;
  open: (opts: OpenOptions) => RemindersHandle;
}

const defaultIo: CliIo = {
  print: (line) => console.log(line),
  printError: (line) => console.error(line),
  open: openReminders,
};

const indexSchema = z
  .string()
  .regex(/^\d+$/, 'Index must be a non-negative integer')
  .transform(Number);

export function buildProgram(io: CliIo): Command {
  /** Opens the store, checks access and runs one command against it. */
  async function withReminders(
    fn: (reminders: Reminders, store: SqliteReminderStore) => Promise<void> | void,
  ): Promise<void> {
    const { reminders, store, close } = io.open({ print: io.print });
    try {
      if (!(await reminders.requestAccess())) {
        throw new RemindersError('You need to grant reminders access');
      }
      await fn(reminders, store);
    } finally {
      close();
    }
  }

  const program = new Command();

  // Set before any .command() so subcommands inherit them
  program
    .exitOverride()
    .configureOutput({
      writeOut: (s) => io.print(s.trimEnd()),
      writeErr: (s) => io.printError(s.trimEnd()),
    });

  program
    .name('remindctl')
    .description('List, complete and add reminders from the command line')
    .version(VERSION);

  // ── init ────────────────────────────────────────────────────────────────

  program
    .command('init')
    .description('Initialize the reminders database')
    .option('--force', 'Force recreate (backs up existing)')
    .action((opts: { force?: boolean }) => {
      io.print(initDb(opts.force));
    });

  // ── show-lists ──────────────────────────────────────────────────────────

  program
    .command('show-lists')
    .description('Print the names of all writable reminder lists')
    .action(async () => {
      await withReminders((reminders) => reminders.showLists());
    });

  // ── show ────────────────────────────────────────────────────────────────

  program
    .command('show')
    .description('Print the open items on the given lists')
    .argument('<lists...>', 'List names (case-insensitive)')
    .option('--json', 'Output JSON')
    .option('--due-date-only', 'Only show items that have a due date')
    .action(async (names: string[], opts: { json?: boolean; dueDateOnly?: boolean }) => {
      await withReminders((reminders) =>
        reminders.showListItems(names, opts.json ? 'json' : 'plainText', opts.dueDateOnly ?? false),
      );
    });

  // ── complete ────────────────────────────────────────────────────────────

  program
    .command('complete')
    .description('Mark an item completed, by its index as printed by `show`')
    .argument('<list>', 'List name')
    .argument('<index>', 'Index of the item on that list')
    .action(async (listName: string, rawIndex: string) => {
      const parsed = indexSchema.safeParse(rawIndex);
      if (!parsed.success) {
        throw new RemindersError(`Invalid index '${rawIndex}': ${parsed.error.issues[0].message}`);
      }
      const index = parsed.data;
      await withReminders((reminders) => reminders.complete(index, listName));
    });

  // ── add ─────────────────────────────────────────────────────────────────

  program
    .command('add')
    .description('Add an item to a list')
    .argument('<list>', 'List name')
    .argument('<title...>', 'Reminder title')
    .option('-d, --due-date <datetime>', 'Due date: +2h, today, tomorrow, YYYY-MM-DD[ HH:MM]')
    .action(async (listName: string, words: string[], opts: { dueDate?: string }) => {
      const dueDate = opts.dueDate ? parseDueDate(opts.dueDate) : null;
      await withReminders((reminders) => reminders.addReminder(words.join(' '), listName, dueDate));
    });

  // ── new-list ────────────────────────────────────────────────────────────

  program
    .command('new-list')
    .description('Create a reminder list')
    .argument('<name>', 'List name')
    .option('--read-only', 'Create the list without content modifications')
    .action(async (name: string, opts: { readOnly?: boolean }) => {
      await withReminders((_reminders, store) => {
        const list = store.createList(name, { allowsContentModifications: !opts.readOnly });
        io.print(`Created list '${list.title}'`);
      });
    });

  return program;
}

// ── Run ───────────────────────────────────────────────────────────────────

/** Runs one command line (without the node and script arguments) and resolves with its exit code. */
export async function run(argv: readonly string[], io: Partial<CliIo> = {}): Promise<number> {
  const resolved: CliIo = { ...defaultIo, ...io };
  const program = buildProgram(resolved);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return 0;
  } catch (e) {
    if (e instanceof RemindersError) {
      resolved.printError(`Error: ${e.message}`);
      return e.exitCode;
    }
    if (e instanceof CommanderError) {
      // commander has already written its own message
      return e.exitCode;
    }
    throw e;
  }
}
