// ── Types ──────────────────────────────────────────────────────────────────

export const SCHEMA_VERSION = 1;
export const VERSION = '0.4.0';

export type OutputFormat = 'json' | 'plainText';

export type EntityType = 'reminder' | 'event';

/** Calendar-based due date; omitting `hour` makes it an all-day date. */
export interface DateComponents {
  year: number;
  month: number;
  day: number;
  hour?: number;
  minute?: number;
  second?: number;
}

export interface ReminderList {
  id: string;
  title: string;
  allowsContentModifications: boolean;
}

export interface ReminderItem {
  id: string | null;
  listId: string;
  title: string | null;
  dueDateComponents: DateComponents | null;
  creationDate: Date | null;
  isCompleted: boolean;
}

export interface OutputRecord {
  title: string | null;
  dueDateHumanReadable?: string;
  dueDateEpoch?: number;
  creationDate?: number;
}

export class RemindersError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1,
  ) {
    super(message);
    this.name = 'RemindersError';
  }
}
