/**
 * Field translation from Todoist values to Taskwarrior values.
 *
 * Taskwarrior dates are UTC in the compact form `YYYYMMDDTHHMMSSZ`, the
 * same form `task export` emits and `task import` accepts.
 */

import { InvalidRemoteDataError, UnsupportedRecurrenceError } from './errors.js';
import type { LocalPriority, RemoteDue } from './model.js';

/* ------------------------------------------------------------------ */
/*  Priority                                                           */
/* ------------------------------------------------------------------ */

// Todoist: 1 = natural (none) ... 4 = urgent.
const PRIORITY_MAP: Record<number, LocalPriority> = {
  2: 'L',
  3: 'M',
  4: 'H',
};

export function toLocalPriority(priority: number): LocalPriority | undefined {
  return PRIORITY_MAP[priority];
}

export function isLocalPriority(value: string): value is LocalPriority {
  return value === 'H' || value === 'M' || value === 'L';
}

/* ------------------------------------------------------------------ */
/*  Dates                                                              */
/* ------------------------------------------------------------------ */

export function toTaskDate(d: Date): string {
  return d.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '');
}

/**
 * Parse a Todoist date. Date-only values are local midnight, floating
 * date-times are local time, and values with an offset are absolute.
 */
export function parseRemoteDate(value: string): Date {
  const dateOnly = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  const parsed = dateOnly
    ? new Date(Number(dateOnly[1]), Number(dateOnly[2]) - 1, Number(dateOnly[3]))
    : new Date(value);
  if (!Number.isFinite(parsed.getTime())) throw new InvalidRemoteDataError(`Unparseable date: '${value}'`);
  return parsed;
}

export function toLocalDate(value: string): string {
  return toTaskDate(parseRemoteDate(value));
}

export function toLocalDue(due?: RemoteDue): string | undefined {
  if (!due?.date) return undefined;
  return toLocalDate(due.date);
}

/* ------------------------------------------------------------------ */
/*  Recurrence                                                         */
/* ------------------------------------------------------------------ */

type Unit = 'hour' | 'day' | 'week' | 'month' | 'year';

const EVERY_UNIT: Record<Unit | 'quarter', string> = {
  hour: 'hourly',
  day: 'daily',
  week: 'weekly',
  month: 'monthly',
  year: 'yearly',
  quarter: 'quarterly',
};

const EVERY_OTHER_UNIT: Record<Unit, string> = {
  hour: '2hours',
  day: '2days',
  week: 'biweekly',
  month: 'bimonthly',
  year: 'biannual',
};

const ALIASES: Record<string, string> = {
  hourly: 'hourly',
  daily: 'daily',
  weekly: 'weekly',
  monthly: 'monthly',
  yearly: 'yearly',
  annually: 'yearly',
};

const WEEKDAY_NAMES = new Set([
  'monday', 'mon',
  'tuesday', 'tue', 'tues',
  'wednesday', 'wed',
  'thursday', 'thu', 'thur', 'thurs',
  'friday', 'fri',
  'saturday', 'sat',
  'sunday', 'sun',
]);

function isUnit(s: string): s is Unit {
  return s === 'hour' || s === 'day' || s === 'week' || s === 'month' || s === 'year';
}

/**
 * Translate a Todoist recurrence string ("every 2 weeks") into a Taskwarrior
 * `recur` value ("2weeks"). Throws `UnsupportedRecurrenceError` for anything
 * Taskwarrior cannot express.
 */
export function toRecur(text: string): string {
  const lower = text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, ' ')
    // a trailing time of day lives in the due date
    .replace(/ at (\d{1,2}(:\d{2})? ?(am|pm)?|noon|midnight)$/, '');

  const alias = ALIASES[lower];
  if (alias) return alias;

  const every = lower.match(/^every (.+)$/);
  if (!every?.[1]) throw new UnsupportedRecurrenceError(text);
  const rest = every[1];

  if (isUnit(rest) || rest === 'quarter') return EVERY_UNIT[rest];

  const other = rest.match(/^other (\w+)$/);
  if (other?.[1] && isUnit(other[1])) return EVERY_OTHER_UNIT[other[1]];

  const counted = rest.match(/^(\d+) (\w+?)s?$/);
  if (counted?.[1] && counted[2] && isUnit(counted[2])) {
    const n = Number(counted[1]);
    if (n < 1) throw new UnsupportedRecurrenceError(text);
    return n === 1 ? EVERY_UNIT[counted[2]] : `${n}${counted[2]}s`;
  }

  if (rest === 'weekday' || rest === 'workday') return 'weekdays';
  if (WEEKDAY_NAMES.has(rest)) return 'weekly';

  const dayOfMonth = rest.match(/^(\d{1,2})(?:st|nd|rd|th)$/);
  if (dayOfMonth) {
    const day = Number(dayOfMonth[1]);
    if (day >= 1 && day <= 31) return 'monthly';
  }

  throw new UnsupportedRecurrenceError(text);
}

/** Recurrence of a due specification, or `undefined` when it does not repeat. */
export function toLocalRecur(due?: RemoteDue): string | undefined {
  if (!due?.isRecurring) return undefined;
  return toRecur(due.string);
}
