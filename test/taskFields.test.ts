import { describe, expect, it } from 'vitest';
import { InvalidRemoteDataError, UnsupportedRecurrenceError } from '../src/errors.js';
import {
  toLocalDate,
  toLocalDue,
  toLocalPriority,
  toLocalRecur,
  toRecur,
  toTaskDate,
} from '../src/task-fields.js';

describe('priority', () => {
  it('maps the Todoist scale onto H/M/L with 1 as none', () => {
    expect(toLocalPriority(1)).toBeUndefined();
    expect(toLocalPriority(2)).toBe('L');
    expect(toLocalPriority(3)).toBe('M');
    expect(toLocalPriority(4)).toBe('H');
    expect(toLocalPriority(9)).toBeUndefined();
  });
});

describe('dates', () => {
  it('renders Taskwarrior compact UTC dates', () => {
    expect(toTaskDate(new Date('2026-02-10T09:15:42.000Z'))).toBe('20260210T091542Z');
  });

  it('keeps absolute timestamps absolute', () => {
    expect(toLocalDate('2026-01-05T08:30:00Z')).toBe('20260105T083000Z');
    expect(toLocalDate('2026-01-05T10:30:00+02:00')).toBe('20260105T083000Z');
  });

  it('treats date-only and floating values as local time', () => {
    expect(toLocalDate('2026-02-10')).toBe(toTaskDate(new Date(2026, 1, 10)));
    expect(toLocalDate('2026-02-10T09:00:00')).toBe(toTaskDate(new Date(2026, 1, 10, 9, 0, 0)));
  });

  it('rejects unparseable dates', () => {
    expect(() => toLocalDate('someday')).toThrow(InvalidRemoteDataError);
  });

  it('has no due date without a due specification', () => {
    expect(toLocalDue(undefined)).toBeUndefined();
    expect(toLocalDue({ string: 'Feb 10', date: '2026-02-10T12:00:00Z', isRecurring: false })).toBe('20260210T120000Z');
  });
});

describe('recurrence', () => {
  it.each([
    ['every day', 'daily'],
    ['Every  Day', 'daily'],
    ['daily', 'daily'],
    ['every week', 'weekly'],
    ['every month', 'monthly'],
    ['every year', 'yearly'],
    ['annually', 'yearly'],
    ['every hour', 'hourly'],
    ['every other day', '2days'],
    ['every other week', 'biweekly'],
    ['every other month', 'bimonthly'],
    ['every other year', 'biannual'],
    ['every 3 days', '3days'],
    ['every 2 weeks', '2weeks'],
    ['every 6 months', '6months'],
    ['every 4 hours', '4hours'],
    ['every 1 week', 'weekly'],
    ['every quarter', 'quarterly'],
    ['every weekday', 'weekdays'],
    ['every workday', 'weekdays'],
    ['every monday', 'weekly'],
    ['every fri', 'weekly'],
    ['every 15th', 'monthly'],
    ['every 1st', 'monthly'],
    ['every day at 9am', 'daily'],
    ['every 2 weeks at 10:00', '2weeks'],
    ['every monday at 9:30 pm', 'weekly'],
    ['every day at noon', 'daily'],
  ])('%s -> %s', (input, expected) => {
    expect(toRecur(input)).toBe(expected);
  });

  it.each([
    'every! day',
    'every mon, fri',
    'every 2nd monday',
    'every day until jun 1',
    'every day at 9am until dec 31',
    'every monday at 10am for 4 weeks',
    'every day at 8pm starting jan 5',
    'every 0 days',
    'every 32nd',
    'tomorrow',
  ])('rejects %s', (input) => {
    expect(() => toRecur(input)).toThrow(UnsupportedRecurrenceError);
  });

  it('carries the raw string on the error', () => {
    try {
      toRecur('every mon, fri');
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(UnsupportedRecurrenceError);
      expect(e instanceof UnsupportedRecurrenceError && e.raw).toBe('every mon, fri');
    }
  });

  it('only parses recurring due specifications', () => {
    expect(toLocalRecur(undefined)).toBeUndefined();
    expect(toLocalRecur({ string: 'every day', date: '2026-02-10', isRecurring: false })).toBeUndefined();
    expect(toLocalRecur({ string: 'every day', date: '2026-02-10', isRecurring: true })).toBe('daily');
  });
});
