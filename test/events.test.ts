import { describe, it, expect } from 'vitest';
import { describeDecision, parseEventDate, recurrenceUntil, toCalendarItem } from '../src/events.js';

describe('parseEventDate', () => {
  it('reads timed events with their offset', () => {
    expect(parseEventDate({ dateTime: '2026-01-20T10:00:00+01:00' })?.toISOString()).toBe('2026-01-20T09:00:00.000Z');
  });

  it('reads all-day events as UTC midnight', () => {
    expect(parseEventDate({ date: '2026-01-20' })?.toISOString()).toBe('2026-01-20T00:00:00.000Z');
  });

  it('returns null for missing or malformed values', () => {
    expect(parseEventDate(undefined)).toBeNull();
    expect(parseEventDate({})).toBeNull();
    expect(parseEventDate({ dateTime: 'soon' })).toBeNull();
  });
});

describe('recurrenceUntil', () => {
  it('parses a date-time UNTIL', () => {
    const until = recurrenceUntil(['RRULE:FREQ=WEEKLY;UNTIL=20170317T083000Z;BYDAY=FR']);
    expect(until?.toISOString()).toBe('2017-03-17T08:30:00.000Z');
  });

  it('parses a date-only UNTIL', () => {
    expect(recurrenceUntil(['RRULE:FREQ=DAILY;UNTIL=20240105'])?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  it('picks the earliest bound and ignores other properties', () => {
    const until = recurrenceUntil([
      'EXDATE;TZID=Europe/Paris:20240110T090000',
      'RRULE:FREQ=WEEKLY;UNTIL=20250101T000000Z',
      'RRULE:FREQ=MONTHLY;UNTIL=20240601T120000Z',
    ]);
    expect(until?.toISOString()).toBe('2024-06-01T12:00:00.000Z');
  });

  it('returns null for an unbounded series', () => {
    expect(recurrenceUntil(['RRULE:FREQ=WEEKLY;BYDAY=MO'])).toBeNull();
  });
});

describe('toCalendarItem', () => {
  it('uses the end of a single event as its time', () => {
    const item = toCalendarItem({
      id: 'evt-1',
      summary: '  Standup ',
      start: { dateTime: '2026-01-20T09:00:00Z' },
      end: { dateTime: '2026-01-20T09:15:00Z' },
    });
    expect(item).toEqual({
      id: 'evt-1',
      occursAt: new Date('2026-01-20T09:15:00Z'),
      summary: 'Standup',
      startsAt: new Date('2026-01-20T09:00:00Z'),
      recurring: false,
    });
  });

  it('uses the UNTIL bound of a series master', () => {
    const item = toCalendarItem({
      id: 'series-1',
      recurrence: ['RRULE:FREQ=WEEKLY;UNTIL=20250301T000000Z'],
      start: { dateTime: '2025-01-06T09:00:00Z' },
      end: { dateTime: '2025-01-06T10:00:00Z' },
    });
    expect(item?.occursAt).toEqual(new Date('2025-03-01T00:00:00Z'));
    expect(item?.recurring).toBe(true);
  });

  it('skips events without an id', () => {
    expect(toCalendarItem({ summary: 'ghost' })).toBeNull();
  });
});

describe('describeDecision', () => {
  it('formats a deleted timed event', () => {
    const item = toCalendarItem({ id: 'e', summary: 'Dentist', start: { dateTime: '2024-03-01T09:30:00Z' } });
    expect(item).not.toBeNull();
    if (!item) return;
    expect(describeDecision(item, 'deletedOk')).toBe('DELETED - 2024-03-01 09:30 - Dentist');
  });

  it('tags series masters and events without a date', () => {
    const item = toCalendarItem({ id: 's', summary: 'Yoga', recurrence: ['RRULE:FREQ=WEEKLY'] });
    if (!item) throw new Error('expected an item');
    expect(describeDecision(item, 'skippedDryRun')).toBe('SIMULATED - (no date) - [Recurring event] - Yoga');
  });

  it('labels events the service had already removed', () => {
    const item = toCalendarItem({ id: 'e', summary: 'Dentist', start: { dateTime: '2024-03-01T09:30:00Z' } });
    if (!item) throw new Error('expected an item');
    expect(describeDecision(item, 'deletedOk', 'alreadyGone')).toBe('ALREADY DELETED - 2024-03-01 09:30 - Dentist');
    expect(describeDecision(item, 'deletedOk', 'deleted')).toBe('DELETED - 2024-03-01 09:30 - Dentist');
  });
});
