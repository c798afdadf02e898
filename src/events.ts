// src/events.ts
import { format } from 'date-fns';
import type { calendar_v3 } from 'googleapis';
import type { DeleteOutcome, PurgeDecision, RemoteItem } from './purge/types.js';

export interface CalendarItem extends RemoteItem {
  summary: string;
  startsAt: Date | null;
  /** Series master carrying recurrence rules (not a single instance). */
  recurring: boolean;
}

// RFC 5545 UNTIL, e.g. UNTIL=20170317T083000Z or UNTIL=20170317
const UNTIL_RE = /UNTIL=(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})Z?)?/;

/** Timed events carry `dateTime`; all-day events a `date`, read as UTC midnight. */
export function parseEventDate(value?: calendar_v3.Schema$EventDateTime | null): Date | null {
  const raw = value?.dateTime ?? (value?.date ? `${value.date}T00:00:00Z` : null);
  if (!raw) return null;
  const date = new Date(raw);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Earliest UNTIL bound across the RRULE lines, or null when the series never ends. */
export function recurrenceUntil(rules: string[]): Date | null {
  let earliest: Date | null = null;
  for (const rule of rules) {
    if (!rule.includes('RRULE')) continue;
    const m = UNTIL_RE.exec(rule);
    if (!m) continue;
    const [, y, mo, d, h = '0', mi = '0', s = '0'] = m;
    const until = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)));
    if (!earliest || until < earliest) earliest = until;
  }
  return earliest;
}

/**
 * Map an API event to a purgeable item.
 * Returns null for events without an id, which cannot be deleted.
 */
export function toCalendarItem(event: calendar_v3.Schema$Event): CalendarItem | null {
  if (!event.id) return null;

  const rules = event.recurrence ?? [];
  const recurring = rules.length > 0;

  return {
    id: event.id,
    occursAt: recurring ? recurrenceUntil(rules) : parseEventDate(event.end),
    summary: (event.summary ?? '').trim(),
    startsAt: parseEventDate(event.start),
    recurring,
  };
}

const RESULT_LABELS: Record<PurgeDecision, string> = {
  kept: 'KEPT',
  deletedOk: 'DELETED',
  deleteFailed: 'FAILED',
  skippedDryRun: 'SIMULATED',
};

export function describeDecision(item: CalendarItem, decision: PurgeDecision, outcome?: DeleteOutcome): string {
  const label = outcome === 'alreadyGone' ? 'ALREADY DELETED' : RESULT_LABELS[decision];
  const when = item.startsAt ? format(item.startsAt, 'yyyy-MM-dd HH:mm') : '(no date)';
  const tag = item.recurring ? '[Recurring event] - ' : '';
  return `${label} - ${when} - ${tag}${item.summary}`;
}
