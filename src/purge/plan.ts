import { alwaysTrue, occursInPast } from './predicates.js';
import type { Predicate, RemoteItem } from './types.js';

/** Upper bound of the listing window when future events are purged too. */
export const FAR_FUTURE = new Date('3000-01-01T00:00:00Z');

export interface PurgeFlags {
  confirmDelete: boolean;
  deleteAll: boolean;
  calendarId?: string;
}

export interface PurgePlan {
  dryRun: boolean;
  predicate: Predicate<RemoteItem>;
  /** Listing window passed to the provider. */
  timeMin: Date;
  timeMax: Date;
}

export function planPurge(flags: PurgeFlags, timeMin: Date, now: Date): PurgePlan {
  return {
    dryRun: !flags.confirmDelete,
    predicate: flags.deleteAll ? alwaysTrue : occursInPast(now),
    timeMin,
    timeMax: flags.deleteAll ? FAR_FUTURE : now,
  };
}
