import { isBefore } from 'date-fns';
import type { Predicate, RemoteItem } from './types.js';

export const alwaysTrue: Predicate<RemoteItem> = () => true;

/** Items without a concrete time never qualify. */
export function occursBefore(cutoff: Date): Predicate<RemoteItem> {
  return (item) => item.occursAt !== null && isBefore(item.occursAt, cutoff);
}

export function occursInPast(now: Date = new Date()): Predicate<RemoteItem> {
  return occursBefore(now);
}
