import type { DeleteError } from '../errors.js';

/** A resource owned by the remote service. Only read, never mutated. */
export interface RemoteItem {
  id: string;
  /** When the item happens; null for items without a concrete time. */
  occursAt: Date | null;
}

export interface Page<T extends RemoteItem = RemoteItem> {
  items: T[];
  /** Absent (or empty) on the last page. */
  nextPageToken?: string;
}

export type PurgeDecision = 'kept' | 'deletedOk' | 'deleteFailed' | 'skippedDryRun';

export type PurgeCounts = Record<PurgeDecision, number>;

export type PurgeReport = Readonly<PurgeCounts> & {
  /** Pages fetched, including a partially processed one when cancelled. */
  readonly pages: number;
  readonly cancelled: boolean;
};

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export type Predicate<T extends RemoteItem = RemoteItem> = (item: T) => boolean;

export type FetchPage<T extends RemoteItem = RemoteItem> = (token?: string) => Promise<Page<T>>;

/** `alreadyGone`: the service no longer had the item, so nothing was removed by this call. */
export type DeleteOutcome = 'deleted' | 'alreadyGone';

export type DeleteItem = (id: string) => Promise<Result<DeleteOutcome, DeleteError>>;
