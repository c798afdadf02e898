// src/purge/engine.ts
import { DeleteError, TransportError } from '../errors.js';
import type {
  DeleteItem,
  DeleteOutcome,
  FetchPage,
  Page,
  Predicate,
  PurgeCounts,
  PurgeDecision,
  PurgeReport,
  RemoteItem,
  Result,
} from './types.js';

export interface PurgeRunOptions<T extends RemoteItem> {
  fetchPage: FetchPage<T>;
  deleteItem: DeleteItem;
  /** Selects the items eligible for deletion. */
  predicate: Predicate<T>;
  /** When true, eligible items are reported as `skippedDryRun` and nothing is deleted. */
  dryRun: boolean;
  /** Called once per item; `outcome` is set for `deletedOk`, `error` for `deleteFailed`. */
  onDecision?: (item: T, decision: PurgeDecision, error?: DeleteError, outcome?: DeleteOutcome) => void;
  /** Checked between items; an aborted signal ends the run with `cancelled: true`. */
  signal?: AbortSignal;
}

function toReport(counts: PurgeCounts, pages: number, cancelled: boolean): PurgeReport {
  return Object.freeze({ ...counts, pages, cancelled });
}

/**
 * Walk every page of a remote collection, in order, and decide each item once.
 * Per-item delete failures are counted; only a failing page fetch aborts the run.
 */
export async function runPurge<T extends RemoteItem>(options: PurgeRunOptions<T>): Promise<PurgeReport> {
  const { fetchPage, deleteItem, predicate, dryRun, onDecision, signal } = options;
  const counts: PurgeCounts = { kept: 0, deletedOk: 0, deleteFailed: 0, skippedDryRun: 0 };
  let pages = 0;
  let token: string | undefined;

  async function decide(
    item: T,
  ): Promise<{ decision: PurgeDecision; error?: DeleteError; outcome?: DeleteOutcome }> {
    if (!predicate(item)) return { decision: 'kept' };
    if (dryRun) return { decision: 'skippedDryRun' };

    let result: Result<DeleteOutcome, DeleteError>;
    try {
      result = await deleteItem(item.id);
    } catch (err) {
      result = { ok: false, error: DeleteError.from(item.id, err) };
    }
    return result.ok
      ? { decision: 'deletedOk', outcome: result.value }
      : { decision: 'deleteFailed', error: result.error };
  }

  do {
    if (signal?.aborted) return toReport(counts, pages, true);

    let page: Page<T>;
    try {
      page = await fetchPage(token);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TransportError(`Failed to fetch page ${pages + 1}: ${reason}`, toReport(counts, pages, false), {
        cause: err,
      });
    }
    pages++;

    for (const item of page.items) {
      if (signal?.aborted) return toReport(counts, pages, true);
      const { decision, error, outcome } = await decide(item);
      counts[decision]++;
      onDecision?.(item, decision, error, outcome);
    }

    token = page.nextPageToken || undefined;
  } while (token);

  return toReport(counts, pages, false);
}
