// src/calendar.ts
import { setTimeout as sleep } from 'timers/promises';
import { google, type Auth, type calendar_v3 } from 'googleapis';
import { z } from 'zod';
import { DeleteError } from './errors.js';
import { toCalendarItem, type CalendarItem } from './events.js';
import type { DeleteItem, DeleteOutcome, FetchPage, Page, Result } from './purge/types.js';

/** The slice of `calendar.events` the purge needs. Inject a fake for testing. */
export interface EventsApi {
  list(params: calendar_v3.Params$Resource$Events$List): Promise<{ data: calendar_v3.Schema$Events }>;
  get(params: calendar_v3.Params$Resource$Events$Get): Promise<{ data: calendar_v3.Schema$Event }>;
  delete(params: calendar_v3.Params$Resource$Events$Delete): Promise<unknown>;
}

export type SendUpdates = 'all' | 'externalOnly' | 'none';

export interface CalendarSourceOptions {
  calendarId: string;
  timeMin: Date;
  timeMax: Date;
  pageSize: number;
  /** Pause before every delete request, to stay under the API rate limit. */
  deleteDelayMs: number;
  sendUpdates: SendUpdates;
}

export interface CalendarSource {
  fetchPage: FetchPage<CalendarItem>;
  deleteItem: DeleteItem;
}

// googleapis errors carry the HTTP status in `code` and/or `response.status`
const httpErrorShape = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  status: z.number().optional(),
  response: z.object({ status: z.number() }).optional(),
});

export function httpStatus(err: unknown): number | undefined {
  const parsed = httpErrorShape.safeParse(err);
  if (!parsed.success) return undefined;
  const { code, status, response } = parsed.data;
  if (response) return response.status;
  if (status !== undefined) return status;
  const numeric = Number(code);
  return Number.isInteger(numeric) ? numeric : undefined;
}

/** 404 Not Found / 410 Gone: the event no longer exists, e.g. removed along with its series. */
function isGone(err: unknown): boolean {
  const status = httpStatus(err);
  return status === 404 || status === 410;
}

export function createEventsApi(auth: Auth.OAuth2Client): EventsApi {
  return google.calendar({ version: 'v3', auth }).events;
}

/**
 * Expose one calendar as the purge capabilities.
 * Series masters are fetched the first time one of their instances shows up
 * and emitted right before it, so a finished series goes away with its instances.
 */
export function createCalendarSource(events: EventsApi, options: CalendarSourceOptions): CalendarSource {
  const { calendarId, sendUpdates } = options;
  const seenMasters = new Set<string>();

  async function fetchMaster(masterId: string): Promise<CalendarItem | null> {
    try {
      const { data } = await events.get({ calendarId, eventId: masterId });
      if (data.status === 'cancelled') return null;
      return toCalendarItem(data);
    } catch (e) {
      if (isGone(e)) return null;
      throw e;
    }
  }

  async function fetchPage(token?: string): Promise<Page<CalendarItem>> {
    const { data } = await events.list({
      calendarId,
      timeMin: options.timeMin.toISOString(),
      timeMax: options.timeMax.toISOString(),
      maxResults: options.pageSize,
      singleEvents: true,
      orderBy: 'startTime',
      pageToken: token,
    });

    const items: CalendarItem[] = [];
    for (const event of data.items ?? []) {
      const masterId = event.recurringEventId;
      if (masterId && !seenMasters.has(masterId)) {
        seenMasters.add(masterId);
        const master = await fetchMaster(masterId);
        if (master) items.push(master);
      }

      const item = toCalendarItem(event);
      if (item) items.push(item);
    }

    return { items, nextPageToken: data.nextPageToken ?? undefined };
  }

  async function deleteItem(id: string): Promise<Result<DeleteOutcome, DeleteError>> {
    if (options.deleteDelayMs > 0) await sleep(options.deleteDelayMs);
    try {
      await events.delete({ calendarId, eventId: id, sendUpdates });
    } catch (e) {
      if (isGone(e)) return { ok: true, value: 'alreadyGone' };
      return { ok: false, error: DeleteError.from(id, e) };
    }
    return { ok: true, value: 'deleted' };
  }

  return { fetchPage, deleteItem };
}
