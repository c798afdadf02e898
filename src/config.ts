// src/config.ts
import { ConfigError } from './errors.js';
import type { SendUpdates } from './calendar.js';
import { EnvSchema } from './validation/config.js';

export interface AppConfig {
  credentialsPath: string;
  tokenPath: string;
  clientId?: string;
  clientSecret?: string;
  calendarId: string;
  /** Lower bound of the listing window. */
  timeMin: Date;
  pageSize: number;
  deleteDelayMs: number;
  sendUpdates: SendUpdates;
}

/** Read settings from the environment (after dotenv has loaded `.env`). */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const flat = parsed.error.flatten();
    const details = Object.entries(flat.fieldErrors)
      .map(([key, errors]) => `${key}: ${(errors ?? []).join(', ')}`)
      .concat(flat.formErrors);
    throw new ConfigError(`Invalid configuration (${details.join('; ')})`, flat.fieldErrors);
  }

  const v = parsed.data;
  return {
    credentialsPath: v.GOOGLE_CREDENTIALS_PATH,
    tokenPath: v.GOOGLE_TOKEN_PATH,
    clientId: v.GOOGLE_CLIENT_ID,
    clientSecret: v.GOOGLE_CLIENT_SECRET,
    calendarId: v.CALENDAR_ID,
    timeMin: v.PURGE_TIME_MIN,
    pageSize: v.PURGE_PAGE_SIZE,
    deleteDelayMs: v.PURGE_DELETE_DELAY_MS,
    sendUpdates: v.PURGE_SEND_UPDATES,
  };
}
