import { z } from 'zod';

const isoDay = z.string().date();

export const EnvSchema = z.object({
  GOOGLE_CREDENTIALS_PATH: z.string().min(1).default('credentials.json'),
  GOOGLE_TOKEN_PATH: z.string().min(1).default('token.json'),
  GOOGLE_CLIENT_ID: z.string().min(1).optional(),
  GOOGLE_CLIENT_SECRET: z.string().min(1).optional(),
  CALENDAR_ID: z.string().min(1).default('primary'),
  PURGE_TIME_MIN: isoDay.default('2000-01-01').transform(d => new Date(`${d}T00:00:00Z`)),
  PURGE_PAGE_SIZE: z.coerce.number().int().min(1).max(2500).default(100),
  PURGE_DELETE_DELAY_MS: z.coerce.number().int().min(0).default(100),
  PURGE_SEND_UPDATES: z.enum(['all', 'externalOnly', 'none']).default('none'),
}).refine(v => !v.GOOGLE_CLIENT_ID === !v.GOOGLE_CLIENT_SECRET, {
  message: 'GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set together',
  path: ['GOOGLE_CLIENT_SECRET'],
});

export type Env = z.infer<typeof EnvSchema>;
