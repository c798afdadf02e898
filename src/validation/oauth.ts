import { z } from 'zod';

/** Query string Google appends to the loopback redirect URI. */
export const CallbackQuerySchema = z.object({
  code: z.string().min(1).optional(),
  error: z.string().min(1).optional(),
}).refine(v => Boolean(v.code || v.error), {
  message: 'either code or error is required',
  path: ['code'],
});

export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;

const clientBlock = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/** OAuth client file downloaded from the Google Cloud console ("Desktop app" or "Web application"). */
export const ClientSecretsFileSchema = z.union([
  z.object({ installed: clientBlock }),
  z.object({ web: clientBlock }),
]);

export const StoredTokenSchema = z.object({
  access_token: z.string().nullable().optional(),
  refresh_token: z.string().nullable().optional(),
  expiry_date: z.number().nullable().optional(),
  token_type: z.string().nullable().optional(),
  id_token: z.string().nullable().optional(),
  scope: z.string().optional(),
});
