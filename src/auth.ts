// src/auth.ts
import { readFile, writeFile } from 'fs/promises';
import express from 'express';
import { google, type Auth } from 'googleapis';
import { AuthError } from './errors.js';
import { validateQuery } from './middlewares/validate.js';
import {
  CallbackQuerySchema,
  ClientSecretsFileSchema,
  StoredTokenSchema,
} from './validation/oauth.js';

// If modifying these scopes, delete the stored token file.
export const SCOPES = ['https://www.googleapis.com/auth/calendar.events'];

const CALLBACK_PATH = '/oauth2callback';

/** The part of `OAuth2Client` a consent flow needs. */
export interface ConsentClient {
  generateAuthUrl(opts: { access_type?: string; prompt?: string; scope?: string[]; redirect_uri?: string }): string;
  getToken(opts: { code: string; redirect_uri?: string }): Promise<{ tokens: Auth.Credentials }>;
}

/** Obtains tokens interactively for `client`; gives up with an AuthError once `signal` aborts. */
export type ConsentFlow = (client: ConsentClient, scopes: string[], signal?: AbortSignal) => Promise<Auth.Credentials>;

export interface AuthorizeOptions {
  credentialsPath: string;
  tokenPath: string;
  clientId?: string;
  clientSecret?: string;
  consent?: ConsentFlow;
  signal?: AbortSignal;
}

interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function resolveClientSecrets(opts: AuthorizeOptions): Promise<ClientSecrets> {
  if (opts.clientId && opts.clientSecret) {
    return { clientId: opts.clientId, clientSecret: opts.clientSecret };
  }

  let raw: string;
  try {
    raw = await readFile(opts.credentialsPath, 'utf8');
  } catch (err) {
    const hint = isMissingFile(err) ? 'not found' : 'unreadable';
    throw new AuthError(`OAuth client credentials ${hint} at ${opts.credentialsPath}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new AuthError(`OAuth client credentials at ${opts.credentialsPath} are not valid JSON`, { cause: err });
  }

  const parsed = ClientSecretsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new AuthError(`OAuth client credentials at ${opts.credentialsPath} have an unexpected shape`, {
      cause: parsed.error,
    });
  }
  const block = 'installed' in parsed.data ? parsed.data.installed : parsed.data.web;
  return { clientId: block.client_id, clientSecret: block.client_secret };
}

/** Stored tokens, or null when there is no usable file. */
export async function readStoredToken(tokenPath: string): Promise<Auth.Credentials | null> {
  let raw: string;
  try {
    raw = await readFile(tokenPath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    console.warn(`[auth] cannot read ${tokenPath}, ignoring it:`, err);
    return null;
  }

  try {
    const parsed = StoredTokenSchema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
    console.warn(`[auth] ${tokenPath} has an unexpected shape, ignoring it`);
  } catch (err) {
    console.warn(`[auth] ${tokenPath} is not valid JSON, ignoring it:`, err);
  }
  return null;
}

export async function saveToken(tokenPath: string, tokens: Auth.Credentials): Promise<void> {
  await writeFile(tokenPath, JSON.stringify(tokens, null, 2), { mode: 0o600 });
}

/**
 * Default consent flow: serve a loopback redirect URI on an ephemeral port,
 * print the authorization URL and exchange the returned code for tokens.
 */
export const runLocalConsent: ConsentFlow = (client, scopes, signal) =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AuthError('Authorization was interrupted'));
      return;
    }

    const app = express();
    let redirectUri = '';

    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        finish(() => reject(new AuthError('OAuth callback server has no TCP address')));
        return;
      }
      redirectUri = `http://127.0.0.1:${address.port}${CALLBACK_PATH}`;
      const url = client.generateAuthUrl({
        access_type: 'offline',
        prompt: 'consent',
        scope: scopes,
        redirect_uri: redirectUri,
      });
      console.log(`[auth] Authorize this app by visiting this url:\n\n${url}\n`);
    });

    const onAbort = () => finish(() => reject(new AuthError('Authorization was interrupted')));
    signal?.addEventListener('abort', onAbort, { once: true });

    server.on('error', (err) =>
      finish(() => reject(new AuthError('Could not start the OAuth callback server', { cause: err }))),
    );

    const finish = (outcome: () => void) => {
      signal?.removeEventListener('abort', onAbort);
      server.close();
      outcome();
    };

    app.get(
      CALLBACK_PATH,
      validateQuery(CallbackQuerySchema, (query, _req, res) => {
        // the server is closed after this reply, so the browser must not keep the socket
        res.set('Connection', 'close');
        if (query.error || !query.code) {
          res.status(400).send('Authorization was denied. You can close this window.');
          finish(() => reject(new AuthError(`Authorization was denied: ${query.error ?? 'no code returned'}`)));
          return;
        }

        client
          .getToken({ code: query.code, redirect_uri: redirectUri })
          .then(({ tokens }) => {
            res.send('Authorization complete. You can close this window.');
            finish(() => resolve(tokens));
          })
          .catch((err: unknown) => {
            res.status(500).send('Token exchange failed. Check the terminal.');
            finish(() => reject(new AuthError('Token exchange failed', { cause: err })));
          });
      }),
    );
  });

/**
 * Return an OAuth2 client ready to call the Calendar API.
 * Reuses the stored refresh token when it still works, otherwise asks for consent
 * and stores the new tokens. Refreshed tokens are written back as they arrive.
 */
export async function authorize(opts: AuthorizeOptions): Promise<Auth.OAuth2Client> {
  const secrets = await resolveClientSecrets(opts);
  const client = new google.auth.OAuth2(secrets.clientId, secrets.clientSecret);

  // writes are chained so a refresh never races the initial save
  let writes = Promise.resolve();
  const persist = (tokens: Auth.Credentials) => {
    const save = () => saveToken(opts.tokenPath, tokens);
    writes = writes.then(save, save);
    return writes;
  };

  client.on('tokens', (tokens) => {
    persist({ ...client.credentials, ...tokens }).catch((err: unknown) => {
      console.error(`[auth] failed to persist refreshed tokens to ${opts.tokenPath}:`, err);
    });
  });

  const stored = await readStoredToken(opts.tokenPath);
  if (stored?.refresh_token) {
    client.setCredentials(stored);
    try {
      await client.getAccessToken();
      return client;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`[auth] stored token was rejected (${reason}), asking for consent again`);
    }
  }

  const consent = opts.consent ?? runLocalConsent;
  let tokens: Auth.Credentials;
  try {
    tokens = await consent(client, SCOPES, opts.signal);
  } catch (err) {
    if (err instanceof AuthError) throw err;
    throw new AuthError('Authorization was not granted', { cause: err });
  }

  client.setCredentials(tokens);
  await persist(tokens);
  console.log(`[auth] token stored in ${opts.tokenPath}`);
  return client;
}
