/**
 * Google OAuth2 authentication (installed-app flow)
 * Uses googleapis' OAuth2 client with a persistent token cache
 *
 * Flow:
 * 1. Require client_secrets.json in the config directory
 * 2. Cached token still valid -> reuse it
 * 3. Cached token expired but has a refresh token -> refresh once
 * 4. Otherwise -> interactive browser flow on the local callback port
 * 5. Persist the new token for the next run
 */

import { randomBytes } from 'crypto';
import { readFile } from 'fs/promises';
import { Auth, google } from 'googleapis';
import { getConfig, SHEETS_SCOPES } from '../config.js';
import type { Config } from '../config.js';
import type { ClientSecrets, Result, SheetsError, StoredCredentials } from '../types/index.js';
import { FileCredentialStore } from './credential-store.js';
import type { CredentialStore } from './credential-store.js';
import { waitForAuthorizationCode } from './oauth-callback.js';
import {
  missingClientSecretsError,
  tokenRefreshFailedError,
  authorizationFailedError,
} from './sheets-errors.js';
import { debug, info, warn } from '../utils/logger.js';

export interface AuthorizeOptions {
  /** Defaults to getConfig() */
  config?: Config;
  /** Defaults to a file store at config.tokenPath */
  store?: CredentialStore;
  /** Clock used for token expiry checks, epoch milliseconds */
  now?: () => number;
}

/**
 * Parses the JSON downloaded from Google Cloud Console
 * Accepts both "installed" (desktop) and "web" client types
 *
 * @returns Client identity, or null when the JSON has the wrong shape
 */
export function parseClientSecrets(raw: string): ClientSecrets | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null) return null;

  const block = 'installed' in parsed ? parsed.installed : 'web' in parsed ? parsed.web : undefined;
  if (typeof block !== 'object' || block === null) return null;

  const clientId = 'client_id' in block ? block.client_id : undefined;
  const clientSecret = 'client_secret' in block ? block.client_secret : undefined;
  if (typeof clientId !== 'string' || !clientId || typeof clientSecret !== 'string' || !clientSecret) {
    return null;
  }

  return { clientId, clientSecret };
}

/**
 * Loads client_secrets.json from the config directory
 */
async function loadClientSecrets(config: Config): Promise<Result<ClientSecrets, SheetsError>> {
  let raw: string;
  try {
    raw = await readFile(config.clientSecretsPath, 'utf-8');
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      return { ok: false, error: missingClientSecretsError(config.clientSecretsPath) };
    }
    return { ok: false, error: authorizationFailedError(err, config.oauthCallbackPort) };
  }

  const secrets = parseClientSecrets(raw);
  if (!secrets) {
    return {
      ok: false,
      error: authorizationFailedError(
        new Error(`Malformed client secrets file: ${config.clientSecretsPath}`),
        config.oauthCallbackPort
      ),
    };
  }

  return { ok: true, value: secrets };
}

/**
 * Redirect URI registered with the local callback listener
 */
export function getRedirectUri(port: number): string {
  return `http://localhost:${port}/`;
}

/**
 * Tokens this close to expiry are refreshed up front
 * Same window google-auth-library uses for its eager refresh
 */
export const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/**
 * Checks whether a cached token can be used without refreshing
 * A token without an expiry date is treated as valid
 */
export function isCredentialValid(credentials: StoredCredentials, now: number): boolean {
  if (!credentials.access_token) return false;
  if (credentials.expiry_date === undefined || credentials.expiry_date === null) return true;
  return credentials.expiry_date - TOKEN_EXPIRY_MARGIN_MS > now;
}

/**
 * Refreshes an expired token once
 */
async function refreshCredentials(
  client: Auth.OAuth2Client,
  stored: StoredCredentials,
  store: CredentialStore
): Promise<Result<StoredCredentials, SheetsError>> {
  info('Refreshing expired credentials...', { module: 'google-auth', phase: 'refresh' });
  client.setCredentials(stored);

  try {
    // Refreshes because the access token is missing or expiring
    await client.getAccessToken();
  } catch (err) {
    return { ok: false, error: tokenRefreshFailedError(err, store.describe()) };
  }

  return { ok: true, value: client.credentials };
}

/**
 * Runs the browser-based authorization flow
 * The browser is not opened automatically: the URL is logged so it can be
 * opened on a local machine with the callback port forwarded over SSH
 */
async function runInteractiveAuthorization(
  client: Auth.OAuth2Client,
  config: Config
): Promise<Result<StoredCredentials, SheetsError>> {
  const port = config.oauthCallbackPort;

  try {
    const state = randomBytes(32).toString('hex');
    const { codeVerifier, codeChallenge } = await client.generateCodeVerifierAsync();
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: SHEETS_SCOPES,
      state,
      code_challenge: codeChallenge,
      code_challenge_method: Auth.CodeChallengeMethod.S256,
    });

    info([
      '',
      '='.repeat(70),
      'OAUTH2 AUTHENTICATION REQUIRED',
      '='.repeat(70),
      '',
      'SSH PORT FORWARDING REQUIRED!',
      'If not already done, reconnect with:',
      `  ssh -L ${port}:localhost:${port} user@server`,
      '',
      'Copy this URL and open it in your LOCAL browser:',
      '',
      authUrl,
      '',
      'Waiting for authentication...',
    ].join('\n'), { module: 'google-auth', phase: 'interactive' });

    const code = await waitForAuthorizationCode(port, { state, timeoutMs: config.oauthCallbackTimeoutMs });
    const { tokens } = await client.getToken({ code, codeVerifier });
    client.setCredentials(tokens);
    return { ok: true, value: tokens };
  } catch (err) {
    return { ok: false, error: authorizationFailedError(err, port) };
  }
}

/**
 * Writes tokens the client refreshes on its own back to the store
 * Refresh responses omit the refresh token, so they are merged into the last
 * persisted record
 */
function persistRefreshedTokens(
  client: Auth.OAuth2Client,
  store: CredentialStore,
  initial: StoredCredentials
): void {
  let persisted = initial;
  client.on('tokens', (tokens: Auth.Credentials) => {
    persisted = { ...persisted, ...tokens };
    store.write(persisted)
      .then(() => debug('Refreshed credentials saved', { module: 'google-auth', store: store.describe() }))
      .catch((err: unknown) => {
        warn('Failed to save refreshed credentials', {
          module: 'google-auth',
          error: err instanceof Error ? err.message : String(err),
        });
      });
  });
}

/**
 * Returns an authorized OAuth2 client for the Sheets API
 *
 * @returns The client, or a SheetsError of kind missing_client_secrets,
 *   token_refresh_failed or authorization_failed
 */
export async function authorize(
  options: AuthorizeOptions = {}
): Promise<Result<Auth.OAuth2Client, SheetsError>> {
  const config = options.config ?? getConfig();
  const store = options.store ?? new FileCredentialStore(config.tokenPath);
  const now = options.now ?? Date.now;

  const secretsResult = await loadClientSecrets(config);
  if (!secretsResult.ok) {
    return secretsResult;
  }

  const { clientId, clientSecret } = secretsResult.value;
  const client = new google.auth.OAuth2(clientId, clientSecret, getRedirectUri(config.oauthCallbackPort));

  const stored = await store.read();
  let credentials: StoredCredentials;

  if (stored && isCredentialValid(stored, now())) {
    debug('Using cached credentials', { module: 'google-auth', store: store.describe() });
    client.setCredentials(stored);
    credentials = stored;
  } else {
    const result = stored?.refresh_token
      ? await refreshCredentials(client, stored, store)
      : await runInteractiveAuthorization(client, config);
    if (!result.ok) {
      return result;
    }

    await store.write(result.value);
    info(`Credentials saved to ${store.describe()}`, { module: 'google-auth' });
    credentials = result.value;
  }

  persistRefreshedTokens(client, store, credentials);

  info('Google Sheets authentication successful!', { module: 'google-auth' });
  return { ok: true, value: client };
}
