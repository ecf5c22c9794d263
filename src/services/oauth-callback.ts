/**
 * Local listener for the OAuth2 redirect
 * Receives the authorization code after the user grants access in a browser
 */

import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Result } from '../types/index.js';
import { DEFAULT_OAUTH_CALLBACK_TIMEOUT_MS } from '../config.js';
import { debug } from '../utils/logger.js';

/**
 * Page shown in the browser after a successful redirect
 */
export const SUCCESS_MESSAGE = 'Authentication successful! You can close this browser tab.';

interface CallbackQuery {
  code?: string;
  error?: string;
  state?: string;
}

export interface WaitForCodeOptions {
  /** Value sent as `state` in the authorization URL; redirects must echo it */
  state: string;
  /** Give up after this many milliseconds */
  timeoutMs?: number;
  /** Interface to bind (default: localhost) */
  host?: string;
  /** Called with the listening address once the server is up */
  onListen?: (address: string) => void;
}

/**
 * Builds the callback server without listening
 * The first redirect to `/` is reported through `onResult`. A redirect whose
 * `state` differs from `expectedState` is reported as a failure, so a code
 * from another authorization request is never accepted.
 */
export function buildCallbackServer(
  expectedState: string,
  onResult: (result: Result<string, Error>) => void
): FastifyInstance {
  const server = Fastify({ logger: false });

  server.get<{ Querystring: CallbackQuery }>('/', async (request, reply) => {
    const { code, error: oauthError, state } = request.query;

    if (state !== expectedState) {
      onResult({ ok: false, error: new Error('OAuth2 redirect state does not match the authorization request') });
      return reply.code(400).type('text/plain').send('Authentication failed: state mismatch');
    }

    if (oauthError) {
      onResult({ ok: false, error: new Error(`Authorization was not granted: ${oauthError}`) });
      return reply.code(400).type('text/plain').send(`Authentication failed: ${oauthError}`);
    }

    if (!code) {
      onResult({ ok: false, error: new Error('OAuth2 redirect did not include an authorization code') });
      return reply.code(400).type('text/plain').send('Authentication failed: missing authorization code');
    }

    onResult({ ok: true, value: code });
    return reply.type('text/plain').send(SUCCESS_MESSAGE);
  });

  return server;
}

/**
 * Listens on the callback port until the browser redirect arrives
 *
 * @param port - Local port registered as the OAuth2 redirect URI
 * @returns The authorization code
 * @throws If the port cannot be bound, access is denied, the state does not
 *   match, or the wait times out
 */
export async function waitForAuthorizationCode(
  port: number,
  options: WaitForCodeOptions
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_OAUTH_CALLBACK_TIMEOUT_MS;

  let settle: (result: Result<string, Error>) => void = () => undefined;
  const outcome = new Promise<Result<string, Error>>(resolve => {
    settle = resolve;
  });

  const server = buildCallbackServer(options.state, result => settle(result));
  let address: string;
  try {
    address = await server.listen({ port, host: options.host ?? 'localhost' });
  } catch (err) {
    await server.close();
    throw err;
  }
  debug('OAuth2 callback listener started', { module: 'oauth-callback', address });
  options.onListen?.(address);

  const timer = setTimeout(() => {
    settle({
      ok: false,
      error: new Error(`Timed out after ${timeoutMs} ms waiting for the OAuth2 redirect`),
    });
  }, timeoutMs);

  try {
    const result = await outcome;
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  } finally {
    clearTimeout(timer);
    await server.close();
  }
}
