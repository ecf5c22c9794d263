/**
 * Unit tests for the OAuth2 callback listener
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Result } from '../types/index.js';

vi.mock('../utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

import { buildCallbackServer, waitForAuthorizationCode, SUCCESS_MESSAGE } from './oauth-callback.js';

const STATE = 'test-state';

describe('buildCallbackServer', () => {
  let server: FastifyInstance;
  let results: Result<string, Error>[];

  beforeEach(async () => {
    results = [];
    server = buildCallbackServer(STATE, result => results.push(result));
    await server.ready();
  });

  afterEach(async () => {
    await server.close();
  });

  it('reports the authorization code and shows the success page', async () => {
    const response = await server.inject({ method: 'GET', url: `/?code=test-code&state=${STATE}&scope=x` });

    expect(response.statusCode).toBe(200);
    expect(response.body).toBe(SUCCESS_MESSAGE);
    expect(results).toEqual([{ ok: true, value: 'test-code' }]);
  });

  it('reports a denied authorization', async () => {
    const response = await server.inject({ method: 'GET', url: `/?error=access_denied&state=${STATE}` });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('Authentication failed: access_denied');
    expect(results).toHaveLength(1);
    const [result] = results;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Authorization was not granted: access_denied');
    }
  });

  it('reports a redirect without a code', async () => {
    const response = await server.inject({ method: 'GET', url: `/?state=${STATE}` });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('Authentication failed: missing authorization code');
    const [result] = results;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('OAuth2 redirect did not include an authorization code');
    }
  });

  it('rejects a code whose state does not match', async () => {
    const response = await server.inject({ method: 'GET', url: '/?code=injected-code&state=forged' });

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('Authentication failed: state mismatch');
    expect(results).toHaveLength(1);
    const [result] = results;
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('OAuth2 redirect state does not match the authorization request');
    }
  });

  it('rejects a code without state', async () => {
    const response = await server.inject({ method: 'GET', url: '/?code=injected-code' });

    expect(response.statusCode).toBe(400);
    expect(results.map(result => result.ok)).toEqual([false]);
  });

  it('does not report requests to other paths', async () => {
    const response = await server.inject({ method: 'GET', url: '/favicon.ico' });

    expect(response.statusCode).toBe(404);
    expect(results).toEqual([]);
  });
});

describe('waitForAuthorizationCode', () => {
  it('resolves with the code from the first redirect', async () => {
    const code = await waitForAuthorizationCode(0, {
      state: STATE,
      host: '127.0.0.1',
      timeoutMs: 5000,
      onListen: address => {
        fetch(`${address}/?code=test-code&state=${STATE}`).catch(() => undefined);
      },
    });

    expect(code).toBe('test-code');
  });

  it('rejects when the user denies access', async () => {
    await expect(
      waitForAuthorizationCode(0, {
        state: STATE,
        host: '127.0.0.1',
        timeoutMs: 5000,
        onListen: address => {
          fetch(`${address}/?error=access_denied&state=${STATE}`).catch(() => undefined);
        },
      })
    ).rejects.toThrow('Authorization was not granted: access_denied');
  });

  it('rejects a redirect carrying another state', async () => {
    await expect(
      waitForAuthorizationCode(0, {
        state: STATE,
        host: '127.0.0.1',
        timeoutMs: 5000,
        onListen: address => {
          fetch(`${address}/?code=injected-code&state=forged`).catch(() => undefined);
        },
      })
    ).rejects.toThrow('OAuth2 redirect state does not match the authorization request');
  });

  it('rejects after the timeout', async () => {
    await expect(
      waitForAuthorizationCode(0, { state: STATE, host: '127.0.0.1', timeoutMs: 20 })
    ).rejects.toThrow('Timed out after 20 ms waiting for the OAuth2 redirect');
  });

  it('rejects when the port is already in use', async () => {
    const blocker = Fastify({ logger: false });
    await blocker.listen({ port: 0, host: '127.0.0.1' });
    const address = blocker.server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    try {
      await expect(
        waitForAuthorizationCode(port, { state: STATE, host: '127.0.0.1', timeoutMs: 1000 })
      ).rejects.toThrow(/EADDRINUSE/);
    } finally {
      await blocker.close();
    }
  });
});
