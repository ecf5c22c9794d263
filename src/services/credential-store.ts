/**
 * Persistence for OAuth2 tokens between runs
 * File-backed store for normal use, in-memory store for tests
 */

import { mkdir, readFile, writeFile, rm } from 'fs/promises';
import { dirname } from 'path';
import type { StoredCredentials } from '../types/index.js';
import { warn, debug } from '../utils/logger.js';

/**
 * Read/write/clear access to the cached token
 */
export interface CredentialStore {
  /** Returns the cached token, or null when none is stored */
  read(): Promise<StoredCredentials | null>;
  write(credentials: StoredCredentials): Promise<void>;
  clear(): Promise<void>;
  /** Human-readable location, used in remediation messages */
  describe(): string;
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || value === null || typeof value === 'string';
}

/**
 * Checks that parsed JSON has the shape of a token record
 */
export function isStoredCredentials(value: unknown): value is StoredCredentials {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const record: Record<string, unknown> = { ...value };
  return (
    isOptionalString(record.access_token) &&
    isOptionalString(record.refresh_token) &&
    isOptionalString(record.token_type) &&
    isOptionalString(record.id_token) &&
    (record.scope === undefined || typeof record.scope === 'string') &&
    (record.expiry_date === undefined || record.expiry_date === null || typeof record.expiry_date === 'number')
  );
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Stores the token as JSON in a single file (mode 0600)
 * No locking: concurrent processes may overwrite each other's token
 */
export class FileCredentialStore implements CredentialStore {
  constructor(private readonly path: string) {}

  async read(): Promise<StoredCredentials | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) {
        debug('No cached token found', { module: 'credential-store', path: this.path });
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      warn('Cached token is not valid JSON, ignoring it', { module: 'credential-store', path: this.path });
      return null;
    }

    if (!isStoredCredentials(parsed)) {
      warn('Cached token has an unexpected shape, ignoring it', { module: 'credential-store', path: this.path });
      return null;
    }

    return parsed;
  }

  async write(credentials: StoredCredentials): Promise<void> {
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(credentials, null, 2), { encoding: 'utf-8', mode: 0o600 });
  }

  async clear(): Promise<void> {
    await rm(this.path, { force: true });
  }

  describe(): string {
    return this.path;
  }
}

/**
 * Keeps the token in memory only
 */
export class MemoryCredentialStore implements CredentialStore {
  private credentials: StoredCredentials | null;

  constructor(initial: StoredCredentials | null = null) {
    this.credentials = initial ? { ...initial } : null;
  }

  async read(): Promise<StoredCredentials | null> {
    return this.credentials ? { ...this.credentials } : null;
  }

  async write(credentials: StoredCredentials): Promise<void> {
    this.credentials = { ...credentials };
  }

  async clear(): Promise<void> {
    this.credentials = null;
  }

  describe(): string {
    return 'memory';
  }
}
