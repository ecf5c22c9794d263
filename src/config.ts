/**
 * Configuration management for the sheets table loader
 * All configuration is loaded from environment variables
 */

import { homedir } from 'os';
import { join } from 'path';
import type { LogLevel } from './types/index.js';

/**
 * OAuth scopes requested from Google
 * Read-only: this tool never writes to spreadsheets
 */
export const SHEETS_SCOPES = ['https://www.googleapis.com/auth/spreadsheets.readonly'];

/**
 * File names inside the config directory
 */
export const CLIENT_SECRETS_FILE = 'client_secrets.json';
export const TOKEN_FILE = 'token.json';

/**
 * Default local port for the OAuth2 redirect
 * Must match the port forwarded over SSH on remote hosts
 */
export const DEFAULT_OAUTH_CALLBACK_PORT = 8080;

/**
 * How long to wait for the browser redirect before giving up (5 minutes)
 */
export const DEFAULT_OAUTH_CALLBACK_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Application configuration loaded from environment
 */
export interface Config {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevel;

  // Credentials
  configDir: string;
  clientSecretsPath: string;
  tokenPath: string;

  // OAuth callback listener
  oauthCallbackPort: number;
  oauthCallbackTimeoutMs: number;
}

/**
 * Default config directory, shared with other gspread-style tools
 */
export function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'gspread');
}

const NODE_ENVS: readonly Config['nodeEnv'][] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR'];

function parseNodeEnv(value: string | undefined): Config['nodeEnv'] {
  return NODE_ENVS.find(env => env === value) ?? 'development';
}

function parseLogLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  return LOG_LEVELS.find(level => level === upper) ?? 'INFO';
}

/**
 * Loads configuration from environment variables
 * Throws if a variable is set to an invalid value
 */
export function loadConfig(): Config {
  const nodeEnv = parseNodeEnv(process.env.NODE_ENV);
  const logLevel = parseLogLevel(process.env.LOG_LEVEL);

  const configDir = process.env.SHEETS_CONFIG_DIR || getDefaultConfigDir();

  const oauthCallbackPort = Number(process.env.OAUTH_CALLBACK_PORT || DEFAULT_OAUTH_CALLBACK_PORT);
  if (!Number.isInteger(oauthCallbackPort) || oauthCallbackPort < 1 || oauthCallbackPort > 65535) {
    throw new Error(`OAUTH_CALLBACK_PORT must be an integer between 1 and 65535, got: ${process.env.OAUTH_CALLBACK_PORT}`);
  }

  const oauthCallbackTimeoutMs = Number(
    process.env.OAUTH_CALLBACK_TIMEOUT_MS || DEFAULT_OAUTH_CALLBACK_TIMEOUT_MS
  );
  if (!Number.isInteger(oauthCallbackTimeoutMs) || oauthCallbackTimeoutMs <= 0) {
    throw new Error(`OAUTH_CALLBACK_TIMEOUT_MS must be a positive integer, got: ${process.env.OAUTH_CALLBACK_TIMEOUT_MS}`);
  }

  return {
    nodeEnv,
    logLevel,
    configDir,
    clientSecretsPath: join(configDir, CLIENT_SECRETS_FILE),
    tokenPath: join(configDir, TOKEN_FILE),
    oauthCallbackPort,
    oauthCallbackTimeoutMs,
  };
}

/**
 * Singleton config instance
 */
let configInstance: Config | null = null;

/**
 * Gets the application configuration
 * Loads from environment on first call
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the config instance (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
