/**
 * Centralized logging service using Pino
 * Logs go to stderr so CLI output on stdout stays machine-readable
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { getConfig } from '../config.js';

/** File descriptor for stderr */
const STDERR_FD = 2;

// Lazy logger initialization to avoid calling getConfig() at import time
let loggerInstance: Logger | null = null;

/**
 * Gets or creates the logger instance
 */
function getLogger(): Logger {
  if (!loggerInstance) {
    const config = getConfig();
    const level = config.logLevel.toLowerCase();

    loggerInstance = config.nodeEnv !== 'production'
      ? pino({
          level,
          // Human-readable output for interactive use
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
              destination: STDERR_FD,
            },
          },
        })
      : pino({ level }, pino.destination(STDERR_FD));
  }

  return loggerInstance;
}

/**
 * Log a DEBUG message with optional context
 */
export function debug(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.debug(context, message);
  } else {
    logger.debug(message);
  }
}

/**
 * Log an INFO message with optional context
 */
export function info(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.info(context, message);
  } else {
    logger.info(message);
  }
}

/**
 * Log a WARN message with optional context
 */
export function warn(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.warn(context, message);
  } else {
    logger.warn(message);
  }
}

/**
 * Log an ERROR message with optional context
 */
export function error(message: string, context?: Record<string, unknown>): void {
  const logger = getLogger();
  if (context) {
    logger.error(context, message);
  } else {
    logger.error(message);
  }
}

/**
 * Drops the cached logger so the next call picks up fresh config (for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
