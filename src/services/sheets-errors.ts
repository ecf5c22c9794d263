/**
 * Sheets error construction and Google API error classification
 *
 * Google API failures are classified by HTTP status:
 * - not_found: 404, or 403 (spreadsheet exists but is not shared with the user)
 * - api_error: everything else (429 rate limit, 5xx, network errors), plus 403s
 *   whose reason says the API is disabled or quota is exhausted
 */

import { SheetsError } from '../types/index.js';
import type { WorksheetInfo, WorksheetSelector } from '../types/index.js';

export type ApiErrorCategory = 'not_found' | 'api_error';

/**
 * Extracts the HTTP status from a googleapis (gaxios) error, if any
 */
export function getHttpStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;

  if ('status' in err && typeof err.status === 'number') {
    return err.status;
  }
  if ('response' in err && typeof err.response === 'object' && err.response !== null &&
      'status' in err.response && typeof err.response.status === 'number') {
    return err.response.status;
  }
  if ('code' in err) {
    // gaxios reports the status as a string code on some versions
    const code = typeof err.code === 'string' ? Number(err.code) : err.code;
    if (typeof code === 'number' && Number.isInteger(code)) return code;
  }
  return undefined;
}

/**
 * 403 reasons that are not about access to the spreadsheet
 */
const PROJECT_LEVEL_REASONS = new Set([
  'accessNotConfigured',
  'SERVICE_DISABLED',
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'RATE_LIMIT_EXCEEDED',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function collectReasons(entries: unknown, into: string[]): void {
  if (!Array.isArray(entries)) return;
  for (const entry of entries) {
    if (isRecord(entry) && typeof entry.reason === 'string') {
      into.push(entry.reason);
    }
  }
}

/**
 * Extracts the error reasons Google attaches to a failed request
 * Reads both the legacy `errors[].reason` list and the `details[].reason` of
 * the JSON error body
 */
export function getErrorReasons(err: unknown): string[] {
  const reasons: string[] = [];
  if (!isRecord(err)) return reasons;

  collectReasons(err.errors, reasons);

  const response = err.response;
  if (isRecord(response) && isRecord(response.data) && isRecord(response.data.error)) {
    collectReasons(response.data.error.errors, reasons);
    collectReasons(response.data.error.details, reasons);
  }
  return reasons;
}

/**
 * Classifies a Google API error
 */
export function classifyApiError(err: unknown): ApiErrorCategory {
  const status = getHttpStatus(err);
  if (status === 404) return 'not_found';
  if (status === 403) {
    const projectLevel = getErrorReasons(err).some(reason => PROJECT_LEVEL_REASONS.has(reason));
    return projectLevel ? 'api_error' : 'not_found';
  }
  return 'api_error';
}

function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function missingClientSecretsError(path: string): SheetsError {
  return new SheetsError(
    'missing_client_secrets',
    `OAuth2 credentials file not found at: ${path}`,
    [
      'To set up Google Sheets access:',
      '1. Create an OAuth client ID (Desktop app) in Google Cloud Console',
      `2. Download it and save as: ${path}`,
      `3. Set permissions: chmod 600 ${path}`,
    ].join('\n')
  );
}

export function tokenRefreshFailedError(cause: unknown, tokenLocation: string): SheetsError {
  return new SheetsError(
    'token_refresh_failed',
    `Failed to refresh OAuth2 credentials: ${describeCause(cause)}`,
    [
      'Try deleting the token file and re-authenticating:',
      `  rm ${tokenLocation}`,
      'Then run the command again.',
    ].join('\n'),
    { cause }
  );
}

export function authorizationFailedError(cause: unknown, port: number): SheetsError {
  return new SheetsError(
    'authorization_failed',
    `OAuth2 authentication failed: ${describeCause(cause)}`,
    [
      'Possible causes:',
      `1. Port ${port} is already in use on this machine`,
      '2. SSH port forwarding not set up',
      '3. User cancelled authentication',
      '4. Invalid client_secrets.json file',
      '',
      'For SSH connections, reconnect with port forwarding:',
      `  ssh -L ${port}:localhost:${port} user@server`,
    ].join('\n'),
    { cause }
  );
}

export function spreadsheetNotFoundError(spreadsheetId: string, cause: unknown): SheetsError {
  return new SheetsError(
    'spreadsheet_not_found',
    `Spreadsheet not found: ${spreadsheetId}`,
    [
      'Possible causes:',
      '1. The sheet ID is incorrect',
      '2. The sheet is not shared with your Google account',
      '3. The sheet has been deleted',
      '',
      'To fix:',
      '1. Verify the sheet ID in the URL',
      '2. Ask the sheet owner to share it with your email',
    ].join('\n'),
    { cause }
  );
}

/**
 * Formats worksheets as `('title', gid)` pairs
 */
export function formatWorksheetList(worksheets: readonly WorksheetInfo[]): string {
  return `[${worksheets.map(ws => `('${ws.title}', ${ws.sheetId})`).join(', ')}]`;
}

export function worksheetNotFoundError(
  selector: WorksheetSelector,
  available: readonly WorksheetInfo[]
): SheetsError {
  const listing = `Available worksheets (title, gid): ${formatWorksheetList(available)}`;

  if (selector.gid !== undefined) {
    return new SheetsError(
      'worksheet_not_found',
      `Worksheet gid ${selector.gid} not found.\n\n${listing}`,
      'Use the gid option with a valid gid.'
    );
  }

  return new SheetsError(
    'worksheet_not_found',
    `Worksheet index ${selector.index ?? 0} not found.\n\n${listing}`,
    'Use the index or gid option to select a different tab.'
  );
}

export function apiError(cause: unknown): SheetsError {
  return new SheetsError(
    'api_error',
    `Google Sheets API error: ${describeCause(cause)}`,
    [
      'Possible causes:',
      '1. API rate limit exceeded',
      '2. Google Sheets API not enabled in your project',
      '3. Temporary API outage',
      '',
      'To fix:',
      '1. Wait a few seconds and try again',
      '2. Enable Google Sheets API in Google Cloud Console',
    ].join('\n'),
    { cause }
  );
}

export function emptyWorksheetError(title: string): SheetsError {
  return new SheetsError(
    'empty_worksheet',
    `Sheet '${title}' is empty.`,
    [
      'The worksheet contains no data. Please check:',
      "1. You're reading the correct worksheet tab",
      "2. The data hasn't been moved or deleted",
    ].join('\n')
  );
}
