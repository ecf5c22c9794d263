/**
 * Type definitions for the sheets table loader
 * All TypeScript interfaces and types
 */

/**
 * Result type for operations that can succeed or fail
 * Replaces exceptions with explicit error handling
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Log levels for the logging system
 */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Worksheet (tab) metadata within a spreadsheet
 */
export interface WorksheetInfo {
  title: string;
  /** Numeric worksheet id, shown as `gid` in the sheet URL */
  sheetId: number;
  /** Zero-based tab position */
  index: number;
}

/**
 * Selects a worksheet either by tab position or by gid
 * gid takes precedence when both are given
 */
export interface WorksheetSelector {
  /** Zero-based tab position (default: 0) */
  index?: number;
  gid?: number;
}

/**
 * Labeled table built from a worksheet
 * Every row has exactly `columns.length` cells
 */
export interface SheetTable {
  spreadsheetId: string;
  worksheet: WorksheetInfo;
  columns: string[];
  rows: string[][];
}

/**
 * OAuth2 token record persisted between runs
 */
export interface StoredCredentials {
  access_token?: string | null;
  refresh_token?: string | null;
  /** Expiry as epoch milliseconds */
  expiry_date?: number | null;
  scope?: string;
  token_type?: string | null;
  id_token?: string | null;
}

/**
 * OAuth2 client identity read from client_secrets.json
 */
export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

/**
 * Failure categories surfaced to callers
 *
 * - missing_client_secrets: client_secrets.json not found
 * - token_refresh_failed: cached token expired and refresh failed
 * - authorization_failed: interactive browser flow failed
 * - spreadsheet_not_found: spreadsheet missing or not shared
 * - worksheet_not_found: selector matched no worksheet
 * - api_error: other Sheets API failure (rate limit, outage, API disabled)
 * - empty_worksheet: worksheet has no rows
 */
export type SheetsErrorKind =
  | 'missing_client_secrets'
  | 'token_refresh_failed'
  | 'authorization_failed'
  | 'spreadsheet_not_found'
  | 'worksheet_not_found'
  | 'api_error'
  | 'empty_worksheet';

/**
 * Error carrying a machine-checkable kind and a human remediation hint
 */
export class SheetsError extends Error {
  constructor(
    public kind: SheetsErrorKind,
    message: string,
    public remediation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SheetsError';
  }
}
