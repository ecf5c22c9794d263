/**
 * Public API
 */

export { fetchSheet, fetchSheetAsArrow, createSpreadsheetSession, GoogleSpreadsheetSession, selectWorksheet } from './services/sheets.js';
export type { SpreadsheetSession, FetchSheetOptions } from './services/sheets.js';
export { authorize } from './services/google-auth.js';
export type { AuthorizeOptions } from './services/google-auth.js';
export { FileCredentialStore, MemoryCredentialStore } from './services/credential-store.js';
export type { CredentialStore } from './services/credential-store.js';
export { makeColumnsUnique, findDuplicateColumns } from './utils/columns.js';
export { toArrowTable } from './utils/arrow-table.js';
export type { StringTable } from './utils/arrow-table.js';
export { getConfig, loadConfig, resetConfig } from './config.js';
export type { Config } from './config.js';
export { SheetsError } from './types/index.js';
export type {
  Result,
  SheetTable,
  SheetsErrorKind,
  StoredCredentials,
  WorksheetInfo,
  WorksheetSelector,
} from './types/index.js';
