/**
 * Google Sheets reader
 * Fetches a worksheet and turns it into a labeled table
 */

import { google } from 'googleapis';
import type { Auth, sheets_v4 } from 'googleapis';
import type {
  Result,
  SheetTable,
  SheetsError,
  WorksheetInfo,
  WorksheetSelector,
} from '../types/index.js';
import { authorize } from './google-auth.js';
import type { AuthorizeOptions } from './google-auth.js';
import {
  classifyApiError,
  spreadsheetNotFoundError,
  worksheetNotFoundError,
  apiError,
  emptyWorksheetError,
} from './sheets-errors.js';
import { makeColumnsUnique, findDuplicateColumns } from '../utils/columns.js';
import { toRectangularGrid } from '../utils/grid.js';
import { toArrowTable } from '../utils/arrow-table.js';
import type { StringTable } from '../utils/arrow-table.js';
import { info, warn } from '../utils/logger.js';

/**
 * Authenticated access to the spreadsheet API
 * Implemented over googleapis; tests substitute an in-memory fake
 */
export interface SpreadsheetSession {
  /** Lists worksheets in tab order */
  listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]>;
  /** Returns every row of the worksheet; trailing empty cells may be omitted */
  getWorksheetValues(spreadsheetId: string, title: string): Promise<unknown[][]>;
}

/**
 * Quotes a worksheet title for use as an A1 range
 *
 * @example
 * quoteSheetTitle("Q1 'final'") // "'Q1 ''final'''"
 */
export function quoteSheetTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

/**
 * Session backed by the Sheets v4 API
 */
export class GoogleSpreadsheetSession implements SpreadsheetSession {
  private readonly sheets: sheets_v4.Sheets;

  constructor(auth: Auth.OAuth2Client) {
    this.sheets = google.sheets({ version: 'v4', auth });
  }

  async listWorksheets(spreadsheetId: string): Promise<WorksheetInfo[]> {
    const response = await this.sheets.spreadsheets.get({
      spreadsheetId,
      fields: 'sheets.properties.title,sheets.properties.sheetId,sheets.properties.index',
    });

    const worksheets: WorksheetInfo[] = [];
    for (const sheet of response.data.sheets || []) {
      const title = sheet.properties?.title;
      const sheetId = sheet.properties?.sheetId;
      if (typeof title !== 'string' || typeof sheetId !== 'number') continue;
      worksheets.push({ title, sheetId, index: sheet.properties?.index ?? worksheets.length });
    }

    return worksheets.sort((a, b) => a.index - b.index);
  }

  async getWorksheetValues(spreadsheetId: string, title: string): Promise<unknown[][]> {
    const response = await this.sheets.spreadsheets.values.get({
      spreadsheetId,
      range: quoteSheetTitle(title),
      valueRenderOption: 'FORMATTED_VALUE',
      majorDimension: 'ROWS',
    });
    return response.data.values || [];
  }
}

/**
 * Creates a session from an authorized OAuth2 client
 */
export function createSpreadsheetSession(auth: Auth.OAuth2Client): SpreadsheetSession {
  return new GoogleSpreadsheetSession(auth);
}

export interface FetchSheetOptions {
  /** Pre-authenticated session; authorizes interactively when omitted */
  session?: SpreadsheetSession;
  /** Which worksheet to read (default: first tab) */
  selector?: WorksheetSelector;
  /** Forwarded to authorize() when no session is given */
  authorizeOptions?: AuthorizeOptions;
}

/**
 * Resolves a selector against the worksheet list
 * gid takes precedence over index; index is the zero-based tab position
 */
export function selectWorksheet(
  worksheets: readonly WorksheetInfo[],
  selector: WorksheetSelector = {}
): WorksheetInfo | undefined {
  if (selector.gid !== undefined) {
    return worksheets.find(ws => ws.sheetId === selector.gid);
  }

  const index = selector.index ?? 0;
  if (!Number.isInteger(index) || index < 0) return undefined;
  return worksheets[index];
}

async function openSession(options: FetchSheetOptions): Promise<Result<SpreadsheetSession, SheetsError>> {
  if (options.session) {
    return { ok: true, value: options.session };
  }

  const authResult = await authorize(options.authorizeOptions);
  if (!authResult.ok) {
    return authResult;
  }
  return { ok: true, value: createSpreadsheetSession(authResult.value) };
}

/**
 * Fetches a worksheet as a labeled table
 *
 * The first row becomes the header (deduplicated with `_N` suffixes) and the
 * remaining rows the body. Rows are padded to a common width.
 *
 * @param spreadsheetId - Sheet ID from the URL
 * @returns SheetTable, or a SheetsError describing what to fix
 */
export async function fetchSheet(
  spreadsheetId: string,
  options: FetchSheetOptions = {}
): Promise<Result<SheetTable, SheetsError>> {
  const sessionResult = await openSession(options);
  if (!sessionResult.ok) {
    return sessionResult;
  }
  const session = sessionResult.value;
  const selector = options.selector ?? {};

  info(`Opening Google Sheet: ${spreadsheetId}`, { module: 'sheets', phase: 'open' });

  let worksheets: WorksheetInfo[];
  try {
    worksheets = await session.listWorksheets(spreadsheetId);
  } catch (err) {
    const error = classifyApiError(err) === 'not_found'
      ? spreadsheetNotFoundError(spreadsheetId, err)
      : apiError(err);
    return { ok: false, error };
  }

  const worksheet = selectWorksheet(worksheets, selector);
  if (!worksheet) {
    return { ok: false, error: worksheetNotFoundError(selector, worksheets) };
  }

  info(`Reading worksheet: '${worksheet.title}'`, { module: 'sheets', phase: 'read', gid: worksheet.sheetId });

  let values: unknown[][];
  try {
    values = await session.getWorksheetValues(spreadsheetId, worksheet.title);
  } catch (err) {
    return { ok: false, error: apiError(err) };
  }

  if (values.length === 0) {
    return { ok: false, error: emptyWorksheetError(worksheet.title) };
  }

  const [rawHeaders, ...rows] = toRectangularGrid(values);
  const columns = makeColumnsUnique(rawHeaders);

  const duplicates = findDuplicateColumns(rawHeaders);
  if (duplicates.length > 0) {
    warn('Found duplicate column names, suffixes added to make them unique', {
      module: 'sheets',
      duplicates,
    });
  }

  info(`Successfully loaded ${rows.length} rows, ${columns.length} columns`, {
    module: 'sheets',
    phase: 'done',
  });

  return {
    ok: true,
    value: { spreadsheetId, worksheet, columns, rows },
  };
}

/**
 * Fetches a worksheet as an Apache Arrow table of Utf8 columns
 */
export async function fetchSheetAsArrow(
  spreadsheetId: string,
  options: FetchSheetOptions = {}
): Promise<Result<StringTable, SheetsError>> {
  const result = await fetchSheet(spreadsheetId, options);
  if (!result.ok) {
    return result;
  }
  return { ok: true, value: toArrowTable(result.value) };
}
