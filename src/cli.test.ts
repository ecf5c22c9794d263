/**
 * Tests for the command-line entry point
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('./utils/logger.js', () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('./services/sheets.js', () => ({
  fetchSheet: vi.fn(),
}));

import { parseCliArgs, formatTable, run, USAGE } from './cli.js';
import type { CliDeps } from './cli.js';
import { SheetsError } from './types/index.js';
import type { SheetTable } from './types/index.js';
import { error as logError } from './utils/logger.js';

const TABLE: SheetTable = {
  spreadsheetId: 'test-spreadsheet-id',
  worksheet: { title: 'Ventas', sheetId: 0, index: 0 },
  columns: ['Cliente', 'Nota'],
  rows: [['ACME', 'pago, parcial']],
};

describe('parseCliArgs', () => {
  it('parses the spreadsheet ID with defaults', () => {
    expect(parseCliArgs(['abc123'])).toEqual({
      ok: true,
      value: { spreadsheetId: 'abc123', selector: {}, format: 'json' },
    });
  });

  it('parses index, gid and format in both flag styles', () => {
    expect(parseCliArgs(['--index', '2', 'abc123', '--gid=456', '--format', 'csv'])).toEqual({
      ok: true,
      value: { spreadsheetId: 'abc123', selector: { index: 2, gid: 456 }, format: 'csv' },
    });
  });

  it('rejects a missing spreadsheet ID', () => {
    const result = parseCliArgs(['--index', '1']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Missing spreadsheet ID');
  });

  it('rejects a negative or non-numeric index', () => {
    const negative = parseCliArgs(['abc', '--index', '-1']);
    const text = parseCliArgs(['abc', '--index=first']);

    expect(negative.ok).toBe(false);
    if (!negative.ok) expect(negative.error.message).toBe('--index expects a non-negative integer, got: -1');
    expect(text.ok).toBe(false);
  });

  it('rejects a flag without value', () => {
    const result = parseCliArgs(['abc', '--gid']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('--gid expects a non-negative integer, got: (nothing)');
  });

  it('rejects an unknown format', () => {
    const result = parseCliArgs(['abc', '--format', 'xml']);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('--format must be json or csv, got: xml');
  });

  it('rejects unknown options and extra arguments', () => {
    const unknown = parseCliArgs(['abc', '--verbose']);
    const extra = parseCliArgs(['abc', 'def']);

    expect(unknown.ok).toBe(false);
    if (!unknown.ok) expect(unknown.error.message).toBe('Unknown option: --verbose');
    expect(extra.ok).toBe(false);
    if (!extra.ok) expect(extra.error.message).toBe('Unexpected argument: def');
  });
});

describe('formatTable', () => {
  it('renders CSV', () => {
    expect(formatTable(TABLE, 'csv')).toBe('Cliente,Nota\nACME,"pago, parcial"');
  });

  it('renders JSON with worksheet, columns and rows', () => {
    expect(JSON.parse(formatTable(TABLE, 'json'))).toEqual({
      worksheet: { title: 'Ventas', sheetId: 0, index: 0 },
      columns: ['Cliente', 'Nota'],
      rows: [['ACME', 'pago, parcial']],
    });
  });
});

describe('run', () => {
  let fetch: Mock<CliDeps['fetch']>;
  let write: Mock<CliDeps['write']>;
  let deps: CliDeps;

  beforeEach(() => {
    vi.clearAllMocks();
    fetch = vi.fn<CliDeps['fetch']>();
    write = vi.fn<CliDeps['write']>();
    deps = { fetch, write };
  });

  it('prints the table and exits 0', async () => {
    fetch.mockResolvedValueOnce({ ok: true, value: TABLE });

    const code = await run(['test-spreadsheet-id', '--gid', '0', '--format', 'csv'], deps);

    expect(code).toBe(0);
    expect(fetch).toHaveBeenCalledWith('test-spreadsheet-id', { selector: { gid: 0 } });
    expect(write).toHaveBeenCalledWith('Cliente,Nota\nACME,"pago, parcial"');
  });

  it('logs message and remediation and exits 1 on fetch failure', async () => {
    const error = new SheetsError('empty_worksheet', "Sheet 'Ventas' is empty.", 'Check the tab.');
    fetch.mockResolvedValueOnce({ ok: false, error });

    const code = await run(['test-spreadsheet-id'], deps);

    expect(code).toBe(1);
    expect(logError).toHaveBeenCalledWith("Sheet 'Ventas' is empty.\n\nCheck the tab.", {
      module: 'cli',
      kind: 'empty_worksheet',
    });
    expect(write).not.toHaveBeenCalled();
  });

  it('prints usage and exits 2 on bad arguments', async () => {
    const code = await run([], deps);

    expect(code).toBe(2);
    expect(logError).toHaveBeenCalledWith(`Missing spreadsheet ID\n${USAGE}`, { module: 'cli' });
    expect(fetch).not.toHaveBeenCalled();
  });
});
