#!/usr/bin/env node

/**
 * Command-line entry point
 * Fetches a worksheet and prints it as JSON or CSV on stdout
 */

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { config as loadEnv } from 'dotenv';
import { fetchSheet } from './services/sheets.js';
import type { FetchSheetOptions } from './services/sheets.js';
import type { Result, SheetTable, SheetsError, WorksheetSelector } from './types/index.js';
import { toCsv } from './utils/csv.js';
import { error as logError } from './utils/logger.js';

export const USAGE =
  'Usage: sheets-table-loader <spreadsheetId> [--index N | --gid ID] [--format json|csv]';

export type OutputFormat = 'json' | 'csv';

export interface CliOptions {
  spreadsheetId: string;
  selector: WorksheetSelector;
  format: OutputFormat;
}

export interface CliDeps {
  fetch: (spreadsheetId: string, options: FetchSheetOptions) => Promise<Result<SheetTable, SheetsError>>;
  write: (text: string) => void;
}

const NON_NEGATIVE_INT = /^\d+$/;

function parseNonNegativeInt(flag: string, value: string | undefined): Result<number, Error> {
  if (value === undefined || !NON_NEGATIVE_INT.test(value)) {
    return { ok: false, error: new Error(`${flag} expects a non-negative integer, got: ${value ?? '(nothing)'}`) };
  }
  return { ok: true, value: Number(value) };
}

/**
 * Parses CLI arguments (without the node and script paths)
 * Flags accept both `--flag value` and `--flag=value`
 */
export function parseCliArgs(args: readonly string[]): Result<CliOptions, Error> {
  let spreadsheetId: string | undefined;
  const selector: WorksheetSelector = {};
  let format: OutputFormat = 'json';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (!arg.startsWith('--')) {
      if (spreadsheetId !== undefined) {
        return { ok: false, error: new Error(`Unexpected argument: ${arg}`) };
      }
      spreadsheetId = arg;
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = eq === -1 ? args[++i] : arg.slice(eq + 1);

    switch (flag) {
      case '--index': {
        const parsed = parseNonNegativeInt(flag, value);
        if (!parsed.ok) return parsed;
        selector.index = parsed.value;
        break;
      }
      case '--gid': {
        const parsed = parseNonNegativeInt(flag, value);
        if (!parsed.ok) return parsed;
        selector.gid = parsed.value;
        break;
      }
      case '--format':
        if (value !== 'json' && value !== 'csv') {
          return { ok: false, error: new Error(`--format must be json or csv, got: ${value ?? '(nothing)'}`) };
        }
        format = value;
        break;
      default:
        return { ok: false, error: new Error(`Unknown option: ${flag}`) };
    }
  }

  if (!spreadsheetId) {
    return { ok: false, error: new Error('Missing spreadsheet ID') };
  }

  return { ok: true, value: { spreadsheetId, selector, format } };
}

/**
 * Renders a table for stdout
 */
export function formatTable(table: SheetTable, format: OutputFormat): string {
  if (format === 'csv') {
    return toCsv(table.columns, table.rows);
  }
  return JSON.stringify({
    worksheet: table.worksheet,
    columns: table.columns,
    rows: table.rows,
  }, null, 2);
}

const defaultDeps: CliDeps = {
  fetch: fetchSheet,
  write: text => {
    process.stdout.write(`${text}\n`);
  },
};

/**
 * Runs the CLI
 *
 * @returns Process exit code: 0 on success, 1 on fetch failure, 2 on usage error
 */
export async function run(args: readonly string[], deps: CliDeps = defaultDeps): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    logError(`${parsed.error.message}\n${USAGE}`, { module: 'cli' });
    return 2;
  }

  const { spreadsheetId, selector, format } = parsed.value;
  const result = await deps.fetch(spreadsheetId, { selector });
  if (!result.ok) {
    logError(`${result.error.message}\n\n${result.error.remediation}`, {
      module: 'cli',
      kind: result.error.kind,
    });
    return 1;
  }

  deps.write(formatTable(result.value, format));
  return 0;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  return import.meta.url === pathToFileURL(realpathSync(script)).href;
}

// Run only when executed directly (not imported during tests)
if (isEntryPoint()) {
  loadEnv();
  run(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logError('Unexpected failure', {
        module: 'cli',
        error: err instanceof Error ? err.message : String(err),
      });
      process.exitCode = 1;
    });
}
