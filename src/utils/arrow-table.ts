/**
 * Conversion of labeled tables to Apache Arrow
 */

import {
  Field,
  RecordBatch,
  Schema,
  Struct,
  Table,
  Utf8,
  makeBuilder,
  makeData,
} from 'apache-arrow';
import type { SheetTable } from '../types/index.js';

export type StringTable = Table<Record<string, Utf8>>;

/**
 * Builds an Arrow table with one non-nullable Utf8 column per header
 * Column order follows `columns`, including names that look numeric
 */
export function toArrowTable(table: Pick<SheetTable, 'columns' | 'rows'>): StringTable {
  const fields = table.columns.map(name => new Field(name, new Utf8(), false));

  const children = table.columns.map((_, col) => {
    const builder = makeBuilder({ type: new Utf8(), nullValues: [] });
    for (const row of table.rows) {
      builder.append(row[col] ?? '');
    }
    return builder.finish().flush();
  });

  const schema = new Schema<Record<string, Utf8>>(fields);
  const data = makeData({
    type: new Struct<Record<string, Utf8>>(fields),
    length: table.rows.length,
    nullCount: 0,
    children,
  });

  return new Table(schema, new RecordBatch(schema, data));
}
