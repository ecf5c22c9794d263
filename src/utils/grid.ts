/**
 * Grid normalization for values returned by the Sheets API
 */

/**
 * Converts a single API cell to its display string
 * Missing cells become empty strings
 */
export function cellToString(cell: unknown): string {
  if (cell === null || cell === undefined) return '';
  return String(cell);
}

/**
 * Pads every row with empty strings to the width of the widest row
 *
 * The Sheets API omits trailing empty cells and trailing empty rows are
 * dropped entirely, so rows of one worksheet often differ in length.
 */
export function toRectangularGrid(values: readonly (readonly unknown[])[]): string[][] {
  const width = values.reduce((max, row) => Math.max(max, row.length), 0);

  return values.map(row => {
    const cells = row.map(cellToString);
    while (cells.length < width) {
      cells.push('');
    }
    return cells;
  });
}
