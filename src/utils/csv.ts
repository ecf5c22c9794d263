/**
 * CSV output for labeled tables
 */

/**
 * Quotes a field when it contains a comma, quote or line break
 * Embedded quotes are doubled
 */
export function csvEscape(value: string): string {
  const normalized = value.replace(/\r\n?/g, '\n');
  if (/[",\n]/.test(normalized)) {
    return `"${normalized.replace(/"/g, '""')}"`;
  }
  return normalized;
}

/**
 * Renders a header and body as CSV lines joined with \n (no trailing newline)
 */
export function toCsv(columns: readonly string[], rows: readonly (readonly string[])[]): string {
  return [columns, ...rows].map(row => row.map(csvEscape).join(',')).join('\n');
}
