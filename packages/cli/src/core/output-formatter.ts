/**
 * Output Formatter - JSON, table, CSV formats
 */

export type TableRow = Record<string, string | number | null>;

/**
 * Format output as JSON
 */
export function formatJSON(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function valueToString(value: string | number | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return String(value);
}

function detectColumns(data: readonly TableRow[], columns?: readonly string[]): readonly string[] {
  return columns ?? (data[0] ? Object.keys(data[0]) : []);
}

/**
 * Format output as a simple table
 */
export function formatTable(data: readonly TableRow[], columns?: readonly string[]): string {
  if (data.length === 0) {
    return 'No data to display';
  }

  const cols = detectColumns(data, columns);

  // Calculate column widths
  const widths = new Map<string, number>();
  for (const col of cols) {
    widths.set(col, Math.max(col.length, ...data.map((row) => valueToString(row[col]).length)));
  }
  const width = (col: string): number => widths.get(col) ?? col.length;

  const lines: string[] = [];
  lines.push(cols.map((col) => col.padEnd(width(col))).join(' | '));
  lines.push(cols.map((col) => '-'.repeat(width(col))).join('-|-'));

  for (const row of data) {
    lines.push(cols.map((col) => valueToString(row[col]).padEnd(width(col))).join(' | '));
  }

  return lines.join('\n');
}

/**
 * Format output as CSV
 */
export function formatCSV(data: readonly TableRow[], columns?: readonly string[]): string {
  if (data.length === 0) {
    return '';
  }

  const cols = detectColumns(data, columns);
  const lines: string[] = [cols.join(',')];

  for (const row of data) {
    const values = cols.map((col) => {
      const str = valueToString(row[col]);
      // Escape CSV values
      if (str.includes(',') || str.includes('"') || str.includes('\n')) {
        return `"${str.replace(/"/g, '""')}"`;
      }
      return str;
    });
    lines.push(values.join(','));
  }

  return lines.join('\n');
}
