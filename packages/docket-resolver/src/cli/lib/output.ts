/**
 * Output Formatting for CLI Commands
 *
 * Consistent output across commands: aligned table, JSON or CSV.
 *
 * @module cli/lib/output
 */

export type OutputFormat = 'table' | 'json' | 'csv';

/**
 * Column definition for table and CSV output
 */
export interface TableColumn<T> {
  readonly key: keyof T & string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right';
  readonly formatter?: (value: unknown) => string;
}

function cellText<T>(row: T, column: TableColumn<T>): string {
  const value = row[column.key];
  if (column.formatter) return column.formatter(value);
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.join(', ');
  return String(value);
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;
  return align === 'right' ? truncated.padStart(width) : truncated.padEnd(width);
}

/**
 * Format rows as an aligned table
 */
export function formatTable<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const cells = data.map((row) => columns.map((column) => cellText(row, column)));
  const widths = columns.map(
    (column, i) =>
      column.width ?? Math.max(column.header.length, ...cells.map((line) => line[i]?.length ?? 0))
  );

  const render = (values: readonly string[]): string =>
    columns
      .map((column, i) => padCell(values[i] ?? '', widths[i] ?? 0, column.align ?? 'left'))
      .join(' | ')
      .trimEnd();

  const headerRow = render(columns.map((column) => column.header));
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');

  return [headerRow, separator, ...cells.map(render)].join('\n');
}

/**
 * Format data as JSON
 */
export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

/**
 * Escape a value for CSV output
 */
function escapeCSV(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Format rows as CSV
 */
export function formatCsv<T>(data: readonly T[], columns: readonly TableColumn<T>[]): string {
  const headerRow = columns.map((column) => escapeCSV(column.header)).join(',');
  const dataRows = data.map((row) =>
    columns.map((column) => escapeCSV(cellText(row, column))).join(',')
  );
  return [headerRow, ...dataRows].join('\n');
}

/**
 * Format rows in the specified format
 */
export function formatOutput<T>(
  data: readonly T[],
  format: OutputFormat,
  columns: readonly TableColumn<T>[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'csv':
      return formatCsv(data, columns);
    case 'table':
      return formatTable(data, columns);
  }
}

/**
 * Common column formatters
 */
export const formatters = {
  /** Fixed-point number; blank for null */
  fixed:
    (digits: number) =>
    (value: unknown): string =>
      typeof value === 'number' ? value.toFixed(digits) : '',

  /** Count of an array value */
  count: (value: unknown): string => (Array.isArray(value) ? String(value.length) : '0'),
} as const;

/**
 * Write command output to stdout
 */
export function printOutput(output: string): void {
  console.log(output);
}
