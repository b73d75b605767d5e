/**
 * Output Formatting for CLI Commands
 *
 * Supports: table, json, ndjson, csv formats
 *
 * @module cli/lib/output
 */

export const OUTPUT_FORMATS = ['table', 'json', 'ndjson', 'csv'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Column definition for table output
 */
export interface TableColumn {
  readonly key: string;
  readonly header: string;
  readonly width?: number;
  readonly align?: 'left' | 'right' | 'center';
  readonly formatter?: (value: unknown) => string;
}

function cellText(row: Readonly<Record<string, unknown>>, col: TableColumn): string {
  const value = row[col.key];
  return col.formatter ? col.formatter(value) : String(value ?? '');
}

/**
 * Format rows as an aligned table
 */
export function formatTable(data: ReadonlyArray<Readonly<Record<string, unknown>>>, columns: readonly TableColumn[]): string {
  if (data.length === 0) {
    return 'No entries found.';
  }

  const widths = columns.map((col) => {
    if (col.width) return col.width;
    const maxDataWidth = Math.max(...data.map((row) => cellText(row, col).length));
    return Math.max(col.header.length, maxDataWidth);
  });

  const headerRow = columns.map((col, i) => padCell(col.header, widths[i] ?? 0, col.align ?? 'left')).join(' | ');
  const separator = widths.map((w) => '-'.repeat(w)).join('-+-');
  const dataRows = data.map((row) =>
    columns.map((col, i) => padCell(cellText(row, col), widths[i] ?? 0, col.align ?? 'left')).join(' | ')
  );

  return [headerRow, separator, ...dataRows].join('\n');
}

/**
 * Pad a cell value to the specified width
 */
function padCell(value: string, width: number, align: 'left' | 'right' | 'center'): string {
  const truncated = value.length > width ? value.slice(0, width - 1) + '~' : value;

  switch (align) {
    case 'right':
      return truncated.padStart(width);
    case 'center': {
      const padding = width - truncated.length;
      const leftPad = Math.floor(padding / 2);
      return ' '.repeat(leftPad) + truncated + ' '.repeat(padding - leftPad);
    }
    default:
      return truncated.padEnd(width);
  }
}

export function formatJson(data: unknown, pretty = true): string {
  return pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
}

export function formatNdjson(data: readonly unknown[]): string {
  return data.map((item) => JSON.stringify(item)).join('\n');
}

export function formatCsv(data: ReadonlyArray<Readonly<Record<string, unknown>>>, columns: readonly TableColumn[]): string {
  const headerRow = columns.map((c) => escapeCSV(c.header)).join(',');
  const dataRows = data.map((row) => columns.map((col) => escapeCSV(cellText(row, col))).join(','));
  return [headerRow, ...dataRows].join('\n');
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
 * Format rows in the requested format
 */
export function formatOutput(
  data: ReadonlyArray<Readonly<Record<string, unknown>>>,
  format: OutputFormat,
  columns: readonly TableColumn[]
): string {
  switch (format) {
    case 'json':
      return formatJson(data);
    case 'ndjson':
      return formatNdjson(data);
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
  /**
   * Format an ISO timestamp as "YYYY-MM-DD HH:MM UTC"
   */
  datetime: (value: unknown): string => {
    if (!value) return '-';
    const date = new Date(String(value));
    return isNaN(date.getTime()) ? String(value) : `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
  },

  /**
   * Format a number with thousands separators
   */
  number: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : num.toLocaleString('en-US');
  },

  /**
   * Format a 0..1 probability as a percentage
   */
  probability: (value: unknown): string => {
    if (value === null || value === undefined) return '-';
    const num = Number(value);
    return isNaN(num) ? String(value) : `${Math.round(num * 100)}%`;
  },

  /**
   * Format a report percentage, passing the undefined marker through
   */
  percentage: (value: unknown): string => {
    if (typeof value === 'number') return `${value.toFixed(1)}%`;
    return String(value ?? '-');
  },

  yesNo: (value: unknown): string => {
    return value ? 'yes' : 'no';
  },
};

export function printOutput(output: string): void {
  console.log(output);
}

/**
 * Print error to stderr
 */
export function printError(message: string): void {
  console.error(`Error: ${message}`);
}

export function printSuccess(message: string): void {
  console.log(`Success: ${message}`);
}

export function printWarning(message: string): void {
  console.warn(`Warning: ${message}`);
}
