/**
 * Forecast date helpers (UTC only)
 */

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Parse an ISO-8601 timestamp, throwing RangeError when invalid
 */
export function parseIssuance(value: string): Date {
  const time = Date.parse(value);
  if (Number.isNaN(time)) {
    throw new RangeError(`Invalid issuance time: ${value}`);
  }
  return new Date(time);
}

/**
 * "November 09, 2025 18:00 UTC"
 */
export function formatForecastDate(date: Date): string {
  const month = MONTH_NAMES[date.getUTCMonth()] ?? '';
  return (
    `${month} ${pad2(date.getUTCDate())}, ${date.getUTCFullYear()} ` +
    `${pad2(date.getUTCHours())}:${pad2(date.getUTCMinutes())} UTC`
  );
}

/**
 * Date shifted by a number of hours
 */
export function addHours(date: Date, hours: number): Date {
  return new Date(date.getTime() + hours * 3_600_000);
}

/**
 * Compact issuance stamp used in file names, e.g. "20251109180000"
 */
export function issuanceStamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad2(date.getUTCMonth() + 1)}${pad2(date.getUTCDate())}` +
    `${pad2(date.getUTCHours())}${pad2(date.getUTCMinutes())}${pad2(date.getUTCSeconds())}`
  );
}
