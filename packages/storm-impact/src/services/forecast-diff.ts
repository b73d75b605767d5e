/**
 * Forecast Diff Engine
 *
 * Compares the current report's metrics with the report of the issuance
 * FORECAST_INTERVAL_HOURS earlier.
 *
 * - No previous report: delta = current value ("increased by N"), percentage "-".
 * - Previous zero, current non-zero: percentage "-" (not infinite).
 * - Previous and current both zero: percentage 0, unchanged.
 * - Otherwise percentage = |delta| / previous × 100; direction carries the sign.
 */

import { FORECAST_INTERVAL_HOURS, UNDEFINED_PERCENTAGE } from '../core/constants.js';
import type { ForecastKey } from '../core/types/index.js';
import { addHours, parseIssuance } from '../core/utils/dates.js';
import type { ChangeDirection, ImpactReport, Percentage } from '../schemas/report.js';

export interface MetricChange {
  readonly current: number;
  /** null when there is no previous report */
  readonly previous: number | null;
  readonly delta: number;
  readonly percentage: Percentage;
  readonly direction: ChangeDirection;
}

/**
 * Change of one metric against its previous value
 */
export function diffMetric(current: number, previous: number | null): MetricChange {
  if (previous === null) {
    return {
      current,
      previous,
      delta: current,
      percentage: UNDEFINED_PERCENTAGE,
      direction: 'increased',
    };
  }

  const delta = current - previous;
  const direction: ChangeDirection = delta > 0 ? 'increased' : delta < 0 ? 'decreased' : 'unchanged';

  let percentage: Percentage;
  if (previous === 0) {
    percentage = current === 0 ? 0 : UNDEFINED_PERCENTAGE;
  } else {
    percentage = (Math.abs(delta) / Math.abs(previous)) * 100;
  }

  return { current, previous, delta, percentage, direction };
}

/**
 * Render a delta with an explicit sign, e.g. "+12", "-3", "+0"
 */
export function formatSignedDelta(delta: number): string {
  return delta < 0 ? String(delta) : `+${delta}`;
}

/**
 * Issuance time shifted by a number of hours, as ISO-8601 UTC
 */
export function shiftIssuance(issuedAt: string, hours: number): string {
  return addHours(parseIssuance(issuedAt), hours).toISOString();
}

/**
 * Key of the issuance immediately preceding this one
 */
export function previousForecastKey(key: ForecastKey, intervalHours: number = FORECAST_INTERVAL_HOURS): ForecastKey {
  return { stormId: key.stormId, issuedAt: shiftIssuance(key.issuedAt, -intervalHours) };
}

/**
 * Lookup of persisted reports
 */
export interface ReportLookup {
  load(region: string, key: ForecastKey): Promise<ImpactReport | null>;
}

/**
 * Loads the previous report and diffs metrics against it
 */
export class ForecastDiffEngine {
  constructor(
    private readonly reports: ReportLookup,
    private readonly intervalHours: number = FORECAST_INTERVAL_HOURS
  ) {}

  /**
   * Report of the preceding issuance; null when none exists
   */
  async previousReport(region: string, key: ForecastKey): Promise<ImpactReport | null> {
    return this.reports.load(region, previousForecastKey(key, this.intervalHours));
  }
}

/**
 * Read a previous metric, mapping "no previous report" to null and a missing
 * entry inside an existing report to 0
 */
export function previousValue<T>(
  previous: ImpactReport | null,
  read: (report: ImpactReport) => T | undefined,
  pick: (entry: T) => number
): number | null {
  if (previous === null) return null;
  const entry = read(previous);
  return entry === undefined ? 0 : pick(entry);
}
