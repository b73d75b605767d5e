/**
 * Storage Layout
 *
 * Every persisted artifact is keyed by (region, storm, issuance[, zoom,
 * threshold]). Issuance times appear as compact UTC stamps.
 */

import type { WindThreshold } from '../core/constants.js';
import type { ForecastKey } from '../core/types/index.js';
import { issuanceStamp, parseIssuance } from '../core/utils/dates.js';

export const VIEW_KINDS = ['tiles', 'admin', 'schools', 'health', 'track', 'cci-tiles', 'cci-admin'] as const;

export type ViewKind = (typeof VIEW_KINDS)[number];

/** Views written per threshold; the rest are written once per issuance */
export const THRESHOLD_VIEW_KINDS = ['tiles', 'admin', 'schools', 'health', 'track'] as const satisfies readonly ViewKind[];

export type CachedFacilityKind = 'schools' | 'health';

function forecastPart(key: ForecastKey): string {
  return `${key.stormId}_${issuanceStamp(parseIssuance(key.issuedAt))}`;
}

export const StorageLayout = {
  baseTiles: (region: string, zoom: number): string => `zones/${region}_${zoom}_tiles.geojson`,
  baseAdmins: (region: string, zoom: number): string => `zones/${region}_${zoom}_admin1.geojson`,
  initializedFlag: (region: string, zoom: number): string => `flags/${region}_${zoom}.initialized`,
  viewsFlag: (region: string, key: ForecastKey, zoom: number): string =>
    `flags/${region}_${forecastPart(key)}_${zoom}.views`,
  view: (region: string, key: ForecastKey, zoom: number, kind: ViewKind, threshold?: WindThreshold): string =>
    threshold === undefined
      ? `views/${region}_${forecastPart(key)}_${zoom}_${kind}.ndjson`
      : `views/${region}_${forecastPart(key)}_${zoom}_${threshold}_${kind}.ndjson`,
  reportsDirectory: (): string => 'reports',
  report: (region: string, key: ForecastKey): string => `reports/${region}_${forecastPart(key)}.json`,
  facilityCache: (region: string, kind: CachedFacilityKind): string => `cache/${region}_${kind}.json`,
  processedForecasts: (): string => 'state/processed-forecasts.json',
} as const;
