/**
 * Risk Ranker
 *
 * Top-N facilities by exceedance probability at the reference threshold
 * (the lowest category, used as the "any impact" proxy). When the reference
 * threshold is absent, the lowest threshold present is used. Ties keep input
 * order.
 */

import {
  REFERENCE_THRESHOLD,
  TOP_FACILITIES_COUNT,
  presentThresholds,
  type WindThreshold,
} from '../core/constants.js';
import type { FacilityProbabilityRow, FacilityProbabilitySeries } from '../core/types/index.js';
import type { FacilityRanking } from '../schemas/report.js';

/**
 * Reference threshold if present, else the lowest one present
 */
export function selectRankingThreshold<T>(
  series: ReadonlyMap<WindThreshold, T>,
  reference: WindThreshold = REFERENCE_THRESHOLD
): WindThreshold | null {
  if (series.has(reference)) {
    return reference;
  }
  return presentThresholds(series)[0] ?? null;
}

/**
 * Stable descending sort by probability, truncated to topN
 */
export function topByProbability(
  rows: readonly FacilityProbabilityRow[],
  topN: number = TOP_FACILITIES_COUNT
): FacilityProbabilityRow[] {
  return [...rows].sort((a, b) => b.probability - a.probability).slice(0, topN);
}

export function rankFacilities(
  series: FacilityProbabilitySeries,
  topN: number = TOP_FACILITIES_COUNT
): FacilityRanking {
  const threshold = selectRankingThreshold(series);
  if (threshold === null) {
    return { threshold: null, facilities: [] };
  }

  const rows = series.get(threshold) ?? [];
  return {
    threshold,
    facilities: topByProbability(rows, topN).map((row, index) => ({
      rank: index + 1,
      facilityId: row.facilityId,
      name: row.name,
      detail: row.detail,
      probability: row.probability,
    })),
  };
}
