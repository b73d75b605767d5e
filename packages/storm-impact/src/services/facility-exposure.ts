/**
 * Facility Exposure
 *
 * Schools and health facilities are buffered into small circular zones and
 * run through the same exceedance rule as tiles. Every threshold present in
 * the envelope set is evaluated; facilities are few, so there is no early
 * exit.
 */

import { FACILITY_BUFFER_METERS, type WindThreshold } from '../core/constants.js';
import type {
  Facility,
  FacilityProbabilityRow,
  FacilityProbabilitySeries,
  HazardEnvelope,
} from '../core/types/index.js';
import { facilityToUnit, type ZonalIntersector } from '../providers/zonal-intersector.js';
import { computeProbabilitySeries } from './exceedance-probability.js';

export function computeFacilityProbabilities(
  facilities: readonly Facility[],
  envelopes: readonly HazardEnvelope[],
  intersector: ZonalIntersector,
  bufferMeters: number = FACILITY_BUFFER_METERS
): FacilityProbabilitySeries {
  if (facilities.length === 0) {
    return new Map();
  }

  const byId = new Map(facilities.map((facility) => [facility.id, facility] as const));
  const units = facilities.map((facility) => facilityToUnit(facility, bufferMeters));
  const probabilities = computeProbabilitySeries(units, envelopes, intersector, { earlyExit: false });

  const series = new Map<WindThreshold, FacilityProbabilityRow[]>();
  for (const [threshold, layer] of probabilities) {
    series.set(
      threshold,
      layer.rows.map((row) => {
        const facility = byId.get(row.zoneId);
        return {
          facilityId: row.zoneId,
          name: facility?.name ?? '',
          detail: facility?.detail ?? '',
          probability: row.probability,
        };
      })
    );
  }
  return series;
}
