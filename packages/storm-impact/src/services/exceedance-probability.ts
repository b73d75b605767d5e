/**
 * Exceedance Probability Calculator
 *
 * probability(zone, t) = distinct members whose envelope at t covers the zone
 *                        / distinct members with any envelope at t
 *
 * Thresholds are processed in ascending order. A threshold with no envelopes
 * is skipped (no data), never treated as zero everywhere. Once a threshold's
 * summed probability is zero, higher thresholds are not computed: within one
 * member, higher-threshold envelopes are subsets of lower ones.
 */

import { WIND_THRESHOLDS, type WindThreshold } from '../core/constants.js';
import type {
  HazardEnvelope,
  ProbabilityLayer,
  ProbabilityRow,
  ProbabilitySeries,
} from '../core/types/index.js';
import type { SpatialUnit, ZonalIntersector } from '../providers/zonal-intersector.js';

export interface ProbabilitySeriesOptions {
  /** Stop after the first threshold with zero summed probability (default true) */
  readonly earlyExit?: boolean;
}

/**
 * Group envelopes by threshold
 */
export function groupEnvelopesByThreshold(
  envelopes: readonly HazardEnvelope[]
): ReadonlyMap<WindThreshold, readonly HazardEnvelope[]> {
  const grouped = new Map<WindThreshold, HazardEnvelope[]>();
  for (const envelope of envelopes) {
    const bucket = grouped.get(envelope.windThreshold);
    if (bucket) {
      bucket.push(envelope);
    } else {
      grouped.set(envelope.windThreshold, [envelope]);
    }
  }
  return grouped;
}

/**
 * Exceedance probability of every unit at one threshold
 *
 * @returns null when no envelopes exist for the threshold
 */
export function computeProbabilityLayer(
  threshold: WindThreshold,
  units: readonly SpatialUnit[],
  envelopes: readonly HazardEnvelope[],
  intersector: ZonalIntersector
): ProbabilityLayer | null {
  const atThreshold = envelopes.filter((envelope) => envelope.windThreshold === threshold);
  if (atThreshold.length === 0) {
    return null;
  }

  const memberCount = new Set(atThreshold.map((envelope) => envelope.ensembleMember)).size;
  const covering = intersector.coveringMembers(units, atThreshold);

  const rows: ProbabilityRow[] = units.map((unit) => {
    const coveringMembers = covering.get(unit.id)?.size ?? 0;
    return {
      zoneId: unit.id,
      coveringMembers,
      probability: coveringMembers / memberCount,
    };
  });

  return { threshold, memberCount, rows };
}

/**
 * Exceedance probabilities across all thresholds present in the envelope set
 */
export function computeProbabilitySeries(
  units: readonly SpatialUnit[],
  envelopes: readonly HazardEnvelope[],
  intersector: ZonalIntersector,
  options: ProbabilitySeriesOptions = {}
): ProbabilitySeries {
  const earlyExit = options.earlyExit ?? true;
  const grouped = groupEnvelopesByThreshold(envelopes);
  const series = new Map<WindThreshold, ProbabilityLayer>();

  for (const threshold of WIND_THRESHOLDS) {
    const atThreshold = grouped.get(threshold);
    if (!atThreshold) continue;

    const layer = computeProbabilityLayer(threshold, units, atThreshold, intersector);
    if (!layer) continue;
    series.set(threshold, layer);

    if (earlyExit && sumProbability(layer) === 0) {
      break;
    }
  }

  return series;
}

export function sumProbability(layer: ProbabilityLayer): number {
  return layer.rows.reduce((sum, row) => sum + row.probability, 0);
}
