/**
 * Expected Impact Calculator
 *
 * expected(zone, t, attribute) = baseline(zone, attribute) × probability(zone, t)
 *
 * Applied uniformly to every baseline attribute. One output row per zone in
 * the probability layer; a missing baseline stays missing.
 */

import { WIND_THRESHOLDS, type WindThreshold } from '../core/constants.js';
import { ConfigurationError } from '../core/errors.js';
import type {
  ExpectedImpactLayer,
  ExpectedImpactRow,
  ExpectedImpactSeries,
  ProbabilityLayer,
  ProbabilitySeries,
  Zone,
  ZoneAttribute,
  ZoneAttributes,
} from '../core/types/index.js';

/**
 * Scale every attribute by a probability, keeping nulls
 */
export function scaleAttributes(attributes: ZoneAttributes, probability: number): ZoneAttributes {
  const scale = (value: number | null): number | null => (value === null ? null : value * probability);
  return {
    population: scale(attributes.population),
    builtSurfaceM2: scale(attributes.builtSurfaceM2),
    numSchools: scale(attributes.numSchools),
    schoolAgePopulation: scale(attributes.schoolAgePopulation),
    infantPopulation: scale(attributes.infantPopulation),
    numHealthCenters: scale(attributes.numHealthCenters),
    rwi: scale(attributes.rwi),
    smodClass: scale(attributes.smodClass),
  };
}

export function computeExpectedLayer(
  layer: ProbabilityLayer,
  zones: ReadonlyMap<string, Zone>
): ExpectedImpactLayer {
  const rows: ExpectedImpactRow[] = [];
  for (const row of layer.rows) {
    const zone = zones.get(row.zoneId);
    if (!zone) {
      throw new ConfigurationError('Probability row refers to an unknown zone', {
        component: 'expected-impact',
        offending: [row.zoneId],
      });
    }
    rows.push({
      zoneId: row.zoneId,
      adminId: zone.adminId,
      probability: row.probability,
      expected: scaleAttributes(zone.attributes, row.probability),
    });
  }
  return { threshold: layer.threshold, rows };
}

export function computeExpectedSeries(
  probabilities: ProbabilitySeries,
  zones: readonly Zone[]
): ExpectedImpactSeries {
  const byId = new Map(zones.map((zone) => [zone.id, zone] as const));
  const series = new Map<WindThreshold, ExpectedImpactLayer>();
  for (const threshold of WIND_THRESHOLDS) {
    const layer = probabilities.get(threshold);
    if (layer) {
      series.set(threshold, computeExpectedLayer(layer, byId));
    }
  }
  return series;
}

/**
 * Sum of one expected attribute over a layer, skipping missing values
 */
export function sumExpected(layer: ExpectedImpactLayer, attribute: ZoneAttribute): number {
  let total = 0;
  for (const row of layer.rows) {
    const value = row.expected[attribute];
    if (value !== null) total += value;
  }
  return total;
}
