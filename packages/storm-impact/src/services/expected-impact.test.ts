import { describe, it, expect } from 'vitest';
import { computeExpectedSeries, scaleAttributes, sumExpected } from './expected-impact.js';
import { ConfigurationError } from '../core/errors.js';
import { ZONE_ATTRIBUTES, type ProbabilityLayer, type ProbabilitySeries } from '../core/types/index.js';
import type { WindThreshold } from '../core/constants.js';
import { makeZone } from '../__tests__/utils/fixtures.js';

function layer(threshold: WindThreshold, probabilities: Record<string, number>): ProbabilityLayer {
  return {
    threshold,
    memberCount: 10,
    rows: Object.entries(probabilities).map(([zoneId, probability]) => ({
      zoneId,
      coveringMembers: probability * 10,
      probability,
    })),
  };
}

function seriesOf(...layers: ProbabilityLayer[]): ProbabilitySeries {
  return new Map(layers.map((entry) => [entry.threshold, entry] as const));
}

describe('ExpectedImpactCalculator', () => {
  const zones = [
    makeZone('t1', { population: 1000, numSchools: 4, rwi: -0.8, smodClass: 30 }, { adminId: 'A' }),
    makeZone('t2', { population: 250, numSchools: 0 }, { adminId: 'B' }),
  ];

  it('should equal baseline × probability for every non-missing attribute', () => {
    const probabilities = seriesOf(layer(34, { t1: 0.6, t2: 0.2 }), layer(64, { t1: 0.3, t2: 0 }));

    const series = computeExpectedSeries(probabilities, zones);

    for (const [threshold, expectedLayer] of series) {
      const probabilityLayer = probabilities.get(threshold);
      expect(expectedLayer.rows).toHaveLength(probabilityLayer?.rows.length ?? -1);
      for (const row of expectedLayer.rows) {
        const zone = zones.find((candidate) => candidate.id === row.zoneId);
        for (const attribute of ZONE_ATTRIBUTES) {
          const baseline = zone?.attributes[attribute] ?? null;
          if (baseline !== null) {
            expect(row.expected[attribute]).toBeCloseTo(baseline * row.probability, 12);
          }
        }
      }
    }

    expect(series.get(34)?.rows[0]).toMatchObject({ zoneId: 't1', adminId: 'A', probability: 0.6 });
    expect(series.get(34)?.rows[0].expected.population).toBeCloseTo(600, 10);
  });

  it('should keep missing baselines missing rather than zero', () => {
    const scaled = scaleAttributes(zones[1].attributes, 0.5);

    expect(scaled.population).toBe(125);
    expect(scaled.numSchools).toBe(0);
    expect(scaled.schoolAgePopulation).toBeNull();
    expect(scaled.rwi).toBeNull();
  });

  it('should sum an attribute over a layer skipping missing values', () => {
    const series = computeExpectedSeries(seriesOf(layer(34, { t1: 0.5, t2: 1 })), zones);
    const expectedLayer = series.get(34);

    expect(expectedLayer && sumExpected(expectedLayer, 'population')).toBe(750);
    expect(expectedLayer && sumExpected(expectedLayer, 'schoolAgePopulation')).toBe(0);
  });

  it('should reject probability rows for unknown zones', () => {
    expect(() => computeExpectedSeries(seriesOf(layer(34, { ghost: 1 })), zones)).toThrow(
      ConfigurationError
    );
  });
});
