/**
 * Tests for the composite severity index
 *
 * Validates:
 * 1. Telescoping marginal rule for raw and expected variants
 * 2. Conservation for a zone exposed at a single threshold
 * 3. Missing baselines and missing admin assignments
 * 4. Admin-level sums
 */

import { describe, it, expect } from 'vitest';
import {
  computeAdminSeverity,
  computeZoneSeverity,
  requireAdminAssignment,
  severityIndex,
} from './severity-index.js';
import { ConfigurationError, isConfigurationError } from '../core/errors.js';
import type { WindThreshold } from '../core/constants.js';
import type { ProbabilityLayer, ProbabilitySeries } from '../core/types/index.js';
import { makeAdmin, makeZone } from '../__tests__/utils/fixtures.js';

function seriesOf(entries: Array<[WindThreshold, Record<string, number>]>): ProbabilitySeries {
  const layers: ProbabilityLayer[] = entries.map(([threshold, probabilities]) => ({
    threshold,
    memberCount: 10,
    rows: Object.entries(probabilities).map(([zoneId, probability]) => ({
      zoneId,
      coveringMembers: Math.round(probability * 10),
      probability,
    })),
  }));
  return new Map(layers.map((layer) => [layer.threshold, layer] as const));
}

describe('severityIndex', () => {
  it('should weight the band where coverage ends for equal coverage at 34 and 64', () => {
    const probabilities = [
      [34, 0.6],
      [64, 0.6],
      [96, 0],
    ] as const;

    // covered: 1000, 1000, 0 -> marginals 0, 1000, 0
    expect(severityIndex(1000, probabilities, 'raw')).toBeCloseTo(1000 * 64 * 64 * 1e-6, 12);
    expect(severityIndex(1000, probabilities, 'raw')).toBeCloseTo(4.096, 12);
    // covered: 600, 600, 0
    expect(severityIndex(1000, probabilities, 'expected')).toBeCloseTo(2.4576, 12);
  });

  it('should partition population across decreasing coverage bands', () => {
    const probabilities = [
      [34, 1],
      [64, 0.5],
      [96, 0.25],
    ] as const;

    // expected covered: 100, 50, 25 -> marginals 50, 25, 25
    const expected = 50 * 34 * 34 * 1e-6 + 25 * 64 * 64 * 1e-6 + 25 * 96 * 96 * 1e-6;
    expect(severityIndex(100, probabilities, 'expected')).toBeCloseTo(expected, 12);
    // raw covered: 100, 100, 100 -> everything in the top band
    expect(severityIndex(100, probabilities, 'raw')).toBeCloseTo(100 * 96 * 96 * 1e-6, 12);
  });

  it('should return exactly population × t² × 1e-6 for a zone exposed at a single threshold', () => {
    const onlyLowest = [
      [34, 0.4],
      [64, 0],
      [96, 0],
    ] as const;
    expect(severityIndex(1000, onlyLowest, 'raw')).toBeCloseTo(1.156, 12);

    const singleThreshold = [[137, 0.1]] as const;
    expect(severityIndex(1000, singleThreshold, 'raw')).toBeCloseTo(1000 * 137 * 137 * 1e-6, 12);
  });

  it('should give the full weight of the top threshold when only that threshold is exposed', () => {
    const onlyHighest = [
      [34, 0],
      [64, 0],
      [96, 0.3],
    ] as const;

    expect(severityIndex(1000, onlyHighest, 'raw')).toBeCloseTo(9.216, 12);
    expect(severityIndex(1000, onlyHighest, 'expected')).toBeCloseTo(300 * 96 * 96 * 1e-6, 12);
  });

  it('should never produce negative bands when coverage rises with the threshold', () => {
    const rising = [
      [34, 0.2],
      [64, 0.5],
    ] as const;

    // expected covered: 200, 500 -> 500, 500 -> marginals 0, 500
    expect(severityIndex(1000, rising, 'expected')).toBeCloseTo(500 * 64 * 64 * 1e-6, 12);
  });

  it('should propagate a missing value as null', () => {
    expect(severityIndex(null, [[34, 1]], 'raw')).toBeNull();
  });

  it('should be zero when no thresholds were computed', () => {
    expect(severityIndex(500, [], 'expected')).toBe(0);
  });
});

describe('computeZoneSeverity', () => {
  it('should emit four groups for both variants', () => {
    const zones = [
      makeZone(
        't1',
        { population: 1000, schoolAgePopulation: 200, infantPopulation: 50 },
        { adminId: 'A' }
      ),
    ];
    const [row] = computeZoneSeverity(zones, seriesOf([[34, { t1: 0.5 }]]));

    expect(row.id).toBe('t1');
    expect(row.adminId).toBe('A');
    expect(row.raw.population).toBeCloseTo(1000 * 34 * 34 * 1e-6, 12);
    expect(row.raw.children).toBeCloseTo(250 * 34 * 34 * 1e-6, 12);
    expect(row.expected.schoolAge).toBeCloseTo(100 * 34 * 34 * 1e-6, 12);
    expect(row.expected.infants).toBeCloseTo(25 * 34 * 34 * 1e-6, 12);
  });

  it('should treat a zone missing from a layer as probability zero', () => {
    const zones = [makeZone('t1', { population: 100 }, { adminId: 'A' })];
    const [row] = computeZoneSeverity(zones, seriesOf([[34, {}]]));

    expect(row.raw.population).toBe(0);
    expect(row.expected.population).toBe(0);
  });

  it('should yield null children when either part is missing', () => {
    const zones = [makeZone('t1', { population: 100, schoolAgePopulation: 10 }, { adminId: 'A' })];
    const [row] = computeZoneSeverity(zones, seriesOf([[34, { t1: 1 }]]));

    expect(row.raw.children).toBeNull();
    expect(row.raw.infants).toBeNull();
    expect(row.raw.schoolAge).not.toBeNull();
  });

  it('should fail fast when a zone has no admin assignment', () => {
    const zones = [makeZone('t1', { population: 1 }, { adminId: 'A' }), makeZone('t2', { population: 1 })];

    expect(() => computeZoneSeverity(zones, seriesOf([[34, { t1: 1 }]]), 'ATL')).toThrow(ConfigurationError);

    try {
      requireAdminAssignment(zones, 'ATL');
    } catch (error) {
      expect(isConfigurationError(error)).toBe(true);
      if (isConfigurationError(error)) {
        expect(error.details.offending).toEqual(['t2']);
        expect(error.details.region).toBe('ATL');
      }
    }
  });
});

describe('computeAdminSeverity', () => {
  it('should sum zone indices per admin unit in admin order', () => {
    const zones = [
      makeZone('t1', { population: 1000 }, { adminId: 'B' }),
      makeZone('t2', { population: 500 }, { adminId: 'A' }),
      makeZone('t3', { population: 500 }, { adminId: 'B' }),
    ];
    const zoneRows = computeZoneSeverity(zones, seriesOf([[34, { t1: 1, t2: 1, t3: 0.5 }]]));
    const adminRows = computeAdminSeverity(zoneRows, [makeAdmin('A'), makeAdmin('B'), makeAdmin('C')]);

    const weight = 34 * 34 * 1e-6;
    expect(adminRows.map((row) => row.adminId)).toEqual(['A', 'B', 'C']);
    expect(adminRows[0].raw.population).toBeCloseTo(500 * weight, 12);
    expect(adminRows[1].raw.population).toBeCloseTo(1500 * weight, 12);
    expect(adminRows[1].expected.population).toBeCloseTo(1250 * weight, 12);
    expect(adminRows[2].raw.population).toBeNull();

    const zoneTotal = zoneRows.reduce((sum, row) => sum + (row.expected.population ?? 0), 0);
    const adminTotal = adminRows.reduce((sum, row) => sum + (row.expected.population ?? 0), 0);
    expect(adminTotal).toBeCloseTo(zoneTotal, 12);
  });
});
