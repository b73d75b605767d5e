/**
 * Tests for the hierarchical aggregator
 *
 * Validates:
 * 1. Sum/mean/max aggregation with missing values
 * 2. Conservation of sum-type attributes from tiles to admins
 * 3. Max-overlap assignment and its lowest-id tie-break
 * 4. Admin impact layers
 */

import { describe, it, expect } from 'vitest';
import {
  aggregateBaselineToAdmins,
  aggregateExpectedToAdmins,
  aggregateToAdmins,
  assignZonesToAdmins,
  computeOverlapAreas,
  pickMaxOverlap,
} from './hierarchical-aggregator.js';
import { computeExpectedSeries } from './expected-impact.js';
import type { ProbabilityLayer } from '../core/types/index.js';
import type { WindThreshold } from '../core/constants.js';
import { makeAdmin, makeZone, square } from '../__tests__/utils/fixtures.js';

describe('aggregateToAdmins', () => {
  it('should sum, average and take the maximum per admin', () => {
    const result = aggregateToAdmins<'n' | 'm' | 'p'>(
      [
        { adminId: 'A', values: { n: 10, m: 2, p: 0.1 } },
        { adminId: 'A', values: { n: 5, m: 4, p: 0.7 } },
        { adminId: 'B', values: { n: 1, m: null, p: 0.2 } },
      ],
      [
        { column: 'n', kind: 'sum' },
        { column: 'm', kind: 'mean' },
        { column: 'p', kind: 'max' },
      ]
    );

    expect(result.get('A')?.get('n')).toBe(15);
    expect(result.get('A')?.get('m')).toBe(3);
    expect(result.get('A')?.get('p')).toBe(0.7);
    expect(result.get('B')?.get('m')).toBeNull();
  });

  it('should list admins in the requested order and give empty admins null', () => {
    const result = aggregateToAdmins<'n'>(
      [{ adminId: 'Z', values: { n: 3 } }],
      [{ column: 'n', kind: 'sum' }],
      ['B', 'A']
    );

    expect([...result.keys()]).toEqual(['B', 'A', 'Z']);
    expect(result.get('B')?.get('n')).toBeNull();
    expect(result.get('Z')?.get('n')).toBe(3);
  });
});

describe('aggregateBaselineToAdmins', () => {
  it('should conserve sum-type attributes from tiles to admin units', () => {
    const zones = [
      makeZone('t1', { population: 120, builtSurfaceM2: 900, numSchools: 2, rwi: -1.2 }, { adminId: 'A' }),
      makeZone('t2', { population: 80, builtSurfaceM2: 100, numSchools: 0, rwi: 0.4 }, { adminId: 'A' }),
      makeZone('t3', { population: 300, builtSurfaceM2: 50, numSchools: 1, rwi: null }, { adminId: 'B' }),
      makeZone('t4', { population: 7, builtSurfaceM2: null, numSchools: 3 }, { adminId: 'C' }),
    ];
    const admins = [makeAdmin('A'), makeAdmin('B'), makeAdmin('C')];

    const byAdmin = aggregateBaselineToAdmins(zones, admins);

    for (const attribute of ['population', 'builtSurfaceM2', 'numSchools'] as const) {
      const tileTotal = zones.reduce((sum, zone) => sum + (zone.attributes[attribute] ?? 0), 0);
      const adminTotal = [...byAdmin.values()].reduce((sum, values) => sum + (values[attribute] ?? 0), 0);
      expect(adminTotal).toBe(tileTotal);
    }

    expect(byAdmin.get('A')?.rwi).toBeCloseTo(-0.4, 12);
    expect(byAdmin.get('B')?.rwi).toBeNull();
    expect(byAdmin.get('C')?.builtSurfaceM2).toBeNull();
  });
});

describe('max-overlap assignment', () => {
  // West unit covers lon 0-1, east unit lon 1-2; ids chosen so order differs from geography
  const west = makeAdmin('W2', square(0, 0, 1));
  const east = makeAdmin('E1', square(1, 0, 1));

  it('should assign a tile to the unit with the largest overlap', () => {
    const tile = square(0.2, 0.2, 1);
    const overlaps = computeOverlapAreas(tile, [west, east]);

    expect(overlaps.map((overlap) => overlap.adminId)).toEqual(['W2', 'E1']);
    expect(overlaps[0].area).toBeGreaterThan(overlaps[1].area);
    expect(pickMaxOverlap(overlaps)).toBe('W2');
  });

  it('should break exact ties by the lowest admin id', () => {
    expect(
      pickMaxOverlap([
        { adminId: 'W2', area: 500 },
        { adminId: 'E1', area: 500 },
        { adminId: 'X0', area: 499 },
      ])
    ).toBe('E1');
  });

  it('should treat areas within the relative tolerance as ties', () => {
    expect(
      pickMaxOverlap([
        { adminId: 'B', area: 1e6 },
        { adminId: 'A', area: 1e6 * (1 - 1e-12) },
      ])
    ).toBe('A');
    expect(
      pickMaxOverlap([
        { adminId: 'B', area: 1e6 },
        { adminId: 'A', area: 1e6 * (1 - 1e-6) },
      ])
    ).toBe('B');
  });

  it('should break geometric ties on a shared border by the lowest admin id', () => {
    const straddling = makeZone('t1', { population: 10 }, { geometry: square(0.5, 0.25, 1) });
    const result = assignZonesToAdmins([straddling], [west, east]);

    expect(result.zones[0].adminId).toBe('E1');
  });

  it('should exclude tiles outside every unit and report them', () => {
    const warnings: string[] = [];
    const logger = {
      debug: () => undefined,
      info: () => undefined,
      warn: (message: string) => {
        warnings.push(message);
      },
      error: () => undefined,
    };
    const inside = makeZone('in', { population: 5 }, { geometry: square(0.1, 0.1, 0.2) });
    const outside = makeZone('out', { population: 9 }, { geometry: square(20, 20, 0.2) });

    const result = assignZonesToAdmins([inside, outside], [west, east], logger);

    expect(result.zones.map((zone) => [zone.id, zone.adminId])).toEqual([['in', 'W2']]);
    expect(result.unassigned).toEqual(['out']);
    expect(warnings).toHaveLength(1);
  });

  it('should return no unit for an empty overlap list', () => {
    expect(pickMaxOverlap([])).toBeUndefined();
  });
});

describe('aggregateExpectedToAdmins', () => {
  it('should sum expected values and take the highest tile probability per admin', () => {
    const zones = [
      makeZone('t1', { population: 100 }, { adminId: 'A' }),
      makeZone('t2', { population: 200 }, { adminId: 'A' }),
      makeZone('t3', { population: 50 }, { adminId: 'B' }),
    ];
    const probabilities = new Map<WindThreshold, ProbabilityLayer>([
      [
        34,
        {
          threshold: 34,
          memberCount: 4,
          rows: [
            { zoneId: 't1', coveringMembers: 1, probability: 0.25 },
            { zoneId: 't2', coveringMembers: 2, probability: 0.5 },
            { zoneId: 't3', coveringMembers: 0, probability: 0 },
          ],
        },
      ],
    ]);

    const series = aggregateExpectedToAdmins(
      computeExpectedSeries(probabilities, zones),
      [makeAdmin('A', square(0, 0), 'Alpha'), makeAdmin('B', square(0, 0), 'Beta')]
    );

    expect(series.get(34)?.rows).toEqual([
      {
        adminId: 'A',
        adminName: 'Alpha',
        probability: 0.5,
        expected: expect.objectContaining({ population: 125 }),
      },
      {
        adminId: 'B',
        adminName: 'Beta',
        probability: 0,
        expected: expect.objectContaining({ population: 0, numSchools: null }),
      },
    ]);
  });
});
