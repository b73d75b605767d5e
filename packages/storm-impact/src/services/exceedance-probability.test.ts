/**
 * Tests for the exceedance probability calculator
 *
 * Validates:
 * 1. Probability = covering members / members present at the threshold
 * 2. Monotonicity across nested envelopes (real turf intersection)
 * 3. Skipping thresholds without envelopes
 * 4. Early exit after the first all-zero threshold
 */

import { describe, it, expect } from 'vitest';
import {
  computeProbabilityLayer,
  computeProbabilitySeries,
  groupEnvelopesByThreshold,
  sumProbability,
} from './exceedance-probability.js';
import { TurfZonalIntersector } from '../providers/zonal-intersector.js';
import { WIND_THRESHOLDS } from '../core/constants.js';
import { TableIntersector, makeEnvelope, makeZone, square } from '../__tests__/utils/fixtures.js';

describe('computeProbabilityLayer', () => {
  it('should divide covering members by distinct members at the threshold', () => {
    const zones = [makeZone('a'), makeZone('b'), makeZone('c')];
    const envelopes = [
      makeEnvelope(1, 34),
      makeEnvelope(2, 34),
      makeEnvelope(2, 34), // second polygon of member 2 counts once
      makeEnvelope(3, 34),
      makeEnvelope(4, 34),
    ];
    const intersector = new TableIntersector({
      a: { 34: [1, 2, 3] },
      b: { 34: [2] },
    });

    const layer = computeProbabilityLayer(34, zones, envelopes, intersector);

    expect(layer).not.toBeNull();
    expect(layer?.memberCount).toBe(4);
    expect(layer?.rows).toEqual([
      { zoneId: 'a', coveringMembers: 3, probability: 0.75 },
      { zoneId: 'b', coveringMembers: 1, probability: 0.25 },
      { zoneId: 'c', coveringMembers: 0, probability: 0 },
    ]);
  });

  it('should return null when the threshold has no envelopes', () => {
    const layer = computeProbabilityLayer(64, [makeZone('a')], [makeEnvelope(1, 34)], new TableIntersector({}));
    expect(layer).toBeNull();
  });
});

describe('computeProbabilitySeries', () => {
  it('should be non-increasing in threshold for nested envelopes', () => {
    const zones = [
      makeZone('inner', {}, { geometry: square(0.2, 0.2, 0.5) }),
      makeZone('middle', {}, { geometry: square(1.5, 1.5, 0.3) }),
      makeZone('outer', {}, { geometry: square(3, 3, 0.5) }),
      makeZone('far', {}, { geometry: square(10, 10, 0.5) }),
    ];
    const envelopes = [
      makeEnvelope(1, 34, square(0, 0, 4)),
      makeEnvelope(1, 64, square(0, 0, 2)),
      makeEnvelope(1, 96, square(0, 0, 1)),
      makeEnvelope(2, 34, square(0, 0, 2)),
      makeEnvelope(2, 64, square(0, 0, 1)),
      makeEnvelope(2, 96, square(50, 50, 1)),
    ];

    const series = computeProbabilitySeries(zones, envelopes, new TurfZonalIntersector());

    const probabilities = (zoneId: string): number[] =>
      [...series.values()].map((layer) => layer.rows.find((row) => row.zoneId === zoneId)?.probability ?? -1);

    expect([...series.keys()]).toEqual([34, 64, 96]);
    expect(probabilities('inner')).toEqual([1, 1, 0.5]);
    expect(probabilities('middle')).toEqual([1, 0.5, 0]);
    expect(probabilities('outer')).toEqual([0.5, 0, 0]);
    expect(probabilities('far')).toEqual([0, 0, 0]);

    for (const zone of zones) {
      const values = probabilities(zone.id);
      for (let i = 1; i < values.length; i++) {
        expect(values[i]).toBeLessThanOrEqual(values[i - 1]);
      }
    }
  });

  it('should skip thresholds without envelopes instead of treating them as zero', () => {
    const intersector = new TableIntersector({ a: { 34: [1], 96: [1] } });
    const series = computeProbabilitySeries(
      [makeZone('a')],
      [makeEnvelope(1, 96), makeEnvelope(1, 34)],
      intersector
    );

    expect([...series.keys()]).toEqual([34, 96]);
    expect(series.has(40)).toBe(false);
    expect(intersector.calls).toBe(2);
  });

  it('should stop after the first threshold with zero summed probability', () => {
    const intersector = new TableIntersector({ a: { 34: [1, 2] } });
    const thresholds = [34, 64, 96, 137] as const;
    const envelopes = thresholds.flatMap((threshold) => [makeEnvelope(1, threshold), makeEnvelope(2, threshold)]);

    const series = computeProbabilitySeries([makeZone('a')], envelopes, intersector);

    expect([...series.keys()]).toEqual([34, 64]);
    const zeroLayer = series.get(64);
    expect(zeroLayer && sumProbability(zeroLayer)).toBe(0);
    expect(intersector.calls).toBe(2);
  });

  it('should compute every threshold when early exit is disabled', () => {
    const intersector = new TableIntersector({ a: { 34: [1] } });
    const envelopes = [makeEnvelope(1, 34), makeEnvelope(1, 64), makeEnvelope(1, 96)];

    const series = computeProbabilitySeries([makeZone('a')], envelopes, intersector, { earlyExit: false });

    expect([...series.keys()]).toEqual([34, 64, 96]);
    expect(intersector.calls).toBe(3);
  });
});

describe('groupEnvelopesByThreshold', () => {
  it('should bucket envelopes by threshold', () => {
    const grouped = groupEnvelopesByThreshold([makeEnvelope(1, 50), makeEnvelope(2, 34), makeEnvelope(3, 50)]);

    expect(grouped.get(50)?.map((envelope) => envelope.ensembleMember)).toEqual([1, 3]);
    expect(grouped.get(34)?.length).toBe(1);
    expect(WIND_THRESHOLDS.filter((threshold) => grouped.has(threshold))).toEqual([34, 50]);
  });
});
