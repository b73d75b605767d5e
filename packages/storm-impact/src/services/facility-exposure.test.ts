import { describe, it, expect } from 'vitest';
import { computeFacilityProbabilities } from './facility-exposure.js';
import { TurfZonalIntersector } from '../providers/zonal-intersector.js';
import { TableIntersector, makeEnvelope, makeFacility, square } from '../__tests__/utils/fixtures.js';

describe('computeFacilityProbabilities', () => {
  it('should carry facility names and details into every threshold present', () => {
    const facilities = [
      makeFacility('s1', 'school', 'North Primary', 'Primary'),
      makeFacility('s2', 'school', 'South Secondary', 'Secondary'),
    ];
    const envelopes = [
      makeEnvelope(1, 34),
      makeEnvelope(2, 34),
      makeEnvelope(1, 64),
      makeEnvelope(2, 64),
    ];
    const intersector = new TableIntersector({ s1: { 34: [1, 2], 64: [] }, s2: { 34: [2], 64: [] } });

    const series = computeFacilityProbabilities(facilities, envelopes, intersector);

    expect([...series.keys()]).toEqual([34, 64]);
    expect(series.get(34)).toEqual([
      { facilityId: 's1', name: 'North Primary', detail: 'Primary', probability: 1 },
      { facilityId: 's2', name: 'South Secondary', detail: 'Secondary', probability: 0.5 },
    ]);
    expect(series.get(64)?.map((row) => row.probability)).toEqual([0, 0]);
  });

  it('should buffer facility points before intersecting', () => {
    // Facility at (0.5, 0.5); envelope edge 100 m east of it
    const facility = { ...makeFacility('h1', 'healthCenter', 'Clinic', 'Clinic'), lon: 0.5, lat: 0.5 };
    const nearby = makeEnvelope(1, 34, square(0.5009, 0.4, 0.2));

    const series = computeFacilityProbabilities([facility], [nearby], new TurfZonalIntersector());

    expect(series.get(34)?.[0]?.probability).toBe(1);
  });

  it('should return an empty series without facilities', () => {
    expect(computeFacilityProbabilities([], [makeEnvelope(1, 34)], new TableIntersector({})).size).toBe(0);
  });
});
