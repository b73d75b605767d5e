/**
 * Zonal Intersector
 *
 * Decides which ensemble members' envelopes cover each zone. The exceedance
 * calculator owns only counting and normalization; "covers" is delegated
 * here so a raster- or index-backed implementation can be injected.
 *
 * The default implementation uses turf.js: bounding-box pre-filter, then an
 * exact `booleanIntersects` test, stopping early per member once a hit is
 * found.
 */

import { booleanIntersects, circle } from '@turf/turf';
import type { BBox, MultiPolygon, Polygon } from 'geojson';
import { FACILITY_BUFFER_METERS } from '../core/constants.js';
import { bboxesOverlap, extractBBox } from '../core/geo-utils.js';
import type { Facility, HazardEnvelope } from '../core/types/index.js';

/**
 * Anything with an id and a polygonal footprint
 */
export interface SpatialUnit {
  readonly id: string;
  readonly geometry: Polygon | MultiPolygon;
}

export interface ZonalIntersector {
  /**
   * Distinct ensemble members whose envelope covers each unit
   *
   * Every unit id appears in the result, with an empty set when no envelope
   * covers it.
   */
  coveringMembers(
    units: readonly SpatialUnit[],
    envelopes: readonly HazardEnvelope[]
  ): ReadonlyMap<string, ReadonlySet<number>>;
}

interface IndexedEnvelope {
  readonly envelope: HazardEnvelope;
  readonly bbox: BBox;
}

export class TurfZonalIntersector implements ZonalIntersector {
  coveringMembers(
    units: readonly SpatialUnit[],
    envelopes: readonly HazardEnvelope[]
  ): ReadonlyMap<string, ReadonlySet<number>> {
    const indexed: IndexedEnvelope[] = envelopes.map((envelope) => ({
      envelope,
      bbox: extractBBox(envelope.geometry),
    }));

    const result = new Map<string, ReadonlySet<number>>();
    for (const unit of units) {
      const unitBBox = extractBBox(unit.geometry);
      const members = new Set<number>();

      for (const { envelope, bbox } of indexed) {
        if (members.has(envelope.ensembleMember)) continue;
        if (!bboxesOverlap(unitBBox, bbox)) continue;
        if (booleanIntersects(unit.geometry, envelope.geometry)) {
          members.add(envelope.ensembleMember);
        }
      }

      result.set(unit.id, members);
    }
    return result;
  }
}

/**
 * Buffer a facility point into a circular zone
 */
export function facilityToUnit(
  facility: Facility,
  radiusMeters: number = FACILITY_BUFFER_METERS
): SpatialUnit {
  const footprint = circle([facility.lon, facility.lat], radiusMeters / 1000, {
    steps: 16,
    units: 'kilometers',
  });
  return { id: facility.id, geometry: footprint.geometry };
}
