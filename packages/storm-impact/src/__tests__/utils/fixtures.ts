/**
 * Shared test fixtures: synthetic geometries, zones, envelopes and a
 * table-driven intersector.
 */

import type { Polygon } from 'geojson';
import type { WindThreshold } from '../../core/constants.js';
import {
  emptyAttributes,
  type AdminUnit,
  type Facility,
  type HazardEnvelope,
  type Zone,
  type ZoneAttributes,
  type ZoneGeometry,
} from '../../core/types/index.js';
import type { SpatialUnit, ZonalIntersector } from '../../providers/zonal-intersector.js';

/**
 * Axis-aligned square with its lower-left corner at (lon, lat)
 */
export function square(lon: number, lat: number, size = 1): Polygon {
  return {
    type: 'Polygon',
    coordinates: [
      [
        [lon, lat],
        [lon + size, lat],
        [lon + size, lat + size],
        [lon, lat + size],
        [lon, lat],
      ],
    ],
  };
}

export function makeZone(
  id: string,
  attributes: Partial<ZoneAttributes> = {},
  options: { adminId?: string; geometry?: ZoneGeometry } = {}
): Zone {
  return {
    id,
    geometry: options.geometry ?? square(0, 0),
    attributes: { ...emptyAttributes(), ...attributes },
    adminId: options.adminId,
  };
}

export function makeAdmin(id: string, geometry: ZoneGeometry = square(0, 0), name = `Admin ${id}`): AdminUnit {
  return { id, name, geometry };
}

export function makeEnvelope(
  ensembleMember: number,
  windThreshold: WindThreshold,
  geometry: Polygon = square(0, 0)
): HazardEnvelope {
  return { ensembleMember, windThreshold, leadTimeRange: '0-120', geometry };
}

export function makeFacility(
  id: string,
  kind: Facility['kind'],
  name: string,
  detail = ''
): Facility {
  return { id, kind, name, detail, lon: 0.5, lat: 0.5 };
}

/**
 * Coverage table: unit id → threshold → covering ensemble members
 */
export type CoverageTable = Readonly<Record<string, Partial<Record<WindThreshold, readonly number[]>>>>;

/**
 * Intersector answering from a fixed coverage table
 *
 * Members listed in the table but absent from the envelope set are ignored,
 * as a real intersector could never report them.
 */
export class TableIntersector implements ZonalIntersector {
  calls = 0;

  constructor(private readonly table: CoverageTable) {}

  coveringMembers(
    units: readonly SpatialUnit[],
    envelopes: readonly HazardEnvelope[]
  ): ReadonlyMap<string, ReadonlySet<number>> {
    this.calls += 1;
    const result = new Map<string, ReadonlySet<number>>();
    for (const unit of units) {
      const members = new Set<number>();
      for (const envelope of envelopes) {
        const listed = this.table[unit.id]?.[envelope.windThreshold] ?? [];
        if (listed.includes(envelope.ensembleMember)) {
          members.add(envelope.ensembleMember);
        }
      }
      result.set(unit.id, members);
    }
    return result;
  }
}
