/**
 * Collaborator Interfaces
 *
 * External sources of zone grids, attribute layers, boundaries and facility
 * locations. Implementations throw MissingDataError when a source has
 * nothing to offer; callers decide the fallback.
 */

import type { AdminUnit, Facility, FacilityKind, RegionBoundary, ZoneAttribute } from '../core/types/index.js';
import type { SpatialUnit } from './zonal-intersector.js';

/**
 * Attribute layers a zone value provider can serve
 *
 * `schoolAgeRange` is the age-bracket population used when no school-age
 * layer exists.
 */
export type AttributeLayerName = ZoneAttribute | 'schoolAgeRange';

export interface ZoneValueProvider {
  /** Tile grid of a region at a zoom level */
  fetchZoneGrid(region: string, zoom: number): Promise<SpatialUnit[]>;
  /** Tile id → value; tiles without a value are absent */
  fetchAttributeLayer(region: string, zoom: number, layer: AttributeLayerName): Promise<ReadonlyMap<string, number>>;
}

export interface BoundaryProvider {
  regionBoundary(region: string): Promise<RegionBoundary>;
  /** First-level administrative units, in provider order */
  adminUnits(region: string): Promise<AdminUnit[]>;
}

export interface FacilityProvider {
  fetchFacilities(region: string, kind: FacilityKind): Promise<Facility[]>;
}
