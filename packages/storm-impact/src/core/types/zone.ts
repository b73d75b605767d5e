/**
 * Zone Types
 *
 * A zone is a fine-grained spatial unit (mercator tile or buffered facility)
 * carrying static baseline attributes. Attribute values are `number | null`:
 * null means the attribute was never measured, which is distinct from a
 * measured zero.
 */

import type { MultiPolygon, Polygon } from 'geojson';

// ============================================================================
// Attributes
// ============================================================================

/**
 * Baseline attributes carried by every tile zone
 */
export const ZONE_ATTRIBUTES = [
  'population',
  'builtSurfaceM2',
  'numSchools',
  'schoolAgePopulation',
  'infantPopulation',
  'numHealthCenters',
  'rwi',
  'smodClass',
] as const;

export type ZoneAttribute = (typeof ZONE_ATTRIBUTES)[number];

export type ZoneAttributes = Readonly<Record<ZoneAttribute, number | null>>;

/**
 * How an attribute rolls up to a coarser unit
 */
export type AggregationKind = 'sum' | 'mean' | 'max';

/**
 * Roll-up rule per attribute: counts and quantities sum, indices average
 */
export const ATTRIBUTE_AGGREGATION: Readonly<Record<ZoneAttribute, AggregationKind>> = {
  population: 'sum',
  builtSurfaceM2: 'sum',
  numSchools: 'sum',
  schoolAgePopulation: 'sum',
  infantPopulation: 'sum',
  numHealthCenters: 'sum',
  rwi: 'mean',
  smodClass: 'mean',
};

/**
 * Attribute record with every value missing
 */
export function emptyAttributes(): ZoneAttributes {
  return {
    population: null,
    builtSurfaceM2: null,
    numSchools: null,
    schoolAgePopulation: null,
    infantPopulation: null,
    numHealthCenters: null,
    rwi: null,
    smodClass: null,
  };
}

// ============================================================================
// Demographic Groups
// ============================================================================

export const DEMOGRAPHIC_GROUPS = ['children', 'schoolAge', 'infants', 'population'] as const;

export type DemographicGroup = (typeof DEMOGRAPHIC_GROUPS)[number];

/**
 * Value of a demographic group for one attribute record
 *
 * Children are school-age plus infants; missing if either part is missing.
 */
export function groupValue(attributes: ZoneAttributes, group: DemographicGroup): number | null {
  switch (group) {
    case 'children': {
      const { schoolAgePopulation, infantPopulation } = attributes;
      if (schoolAgePopulation === null || infantPopulation === null) {
        return null;
      }
      return schoolAgePopulation + infantPopulation;
    }
    case 'schoolAge':
      return attributes.schoolAgePopulation;
    case 'infants':
      return attributes.infantPopulation;
    case 'population':
      return attributes.population;
  }
}

// ============================================================================
// Zones
// ============================================================================

export type ZoneGeometry = Polygon | MultiPolygon;

/**
 * Tile zone with baseline attributes
 *
 * `adminId` is filled by the max-overlap assignment when the base view is
 * materialized; it is required before the severity index can be computed.
 */
export interface Zone {
  readonly id: string;
  readonly geometry: ZoneGeometry;
  readonly attributes: ZoneAttributes;
  readonly adminId?: string;
}

/**
 * Administrative unit boundary
 */
export interface AdminUnit {
  readonly id: string;
  readonly name: string;
  readonly geometry: ZoneGeometry;
}

/**
 * Region (country) boundary
 */
export interface RegionBoundary {
  readonly code: string;
  readonly name: string;
  readonly geometry: ZoneGeometry;
}

// ============================================================================
// Facilities
// ============================================================================

export type FacilityKind = 'school' | 'healthCenter';

/**
 * Point facility (school or health facility)
 *
 * `detail` is the education level for schools and the facility type for
 * health facilities.
 */
export interface Facility {
  readonly id: string;
  readonly kind: FacilityKind;
  readonly name: string;
  readonly detail: string;
  readonly lon: number;
  readonly lat: number;
}
