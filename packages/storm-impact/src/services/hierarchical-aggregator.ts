/**
 * Hierarchical Aggregator
 *
 * Rolls fine-grained tile records up to administrative units.
 *
 * Assignment: each tile goes to the admin unit with the largest intersection
 * area. Areas within OVERLAP_TIE_TOLERANCE (relative) are ties, broken by the
 * lexicographically lowest admin id. Tiles touching no admin unit stay
 * unassigned and are reported back to the caller.
 *
 * Aggregation: sum-type attributes are summed, mean-type attributes averaged,
 * probabilities take the maximum. Missing values are skipped; a unit whose
 * inputs are all missing gets null. Because each tile belongs to exactly one
 * unit, Σ_admins(sum attribute) == Σ_tiles(sum attribute).
 */

import { area, bbox as turfBBox, feature, featureCollection, intersect } from '@turf/turf';
import type { Feature, MultiPolygon, Polygon } from 'geojson';
import { OVERLAP_TIE_TOLERANCE, WIND_THRESHOLDS, type WindThreshold } from '../core/constants.js';
import { bboxesOverlap } from '../core/geo-utils.js';
import {
  ATTRIBUTE_AGGREGATION,
  ZONE_ATTRIBUTES,
  type AdminImpactLayer,
  type AdminImpactRow,
  type AdminImpactSeries,
  type AdminUnit,
  type AggregationKind,
  type ExpectedImpactSeries,
  type Zone,
  type ZoneAttribute,
  type ZoneAttributes,
} from '../core/types/index.js';
import type { PipelineLogger } from '../core/utils/logger.js';

// ============================================================================
// Numeric Aggregation
// ============================================================================

export interface ColumnSpec<K extends string> {
  readonly column: K;
  readonly kind: AggregationKind;
}

export interface AggregationInput<K extends string> {
  readonly adminId: string;
  readonly values: Readonly<Record<K, number | null>>;
}

interface Accumulator {
  sum: number;
  count: number;
  max: number;
}

function finalize(acc: Accumulator | undefined, kind: AggregationKind): number | null {
  if (!acc || acc.count === 0) {
    return null;
  }
  switch (kind) {
    case 'sum':
      return acc.sum;
    case 'mean':
      return acc.sum / acc.count;
    case 'max':
      return acc.max;
  }
}

/**
 * Aggregate per-tile values into per-admin values
 *
 * @param adminOrder - Admin ids to emit first, in this order; ids found only
 *   in the inputs follow in first-seen order
 */
export function aggregateToAdmins<K extends string>(
  inputs: readonly AggregationInput<K>[],
  columns: readonly ColumnSpec<K>[],
  adminOrder: readonly string[] = []
): ReadonlyMap<string, ReadonlyMap<K, number | null>> {
  const accumulators = new Map<string, Map<K, Accumulator>>();
  for (const adminId of adminOrder) {
    accumulators.set(adminId, new Map());
  }

  for (const input of inputs) {
    let byColumn = accumulators.get(input.adminId);
    if (!byColumn) {
      byColumn = new Map();
      accumulators.set(input.adminId, byColumn);
    }
    for (const { column } of columns) {
      const value = input.values[column];
      if (value === null || Number.isNaN(value)) continue;
      const acc = byColumn.get(column);
      if (acc) {
        acc.sum += value;
        acc.count += 1;
        acc.max = Math.max(acc.max, value);
      } else {
        byColumn.set(column, { sum: value, count: 1, max: value });
      }
    }
  }

  const result = new Map<string, ReadonlyMap<K, number | null>>();
  for (const [adminId, byColumn] of accumulators) {
    result.set(
      adminId,
      new Map(columns.map(({ column, kind }) => [column, finalize(byColumn.get(column), kind)] as const))
    );
  }
  return result;
}

const ATTRIBUTE_COLUMNS: readonly ColumnSpec<ZoneAttribute>[] = ZONE_ATTRIBUTES.map((column) => ({
  column,
  kind: ATTRIBUTE_AGGREGATION[column],
}));

type ImpactColumn = ZoneAttribute | 'probability';

const IMPACT_COLUMNS: readonly ColumnSpec<ImpactColumn>[] = [
  ...ATTRIBUTE_COLUMNS,
  { column: 'probability', kind: 'max' },
];

interface ColumnLookup {
  get(column: ZoneAttribute): number | null | undefined;
}

function attributesFrom(values: ColumnLookup | undefined): ZoneAttributes {
  const read = (attribute: ZoneAttribute): number | null => values?.get(attribute) ?? null;
  return {
    population: read('population'),
    builtSurfaceM2: read('builtSurfaceM2'),
    numSchools: read('numSchools'),
    schoolAgePopulation: read('schoolAgePopulation'),
    infantPopulation: read('infantPopulation'),
    numHealthCenters: read('numHealthCenters'),
    rwi: read('rwi'),
    smodClass: read('smodClass'),
  };
}

/**
 * Baseline attributes per admin unit
 */
export function aggregateBaselineToAdmins(
  zones: readonly Zone[],
  admins: readonly AdminUnit[]
): Map<string, ZoneAttributes> {
  const inputs: AggregationInput<ZoneAttribute>[] = [];
  for (const zone of zones) {
    if (zone.adminId !== undefined) {
      inputs.push({ adminId: zone.adminId, values: zone.attributes });
    }
  }
  const aggregated = aggregateToAdmins(inputs, ATTRIBUTE_COLUMNS, admins.map((admin) => admin.id));
  return new Map(admins.map((admin) => [admin.id, attributesFrom(aggregated.get(admin.id))] as const));
}

/**
 * Expected impact per admin unit for every threshold
 *
 * Rows follow the order of `admins`; units without tiles get probability 0
 * and null attributes.
 */
export function aggregateExpectedToAdmins(
  expected: ExpectedImpactSeries,
  admins: readonly AdminUnit[]
): AdminImpactSeries {
  const series = new Map<WindThreshold, AdminImpactLayer>();

  for (const threshold of WIND_THRESHOLDS) {
    const layer = expected.get(threshold);
    if (!layer) continue;

    const inputs: AggregationInput<ImpactColumn>[] = [];
    for (const row of layer.rows) {
      if (row.adminId === undefined) continue;
      inputs.push({ adminId: row.adminId, values: { ...row.expected, probability: row.probability } });
    }

    const aggregated = aggregateToAdmins(inputs, IMPACT_COLUMNS, admins.map((admin) => admin.id));
    const rows: AdminImpactRow[] = admins.map((admin) => {
      const values = aggregated.get(admin.id);
      return {
        adminId: admin.id,
        adminName: admin.name,
        probability: values?.get('probability') ?? 0,
        expected: attributesFrom(values),
      };
    });
    series.set(threshold, { threshold, rows });
  }

  return series;
}

// ============================================================================
// Max-Overlap Assignment
// ============================================================================

export interface OverlapArea {
  readonly adminId: string;
  /** Intersection area in square meters */
  readonly area: number;
}

function toFeature(geometry: Polygon | MultiPolygon): Feature<Polygon | MultiPolygon> {
  return feature<Polygon | MultiPolygon>(geometry);
}

/**
 * Intersection area of a tile with every admin unit it touches
 */
export function computeOverlapAreas(
  tile: Polygon | MultiPolygon,
  admins: readonly AdminUnit[]
): OverlapArea[] {
  const tileFeature = toFeature(tile);
  const tileBBox = turfBBox(tile);
  const overlaps: OverlapArea[] = [];

  for (const admin of admins) {
    if (!bboxesOverlap(tileBBox, turfBBox(admin.geometry))) continue;
    const intersection = intersect(featureCollection([tileFeature, toFeature(admin.geometry)]));
    if (!intersection) continue;
    const overlap = area(intersection);
    if (overlap > 0) {
      overlaps.push({ adminId: admin.id, area: overlap });
    }
  }
  return overlaps;
}

/**
 * Admin unit with the largest overlap; ties go to the lowest admin id
 */
export function pickMaxOverlap(
  overlaps: readonly OverlapArea[],
  tolerance: number = OVERLAP_TIE_TOLERANCE
): string | undefined {
  let best: OverlapArea | undefined;
  for (const candidate of overlaps) {
    if (!best) {
      best = candidate;
      continue;
    }
    const scale = Math.max(Math.abs(best.area), Math.abs(candidate.area));
    const tied = Math.abs(candidate.area - best.area) <= tolerance * scale;
    if (tied) {
      if (candidate.adminId < best.adminId) best = candidate;
    } else if (candidate.area > best.area) {
      best = candidate;
    }
  }
  return best?.adminId;
}

export interface AssignmentResult {
  readonly zones: Zone[];
  readonly unassigned: string[];
}

/**
 * Attach an admin id to every tile by max intersection area
 *
 * Unassigned tiles are dropped from `zones` and listed in `unassigned`.
 */
export function assignZonesToAdmins(
  zones: readonly Zone[],
  admins: readonly AdminUnit[],
  logger?: PipelineLogger
): AssignmentResult {
  const assigned: Zone[] = [];
  const unassigned: string[] = [];

  for (const zone of zones) {
    const adminId = pickMaxOverlap(computeOverlapAreas(zone.geometry, admins));
    if (adminId === undefined) {
      unassigned.push(zone.id);
    } else {
      assigned.push({ ...zone, adminId });
    }
  }

  if (unassigned.length > 0) {
    logger?.warn('Tiles outside every admin unit excluded from aggregation', {
      count: unassigned.length,
      sample: unassigned.slice(0, 5),
    });
  }

  return { zones: assigned, unassigned };
}
