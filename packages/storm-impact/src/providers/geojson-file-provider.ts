/**
 * GeoJSON File Provider
 *
 * Serves every collaborator from a directory of GeoJSON files:
 *
 *   {dataDir}/{REGION}/boundary.geojson     region outline, properties.name
 *   {dataDir}/{REGION}/admin1.geojson       admin units, properties.id / name
 *   {dataDir}/{REGION}/tiles_{zoom}.geojson tile grid, properties.id plus one
 *                                           numeric property per attribute layer
 *   {dataDir}/{REGION}/schools.geojson      points, properties.id / name / level
 *   {dataDir}/{REGION}/health.geojson       points, properties.id / name / type
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { MissingDataError } from '../core/errors.js';
import type { AdminUnit, Facility, FacilityKind, RegionBoundary } from '../core/types/index.js';
import {
  FeatureCollectionSchema,
  PointSchema,
  PolygonalGeometrySchema,
  type RawFeature,
  type RawFeatureCollection,
} from '../schemas/geojson.js';
import type { AttributeLayerName, BoundaryProvider, FacilityProvider, ZoneValueProvider } from './types.js';
import type { SpatialUnit } from './zonal-intersector.js';

const FACILITY_FILES: Readonly<Record<FacilityKind, { file: string; detail: string }>> = {
  school: { file: 'schools.geojson', detail: 'level' },
  healthCenter: { file: 'health.geojson', detail: 'type' },
};

function stringProperty(feature: RawFeature, key: string): string | undefined {
  const value = feature.properties?.[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function featureId(feature: RawFeature, index: number): string {
  return stringProperty(feature, 'id') ?? (feature.id === undefined ? String(index) : String(feature.id));
}

export class GeoJsonFileProvider implements ZoneValueProvider, BoundaryProvider, FacilityProvider {
  constructor(private readonly dataDir: string) {}

  async fetchZoneGrid(region: string, zoom: number): Promise<SpatialUnit[]> {
    const collection = await this.readCollection(region, `tiles_${zoom}.geojson`);
    return collection.features.flatMap((feature, index) => {
      const geometry = PolygonalGeometrySchema.safeParse(feature.geometry);
      return geometry.success ? [{ id: featureId(feature, index), geometry: geometry.data }] : [];
    });
  }

  async fetchAttributeLayer(
    region: string,
    zoom: number,
    layer: AttributeLayerName
  ): Promise<ReadonlyMap<string, number>> {
    const collection = await this.readCollection(region, `tiles_${zoom}.geojson`);
    const values = new Map<string, number>();
    collection.features.forEach((feature, index) => {
      const value = feature.properties?.[layer];
      if (typeof value === 'number' && Number.isFinite(value)) {
        values.set(featureId(feature, index), value);
      }
    });

    if (values.size === 0) {
      throw new MissingDataError(`No tile carries a ${layer} value`, `${region}/tiles_${zoom}`);
    }
    return values;
  }

  async regionBoundary(region: string): Promise<RegionBoundary> {
    const collection = await this.readCollection(region, 'boundary.geojson');
    const first = collection.features[0];
    const geometry = first ? PolygonalGeometrySchema.safeParse(first.geometry) : undefined;
    if (!first || !geometry?.success) {
      throw new MissingDataError('Boundary file has no polygonal feature', `${region}/boundary`);
    }
    return { code: region, name: stringProperty(first, 'name') ?? region, geometry: geometry.data };
  }

  async adminUnits(region: string): Promise<AdminUnit[]> {
    const collection = await this.readCollection(region, 'admin1.geojson');
    return collection.features.flatMap((feature, index) => {
      const geometry = PolygonalGeometrySchema.safeParse(feature.geometry);
      if (!geometry.success) return [];
      const id = featureId(feature, index);
      return [{ id, name: stringProperty(feature, 'name') ?? id, geometry: geometry.data }];
    });
  }

  async fetchFacilities(region: string, kind: FacilityKind): Promise<Facility[]> {
    const { file, detail } = FACILITY_FILES[kind];
    const collection = await this.readCollection(region, file);
    return collection.features.flatMap((feature, index) => {
      const point = PointSchema.safeParse(feature.geometry);
      if (!point.success) return [];
      const [lon = 0, lat = 0] = point.data.coordinates;
      const id = featureId(feature, index);
      return [
        {
          id,
          kind,
          name: stringProperty(feature, 'name') ?? id,
          detail: stringProperty(feature, detail) ?? '',
          lon,
          lat,
        },
      ];
    });
  }

  private async readCollection(region: string, file: string): Promise<RawFeatureCollection> {
    const path = join(this.dataDir, region, file);
    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      throw new MissingDataError(`Cannot read ${path}: ${String(error)}`, `${region}/${file}`);
    }

    let value: unknown;
    try {
      value = JSON.parse(content);
    } catch (error) {
      throw new MissingDataError(`Invalid JSON in ${path}: ${String(error)}`, `${region}/${file}`);
    }

    const parsed = FeatureCollectionSchema.safeParse(value);
    if (!parsed.success) {
      throw new MissingDataError(`Not a GeoJSON FeatureCollection: ${path}`, `${region}/${file}`);
    }
    return parsed.data;
  }
}
