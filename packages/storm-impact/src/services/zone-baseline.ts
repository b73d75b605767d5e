/**
 * Zone Baseline
 *
 * Materializes the static tile table of a region at a zoom level: the tile
 * grid, every attribute layer, and the max-overlap admin assignment. The
 * tile table and the admin-level base table are persisted as GeoJSON, then
 * the region transitions to INITIALIZED.
 *
 * Attribute layers that cannot be fetched become all-null columns. School-age
 * population falls back to the age-range layer before giving up.
 */

import { z } from 'zod';
import { MissingDataError } from '../core/errors.js';
import { fetchWithFallback, outcomeData, type FetchOutcome } from '../core/fallback.js';
import {
  ZONE_ATTRIBUTES,
  type AdminUnit,
  type Zone,
  type ZoneAttribute,
  type ZoneAttributes,
} from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { StorageLayout } from '../persistence/layout.js';
import type { StorageBackend } from '../persistence/storage.js';
import { FeatureCollectionSchema, PolygonalGeometrySchema } from '../schemas/geojson.js';
import type { AttributeLayerName, BoundaryProvider, ZoneValueProvider } from '../providers/types.js';
import { aggregateBaselineToAdmins, assignZonesToAdmins } from './hierarchical-aggregator.js';
import type { PipelineStateTracker } from './pipeline-state-tracker.js';

// ============================================================================
// Types
// ============================================================================

export interface BaselineZones {
  /** Admin assignment is checked where it is required, by the severity index */
  readonly zones: readonly Zone[];
  readonly admins: readonly AdminUnit[];
}

export type BaselineResult =
  | { readonly status: 'reused'; readonly region: string; readonly zoom: number }
  | {
      readonly status: 'materialized';
      readonly region: string;
      readonly zoom: number;
      readonly tiles: number;
      readonly unassigned: number;
      readonly admins: number;
      /** Attribute layers replaced by all-null columns */
      readonly missingLayers: readonly ZoneAttribute[];
    };

export interface ZoneBaselineDependencies {
  readonly zones: ZoneValueProvider;
  readonly boundaries: BoundaryProvider;
  readonly storage: StorageBackend;
  readonly state: PipelineStateTracker;
  readonly logger?: PipelineLogger;
}

const AttributeValueSchema = z.number().nullable();

const TilePropertiesSchema = z.object({
  id: z.string(),
  // Absent when the table was written without the admin mapping
  adminId: z.string().optional(),
  population: AttributeValueSchema,
  builtSurfaceM2: AttributeValueSchema,
  numSchools: AttributeValueSchema,
  schoolAgePopulation: AttributeValueSchema,
  infantPopulation: AttributeValueSchema,
  numHealthCenters: AttributeValueSchema,
  rwi: AttributeValueSchema,
  smodClass: AttributeValueSchema,
});

const AdminPropertiesSchema = z.object({
  id: z.string(),
  name: z.string(),
});

// ============================================================================
// Service
// ============================================================================

export class ZoneBaselineService {
  private readonly logger: PipelineLogger;

  constructor(private readonly deps: ZoneBaselineDependencies) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Materialize baseline zones unless already INITIALIZED (or forced)
   */
  async initialize(region: string, zoom: number, force = false): Promise<BaselineResult> {
    if (!(await this.deps.state.needsInitialization(region, zoom, force))) {
      this.logger.info(`${region}: zoom ${zoom} already initialized, reusing base zones`);
      return { status: 'reused', region, zoom };
    }

    this.logger.info(`${region}: materializing base zones at zoom ${zoom}`);
    const gridOutcome = await fetchWithFallback(
      {
        name: `${region} zone grid`,
        live: () => this.deps.zones.fetchZoneGrid(region, zoom),
        isEmpty: (units) => units.length === 0,
      },
      this.logger
    );
    // An empty grid must not become a durable INITIALIZED state
    if (gridOutcome.status === 'unavailable') {
      throw new MissingDataError(`No zone grid for ${region} at zoom ${zoom}: ${gridOutcome.reason}`, `${region} zone grid`);
    }
    const grid = gridOutcome.data;

    const layers = new Map<ZoneAttribute, ReadonlyMap<string, number>>();
    const missingLayers: ZoneAttribute[] = [];
    for (const attribute of ZONE_ATTRIBUTES) {
      const layer = await this.fetchLayer(region, zoom, attribute);
      if (layer) {
        layers.set(attribute, layer);
      } else {
        missingLayers.push(attribute);
      }
    }

    const zones: Zone[] = grid.map((unit) => ({
      id: unit.id,
      geometry: unit.geometry,
      attributes: attributesFor(unit.id, layers),
    }));

    const admins = await this.deps.boundaries.adminUnits(region);
    const assignment = assignZonesToAdmins(zones, admins, this.logger);

    await this.persist(region, zoom, assignment.zones, admins);
    await this.deps.state.markInitialized(region, zoom, assignment.zones.length);

    return {
      status: 'materialized',
      region,
      zoom,
      tiles: assignment.zones.length,
      unassigned: assignment.unassigned.length,
      admins: admins.length,
      missingLayers,
    };
  }

  /**
   * Read persisted base zones; null when they have not been materialized
   */
  async load(region: string, zoom: number): Promise<BaselineZones | null> {
    const tilesText = await this.deps.storage.readText(StorageLayout.baseTiles(region, zoom));
    const adminsText = await this.deps.storage.readText(StorageLayout.baseAdmins(region, zoom));
    if (tilesText === null || adminsText === null) {
      return null;
    }

    const tiles = FeatureCollectionSchema.parse(JSON.parse(tilesText));
    const zones = tiles.features.map((feature) => {
      const properties = TilePropertiesSchema.parse(feature.properties);
      const { id, adminId, ...attributes } = properties;
      return { id, adminId, attributes, geometry: PolygonalGeometrySchema.parse(feature.geometry) };
    });

    const adminCollection = FeatureCollectionSchema.parse(JSON.parse(adminsText));
    const admins = adminCollection.features.map((feature) => {
      const properties = AdminPropertiesSchema.parse(feature.properties);
      return { id: properties.id, name: properties.name, geometry: PolygonalGeometrySchema.parse(feature.geometry) };
    });

    return { zones, admins };
  }

  /**
   * Base zones, materializing them first when needed
   */
  async ensure(region: string, zoom: number, force = false): Promise<BaselineZones> {
    await this.initialize(region, zoom, force);
    const loaded = await this.load(region, zoom);
    if (loaded) {
      return loaded;
    }

    // Flag present but tables gone: rebuild
    this.logger.warn(`${region}: base zone tables missing at zoom ${zoom}, rebuilding`);
    await this.initialize(region, zoom, true);
    const rebuilt = await this.load(region, zoom);
    if (!rebuilt) {
      throw new Error(`Base zone tables for ${region} at zoom ${zoom} were not written`);
    }
    return rebuilt;
  }

  private async fetchLayer(
    region: string,
    zoom: number,
    attribute: ZoneAttribute
  ): Promise<ReadonlyMap<string, number> | null> {
    const primary = await this.fetchNamedLayer(region, zoom, attribute);
    if (primary.status !== 'unavailable' || attribute !== 'schoolAgePopulation') {
      return outcomeData(primary, null);
    }
    this.logger.info(`${region}: school-age layer unavailable, using age-range population`);
    return outcomeData(await this.fetchNamedLayer(region, zoom, 'schoolAgeRange'), null);
  }

  private fetchNamedLayer(
    region: string,
    zoom: number,
    layer: AttributeLayerName
  ): Promise<FetchOutcome<ReadonlyMap<string, number> | null>> {
    return fetchWithFallback<ReadonlyMap<string, number> | null>(
      {
        name: `${region} ${layer} layer`,
        live: () => this.deps.zones.fetchAttributeLayer(region, zoom, layer),
        isEmpty: (values) => values === null || values.size === 0,
      },
      this.logger
    );
  }

  private async persist(region: string, zoom: number, zones: readonly Zone[], admins: readonly AdminUnit[]): Promise<void> {
    const tiles = {
      type: 'FeatureCollection',
      features: zones.map((zone) => ({
        type: 'Feature',
        properties: { id: zone.id, adminId: zone.adminId, ...zone.attributes },
        geometry: zone.geometry,
      })),
    };

    const baseline = aggregateBaselineToAdmins(zones, admins);
    const adminTable = {
      type: 'FeatureCollection',
      features: admins.map((admin) => ({
        type: 'Feature',
        properties: { id: admin.id, name: admin.name, ...baseline.get(admin.id) },
        geometry: admin.geometry,
      })),
    };

    await this.deps.storage.writeText(StorageLayout.baseTiles(region, zoom), JSON.stringify(tiles));
    await this.deps.storage.writeText(StorageLayout.baseAdmins(region, zoom), JSON.stringify(adminTable));
  }
}

function attributesFor(id: string, layers: ReadonlyMap<ZoneAttribute, ReadonlyMap<string, number>>): ZoneAttributes {
  const read = (attribute: ZoneAttribute): number | null => layers.get(attribute)?.get(id) ?? null;
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
