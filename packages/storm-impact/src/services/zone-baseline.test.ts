import { describe, it, expect, beforeEach } from 'vitest';
import { ZoneBaselineService } from './zone-baseline.js';
import { PipelineStateTracker } from './pipeline-state-tracker.js';
import { MissingDataError } from '../core/errors.js';
import type { AdminUnit, RegionBoundary } from '../core/types/index.js';
import { InMemoryStorage } from '../persistence/storage.js';
import type { AttributeLayerName, BoundaryProvider, ZoneValueProvider } from '../providers/types.js';
import type { SpatialUnit } from '../providers/zonal-intersector.js';
import { makeAdmin, square } from '../__tests__/utils/fixtures.js';

class LayerTable implements ZoneValueProvider {
  gridCalls = 0;

  constructor(private readonly layers: Partial<Record<AttributeLayerName, Readonly<Record<string, number>>>>) {}

  async fetchZoneGrid(): Promise<SpatialUnit[]> {
    this.gridCalls++;
    return [
      { id: 't1', geometry: square(0.25, 0.25, 0.5) },
      { id: 't2', geometry: square(1.25, 0.25, 0.5) },
      // Outside every admin unit
      { id: 't3', geometry: square(5, 5, 0.5) },
    ];
  }

  async fetchAttributeLayer(region: string, _zoom: number, layer: AttributeLayerName): Promise<ReadonlyMap<string, number>> {
    const values = this.layers[layer];
    if (!values) {
      throw new MissingDataError(`No ${layer} layer`, region);
    }
    return new Map(Object.entries(values));
  }
}

class FailingGrid extends LayerTable {
  constructor(private readonly units: SpatialUnit[] | null) {
    super({});
  }

  override async fetchZoneGrid(): Promise<SpatialUnit[]> {
    this.gridCalls++;
    if (this.units === null) {
      throw new Error('grid service offline');
    }
    return this.units;
  }
}

const boundaries: BoundaryProvider = {
  regionBoundary: async (region: string): Promise<RegionBoundary> => ({
    code: region,
    name: region,
    geometry: square(0, 0, 2),
  }),
  adminUnits: async (): Promise<AdminUnit[]> => [
    makeAdmin('A1', square(0, 0, 1), 'North'),
    makeAdmin('A2', square(1, 0, 1), 'South'),
  ],
};

const FULL_LAYERS = {
  population: { t1: 100, t2: 50, t3: 7 },
  builtSurfaceM2: { t1: 1000, t2: 400 },
  numSchools: { t1: 1, t2: 0 },
  schoolAgePopulation: { t1: 30, t2: 20 },
  infantPopulation: { t1: 10, t2: 5 },
  numHealthCenters: { t1: 0, t2: 1 },
  rwi: { t1: -0.7 },
  smodClass: { t1: 30, t2: 11 },
};

describe('ZoneBaselineService', () => {
  let storage: InMemoryStorage;
  let warnings: string[];
  let state: PipelineStateTracker;

  const logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => undefined,
  };

  function service(zones: ZoneValueProvider): ZoneBaselineService {
    return new ZoneBaselineService({ zones, boundaries, storage, state, logger });
  }

  beforeEach(() => {
    storage = new InMemoryStorage();
    warnings = [];
    state = new PipelineStateTracker(storage, { now: () => new Date('2025-11-09T12:00:00.000Z') });
  });

  it('should assign tiles to admin units and persist both tables', async () => {
    const baseline = service(new LayerTable(FULL_LAYERS));

    const result = await baseline.initialize('ATL', 14);
    const loaded = await baseline.load('ATL', 14);

    expect(result).toEqual({
      status: 'materialized',
      region: 'ATL',
      zoom: 14,
      tiles: 2,
      unassigned: 1,
      admins: 2,
      missingLayers: [],
    });
    expect(loaded?.zones.map((zone) => [zone.id, zone.adminId])).toEqual([
      ['t1', 'A1'],
      ['t2', 'A2'],
    ]);
    expect(loaded?.zones[1]?.attributes).toEqual({
      population: 50,
      builtSurfaceM2: 400,
      numSchools: 0,
      schoolAgePopulation: 20,
      infantPopulation: 5,
      numHealthCenters: 1,
      rwi: null,
      smodClass: 11,
    });
    expect(loaded?.admins.map((admin) => admin.name)).toEqual(['North', 'South']);
    expect(await state.state('ATL', 14)).toBe('INITIALIZED');
  });

  it('should reuse an initialized level unless forced', async () => {
    const zones = new LayerTable(FULL_LAYERS);
    const baseline = service(zones);
    await baseline.initialize('ATL', 14);

    expect(await baseline.initialize('ATL', 14)).toEqual({ status: 'reused', region: 'ATL', zoom: 14 });
    expect(zones.gridCalls).toBe(1);

    await baseline.initialize('ATL', 14, true);
    expect(zones.gridCalls).toBe(2);
  });

  it('should fall back to the age-range layer for school-age population', async () => {
    const { schoolAgePopulation: _omitted, ...rest } = FULL_LAYERS;
    const baseline = service(new LayerTable({ ...rest, schoolAgeRange: { t1: 25, t2: 15 } }));

    const result = await baseline.initialize('ATL', 14);
    const loaded = await baseline.load('ATL', 14);

    expect(result.status === 'materialized' && result.missingLayers).toEqual([]);
    expect(loaded?.zones.map((zone) => zone.attributes.schoolAgePopulation)).toEqual([25, 15]);
  });

  it('should replace an unavailable layer with missing values', async () => {
    const { rwi: _omitted, ...rest } = FULL_LAYERS;
    const baseline = service(new LayerTable(rest));

    const result = await baseline.initialize('ATL', 14);
    const loaded = await baseline.load('ATL', 14);

    expect(result.status === 'materialized' && result.missingLayers).toEqual(['rwi']);
    expect(loaded?.zones.map((zone) => zone.attributes.rwi)).toEqual([null, null]);
    expect(warnings).toContain('ATL rwi layer: No rwi layer; no cached copy configured');
  });

  it('should stay uninitialized when the zone grid cannot be fetched', async () => {
    const baseline = service(new FailingGrid(null));

    await expect(baseline.initialize('ATL', 14)).rejects.toBeInstanceOf(MissingDataError);
    expect(await state.state('ATL', 14)).toBe('UNINITIALIZED');
    expect(await baseline.load('ATL', 14)).toBeNull();
    expect(warnings).toContain('ATL zone grid: grid service offline; no cached copy configured');
  });

  it('should stay uninitialized when the zone grid is empty', async () => {
    const baseline = service(new FailingGrid([]));

    await expect(baseline.initialize('ATL', 14)).rejects.toThrow('No zone grid for ATL at zoom 14');
    expect(await state.state('ATL', 14)).toBe('UNINITIALIZED');
  });

  it('should initialize on a later attempt once the grid is back', async () => {
    await expect(service(new FailingGrid(null)).initialize('ATL', 14)).rejects.toBeInstanceOf(MissingDataError);

    const result = await service(new LayerTable(FULL_LAYERS)).initialize('ATL', 14);

    expect(result.status).toBe('materialized');
    expect(await state.state('ATL', 14)).toBe('INITIALIZED');
  });

  it('should load tiles stored without their admin mapping', async () => {
    const baseline = service(new LayerTable(FULL_LAYERS));
    await baseline.initialize('ATL', 14);
    const key = 'zones/ATL_14_tiles.geojson';
    const stored = await storage.readText(key);
    await storage.writeText(key, (stored ?? '').replace(/"adminId":"A\d",/g, ''));

    const loaded = await baseline.load('ATL', 14);

    expect(loaded?.zones.map((zone) => [zone.id, zone.adminId])).toEqual([
      ['t1', undefined],
      ['t2', undefined],
    ]);
  });

  it('should return null before materialization', async () => {
    expect(await service(new LayerTable(FULL_LAYERS)).load('ATL', 14)).toBeNull();
  });

  it('should rebuild when the flag exists but the tables are gone', async () => {
    await state.markInitialized('ATL', 14, 2);

    const loaded = await service(new LayerTable(FULL_LAYERS)).ensure('ATL', 14);

    expect(loaded.zones).toHaveLength(2);
    expect(warnings).toContain('ATL: base zone tables missing at zoom 14, rebuilding');
  });
});
