import { describe, it, expect, beforeEach } from 'vitest';
import { ImpactPipeline, selectForecasts, type HazardSource } from './impact-pipeline.js';
import { ConfigurationError, MissingDataError } from '../core/errors.js';
import type {
  AdminUnit,
  Facility,
  FacilityKind,
  ForecastKey,
  HazardEnvelope,
  RegionBoundary,
  TrackPoint,
} from '../core/types/index.js';
import { ProcessedForecastLog } from '../persistence/processed-forecasts.js';
import { InMemoryStorage } from '../persistence/storage.js';
import { parseReport, type ImpactReport } from '../schemas/report.js';
import type {
  AttributeLayerName,
  BoundaryProvider,
  FacilityProvider,
  ZoneValueProvider,
} from '../providers/types.js';
import type { SpatialUnit, ZonalIntersector } from '../providers/zonal-intersector.js';
import { TableIntersector, makeAdmin, makeEnvelope, makeFacility, square } from '../__tests__/utils/fixtures.js';

const FIRST: ForecastKey = { stormId: 'STORM-A', issuedAt: '2025-11-10T00:00:00.000Z' };
const SECOND: ForecastKey = { stormId: 'STORM-A', issuedAt: '2025-11-10T06:00:00.000Z' };

const LAYERS: Readonly<Record<string, Readonly<Record<string, number>>>> = {
  population: { t1: 100, t2: 50 },
  builtSurfaceM2: { t1: 1000, t2: 400 },
  numSchools: { t1: 1, t2: 0 },
  schoolAgePopulation: { t1: 30, t2: 20 },
  infantPopulation: { t1: 10, t2: 5 },
  numHealthCenters: { t1: 0, t2: 1 },
  rwi: { t1: -0.7, t2: 0.2 },
  smodClass: { t1: 30, t2: 11 },
};

class FakeZones implements ZoneValueProvider {
  async fetchZoneGrid(): Promise<SpatialUnit[]> {
    return [
      { id: 't1', geometry: square(0.25, 0.25, 0.5) },
      { id: 't2', geometry: square(1.25, 0.25, 0.5) },
    ];
  }

  async fetchAttributeLayer(region: string, _zoom: number, layer: AttributeLayerName): Promise<ReadonlyMap<string, number>> {
    const values = LAYERS[layer];
    if (!values) {
      throw new MissingDataError(`No ${layer} layer`, region);
    }
    return new Map(Object.entries(values));
  }
}

class FakeBoundaries implements BoundaryProvider {
  async regionBoundary(region: string): Promise<RegionBoundary> {
    if (region !== 'ATL') {
      throw new MissingDataError(`Unknown region ${region}`, region);
    }
    return { code: 'ATL', name: 'Atlantis', geometry: square(0, 0, 2) };
  }

  async adminUnits(): Promise<AdminUnit[]> {
    return [makeAdmin('A1', square(0, 0, 1), 'North'), makeAdmin('A2', square(1, 0, 1), 'South')];
  }
}

class FakeFacilities implements FacilityProvider {
  async fetchFacilities(region: string, kind: FacilityKind): Promise<Facility[]> {
    if (kind === 'healthCenter') {
      throw new MissingDataError('Health facility source offline', region);
    }
    return [makeFacility('s1', 'school', 'North School', 'primary')];
  }
}

class FakeHazards implements HazardSource {
  constructor(
    private readonly envelopes: HazardEnvelope[],
    private readonly forecasts: ForecastKey[] = [FIRST]
  ) {}

  async getEnvelopes(): Promise<HazardEnvelope[]> {
    return this.envelopes;
  }

  async getTrack(): Promise<TrackPoint[]> {
    return [];
  }

  async listForecasts(): Promise<ForecastKey[]> {
    return this.forecasts;
  }
}

const ENVELOPES = [makeEnvelope(1, 34, square(0, 0, 2)), makeEnvelope(2, 34, square(0, 0, 2)), makeEnvelope(1, 64, square(0, 0, 2))];

const COVERAGE = {
  t1: { 34: [1, 2], 64: [1] },
  t2: { 34: [1] },
  s1: { 34: [2] },
};

function readReport(storage: InMemoryStorage, path: string): ImpactReport {
  const parsed = parseReport(JSON.parse(storage.snapshot().get(path) ?? 'null'));
  if (!parsed.success) {
    throw new Error(parsed.error);
  }
  return parsed.data;
}

describe('ImpactPipeline', () => {
  let storage: InMemoryStorage;
  let warnings: string[];

  const logger = {
    debug: () => undefined,
    info: () => undefined,
    warn: (message: string) => {
      warnings.push(message);
    },
    error: () => undefined,
  };

  function pipeline(options: { hazards?: HazardSource; intersector?: ZonalIntersector } = {}): ImpactPipeline {
    return new ImpactPipeline({
      hazards: options.hazards ?? new FakeHazards(ENVELOPES),
      zones: new FakeZones(),
      boundaries: new FakeBoundaries(),
      facilities: new FakeFacilities(),
      intersector: options.intersector ?? new TableIntersector(COVERAGE),
      storage,
      logger,
      now: () => new Date('2025-11-10T07:30:00Z'),
    });
  }

  beforeEach(() => {
    storage = new InMemoryStorage();
    warnings = [];
  });

  describe('runForecast', () => {
    it('should write views and a report for an affected region', async () => {
      const summary = await pipeline().runForecast(FIRST, ['ATL'], 14);

      expect(summary.status).toBe('completed');
      expect(summary.errors).toEqual([]);
      expect(summary.regionsProcessed).toBe(1);
      // tiles + admin at 34 and 64, schools at 34 and 64, track at 34 and 64, two severity views
      expect(summary.outcomes).toEqual([
        { region: 'ATL', status: 'reported', viewsWritten: 10, reportPath: 'reports/ATL_STORM-A_20251110000000.json' },
      ]);
      expect(summary.viewsWritten).toBe(10);
    });

    it('should build the report from the computed tables', async () => {
      await pipeline().runForecast(FIRST, ['ATL'], 14);

      const report = readReport(storage, 'reports/ATL_STORM-A_20251110000000.json');
      expect(report.identity.stormCategory).toBe('Cat 1 Hurricane');
      expect(report.identity.expectedLandfall).toBe('Unknown');
      expect(report.identity.reportDate).toBe('November 10, 2025 07:30 UTC');
      expect(report.totals.expectedSchoolAge).toBe(40);
      expect(report.totals.expectedInfants).toBe(12);
      expect(report.totals.expectedChildren).toBe(52);
      expect(report.totals.expectedPopulation).toBe(125);
      expect(report.childrenChange).toEqual({ direction: 'increased', delta: '+52', percentage: '-' });
      expect(report.facilities.schools.facilities).toEqual([
        { rank: 1, facilityId: 's1', name: 'North School', detail: 'primary', probability: 0.5 },
      ]);
      expect(report.facilities.healthCenters).toEqual({ threshold: null, facilities: [] });
      expect(report.admins.population.map((row) => row.adminId)).toEqual(['A1', 'A2']);
    });

    it('should not rewrite anything on a second run without force', async () => {
      await pipeline().runForecast(FIRST, ['ATL'], 14);
      const writes = storage.writes;
      const before = storage.snapshot();

      const summary = await pipeline().runForecast(FIRST, ['ATL'], 14);

      expect(summary.outcomes).toEqual([{ region: 'ATL', status: 'skipped', viewsWritten: 0 }]);
      expect(storage.writes).toBe(writes);
      expect(storage.snapshot()).toEqual(before);
    });

    it('should recompute views when forced', async () => {
      await pipeline().runForecast(FIRST, ['ATL'], 14);

      const summary = await pipeline().runForecast(FIRST, ['ATL'], 14, true);

      expect(summary.outcomes[0]?.status).toBe('reported');
      expect(summary.viewsWritten).toBe(10);
    });

    it('should diff against the report of the previous issuance', async () => {
      await pipeline().runForecast(FIRST, ['ATL'], 14);
      await pipeline().runForecast(SECOND, ['ATL'], 14);

      const report = readReport(storage, 'reports/ATL_STORM-A_20251110060000.json');
      expect(report.childrenChange).toEqual({ direction: 'unchanged', delta: '+0', percentage: 0 });
      expect(report.thresholds[0]?.changeChildren).toBe(0);
    });

    it('should fall back to empty health facilities and cache fetched schools', async () => {
      await pipeline().runForecast(FIRST, ['ATL'], 14);

      expect(warnings).toContain('ATL: no health facilities available, facility tables will be empty');
      expect(await storage.exists('cache/ATL_schools.json')).toBe(true);
      expect(await storage.exists('cache/ATL_health.json')).toBe(false);
    });

    it('should isolate a failing region and continue with the rest', async () => {
      const summary = await pipeline().runForecast(FIRST, ['BAD', 'ATL'], 14);

      expect(summary.status).toBe('partial');
      expect(summary.outcomes.map((outcome) => [outcome.region, outcome.status])).toEqual([
        ['BAD', 'failed'],
        ['ATL', 'reported'],
      ]);
      expect(summary.errors).toEqual(['Region BAD failed during boundary: Unknown region BAD']);
    });

    it('should fail the run when no envelopes exist', async () => {
      const summary = await pipeline({ hazards: new FakeHazards([]) }).runForecast(FIRST, ['ATL'], 14);

      expect(summary.status).toBe('no-envelopes');
      expect(summary.errors).toEqual(['No envelope data found for STORM-A at 2025-11-10T00:00:00.000Z']);
      expect(storage.writes).toBe(0);
    });

    it('should fail the run when no region is affected', async () => {
      const hazards = new FakeHazards([makeEnvelope(1, 34, square(60, 60, 1))]);

      const summary = await pipeline({ hazards }).runForecast(FIRST, ['ATL'], 14);

      expect(summary.status).toBe('no-intersection');
      expect(summary.errors).toEqual(['No intersection with countries for STORM-A at 2025-11-10T00:00:00.000Z']);
    });

    it('should write no report when no threshold carries probability', async () => {
      const summary = await pipeline({ intersector: new TableIntersector({}) }).runForecast(FIRST, ['ATL'], 14);

      expect(summary.outcomes[0]?.status).toBe('no-impact');
      expect(await storage.list('reports')).toEqual([]);
    });

    it('should abort when stored base zones lack their admin mapping', async () => {
      await pipeline().initialize(['ATL'], 14);
      const key = 'zones/ATL_14_tiles.geojson';
      const stored = storage.snapshot().get(key) ?? '';
      await storage.writeText(key, stored.replace(/"adminId":"A\d",/g, ''));

      await expect(pipeline().runForecast(FIRST, ['ATL'], 14)).rejects.toBeInstanceOf(ConfigurationError);
      expect(await storage.exists('flags/ATL_STORM-A_20251110000000_14.views')).toBe(false);
    });

    it('should abort on a configuration error', async () => {
      const broken: ZonalIntersector = {
        coveringMembers: () => {
          throw new ConfigurationError('Intersector not configured', { component: 'test' });
        },
      };

      await expect(pipeline({ intersector: broken }).runForecast(FIRST, ['ATL'], 14)).rejects.toBeInstanceOf(
        ConfigurationError
      );
    });
  });

  describe('initialize', () => {
    it('should materialize base zones once', async () => {
      const first = await pipeline().initialize(['ATL'], 14);
      const second = await pipeline().initialize(['ATL'], 14);

      expect(first.results).toEqual([
        { status: 'materialized', region: 'ATL', zoom: 14, tiles: 2, unassigned: 0, admins: 2, missingLayers: [] },
      ]);
      expect(second.results).toEqual([{ status: 'reused', region: 'ATL', zoom: 14 }]);
      expect(await storage.exists('flags/ATL_14.initialized')).toBe(true);
    });
  });

  describe('update', () => {
    it('should process each selected forecast once', async () => {
      const older: ForecastKey = { stormId: 'STORM-A', issuedAt: '2025-10-01T00:00:00.000Z' };
      const hazards = new FakeHazards(ENVELOPES, [older, FIRST]);

      const first = await pipeline({ hazards }).update({ timeDeltaDays: 2 }, ['ATL'], 14);
      const second = await pipeline({ hazards }).update({ timeDeltaDays: 2 }, ['ATL'], 14);

      expect(first.selected).toBe(1);
      expect(first.runs.map((run) => run.key)).toEqual([FIRST]);
      expect(second.skipped).toBe(1);
      expect(second.runs).toEqual([]);
    });

    it('should record finished forecasts when a later one aborts the update', async () => {
      const hazards: HazardSource = {
        getEnvelopes: async (key) => {
          if (key.issuedAt === SECOND.issuedAt) {
            throw new ConfigurationError('Envelope table not migrated', { component: 'test' });
          }
          return ENVELOPES;
        },
        getTrack: async () => [],
        listForecasts: async () => [FIRST, SECOND],
      };

      await expect(pipeline({ hazards }).update({}, ['ATL'], 14)).rejects.toBeInstanceOf(ConfigurationError);

      const log = await ProcessedForecastLog.load(storage);
      expect(log.has(FIRST)).toBe(true);
      expect(log.has(SECOND)).toBe(false);
    });

    it('should reprocess every selected forecast when forced', async () => {
      const hazards = new FakeHazards(ENVELOPES, [FIRST]);
      await pipeline({ hazards }).update({}, ['ATL'], 14);

      const forced = await pipeline({ hazards }).update({}, ['ATL'], 14, true);

      expect(forced.skipped).toBe(0);
      expect(forced.runs[0]?.outcomes[0]?.status).toBe('reported');
    });
  });
});

describe('selectForecasts', () => {
  const forecasts: ForecastKey[] = [
    { stormId: 'STORM-A', issuedAt: '2025-11-01T12:00:00.000Z' },
    { stormId: 'STORM-B', issuedAt: '2025-11-09T18:00:00.000Z' },
    { stormId: 'STORM-A', issuedAt: '2025-11-10T00:00:00.000Z' },
  ];
  const now = new Date('2025-11-10T06:00:00Z');

  it('should keep forecasts inside the look-back window', () => {
    expect(selectForecasts(forecasts, { timeDeltaDays: 1 }, now).map((key) => key.stormId)).toEqual([
      'STORM-B',
      'STORM-A',
    ]);
  });

  it('should match an exact UTC day instead of the window', () => {
    expect(selectForecasts(forecasts, { date: '2025-11-01', timeDeltaDays: 1 }, now)).toEqual([forecasts[0]]);
  });

  it('should filter by storm', () => {
    expect(selectForecasts(forecasts, { stormId: 'STORM-A' }, now).map((key) => key.issuedAt)).toEqual([
      '2025-11-01T12:00:00.000Z',
      '2025-11-10T00:00:00.000Z',
    ]);
  });
});
