/**
 * Impact Pipeline
 *
 * Orchestrates one forecast issuance end to end:
 *
 * 1. Load envelopes for (storm, issuance); none → the run fails
 * 2. Gate regions with the AffectedRegionDetector; none affected → the run fails
 * 3. Per affected region, inside its own failure boundary:
 *    base zones → probabilities → expected impact → severity index →
 *    admin aggregates → facility tables → member severity → views →
 *    report → views flag
 *
 * A region whose views flag exists is skipped unless forced. A region failure
 * is recorded in the summary and the next region runs; a ConfigurationError
 * aborts the whole run.
 */

import {
  DEFAULT_TIME_DELTA_DAYS,
  FACILITY_BUFFER_METERS,
  FORECAST_INTERVAL_HOURS,
  REGION_BUFFER_KM,
  TOP_FACILITIES_COUNT,
  presentThresholds,
} from '../core/constants.js';
import { RegionProcessingError, isConfigurationError } from '../core/errors.js';
import { fetchWithFallback, outcomeData } from '../core/fallback.js';
import type {
  Facility,
  FacilityKind,
  ForecastKey,
  HazardEnvelope,
  RegionBoundary,
  TrackPoint,
} from '../core/types/index.js';
import { parseIssuance } from '../core/utils/dates.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { FacilityCache } from '../persistence/facility-cache.js';
import { ProcessedForecastLog } from '../persistence/processed-forecasts.js';
import { ReportStore } from '../persistence/report-store.js';
import type { StorageBackend } from '../persistence/storage.js';
import { ViewStore, type ViewAddress } from '../persistence/view-store.js';
import type { BoundaryProvider, FacilityProvider, ZoneValueProvider } from '../providers/types.js';
import type { ZonalIntersector } from '../providers/zonal-intersector.js';
import { AffectedRegionDetector } from './affected-region-detector.js';
import { computeProbabilitySeries } from './exceedance-probability.js';
import { computeExpectedSeries } from './expected-impact.js';
import { computeFacilityProbabilities } from './facility-exposure.js';
import { ForecastDiffEngine } from './forecast-diff.js';
import { aggregateExpectedToAdmins } from './hierarchical-aggregator.js';
import { expectedLandfall } from './landfall.js';
import { MemberSeverityCalculator } from './member-severity.js';
import { PipelineStateTracker, type InitializationTracking } from './pipeline-state-tracker.js';
import { buildReport } from './report-builder.js';
import { computeAdminSeverity, computeZoneSeverity } from './severity-index.js';
import { ZoneBaselineService, type BaselineResult } from './zone-baseline.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Source of envelopes and tracks (the hazard warehouse)
 */
export interface HazardSource {
  getEnvelopes(key: ForecastKey): Promise<HazardEnvelope[]>;
  getTrack(key: ForecastKey): Promise<TrackPoint[]>;
  listForecasts(): Promise<ForecastKey[]>;
}

export interface ImpactPipelineDependencies {
  readonly hazards: HazardSource;
  readonly zones: ZoneValueProvider;
  readonly boundaries: BoundaryProvider;
  readonly facilities: FacilityProvider;
  readonly intersector: ZonalIntersector;
  readonly storage: StorageBackend;
  readonly tracking?: InitializationTracking;
  readonly logger?: PipelineLogger;
  readonly now?: () => Date;
}

export interface ImpactPipelineOptions {
  readonly regionBufferKm?: number;
  readonly facilityBufferMeters?: number;
  readonly forecastIntervalHours?: number;
  readonly topFacilities?: number;
}

export type RegionStatus = 'reported' | 'no-impact' | 'skipped' | 'failed';

export interface RegionOutcome {
  readonly region: string;
  readonly status: RegionStatus;
  readonly viewsWritten: number;
  readonly reportPath?: string;
  readonly error?: string;
}

export type ForecastRunStatus = 'completed' | 'partial' | 'no-envelopes' | 'no-intersection';

export interface ForecastRunSummary {
  readonly key: ForecastKey;
  readonly status: ForecastRunStatus;
  readonly durationMs: number;
  readonly regionsProcessed: number;
  readonly viewsWritten: number;
  readonly outcomes: readonly RegionOutcome[];
  readonly errors: readonly string[];
}

export interface InitializeSummary {
  readonly durationMs: number;
  readonly results: readonly BaselineResult[];
  readonly errors: readonly string[];
}

export interface UpdateFilters {
  /** Only issuances on this UTC day (YYYY-MM-DD) */
  readonly date?: string;
  /** Look-back window in days, used when no date is given */
  readonly timeDeltaDays?: number;
  readonly stormId?: string;
}

export interface UpdateSummary {
  readonly durationMs: number;
  readonly selected: number;
  readonly skipped: number;
  readonly runs: readonly ForecastRunSummary[];
}

/**
 * Whether every region of a run succeeded
 */
export function runSucceeded(summary: ForecastRunSummary): boolean {
  return summary.status === 'completed';
}

/**
 * Forecasts matching an exact day, or else a look-back window, and a storm
 */
export function selectForecasts(
  forecasts: readonly ForecastKey[],
  filters: UpdateFilters,
  now: Date
): ForecastKey[] {
  const windowStart = now.getTime() - (filters.timeDeltaDays ?? DEFAULT_TIME_DELTA_DAYS) * 86_400_000;
  return forecasts.filter((key) => {
    if (filters.stormId !== undefined && key.stormId !== filters.stormId) {
      return false;
    }
    const issued = parseIssuance(key.issuedAt);
    if (filters.date !== undefined) {
      return issued.toISOString().slice(0, 10) === filters.date;
    }
    return issued.getTime() >= windowStart;
  });
}

// ============================================================================
// Pipeline
// ============================================================================

interface RegionContext {
  readonly boundary: RegionBoundary;
  readonly key: ForecastKey;
  readonly zoom: number;
  readonly envelopes: readonly HazardEnvelope[];
}

export class ImpactPipeline {
  private readonly logger: PipelineLogger;
  private readonly now: () => Date;
  private readonly state: PipelineStateTracker;
  private readonly baseline: ZoneBaselineService;
  private readonly detector: AffectedRegionDetector;
  private readonly views: ViewStore;
  private readonly reports: ReportStore;
  private readonly diff: ForecastDiffEngine;
  private readonly facilityCache: FacilityCache;
  private readonly memberSeverity: MemberSeverityCalculator;
  private readonly facilityBufferMeters: number;
  private readonly topFacilities: number;
  private readonly intervalHours: number;

  constructor(
    private readonly deps: ImpactPipelineDependencies,
    options: ImpactPipelineOptions = {}
  ) {
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
    this.facilityBufferMeters = options.facilityBufferMeters ?? FACILITY_BUFFER_METERS;
    this.topFacilities = options.topFacilities ?? TOP_FACILITIES_COUNT;
    this.intervalHours = options.forecastIntervalHours ?? FORECAST_INTERVAL_HOURS;

    this.state = new PipelineStateTracker(deps.storage, {
      tracking: deps.tracking,
      logger: this.logger,
      now: this.now,
    });
    this.baseline = new ZoneBaselineService({
      zones: deps.zones,
      boundaries: deps.boundaries,
      storage: deps.storage,
      state: this.state,
      logger: this.logger,
    });
    this.detector = new AffectedRegionDetector({
      bufferKm: options.regionBufferKm ?? REGION_BUFFER_KM,
      logger: this.logger,
    });
    this.views = new ViewStore(deps.storage, this.now);
    this.reports = new ReportStore(deps.storage, this.logger);
    this.diff = new ForecastDiffEngine(this.reports, this.intervalHours);
    this.facilityCache = new FacilityCache(deps.storage, this.now);
    this.memberSeverity = new MemberSeverityCalculator(deps.intersector, {
      bufferMeters: this.facilityBufferMeters,
      logger: this.logger,
    });
  }

  /**
   * Materialize base zones for each region
   */
  async initialize(regions: readonly string[], zoom: number, force = false): Promise<InitializeSummary> {
    const startTime = Date.now();
    const results: BaselineResult[] = [];
    const errors: string[] = [];

    for (const region of regions) {
      try {
        const result = await this.baseline.initialize(region, zoom, force);
        results.push(result);
        if (result.status === 'materialized') {
          this.logger.info(`${region}: initialized ${result.tiles} tiles across ${result.admins} admin units`);
        }
      } catch (error) {
        if (isConfigurationError(error)) throw error;
        const failure = new RegionProcessingError(region, 'initialize', error);
        this.logger.error(failure.toLogString());
        errors.push(failure.message);
      }
    }

    return { durationMs: Date.now() - startTime, results, errors };
  }

  /**
   * Process one forecast issuance for the given regions
   */
  async runForecast(
    key: ForecastKey,
    regions: readonly string[],
    zoom: number,
    force = false
  ): Promise<ForecastRunSummary> {
    const startTime = Date.now();
    const finish = (
      status: ForecastRunStatus,
      outcomes: readonly RegionOutcome[],
      errors: readonly string[]
    ): ForecastRunSummary => ({
      key,
      status,
      durationMs: Date.now() - startTime,
      regionsProcessed: outcomes.filter((outcome) => outcome.status !== 'failed').length,
      viewsWritten: outcomes.reduce((sum, outcome) => sum + outcome.viewsWritten, 0),
      outcomes,
      errors,
    });

    this.logger.info(`Processing ${key.stormId} issued ${key.issuedAt}`);
    const envelopes = await this.deps.hazards.getEnvelopes(key);
    if (envelopes.length === 0) {
      const message = `No envelope data found for ${key.stormId} at ${key.issuedAt}`;
      this.logger.warn(message);
      return finish('no-envelopes', [], [message]);
    }

    const outcomes: RegionOutcome[] = [];
    const errors: string[] = [];
    const boundaries: RegionBoundary[] = [];
    for (const region of regions) {
      try {
        boundaries.push(await this.deps.boundaries.regionBoundary(region));
      } catch (error) {
        const failure = new RegionProcessingError(region, 'boundary', error);
        this.logger.error(failure.toLogString());
        outcomes.push({ region, status: 'failed', viewsWritten: 0, error: failure.message });
        errors.push(failure.message);
      }
    }

    const affected = this.detector
      .detect(boundaries, envelopes)
      .filter((result) => result.affected)
      .map((result) => result.region);
    if (affected.length === 0) {
      const message = `No intersection with countries for ${key.stormId} at ${key.issuedAt}`;
      this.logger.info(message);
      return finish('no-intersection', outcomes, [...errors, message]);
    }

    for (const boundary of boundaries) {
      if (!affected.includes(boundary.code)) continue;
      const outcome = await this.processRegion({ boundary, key, zoom, envelopes }, force);
      outcomes.push(outcome);
      if (outcome.error !== undefined) {
        errors.push(outcome.error);
      }
    }

    return finish(errors.length === 0 ? 'completed' : 'partial', outcomes, errors);
  }

  /**
   * Process every warehouse forecast matching the filters that has not been
   * processed yet (or every match when forced)
   */
  async update(
    filters: UpdateFilters,
    regions: readonly string[],
    zoom: number,
    force = false
  ): Promise<UpdateSummary> {
    const startTime = Date.now();
    const log = await ProcessedForecastLog.load(this.deps.storage, this.logger);
    const selected = selectForecasts(await this.deps.hazards.listForecasts(), filters, this.now());
    this.logger.info(`Selected ${selected.length} forecast(s) for processing`);

    const runs: ForecastRunSummary[] = [];
    let skipped = 0;
    try {
      for (const key of selected) {
        if (!force && log.has(key)) {
          this.logger.debug(`${key.stormId} ${key.issuedAt} already processed`);
          skipped++;
          continue;
        }

        const summary = await this.runForecast(key, regions, zoom, force);
        runs.push(summary);
        // Failed regions stay eligible for the next update
        if (summary.status === 'completed' || summary.status === 'no-intersection') {
          log.mark(key, this.now());
        }
      }
    } finally {
      // Forecasts finished before a fatal error stay recorded
      await log.save();
    }
    return { durationMs: Date.now() - startTime, selected: selected.length, skipped, runs };
  }

  // ==========================================================================
  // Region Processing
  // ==========================================================================

  private async processRegion(context: RegionContext, force: boolean): Promise<RegionOutcome> {
    const { boundary, key, zoom, envelopes } = context;
    const region = boundary.code;
    let stage = 'views flag';
    let viewsWritten = 0;

    try {
      if (!force && (await this.state.hasViews(region, key, zoom))) {
        this.logger.info(`${region}: views exist for ${key.stormId} ${key.issuedAt}, skipping`);
        return { region, status: 'skipped', viewsWritten: 0 };
      }

      stage = 'base zones';
      const { zones, admins } = await this.baseline.ensure(region, zoom, force);

      stage = 'exceedance';
      const probabilities = computeProbabilitySeries(zones, envelopes, this.deps.intersector);
      const expected = computeExpectedSeries(probabilities, zones);

      stage = 'severity index';
      const zoneSeverity = computeZoneSeverity(zones, probabilities, region);
      const adminSeverity = computeAdminSeverity(zoneSeverity, admins);

      stage = 'admin aggregation';
      const adminImpact = aggregateExpectedToAdmins(expected, admins);

      stage = 'facilities';
      const schools = await this.loadFacilities(region, 'school');
      const healthCenters = await this.loadFacilities(region, 'healthCenter');
      const schoolSeries = computeFacilityProbabilities(
        schools,
        envelopes,
        this.deps.intersector,
        this.facilityBufferMeters
      );
      const healthSeries = computeFacilityProbabilities(
        healthCenters,
        envelopes,
        this.deps.intersector,
        this.facilityBufferMeters
      );
      const members = this.memberSeverity.compute({ zones, schools, healthCenters, envelopes });

      stage = 'views';
      const write = async (
        address: Omit<ViewAddress, 'region' | 'key' | 'zoom'>,
        rows: readonly object[]
      ): Promise<void> => {
        await this.views.write({ region, key, zoom, ...address }, rows);
        viewsWritten++;
      };
      for (const threshold of presentThresholds(probabilities)) {
        const tiles = expected.get(threshold)?.rows ?? [];
        await write(
          { kind: 'tiles', threshold },
          tiles.map((row) => ({
            zoneId: row.zoneId,
            adminId: row.adminId,
            probability: row.probability,
            ...row.expected,
          }))
        );
        const adminRows = adminImpact.get(threshold)?.rows ?? [];
        await write(
          { kind: 'admin', threshold },
          adminRows.map((row) => ({
            adminId: row.adminId,
            adminName: row.adminName,
            probability: row.probability,
            ...row.expected,
          }))
        );
      }
      for (const [threshold, rows] of schoolSeries) {
        await write({ kind: 'schools', threshold }, rows);
      }
      for (const [threshold, rows] of healthSeries) {
        await write({ kind: 'health', threshold }, rows);
      }
      for (const [threshold, rows] of members) {
        await write({ kind: 'track', threshold }, rows);
      }
      await write({ kind: 'cci-tiles' }, zoneSeverity);
      await write({ kind: 'cci-admin' }, adminSeverity);

      stage = 'landfall';
      const trackOutcome = await fetchWithFallback(
        { name: `${key.stormId} track`, live: () => this.deps.hazards.getTrack(key) },
        this.logger
      );
      const landfall = expectedLandfall(outcomeData(trackOutcome, []), boundary, key.issuedAt);

      stage = 'report';
      const previous = await this.diff.previousReport(region, key);
      const outcome = buildReport(
        {
          region: boundary,
          key,
          zones,
          admins,
          expected,
          adminImpact,
          zoneSeverity,
          adminSeverity,
          schools: schoolSeries,
          healthCenters: healthSeries,
          expectedLandfall: landfall,
          previous,
          reportDate: this.now(),
        },
        { intervalHours: this.intervalHours, topFacilities: this.topFacilities }
      );

      let reportPath: string | undefined;
      if (outcome.status === 'report') {
        reportPath = await this.reports.save(outcome.report);
        this.logger.info(`${region}: report written to ${reportPath}`);
      } else {
        this.logger.info(`${region}: no threshold carries impact, no report written`);
      }

      stage = 'views flag';
      await this.state.markViews(region, key, zoom, viewsWritten);

      return outcome.status === 'report'
        ? { region, status: 'reported', viewsWritten, reportPath }
        : { region, status: 'no-impact', viewsWritten };
    } catch (error) {
      if (isConfigurationError(error)) throw error;
      const failure = new RegionProcessingError(region, stage, error);
      this.logger.error(failure.toLogString());
      return { region, status: 'failed', viewsWritten, error: failure.message };
    }
  }

  private async loadFacilities(region: string, kind: FacilityKind): Promise<Facility[]> {
    const label = kind === 'school' ? 'schools' : 'health facilities';
    const outcome = await fetchWithFallback(
      {
        name: `${region} ${label}`,
        live: () => this.deps.facilities.fetchFacilities(region, kind),
        cached: () => this.facilityCache.load(region, kind),
        saveCache: (facilities) => this.facilityCache.save(region, kind, facilities),
        isEmpty: (facilities) => facilities.length === 0,
      },
      this.logger
    );
    if (outcome.status === 'unavailable') {
      this.logger.warn(`${region}: no ${label} available, facility tables will be empty`, {
        reason: outcome.reason,
      });
    }
    return outcomeData(outcome, []);
  }
}
