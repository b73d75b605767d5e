/**
 * Storm Impact - Ensemble Wind-Threshold Impact Engine
 *
 * Turns ensemble wind-threshold envelopes into per-region impact reports:
 * - exceedance probabilities and expected impact per tile and admin unit
 * - member-weighted severity index (CCI) per demographic group
 * - facility exposure rankings and vulnerability splits
 * - forecast-to-forecast change against the previous issuance
 *
 * @packageDocumentation
 */

// Constants and domain types
export * from './core/constants.js';
export * from './core/types/index.js';
export {
  ConfigurationError,
  GeometryError,
  MissingDataError,
  RegionProcessingError,
  describeError,
  isConfigurationError,
  isGeometryError,
  isMissingDataError,
  isRegionProcessingError,
  type ConfigurationErrorDetails,
  type GeometryOperation,
} from './core/errors.js';
export { fetchWithFallback, outcomeData, type FallbackSource, type FetchOutcome } from './core/fallback.js';
export { silentLogger, type LogLevel, type LogMetadata, type PipelineLogger } from './core/utils/logger.js';
export { parseIssuance, formatForecastDate } from './core/utils/dates.js';

// Report schema
export * from './schemas/report.js';

// Calculators
export {
  computeProbabilityLayer,
  computeProbabilitySeries,
  groupEnvelopesByThreshold,
  sumProbability,
  type ProbabilitySeriesOptions,
} from './services/exceedance-probability.js';
export { computeExpectedLayer, computeExpectedSeries, scaleAttributes, sumExpected } from './services/expected-impact.js';
export { computeFacilityProbabilities } from './services/facility-exposure.js';
export {
  MemberSeverityCalculator,
  type MemberSeverityInput,
  type MemberSeverityOptions,
} from './services/member-severity.js';
export {
  computeAdminSeverity,
  computeZoneSeverity,
  requireAdminAssignment,
  severityIndex,
  type AssignedZone,
} from './services/severity-index.js';
export {
  aggregateBaselineToAdmins,
  aggregateExpectedToAdmins,
  aggregateToAdmins,
  assignZonesToAdmins,
  computeOverlapAreas,
  pickMaxOverlap,
  type AggregationInput,
  type AssignmentResult,
  type ColumnSpec,
  type OverlapArea,
} from './services/hierarchical-aggregator.js';
export { classifyZone, computeVulnerability } from './services/vulnerability.js';
export { rankFacilities, selectRankingThreshold, topByProbability } from './services/risk-ranker.js';
export { ALREADY_LANDED, LANDFALL_UNKNOWN, expectedLandfall, landfallLeadTime } from './services/landfall.js';

// Forecast diff and report assembly
export {
  ForecastDiffEngine,
  diffMetric,
  formatSignedDelta,
  previousForecastKey,
  type MetricChange,
  type ReportLookup,
} from './services/forecast-diff.js';
export {
  buildChildrenChange,
  buildReport,
  expectedThreshold,
  maxImpactThreshold,
  type ReportBuilderOptions,
  type ReportInputs,
  type ReportOutcome,
} from './services/report-builder.js';

// Orchestration
export {
  AffectedRegionDetector,
  type AffectedRegionDetectorOptions,
  type BufferedBoundary,
  type RegionGateResult,
} from './services/affected-region-detector.js';
export { ZoneBaselineService, type BaselineResult, type BaselineZones } from './services/zone-baseline.js';
export {
  PipelineStateTracker,
  type InitializationState,
  type PipelineStateTrackerOptions,
} from './services/pipeline-state-tracker.js';
export {
  ImpactPipeline,
  runSucceeded,
  selectForecasts,
  type ForecastRunStatus,
  type ForecastRunSummary,
  type HazardSource,
  type ImpactPipelineDependencies,
  type ImpactPipelineOptions,
  type InitializeSummary,
  type RegionOutcome,
  type RegionStatus,
  type UpdateFilters,
  type UpdateSummary,
} from './services/impact-pipeline.js';

// Providers
export type { BoundaryProvider, FacilityProvider, ZoneValueProvider } from './providers/types.js';
export { TurfZonalIntersector, facilityToUnit, type SpatialUnit, type ZonalIntersector } from './providers/zonal-intersector.js';
export { GeoJsonFileProvider } from './providers/geojson-file-provider.js';

// Persistence
export type { DatabaseAdapter } from './persistence/database.js';
export { SQLiteAdapter, openDatabase } from './persistence/adapters/sqlite.js';
export {
  WarehouseRepository,
  EnvelopeRecordSchema,
  TrackRecordSchema,
  type EnvelopeRecord,
  type TrackRecord,
} from './persistence/warehouse-repository.js';
export {
  TrackingRepository,
  type NewPipelineRegion,
  type PipelineRegion,
} from './persistence/tracking-repository.js';
export { InMemoryStorage, LocalFileStorage, type StorageBackend } from './persistence/storage.js';
export { StorageLayout, VIEW_KINDS, type ViewKind } from './persistence/layout.js';
export { ViewStore, type ViewAddress, type ViewHeader } from './persistence/view-store.js';
export { ReportStore } from './persistence/report-store.js';
export { ProcessedForecastLog, type ProcessedForecast } from './persistence/processed-forecasts.js';
export { FacilityCache } from './persistence/facility-cache.js';
