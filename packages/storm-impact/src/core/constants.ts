/**
 * Storm Impact Constants
 *
 * Wind threshold enumeration, category labels and the fixed parameters of the
 * impact model. Threshold-keyed data everywhere in the package is iterated in
 * the order of WIND_THRESHOLDS (ascending).
 */

// ============================================================================
// Wind Thresholds
// ============================================================================

/**
 * Wind-speed thresholds in knots, ascending
 */
export const WIND_THRESHOLDS = [34, 40, 50, 64, 83, 96, 113, 137] as const;

export type WindThreshold = (typeof WIND_THRESHOLDS)[number];

/**
 * Storm category label for each threshold
 */
export const STORM_CATEGORIES: Readonly<Record<WindThreshold, string>> = {
  34: 'Tropical Storm',
  40: 'Strong Tropical Storm',
  50: 'Very Strong TS',
  64: 'Cat 1 Hurricane',
  83: 'Cat 2 Hurricane',
  96: 'Cat 3 Hurricane',
  113: 'Cat 4 Hurricane',
  137: 'Cat 5 Hurricane',
};

/**
 * Type guard for enumerated wind thresholds
 */
export function isWindThreshold(value: number): value is WindThreshold {
  return WIND_THRESHOLDS.some((threshold) => threshold === value);
}

/**
 * Thresholds present in a threshold-keyed map, in ascending order
 */
export function presentThresholds<T>(map: ReadonlyMap<WindThreshold, T>): WindThreshold[] {
  return WIND_THRESHOLDS.filter((threshold) => map.has(threshold));
}

// ============================================================================
// Model Parameters
// ============================================================================

/** Threshold used as the "any impact" proxy for expected totals and rankings */
export const REFERENCE_THRESHOLD: WindThreshold = 34;

/** Severity weight scale applied to threshold² in the composite index */
export const SEVERITY_WEIGHT_SCALE = 1e-6;

/** Outward buffer applied to a region boundary before the envelope test */
export const REGION_BUFFER_KM = 1500;

/** Radius used to turn facility points into zones */
export const FACILITY_BUFFER_METERS = 150;

/** Interval between consecutive forecast issuances */
export const FORECAST_INTERVAL_HOURS = 6;

/** Facilities reported per facility kind */
export const TOP_FACILITIES_COUNT = 5;

/** Ensemble member carrying the deterministic (control) track */
export const DETERMINISTIC_MEMBER = 51;

/** Settlement class at or above which a zone counts as urban */
export const URBAN_SMOD_THRESHOLD = 20;

/** Wealth index below which a zone is in poverty */
export const POVERTY_RWI_THRESHOLD = -0.5;

/** Wealth index below which a zone is in severe poverty */
export const SEVERE_RWI_THRESHOLD = -1.0;

/** Default tile zoom level */
export const DEFAULT_ZOOM_LEVEL = 14;

/** Default look-back window for update runs */
export const DEFAULT_TIME_DELTA_DAYS = 9;

/** Percentage marker used when a change has no defined percentage */
export const UNDEFINED_PERCENTAGE = '-';

/** Intersection areas within this relative tolerance count as a tie */
export const OVERLAP_TIE_TOLERANCE = 1e-9;
