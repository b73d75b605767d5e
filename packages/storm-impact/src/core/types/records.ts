/**
 * Impact Record Types
 *
 * Derived tables produced for one (region, storm, issuance). Every
 * threshold-keyed collection is a ReadonlyMap keyed by WindThreshold and is
 * iterated in WIND_THRESHOLDS order, never in insertion order.
 */

import type { WindThreshold } from '../constants.js';
import type { DemographicGroup, ZoneAttributes } from './zone.js';

// ============================================================================
// Exceedance Probability
// ============================================================================

export interface ProbabilityRow {
  readonly zoneId: string;
  /** Distinct ensemble members whose envelope covers the zone */
  readonly coveringMembers: number;
  /** coveringMembers / memberCount, in [0, 1] */
  readonly probability: number;
}

/**
 * Exceedance probabilities for every zone at one threshold
 */
export interface ProbabilityLayer {
  readonly threshold: WindThreshold;
  /** Distinct ensemble members with an envelope at this threshold */
  readonly memberCount: number;
  readonly rows: readonly ProbabilityRow[];
}

export type ProbabilitySeries = ReadonlyMap<WindThreshold, ProbabilityLayer>;

// ============================================================================
// Expected Impact
// ============================================================================

export interface ExpectedImpactRow {
  readonly zoneId: string;
  readonly adminId?: string;
  readonly probability: number;
  /** baseline × probability; null where the baseline is missing */
  readonly expected: ZoneAttributes;
}

export interface ExpectedImpactLayer {
  readonly threshold: WindThreshold;
  readonly rows: readonly ExpectedImpactRow[];
}

export type ExpectedImpactSeries = ReadonlyMap<WindThreshold, ExpectedImpactLayer>;

// ============================================================================
// Composite Severity Index
// ============================================================================

export const SEVERITY_VARIANTS = ['raw', 'expected'] as const;

export type SeverityVariant = (typeof SEVERITY_VARIANTS)[number];

export type SeverityValues = Readonly<Record<DemographicGroup, number | null>>;

/**
 * Composite index for one zone or admin unit: 4 groups × 2 variants
 */
export interface SeverityIndexRow {
  readonly id: string;
  readonly adminId: string;
  readonly raw: SeverityValues;
  readonly expected: SeverityValues;
}

// ============================================================================
// Admin Aggregates
// ============================================================================

/**
 * Expected impact rolled up to one admin unit at one threshold
 */
export interface AdminImpactRow {
  readonly adminId: string;
  readonly adminName: string;
  /** Highest tile probability inside the unit */
  readonly probability: number;
  readonly expected: ZoneAttributes;
}

export interface AdminImpactLayer {
  readonly threshold: WindThreshold;
  readonly rows: readonly AdminImpactRow[];
}

export type AdminImpactSeries = ReadonlyMap<WindThreshold, AdminImpactLayer>;

// ============================================================================
// Facilities and Tracks
// ============================================================================

export interface FacilityProbabilityRow {
  readonly facilityId: string;
  readonly name: string;
  readonly detail: string;
  readonly probability: number;
}

export type FacilityProbabilitySeries = ReadonlyMap<WindThreshold, readonly FacilityProbabilityRow[]>;

/**
 * Exposure inside one ensemble member's envelope at one threshold
 */
export interface MemberSeverityRow {
  readonly ensembleMember: number;
  readonly schools: number;
  readonly healthCenters: number;
  readonly population: number;
  readonly schoolAgePopulation: number;
  readonly infantPopulation: number;
  readonly builtSurfaceM2: number;
}

export type MemberSeveritySeries = ReadonlyMap<WindThreshold, readonly MemberSeverityRow[]>;
