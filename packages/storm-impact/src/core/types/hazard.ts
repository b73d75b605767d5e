/**
 * Hazard Types
 *
 * Ensemble envelopes and track points for one forecast issuance.
 */

import type { MultiPolygon, Polygon } from 'geojson';
import type { WindThreshold } from '../constants.js';

/**
 * Region affected at or above a wind threshold for one ensemble member
 */
export interface HazardEnvelope {
  readonly ensembleMember: number;
  readonly windThreshold: WindThreshold;
  readonly leadTimeRange: string;
  readonly geometry: Polygon | MultiPolygon;
}

/**
 * Identifies one forecast issuance of one storm
 *
 * `issuedAt` is an ISO-8601 UTC timestamp.
 */
export interface ForecastKey {
  readonly stormId: string;
  readonly issuedAt: string;
}

/**
 * Point on an ensemble member's track
 */
export interface TrackPoint {
  readonly ensembleMember: number;
  /** Hours after issuance */
  readonly leadTimeHours: number;
  readonly lon: number;
  readonly lat: number;
  readonly windSpeedKnots?: number;
}
