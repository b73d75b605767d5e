/**
 * Expected Landfall
 *
 * Estimated from the deterministic ensemble member's track: the first track
 * point inside the region boundary gives the landfall lead time; failing
 * that, the first track segment crossing the boundary gives it (the lead time
 * of the segment's start point).
 */

import { booleanIntersects, booleanPointInPolygon, lineString, point } from '@turf/turf';
import { DETERMINISTIC_MEMBER } from '../core/constants.js';
import type { RegionBoundary, TrackPoint } from '../core/types/index.js';
import { addHours, formatForecastDate, parseIssuance } from '../core/utils/dates.js';

export const LANDFALL_UNKNOWN = 'Unknown';
export const ALREADY_LANDED = 'Already landed';

/**
 * Lead time in hours at which the deterministic track reaches the region,
 * or null when it never does
 */
export function landfallLeadTime(
  track: readonly TrackPoint[],
  boundary: RegionBoundary,
  member: number = DETERMINISTIC_MEMBER
): number | null {
  const points = track
    .filter((trackPoint) => trackPoint.ensembleMember === member)
    .sort((a, b) => a.leadTimeHours - b.leadTimeHours);

  const inside = points.find((trackPoint) =>
    booleanPointInPolygon(point([trackPoint.lon, trackPoint.lat]), boundary.geometry)
  );
  if (inside) {
    return inside.leadTimeHours;
  }

  for (let i = 0; i < points.length - 1; i++) {
    const start = points[i];
    const end = points[i + 1];
    if (!start || !end) continue;
    const segment = lineString([
      [start.lon, start.lat],
      [end.lon, end.lat],
    ]);
    if (booleanIntersects(segment, boundary.geometry)) {
      return start.leadTimeHours;
    }
  }

  return null;
}

/**
 * Display string for the expected landfall of one issuance
 */
export function expectedLandfall(
  track: readonly TrackPoint[],
  boundary: RegionBoundary,
  issuedAt: string
): string {
  const leadTime = landfallLeadTime(track, boundary);
  if (leadTime === null) {
    return LANDFALL_UNKNOWN;
  }
  if (leadTime === 0) {
    return ALREADY_LANDED;
  }
  return formatForecastDate(addHours(parseIssuance(issuedAt), leadTime));
}
