/**
 * Geographic Utilities - Shared Geometry Functions
 *
 * - extractBBox: bounding box of a polygonal geometry
 * - bboxesOverlap: cheap pre-filter before exact intersection tests
 * - hasUsableBounds / crossesDateline: sanity checks on buffered geometry
 * - repairGeometry: regularize self-intersecting output of buffer/overlay
 */

import { booleanValid, cleanCoords, unkinkPolygon } from '@turf/turf';
import type { BBox, MultiPolygon, Polygon, Position } from 'geojson';

/**
 * Coordinates outside this magnitude mean a projection blew up
 */
const MAX_SANE_COORDINATE = 1000;

// ============================================================================
// Bounding Boxes
// ============================================================================

/**
 * Extract bounding box from a polygonal geometry
 *
 * @returns Bounding box [minLon, minLat, maxLon, maxLat]
 */
export function extractBBox(geometry: Polygon | MultiPolygon): BBox {
    let minLon = Infinity;
    let minLat = Infinity;
    let maxLon = -Infinity;
    let maxLat = -Infinity;

    const processRing = (ring: Position[]): void => {
        for (const [lon, lat] of ring) {
            minLon = Math.min(minLon, lon);
            minLat = Math.min(minLat, lat);
            maxLon = Math.max(maxLon, lon);
            maxLat = Math.max(maxLat, lat);
        }
    };

    if (geometry.type === 'Polygon') {
        for (const ring of geometry.coordinates) {
            processRing(ring);
        }
    } else {
        for (const polygon of geometry.coordinates) {
            for (const ring of polygon) {
                processRing(ring);
            }
        }
    }

    return [minLon, minLat, maxLon, maxLat];
}

/**
 * Whether two bounding boxes share at least one point
 */
export function bboxesOverlap(a: BBox, b: BBox): boolean {
    return a[0] <= b[2] && b[0] <= a[2] && a[1] <= b[3] && b[1] <= a[3];
}

/**
 * Whether every bound is finite and within sane coordinate magnitude
 */
export function hasUsableBounds(bbox: BBox): boolean {
    return bbox.every((value) => Number.isFinite(value) && Math.abs(value) < MAX_SANE_COORDINATE);
}

/**
 * Whether a bounding box spans more than half the globe in longitude
 */
export function crossesDateline(bbox: BBox): boolean {
    return bbox[2] - bbox[0] > 180;
}

// ============================================================================
// Repair
// ============================================================================

/**
 * Whether geometry has sane bounds and passes OGC validity
 */
export function isUsableGeometry(geometry: Polygon | MultiPolygon): boolean {
    return hasUsableBounds(extractBBox(geometry)) && booleanValid(geometry);
}

/**
 * Regularize an invalid polygonal geometry
 *
 * First splits self-intersecting rings into simple pieces, then falls back
 * to removing duplicate and collinear vertices. Returns null when neither
 * attempt yields a usable geometry.
 */
export function repairGeometry(geometry: Polygon | MultiPolygon): Polygon | MultiPolygon | null {
    const unkinked = attemptRepair((): MultiPolygon => ({
        type: 'MultiPolygon',
        coordinates: unkinkPolygon(geometry).features.map((piece) => piece.geometry.coordinates),
    }));
    if (unkinked !== null && unkinked.coordinates.length > 0) {
        return unkinked;
    }

    return attemptRepair(() => cleanCoords(geometry));
}

/**
 * Run one repair strategy; turf throws on degenerate rings
 */
function attemptRepair<T extends Polygon | MultiPolygon>(repair: () => T): T | null {
    try {
        const repaired = repair();
        return isUsableGeometry(repaired) ? repaired : null;
    } catch {
        return null;
    }
}
