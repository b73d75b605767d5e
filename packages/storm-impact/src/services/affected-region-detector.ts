/**
 * Affected Region Detector
 *
 * Gates which regions are processed for a forecast issuance. A region is
 * affected iff any envelope (any threshold, any member) intersects its
 * boundary buffered outward by REGION_BUFFER_KM, which captures storms that
 * have not yet made landfall.
 *
 * Buffering near the antimeridian or the poles can produce invalid output.
 * Such a buffer is repaired; when repair fails the unbuffered boundary is
 * tested instead of aborting.
 */

import { booleanIntersects, buffer } from '@turf/turf';
import type { MultiPolygon, Polygon } from 'geojson';
import { REGION_BUFFER_KM } from '../core/constants.js';
import { GeometryError, describeError } from '../core/errors.js';
import {
  bboxesOverlap,
  crossesDateline,
  extractBBox,
  isUsableGeometry,
  repairGeometry,
} from '../core/geo-utils.js';
import type { HazardEnvelope, RegionBoundary } from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';

export type BufferSource = 'buffered' | 'repaired' | 'unbuffered';

export interface BufferedBoundary {
  readonly geometry: Polygon | MultiPolygon;
  readonly source: BufferSource;
}

export interface RegionGateResult {
  readonly region: string;
  readonly affected: boolean;
  readonly bufferSource: BufferSource;
  readonly crossesDateline: boolean;
}

export interface AffectedRegionDetectorOptions {
  readonly bufferKm?: number;
  readonly logger?: PipelineLogger;
}

export class AffectedRegionDetector {
  private readonly bufferKm: number;
  private readonly logger: PipelineLogger;

  constructor(options: AffectedRegionDetectorOptions = {}) {
    this.bufferKm = options.bufferKm ?? REGION_BUFFER_KM;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Outward buffer of a region boundary, repaired or replaced when invalid
   */
  bufferBoundary(boundary: RegionBoundary): BufferedBoundary {
    let buffered: Polygon | MultiPolygon;
    try {
      buffered = this.rawBuffer(boundary);
    } catch (error) {
      this.logger.debug(`Buffer failed for ${boundary.code}, using original boundary`, {
        error: describeError(error),
      });
      return { geometry: boundary.geometry, source: 'unbuffered' };
    }

    if (isUsableGeometry(buffered)) {
      return { geometry: buffered, source: 'buffered' };
    }

    this.logger.debug(`Buffer geometry for ${boundary.code} is invalid, attempting repair`);
    const repaired = repairGeometry(buffered);
    if (repaired) {
      return { geometry: repaired, source: 'repaired' };
    }

    this.logger.debug(`Could not repair buffer for ${boundary.code}, using original boundary`);
    return { geometry: boundary.geometry, source: 'unbuffered' };
  }

  /**
   * Whether any envelope intersects the region's buffered boundary
   */
  isAffected(boundary: RegionBoundary, envelopes: readonly HazardEnvelope[]): RegionGateResult {
    const { geometry, source } = this.bufferBoundary(boundary);
    const zoneBBox = extractBBox(geometry);

    const affected = envelopes.some(
      (envelope) =>
        bboxesOverlap(zoneBBox, extractBBox(envelope.geometry)) &&
        booleanIntersects(geometry, envelope.geometry)
    );

    return {
      region: boundary.code,
      affected,
      bufferSource: source,
      crossesDateline: crossesDateline(zoneBBox),
    };
  }

  /**
   * Gate a list of regions, logging each decision
   */
  detect(boundaries: readonly RegionBoundary[], envelopes: readonly HazardEnvelope[]): RegionGateResult[] {
    return boundaries.map((boundary) => {
      const result = this.isAffected(boundary, envelopes);
      if (!result.affected) {
        this.logger.info(`${boundary.code}: Not affected (skipping)`);
      } else if (result.crossesDateline) {
        this.logger.info(`${boundary.code}: Affected (buffer crosses dateline)`);
      } else {
        this.logger.info(`${boundary.code}: Affected`);
      }
      return result;
    });
  }

  private rawBuffer(boundary: RegionBoundary): Polygon | MultiPolygon {
    const result = buffer(boundary.geometry, this.bufferKm, { units: 'kilometers' });
    if (!result || result.type !== 'Feature') {
      throw new GeometryError('Buffer produced no geometry', 'buffer', boundary.code);
    }
    return result.geometry;
  }
}
