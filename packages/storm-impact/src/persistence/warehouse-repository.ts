/**
 * Hazard Warehouse Repository
 *
 * Envelope and track tables for every forecast issuance. Rows are validated
 * with zod; an envelope whose threshold is not enumerated or whose geometry
 * does not parse is dropped with a warning.
 */

import { z } from 'zod';
import { WIND_THRESHOLDS, isWindThreshold } from '../core/constants.js';
import type { ForecastKey, HazardEnvelope, TrackPoint } from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { parsePolygonalText, PolygonalGeometrySchema } from '../schemas/geojson.js';
import type { DatabaseAdapter } from './database.js';

// ============================================================================
// Row Schemas
// ============================================================================

const EnvelopeRowSchema = z.object({
  ensemble_member: z.number().int(),
  wind_threshold: z.number().int(),
  lead_time_range: z.string(),
  geometry: z.string(),
});

const TrackRowSchema = z.object({
  ensemble_member: z.number().int(),
  lead_time: z.number().int(),
  lon: z.number(),
  lat: z.number(),
  wind_speed: z.number().nullable(),
});

const ForecastRowSchema = z.object({
  storm_id: z.string(),
  forecast_time: z.string(),
});

/**
 * Envelope record accepted by bulk import
 */
export const EnvelopeRecordSchema = z.object({
  stormId: z.string().min(1),
  issuedAt: z.string().datetime(),
  ensembleMember: z.number().int().nonnegative(),
  windThreshold: z
    .number()
    .int()
    .refine(isWindThreshold, { message: `Wind threshold must be one of ${WIND_THRESHOLDS.join(', ')}` }),
  leadTimeRange: z.string().default(''),
  geometry: PolygonalGeometrySchema,
});

export const TrackRecordSchema = z.object({
  stormId: z.string().min(1),
  issuedAt: z.string().datetime(),
  ensembleMember: z.number().int().nonnegative(),
  leadTimeHours: z.number().int().nonnegative(),
  lon: z.number().min(-180).max(180),
  lat: z.number().min(-90).max(90),
  windSpeedKnots: z.number().nonnegative().optional(),
});

export type EnvelopeRecord = z.infer<typeof EnvelopeRecordSchema>;
export type TrackRecord = z.infer<typeof TrackRecordSchema>;

/**
 * Issuance times are stored normalized so lookups by key always match
 */
function normalizeIssuance(issuedAt: string): string {
  return new Date(issuedAt).toISOString();
}

// ============================================================================
// Repository
// ============================================================================

export class WarehouseRepository {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  async getEnvelopes(key: ForecastKey): Promise<HazardEnvelope[]> {
    const rows = await this.db.queryMany(
      `SELECT ensemble_member, wind_threshold, lead_time_range, geometry
       FROM envelopes
       WHERE storm_id = ? AND forecast_time = ?
       ORDER BY id`,
      [key.stormId, normalizeIssuance(key.issuedAt)]
    );

    const envelopes: HazardEnvelope[] = [];
    let dropped = 0;
    for (const raw of rows) {
      const row = EnvelopeRowSchema.parse(raw);
      const windThreshold = row.wind_threshold;
      const geometry = parsePolygonalText(row.geometry);
      if (!isWindThreshold(windThreshold) || !geometry) {
        dropped++;
        continue;
      }
      envelopes.push({
        ensembleMember: row.ensemble_member,
        windThreshold,
        leadTimeRange: row.lead_time_range,
        geometry,
      });
    }

    if (dropped > 0) {
      this.logger.warn(`Dropped ${dropped} envelope rows with unsupported threshold or invalid geometry`, {
        storm: key.stormId,
        issuedAt: key.issuedAt,
      });
    }
    return envelopes;
  }

  async getTrack(key: ForecastKey): Promise<TrackPoint[]> {
    const rows = await this.db.queryMany(
      `SELECT ensemble_member, lead_time, lon, lat, wind_speed
       FROM track_points
       WHERE storm_id = ? AND forecast_time = ?
       ORDER BY ensemble_member, lead_time`,
      [key.stormId, normalizeIssuance(key.issuedAt)]
    );

    return rows.map((raw) => {
      const row = TrackRowSchema.parse(raw);
      return {
        ensembleMember: row.ensemble_member,
        leadTimeHours: row.lead_time,
        lon: row.lon,
        lat: row.lat,
        ...(row.wind_speed === null ? {} : { windSpeedKnots: row.wind_speed }),
      };
    });
  }

  /**
   * Distinct forecast issuances with envelope data, oldest first
   */
  async listForecasts(): Promise<ForecastKey[]> {
    const rows = await this.db.queryMany(
      `SELECT DISTINCT storm_id, forecast_time
       FROM envelopes
       ORDER BY forecast_time, storm_id`
    );
    return rows.map((raw) => {
      const row = ForecastRowSchema.parse(raw);
      return { stormId: row.storm_id, issuedAt: row.forecast_time };
    });
  }

  async importEnvelopes(records: readonly EnvelopeRecord[]): Promise<number> {
    return this.db.transaction(async () => {
      let inserted = 0;
      for (const record of records) {
        inserted += await this.db.execute(
          `INSERT INTO envelopes (
            forecast_time, storm_id, ensemble_member, wind_threshold, lead_time_range, geometry
          ) VALUES (?, ?, ?, ?, ?, ?)`,
          [
            normalizeIssuance(record.issuedAt),
            record.stormId,
            record.ensembleMember,
            record.windThreshold,
            record.leadTimeRange,
            JSON.stringify(record.geometry),
          ]
        );
      }
      return inserted;
    });
  }

  async importTrack(records: readonly TrackRecord[]): Promise<number> {
    return this.db.transaction(async () => {
      let inserted = 0;
      for (const record of records) {
        inserted += await this.db.execute(
          `INSERT INTO track_points (
            forecast_time, storm_id, ensemble_member, lead_time, lon, lat, wind_speed
          ) VALUES (?, ?, ?, ?, ?, ?, ?)`,
          [
            normalizeIssuance(record.issuedAt),
            record.stormId,
            record.ensembleMember,
            record.leadTimeHours,
            record.lon,
            record.lat,
            record.windSpeedKnots ?? null,
          ]
        );
      }
      return inserted;
    });
  }
}
