/**
 * Pipeline Tracking Repository
 *
 * Which regions the pipeline runs for, and which (region, zoom) levels have
 * materialized baseline zones. Best-effort telemetry: the flag files in
 * storage stay authoritative.
 */

import { z } from 'zod';
import type { DatabaseAdapter } from './database.js';

const RegionRowSchema = z.object({
  code: z.string(),
  name: z.string(),
  default_zoom: z.number().int(),
  active: z.number().int(),
  last_initialized: z.string().nullable(),
  created_at: z.string(),
});

const ZoomRowSchema = z.object({ zoom: z.number().int() });

export interface PipelineRegion {
  readonly code: string;
  readonly name: string;
  readonly defaultZoom: number;
  readonly active: boolean;
  readonly lastInitialized: string | null;
  readonly createdAt: string;
}

export interface NewPipelineRegion {
  readonly code: string;
  readonly name: string;
  readonly defaultZoom: number;
  readonly active?: boolean;
}

function toRegion(raw: unknown): PipelineRegion {
  const row = RegionRowSchema.parse(raw);
  return {
    code: row.code,
    name: row.name,
    defaultZoom: row.default_zoom,
    active: row.active === 1,
    lastInitialized: row.last_initialized,
    createdAt: row.created_at,
  };
}

export class TrackingRepository {
  constructor(
    private readonly db: DatabaseAdapter,
    private readonly now: () => Date = () => new Date()
  ) {}

  async listRegions(): Promise<PipelineRegion[]> {
    const rows = await this.db.queryMany('SELECT * FROM pipeline_regions ORDER BY code');
    return rows.map(toRegion);
  }

  async listActiveRegions(): Promise<PipelineRegion[]> {
    const rows = await this.db.queryMany('SELECT * FROM pipeline_regions WHERE active = 1 ORDER BY code');
    return rows.map(toRegion);
  }

  async getRegion(code: string): Promise<PipelineRegion | null> {
    const row = await this.db.queryOne('SELECT * FROM pipeline_regions WHERE code = ?', [code]);
    return row === null ? null : toRegion(row);
  }

  /**
   * Add a region, or update its name and zoom when it already exists
   */
  async addRegion(region: NewPipelineRegion): Promise<PipelineRegion> {
    await this.db.execute(
      `INSERT INTO pipeline_regions (code, name, default_zoom, active, created_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(code) DO UPDATE SET name = excluded.name, default_zoom = excluded.default_zoom`,
      [region.code, region.name, region.defaultZoom, region.active === false ? 0 : 1, this.now().toISOString()]
    );

    const stored = await this.getRegion(region.code);
    if (!stored) {
      throw new Error(`Failed to add region: ${region.code}`);
    }
    return stored;
  }

  /**
   * @returns false when the region is unknown
   */
  async setActive(code: string, active: boolean): Promise<boolean> {
    const changes = await this.db.execute('UPDATE pipeline_regions SET active = ? WHERE code = ?', [
      active ? 1 : 0,
      code,
    ]);
    return changes > 0;
  }

  async recordInitialization(region: string, zoom: number): Promise<void> {
    const at = this.now().toISOString();
    await this.db.transaction(async () => {
      await this.db.execute(
        `INSERT INTO initialized_levels (region, zoom, initialized_at) VALUES (?, ?, ?)
         ON CONFLICT(region, zoom) DO UPDATE SET initialized_at = excluded.initialized_at`,
        [region, zoom, at]
      );
      await this.db.execute('UPDATE pipeline_regions SET last_initialized = ? WHERE code = ?', [at, region]);
    });
  }

  async listInitializedZooms(region: string): Promise<number[]> {
    const rows = await this.db.queryMany('SELECT zoom FROM initialized_levels WHERE region = ? ORDER BY zoom', [
      region,
    ]);
    return rows.map((raw) => ZoomRowSchema.parse(raw).zoom);
  }

  /**
   * Active regions without materialized zones at the given zoom
   */
  async regionsNeedingInitialization(zoom: number): Promise<PipelineRegion[]> {
    const rows = await this.db.queryMany(
      `SELECT r.* FROM pipeline_regions r
       WHERE r.active = 1
         AND NOT EXISTS (
           SELECT 1 FROM initialized_levels l WHERE l.region = r.code AND l.zoom = ?
         )
       ORDER BY r.code`,
      [zoom]
    );
    return rows.map(toRegion);
  }
}
