/**
 * Schema Migrations
 *
 * Applied in version order inside one transaction. Never edit a released
 * migration; append a new one.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  readonly version: number;
  readonly name: string;
  readonly up: (db: Database.Database) => void;
}

export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    name: 'hazard_warehouse',
    up: (db) => {
      db.exec(`
        CREATE TABLE envelopes (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          forecast_time TEXT NOT NULL,
          storm_id TEXT NOT NULL,
          ensemble_member INTEGER NOT NULL,
          wind_threshold INTEGER NOT NULL,
          lead_time_range TEXT NOT NULL,
          geometry TEXT NOT NULL
        );

        CREATE TABLE track_points (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          forecast_time TEXT NOT NULL,
          storm_id TEXT NOT NULL,
          ensemble_member INTEGER NOT NULL,
          lead_time INTEGER NOT NULL,
          lon REAL NOT NULL,
          lat REAL NOT NULL,
          wind_speed REAL
        );

        CREATE INDEX idx_envelopes_forecast ON envelopes(storm_id, forecast_time);
        CREATE INDEX idx_track_points_forecast ON track_points(storm_id, forecast_time);
      `);
    },
  },
  {
    version: 2,
    name: 'pipeline_tracking',
    up: (db) => {
      db.exec(`
        CREATE TABLE pipeline_regions (
          code TEXT PRIMARY KEY,
          name TEXT NOT NULL,
          default_zoom INTEGER NOT NULL,
          active INTEGER NOT NULL DEFAULT 1 CHECK (active IN (0, 1)),
          last_initialized TEXT,
          created_at TEXT NOT NULL
        );

        CREATE TABLE initialized_levels (
          region TEXT NOT NULL,
          zoom INTEGER NOT NULL,
          initialized_at TEXT NOT NULL,
          PRIMARY KEY (region, zoom)
        );
      `);
    },
  },
];
