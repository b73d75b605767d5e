/**
 * CLI Runtime Context
 *
 * Global configuration and logger set up by the entry point's preAction
 * hook, and the runtime each pipeline command opens: the SQLite warehouse,
 * the file-backed providers, the results storage and the pipeline wired
 * over them.
 *
 * @module cli/context
 */

import { InvalidArgumentError } from 'commander';
import { ConfigurationError } from '../core/errors.js';
import type { PipelineLogger } from '../core/utils/logger.js';
import { openDatabase, type SQLiteAdapter } from '../persistence/adapters/sqlite.js';
import { LocalFileStorage, type StorageBackend } from '../persistence/storage.js';
import { TrackingRepository } from '../persistence/tracking-repository.js';
import { WarehouseRepository } from '../persistence/warehouse-repository.js';
import { GeoJsonFileProvider } from '../providers/geojson-file-provider.js';
import { TurfZonalIntersector } from '../providers/zonal-intersector.js';
import { ImpactPipeline } from '../services/impact-pipeline.js';
import { loadConfig, resolvePath, validateConfig, type CLIConfig } from './lib/config.js';
import { createCLILogger, type CLILogger } from './lib/logger.js';
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from './lib/output.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
  USER_CANCELLED: 10,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// Global Context
// ============================================================================

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

/**
 * Global options accepted by every command
 */
export type GlobalOptions = {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  resultsDir?: string;
  dataDir?: string;
  database?: string;
};

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

/**
 * The context when one was initialized, for last-resort error reporting
 */
export function peekGlobalContext(): GlobalContext | null {
  return globalContext;
}

export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      resultsDir: options.resultsDir,
      dataDir: options.dataDir,
      database: options.database,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.logLevel,
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

// ============================================================================
// Runtime
// ============================================================================

export interface Runtime {
  readonly db: SQLiteAdapter;
  readonly warehouse: WarehouseRepository;
  readonly tracking: TrackingRepository;
  readonly storage: StorageBackend;
  readonly pipeline: ImpactPipeline;
}

/**
 * Open the database and wire the pipeline from configuration
 */
export async function openRuntime(config: CLIConfig, logger: PipelineLogger): Promise<Runtime> {
  const db = await openDatabase(resolvePath(config, 'database'));
  const warehouse = new WarehouseRepository(db, logger);
  const tracking = new TrackingRepository(db);
  const provider = new GeoJsonFileProvider(resolvePath(config, 'data'));
  const storage = new LocalFileStorage(resolvePath(config, 'results'));

  const pipeline = new ImpactPipeline(
    {
      hazards: warehouse,
      zones: provider,
      boundaries: provider,
      facilities: provider,
      intersector: new TurfZonalIntersector(),
      storage,
      tracking,
      logger,
    },
    {
      regionBufferKm: config.pipeline.regionBufferKm,
      facilityBufferMeters: config.pipeline.facilityBufferMeters,
      forecastIntervalHours: config.pipeline.forecastIntervalHours,
      topFacilities: config.pipeline.topFacilities,
    }
  );

  return { db, warehouse, tracking, storage, pipeline };
}

/**
 * Run a command body against an open runtime, closing the database after
 */
export async function withRuntime<T>(fn: (runtime: Runtime, context: GlobalContext) => Promise<T>): Promise<T> {
  const context = getGlobalContext();
  const runtime = await openRuntime(context.config, context.logger);
  try {
    return await fn(runtime, context);
  } finally {
    await runtime.db.close();
  }
}

// ============================================================================
// Option Helpers
// ============================================================================

/**
 * Split a comma-separated option, dropping blanks
 */
export function parseList(value: string | undefined): string[] {
  if (value === undefined) return [];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse a positive integer option
 */
export function parsePositiveInt(value: string): number {
  const num = Number(value);
  if (!Number.isInteger(num) || num <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return num;
}

/**
 * Parse an output format option
 */
export function parseFormat(value: string): OutputFormat {
  if (!isOutputFormat(value)) {
    throw new InvalidArgumentError(`Expected one of ${OUTPUT_FORMATS.join(', ')}, got "${value}".`);
  }
  return value;
}

/**
 * Regions to process: the explicit list, else the active tracked regions,
 * else the configured list
 */
export async function resolveRegions(
  requested: string | undefined,
  tracking: Pick<TrackingRepository, 'listActiveRegions'>,
  config: Pick<CLIConfig, 'regions'>
): Promise<string[]> {
  const explicit = parseList(requested);
  if (explicit.length > 0) {
    return explicit;
  }

  const active = await tracking.listActiveRegions();
  if (active.length > 0) {
    return active.map((region) => region.code);
  }

  if (config.regions.length > 0) {
    return [...config.regions];
  }

  throw new ConfigurationError('No regions to process: pass --regions, add regions, or list them in the config file', {
    component: 'cli',
  });
}
