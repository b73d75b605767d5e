/**
 * Storm Impact CLI Configuration Management
 *
 * Loads configuration from .storm-impactrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (STORM_IMPACT_*)
 * 3. Config file (.storm-impactrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  DEFAULT_TIME_DELTA_DAYS,
  DEFAULT_ZOOM_LEVEL,
  FACILITY_BUFFER_METERS,
  FORECAST_INTERVAL_HOURS,
  REGION_BUFFER_KM,
  TOP_FACILITIES_COUNT,
} from '../../core/constants.js';
import { ConfigurationError } from '../../core/errors.js';
import type { LogLevel } from '../../core/utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** Results root holding zones/, views/, reports/, flags/ and cache/ */
  readonly results: string;
  /** Directory of per-region GeoJSON inputs read by the file provider */
  readonly data: string;
  /** SQLite database holding envelopes, tracks and region tracking */
  readonly database: string;
}

/**
 * Pipeline defaults
 */
export interface PipelineConfig {
  readonly zoom: number;
  /** Look-back window for `update` when no date is given */
  readonly timeDeltaDays: number;
  readonly regionBufferKm: number;
  readonly forecastIntervalHours: number;
  readonly topFacilities: number;
  readonly facilityBufferMeters: number;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly paths: PathsConfig;

  readonly pipeline: PipelineConfig;

  /** Regions used when the tracking table has no active regions */
  readonly regions: readonly string[];

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly logLevel: LogLevel;
  /** Resolved config file path */
  readonly configPath: string | null;
}

const positive = z.number().positive();

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        results: z.string().min(1),
        data: z.string().min(1),
        database: z.string().min(1),
      })
      .partial()
      .optional(),
    pipeline: z
      .object({
        zoom: z.number().int(),
        time_delta_days: positive,
        region_buffer_km: positive,
        forecast_interval_hours: positive,
        top_facilities: z.number().int(),
        facility_buffer_meters: positive,
      })
      .partial()
      .optional(),
    regions: z.array(z.string().min(1)).optional(),
    log_level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'logLevel' | 'configPath'> = {
  version: 1,

  paths: {
    results: './results',
    data: './data',
    database: './data/warehouse.db',
  },

  pipeline: {
    zoom: DEFAULT_ZOOM_LEVEL,
    timeDeltaDays: DEFAULT_TIME_DELTA_DAYS,
    regionBufferKm: REGION_BUFFER_KM,
    forecastIntervalHours: FORECAST_INTERVAL_HOURS,
    topFacilities: TOP_FACILITIES_COUNT,
    facilityBufferMeters: FACILITY_BUFFER_METERS,
  },

  regions: [],
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.storm-impactrc',
  '.storm-impactrc.yaml',
  '.storm-impactrc.yml',
  '.storm-impactrc.json',
];

/**
 * Find config file in a directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so one parser covers every file name
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Config file is not valid YAML or JSON: ${filePath} (${String(error)})`, {
      component: 'config',
    });
  }

  // An empty file parses to null
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file: ${filePath}`, {
      component: 'config',
      offending: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  return process.env[`STORM_IMPACT_${name}`];
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = Number(value);
  return value.trim() === '' || isNaN(num) ? undefined : num;
}

/**
 * Get comma-separated list environment variable
 */
function getEnvList(name: string): string[] | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function getEnvLogLevel(): LogLevel | undefined {
  const value = getEnvVar('LOG_LEVEL')?.toLowerCase();
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') {
    return value;
  }
  return undefined;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    zoom?: number;
    resultsDir?: string;
    dataDir?: string;
    database?: string;
  };
}

/**
 * Load and merge configuration from all sources
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`, { component: 'config' });
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};
  const verbose = overrides.verbose ?? getEnvBool('VERBOSE') ?? false;

  const config: CLIConfig = {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    paths: {
      results:
        overrides.resultsDir ?? getEnvVar('RESULTS_DIR') ?? fileConfig.paths?.results ?? DEFAULT_CONFIG.paths.results,
      data: overrides.dataDir ?? getEnvVar('DATA_DIR') ?? fileConfig.paths?.data ?? DEFAULT_CONFIG.paths.data,
      database:
        overrides.database ?? getEnvVar('DATABASE') ?? fileConfig.paths?.database ?? DEFAULT_CONFIG.paths.database,
    },

    pipeline: {
      zoom: overrides.zoom ?? getEnvNumber('ZOOM') ?? fileConfig.pipeline?.zoom ?? DEFAULT_CONFIG.pipeline.zoom,
      timeDeltaDays:
        getEnvNumber('TIME_DELTA_DAYS') ??
        fileConfig.pipeline?.time_delta_days ??
        DEFAULT_CONFIG.pipeline.timeDeltaDays,
      regionBufferKm:
        getEnvNumber('REGION_BUFFER_KM') ??
        fileConfig.pipeline?.region_buffer_km ??
        DEFAULT_CONFIG.pipeline.regionBufferKm,
      forecastIntervalHours:
        getEnvNumber('FORECAST_INTERVAL_HOURS') ??
        fileConfig.pipeline?.forecast_interval_hours ??
        DEFAULT_CONFIG.pipeline.forecastIntervalHours,
      topFacilities:
        getEnvNumber('TOP_FACILITIES') ??
        fileConfig.pipeline?.top_facilities ??
        DEFAULT_CONFIG.pipeline.topFacilities,
      facilityBufferMeters:
        getEnvNumber('FACILITY_BUFFER_METERS') ??
        fileConfig.pipeline?.facility_buffer_meters ??
        DEFAULT_CONFIG.pipeline.facilityBufferMeters,
    },

    regions: getEnvList('REGIONS') ?? fileConfig.regions ?? DEFAULT_CONFIG.regions,

    // Runtime flags
    verbose,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    logLevel: verbose ? 'debug' : (getEnvLogLevel() ?? fileConfig.log_level ?? 'info'),
    configPath,
  };

  return config;
}

/**
 * Resolve a configured path relative to the config file, or the working
 * directory when no config file was loaded
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const value = config.paths[pathKey];
  if (pathKey === 'database' && value === ':memory:') {
    return value;
  }
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, value);
}

/**
 * Validate configuration
 *
 * @throws ConfigurationError if configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`, {
      component: 'config',
      offending: ['version'],
    });
  }

  const numeric: ReadonlyArray<readonly [string, number]> = [
    ['pipeline.zoom', config.pipeline.zoom],
    ['pipeline.timeDeltaDays', config.pipeline.timeDeltaDays],
    ['pipeline.regionBufferKm', config.pipeline.regionBufferKm],
    ['pipeline.forecastIntervalHours', config.pipeline.forecastIntervalHours],
    ['pipeline.topFacilities', config.pipeline.topFacilities],
    ['pipeline.facilityBufferMeters', config.pipeline.facilityBufferMeters],
  ];
  const invalid = numeric.filter(([, value]) => !Number.isFinite(value) || value <= 0).map(([name]) => name);
  if (invalid.length > 0) {
    throw new ConfigurationError('Numeric settings must be positive numbers', {
      component: 'config',
      offending: invalid,
    });
  }

  if (!Number.isInteger(config.pipeline.zoom) || !Number.isInteger(config.pipeline.topFacilities)) {
    throw new ConfigurationError('Zoom level and facility count must be integers', {
      component: 'config',
      offending: ['pipeline.zoom', 'pipeline.topFacilities'],
    });
  }
}
