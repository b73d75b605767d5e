/**
 * Run Command
 *
 * Process a single forecast issuance of one storm.
 *
 * Usage:
 *   storm-impact run <storm> <issuedAt> [options]
 *
 * Options:
 *   --regions <codes>   Comma-separated region codes (default: active regions)
 *   --zoom <n>          Tile zoom level (default: from config)
 *   --force             Recompute regions whose views already exist
 *
 * Examples:
 *   storm-impact run STORM-A 2025-11-10T00:00:00Z
 *   storm-impact run STORM-A 2025-11-10T06:00:00Z --regions ATL --force
 */

import type { Command } from 'commander';
import { parseIssuance } from '../../../core/utils/dates.js';
import { parsePositiveInt, resolveRegions, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, printOutput } from '../../lib/output.js';
import { renderRunSummary, runExitCode } from './summary.js';

interface RunOptions {
  readonly regions?: string;
  readonly zoom?: number;
  readonly force?: boolean;
}

export function registerRunCommand(parent: Command): void {
  parent
    .command('run <storm> <issuedAt>')
    .description('Process one forecast issuance (ISO-8601 UTC time)')
    .option('--regions <codes>', 'Comma-separated region codes')
    .option('--zoom <n>', 'Tile zoom level', parsePositiveInt)
    .option('--force', 'Recompute regions whose views already exist')
    .action(async (storm: string, issuedAt: string, options: RunOptions) => {
      process.exitCode = await executeRun(storm, issuedAt, options);
    });
}

async function executeRun(storm: string, issuedAt: string, options: RunOptions): Promise<ExitCode> {
  // Normalized so the key matches the warehouse's stored issuance times
  const key = { stormId: storm, issuedAt: parseIssuance(issuedAt).toISOString() };

  return withRuntime(async ({ pipeline, tracking }, { config, logger }) => {
    const regions = await resolveRegions(options.regions, tracking, config);
    const zoom = options.zoom ?? config.pipeline.zoom;

    logger.commandStart('run', { storm, issuedAt: key.issuedAt, regions: regions.join(','), zoom });
    const summary = await pipeline.runForecast(key, regions, zoom, options.force ?? false);
    const exitCode = runExitCode(summary);
    logger.commandEnd(exitCode === 0, { status: summary.status, views: summary.viewsWritten });

    printOutput(config.json ? formatJson(summary) : renderRunSummary(summary));
    return exitCode;
  });
}
