/**
 * Initialize Command
 *
 * Materialize base zones (tile grid with admin assignment, plus admin
 * units) for each region at a zoom level.
 *
 * Usage:
 *   storm-impact initialize [options]
 *
 * Options:
 *   --regions <codes>   Comma-separated region codes (default: active regions)
 *   --zoom <n>          Tile zoom level (default: from config)
 *   --force             Rebuild levels that are already initialized
 *
 * Examples:
 *   storm-impact initialize --regions ATL,BRB --zoom 14
 */

import type { Command } from 'commander';
import { parsePositiveInt, resolveRegions, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, printOutput } from '../../lib/output.js';
import { initializeExitCode, renderInitializeSummary } from './summary.js';

interface InitializeOptions {
  readonly regions?: string;
  readonly zoom?: number;
  readonly force?: boolean;
}

export function registerInitializeCommand(parent: Command): void {
  parent
    .command('initialize')
    .description('Materialize base zones for each region')
    .option('--regions <codes>', 'Comma-separated region codes')
    .option('--zoom <n>', 'Tile zoom level', parsePositiveInt)
    .option('--force', 'Rebuild levels that are already initialized')
    .action(async (options: InitializeOptions) => {
      process.exitCode = await executeInitialize(options);
    });
}

async function executeInitialize(options: InitializeOptions): Promise<ExitCode> {
  return withRuntime(async ({ pipeline, tracking }, { config, logger }) => {
    const regions = await resolveRegions(options.regions, tracking, config);
    const zoom = options.zoom ?? config.pipeline.zoom;

    logger.commandStart('initialize', { regions: regions.join(','), zoom });
    const summary = await pipeline.initialize(regions, zoom, options.force ?? false);
    const exitCode = initializeExitCode(summary);
    logger.commandEnd(exitCode === 0, { regions: regions.length, errors: summary.errors.length });

    printOutput(config.json ? formatJson(summary) : renderInitializeSummary(summary));
    return exitCode;
  });
}
