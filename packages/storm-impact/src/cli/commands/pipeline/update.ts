/**
 * Update Command
 *
 * Process every warehouse forecast issued on a date, or within a look-back
 * window, that has not been processed yet.
 *
 * Usage:
 *   storm-impact update [options]
 *
 * Options:
 *   --date <YYYY-MM-DD>    Only issuances on this UTC day
 *   --time-delta <days>    Look-back window when no date is given (default: from config)
 *   --storm <id>           Only this storm
 *   --regions <codes>      Comma-separated region codes (default: active regions)
 *   --zoom <n>             Tile zoom level (default: from config)
 *   --force                Reprocess forecasts already processed
 *
 * Examples:
 *   storm-impact update
 *   storm-impact update --date 2025-11-10 --storm STORM-A --force
 */

import { InvalidArgumentError, type Command } from 'commander';
import { parsePositiveInt, resolveRegions, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, printOutput } from '../../lib/output.js';
import { renderUpdateSummary, updateExitCode } from './summary.js';

interface UpdateOptions {
  readonly date?: string;
  readonly timeDelta?: number;
  readonly storm?: string;
  readonly regions?: string;
  readonly zoom?: number;
  readonly force?: boolean;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function parseDay(value: string): string {
  if (!DATE_PATTERN.test(value) || isNaN(Date.parse(`${value}T00:00:00Z`))) {
    throw new InvalidArgumentError(`Expected a date as YYYY-MM-DD, got "${value}".`);
  }
  return value;
}

export function registerUpdateCommand(parent: Command): void {
  parent
    .command('update')
    .description('Process new forecasts from the hazard warehouse')
    .option('--date <YYYY-MM-DD>', 'Only issuances on this UTC day', parseDay)
    .option('--time-delta <days>', 'Look-back window in days', parsePositiveInt)
    .option('--storm <id>', 'Only this storm')
    .option('--regions <codes>', 'Comma-separated region codes')
    .option('--zoom <n>', 'Tile zoom level', parsePositiveInt)
    .option('--force', 'Reprocess forecasts already processed')
    .action(async (options: UpdateOptions) => {
      process.exitCode = await executeUpdate(options);
    });
}

async function executeUpdate(options: UpdateOptions): Promise<ExitCode> {
  return withRuntime(async ({ pipeline, tracking }, { config, logger }) => {
    const regions = await resolveRegions(options.regions, tracking, config);
    const zoom = options.zoom ?? config.pipeline.zoom;
    const filters = {
      date: options.date,
      timeDeltaDays: options.timeDelta ?? config.pipeline.timeDeltaDays,
      stormId: options.storm,
    };

    logger.commandStart('update', { ...filters, regions: regions.join(','), zoom });
    const summary = await pipeline.update(filters, regions, zoom, options.force ?? false);
    const exitCode = updateExitCode(summary);
    logger.commandEnd(exitCode === 0, { selected: summary.selected, runs: summary.runs.length });

    printOutput(config.json ? formatJson(summary) : renderUpdateSummary(summary));
    return exitCode;
  });
}
