/**
 * Regions List Command
 *
 * Usage:
 *   storm-impact regions list [--active] [--format table|json|ndjson|csv]
 */

import type { Command } from 'commander';
import { EXIT_CODES, parseFormat, withRuntime, type ExitCode } from '../../context.js';
import { formatOutput, formatters, printOutput, type OutputFormat, type TableColumn } from '../../lib/output.js';

interface ListOptions {
  readonly active?: boolean;
  readonly format: OutputFormat;
}

const REGION_COLUMNS: TableColumn[] = [
  { key: 'code', header: 'Code' },
  { key: 'name', header: 'Name' },
  { key: 'defaultZoom', header: 'Zoom', align: 'right' },
  { key: 'active', header: 'Active', formatter: formatters.yesNo },
  { key: 'initializedZooms', header: 'Initialized', formatter: (value) => (Array.isArray(value) ? value.join(', ') : '') },
  { key: 'lastInitialized', header: 'Last initialized', formatter: formatters.datetime },
];

export function registerListCommand(parent: Command): void {
  parent
    .command('list')
    .description('List pipeline regions')
    .option('--active', 'Only active regions')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseFormat, 'table')
    .action(async (options: ListOptions) => {
      process.exitCode = await executeList(options);
    });
}

async function executeList(options: ListOptions): Promise<ExitCode> {
  return withRuntime(async ({ tracking }, { config }) => {
    const regions = options.active ? await tracking.listActiveRegions() : await tracking.listRegions();
    const rows = await Promise.all(
      regions.map(async (region) => ({
        ...region,
        initializedZooms: await tracking.listInitializedZooms(region.code),
      }))
    );

    printOutput(formatOutput(rows, config.json ? 'json' : options.format, REGION_COLUMNS));
    return EXIT_CODES.SUCCESS;
  });
}
