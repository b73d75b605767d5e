/**
 * Report List Command
 *
 * Usage:
 *   storm-impact report list [--region <code>] [--storm <id>] [--format <fmt>]
 */

import type { Command } from 'commander';
import { ReportStore } from '../../../persistence/report-store.js';
import { EXIT_CODES, parseFormat, withRuntime, type ExitCode } from '../../context.js';
import { formatOutput, formatters, printOutput, type OutputFormat, type TableColumn } from '../../lib/output.js';

interface ListOptions {
  readonly region?: string;
  readonly storm?: string;
  readonly format: OutputFormat;
}

const REPORT_COLUMNS: TableColumn[] = [
  { key: 'region', header: 'Region' },
  { key: 'stormId', header: 'Storm' },
  { key: 'issuedAt', header: 'Issued', formatter: formatters.datetime },
  { key: 'stormCategory', header: 'Category' },
  { key: 'expectedChildren', header: 'Children', align: 'right', formatter: formatters.number },
  { key: 'childrenDelta', header: 'Change', align: 'right' },
  { key: 'expectedLandfall', header: 'Landfall' },
];

export function registerReportListCommand(parent: Command): void {
  parent
    .command('list')
    .description('List stored reports')
    .option('--region <code>', 'Only this region')
    .option('--storm <id>', 'Only this storm')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseFormat, 'table')
    .action(async (options: ListOptions) => {
      process.exitCode = await executeList(options);
    });
}

async function executeList(options: ListOptions): Promise<ExitCode> {
  return withRuntime(async ({ storage }, { config, logger }) => {
    const reports = await new ReportStore(storage, logger).list();
    const rows = reports
      .filter((report) => !options.region || report.identity.region === options.region)
      .filter((report) => !options.storm || report.identity.stormId === options.storm)
      .map((report) => ({
        region: report.identity.region,
        stormId: report.identity.stormId,
        issuedAt: report.identity.issuedAt,
        stormCategory: report.identity.stormCategory,
        expectedChildren: report.totals.expectedChildren,
        childrenDelta: report.childrenChange.delta,
        expectedLandfall: report.identity.expectedLandfall,
      }));

    printOutput(formatOutput(rows, config.json ? 'json' : options.format, REPORT_COLUMNS));
    return EXIT_CODES.SUCCESS;
  });
}
