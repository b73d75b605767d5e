/**
 * Report Show Command
 *
 * Print one section of a stored impact report.
 *
 * Usage:
 *   storm-impact report show <region> <storm> <issuedAt> [options]
 *
 * Options:
 *   --section <name>   summary|thresholds|facilities|vulnerability|population|
 *                      school-age|infants|schools|health (default: summary)
 *   --format <fmt>     table|json|ndjson|csv (default: table)
 *   --raw              Print the whole report as stored
 *
 * Examples:
 *   storm-impact report show ATL STORM-A 2025-11-10T06:00:00Z --section population
 */

import { InvalidArgumentError, type Command } from 'commander';
import { parseIssuance } from '../../../core/utils/dates.js';
import { ReportStore } from '../../../persistence/report-store.js';
import { EXIT_CODES, parseFormat, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, formatOutput, printError, printOutput, type OutputFormat } from '../../lib/output.js';
import { REPORT_SECTIONS, isReportSection, sectionTable, type ReportSection } from './sections.js';

interface ShowOptions {
  readonly section: ReportSection;
  readonly format: OutputFormat;
  readonly raw?: boolean;
}

function parseSection(value: string): ReportSection {
  if (!isReportSection(value)) {
    throw new InvalidArgumentError(`Expected one of ${REPORT_SECTIONS.join(', ')}, got "${value}".`);
  }
  return value;
}

export function registerShowCommand(parent: Command): void {
  parent
    .command('show <region> <storm> <issuedAt>')
    .description('Print a section of a stored report')
    .option('--section <name>', `Section: ${REPORT_SECTIONS.join('|')}`, parseSection, 'summary')
    .option('--format <fmt>', 'Output format: table|json|ndjson|csv', parseFormat, 'table')
    .option('--raw', 'Print the whole report as stored')
    .action(async (region: string, storm: string, issuedAt: string, options: ShowOptions) => {
      process.exitCode = await executeShow(region, storm, issuedAt, options);
    });
}

async function executeShow(region: string, storm: string, issuedAt: string, options: ShowOptions): Promise<ExitCode> {
  const key = { stormId: storm, issuedAt: parseIssuance(issuedAt).toISOString() };

  return withRuntime(async ({ storage }, { config, logger }) => {
    const report = await new ReportStore(storage, logger).load(region, key);
    if (!report) {
      printError(`No report for ${region} ${storm} issued ${key.issuedAt}`);
      return EXIT_CODES.ERRORS;
    }

    if (options.raw) {
      printOutput(formatJson(report));
      return EXIT_CODES.SUCCESS;
    }

    const { rows, columns } = sectionTable(report, options.section);
    printOutput(formatOutput(rows, config.json ? 'json' : options.format, columns));
    return EXIT_CODES.SUCCESS;
  });
}
