/**
 * Run Summary Rendering
 *
 * Human tables and exit codes for pipeline summaries. A run exits 0 only
 * when every region it touched succeeded.
 *
 * @module cli/commands/pipeline/summary
 */

import {
  runSucceeded,
  type ForecastRunSummary,
  type InitializeSummary,
  type RegionOutcome,
  type UpdateSummary,
} from '../../../services/impact-pipeline.js';
import { EXIT_CODES, type ExitCode } from '../../context.js';
import { formatDuration } from '../../lib/logger.js';
import { formatTable, type TableColumn } from '../../lib/output.js';

const OUTCOME_COLUMNS: TableColumn[] = [
  { key: 'region', header: 'Region' },
  { key: 'status', header: 'Status' },
  { key: 'viewsWritten', header: 'Views', align: 'right' },
  { key: 'detail', header: 'Detail' },
];

function outcomeRow(outcome: RegionOutcome): Record<string, unknown> {
  return {
    region: outcome.region,
    status: outcome.status,
    viewsWritten: outcome.viewsWritten,
    detail: outcome.error ?? outcome.reportPath ?? '',
  };
}

export function runExitCode(summary: ForecastRunSummary): ExitCode {
  return runSucceeded(summary) ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}

/**
 * Forecasts without an affected region are not failures of an update
 */
export function updateExitCode(summary: UpdateSummary): ExitCode {
  const failed = summary.runs.some((run) => !runSucceeded(run) && run.status !== 'no-intersection');
  return failed ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
}

export function initializeExitCode(summary: InitializeSummary): ExitCode {
  return summary.errors.length === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
}

export function renderRunSummary(summary: ForecastRunSummary): string {
  const lines = [
    `${summary.key.stormId} issued ${summary.key.issuedAt}: ${summary.status}`,
    `  Regions processed: ${summary.regionsProcessed}`,
    `  Views written: ${summary.viewsWritten}`,
    `  Duration: ${formatDuration(summary.durationMs)}`,
  ];
  if (summary.outcomes.length > 0) {
    lines.push('', formatTable(summary.outcomes.map(outcomeRow), OUTCOME_COLUMNS));
  }
  const unattributed = summary.errors.filter(
    (error) => !summary.outcomes.some((outcome) => outcome.error === error)
  );
  for (const error of unattributed) {
    lines.push(`  ${error}`);
  }
  return lines.join('\n');
}

export function renderUpdateSummary(summary: UpdateSummary): string {
  const lines = [
    `Selected ${summary.selected} forecast(s), skipped ${summary.skipped} already processed`,
    `Duration: ${formatDuration(summary.durationMs)}`,
  ];
  for (const run of summary.runs) {
    lines.push('', renderRunSummary(run));
  }
  return lines.join('\n');
}

export function renderInitializeSummary(summary: InitializeSummary): string {
  const rows = summary.results.map((result) =>
    result.status === 'materialized'
      ? {
          region: result.region,
          status: result.status,
          tiles: result.tiles,
          unassigned: result.unassigned,
          admins: result.admins,
          missing: result.missingLayers.join(', '),
        }
      : { region: result.region, status: result.status }
  );
  const lines = [
    formatTable(rows, [
      { key: 'region', header: 'Region' },
      { key: 'status', header: 'Status' },
      { key: 'tiles', header: 'Tiles', align: 'right' },
      { key: 'unassigned', header: 'Unassigned', align: 'right' },
      { key: 'admins', header: 'Admins', align: 'right' },
      { key: 'missing', header: 'Missing layers' },
    ]),
    ...summary.errors,
    `Duration: ${formatDuration(summary.durationMs)}`,
  ];
  return lines.join('\n');
}
