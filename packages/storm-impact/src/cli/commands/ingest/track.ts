/**
 * Ingest Track Command
 *
 * Load ensemble track points into the hazard warehouse; expected landfall
 * is estimated from them.
 *
 * Usage:
 *   storm-impact ingest track <file> [--strict]
 *
 * Records carry stormId, issuedAt, ensembleMember, leadTimeHours, lon, lat
 * and optionally windSpeedKnots.
 */

import type { Command } from 'commander';
import { TrackRecordSchema } from '../../../persistence/warehouse-repository.js';
import { withRuntime, type ExitCode } from '../../context.js';
import { readRecordFile } from '../../lib/records.js';
import { reportImport, type ImportOptions } from './report.js';

export function registerTrackCommand(parent: Command): void {
  parent
    .command('track <file>')
    .description('Import ensemble track points into the warehouse')
    .option('--strict', 'Import nothing when any record is invalid')
    .action(async (file: string, options: ImportOptions) => {
      process.exitCode = await executeTrack(file, options);
    });
}

async function executeTrack(file: string, options: ImportOptions): Promise<ExitCode> {
  const parsed = await readRecordFile(file, TrackRecordSchema);

  return withRuntime(async ({ warehouse }, context) => {
    context.logger.commandStart('ingest track', { file, records: parsed.records.length });
    const skip = options.strict === true && parsed.rejected.length > 0;
    const imported = skip ? 0 : await warehouse.importTrack(parsed.records);
    return reportImport(context, { kind: 'track points', file, imported, rejected: parsed.rejected });
  });
}
