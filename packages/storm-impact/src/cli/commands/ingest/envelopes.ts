/**
 * Ingest Envelopes Command
 *
 * Load ensemble wind envelopes into the hazard warehouse.
 *
 * Usage:
 *   storm-impact ingest envelopes <file> [--strict]
 *
 * The file is a JSON array, a GeoJSON FeatureCollection or NDJSON of records
 * with stormId, issuedAt, ensembleMember, windThreshold, leadTimeRange and
 * geometry (Polygon or MultiPolygon).
 *
 * Options:
 *   --strict   Import nothing when any record is invalid
 */

import type { Command } from 'commander';
import { EnvelopeRecordSchema } from '../../../persistence/warehouse-repository.js';
import { withRuntime, type ExitCode } from '../../context.js';
import { readRecordFile } from '../../lib/records.js';
import { reportImport, type ImportOptions } from './report.js';

export function registerEnvelopesCommand(parent: Command): void {
  parent
    .command('envelopes <file>')
    .description('Import ensemble wind envelopes into the warehouse')
    .option('--strict', 'Import nothing when any record is invalid')
    .action(async (file: string, options: ImportOptions) => {
      process.exitCode = await executeEnvelopes(file, options);
    });
}

async function executeEnvelopes(file: string, options: ImportOptions): Promise<ExitCode> {
  const parsed = await readRecordFile(file, EnvelopeRecordSchema);

  return withRuntime(async ({ warehouse }, context) => {
    context.logger.commandStart('ingest envelopes', { file, records: parsed.records.length });
    const skip = options.strict === true && parsed.rejected.length > 0;
    const imported = skip ? 0 : await warehouse.importEnvelopes(parsed.records);
    return reportImport(context, { kind: 'envelopes', file, imported, rejected: parsed.rejected });
  });
}
