/**
 * Ingest Commands Index
 *
 * Registers hazard warehouse import subcommands:
 * - envelopes: Ensemble wind envelopes
 * - track: Ensemble track points
 */

import type { Command } from 'commander';
import { registerEnvelopesCommand } from './envelopes.js';
import { registerTrackCommand } from './track.js';

export function registerIngestCommands(program: Command): void {
  const ingest = program.command('ingest').description('Import hazard data into the warehouse');

  registerEnvelopesCommand(ingest);
  registerTrackCommand(ingest);
}
