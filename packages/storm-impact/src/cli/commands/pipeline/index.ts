/**
 * Pipeline Commands Index
 *
 * Registers the top-level pipeline commands:
 * - initialize: Materialize base zones
 * - run: Process one forecast issuance
 * - update: Process new forecasts from the warehouse
 */

import type { Command } from 'commander';
import { registerInitializeCommand } from './initialize.js';
import { registerRunCommand } from './run.js';
import { registerUpdateCommand } from './update.js';

export function registerPipelineCommands(program: Command): void {
  registerInitializeCommand(program);
  registerRunCommand(program);
  registerUpdateCommand(program);
}
