/**
 * Regions Commands Index
 *
 * Registers region management subcommands:
 * - list: List pipeline regions
 * - add: Add or update a region
 * - activate / deactivate: Toggle a region
 */

import type { Command } from 'commander';
import { registerActivationCommands } from './activate.js';
import { registerAddCommand } from './add.js';
import { registerListCommand } from './list.js';

export function registerRegionsCommands(program: Command): void {
  const regions = program.command('regions').description('Manage the regions the pipeline runs for');

  registerListCommand(regions);
  registerAddCommand(regions);
  registerActivationCommands(regions);
}
