/**
 * Report Commands Index
 *
 * Registers report inspection subcommands:
 * - list: List stored reports
 * - show: Print a section of one report
 */

import type { Command } from 'commander';
import { registerReportListCommand } from './list.js';
import { registerShowCommand } from './show.js';

export function registerReportCommands(program: Command): void {
  const report = program.command('report').description('Inspect stored impact reports');

  registerReportListCommand(report);
  registerShowCommand(report);
}
