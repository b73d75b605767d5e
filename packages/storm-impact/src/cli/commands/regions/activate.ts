/**
 * Regions Activate / Deactivate Commands
 *
 * Usage:
 *   storm-impact regions activate <code>
 *   storm-impact regions deactivate <code>
 */

import type { Command } from 'commander';
import { EXIT_CODES, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, printError, printOutput, printSuccess } from '../../lib/output.js';

export function registerActivationCommands(parent: Command): void {
  parent
    .command('activate <code>')
    .description('Include a region in pipeline runs')
    .action(async (code: string) => {
      process.exitCode = await executeSetActive(code, true);
    });

  parent
    .command('deactivate <code>')
    .description('Exclude a region from pipeline runs')
    .action(async (code: string) => {
      process.exitCode = await executeSetActive(code, false);
    });
}

async function executeSetActive(code: string, active: boolean): Promise<ExitCode> {
  return withRuntime(async ({ tracking }, { config }) => {
    const found = await tracking.setActive(code, active);

    if (config.json) {
      printOutput(formatJson({ success: found, region: code, active }));
    } else if (found) {
      printSuccess(`Region ${code} ${active ? 'activated' : 'deactivated'}`);
    } else {
      printError(`Unknown region: ${code}`);
    }
    return found ? EXIT_CODES.SUCCESS : EXIT_CODES.ERRORS;
  });
}
