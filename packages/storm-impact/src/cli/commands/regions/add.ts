/**
 * Regions Add Command
 *
 * Add a region to the pipeline, or update the name and default zoom of an
 * existing one.
 *
 * Usage:
 *   storm-impact regions add <code> --name <name> [--zoom <n>] [--inactive]
 */

import type { Command } from 'commander';
import { EXIT_CODES, parsePositiveInt, withRuntime, type ExitCode } from '../../context.js';
import { formatJson, printOutput, printSuccess } from '../../lib/output.js';

interface AddOptions {
  readonly name?: string;
  readonly zoom?: number;
  readonly inactive?: boolean;
}

export function registerAddCommand(parent: Command): void {
  parent
    .command('add <code>')
    .description('Add or update a pipeline region')
    .option('--name <name>', 'Display name (default: the code)')
    .option('--zoom <n>', 'Default tile zoom level', parsePositiveInt)
    .option('--inactive', 'Add without activating')
    .action(async (code: string, options: AddOptions) => {
      process.exitCode = await executeAdd(code, options);
    });
}

async function executeAdd(code: string, options: AddOptions): Promise<ExitCode> {
  return withRuntime(async ({ tracking }, { config }) => {
    const region = await tracking.addRegion({
      code: code,
      name: options.name ?? code,
      defaultZoom: options.zoom ?? config.pipeline.zoom,
      active: !options.inactive,
    });

    if (config.json) {
      printOutput(formatJson(region));
    } else {
      printSuccess(`Region ${region.code} (${region.name}) saved, zoom ${region.defaultZoom}`);
    }
    return EXIT_CODES.SUCCESS;
  });
}
