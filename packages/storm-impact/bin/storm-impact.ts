#!/usr/bin/env tsx
/**
 * Storm Impact CLI Entry Point
 *
 * Ensemble wind-threshold impact estimation: base zone initialization,
 * forecast processing, hazard data import, region management and report
 * inspection.
 *
 * @module storm-impact-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { describeError, isConfigurationError } from '../src/core/errors.js';
import { EXIT_CODES, initializeContext, peekGlobalContext, type GlobalOptions } from '../src/cli/context.js';
import { registerIngestCommands } from '../src/cli/commands/ingest/index.js';
import { registerPipelineCommands } from '../src/cli/commands/pipeline/index.js';
import { registerRegionsCommands } from '../src/cli/commands/regions/index.js';
import { registerReportCommands } from '../src/cli/commands/report/index.js';

// STORM_IMPACT_* settings may come from a .env file in the working directory
loadDotenv();

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Get package version from package.json
 */
function getVersion(): string {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('storm-impact')
    .description('Storm Impact CLI - ensemble wind-threshold impact estimates and forecast-to-forecast changes')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .storm-impactrc)')
    .option('--results-dir <dir>', 'Results root for zones, views and reports')
    .option('--data-dir <dir>', 'Directory of per-region GeoJSON inputs')
    .option('--database <file>', 'SQLite hazard warehouse')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts<GlobalOptions>());
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        if (isConfigurationError(error)) {
          console.error(error.toLogString());
        }
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerPipelineCommands(program);
  registerIngestCommands(program);
  registerRegionsCommands(program);
  registerReportCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    const context = peekGlobalContext();
    if (context) {
      context.logger.error('Command failed', {
        error: describeError(error),
        duration_ms: Date.now() - context.startTime,
      });
    } else {
      console.error(`Error: ${describeError(error)}`);
    }
    process.exit(isConfigurationError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
