/**
 * Import result reporting shared by the ingest commands
 */

import { EXIT_CODES, type ExitCode, type GlobalContext } from '../../context.js';
import { formatJson, printOutput, printSuccess, printWarning } from '../../lib/output.js';
import type { RejectedRecord } from '../../lib/records.js';

export interface ImportOptions {
  readonly strict?: boolean;
}

export interface ImportResult {
  readonly kind: string;
  readonly file: string;
  readonly imported: number;
  readonly rejected: readonly RejectedRecord[];
}

/** Rejections listed individually in human output */
const MAX_LISTED = 10;

/**
 * Print the result; any rejected record makes the exit status a data error
 */
export function reportImport({ config, logger }: GlobalContext, result: ImportResult): ExitCode {
  const exitCode = result.rejected.length === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.DATA_INTEGRITY_ERROR;
  logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, { imported: result.imported, rejected: result.rejected.length });

  if (config.json) {
    printOutput(formatJson({ success: exitCode === EXIT_CODES.SUCCESS, ...result }));
    return exitCode;
  }

  printSuccess(`Imported ${result.imported} ${result.kind} from ${result.file}`);
  for (const entry of result.rejected.slice(0, MAX_LISTED)) {
    printWarning(`record ${entry.position}: ${entry.message}`);
  }
  if (result.rejected.length > MAX_LISTED) {
    printWarning(`... ${result.rejected.length - MAX_LISTED} more invalid records`);
  }
  return exitCode;
}
