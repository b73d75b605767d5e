/**
 * Processed Forecast Log
 *
 * JSON record of forecast issuances the update loop has completed, so later
 * runs skip them. Saving is best-effort: the views flags stay authoritative.
 */

import { z } from 'zod';
import type { ForecastKey } from '../core/types/index.js';
import { describeError } from '../core/errors.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { StorageLayout } from './layout.js';
import type { StorageBackend } from './storage.js';

const ProcessedForecastSchema = z.object({
  stormId: z.string(),
  issuedAt: z.string(),
  processedAt: z.string(),
});

const ProcessedForecastFileSchema = z.object({
  version: z.literal(1),
  forecasts: z.array(ProcessedForecastSchema),
});

export type ProcessedForecast = z.infer<typeof ProcessedForecastSchema>;

function forecastId(key: ForecastKey): string {
  return `${key.stormId}@${new Date(key.issuedAt).toISOString()}`;
}

export class ProcessedForecastLog {
  private readonly entries = new Map<string, ProcessedForecast>();

  private constructor(
    private readonly storage: StorageBackend,
    private readonly logger: PipelineLogger
  ) {}

  /**
   * Load the log; a missing or unreadable file starts an empty log
   */
  static async load(storage: StorageBackend, logger: PipelineLogger = silentLogger): Promise<ProcessedForecastLog> {
    const log = new ProcessedForecastLog(storage, logger);
    const content = await storage.readText(StorageLayout.processedForecasts());
    if (content === null) {
      return log;
    }

    try {
      const file = ProcessedForecastFileSchema.parse(JSON.parse(content));
      for (const entry of file.forecasts) {
        log.entries.set(forecastId(entry), entry);
      }
    } catch (error) {
      logger.warn('Processed forecast log is unreadable, starting empty', { error: describeError(error) });
    }
    return log;
  }

  has(key: ForecastKey): boolean {
    return this.entries.has(forecastId(key));
  }

  list(): ProcessedForecast[] {
    return [...this.entries.values()];
  }

  mark(key: ForecastKey, processedAt: Date): void {
    this.entries.set(forecastId(key), {
      stormId: key.stormId,
      issuedAt: key.issuedAt,
      processedAt: processedAt.toISOString(),
    });
  }

  /**
   * @returns false when the file could not be written
   */
  async save(): Promise<boolean> {
    const file = { version: 1, forecasts: this.list() };
    try {
      await this.storage.writeText(StorageLayout.processedForecasts(), JSON.stringify(file, null, 2) + '\n');
      return true;
    } catch (error) {
      this.logger.warn('Could not save processed forecast log', { error: describeError(error) });
      return false;
    }
  }
}
