/**
 * Pipeline State Tracker
 *
 * Per (region, zoom): UNINITIALIZED → INITIALIZED once baseline zones are
 * materialized. The flag file in storage is authoritative; the tracking
 * table is best-effort telemetry, so a failure to record there is logged and
 * the state stays INITIALIZED. Force-recompute re-enters INITIALIZED from
 * INITIALIZED.
 *
 * Per (region, storm, issuance, zoom): a views flag marks that impact views
 * exist, which makes re-runs no-ops unless forced.
 */

import { describeError } from '../core/errors.js';
import type { ForecastKey } from '../core/types/index.js';
import { silentLogger, type PipelineLogger } from '../core/utils/logger.js';
import { StorageLayout } from '../persistence/layout.js';
import type { StorageBackend } from '../persistence/storage.js';

export type InitializationState = 'UNINITIALIZED' | 'INITIALIZED';

/**
 * External record of initialized levels
 */
export interface InitializationTracking {
  recordInitialization(region: string, zoom: number): Promise<void>;
}

export interface PipelineStateTrackerOptions {
  readonly tracking?: InitializationTracking;
  readonly logger?: PipelineLogger;
  readonly now?: () => Date;
}

export class PipelineStateTracker {
  private readonly tracking: InitializationTracking | undefined;
  private readonly logger: PipelineLogger;
  private readonly now: () => Date;

  constructor(
    private readonly storage: StorageBackend,
    options: PipelineStateTrackerOptions = {}
  ) {
    this.tracking = options.tracking;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  async state(region: string, zoom: number): Promise<InitializationState> {
    return (await this.storage.exists(StorageLayout.initializedFlag(region, zoom))) ? 'INITIALIZED' : 'UNINITIALIZED';
  }

  /**
   * Whether baseline zones must be (re)materialized
   */
  async needsInitialization(region: string, zoom: number, force: boolean): Promise<boolean> {
    return force || (await this.state(region, zoom)) === 'UNINITIALIZED';
  }

  /**
   * Transition to INITIALIZED
   *
   * @throws when the flag file cannot be written
   */
  async markInitialized(region: string, zoom: number, tiles: number): Promise<void> {
    const flag = { region, zoom, tiles, initializedAt: this.now().toISOString() };
    await this.storage.writeText(StorageLayout.initializedFlag(region, zoom), JSON.stringify(flag) + '\n');

    if (!this.tracking) return;
    try {
      await this.tracking.recordInitialization(region, zoom);
    } catch (error) {
      this.logger.warn(`Could not record initialization of ${region} at zoom ${zoom}`, {
        error: describeError(error),
      });
    }
  }

  async hasViews(region: string, key: ForecastKey, zoom: number): Promise<boolean> {
    return this.storage.exists(StorageLayout.viewsFlag(region, key, zoom));
  }

  async markViews(region: string, key: ForecastKey, zoom: number, views: number): Promise<void> {
    const flag = { region, ...key, zoom, views, completedAt: this.now().toISOString() };
    await this.storage.writeText(StorageLayout.viewsFlag(region, key, zoom), JSON.stringify(flag) + '\n');
  }
}
