/**
 * Collaborator Fetch Fallback
 *
 * External fetches (facility locations, attribute layers) resolve to a
 * three-way outcome instead of throwing:
 *
 * - fetched: the live source answered with usable data
 * - cached: the live source failed or was empty, a saved copy was used
 * - unavailable: neither produced data; the caller substitutes a placeholder
 *
 * Each source is tried exactly once. There is no retry loop.
 */

import { describeError } from './errors.js';
import type { PipelineLogger } from './utils/logger.js';

export type FetchOutcome<T> =
  | { readonly status: 'fetched'; readonly data: T }
  | { readonly status: 'cached'; readonly data: T; readonly reason: string }
  | { readonly status: 'unavailable'; readonly reason: string };

/**
 * A live fetch with an optional saved copy
 */
export interface FallbackSource<T> {
  /** Name used in log messages */
  readonly name: string;
  live(): Promise<T>;
  /** Saved copy, or null when none exists */
  cached?(): Promise<T | null>;
  /** Persist a fresh live result for later fallback */
  saveCache?(data: T): Promise<void>;
  /** Live results for which this returns true count as failures */
  isEmpty?(data: T): boolean;
}

/**
 * Run live fetch, then cached copy, then give up
 *
 * @example
 * ```typescript
 * const outcome = await fetchWithFallback({
 *   name: 'health facilities',
 *   live: () => provider.healthFacilities(region),
 *   cached: () => cache.load(region),
 *   saveCache: (data) => cache.save(region, data),
 *   isEmpty: (data) => data.length === 0,
 * }, logger);
 * const facilities = outcomeData(outcome, []);
 * ```
 */
export async function fetchWithFallback<T>(
  source: FallbackSource<T>,
  logger: PipelineLogger
): Promise<FetchOutcome<T>> {
  let reason: string;

  try {
    const data = await source.live();
    if (source.isEmpty?.(data)) {
      reason = `${source.name}: live source returned no data`;
    } else {
      if (source.saveCache) {
        try {
          await source.saveCache(data);
        } catch (error) {
          logger.warn(`Could not save ${source.name} for fallback`, { error: describeError(error) });
        }
      }
      return { status: 'fetched', data };
    }
  } catch (error) {
    reason = `${source.name}: ${describeError(error)}`;
  }

  if (!source.cached) {
    logger.warn(`${reason}; no cached copy configured`);
    return { status: 'unavailable', reason };
  }

  logger.warn(`${reason}; trying saved copy`);
  try {
    const data = await source.cached();
    if (data !== null) {
      return { status: 'cached', data, reason };
    }
    logger.warn(`${source.name}: no saved copy available`);
  } catch (error) {
    logger.warn(`${source.name}: saved copy unreadable`, { error: describeError(error) });
  }

  return { status: 'unavailable', reason };
}

/**
 * Data of an outcome, or the placeholder when unavailable
 */
export function outcomeData<T>(outcome: FetchOutcome<T>, placeholder: T): T {
  return outcome.status === 'unavailable' ? placeholder : outcome.data;
}
