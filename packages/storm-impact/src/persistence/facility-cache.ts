/**
 * Facility Cache
 *
 * Last successful facility fetch per (region, kind), used when the live
 * facility source fails.
 */

import { z } from 'zod';
import type { Facility, FacilityKind } from '../core/types/index.js';
import { StorageLayout, type CachedFacilityKind } from './layout.js';
import type { StorageBackend } from './storage.js';

const FacilitySchema = z.object({
  id: z.string(),
  kind: z.enum(['school', 'healthCenter']),
  name: z.string(),
  detail: z.string(),
  lon: z.number(),
  lat: z.number(),
});

const FacilityCacheFileSchema = z.object({
  savedAt: z.string(),
  facilities: z.array(FacilitySchema),
});

const CACHE_KIND: Readonly<Record<FacilityKind, CachedFacilityKind>> = {
  school: 'schools',
  healthCenter: 'health',
};

export class FacilityCache {
  constructor(
    private readonly storage: StorageBackend,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * @returns null when nothing was cached
   * @throws when the cached file is not a valid facility list
   */
  async load(region: string, kind: FacilityKind): Promise<Facility[] | null> {
    const content = await this.storage.readText(StorageLayout.facilityCache(region, CACHE_KIND[kind]));
    if (content === null) {
      return null;
    }
    return FacilityCacheFileSchema.parse(JSON.parse(content)).facilities;
  }

  async save(region: string, kind: FacilityKind, facilities: readonly Facility[]): Promise<void> {
    const file = { savedAt: this.now().toISOString(), facilities };
    await this.storage.writeText(StorageLayout.facilityCache(region, CACHE_KIND[kind]), JSON.stringify(file) + '\n');
  }
}
