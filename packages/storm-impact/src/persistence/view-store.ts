/**
 * View Store
 *
 * Derived tables are written as NDJSON:
 * - Line 1: header with schema version, view kind, row count, write time and key
 * - Lines 2+: one row object per line
 *
 * @module persistence/view-store
 */

import { z } from 'zod';
import { isWindThreshold, type WindThreshold } from '../core/constants.js';
import type { ForecastKey } from '../core/types/index.js';
import { StorageLayout, VIEW_KINDS, type ViewKind } from './layout.js';
import type { StorageBackend } from './storage.js';

export const ViewHeaderSchema = z.object({
  _schema: z.literal('v1'),
  _type: z.enum(VIEW_KINDS),
  _count: z.number().int().nonnegative(),
  _written: z.string(),
  region: z.string(),
  stormId: z.string(),
  issuedAt: z.string(),
  zoom: z.number().int(),
  threshold: z.number().refine(isWindThreshold).nullable(),
});

export type ViewHeader = z.infer<typeof ViewHeaderSchema>;

export interface ViewAddress {
  readonly region: string;
  readonly key: ForecastKey;
  readonly zoom: number;
  readonly kind: ViewKind;
  readonly threshold?: WindThreshold;
}

export interface ParsedView {
  readonly header: ViewHeader;
  readonly rows: readonly unknown[];
}

/**
 * Serialize a header and rows to NDJSON text
 */
export function toNdjson(header: ViewHeader, rows: readonly object[]): string {
  const lines = [JSON.stringify(header), ...rows.map((row) => JSON.stringify(row))];
  return lines.join('\n') + '\n';
}

/**
 * Parse NDJSON view text
 *
 * @throws Error if the header is invalid, a line fails to parse, or the row
 *   count disagrees with the header
 */
export function parseNdjson(content: string, source: string): ParsedView {
  const lines = content.split('\n').filter((line) => line.trim().length > 0);
  const [first, ...rest] = lines;
  if (first === undefined) {
    throw new Error(`NDJSON file is empty: ${source}`);
  }

  const header = ViewHeaderSchema.parse(JSON.parse(first));
  const rows = rest.map((line, index) => {
    try {
      const row: unknown = JSON.parse(line);
      return row;
    } catch (error) {
      throw new Error(`Failed to parse line ${index + 2} in ${source}: ${String(error)}`);
    }
  });

  if (rows.length !== header._count) {
    throw new Error(`Row count mismatch in ${source}: header says ${header._count}, found ${rows.length}`);
  }
  return { header, rows };
}

export class ViewStore {
  constructor(
    private readonly storage: StorageBackend,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Write one view
   *
   * @returns Storage key written
   */
  async write(address: ViewAddress, rows: readonly object[]): Promise<string> {
    const path = StorageLayout.view(address.region, address.key, address.zoom, address.kind, address.threshold);
    const header: ViewHeader = {
      _schema: 'v1',
      _type: address.kind,
      _count: rows.length,
      _written: this.now().toISOString(),
      region: address.region,
      stormId: address.key.stormId,
      issuedAt: address.key.issuedAt,
      zoom: address.zoom,
      threshold: address.threshold ?? null,
    };
    await this.storage.writeText(path, toNdjson(header, rows));
    return path;
  }

  /**
   * @returns null when the view has not been written
   */
  async read(address: ViewAddress): Promise<ParsedView | null> {
    const path = StorageLayout.view(address.region, address.key, address.zoom, address.kind, address.threshold);
    const content = await this.storage.readText(path);
    return content === null ? null : parseNdjson(content, path);
  }
}
