/**
 * Record File Parsing for Bulk Import
 *
 * Accepts three layouts:
 * - a JSON array of records
 * - a GeoJSON FeatureCollection, each feature's properties plus its geometry
 *   forming one record
 * - NDJSON, one record per line (blank lines ignored)
 *
 * Every record is validated independently; invalid records are reported by
 * position and the rest are kept.
 *
 * @module cli/lib/records
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';

export interface RejectedRecord {
  /** 1-based position: array index, feature index or line number */
  readonly position: number;
  readonly message: string;
}

export interface ParsedRecords<T> {
  readonly records: T[];
  readonly rejected: RejectedRecord[];
}

const FeatureCollectionEnvelope = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(
    z.object({
      properties: z.record(z.unknown()).nullable().optional(),
      geometry: z.unknown(),
    })
  ),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/**
 * Raw candidates with their positions, or null when the content is not a
 * single JSON document
 */
function documentCandidates(content: string): Array<readonly [number, unknown]> | null {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch {
    // Not one JSON document; the caller falls back to NDJSON
    return null;
  }

  if (Array.isArray(document)) {
    return document.map((item, index) => [index + 1, item] as const);
  }

  const collection = FeatureCollectionEnvelope.safeParse(document);
  if (collection.success) {
    return collection.data.features.map(
      (feature, index) => [index + 1, { ...(feature.properties ?? {}), geometry: feature.geometry }] as const
    );
  }

  return [[1, document]];
}

/**
 * Parse and validate the records in a file's content
 */
export function parseRecords<T>(content: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParsedRecords<T> {
  const records: T[] = [];
  const rejected: RejectedRecord[] = [];

  const accept = (position: number, raw: unknown): void => {
    const parsed = schema.safeParse(raw);
    if (parsed.success) {
      records.push(parsed.data);
    } else {
      rejected.push({ position, message: describeIssues(parsed.error) });
    }
  };

  const candidates = documentCandidates(content);
  if (candidates) {
    for (const [position, raw] of candidates) {
      accept(position, raw);
    }
    return { records, rejected };
  }

  const lines = content.split('\n');
  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed.length === 0) return;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (error) {
      rejected.push({ position: index + 1, message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` });
      return;
    }
    accept(index + 1, raw);
  });

  return { records, rejected };
}

/**
 * Read and parse a record file
 */
export async function readRecordFile<T>(
  filepath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<ParsedRecords<T>> {
  return parseRecords(await readFile(filepath, 'utf-8'), schema);
}
