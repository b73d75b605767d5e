/**
 * GeoJSON Schemas
 *
 * Only the shapes this package reads: polygonal geometries, points, and
 * feature collections whose properties are validated separately.
 */

import { z } from 'zod';

const PositionSchema = z.array(z.number().finite()).min(2);

const LinearRingSchema = z.array(PositionSchema).min(4);

export const PolygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(LinearRingSchema),
});

export const MultiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(LinearRingSchema)),
});

export const PolygonalGeometrySchema = z.discriminatedUnion('type', [PolygonSchema, MultiPolygonSchema]);

export const PointSchema = z.object({
  type: z.literal('Point'),
  coordinates: PositionSchema,
});

export const FeatureSchema = z.object({
  type: z.literal('Feature'),
  id: z.union([z.string(), z.number()]).optional(),
  properties: z.record(z.unknown()).nullable(),
  geometry: z.unknown(),
});

export const FeatureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(FeatureSchema),
});

export type PolygonalGeometry = z.infer<typeof PolygonalGeometrySchema>;
export type RawFeature = z.infer<typeof FeatureSchema>;
export type RawFeatureCollection = z.infer<typeof FeatureCollectionSchema>;

/**
 * Parse GeoJSON text as a polygonal geometry; null when it is anything else
 */
export function parsePolygonalText(text: string): PolygonalGeometry | null {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch {
    return null;
  }
  const result = PolygonalGeometrySchema.safeParse(value);
  return result.success ? result.data : null;
}
