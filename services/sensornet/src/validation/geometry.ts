import { z } from 'zod';

const positionSchema = z.array(z.number().finite()).min(2).max(3);
const linearRingSchema = z.array(positionSchema).min(4);

const pointSchema = z.object({ type: z.literal('Point'), coordinates: positionSchema });
const multiPointSchema = z.object({ type: z.literal('MultiPoint'), coordinates: z.array(positionSchema).min(1) });
const lineStringSchema = z.object({ type: z.literal('LineString'), coordinates: z.array(positionSchema).min(2) });
const multiLineStringSchema = z.object({
  type: z.literal('MultiLineString'),
  coordinates: z.array(z.array(positionSchema).min(2)).min(1)
});
const polygonSchema = z.object({ type: z.literal('Polygon'), coordinates: z.array(linearRingSchema).min(1) });
const multiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(linearRingSchema).min(1)).min(1)
});

export const spatialFilterSchema = z.discriminatedUnion('type', [
  pointSchema,
  multiPointSchema,
  lineStringSchema,
  multiLineStringSchema,
  polygonSchema,
  multiPolygonSchema
]);

export type SpatialFilter = z.infer<typeof spatialFilterSchema>;

const fragmentSchema = z
  .object({
    type: z.string(),
    geometry: z.unknown().optional(),
    geometries: z.array(z.unknown()).optional(),
    features: z.array(z.object({ geometry: z.unknown() }).passthrough()).optional()
  })
  .passthrough();

function firstFragment(input: unknown): unknown {
  const parsed = fragmentSchema.safeParse(input);
  if (!parsed.success) {
    return input;
  }
  const fragment = parsed.data;
  switch (fragment.type) {
    case 'FeatureCollection': {
      const [first] = fragment.features ?? [];
      if (!first) {
        throw new Error('FeatureCollection contains no features');
      }
      return firstFragment(first.geometry);
    }
    case 'Feature':
      return firstFragment(fragment.geometry);
    case 'GeometryCollection': {
      const [first] = fragment.geometries ?? [];
      if (!first) {
        throw new Error('GeometryCollection contains no geometries');
      }
      return firstFragment(first);
    }
    default:
      return input;
  }
}

/**
 * Accepts a GeoJSON geometry, Feature, FeatureCollection or GeometryCollection
 * (as text or parsed) and returns only its first geometry.
 */
export function extractFirstGeometryFragment(input: unknown): SpatialFilter {
  const value: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  const parsed = spatialFilterSchema.safeParse(firstFragment(value));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(issue ? `${issue.path.join('.') || 'geometry'}: ${issue.message}` : 'invalid geometry');
  }
  return parsed.data;
}

export function toGeoJsonText(geometry: SpatialFilter): string {
  return JSON.stringify(geometry);
}
