import { z } from 'zod';
import {
  AGGREGATE_FUNCTION_NAMES,
  BUCKETS,
  isAggregateFunctionName,
  isBucket,
  type AggregateFunctionName,
  type Bucket
} from '../aggregation/functions';
import { parseUtcDateTime } from '../formatting/time';
import { extractFirstGeometryFragment, type SpatialFilter } from '../validation/geometry';

const DAY_MS = 24 * 60 * 60 * 1000;

const lowerString = z
  .string()
  .trim()
  .min(1)
  .transform((value) => value.toLowerCase());

const listSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((entry) => entry.trim().toLowerCase())
      .filter((entry) => entry.length > 0)
  )
  .refine((values) => values.length > 0, { message: 'Expected at least one value' });

const geomSchema = z.string().transform((value, ctx): SpatialFilter => {
  try {
    return extractFirstGeometryFragment(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Could not parse geojson: ${value}. ${reason}` });
    return z.NEVER;
  }
});

function dateTimeSchema(fallback: () => Date) {
  return z
    .string()
    .optional()
    .transform((value, ctx): Date => {
      if (value === undefined || value.trim().length === 0) {
        return fallback();
      }
      const parsed = parseUtcDateTime(value);
      if (!parsed) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a valid datetime: ${value}` });
        return z.NEVER;
      }
      return parsed;
    });
}

const limitSchema = z.coerce
  .number({ invalid_type_error: 'Limit must be a number' })
  .int('Limit must be an integer')
  .positive('Limit must be positive')
  .optional();

const offsetSchema = z.coerce
  .number({ invalid_type_error: 'Offset must be a number' })
  .int('Offset must be an integer')
  .min(0, 'Offset must be zero or greater')
  .optional();

const functionSchema = z
  .string()
  .optional()
  .transform((value, ctx): AggregateFunctionName => {
    const normalized = (value ?? 'avg').trim().toLowerCase();
    if (!isAggregateFunctionName(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid aggregate function: ${normalized}. Expected one of ${AGGREGATE_FUNCTION_NAMES.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });

const bucketSchema = z
  .string()
  .optional()
  .transform((value, ctx): Bucket => {
    const normalized = (value ?? 'hour').trim().toLowerCase();
    if (!isBucket(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid aggregation unit: ${normalized}. Expected one of ${BUCKETS.join(', ')}`
      });
      return z.NEVER;
    }
    return normalized;
  });

/**
 * Builds the per-endpoint schemas. Datetime defaults are relative to `now`.
 */
export function createRequestSchemas(now: () => Date = () => new Date()) {
  const daysAgo = (days: number) => () => new Date(now().getTime() - days * DAY_MS);

  const metadata = z.object({
    network: lowerString.optional(),
    nodes: listSchema.optional(),
    sensors: listSchema.optional(),
    features: listSchema.optional(),
    geom: geomSchema.optional()
  });

  const observations = z.object({
    network: lowerString,
    feature: lowerString,
    nodes: listSchema.optional(),
    sensors: listSchema.optional(),
    geom: geomSchema.optional(),
    start_datetime: dateTimeSchema(daysAgo(90)),
    end_datetime: dateTimeSchema(now),
    limit: limitSchema,
    offset: offsetSchema
  });

  const aggregate = z
    .object({
      network: lowerString,
      node: lowerString,
      features: listSchema,
      sensors: listSchema.optional(),
      function: functionSchema,
      agg: bucketSchema,
      start_datetime: dateTimeSchema(daysAgo(1)),
      end_datetime: dateTimeSchema(now)
    })
    .superRefine((value, ctx) => {
      if (value.end_datetime.getTime() <= value.start_datetime.getTime()) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['end_datetime'],
          message: 'end_datetime must be later than start_datetime'
        });
      }
    });

  const datadump = z.object({
    network: lowerString,
    nodes: listSchema.optional(),
    sensors: listSchema.optional(),
    features: listSchema.optional(),
    geom: geomSchema.optional(),
    start_datetime: dateTimeSchema(daysAgo(7)),
    end_datetime: dateTimeSchema(now),
    limit: limitSchema,
    offset: offsetSchema
  });

  return { metadata, observations, aggregate, datadump };
}

export type RequestSchemas = ReturnType<typeof createRequestSchemas>;
export type MetadataRequest = z.infer<RequestSchemas['metadata']>;
export type ObservationRequest = z.infer<RequestSchemas['observations']>;
export type AggregateQuery = z.infer<RequestSchemas['aggregate']>;
export type DatadumpRequest = z.infer<RequestSchemas['datadump']>;
