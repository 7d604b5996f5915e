import type { z } from 'zod';
import type { FieldError } from '../errors/domain';
import { RequestValidationError } from '../errors/domain';
import type { MetadataIndex } from '../metadata/types';

export type ValidationResult<T> =
  | { ok: true; data: T; errors: [] }
  | { ok: false; data: null; errors: FieldError[] };

export type ExistenceFields = {
  network?: string | null;
  nodes?: string[] | null;
  sensors?: string[] | null;
  features?: string[] | null;
};

/**
 * Flattens a query string object; repeated keys keep their first value.
 */
export function normalizeQuery(input: unknown): Record<string, string> {
  const normalized: Record<string, string> = {};
  if (input === null || typeof input !== 'object') {
    return normalized;
  }
  for (const [key, value] of Object.entries(input)) {
    if (typeof value === 'string') {
      normalized[key] = value;
    } else if (Array.isArray(value)) {
      const first: unknown = value[0];
      if (typeof first === 'string') {
        normalized[key] = first;
      }
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      normalized[key] = String(value);
    }
  }
  return normalized;
}

function issuesToFieldErrors(error: z.ZodError): FieldError[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : 'request',
    message: issue.message
  }));
}

export function checkExistence(fields: ExistenceFields, index: MetadataIndex): FieldError[] {
  const errors: FieldError[] = [];
  const networks = new Set(index.networks);
  const nodes = new Set(index.nodes);
  const sensors = new Set(index.sensors);
  const features = new Set(index.features);

  if (fields.network && !networks.has(fields.network.toLowerCase())) {
    errors.push({ field: 'network', message: `Invalid network name: ${fields.network}` });
  }
  for (const node of fields.nodes ?? []) {
    if (!nodes.has(node.toLowerCase())) {
      errors.push({ field: 'nodes', message: `Invalid node ID: ${node}` });
    }
  }
  for (const sensor of fields.sensors ?? []) {
    if (!sensors.has(sensor.toLowerCase())) {
      errors.push({ field: 'sensors', message: `Invalid sensor name: ${sensor}` });
    }
  }
  for (const entry of fields.features ?? []) {
    const feature = entry.split('.')[0].toLowerCase();
    if (!features.has(feature)) {
      errors.push({ field: 'features', message: `Invalid feature of interest name: ${feature}` });
    }
  }
  return errors;
}

/**
 * Parses `input` with `schema`, then checks every named entity exists.
 * Shape errors short-circuit the existence checks.
 */
export async function validateRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: Record<string, string>,
  options: {
    loadIndex: () => Promise<MetadataIndex>;
    existence: (data: z.output<S>) => ExistenceFields;
  }
): Promise<ValidationResult<z.output<S>>> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, data: null, errors: issuesToFieldErrors(parsed.error) };
  }
  const data: z.output<S> = parsed.data;
  const errors = checkExistence(options.existence(data), await options.loadIndex());
  if (errors.length > 0) {
    return { ok: false, data: null, errors };
  }
  return { ok: true, data, errors: [] };
}

export async function validateOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  input: Record<string, string>,
  options: {
    loadIndex: () => Promise<MetadataIndex>;
    existence: (data: z.output<S>) => ExistenceFields;
  }
): Promise<z.output<S>> {
  const result = await validateRequest(schema, input, options);
  if (!result.ok) {
    throw new RequestValidationError(result.errors);
  }
  return result.data;
}
