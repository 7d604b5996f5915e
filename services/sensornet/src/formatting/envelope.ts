import { formatTimestamp } from './time';

export type ResponseEnvelope<T> = {
  meta: {
    status: 'ok';
    query: Record<string, unknown>;
    message: string[];
    total: number;
  };
  data: T;
};

/**
 * Drops null and undefined entries so the echoed query only shows what was
 * actually applied.
 */
export function echoQuery(query: Record<string, unknown>, omit: string[] = []): Record<string, unknown> {
  const echoed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === null || value === undefined || omit.includes(key)) {
      continue;
    }
    echoed[key] = value;
  }
  return echoed;
}

export function buildEnvelope<T>(query: Record<string, unknown>, data: T): ResponseEnvelope<T> {
  return {
    meta: {
      status: 'ok',
      query,
      message: [],
      total: Array.isArray(data) ? data.length : 1
    },
    data
  };
}

function normalize(value: unknown): unknown {
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (value !== null && typeof value === 'object') {
    const normalized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      normalized[key] = normalize(entry);
    }
    return normalized;
  }
  return value;
}

/** Dates are written as offset-free ISO strings. */
export function serializeJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}
