const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Parses datetimes as UTC. A trailing offset is dropped rather than applied,
 * and ClickHouse's `YYYY-MM-DD hh:mm:ss` form is accepted.
 */
export function parseUtcDateTime(value: string): Date | null {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return null;
  }
  const withoutOffset = trimmed.replace(OFFSET_SUFFIX, '');
  const normalized = withoutOffset.includes('T') ? withoutOffset : withoutOffset.replace(' ', 'T');
  const iso = /^\d{4}-\d{2}-\d{2}$/.test(normalized) ? `${normalized}T00:00:00` : normalized;
  if (!/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(iso)) {
    return null;
  }
  const parsed = new Date(`${iso}Z`);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

export function toDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  if (typeof value === 'string') {
    return parseUtcDateTime(value);
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return new Date(value);
  }
  return null;
}

/**
 * ISO-8601 without an offset; milliseconds only when present.
 */
export function formatTimestamp(value: Date): string {
  const iso = value.toISOString();
  const base = iso.slice(0, 19);
  return value.getUTCMilliseconds() === 0 ? base : iso.slice(0, 23);
}
