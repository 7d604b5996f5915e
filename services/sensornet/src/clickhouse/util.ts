export function quoteIdentifier(value: string): string {
  return `\`${value.replace(/`/g, '``')}\``;
}

export function escapeStringLiteral(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

export function toStringLiteral(value: string): string {
  return `'${escapeStringLiteral(value)}'`;
}

export function toDateTime64Literal(value: Date): string {
  const formatted = value.toISOString().replace('T', ' ').replace('Z', '');
  return `toDateTime64('${escapeStringLiteral(formatted)}', 3, 'UTC')`;
}

export function toStringList(values: string[]): string {
  return values.map(toStringLiteral).join(', ');
}

type ErrorFields = {
  code: string | null;
  type: string | null;
  message: string;
};

function errorFields(error: unknown): ErrorFields | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  const code =
    'code' in error && (typeof error.code === 'string' || typeof error.code === 'number') ? String(error.code) : null;
  const type = 'type' in error && typeof error.type === 'string' ? error.type : null;
  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return { code, type, message };
}

/**
 * Recognizes ClickHouse errors for a table that is not there (code 60).
 */
export function isUnknownTableError(error: unknown): boolean {
  const fields = errorFields(error);
  if (!fields) {
    return false;
  }
  return fields.code === '60' || fields.type === 'UNKNOWN_TABLE' || /UNKNOWN_TABLE|doesn't exist/i.test(fields.message);
}

const UNKNOWN_COLUMN_CODES = new Set(['16', '47']);
const UNKNOWN_COLUMN_TYPES = new Set(['NO_SUCH_COLUMN_IN_TABLE', 'UNKNOWN_IDENTIFIER']);

/**
 * Recognizes ClickHouse errors for a column the table no longer has
 * (`UNKNOWN_IDENTIFIER`, code 47, and `NO_SUCH_COLUMN_IN_TABLE`, code 16).
 */
export function isUnknownColumnError(error: unknown): boolean {
  const fields = errorFields(error);
  if (!fields) {
    return false;
  }
  return (
    (fields.code !== null && UNKNOWN_COLUMN_CODES.has(fields.code)) ||
    (fields.type !== null && UNKNOWN_COLUMN_TYPES.has(fields.type)) ||
    /UNKNOWN_IDENTIFIER|NO_SUCH_COLUMN_IN_TABLE|Missing columns/i.test(fields.message)
  );
}
