export const AGGREGATE_FUNCTION_NAMES = ['avg', 'min', 'max', 'sum', 'count'] as const;
export type AggregateFunctionName = (typeof AGGREGATE_FUNCTION_NAMES)[number];

export const BUCKETS = ['minute', 'hour', 'day', 'week', 'month', 'year'] as const;
export type Bucket = (typeof BUCKETS)[number];

export interface AggregateFunction {
  /** ClickHouse expression over an already quoted column. */
  sql(column: string): string;
  /** Same statistic over the non-null values of one bucket. */
  compute(values: number[]): number | null;
}

export const AGGREGATE_FUNCTIONS: Record<AggregateFunctionName, AggregateFunction> = {
  avg: {
    sql: (column) => `avg(${column})`,
    compute: (values) => (values.length === 0 ? null : values.reduce((sum, value) => sum + value, 0) / values.length)
  },
  min: {
    sql: (column) => `min(${column})`,
    compute: (values) =>
      values.length === 0 ? null : values.reduce((lowest, value) => (value < lowest ? value : lowest))
  },
  max: {
    sql: (column) => `max(${column})`,
    compute: (values) =>
      values.length === 0 ? null : values.reduce((highest, value) => (value > highest ? value : highest))
  },
  sum: {
    sql: (column) => `sum(${column})`,
    compute: (values) => (values.length === 0 ? null : values.reduce((sum, value) => sum + value, 0))
  },
  count: {
    sql: (column) => `count(${column})`,
    compute: (values) => values.length
  }
};

export function isAggregateFunctionName(value: string): value is AggregateFunctionName {
  return (AGGREGATE_FUNCTION_NAMES as readonly string[]).includes(value);
}

export function isBucket(value: string): value is Bucket {
  return (BUCKETS as readonly string[]).includes(value);
}

export const BUCKET_EXPRESSIONS: Record<Bucket, (column: string) => string> = {
  minute: (column) => `toStartOfMinute(${column})`,
  hour: (column) => `toStartOfHour(${column})`,
  day: (column) => `toStartOfDay(${column})`,
  week: (column) => `toDateTime(toMonday(${column}), 'UTC')`,
  month: (column) => `toDateTime(toStartOfMonth(${column}), 'UTC')`,
  year: (column) => `toDateTime(toStartOfYear(${column}), 'UTC')`
};

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * UTC start of the bucket containing `value`. Weeks start on Monday.
 */
export function truncateToBucket(value: Date, bucket: Bucket): Date {
  const time = value.getTime();
  switch (bucket) {
    case 'minute':
      return new Date(time - (((time % MINUTE_MS) + MINUTE_MS) % MINUTE_MS));
    case 'hour':
      return new Date(time - (((time % HOUR_MS) + HOUR_MS) % HOUR_MS));
    case 'day':
      return new Date(time - (((time % DAY_MS) + DAY_MS) % DAY_MS));
    case 'week': {
      const day = new Date(time - (((time % DAY_MS) + DAY_MS) % DAY_MS));
      const offset = (day.getUTCDay() + 6) % 7;
      return new Date(day.getTime() - offset * DAY_MS);
    }
    case 'month':
      return new Date(Date.UTC(value.getUTCFullYear(), value.getUTCMonth(), 1));
    case 'year':
      return new Date(Date.UTC(value.getUTCFullYear(), 0, 1));
  }
}

const NUMERIC_TYPE = /^(U?Int\d+|Float\d+|Decimal(\d+)?(\(.*\))?|double precision|real|integer|bigint|smallint|numeric)$/i;

/**
 * True for column types an aggregate can be computed over, looking through
 * `Nullable(...)` and `LowCardinality(...)` wrappers.
 */
export function isNumericType(type: string): boolean {
  let inner = type.trim();
  const wrapper = /^(Nullable|LowCardinality)\((.*)\)$/i;
  let match = wrapper.exec(inner);
  while (match) {
    inner = match[2].trim();
    match = wrapper.exec(inner);
  }
  return NUMERIC_TYPE.test(inner);
}
