import type { FeatureRecord } from '../metadata/types';
import { AGGREGATE_FUNCTIONS, BUCKET_EXPRESSIONS } from '../aggregation/functions';
import { quoteIdentifier, toDateTime64Literal, toStringList } from '../clickhouse/util';
import type { SchemaRegistry } from './schemaRegistry';
import type { AggregationPlan, ObservationQuery, WindowRequest } from './types';

export type ObservationQueryArgs = {
  start: Date;
  end: Date;
  nodes?: string[] | null;
  sensors?: string[] | null;
  limit?: number | null;
  offset?: number | null;
};

function normalizeList(values: string[] | null | undefined): string[] | null {
  if (!values || values.length === 0) {
    return null;
  }
  return Array.from(new Set(values.map((value) => value.toLowerCase())));
}

/**
 * One query descriptor per resolved feature. Schemas are looked up when the
 * queries are built, so a feature without a table fails here.
 */
export async function buildObservationQueries(
  features: FeatureRecord[],
  args: ObservationQueryArgs,
  registry: Pick<SchemaRegistry, 'getSchema'>
): Promise<ObservationQuery[]> {
  const queries: ObservationQuery[] = [];
  for (const feature of features) {
    const schema = await registry.getSchema(feature.name);
    queries.push({
      feature: feature.name,
      table: schema.table,
      columns: schema.columns,
      range: { start: args.start, end: args.end },
      nodes: normalizeList(args.nodes),
      sensors: normalizeList(args.sensors),
      limit: args.limit ?? null,
      offset: args.offset ?? null
    });
  }
  return queries;
}

function buildWhereClause(
  range: { start: Date; end: Date },
  nodes: string[] | null,
  sensors: string[] | null
): string {
  const datetime = quoteIdentifier('datetime');
  const clauses = [
    `${datetime} >= ${toDateTime64Literal(range.start)}`,
    `${datetime} < ${toDateTime64Literal(range.end)}`
  ];
  if (nodes) {
    clauses.push(`lower(${quoteIdentifier('node_id')}) IN (${toStringList(nodes)})`);
  }
  if (sensors) {
    clauses.push(`lower(${quoteIdentifier('sensor')}) IN (${toStringList(sensors)})`);
  }
  return clauses.join(' AND ');
}

/** Leading sort keys of every row listing. */
export const ROW_ORDER_PREFIX = ['datetime', 'node_id', 'sensor', 'meta_id'];

/**
 * Envelope columns first, then every measured column, so rows that share a
 * timestamp still come back in the same order from window to window.
 */
function renderOrderBy(query: ObservationQuery): string {
  const measured = query.columns
    .map((column) => column.name)
    .filter((name) => !ROW_ORDER_PREFIX.includes(name));
  return [...ROW_ORDER_PREFIX, ...measured].map(quoteIdentifier).join(', ');
}

function renderPaging(limit: number | null, offset: number | null): string {
  if (limit !== null) {
    return offset !== null && offset > 0 ? ` LIMIT ${limit} OFFSET ${offset}` : ` LIMIT ${limit}`;
  }
  if (offset !== null && offset > 0) {
    return ` OFFSET ${offset} ROWS`;
  }
  return '';
}

export function renderSelect(query: ObservationQuery): string {
  return (
    `SELECT * FROM ${quoteIdentifier(query.table)}` +
    ` WHERE ${buildWhereClause(query.range, query.nodes, query.sensors)}` +
    ` ORDER BY ${renderOrderBy(query)}` +
    renderPaging(query.limit, query.offset)
  );
}

/**
 * Counts what `renderSelect` would return, honoring the query's own paging.
 */
export function renderCount(query: ObservationQuery): string {
  if (query.limit === null && (query.offset === null || query.offset === 0)) {
    return (
      `SELECT count() AS total FROM ${quoteIdentifier(query.table)}` +
      ` WHERE ${buildWhereClause(query.range, query.nodes, query.sensors)}`
    );
  }
  return `SELECT count() AS total FROM (${renderSelect(query)})`;
}

/**
 * A window relative to the query's own result set.
 */
export function renderWindow(query: ObservationQuery, window: WindowRequest): string {
  const baseOffset = query.offset ?? 0;
  let limit = window.limit;
  if (query.limit !== null) {
    limit = Math.max(0, Math.min(window.limit, query.limit - window.offset));
  }
  return (
    `SELECT * FROM ${quoteIdentifier(query.table)}` +
    ` WHERE ${buildWhereClause(query.range, query.nodes, query.sensors)}` +
    ` ORDER BY ${renderOrderBy(query)}` +
    ` LIMIT ${limit} OFFSET ${baseOffset + window.offset}`
  );
}

export function renderAggregate(plan: AggregationPlan): string {
  const fn = AGGREGATE_FUNCTIONS[plan.fn];
  const bucket = BUCKET_EXPRESSIONS[plan.bucket](quoteIdentifier('datetime'));
  const measures = plan.properties.map(
    (property, index) => `${fn.sql(quoteIdentifier(property))} AS ${quoteIdentifier(`agg_${index}`)}`
  );
  const selectList = [
    `${bucket} AS ${quoteIdentifier('time_bucket')}`,
    `count() AS ${quoteIdentifier('row_count')}`,
    ...measures
  ].join(', ');
  return (
    `SELECT ${selectList} FROM ${quoteIdentifier(plan.table)}` +
    ` WHERE ${buildWhereClause(plan.range, [plan.node.toLowerCase()], plan.sensors)}` +
    ` GROUP BY ${quoteIdentifier('time_bucket')}` +
    ` ORDER BY ${quoteIdentifier('time_bucket')}`
  );
}
