import { AGGREGATE_FUNCTIONS, truncateToBucket } from '../aggregation/functions';
import { toDate } from '../formatting/time';
import { ROW_ORDER_PREFIX } from '../observations/queryBuilder';
import type {
  AggregateRow,
  AggregationPlan,
  ColumnDefinition,
  ObservationQuery,
  ObservationRow,
  ObservationStore,
  TimeRange,
  WindowRequest
} from '../observations/types';

type MemoryTable = {
  columns: ColumnDefinition[];
  rows: ObservationRow[];
};

export class UnknownTableError extends Error {
  readonly code = '60';
  readonly type = 'UNKNOWN_TABLE';

  constructor(table: string) {
    super(`Table ${table} doesn't exist`);
    this.name = 'UnknownTableError';
  }
}

export class UnknownColumnError extends Error {
  readonly code = '47';
  readonly type = 'UNKNOWN_IDENTIFIER';

  constructor(column: string, table: string) {
    super(`Unknown identifier ${column} in table ${table}`);
    this.name = 'UnknownColumnError';
  }
}

function cloneRow(row: ObservationRow): ObservationRow {
  const copy: ObservationRow = {};
  for (const [key, value] of Object.entries(row)) {
    copy[key] = value instanceof Date ? new Date(value.getTime()) : value;
  }
  return copy;
}

function lowerText(value: unknown): string {
  return typeof value === 'string' ? value.toLowerCase() : String(value).toLowerCase();
}

function compareText(left: unknown, right: unknown): number {
  const a = String(left ?? '');
  const b = String(right ?? '');
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareValues(left: unknown, right: unknown): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left - right;
  }
  return compareText(left, right);
}

function timeOf(row: ObservationRow): number {
  return toDate(row.datetime)?.getTime() ?? Number.NaN;
}

function matches(
  row: ObservationRow,
  range: TimeRange,
  nodes: string[] | null,
  sensors: string[] | null
): boolean {
  const time = timeOf(row);
  if (!(time >= range.start.getTime() && time < range.end.getTime())) {
    return false;
  }
  if (nodes && !nodes.includes(lowerText(row.node_id))) {
    return false;
  }
  if (sensors && !sensors.includes(lowerText(row.sensor))) {
    return false;
  }
  return true;
}

/**
 * In-process observation store used for inline mode and tests.
 */
export class MemoryObservationStore implements ObservationStore {
  private readonly tables = new Map<string, MemoryTable>();

  defineTable(table: string, columns: ColumnDefinition[]): void {
    this.tables.set(table.toLowerCase(), {
      columns: columns.map((column) => ({ ...column })),
      rows: []
    });
  }

  insert(table: string, rows: ObservationRow[]): void {
    const target = this.requireTable(table);
    for (const row of rows) {
      target.rows.push(cloneRow(row));
    }
  }

  dropTable(table: string): void {
    this.tables.delete(table.toLowerCase());
  }

  private requireTable(table: string): MemoryTable {
    const entry = this.tables.get(table.toLowerCase());
    if (!entry) {
      throw new UnknownTableError(table);
    }
    return entry;
  }

  private requireColumns(table: string, entry: MemoryTable, names: string[]): void {
    const known = new Set(entry.columns.map((column) => column.name));
    const missing = names.find((name) => !known.has(name));
    if (missing !== undefined) {
      throw new UnknownColumnError(missing, table);
    }
  }

  private select(query: ObservationQuery): ObservationRow[] {
    const table = this.requireTable(query.table);
    const measured = query.columns
      .map((column) => column.name)
      .filter((name) => !ROW_ORDER_PREFIX.includes(name));
    this.requireColumns(query.table, table, query.columns.map((column) => column.name));
    return table.rows
      .filter((row) => matches(row, query.range, query.nodes, query.sensors))
      .sort(
        (a, b) =>
          timeOf(a) - timeOf(b) ||
          compareText(a.node_id, b.node_id) ||
          compareText(a.sensor, b.sensor) ||
          compareValues(a.meta_id, b.meta_id) ||
          measured.reduce((order, name) => order || compareValues(a[name], b[name]), 0)
      );
  }

  private project(query: ObservationQuery, rows: ObservationRow[]): ObservationRow[] {
    const { columns } = this.requireTable(query.table);
    return rows.map((row) => {
      const projected: ObservationRow = {};
      for (const column of columns) {
        const value = row[column.name];
        projected[column.name] = value instanceof Date ? new Date(value.getTime()) : value ?? null;
      }
      return projected;
    });
  }

  private paged(query: ObservationQuery): ObservationRow[] {
    const rows = this.select(query);
    const offset = query.offset ?? 0;
    const end = query.limit === null ? undefined : offset + query.limit;
    return rows.slice(offset, end);
  }

  async describeTable(table: string): Promise<ColumnDefinition[] | null> {
    const entry = this.tables.get(table.toLowerCase());
    return entry ? entry.columns.map((column) => ({ ...column })) : null;
  }

  async fetchRows(query: ObservationQuery): Promise<ObservationRow[]> {
    return this.project(query, this.paged(query));
  }

  async fetchWindow(query: ObservationQuery, window: WindowRequest): Promise<ObservationRow[]> {
    const rows = this.paged(query).slice(window.offset, window.offset + window.limit);
    return this.project(query, rows);
  }

  async countRows(query: ObservationQuery): Promise<number> {
    return this.paged(query).length;
  }

  async aggregate(plan: AggregationPlan): Promise<AggregateRow[]> {
    const table = this.requireTable(plan.table);
    this.requireColumns(plan.table, table, plan.properties);
    const node = plan.node.toLowerCase();
    const buckets = new Map<number, ObservationRow[]>();
    for (const row of table.rows) {
      if (!matches(row, plan.range, [node], plan.sensors)) {
        continue;
      }
      const bucket = truncateToBucket(new Date(timeOf(row)), plan.bucket).getTime();
      const members = buckets.get(bucket) ?? [];
      members.push(row);
      buckets.set(bucket, members);
    }

    const fn = AGGREGATE_FUNCTIONS[plan.fn];
    return Array.from(buckets.entries())
      .sort(([a], [b]) => a - b)
      .map(([bucket, rows]) => {
        const values: Record<string, number | null> = {};
        for (const property of plan.properties) {
          const numbers = rows
            .map((row) => row[property])
            .filter((value): value is number => typeof value === 'number' && Number.isFinite(value));
          values[property] = fn.compute(numbers);
        }
        return { bucket: new Date(bucket), count: rows.length, values };
      });
  }
}
