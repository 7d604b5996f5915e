import type { ClickHouseClient } from '@clickhouse/client';
import { toStringLiteral } from '../clickhouse/util';
import { parseUtcDateTime } from '../formatting/time';
import { renderAggregate, renderCount, renderSelect, renderWindow } from './queryBuilder';
import type {
  AggregateRow,
  AggregationPlan,
  ColumnDefinition,
  ObservationQuery,
  ObservationRow,
  ObservationStore,
  WindowRequest
} from './types';

type SystemColumnRow = {
  name: string;
  type: string;
};

type CountRow = {
  total: string | number;
};

type AggregateResultRow = Record<string, unknown> & {
  time_bucket: string;
  row_count: string | number;
};

function toNumber(value: unknown): number | null {
  if (value === null || value === undefined) {
    return null;
  }
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

export class ClickHouseObservationStore implements ObservationStore {
  constructor(
    private readonly client: ClickHouseClient,
    private readonly database: string
  ) {}

  private async select<T>(query: string): Promise<T[]> {
    const result = await this.client.query({ query, format: 'JSONEachRow' });
    return result.json<T>();
  }

  async describeTable(table: string): Promise<ColumnDefinition[] | null> {
    const rows = await this.select<SystemColumnRow>(
      `SELECT name, type FROM system.columns WHERE database = ${toStringLiteral(this.database)}` +
        ` AND table = ${toStringLiteral(table)}` +
        ` AND default_kind NOT IN ('MATERIALIZED', 'ALIAS', 'EPHEMERAL') ORDER BY position`
    );
    if (rows.length === 0) {
      return null;
    }
    return rows.map((row) => ({ name: row.name, type: row.type }));
  }

  async fetchRows(query: ObservationQuery): Promise<ObservationRow[]> {
    return this.select<ObservationRow>(renderSelect(query));
  }

  async fetchWindow(query: ObservationQuery, window: WindowRequest): Promise<ObservationRow[]> {
    return this.select<ObservationRow>(renderWindow(query, window));
  }

  async countRows(query: ObservationQuery): Promise<number> {
    const [row] = await this.select<CountRow>(renderCount(query));
    return row ? toNumber(row.total) ?? 0 : 0;
  }

  async aggregate(plan: AggregationPlan): Promise<AggregateRow[]> {
    const rows = await this.select<AggregateResultRow>(renderAggregate(plan));
    return rows.map((row) => {
      const values: Record<string, number | null> = {};
      plan.properties.forEach((property, index) => {
        values[property] = toNumber(row[`agg_${index}`]);
      });
      const bucket = parseUtcDateTime(row.time_bucket);
      if (!bucket) {
        throw new Error(`Unexpected time bucket value from ClickHouse: ${row.time_bucket}`);
      }
      return {
        bucket,
        count: toNumber(row.row_count) ?? 0,
        values
      };
    });
  }
}
