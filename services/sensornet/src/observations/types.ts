import type { AggregateFunctionName, Bucket } from '../aggregation/functions';

export type ColumnDefinition = {
  name: string;
  type: string;
};

export type TableSchema = {
  table: string;
  columns: ColumnDefinition[];
};

export type TimeRange = {
  start: Date;
  end: Date;
};

/** Columns every observation table carries in addition to its measurements. */
export const ENVELOPE_COLUMNS = ['node_id', 'datetime', 'sensor', 'meta_id'] as const;

export interface ObservationQuery {
  feature: string;
  table: string;
  columns: ColumnDefinition[];
  range: TimeRange;
  nodes: string[] | null;
  sensors: string[] | null;
  limit: number | null;
  offset: number | null;
}

export type ObservationRow = Record<string, unknown>;

export type WindowRequest = {
  offset: number;
  limit: number;
};

export interface AggregationPlan {
  feature: string;
  table: string;
  fn: AggregateFunctionName;
  bucket: Bucket;
  node: string;
  sensors: string[] | null;
  properties: string[];
  range: TimeRange;
}

export interface AggregateRow {
  bucket: Date;
  count: number;
  values: Record<string, number | null>;
}

export interface ObservationStore {
  /** Returns null when the table does not exist. */
  describeTable(table: string): Promise<ColumnDefinition[] | null>;
  fetchRows(query: ObservationQuery): Promise<ObservationRow[]>;
  fetchWindow(query: ObservationQuery, window: WindowRequest): Promise<ObservationRow[]>;
  countRows(query: ObservationQuery): Promise<number>;
  aggregate(plan: AggregationPlan): Promise<AggregateRow[]>;
}
