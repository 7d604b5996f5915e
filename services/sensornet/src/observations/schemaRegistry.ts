import { FeatureSchemaChangedError, FeatureTableMissingError } from '../errors/domain';
import { isUnknownColumnError, isUnknownTableError } from '../clickhouse/util';
import type { ColumnDefinition, ObservationRow, ObservationStore, TableSchema } from './types';

type CacheEntry = {
  schema: TableSchema;
  expiresAt: number;
};

export interface SchemaRegistry {
  getSchema(feature: string): Promise<TableSchema>;
  invalidate(feature: string): void;
  reset(): void;
  /**
   * Runs `operation` against a feature table and drops the cached schema when
   * the table vanished (`FeatureTableMissingError`) or lost a column
   * (`FeatureSchemaChangedError`).
   */
  guard<T>(feature: string, operation: () => Promise<T>): Promise<T>;
  /**
   * Columns to format `rows` with. Rows whose keys differ from `columns` mean
   * the table changed since it was described: the entry is refreshed, and a
   * table that still disagrees with its rows raises `FeatureSchemaChangedError`.
   */
  reconcile(feature: string, columns: ColumnDefinition[], rows: ObservationRow[]): Promise<ColumnDefinition[]>;
}

export type SchemaRegistryOptions = {
  ttlMs: number;
  now?: () => number;
};

export function tableNameForFeature(feature: string): string {
  return feature.trim().toLowerCase();
}

function describesRow(columns: ColumnDefinition[], row: ObservationRow): boolean {
  const keys = Object.keys(row);
  if (keys.length !== columns.length) {
    return false;
  }
  const names = new Set(columns.map((column) => column.name));
  return keys.every((key) => names.has(key));
}

export function createSchemaRegistry(
  store: Pick<ObservationStore, 'describeTable'>,
  options: SchemaRegistryOptions
): SchemaRegistry {
  const entries = new Map<string, CacheEntry>();
  const now = options.now ?? Date.now;

  const invalidate = (feature: string): void => {
    entries.delete(tableNameForFeature(feature));
  };

  const getSchema = async (feature: string): Promise<TableSchema> => {
    const table = tableNameForFeature(feature);
    const cached = entries.get(table);
    if (cached && cached.expiresAt > now()) {
      return cached.schema;
    }

    const columns = await store.describeTable(table);
    if (!columns || columns.length === 0) {
      entries.delete(table);
      throw new FeatureTableMissingError(feature);
    }

    const schema: TableSchema = { table, columns };
    if (options.ttlMs > 0) {
      entries.set(table, { schema, expiresAt: now() + options.ttlMs });
    }
    return schema;
  };

  return {
    getSchema,

    invalidate,

    reset() {
      entries.clear();
    },

    async guard(feature, operation) {
      try {
        return await operation();
      } catch (error) {
        if (isUnknownTableError(error)) {
          invalidate(feature);
          throw new FeatureTableMissingError(feature, error);
        }
        if (isUnknownColumnError(error)) {
          invalidate(feature);
          throw new FeatureSchemaChangedError(feature, error);
        }
        throw error;
      }
    },

    async reconcile(feature, columns, rows) {
      const [first] = rows;
      if (!first || describesRow(columns, first)) {
        return columns;
      }
      invalidate(feature);
      const fresh = await getSchema(feature);
      if (!describesRow(fresh.columns, first)) {
        invalidate(feature);
        throw new FeatureSchemaChangedError(feature);
      }
      return fresh.columns;
    }
  };
}
