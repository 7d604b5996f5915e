import type { ServiceConfig } from '../config/serviceConfig';
import { getClickHouseClient, isInlineClickHouse } from '../clickhouse/client';
import { MemoryObservationStore } from '../clickhouse/memoryStore';
import { ClickHouseObservationStore } from './clickhouseStore';
import type { ObservationStore } from './types';

let inlineStore: MemoryObservationStore | null = null;

export function getInlineObservationStore(): MemoryObservationStore {
  if (!inlineStore) {
    inlineStore = new MemoryObservationStore();
  }
  return inlineStore;
}

export function createObservationStore(config: ServiceConfig): ObservationStore {
  if (isInlineClickHouse(config.clickhouse)) {
    return getInlineObservationStore();
  }
  return new ClickHouseObservationStore(getClickHouseClient(config.clickhouse), config.clickhouse.database);
}
