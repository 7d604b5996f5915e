import type { ObservationQuery, ObservationRow, ObservationStore } from './types';

/**
 * Walks a query's result set in ordered windows of `windowSize` rows so only
 * one window is held in memory at a time.
 */
export async function* windowedRows(
  store: Pick<ObservationStore, 'fetchWindow'>,
  query: ObservationQuery,
  windowSize: number
): AsyncGenerator<ObservationRow[]> {
  if (!Number.isInteger(windowSize) || windowSize <= 0) {
    throw new Error(`Window size must be a positive integer, received ${windowSize}`);
  }

  let offset = 0;
  while (true) {
    const remaining = query.limit === null ? windowSize : Math.min(windowSize, query.limit - offset);
    if (remaining <= 0) {
      return;
    }
    const rows = await store.fetchWindow(query, { offset, limit: remaining });
    if (rows.length === 0) {
      return;
    }
    yield rows;
    offset += rows.length;
    if (rows.length < remaining) {
      return;
    }
  }
}
