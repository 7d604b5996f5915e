import { formatTimestamp } from '../formatting/time';
import { createInitialStatus } from '../jobs/statusStore';
import { datadumpJobPayloadSchema, type DatadumpResult } from '../jobs/types';
import { runDatadump, type DatadumpDeps } from './pipeline';

/**
 * Runs one queued export and records its outcome on the job status. Failures
 * are recorded as `error` and re-thrown so the queue marks the job failed.
 */
export async function processDatadumpJob(payload: unknown, deps: DatadumpDeps): Promise<DatadumpResult> {
  const job = datadumpJobPayloadSchema.parse(payload);
  const now = deps.now ?? (() => new Date());
  const { ticket } = job;

  const initial = (await deps.statuses.getStatus(ticket)) ?? createInitialStatus(formatTimestamp(now()));
  await deps.statuses.setStatus(ticket, {
    ...initial,
    state: 'processing',
    meta: { ...initial.meta, workers: [deps.workerId] }
  });

  try {
    const result = await runDatadump(ticket, job.args, deps);
    const status = (await deps.statuses.getStatus(ticket)) ?? initial;
    await deps.statuses.setStatus(ticket, {
      ...status,
      state: 'success',
      result: { url: result.url },
      error: null
    });
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    deps.logger.error({ err: error, ticket }, 'datadump failed');
    const status = (await deps.statuses.getStatus(ticket)) ?? initial;
    await deps.statuses.setStatus(ticket, {
      ...status,
      state: 'error',
      meta: { ...status.meta, endTime: formatTimestamp(now()) },
      error: message
    });
    throw error;
  }
}
