import { randomUUID } from 'node:crypto';
import { Queue } from 'bullmq';
import IORedis, { type Redis } from 'ioredis';
import type { ServiceConfig } from '../config/serviceConfig';
import { formatTimestamp } from '../formatting/time';
import type { ServiceLogger } from '../logger';
import { createInitialStatus, type JobStatusStore } from './statusStore';
import { datadumpJobPayloadSchema, toJobInput, type DatadumpArgs, type DatadumpJobInput } from './types';

export type JobKind = 'observation_datadump';

export interface JobQueue {
  readonly mode: 'inline' | 'queued';
  enqueue(payload: DatadumpJobInput): Promise<void>;
  close(): Promise<void>;
}

export type JobResponse = {
  ticket: string;
  url: string;
};

let connection: Redis | null = null;

export function getRedisConnection(config: ServiceConfig, logger?: ServiceLogger): Redis {
  if (config.redis.inline) {
    throw new Error('Redis connection not available in inline mode');
  }
  if (!connection) {
    connection = new IORedis(config.redis.url, {
      maxRetriesPerRequest: null
    });
    connection.on('error', (err) => {
      logger?.error({ err }, 'redis connection error');
    });
  }
  return connection;
}

export async function closeRedisConnection(): Promise<void> {
  if (!connection) {
    return;
  }
  const current = connection;
  connection = null;
  await current.quit();
}

export class BullJobQueue implements JobQueue {
  readonly mode = 'queued' as const;
  private readonly queue: Queue<DatadumpJobInput>;

  constructor(queueName: string, redis: Redis) {
    this.queue = new Queue<DatadumpJobInput>(queueName, { connection: redis });
  }

  async enqueue(payload: DatadumpJobInput): Promise<void> {
    const job = datadumpJobPayloadSchema.parse(payload);
    await this.queue.add(job.kind, payload, {
      jobId: job.ticket,
      removeOnComplete: 100,
      removeOnFail: 500
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * Runs jobs in-process as soon as they are enqueued. The processor records
 * failures on the job status; they are logged here instead of failing the
 * request that enqueued them.
 */
export class InlineJobQueue implements JobQueue {
  readonly mode = 'inline' as const;

  constructor(
    private readonly run: (payload: DatadumpJobInput) => Promise<unknown>,
    private readonly logger: ServiceLogger
  ) {}

  async enqueue(payload: DatadumpJobInput): Promise<void> {
    try {
      await this.run(payload);
    } catch (err) {
      this.logger.error({ err, ticket: payload.ticket }, 'inline job failed');
    }
  }

  async close(): Promise<void> {
    return;
  }
}

export function generateTicket(): string {
  return randomUUID().replace(/-/g, '');
}

export function jobStatusUrl(publicUrl: string, ticket: string): string {
  return `${publicUrl.replace(/\/+$/, '')}/v1/api/jobs/${ticket}`;
}

export type JobResponseDeps = {
  queue: JobQueue;
  statuses: JobStatusStore;
  publicUrl: string;
  now?: () => Date;
  generateTicket?: () => string;
};

/**
 * Registers a queued status for a new ticket and hands the job to the queue.
 */
export async function makeJobResponse(
  kind: JobKind,
  args: DatadumpArgs,
  deps: JobResponseDeps
): Promise<JobResponse> {
  const ticket = (deps.generateTicket ?? generateTicket)();
  const now = deps.now ?? (() => new Date());
  await deps.statuses.setStatus(ticket, createInitialStatus(formatTimestamp(now())));

  const payload = toJobInput(ticket, args);
  if (payload.kind !== kind) {
    throw new Error(`Unsupported job kind: ${kind}`);
  }
  await deps.queue.enqueue(payload);

  return { ticket, url: jobStatusUrl(deps.publicUrl, ticket) };
}
