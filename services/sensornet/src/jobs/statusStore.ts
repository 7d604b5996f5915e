import type { Redis } from 'ioredis';
import { z } from 'zod';

export const jobStateSchema = z.enum(['queued', 'processing', 'success', 'error']);

export const jobStatusSchema = z.object({
  state: jobStateSchema,
  progress: z
    .object({
      done: z.number().int().nonnegative(),
      total: z.number().int().nonnegative()
    })
    .nullable(),
  meta: z.object({
    startTime: z.string(),
    endTime: z.string().nullable(),
    workers: z.array(z.string()),
    features: z.array(z.string())
  }),
  result: z.record(z.unknown()).nullable(),
  error: z.string().nullable()
});

export type JobState = z.infer<typeof jobStateSchema>;
export type JobStatus = z.infer<typeof jobStatusSchema>;

export interface JobStatusStore {
  getStatus(ticket: string): Promise<JobStatus | null>;
  setStatus(ticket: string, status: JobStatus): Promise<void>;
  deleteStatus(ticket: string): Promise<void>;
  setFlag(key: string, value: boolean, ttlSeconds: number): Promise<void>;
  getFlag(key: string): Promise<boolean>;
}

export function createInitialStatus(startTime: string): JobStatus {
  return {
    state: 'queued',
    progress: null,
    meta: { startTime, endTime: null, workers: [], features: [] },
    result: null,
    error: null
  };
}

function cloneStatus(status: JobStatus): JobStatus {
  return jobStatusSchema.parse(JSON.parse(JSON.stringify(status)));
}

export class RedisJobStatusStore implements JobStatusStore {
  constructor(
    private readonly redis: Redis,
    private readonly keyPrefix: string
  ) {}

  private statusKey(ticket: string): string {
    return `${this.keyPrefix}:jobs:${ticket}`;
  }

  private flagKey(key: string): string {
    return `${this.keyPrefix}:flags:${key}`;
  }

  async getStatus(ticket: string): Promise<JobStatus | null> {
    const raw = await this.redis.get(this.statusKey(ticket));
    if (raw === null) {
      return null;
    }
    return jobStatusSchema.parse(JSON.parse(raw));
  }

  async setStatus(ticket: string, status: JobStatus): Promise<void> {
    await this.redis.set(this.statusKey(ticket), JSON.stringify(jobStatusSchema.parse(status)));
  }

  async deleteStatus(ticket: string): Promise<void> {
    await this.redis.del(this.statusKey(ticket));
  }

  async setFlag(key: string, value: boolean, ttlSeconds: number): Promise<void> {
    await this.redis.set(this.flagKey(key), value ? '1' : '0', 'EX', ttlSeconds);
  }

  async getFlag(key: string): Promise<boolean> {
    return (await this.redis.get(this.flagKey(key))) === '1';
  }
}

type FlagEntry = {
  value: boolean;
  expiresAt: number;
};

export class MemoryJobStatusStore implements JobStatusStore {
  private readonly statuses = new Map<string, JobStatus>();
  private readonly flags = new Map<string, FlagEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  async getStatus(ticket: string): Promise<JobStatus | null> {
    const status = this.statuses.get(ticket);
    return status ? cloneStatus(status) : null;
  }

  async setStatus(ticket: string, status: JobStatus): Promise<void> {
    this.statuses.set(ticket, cloneStatus(status));
  }

  async deleteStatus(ticket: string): Promise<void> {
    this.statuses.delete(ticket);
  }

  async setFlag(key: string, value: boolean, ttlSeconds: number): Promise<void> {
    this.flags.set(key, { value, expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async getFlag(key: string): Promise<boolean> {
    const entry = this.flags.get(key);
    if (!entry) {
      return false;
    }
    if (entry.expiresAt <= this.now()) {
      this.flags.delete(key);
      return false;
    }
    return entry.value;
  }
}
