import type { PoolClient } from 'pg';
import { getClient } from './client';

export type DatadumpPart = {
  id: string;
  request: string;
  part: number;
  total: number;
  data: string;
};

export interface DatadumpUnitOfWork {
  addPart(part: DatadumpPart): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface DatadumpPartStore {
  begin(): Promise<DatadumpUnitOfWork>;
}

async function insertDatadumpPart(client: PoolClient, part: DatadumpPart): Promise<void> {
  await client.query(
    `INSERT INTO sensor__datadumps (id, request, part, total, data)
     VALUES ($1, $2, $3, $4, $5)`,
    [part.id, part.request, part.part, part.total, part.data]
  );
}

class PostgresUnitOfWork implements DatadumpUnitOfWork {
  private finished = false;

  constructor(private readonly client: PoolClient) {}

  private assertOpen(): void {
    if (this.finished) {
      throw new Error('Datadump unit of work already finished');
    }
  }

  async addPart(part: DatadumpPart): Promise<void> {
    this.assertOpen();
    await insertDatadumpPart(this.client, part);
  }

  async commit(): Promise<void> {
    this.assertOpen();
    try {
      await this.client.query('COMMIT');
    } finally {
      this.finished = true;
      this.client.release();
    }
  }

  async rollback(): Promise<void> {
    if (this.finished) {
      return;
    }
    try {
      await this.client.query('ROLLBACK');
    } finally {
      this.finished = true;
      this.client.release();
    }
  }
}

export function createPostgresDatadumpStore(
  acquire: () => Promise<PoolClient> = () => getClient()
): DatadumpPartStore {
  return {
    async begin() {
      const client = await acquire();
      try {
        await client.query('BEGIN');
      } catch (err) {
        client.release();
        throw err;
      }
      return new PostgresUnitOfWork(client);
    }
  };
}
