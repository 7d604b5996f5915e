import { Worker } from 'bullmq';
import { loadServiceConfig } from '../config/serviceConfig';
import { configureDatabase, ensureSchemaReady } from '../db/client';
import { processDatadumpJob } from '../export/processor';
import type { DatadumpResult, DatadumpJobInput } from '../jobs/types';
import { getRedisConnection } from '../jobs/queue';
import { createLogger } from '../logger';
import { createDatadumpDeps, createRuntime, defaultWorkerId } from '../runtime';

async function main(): Promise<void> {
  const config = loadServiceConfig();
  const logger = createLogger(config.logLevel, 'sensornet-datadump');

  if (config.redis.inline) {
    logger.info('inline queue mode active; datadump worker not started');
    return;
  }

  configureDatabase(config.database, logger);
  await ensureSchemaReady();

  const runtime = createRuntime(config, logger);
  const workerId = defaultWorkerId();
  const deps = createDatadumpDeps(runtime, config, logger, workerId);

  const worker = new Worker<DatadumpJobInput, DatadumpResult>(
    config.datadump.queueName,
    async (job) => processDatadumpJob(job.data, deps),
    {
      connection: getRedisConnection(config, logger),
      concurrency: config.datadump.concurrency
    }
  );

  worker.on('completed', (job, result) => {
    logger.info({ jobId: job.id, ticket: job.data.ticket, url: result.url }, 'datadump job completed');
  });

  worker.on('failed', (job, err) => {
    logger.error({ jobId: job?.id, ticket: job?.data.ticket ?? null, err }, 'datadump job failed');
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'shutting down datadump worker');
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'datadump worker shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  logger.info({ workerId, queue: config.datadump.queueName }, 'datadump worker started');
}

if (require.main === module) {
  main().catch((err) => {
    console.error('[sensornet:datadump] fatal error', err);
    process.exit(1);
  });
}
