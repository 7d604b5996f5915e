import Fastify from 'fastify';
import cors from '@fastify/cors';
import { createResponseCache, type ResponseCache } from './cache/responseCache';
import { loadServiceConfig, type ServiceConfig } from './config/serviceConfig';
import { configureDatabase, ensureSchemaReady } from './db/client';
import { createHttpErrorHandler } from './errors/errorHandler';
import { createLoggerOptions } from './logger';
import { registerSensorNetworkRoutes } from './routes/sensorNetworks';
import { registerSystemRoutes } from './routes/system';
import { createRuntime } from './runtime';
import { createSensorNetworkService, type SensorNetworkService } from './services/sensorNetworkService';

export type BuildAppOptions = {
  config?: ServiceConfig;
  /** Supplying a service skips the Postgres, ClickHouse and Redis wiring. */
  service?: SensorNetworkService;
  cache?: ResponseCache;
  checkReadiness?: () => Promise<void>;
};

export async function buildApp(options?: BuildAppOptions) {
  const config = options?.config ?? loadServiceConfig();

  const app = Fastify({
    logger: createLoggerOptions(config.logLevel)
  });

  await app.register(cors, {
    origin: true,
    methods: ['GET']
  });

  app.setErrorHandler(createHttpErrorHandler());

  let service = options?.service;
  let cache = options?.cache;
  let checkReadiness = options?.checkReadiness;

  if (!service) {
    configureDatabase(config.database, app.log);
    const runtime = createRuntime(config, app.log);
    service = createSensorNetworkService({
      repository: runtime.repository,
      registry: runtime.registry,
      store: runtime.store,
      statuses: runtime.statuses,
      queue: runtime.queue,
      publicUrl: config.publicUrl
    });
    cache = cache ?? runtime.cache;
    checkReadiness = checkReadiness ?? runtime.checkReadiness;

    app.addHook('onReady', async () => {
      await ensureSchemaReady();
    });
    app.addHook('onClose', async () => {
      await runtime.close();
    });
  }

  await registerSystemRoutes(app, { checkReadiness: checkReadiness ?? (async () => undefined) });
  await registerSensorNetworkRoutes(app, {
    service,
    cache: cache ?? createResponseCache(config.cache.enabled),
    cacheTtlMs: config.cache.ttlSeconds * 1000
  });

  return { app, config };
}
