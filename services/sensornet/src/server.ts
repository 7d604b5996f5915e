import type { FastifyInstance } from 'fastify';
import { buildApp } from './app';
import { loadServiceConfig } from './config/serviceConfig';

/**
 * Closes the app on SIGINT/SIGTERM; its onClose hooks release the pg pool,
 * the ClickHouse client and the Redis connections.
 */
function closeOnSignals(app: FastifyInstance): void {
  let closing = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    app.log.info({ signal }, 'shutting down sensor network API');
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, 'sensor network API shutdown failed');
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

async function start(): Promise<void> {
  const config = loadServiceConfig();
  const { app } = await buildApp({ config });
  closeOnSignals(app);

  const address = await app.listen({ host: config.host, port: config.port });
  app.log.info({ address, publicUrl: config.publicUrl }, 'sensor network API ready');
}

if (require.main === module) {
  start().catch((err) => {
    console.error('[sensornet:api] failed to start', err);
    process.exit(1);
  });
}
