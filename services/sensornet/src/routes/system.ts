import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

type SystemRouteOptions = {
  checkReadiness: () => Promise<void>;
};

export async function registerSystemRoutes(app: FastifyInstance, options: SystemRouteOptions): Promise<void> {
  app.get('/healthz', async () => ({ status: 'ok' }));

  app.get('/readyz', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      await options.checkReadiness();
    } catch (err) {
      request.log.warn({ err }, 'readiness check failed');
      reply.status(503);
      return {
        status: 'unavailable',
        reason: err instanceof Error ? err.message : String(err)
      };
    }
    return { status: 'ok' };
  });
}
