import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  DOWNLOAD_CACHE_TTL_MS,
  METADATA_CACHE_TTL_MS,
  buildCacheKey,
  type ResponseCache
} from '../cache/responseCache';
import { ApiError } from '../errors/domain';
import { serializeJson } from '../formatting/envelope';
import type { MetadataLevel } from '../metadata/types';
import type { PathParams, SensorNetworkService } from '../services/sensorNetworkService';

const PREFIX = '/v1/api/sensor-networks';

type SensorNetworkRouteOptions = {
  service: SensorNetworkService;
  cache: ResponseCache;
  /** Metadata and aggregate TTL; downloads are kept ten times as long. */
  cacheTtlMs?: number;
};

type NetworkParams = { network: string };

function sendJson(reply: FastifyReply, body: string): FastifyReply {
  return reply.status(200).header('content-type', 'application/json; charset=utf-8').send(body);
}

/**
 * Replays a stored body for the same method, path and sorted query string,
 * otherwise produces, stores and sends a fresh one. A `ttlMs` of 0 skips the
 * cache.
 */
async function respond(
  request: FastifyRequest,
  reply: FastifyReply,
  cache: ResponseCache,
  ttlMs: number,
  produce: () => Promise<unknown>
): Promise<FastifyReply> {
  const key = buildCacheKey(request.method, request.url);
  if (ttlMs > 0) {
    const hit = await cache.get(key);
    if (hit !== null) {
      return sendJson(reply, hit);
    }
  }
  const body = serializeJson(await produce());
  if (ttlMs > 0) {
    await cache.set(key, body, ttlMs);
  }
  return sendJson(reply, body);
}

export async function registerSensorNetworkRoutes(
  app: FastifyInstance,
  options: SensorNetworkRouteOptions
): Promise<void> {
  const { service, cache } = options;
  const metadataTtlMs = options.cacheTtlMs ?? METADATA_CACHE_TTL_MS;
  const downloadTtlMs = options.cacheTtlMs === undefined ? DOWNLOAD_CACHE_TTL_MS : options.cacheTtlMs * 10;

  const metadataRoute = (level: MetadataLevel) =>
    async (request: FastifyRequest<{ Params: PathParams }>, reply: FastifyReply) =>
      respond(request, reply, cache, metadataTtlMs, () =>
        service.getMetadata(level, request.params, request.query)
      );

  app.get<{ Params: PathParams }>(PREFIX, metadataRoute('network'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network`, metadataRoute('network'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/nodes`, metadataRoute('nodes'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/nodes/:node`, metadataRoute('nodes'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/sensors`, metadataRoute('sensors'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/sensors/:sensor`, metadataRoute('sensors'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/features`, metadataRoute('features'));
  app.get<{ Params: PathParams }>(`${PREFIX}/:network/features/:feature`, metadataRoute('features'));

  app.get<{ Params: NetworkParams }>(`${PREFIX}/:network/query`, async (request, reply) =>
    respond(request, reply, cache, 0, () => service.queryObservations(request.params.network, request.query))
  );

  app.get<{ Params: NetworkParams }>(`${PREFIX}/:network/aggregate`, async (request, reply) =>
    respond(request, reply, cache, metadataTtlMs, () =>
      service.aggregate(request.params.network, request.query)
    )
  );

  app.get<{ Params: NetworkParams }>(`${PREFIX}/:network/download`, async (request, reply) =>
    respond(request, reply, cache, downloadTtlMs, () =>
      service.requestDownload(request.params.network, request.query)
    )
  );

  app.get<{ Params: { ticket: string } }>('/v1/api/jobs/:ticket', async (request, reply) => {
    const status = await service.getJobStatus(request.params.ticket);
    if (!status) {
      throw new ApiError(404, 'job_not_found', `No job found for ticket ${request.params.ticket}`);
    }
    return sendJson(reply, serializeJson({ ticket: request.params.ticket, ...status }));
  });
}
