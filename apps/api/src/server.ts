import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { EssBridge } from '@essbridge/worker';
import { requireApiToken } from './auth/middleware';
import { commandRoutes } from './commands/routes';
import { readingRoutes } from './readings/routes';

export interface ServerOptions {
  apiToken?: string | null;
  logger?: boolean;
}

export async function buildServer(bridge: EssBridge, options: ServerOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  await fastify.register(cors);
  await fastify.register(rateLimit, {
    global: false, // Apply per-route
  });

  // Health check (no auth required)
  fastify.get('/health', async () => {
    return { status: 'ok' };
  });

  // API v1 routes
  await fastify.register(
    async (api) => {
      api.addHook('onRequest', requireApiToken(options.apiToken ?? null));

      await api.register(readingRoutes, { bridge });
      await api.register(commandRoutes, { bridge });
    },
    { prefix: '/api/v1' },
  );

  return fastify;
}
