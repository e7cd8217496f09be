import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RouterStats } from '../../application/router.js';
import type { ListenerStats } from '../../infrastructure/listener/index.js';

export interface DaemonSnapshot {
  uptimeSeconds: number;
  listeners: ListenerStats[];
  router: RouterStats;
  pendingReconnects: string[];
}

export interface StatsRoutesOptions {
  snapshot: () => DaemonSnapshot;
}

/**
 * Read-only daemon introspection.
 *
 * GET /health: 200 with `ok` when every sink is connected, `degraded` otherwise
 * GET /stats: listener, router and per-sink counters
 */
async function statsRoutes(fastify: FastifyInstance, options: StatsRoutesOptions): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { router } = options.snapshot();
    const sinks = router.sinks.map((sink) => ({ name: sink.name, state: sink.state }));
    const status = sinks.every((sink) => sink.state === 'connected') ? 'ok' : 'degraded';

    return reply.status(200).send({ status, sinks });
  });

  fastify.get('/stats', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send(options.snapshot());
  });
}

export default fp(statsRoutes, {
  name: 'stats-routes',
  fastify: '5.x',
});
