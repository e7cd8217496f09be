import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { statsRoutes } from '../../src/interfaces/http/index.js';
import type { DaemonSnapshot } from '../../src/interfaces/http/index.js';
import type { SinkStats } from '../../src/application/sink.js';

function sinkStats(name: string, state: string): SinkStats {
  return {
    name,
    kind: 'redis',
    state,
    backlog: 0,
    capacity: 10,
    offered: 3,
    sent: 3,
    evicted: 0,
    expired: 0,
    filtered: 0,
    failures: 0,
  };
}

function snapshotWith(sinks: SinkStats[]): DaemonSnapshot {
  return {
    uptimeSeconds: 12,
    listeners: [
      {
        name: 'udplog',
        address: '127.0.0.1:55647',
        received: 4,
        accepted: 3,
        dropped: { InvalidCategory: 1, InvalidPayload: 0 },
      },
    ],
    router: { accepted: 3, sinks },
    pendingReconnects: [],
  };
}

describe('stats routes', () => {
  let app: FastifyInstance;

  async function build(snapshot: DaemonSnapshot): Promise<FastifyInstance> {
    app = Fastify();
    await app.register(statsRoutes, { snapshot: () => snapshot });
    return app;
  }

  afterEach(async () => {
    await app.close();
  });

  it('reports ok when every sink is connected', async () => {
    await build(snapshotWith([sinkStats('redis', 'connected')]));

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', sinks: [{ name: 'redis', state: 'connected' }] });
  });

  it('reports degraded when a sink is backing off', async () => {
    await build(snapshotWith([sinkStats('redis', 'connected'), sinkStats('amqp', 'backoff(2)')]));

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.json()).toEqual({
      status: 'degraded',
      sinks: [
        { name: 'redis', state: 'connected' },
        { name: 'amqp', state: 'backoff(2)' },
      ],
    });
  });

  it('returns the full snapshot on /stats', async () => {
    const snapshot = snapshotWith([sinkStats('redis', 'connected')]);
    await build(snapshot);

    const res = await app.inject({ method: 'GET', url: '/stats' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(snapshot);
  });
});
