import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { DEFAULT_QUEUE_SIZE, Router, Supervisor } from './application/index.js';
import type { DaemonConfig, Sink } from './application/index.js';
import {
  AmqpSink,
  BatchRpcSink,
  ConsoleSink,
  KafkaSink,
  RedisSink,
  SyslogListener,
  UdpLogListener,
} from './infrastructure/index.js';
import type { DatagramListener } from './infrastructure/index.js';
import { statsRoutes } from './interfaces/http/index.js';
import type { DaemonSnapshot } from './interfaces/http/index.js';

export interface Daemon {
  readonly sinks: readonly Sink[];
  readonly listeners: readonly DatagramListener[];
  start(): Promise<void>;
  stop(): Promise<void>;
  snapshot(): DaemonSnapshot;
}

/** Builds one sink per configured backend, in a fixed order. */
export function createSinks(config: DaemonConfig, log: Logger): Sink[] {
  const shared = {
    overflowPolicy: config.overflowPolicy,
    backoff: config.backoff,
  };
  const sinks: Sink[] = [];

  if (config.amqp) {
    const { queueSize, confirm, maxAttempts, ...connection } = config.amqp;
    sinks.push(new AmqpSink({
      ...shared,
      ...connection,
      name: 'amqp',
      log: log.child({ sink: 'amqp' }),
      backlogCapacity: queueSize,
      maxAttempts,
      mode: confirm ? 'confirm' : 'fire-and-forget',
    }));
  }

  if (config.rpc) {
    const { queueSize, ...rpc } = config.rpc;
    sinks.push(new BatchRpcSink({
      ...shared,
      ...rpc,
      name: 'rpc',
      log: log.child({ sink: 'rpc' }),
      backlogCapacity: queueSize,
    }));
  }

  if (config.kafka) {
    const { queueSize, sendEveryMsg, sendEveryMs, ...kafka } = config.kafka;
    sinks.push(new KafkaSink({
      ...shared,
      ...kafka,
      name: 'kafka',
      log: log.child({ sink: 'kafka' }),
      backlogCapacity: queueSize,
      batchSize: sendEveryMsg,
      flushIntervalMs: sendEveryMs,
    }));
  }

  if (config.redis) {
    const { queueSize, ...redis } = config.redis;
    sinks.push(new RedisSink({
      ...shared,
      ...redis,
      name: 'redis',
      log: log.child({ sink: 'redis' }),
      backlogCapacity: queueSize,
    }));
  }

  if (config.verbose) {
    sinks.push(new ConsoleSink({
      ...shared,
      name: 'console',
      log: log.child({ sink: 'console' }),
      backlogCapacity: DEFAULT_QUEUE_SIZE,
    }));
  }

  return sinks;
}

/**
 * Wires listeners, router, sinks and supervisor from a validated config.
 *
 * Start order: sockets, then the supervisor (which triggers the first
 * connect of every sink), then the optional stats server. Stop runs in
 * reverse, with each sink given `shutdownTimeoutMs` to flush.
 */
export function createDaemon(config: DaemonConfig, log: Logger): Daemon {
  const sinks = createSinks(config, log);
  const router = new Router(sinks, log.child({ component: 'router' }));
  const supervisor = new Supervisor(sinks, log.child({ component: 'supervisor' }));

  const listeners: DatagramListener[] = [
    new UdpLogListener({
      host: config.listener.host,
      port: config.listener.port,
      router,
      log: log.child({ listener: 'udplog' }),
    }),
  ];

  if (config.syslog) {
    listeners.push(new SyslogListener({
      host: config.syslog.host,
      port: config.syslog.port,
      timezone: config.syslog.timezone,
      hostnames: config.syslog.hostnames,
      router,
      log: log.child({ listener: 'syslog' }),
    }));
  }

  const startedAt = Date.now();
  let stats: FastifyInstance | null = null;

  const snapshot = (): DaemonSnapshot => ({
    uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
    listeners: listeners.map((listener) => listener.stats()),
    router: router.snapshot(),
    pendingReconnects: supervisor.pending(),
  });

  return {
    sinks,
    listeners,
    snapshot,

    async start(): Promise<void> {
      if (sinks.length === 0) {
        log.warn('No sinks configured; events will be counted and discarded');
      }

      for (const listener of listeners) {
        await listener.start();
      }

      supervisor.start();

      if (config.stats) {
        const statsLog: FastifyBaseLogger = log.child({ component: 'stats' });
        stats = Fastify({ loggerInstance: statsLog });
        await stats.register(statsRoutes, { snapshot });
        await stats.listen({ host: config.stats.host, port: config.stats.port });
      }

      log.info(
        { sinks: sinks.map((sink) => sink.name), listeners: listeners.map((l) => l.address()) },
        'Daemon started',
      );
    },

    async stop(): Promise<void> {
      log.info('Shutting down daemon...');

      await Promise.all(listeners.map((listener) => listener.stop()));
      supervisor.stop();
      await Promise.all(sinks.map((sink) => sink.stop(config.shutdownTimeoutMs)));

      if (stats) {
        await stats.close();
        stats = null;
      }

      log.info(router.snapshot(), 'Daemon stopped');
    },
  };
}
