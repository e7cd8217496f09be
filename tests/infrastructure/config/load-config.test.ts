import { describe, it, expect } from 'vitest';
import { loadDaemonConfig } from '../../../src/infrastructure/config/load-config.js';
import { ConfigError } from '../../../src/domain/index.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err: unknown) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadDaemonConfig', () => {
  it('returns defaults for an empty environment', () => {
    const config = loadDaemonConfig({});

    expect(config).toEqual({
      listener: { host: '127.0.0.1', port: 55647 },
      overflowPolicy: 'drop-oldest',
      backoff: { minDelayMs: 1000, maxDelayMs: 30_000, factor: 2, maxAttempt: 16 },
      shutdownTimeoutMs: 2000,
      verbose: false,
      logLevel: 'info',
    });
  });

  it('treats blank variables as unset', () => {
    const config = loadDaemonConfig({ LOGSHIP_UDP_PORT: '  ', LOGSHIP_AMQP_HOST: '' });

    expect(config.listener.port).toBe(55647);
    expect(config.amqp).toBeUndefined();
  });

  it('enables the broker sink from its host', () => {
    const config = loadDaemonConfig({
      LOGSHIP_AMQP_HOST: 'broker.test',
      LOGSHIP_AMQP_CONFIRM: 'no',
    });

    expect(config.amqp).toEqual({
      host: 'broker.test',
      port: 5672,
      vhost: '/',
      user: 'guest',
      password: 'guest',
      exchange: 'logs',
      confirm: false,
      maxAttempts: 5,
      queueSize: 2500,
    });
  });

  it('enables the RPC sink from its URL', () => {
    const config = loadDaemonConfig({
      LOGSHIP_RPC_URL: 'http://collector.test/batch',
      LOGSHIP_RPC_BATCH_SIZE: '50',
      LOGSHIP_RPC_MIN_LOG_LEVEL: 'warning',
    });

    expect(config.rpc).toEqual({
      url: 'http://collector.test/batch',
      batchSize: 50,
      flushIntervalMs: 5000,
      timeoutMs: 5000,
      minLogLevel: 'WARNING',
      queueSize: 2500,
    });
  });

  it('splits Redis hosts on commas', () => {
    const config = loadDaemonConfig({ LOGSHIP_REDIS_HOSTS: 'redis-a, redis-b,,redis-c' });

    expect(config.redis).toEqual({
      hosts: ['redis-a', 'redis-b', 'redis-c'],
      port: 6379,
      key: 'udplog',
      queueSize: 2500,
    });
  });

  it('enables the Kafka sink from its brokers', () => {
    const config = loadDaemonConfig({
      LOGSHIP_KAFKA_BROKERS: 'kafka-1:9092, kafka-2:9092',
      LOGSHIP_KAFKA_SEND_EVERY_MSG: '200',
    });

    expect(config.kafka).toEqual({
      brokers: ['kafka-1:9092', 'kafka-2:9092'],
      topic: 'udplog',
      sendEveryMsg: 200,
      sendEveryMs: 5000,
      queueSize: 2500,
    });
  });

  it('reads syslog, stats, overflow policy, verbosity and log level', () => {
    const config = loadDaemonConfig({
      LOGSHIP_SYSLOG_PORT: '5514',
      LOGSHIP_SYSLOG_TIMEZONE: 'utc',
      LOGSHIP_STATS_PORT: '9100',
      LOGSHIP_OVERFLOW_POLICY: 'drop-newest',
      LOGSHIP_VERBOSE: 'TRUE',
      LOG_LEVEL: 'debug',
    });

    expect(config.syslog).toEqual({ host: '0.0.0.0', port: 5514, timezone: 'utc' });
    expect(config.stats).toEqual({ host: '127.0.0.1', port: 9100 });
    expect(config.overflowPolicy).toBe('drop-newest');
    expect(config.verbose).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('parses syslog hostname rewrites', () => {
    const config = loadDaemonConfig({
      LOGSHIP_SYSLOG_PORT: '5514',
      LOGSHIP_SYSLOG_HOSTNAMES: 'web01=web01.example.test, db01 = db01.example.test,',
    });

    expect(config.syslog?.hostnames).toEqual({
      web01: 'web01.example.test',
      db01: 'db01.example.test',
    });
  });

  it('rejects a hostname rewrite without a target', () => {
    const error = configError(() =>
      loadDaemonConfig({ LOGSHIP_SYSLOG_PORT: '5514', LOGSHIP_SYSLOG_HOSTNAMES: 'web01' }),
    );

    expect(error.issues).toEqual(['syslog.hostnames: Expected short=fqdn, got "web01"']);
  });

  it('rejects a non-numeric port with the offending path', () => {
    const error = configError(() => loadDaemonConfig({ LOGSHIP_UDP_PORT: 'abc' }));

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^listener\.port: /);
  });

  it('rejects a backoff maximum below the minimum', () => {
    const error = configError(() =>
      loadDaemonConfig({ LOGSHIP_BACKOFF_MIN_MS: '5000', LOGSHIP_BACKOFF_MAX_MS: '1000' }),
    );

    expect(error.issues).toEqual(['backoff.maxDelayMs: maxDelayMs must be >= minDelayMs']);
    expect(error.message).toBe('Invalid configuration: backoff.maxDelayMs: maxDelayMs must be >= minDelayMs');
  });

  it('collects every issue at once', () => {
    const error = configError(() =>
      loadDaemonConfig({
        LOGSHIP_RPC_URL: 'not a url',
        LOGSHIP_OVERFLOW_POLICY: 'drop-everything',
        LOGSHIP_AMQP_HOST: 'broker.test',
        LOGSHIP_AMQP_CONFIRM: 'maybe',
      }),
    );

    expect(error.issues.map((issue) => issue.split(':')[0])).toEqual([
      'amqp.confirm',
      'rpc.url',
      'overflowPolicy',
    ]);
  });
});
