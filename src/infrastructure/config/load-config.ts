import type { DaemonConfig } from '../../application/config-schema.js';
import { daemonConfigSchema } from '../../application/config-schema.js';
import { ConfigError } from '../../domain/index.js';

export type Env = Readonly<Record<string, string | undefined>>;

const PREFIX = 'LOGSHIP_';

/** Blank variables count as unset so defaults apply. */
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Builds the daemon configuration from environment variables.
 *
 * A sink or optional surface is enabled by its "target" variable:
 * `LOGSHIP_AMQP_HOST`, `LOGSHIP_RPC_URL`, `LOGSHIP_KAFKA_BROKERS`,
 * `LOGSHIP_REDIS_HOSTS`, `LOGSHIP_SYSLOG_PORT`, `LOGSHIP_STATS_PORT`. Validation failures throw a
 * `ConfigError` listing every issue; the daemon does not start.
 */
export function loadDaemonConfig(env: Env = process.env): DaemonConfig {
  const v = (name: string): string | undefined => read(env, `${PREFIX}${name}`);

  const raw = {
    listener: {
      host: v('UDP_HOST'),
      port: v('UDP_PORT'),
    },
    syslog: v('SYSLOG_PORT') === undefined
      ? undefined
      : {
          host: v('SYSLOG_HOST'),
          port: v('SYSLOG_PORT'),
          timezone: v('SYSLOG_TIMEZONE'),
          hostnames: v('SYSLOG_HOSTNAMES'),
        },
    amqp: v('AMQP_HOST') === undefined
      ? undefined
      : {
          host: v('AMQP_HOST'),
          port: v('AMQP_PORT'),
          vhost: v('AMQP_VHOST'),
          user: v('AMQP_USER'),
          password: v('AMQP_PASSWORD'),
          exchange: v('AMQP_EXCHANGE'),
          confirm: v('AMQP_CONFIRM'),
          maxAttempts: v('AMQP_MAX_ATTEMPTS'),
          queueSize: v('AMQP_QUEUE_SIZE'),
        },
    rpc: v('RPC_URL') === undefined
      ? undefined
      : {
          url: v('RPC_URL'),
          batchSize: v('RPC_BATCH_SIZE'),
          flushIntervalMs: v('RPC_FLUSH_INTERVAL_MS'),
          timeoutMs: v('RPC_TIMEOUT_MS'),
          minLogLevel: v('RPC_MIN_LOG_LEVEL'),
          queueSize: v('RPC_QUEUE_SIZE'),
        },
    kafka: v('KAFKA_BROKERS') === undefined
      ? undefined
      : {
          brokers: v('KAFKA_BROKERS'),
          topic: v('KAFKA_TOPIC'),
          clientId: v('KAFKA_CLIENT_ID'),
          sendEveryMsg: v('KAFKA_SEND_EVERY_MSG'),
          sendEveryMs: v('KAFKA_SEND_EVERY_MS'),
          queueSize: v('KAFKA_QUEUE_SIZE'),
        },
    redis: v('REDIS_HOSTS') === undefined
      ? undefined
      : {
          hosts: v('REDIS_HOSTS'),
          port: v('REDIS_PORT'),
          key: v('REDIS_KEY'),
          queueSize: v('REDIS_QUEUE_SIZE'),
        },
    overflowPolicy: v('OVERFLOW_POLICY'),
    backoff: {
      minDelayMs: v('BACKOFF_MIN_MS'),
      maxDelayMs: v('BACKOFF_MAX_MS'),
      factor: v('BACKOFF_FACTOR'),
      maxAttempt: v('BACKOFF_CAP'),
    },
    shutdownTimeoutMs: v('SHUTDOWN_TIMEOUT_MS'),
    verbose: v('VERBOSE'),
    stats: v('STATS_PORT') === undefined
      ? undefined
      : {
          host: v('STATS_HOST'),
          port: v('STATS_PORT'),
        },
    logLevel: read(env, 'LOG_LEVEL'),
  };

  const parsed = daemonConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }

  return parsed.data;
}
