import { z } from 'zod';
import { OVERFLOW_POLICIES } from './backlog.js';

export const DEFAULT_UDP_HOST = '127.0.0.1';
export const DEFAULT_UDP_PORT = 55647;
export const DEFAULT_QUEUE_SIZE = 2500;

/** Level names ranked for the RPC sink's minimum-level filter. */
export const LOG_LEVEL_RANKS = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50,
} as const;

export type LogLevelName = keyof typeof LOG_LEVEL_RANKS;

const port = z.coerce.number().int().min(0).max(65535);
const positiveInt = z.coerce.number().int().positive();

/** Env flags: `true`/`false`/`1`/`0`/`yes`/`no`, case-insensitive. */
const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const queueSize = positiveInt.default(DEFAULT_QUEUE_SIZE);

export const listenerConfigSchema = z.object({
  host: z.string().min(1).default(DEFAULT_UDP_HOST),
  port: port.default(DEFAULT_UDP_PORT),
});

/** `short=fqdn` pairs separated by commas, e.g. `web01=web01.example.org`. */
const hostnameMap = z.string().transform((value, ctx) => {
  const map: Record<string, string> = {};
  const pairs = value.split(',').map((pair) => pair.trim()).filter((pair) => pair !== '');

  for (const pair of pairs) {
    const [short, fqdn, ...rest] = pair.split('=').map((part) => part.trim());
    if (!short || !fqdn || rest.length > 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected short=fqdn, got "${pair}"` });
      return z.NEVER;
    }
    map[short] = fqdn;
  }

  return map;
});

export const syslogConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port,
  timezone: z.enum(['local', 'utc']).default('local'),
  hostnames: hostnameMap.optional(),
});

export const amqpSinkConfigSchema = z.object({
  host: z.string().min(1),
  port: port.default(5672),
  vhost: z.string().default('/'),
  user: z.string().default('guest'),
  password: z.string().default('guest'),
  exchange: z.string().min(1).default('logs'),
  confirm: flag.default('true'),
  maxAttempts: positiveInt.default(5),
  queueSize,
});

export const rpcSinkConfigSchema = z.object({
  url: z.string().url(),
  batchSize: positiveInt.default(100),
  flushIntervalMs: positiveInt.default(5000),
  timeoutMs: positiveInt.default(5000),
  minLogLevel: z
    .string()
    .trim()
    .toUpperCase()
    .pipe(z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']))
    .default('INFO'),
  queueSize,
});

export const kafkaSinkConfigSchema = z.object({
  brokers: z
    .string()
    .transform((value) => value.split(',').map((broker) => broker.trim()).filter((broker) => broker !== ''))
    .pipe(z.array(z.string()).min(1, 'At least one Kafka broker is required')),
  topic: z.string().min(1).default('udplog'),
  clientId: z.string().min(1).optional(),
  sendEveryMsg: positiveInt.default(1000),
  sendEveryMs: positiveInt.default(5000),
  queueSize,
});

export const redisSinkConfigSchema = z.object({
  hosts: z
    .string()
    .transform((value) => value.split(',').map((host) => host.trim()).filter((host) => host !== ''))
    .pipe(z.array(z.string()).min(1, 'At least one Redis host is required')),
  port: port.default(6379),
  key: z.string().min(1).default('udplog'),
  queueSize,
});

export const backoffConfigSchema = z
  .object({
    minDelayMs: positiveInt.default(1000),
    maxDelayMs: positiveInt.default(30_000),
    factor: z.coerce.number().min(1).default(2),
    maxAttempt: positiveInt.default(16),
  })
  .refine((value) => value.maxDelayMs >= value.minDelayMs, {
    message: 'maxDelayMs must be >= minDelayMs',
    path: ['maxDelayMs'],
  });

export const statsConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port,
});

/**
 * Full daemon configuration.
 *
 * Each optional section enables one sink or surface: a missing `amqp`
 * section means no broker sink, and so on. Values arrive as strings from
 * the environment and are coerced here.
 */
export const daemonConfigSchema = z.object({
  listener: listenerConfigSchema,
  syslog: syslogConfigSchema.optional(),
  amqp: amqpSinkConfigSchema.optional(),
  rpc: rpcSinkConfigSchema.optional(),
  kafka: kafkaSinkConfigSchema.optional(),
  redis: redisSinkConfigSchema.optional(),
  overflowPolicy: z.enum(OVERFLOW_POLICIES).default('drop-oldest'),
  backoff: backoffConfigSchema,
  shutdownTimeoutMs: positiveInt.default(2000),
  verbose: flag.default('false'),
  stats: statsConfigSchema.optional(),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type DaemonConfig = z.infer<typeof daemonConfigSchema>;
export type AmqpSinkConfig = z.infer<typeof amqpSinkConfigSchema>;
export type RpcSinkConfig = z.infer<typeof rpcSinkConfigSchema>;
export type KafkaSinkConfig = z.infer<typeof kafkaSinkConfigSchema>;
export type RedisSinkConfig = z.infer<typeof redisSinkConfigSchema>;
export type SyslogConfig = z.infer<typeof syslogConfigSchema>;
