export { decode, encode, toPayload, toRecord, jsonValueSchema } from './protocol-codec.js';
export type { DecodeResult } from './protocol-codec.js';
export { parseSyslog, parseSyslogTimestamp, parsePriority } from './syslog-parser.js';
export type { SyslogParseOptions, SyslogTimezone } from './syslog-parser.js';
export { Backlog, OVERFLOW_POLICIES } from './backlog.js';
export type { OverflowPolicy, PushResult } from './backlog.js';
export { BackoffSchedule, DEFAULT_BACKOFF } from './backoff.js';
export type { BackoffOptions } from './backoff.js';
export { Sink } from './sink.js';
export type { SinkKind, SinkOptions, SinkStats, SinkCounters, SendResult, BacklogEntry } from './sink.js';
export { BatchedSink } from './batched-sink.js';
export type { BatchedSinkOptions } from './batched-sink.js';
export { Router } from './router.js';
export type { EventAcceptor, RouterStats } from './router.js';
export { Supervisor } from './supervisor.js';
export { daemonConfigSchema, DEFAULT_QUEUE_SIZE, LOG_LEVEL_RANKS } from './config-schema.js';
export type { DaemonConfig, LogLevelName } from './config-schema.js';
