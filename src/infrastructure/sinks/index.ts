export { AmqpSink, toMessage } from './amqp-sink.js';
export type { AmqpSinkOptions, PublishMode } from './amqp-sink.js';
export { BatchRpcSink } from './batch-rpc-sink.js';
export type { BatchRpcSinkOptions, LogEntry } from './batch-rpc-sink.js';
export { KafkaSink } from './kafka-sink.js';
export type { KafkaSinkOptions } from './kafka-sink.js';
export { RedisSink } from './redis-sink.js';
export type { RedisSinkOptions } from './redis-sink.js';
export { ConsoleSink } from './console-sink.js';
export type { ConsoleSinkOptions } from './console-sink.js';
