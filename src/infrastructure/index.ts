export { loadDaemonConfig } from './config/load-config.js';
export type { Env } from './config/load-config.js';
export { AmqpSink, BatchRpcSink, KafkaSink, RedisSink, ConsoleSink } from './sinks/index.js';
export { UdpLogListener, SyslogListener } from './listener/index.js';
export type { DatagramListener, ListenerStats } from './listener/index.js';
