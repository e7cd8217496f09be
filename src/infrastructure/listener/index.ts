export { DatagramListener } from './datagram-listener.js';
export type { ListenerOptions, ListenerStats } from './datagram-listener.js';
export { UdpLogListener } from './udp-listener.js';
export { SyslogListener } from './syslog-listener.js';
export type { SyslogListenerOptions } from './syslog-listener.js';
