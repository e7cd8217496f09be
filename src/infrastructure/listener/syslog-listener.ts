import { parseSyslog } from '../../application/syslog-parser.js';
import type { SyslogTimezone } from '../../application/syslog-parser.js';
import type { DecodeResult } from '../../application/protocol-codec.js';
import { DatagramListener } from './datagram-listener.js';
import type { ListenerOptions } from './datagram-listener.js';

export interface SyslogListenerOptions extends ListenerOptions {
  timezone: SyslogTimezone;
  hostnames?: Readonly<Record<string, string>> | undefined;
}

/**
 * Accepts RFC 3164 syslog datagrams so daemons that only speak syslog
 * can ship through the same sinks.
 */
export class SyslogListener extends DatagramListener {
  readonly name = 'syslog';

  private readonly timezone: SyslogTimezone;
  private readonly hostnames: Readonly<Record<string, string>> | undefined;

  constructor(options: SyslogListenerOptions) {
    super(options);
    this.timezone = options.timezone;
    this.hostnames = options.hostnames;
  }

  protected decodeDatagram(datagram: Buffer): DecodeResult {
    return parseSyslog(datagram, {
      now: () => Date.now(),
      timezone: this.timezone,
      hostnames: this.hostnames,
    });
  }
}
