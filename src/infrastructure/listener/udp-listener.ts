import { decode } from '../../application/protocol-codec.js';
import type { DecodeResult } from '../../application/protocol-codec.js';
import { DatagramListener } from './datagram-listener.js';

/** Listener for the native `<category>: <json>` protocol. */
export class UdpLogListener extends DatagramListener {
  readonly name = 'udplog';

  protected decodeDatagram(datagram: Buffer): DecodeResult {
    return decode(datagram);
  }
}
