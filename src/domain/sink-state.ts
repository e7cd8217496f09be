/**
 * Connection state of a single sink.
 *
 * `backoff` carries the consecutive failure count and when the next
 * connection attempt is due (epoch milliseconds).
 */
export type SinkState =
  | { readonly kind: 'disconnected' }
  | { readonly kind: 'connecting' }
  | { readonly kind: 'connected' }
  | { readonly kind: 'backoff'; readonly attempt: number; readonly delayMs: number; readonly retryAt: number };

export type SinkStateKind = SinkState['kind'];

export const DISCONNECTED: SinkState = { kind: 'disconnected' };
export const CONNECTING: SinkState = { kind: 'connecting' };
export const CONNECTED: SinkState = { kind: 'connected' };

/** Renders a state the way logs and the stats endpoint show it, e.g. `backoff(3)`. */
export function describeState(state: SinkState): string {
  return state.kind === 'backoff' ? `backoff(${state.attempt})` : state.kind;
}
