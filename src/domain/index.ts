export type { JsonValue, EventFields, EventTimestamp, LogEvent, LogEventDraft } from './event.js';
export { CATEGORY_PATTERN, isValidCategory, createLogEvent, epochSeconds } from './event.js';
export type { DecodeErrorKind } from './errors.js';
export { DecodeError, ConnectError, SendError, ConfigError, toError } from './errors.js';
export type { SinkState, SinkStateKind } from './sink-state.js';
export { DISCONNECTED, CONNECTING, CONNECTED, describeState } from './sink-state.js';
