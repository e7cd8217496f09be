/** Why a datagram could not be turned into an event. */
export type DecodeErrorKind = 'InvalidCategory' | 'InvalidPayload';

/**
 * A datagram that does not follow `<category>:<SP>?<json-object>`.
 *
 * Listeners count and drop these; they never leave the receive path.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;

  constructor(kind: DecodeErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DecodeError';
    this.kind = kind;
  }
}

/** A sink could not establish its backend connection. */
export class ConnectError extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConnectError';
    this.sink = sink;
  }
}

/** A backend refused or failed to acknowledge a delivery. */
export class SendError extends Error {
  readonly sink: string;

  constructor(sink: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SendError';
    this.sink = sink;
  }
}

/** Configuration could not be validated. Fatal at startup. */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Normalises anything thrown into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
