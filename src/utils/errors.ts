import { TransportErrorKind } from '../types';

/**
 * Get human-readable message for a transport error kind
 */
export function getTransportErrorMessage(kind: TransportErrorKind): string {
  switch (kind) {
    case TransportErrorKind.CONNECT_FAILED:
      return 'Could not connect to the device';
    case TransportErrorKind.DEVICE_NOT_FOUND:
      return 'Device not found';
    case TransportErrorKind.LINK_LOST:
      return 'Connection to the device was lost';
    case TransportErrorKind.WRITE_NOT_ACKNOWLEDGED:
      return 'Characteristic write was not acknowledged';
    case TransportErrorKind.CHARACTERISTIC_MISSING:
      return 'Characteristic not found on the device';
    default:
      return 'Transport error';
  }
}

/**
 * Base class for failures reported by the BLE transport.
 * Timeouts waiting for a notification are not transport errors: they resolve to LedState.UNKNOWN.
 */
export class TransportError extends Error {
  public readonly name: string = 'TransportError';

  constructor(
    public readonly kind: TransportErrorKind,
    detail?: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(detail ? `${getTransportErrorMessage(kind)}: ${detail}` : getTransportErrorMessage(kind));
    // Maintains proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      kind: this.kind,
      context: this.context
    };
  }
}

/**
 * The transport could not establish a link, or lost it before an operation began
 */
export class ConnectionFailureError extends TransportError {
  public readonly name: string = 'ConnectionFailureError';

  constructor(
    kind: TransportErrorKind.CONNECT_FAILED | TransportErrorKind.DEVICE_NOT_FOUND | TransportErrorKind.LINK_LOST,
    detail?: string,
    context?: Record<string, unknown>
  ) {
    super(kind, detail, context);
  }
}

/**
 * A characteristic write did not receive link-layer acknowledgment. Never retried.
 */
export class WriteFailureError extends TransportError {
  public readonly name: string = 'WriteFailureError';

  constructor(
    public readonly characteristic: string,
    cause?: unknown,
    kind: TransportErrorKind.WRITE_NOT_ACKNOWLEDGED | TransportErrorKind.CHARACTERISTIC_MISSING = TransportErrorKind.WRITE_NOT_ACKNOWLEDGED
  ) {
    super(kind, `${characteristic}${cause !== undefined ? ` (${describeCause(cause)})` : ''}`, { characteristic });
  }
}

export class SessionBusyError extends Error {
  public readonly name = 'SessionBusyError';

  constructor(public readonly operation: string, public readonly inFlight: string) {
    super(`Cannot start ${operation} while ${inFlight} is in progress`);
  }
}

export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError';

  constructor(public readonly field: string, value: string) {
    super(`Invalid ${field}: "${value}"`);
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
