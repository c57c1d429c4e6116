/**
 * Error Types for mic-bridge
 *
 * Every error raised by the bridge extends BridgeError so callers can tell
 * bridge failures apart from programming errors with a single instanceof.
 */

export class BridgeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'BridgeError';
  }
}

/**
 * A wire message that could not be decoded. Recoverable: the connection
 * manager counts these and only reconnects after several in a row.
 */
export class BadMessageError extends BridgeError {
  /** The offending bytes, as far as they were read */
  readonly raw: Buffer;

  constructor(message: string, raw: Buffer = Buffer.alloc(0), options?: ErrorOptions) {
    super(message, options);
    this.name = 'BadMessageError';
    this.raw = raw;
  }
}

/**
 * The candidate target did not answer the validation handshake with a
 * usable client-info message.
 */
export class HandshakeError extends BridgeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'HandshakeError';
  }
}

/** Socket-level failure: reset, refused, broken pipe. Ends the session. */
export class TransportError extends BridgeError {
  readonly code?: string;

  constructor(message: string, options?: ErrorOptions & { code?: string }) {
    super(message, options);
    this.name = 'TransportError';
    this.code = options?.code;
  }
}

export class ConnectionTimeoutError extends TransportError {
  constructor(target: string, timeoutMs: number) {
    super(`Connection to ${target} timed out after ${timeoutMs}ms`, { code: 'ETIMEDOUT' });
    this.name = 'ConnectionTimeoutError';
  }
}

export class ReadTimeoutError extends BridgeError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'ReadTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ConfigError extends BridgeError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}

/**
 * Node reports aborted operations with an error named AbortError, whether it
 * came from an AbortSignal reason or from node:timers/promises.
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
