/**
 * Error taxonomy for the EWPE session engine
 */

export type EwpeErrorKind =
  | 'crypto'
  | 'serialization'
  | 'io'
  | 'timeout'
  | 'not-found'
  | 'not-bound'
  | 'invalid-variable'
  | 'invalid-value'
  | 'config';

/**
 * Base class of every error raised by the engine.
 * `kind` lets front ends switch without `instanceof` chains.
 */
export class EwpeError extends Error {
  constructor(
    public readonly kind: EwpeErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Base64 or AES failure */
export class CryptoError extends EwpeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('crypto', message, options);
  }
}

/** Malformed JSON, or JSON that does not have the expected shape */
export class SerializationError extends EwpeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('serialization', message, options);
  }
}

export class IoError extends EwpeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('io', message, options);
  }
}

export class TimeoutError extends EwpeError {
  constructor(public readonly timeoutMs: number) {
    super('timeout', `No response within ${timeoutMs}ms`);
  }
}

export class NotFoundError extends EwpeError {
  constructor(public readonly target: string) {
    super('not-found', `Device not found: ${target}`);
  }
}

export class NotBoundError extends EwpeError {
  constructor(public readonly mac: string) {
    super('not-bound', `Device is not bound: ${mac}`);
  }
}

export class InvalidVariableError extends EwpeError {
  constructor(public readonly variable: string, reason = 'unknown variable') {
    super('invalid-variable', `Invalid variable ${variable}: ${reason}`);
  }
}

export class InvalidValueError extends EwpeError {
  constructor(
    public readonly variable: string,
    public readonly literal: string,
  ) {
    super('invalid-value', `Invalid value for ${variable}: ${literal}`);
  }
}

export class ConfigError extends EwpeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
  }
}

/**
 * Status code a front end answers with when an operation fails.
 * not found -> 404, timeout and socket failures -> 503, anything else -> 400
 */
export function httpStatusFor(err: unknown): 400 | 404 | 503 {
  if (!(err instanceof EwpeError)) {
    return 400;
  }
  switch (err.kind) {
  case 'not-found':
    return 404;
  case 'timeout':
  case 'io':
    return 503;
  default:
    return 400;
  }
}

/**
 * Message text of anything thrown
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
