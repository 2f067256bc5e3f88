/** Configuration was missing or invalid; the provider is never created. */
export class ConfigError extends Error {
  public readonly field?: string;

  constructor(message: string, field?: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
    this.field = field;
  }
}

export type TransportErrorKind = 'timeout' | 'connection' | 'status';

interface OperationErrorInit {
  operation: string;
  url: string;
  cause?: unknown;
}

/** Failure of a single remote operation, tagged with where it was headed. */
export abstract class OperationError extends Error {
  public readonly operation: string;
  public readonly url: string;

  constructor(message: string, init: OperationErrorInit) {
    super(`${init.operation} ${init.url}: ${message}`, { cause: init.cause });
    this.operation = init.operation;
    this.url = init.url;
  }
}

/** The remote service could not be reached, did not answer in time, or refused the request. */
export class TransportError extends OperationError {
  public readonly kind: TransportErrorKind;
  public readonly status?: number;

  constructor(kind: TransportErrorKind, message: string, init: OperationErrorInit & { status?: number }) {
    super(message, init);
    this.name = 'TransportError';
    this.kind = kind;
    this.status = init.status;
  }
}

/** The remote service answered with a body that is not the expected JSON. */
export class DecodeError extends OperationError {
  constructor(message: string, init: OperationErrorInit) {
    super(message, init);
    this.name = 'DecodeError';
  }
}

/** The request payload could not be serialized; nothing was sent. */
export class EncodeError extends OperationError {
  constructor(message: string, init: OperationErrorInit) {
    super(message, init);
    this.name = 'EncodeError';
  }
}

/** A caller-supplied value cannot be sent as a URL path segment; nothing was sent. */
export class InvalidPathSegmentError extends RangeError {
  public readonly segment: string;

  constructor(segment: string, message: string) {
    super(message);
    this.name = 'InvalidPathSegmentError';
    this.segment = segment;
  }
}

/** An operation was invoked on a capability the configuration left disabled. */
export class UnsupportedCapabilityError extends Error {
  public readonly capability: string;

  constructor(capability: string) {
    super(`${capability} is not supported by this provider configuration`);
    this.name = 'UnsupportedCapabilityError';
    this.capability = capability;
  }
}
