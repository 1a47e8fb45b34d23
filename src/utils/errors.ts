import { PushReceipt } from '../models/pushOptions';

export type PushClientErrorKind =
  | 'InitializeError'
  | 'BuildError'
  | 'SignError'
  | 'ClockError'
  | 'HeaderError'
  | 'TransportError'
  | 'InvalidResponseError'
  | 'HeaderDecodeError'
  | 'ServiceError';

/**
 * Base class of every failure surfaced by the push client.
 * `statusCode` is what the relay answers with when the error reaches the error handler.
 */
export abstract class PushClientError extends Error {
  abstract readonly kind: PushClientErrorKind;
  readonly statusCode: number;

  constructor(message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.statusCode = statusCode;
  }
}

export class InitializeError extends PushClientError {
  readonly kind = 'InitializeError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Error when initializing client: ${message}`, 500, options);
  }
}

export type JsonObjectErrorKind = 'Serialization' | 'NotAnObject' | 'ReservedKey';

/**
 * Raised while coercing caller data into a JSON object.
 */
export class JsonObjectError extends Error {
  readonly kind: JsonObjectErrorKind;

  constructor(kind: JsonObjectErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JsonObjectError';
    this.kind = kind;
  }
}

export class BuildError extends PushClientError {
  readonly kind = 'BuildError';

  constructor(cause: JsonObjectError) {
    super(`Unable to build payload: ${cause.message}`, 400, { cause });
  }
}

export class SignError extends PushClientError {
  readonly kind = 'SignError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Error when signing token: ${message}`, 500, options);
  }
}

export class ClockError extends PushClientError {
  readonly kind = 'ClockError';

  constructor(message: string) {
    super(`System clock error: ${message}`, 500);
  }
}

export class HeaderError extends PushClientError {
  readonly kind = 'HeaderError';
  readonly header: string;

  constructor(header: string) {
    super(`Unable to build header ${header}`, 400);
    this.header = header;
  }
}

export class TransportError extends PushClientError {
  readonly kind = 'TransportError';

  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Transport failure: ${detail}`, 502, { cause });
  }
}

export class InvalidResponseError extends PushClientError {
  readonly kind = 'InvalidResponseError';

  constructor(message = 'Can not parse APNs server response', options?: { cause?: unknown }) {
    super(message, 502, options);
  }
}

export class HeaderDecodeError extends PushClientError {
  readonly kind = 'HeaderDecodeError';
  readonly header: string;

  constructor(header: string) {
    super(`Response header ${header} is not valid text`, 502);
    this.header = header;
  }
}

export class ServiceError extends PushClientError {
  readonly kind = 'ServiceError';
  readonly status: number;
  readonly reason: string;
  readonly timestamp?: number;
  readonly receipt: PushReceipt;

  constructor(status: number, reason: string, receipt: PushReceipt, timestamp?: number) {
    super(`Error from APNs server: ${reason}`, 502);
    this.status = status;
    this.reason = reason;
    this.receipt = receipt;
    if (timestamp !== undefined) {
      this.timestamp = timestamp;
    }
  }
}

export const isPushClientError = (error: unknown): error is PushClientError =>
  error instanceof PushClientError;
