import type { RequestContext } from './types.js';

export const CUSTOMERIO_ERROR_SOURCE = 'customerio';

export type CustomerIoErrorKind =
  | 'RESOURCE_NOT_FOUND'
  | 'INVALID_REQUEST'
  | 'INVALID_API_KEY'
  | 'INTERNAL_SERVER_ERR'
  | 'UNEXPECTED_HTTP_CODE'
  | 'UNEXPECTED_RESPONSE_FORMAT';

export interface RawResponse {
  body: string;
  status: number;
  statusLine: string;
}

export interface CustomerIoErrorContext extends RequestContext {
  /** Decode or schema failure, for UNEXPECTED_RESPONSE_FORMAT. */
  detail?: string | undefined;
  response: RawResponse;
}

/**
 * HTTP-domain failure of a dispatched request. Transport failures are never
 * wrapped in this class.
 */
export class CustomerIoApiError extends Error {
  readonly source = CUSTOMERIO_ERROR_SOURCE;

  constructor(
    public readonly kind: CustomerIoErrorKind,
    public readonly context: CustomerIoErrorContext,
    message: string = kind
  ) {
    super(message);
    this.name = 'CustomerIoApiError';
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: { message: string; path: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class RequestTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class AdmissionCancelledError extends Error {
  constructor(message = 'Admission cancelled before a slot was granted') {
    super(message);
    this.name = 'AdmissionCancelledError';
  }
}

export function isCustomerIoApiError(error: unknown): error is CustomerIoApiError {
  return error instanceof CustomerIoApiError;
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (error instanceof Error) {
    return error.message;
  }
  return defaultMessage ?? String(error);
}

/** Normalizes a thrown value without replacing genuine Error instances. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
