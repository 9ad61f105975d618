// Pure outcome classification: transport outcome -> payload or tagged error

import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { CustomerIoApiError, type CustomerIoErrorKind, type RawResponse, getErrorMessage } from '../errors.js';
import type { JsonCodec, RequestContext } from '../types.js';

import { formatStatusLine, jsonCodec } from './http-utils.js';
import type { TransportOutcome } from './types.js';

export interface ClassifyOptions<T = unknown> {
  codec?: JsonCodec | undefined;
  schema?: ZodType<T, ZodTypeDef, unknown> | undefined;
}

const STATUS_KINDS: ReadonlyMap<number, CustomerIoErrorKind> = new Map<number, CustomerIoErrorKind>([
  [400, 'INVALID_REQUEST'],
  [401, 'INVALID_API_KEY'],
  [404, 'RESOURCE_NOT_FOUND'],
  [500, 'INTERNAL_SERVER_ERR'],
  [502, 'INTERNAL_SERVER_ERR'],
  [503, 'INTERNAL_SERVER_ERR'],
  [504, 'INTERNAL_SERVER_ERR'],
]);

const MAX_REPORTED_ISSUES = 5;

/**
 * Error kind for an HTTP status, or undefined for 2xx.
 */
export const kindForStatus = (status: number): CustomerIoErrorKind | undefined => {
  if (status >= 200 && status < 300) {
    return undefined;
  }
  return STATUS_KINDS.get(status) ?? 'UNEXPECTED_HTTP_CODE';
};

/**
 * Classify the outcome of one dispatched request.
 *
 * Precedence: transport failures pass through untouched, then the HTTP status
 * decides the error kind, and only a 2xx body is decoded (and validated when
 * a schema is given).
 */
export function classifyOutcome<T>(
  outcome: TransportOutcome,
  request: RequestContext,
  options: ClassifyOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }
): Result<T, Error>;
export function classifyOutcome(
  outcome: TransportOutcome,
  request: RequestContext,
  options?: ClassifyOptions
): Result<unknown, Error>;
export function classifyOutcome(
  outcome: TransportOutcome,
  request: RequestContext,
  options: ClassifyOptions = {}
): Result<unknown, Error> {
  if (outcome.type === 'failure') {
    return err(outcome.error);
  }

  const statusLine = formatStatusLine(outcome.status, outcome.statusText);
  const response: RawResponse = { body: outcome.body, status: outcome.status, statusLine };
  const context = { ...request, response };

  const kind = kindForStatus(outcome.status);
  if (kind === 'UNEXPECTED_HTTP_CODE') {
    return err(new CustomerIoApiError(kind, context, `UNEXPECTED_HTTP_CODE: ${statusLine}`));
  }
  if (kind !== undefined) {
    return err(new CustomerIoApiError(kind, context));
  }

  const codec = options.codec ?? jsonCodec;
  let payload: unknown;
  try {
    payload = codec.decode(outcome.body);
  } catch (error) {
    const detail = getErrorMessage(error);
    return err(
      new CustomerIoApiError('UNEXPECTED_RESPONSE_FORMAT', { ...context, detail }, `UNEXPECTED_RESPONSE_FORMAT: ${detail}`)
    );
  }

  if (!options.schema) {
    return ok(payload);
  }

  const parsed = options.schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, MAX_REPORTED_ISSUES)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    const detail = `Response validation failed: ${issues}`;
    return err(
      new CustomerIoApiError('UNEXPECTED_RESPONSE_FORMAT', { ...context, detail }, `UNEXPECTED_RESPONSE_FORMAT: ${detail}`)
    );
  }

  return ok(parsed.data);
}
