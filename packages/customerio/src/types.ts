import type { Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import type { CustomerIoErrorKind } from './errors.js';

/** Named grouping of routes sharing one base URL and one rate-limit budget. */
export type EndpointClass = 'tracking' | 'api';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type RequestBody = Record<string, unknown> | unknown[];

/**
 * A logical request against one endpoint class. GET never carries a body;
 * POST and PUT without a body are sent with an empty one.
 */
export type ApiRequest =
  | { body?: undefined; method: 'GET'; path: string }
  | { body?: RequestBody | undefined; method: 'POST' | 'PUT' | 'DELETE'; path: string };

/** The request descriptor attached to every classified error. */
export interface RequestContext {
  body: RequestBody | undefined;
  method: HttpMethod;
  path: string;
}

export interface HttpExecutorRequest {
  body?: string | undefined;
  headers: Record<string, string>;
  method: HttpMethod;
  signal: AbortSignal;
}

export interface HttpExecutorResponse {
  status: number;
  statusText: string;
  text(): Promise<string>;
}

/**
 * Opaque transport capability. Resolves once a response arrives (any status)
 * and rejects only when no HTTP response was produced.
 */
export type HttpExecutor = (url: string, init: HttpExecutorRequest) => Promise<HttpExecutorResponse>;

export interface JsonCodec {
  decode(text: string): unknown;
  encode(value: unknown): string;
}

export type ReplenishPolicy = 'rolling' | 'fixed-window';

export interface RateLimitConfig {
  capacity: number;
  intervalMs: number;
  policy: ReplenishPolicy;
}

export interface Credentials {
  apiKey: string;
  siteId: string;
}

export interface DispatchOptions<T = unknown> {
  /** Validates the decoded payload; a mismatch is classified as UNEXPECTED_RESPONSE_FORMAT. */
  schema?: ZodType<T, ZodTypeDef, unknown> | undefined;
  /** Abandons the request while queued for admission or in flight. */
  signal?: AbortSignal | undefined;
}

export type DispatchResult<T = unknown> = Promise<Result<T, Error>>;

export interface DispatchHooks {
  /** Called once the limiter grants the request its slot. */
  onAdmitted?: (event: { endpointClass: EndpointClass; method: HttpMethod; path: string; waitedMs: number }) => void;

  /**
   * Called exactly once per dispatched request with its terminal state.
   * `kind` is absent for transport failures and cancelled admissions.
   */
  onSettled?: (event: {
    durationMs: number;
    endpointClass: EndpointClass;
    kind?: CustomerIoErrorKind | undefined;
    method: HttpMethod;
    outcome: 'succeeded' | 'failed' | 'cancelled';
    path: string;
  }) => void;
}

/** Entry points used by the domain helpers. */
export interface RequestIssuer {
  apiRequest<T>(request: ApiRequest, options: DispatchOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }): DispatchResult<T>;
  apiRequest(request: ApiRequest, options?: DispatchOptions): DispatchResult;
  trackingRequest<T>(
    request: ApiRequest,
    options: DispatchOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }
  ): DispatchResult<T>;
  trackingRequest(request: ApiRequest, options?: DispatchOptions): DispatchResult;
}
