import { type Logger, getLogger } from '@customerio-async/logger';
import { err, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { classifyOutcome } from './core/error-classifier.js';
import { basicAuthHeader, buildUrl, encodeRequestBody, jsonCodec, toRequestContext } from './core/http-utils.js';
import type { TransportOutcome } from './core/types.js';
import { InvalidArgumentError, RequestTimeoutError, getErrorMessage, isCustomerIoApiError, toError } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import type {
  ApiRequest,
  Credentials,
  DispatchHooks,
  DispatchOptions,
  EndpointClass,
  HttpExecutor,
  HttpMethod,
  HttpExecutorRequest,
  JsonCodec,
} from './types.js';

export interface RequestDispatcherConfig {
  codec?: JsonCodec | undefined;
  credentials: Credentials;
  endpoints: Record<EndpointClass, string>;
  hooks?: DispatchHooks | undefined;
  limiters: Record<EndpointClass, RateLimiter>;
  timeoutMs: number;
  userAgent: string;
}

/**
 * Side effects the dispatcher depends on, injectable for tests
 */
export interface DispatcherEffects {
  execute: HttpExecutor;
  now: () => number;
}

/**
 * Sequences every request through admission, transport and classification:
 * Pending -> Admitted -> Sent -> Succeeded | Failed. Nothing is retried; the
 * caller receives every classified error and transport failure as is.
 */
export class RequestDispatcher {
  private readonly codec: JsonCodec;
  private readonly logger: Logger;

  constructor(
    private readonly config: RequestDispatcherConfig,
    private readonly effects: DispatcherEffects
  ) {
    this.codec = config.codec ?? jsonCodec;
    this.logger = getLogger('RequestDispatcher');
  }

  async dispatch<T>(
    endpointClass: EndpointClass,
    request: ApiRequest,
    options: DispatchOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }
  ): Promise<Result<T, Error>>;
  async dispatch(endpointClass: EndpointClass, request: ApiRequest, options?: DispatchOptions): Promise<Result<unknown, Error>>;
  async dispatch(
    endpointClass: EndpointClass,
    request: ApiRequest,
    options: DispatchOptions = {}
  ): Promise<Result<unknown, Error>> {
    const { method, path } = request;
    const hooks = this.config.hooks;
    const logger = this.logger.child({ endpointClass, method, path });
    const startTime = this.effects.now();

    let body: string | undefined;
    try {
      body = encodeRequestBody(request, this.codec);
    } catch (error) {
      const failure = new InvalidArgumentError(`Request body could not be encoded: ${getErrorMessage(error)}`);
      logger.warn({ error: failure }, 'Request rejected before admission - Body encoding failed');
      hooks?.onSettled?.({ durationMs: this.effects.now() - startTime, endpointClass, method, outcome: 'failed', path });
      return err(failure);
    }

    const admission = await this.config.limiters[endpointClass].acquire(options.signal);
    if (admission.isErr()) {
      logger.debug(`Request abandoned before admission - Reason: ${admission.error.message}`);
      hooks?.onSettled?.({ durationMs: this.effects.now() - startTime, endpointClass, method, outcome: 'cancelled', path });
      return err(admission.error);
    }

    const waitedMs = this.effects.now() - startTime;
    logger.debug(`Request admitted - WaitedMs: ${waitedMs}`);
    hooks?.onAdmitted?.({ endpointClass, method, path, waitedMs });

    logger.debug('Request sent');
    const outcome = await this.send(buildUrl(this.config.endpoints[endpointClass], path), request.method, body, options.signal);
    const result = classifyOutcome(outcome, toRequestContext(request), { codec: this.codec, schema: options.schema });
    const durationMs = this.effects.now() - startTime;

    if (result.isOk()) {
      logger.debug(`Request succeeded - DurationMs: ${durationMs}`);
      hooks?.onSettled?.({ durationMs, endpointClass, method, outcome: 'succeeded', path });
      return result;
    }

    const kind = isCustomerIoApiError(result.error) ? result.error.kind : undefined;
    logger.warn(
      { error: result.error, kind, status: outcome.type === 'response' ? outcome.status : undefined },
      `Request failed - DurationMs: ${durationMs}, Error: ${result.error.message}`
    );
    hooks?.onSettled?.({ durationMs, endpointClass, kind, method, outcome: 'failed', path });
    return result;
  }

  private async send(
    url: string,
    method: HttpMethod,
    body: string | undefined,
    callerSignal: AbortSignal | undefined
  ): Promise<TransportOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(new RequestTimeoutError(this.config.timeoutMs)), this.config.timeoutMs);
    const forwardAbort = () => controller.abort(callerSignal?.reason);
    if (callerSignal?.aborted) {
      forwardAbort();
    } else {
      callerSignal?.addEventListener('abort', forwardAbort, { once: true });
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Authorization: basicAuthHeader(this.config.credentials),
      'User-Agent': this.config.userAgent,
    };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const init: HttpExecutorRequest = {
      headers,
      method,
      signal: controller.signal,
      ...(body === undefined ? {} : { body }),
    };

    try {
      const response = await this.effects.execute(url, init);
      const text = await response.text();
      return { body: text, status: response.status, statusText: response.statusText, type: 'response' };
    } catch (error) {
      return { error: toError(error), type: 'failure' };
    } finally {
      clearTimeout(timeoutId);
      callerSignal?.removeEventListener('abort', forwardAbort);
    }
  }
}
