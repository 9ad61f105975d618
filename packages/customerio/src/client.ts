import { type Logger, getLogger } from '@customerio-async/logger';
import { err, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import { type ClientConfig, type ClientConfigInput, parseClientConfig } from './config.js';
import { pathSegment } from './core/http-utils.js';
import { type DispatcherEffects, RequestDispatcher } from './dispatcher.js';
import { Customer, type CustomerParams } from './domain/customer.js';
import { customerIdsSchema, eventSchema, firstIssueMessage, segmentIdSchema } from './domain/schemas.js';
import { Trigger, type TriggerParams } from './domain/trigger.js';
import { InvalidArgumentError } from './errors.js';
import { RateLimiter, type RateLimiterStatus } from './rate-limiter.js';
import type {
  ApiRequest,
  DispatchHooks,
  DispatchOptions,
  DispatchResult,
  EndpointClass,
  JsonCodec,
  RequestIssuer,
} from './types.js';

export interface CustomerIoClientOptions extends ClientConfigInput {
  codec?: JsonCodec | undefined;
  hooks?: DispatchHooks | undefined;
}

export interface CustomerEvent {
  data?: Record<string, unknown> | undefined;
  name: string;
}

/**
 * Client for the Customer.io Tracking and Regular APIs.
 *
 * Owns one rate limiter per endpoint class and the dispatcher that routes
 * every request through it. Configuration is validated on construction.
 */
export class CustomerIoClient implements RequestIssuer {
  readonly config: ClientConfig;
  private readonly dispatcher: RequestDispatcher;
  private readonly limiters: Record<EndpointClass, RateLimiter>;
  private readonly logger: Logger;
  private readonly agent: Agent | undefined;

  private closePromise?: Promise<void>;

  /**
   * @throws ConfigurationError when credentials are missing or any setting is invalid
   */
  constructor(options: CustomerIoClientOptions, effects?: Partial<DispatcherEffects>) {
    const { codec, hooks, ...configInput } = options;
    this.config = parseClientConfig(configInput);
    this.logger = getLogger('CustomerIoClient');

    this.limiters = {
      api: new RateLimiter('api', this.config.rateLimits.api),
      tracking: new RateLimiter('tracking', this.config.rateLimits.tracking),
    };

    // Only build the pooled agent when no executor is injected
    let execute = effects?.execute;
    if (!execute) {
      const agent = new Agent({
        bodyTimeout: this.config.timeoutMs,
        connections: 4,
        headersTimeout: this.config.timeoutMs,
        keepAliveTimeout: 10_000,
        pipelining: 1,
      });
      this.agent = agent;
      execute = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }

    this.dispatcher = new RequestDispatcher(
      {
        codec,
        credentials: { apiKey: this.config.apiKey, siteId: this.config.siteId },
        endpoints: this.config.endpoints,
        hooks,
        limiters: this.limiters,
        timeoutMs: this.config.timeoutMs,
        userAgent: this.config.userAgent,
      },
      { execute, now: effects?.now ?? (() => Date.now()) }
    );

    this.logger.debug(
      {
        endpoints: this.config.endpoints,
        rateLimits: this.config.rateLimits,
        timeoutMs: this.config.timeoutMs,
      },
      'Customer.io client initialized'
    );
  }

  get siteId(): string {
    return this.config.siteId;
  }

  get apiKey(): string {
    return this.config.apiKey;
  }

  /**
   * Send a request to the Behavioral Tracking API (people, events, segments).
   */
  trackingRequest<T>(request: ApiRequest, options: DispatchOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }): DispatchResult<T>;
  trackingRequest(request: ApiRequest, options?: DispatchOptions): DispatchResult;
  trackingRequest(request: ApiRequest, options: DispatchOptions = {}): DispatchResult {
    return this.dispatcher.dispatch('tracking', request, options);
  }

  /**
   * Send a request to the Regular API (API-triggered broadcasts).
   */
  apiRequest<T>(request: ApiRequest, options: DispatchOptions<T> & { schema: ZodType<T, ZodTypeDef, unknown> }): DispatchResult<T>;
  apiRequest(request: ApiRequest, options?: DispatchOptions): DispatchResult;
  apiRequest(request: ApiRequest, options: DispatchOptions = {}): DispatchResult {
    return this.dispatcher.dispatch('api', request, options);
  }

  getRateLimitStatus(): Record<EndpointClass, RateLimiterStatus> {
    return {
      api: this.limiters.api.getStatus(),
      tracking: this.limiters.tracking.getStatus(),
    };
  }

  /**
   * Track an anonymous event.
   */
  async emitEvent(event: CustomerEvent): Promise<Result<void, Error>> {
    const parsed = eventSchema.safeParse(event);
    if (!parsed.success) {
      return err(new InvalidArgumentError(firstIssueMessage(parsed.error)));
    }

    const body = { name: event.name, ...(event.data === undefined ? {} : { data: event.data }) };
    const result = await this.trackingRequest({ body, method: 'POST', path: 'events' });
    return result.map(() => undefined);
  }

  /**
   * Add people to a manual segment.
   */
  addToSegment(segmentId: number | string, customerIds: string[]): Promise<Result<void, Error>> {
    return this.updateSegment(segmentId, customerIds, 'add_customers');
  }

  /**
   * Remove people from a manual segment.
   */
  removeFromSegment(segmentId: number | string, customerIds: string[]): Promise<Result<void, Error>> {
    return this.updateSegment(segmentId, customerIds, 'remove_customers');
  }

  newCustomer(params: CustomerParams): Customer {
    return new Customer(this, params);
  }

  newTrigger(params: TriggerParams): Trigger {
    return new Trigger(this, params);
  }

  /**
   * Retrieve a previously activated trigger.
   */
  findTrigger(campaignId: number | string, triggerId: number | string): Promise<Result<Trigger, Error>> {
    return Trigger.find(this, campaignId, triggerId);
  }

  /**
   * Close pooled connections of the default transport. Idempotent.
   */
  async close(): Promise<void> {
    if (!this.agent) {
      return;
    }

    const agent = this.agent;
    this.closePromise ??= (async () => {
      this.logger.debug('Closing HTTP agent connections');
      await agent.close();
      this.logger.debug('HTTP agent closed successfully');
    })();

    return this.closePromise;
  }

  private async updateSegment(
    segmentId: number | string,
    customerIds: string[],
    action: 'add_customers' | 'remove_customers'
  ): Promise<Result<void, Error>> {
    if (!segmentIdSchema.safeParse(segmentId).success) {
      return err(new InvalidArgumentError('Missing required argument: segmentId'));
    }
    if (!customerIdsSchema.safeParse(customerIds).success) {
      return err(new InvalidArgumentError('Invalid value for customerIds'));
    }

    const result = await this.trackingRequest({
      body: { ids: customerIds },
      method: 'POST',
      path: `segments/${pathSegment(segmentId)}/${action}`,
    });
    return result.map(() => undefined);
  }
}
