import { err, type Result } from 'neverthrow';

import { pathSegment } from '../core/http-utils.js';
import { InvalidArgumentError } from '../errors.js';
import type { RequestIssuer } from '../types.js';

import { compact, deviceSchema, eventSchema, firstIssueMessage, idSchema, toUnixSeconds } from './schemas.js';

export interface CustomerParams {
  attributes?: Record<string, unknown> | undefined;
  createdAt?: Date | number | undefined;
  email?: string | undefined;
  id: string;
}

export interface DeviceParams {
  id: string;
  lastUsed?: Date | number | undefined;
  platform: 'ios' | 'android';
}

/**
 * A person in the Tracking API. Every method maps to exactly one tracking
 * request against `customers/{id}`.
 */
export class Customer {
  readonly attributes: Record<string, unknown>;
  readonly createdAt: Date | number | undefined;
  readonly email: string | undefined;
  readonly id: string;

  constructor(
    private readonly client: RequestIssuer,
    params: CustomerParams
  ) {
    this.id = params.id;
    this.email = params.email;
    this.createdAt = params.createdAt;
    this.attributes = params.attributes ?? {};
  }

  /**
   * Create the customer or update its attributes. `email` and `createdAt`
   * override same-named attributes only when they are set.
   */
  async upsert(): Promise<Result<void, Error>> {
    const body = compact({ ...this.attributes });
    if (this.createdAt !== undefined) {
      body['created_at'] = toUnixSeconds(this.createdAt);
    }
    if (this.email !== undefined) {
      body['email'] = this.email;
    }
    return this.send('PUT', '', body);
  }

  async delete(): Promise<Result<void, Error>> {
    return this.send('DELETE', '');
  }

  async emitEvent(name: string, data?: Record<string, unknown>): Promise<Result<void, Error>> {
    const parsed = eventSchema.safeParse({ data, name });
    if (!parsed.success) {
      return err(new InvalidArgumentError(firstIssueMessage(parsed.error)));
    }
    return this.send('POST', '/events', compact({ data, name }));
  }

  async setDevice(device: DeviceParams): Promise<Result<void, Error>> {
    if (!deviceSchema.safeParse(device).success) {
      return err(new InvalidArgumentError('Invalid value for device'));
    }

    const body = {
      device: compact({
        id: device.id,
        last_used: device.lastUsed === undefined ? undefined : toUnixSeconds(device.lastUsed),
        platform: device.platform,
      }),
    };
    return this.send('PUT', '/devices', body);
  }

  async deleteDevice(deviceId: string): Promise<Result<void, Error>> {
    if (!idSchema.safeParse(deviceId).success) {
      return err(new InvalidArgumentError('Missing required argument: deviceId'));
    }
    return this.send('DELETE', `/devices/${pathSegment(deviceId)}`);
  }

  async suppress(): Promise<Result<void, Error>> {
    return this.send('POST', '/suppress');
  }

  async unsuppress(): Promise<Result<void, Error>> {
    return this.send('POST', '/unsuppress');
  }

  private async send(
    method: 'POST' | 'PUT' | 'DELETE',
    suffix: string,
    body?: Record<string, unknown>
  ): Promise<Result<void, Error>> {
    if (!idSchema.safeParse(this.id).success) {
      return err(new InvalidArgumentError('Missing required argument: id'));
    }

    const result = await this.client.trackingRequest({ body, method, path: `customers/${pathSegment(this.id)}${suffix}` });
    return result.map(() => undefined);
  }
}
