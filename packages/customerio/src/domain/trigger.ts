import { err, ok, type Result } from 'neverthrow';

import { pathSegment } from '../core/http-utils.js';
import { InvalidArgumentError } from '../errors.js';
import type { RequestIssuer } from '../types.js';

import {
  activateTriggerResponseSchema,
  compact,
  idSchema,
  triggerErrorsResponseSchema,
  triggerResponseSchema,
} from './schemas.js';

export interface TriggerParams {
  campaignId: number | string;
  data?: Record<string, unknown> | undefined;
  emailAddDuplicates?: boolean | undefined;
  emailIgnoreMissing?: boolean | undefined;
  emails?: string[] | undefined;
  id?: string | undefined;
  idIgnoreMissing?: boolean | undefined;
  ids?: string[] | undefined;
  recipients?: Record<string, unknown> | undefined;
}

/**
 * An API-triggered broadcast. `activate()` starts it through the Regular
 * API and remembers the trigger id the service assigns.
 */
export class Trigger {
  readonly campaignId: number | string;
  readonly params: Omit<TriggerParams, 'campaignId' | 'id'>;
  private triggerId: string | undefined;

  constructor(
    private readonly client: RequestIssuer,
    params: TriggerParams
  ) {
    const { campaignId, id, ...rest } = params;
    this.campaignId = campaignId;
    this.triggerId = id;
    this.params = rest;
  }

  static async find(
    client: RequestIssuer,
    campaignId: number | string,
    triggerId: number | string
  ): Promise<Result<Trigger, Error>> {
    if (!idSchema.safeParse(campaignId).success) {
      return err(new InvalidArgumentError('Missing required argument: campaignId'));
    }
    if (!idSchema.safeParse(triggerId).success) {
      return err(new InvalidArgumentError('Missing required argument: triggerId'));
    }

    const result = await client.apiRequest(
      { method: 'GET', path: `campaigns/${pathSegment(campaignId)}/triggers/${pathSegment(triggerId)}` },
      { schema: triggerResponseSchema }
    );

    return result.map(
      (trigger) =>
        new Trigger(client, {
          campaignId,
          data: trigger.data,
          emails: trigger.emails,
          id: String(trigger.id),
          ids: trigger.ids,
          recipients: trigger.recipients,
        })
    );
  }

  get id(): string | undefined {
    return this.triggerId;
  }

  get isActivated(): boolean {
    return this.triggerId !== undefined;
  }

  /**
   * Start the broadcast. Resolves with the trigger id assigned by the API.
   */
  async activate(): Promise<Result<string, Error>> {
    if (this.triggerId !== undefined) {
      return err(new InvalidArgumentError(`Trigger ${this.triggerId} has already been activated`));
    }
    if (!idSchema.safeParse(this.campaignId).success) {
      return err(new InvalidArgumentError('Missing required argument: campaignId'));
    }

    const body = compact({
      data: this.params.data,
      email_add_duplicates: this.params.emailAddDuplicates,
      email_ignore_missing: this.params.emailIgnoreMissing,
      emails: this.params.emails,
      id_ignore_missing: this.params.idIgnoreMissing,
      ids: this.params.ids,
      recipients: this.params.recipients,
    });

    const result = await this.client.apiRequest(
      { body, method: 'POST', path: `campaigns/${pathSegment(this.campaignId)}/triggers` },
      { schema: activateTriggerResponseSchema }
    );
    if (result.isErr()) {
      return err(result.error);
    }

    this.triggerId = String(result.value.id);
    return ok(this.triggerId);
  }

  /**
   * Errors the service recorded while processing this trigger.
   */
  async getErrors(): Promise<Result<unknown[], Error>> {
    if (this.triggerId === undefined) {
      return err(new InvalidArgumentError('Trigger has not been activated'));
    }

    const result = await this.client.apiRequest(
      {
        method: 'GET',
        path: `campaigns/${pathSegment(this.campaignId)}/triggers/${pathSegment(this.triggerId)}/errors`,
      },
      { schema: triggerErrorsResponseSchema }
    );
    return result.map((response) => response.errors);
  }
}
