import { describe, expect, it, vi } from 'vitest';

import { CustomerIoClient } from '../client.js';
import { CustomerIoApiError } from '../errors.js';
import type { HttpExecutorRequest, HttpExecutorResponse } from '../types.js';

function createClient(...responses: [number, string][]) {
  const queue = [...responses];
  const execute = vi.fn((_url: string, _init: HttpExecutorRequest) => {
    const [status, body] = queue.shift() ?? [200, '{}'];
    return Promise.resolve<HttpExecutorResponse>({ status, statusText: '', text: () => Promise.resolve(body) });
  });
  const client = new CustomerIoClient({ apiKey: 'test-secret', siteId: 'site-1' }, { execute });
  return { client, execute };
}

describe('Trigger', () => {
  it('activates a broadcast and remembers the assigned id', async () => {
    const { client, execute } = createClient([200, '{"id":77}']);
    const trigger = client.newTrigger({
      campaignId: 5,
      data: { headline: 'Hello' },
      idIgnoreMissing: true,
      ids: ['cust-1'],
    });

    const result = await trigger.activate();

    expect(result.isOk() && result.value).toBe('77');
    expect(trigger.id).toBe('77');
    expect(trigger.isActivated).toBe(true);
    const [url, init] = execute.mock.calls[0] ?? [];
    expect(url).toBe('https://api.customer.io/v1/api/campaigns/5/triggers');
    expect(init?.body).toBe('{"data":{"headline":"Hello"},"id_ignore_missing":true,"ids":["cust-1"]}');
  });

  it('refuses to activate twice', async () => {
    const { client, execute } = createClient([200, '{"id":77}']);
    const trigger = client.newTrigger({ campaignId: 5 });

    await trigger.activate();
    const second = await trigger.activate();

    expect(second.isErr() && second.error.message).toBe('Trigger 77 has already been activated');
    expect(execute).toHaveBeenCalledOnce();
  });

  it('reports an activation response without an id as UNEXPECTED_RESPONSE_FORMAT', async () => {
    const { client } = createClient([200, '{"ok":true}']);
    const trigger = client.newTrigger({ campaignId: 5 });

    const result = await trigger.activate();

    expect(result.isErr() && result.error).toBeInstanceOf(CustomerIoApiError);
    expect(result.isErr() && result.error).toMatchObject({ kind: 'UNEXPECTED_RESPONSE_FORMAT' });
    expect(trigger.isActivated).toBe(false);
  });

  it('finds an existing trigger through the Regular API', async () => {
    const { client, execute } = createClient([200, '{"id":9,"processed":true,"ids":["cust-1"],"data":{"a":1}}']);

    const result = await client.findTrigger(5, 9);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.id).toBe('9');
      expect(result.value.campaignId).toBe(5);
      expect(result.value.params).toEqual({
        data: { a: 1 },
        emails: undefined,
        ids: ['cust-1'],
        recipients: undefined,
      });
    }
    expect(execute.mock.calls[0]?.[0]).toBe('https://api.customer.io/v1/api/campaigns/5/triggers/9');
  });

  it('maps a missing trigger to RESOURCE_NOT_FOUND', async () => {
    const { client } = createClient([404, '{"meta":{"error":"not found"}}']);

    const result = await client.findTrigger(5, 404);

    expect(result.isErr() && result.error).toMatchObject({
      context: { body: undefined, method: 'GET', path: 'campaigns/5/triggers/404' },
      kind: 'RESOURCE_NOT_FOUND',
    });
  });

  it('lists processing errors of an activated trigger', async () => {
    const { client, execute } = createClient([200, '{"errors":[{"reason":"missing customer"}]}']);
    const trigger = client.newTrigger({ campaignId: 5, id: '77' });

    const result = await trigger.getErrors();

    expect(result.isOk() && result.value).toEqual([{ reason: 'missing customer' }]);
    expect(execute.mock.calls[0]?.[0]).toBe('https://api.customer.io/v1/api/campaigns/5/triggers/77/errors');
  });

  it('requires activation before listing errors', async () => {
    const { client } = createClient();

    const result = await client.newTrigger({ campaignId: 5 }).getErrors();

    expect(result.isErr() && result.error.message).toBe('Trigger has not been activated');
  });
});
