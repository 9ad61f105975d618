import { describe, expect, it, vi } from 'vitest';

import { CustomerIoClient } from '../client.js';
import { InvalidArgumentError } from '../errors.js';
import type { HttpExecutorRequest, HttpExecutorResponse } from '../types.js';

function createClient() {
  const execute = vi.fn((_url: string, _init: HttpExecutorRequest) =>
    Promise.resolve<HttpExecutorResponse>({ status: 200, statusText: 'OK', text: () => Promise.resolve('{}') })
  );
  const client = new CustomerIoClient({ apiKey: 'test-secret', siteId: 'site-1' }, { execute });
  return { client, execute };
}

function sent(execute: ReturnType<typeof createClient>['execute']) {
  return execute.mock.calls.map(([url, init]) => ({ body: init.body, method: init.method, url }));
}

describe('Customer', () => {
  it('upserts attributes with email and created_at in seconds', async () => {
    const { client, execute } = createClient();
    const customer = client.newCustomer({
      attributes: { plan: 'pro' },
      createdAt: new Date('2024-03-01T00:00:00Z'),
      email: 'person@example.com',
      id: 'cust-1',
    });

    const result = await customer.upsert();

    expect(result.isOk()).toBe(true);
    expect(sent(execute)).toEqual([
      {
        body: '{"plan":"pro","created_at":1709251200,"email":"person@example.com"}',
        method: 'PUT',
        url: 'https://track.customer.io/api/v1/customers/cust-1',
      },
    ]);
  });

  it('keeps email and created_at attributes when the dedicated params are unset', async () => {
    const { client, execute } = createClient();

    await client.newCustomer({ attributes: { created_at: 1700000000, email: 'a@example.com', plan: 'pro' }, id: 'c1' }).upsert();
    await client.newCustomer({ attributes: { email: 'old@example.com' }, email: 'new@example.com', id: 'c2' }).upsert();

    expect(sent(execute).map(({ body }) => body)).toEqual([
      '{"created_at":1700000000,"email":"a@example.com","plan":"pro"}',
      '{"email":"new@example.com"}',
    ]);
  });

  it('escapes the customer id in paths', async () => {
    const { client, execute } = createClient();

    await client.newCustomer({ id: 'user/1 a' }).delete();

    expect(sent(execute)).toEqual([
      { body: undefined, method: 'DELETE', url: 'https://track.customer.io/api/v1/customers/user%2F1%20a' },
    ]);
  });

  it('emits a customer event', async () => {
    const { client, execute } = createClient();

    await client.newCustomer({ id: 'cust-1' }).emitEvent('purchase', { total: 42 });

    expect(sent(execute)).toEqual([
      {
        body: '{"data":{"total":42},"name":"purchase"}',
        method: 'POST',
        url: 'https://track.customer.io/api/v1/customers/cust-1/events',
      },
    ]);
  });

  it('registers and removes devices', async () => {
    const { client, execute } = createClient();
    const customer = client.newCustomer({ id: 'cust-1' });

    await customer.setDevice({ id: 'device-token', lastUsed: 1700000000, platform: 'ios' });
    await customer.deleteDevice('device-token');

    expect(sent(execute)).toEqual([
      {
        body: '{"device":{"id":"device-token","last_used":1700000000,"platform":"ios"}}',
        method: 'PUT',
        url: 'https://track.customer.io/api/v1/customers/cust-1/devices',
      },
      { body: undefined, method: 'DELETE', url: 'https://track.customer.io/api/v1/customers/cust-1/devices/device-token' },
    ]);
  });

  it('sends suppress and unsuppress as empty-bodied POSTs', async () => {
    const { client, execute } = createClient();
    const customer = client.newCustomer({ id: 'cust-1' });

    await customer.suppress();
    await customer.unsuppress();

    expect(sent(execute)).toEqual([
      { body: '', method: 'POST', url: 'https://track.customer.io/api/v1/customers/cust-1/suppress' },
      { body: '', method: 'POST', url: 'https://track.customer.io/api/v1/customers/cust-1/unsuppress' },
    ]);
  });

  it('rejects invalid arguments without dispatching', async () => {
    const { client, execute } = createClient();

    const missingId = await client.newCustomer({ id: '' }).upsert();
    const badDevice = await client.newCustomer({ id: 'cust-1' }).setDevice({ id: '', platform: 'android' });
    const unnamed = await client.newCustomer({ id: 'cust-1' }).emitEvent('');
    const badData = await client.newCustomer({ id: 'cust-1' }).emitEvent('purchase', [1, 2] as unknown as Record<string, unknown>); // untyped caller

    expect(missingId.isErr() && missingId.error).toBeInstanceOf(InvalidArgumentError);
    expect(badDevice.isErr() && badDevice.error.message).toBe('Invalid value for device');
    expect(unnamed.isErr() && unnamed.error.message).toBe('Missing required argument: name');
    expect(badData.isErr() && badData.error.message).toBe('Invalid value for data');
    expect(execute).not.toHaveBeenCalled();
  });
});
