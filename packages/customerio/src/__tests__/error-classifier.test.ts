import { describe, expect, it } from 'vitest';
import { z } from 'zod';

import { classifyOutcome, kindForStatus } from '../core/error-classifier.js';
import type { TransportOutcome } from '../core/types.js';
import { CUSTOMERIO_ERROR_SOURCE, CustomerIoApiError } from '../errors.js';
import type { JsonCodec, RequestContext } from '../types.js';

const request: RequestContext = {
  body: { ids: ['cust-1', 'cust-2'] },
  method: 'POST',
  path: 'segments/7/add_customers',
};

const response = (status: number, body: string, statusText = ''): TransportOutcome => ({
  body,
  status,
  statusText,
  type: 'response',
});

function expectApiError(result: ReturnType<typeof classifyOutcome>): CustomerIoApiError {
  expect(result.isErr()).toBe(true);
  if (result.isOk()) {
    throw new Error('expected an error result');
  }
  expect(result.error).toBeInstanceOf(CustomerIoApiError);
  if (!(result.error instanceof CustomerIoApiError)) {
    throw new Error('expected CustomerIoApiError');
  }
  return result.error;
}

describe('kindForStatus', () => {
  it.each([
    [404, 'RESOURCE_NOT_FOUND'],
    [400, 'INVALID_REQUEST'],
    [401, 'INVALID_API_KEY'],
    [500, 'INTERNAL_SERVER_ERR'],
    [502, 'INTERNAL_SERVER_ERR'],
    [503, 'INTERNAL_SERVER_ERR'],
    [504, 'INTERNAL_SERVER_ERR'],
    [501, 'UNEXPECTED_HTTP_CODE'],
    [403, 'UNEXPECTED_HTTP_CODE'],
    [429, 'UNEXPECTED_HTTP_CODE'],
    [302, 'UNEXPECTED_HTTP_CODE'],
  ])('maps %i to %s', (status, kind) => {
    expect(kindForStatus(status)).toBe(kind);
  });

  it('returns undefined for 2xx', () => {
    expect(kindForStatus(200)).toBeUndefined();
    expect(kindForStatus(204)).toBeUndefined();
  });
});

describe('classifyOutcome', () => {
  it('passes transport failures through unchanged', () => {
    const failure = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });

    const result = classifyOutcome({ error: failure, type: 'failure' }, request);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBe(failure);
      expect(result.error).not.toBeInstanceOf(CustomerIoApiError);
    }
  });

  it('tags 404 with the request context and raw response', () => {
    const error = expectApiError(classifyOutcome(response(404, '{"error":"not found"}', 'Not Found'), request));

    expect(error.kind).toBe('RESOURCE_NOT_FOUND');
    expect(error.message).toBe('RESOURCE_NOT_FOUND');
    expect(error.source).toBe(CUSTOMERIO_ERROR_SOURCE);
    expect(error.context).toEqual({
      body: { ids: ['cust-1', 'cust-2'] },
      method: 'POST',
      path: 'segments/7/add_customers',
      response: { body: '{"error":"not found"}', status: 404, statusLine: '404 Not Found' },
    });
  });

  it('classifies by status before looking at the body', () => {
    const error = expectApiError(classifyOutcome(response(401, 'not-json', 'Unauthorized'), request));

    expect(error.kind).toBe('INVALID_API_KEY');
  });

  it('carries the literal code and status line for unexpected statuses', () => {
    const error = expectApiError(classifyOutcome(response(418, '', "I'm a teapot"), request));

    expect(error.kind).toBe('UNEXPECTED_HTTP_CODE');
    expect(error.message).toBe("UNEXPECTED_HTTP_CODE: 418 I'm a teapot");
    expect(error.context.response.status).toBe(418);
    expect(error.context.response.statusLine).toBe("418 I'm a teapot");
  });

  it('uses the bare code as status line when no reason phrase is given', () => {
    const error = expectApiError(classifyOutcome(response(429, ''), request));

    expect(error.message).toBe('UNEXPECTED_HTTP_CODE: 429');
  });

  it('returns the decoded payload for 2xx', () => {
    const result = classifyOutcome(response(200, '{"id":42,"tags":["a"]}', 'OK'), request);

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ id: 42, tags: ['a'] });
    }
  });

  it('reports undecodable 2xx bodies as UNEXPECTED_RESPONSE_FORMAT', () => {
    const error = expectApiError(classifyOutcome(response(200, 'not-json', 'OK'), request));

    expect(error.kind).toBe('UNEXPECTED_RESPONSE_FORMAT');
    expect(error.context.response).toEqual({ body: 'not-json', status: 200, statusLine: '200 OK' });
    expect(error.context.detail).toEqual(expect.any(String));
    expect(error.message).toBe(`UNEXPECTED_RESPONSE_FORMAT: ${error.context.detail ?? ''}`);
  });

  it('treats an empty 2xx body as undecodable', () => {
    const error = expectApiError(classifyOutcome(response(200, '', 'OK'), request));

    expect(error.kind).toBe('UNEXPECTED_RESPONSE_FORMAT');
  });

  it('decodes through an injected codec', () => {
    const codec: JsonCodec = {
      decode: () => {
        throw new Error('codec refused');
      },
      encode: (value) => JSON.stringify(value),
    };

    const error = expectApiError(classifyOutcome(response(200, '{}', 'OK'), request, { codec }));

    expect(error.context.detail).toBe('codec refused');
  });

  it('validates the payload against a schema', () => {
    const schema = z.object({ id: z.number() });

    const valid = classifyOutcome(response(200, '{"id":3}', 'OK'), request, { schema });
    expect(valid.isOk() && valid.value.id).toBe(3);

    const error = expectApiError(classifyOutcome(response(200, '{"id":"three"}', 'OK'), request, { schema }));
    expect(error.kind).toBe('UNEXPECTED_RESPONSE_FORMAT');
    expect(error.context.detail).toBe('Response validation failed: id: Expected number, received string');
  });

  it('is deterministic for the same outcome', () => {
    const outcome = response(503, 'upstream down', 'Service Unavailable');

    const first = expectApiError(classifyOutcome(outcome, request));
    const second = expectApiError(classifyOutcome(outcome, request));

    expect(second.kind).toBe(first.kind);
    expect(second.context).toEqual(first.context);
  });
});
