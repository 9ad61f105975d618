// Pure request-building helpers

import type { ApiRequest, Credentials, JsonCodec, RequestContext } from '../types.js';

export const jsonCodec: JsonCodec = {
  decode: (text: string): unknown => JSON.parse(text),
  encode: (value: unknown): string => JSON.stringify(value),
};

/**
 * Join a relative resource path to an endpoint base URL with exactly one `/`.
 */
export const buildUrl = (baseUrl: string, path: string): string => {
  const cleanBaseUrl = baseUrl.replace(/\/+$/, '');
  const cleanPath = path.replace(/^\/+/, '');
  return `${cleanBaseUrl}/${cleanPath}`;
};

/**
 * Encode one path segment (customer id, campaign id, ...) for use in a resource path.
 */
export const pathSegment = (value: string | number): string => encodeURIComponent(String(value));

export const basicAuthHeader = ({ apiKey, siteId }: Credentials): string =>
  `Basic ${Buffer.from(`${siteId}:${apiKey}`, 'utf8').toString('base64')}`;

/**
 * Serialized body for the wire. `undefined` means the request carries no body
 * field at all, `''` is an explicitly empty body (bodyless POST/PUT).
 */
export const encodeRequestBody = (request: ApiRequest, codec: JsonCodec): string | undefined => {
  if (request.body !== undefined) {
    return codec.encode(request.body);
  }
  return request.method === 'POST' || request.method === 'PUT' ? '' : undefined;
};

export const toRequestContext = (request: ApiRequest): RequestContext => ({
  body: request.body,
  method: request.method,
  path: request.path,
});

export const formatStatusLine = (status: number, statusText: string): string => `${status} ${statusText}`.trim();
