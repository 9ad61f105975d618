import { z } from 'zod';

import { ConfigurationError } from './errors.js';

export const TRACKING_END_POINT = 'https://track.customer.io/api/v1';
export const API_END_POINT = 'https://api.customer.io/v1/api';
export const REQUEST_PER_SECOND_LIMIT_TRACKING = 30;
export const REQUEST_PER_SECOND_LIMIT_API = 10;
export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_USER_AGENT = 'customerio-async/0.1.0';

export const replenishPolicySchema = z.enum(['rolling', 'fixed-window']);

const rateLimitSchema = (defaultCapacity: number) =>
  z
    .object({
      capacity: z.number().int().positive().default(defaultCapacity),
      intervalMs: z.number().positive().finite().default(1000),
      policy: replenishPolicySchema.default('rolling'),
    })
    .default({});

const requiredString = (name: string) =>
  z
    .string({
      invalid_type_error: `Invalid value for ${name}`,
      required_error: `Missing required argument: ${name}`,
    })
    .trim()
    .min(1, { message: `Missing required argument: ${name}` });

export const clientConfigSchema = z.object({
  apiKey: requiredString('apiKey'),
  endpoints: z
    .object({
      api: z.string().url().default(API_END_POINT),
      tracking: z.string().url().default(TRACKING_END_POINT),
    })
    .default({}),
  rateLimits: z
    .object({
      api: rateLimitSchema(REQUEST_PER_SECOND_LIMIT_API),
      tracking: rateLimitSchema(REQUEST_PER_SECOND_LIMIT_TRACKING),
    })
    .default({}),
  siteId: requiredString('siteId'),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
});

export type ClientConfigInput = z.input<typeof clientConfigSchema>;
export type ClientConfig = z.output<typeof clientConfigSchema>;

const formatIssues = (issues: z.ZodIssue[]) =>
  issues.map((issue) => ({ message: issue.message, path: issue.path.join('.') }));

/**
 * Validate client configuration, throwing on the first call rather than on
 * the first request.
 * @throws ConfigurationError listing every issue
 */
export function parseClientConfig(input: unknown): ClientConfig {
  const result = clientConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    const lines = issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Invalid Customer.io client configuration:\n${lines}`, issues);
  }
  return result.data;
}

const positiveIntFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const clientEnvSchema = z.object({
  CUSTOMERIO_API_KEY: z.string().trim().min(1, { message: 'Missing CUSTOMERIO_API_KEY' }),
  CUSTOMERIO_API_RATE_LIMIT: positiveIntFromEnv(REQUEST_PER_SECOND_LIMIT_API),
  CUSTOMERIO_RATE_LIMIT_POLICY: replenishPolicySchema.default('rolling'),
  CUSTOMERIO_SITE_ID: z.string().trim().min(1, { message: 'Missing CUSTOMERIO_SITE_ID' }),
  CUSTOMERIO_TIMEOUT_MS: positiveIntFromEnv(DEFAULT_TIMEOUT_MS),
  CUSTOMERIO_TRACKING_RATE_LIMIT: positiveIntFromEnv(REQUEST_PER_SECOND_LIMIT_TRACKING),
});

/**
 * Build client configuration from environment variables.
 * @throws ConfigurationError listing every issue
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfigInput {
  const result = clientEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = formatIssues(result.error.issues);
    const lines = issues.map((issue) => `  - ${issue.path}: ${issue.message}`).join('\n');
    throw new ConfigurationError(`Environment validation failed:\n${lines}`, issues);
  }

  const vars = result.data;
  return {
    apiKey: vars.CUSTOMERIO_API_KEY,
    rateLimits: {
      api: { capacity: vars.CUSTOMERIO_API_RATE_LIMIT, policy: vars.CUSTOMERIO_RATE_LIMIT_POLICY },
      tracking: { capacity: vars.CUSTOMERIO_TRACKING_RATE_LIMIT, policy: vars.CUSTOMERIO_RATE_LIMIT_POLICY },
    },
    siteId: vars.CUSTOMERIO_SITE_ID,
    timeoutMs: vars.CUSTOMERIO_TIMEOUT_MS,
  };
}
