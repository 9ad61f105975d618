import { z } from 'zod';

// Argument checks for the domain helpers

export const idSchema = z.union([z.number().int().positive(), z.string().trim().min(1)]);

export const segmentIdSchema = idSchema;

export const customerIdsSchema = z.array(z.string().min(1));

export const eventSchema = z.object({
  data: z.record(z.unknown(), { invalid_type_error: 'Invalid value for data' }).optional(),
  name: z
    .string({ invalid_type_error: 'Invalid value for name', required_error: 'Missing required argument: name' })
    .trim()
    .min(1, { message: 'Missing required argument: name' }),
});

/** Message of the first failed argument check. */
export const firstIssueMessage = (error: z.ZodError): string => error.issues[0]?.message ?? 'Invalid argument';

export const deviceSchema = z.object({
  id: z.string().trim().min(1),
  lastUsed: z.union([z.date(), z.number().int().nonnegative()]).optional(),
  platform: z.enum(['ios', 'android']),
});

// Response shapes of the Regular API trigger endpoints

export const triggerIdSchema = z.union([z.number(), z.string()]);

export const activateTriggerResponseSchema = z.object({
  id: triggerIdSchema,
});

export const triggerResponseSchema = z.object({
  created_at: z.number().optional(),
  data: z.record(z.unknown()).optional(),
  emails: z.array(z.string()).optional(),
  id: triggerIdSchema,
  ids: z.array(z.string()).optional(),
  processed: z.boolean().optional(),
  recipients: z.record(z.unknown()).optional(),
});

export const triggerErrorsResponseSchema = z.object({
  errors: z.array(z.unknown()),
});

export type TriggerResponse = z.infer<typeof triggerResponseSchema>;

/**
 * Seconds since epoch, the timestamp unit of the Tracking API.
 */
export const toUnixSeconds = (value: Date | number): number =>
  value instanceof Date ? Math.floor(value.getTime() / 1000) : value;

/**
 * Drop keys whose value is undefined so request bodies (and error contexts)
 * only hold what was actually sent.
 */
export const compact = (record: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
