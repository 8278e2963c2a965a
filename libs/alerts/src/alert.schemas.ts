import { z } from 'zod';
import { AlertKind } from './types';

const durationMinutes = z.coerce.number().int().positive().max(24 * 60);

export const alertKindSchema: z.ZodType<AlertKind, z.ZodTypeDef, unknown> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('GAP_UP') }),
  z.object({ type: z.literal('GAP_DOWN') }),
  z.object({ type: z.literal('DROP_WINDOW'), durationMinutes }),
  z.object({ type: z.literal('SPIKE_WINDOW'), durationMinutes }),
]);

export const thresholdPercentSchema = z.coerce.number().positive().max(100);

export const ownerKeySchema = z.string().trim().min(1).max(64);

export const symbolSchema = z
  .string()
  .trim()
  .min(1)
  .max(32)
  .regex(/^[\^A-Za-z0-9.&_-]+$/, 'invalid symbol');

export const createAlertSchema = z.object({
  ownerKey: ownerKeySchema,
  symbol: symbolSchema,
  kind: alertKindSchema,
  thresholdPercent: thresholdPercentSchema,
});

/** A signed threshold: negative watches for falls, positive for rises. */
export const createAlertSetSchema = z.object({
  ownerKey: ownerKeySchema,
  symbol: symbolSchema,
  thresholdPercent: z.coerce
    .number()
    .refine((value) => value !== 0 && Math.abs(value) <= 100, 'threshold must be non-zero and within ±100'),
});

export type CreateAlertInput = z.infer<typeof createAlertSchema>;
export type CreateAlertSetInput = z.infer<typeof createAlertSetSchema>;
