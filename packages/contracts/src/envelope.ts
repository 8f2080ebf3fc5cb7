import { z } from 'zod';

// Success response envelope
export const successEnvelopeSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.object({
    success: z.literal(true),
    data: dataSchema,
    metadata: z.record(z.unknown()).optional(),
  });

// Paginated success response envelope
export const paginatedEnvelopeSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
  z.object({
    success: z.literal(true),
    data: z.array(itemSchema),
    pagination: z.object({
      has_more: z.boolean(),
      total_count: z.number().int().nonnegative(),
    }),
  });

// Error response envelope
export const errorEnvelopeSchema = z.object({
  success: z.literal(false),
  message: z.string(),
  code: z.string(),
  details: z.array(z.unknown()).optional(),
});

// Discriminated union for any response
export const apiResponseSchema = <T extends z.ZodTypeAny>(dataSchema: T) =>
  z.discriminatedUnion('success', [successEnvelopeSchema(dataSchema), errorEnvelopeSchema]);

// TypeScript types
export type SuccessEnvelope<T> = { success: true; data: T; metadata?: Record<string, unknown> };
export type PaginatedEnvelope<T> = {
  success: true;
  data: T[];
  pagination: { has_more: boolean; total_count: number };
};
export type ErrorEnvelope = {
  success: false;
  message: string;
  code: string;
  details?: unknown[];
};
export type ApiResponse<T> = SuccessEnvelope<T> | ErrorEnvelope;
