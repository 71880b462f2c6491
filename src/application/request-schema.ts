import { z } from 'zod';

/** Schema for POST /api/v1/cases/:case_id/configs. An empty list is allowed. */
export const attachConfigsSchema = z.object({
  config_ids: z.array(z.string().uuid()).max(500),
});

export type AttachConfigsInput = z.infer<typeof attachConfigsSchema>;

/**
 * Schema for POST /api/v1/case-configs/send.
 * Emptiness is left to the use case, which raises SelectionError.
 */
export const sendCaseConfigsSchema = z.object({
  case_config_ids: z.array(z.string().uuid()).max(500),
});

export type SendCaseConfigsInput = z.infer<typeof sendCaseConfigsSchema>;

/** Query string for list endpoints. Numbers arrive as strings. */
export const listQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
  sort: z.enum(['asc', 'desc']).optional(),
});

export type ListQuery = z.infer<typeof listQuerySchema>;
