import { z } from 'zod';

const seedSchema = z.object({
  configs: z.array(z.object({
    label: z.string().min(1).max(255),
    type: z.string().min(1).max(255),
    amount: z.number().finite(),
  })).default([]),
  cases: z.array(z.object({
    case_id: z.string().uuid().optional(),
    subject: z.string().max(255).default(''),
    status: z.enum(['Open', 'Closed']).default('Open'),
  })).default([]),
});

export type SeedFile = z.infer<typeof seedSchema>;

/** Parses a seed file. Throws on invalid JSON or a shape mismatch. */
export function parseSeedFile(content: string): SeedFile {
  return seedSchema.parse(JSON.parse(content));
}
