import { z } from 'zod';

export const AnalyzeRequestSchema = z.object({
  url: z.string().trim().min(1),
  question: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : undefined)),
  noAi: z.boolean().default(false),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;
