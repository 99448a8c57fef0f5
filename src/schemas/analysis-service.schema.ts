import { z } from 'zod';

export const GatewayRequestSchema = z.object({
  prompt: z.string().min(1),
  context: z.string(),
});
export type GatewayRequest = z.infer<typeof GatewayRequestSchema>;

// Body returned by the analysis gateway's /api/analyze endpoint
export const GatewayResponseSchema = z.object({
  response: z.string().optional(),
  model: z.string().optional(),
  context: z.string().optional(),
  processing_time_ms: z.number().optional(),
  timestamp: z.string().optional(),
  error: z.string().optional(),
  details: z.string().optional(),
});
export type GatewayResponse = z.infer<typeof GatewayResponseSchema>;

export const ReportSourceSchema = z.enum(['ai', 'fallback']);
export type ReportSource = z.infer<typeof ReportSourceSchema>;

export const AnalysisReportSchema = z.object({
  text: z.string(),
  source: ReportSourceSchema,
  model: z.string().optional(),
  processingTimeMs: z.number().optional(),
  fallbackReason: z.string().optional(),
});
export type AnalysisReport = z.infer<typeof AnalysisReportSchema>;
