import { z } from 'zod';

export const DnsOutcomeSchema = z.object({
  resolved: z.boolean(),
  address: z.string().optional(),
  failureReason: z.string().optional(),
});
export type DnsOutcome = z.infer<typeof DnsOutcomeSchema>;

export const PortOutcomeSchema = z.object({
  open: z.boolean(),
  failureReason: z.string().optional(),
});
export type PortOutcome = z.infer<typeof PortOutcomeSchema>;

export const TlsOutcomeSchema = z.object({
  valid: z.boolean(),
  subject: z.string().optional(),
  issuer: z.string().optional(),
  notBefore: z.string().optional(),
  notAfter: z.string().optional(),
  failureReason: z.string().optional(),
});
export type TlsOutcome = z.infer<typeof TlsOutcomeSchema>;

export const HttpOutcomeSchema = z.object({
  statusCode: z.number().int().optional(),
  statusText: z.string().optional(),
  redirectCount: z.number().int().min(0),
  finalUrl: z.string().optional(),
  failureReason: z.string().optional(),
});
export type HttpOutcome = z.infer<typeof HttpOutcomeSchema>;

export const DiagnosticRecordSchema = z.object({
  target: z.string(),
  hostname: z.string(),
  port: z.number().int().min(0).max(65535),
  scheme: z.string(),
  probedAt: z.string().datetime(),
  dns: DnsOutcomeSchema,
  portReachable: PortOutcomeSchema,
  // null whenever the scheme is not https
  tls: TlsOutcomeSchema.nullable(),
  http: HttpOutcomeSchema,
  latencyMs: z.number().min(0).optional(),
  errors: z.array(z.string()),
  inputError: z.string().optional(),
});

export type DiagnosticRecord = z.infer<typeof DiagnosticRecordSchema>;
