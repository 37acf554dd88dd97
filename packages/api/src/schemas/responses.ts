import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    phase: z.enum(['extraction', 'gathering', 'evaluation', 'synthesis']).optional(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Verifications
export const EvidenceItemSchema = z
  .object({
    title: z.string(),
    url: z.string(),
    snippet: z.string(),
  })
  .openapi('EvidenceItem');

export const AssumptionVerdictSchema = z
  .object({
    assumption: z.string(),
    label: z.enum(['SUPPORTED', 'CONTRADICTED', 'INCONCLUSIVE']),
    rationale: z.string(),
    citedUrls: z.array(z.string()),
    evidenceCount: z.number().int().nonnegative(),
  })
  .openapi('AssumptionVerdict');

export const VerificationReportResponseSchema = z
  .object({
    statement: z.string(),
    assumptions: z.array(z.string()),
    evidence: z.array(
      z.object({
        assumption: z.string(),
        items: z.array(EvidenceItemSchema),
      }),
    ),
    gatheringFailures: z.array(
      z.object({
        assumption: z.string(),
        reason: z.string(),
      }),
    ),
    assumptionVerdicts: z.array(AssumptionVerdictSchema),
    finalVerdict: z.object({
      label: z.enum(['REAL', 'FAKE']),
      rationale: z.string(),
      determined: z.boolean(),
    }),
    durationMs: z.number(),
  })
  .openapi('VerificationReport');

export type VerificationReportResponse = z.infer<typeof VerificationReportResponseSchema>;
