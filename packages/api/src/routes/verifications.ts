import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { VerificationPipeline } from '@newscheck/core/src/orchestration/pipeline.js';
import type { VerificationReport } from '@newscheck/shared/src/types/verification.types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { VerifyRequestSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  VerificationReportResponseSchema,
  type VerificationReportResponse,
} from '../schemas/responses.js';

const log = createChildLogger('api:verifications');

const errorContent = {
  'application/json': {
    schema: ErrorResponseSchema,
  },
};

const verifyRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Verifications'],
  summary: 'Verify a news statement',
  description:
    'Splits the statement into assumptions, checks each against web search results and returns a REAL or FAKE verdict with the reasoning behind it.',
  request: {
    body: {
      required: true,
      content: {
        'application/json': {
          schema: VerifyRequestSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Verification report',
      content: {
        'application/json': {
          schema: VerificationReportResponseSchema,
        },
      },
    },
    400: { description: 'Invalid statement', content: errorContent },
    502: { description: 'Model call failed during extraction or synthesis', content: errorContent },
    503: { description: 'Verification was cancelled', content: errorContent },
  },
});

export function toReportResponse(report: VerificationReport): VerificationReportResponse {
  return {
    statement: report.statement,
    assumptions: [...report.assumptions],
    evidence: report.assumptions.map((assumption) => ({
      assumption,
      items: (report.evidence.get(assumption) ?? []).map((item) => ({ ...item })),
    })),
    gatheringFailures: report.gatheringFailures.map((failure) => ({ ...failure })),
    assumptionVerdicts: report.assumptionVerdicts.map((verdict) => ({
      ...verdict,
      citedUrls: [...verdict.citedUrls],
    })),
    finalVerdict: { ...report.finalVerdict },
    durationMs: report.durationMs,
  };
}

export function createVerificationRoutes(pipeline: VerificationPipeline): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(verifyRoute, async (c) => {
    const { statement } = c.req.valid('json');

    const report = await pipeline.run(statement, {
      signal: c.req.raw.signal,
      onPhase: (event) => {
        log.debug({ requestId: c.get('requestId'), ...event }, 'Verification phase');
      },
    });

    return c.json(toReportResponse(report), 200);
  });

  return routes;
}
