import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import type { VerificationPhase } from '@newscheck/shared/src/types/verification.types.js';
import {
  ExtractionError,
  InvalidInputError,
  SynthesisError,
  VerificationCancelledError,
} from '@newscheck/shared/src/utils/errors.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly phase?: VerificationPhase;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.status === 400 ? 'VALIDATION_ERROR' : 'HTTP_ERROR',
      requestId,
    };
    return c.json(body, err.status);
  }

  if (err instanceof InvalidInputError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'INVALID_INPUT',
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof ExtractionError) {
    log.error({ requestId, error: err.message }, 'Assumption extraction failed');
    const body: ErrorResponse = {
      error: 'Assumption extraction failed',
      code: 'EXTRACTION_FAILED',
      requestId,
      phase: 'extraction',
    };
    return c.json(body, 502);
  }

  if (err instanceof SynthesisError) {
    log.error({ requestId, error: err.message }, 'Verdict synthesis failed');
    const body: ErrorResponse = {
      error: 'Verdict synthesis failed',
      code: 'SYNTHESIS_FAILED',
      requestId,
      phase: 'synthesis',
    };
    return c.json(body, 502);
  }

  if (err instanceof VerificationCancelledError) {
    log.warn({ requestId }, 'Verification cancelled');
    const body: ErrorResponse = {
      error: err.message,
      code: 'VERIFICATION_CANCELLED',
      requestId,
    };
    return c.json(body, 503);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
