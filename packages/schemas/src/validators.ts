import type { ZodError } from 'zod';
import { SchemaValidationError } from '@newscheck/shared/src/utils/errors.js';
import { VerifierConfigSchema } from './verifier-config.schema.js';
import type { VerifierConfig } from './verifier-config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateVerifierConfig(data: unknown): VerifierConfig {
  const result = VerifierConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid verifier configuration', formatZodErrors(result.error));
  }

  return result.data;
}
