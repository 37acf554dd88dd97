import { z } from '@hono/zod-openapi';

export const MAX_STATEMENT_LENGTH = 10000;

export const VerifyRequestSchema = z
  .object({
    statement: z
      .string()
      .max(MAX_STATEMENT_LENGTH)
      .openapi({ example: 'The city bridge reopened to traffic in May.' }),
  })
  .openapi('VerifyRequest');

export type VerifyRequest = z.infer<typeof VerifyRequestSchema>;
