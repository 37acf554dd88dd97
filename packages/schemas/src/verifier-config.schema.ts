import { z } from 'zod';

const LlmConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gemini-2.0-flash'),
  temperature: z.number().min(0).max(2).default(0.2),
});

const SearchConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  maxResults: z.number().int().min(1).max(20).default(5),
  searchDepth: z.enum(['basic', 'advanced']).default('basic'),
});

const PipelineConfigSchema = z.object({
  requestTimeoutMs: z.number().int().min(1000).max(300000).default(30000),
  maxAssumptions: z.number().int().min(1).max(20).default(8),
  maxRetries: z.number().int().min(0).max(5).default(2),
});

export const VerifierConfigSchema = z.object({
  $schema: z.string().optional(),
  mock: z.boolean().default(false),
  llm: LlmConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  pipeline: PipelineConfigSchema.default({}),
});

export type VerifierConfig = z.infer<typeof VerifierConfigSchema>;
