import type { OpenAPIHono } from '@hono/zod-openapi';
import { createMockLlmClient } from '@newscheck/core/src/llm/llm-client.js';
import { createMockWebSearchClient } from '@newscheck/core/src/services/web-search/mock-web-search-client.js';
import {
  createVerificationPipeline,
  type VerificationPipeline,
} from '@newscheck/core/src/orchestration/pipeline.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

/** Pipeline wired to the in-process mock model and search clients. */
export function createMockPipeline(): VerificationPipeline {
  return createVerificationPipeline({
    llmClient: createMockLlmClient(),
    webSearchClient: createMockWebSearchClient(),
    settings: { maxAssumptions: 8, maxResults: 5, requestTimeoutMs: 1000 },
  });
}

export function createTestApp(
  pipeline: VerificationPipeline = createMockPipeline(),
): OpenAPIHono<AppEnv> {
  return createApp({ pipeline });
}

export function jsonPost(body: unknown, headers: Record<string, string> = {}): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
  };
}
