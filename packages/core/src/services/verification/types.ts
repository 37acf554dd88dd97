import type { LlmClient } from '../../llm/llm-client.js';
import type { WebSearchClient } from '../web-search/types.js';

export interface VerificationDeps {
  readonly llmClient: LlmClient;
  readonly webSearchClient: WebSearchClient;
}

export interface VerificationSettings {
  readonly maxAssumptions: number;
  readonly maxResults: number;
  readonly requestTimeoutMs: number;
}
