import { vi, type Mock } from 'vitest';
import type { LlmClient } from '../../llm/llm-client.js';
import type { WebSearchClient } from '../web-search/types.js';

export function createLlmStub(): { client: LlmClient; generate: Mock<LlmClient['generate']> } {
  const generate = vi.fn<LlmClient['generate']>();
  return { client: { generate }, generate };
}

export function createSearchStub(): {
  client: WebSearchClient;
  search: Mock<WebSearchClient['search']>;
} {
  const search = vi.fn<WebSearchClient['search']>();
  return { client: { search }, search };
}

/** Never settles; used to run into deadlines. */
export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
