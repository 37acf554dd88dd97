import { z } from 'zod';
import type { VerifierConfig } from '@newscheck/schemas/src/verifier-config.schema.js';
import { formatZodErrors } from '@newscheck/schemas/src/validators.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { ConfigurationError, SearchError, toError } from '@newscheck/shared/src/utils/errors.js';
import { isTransientError, retryTransient } from '../../llm/transient-retry.js';
import { createMockWebSearchClient } from './mock-web-search-client.js';
import type { WebSearchClient, WebSearchHit, WebSearchOptions } from './types.js';

const log = createChildLogger('web-search:client');

export const TAVILY_SEARCH_URL = 'https://api.tavily.com/search';

const TavilyResultSchema = z.object({
  title: z.string().nullish(),
  url: z.string(),
  content: z.string().nullish(),
});

const TavilyResponseSchema = z.object({
  results: z.array(TavilyResultSchema).default([]),
});

export interface WebSearchClientConfig {
  readonly apiKey: string;
  readonly searchDepth: 'basic' | 'advanced';
  readonly maxRetries: number;
  readonly retryBaseDelayMs?: number;
}

async function requestTavily(
  apiKey: string,
  body: Record<string, unknown>,
  signal?: AbortSignal,
): Promise<unknown> {
  const response = await fetch(TAVILY_SEARCH_URL, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      Authorization: `Bearer ${apiKey}`,
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    const transient = response.status === 429 || response.status >= 500;
    throw new SearchError(
      `Tavily responded with HTTP ${String(response.status)} ${response.statusText}`,
      transient,
    );
  }

  return (await response.json()) as unknown;
}

export function createTavilySearchClient(config: WebSearchClientConfig): WebSearchClient {
  if (!config.apiKey) {
    throw new ConfigurationError('TAVILY_API_KEY is required for the Tavily search client');
  }

  log.info({ searchDepth: config.searchDepth }, 'Creating Tavily search client');

  return {
    async search(query: string, options: WebSearchOptions): Promise<readonly WebSearchHit[]> {
      log.debug({ query, maxResults: options.maxResults }, 'Executing web search');

      let payload: unknown;
      try {
        payload = await retryTransient(
          () =>
            requestTavily(
              config.apiKey,
              {
                query,
                max_results: options.maxResults,
                search_depth: config.searchDepth,
                include_answer: false,
              },
              options.signal,
            ),
          {
            maxRetries: config.maxRetries,
            baseDelayMs: config.retryBaseDelayMs,
            signal: options.signal,
            operation: 'web search',
            log,
          },
        );
      } catch (error) {
        if (error instanceof SearchError) {
          throw error;
        }
        const cause = toError(error);
        throw new SearchError(`Web search failed: ${cause.message}`, isTransientError(error), cause);
      }

      const parsed = TavilyResponseSchema.safeParse(payload);
      if (!parsed.success) {
        throw new SearchError(
          `Unexpected Tavily response: ${formatZodErrors(parsed.error).join(', ')}`,
          false,
        );
      }

      const hits = parsed.data.results.map((result) => ({
        title: result.title ?? '',
        url: result.url,
        snippet: result.content ?? '',
      }));

      log.debug({ query, resultCount: hits.length }, 'Web search completed');

      return hits;
    },
  };
}

export function createWebSearchClient(config: VerifierConfig): WebSearchClient {
  if (config.mock) {
    return createMockWebSearchClient();
  }

  return createTavilySearchClient({
    apiKey: config.search.apiKey ?? '',
    searchDepth: config.search.searchDepth,
    maxRetries: config.pipeline.maxRetries,
  });
}
