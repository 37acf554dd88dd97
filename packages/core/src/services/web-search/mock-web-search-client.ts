import { createChildLogger } from '@newscheck/shared/src/logger.js';
import type { WebSearchClient, WebSearchHit, WebSearchOptions } from './types.js';

const log = createChildLogger('web-search:mock');

const DEFAULT_HITS: readonly WebSearchHit[] = [
  {
    title: 'Mock source one',
    url: 'https://example.com/source1',
    snippet: 'Mock web search result with general information about the topic.',
  },
  {
    title: 'Mock source two',
    url: 'https://example.com/source2',
    snippet: 'A second mock result that covers the same topic from another angle.',
  },
];

export function createMockWebSearchClient(
  responses?: Map<string, readonly WebSearchHit[]>,
): WebSearchClient {
  log.info('Using mock web search client');

  return {
    search(query: string, options: WebSearchOptions): Promise<readonly WebSearchHit[]> {
      log.debug({ query, maxResults: options.maxResults }, 'Mock web search');

      const hits = responses?.get(query) ?? DEFAULT_HITS;
      return Promise.resolve(hits.slice(0, options.maxResults));
    },
  };
}
