import type {
  Assumption,
  EvidenceItem,
  EvidenceSet,
  GatheringFailure,
} from '@newscheck/shared/src/types/verification.types.js';
import type { WebSearchClient, WebSearchHit } from '../web-search/types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { isHttpUrl, normalizeUrl } from '../../parsing/url.js';
import { withDeadline, type CallOptions } from '../../orchestration/deadline.js';
import { settleAll } from '../../orchestration/settle.js';

const log = createChildLogger('verification:evidence-gatherer');

export interface EvidenceGathererConfig {
  readonly maxResults: number;
  readonly requestTimeoutMs: number;
}

export interface GatherResult {
  readonly evidence: EvidenceSet;
  readonly failures: readonly GatheringFailure[];
}

export interface EvidenceGatherer {
  gather(assumptions: readonly Assumption[], options?: CallOptions): Promise<GatherResult>;
}

/** Drops hits without an absolute http(s) URL and repeated URLs, then caps the list. */
export function normalizeEvidence(
  hits: readonly WebSearchHit[],
  maxResults: number,
): EvidenceItem[] {
  const seen = new Set<string>();
  const items: EvidenceItem[] = [];

  for (const hit of hits) {
    const url = hit.url.trim();
    if (!isHttpUrl(url)) continue;

    const key = normalizeUrl(url);
    if (seen.has(key)) continue;
    seen.add(key);

    items.push({
      title: hit.title.trim() || url,
      url,
      snippet: hit.snippet.replace(/\s+/g, ' ').trim(),
    });

    if (items.length >= maxResults) break;
  }

  return items;
}

export function createEvidenceGatherer(
  webSearchClient: WebSearchClient,
  config: EvidenceGathererConfig,
): EvidenceGatherer {
  return {
    async gather(
      assumptions: readonly Assumption[],
      options: CallOptions = {},
    ): Promise<GatherResult> {
      log.info({ assumptionCount: assumptions.length }, 'Gathering evidence');

      const results = await settleAll(assumptions, (assumption) =>
        withDeadline(
          (signal) =>
            webSearchClient.search(assumption, { maxResults: config.maxResults, signal }),
          {
            timeoutMs: config.requestTimeoutMs,
            signal: options.signal,
            label: 'Web search',
          },
        ),
      );

      const evidence = new Map<Assumption, readonly EvidenceItem[]>();
      const failures: GatheringFailure[] = [];

      assumptions.forEach((assumption, i) => {
        const result = results[i];
        if (result.ok) {
          evidence.set(assumption, normalizeEvidence(result.value, config.maxResults));
          return;
        }

        log.warn(
          { assumption, error: result.error.message },
          'Evidence gathering failed, continuing with empty evidence',
        );
        evidence.set(assumption, []);
        failures.push({ assumption, reason: result.error.message });
      });

      log.info(
        {
          assumptionCount: assumptions.length,
          failedSearches: failures.length,
          evidenceCount: Array.from(evidence.values()).reduce((sum, items) => sum + items.length, 0),
        },
        'Evidence gathering complete',
      );

      return { evidence, failures };
    },
  };
}
