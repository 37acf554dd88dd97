import { describe, it, expect } from 'vitest';
import type { PhaseEvent } from '@newscheck/shared/src/types/verification.types.js';
import {
  ExtractionError,
  InvalidInputError,
  SynthesisError,
  VerificationCancelledError,
} from '@newscheck/shared/src/utils/errors.js';
import type { LlmRequest, LlmResponse } from '../llm/llm-client.js';
import { createMockLlmClient } from '../llm/llm-client.js';
import { createMockWebSearchClient } from '../services/web-search/mock-web-search-client.js';
import type { WebSearchHit } from '../services/web-search/types.js';
import { NO_EVIDENCE_RATIONALE } from '../services/verification/assumption-evaluator.js';
import { createLlmStub, createSearchStub } from '../services/verification/test-helpers.js';
import { createVerificationPipeline } from './pipeline.js';

const settings = { maxAssumptions: 8, maxResults: 5, requestTimeoutMs: 1000 };

const LANDING = 'A crewed moon landing took place in 1969';
const STAGED = 'The 1969 moon landing footage was staged';

const searchResults: Record<string, readonly WebSearchHit[]> = {
  [LANDING]: [
    {
      title: 'Apollo 11 mission overview',
      url: 'https://history.example.org/apollo-11',
      snippet: 'Apollo 11 landed on the Moon on 20 July 1969 with two astronauts.',
    },
  ],
  [STAGED]: [
    {
      title: 'Footage analysis',
      url: 'https://science.example.org/footage',
      snippet: 'Independent analyses found no sign that the landing footage was staged.',
    },
  ],
};

/** Answers each pipeline prompt the way a well-behaved model would for the moon landing case. */
function moonLandingModel(request: LlmRequest): Promise<LlmResponse> {
  const { prompt } = request;

  if (prompt.includes('Final Result')) {
    return Promise.resolve({
      content:
        'Overall Reasoning: The landing itself is documented, but the claim that the footage was staged is contradicted by independent analysis.\n\nFinal Result: FAKE',
    });
  }

  if (prompt.includes(`Assumption to check:\n${LANDING}`)) {
    return Promise.resolve({
      content: 'Source [1] documents the Apollo 11 landing in July 1969.\nVerdict: SUPPORTED',
    });
  }

  if (prompt.includes(`Assumption to check:\n${STAGED}`)) {
    return Promise.resolve({
      content: 'Source [1] found no sign of staging.\nVerdict: CONTRADICTED',
    });
  }

  return Promise.resolve({ content: `* ${LANDING}\n* ${STAGED}` });
}

function setup() {
  const llm = createLlmStub();
  const search = createSearchStub();
  llm.generate.mockImplementation(moonLandingModel);
  search.search.mockImplementation((query) => Promise.resolve(searchResults[query] ?? []));

  const pipeline = createVerificationPipeline({
    llmClient: llm.client,
    webSearchClient: search.client,
    settings,
  });

  return { pipeline, generate: llm.generate, search: search.search };
}

describe('VerificationPipeline', () => {
  it('should check every assumption and combine the verdicts', async () => {
    const { pipeline, generate, search } = setup();

    const report = await pipeline.run('The 1969 moon landing was staged in a film studio.');

    expect(report.statement).toBe('The 1969 moon landing was staged in a film studio.');
    expect(report.assumptions).toEqual([LANDING, STAGED]);
    expect(report.evidence.get(LANDING)).toEqual(searchResults[LANDING]);
    expect(report.gatheringFailures).toEqual([]);
    expect(report.assumptionVerdicts).toEqual([
      {
        assumption: LANDING,
        label: 'SUPPORTED',
        rationale: 'Source [1] documents the Apollo 11 landing in July 1969.\nVerdict: SUPPORTED',
        citedUrls: ['https://history.example.org/apollo-11'],
        evidenceCount: 1,
      },
      {
        assumption: STAGED,
        label: 'CONTRADICTED',
        rationale: 'Source [1] found no sign of staging.\nVerdict: CONTRADICTED',
        citedUrls: ['https://science.example.org/footage'],
        evidenceCount: 1,
      },
    ]);
    expect(report.finalVerdict.label).toBe('FAKE');
    expect(report.finalVerdict.determined).toBe(true);
    expect(report.finalVerdict.rationale).toContain('contradicted by independent analysis');
    expect(report.durationMs).toBeGreaterThanOrEqual(0);
    expect(generate).toHaveBeenCalledTimes(4);
    expect(search).toHaveBeenCalledTimes(2);
  });

  it('should report phases in order', async () => {
    const { pipeline } = setup();
    const events: PhaseEvent[] = [];

    await pipeline.run('The 1969 moon landing was staged.', {
      onPhase: (event) => events.push(event),
    });

    expect(events.map((e) => `${e.phase}:${e.status}`)).toEqual([
      'extraction:started',
      'extraction:completed',
      'gathering:started',
      'gathering:completed',
      'evaluation:started',
      'evaluation:completed',
      'synthesis:started',
      'synthesis:completed',
    ]);
  });

  it('should reject blank statements before calling any backend', async () => {
    const { pipeline, generate, search } = setup();

    await expect(pipeline.run('')).rejects.toBeInstanceOf(InvalidInputError);
    await expect(pipeline.run('   ')).rejects.toBeInstanceOf(InvalidInputError);
    expect(generate).not.toHaveBeenCalled();
    expect(search).not.toHaveBeenCalled();
  });

  it('should fall back to an undetermined FAKE when every search fails', async () => {
    const { pipeline, generate, search } = setup();
    search.mockRejectedValue(new Error('search backend unavailable'));

    const report = await pipeline.run('The 1969 moon landing was staged.');

    expect(report.gatheringFailures).toEqual([
      { assumption: LANDING, reason: 'search backend unavailable' },
      { assumption: STAGED, reason: 'search backend unavailable' },
    ]);
    expect(report.assumptionVerdicts.map((v) => v.label)).toEqual(['INCONCLUSIVE', 'INCONCLUSIVE']);
    expect(report.assumptionVerdicts.every((v) => v.rationale === NO_EVIDENCE_RATIONALE)).toBe(true);
    expect(report.finalVerdict).toEqual({
      label: 'FAKE',
      rationale:
        'Undetermined: insufficient evidence. No sources were retrieved for any of the 2 assumptions, so the statement defaults to FAKE.',
      determined: false,
    });
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('should let the model decide when evidence was found but nothing was settled', async () => {
    const { pipeline, generate } = setup();
    generate.mockImplementation((request) =>
      request.prompt.includes('Assumption to check:')
        ? Promise.resolve({
            content: 'The retrieved articles do not address this claim.\nVerdict: INCONCLUSIVE',
          })
        : moonLandingModel(request),
    );

    const report = await pipeline.run('The 1969 moon landing was staged.');

    expect(report.assumptionVerdicts.map((v) => [v.label, v.citedUrls, v.evidenceCount])).toEqual([
      ['INCONCLUSIVE', [], 1],
      ['INCONCLUSIVE', [], 1],
    ]);
    expect(report.finalVerdict.label).toBe('FAKE');
    expect(report.finalVerdict.determined).toBe(true);
    expect(generate).toHaveBeenCalledTimes(4);
  });

  it('should carry on with partial evidence', async () => {
    const { pipeline, search } = setup();
    search.mockImplementation((query) =>
      query === STAGED
        ? Promise.reject(new Error('rate limited'))
        : Promise.resolve(searchResults[query] ?? []),
    );

    const report = await pipeline.run('The 1969 moon landing was staged.');

    expect(report.gatheringFailures).toEqual([{ assumption: STAGED, reason: 'rate limited' }]);
    expect(report.evidence.get(STAGED)).toEqual([]);
    expect(report.assumptionVerdicts.map((v) => v.label)).toEqual(['SUPPORTED', 'INCONCLUSIVE']);
    expect(report.finalVerdict.determined).toBe(true);
  });

  it('should propagate extraction failures without searching', async () => {
    const { pipeline, generate, search } = setup();
    generate.mockRejectedValue(new Error('model unavailable'));

    await expect(pipeline.run('Some statement.')).rejects.toBeInstanceOf(ExtractionError);
    expect(search).not.toHaveBeenCalled();
  });

  it('should propagate synthesis failures', async () => {
    const { pipeline, generate } = setup();
    generate.mockImplementation((request) =>
      request.prompt.includes('Final Result')
        ? Promise.reject(new Error('model unavailable'))
        : moonLandingModel(request),
    );

    await expect(pipeline.run('The 1969 moon landing was staged.')).rejects.toThrow(
      new SynthesisError('Verdict synthesis failed: model unavailable'),
    );
  });

  it('should refuse to start with an aborted signal', async () => {
    const { pipeline, generate } = setup();
    const controller = new AbortController();
    controller.abort();

    await expect(
      pipeline.run('The 1969 moon landing was staged.', { signal: controller.signal }),
    ).rejects.toBeInstanceOf(VerificationCancelledError);
    expect(generate).not.toHaveBeenCalled();
  });

  it('should stop between phases once cancelled', async () => {
    const { pipeline, generate, search } = setup();
    const controller = new AbortController();
    const events: PhaseEvent[] = [];
    search.mockImplementation((query) => {
      controller.abort();
      return Promise.resolve(searchResults[query] ?? []);
    });

    await expect(
      pipeline.run('The 1969 moon landing was staged.', {
        signal: controller.signal,
        onPhase: (event) => events.push(event),
      }),
    ).rejects.toBeInstanceOf(VerificationCancelledError);

    expect(events.map((e) => `${e.phase}:${e.status}`)).toEqual([
      'extraction:started',
      'extraction:completed',
      'gathering:started',
    ]);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('should run end to end on the mock backends', async () => {
    const pipeline = createVerificationPipeline({
      llmClient: createMockLlmClient(),
      webSearchClient: createMockWebSearchClient(),
      settings,
    });

    const report = await pipeline.run('The bridge reopened in May.');

    expect(report.assumptions).toEqual([
      'Is it true that The bridge reopened in May.?',
      'Are there news reports confirming that The bridge reopened in May.?',
    ]);
    expect(report.assumptionVerdicts.map((v) => v.citedUrls)).toEqual([
      ['https://example.com/source1'],
      ['https://example.com/source1'],
    ]);
    expect(report.finalVerdict).toMatchObject({ label: 'REAL', determined: true });
  });
});
