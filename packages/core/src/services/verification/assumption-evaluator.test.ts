import { describe, it, expect } from 'vitest';
import type { EvidenceItem } from '@newscheck/shared/src/types/verification.types.js';
import { LlmError } from '@newscheck/shared/src/utils/errors.js';
import { NO_EVIDENCE_RATIONALE, createAssumptionEvaluator } from './assumption-evaluator.js';
import { createLlmStub, never } from './test-helpers.js';

const config = { requestTimeoutMs: 1000 };
const statement = 'The bridge reopened in May.';

const evidence: EvidenceItem[] = [
  {
    title: 'City council minutes',
    url: 'https://city.example.com/minutes',
    snippet: 'The council approved the reopening.',
  },
  {
    title: 'Local paper',
    url: 'https://paper.example.com/bridge',
    snippet: 'Traffic returned to the bridge on 12 May.',
  },
];

describe('AssumptionEvaluator.evaluate', () => {
  it('should parse the label and the cited sources', async () => {
    const { client, generate } = createLlmStub();
    const content = '1. Source [2] reports traffic on 12 May.\n\nVerdict: SUPPORTED';
    generate.mockResolvedValue({ content });

    const verdict = await createAssumptionEvaluator(client, config).evaluate(
      statement,
      'The bridge reopened in May',
      evidence,
    );

    expect(verdict).toEqual({
      assumption: 'The bridge reopened in May',
      label: 'SUPPORTED',
      rationale: content,
      citedUrls: ['https://paper.example.com/bridge'],
      evidenceCount: 2,
    });
  });

  it('should include the statement, assumption and numbered evidence in the prompt', async () => {
    const { client, generate } = createLlmStub();
    generate.mockResolvedValue({ content: 'Verdict: INCONCLUSIVE' });

    await createAssumptionEvaluator(client, config).evaluate(statement, 'Assumption A', evidence);

    const { prompt } = generate.mock.calls[0][0];
    expect(prompt).toContain(`Original news statement:\n${statement}`);
    expect(prompt).toContain('Assumption to check:\nAssumption A');
    expect(prompt).toContain(
      '[1] City council minutes\nURL: https://city.example.com/minutes\nSnippet: The council approved the reopening.',
    );
    expect(prompt).toContain('[2] Local paper\nURL: https://paper.example.com/bridge');
  });

  it('should fall back to inconclusive when no label can be read', async () => {
    const { client, generate } = createLlmStub();
    generate.mockResolvedValue({ content: '  I cannot tell from these sources.  ' });

    const verdict = await createAssumptionEvaluator(client, config).evaluate(
      statement,
      'Assumption A',
      evidence,
    );

    expect(verdict.label).toBe('INCONCLUSIVE');
    expect(verdict.rationale).toBe('I cannot tell from these sources.');
    expect(verdict.citedUrls).toEqual([]);
    expect(verdict.evidenceCount).toBe(2);
  });

  it('should explain an empty model answer', async () => {
    const { client, generate } = createLlmStub();
    generate.mockResolvedValue({ content: '' });

    const verdict = await createAssumptionEvaluator(client, config).evaluate(
      statement,
      'Assumption A',
      evidence,
    );

    expect(verdict.rationale).toBe('The model returned an empty evaluation.');
  });

  it('should skip the model when there is no evidence', async () => {
    const { client, generate } = createLlmStub();

    const verdict = await createAssumptionEvaluator(client, config).evaluate(
      statement,
      'Assumption A',
      [],
    );

    expect(verdict).toEqual({
      assumption: 'Assumption A',
      label: 'INCONCLUSIVE',
      rationale: NO_EVIDENCE_RATIONALE,
      citedUrls: [],
      evidenceCount: 0,
    });
    expect(generate).not.toHaveBeenCalled();
  });

  it('should turn a model failure into an inconclusive verdict', async () => {
    const { client, generate } = createLlmStub();
    generate.mockRejectedValue(new LlmError('Gemini invocation failed: quota', true));

    const verdict = await createAssumptionEvaluator(client, config).evaluate(
      statement,
      'Assumption A',
      evidence,
    );

    expect(verdict.label).toBe('INCONCLUSIVE');
    expect(verdict.rationale).toBe(
      'Evaluation failed (Gemini invocation failed: quota), so the assumption could not be assessed.',
    );
  });

  it('should turn a timeout into an inconclusive verdict', async () => {
    const { client, generate } = createLlmStub();
    generate.mockImplementation(() => never());

    const verdict = await createAssumptionEvaluator(client, { requestTimeoutMs: 20 }).evaluate(
      statement,
      'Assumption A',
      evidence,
    );

    expect(verdict.rationale).toBe(
      'Evaluation failed (Assumption evaluation timed out after 20ms), so the assumption could not be assessed.',
    );
  });
});

describe('AssumptionEvaluator.evaluateAll', () => {
  it('should return one verdict per assumption in order', async () => {
    const { client, generate } = createLlmStub();
    generate.mockResolvedValue({ content: 'Source [1] disagrees.\nVerdict: CONTRADICTED' });
    const evidenceSet = new Map<string, readonly EvidenceItem[]>([
      ['a', evidence],
      ['b', []],
    ]);

    const verdicts = await createAssumptionEvaluator(client, config).evaluateAll(
      statement,
      ['a', 'b', 'c'],
      evidenceSet,
    );

    expect(verdicts.map((v) => [v.assumption, v.label])).toEqual([
      ['a', 'CONTRADICTED'],
      ['b', 'INCONCLUSIVE'],
      ['c', 'INCONCLUSIVE'],
    ]);
    expect(verdicts[0].citedUrls).toEqual(['https://city.example.com/minutes']);
    expect(verdicts[2].rationale).toBe(NO_EVIDENCE_RATIONALE);
    expect(generate).toHaveBeenCalledTimes(1);
  });

  it('should keep going when one evaluation fails', async () => {
    const { client, generate } = createLlmStub();
    generate.mockImplementation((request) =>
      request.prompt.includes('Assumption to check:\nb\n')
        ? Promise.reject(new Error('boom'))
        : Promise.resolve({ content: 'Verdict: SUPPORTED' }),
    );
    const evidenceSet = new Map<string, readonly EvidenceItem[]>([
      ['a', evidence],
      ['b', evidence],
    ]);

    const verdicts = await createAssumptionEvaluator(client, config).evaluateAll(
      statement,
      ['a', 'b'],
      evidenceSet,
    );

    expect(verdicts[0].label).toBe('SUPPORTED');
    expect(verdicts[1]).toEqual({
      assumption: 'b',
      label: 'INCONCLUSIVE',
      rationale: 'Evaluation failed (boom), so the assumption could not be assessed.',
      citedUrls: [],
      evidenceCount: 2,
    });
  });
});
