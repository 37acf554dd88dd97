import { describe, it, expect } from 'vitest';
import { buildEvaluationPrompt, buildExtractionPrompt, formatEvidence } from './prompts.js';

describe('formatEvidence', () => {
  it('should number the items from one', () => {
    const text = formatEvidence([
      { title: 'A', url: 'https://a.example.com', snippet: 'first' },
      { title: 'B', url: 'https://b.example.com', snippet: 'second' },
    ]);

    expect(text).toBe(
      '[1] A\nURL: https://a.example.com\nSnippet: first\n\n[2] B\nURL: https://b.example.com\nSnippet: second',
    );
  });

  it('should truncate long snippets', () => {
    const text = formatEvidence([{ title: 'A', url: 'https://a.example.com', snippet: 'x'.repeat(1200) }]);

    expect(text.endsWith(`Snippet: ${'x'.repeat(1000)}…`)).toBe(true);
  });
});

describe('prompt builders', () => {
  it('should put the statement first in the extraction prompt', () => {
    expect(buildExtractionPrompt('Water boils at 100 C.').split('\n').slice(0, 2)).toEqual([
      'Here is a statement:',
      'Water boils at 100 C.',
    ]);
  });

  it('should end the evaluation prompt with the verdict format', () => {
    const prompt = buildEvaluationPrompt('S', 'A', []);

    expect(prompt.split('\n').at(-1)).toBe('Verdict: SUPPORTED | CONTRADICTED | INCONCLUSIVE');
  });
});
