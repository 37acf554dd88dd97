import { describe, it, expect } from 'vitest';
import { validateVerifierConfig } from './validators.js';
import { SchemaValidationError } from '@newscheck/shared/src/utils/errors.js';

describe('validateVerifierConfig', () => {
  it('should fill in defaults for an empty configuration', () => {
    const result = validateVerifierConfig({});

    expect(result.mock).toBe(false);
    expect(result.llm.model).toBe('gemini-2.0-flash');
    expect(result.llm.temperature).toBe(0.2);
    expect(result.search.maxResults).toBe(5);
    expect(result.search.searchDepth).toBe('basic');
    expect(result.pipeline).toEqual({ requestTimeoutMs: 30000, maxAssumptions: 8, maxRetries: 2 });
  });

  it('should keep provided values', () => {
    const result = validateVerifierConfig({
      llm: { apiKey: 'test-llm-key', model: 'gemini-1.5-pro' },
      search: { apiKey: 'test-search-key', maxResults: 3, searchDepth: 'advanced' },
      pipeline: { maxAssumptions: 4 },
    });

    expect(result.llm.apiKey).toBe('test-llm-key');
    expect(result.llm.model).toBe('gemini-1.5-pro');
    expect(result.search.maxResults).toBe(3);
    expect(result.search.searchDepth).toBe('advanced');
    expect(result.pipeline.maxAssumptions).toBe(4);
    expect(result.pipeline.requestTimeoutMs).toBe(30000);
  });

  it('should reject a non-integer result count', () => {
    expect(() => validateVerifierConfig({ search: { maxResults: 2.5 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject an unknown search depth', () => {
    expect(() => validateVerifierConfig({ search: { searchDepth: 'deep' } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should reject a timeout below one second', () => {
    expect(() => validateVerifierConfig({ pipeline: { requestTimeoutMs: 10 } })).toThrow(
      SchemaValidationError,
    );
  });

  it('should report the failing path in validation errors', () => {
    try {
      validateVerifierConfig({ llm: { temperature: 5 } });
      expect.fail('expected validation to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(SchemaValidationError);
      const validationErrors = (error as SchemaValidationError).validationErrors;
      expect(validationErrors).toHaveLength(1);
      expect(validationErrors[0]).toMatch(/^llm\.temperature: /);
    }
  });
});
