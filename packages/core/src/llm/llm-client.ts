import type { VerifierConfig } from '@newscheck/schemas/src/verifier-config.schema.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@newscheck/shared/src/utils/errors.js';
import { isTransientError, retryTransient } from './transient-retry.js';

const log = createChildLogger('llm:client');

export interface LlmRequest {
  readonly systemInstruction?: string;
  readonly prompt: string;
  readonly signal?: AbortSignal;
}

export interface LlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface LlmClient {
  generate(request: LlmRequest): Promise<LlmResponse>;
}

export interface GeminiClientConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly temperature: number;
  readonly maxRetries: number;
  readonly retryBaseDelayMs?: number;
}

function extractStatement(prompt: string): string {
  const match = /Here is a statement:\s*\n(.+)/i.exec(prompt);
  return match ? match[1].trim() : 'the statement';
}

function createMockResponse(prompt: string): string {
  const lower = prompt.toLowerCase();

  if (lower.includes('list of the assumptions')) {
    const statement = extractStatement(prompt);
    return [
      `* Is it true that ${statement}?`,
      `* Are there news reports confirming that ${statement}?`,
    ].join('\n');
  }

  if (lower.includes('final result')) {
    return [
      'Overall Reasoning: Every assumption was checked against the retrieved sources and none of them was contradicted.',
      '',
      'Final Result: REAL',
    ].join('\n');
  }

  if (lower.includes('verdict:')) {
    return [
      '1. The assumption was compared with source [1].',
      '2. The source is consistent with the assumption.',
      '',
      'Verdict: SUPPORTED',
    ].join('\n');
  }

  return 'Mock LLM response';
}

export function createMockLlmClient(): LlmClient {
  log.info('Using mock LLM client');

  return {
    generate(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ promptLength: request.prompt.length }, 'Mock LLM invocation');

      return Promise.resolve({
        content: createMockResponse(request.prompt),
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

export async function createGeminiLlmClient(config: GeminiClientConfig): Promise<LlmClient> {
  if (!config.apiKey) {
    throw new ConfigurationError('GEMINI_API_KEY is required for the Gemini LLM client');
  }

  const { GoogleGenAI } = await import('@google/genai');
  const ai = new GoogleGenAI({ apiKey: config.apiKey });

  log.info({ model: config.model }, 'Using Gemini LLM client');

  return {
    async generate(request: LlmRequest): Promise<LlmResponse> {
      log.debug({ promptLength: request.prompt.length }, 'Gemini LLM invocation');

      try {
        const response = await retryTransient(
          () =>
            ai.models.generateContent({
              model: config.model,
              contents: request.prompt,
              config: {
                systemInstruction: request.systemInstruction,
                temperature: config.temperature,
                abortSignal: request.signal,
              },
            }),
          {
            maxRetries: config.maxRetries,
            baseDelayMs: config.retryBaseDelayMs,
            signal: request.signal,
            operation: 'LLM',
            log,
          },
        );

        const usage = response.usageMetadata;

        return {
          content: response.text ?? '',
          tokenUsage: usage
            ? {
                input: usage.promptTokenCount ?? 0,
                output: usage.candidatesTokenCount ?? 0,
              }
            : undefined,
        };
      } catch (error) {
        const cause = toError(error);
        throw new LlmError(
          `Gemini invocation failed: ${cause.message}`,
          isTransientError(error),
          cause,
        );
      }
    },
  };
}

export async function createLlmClient(config: VerifierConfig): Promise<LlmClient> {
  if (config.mock) {
    return createMockLlmClient();
  }

  return createGeminiLlmClient({
    apiKey: config.llm.apiKey ?? '',
    model: config.llm.model,
    temperature: config.llm.temperature,
    maxRetries: config.pipeline.maxRetries,
  });
}
