import type { Assumption, Statement } from '@newscheck/shared/src/types/verification.types.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import {
  ExtractionError,
  InvalidInputError,
  VerificationCancelledError,
  toError,
} from '@newscheck/shared/src/utils/errors.js';
import { parseAssumptions, parseBulletList } from '../../parsing/bullet-parser.js';
import { withDeadline, type CallOptions } from '../../orchestration/deadline.js';
import { SYSTEM_INSTRUCTION, buildExtractionPrompt } from './prompts.js';

const log = createChildLogger('verification:assumption-extractor');

export interface AssumptionExtractorConfig {
  readonly maxAssumptions: number;
  readonly requestTimeoutMs: number;
}

export interface AssumptionExtractor {
  extract(statement: Statement, options?: CallOptions): Promise<readonly Assumption[]>;
}

export function createAssumptionExtractor(
  llmClient: LlmClient,
  config: AssumptionExtractorConfig,
): AssumptionExtractor {
  return {
    async extract(statement: Statement, options: CallOptions = {}): Promise<readonly Assumption[]> {
      const trimmed = statement.trim();
      if (!trimmed) {
        throw new InvalidInputError('Statement must not be empty');
      }

      log.info({ statementLength: trimmed.length }, 'Extracting assumptions');

      let content: string;
      try {
        const response = await withDeadline(
          (signal) =>
            llmClient.generate({
              systemInstruction: SYSTEM_INSTRUCTION,
              prompt: buildExtractionPrompt(trimmed),
              signal,
            }),
          {
            timeoutMs: config.requestTimeoutMs,
            signal: options.signal,
            label: 'Assumption extraction',
          },
        );
        log.debug({ tokenUsage: response.tokenUsage }, 'Extraction model call complete');
        content = response.content;
      } catch (error) {
        if (error instanceof VerificationCancelledError) {
          throw error;
        }
        const cause = toError(error);
        log.error({ error: cause.message }, 'Assumption extraction failed');
        throw new ExtractionError(`Assumption extraction failed: ${cause.message}`, cause);
      }

      const assumptions = parseAssumptions(content, config.maxAssumptions);
      if (assumptions.length === 0) {
        throw new ExtractionError('Assumption extraction returned an empty response');
      }

      log.info(
        {
          assumptionCount: assumptions.length,
          usedFallback: parseBulletList(content).length === 0,
        },
        'Assumption extraction complete',
      );

      return assumptions;
    },
  };
}
