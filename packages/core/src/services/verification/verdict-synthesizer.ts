import {
  FINAL_LABELS,
  type AssumptionVerdict,
  type FinalVerdict,
  type Statement,
} from '@newscheck/shared/src/types/verification.types.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import {
  InvalidInputError,
  SynthesisError,
  VerificationCancelledError,
  toError,
} from '@newscheck/shared/src/utils/errors.js';
import { parseLabel } from '../../parsing/label-parser.js';
import { withDeadline, type CallOptions } from '../../orchestration/deadline.js';
import { SYSTEM_INSTRUCTION, buildSynthesisPrompt } from './prompts.js';

const log = createChildLogger('verification:verdict-synthesizer');

export const UNDETERMINED_PREFIX = 'Undetermined:';

const DEFAULT_LABEL = 'FAKE';

export interface VerdictSynthesizerConfig {
  readonly requestTimeoutMs: number;
}

export interface VerdictSynthesizer {
  synthesize(
    statement: Statement,
    verdicts: readonly AssumptionVerdict[],
    options?: CallOptions,
  ): Promise<FinalVerdict>;
}

function hasNoEvidence(verdicts: readonly AssumptionVerdict[]): boolean {
  return verdicts.every((v) => v.label === 'INCONCLUSIVE' && v.evidenceCount === 0);
}

export function createVerdictSynthesizer(
  llmClient: LlmClient,
  config: VerdictSynthesizerConfig,
): VerdictSynthesizer {
  return {
    async synthesize(
      statement: Statement,
      verdicts: readonly AssumptionVerdict[],
      options: CallOptions = {},
    ): Promise<FinalVerdict> {
      if (verdicts.length === 0) {
        throw new InvalidInputError('At least one assumption verdict is required');
      }

      if (hasNoEvidence(verdicts)) {
        log.warn(
          { assumptionCount: verdicts.length },
          'No evidence was retrieved for any assumption, using default verdict',
        );
        return {
          label: DEFAULT_LABEL,
          rationale: `${UNDETERMINED_PREFIX} insufficient evidence. No sources were retrieved for any of the ${String(verdicts.length)} assumptions, so the statement defaults to ${DEFAULT_LABEL}.`,
          determined: false,
        };
      }

      log.info({ assumptionCount: verdicts.length }, 'Synthesizing final verdict');

      let content: string;
      try {
        const response = await withDeadline(
          (signal) =>
            llmClient.generate({
              systemInstruction: SYSTEM_INSTRUCTION,
              prompt: buildSynthesisPrompt(statement, verdicts),
              signal,
            }),
          {
            timeoutMs: config.requestTimeoutMs,
            signal: options.signal,
            label: 'Verdict synthesis',
          },
        );
        log.debug({ tokenUsage: response.tokenUsage }, 'Synthesis model call complete');
        content = response.content.trim();
      } catch (error) {
        if (error instanceof VerificationCancelledError) {
          throw error;
        }
        const cause = toError(error);
        log.error({ error: cause.message }, 'Verdict synthesis failed');
        throw new SynthesisError(`Verdict synthesis failed: ${cause.message}`, cause);
      }

      const label = parseLabel(content, FINAL_LABELS);
      if (label === undefined) {
        log.warn('Synthesis response carried no REAL/FAKE decision, using default verdict');
        return {
          label: DEFAULT_LABEL,
          rationale: `${UNDETERMINED_PREFIX} the model did not return a REAL or FAKE decision, so the statement defaults to ${DEFAULT_LABEL}.\n\n${content}`.trim(),
          determined: false,
        };
      }

      log.info({ label }, 'Final verdict synthesized');

      return { label, rationale: content, determined: true };
    },
  };
}
