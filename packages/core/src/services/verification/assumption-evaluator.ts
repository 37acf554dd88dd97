import {
  ASSUMPTION_LABELS,
  type Assumption,
  type AssumptionVerdict,
  type EvidenceItem,
  type EvidenceSet,
  type Statement,
} from '@newscheck/shared/src/types/verification.types.js';
import type { LlmClient } from '../../llm/llm-client.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { toError } from '@newscheck/shared/src/utils/errors.js';
import { parseLabel } from '../../parsing/label-parser.js';
import { matchCitations } from '../../parsing/citation-matcher.js';
import { withDeadline, type CallOptions } from '../../orchestration/deadline.js';
import { settleAll } from '../../orchestration/settle.js';
import { SYSTEM_INSTRUCTION, buildEvaluationPrompt } from './prompts.js';

const log = createChildLogger('verification:assumption-evaluator');

export const NO_EVIDENCE_RATIONALE =
  'No evidence was retrieved for this assumption, so it could not be checked.';

export interface AssumptionEvaluatorConfig {
  readonly requestTimeoutMs: number;
}

export interface AssumptionEvaluator {
  evaluate(
    statement: Statement,
    assumption: Assumption,
    evidence: readonly EvidenceItem[],
    options?: CallOptions,
  ): Promise<AssumptionVerdict>;
  /** One verdict per assumption, in the order given, evaluated concurrently. */
  evaluateAll(
    statement: Statement,
    assumptions: readonly Assumption[],
    evidence: EvidenceSet,
    options?: CallOptions,
  ): Promise<readonly AssumptionVerdict[]>;
}

function failedVerdict(
  assumption: Assumption,
  error: Error,
  evidenceCount: number,
): AssumptionVerdict {
  return {
    assumption,
    label: 'INCONCLUSIVE',
    rationale: `Evaluation failed (${error.message}), so the assumption could not be assessed.`,
    citedUrls: [],
    evidenceCount,
  };
}

export function createAssumptionEvaluator(
  llmClient: LlmClient,
  config: AssumptionEvaluatorConfig,
): AssumptionEvaluator {
  async function evaluate(
    statement: Statement,
    assumption: Assumption,
    evidence: readonly EvidenceItem[],
    options: CallOptions = {},
  ): Promise<AssumptionVerdict> {
    if (evidence.length === 0) {
      log.info({ assumption }, 'No evidence, marking assumption as inconclusive');
      return {
        assumption,
        label: 'INCONCLUSIVE',
        rationale: NO_EVIDENCE_RATIONALE,
        citedUrls: [],
        evidenceCount: 0,
      };
    }

    let content: string;
    try {
      const response = await withDeadline(
        (signal) =>
          llmClient.generate({
            systemInstruction: SYSTEM_INSTRUCTION,
            prompt: buildEvaluationPrompt(statement, assumption, evidence),
            signal,
          }),
        {
          timeoutMs: config.requestTimeoutMs,
          signal: options.signal,
          label: 'Assumption evaluation',
        },
      );
      log.debug({ assumption, tokenUsage: response.tokenUsage }, 'Evaluation model call complete');
      content = response.content.trim();
    } catch (error) {
      const cause = toError(error);
      log.warn(
        { assumption, error: cause.message },
        'Assumption evaluation failed, marking as inconclusive',
      );
      return failedVerdict(assumption, cause, evidence.length);
    }

    const label = parseLabel(content, ASSUMPTION_LABELS) ?? 'INCONCLUSIVE';
    const citedUrls = matchCitations(content, evidence);

    log.info(
      { assumption, label, citedCount: citedUrls.length, evidenceCount: evidence.length },
      'Assumption evaluated',
    );

    return {
      assumption,
      label,
      rationale: content || 'The model returned an empty evaluation.',
      citedUrls,
      evidenceCount: evidence.length,
    };
  }

  return {
    evaluate,

    async evaluateAll(
      statement: Statement,
      assumptions: readonly Assumption[],
      evidence: EvidenceSet,
      options: CallOptions = {},
    ): Promise<readonly AssumptionVerdict[]> {
      log.info({ assumptionCount: assumptions.length }, 'Evaluating assumptions');

      const results = await settleAll(assumptions, (assumption) =>
        evaluate(statement, assumption, evidence.get(assumption) ?? [], options),
      );

      return results.map((result, i) =>
        result.ok
          ? result.value
          : failedVerdict(
              assumptions[i],
              result.error,
              (evidence.get(assumptions[i]) ?? []).length,
            ),
      );
    },
  };
}
