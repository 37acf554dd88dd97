import { StateGraph, START, END } from '@langchain/langgraph';
import type {
  Assumption,
  EvidenceItem,
  PhaseEvent,
  VerificationPhase,
  VerificationReport,
} from '@newscheck/shared/src/types/verification.types.js';
import type { VerificationDeps, VerificationSettings } from '../services/verification/types.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { InvalidInputError, SynthesisError } from '@newscheck/shared/src/utils/errors.js';
import { createAssumptionExtractor } from '../services/verification/assumption-extractor.js';
import { createEvidenceGatherer } from '../services/verification/evidence-gatherer.js';
import { createAssumptionEvaluator } from '../services/verification/assumption-evaluator.js';
import { createVerdictSynthesizer } from '../services/verification/verdict-synthesizer.js';
import { throwIfCancelled } from './deadline.js';
import { VerificationGraphAnnotation, type VerificationGraphState } from './pipeline-state.js';

const log = createChildLogger('orchestration:pipeline');

export interface PipelineConfig extends VerificationDeps {
  readonly settings: VerificationSettings;
}

export interface PipelineRunOptions {
  readonly signal?: AbortSignal;
  readonly onPhase?: (event: PhaseEvent) => void;
}

export interface VerificationPipeline {
  run(statement: string, options?: PipelineRunOptions): Promise<VerificationReport>;
}

export function createVerificationPipeline(config: PipelineConfig): VerificationPipeline {
  const { llmClient, webSearchClient, settings } = config;

  log.info(
    {
      maxAssumptions: settings.maxAssumptions,
      maxResults: settings.maxResults,
      requestTimeoutMs: settings.requestTimeoutMs,
    },
    'Initializing verification pipeline',
  );

  const extractor = createAssumptionExtractor(llmClient, settings);
  const gatherer = createEvidenceGatherer(webSearchClient, settings);
  const evaluator = createAssumptionEvaluator(llmClient, settings);
  const synthesizer = createVerdictSynthesizer(llmClient, settings);

  // Compiled per run so that the run's signal and progress callback stay out of shared state.
  function buildGraph(options: PipelineRunOptions) {
    const { signal, onPhase } = options;

    async function phase<T>(name: VerificationPhase, work: () => Promise<T>): Promise<T> {
      throwIfCancelled(signal);
      onPhase?.({ phase: name, status: 'started' });
      const result = await work();
      throwIfCancelled(signal);
      onPhase?.({ phase: name, status: 'completed' });
      return result;
    }

    const extractionNode = async (
      state: VerificationGraphState,
    ): Promise<Partial<VerificationGraphState>> => ({
      assumptions: await phase('extraction', () =>
        extractor.extract(state.statement, { signal }),
      ),
    });

    const gatheringNode = async (
      state: VerificationGraphState,
    ): Promise<Partial<VerificationGraphState>> => {
      const { evidence, failures } = await phase('gathering', () =>
        gatherer.gather(state.assumptions, { signal }),
      );
      return { evidence, gatheringFailures: failures };
    };

    const evaluationNode = async (
      state: VerificationGraphState,
    ): Promise<Partial<VerificationGraphState>> => ({
      assumptionVerdicts: await phase('evaluation', () =>
        evaluator.evaluateAll(state.statement, state.assumptions, state.evidence, { signal }),
      ),
    });

    const synthesisNode = async (
      state: VerificationGraphState,
    ): Promise<Partial<VerificationGraphState>> => ({
      finalVerdict: await phase('synthesis', () =>
        synthesizer.synthesize(state.statement, state.assumptionVerdicts, { signal }),
      ),
    });

    return new StateGraph(VerificationGraphAnnotation)
      .addNode('extraction', extractionNode)
      .addNode('gathering', gatheringNode)
      .addNode('evaluation', evaluationNode)
      .addNode('synthesis', synthesisNode)
      .addEdge(START, 'extraction')
      .addEdge('extraction', 'gathering')
      .addEdge('gathering', 'evaluation')
      .addEdge('evaluation', 'synthesis')
      .addEdge('synthesis', END)
      .compile();
  }

  return {
    async run(statement: string, options: PipelineRunOptions = {}): Promise<VerificationReport> {
      const trimmed = statement.trim();
      if (!trimmed) {
        throw new InvalidInputError('Statement must not be empty');
      }
      throwIfCancelled(options.signal);

      const startTime = Date.now();
      log.info({ statementLength: trimmed.length }, 'Running verification pipeline');

      const result = await buildGraph(options).invoke({
        statement: trimmed,
        assumptions: [],
        evidence: new Map<Assumption, readonly EvidenceItem[]>(),
        gatheringFailures: [],
        assumptionVerdicts: [],
        finalVerdict: undefined,
      });

      if (!result.finalVerdict) {
        throw new SynthesisError('Pipeline finished without a final verdict');
      }

      const durationMs = Date.now() - startTime;

      log.info(
        {
          label: result.finalVerdict.label,
          determined: result.finalVerdict.determined,
          assumptionCount: result.assumptions.length,
          failedSearches: result.gatheringFailures.length,
          durationMs,
        },
        'Verification complete',
      );

      return {
        statement: result.statement,
        assumptions: result.assumptions,
        evidence: result.evidence,
        gatheringFailures: result.gatheringFailures,
        assumptionVerdicts: result.assumptionVerdicts,
        finalVerdict: result.finalVerdict,
        durationMs,
      };
    },
  };
}
