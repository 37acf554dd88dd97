import { Annotation } from '@langchain/langgraph';
import type {
  Assumption,
  AssumptionVerdict,
  EvidenceSet,
  FinalVerdict,
  GatheringFailure,
  Statement,
} from '@newscheck/shared/src/types/verification.types.js';

export const VerificationGraphAnnotation = Annotation.Root({
  statement: Annotation<Statement>,
  assumptions: Annotation<readonly Assumption[]>,
  evidence: Annotation<EvidenceSet>,
  gatheringFailures: Annotation<readonly GatheringFailure[]>,
  assumptionVerdicts: Annotation<readonly AssumptionVerdict[]>,
  finalVerdict: Annotation<FinalVerdict | undefined>,
});

export type VerificationGraphState = typeof VerificationGraphAnnotation.State;
