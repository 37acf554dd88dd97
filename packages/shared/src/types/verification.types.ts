export type Statement = string;

export type Assumption = string;

export interface EvidenceItem {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
}

/** One entry per assumption, in extraction order. Entries may be empty. */
export type EvidenceSet = ReadonlyMap<Assumption, readonly EvidenceItem[]>;

export interface GatheringFailure {
  readonly assumption: Assumption;
  readonly reason: string;
}

export type AssumptionLabel = 'SUPPORTED' | 'CONTRADICTED' | 'INCONCLUSIVE';

export const ASSUMPTION_LABELS: readonly AssumptionLabel[] = [
  'SUPPORTED',
  'CONTRADICTED',
  'INCONCLUSIVE',
];

export interface AssumptionVerdict {
  readonly assumption: Assumption;
  readonly label: AssumptionLabel;
  readonly rationale: string;
  readonly citedUrls: readonly string[];
  /** Number of evidence items the assumption was evaluated against. */
  readonly evidenceCount: number;
}

export type FinalLabel = 'REAL' | 'FAKE';

export const FINAL_LABELS: readonly FinalLabel[] = ['REAL', 'FAKE'];

export interface FinalVerdict {
  readonly label: FinalLabel;
  readonly rationale: string;
  /** False when the label is the forced default rather than a model decision. */
  readonly determined: boolean;
}

export type VerificationPhase = 'extraction' | 'gathering' | 'evaluation' | 'synthesis';

export interface PhaseEvent {
  readonly phase: VerificationPhase;
  readonly status: 'started' | 'completed';
}

export interface VerificationReport {
  readonly statement: Statement;
  readonly assumptions: readonly Assumption[];
  readonly evidence: EvidenceSet;
  readonly gatheringFailures: readonly GatheringFailure[];
  readonly assumptionVerdicts: readonly AssumptionVerdict[];
  readonly finalVerdict: FinalVerdict;
  readonly durationMs: number;
}
