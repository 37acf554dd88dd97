import type {
  AssumptionVerdict,
  EvidenceItem,
} from '@newscheck/shared/src/types/verification.types.js';

const MAX_SNIPPET_LENGTH = 1000;

export const SYSTEM_INSTRUCTION =
  'You are an assistant that analyzes the validity of news. Keep a neutral and objective tone, ' +
  'be concise, and base every conclusion on the material you are given.';

export function buildExtractionPrompt(statement: string): string {
  return `Here is a statement:
${statement}

Make a bullet point list of the assumptions you made when given the above statement.
Each assumption must be a single, atomic claim that can be checked independently with an online search.
These assumptions will then be used to check online for the validity of the statement.
Only give bullet points, no other text.

Example:

Input:
A tech startup called Nimbus is owned by a famous car maker

Output:
* Does a famous car maker own a startup called Nimbus?
* Has any car maker publicly announced the acquisition of a company named Nimbus?
* Do corporate registries list a car maker as an owner or shareholder of Nimbus?`;
}

export function formatEvidence(evidence: readonly EvidenceItem[]): string {
  return evidence
    .map((item, i) => {
      const snippet =
        item.snippet.length > MAX_SNIPPET_LENGTH
          ? `${item.snippet.slice(0, MAX_SNIPPET_LENGTH)}…`
          : item.snippet;
      return `[${String(i + 1)}] ${item.title}\nURL: ${item.url}\nSnippet: ${snippet}`;
    })
    .join('\n\n');
}

export function buildEvaluationPrompt(
  statement: string,
  assumption: string,
  evidence: readonly EvidenceItem[],
): string {
  return `Original news statement:
${statement}

Assumption to check:
${assumption}

Information gathered from the internet:
${formatEvidence(evidence)}

Evaluate the assumption step by step:
1. Identify the key claim made in the assumption.
2. Cross-check it against the sources above. Cite each source you rely on by its number, e.g. [1].
3. Note any contradictions or missing details that affect the assessment.
4. Decide whether the sources support the assumption, contradict it, or are inconclusive.

End your answer with exactly one line in this format:
Verdict: SUPPORTED | CONTRADICTED | INCONCLUSIVE`;
}

export function buildSynthesisPrompt(
  statement: string,
  verdicts: readonly AssumptionVerdict[],
): string {
  const steps = verdicts
    .map(
      (verdict, i) =>
        `Step ${String(i + 1)}: ${verdict.assumption}\nPreliminary label: ${verdict.label}\n${verdict.rationale}`,
    )
    .join('\n\n');

  return `You are given the reasoning steps used to check a news statement. Each step checked one assumption behind the statement against web sources and carries a preliminary label.

News statement:
${statement}

Instructions:
1. Read each reasoning step.
2. Extract the key evidence and conclusions.
3. Combine them into a single, easy-to-follow chain of reasoning.
4. Decide whether the news statement is REAL or FAKE and justify the decision.

Output format:
Overall Reasoning: <explanation combining the evidence>
Final Result: REAL or FAKE

Reasoning steps:
${steps}`;
}
