import { resolve } from 'node:path';
import { loadConfig } from '@newscheck/schemas/src/config-loader.js';
import { createLlmClient } from '@newscheck/core/src/llm/llm-client.js';
import { createWebSearchClient } from '@newscheck/core/src/services/web-search/web-search-client.js';
import { createVerificationPipeline } from '@newscheck/core/src/orchestration/pipeline.js';
import type { VerificationPhase } from '@newscheck/shared/src/types/verification.types.js';
import {
  ExtractionError,
  InvalidInputError,
  SynthesisError,
  VerificationCancelledError,
} from '@newscheck/shared/src/utils/errors.js';

function failedPhase(error: unknown): VerificationPhase | 'input' | undefined {
  if (error instanceof InvalidInputError) return 'input';
  if (error instanceof ExtractionError) return 'extraction';
  if (error instanceof SynthesisError) return 'synthesis';
  return undefined;
}

async function main(): Promise<void> {
  const statement = process.argv[2] ?? '';
  const configPath =
    process.env['NEWSCHECK_CONFIG'] ?? resolve(process.cwd(), 'config/verifier.json');

  console.log('=== Newscheck Verification Runner ===\n');
  console.log(`Config file: ${configPath}`);
  console.log(`Statement: ${statement}`);

  const config = await loadConfig({ configPath, env: process.env });
  console.log(`Mock backends: ${config.mock ? 'yes' : 'no'}\n`);

  const llmClient = await createLlmClient(config);
  const webSearchClient = createWebSearchClient(config);

  const pipeline = createVerificationPipeline({
    llmClient,
    webSearchClient,
    settings: {
      maxAssumptions: config.pipeline.maxAssumptions,
      maxResults: config.search.maxResults,
      requestTimeoutMs: config.pipeline.requestTimeoutMs,
    },
  });

  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\nCancelling...');
    controller.abort();
  });

  const report = await pipeline.run(statement, {
    signal: controller.signal,
    onPhase: (event) => {
      console.log(`[${event.phase}] ${event.status}`);
    },
  });

  console.log('\n--- Assumptions ---');
  report.assumptions.forEach((assumption, i) => {
    console.log(`  ${String(i + 1)}. ${assumption}`);
  });

  console.log('\n--- Evidence ---');
  for (const assumption of report.assumptions) {
    const items = report.evidence.get(assumption) ?? [];
    console.log(`  ${assumption} (${String(items.length)} sources)`);
    for (const item of items) {
      console.log(`    - ${item.title}: ${item.url}`);
    }
  }
  for (const failure of report.gatheringFailures) {
    console.log(`  Search failed for "${failure.assumption}": ${failure.reason}`);
  }

  console.log('\n--- Assumption Verdicts ---');
  for (const verdict of report.assumptionVerdicts) {
    console.log(`  [${verdict.label}] ${verdict.assumption}`);
    if (verdict.citedUrls.length > 0) {
      console.log(`    Cited: ${verdict.citedUrls.join(', ')}`);
    }
    console.log(`    ${verdict.rationale.replace(/\n/g, '\n    ')}`);
  }

  console.log('\n--- Final Verdict ---');
  console.log(`  ${report.finalVerdict.label}${report.finalVerdict.determined ? '' : ' (default)'}`);
  console.log(`  ${report.finalVerdict.rationale.replace(/\n/g, '\n  ')}`);

  console.log(`\n=== Verification completed in ${String(report.durationMs)}ms ===`);
}

main().catch((error: unknown) => {
  const phase = failedPhase(error);
  const message = error instanceof Error ? error.message : String(error);

  if (error instanceof VerificationCancelledError) {
    console.error('Verification cancelled');
  } else if (phase) {
    console.error(`Verification failed during ${phase}: ${message}`);
  } else {
    console.error('Verification failed:', message);
  }
  process.exit(1);
});
