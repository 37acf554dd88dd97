import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import { loadConfig } from '@newscheck/schemas/src/config-loader.js';
import { createLlmClient } from '@newscheck/core/src/llm/llm-client.js';
import { createWebSearchClient } from '@newscheck/core/src/services/web-search/web-search-client.js';
import { createVerificationPipeline } from '@newscheck/core/src/orchestration/pipeline.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const port = parseInt(process.env['PORT'] ?? '3000', 10);
  const configPath = process.env['NEWSCHECK_CONFIG'] ?? resolve(process.cwd(), 'config/verifier.json');

  const config = await loadConfig({ configPath, env: process.env });

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

  const app = createApp({ pipeline });

  log.info({ port, mock: config.mock }, 'Starting Newscheck API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'Newscheck API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
