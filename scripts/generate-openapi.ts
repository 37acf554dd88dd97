import { buildOpenApiDocument, createApp } from '../packages/api/src/app.js';
import type { VerificationPipeline } from '../packages/core/src/orchestration/pipeline.js';

const unusedPipeline: VerificationPipeline = {
  run: () => Promise.reject(new Error('The pipeline is not available while generating the OpenAPI document')),
};

const doc = buildOpenApiDocument(createApp({ pipeline: unusedPipeline }));

doc.servers = [{ url: 'http://localhost:3000', description: 'Local development' }];

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
