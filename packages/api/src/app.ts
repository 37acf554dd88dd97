import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { VerificationPipeline } from '@newscheck/core/src/orchestration/pipeline.js';
import { createChildLogger } from '@newscheck/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { API_VERSION, health } from './routes/health.js';
import { createVerificationRoutes } from './routes/verifications.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly pipeline: VerificationPipeline;
}

export function buildOpenApiDocument(
  app: OpenAPIHono<AppEnv>,
): ReturnType<OpenAPIHono<AppEnv>['getOpenAPI31Document']> {
  return app.getOpenAPI31Document({
    openapi: '3.1.0',
    info: {
      title: 'Newscheck API',
      version: API_VERSION,
      description: 'Checks news statements against live web search and returns a REAL or FAKE verdict',
    },
  });
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => c.json(buildOpenApiDocument(app)));

  app.route('/verifications', createVerificationRoutes(config.pipeline));

  return app;
}
