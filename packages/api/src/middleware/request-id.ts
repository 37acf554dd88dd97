import { randomUUID } from 'node:crypto';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

const MAX_INCOMING_ID_LENGTH = 128;

/** Reuses a caller-supplied request id when it is short enough, otherwise generates one. */
export const requestId = createMiddleware<AppEnv>(async (c, next) => {
  const incoming = c.req.header(REQUEST_ID_HEADER)?.trim();
  const id =
    incoming && incoming.length <= MAX_INCOMING_ID_LENGTH ? incoming : randomUUID();

  c.set('requestId', id);
  c.header(REQUEST_ID_HEADER, id);
  await next();
});
