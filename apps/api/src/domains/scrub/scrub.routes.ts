import { type FastifyInstance } from 'fastify';
import multipart from '@fastify/multipart';
import {
  sampleClaimsQuerySchema,
  scrubQuerySchema,
} from '@claim-scrub/shared/schemas/scrub.schema.js';
import { uploadRateLimit } from '../../plugins/rate-limit.plugin.js';
import {
  createScrubHandlers,
  type ScrubHandlerDeps,
} from './scrub.handlers.js';

// ---------------------------------------------------------------------------
// Scrub Routes
// ---------------------------------------------------------------------------

export async function scrubRoutes(
  app: FastifyInstance,
  opts: { deps: ScrubHandlerDeps },
) {
  const handlers = createScrubHandlers(opts.deps);

  // Bodies are a multipart CSV upload or JSON, so they are validated in the handler
  await app.register(multipart, {
    limits: {
      fileSize: opts.deps.maxUploadBytes,
      files: 1,
    },
  });

  app.post('/api/v1/scrub', {
    schema: { querystring: scrubQuerySchema },
    config: { rateLimit: uploadRateLimit() },
    handler: handlers.scrubHandler,
  });

  app.post('/api/v1/scrub/export', {
    config: { rateLimit: uploadRateLimit() },
    handler: handlers.exportHandler,
  });

  app.get('/api/v1/scrub/sample', {
    schema: { querystring: sampleClaimsQuerySchema },
    handler: handlers.sampleHandler,
  });
}
