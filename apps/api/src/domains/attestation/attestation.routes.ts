import { type FastifyInstance } from 'fastify';
import {
  claimIdParamSchema,
  signAttestationSchema,
  listAttestationsSchema,
} from '@claim-scrub/shared/schemas/attestation.schema.js';
import {
  createAttestationHandlers,
  type AttestationHandlerDeps,
} from './attestation.handlers.js';

// ---------------------------------------------------------------------------
// Attestation Routes
// ---------------------------------------------------------------------------

export async function attestationRoutes(
  app: FastifyInstance,
  opts: { deps: AttestationHandlerDeps },
) {
  const handlers = createAttestationHandlers(opts.deps);

  // =========================================================================
  // Dashboard (static paths before /:claim_id)
  // =========================================================================

  app.get('/api/v1/attestations', {
    schema: { querystring: listAttestationsSchema },
    handler: handlers.listHandler,
  });

  app.get('/api/v1/attestations/stats', {
    handler: handlers.statsHandler,
  });

  app.get('/api/v1/attestations/archive', {
    schema: { querystring: listAttestationsSchema },
    handler: handlers.archiveHandler,
  });

  app.get('/api/v1/attestations/:claim_id', {
    schema: { params: claimIdParamSchema },
    handler: handlers.getHandler,
  });

  // =========================================================================
  // Status actions
  // =========================================================================

  app.post('/api/v1/attestations/:claim_id/sign', {
    schema: { params: claimIdParamSchema, body: signAttestationSchema },
    handler: handlers.signHandler,
  });

  app.post('/api/v1/attestations/:claim_id/verify', {
    schema: { params: claimIdParamSchema },
    handler: handlers.verifyHandler,
  });

  app.post('/api/v1/attestations/:claim_id/remind', {
    schema: { params: claimIdParamSchema },
    handler: handlers.remindHandler,
  });

  // =========================================================================
  // Documents
  // =========================================================================

  app.get('/api/v1/attestations/:claim_id/document', {
    schema: { params: claimIdParamSchema },
    handler: handlers.documentHandler,
  });
}
