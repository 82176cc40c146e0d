import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  type ClaimIdParam,
  type SignAttestation,
  type ListAttestations,
} from '@claim-scrub/shared/schemas/attestation.schema.js';
import {
  listAttestations,
  getAttestation,
  getAttestationStats,
  signAttestation,
  verifyAttestation,
  markReminded,
  getAttestationDocument,
  buildAttestationArchive,
  type AttestationServiceDeps,
} from './attestation.service.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface AttestationHandlerDeps {
  serviceDeps: AttestationServiceDeps;
}

export const ARCHIVE_FILE_NAME = 'attestation_archive.zip';

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createAttestationHandlers(deps: AttestationHandlerDeps) {
  const { serviceDeps } = deps;

  // =========================================================================
  // Dashboard
  // =========================================================================

  async function listHandler(
    request: FastifyRequest<{ Querystring: ListAttestations }>,
    reply: FastifyReply,
  ) {
    const attestations = await listAttestations(serviceDeps, request.query);
    return reply.code(200).send({ data: attestations });
  }

  async function statsHandler(_request: FastifyRequest, reply: FastifyReply) {
    const stats = await getAttestationStats(serviceDeps);
    return reply.code(200).send({ data: stats });
  }

  async function getHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const attestation = await getAttestation(serviceDeps, request.params.claim_id);
    return reply.code(200).send({ data: attestation });
  }

  // =========================================================================
  // Status actions
  // =========================================================================

  async function signHandler(
    request: FastifyRequest<{ Params: ClaimIdParam; Body: SignAttestation }>,
    reply: FastifyReply,
  ) {
    const { claim_id } = request.params;
    const { signer_name, signed_at } = request.body;

    const attestation = await signAttestation(
      serviceDeps,
      claim_id,
      signer_name,
      signed_at ? new Date(signed_at) : undefined,
    );

    request.log.info({ claimId: claim_id }, 'Attestation signed');
    return reply.code(200).send({ data: attestation });
  }

  async function verifyHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const { claim_id } = request.params;

    const attestation = await verifyAttestation(serviceDeps, claim_id);

    request.log.info({ claimId: claim_id }, 'Attestation verified');
    return reply.code(200).send({ data: attestation });
  }

  async function remindHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const { claim_id } = request.params;

    const attestation = await markReminded(serviceDeps, claim_id);

    request.log.info({ claimId: claim_id }, 'Attestation reminder recorded');
    return reply.code(200).send({ data: attestation });
  }

  // =========================================================================
  // Documents
  // =========================================================================

  async function documentHandler(
    request: FastifyRequest<{ Params: ClaimIdParam }>,
    reply: FastifyReply,
  ) {
    const { fileName, content } = await getAttestationDocument(
      serviceDeps,
      request.params.claim_id,
    );

    return reply
      .code(200)
      .type('application/pdf')
      .header('Content-Disposition', `attachment; filename="${fileName}"`)
      .send(Buffer.from(content));
  }

  async function archiveHandler(
    request: FastifyRequest<{ Querystring: ListAttestations }>,
    reply: FastifyReply,
  ) {
    const archive = await buildAttestationArchive(serviceDeps, request.query);

    return reply
      .code(200)
      .type('application/zip')
      .header('Content-Disposition', `attachment; filename="${ARCHIVE_FILE_NAME}"`)
      .send(archive);
  }

  return {
    listHandler,
    statsHandler,
    getHandler,
    signHandler,
    verifyHandler,
    remindHandler,
    documentHandler,
    archiveHandler,
  };
}
