import { type FastifyRequest, type FastifyReply } from 'fastify';
import {
  scrubRequestSchema,
  type SampleClaimsQuery,
  type ScrubQuery,
} from '@claim-scrub/shared/schemas/scrub.schema.js';
import { resolveClaimColumn } from '@claim-scrub/shared/constants/scrub.constants.js';
import {
  exportScrubCsv,
  normalizeClaimRow,
  parseClaimsCsv,
  runScrub,
  sampleClaimsCsv,
  type ParsedClaims,
  type ScrubServiceDeps,
} from './scrub.service.js';
import { ValidationError } from '../../lib/errors.js';

// ---------------------------------------------------------------------------
// Handler dependencies
// ---------------------------------------------------------------------------

export interface ScrubHandlerDeps {
  serviceDeps: ScrubServiceDeps;
  maxUploadBytes: number;
}

export const EXPORT_FILE_NAME = 'claims_with_issues.csv';
export const SAMPLE_FILE_NAME = 'sample_claims.csv';

const ALLOWED_MIMES = ['text/csv', 'text/plain', 'application/csv', 'application/vnd.ms-excel'];

// ---------------------------------------------------------------------------
// Helper: read claims from a multipart upload or a JSON body
// ---------------------------------------------------------------------------

async function readUpload(request: FastifyRequest, maxUploadBytes: number): Promise<string> {
  const data = await request.file();
  if (!data) {
    throw new ValidationError('No file uploaded');
  }

  const fileName = data.filename ?? '';
  const ext = fileName.toLowerCase().split('.').pop();
  if (ext !== 'csv' && ext !== 'txt') {
    throw new ValidationError('Only .csv and .txt files are accepted');
  }

  // Loose check: some systems send text/plain or the Excel type for CSV
  const mime = data.mimetype ?? '';
  if (mime && !ALLOWED_MIMES.includes(mime)) {
    throw new ValidationError('Only .csv and .txt files are accepted');
  }

  const chunks: Buffer[] = [];
  for await (const chunk of data.file) {
    chunks.push(chunk);
  }

  if (data.file.truncated) {
    throw new ValidationError(`File exceeds maximum size of ${maxUploadBytes} bytes`);
  }

  return Buffer.concat(chunks).toString('utf8');
}

function readJsonClaims(body: unknown): ParsedClaims {
  const parsed = scrubRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Request must be a CSV upload or a JSON body with claims', {
      issues: parsed.error.issues,
    });
  }

  const unmapped = new Set<string>();
  for (const row of parsed.data.claims) {
    for (const key of Object.keys(row)) {
      if (!resolveClaimColumn(key)) unmapped.add(key);
    }
  }

  return {
    records: parsed.data.claims.map(normalizeClaimRow),
    unmappedColumns: [...unmapped],
  };
}

async function readClaims(request: FastifyRequest, maxUploadBytes: number): Promise<ParsedClaims> {
  if (request.isMultipart()) {
    return parseClaimsCsv(await readUpload(request, maxUploadBytes));
  }
  return readJsonClaims(request.body);
}

// ---------------------------------------------------------------------------
// Handler factory
// ---------------------------------------------------------------------------

export function createScrubHandlers(deps: ScrubHandlerDeps) {
  const { serviceDeps, maxUploadBytes } = deps;

  // POST /api/v1/scrub
  async function scrubHandler(
    request: FastifyRequest<{ Querystring: ScrubQuery }>,
    reply: FastifyReply,
  ) {
    const { records, unmappedColumns } = await readClaims(request, maxUploadBytes);

    const outcome = await runScrub(serviceDeps, records, { persist: request.query.persist });

    request.log.info(
      {
        totalClaims: outcome.summary.totalClaims,
        flaggedClaims: outcome.summary.flaggedClaims,
        recorded: outcome.recorded,
      },
      'Claims scrubbed',
    );

    return reply.code(200).send({ data: { ...outcome, unmappedColumns } });
  }

  // POST /api/v1/scrub/export
  async function exportHandler(request: FastifyRequest, reply: FastifyReply) {
    const { records } = await readClaims(request, maxUploadBytes);

    const csv = exportScrubCsv(serviceDeps, records);

    request.log.info({ totalClaims: records.length }, 'Claims exported');

    return reply
      .code(200)
      .type('text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${EXPORT_FILE_NAME}"`)
      .send(csv);
  }

  // GET /api/v1/scrub/sample
  async function sampleHandler(
    request: FastifyRequest<{ Querystring: SampleClaimsQuery }>,
    reply: FastifyReply,
  ) {
    const csv = sampleClaimsCsv(serviceDeps, request.query.count);

    return reply
      .code(200)
      .type('text/csv; charset=utf-8')
      .header('Content-Disposition', `attachment; filename="${SAMPLE_FILE_NAME}"`)
      .send(csv);
  }

  return {
    scrubHandler,
    exportHandler,
    sampleHandler,
  };
}
