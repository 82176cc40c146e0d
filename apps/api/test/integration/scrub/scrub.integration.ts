import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';
import { scrubRoutes } from '../../../src/domains/scrub/scrub.routes.js';
import { type ScrubHandlerDeps } from '../../../src/domains/scrub/scrub.handlers.js';
import { errorHandlerPluginFp } from '../../../src/plugins/error-handler.plugin.js';
import { buildMultipartPayload } from '../../helpers/multipart.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const AS_OF = new Date('2026-06-01T12:00:00.000Z');

const FLAGGED_CLAIM = {
  ClaimID: 'CLM0001',
  PatientID: 'PAT0001',
  ProviderName: 'Dr. Test Provider',
  ProcedureCode: '99213',
  DiagnosisCode: 'Z51.11',
  BilledAmount: '150.00',
  DateOfService: '2026-03-15',
  RenderingNPI: '1467503125',
  DocStatus: '',
  PlaceOfService: '11',
};

const CLEAN_CLAIM = {
  ClaimID: 'CLM0002',
  PatientID: 'PAT0002',
  ProviderName: 'Dr. Jones',
  ProcedureCode: '99214',
  DiagnosisCode: 'E11.9',
  BilledAmount: '200.00',
  DateOfService: '2026-04-01',
  RenderingNPI: '1467503125',
  DocStatus: 'Attached',
  PlaceOfService: '11',
};

const CSV_CONTENT = [
  'ClaimID,PatientID,ProviderName,ProcedureCode,DiagnosisCode,BilledAmount,DateOfService,RenderingNPI,DocStatus,PlaceOfService',
  'CLM0001,PAT0001,Dr. Test Provider,99213,Z51.11,150.00,2026-03-15,1467503125,,11',
  'CLM0002,PAT0002,Dr. Jones,99214,E11.9,200.00,2026-04-01,1467503125,Attached,11',
].join('\n');

// ---------------------------------------------------------------------------
// Test App Builder
// ---------------------------------------------------------------------------

let app: FastifyInstance;
let recordFlaggedClaims: ReturnType<typeof vi.fn>;

async function buildTestApp(): Promise<FastifyInstance> {
  recordFlaggedClaims = vi.fn().mockResolvedValue({ recorded: 1, created: 1, skipped: 0 });

  const deps: ScrubHandlerDeps = {
    serviceDeps: {
      recorder: { recordFlaggedClaims },
      filingWindowDays: 730,
      clock: () => AS_OF,
    },
    maxUploadBytes: 1024,
  };

  const testApp = Fastify({ logger: false });

  testApp.setValidatorCompiler(validatorCompiler);
  testApp.setSerializerCompiler(serializerCompiler);

  await testApp.register(errorHandlerPluginFp);
  await testApp.register(scrubRoutes, { deps });

  await testApp.ready();
  return testApp;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function postJson(url: string, body: Record<string, unknown>) {
  return app.inject({
    method: 'POST',
    url,
    headers: { 'content-type': 'application/json' },
    payload: body,
  });
}

function upload(url: string, filename: string, content: string, contentType = 'text/csv') {
  const { body, boundary } = buildMultipartPayload(filename, content, contentType);
  return app.inject({
    method: 'POST',
    url,
    headers: { 'content-type': `multipart/form-data; boundary=${boundary}` },
    payload: body,
  });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Scrub Routes Integration Tests', () => {
  beforeAll(async () => {
    app = await buildTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    recordFlaggedClaims.mockClear();
  });

  describe('POST /api/v1/scrub (JSON)', () => {
    it('returns the summary, clean and flagged claims', async () => {
      const res = await postJson('/api/v1/scrub', { claims: [FLAGGED_CLAIM, CLEAN_CLAIM] });

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      expect(data.summary).toEqual({
        totalClaims: 2,
        flaggedClaims: 1,
        cleanClaims: 1,
        complianceRate: 50,
        issueCounts: { 'Missing documentation': 1 },
        severityBreakdown: { HIGH: 0, MEDIUM: 1 },
      });
      expect(data.clean.map((c: { claimId: string }) => c.claimId)).toEqual(['CLM0002']);
      expect(data.flagged).toHaveLength(1);
      expect(data.flagged[0].record.claimId).toBe('CLM0001');
      expect(data.flagged[0].issues).toEqual(['Missing documentation']);
      expect(data.flagged[0].severity).toBe('MEDIUM');
      expect(data.recorded).toEqual({ recorded: 1, created: 1, skipped: 0 });
      expect(data.unmappedColumns).toEqual([]);
    });

    it('hands flagged claims to the attestation store', async () => {
      await postJson('/api/v1/scrub', { claims: [FLAGGED_CLAIM, CLEAN_CLAIM] });

      expect(recordFlaggedClaims).toHaveBeenCalledTimes(1);
      const [flagged] = recordFlaggedClaims.mock.calls[0];
      expect(flagged).toHaveLength(1);
      expect(flagged[0].record.claimId).toBe('CLM0001');
    });

    it('skips persistence when persist=false', async () => {
      const res = await postJson('/api/v1/scrub?persist=false', { claims: [FLAGGED_CLAIM] });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.recorded).toBeNull();
      expect(recordFlaggedClaims).not.toHaveBeenCalled();
    });

    it('reports columns it does not recognise', async () => {
      const res = await postJson('/api/v1/scrub', {
        claims: [{ ...CLEAN_CLAIM, Notes: 'follow up' }],
      });

      expect(res.statusCode).toBe(200);
      expect(res.json().data.unmappedColumns).toEqual(['Notes']);
    });

    it('rejects an empty claims list', async () => {
      const res = await postJson('/api/v1/scrub', { claims: [] });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('rejects an unknown persist value', async () => {
      const res = await postJson('/api/v1/scrub?persist=maybe', { claims: [CLEAN_CLAIM] });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /api/v1/scrub (CSV upload)', () => {
    it('parses and scrubs an uploaded CSV', async () => {
      const res = await upload('/api/v1/scrub', 'claims.csv', CSV_CONTENT);

      expect(res.statusCode).toBe(200);
      const { data } = res.json();
      expect(data.summary.totalClaims).toBe(2);
      expect(data.summary.flaggedClaims).toBe(1);
      expect(data.flagged[0].record.claimId).toBe('CLM0001');
    });

    it('accepts .txt uploads sent as text/plain', async () => {
      const res = await upload('/api/v1/scrub', 'claims.txt', CSV_CONTENT, 'text/plain');
      expect(res.statusCode).toBe(200);
    });

    it('rejects other file extensions', async () => {
      const res = await upload('/api/v1/scrub', 'claims.xlsx', CSV_CONTENT);

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Only .csv and .txt files are accepted',
      });
    });

    it('rejects disallowed content types', async () => {
      const res = await upload('/api/v1/scrub', 'claims.csv', CSV_CONTENT, 'application/pdf');
      expect(res.statusCode).toBe(400);
    });

    it('rejects an empty file', async () => {
      const res = await upload('/api/v1/scrub', 'claims.csv', '');

      expect(res.statusCode).toBe(400);
      expect(res.json().error.message).toBe('Uploaded file is empty');
    });

    it('rejects a header with no claim columns', async () => {
      const res = await upload('/api/v1/scrub', 'claims.csv', 'foo,bar\n1,2');

      expect(res.statusCode).toBe(400);
      expect(res.json().error.message).toBe('No recognised claim columns in header');
    });

    it('rejects files over the upload limit', async () => {
      const res = await upload('/api/v1/scrub', 'claims.csv', CSV_CONTENT + '\n' + 'x'.repeat(2048));

      // Multipart reports the limit either as a truncated file or as 413
      expect([400, 413]).toContain(res.statusCode);
    });
  });

  describe('POST /api/v1/scrub/export', () => {
    it('returns every claim with its issues as CSV', async () => {
      const res = await postJson('/api/v1/scrub/export', { claims: [FLAGGED_CLAIM, CLEAN_CLAIM] });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe(
        'attachment; filename="claims_with_issues.csv"',
      );
      expect(res.body).toBe(
        'ClaimID,PatientID,ProviderName,ProcedureCode,DiagnosisCode,BilledAmount,DateOfService,RenderingNPI,DocStatus,PlaceOfService,Issues\n' +
          'CLM0001,PAT0001,Dr. Test Provider,99213,Z51.11,150.00,2026-03-15,1467503125,,11,Missing documentation\n' +
          'CLM0002,PAT0002,Dr. Jones,99214,E11.9,200.00,2026-04-01,1467503125,Attached,11,\n',
      );
    });

    it('does not persist anything', async () => {
      await upload('/api/v1/scrub/export', 'claims.csv', CSV_CONTENT);
      expect(recordFlaggedClaims).not.toHaveBeenCalled();
    });
  });

  describe('GET /api/v1/scrub/sample', () => {
    it('downloads the requested number of sample claims', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/scrub/sample?count=5' });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(res.headers['content-disposition']).toBe('attachment; filename="sample_claims.csv"');

      const lines = res.body.trimEnd().split('\n');
      expect(lines).toHaveLength(6);
      expect(lines[0]).toBe(
        'ClaimID,PatientID,ProviderName,ProcedureCode,DiagnosisCode,BilledAmount,DateOfService,RenderingNPI,DocStatus,PlaceOfService',
      );
      expect(lines[5]).toBe(
        'CLM0005,PAT0005,Dr. Lisa Thompson,J9355,L70.9,1250.00,2026-04-27,1467503125,Complete,11',
      );
    });

    it('defaults to twenty claims', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/scrub/sample' });

      expect(res.statusCode).toBe(200);
      expect(res.body.trimEnd().split('\n')).toHaveLength(21);
    });

    it('rejects a count outside the allowed range', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/scrub/sample?count=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe('VALIDATION_ERROR');
    });
  });
});
