import { describe, it, expect, vi, beforeEach } from 'vitest';
import { type ClaimRecord } from '@claim-scrub/shared/schemas/scrub.schema.js';
import {
  BusinessRuleError,
  ConflictError,
  NotFoundError,
} from '../../lib/errors.js';
import {
  createInMemoryAttestationRepository,
  type InMemoryAttestationStore,
} from '../../../test/helpers/in-memory-attestation.repository.js';
import { type AttestationDocument } from './attestation.document.js';
import { type ArchiveEntry } from './attestation.archive.js';
import {
  checkAttestationTransition,
  recordFlaggedClaims,
  signAttestation,
  verifyAttestation,
  markReminded,
  getAttestation,
  listAttestations,
  getAttestationStats,
  getAttestationDocument,
  buildAttestationArchive,
  type AttestationServiceDeps,
} from './attestation.service.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const NOW = new Date('2026-06-01T12:00:00.000Z');
const SIGNED_AT = new Date('2026-06-02T09:15:30.000Z');

function makeRecord(overrides: Partial<ClaimRecord> = {}): ClaimRecord {
  return {
    claimId: 'CLM0001',
    patientId: 'PAT0001',
    providerName: 'Dr. Smith',
    procedureCode: '99213',
    diagnosisCode: 'Z51.11',
    billedAmount: '150.00',
    dateOfService: '2026-03-15',
    renderingNpi: '1467503125',
    docStatus: undefined,
    placeOfService: '11',
    ...overrides,
  };
}

let store: InMemoryAttestationStore;
let deps: AttestationServiceDeps;
let rendered: AttestationDocument[];
let archived: ArchiveEntry[][];

beforeEach(() => {
  store = createInMemoryAttestationRepository(() => NOW);
  rendered = [];
  archived = [];
  deps = {
    repo: store.repo,
    renderer: {
      render: vi.fn(async (document: AttestationDocument) => {
        rendered.push(document);
        return new TextEncoder().encode(`pdf:${document.fields[0].value}`);
      }),
    },
    archiver: {
      createArchive: vi.fn(async (entries: readonly ArchiveEntry[]) => {
        archived.push([...entries]);
        return Buffer.from('zip');
      }),
    },
    clock: () => NOW,
  };
});

async function seed(...records: ClaimRecord[]): Promise<void> {
  await recordFlaggedClaims(
    deps,
    records.map((record) => ({ record, issues: ['Missing documentation'] })),
  );
}

// ============================================================================
// checkAttestationTransition
// ============================================================================

describe('checkAttestationTransition', () => {
  it('allows each forward step', () => {
    expect(checkAttestationTransition('Pending', 'Signed')).toEqual({ allowed: true });
    expect(checkAttestationTransition('Signed', 'Verified')).toEqual({ allowed: true });
  });

  it('rejects skipping a step', () => {
    expect(checkAttestationTransition('Pending', 'Verified')).toEqual({
      allowed: false,
      reason: 'Cannot move attestation from Pending to Verified',
    });
  });

  it('rejects moving backwards', () => {
    expect(checkAttestationTransition('Signed', 'Pending').allowed).toBe(false);
    expect(checkAttestationTransition('Verified', 'Signed').allowed).toBe(false);
  });

  it('rejects repeating the current status', () => {
    expect(checkAttestationTransition('Signed', 'Signed')).toEqual({
      allowed: false,
      reason: 'Attestation is already Signed',
    });
  });
});

// ============================================================================
// recordFlaggedClaims
// ============================================================================

describe('recordFlaggedClaims', () => {
  it('creates Pending attestations and skips claims without an ID', async () => {
    const result = await recordFlaggedClaims(deps, [
      { record: makeRecord(), issues: ['Missing documentation'] },
      { record: makeRecord({ claimId: '' }), issues: ['Missing claim ID'] },
    ]);

    expect(result).toEqual({ recorded: 1, created: 1, skipped: 1 });
    expect(store.attestations.get('CLM0001')?.status).toBe('Pending');
    expect(store.claims.get('CLM0001')?.docStatus).toBeNull();
  });

  it('replaces the claim on re-scrub without resetting its attestation', async () => {
    await seed(makeRecord());
    await signAttestation(deps, 'CLM0001', 'Dr. Smith', SIGNED_AT);

    const result = await recordFlaggedClaims(deps, [
      { record: makeRecord({ billedAmount: '0' }), issues: ['Zero billing amount — possible missing data'] },
    ]);

    expect(result).toEqual({ recorded: 1, created: 0, skipped: 0 });
    expect(store.claims.get('CLM0001')?.issues).toEqual([
      'Zero billing amount — possible missing data',
    ]);
    expect(store.attestations.get('CLM0001')?.status).toBe('Signed');
  });

  it('stores nothing from the batch when one claim fails to save', async () => {
    const failing = createInMemoryAttestationRepository(() => NOW, {
      beforeWrite: (claim) => {
        if (claim.claimId === 'B') throw new Error('write rejected');
      },
    });
    deps = { ...deps, repo: failing.repo };

    await expect(
      recordFlaggedClaims(deps, [
        { record: makeRecord({ claimId: 'A' }), issues: ['Missing documentation'] },
        { record: makeRecord({ claimId: 'B' }), issues: ['Missing documentation'] },
        { record: makeRecord({ claimId: 'C' }), issues: ['Missing documentation'] },
      ]),
    ).rejects.toThrow('write rejected');

    expect(failing.claims.size).toBe(0);
    expect(failing.attestations.size).toBe(0);
  });

  it('keeps earlier attestations intact when a later batch fails', async () => {
    const failing = createInMemoryAttestationRepository(() => NOW, {
      beforeWrite: (claim) => {
        if (claim.procedureCode.length > 20) throw new Error('write rejected');
      },
    });
    deps = { ...deps, repo: failing.repo };
    await seed(makeRecord());
    await signAttestation(deps, 'CLM0001', 'Dr. Smith', SIGNED_AT);

    await expect(
      recordFlaggedClaims(deps, [
        { record: makeRecord({ billedAmount: '0' }), issues: ['Zero billing amount — possible missing data'] },
        {
          record: makeRecord({ claimId: 'CLM0002', procedureCode: '99213 office visit established' }),
          issues: ['Invalid CPT code format'],
        },
      ]),
    ).rejects.toThrow('write rejected');

    expect([...failing.claims.keys()]).toEqual(['CLM0001']);
    expect(failing.claims.get('CLM0001')?.billedAmount).toBe('150.00');
    expect(failing.attestations.get('CLM0001')?.status).toBe('Signed');
  });

  it('records long free-text values as received', async () => {
    const result = await recordFlaggedClaims(deps, [
      {
        record: makeRecord({ procedureCode: '99213 office visit established' }),
        issues: ['Invalid CPT code format'],
      },
    ]);

    expect(result).toEqual({ recorded: 1, created: 1, skipped: 0 });
    expect(store.claims.get('CLM0001')?.procedureCode).toBe('99213 office visit established');
  });
});

// ============================================================================
// Status actions
// ============================================================================

describe('signAttestation', () => {
  it('records the signer and moves to Signed', async () => {
    await seed(makeRecord());

    const view = await signAttestation(deps, 'CLM0001', 'Dr. Smith', SIGNED_AT);

    expect(view.status).toBe('Signed');
    expect(view.signedName).toBe('Dr. Smith');
    expect(view.signedAt).toEqual(SIGNED_AT);
  });

  it('defaults the signature time to the clock', async () => {
    await seed(makeRecord());

    const view = await signAttestation(deps, 'CLM0001', 'Dr. Smith');

    expect(view.signedAt).toEqual(NOW);
  });

  it('rejects signing twice', async () => {
    await seed(makeRecord());
    await signAttestation(deps, 'CLM0001', 'Dr. Smith');

    await expect(signAttestation(deps, 'CLM0001', 'Dr. Smith')).rejects.toThrow(
      BusinessRuleError,
    );
    await expect(signAttestation(deps, 'CLM0001', 'Dr. Smith')).rejects.toThrow(
      'Attestation is already Signed',
    );
  });

  it('throws NotFoundError for unknown claims', async () => {
    await expect(signAttestation(deps, 'NOPE', 'Dr. Smith')).rejects.toThrow(NotFoundError);
  });

  it('throws ConflictError when the status changes underneath', async () => {
    await seed(makeRecord());
    vi.spyOn(store.repo, 'updateAttestation').mockResolvedValueOnce(undefined);

    await expect(signAttestation(deps, 'CLM0001', 'Dr. Smith')).rejects.toThrow(ConflictError);
  });
});

describe('verifyAttestation', () => {
  it('rejects verifying an unsigned attestation', async () => {
    await seed(makeRecord());

    await expect(verifyAttestation(deps, 'CLM0001')).rejects.toThrow(
      'Cannot move attestation from Pending to Verified',
    );
  });

  it('verifies a signed attestation', async () => {
    await seed(makeRecord());
    await signAttestation(deps, 'CLM0001', 'Dr. Smith', SIGNED_AT);

    const view = await verifyAttestation(deps, 'CLM0001');

    expect(view.status).toBe('Verified');
    expect(view.verifiedAt).toEqual(NOW);
    expect(view.signedName).toBe('Dr. Smith');
  });
});

describe('markReminded', () => {
  it('stamps the reminder time on a Pending attestation', async () => {
    await seed(makeRecord());

    const view = await markReminded(deps, 'CLM0001');

    expect(view.status).toBe('Pending');
    expect(view.lastReminderAt).toEqual(NOW);
  });

  it('rejects reminders once signed', async () => {
    await seed(makeRecord());
    await signAttestation(deps, 'CLM0001', 'Dr. Smith');

    await expect(markReminded(deps, 'CLM0001')).rejects.toThrow(
      'Reminders can only be sent for Pending attestations (currently Signed)',
    );
  });
});

// ============================================================================
// Dashboard
// ============================================================================

describe('listAttestations', () => {
  beforeEach(async () => {
    await recordFlaggedClaims(deps, [
      { record: makeRecord({ claimId: 'A', providerName: 'Dr. Smith' }), issues: ['Missing documentation'] },
      { record: makeRecord({ claimId: 'B', providerName: 'Dr. Jones' }), issues: ['High-audit-risk diagnosis'] },
      { record: makeRecord({ claimId: 'C', providerName: 'Dr. Smithers' }), issues: ['Invalid NPI format'] },
    ]);
    await signAttestation(deps, 'C', 'Dr. Smithers');
  });

  it('lists newest first', async () => {
    const views = await listAttestations(deps);
    expect(views.map((v) => v.claimId)).toEqual(['C', 'B', 'A']);
  });

  it('filters by provider substring, case-insensitively', async () => {
    const views = await listAttestations(deps, { provider: 'smith' });
    expect(views.map((v) => v.claimId)).toEqual(['C', 'A']);
  });

  it('filters by status', async () => {
    const views = await listAttestations(deps, { status: 'Signed' });
    expect(views.map((v) => v.claimId)).toEqual(['C']);
  });

  it('filters by issue substring', async () => {
    const views = await listAttestations(deps, { issue: 'audit-risk' });
    expect(views.map((v) => v.claimId)).toEqual(['B']);
  });
});

describe('getAttestation', () => {
  it('returns the flattened claim and attestation', async () => {
    await seed(makeRecord());

    const view = await getAttestation(deps, 'CLM0001');

    expect(view).toEqual({
      claimId: 'CLM0001',
      patientId: 'PAT0001',
      providerName: 'Dr. Smith',
      procedureCode: '99213',
      diagnosisCode: 'Z51.11',
      billedAmount: '150.00',
      dateOfService: '2026-03-15',
      renderingNpi: '1467503125',
      docStatus: null,
      placeOfService: '11',
      issues: ['Missing documentation'],
      status: 'Pending',
      signedName: null,
      signedAt: null,
      verifiedAt: null,
      lastReminderAt: null,
      flaggedAt: NOW,
      updatedAt: NOW,
    });
  });
});

describe('getAttestationStats', () => {
  it('zero-fills every status', async () => {
    expect(await getAttestationStats(deps)).toEqual({
      Pending: 0,
      Signed: 0,
      Verified: 0,
      total: 0,
    });
  });

  it('counts attestations by status', async () => {
    await seed(makeRecord({ claimId: 'A' }), makeRecord({ claimId: 'B' }), makeRecord({ claimId: 'C' }));
    await signAttestation(deps, 'B', 'Dr. Smith');

    expect(await getAttestationStats(deps)).toEqual({
      Pending: 2,
      Signed: 1,
      Verified: 0,
      total: 3,
    });
  });
});

// ============================================================================
// Documents
// ============================================================================

describe('getAttestationDocument', () => {
  it('renders the claim with a blank signature while Pending', async () => {
    await seed(makeRecord({ claimId: 'CLM0002', providerName: 'Dr. Jones' }));

    const doc = await getAttestationDocument(deps, 'CLM0002');

    expect(doc.fileName).toBe('Claim_CLM0002_Dr_Jones.pdf');
    expect(new TextDecoder().decode(doc.content)).toBe('pdf:CLM0002');
    expect(rendered[0].issues).toEqual(['Missing documentation']);
    expect(rendered[0].signatureLines[0]).toBe(
      'Provider Signature: ______________________________',
    );
  });

  it('renders the electronic signature once signed', async () => {
    await seed(makeRecord({ claimId: 'CLM0002', providerName: 'Dr. Jones' }));
    await signAttestation(deps, 'CLM0002', 'Dr. Jones', SIGNED_AT);

    await getAttestationDocument(deps, 'CLM0002');

    expect(rendered[0].signatureLines[1]).toBe(
      'Electronically signed by Dr. Jones on 2026-06-02T09:15:30Z',
    );
  });
});

describe('buildAttestationArchive', () => {
  it('renders every matching attestation into the archive', async () => {
    await seed(makeRecord({ claimId: 'A' }), makeRecord({ claimId: 'B', providerName: 'Dr. Jones' }));
    await signAttestation(deps, 'B', 'Dr. Jones', SIGNED_AT);

    const zip = await buildAttestationArchive(deps, { provider: 'jones' });

    expect(zip.toString()).toBe('zip');
    expect(archived).toHaveLength(1);
    expect(archived[0]).toHaveLength(1);
    const [entry] = archived[0];
    expect(entry.claimId).toBe('B');
    expect(entry.providerName).toBe('Dr. Jones');
    expect(entry.status).toBe('Signed');
    expect(entry.signedAt).toEqual(SIGNED_AT);
    expect(new TextDecoder().decode(entry.pdf)).toBe('pdf:B');
  });

  it('hands an empty selection to the archiver', async () => {
    await buildAttestationArchive(deps, { status: 'Verified' });
    expect(archived).toEqual([[]]);
  });
});
