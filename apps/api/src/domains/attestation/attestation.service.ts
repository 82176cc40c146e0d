// ============================================================================
// Provider Attestation — Service
// Records flagged claims, moves attestations through
// Pending -> Signed -> Verified, and produces the PDF / ZIP artifacts.
// ============================================================================

import {
  AttestationStatus,
  ATTESTATION_STATUSES,
  ATTESTATION_TRANSITIONS,
} from '@claim-scrub/shared/constants/attestation.constants.js';
import {
  BusinessRuleError,
  ConflictError,
  NotFoundError,
} from '../../lib/errors.js';
import { type FlaggedClaim } from '../scrub/scrub.rules.js';
import { type RecordFlaggedResult } from '../scrub/scrub.service.js';
import {
  type AttestationFilters,
  type AttestationRecord,
  type AttestationRepository,
  type AttestationUpdate,
  type FlaggedClaimInsert,
} from './attestation.repository.js';
import {
  attestationFileName,
  buildAttestationDocument,
  type AttestationDocumentInput,
  type AttestationRenderer,
} from './attestation.document.js';
import { type ArchiveEntry, type AttestationArchiver } from './attestation.archive.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface AttestationServiceDeps {
  repo: AttestationRepository;
  renderer: AttestationRenderer;
  archiver: AttestationArchiver;
  clock?: () => Date;
}

function now(deps: AttestationServiceDeps): Date {
  return deps.clock ? deps.clock() : new Date();
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

export interface AttestationView {
  claimId: string;
  patientId: string;
  providerName: string;
  procedureCode: string;
  diagnosisCode: string | null;
  billedAmount: string;
  dateOfService: string;
  renderingNpi: string | null;
  docStatus: string | null;
  placeOfService: string | null;
  issues: string[];
  status: AttestationStatus;
  signedName: string | null;
  signedAt: Date | null;
  verifiedAt: Date | null;
  lastReminderAt: Date | null;
  flaggedAt: Date;
  updatedAt: Date;
}

export function toAttestationView({ claim, attestation }: AttestationRecord): AttestationView {
  return {
    claimId: claim.claimId,
    patientId: claim.patientId,
    providerName: claim.providerName,
    procedureCode: claim.procedureCode,
    diagnosisCode: claim.diagnosisCode,
    billedAmount: claim.billedAmount,
    dateOfService: claim.dateOfService,
    renderingNpi: claim.renderingNpi,
    docStatus: claim.docStatus,
    placeOfService: claim.placeOfService,
    issues: claim.issues,
    status: attestation.status,
    signedName: attestation.signedName,
    signedAt: attestation.signedAt,
    verifiedAt: attestation.verifiedAt,
    lastReminderAt: attestation.lastReminderAt,
    flaggedAt: claim.createdAt,
    updatedAt: claim.updatedAt,
  };
}

export type AttestationStats = Record<AttestationStatus, number> & { total: number };

// ---------------------------------------------------------------------------
// Status transitions
// ---------------------------------------------------------------------------

export type TransitionCheck =
  | { allowed: true }
  | { allowed: false; reason: string };

/** Only the next forward step is allowed; repeats and reversals are rejected. */
export function checkAttestationTransition(
  from: AttestationStatus,
  to: AttestationStatus,
): TransitionCheck {
  if (from === to) {
    return { allowed: false, reason: `Attestation is already ${from}` };
  }
  if (!ATTESTATION_TRANSITIONS[from].includes(to)) {
    return {
      allowed: false,
      reason: `Cannot move attestation from ${from} to ${to}`,
    };
  }
  return { allowed: true };
}

async function getRecordOrThrow(
  deps: AttestationServiceDeps,
  claimId: string,
): Promise<AttestationRecord> {
  const record = await deps.repo.findByClaimId(claimId);
  if (!record) {
    throw new NotFoundError('Attestation');
  }
  return record;
}

async function transition(
  deps: AttestationServiceDeps,
  claimId: string,
  to: AttestationStatus,
  data: AttestationUpdate,
): Promise<AttestationView> {
  const record = await getRecordOrThrow(deps, claimId);
  const from = record.attestation.status;

  const check = checkAttestationTransition(from, to);
  if (!check.allowed) {
    throw new BusinessRuleError(check.reason, { claimId, from, to });
  }

  const updated = await deps.repo.updateAttestation(claimId, from, {
    ...data,
    status: to,
  });
  if (!updated) {
    throw new ConflictError('Attestation status changed while updating');
  }

  return toAttestationView({ claim: record.claim, attestation: updated });
}

// ---------------------------------------------------------------------------
// Service: recordFlaggedClaims
// ---------------------------------------------------------------------------

/**
 * Store each flagged claim with its issues. Claims flagged for the first
 * time get a Pending attestation; claims without an ID cannot be tracked
 * and are skipped. The batch is stored all-or-nothing.
 */
export async function recordFlaggedClaims(
  deps: AttestationServiceDeps,
  flagged: readonly FlaggedClaim[],
): Promise<RecordFlaggedResult> {
  const rows: FlaggedClaimInsert[] = [];
  let skipped = 0;

  for (const { record, issues } of flagged) {
    if (!record.claimId) {
      skipped += 1;
      continue;
    }

    rows.push({
      claimId: record.claimId,
      patientId: record.patientId,
      providerName: record.providerName,
      procedureCode: record.procedureCode,
      diagnosisCode: record.diagnosisCode ?? null,
      billedAmount: record.billedAmount,
      dateOfService: record.dateOfService,
      renderingNpi: record.renderingNpi ?? null,
      docStatus: record.docStatus ?? null,
      placeOfService: record.placeOfService ?? null,
      issues,
    });
  }

  const results = await deps.repo.upsertFlaggedClaims(rows);

  return {
    recorded: results.length,
    created: results.filter((r) => r.created).length,
    skipped,
  };
}

// ---------------------------------------------------------------------------
// Service: status actions
// ---------------------------------------------------------------------------

export async function signAttestation(
  deps: AttestationServiceDeps,
  claimId: string,
  signerName: string,
  at?: Date,
): Promise<AttestationView> {
  return transition(deps, claimId, AttestationStatus.SIGNED, {
    signedName: signerName,
    signedAt: at ?? now(deps),
  });
}

export async function verifyAttestation(
  deps: AttestationServiceDeps,
  claimId: string,
  at?: Date,
): Promise<AttestationView> {
  return transition(deps, claimId, AttestationStatus.VERIFIED, {
    verifiedAt: at ?? now(deps),
  });
}

/** Stamp a reminder on a Pending attestation. Status is unchanged. */
export async function markReminded(
  deps: AttestationServiceDeps,
  claimId: string,
  at?: Date,
): Promise<AttestationView> {
  const record = await getRecordOrThrow(deps, claimId);
  if (record.attestation.status !== AttestationStatus.PENDING) {
    throw new BusinessRuleError(
      `Reminders can only be sent for Pending attestations (currently ${record.attestation.status})`,
      { claimId, status: record.attestation.status },
    );
  }

  const updated = await deps.repo.updateAttestation(claimId, AttestationStatus.PENDING, {
    lastReminderAt: at ?? now(deps),
  });
  if (!updated) {
    throw new ConflictError('Attestation status changed while updating');
  }

  return toAttestationView({ claim: record.claim, attestation: updated });
}

// ---------------------------------------------------------------------------
// Service: dashboard
// ---------------------------------------------------------------------------

export async function getAttestation(
  deps: AttestationServiceDeps,
  claimId: string,
): Promise<AttestationView> {
  return toAttestationView(await getRecordOrThrow(deps, claimId));
}

export async function listAttestations(
  deps: AttestationServiceDeps,
  filters: AttestationFilters = {},
): Promise<AttestationView[]> {
  const records = await deps.repo.listAttestations(filters);
  return records.map(toAttestationView);
}

export async function getAttestationStats(
  deps: AttestationServiceDeps,
): Promise<AttestationStats> {
  const stats: AttestationStats = {
    [AttestationStatus.PENDING]: 0,
    [AttestationStatus.SIGNED]: 0,
    [AttestationStatus.VERIFIED]: 0,
    total: 0,
  };

  for (const { status, count } of await deps.repo.countByStatus()) {
    if (ATTESTATION_STATUSES.includes(status)) {
      stats[status] += count;
      stats.total += count;
    }
  }

  return stats;
}

// ---------------------------------------------------------------------------
// Service: documents
// ---------------------------------------------------------------------------

function toDocumentInput({ claim, attestation }: AttestationRecord): AttestationDocumentInput {
  return {
    claimId: claim.claimId,
    providerName: claim.providerName,
    patientId: claim.patientId,
    dateOfService: claim.dateOfService,
    diagnosisCode: claim.diagnosisCode,
    procedureCode: claim.procedureCode,
    issues: claim.issues,
    signature:
      attestation.signedName && attestation.signedAt
        ? { signerName: attestation.signedName, signedAt: attestation.signedAt }
        : null,
  };
}

export async function getAttestationDocument(
  deps: AttestationServiceDeps,
  claimId: string,
): Promise<{ fileName: string; content: Uint8Array }> {
  const record = await getRecordOrThrow(deps, claimId);
  const content = await deps.renderer.render(buildAttestationDocument(toDocumentInput(record)));
  return {
    fileName: attestationFileName(record.claim.claimId, record.claim.providerName),
    content,
  };
}

/** ZIP of every attestation matching the dashboard filters plus an audit summary. */
export async function buildAttestationArchive(
  deps: AttestationServiceDeps,
  filters: AttestationFilters = {},
): Promise<Buffer> {
  const records = await deps.repo.listAttestations(filters);

  const entries: ArchiveEntry[] = [];
  for (const record of records) {
    const pdf = await deps.renderer.render(buildAttestationDocument(toDocumentInput(record)));
    entries.push({
      claimId: record.claim.claimId,
      providerName: record.claim.providerName,
      issues: record.claim.issues,
      status: record.attestation.status,
      signedAt: record.attestation.signedAt,
      verifiedAt: record.attestation.verifiedAt,
      lastReminderAt: record.attestation.lastReminderAt,
      pdf,
    });
  }

  return deps.archiver.createArchive(entries);
}
