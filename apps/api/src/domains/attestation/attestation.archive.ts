// ============================================================================
// Provider Attestation — Audit Archive (ZIP)
// ============================================================================

import AdmZip from 'adm-zip';
import {
  AUDIT_SUMMARY_FILE_NAME,
  ARCHIVE_README_FILE_NAME,
  EMPTY_ARCHIVE_README,
  type AttestationStatus,
} from '@claim-scrub/shared/constants/attestation.constants.js';
import { toCsv } from '../../lib/csv.js';
import { attestationFileName } from './attestation.document.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ArchiveEntry {
  claimId: string;
  providerName: string;
  issues: readonly string[];
  status: AttestationStatus;
  signedAt: Date | null;
  verifiedAt: Date | null;
  lastReminderAt: Date | null;
  pdf: Uint8Array;
}

/** Bundles rendered attestations into a single downloadable archive. */
export interface AttestationArchiver {
  createArchive(entries: readonly ArchiveEntry[]): Promise<Buffer>;
}

// ---------------------------------------------------------------------------
// Audit summary
// ---------------------------------------------------------------------------

const AUDIT_SUMMARY_HEADERS = [
  'ClaimID',
  'Provider',
  'Issues',
  'Status',
  'SignedAt',
  'VerifiedAt',
  'LastReminderAt',
] as const;

function isoOrBlank(value: Date | null): string {
  return value ? value.toISOString() : '';
}

export function buildAuditSummaryCsv(entries: readonly ArchiveEntry[]): string {
  return toCsv(
    AUDIT_SUMMARY_HEADERS,
    entries.map((entry) => [
      entry.claimId,
      entry.providerName,
      entry.issues.join('; '),
      entry.status,
      isoOrBlank(entry.signedAt),
      isoOrBlank(entry.verifiedAt),
      isoOrBlank(entry.lastReminderAt),
    ]),
  );
}

// ---------------------------------------------------------------------------
// Packaging (adm-zip)
// ---------------------------------------------------------------------------

/** Claim IDs that differ only in stripped characters get _2, _3, ... */
export function uniqueEntryName(name: string, used: ReadonlySet<string>): string {
  if (!used.has(name)) return name;

  const dot = name.lastIndexOf('.');
  const stem = dot > 0 ? name.slice(0, dot) : name;
  const ext = dot > 0 ? name.slice(dot) : '';
  let n = 2;
  while (used.has(`${stem}_${n}${ext}`)) n += 1;
  return `${stem}_${n}${ext}`;
}

/**
 * One PDF per claim plus audit_summary.csv. An empty selection yields an
 * archive holding only a README so the download is never an empty file.
 */
export async function packageAttestations(entries: readonly ArchiveEntry[]): Promise<Buffer> {
  const zip = new AdmZip();

  if (entries.length === 0) {
    zip.addFile(ARCHIVE_README_FILE_NAME, Buffer.from(EMPTY_ARCHIVE_README, 'utf8'));
    return zip.toBuffer();
  }

  const used = new Set<string>();
  for (const entry of entries) {
    const name = uniqueEntryName(attestationFileName(entry.claimId, entry.providerName), used);
    used.add(name);
    zip.addFile(name, Buffer.from(entry.pdf));
  }
  zip.addFile(AUDIT_SUMMARY_FILE_NAME, Buffer.from(buildAuditSummaryCsv(entries), 'utf8'));

  return zip.toBuffer();
}

export function createZipAttestationArchiver(): AttestationArchiver {
  return { createArchive: packageAttestations };
}
