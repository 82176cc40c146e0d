// ============================================================================
// Provider Attestation — Constants
// ============================================================================

// --- Attestation Status ---

export const AttestationStatus = {
  PENDING: 'Pending',
  SIGNED: 'Signed',
  VERIFIED: 'Verified',
} as const;

export type AttestationStatus =
  (typeof AttestationStatus)[keyof typeof AttestationStatus];

export const ATTESTATION_STATUSES = [
  AttestationStatus.PENDING,
  AttestationStatus.SIGNED,
  AttestationStatus.VERIFIED,
] as const;

// --- Status Transition Map ---
// Strictly forward, one step at a time. Verified is terminal.

export const ATTESTATION_TRANSITIONS: Readonly<
  Record<AttestationStatus, readonly AttestationStatus[]>
> = Object.freeze({
  [AttestationStatus.PENDING]: [AttestationStatus.SIGNED],
  [AttestationStatus.SIGNED]: [AttestationStatus.VERIFIED],
  [AttestationStatus.VERIFIED]: [],
});

// --- Attestation Document Text ---

export const ATTESTATION_DOCUMENT_TITLE =
  'Provider Attestation - CMS Audit Preparation';

export const ATTESTATION_STATEMENT =
  'I attest that the documentation provided is accurate and complete for the ' +
  'services billed. I understand that falsification or omission may result in ' +
  'penalties under applicable law.';

export const ATTESTATION_DOCUMENT_FOOTER =
  'Confidential - Compliance Review Use Only';

// --- Archive ---

export const AUDIT_SUMMARY_FILE_NAME = 'audit_summary.csv';
export const ARCHIVE_README_FILE_NAME = 'README.txt';
export const EMPTY_ARCHIVE_README =
  'No flagged claims matched the requested filters. ' +
  'No attestation documents were generated.\n';
