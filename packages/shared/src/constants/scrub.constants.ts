// ============================================================================
// Claim Scrubbing — Constants
// ============================================================================

// --- Claim Issue Messages ---
// The message text is the public contract: it is shown to reviewers, written
// into exports and stored with flagged claims. Do not reword.

export const ClaimIssue = {
  MISSING_CLAIM_ID: 'Missing claim ID',
  MISSING_PATIENT_ID: 'Missing patient ID',
  MISSING_PROVIDER_NAME: 'Missing provider name',
  MISSING_PROCEDURE_CODE: 'Missing procedure code',
  MISSING_BILLED_AMOUNT: 'Missing billed amount',
  MISSING_DATE_OF_SERVICE: 'Missing date of service',
  INVALID_CPT_FORMAT: 'Invalid CPT code format',
  INVALID_PROCEDURE_CODE: 'Invalid procedure code',
  INVALID_ICD10_FORMAT: 'Invalid ICD-10 format',
  HIGH_AUDIT_RISK_DIAGNOSIS: 'High-audit-risk diagnosis',
  INVALID_AMOUNT_FORMAT: 'Invalid billed amount format',
  NEGATIVE_AMOUNT: 'Negative billing amount',
  ZERO_AMOUNT: 'Zero billing amount — possible missing data',
  HIGH_AMOUNT: 'Unusually high billed amount',
  INVALID_NPI_FORMAT: 'Invalid NPI format',
  PLACEHOLDER_NPI: 'Placeholder NPI — needs verification',
  INVALID_DATE_FORMAT: 'Invalid date format',
  FUTURE_DATE_OF_SERVICE: 'Future date of service',
  OUTSIDE_FILING_WINDOW: 'Date of service outside filing window',
  MISSING_DOCUMENTATION: 'Missing documentation',
  MISMATCHED_DOCUMENTATION: 'Mismatched documentation',
  HIGH_COST_REQUIRES_DOCUMENTATION:
    'High-cost procedure requires attached documentation',
} as const;

export type ClaimIssue = (typeof ClaimIssue)[keyof typeof ClaimIssue];

// --- Issue Severity ---
// A flagged claim is HIGH severity when any of its issues is critical
// (missing data or values that cannot be read), otherwise MEDIUM.

export const ClaimSeverity = {
  NONE: 'NONE',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
} as const;

export type ClaimSeverity = (typeof ClaimSeverity)[keyof typeof ClaimSeverity];

export const CRITICAL_ISSUES: ReadonlySet<string> = new Set<ClaimIssue>([
  ClaimIssue.MISSING_CLAIM_ID,
  ClaimIssue.MISSING_PATIENT_ID,
  ClaimIssue.MISSING_PROVIDER_NAME,
  ClaimIssue.MISSING_PROCEDURE_CODE,
  ClaimIssue.MISSING_BILLED_AMOUNT,
  ClaimIssue.MISSING_DATE_OF_SERVICE,
  ClaimIssue.INVALID_PROCEDURE_CODE,
  ClaimIssue.INVALID_AMOUNT_FORMAT,
  ClaimIssue.NEGATIVE_AMOUNT,
  ClaimIssue.INVALID_DATE_FORMAT,
]);

// --- Code Tables ---

/** Known-bad procedure codes (placeholders that slip through billing systems). */
export const INVALID_PROCEDURE_CODES: ReadonlySet<string> = new Set([
  '00000',
  '99999',
  '11111',
]);

/** ICD-10 category prefixes that draw audit attention (heart failure, breast cancer). */
export const HIGH_RISK_DIAGNOSIS_PREFIXES: ReadonlySet<string> = new Set([
  'I50',
  'C50',
]);

/** Injectable drugs that must ship with attached documentation. */
export const HIGH_COST_PROCEDURE_CODES: ReadonlySet<string> = new Set([
  'J9355',
  'J1940',
]);

export const PLACEHOLDER_NPI = '1234567890';
export const PLACEHOLDER_NPI_PREFIX = '000000000';

// --- Patterns ---

// CPT (5 digits), CPT Category II/III (4 digits + F/T/U), HCPCS Level II (A-V + 4 digits)
export const PROCEDURE_CODE_PATTERN = /^(?:\d{5}|\d{4}[FTU]|[A-V]\d{4})$/;
export const ICD10_PATTERN = /^[A-Z]\d{2}(?:\.[0-9A-Z]{1,4})?$/;
export const NPI_PATTERN = /^\d{10}$/;
export const DATE_OF_SERVICE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

// --- Thresholds ---

export const HIGH_BILLED_AMOUNT_THRESHOLD = 10_000;
export const DEFAULT_FILING_WINDOW_DAYS = 730;

// --- Documentation Status ---

export const DocStatus = {
  ATTACHED: 'Attached',
  COMPLETE: 'Complete',
  PENDING: 'Pending',
} as const;

export type DocStatus = (typeof DocStatus)[keyof typeof DocStatus];

// --- Claim Fields ---

export const CLAIM_FIELDS = [
  'claimId',
  'patientId',
  'providerName',
  'procedureCode',
  'diagnosisCode',
  'billedAmount',
  'dateOfService',
  'renderingNpi',
  'docStatus',
  'placeOfService',
] as const;

export type ClaimField = (typeof CLAIM_FIELDS)[number];

/** Column headings used when claims are written back out as CSV. */
export const CLAIM_EXPORT_HEADERS: Readonly<Record<ClaimField, string>> =
  Object.freeze({
    claimId: 'ClaimID',
    patientId: 'PatientID',
    providerName: 'ProviderName',
    procedureCode: 'ProcedureCode',
    diagnosisCode: 'DiagnosisCode',
    billedAmount: 'BilledAmount',
    dateOfService: 'DateOfService',
    renderingNpi: 'RenderingNPI',
    docStatus: 'DocStatus',
    placeOfService: 'PlaceOfService',
  });

// --- Column Aliases ---
// Keys are header names lowercased with everything but letters and digits
// removed, so "Claim ID", "claim_id" and "ClaimID" all resolve the same way.

export const CLAIM_COLUMN_ALIASES: Readonly<Record<string, ClaimField>> =
  Object.freeze({
    claimid: 'claimId',
    patientid: 'patientId',
    providername: 'providerName',
    provider: 'providerName',
    procedurecode: 'procedureCode',
    proccode: 'procedureCode',
    cpt: 'procedureCode',
    cptcode: 'procedureCode',
    diagnosiscode: 'diagnosisCode',
    diagnosis: 'diagnosisCode',
    icd10: 'diagnosisCode',
    icd10code: 'diagnosisCode',
    billedamount: 'billedAmount',
    amount: 'billedAmount',
    dateofservice: 'dateOfService',
    servicedate: 'dateOfService',
    dos: 'dateOfService',
    renderingnpi: 'renderingNpi',
    npi: 'renderingNpi',
    docstatus: 'docStatus',
    documentationstatus: 'docStatus',
    placeofservice: 'placeOfService',
    pos: 'placeOfService',
  });

export function normaliseColumnName(header: string): string {
  return header.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function resolveClaimColumn(header: string): ClaimField | undefined {
  const key = normaliseColumnName(header);
  return Object.hasOwn(CLAIM_COLUMN_ALIASES, key)
    ? CLAIM_COLUMN_ALIASES[key]
    : undefined;
}

// --- Sample Data ---
// Value pools for the downloadable sample claims file. Rows cycle through
// them, so the file is the same for a given date.

export const SAMPLE_PROVIDERS = [
  'Dr. Sarah Johnson',
  'Dr. Michael Chen',
  'Dr. Emily Rodriguez',
  'Dr. James Wilson',
  'Dr. Lisa Thompson',
] as const;

export const SAMPLE_PROCEDURE_CODES = ['99213', '99214', '99215', '99202', 'J9355', 'J1940'] as const;
export const SAMPLE_DIAGNOSIS_CODES = ['Z51.11', 'E11.9', 'M25.561', 'L70.9', 'I50.9', 'C50.911'] as const;
export const SAMPLE_DOC_STATUSES = ['Complete', 'Attached', 'Pending', ''] as const;
export const SAMPLE_RENDERING_NPI = '1467503125';
export const DEFAULT_SAMPLE_CLAIMS = 20;
export const MAX_SAMPLE_CLAIMS = 500;
