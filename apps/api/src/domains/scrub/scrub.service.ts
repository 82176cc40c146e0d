// ============================================================================
// Claim Scrubbing — Service
// Ingestion (CSV / JSON rows -> ClaimRecord), batch scrubbing, summary
// statistics and the issues CSV export.
// ============================================================================

import {
  CLAIM_FIELDS,
  CLAIM_EXPORT_HEADERS,
  CRITICAL_ISSUES,
  ClaimSeverity,
  HIGH_COST_PROCEDURE_CODES,
  SAMPLE_DIAGNOSIS_CODES,
  SAMPLE_DOC_STATUSES,
  SAMPLE_PROCEDURE_CODES,
  SAMPLE_PROVIDERS,
  SAMPLE_RENDERING_NPI,
  resolveClaimColumn,
  type ClaimField,
} from '@claim-scrub/shared/constants/scrub.constants.js';
import {
  claimRecordSchema,
  type ClaimRecord,
  type RawClaimRow,
} from '@claim-scrub/shared/schemas/scrub.schema.js';
import { ValidationError } from '../../lib/errors.js';
import { detectDelimiter, parseRows, toCsv } from '../../lib/csv.js';
import {
  classifyClaims,
  evaluateClaim,
  type ClassificationResult,
  type EvaluationOptions,
  type FlaggedClaim,
} from './scrub.rules.js';

// ---------------------------------------------------------------------------
// Dependency interfaces
// ---------------------------------------------------------------------------

export interface RecordFlaggedResult {
  /** Claims written to the attestation store. */
  recorded: number;
  /** Attestations created Pending by this call (claims seen for the first time). */
  created: number;
  /** Flagged claims without a claim ID, which cannot be tracked. */
  skipped: number;
}

export interface FlaggedClaimRecorder {
  recordFlaggedClaims(flagged: readonly FlaggedClaim[]): Promise<RecordFlaggedResult>;
}

export interface ScrubServiceDeps {
  recorder: FlaggedClaimRecorder;
  filingWindowDays: number;
  clock?: () => Date;
}

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

export interface ScrubbedClaim extends FlaggedClaim {
  severity: ClaimSeverity;
}

export interface ScrubSummary {
  totalClaims: number;
  flaggedClaims: number;
  cleanClaims: number;
  /** Percentage of clean claims, one decimal place. */
  complianceRate: number;
  /** Occurrences of each issue message, in first-seen order. */
  issueCounts: Record<string, number>;
  /** Flagged claims by severity. */
  severityBreakdown: { HIGH: number; MEDIUM: number };
}

export interface ScrubOutcome {
  summary: ScrubSummary;
  clean: ClaimRecord[];
  flagged: ScrubbedClaim[];
  recorded: RecordFlaggedResult | null;
}

export interface ParsedClaims {
  records: ClaimRecord[];
  /** Header columns that map to no claim field. */
  unmappedColumns: string[];
}

// ---------------------------------------------------------------------------
// Ingestion
// ---------------------------------------------------------------------------

function evaluationOptions(deps: ScrubServiceDeps): EvaluationOptions {
  return {
    asOf: (deps.clock ?? (() => new Date()))(),
    filingWindowDays: deps.filingWindowDays,
  };
}

/**
 * Turn one loosely-keyed row into a ClaimRecord. Keys are matched through
 * the column alias table; the first column mapping to a field wins and
 * unknown keys are ignored. Absent fields come through blank.
 */
export function normalizeClaimRow(row: RawClaimRow): ClaimRecord {
  const fields: Partial<Record<ClaimField, string | number | null>> = {};
  for (const [key, value] of Object.entries(row)) {
    const field = resolveClaimColumn(key);
    if (field && !(field in fields)) {
      fields[field] = value;
    }
  }
  return claimRecordSchema.parse(fields);
}

/**
 * Parse a delimited claims upload (comma, tab or pipe separated) with a
 * header row. Short rows are padded with blanks.
 */
export function parseClaimsCsv(content: string): ParsedClaims {
  const text = content.replace(/^\uFEFF/, '');
  const firstLine = text.split(/\r?\n/).find((line) => line.trim().length > 0);
  if (firstLine === undefined) {
    throw new ValidationError('Uploaded file is empty');
  }

  const [header, ...rows] = parseRows(text, detectDelimiter(firstLine));

  const columnFields = header.map((column) => resolveClaimColumn(column));
  if (columnFields.every((field) => field === undefined)) {
    throw new ValidationError('No recognised claim columns in header', {
      header,
      expected: CLAIM_FIELDS.map((field) => CLAIM_EXPORT_HEADERS[field]),
    });
  }
  if (rows.length === 0) {
    throw new ValidationError('Uploaded file contains no claim rows');
  }

  const records = rows.map((cells) => {
    const row: RawClaimRow = {};
    header.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return normalizeClaimRow(row);
  });

  return {
    records,
    unmappedColumns: header.filter((_, index) => columnFields[index] === undefined),
  };
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export function issueSeverity(issues: readonly string[]): ClaimSeverity {
  if (issues.length === 0) return ClaimSeverity.NONE;
  return issues.some((issue) => CRITICAL_ISSUES.has(issue))
    ? ClaimSeverity.HIGH
    : ClaimSeverity.MEDIUM;
}

export function summarizeScrub(result: ClassificationResult): ScrubSummary {
  const flaggedClaims = result.flagged.length;
  const cleanClaims = result.clean.length;
  const totalClaims = flaggedClaims + cleanClaims;

  const issueCounts: Record<string, number> = {};
  const severityBreakdown = { [ClaimSeverity.HIGH]: 0, [ClaimSeverity.MEDIUM]: 0 };

  for (const { issues } of result.flagged) {
    for (const issue of issues) {
      issueCounts[issue] = (issueCounts[issue] ?? 0) + 1;
    }
    if (issueSeverity(issues) === ClaimSeverity.HIGH) {
      severityBreakdown[ClaimSeverity.HIGH] += 1;
    } else {
      severityBreakdown[ClaimSeverity.MEDIUM] += 1;
    }
  }

  const complianceRate =
    totalClaims === 0 ? 0 : Math.round((cleanClaims / totalClaims) * 1000) / 10;

  return {
    totalClaims,
    flaggedClaims,
    cleanClaims,
    complianceRate,
    issueCounts,
    severityBreakdown,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

const CLAIM_HEADERS = CLAIM_FIELDS.map((field) => CLAIM_EXPORT_HEADERS[field]);

function claimCells(record: ClaimRecord): string[] {
  return CLAIM_FIELDS.map((field) => record[field] ?? '');
}

/** Claims in the column layout ingestion reads back. */
export function toClaimsCsv(records: readonly ClaimRecord[]): string {
  return toCsv(CLAIM_HEADERS, records.map(claimCells));
}

/** Claims with their original columns plus an Issues column joined with "; ". */
export function toIssuesCsv(rows: readonly FlaggedClaim[]): string {
  const lines = rows.map(({ record, issues }) => [...claimCells(record), issues.join('; ')]);
  return toCsv([...CLAIM_HEADERS, 'Issues'], lines);
}

/** Evaluate every record in input order and render the issues CSV. */
export function exportScrubCsv(
  deps: ScrubServiceDeps,
  records: readonly ClaimRecord[],
): string {
  const options = evaluationOptions(deps);
  return toIssuesCsv(
    records.map((record) => ({ record, issues: evaluateClaim(record, options) })),
  );
}

// ---------------------------------------------------------------------------
// Service: runScrub
// ---------------------------------------------------------------------------

/**
 * Scrub a batch: classify every claim, hand flagged claims to the
 * attestation store (unless persist is off) and summarise the result.
 */
export async function runScrub(
  deps: ScrubServiceDeps,
  records: readonly ClaimRecord[],
  options: { persist?: boolean } = {},
): Promise<ScrubOutcome> {
  const result = classifyClaims(records, evaluationOptions(deps));

  const recorded =
    options.persist === false || result.flagged.length === 0
      ? null
      : await deps.recorder.recordFlaggedClaims(result.flagged);

  return {
    summary: summarizeScrub(result),
    clean: result.clean,
    flagged: result.flagged.map((claim) => ({
      ...claim,
      severity: issueSeverity(claim.issues),
    })),
    recorded,
  };
}

// ---------------------------------------------------------------------------
// Sample data
// ---------------------------------------------------------------------------

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Deterministic demo claims: each column cycles through its value pool at a
 * different stride, and service dates step back a week at a time (within a
 * year of asOf).
 */
export function buildSampleClaims(count: number, asOf: Date): ClaimRecord[] {
  return Array.from({ length: count }, (_, i) => {
    const sequence = String(i + 1).padStart(4, '0');
    const procedureCode = SAMPLE_PROCEDURE_CODES[i % SAMPLE_PROCEDURE_CODES.length];
    const docStatus = SAMPLE_DOC_STATUSES[i % SAMPLE_DOC_STATUSES.length];
    const daysBack = 7 * ((i % 52) + 1);

    return {
      claimId: `CLM${sequence}`,
      patientId: `PAT${sequence}`,
      providerName: SAMPLE_PROVIDERS[i % SAMPLE_PROVIDERS.length],
      procedureCode,
      diagnosisCode: SAMPLE_DIAGNOSIS_CODES[(i * 5 + 1) % SAMPLE_DIAGNOSIS_CODES.length],
      billedAmount: HIGH_COST_PROCEDURE_CODES.has(procedureCode) ? '1250.00' : '150.00',
      dateOfService: new Date(asOf.getTime() - daysBack * DAY_MS).toISOString().slice(0, 10),
      renderingNpi: SAMPLE_RENDERING_NPI,
      docStatus: docStatus === '' ? undefined : docStatus,
      placeOfService: '11',
    };
  });
}

export function sampleClaimsCsv(deps: ScrubServiceDeps, count: number): string {
  const asOf = deps.clock ? deps.clock() : new Date();
  return toClaimsCsv(buildSampleClaims(count, asOf));
}
