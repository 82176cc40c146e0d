// ============================================================================
// Claim Scrubbing — Rule Evaluator & Batch Classifier
// ============================================================================

import {
  ClaimIssue,
  DocStatus,
  INVALID_PROCEDURE_CODES,
  HIGH_RISK_DIAGNOSIS_PREFIXES,
  HIGH_COST_PROCEDURE_CODES,
  PLACEHOLDER_NPI,
  PLACEHOLDER_NPI_PREFIX,
  PROCEDURE_CODE_PATTERN,
  ICD10_PATTERN,
  NPI_PATTERN,
  DATE_OF_SERVICE_PATTERN,
  HIGH_BILLED_AMOUNT_THRESHOLD,
  DEFAULT_FILING_WINDOW_DAYS,
} from '@claim-scrub/shared/constants/scrub.constants.js';
import { type ClaimRecord } from '@claim-scrub/shared/schemas/scrub.schema.js';

const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface EvaluationOptions {
  /** Instant the claim is evaluated at. Defaults to now. */
  asOf?: Date;
  /** Oldest date of service still fileable, in days before asOf. */
  filingWindowDays?: number;
}

interface EvaluationContext {
  asOfDay: number;
  filingWindowDays: number;
}

type ClaimRule = (record: ClaimRecord, ctx: EvaluationContext) => string[];

export interface FlaggedClaim {
  record: ClaimRecord;
  issues: string[];
}

export interface ClassificationResult {
  clean: ClaimRecord[];
  flagged: FlaggedClaim[];
}

// ---------------------------------------------------------------------------
// Value parsing
// ---------------------------------------------------------------------------

/** Trimmed value, or null when the field is absent or blank. */
function filled(value: string | undefined): string | null {
  const trimmed = value?.trim() ?? '';
  return trimmed === '' ? null : trimmed;
}

/**
 * Read a billed amount. Accepts an optional sign, a leading "$" and
 * thousands separators. Returns null when the text is not a number.
 */
export function parseBilledAmount(raw: string): number | null {
  const normalized = raw.replace(/[$,\s]/g, '');
  if (!/^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/.test(normalized)) {
    return null;
  }
  return Number(normalized);
}

/**
 * Read a YYYY-MM-DD date of service as a UTC day number (days since epoch).
 * Returns null for other shapes and for impossible dates such as 2024-02-30.
 */
export function parseServiceDay(raw: string): number | null {
  const match = DATE_OF_SERVICE_PATTERN.exec(raw.trim());
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const time = Date.UTC(year, month - 1, day);
  const date = new Date(time);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return time / DAY_MS;
}

function toUtcDay(instant: Date): number {
  return Math.floor(instant.getTime() / DAY_MS);
}

// ---------------------------------------------------------------------------
// Rules (run in declaration order, never short-circuit)
// ---------------------------------------------------------------------------

const REQUIRED_FIELDS: ReadonlyArray<readonly [keyof ClaimRecord, ClaimIssue]> = [
  ['claimId', ClaimIssue.MISSING_CLAIM_ID],
  ['patientId', ClaimIssue.MISSING_PATIENT_ID],
  ['providerName', ClaimIssue.MISSING_PROVIDER_NAME],
  ['procedureCode', ClaimIssue.MISSING_PROCEDURE_CODE],
  ['billedAmount', ClaimIssue.MISSING_BILLED_AMOUNT],
  ['dateOfService', ClaimIssue.MISSING_DATE_OF_SERVICE],
];

const requiredFieldsRule: ClaimRule = (record) =>
  REQUIRED_FIELDS.filter(([field]) => filled(record[field]) === null).map(
    ([, issue]) => issue,
  );

const procedureCodeRule: ClaimRule = (record) => {
  const code = filled(record.procedureCode);
  if (code === null) return [];
  if (!PROCEDURE_CODE_PATTERN.test(code)) {
    return [ClaimIssue.INVALID_CPT_FORMAT];
  }
  if (INVALID_PROCEDURE_CODES.has(code)) {
    return [ClaimIssue.INVALID_PROCEDURE_CODE];
  }
  return [];
};

const diagnosisFormatRule: ClaimRule = (record) => {
  const code = filled(record.diagnosisCode);
  if (code === null) return [];
  return ICD10_PATTERN.test(code) ? [] : [ClaimIssue.INVALID_ICD10_FORMAT];
};

// Prefix match on the raw code: I50.9 and I5099 both count.
const highRiskDiagnosisRule: ClaimRule = (record) => {
  const code = filled(record.diagnosisCode);
  if (code === null) return [];
  return HIGH_RISK_DIAGNOSIS_PREFIXES.has(code.slice(0, 3))
    ? [ClaimIssue.HIGH_AUDIT_RISK_DIAGNOSIS]
    : [];
};

const billedAmountRule: ClaimRule = (record) => {
  const raw = filled(record.billedAmount);
  if (raw === null) return [];
  const amount = parseBilledAmount(raw);
  if (amount === null) return [ClaimIssue.INVALID_AMOUNT_FORMAT];
  if (amount < 0) return [ClaimIssue.NEGATIVE_AMOUNT];
  if (amount === 0) return [ClaimIssue.ZERO_AMOUNT];
  if (amount > HIGH_BILLED_AMOUNT_THRESHOLD) return [ClaimIssue.HIGH_AMOUNT];
  return [];
};

const npiRule: ClaimRule = (record) => {
  const value = filled(record.renderingNpi);
  if (value === null) return [];
  const issues: string[] = [];
  if (!NPI_PATTERN.test(value)) {
    issues.push(ClaimIssue.INVALID_NPI_FORMAT);
  }
  if (value === PLACEHOLDER_NPI || value.startsWith(PLACEHOLDER_NPI_PREFIX)) {
    issues.push(ClaimIssue.PLACEHOLDER_NPI);
  }
  return issues;
};

const dateOfServiceRule: ClaimRule = (record, ctx) => {
  const raw = filled(record.dateOfService);
  if (raw === null) return [];
  const serviceDay = parseServiceDay(raw);
  if (serviceDay === null) return [ClaimIssue.INVALID_DATE_FORMAT];
  if (serviceDay > ctx.asOfDay) return [ClaimIssue.FUTURE_DATE_OF_SERVICE];
  if (serviceDay < ctx.asOfDay - ctx.filingWindowDays) {
    return [ClaimIssue.OUTSIDE_FILING_WINDOW];
  }
  return [];
};

const documentationRule: ClaimRule = (record) =>
  filled(record.docStatus) === null ? [ClaimIssue.MISSING_DOCUMENTATION] : [];

// High-cost drugs raise two issues together when documentation is not attached.
const highCostDocumentationRule: ClaimRule = (record) => {
  const code = filled(record.procedureCode);
  if (code === null || !HIGH_COST_PROCEDURE_CODES.has(code)) return [];
  if (filled(record.docStatus) === DocStatus.ATTACHED) return [];
  return [
    ClaimIssue.MISMATCHED_DOCUMENTATION,
    ClaimIssue.HIGH_COST_REQUIRES_DOCUMENTATION,
  ];
};

const CLAIM_RULES: readonly ClaimRule[] = [
  requiredFieldsRule,
  procedureCodeRule,
  diagnosisFormatRule,
  highRiskDiagnosisRule,
  billedAmountRule,
  npiRule,
  dateOfServiceRule,
  documentationRule,
  highCostDocumentationRule,
];

// ---------------------------------------------------------------------------
// Evaluator
// ---------------------------------------------------------------------------

function buildContext(options: EvaluationOptions): EvaluationContext {
  return {
    asOfDay: toUtcDay(options.asOf ?? new Date()),
    filingWindowDays: options.filingWindowDays ?? DEFAULT_FILING_WINDOW_DAYS,
  };
}

function runRules(record: ClaimRecord, ctx: EvaluationContext): string[] {
  return CLAIM_RULES.flatMap((rule) => rule(record, ctx));
}

/**
 * Evaluate one claim against every compliance rule. Returns issue messages
 * in rule order; an empty list means the claim is clean. Never throws on
 * malformed field values.
 */
export function evaluateClaim(
  record: ClaimRecord,
  options: EvaluationOptions = {},
): string[] {
  return runRules(record, buildContext(options));
}

/**
 * Partition a batch into clean and flagged claims. Input order is kept
 * within each partition. The clock is read once for the whole batch.
 */
export function classifyClaims(
  records: readonly ClaimRecord[],
  options: EvaluationOptions = {},
): ClassificationResult {
  const ctx = buildContext(options);
  const result: ClassificationResult = { clean: [], flagged: [] };

  for (const record of records) {
    const issues = runRules(record, ctx);
    if (issues.length === 0) {
      result.clean.push(record);
    } else {
      result.flagged.push({ record, issues });
    }
  }

  return result;
}
