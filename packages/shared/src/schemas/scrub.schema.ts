// ============================================================================
// Claim Scrubbing — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  DEFAULT_SAMPLE_CLAIMS,
  MAX_SAMPLE_CLAIMS,
} from '../constants/scrub.constants.js';

// --- Cell Coercion ---
// Tabular sources hand us strings, JSON callers may send numbers or null.
// Everything becomes a trimmed string; blank optional cells become undefined.

const cell = z
  .union([z.string(), z.number(), z.null(), z.undefined()])
  .transform((value) =>
    value === null || value === undefined ? '' : String(value).trim(),
  );

const optionalCell = cell.transform((value) =>
  value === '' ? undefined : value,
);

// ============================================================================
// Claim Record (ingestion boundary)
// ============================================================================

export const claimRecordSchema = z.object({
  claimId: cell,
  patientId: cell,
  providerName: cell,
  procedureCode: cell,
  diagnosisCode: optionalCell,
  billedAmount: cell,
  dateOfService: cell,
  renderingNpi: optionalCell,
  docStatus: optionalCell,
  placeOfService: optionalCell,
});

export type ClaimRecord = z.output<typeof claimRecordSchema>;

// ============================================================================
// Scrub Request (JSON body)
// ============================================================================

const rawClaimRowSchema = z.record(
  z.string(),
  z.union([z.string(), z.number(), z.null()]),
);

export const MAX_CLAIMS_PER_REQUEST = 10_000;

export const scrubRequestSchema = z.object({
  claims: z.array(rawClaimRowSchema).min(1).max(MAX_CLAIMS_PER_REQUEST),
});

export type ScrubRequest = z.infer<typeof scrubRequestSchema>;
export type RawClaimRow = z.infer<typeof rawClaimRowSchema>;

// ============================================================================
// Scrub Query
// ============================================================================

export const scrubQuerySchema = z.object({
  persist: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export type ScrubQuery = z.infer<typeof scrubQuerySchema>;

// ============================================================================
// Sample Claims Query
// ============================================================================

export const sampleClaimsQuerySchema = z.object({
  count: z.coerce.number().int().min(1).max(MAX_SAMPLE_CLAIMS).default(DEFAULT_SAMPLE_CLAIMS),
});

export type SampleClaimsQuery = z.infer<typeof sampleClaimsQuerySchema>;
