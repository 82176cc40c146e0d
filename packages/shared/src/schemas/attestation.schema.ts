// ============================================================================
// Provider Attestation — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { ATTESTATION_STATUSES } from '../constants/attestation.constants.js';

// ============================================================================
// Params
// ============================================================================

export const claimIdParamSchema = z.object({
  claim_id: z.string().trim().min(1).max(64),
});

export type ClaimIdParam = z.infer<typeof claimIdParamSchema>;

// ============================================================================
// Status Actions
// ============================================================================

export const signAttestationSchema = z.object({
  signer_name: z.string().trim().min(1).max(200),
  signed_at: z.string().datetime().optional(),
});

export type SignAttestation = z.infer<typeof signAttestationSchema>;

// ============================================================================
// Listing / Dashboard Filters
// ============================================================================

export const listAttestationsSchema = z.object({
  provider: z.string().trim().min(1).max(200).optional(),
  status: z.enum(ATTESTATION_STATUSES).optional(),
  issue: z.string().trim().min(1).max(200).optional(),
});

export type ListAttestations = z.infer<typeof listAttestationsSchema>;
