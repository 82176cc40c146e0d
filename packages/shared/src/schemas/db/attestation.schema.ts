// ============================================================================
// Claim Scrubbing & Provider Attestation — Drizzle DB Schema
// ============================================================================

import {
  pgTable,
  uuid,
  varchar,
  text,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

import { type AttestationStatus } from '../../constants/attestation.constants.js';

// --- Scrubbed Claims Table ---
// Latest flagged version of each claim, keyed by the billing system's claim
// ID. Re-scrubbing a claim replaces its row. Field values are stored as
// received, without length limits, so that malformed values can still be
// reviewed.

export const scrubbedClaims = pgTable(
  'scrubbed_claims',
  {
    claimId: text('claim_id').primaryKey(),
    patientId: text('patient_id').notNull(),
    providerName: text('provider_name').notNull(),
    procedureCode: text('procedure_code').notNull(),
    diagnosisCode: text('diagnosis_code'),
    billedAmount: text('billed_amount').notNull(),
    dateOfService: text('date_of_service').notNull(),
    renderingNpi: text('rendering_npi'),
    docStatus: text('doc_status'),
    placeOfService: text('place_of_service'),
    issues: jsonb('issues').$type<string[]>().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    // Dashboard filter by provider
    index('scrubbed_claims_provider_idx').on(table.providerName),

    // Dashboard ordering (newest first)
    index('scrubbed_claims_updated_idx').on(table.updatedAt),
  ],
);

export type InsertScrubbedClaim = typeof scrubbedClaims.$inferInsert;
export type SelectScrubbedClaim = typeof scrubbedClaims.$inferSelect;

// --- Attestations Table ---
// One row per flagged claim. Created Pending the first time the claim is
// flagged and never reset by later scrubs. Status moves forward only:
// Pending -> Signed -> Verified.

export const attestations = pgTable(
  'attestations',
  {
    attestationId: uuid('attestation_id').primaryKey().defaultRandom(),
    claimId: text('claim_id')
      .notNull()
      .references(() => scrubbedClaims.claimId, { onDelete: 'cascade' }),
    status: varchar('status', { length: 20 })
      .$type<AttestationStatus>()
      .notNull()
      .default('Pending'),
    signedName: text('signed_name'),
    signedAt: timestamp('signed_at', { withTimezone: true }),
    verifiedAt: timestamp('verified_at', { withTimezone: true }),
    lastReminderAt: timestamp('last_reminder_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    uniqueIndex('attestations_claim_id_idx').on(table.claimId),

    // Stats and status filter
    index('attestations_status_idx').on(table.status),
  ],
);

export type InsertAttestation = typeof attestations.$inferInsert;
export type SelectAttestation = typeof attestations.$inferSelect;
