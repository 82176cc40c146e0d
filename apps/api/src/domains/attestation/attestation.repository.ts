import { eq, and, desc, ilike, sql, type SQL } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  scrubbedClaims,
  attestations,
  type InsertScrubbedClaim,
  type SelectScrubbedClaim,
  type SelectAttestation,
} from '@claim-scrub/shared/schemas/db/attestation.schema.js';
import { AttestationStatus } from '@claim-scrub/shared/constants/attestation.constants.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AttestationRecord {
  claim: SelectScrubbedClaim;
  attestation: SelectAttestation;
}

export interface AttestationFilters {
  /** Case-insensitive substring of the provider name. */
  provider?: string;
  status?: AttestationStatus;
  /** Case-insensitive substring of any issue message. */
  issue?: string;
}

export type AttestationUpdate = Partial<
  Pick<
    SelectAttestation,
    'status' | 'signedName' | 'signedAt' | 'verifiedAt' | 'lastReminderAt'
  >
>;

export type FlaggedClaimInsert = Omit<InsertScrubbedClaim, 'createdAt' | 'updatedAt'>;

export interface UpsertFlaggedClaimResult {
  record: AttestationRecord;
  /** True when this call created the attestation row. */
  created: boolean;
}

export interface StatusCount {
  status: AttestationStatus;
  count: number;
}

/** Escape ILIKE wildcards so filters match literal substrings. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

// ---------------------------------------------------------------------------
// Attestation Repository
// ---------------------------------------------------------------------------

export function createAttestationRepository(db: NodePgDatabase) {
  return {
    /**
     * Replace the stored copy of each flagged claim and make sure it has an
     * attestation. An existing attestation keeps its status and signature,
     * so re-scrubbing never resets a signed or verified claim. The batch is
     * written in one transaction; a failure leaves nothing behind.
     */
    async upsertFlaggedClaims(
      claims: readonly FlaggedClaimInsert[],
    ): Promise<UpsertFlaggedClaimResult[]> {
      if (claims.length === 0) return [];

      return db.transaction(async (tx) => {
        const results: UpsertFlaggedClaimResult[] = [];

        for (const data of claims) {
          const { claimId, ...fields } = data;
          const claimRows = await tx
            .insert(scrubbedClaims)
            .values(data)
            .onConflictDoUpdate({
              target: scrubbedClaims.claimId,
              set: { ...fields, updatedAt: new Date() },
            })
            .returning();

          const inserted = await tx
            .insert(attestations)
            .values({ claimId, status: AttestationStatus.PENDING })
            .onConflictDoNothing({ target: attestations.claimId })
            .returning();

          if (inserted.length > 0) {
            results.push({
              record: { claim: claimRows[0], attestation: inserted[0] },
              created: true,
            });
            continue;
          }

          const existing = await tx
            .select()
            .from(attestations)
            .where(eq(attestations.claimId, claimId))
            .limit(1);

          results.push({
            record: { claim: claimRows[0], attestation: existing[0] },
            created: false,
          });
        }

        return results;
      });
    },

    async findByClaimId(claimId: string): Promise<AttestationRecord | undefined> {
      const rows = await db
        .select({ claim: scrubbedClaims, attestation: attestations })
        .from(scrubbedClaims)
        .innerJoin(attestations, eq(attestations.claimId, scrubbedClaims.claimId))
        .where(eq(scrubbedClaims.claimId, claimId))
        .limit(1);
      return rows[0];
    },

    /** Dashboard listing, most recently scrubbed first. */
    async listAttestations(
      filters: AttestationFilters = {},
    ): Promise<AttestationRecord[]> {
      const conditions: SQL[] = [];
      if (filters.provider) {
        conditions.push(
          ilike(scrubbedClaims.providerName, `%${escapeLikePattern(filters.provider)}%`),
        );
      }
      if (filters.status) {
        conditions.push(eq(attestations.status, filters.status));
      }
      if (filters.issue) {
        conditions.push(
          sql`${scrubbedClaims.issues}::text ilike ${`%${escapeLikePattern(filters.issue)}%`}`,
        );
      }

      return db
        .select({ claim: scrubbedClaims, attestation: attestations })
        .from(scrubbedClaims)
        .innerJoin(attestations, eq(attestations.claimId, scrubbedClaims.claimId))
        .where(and(...conditions))
        .orderBy(desc(scrubbedClaims.updatedAt));
    },

    /**
     * Apply a status change with optimistic concurrency: the row is only
     * updated while it is still in fromStatus. Returns undefined otherwise.
     */
    async updateAttestation(
      claimId: string,
      fromStatus: AttestationStatus,
      data: AttestationUpdate,
    ): Promise<SelectAttestation | undefined> {
      const rows = await db
        .update(attestations)
        .set({ ...data, updatedAt: new Date() })
        .where(
          and(
            eq(attestations.claimId, claimId),
            eq(attestations.status, fromStatus),
          ),
        )
        .returning();
      return rows[0];
    },

    async countByStatus(): Promise<StatusCount[]> {
      return db
        .select({
          status: attestations.status,
          count: sql<number>`count(*)::int`,
        })
        .from(attestations)
        .groupBy(attestations.status);
    },
  };
}

export type AttestationRepository = ReturnType<typeof createAttestationRepository>;
