import type pg from 'pg';
import { StoreError } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';
import type { DeliveryOutcome, DeliveryStatus, EnforcementRecord, UpsertOutcome } from './types.js';

const logger = createChildLogger('record-store');

/**
 * Durable keyed storage of every enforcement record seen so far.
 * No delete operation is exposed.
 */
export interface RecordStore {
  /** Every identity key currently stored */
  knownKeys(): Promise<Set<string>>;
  /**
   * Insert if absent, refresh display fields if present. Must leave
   * first_seen_run_id untouched on existing rows. Atomic per call.
   */
  upsert(record: EnforcementRecord): Promise<UpsertOutcome>;
  /** Delivery bookkeeping for operator reconciliation; never read by the pipeline */
  recordDelivery(identityKey: string, outcome: DeliveryOutcome): Promise<void>;
}

/**
 * Minimal pool surface used by the store
 */
export type Queryable = Pick<pg.Pool, 'query'>;

/**
 * PostgreSQL-backed record store over the enforcement_records table
 */
export class PostgresRecordStore implements RecordStore {
  constructor(private pool: Queryable) {}

  async knownKeys(): Promise<Set<string>> {
    try {
      const result = await this.pool.query<{ identityKey: string }>(
        `SELECT identity_key as "identityKey" FROM enforcement_records`
      );
      return new Set(result.rows.map((row) => row.identityKey));
    } catch (error) {
      logger.error({ error }, 'Failed to load known identity keys');
      throw new StoreError('Failed to load known identity keys', error);
    }
  }

  async upsert(record: EnforcementRecord): Promise<UpsertOutcome> {
    const { fields } = record;

    try {
      // xmax is 0 only for a freshly inserted tuple
      const result = await this.pool.query<{ inserted: boolean }>(
        `
        INSERT INTO enforcement_records (
          identity_key, organization, action_date, reference, action_type,
          penalty_amount, summary, url, pdf_url, first_seen_run_id
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
        ON CONFLICT (identity_key) DO UPDATE SET
          organization = EXCLUDED.organization,
          action_date = EXCLUDED.action_date,
          reference = EXCLUDED.reference,
          action_type = EXCLUDED.action_type,
          penalty_amount = EXCLUDED.penalty_amount,
          summary = EXCLUDED.summary,
          url = EXCLUDED.url,
          pdf_url = EXCLUDED.pdf_url,
          last_seen_at = NOW()
        RETURNING (xmax = 0) AS inserted
        `,
        [
          record.identityKey,
          fields.organization,
          fields.date,
          fields.reference,
          fields.actionType,
          fields.penaltyAmount ?? null,
          fields.summary ?? null,
          fields.url,
          fields.pdfUrl ?? null,
          record.firstSeenRunId,
        ]
      );

      return result.rows[0]?.inserted ? 'inserted' : 'refreshed';
    } catch (error) {
      logger.error({ error, identityKey: record.identityKey }, 'Failed to upsert record');
      throw new StoreError(`Failed to upsert record ${record.identityKey}`, error);
    }
  }

  async recordDelivery(identityKey: string, outcome: DeliveryOutcome): Promise<void> {
    const status: DeliveryStatus = outcome.status;
    const reason = outcome.status === 'failed' ? outcome.reason : null;

    try {
      await this.pool.query(
        `
        UPDATE enforcement_records
        SET
          delivery_status = $2,
          delivery_error = $3,
          delivery_attempted_at = NOW()
        WHERE identity_key = $1
        `,
        [identityKey, status, reason]
      );
    } catch (error) {
      logger.error({ error, identityKey }, 'Failed to record delivery outcome');
      throw new StoreError(`Failed to record delivery for ${identityKey}`, error);
    }
  }
}

/**
 * Create a record store over a pg pool
 */
export function createRecordStore(pool: Queryable): PostgresRecordStore {
  return new PostgresRecordStore(pool);
}
