// packages/core/src/memory/deletion-store.ts — Pre-delete snapshots and outcomes

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { HELPER_DOMAINS } from '../discovery/domains.js';
import type { DeletionOutcome, DeletionRecord, DeletionStatus } from '../types/deletion.js';
import { DatabaseError } from '../utils/errors.js';

interface DeletionRow {
  run_id: string;
  entity_id: string;
  dry_run: number;
  snapshot_json: string;
  requested_at: string;
  status: string;
  message: string | null;
}

const snapshotSchema = z.object({
  domain: z.enum(HELPER_DOMAINS),
  friendlyName: z.string(),
  state: z.string().nullable(),
  attributes: z.record(z.string(), z.unknown()),
});

export type StoredDeletionStatus = DeletionStatus | 'pending';

export interface StoredDeletion {
  runId: string;
  dryRun: boolean;
  record: DeletionRecord;
  status: StoredDeletionStatus;
  message: string | null;
}

function toStatus(value: string): StoredDeletionStatus {
  switch (value) {
    case 'planned':
    case 'deleted':
    case 'failed':
      return value;
    default:
      return 'pending';
  }
}

export class DeletionStore {
  constructor(private db: Database.Database) {}

  /** Persist a snapshot before the helper is touched. */
  record(runId: string, record: DeletionRecord, dryRun: boolean): void {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO deletion_records (run_id, entity_id, dry_run, snapshot_json, requested_at, status, message, updated_at)
         VALUES (?, ?, ?, ?, ?, 'pending', NULL, ?)`,
      )
      .run(
        runId,
        record.entityId,
        dryRun ? 1 : 0,
        JSON.stringify(record.preDeleteStateSnapshot),
        record.requestedAt,
        Date.now(),
      );
  }

  updateOutcome(runId: string, outcome: DeletionOutcome): void {
    this.db
      .prepare('UPDATE deletion_records SET status = ?, message = ?, updated_at = ? WHERE run_id = ? AND entity_id = ?')
      .run(outcome.status, outcome.message, Date.now(), runId, outcome.entityId);
  }

  listForRun(runId: string): StoredDeletion[] {
    return this.db
      .prepare<[string], DeletionRow>('SELECT * FROM deletion_records WHERE run_id = ? ORDER BY id')
      .all(runId)
      .map((row) => {
        const snapshot = snapshotSchema.safeParse(JSON.parse(row.snapshot_json));
        if (!snapshot.success) {
          throw new DatabaseError(`Corrupt snapshot for ${row.entity_id} in run ${row.run_id}`, 'read');
        }
        return {
          runId: row.run_id,
          dryRun: row.dry_run === 1,
          record: {
            entityId: row.entity_id,
            preDeleteStateSnapshot: snapshot.data,
            requestedAt: row.requested_at,
          },
          status: toStatus(row.status),
          message: row.message,
        };
      });
  }
}
