// packages/core/src/types/deletion.ts — Deletion gate and executor contracts

import type { LookupIssue } from './analysis.js';
import type { HelperDomain, HelperEntity } from './helpers.js';

export interface OrphanListEntry {
  lineNumber: number;
  entityId: string;
}

export type ValidationReason =
  | 'malformed_entity_id'
  | 'requires_manual_removal'
  | 'not_orphaned'
  | 'not_in_analysis';

export interface ValidationIssue {
  lineNumber: number;
  entityId: string;
  reason: ValidationReason;
  message: string;
}

export interface ParsedOrphanList {
  entries: OrphanListEntry[];
  /** Commented-out lines (kept by the user) */
  keptCount: number;
  issues: ValidationIssue[];
}

export interface DeletionGateResult {
  candidates: HelperEntity[];
  alreadyAbsent: string[];
  rejected: ValidationIssue[];
}

export interface StateSnapshot {
  domain: HelperDomain;
  friendlyName: string;
  state: string | null;
  attributes: Record<string, unknown>;
}

export interface DeletionRecord {
  entityId: string;
  preDeleteStateSnapshot: StateSnapshot;
  requestedAt: string;
}

export type DeletionStatus = 'planned' | 'deleted' | 'failed';

export interface DeletionOutcome {
  entityId: string;
  status: DeletionStatus;
  /** Manual action needed (template-type or no removal service) */
  manual: boolean;
  message: string;
}

export interface DeletionReport {
  runId: string;
  dryRun: boolean;
  generatedAt: string;
  outcomes: DeletionOutcome[];
  planned: number;
  succeeded: number;
  failed: number;
  alreadyAbsent: string[];
  /** Lines the gate refused, other than template-type helpers */
  rejected: ValidationIssue[];
  lookupErrors: LookupIssue[];
}
