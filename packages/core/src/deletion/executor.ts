// packages/core/src/deletion/executor.ts — Apply a deletion plan

import type { HelperMutator } from '../discovery/data-source.js';
import { getHelperDescriptor } from '../discovery/domains.js';
import type { LookupIssue } from '../types/analysis.js';
import type {
  DeletionOutcome,
  DeletionRecord,
  DeletionReport,
  ValidationIssue,
} from '../types/deletion.js';
import type { HelperEntity } from '../types/helpers.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';
import type { Logger } from '../utils/logger.js';

export interface DeletionOptions {
  candidates: readonly HelperEntity[];
  rejected?: readonly ValidationIssue[];
  alreadyAbsent?: readonly string[];
  lookupErrors?: readonly LookupIssue[];
  /** Required unless dryRun */
  mutator?: HelperMutator;
  dryRun: boolean;
  /** Called once per candidate, before any mutation */
  onRecord?: (record: DeletionRecord) => void | Promise<void>;
  now?: () => Date;
  runId?: string;
  logger?: Logger;
}

export function toDeletionRecord(helper: HelperEntity, requestedAt: string): DeletionRecord {
  return {
    entityId: helper.entityId,
    preDeleteStateSnapshot: {
      domain: helper.domain,
      friendlyName: helper.friendlyName,
      state: helper.currentState,
      attributes: helper.attributes,
    },
    requestedAt,
  };
}

/**
 * Snapshot every candidate, then remove them one by one (or only plan, in a
 * dry run). Helpers without a removal service and template-type rejections
 * are reported as failures needing manual action.
 */
export async function runDeletion(options: DeletionOptions): Promise<DeletionReport> {
  const { candidates, dryRun, mutator, logger } = options;
  if (!dryRun && !mutator) {
    throw new ConfigError('Executing a deletion requires a live host connection');
  }
  const now = options.now ?? (() => new Date());
  const requestedAt = now().toISOString();

  for (const helper of candidates) {
    await options.onRecord?.(toDeletionRecord(helper, requestedAt));
  }

  const outcomes: DeletionOutcome[] = [];
  for (const helper of candidates) {
    const descriptor = getHelperDescriptor(helper.domain);
    const manual = descriptor.removal === 'manual';
    const service = `${helper.entityDomain}.remove`;

    if (dryRun) {
      outcomes.push({
        entityId: helper.entityId,
        status: 'planned',
        manual,
        message: manual ? 'no removal service; remove it from the configuration' : `would call ${service}`,
      });
      continue;
    }
    if (manual || !mutator) {
      outcomes.push({
        entityId: helper.entityId,
        status: 'failed',
        manual: true,
        message: 'no removal service; remove it from the configuration',
      });
      continue;
    }
    try {
      await mutator.remove(helper);
      logger?.info(`Deleted ${helper.entityId}`);
      outcomes.push({ entityId: helper.entityId, status: 'deleted', manual: false, message: `called ${service}` });
    } catch (err) {
      logger?.warn(`Failed to delete ${helper.entityId}: ${errorMessage(err)}`);
      outcomes.push({ entityId: helper.entityId, status: 'failed', manual: false, message: errorMessage(err) });
    }
  }

  const rejected: ValidationIssue[] = [];
  for (const issue of options.rejected ?? []) {
    if (issue.reason === 'requires_manual_removal') {
      outcomes.push({ entityId: issue.entityId, status: 'failed', manual: true, message: issue.message });
    } else {
      rejected.push(issue);
    }
  }

  return {
    runId: options.runId ?? generateRunId(),
    dryRun,
    generatedAt: requestedAt,
    outcomes,
    planned: outcomes.filter((o) => o.status === 'planned').length,
    succeeded: outcomes.filter((o) => o.status === 'deleted').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    alreadyAbsent: [...(options.alreadyAbsent ?? [])],
    rejected,
    lookupErrors: [...(options.lookupErrors ?? [])],
  };
}
