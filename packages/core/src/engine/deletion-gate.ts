// packages/core/src/engine/deletion-gate.ts — Which listed helpers may be deleted

import type { RegistryDataSource } from '../discovery/data-source.js';
import { isTemplateType } from '../discovery/domains.js';
import { type IdentifyOptions, identifyHelper } from '../discovery/identify.js';
import type { AnalysisResult, ClassifiedHelper, LookupIssue } from '../types/analysis.js';
import type { DeletionGateResult, OrphanListEntry, ValidationIssue } from '../types/deletion.js';
import type { HelperEntity } from '../types/helpers.js';
import { MAX_REGISTRY_LOOKUPS } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { mapWithConcurrency } from '../utils/semaphore.js';
import { withTimeout } from '../utils/timeout.js';

export interface DeletionGateInput {
  entries: readonly OrphanListEntry[];
  /**
   * Live state per listed id: a helper, or null when the entity no longer
   * exists. Ids missing from the map could not be looked up.
   */
  live: ReadonlyMap<string, HelperEntity | null>;
  latest: AnalysisResult;
}

export const MANUAL_REMOVAL_MESSAGE = 'requires manual config removal';

/**
 * Pure. A candidate exists, is not template-type, and was classified
 * truly_orphaned or dashboard_only in the latest analysis.
 */
export function evaluateDeletionGate(input: DeletionGateInput): DeletionGateResult {
  const latestById = new Map<string, ClassifiedHelper>(
    input.latest.helpers.map((c) => [c.helper.entityId, c]),
  );
  const candidates: HelperEntity[] = [];
  const alreadyAbsent: string[] = [];
  const rejected: ValidationIssue[] = [];

  for (const { lineNumber, entityId } of input.entries) {
    const helper = input.live.get(entityId);
    if (helper === undefined) continue;
    if (helper === null) {
      alreadyAbsent.push(entityId);
      continue;
    }

    const latest = latestById.get(entityId);
    if (isTemplateType(helper.domain) || latest?.requiresManualRemoval) {
      rejected.push({ lineNumber, entityId, reason: 'requires_manual_removal', message: MANUAL_REMOVAL_MESSAGE });
    } else if (!latest) {
      rejected.push({
        lineNumber,
        entityId,
        reason: 'not_in_analysis',
        message: 'not present in latest analysis',
      });
    } else if (latest.classification === 'actively_used') {
      rejected.push({
        lineNumber,
        entityId,
        reason: 'not_orphaned',
        message: 'not orphaned in latest analysis',
      });
    } else {
      candidates.push(helper);
    }
  }

  return { candidates, alreadyAbsent, rejected };
}

type LiveLookup =
  | { entityId: string; helper: HelperEntity | null }
  | { entityId: string; error: string };

export interface LiveLookupResult {
  live: Map<string, HelperEntity | null>;
  lookupErrors: LookupIssue[];
}

/**
 * Look up the ids with at most MAX_REGISTRY_LOOKUPS in flight, each bounded
 * by `timeoutMs`. An entity
 * that exists but is not a recognized helper is a lookup error.
 */
export async function resolveLiveHelpers(
  entityIds: readonly string[],
  source: RegistryDataSource,
  options: IdentifyOptions & { timeoutMs: number; logger?: Logger },
): Promise<LiveLookupResult> {
  const results = await mapWithConcurrency(
    entityIds,
    MAX_REGISTRY_LOOKUPS,
    async (entityId): Promise<LiveLookup> => {
      try {
        const snapshot = await withTimeout(source.get(entityId), options.timeoutMs, `get(${entityId})`);
        if (snapshot === null) return { entityId, helper: null };
        const helper = identifyHelper(snapshot, options);
        if (!helper) return { entityId, error: 'exists but is not a recognized helper' };
        return { entityId, helper };
      } catch (err) {
        return { entityId, error: errorMessage(err) };
      }
    },
  );

  const live = new Map<string, HelperEntity | null>();
  const lookupErrors: LookupIssue[] = [];
  for (const result of results) {
    if ('error' in result) {
      options.logger?.warn(`Lookup failed for ${result.entityId}: ${result.error}`);
      lookupErrors.push({ target: result.entityId, message: result.error });
    } else {
      live.set(result.entityId, result.helper);
    }
  }
  return { live, lookupErrors };
}
