// packages/core/src/engine/classifier.ts — Per-helper classification and counts

import { isTemplateType } from '../discovery/domains.js';
import type {
  AnalysisCounts,
  Classification,
  ClassifiedHelper,
  ReferenceHit,
  ReferenceIndex,
  SourceKind,
} from '../types/analysis.js';
import type { HelperDomain, HelperEntity } from '../types/helpers.js';
import { ClassificationInvariantViolation } from '../utils/errors.js';

export const CLASSIFICATIONS: readonly Classification[] = [
  'actively_used',
  'dashboard_only',
  'truly_orphaned',
];

/**
 * Any non-dashboard hit means actively used; only dashboard hits means
 * dashboard only; no hits means truly orphaned.
 */
export function classifyHelper(
  helper: HelperEntity,
  hits: readonly ReferenceHit[] | undefined,
): ClassifiedHelper {
  const list = hits ? [...hits] : [];
  const sourceKinds: SourceKind[] = [];
  for (const hit of list) {
    if (!sourceKinds.includes(hit.sourceKind)) sourceKinds.push(hit.sourceKind);
  }

  let classification: Classification;
  if (list.length === 0) classification = 'truly_orphaned';
  else if (sourceKinds.some((k) => k !== 'dashboard')) classification = 'actively_used';
  else classification = 'dashboard_only';

  return {
    helper,
    classification,
    requiresManualRemoval: isTemplateType(helper.domain),
    sourceKinds,
    hits: list,
  };
}

/**
 * Classify every helper exactly once, sorted by entity id.
 * Throws ClassificationInvariantViolation on a duplicate helper or an
 * orphan that has hits.
 */
export function classifyAll(helpers: readonly HelperEntity[], index: ReferenceIndex): ClassifiedHelper[] {
  const seen = new Set<string>();
  const classified: ClassifiedHelper[] = [];
  for (const helper of helpers) {
    if (seen.has(helper.entityId)) {
      throw new ClassificationInvariantViolation(
        `${helper.entityId} would be classified more than once`,
        helper.entityId,
      );
    }
    seen.add(helper.entityId);

    const result = classifyHelper(helper, index.get(helper.entityId));
    if (result.classification === 'truly_orphaned' && result.hits.length > 0) {
      throw new ClassificationInvariantViolation(
        `${helper.entityId} classified truly_orphaned with ${result.hits.length} hits`,
        helper.entityId,
      );
    }
    classified.push(result);
  }
  return classified.sort((a, b) => (a.helper.entityId < b.helper.entityId ? -1 : 1));
}

export function summarizeCounts(classified: readonly ClassifiedHelper[]): AnalysisCounts {
  const domainTotals = new Map<HelperDomain, number>();
  const byClassification: Record<Classification, number> = {
    actively_used: 0,
    dashboard_only: 0,
    truly_orphaned: 0,
  };
  for (const c of classified) {
    domainTotals.set(c.helper.domain, (domainTotals.get(c.helper.domain) ?? 0) + 1);
    byClassification[c.classification] += 1;
  }

  const byDomain: Partial<Record<HelperDomain, number>> = {};
  for (const domain of [...domainTotals.keys()].sort()) {
    byDomain[domain] = domainTotals.get(domain);
  }
  return { total: classified.length, byDomain, byClassification };
}
