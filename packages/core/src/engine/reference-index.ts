// packages/core/src/engine/reference-index.ts

import type { ReferenceHit, ReferenceIndex } from '../types/analysis.js';

/**
 * Group hits by entity id. Insertion order is discovery order, both for
 * keys and for the hits of one entity. Hits are never deduplicated.
 */
export function buildReferenceIndex(hits: Iterable<ReferenceHit>): ReferenceIndex {
  const index = new Map<string, ReferenceHit[]>();
  for (const hit of hits) {
    const list = index.get(hit.entityId);
    if (list) list.push(hit);
    else index.set(hit.entityId, [hit]);
  }
  return index;
}
