// packages/core/src/scanners/attributes.ts — References held in helper attributes

import type { ReferenceHit } from '../types/analysis.js';
import type { HelperEntity } from '../types/helpers.js';
import type { ScanContext } from './entity-id.js';
import { scanTree } from './tree.js';

/**
 * Group members, source sensors and templates kept in attributes. A helper
 * never references itself.
 */
export function scanHelperAttributes(helpers: readonly HelperEntity[], ctx: ScanContext): ReferenceHit[] {
  const hits: ReferenceHit[] = [];
  for (const helper of helpers) {
    const found = scanTree(helper.attributes, `entity:${helper.entityId}`, ctx, {
      literalKind: 'template',
      literalConfidence: ctx.confidence.template,
      templateKind: 'template',
      templateConfidence: ctx.confidence.template,
    });
    hits.push(...found.filter((hit) => hit.entityId !== helper.entityId));
  }
  return hits;
}
