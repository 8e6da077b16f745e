// packages/core/src/scanners/tree.ts — Generic walk over parsed YAML/JSON trees

import type { ReferenceHit, SourceKind } from '../types/analysis.js';
import { type ScanContext, findEntityIdTokens, formatExcerpt } from './entity-id.js';
import { hasTemplateMarkers, scanTemplateText } from './template.js';

export type KeyPath = readonly (string | number)[];

/** Value of a host-specific YAML tag (`!include`, `!secret` …). Never scanned. */
export class TaggedScalar {
  constructor(
    public readonly tag: string,
    public readonly value: string,
  ) {}

  toString(): string {
    return `${this.tag} ${this.value}`;
  }
}

export type TreeVisitor = (text: string, keyPath: KeyPath, isKey: boolean) => void;

/**
 * Visit every string scalar and every mapping key, depth first, in document order.
 * Tagged scalars are skipped.
 */
export function walkTree(node: unknown, visit: TreeVisitor, keyPath: KeyPath = []): void {
  if (typeof node === 'string') {
    visit(node, keyPath, false);
    return;
  }
  if (node === null || typeof node !== 'object' || node instanceof TaggedScalar) return;
  if (Array.isArray(node)) {
    node.forEach((item: unknown, i) => walkTree(item, visit, [...keyPath, i]));
    return;
  }
  for (const [key, value] of Object.entries(node)) {
    visit(key, keyPath, true);
    walkTree(value, visit, [...keyPath, key]);
  }
}

/** Keys whose plain string value names a service call, not an entity. Templated values are still scanned. */
const SERVICE_KEYS = new Set(['service', 'action']);

export interface TreeScanKinds {
  literalKind: SourceKind;
  literalConfidence: number;
  templateKind: SourceKind;
  templateConfidence: number;
}

/**
 * Collect reference hits from a parsed tree. Template-marked strings go
 * through the template extractor; other strings yield one literal hit per
 * distinct entity id token.
 */
export function scanTree(
  tree: unknown,
  sourcePath: string,
  ctx: ScanContext,
  kinds: TreeScanKinds,
): ReferenceHit[] {
  const hits: ReferenceHit[] = [];
  walkTree(tree, (text, keyPath, isKey) => {
    if (hasTemplateMarkers(text)) {
      hits.push(
        ...scanTemplateText(text, sourcePath, ctx, {
          sourceKind: kinds.templateKind,
          confidence: kinds.templateConfidence,
          keyPath,
        }),
      );
      return;
    }
    const parentKey = keyPath[keyPath.length - 1];
    if (!isKey && typeof parentKey === 'string' && SERVICE_KEYS.has(parentKey)) return;

    for (const m of findEntityIdTokens(text, ctx.knownDomains)) {
      hits.push({
        entityId: m.entityId,
        sourceKind: kinds.literalKind,
        sourcePath,
        excerpt: formatExcerpt(keyPath, text, m.index, ctx.excerptLength),
        confidence: kinds.literalConfidence,
      });
    }
  });
  return hits;
}
