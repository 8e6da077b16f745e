// packages/core/src/scanners/template.ts — Jinja-style template reference extraction

import type { ReferenceHit, SourceKind } from '../types/analysis.js';
import {
  type EntityIdMatch,
  type ScanContext,
  distinctMatches,
  findEntityIdTokens,
  formatExcerpt,
} from './entity-id.js';

/** Template functions and filters whose first argument is an entity id */
export const ENTITY_ACCESSORS = [
  'states',
  'is_state',
  'state_attr',
  'is_state_attr',
  'has_value',
  'state_translated',
  'expand',
  'device_id',
  'device_attr',
  'area_id',
  'area_name',
  'closest',
  'distance',
] as const;

const ACCESSOR_CALL_RE = new RegExp(
  `\\b(?:${ENTITY_ACCESSORS.join('|')})\\s*\\(\\s*(['"])([a-z_][a-z0-9_]*\\.[a-z0-9_]+)\\1`,
  'g',
);

const STATE_OBJECT_RE = /\bstates\.([a-z_][a-z0-9_]*)\.([a-z0-9_]+)/g;

const TEMPLATE_MARKER_RE = /\{\{|\{%/;

export type TemplateMatch = EntityIdMatch;

export function hasTemplateMarkers(text: string): boolean {
  return TEMPLATE_MARKER_RE.test(text);
}

/**
 * Entity ids referenced by a template, distinct, in order of first occurrence.
 * Accessor calls and `states.<domain>.<id>` accept any domain; other tokens
 * must belong to a known entity domain.
 */
export function extractTemplateReferences(
  text: string,
  options: { knownDomains: ReadonlySet<string> },
): TemplateMatch[] {
  const matches: EntityIdMatch[] = [];

  for (const m of text.matchAll(ACCESSOR_CALL_RE)) {
    matches.push({ entityId: m[2], index: (m.index ?? 0) + m[0].length - m[2].length - 1 });
  }
  for (const m of text.matchAll(STATE_OBJECT_RE)) {
    matches.push({ entityId: `${m[1]}.${m[2]}`, index: (m.index ?? 0) + 'states.'.length });
  }
  matches.push(...findEntityIdTokens(text, options.knownDomains));

  return distinctMatches(matches);
}

export interface TemplateScanOptions {
  sourceKind?: SourceKind;
  confidence?: number;
  keyPath?: readonly (string | number)[];
}

/** One hit per distinct entity id in a template text. */
export function scanTemplateText(
  text: string,
  sourcePath: string,
  ctx: ScanContext,
  options?: TemplateScanOptions,
): ReferenceHit[] {
  const sourceKind = options?.sourceKind ?? 'template';
  const confidence = options?.confidence ?? ctx.confidence.template;
  const keyPath = options?.keyPath ?? [];
  return extractTemplateReferences(text, ctx).map((m) => ({
    entityId: m.entityId,
    sourceKind,
    sourcePath,
    excerpt: formatExcerpt(keyPath, text, m.index, ctx.excerptLength),
    confidence,
  }));
}
