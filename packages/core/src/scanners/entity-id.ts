// packages/core/src/scanners/entity-id.ts — Entity id tokens, known domains, excerpts

import entityDomains from '../data/entity-domains.json';
import type { ConfidenceConfig } from '../types/config.js';

const ENTITY_ID_RE = /^[a-z_][a-z0-9_]*\.[a-z0-9_]+$/;

/**
 * `domain.object_id` not embedded in a longer dotted name or identifier,
 * and not a call such as `light.turn_on(`.
 */
const ENTITY_TOKEN_RE = /(?<![A-Za-z0-9_.])([a-z_][a-z0-9_]*)\.([a-z0-9_]+)(?![A-Za-z0-9_(])/g;

export const BUILTIN_ENTITY_DOMAINS: readonly string[] = entityDomains;

/** Everything the scanners need besides the text itself. */
export interface ScanContext {
  knownDomains: ReadonlySet<string>;
  excerptLength: number;
  confidence: ConfidenceConfig;
}

export function createScanContext(options: {
  extraDomains?: readonly string[];
  excerptLength: number;
  confidence: ConfidenceConfig;
}): ScanContext {
  return {
    knownDomains: new Set([...BUILTIN_ENTITY_DOMAINS, ...(options.extraDomains ?? [])]),
    excerptLength: options.excerptLength,
    confidence: options.confidence,
  };
}

export function isValidEntityId(value: string): boolean {
  return ENTITY_ID_RE.test(value);
}

export function splitEntityId(entityId: string): { domain: string; objectId: string } {
  const dot = entityId.indexOf('.');
  return { domain: entityId.slice(0, dot), objectId: entityId.slice(dot + 1) };
}

export interface EntityIdMatch {
  entityId: string;
  /** Offset of the first occurrence in the scanned text */
  index: number;
}

/** Keep the first occurrence of each id, ordered by offset. */
export function distinctMatches(matches: readonly EntityIdMatch[]): EntityIdMatch[] {
  const first = new Map<string, number>();
  for (const m of matches) {
    const seen = first.get(m.entityId);
    if (seen === undefined || m.index < seen) first.set(m.entityId, m.index);
  }
  return [...first.entries()]
    .map(([entityId, index]) => ({ entityId, index }))
    .sort((a, b) => a.index - b.index || (a.entityId < b.entityId ? -1 : 1));
}

/** Bare or quoted `domain.object_id` tokens whose domain is known. */
export function findEntityIdTokens(text: string, knownDomains: ReadonlySet<string>): EntityIdMatch[] {
  const matches: EntityIdMatch[] = [];
  for (const m of text.matchAll(ENTITY_TOKEN_RE)) {
    if (knownDomains.has(m[1])) {
      matches.push({ entityId: `${m[1]}.${m[2]}`, index: m.index ?? 0 });
    }
  }
  return distinctMatches(matches);
}

/** Whitespace-collapsed window of `text` around `index`, at most `maxLength` chars. */
export function excerptAround(text: string, index: number, maxLength: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) return flat;
  // Offsets shift when whitespace collapses; map through the raw prefix.
  const offset = text.slice(0, index).replace(/\s+/g, ' ').trimStart().length;
  const start = Math.max(0, Math.min(offset - Math.floor(maxLength / 2), flat.length - maxLength));
  return flat.slice(start, start + maxLength);
}

/** `keyPath: snippet`, bounded by `maxLength`. */
export function formatExcerpt(
  keyPath: readonly (string | number)[],
  text: string,
  index: number,
  maxLength: number,
): string {
  const prefix = keyPath.length > 0 ? `${keyPath.join('.')}: ` : '';
  if (prefix.length >= maxLength) return `${prefix}${text}`.slice(0, maxLength);
  return `${prefix}${excerptAround(text, index, maxLength - prefix.length)}`;
}
