// packages/core/src/scanners/naming.ts — Naming-pattern inference between scripts/automations and helpers

import { basename, extname } from 'node:path';
import type { ReferenceHit } from '../types/analysis.js';
import type { NamingConfig } from '../types/config.js';
import type { HelperEntity } from '../types/helpers.js';
import type { ScanContext } from './entity-id.js';

export type NamingSubjectKind = 'script' | 'automation' | 'file';

/** A name that may share vocabulary with the helpers it drives. */
export interface NamingSubject {
  kind: NamingSubjectKind;
  text: string;
  sourcePath: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function isAutomation(node: Record<string, unknown>): boolean {
  return ('trigger' in node || 'triggers' in node) && ('action' in node || 'actions' in node);
}

function pushString(out: NamingSubject[], kind: NamingSubjectKind, value: unknown, sourcePath: string): void {
  if (typeof value === 'string' && value.trim()) out.push({ kind, text: value, sourcePath });
}

function collectFromNode(node: unknown, sourcePath: string, out: NamingSubject[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectFromNode(item, sourcePath, out);
    return;
  }
  if (!isRecord(node)) return;

  if (isAutomation(node)) {
    pushString(out, 'automation', node.id, sourcePath);
    pushString(out, 'automation', node.alias, sourcePath);
  }
  for (const [key, value] of Object.entries(node)) {
    if (isRecord(value) && 'sequence' in value) {
      pushString(out, 'script', key, sourcePath);
      pushString(out, 'script', value.alias, sourcePath);
    }
    collectFromNode(value, sourcePath, out);
  }
}

/**
 * Script keys and aliases, automation ids and aliases, and the base name of
 * package and blueprint files.
 */
export function collectNamingSubjects(file: { path: string; documents: readonly unknown[] }): NamingSubject[] {
  const subjects: NamingSubject[] = [];
  const segments = file.path.split('/');
  if (segments.includes('packages') || segments.includes('blueprints')) {
    pushString(subjects, 'file', basename(file.path, extname(file.path)), file.path);
  }
  for (const doc of file.documents) collectFromNode(doc, file.path, subjects);
  return subjects;
}

function separatorPattern(separators: string): RegExp {
  const escaped = [...separators].map((c) => c.replace(/[-[\]\\^]/g, '\\$&')).join('');
  return new RegExp(`[${escaped}]+`);
}

export function tokenizeName(text: string, naming: NamingConfig): string[] {
  const stop = new Set(naming.stopTokens.map((t) => t.toLowerCase()));
  const tokens = text
    .toLowerCase()
    .split(separatorPattern(naming.separators))
    .filter((t) => t.length >= naming.minTokenLength && !stop.has(t));
  return [...new Set(tokens)];
}

/**
 * One `naming_pattern` hit per (helper, subject) pair sharing at least
 * `minSharedTokens` tokens. Disabled naming yields no hits.
 */
export function inferNamingReferences(
  subjects: readonly NamingSubject[],
  helpers: readonly HelperEntity[],
  naming: NamingConfig,
  ctx: ScanContext,
): ReferenceHit[] {
  if (!naming.enabled) return [];

  const helperTokens = helpers
    .map((h) => ({ entityId: h.entityId, tokens: tokenizeName(h.objectId, naming) }))
    .filter((h) => h.tokens.length > 0);

  const hits: ReferenceHit[] = [];
  for (const subject of subjects) {
    const subjectTokens = new Set(tokenizeName(subject.text, naming));
    if (subjectTokens.size === 0) continue;
    for (const helper of helperTokens) {
      const shared = helper.tokens.filter((t) => subjectTokens.has(t));
      if (shared.length < naming.minSharedTokens) continue;
      hits.push({
        entityId: helper.entityId,
        sourceKind: 'naming_pattern',
        sourcePath: subject.sourcePath,
        excerpt: `${subject.kind} ${subject.text} (shares: ${shared.join(', ')})`.slice(0, ctx.excerptLength),
        confidence: ctx.confidence.naming,
      });
    }
  }
  return hits;
}
