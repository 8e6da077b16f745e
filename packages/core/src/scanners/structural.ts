// packages/core/src/scanners/structural.ts — YAML parsing and structural reference scan

import { type ScalarTag, parseAllDocuments } from 'yaml';
import type { ReferenceHit } from '../types/analysis.js';
import { LoadError } from '../utils/errors.js';
import type { ScanContext } from './entity-id.js';
import { TaggedScalar, scanTree } from './tree.js';

export const HOST_YAML_TAGS = [
  '!include',
  '!include_dir_list',
  '!include_dir_named',
  '!include_dir_merge_list',
  '!include_dir_merge_named',
  '!secret',
  '!input',
  '!env_var',
] as const;

const customTags: ScalarTag[] = HOST_YAML_TAGS.map((tag) => ({
  tag,
  resolve: (value: string) => new TaggedScalar(tag, value),
  identify: (value: unknown) => value instanceof TaggedScalar && value.tag === tag,
}));

/**
 * Parse every document of a YAML file. Host tags resolve to TaggedScalar.
 * Throws LoadError (phase `parse`) on the first syntax error.
 */
export function parseYamlDocument(path: string, text: string): unknown[] {
  const documents: unknown[] = [];
  for (const doc of parseAllDocuments(text, { customTags, uniqueKeys: false })) {
    const [first] = doc.errors;
    if (first) {
      throw new LoadError(first.message, path, 'parse');
    }
    const value: unknown = doc.toJS();
    documents.push(value);
  }
  return documents;
}

/** Structural hits (1.0) for literals, template hits for template-marked strings. */
export function scanStructuralTree(tree: unknown, sourcePath: string, ctx: ScanContext): ReferenceHit[] {
  return scanTree(tree, sourcePath, ctx, {
    literalKind: 'yaml_structural',
    literalConfidence: ctx.confidence.structural,
    templateKind: 'template',
    templateConfidence: ctx.confidence.template,
  });
}
