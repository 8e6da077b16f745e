// packages/core/src/scanners/config-entries.ts — Helper definitions stored by the UI

import { join } from 'node:path';
import { z } from 'zod';
import { readOptionalJsonFile, toLoadIssue } from '../corpus/read.js';
import { HELPER_PLATFORMS } from '../discovery/domains.js';
import type { LoadIssue, ReferenceHit } from '../types/analysis.js';
import { LoadError } from '../utils/errors.js';
import type { ScanContext } from './entity-id.js';
import { scanTree } from './tree.js';

const configEntrySchema = z
  .object({
    entry_id: z.string().optional(),
    domain: z.string(),
    title: z.string().default(''),
    data: z.unknown().optional(),
    options: z.unknown().optional(),
  })
  .passthrough();

const configEntriesStoreSchema = z.object({
  data: z.object({
    entries: z.array(configEntrySchema),
  }),
});

export type ConfigEntry = z.infer<typeof configEntrySchema>;

/** Validate the store document and keep entries of helper integrations. */
export function parseConfigEntries(store: unknown, path: string): ConfigEntry[] {
  const result = configEntriesStoreSchema.safeParse(store);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new LoadError(`Unexpected config entry store shape at ${issue?.path.join('.') ?? '<root>'}`, path, 'parse');
  }
  return result.data.data.entries.filter((e) => HELPER_PLATFORMS.has(e.domain));
}

export interface ConfigEntriesLoad {
  /** Config-root relative path of the store */
  path: string;
  /** False when the store does not exist */
  found: boolean;
  entries: ConfigEntry[];
  issue: LoadIssue | null;
}

/** Read the config entry store; a missing store yields no entries and no issue. */
export async function loadConfigEntries(
  root: string,
  options: { storageDir: string; file: string; timeoutMs: number },
): Promise<ConfigEntriesLoad> {
  const path = `${options.storageDir}/${options.file}`;
  try {
    const raw = await readOptionalJsonFile(join(root, options.storageDir, options.file), path, options.timeoutMs);
    if (raw === undefined) return { path, found: false, entries: [], issue: null };
    return { path, found: true, entries: parseConfigEntries(raw, path), issue: null };
  } catch (err) {
    return { path, found: true, entries: [], issue: toLoadIssue(err, path) };
  }
}

/**
 * Walk each helper entry's `options` and `data`. Templates give template
 * hits; plain entity ids are structural references.
 */
export function scanConfigEntries(
  entries: readonly ConfigEntry[],
  path: string,
  ctx: ScanContext,
): ReferenceHit[] {
  const hits: ReferenceHit[] = [];
  for (const entry of entries) {
    const sourcePath = `${path}#${entry.title || entry.entry_id || entry.domain}`;
    for (const tree of [entry.options, entry.data]) {
      hits.push(
        ...scanTree(tree, sourcePath, ctx, {
          literalKind: 'yaml_structural',
          literalConfidence: ctx.confidence.structural,
          templateKind: 'template',
          templateConfidence: ctx.confidence.template,
        }),
      );
    }
  }
  return hits;
}
