// packages/core/src/scanners/dashboard.ts — UI dashboard store loader and scanner

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { readJsonFile, toLoadIssue } from '../corpus/read.js';
import type { LoadIssue, ReferenceHit } from '../types/analysis.js';
import { MAX_OPEN_FILES } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { mapWithConcurrency } from '../utils/semaphore.js';
import type { ScanContext } from './entity-id.js';
import { scanTree } from './tree.js';

export interface DashboardFile {
  /** Config-root relative POSIX path */
  path: string;
  tree: unknown;
}

export interface DashboardStoreOptions {
  storageDir: string;
  /** File names, `*` wildcard allowed */
  storagePatterns: readonly string[];
  readTimeoutMs: number;
}

function wildcardToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+?^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Read the dashboard documents kept in the storage directory.
 * A missing storage directory yields no files and no errors.
 */
export async function loadDashboardStore(
  root: string,
  options: DashboardStoreOptions,
): Promise<{ files: DashboardFile[]; errors: LoadIssue[] }> {
  const storageAbs = join(root, options.storageDir);
  let names: string[];
  try {
    names = await readdir(storageAbs);
  } catch (err) {
    if (isMissing(err)) return { files: [], errors: [] };
    return { files: [], errors: [{ path: options.storageDir, phase: 'read', message: errorMessage(err) }] };
  }

  const patterns = options.storagePatterns.map(wildcardToRegExp);
  const selected = names.filter((name) => patterns.some((re) => re.test(name))).sort();

  const files: DashboardFile[] = [];
  const errors: LoadIssue[] = [];
  const results = await mapWithConcurrency(selected, MAX_OPEN_FILES, async (name) => {
    const path = `${options.storageDir}/${name}`;
    try {
      return { path, tree: await readJsonFile(join(storageAbs, name), path, options.readTimeoutMs) };
    } catch (err) {
      return toLoadIssue(err, path);
    }
  });
  for (const result of results) {
    if ('phase' in result) errors.push(result);
    else files.push(result);
  }
  return { files, errors };
}

/** Every reference in a dashboard is dashboard evidence, literal or templated. */
export function scanDashboardTree(tree: unknown, sourcePath: string, ctx: ScanContext): ReferenceHit[] {
  return scanTree(tree, sourcePath, ctx, {
    literalKind: 'dashboard',
    literalConfidence: ctx.confidence.dashboard,
    templateKind: 'dashboard',
    templateConfidence: ctx.confidence.template,
  });
}
