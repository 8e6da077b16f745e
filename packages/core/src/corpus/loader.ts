// packages/core/src/corpus/loader.ts — Configuration tree walker

import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { extname, join, relative, sep } from 'node:path';
import type { Ignore } from 'ignore';
import { createIgnoreFilter } from '../config/ignore.js';
import type { LoadIssue } from '../types/analysis.js';
import { MAX_OPEN_FILES } from '../utils/constants.js';
import { errorMessage } from '../utils/errors.js';
import { mapWithConcurrency } from '../utils/semaphore.js';
import { readTextFile, toLoadIssue } from './read.js';

export type CorpusFileKind = 'yaml' | 'template';

export interface CorpusFile {
  /** Config-root relative POSIX path */
  path: string;
  kind: CorpusFileKind;
  text: string;
}

export interface CorpusOptions {
  yamlExtensions: readonly string[];
  templateExtensions: readonly string[];
  readTimeoutMs: number;
  skipGitignore?: boolean;
  /** Additional gitignore-style patterns, e.g. the report directory */
  extraIgnores?: string[];
  /** Files read at once; defaults to MAX_OPEN_FILES */
  maxOpenFiles?: number;
}

export interface CorpusLoadResult {
  files: CorpusFile[];
  errors: LoadIssue[];
}

function normalizePath(filePath: string): string {
  return filePath.split(sep).join('/');
}

function byPath<T extends { path: string }>(a: T, b: T): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

interface PendingFile {
  absPath: string;
  path: string;
  kind: CorpusFileKind;
}

async function walkFiles(
  dir: string,
  root: string,
  ig: Ignore,
  kindOf: (ext: string) => CorpusFileKind | null,
  found: PendingFile[],
  errors: LoadIssue[],
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    errors.push({ path: normalizePath(relative(root, dir)) || '.', phase: 'read', message: errorMessage(err) });
    return;
  }

  const subdirs: string[] = [];
  for (const entry of entries) {
    const full = join(dir, entry.name);
    const rel = normalizePath(relative(root, full));
    if (entry.isDirectory()) {
      if (!ig.ignores(`${rel}/`)) subdirs.push(full);
    } else if (entry.isFile() && !ig.ignores(rel)) {
      const kind = kindOf(extname(entry.name).toLowerCase());
      if (kind) found.push({ absPath: full, path: rel, kind });
    }
  }
  // One directory handle open at a time
  for (const sub of subdirs) {
    await walkFiles(sub, root, ig, kindOf, found, errors);
  }
}

/**
 * Load every YAML and template file under the configuration root.
 * Unreadable files become LoadIssues; the walk never aborts on one file.
 */
export async function loadCorpus(root: string, options: CorpusOptions): Promise<CorpusLoadResult> {
  const ig = createIgnoreFilter(root, {
    skipGitignore: options.skipGitignore,
    extraPatterns: options.extraIgnores,
  });
  const yamlExts = new Set(options.yamlExtensions.map((e) => e.toLowerCase()));
  const templateExts = new Set(options.templateExtensions.map((e) => e.toLowerCase()));
  const kindOf = (ext: string): CorpusFileKind | null =>
    yamlExts.has(ext) ? 'yaml' : templateExts.has(ext) ? 'template' : null;

  const pending: PendingFile[] = [];
  const errors: LoadIssue[] = [];
  await walkFiles(root, root, ig, kindOf, pending, errors);

  const results = await mapWithConcurrency(
    pending,
    options.maxOpenFiles ?? MAX_OPEN_FILES,
    async (file): Promise<CorpusFile | LoadIssue> => {
      try {
        const text = await readTextFile(file.absPath, file.path, options.readTimeoutMs);
        return { path: file.path, kind: file.kind, text };
      } catch (err) {
        return toLoadIssue(err, file.path);
      }
    },
  );

  const files: CorpusFile[] = [];
  for (const result of results) {
    if ('phase' in result) errors.push(result);
    else files.push(result);
  }

  return { files: files.sort(byPath), errors: errors.sort(byPath) };
}

export { byPath, normalizePath };
