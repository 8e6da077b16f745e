// packages/core/src/config/ignore.ts — .gitignore + .helpersweepignore aware file filtering

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';

export const IGNORE_FILENAME = '.helpersweepignore';

/** Runtime state, caches and secrets that never hold entity references */
export const BUILTIN_IGNORES = [
  '.storage',
  '.git',
  '.cloud',
  '.helpersweep',
  'node_modules',
  'deps',
  'tts',
  'backups',
  'custom_components',
  'www',
  'image',
  '__pycache__',
  'secrets.yaml',
  'known_devices.yaml',
  '*.db',
  '*.db-journal',
  '*.db-wal',
  '*.db-shm',
  '*.log',
  '*.log.*',
];

/**
 * Load and compile all ignore patterns into a single matcher.
 * Precedence: builtins -> extra patterns -> .gitignore -> .helpersweepignore
 */
export function createIgnoreFilter(
  configRoot: string,
  options?: { skipGitignore?: boolean; extraPatterns?: string[] },
): Ignore {
  const ig = ignore();

  ig.add(BUILTIN_IGNORES);
  if (options?.extraPatterns?.length) {
    ig.add(options.extraPatterns);
  }

  if (!options?.skipGitignore) {
    const gitignorePath = join(configRoot, '.gitignore');
    if (existsSync(gitignorePath)) {
      ig.add(readFileSync(gitignorePath, 'utf-8'));
    }
  }

  // Highest priority: can re-include builtins with `!pattern`
  const projectIgnorePath = join(configRoot, IGNORE_FILENAME);
  if (existsSync(projectIgnorePath)) {
    ig.add(readFileSync(projectIgnorePath, 'utf-8'));
  }

  return ig;
}

/**
 * Compile gitignore-style patterns into a predicate over relative POSIX paths.
 */
export function createPathMatcher(patterns: readonly string[]): (relPath: string) => boolean {
  if (patterns.length === 0) return () => false;
  const ig = ignore().add([...patterns]);
  return (relPath) => ig.ignores(relPath);
}
