// packages/core/src/config/loader.ts

import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { ProjectConfig } from '../types/config.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { validateConfig } from './schema.js';

export const CONFIG_FILENAME = '.helpersweep.yml';
export const STATE_DIRNAME = '.helpersweep';

/** Per-section partial overrides, as the CLI flags produce them. */
export type ConfigOverrides = {
  [K in keyof ProjectConfig]?: ProjectConfig[K] extends object
    ? Partial<ProjectConfig[K]>
    : ProjectConfig[K];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Deep merge two objects. Source values overwrite target values.
 * Arrays are replaced, not merged. Undefined source values are skipped.
 */
function deepMerge(target: unknown, source: unknown): unknown {
  if (source === undefined) return target;
  if (!isPlainObject(target) || !isPlainObject(source)) return source;
  const result: Record<string, unknown> = { ...target };
  for (const [key, value] of Object.entries(source)) {
    result[key] = deepMerge(result[key], value);
  }
  return result;
}

/**
 * Load config with precedence: overrides > .helpersweep.yml > defaults.
 * The merged result is validated before it is returned.
 */
export function loadConfig(options?: {
  projectDir?: string;
  overrides?: ConfigOverrides;
  skipFile?: boolean;
}): ProjectConfig {
  const projectDir = options?.projectDir ?? process.cwd();
  let merged: unknown = structuredClone(DEFAULT_CONFIG);

  const configPath = join(projectDir, CONFIG_FILENAME);
  if (!options?.skipFile && existsSync(configPath)) {
    let fileConfig: unknown;
    try {
      fileConfig = parseYaml(readFileSync(configPath, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${CONFIG_FILENAME}: ${errorMessage(err)}`);
    }
    if (fileConfig !== null && fileConfig !== undefined && !isPlainObject(fileConfig)) {
      throw new ConfigError(`${CONFIG_FILENAME} must contain a mapping at the top level`);
    }
    merged = deepMerge(merged, fileConfig ?? undefined);
  }

  if (options?.overrides) {
    merged = deepMerge(merged, options.overrides);
  }

  return validateConfig(merged);
}

/**
 * Write a ProjectConfig to .helpersweep.yml in the given directory.
 * Also creates .helpersweep/db/ and keeps it out of git.
 */
export function writeConfig(config: ProjectConfig, dir: string): void {
  const configPath = join(dir, CONFIG_FILENAME);
  writeFileSync(configPath, stringifyYaml(config, { lineWidth: 100 }), 'utf-8');

  mkdirSync(join(dir, STATE_DIRNAME, 'db'), { recursive: true });

  const gitignorePath = join(dir, '.gitignore');
  if (existsSync(gitignorePath)) {
    const content = readFileSync(gitignorePath, 'utf-8');
    if (!content.includes(`${STATE_DIRNAME}/`)) {
      appendFileSync(gitignorePath, `\n${STATE_DIRNAME}/\n`);
    }
  } else {
    writeFileSync(gitignorePath, `${STATE_DIRNAME}/\n`, 'utf-8');
  }
}

export { deepMerge };
