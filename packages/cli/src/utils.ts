// packages/cli/src/utils.ts — Shared command plumbing

import { mkdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  ConfigError,
  HostApiClient,
  type Logger,
  type LogLevel,
  type ProjectConfig,
  type RegistryDataSource,
  STATE_DIRNAME,
  SnapshotRegistrySource,
  createLogger,
  openDatabase,
} from '@helpersweep/core';

export function getDbPath(projectDir?: string): string {
  const base = projectDir ?? process.cwd();
  const dbDir = join(base, STATE_DIRNAME, 'db');
  mkdirSync(dbDir, { recursive: true });
  return join(dbDir, 'helpersweep.db');
}

/**
 * Run a function with a database connection that is closed afterwards,
 * whether it returns or throws.
 */
export async function withDatabase<T>(
  projectDir: string,
  fn: (db: ReturnType<typeof openDatabase>) => T | Promise<T>,
): Promise<T> {
  const db = openDatabase(getDbPath(projectDir));
  try {
    return await fn(db);
  } finally {
    db.close();
  }
}

export function createCliLogger(config: ProjectConfig, flags: { verbose?: boolean; quiet?: boolean }): Logger {
  let level: LogLevel = config.advanced.logLevel;
  if (flags.quiet) level = 'error';
  if (flags.verbose) level = 'debug';
  return createLogger(level);
}

export interface RegistryConnection {
  source: RegistryDataSource;
  /** Present only for a live host; offline sources cannot delete */
  client: HostApiClient | null;
}

/**
 * A states dump when `statesPath` is given, otherwise the live host with the
 * token read from `config.host.tokenEnv`.
 */
export async function connectRegistry(
  config: ProjectConfig,
  options: { statesPath?: string; cwd: string; env: NodeJS.ProcessEnv; logger: Logger },
): Promise<RegistryConnection> {
  if (options.statesPath) {
    const path = resolve(options.cwd, options.statesPath);
    options.logger.debug(`Reading entity states from ${path}`);
    const source = await SnapshotRegistrySource.fromFile(path, { timeoutMs: config.scan.readTimeoutMs });
    return { source, client: null };
  }

  const token = options.env[config.host.tokenEnv];
  if (!token) {
    throw new ConfigError(
      `No access token: set ${config.host.tokenEnv} or pass --states <file> for an offline run`,
      'host.tokenEnv',
    );
  }
  options.logger.debug(`Connecting to ${config.host.url}`);
  const client = new HostApiClient({
    url: config.host.url,
    token,
    timeoutMs: config.host.timeoutMs,
    retryAttempts: config.host.retryAttempts,
    logger: options.logger,
  });
  return { source: client, client };
}

