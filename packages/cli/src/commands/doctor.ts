// packages/cli/src/commands/doctor.ts — Preflight diagnostics

import { accessSync, constants, existsSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  type ProjectConfig,
  STATE_DIRNAME,
  VERSION,
  errorMessage,
  getSchemaVersion,
  loadConfig,
  openDatabase,
} from '@helpersweep/core';
import chalk from 'chalk';

export interface Check {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export interface DoctorReport {
  version: string;
  checks: Check[];
  healthy: boolean;
}

function checkConfig(cwd: string): { check: Check; config: ProjectConfig } {
  if (!existsSync(join(cwd, CONFIG_FILENAME))) {
    return {
      check: {
        name: 'config',
        status: 'warn',
        message: `${CONFIG_FILENAME} not found, using defaults`,
        fix: 'helpersweep init',
      },
      config: DEFAULT_CONFIG,
    };
  }
  try {
    return {
      check: { name: 'config', status: 'pass', message: `${CONFIG_FILENAME} is valid` },
      config: loadConfig({ projectDir: cwd }),
    };
  } catch (err) {
    return {
      check: { name: 'config', status: 'fail', message: errorMessage(err), fix: `Fix ${CONFIG_FILENAME}` },
      config: DEFAULT_CONFIG,
    };
  }
}

function checkConfigRoot(cwd: string, config: ProjectConfig): Check {
  const root = resolve(cwd, config.configRoot);
  if (!existsSync(root) || !statSync(root).isDirectory()) {
    return {
      name: 'config-root',
      status: 'fail',
      message: `${root} is not a directory`,
      fix: `Set configRoot in ${CONFIG_FILENAME} or pass it to helpersweep analyze`,
    };
  }
  if (!existsSync(join(root, 'configuration.yaml'))) {
    return { name: 'config-root', status: 'warn', message: `${root} has no configuration.yaml` };
  }
  return { name: 'config-root', status: 'pass', message: root };
}

function checkDatabase(cwd: string): Check[] {
  const dbDir = join(cwd, STATE_DIRNAME, 'db');
  const dbPath = join(dbDir, 'helpersweep.db');
  if (!existsSync(dbDir)) {
    return [
      {
        name: 'database',
        status: 'warn',
        message: `${STATE_DIRNAME}/db/ not found, will be created on first run`,
      },
    ];
  }
  try {
    accessSync(dbDir, constants.W_OK);
  } catch {
    return [
      {
        name: 'database',
        status: 'fail',
        message: `${STATE_DIRNAME}/db/ is not writable`,
        fix: `Check file permissions on ${STATE_DIRNAME}/db/`,
      },
    ];
  }
  if (!existsSync(dbPath)) {
    return [{ name: 'database', status: 'warn', message: 'Database will be created on first run' }];
  }

  const checks: Check[] = [{ name: 'database', status: 'pass', message: 'Database exists and is writable' }];
  try {
    const db = openDatabase(dbPath);
    try {
      checks.push({ name: 'schema', status: 'pass', message: `Schema version ${getSchemaVersion(db) ?? 'unknown'}` });
    } finally {
      db.close();
    }
  } catch (err) {
    checks.push({ name: 'schema', status: 'fail', message: errorMessage(err) });
  }
  return checks;
}

function checkToken(config: ProjectConfig, env: NodeJS.ProcessEnv): Check {
  if (env[config.host.tokenEnv]) {
    return { name: 'token', status: 'pass', message: `${config.host.tokenEnv} is set (${config.host.url})` };
  }
  return {
    name: 'token',
    status: 'warn',
    message: `${config.host.tokenEnv} is not set; only offline runs with --states are possible`,
    fix: `export ${config.host.tokenEnv}=<long-lived access token>`,
  };
}

function checkNode(): Check {
  const nodeVersion = process.version;
  const major = Number.parseInt(nodeVersion.slice(1).split('.')[0], 10);
  if (major >= 20) return { name: 'node', status: 'pass', message: `Node.js ${nodeVersion}` };
  return {
    name: 'node',
    status: 'fail',
    message: `Node.js ${nodeVersion}, requires >= 20`,
    fix: 'Install Node.js 20+',
  };
}

export function runChecks(cwd: string, env: NodeJS.ProcessEnv): Check[] {
  const { check, config } = checkConfig(cwd);
  return [check, checkConfigRoot(cwd, config), ...checkDatabase(cwd), checkToken(config, env), checkNode()];
}

export async function doctorCommand(options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): Promise<DoctorReport> {
  const cwd = options.cwd ?? process.cwd();
  console.error(chalk.cyan(`\n  helpersweep doctor v${VERSION}\n`));

  const checks = runChecks(cwd, options.env ?? process.env);
  for (const check of checks) {
    const icon =
      check.status === 'pass' ? chalk.green('PASS') : check.status === 'warn' ? chalk.yellow('WARN') : chalk.red('FAIL');
    console.error(`  ${icon} ${check.name}: ${check.message}`);
    if (check.fix) {
      console.error(chalk.dim(`       → ${check.fix}`));
    }
  }
  console.error('');

  const report: DoctorReport = { version: VERSION, checks, healthy: checks.every((c) => c.status !== 'fail') };
  console.log(JSON.stringify(report, null, 2));
  return report;
}
