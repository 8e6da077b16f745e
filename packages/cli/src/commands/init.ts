import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';

import { CONFIG_FILENAME, ConfigError, type ProjectConfig, loadConfig, writeConfig } from '@helpersweep/core';
import chalk from 'chalk';

export interface InitOptions {
  configRoot?: string;
  url?: string;
  tokenEnv?: string;
  force?: boolean;
  cwd?: string;
}

export async function initCommand(options: InitOptions): Promise<ProjectConfig> {
  const cwd = options.cwd ?? process.cwd();

  if (existsSync(join(cwd, CONFIG_FILENAME)) && !options.force) {
    throw new ConfigError('Already initialized. Use --force to overwrite.');
  }

  // An existing file is replaced under --force, not merged
  const config = loadConfig({
    projectDir: cwd,
    skipFile: true,
    overrides: {
      configRoot: options.configRoot === undefined ? undefined : resolve(cwd, options.configRoot),
      host: { url: options.url, tokenEnv: options.tokenEnv },
    },
  });
  writeConfig(config, cwd);

  console.error(chalk.green(`\nWrote ${CONFIG_FILENAME}`));
  console.error(chalk.gray(`  configRoot: ${config.configRoot}`));
  console.error(chalk.gray(`  host:       ${config.host.url} (token from ${config.host.tokenEnv})`));
  console.error(chalk.gray(`  reports:    ${config.reportDir}`));
  console.error(chalk.gray('\nNext: helpersweep analyze'));
  return config;
}
