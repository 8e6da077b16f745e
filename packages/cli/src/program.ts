// packages/cli/src/program.ts — Command registration

import { Command, InvalidArgumentError } from 'commander';

import { VERSION } from '@helpersweep/core';

import { analyzeCommand } from './commands/analyze.js';
import { deleteCommand } from './commands/delete.js';
import { doctorCommand } from './commands/doctor.js';
import { historyCommand } from './commands/history.js';
import { initCommand } from './commands/init.js';

export function parsePositiveInt(value: string): number {
  if (!/^\d+$/.test(value) || Number.parseInt(value, 10) <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number.parseInt(value, 10);
}

function isVerbose(command: Command): boolean {
  return command.optsWithGlobals().verbose === true;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('helpersweep')
    .description('Find helper entities nothing references, and remove them safely')
    .version(VERSION)
    .option('--verbose', 'Enable debug logging');

  program
    .command('analyze')
    .description('Scan configuration and dashboards, classify every helper and write the reports')
    .argument('[config-root]', 'Configuration root (defaults to configRoot in .helpersweep.yml)')
    .option('--states <file>', 'Read entity states from a JSON dump instead of the live host')
    .option('--output <dir>', 'Report directory')
    .option('--json', 'Print the run summary as JSON on stdout', false)
    .option('--no-save', 'Do not store the run in the local database')
    .option('--quiet', 'Only print warnings and errors', false)
    .action(async (configRoot: string | undefined, opts, command: Command) => {
      await analyzeCommand(configRoot, { ...opts, verbose: isVerbose(command) });
    });

  program
    .command('delete')
    .description('Delete the helpers left in the reviewed orphan list (dry run unless --execute)')
    .option('--execute', 'Remove helpers instead of only planning', false)
    .option('--list <file>', 'Orphan list to act on (default: truly_orphaned_helpers.txt in the report directory)')
    .option('--analysis <file>', 'Analysis JSON to gate against (default: latest saved run)')
    .option('--states <file>', 'Read entity states from a JSON dump (dry run only)')
    .option('--json', 'Print the deletion report as JSON on stdout', false)
    .action(async (opts, command: Command) => {
      const { report } = await deleteCommand({ ...opts, verbose: isVerbose(command) });
      if (report.failed > 0) process.exitCode = 1;
    });

  program
    .command('history')
    .description('List saved analysis runs')
    .option('--limit <n>', 'Max runs', parsePositiveInt, 20)
    .option('--json', 'Print as JSON on stdout', false)
    .action(async (opts) => {
      await historyCommand(opts);
    });

  program
    .command('doctor')
    .description('Preflight diagnostics: config, configuration root, database, token, node')
    .action(async () => {
      const report = await doctorCommand();
      if (!report.healthy) process.exitCode = 1;
    });

  program
    .command('init')
    .description('Write .helpersweep.yml in the current directory')
    .option('--config-root <path>', 'Configuration root to analyze')
    .option('--url <url>', 'Base URL of the host API')
    .option('--token-env <name>', 'Environment variable holding the access token')
    .option('--force', 'Overwrite an existing .helpersweep.yml', false)
    .action(async (opts) => {
      await initCommand(opts);
    });

  return program;
}
