// packages/cli/src/commands/analyze.ts — Classify every helper and write the reports

import { existsSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  AnalysisStore,
  type AnalysisResult,
  ConfigError,
  DirectorySink,
  generateReports,
  loadConfig,
  runAnalysis,
  writeArtifacts,
} from '@helpersweep/core';
import { renderAnalysisSummary, startSpinner } from '../render.js';
import { connectRegistry, createCliLogger, withDatabase } from '../utils.js';

export interface AnalyzeOptions {
  /** States dump (JSON array shaped like /api/states) for an offline run */
  states?: string;
  /** Report directory; relative to the working directory */
  output?: string;
  json?: boolean;
  /** false with --no-save */
  save?: boolean;
  quiet?: boolean;
  verbose?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface AnalyzeOutcome {
  result: AnalysisResult;
  runId: string | null;
  reportDir: string;
  files: string[];
}

export async function analyzeCommand(configRootArg: string | undefined, options: AnalyzeOptions): Promise<AnalyzeOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const config = loadConfig({
    projectDir: cwd,
    overrides: {
      configRoot: configRootArg === undefined ? undefined : resolve(cwd, configRootArg),
      reportDir: options.output === undefined ? undefined : resolve(cwd, options.output),
    },
  });
  const logger = createCliLogger(config, options);

  const configRoot = resolve(cwd, config.configRoot);
  if (!existsSync(configRoot) || !statSync(configRoot).isDirectory()) {
    throw new ConfigError(`Configuration root not found: ${configRoot}`, 'configRoot');
  }
  const reportDir = resolve(configRoot, config.reportDir);

  const { source } = await connectRegistry(config, {
    statesPath: options.states,
    cwd,
    env: options.env ?? process.env,
    logger,
  });

  const spinner = startSpinner(`Analyzing helpers in ${configRoot}`, Boolean(options.quiet || options.json));
  let result: AnalysisResult;
  try {
    result = await runAnalysis({ configRoot, config, source, logger, now: options.now });
  } catch (err) {
    spinner.fail('Analysis failed');
    throw err;
  }
  spinner.succeed(`Classified ${result.counts.total} helpers`);

  const files = await writeArtifacts(new DirectorySink(reportDir), generateReports(result));

  const runId =
    options.save === false
      ? null
      : await withDatabase(cwd, (db) => new AnalysisStore(db).save(result, configRoot));

  if (options.json) {
    console.log(JSON.stringify({ runId, reportDir, files, counts: result.counts }, null, 2));
  } else if (!options.quiet) {
    renderAnalysisSummary(result, { reportDir, files, runId });
  }
  return { result, runId, reportDir, files };
}
