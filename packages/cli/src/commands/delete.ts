// packages/cli/src/commands/delete.ts — Gate the reviewed orphan list and remove what passes

import { existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import {
  AnalysisStore,
  type AnalysisResult,
  ConfigError,
  type DeletionRecord,
  type DeletionReport,
  DeletionStore,
  DirectorySink,
  type Logger,
  type ProjectConfig,
  REPORT_FILES,
  type ValidationIssue,
  deletionArtifacts,
  evaluateDeletionGate,
  generateRunId,
  loadConfig,
  loadEntityRegistry,
  parseAnalysisResult,
  parseOrphanList,
  readJsonFile,
  readTextFile,
  resolveLiveHelpers,
  runDeletion,
  writeArtifacts,
} from '@helpersweep/core';
import { renderDeletionSummary, startSpinner } from '../render.js';
import { connectRegistry, createCliLogger, withDatabase } from '../utils.js';

export interface DeleteOptions {
  /** Actually remove helpers; otherwise a dry run */
  execute?: boolean;
  /** Orphan list; defaults to the truly orphaned list in the report directory */
  list?: string;
  /** Analysis JSON to gate against instead of the latest analysis */
  analysis?: string;
  states?: string;
  json?: boolean;
  verbose?: boolean;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  now?: () => Date;
}

export interface DeleteOutcome {
  report: DeletionReport;
  records: DeletionRecord[];
  reportDir: string;
}

/**
 * The analysis to gate against: an explicit file, else whichever is newer of
 * the latest run saved for this root and the JSON report in the report
 * directory.
 */
async function loadLatestAnalysis(
  options: DeleteOptions,
  ctx: { cwd: string; configRoot: string; reportDir: string; config: ProjectConfig; logger: Logger },
): Promise<AnalysisResult> {
  const timeoutMs = ctx.config.scan.readTimeoutMs;
  if (options.analysis) {
    const path = resolve(ctx.cwd, options.analysis);
    return parseAnalysisResult(await readJsonFile(path, path, timeoutMs), path);
  }

  const stored = await withDatabase(ctx.cwd, (db) => new AnalysisStore(db).latest(ctx.configRoot));
  const reportPath = join(ctx.reportDir, REPORT_FILES.analysis);
  const report = existsSync(reportPath)
    ? parseAnalysisResult(await readJsonFile(reportPath, reportPath, timeoutMs), reportPath)
    : null;

  // A run analyzed with --no-save leaves only the report; the newer analysis wins
  if (stored && (!report || Date.parse(stored.result.timestamp) >= Date.parse(report.timestamp))) {
    ctx.logger.debug(`Gating against saved run ${stored.runId}`);
    return stored.result;
  }
  if (report) {
    ctx.logger.debug(`Gating against ${reportPath}`);
    return report;
  }
  throw new ConfigError(`No analysis found for ${ctx.configRoot}; run helpersweep analyze first`);
}

function byLine(a: ValidationIssue, b: ValidationIssue): number {
  return a.lineNumber - b.lineNumber;
}

export async function deleteCommand(options: DeleteOptions): Promise<DeleteOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const dryRun = !options.execute;
  const config = loadConfig({ projectDir: cwd });
  const logger = createCliLogger(config, options);
  const configRoot = resolve(cwd, config.configRoot);
  const reportDir = resolve(configRoot, config.reportDir);
  const timeoutMs = config.scan.readTimeoutMs;

  const listPath = options.list ? resolve(cwd, options.list) : join(reportDir, REPORT_FILES.trulyOrphaned);
  const parsed = parseOrphanList(await readTextFile(listPath, listPath, timeoutMs));
  logger.debug(`${parsed.entries.length} helpers listed, ${parsed.keptCount} kept`);

  const latest = await loadLatestAnalysis(options, { cwd, configRoot, reportDir, config, logger });
  const { source, client } = await connectRegistry(config, {
    statesPath: options.states,
    cwd,
    env: options.env ?? process.env,
    logger,
  });
  if (!dryRun && !client) {
    throw new ConfigError('--execute needs the live host; it cannot be combined with --states');
  }

  const spinner = startSpinner(`Checking ${parsed.entries.length} listed helpers`, Boolean(options.json));
  const registry = await loadEntityRegistry(configRoot, {
    storageDir: config.dashboards.storageDir,
    file: config.discovery.entityRegistryFile,
    timeoutMs,
  });
  if (registry.issue) logger.warn(`${registry.issue.path}: ${registry.issue.message}`);

  const { live, lookupErrors } = await resolveLiveHelpers(
    parsed.entries.map((e) => e.entityId),
    source,
    {
      domains: config.discovery.domains,
      inferTemplateFromAttributes: config.discovery.inferTemplateFromAttributes,
      platforms: registry.platforms,
      timeoutMs: config.discovery.timeoutMs,
      logger,
    },
  );
  const gate = evaluateDeletionGate({ entries: parsed.entries, live, latest });
  spinner.succeed(`${gate.candidates.length} helpers pass the deletion gate`);

  const runId = generateRunId();
  const records: DeletionRecord[] = [];
  const report = await withDatabase(cwd, async (db) => {
    const store = new DeletionStore(db);
    const result = await runDeletion({
      candidates: gate.candidates,
      rejected: [...gate.rejected, ...parsed.issues].sort(byLine),
      alreadyAbsent: gate.alreadyAbsent,
      lookupErrors,
      mutator: client ?? undefined,
      dryRun,
      runId,
      now: options.now,
      logger,
      onRecord: (record) => {
        store.record(runId, record, dryRun);
        records.push(record);
      },
    });
    for (const outcome of result.outcomes) store.updateOutcome(runId, outcome);
    return result;
  });

  await writeArtifacts(new DirectorySink(reportDir), deletionArtifacts(report, records));

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    renderDeletionSummary(report, reportDir);
  }
  return { report, records, reportDir };
}
