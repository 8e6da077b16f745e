// packages/cli/src/render.ts — Terminal rendering for analysis and deletion runs

import type { AnalysisResult, AnalysisRunSummary, Classification, DeletionReport } from '@helpersweep/core';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';

const CLASSIFICATIONS: readonly Classification[] = ['actively_used', 'dashboard_only', 'truly_orphaned'];

const classificationColors: Record<Classification, (text: string) => string> = {
  actively_used: chalk.green,
  dashboard_only: chalk.yellow,
  truly_orphaned: chalk.red,
};

/** Spinner on stderr; silent under --quiet or --json. */
export function startSpinner(text: string, silent: boolean): Ora {
  return ora({ text, isSilent: silent }).start();
}

export function renderAnalysisSummary(
  result: AnalysisResult,
  info: { reportDir: string; files: string[]; runId: string | null },
): void {
  const { counts } = result;
  console.error(chalk.bold('\nHelper Analysis'));
  console.error(chalk.gray('-'.repeat(40)));
  console.error(`  Helpers:        ${chalk.white(String(counts.total))}`);
  for (const classification of CLASSIFICATIONS) {
    const color = classificationColors[classification];
    console.error(`  ${`${classification}:`.padEnd(16)}${color(String(counts.byClassification[classification]))}`);
  }
  console.error(
    `  Sources:        ${result.sources.configFiles.length} config, ${result.sources.dashboardFiles.length} dashboard`,
  );
  if (result.loadErrors.length > 0) {
    console.error(chalk.yellow(`  Files skipped:  ${result.loadErrors.length}`));
  }
  if (result.lookupErrors.length > 0) {
    console.error(chalk.yellow(`  Lookup errors:  ${result.lookupErrors.length}`));
  }
  console.error(chalk.gray('-'.repeat(40)));
  console.error(chalk.gray(`Reports in ${info.reportDir}: ${info.files.join(', ')}`));
  if (info.runId) console.error(chalk.gray(`Saved as run ${info.runId}`));
  if (counts.byClassification.truly_orphaned > 0) {
    console.error(chalk.gray('\nNext: review truly_orphaned_helpers.txt, then helpersweep delete'));
  }
}

export function renderDeletionSummary(report: DeletionReport, reportDir: string): void {
  const mode = report.dryRun ? chalk.cyan('dry run') : chalk.red('executed');
  console.error(chalk.bold(`\nHelper Deletion (${mode})`));
  for (const outcome of report.outcomes) {
    const mark =
      outcome.status === 'deleted' ? chalk.green('✓') : outcome.status === 'failed' ? chalk.red('✗') : chalk.cyan('•');
    console.error(`  ${mark} ${outcome.entityId} ${chalk.gray(outcome.message)}`);
  }
  for (const id of report.alreadyAbsent) {
    console.error(`  ${chalk.gray('-')} ${id} ${chalk.gray('already absent')}`);
  }
  for (const issue of report.rejected) {
    console.error(chalk.yellow(`  ! line ${issue.lineNumber} ${issue.entityId}: ${issue.message}`));
  }
  for (const issue of report.lookupErrors) {
    console.error(chalk.yellow(`  ! ${issue.target}: ${issue.message}`));
  }
  console.error(
    chalk.gray(`\nPlanned ${report.planned}, deleted ${report.succeeded}, failed ${report.failed}. Report in ${reportDir}`),
  );
  if (report.dryRun && report.planned > 0) {
    console.error(chalk.gray('Re-run with --execute to delete.'));
  }
}

export function renderHistory(runs: readonly AnalysisRunSummary[]): void {
  if (runs.length === 0) {
    console.error(chalk.gray('No saved analysis runs.'));
    return;
  }
  for (const run of runs) {
    console.error(
      `${chalk.white(run.runId)}  ${chalk.gray(run.analyzedAt)}  ${run.total} helpers  ` +
        `${chalk.red(`${run.trulyOrphaned} orphaned`)}  ${chalk.yellow(`${run.dashboardOnly} dashboard only`)}  ` +
        chalk.gray(run.configRoot),
    );
  }
}
