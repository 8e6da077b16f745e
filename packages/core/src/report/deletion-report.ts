// packages/core/src/report/deletion-report.ts

import type { DeletionRecord, DeletionReport } from '../types/deletion.js';
import { REPORT_FILES, type ReportArtifact } from './generator.js';

export function renderDeletionReport(report: DeletionReport): string {
  const lines = [
    'Helper Deletion Report',
    `Run: ${report.runId}`,
    `Generated: ${report.generatedAt}`,
    `Mode: ${report.dryRun ? 'dry run (nothing was deleted)' : 'executed'}`,
    '',
    `Planned: ${report.planned}  Deleted: ${report.succeeded}  Failed: ${report.failed}`,
    '',
    'Outcomes:',
  ];
  if (report.outcomes.length === 0) lines.push('  (none)');
  for (const o of report.outcomes) {
    lines.push(`  [${o.status}] ${o.entityId}${o.manual ? ' (manual)' : ''} - ${o.message}`);
  }

  if (report.alreadyAbsent.length > 0) {
    lines.push('', `Already absent (${report.alreadyAbsent.length}):`);
    lines.push(...report.alreadyAbsent.map((id) => `  - ${id}`));
  }
  if (report.rejected.length > 0) {
    lines.push('', `Rejected (${report.rejected.length}):`);
    lines.push(...report.rejected.map((r) => `  - line ${r.lineNumber} ${r.entityId}: ${r.message}`));
  }
  if (report.lookupErrors.length > 0) {
    lines.push('', `Lookup errors (${report.lookupErrors.length}):`);
    lines.push(...report.lookupErrors.map((e) => `  - ${e.target}: ${e.message}`));
  }
  return `${lines.join('\n')}\n`;
}

/** deletion_report.txt and, when anything was snapshotted, deletion_backup.json */
export function deletionArtifacts(report: DeletionReport, records: readonly DeletionRecord[]): ReportArtifact[] {
  const artifacts: ReportArtifact[] = [];
  if (records.length > 0) {
    artifacts.push({ name: REPORT_FILES.deletionBackup, content: `${JSON.stringify(records, null, 2)}\n` });
  }
  artifacts.push({ name: REPORT_FILES.deletionReport, content: renderDeletionReport(report) });
  return artifacts;
}
