// packages/core/src/report/generator.ts — Analysis artifacts

import { stringify as stringifyYaml } from 'yaml';
import { MANUAL_REMOVAL_MESSAGE } from '../engine/deletion-gate.js';
import type { AnalysisResult, ClassifiedHelper } from '../types/analysis.js';
import { SUMMARY_LIST_LIMIT } from '../utils/constants.js';

export interface ReportArtifact {
  /** File name inside the report directory */
  name: string;
  content: string;
}

export const REPORT_FILES = {
  analysis: 'helper_analysis.json',
  summary: 'helper_summary.txt',
  trulyOrphaned: 'truly_orphaned_helpers.txt',
  orphaned: 'orphaned_helpers.txt',
  reviewCards: 'dashboard_review_cards.yaml',
  deletionBackup: 'deletion_backup.json',
  deletionReport: 'deletion_report.txt',
} as const;

function ofClass(result: AnalysisResult, classification: ClassifiedHelper['classification']): ClassifiedHelper[] {
  return result.helpers.filter((c) => c.classification === classification);
}

/** `<entity_id>  # <name> (state: <state>)`, pre-commented for template-type helpers. */
export function formatOrphanLine(c: ClassifiedHelper): string {
  let line = `${c.helper.entityId}  # ${c.helper.friendlyName} (state: ${c.helper.currentState ?? 'unknown'})`;
  if (c.classification === 'dashboard_only') line += ' [dashboard only]';
  if (c.requiresManualRemoval) line = `# ${line} - ${MANUAL_REMOVAL_MESSAGE}`;
  return line;
}

function renderOrphanList(title: string, timestamp: string, helpers: readonly ClassifiedHelper[]): string {
  const lines = [
    `# ${title}`,
    `# Generated: ${timestamp}`,
    '# Comment out (#) every helper you want to keep, then run `helpersweep delete`.',
    '# Lines already commented need a manual configuration change.',
    '',
  ];
  if (helpers.length === 0) lines.push('# (none)');
  else lines.push(...helpers.map(formatOrphanLine));
  return `${lines.join('\n')}\n`;
}

function listSection(title: string, items: readonly string[]): string[] {
  const lines = [`${title} (${items.length}):`];
  if (items.length === 0) {
    lines.push('  (none)');
    return lines;
  }
  lines.push(...items.slice(0, SUMMARY_LIST_LIMIT).map((item) => `  - ${item}`));
  if (items.length > SUMMARY_LIST_LIMIT) {
    lines.push(`  ... and ${items.length - SUMMARY_LIST_LIMIT} more`);
  }
  return lines;
}

function describeHelper(c: ClassifiedHelper): string {
  const manual = c.requiresManualRemoval ? ' [manual removal]' : '';
  return `${c.helper.entityId} (${c.helper.friendlyName})${manual}`;
}

export function renderSummary(result: AnalysisResult): string {
  const { counts } = result;
  const lines = [
    'Helper Analysis Summary',
    `Generated: ${result.timestamp}`,
    '',
    `Total helpers: ${counts.total}`,
    `  actively_used:  ${counts.byClassification.actively_used}`,
    `  dashboard_only: ${counts.byClassification.dashboard_only}`,
    `  truly_orphaned: ${counts.byClassification.truly_orphaned}`,
    '',
    'By domain:',
    ...Object.entries(counts.byDomain).map(([domain, n]) => `  ${domain}: ${n}`),
    '',
    `Scanned ${result.sources.configFiles.length} configuration files and ${result.sources.dashboardFiles.length} dashboard files.`,
    '',
    ...listSection('Truly orphaned', ofClass(result, 'truly_orphaned').map(describeHelper)),
    '',
    ...listSection('Dashboard only', ofClass(result, 'dashboard_only').map(describeHelper)),
    '',
    ...listSection(
      'Files with errors',
      result.loadErrors.map((e) => `${e.path} [${e.phase}]: ${e.message}`),
    ),
    '',
    ...listSection(
      'Registry lookup errors',
      result.lookupErrors.map((e) => `${e.target}: ${e.message}`),
    ),
  ];
  return `${lines.join('\n')}\n`;
}

function reviewColumn(title: string, empty: string, helpers: readonly ClassifiedHelper[]): Record<string, unknown> {
  if (helpers.length === 0) {
    return { type: 'markdown', title, content: empty };
  }
  return {
    type: 'entities',
    title: `${title} (${helpers.length})`,
    entities: helpers.map((c) => ({ entity: c.helper.entityId, name: c.helper.friendlyName })),
  };
}

/** Two-column grid card for reviewing candidates on a dashboard. */
export function renderReviewCards(result: AnalysisResult): string {
  const card = {
    type: 'grid',
    columns: 2,
    square: false,
    cards: [
      reviewColumn('Truly orphaned helpers', 'No truly orphaned helpers.', ofClass(result, 'truly_orphaned')),
      reviewColumn('Dashboard-only helpers', 'No dashboard-only helpers.', ofClass(result, 'dashboard_only')),
    ],
  };
  return stringifyYaml(card, { lineWidth: 0 });
}

/**
 * Pure: the same result always renders to the same artifacts, in a fixed order.
 */
export function generateReports(result: AnalysisResult): ReportArtifact[] {
  const orphans = ofClass(result, 'truly_orphaned');
  return [
    { name: REPORT_FILES.analysis, content: `${JSON.stringify(result, null, 2)}\n` },
    { name: REPORT_FILES.summary, content: renderSummary(result) },
    {
      name: REPORT_FILES.trulyOrphaned,
      content: renderOrphanList('Truly orphaned helpers: referenced nowhere', result.timestamp, orphans),
    },
    {
      name: REPORT_FILES.orphaned,
      content: renderOrphanList(
        'Orphaned helpers: unreferenced, or referenced only by dashboards',
        result.timestamp,
        [...orphans, ...ofClass(result, 'dashboard_only')],
      ),
    },
    { name: REPORT_FILES.reviewCards, content: renderReviewCards(result) },
  ];
}
