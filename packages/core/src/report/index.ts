// packages/core/src/report/index.ts -- barrel re-export

export {
  generateReports,
  renderSummary,
  renderReviewCards,
  formatOrphanLine,
  REPORT_FILES,
} from './generator.js';
export type { ReportArtifact } from './generator.js';
export { renderDeletionReport, deletionArtifacts } from './deletion-report.js';
export { DirectorySink, writeArtifacts } from './sink.js';
export type { ReportSink } from './sink.js';
