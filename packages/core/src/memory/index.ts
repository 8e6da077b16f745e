// packages/core/src/memory/index.ts -- barrel re-export

export { openDatabase, runMigrations, getSchemaVersion } from './database.js';
export { AnalysisStore } from './analysis-store.js';
export type { AnalysisRunSummary, StoredAnalysis } from './analysis-store.js';
export { DeletionStore } from './deletion-store.js';
export type { StoredDeletion, StoredDeletionStatus } from './deletion-store.js';
