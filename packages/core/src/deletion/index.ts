// packages/core/src/deletion/index.ts -- barrel re-export

export { runDeletion, toDeletionRecord } from './executor.js';
export type { DeletionOptions } from './executor.js';
