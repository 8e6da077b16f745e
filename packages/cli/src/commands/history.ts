// packages/cli/src/commands/history.ts — Saved analysis runs

import { AnalysisStore, type AnalysisRunSummary } from '@helpersweep/core';
import { renderHistory } from '../render.js';
import { withDatabase } from '../utils.js';

export async function historyCommand(options: { limit: number; json?: boolean; cwd?: string }): Promise<AnalysisRunSummary[]> {
  const runs = await withDatabase(options.cwd ?? process.cwd(), (db) => new AnalysisStore(db).list(options.limit));
  if (options.json) {
    console.log(JSON.stringify(runs, null, 2));
  } else {
    renderHistory(runs);
  }
  return runs;
}
