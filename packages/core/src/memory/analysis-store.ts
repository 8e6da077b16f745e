// packages/core/src/memory/analysis-store.ts — Persisted analysis results

import type Database from 'better-sqlite3';
import { parseAnalysisResult } from '../engine/result-schema.js';
import type { AnalysisResult } from '../types/analysis.js';
import { DatabaseError, errorMessage } from '../utils/errors.js';
import { generateRunId } from '../utils/id.js';

interface AnalysisRunRow {
  run_id: string;
  config_root: string;
  analyzed_at: string;
  saved_at: number;
  total: number;
  actively_used: number;
  dashboard_only: number;
  truly_orphaned: number;
  result_json: string;
}

export interface AnalysisRunSummary {
  runId: string;
  configRoot: string;
  analyzedAt: string;
  savedAt: number;
  total: number;
  activelyUsed: number;
  dashboardOnly: number;
  trulyOrphaned: number;
}

export interface StoredAnalysis {
  runId: string;
  configRoot: string;
  savedAt: number;
  result: AnalysisResult;
}

export class AnalysisStore {
  constructor(private db: Database.Database) {}

  /** Store a result; returns its run id. */
  save(result: AnalysisResult, configRoot: string, runId: string = generateRunId()): string {
    const { byClassification } = result.counts;
    this.db
      .prepare(
        `INSERT INTO analysis_runs (run_id, config_root, analyzed_at, saved_at, total, actively_used, dashboard_only, truly_orphaned, result_json)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        runId,
        configRoot,
        result.timestamp,
        Date.now(),
        result.counts.total,
        byClassification.actively_used,
        byClassification.dashboard_only,
        byClassification.truly_orphaned,
        JSON.stringify(result),
      );
    return runId;
  }

  get(runId: string): StoredAnalysis | null {
    const row = this.db
      .prepare<[string], AnalysisRunRow>('SELECT * FROM analysis_runs WHERE run_id = ?')
      .get(runId);
    return row ? this.toStored(row) : null;
  }

  /** Most recently saved run, optionally for one configuration root. */
  latest(configRoot?: string): StoredAnalysis | null {
    const row = configRoot
      ? this.db
          .prepare<[string], AnalysisRunRow>(
            'SELECT * FROM analysis_runs WHERE config_root = ? ORDER BY saved_at DESC, rowid DESC LIMIT 1',
          )
          .get(configRoot)
      : this.db
          .prepare<[], AnalysisRunRow>('SELECT * FROM analysis_runs ORDER BY saved_at DESC, rowid DESC LIMIT 1')
          .get();
    return row ? this.toStored(row) : null;
  }

  list(limit = 20): AnalysisRunSummary[] {
    return this.db
      .prepare<[number], AnalysisRunRow>('SELECT * FROM analysis_runs ORDER BY saved_at DESC, rowid DESC LIMIT ?')
      .all(limit)
      .map((r) => ({
        runId: r.run_id,
        configRoot: r.config_root,
        analyzedAt: r.analyzed_at,
        savedAt: r.saved_at,
        total: r.total,
        activelyUsed: r.actively_used,
        dashboardOnly: r.dashboard_only,
        trulyOrphaned: r.truly_orphaned,
      }));
  }

  private toStored(row: AnalysisRunRow): StoredAnalysis {
    let raw: unknown;
    try {
      raw = JSON.parse(row.result_json);
    } catch (err) {
      throw new DatabaseError(`Corrupt result for run ${row.run_id}: ${errorMessage(err)}`, 'read');
    }
    return {
      runId: row.run_id,
      configRoot: row.config_root,
      savedAt: row.saved_at,
      result: parseAnalysisResult(raw, `analysis_runs/${row.run_id}`),
    };
  }
}
