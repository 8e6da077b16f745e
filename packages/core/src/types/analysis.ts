// packages/core/src/types/analysis.ts — Reference, classification and result types

import type { HelperDomain, HelperEntity } from './helpers.js';

export type SourceKind = 'yaml_structural' | 'template' | 'dashboard' | 'naming_pattern';

export type Classification = 'actively_used' | 'dashboard_only' | 'truly_orphaned';

/** One piece of evidence that an entity is used somewhere. */
export interface ReferenceHit {
  entityId: string;
  sourceKind: SourceKind;
  /** Config-root relative path, or a pseudo path such as `entity:<id>` */
  sourcePath: string;
  excerpt: string;
  confidence: number;
}

/** entity_id -> hits in discovery order. Read-only once built. */
export type ReferenceIndex = ReadonlyMap<string, readonly ReferenceHit[]>;

export interface ClassifiedHelper {
  helper: HelperEntity;
  classification: Classification;
  requiresManualRemoval: boolean;
  /** Distinct source kinds, in first-seen order */
  sourceKinds: SourceKind[];
  hits: ReferenceHit[];
}

export type LoadPhase = 'read' | 'parse' | 'timeout';

/** A configuration or dashboard file that could not be used. */
export interface LoadIssue {
  path: string;
  phase: LoadPhase;
  message: string;
}

/** A registry query that failed for one domain or entity. */
export interface LookupIssue {
  /** Entity domain or entity id the lookup was for */
  target: string;
  message: string;
}

export interface AnalysisCounts {
  total: number;
  byDomain: Partial<Record<HelperDomain, number>>;
  byClassification: Record<Classification, number>;
}

export interface AnalysisResult {
  timestamp: string;
  helpers: ClassifiedHelper[];
  counts: AnalysisCounts;
  loadErrors: LoadIssue[];
  lookupErrors: LookupIssue[];
  sources: {
    configFiles: string[];
    dashboardFiles: string[];
  };
}
