// packages/core/src/types/index.ts -- barrel re-export

export type {
  HostConfig,
  ScanConfig,
  DashboardConfig,
  NamingConfig,
  DiscoveryConfig,
  ConfidenceConfig,
  AdvancedConfig,
  ProjectConfig,
} from './config.js';

export type {
  HelperDomain,
  RemovalStrategy,
  HelperDescriptor,
  EntitySnapshot,
  HelperEntity,
} from './helpers.js';

export type {
  SourceKind,
  Classification,
  ReferenceHit,
  ReferenceIndex,
  ClassifiedHelper,
  LoadPhase,
  LoadIssue,
  LookupIssue,
  AnalysisCounts,
  AnalysisResult,
} from './analysis.js';

export type {
  OrphanListEntry,
  ValidationReason,
  ValidationIssue,
  ParsedOrphanList,
  DeletionGateResult,
  StateSnapshot,
  DeletionRecord,
  DeletionStatus,
  DeletionOutcome,
  DeletionReport,
} from './deletion.js';
