// @helpersweep/core - Helper dependency analysis engine
// Corpus loading, reference scanning, entity discovery, classification,
// reports, the deletion gate and run persistence.

export const VERSION = '0.1.0';

// Type definitions
export type {
  // Config
  HostConfig,
  ScanConfig,
  DashboardConfig,
  NamingConfig,
  DiscoveryConfig,
  ConfidenceConfig,
  AdvancedConfig,
  ProjectConfig,
  // Helpers
  HelperDomain,
  RemovalStrategy,
  HelperDescriptor,
  EntitySnapshot,
  HelperEntity,
  // Analysis
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
  // Deletion
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
} from './types/index.js';

// Utilities
export {
  generateRunId,
  ConfigError,
  DatabaseError,
  TimeoutError,
  HostApiError,
  LoadError,
  RegistryLookupError,
  ClassificationInvariantViolation,
  ValidationError,
  errorMessage,
  withRetry,
  withTimeout,
  AsyncSemaphore,
  mapWithConcurrency,
  createLogger,
  sleep,
} from './utils/index.js';
export type { RetryOptions, Logger, LogLevel } from './utils/index.js';
export {
  STRUCTURAL_CONFIDENCE,
  TEMPLATE_CONFIDENCE,
  DASHBOARD_CONFIDENCE,
  NAMING_CONFIDENCE,
  EXCERPT_MAX_CHARS,
  FILE_READ_TIMEOUT_MS,
  REGISTRY_TIMEOUT_MS,
  HOST_RETRY_ATTEMPTS,
  HOST_RETRY_BACKOFF_MS,
  SUMMARY_LIST_LIMIT,
  MAX_OPEN_FILES,
  MAX_REGISTRY_LOOKUPS,
} from './utils/constants.js';

// Configuration
export {
  DEFAULT_CONFIG,
  DEFAULT_STOP_TOKENS,
  projectConfigSchema,
  validateConfig,
  loadConfig,
  writeConfig,
  deepMerge,
  CONFIG_FILENAME,
  STATE_DIRNAME,
  createIgnoreFilter,
  createPathMatcher,
  BUILTIN_IGNORES,
  IGNORE_FILENAME,
} from './config/index.js';
export type { ProjectConfigInput, ConfigOverrides } from './config/index.js';

// Corpus
export { loadCorpus, readTextFile, readJsonFile, readOptionalJsonFile } from './corpus/index.js';
export type { CorpusFile, CorpusFileKind, CorpusOptions, CorpusLoadResult } from './corpus/index.js';

// Scanners
export {
  BUILTIN_ENTITY_DOMAINS,
  createScanContext,
  isValidEntityId,
  splitEntityId,
  findEntityIdTokens,
  ENTITY_ACCESSORS,
  extractTemplateReferences,
  scanTemplateText,
  hasTemplateMarkers,
  walkTree,
  scanTree,
  TaggedScalar,
  parseYamlDocument,
  scanStructuralTree,
  loadDashboardStore,
  scanDashboardTree,
  collectNamingSubjects,
  tokenizeName,
  inferNamingReferences,
  loadConfigEntries,
  parseConfigEntries,
  scanConfigEntries,
  scanHelperAttributes,
} from './scanners/index.js';
export type {
  ScanContext,
  EntityIdMatch,
  TemplateMatch,
  DashboardFile,
  NamingSubject,
  ConfigEntry,
} from './scanners/index.js';

// Discovery
export {
  HELPER_DOMAINS,
  HELPER_DESCRIPTORS,
  getHelperDescriptor,
  isTemplateType,
  isHelperDomain,
  entityDomainsFor,
  HostApiClient,
  SnapshotRegistrySource,
  loadEntityRegistry,
  identifyHelper,
  looksLikeTemplateHelper,
  discoverHelpers,
} from './discovery/index.js';
export type {
  RegistryDataSource,
  HelperMutator,
  HostApiClientOptions,
  EntityRegistryResult,
  IdentifyOptions,
  DiscoveryOptions,
  DiscoveryResult,
} from './discovery/index.js';

// Engine
export {
  buildReferenceIndex,
  classifyHelper,
  classifyAll,
  summarizeCounts,
  runAnalysis,
  analysisResultSchema,
  parseAnalysisResult,
  parseOrphanList,
  evaluateDeletionGate,
  resolveLiveHelpers,
  MANUAL_REMOVAL_MESSAGE,
} from './engine/index.js';
export type { AnalysisOptions, DeletionGateInput, LiveLookupResult } from './engine/index.js';

// Deletion
export { runDeletion, toDeletionRecord } from './deletion/index.js';
export type { DeletionOptions } from './deletion/index.js';

// Reports
export {
  generateReports,
  renderSummary,
  renderReviewCards,
  formatOrphanLine,
  REPORT_FILES,
  renderDeletionReport,
  deletionArtifacts,
  DirectorySink,
  writeArtifacts,
} from './report/index.js';
export type { ReportArtifact, ReportSink } from './report/index.js';

// Memory / Database
export { openDatabase, runMigrations, getSchemaVersion, AnalysisStore, DeletionStore } from './memory/index.js';
export type { AnalysisRunSummary, StoredAnalysis, StoredDeletion, StoredDeletionStatus } from './memory/index.js';
