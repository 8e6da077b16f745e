// packages/core/src/scanners/index.ts -- barrel re-export

export {
  BUILTIN_ENTITY_DOMAINS,
  createScanContext,
  isValidEntityId,
  splitEntityId,
  findEntityIdTokens,
  excerptAround,
  formatExcerpt,
} from './entity-id.js';
export type { ScanContext, EntityIdMatch } from './entity-id.js';
export {
  ENTITY_ACCESSORS,
  extractTemplateReferences,
  scanTemplateText,
  hasTemplateMarkers,
} from './template.js';
export type { TemplateMatch, TemplateScanOptions } from './template.js';
export { walkTree, scanTree, TaggedScalar } from './tree.js';
export type { KeyPath, TreeVisitor, TreeScanKinds } from './tree.js';
export { parseYamlDocument, scanStructuralTree, HOST_YAML_TAGS } from './structural.js';
export { loadDashboardStore, scanDashboardTree } from './dashboard.js';
export type { DashboardFile, DashboardStoreOptions } from './dashboard.js';
export { collectNamingSubjects, tokenizeName, inferNamingReferences } from './naming.js';
export type { NamingSubject, NamingSubjectKind } from './naming.js';
export { loadConfigEntries, parseConfigEntries, scanConfigEntries } from './config-entries.js';
export type { ConfigEntry, ConfigEntriesLoad } from './config-entries.js';
export { scanHelperAttributes } from './attributes.js';
