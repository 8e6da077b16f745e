// packages/core/src/engine/analyzer.ts — One analysis run, loads through classification

import { isAbsolute, relative, sep } from 'node:path';
import { createPathMatcher } from '../config/ignore.js';
import { loadCorpus } from '../corpus/loader.js';
import { toLoadIssue } from '../corpus/read.js';
import type { RegistryDataSource } from '../discovery/data-source.js';
import { discoverHelpers } from '../discovery/discovery.js';
import { loadEntityRegistry } from '../discovery/entity-registry.js';
import { scanHelperAttributes } from '../scanners/attributes.js';
import { loadConfigEntries, scanConfigEntries } from '../scanners/config-entries.js';
import { loadDashboardStore, scanDashboardTree } from '../scanners/dashboard.js';
import { createScanContext } from '../scanners/entity-id.js';
import { type NamingSubject, collectNamingSubjects, inferNamingReferences } from '../scanners/naming.js';
import { parseYamlDocument, scanStructuralTree } from '../scanners/structural.js';
import { scanTemplateText } from '../scanners/template.js';
import type { AnalysisResult, LoadIssue, ReferenceHit } from '../types/analysis.js';
import type { ProjectConfig } from '../types/config.js';
import type { Logger } from '../utils/logger.js';
import { classifyAll, summarizeCounts } from './classifier.js';
import { buildReferenceIndex } from './reference-index.js';

export interface AnalysisOptions {
  /** Absolute path of the configuration root */
  configRoot: string;
  config: ProjectConfig;
  source: RegistryDataSource;
  logger?: Logger;
  /** Clock for the result timestamp */
  now?: () => Date;
}

/** The report directory, as an ignore pattern, when it lives inside the root. */
function reportDirPattern(configRoot: string, reportDir: string): string[] {
  const rel = isAbsolute(reportDir) ? relative(configRoot, reportDir) : reportDir;
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) return [];
  return [`${rel.split(sep).join('/').replace(/\/+$/, '')}/`];
}

function byPath(a: LoadIssue, b: LoadIssue): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Run every loader concurrently, scan everything, then classify. No helper is
 * classified before the last scanner has finished.
 */
export async function runAnalysis(options: AnalysisOptions): Promise<AnalysisResult> {
  const { configRoot, config, source, logger } = options;
  const now = options.now ?? (() => new Date());
  const ctx = createScanContext({
    extraDomains: config.scan.extraDomains,
    excerptLength: config.scan.excerptLength,
    confidence: config.confidence,
  });
  const timeoutMs = config.scan.readTimeoutMs;
  const storage = { storageDir: config.dashboards.storageDir, timeoutMs };

  logger?.debug(`Analyzing ${configRoot}`);

  const [corpus, store, configEntries, registry] = await Promise.all([
    loadCorpus(configRoot, {
      yamlExtensions: config.scan.yamlExtensions,
      templateExtensions: config.scan.templateExtensions,
      readTimeoutMs: timeoutMs,
      skipGitignore: config.scan.skipGitignore,
      extraIgnores: reportDirPattern(configRoot, config.reportDir),
    }),
    loadDashboardStore(configRoot, {
      storageDir: config.dashboards.storageDir,
      storagePatterns: config.dashboards.storagePatterns,
      readTimeoutMs: timeoutMs,
    }),
    loadConfigEntries(configRoot, { ...storage, file: config.dashboards.configEntriesFile }),
    loadEntityRegistry(configRoot, { ...storage, file: config.discovery.entityRegistryFile }).then(
      async (reg) => ({
        reg,
        discovery: await discoverHelpers(source, {
          domains: config.discovery.domains,
          inferTemplateFromAttributes: config.discovery.inferTemplateFromAttributes,
          timeoutMs: config.discovery.timeoutMs,
          platforms: reg.platforms,
          logger,
        }),
      }),
    ),
  ]);
  const { helpers, lookupErrors } = registry.discovery;

  const loadErrors: LoadIssue[] = [...corpus.errors, ...store.errors];
  if (configEntries.issue) loadErrors.push(configEntries.issue);
  if (registry.reg.issue) loadErrors.push(registry.reg.issue);

  const isYamlDashboard = createPathMatcher(config.dashboards.yamlPaths);
  const configFiles: string[] = [];
  const dashboardFiles: string[] = [];
  const subjects: NamingSubject[] = [];
  const hits: ReferenceHit[] = [];

  for (const file of corpus.files) {
    if (file.kind === 'template') {
      hits.push(...scanTemplateText(file.text, file.path, ctx));
      configFiles.push(file.path);
      continue;
    }

    let documents: unknown[];
    try {
      documents = parseYamlDocument(file.path, file.text);
    } catch (err) {
      loadErrors.push(toLoadIssue(err, file.path));
      logger?.warn(`Skipping ${file.path}: ${loadErrors[loadErrors.length - 1].message}`);
      continue;
    }

    if (isYamlDashboard(file.path)) {
      for (const doc of documents) hits.push(...scanDashboardTree(doc, file.path, ctx));
      dashboardFiles.push(file.path);
    } else {
      for (const doc of documents) hits.push(...scanStructuralTree(doc, file.path, ctx));
      subjects.push(...collectNamingSubjects({ path: file.path, documents }));
      configFiles.push(file.path);
    }
  }

  for (const file of store.files) {
    hits.push(...scanDashboardTree(file.tree, file.path, ctx));
    dashboardFiles.push(file.path);
  }

  if (configEntries.found && !configEntries.issue) {
    hits.push(...scanConfigEntries(configEntries.entries, configEntries.path, ctx));
    configFiles.push(configEntries.path);
  }

  hits.push(...scanHelperAttributes(helpers, ctx));
  hits.push(...inferNamingReferences(subjects, helpers, config.naming, ctx));

  // Barrier passed: every scanner has contributed.
  const index = buildReferenceIndex(hits);
  const classified = classifyAll(helpers, index);

  const result: AnalysisResult = {
    timestamp: now().toISOString(),
    helpers: classified,
    counts: summarizeCounts(classified),
    loadErrors: loadErrors.sort(byPath),
    lookupErrors,
    sources: { configFiles, dashboardFiles },
  };

  logger?.info(
    `Analyzed ${result.counts.total} helpers from ${configFiles.length} config and ${dashboardFiles.length} dashboard files`,
  );
  if (loadErrors.length > 0) logger?.warn(`${loadErrors.length} files could not be used`);
  if (lookupErrors.length > 0) logger?.warn(`${lookupErrors.length} registry lookups failed`);
  return result;
}
