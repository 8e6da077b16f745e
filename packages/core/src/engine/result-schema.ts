// packages/core/src/engine/result-schema.ts — Validation of stored analysis results

import { z } from 'zod';
import { HELPER_DOMAINS } from '../discovery/domains.js';
import type { AnalysisResult } from '../types/analysis.js';
import { LoadError } from '../utils/errors.js';

const sourceKindSchema = z.enum(['yaml_structural', 'template', 'dashboard', 'naming_pattern']);
const classificationSchema = z.enum(['actively_used', 'dashboard_only', 'truly_orphaned']);

const helperEntitySchema = z.object({
  entityId: z.string(),
  domain: z.enum(HELPER_DOMAINS),
  entityDomain: z.string(),
  objectId: z.string(),
  friendlyName: z.string(),
  currentState: z.string().nullable(),
  attributes: z.record(z.string(), z.unknown()),
  platform: z.string().nullable(),
});

const referenceHitSchema = z.object({
  entityId: z.string(),
  sourceKind: sourceKindSchema,
  sourcePath: z.string(),
  excerpt: z.string(),
  confidence: z.number().min(0).max(1),
});

export const analysisResultSchema = z.object({
  timestamp: z.string().datetime(),
  helpers: z.array(
    z.object({
      helper: helperEntitySchema,
      classification: classificationSchema,
      requiresManualRemoval: z.boolean(),
      sourceKinds: z.array(sourceKindSchema),
      hits: z.array(referenceHitSchema),
    }),
  ),
  counts: z.object({
    total: z.number().int().nonnegative(),
    byDomain: z.record(z.enum(HELPER_DOMAINS), z.number().int().nonnegative()),
    byClassification: z.object({
      actively_used: z.number().int().nonnegative(),
      dashboard_only: z.number().int().nonnegative(),
      truly_orphaned: z.number().int().nonnegative(),
    }),
  }),
  loadErrors: z.array(
    z.object({
      path: z.string(),
      phase: z.enum(['read', 'parse', 'timeout']),
      message: z.string(),
    }),
  ),
  lookupErrors: z.array(z.object({ target: z.string(), message: z.string() })),
  sources: z.object({
    configFiles: z.array(z.string()),
    dashboardFiles: z.array(z.string()),
  }),
});

/** Validate a serialized AnalysisResult. Throws LoadError (phase `parse`). */
export function parseAnalysisResult(raw: unknown, path: string): AnalysisResult {
  const result = analysisResultSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .slice(0, 3)
      .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
      .join('; ');
    throw new LoadError(`Not a valid analysis result: ${issues}`, path, 'parse');
  }
  return result.data;
}
