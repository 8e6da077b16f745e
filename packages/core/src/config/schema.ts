// packages/core/src/config/schema.ts

import { z } from 'zod';
import { HELPER_DOMAINS } from '../discovery/domains.js';
import {
  DASHBOARD_CONFIDENCE,
  EXCERPT_MAX_CHARS,
  FILE_READ_TIMEOUT_MS,
  HOST_RETRY_ATTEMPTS,
  NAMING_CONFIDENCE,
  REGISTRY_TIMEOUT_MS,
  STRUCTURAL_CONFIDENCE,
  TEMPLATE_CONFIDENCE,
} from '../utils/constants.js';
import { ConfigError } from '../utils/errors.js';
import type { ProjectConfig } from '../types/config.js';

const extensionSchema = z.string().regex(/^\.[a-z0-9]+$/i, 'Extension must look like ".yaml"');
const confidenceSchema = z.number().min(0).max(1);

const hostConfigSchema = z.object({
  url: z.string().url().default('http://homeassistant.local:8123'),
  tokenEnv: z.string().min(1).default('HASS_TOKEN'),
  timeoutMs: z.number().int().positive().default(REGISTRY_TIMEOUT_MS),
  retryAttempts: z.number().int().nonnegative().max(10).default(HOST_RETRY_ATTEMPTS),
});

const scanConfigSchema = z.object({
  yamlExtensions: z.array(extensionSchema).min(1).default(['.yaml', '.yml']),
  templateExtensions: z.array(extensionSchema).default(['.jinja', '.jinja2', '.j2']),
  extraDomains: z.array(z.string().regex(/^[a-z_][a-z0-9_]*$/)).default([]),
  readTimeoutMs: z.number().int().positive().default(FILE_READ_TIMEOUT_MS),
  excerptLength: z.number().int().min(20).max(1000).default(EXCERPT_MAX_CHARS),
  skipGitignore: z.boolean().default(false),
});

const dashboardConfigSchema = z.object({
  storageDir: z.string().min(1).default('.storage'),
  storagePatterns: z.array(z.string().min(1)).default(['lovelace', 'lovelace.*', 'lovelace_dashboards']),
  yamlPaths: z.array(z.string().min(1)).default(['/ui-lovelace.yaml', '/lovelace.yaml', '/dashboards/', '/lovelace/']),
  configEntriesFile: z.string().min(1).default('core.config_entries'),
});

const namingConfigSchema = z.object({
  enabled: z.boolean().default(true),
  minTokenLength: z.number().int().positive().default(4),
  minSharedTokens: z.number().int().positive().default(1),
  separators: z.string().min(1).default('_-. '),
  stopTokens: z.array(z.string()).default([]),
});

const discoveryConfigSchema = z.object({
  domains: z.array(z.enum(HELPER_DOMAINS)).min(1).default([...HELPER_DOMAINS]),
  inferTemplateFromAttributes: z.boolean().default(true),
  timeoutMs: z.number().int().positive().default(REGISTRY_TIMEOUT_MS),
  entityRegistryFile: z.string().min(1).default('core.entity_registry'),
});

const confidenceConfigSchema = z.object({
  structural: confidenceSchema.default(STRUCTURAL_CONFIDENCE),
  template: confidenceSchema.default(TEMPLATE_CONFIDENCE),
  dashboard: confidenceSchema.default(DASHBOARD_CONFIDENCE),
  naming: confidenceSchema.default(NAMING_CONFIDENCE),
});

const advancedConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export const projectConfigSchema = z.object({
  configVersion: z.number().int().positive().optional(),
  configRoot: z.string().min(1).default('/config'),
  reportDir: z.string().min(1).default('helper_analysis'),
  host: hostConfigSchema.default({}),
  scan: scanConfigSchema.default({}),
  dashboards: dashboardConfigSchema.default({}),
  naming: namingConfigSchema.default({}),
  discovery: discoveryConfigSchema.default({}),
  confidence: confidenceConfigSchema.default({}),
  advanced: advancedConfigSchema.default({}),
});

export type ProjectConfigInput = z.input<typeof projectConfigSchema>;

/**
 * Validate and parse a config object. Throws ConfigError on invalid input.
 */
export function validateConfig(config: unknown): ProjectConfig {
  const result = projectConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return result.data;
}
