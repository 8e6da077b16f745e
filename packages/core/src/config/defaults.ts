// packages/core/src/config/defaults.ts

import type { ProjectConfig } from '../types/config.js';
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

/** Tokens too generic to link a script or automation name to a helper */
export const DEFAULT_STOP_TOKENS = [
  'input',
  'boolean',
  'number',
  'text',
  'select',
  'datetime',
  'button',
  'counter',
  'timer',
  'sensor',
  'binary',
  'helper',
  'automation',
  'script',
  'scene',
  'state',
  'mode',
  'status',
  'toggle',
  'enabled',
  'switch',
  'light',
  'lights',
];

export const DEFAULT_CONFIG: ProjectConfig = {
  configRoot: '/config',
  reportDir: 'helper_analysis',
  host: {
    url: 'http://homeassistant.local:8123',
    tokenEnv: 'HASS_TOKEN',
    timeoutMs: REGISTRY_TIMEOUT_MS,
    retryAttempts: HOST_RETRY_ATTEMPTS,
  },
  scan: {
    yamlExtensions: ['.yaml', '.yml'],
    templateExtensions: ['.jinja', '.jinja2', '.j2'],
    extraDomains: [],
    readTimeoutMs: FILE_READ_TIMEOUT_MS,
    excerptLength: EXCERPT_MAX_CHARS,
    skipGitignore: false,
  },
  dashboards: {
    storageDir: '.storage',
    storagePatterns: ['lovelace', 'lovelace.*', 'lovelace_dashboards'],
    yamlPaths: ['/ui-lovelace.yaml', '/lovelace.yaml', '/dashboards/', '/lovelace/'],
    configEntriesFile: 'core.config_entries',
  },
  naming: {
    enabled: true,
    minTokenLength: 4,
    minSharedTokens: 1,
    separators: '_-. ',
    stopTokens: DEFAULT_STOP_TOKENS,
  },
  discovery: {
    domains: [...HELPER_DOMAINS],
    inferTemplateFromAttributes: true,
    timeoutMs: REGISTRY_TIMEOUT_MS,
    entityRegistryFile: 'core.entity_registry',
  },
  confidence: {
    structural: STRUCTURAL_CONFIDENCE,
    template: TEMPLATE_CONFIDENCE,
    dashboard: DASHBOARD_CONFIDENCE,
    naming: NAMING_CONFIDENCE,
  },
  advanced: {
    logLevel: 'info',
  },
};
