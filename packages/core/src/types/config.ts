// packages/core/src/types/config.ts

import type { LogLevel } from '../utils/logger.js';
import type { HelperDomain } from './helpers.js';

export interface HostConfig {
  /** Base URL of the host's REST API, e.g. http://homeassistant.local:8123 */
  url: string;
  /** Environment variable holding the long-lived access token */
  tokenEnv: string;
  timeoutMs: number;
  retryAttempts: number;
}

export interface ScanConfig {
  yamlExtensions: string[];
  templateExtensions: string[];
  /** Extra entity domains accepted for bare and quoted tokens */
  extraDomains: string[];
  readTimeoutMs: number;
  excerptLength: number;
  skipGitignore: boolean;
}

export interface DashboardConfig {
  storageDir: string;
  /** File names inside storageDir, `*` wildcard allowed */
  storagePatterns: string[];
  /** gitignore-style patterns selecting YAML-mode dashboards */
  yamlPaths: string[];
  configEntriesFile: string;
}

export interface NamingConfig {
  enabled: boolean;
  minTokenLength: number;
  minSharedTokens: number;
  separators: string;
  stopTokens: string[];
}

export interface DiscoveryConfig {
  domains: HelperDomain[];
  inferTemplateFromAttributes: boolean;
  timeoutMs: number;
  entityRegistryFile: string;
}

export interface ConfidenceConfig {
  structural: number;
  template: number;
  dashboard: number;
  naming: number;
}

export interface AdvancedConfig {
  logLevel: LogLevel;
}

export interface ProjectConfig {
  configVersion?: number;
  configRoot: string;
  reportDir: string;
  host: HostConfig;
  scan: ScanConfig;
  dashboards: DashboardConfig;
  naming: NamingConfig;
  discovery: DiscoveryConfig;
  confidence: ConfidenceConfig;
  advanced: AdvancedConfig;
}
