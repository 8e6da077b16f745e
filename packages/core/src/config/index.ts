// packages/core/src/config/index.ts -- barrel re-export

export { DEFAULT_CONFIG, DEFAULT_STOP_TOKENS } from './defaults.js';
export { projectConfigSchema, validateConfig } from './schema.js';
export type { ProjectConfigInput } from './schema.js';
export { loadConfig, writeConfig, deepMerge, CONFIG_FILENAME, STATE_DIRNAME } from './loader.js';
export type { ConfigOverrides } from './loader.js';
export {
  createIgnoreFilter,
  createPathMatcher,
  BUILTIN_IGNORES,
  IGNORE_FILENAME,
} from './ignore.js';
