// packages/core/src/utils/constants.ts — Shared magic number constants

/** Confidence of a literal entity id found in a parsed YAML/JSON tree */
export const STRUCTURAL_CONFIDENCE = 1.0;

/** Confidence of a lexical match inside template source */
export const TEMPLATE_CONFIDENCE = 0.6;

/** Confidence of a literal entity id in a dashboard definition */
export const DASHBOARD_CONFIDENCE = 1.0;

/** Confidence of a naming-pattern inference */
export const NAMING_CONFIDENCE = 0.3;

/** Max excerpt length kept per reference hit */
export const EXCERPT_MAX_CHARS = 120;

/** Per-file read timeout in milliseconds */
export const FILE_READ_TIMEOUT_MS = 5000;

/** Per-request registry timeout in milliseconds */
export const REGISTRY_TIMEOUT_MS = 10000;

/** Retry attempts for host API calls */
export const HOST_RETRY_ATTEMPTS = 2;

/** Backoff base for host API retries in milliseconds */
export const HOST_RETRY_BACKOFF_MS = 500;

/** SQLite busy timeout in milliseconds */
export const DB_BUSY_TIMEOUT_MS = 5000;

/** Helpers listed per category in the summary before truncating */
export const SUMMARY_LIST_LIMIT = 50;

/** Files read at once by the corpus and dashboard loaders */
export const MAX_OPEN_FILES = 32;

/** Registry lookups in flight at once */
export const MAX_REGISTRY_LOOKUPS = 8;
