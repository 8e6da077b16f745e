// packages/core/src/utils/index.ts -- barrel re-export

export { generateRunId } from './id.js';
export {
  ConfigError,
  DatabaseError,
  TimeoutError,
  HostApiError,
  LoadError,
  RegistryLookupError,
  ClassificationInvariantViolation,
  ValidationError,
  errorMessage,
} from './errors.js';
export { withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
export { withTimeout } from './timeout.js';
export { AsyncSemaphore, mapWithConcurrency } from './semaphore.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { sleep } from './retry.js';
