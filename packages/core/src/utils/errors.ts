// packages/core/src/utils/errors.ts

import type { LoadPhase, ValidationReason } from '../types/index.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class DatabaseError extends Error {
  constructor(
    message: string,
    public readonly operation?: string,
  ) {
    super(message);
    this.name = 'DatabaseError';
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/** Non-2xx response or transport failure talking to the host API. */
export class HostApiError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'HostApiError';
  }

  get isTimeout(): boolean {
    return this.message.includes('timeout') || this.message.includes('ETIMEDOUT');
  }

  get isServerError(): boolean {
    return this.statusCode !== undefined && this.statusCode >= 500;
  }

  get isAuthError(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/** Recoverable, per-file: unreadable or malformed configuration/dashboard file. */
export class LoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly phase: LoadPhase,
  ) {
    super(message);
    this.name = 'LoadError';
  }
}

/** Recoverable, per-entity or per-domain registry failure. */
export class RegistryLookupError extends Error {
  constructor(
    message: string,
    public readonly target: string,
  ) {
    super(message);
    this.name = 'RegistryLookupError';
  }
}

/** Fatal: an entity ended with zero or several classifications. */
export class ClassificationInvariantViolation extends Error {
  constructor(
    message: string,
    public readonly entityId: string,
  ) {
    super(message);
    this.name = 'ClassificationInvariantViolation';
  }
}

/** User-facing, deletion gate only: an orphan-list line that cannot be deleted. */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly entityId: string,
    public readonly reason: ValidationReason,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
