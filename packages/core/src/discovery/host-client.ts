// packages/core/src/discovery/host-client.ts — REST client for the live host

import type { EntitySnapshot, HelperEntity } from '../types/helpers.js';
import { HOST_RETRY_BACKOFF_MS } from '../utils/constants.js';
import { HostApiError, errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import type { HelperMutator, RegistryDataSource } from './data-source.js';
import { snapshotsInDomain, toEntitySnapshot } from './data-source.js';

export interface HostApiClientOptions {
  /** Base URL, e.g. http://homeassistant.local:8123 */
  url: string;
  token: string;
  timeoutMs: number;
  retryAttempts: number;
  retryBackoffMs?: number;
  logger?: Logger;
}

function isRetryable(err: unknown): boolean {
  return err instanceof HostApiError && (err.statusCode === undefined || err.isServerError);
}

/**
 * Registry source and helper mutator over the host's REST API.
 * `/api/states` is fetched once per client and filtered per domain.
 */
export class HostApiClient implements RegistryDataSource, HelperMutator {
  private readonly baseUrl: string;
  private states: Promise<unknown[]> | null = null;

  constructor(private readonly options: HostApiClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, '');
  }

  async listByDomain(entityDomain: string): Promise<EntitySnapshot[]> {
    if (!this.states) this.states = this.fetchStates();
    try {
      return snapshotsInDomain(await this.states, entityDomain);
    } catch (err) {
      // Next domain gets a fresh attempt
      this.states = null;
      throw err;
    }
  }

  async get(entityId: string): Promise<EntitySnapshot | null> {
    const body = await this.request('GET', `/api/states/${encodeURIComponent(entityId)}`, {
      allowNotFound: true,
    });
    if (body === null) return null;
    const snapshot = toEntitySnapshot(body);
    if (!snapshot) {
      throw new HostApiError(`Unexpected state payload for ${entityId}`, `/api/states/${entityId}`);
    }
    return snapshot;
  }

  async remove(helper: HelperEntity): Promise<void> {
    await this.request('POST', `/api/services/${helper.entityDomain}/remove`, {
      body: { entity_id: helper.entityId },
    });
  }

  private async fetchStates(): Promise<unknown[]> {
    const body = await this.request('GET', '/api/states');
    if (!Array.isArray(body)) {
      throw new HostApiError('Unexpected /api/states payload: expected an array', '/api/states');
    }
    return body;
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    extra?: { body?: unknown; allowNotFound?: boolean },
  ): Promise<unknown> {
    return withRetry(
      async () => {
        let response: Response;
        try {
          response = await fetch(`${this.baseUrl}${path}`, {
            method,
            headers: {
              Authorization: `Bearer ${this.options.token}`,
              'Content-Type': 'application/json',
            },
            body: extra?.body === undefined ? undefined : JSON.stringify(extra.body),
            signal: AbortSignal.timeout(this.options.timeoutMs),
          });
        } catch (err) {
          const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError');
          throw new HostApiError(
            timedOut
              ? `${method} ${path}: request timeout after ${this.options.timeoutMs}ms`
              : `${method} ${path}: ${errorMessage(err)}`,
            path,
          );
        }

        if (response.status === 404 && extra?.allowNotFound) return null;
        if (!response.ok) {
          throw new HostApiError(`${method} ${path}: HTTP ${response.status}`, path, response.status);
        }
        const text = await response.text();
        if (!text) return null;
        try {
          const parsed: unknown = JSON.parse(text);
          return parsed;
        } catch (err) {
          throw new HostApiError(`${method} ${path}: invalid JSON (${errorMessage(err)})`, path, response.status);
        }
      },
      {
        attempts: this.options.retryAttempts + 1,
        backoff: this.options.retryBackoffMs ?? HOST_RETRY_BACKOFF_MS,
        retryOn: isRetryable,
        onRetry: (err, attempt, delayMs) =>
          this.options.logger?.warn(`${errorMessage(err)}; retry ${attempt} in ${delayMs}ms`),
      },
    );
  }
}
