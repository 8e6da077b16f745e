// packages/core/src/discovery/snapshot-source.ts — Offline registry built from a states dump

import { readJsonFile } from '../corpus/read.js';
import type { EntitySnapshot } from '../types/helpers.js';
import { RegistryLookupError } from '../utils/errors.js';
import type { RegistryDataSource } from './data-source.js';
import { snapshotsInDomain, toEntitySnapshot } from './data-source.js';

/** Serves a JSON array shaped like the `/api/states` response. */
export class SnapshotRegistrySource implements RegistryDataSource {
  constructor(private readonly rows: readonly unknown[]) {}

  static async fromFile(
    path: string,
    options: { timeoutMs: number },
  ): Promise<SnapshotRegistrySource> {
    const data = await readJsonFile(path, path, options.timeoutMs);
    if (!Array.isArray(data)) {
      throw new RegistryLookupError(`${path} must contain a JSON array of entity states`, path);
    }
    return new SnapshotRegistrySource(data);
  }

  async listByDomain(entityDomain: string): Promise<EntitySnapshot[]> {
    return snapshotsInDomain(this.rows, entityDomain);
  }

  async get(entityId: string): Promise<EntitySnapshot | null> {
    for (const row of this.rows) {
      const snapshot = toEntitySnapshot(row);
      if (snapshot?.entityId === entityId) return snapshot;
    }
    return null;
  }
}
