// packages/core/src/discovery/data-source.ts — Registry and mutation contracts

import type { EntitySnapshot, HelperEntity } from '../types/helpers.js';

/** Read-only view of the live entity registry and state store. */
export interface RegistryDataSource {
  /** Every entity currently registered in an entity domain such as `sensor` */
  listByDomain(entityDomain: string): Promise<EntitySnapshot[]>;
  /** null when the entity does not exist */
  get(entityId: string): Promise<EntitySnapshot | null>;
}

/** Removes a helper through the host's removal service. */
export interface HelperMutator {
  remove(helper: HelperEntity): Promise<void>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Convert a `/api/states` row. Rows without a string `entity_id` cannot be
 * attributed to any domain and yield null. `/api/states` carries no platform;
 * dumps that include one keep it.
 */
export function toEntitySnapshot(row: unknown): EntitySnapshot | null {
  if (!isRecord(row) || typeof row.entity_id !== 'string') return null;
  return {
    entityId: row.entity_id,
    state: typeof row.state === 'string' ? row.state : null,
    attributes: isRecord(row.attributes) ? row.attributes : {},
    platform: typeof row.platform === 'string' ? row.platform : null,
  };
}

/** Rows of `rows` in `entityDomain`, as snapshots. */
export function snapshotsInDomain(rows: readonly unknown[], entityDomain: string): EntitySnapshot[] {
  const prefix = `${entityDomain}.`;
  const snapshots: EntitySnapshot[] = [];
  for (const row of rows) {
    const snapshot = toEntitySnapshot(row);
    if (snapshot?.entityId.startsWith(prefix)) snapshots.push(snapshot);
  }
  return snapshots;
}
