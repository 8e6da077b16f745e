// packages/core/src/discovery/identify.ts — Snapshot -> HelperEntity recognition

import { splitEntityId } from '../scanners/entity-id.js';
import type { EntitySnapshot, HelperDomain, HelperEntity } from '../types/helpers.js';
import { HELPER_DESCRIPTORS, HELPER_DOMAINS, isHelperDomain } from './domains.js';

export interface IdentifyOptions {
  /** Enabled helper types */
  domains: readonly HelperDomain[];
  inferTemplateFromAttributes: boolean;
  /** entity_id -> integration platform, consulted when the snapshot has none */
  platforms?: ReadonlyMap<string, string>;
}

/** Attributes a UI template sensor may carry; anything else means an integration owns it. */
const TEMPLATE_ATTRIBUTE_SIGNATURE = new Set([
  'friendly_name',
  'device_class',
  'icon',
  'unique_id',
  'entity_category',
]);

const INFERRED_TEMPLATE_TYPES: Readonly<Record<string, HelperDomain>> = {
  sensor: 'template_sensor',
  binary_sensor: 'template_binary_sensor',
};

/**
 * Conservative signature of a template sensor whose platform is unknown:
 * a friendly name, a device class or icon, and nothing beyond the signature set.
 */
export function looksLikeTemplateHelper(attributes: Record<string, unknown>): boolean {
  const keys = Object.keys(attributes);
  if (keys.length === 0 || keys.length > TEMPLATE_ATTRIBUTE_SIGNATURE.size) return false;
  if (!keys.every((k) => TEMPLATE_ATTRIBUTE_SIGNATURE.has(k))) return false;
  return 'friendly_name' in attributes && ('device_class' in attributes || 'icon' in attributes);
}

function resolveDomain(
  entityDomain: string,
  snapshot: EntitySnapshot,
  platform: string | null,
  enabled: ReadonlySet<HelperDomain>,
  options: IdentifyOptions,
): HelperDomain | null {
  if (isHelperDomain(entityDomain) && enabled.has(entityDomain)) {
    return entityDomain;
  }

  if (platform !== null) {
    return (
      HELPER_DOMAINS.find((d) => {
        const descriptor = HELPER_DESCRIPTORS[d];
        return (
          enabled.has(d) &&
          d !== entityDomain &&
          descriptor.platform === platform &&
          descriptor.entityDomains.includes(entityDomain)
        );
      }) ?? null
    );
  }

  const inferred = INFERRED_TEMPLATE_TYPES[entityDomain];
  if (
    options.inferTemplateFromAttributes &&
    inferred !== undefined &&
    enabled.has(inferred) &&
    looksLikeTemplateHelper(snapshot.attributes)
  ) {
    return inferred;
  }
  return null;
}

/**
 * Recognize a helper. Dedicated domains map directly; platform-based helpers
 * need the registry platform, or the template attribute signature when the
 * platform is unknown. Returns null for everything else.
 */
export function identifyHelper(snapshot: EntitySnapshot, options: IdentifyOptions): HelperEntity | null {
  const { domain: entityDomain, objectId } = splitEntityId(snapshot.entityId);
  const platform = snapshot.platform ?? options.platforms?.get(snapshot.entityId) ?? null;
  const domain = resolveDomain(entityDomain, snapshot, platform, new Set(options.domains), options);
  if (domain === null) return null;

  const friendlyName = snapshot.attributes.friendly_name;
  return {
    entityId: snapshot.entityId,
    domain,
    entityDomain,
    objectId,
    friendlyName: typeof friendlyName === 'string' && friendlyName ? friendlyName : snapshot.entityId,
    currentState: snapshot.state,
    attributes: snapshot.attributes,
    platform,
  };
}
