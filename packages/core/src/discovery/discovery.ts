// packages/core/src/discovery/discovery.ts — Helper inventory from a registry source

import { isValidEntityId, splitEntityId } from '../scanners/entity-id.js';
import type { LookupIssue } from '../types/analysis.js';
import type { EntitySnapshot, HelperEntity } from '../types/helpers.js';
import { errorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { RegistryDataSource } from './data-source.js';
import { entityDomainsFor } from './domains.js';
import { type IdentifyOptions, identifyHelper } from './identify.js';

export interface DiscoveryOptions extends IdentifyOptions {
  /** Bound on each `listByDomain` call */
  timeoutMs: number;
  logger?: Logger;
}

export interface DiscoveryResult {
  /** Sorted by entity id, no duplicates */
  helpers: HelperEntity[];
  lookupErrors: LookupIssue[];
}

type DomainListing =
  | { entityDomain: string; rows: EntitySnapshot[] }
  | { entityDomain: string; error: string };

/**
 * Query every entity domain the enabled helper types live in, concurrently.
 * A failing domain or malformed row is recorded and discovery continues.
 */
export async function discoverHelpers(
  source: RegistryDataSource,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const entityDomains = entityDomainsFor(options.domains);
  const listings = await Promise.all(
    entityDomains.map(async (entityDomain): Promise<DomainListing> => {
      try {
        const rows = await withTimeout(
          source.listByDomain(entityDomain),
          options.timeoutMs,
          `listByDomain(${entityDomain})`,
        );
        return { entityDomain, rows };
      } catch (err) {
        return { entityDomain, error: errorMessage(err) };
      }
    }),
  );

  const byId = new Map<string, HelperEntity>();
  const lookupErrors: LookupIssue[] = [];
  for (const listing of listings) {
    if ('error' in listing) {
      options.logger?.warn(`Registry lookup failed for ${listing.entityDomain}: ${listing.error}`);
      lookupErrors.push({ target: listing.entityDomain, message: listing.error });
      continue;
    }
    for (const row of listing.rows) {
      if (!isValidEntityId(row.entityId) || splitEntityId(row.entityId).domain !== listing.entityDomain) {
        lookupErrors.push({
          target: row.entityId || listing.entityDomain,
          message: `Malformed entity row returned for domain ${listing.entityDomain}`,
        });
        continue;
      }
      if (byId.has(row.entityId)) continue;
      const helper = identifyHelper(row, options);
      if (helper) byId.set(helper.entityId, helper);
    }
  }

  const helpers = [...byId.values()].sort((a, b) => (a.entityId < b.entityId ? -1 : 1));
  options.logger?.debug(`Discovered ${helpers.length} helpers across ${entityDomains.length} entity domains`);
  return { helpers, lookupErrors };
}
