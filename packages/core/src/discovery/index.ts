// packages/core/src/discovery/index.ts -- barrel re-export

export {
  HELPER_DOMAINS,
  HELPER_DESCRIPTORS,
  HELPER_PLATFORMS,
  getHelperDescriptor,
  isTemplateType,
  isHelperDomain,
  entityDomainsFor,
} from './domains.js';
export { toEntitySnapshot, snapshotsInDomain } from './data-source.js';
export type { RegistryDataSource, HelperMutator } from './data-source.js';
export { HostApiClient } from './host-client.js';
export type { HostApiClientOptions } from './host-client.js';
export { SnapshotRegistrySource } from './snapshot-source.js';
export { loadEntityRegistry } from './entity-registry.js';
export type { EntityRegistryResult } from './entity-registry.js';
export { identifyHelper, looksLikeTemplateHelper } from './identify.js';
export type { IdentifyOptions } from './identify.js';
export { discoverHelpers } from './discovery.js';
export type { DiscoveryOptions, DiscoveryResult } from './discovery.js';
