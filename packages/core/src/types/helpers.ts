// packages/core/src/types/helpers.ts — Helper entity types

/** Recognized helper types. Platform-based types share an entity domain such as `sensor`. */
export type HelperDomain =
  | 'input_boolean'
  | 'input_text'
  | 'input_number'
  | 'input_select'
  | 'input_datetime'
  | 'input_button'
  | 'counter'
  | 'timer'
  | 'schedule'
  | 'template_sensor'
  | 'template_binary_sensor'
  | 'template_entity'
  | 'utility_meter'
  | 'statistics'
  | 'derivative'
  | 'integral'
  | 'threshold'
  | 'trend'
  | 'history_stats'
  | 'generic_thermostat'
  | 'generic_hygrostat'
  | 'manual_alarm_control_panel'
  | 'min_max'
  | 'group'
  | 'switch_as_x'
  | 'times_of_the_day'
  | 'mold_indicator';

/** How a helper of this type is removed once confirmed orphaned */
export type RemovalStrategy = 'service' | 'manual';

export interface HelperDescriptor {
  /** Entity domains entities of this type live in */
  entityDomains: string[];
  /** Registry platform identifying platform-based helpers; null for dedicated domains */
  platform: string | null;
  /** Lifecycle owned by static configuration rather than the helper registry */
  templateType: boolean;
  removal: RemovalStrategy;
}

/** Raw row read from the live registry / state store. */
export interface EntitySnapshot {
  entityId: string;
  state: string | null;
  attributes: Record<string, unknown>;
  /** Integration platform from the entity registry, when known */
  platform: string | null;
}

export interface HelperEntity {
  entityId: string;
  domain: HelperDomain;
  entityDomain: string;
  objectId: string;
  friendlyName: string;
  currentState: string | null;
  attributes: Record<string, unknown>;
  platform: string | null;
}
