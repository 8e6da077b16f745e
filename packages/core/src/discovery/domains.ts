// packages/core/src/discovery/domains.ts — Helper type descriptors

import type { HelperDescriptor, HelperDomain } from '../types/helpers.js';

/** All recognized helper types, in discovery order. */
export const HELPER_DOMAINS = [
  'input_boolean',
  'input_text',
  'input_number',
  'input_select',
  'input_datetime',
  'input_button',
  'counter',
  'timer',
  'schedule',
  'template_sensor',
  'template_binary_sensor',
  'template_entity',
  'utility_meter',
  'statistics',
  'derivative',
  'integral',
  'threshold',
  'trend',
  'history_stats',
  'generic_thermostat',
  'generic_hygrostat',
  'manual_alarm_control_panel',
  'min_max',
  'group',
  'switch_as_x',
  'times_of_the_day',
  'mold_indicator',
] as const satisfies readonly HelperDomain[];

function dedicated(domain: string): HelperDescriptor {
  return { entityDomains: [domain], platform: null, templateType: false, removal: 'service' };
}

function platformBased(
  platform: string,
  entityDomains: string[],
  templateType = false,
): HelperDescriptor {
  return { entityDomains, platform, templateType, removal: 'manual' };
}

export const HELPER_DESCRIPTORS = {
  input_boolean: dedicated('input_boolean'),
  input_text: dedicated('input_text'),
  input_number: dedicated('input_number'),
  input_select: dedicated('input_select'),
  input_datetime: dedicated('input_datetime'),
  input_button: dedicated('input_button'),
  counter: dedicated('counter'),
  timer: dedicated('timer'),
  schedule: dedicated('schedule'),
  template_sensor: platformBased('template', ['sensor'], true),
  template_binary_sensor: platformBased('template', ['binary_sensor'], true),
  template_entity: platformBased(
    'template',
    ['alarm_control_panel', 'button', 'cover', 'fan', 'image', 'light', 'lock', 'number', 'select', 'switch', 'vacuum', 'weather'],
    true,
  ),
  utility_meter: platformBased('utility_meter', ['sensor', 'select']),
  statistics: platformBased('statistics', ['sensor']),
  derivative: platformBased('derivative', ['sensor']),
  integral: platformBased('integration', ['sensor']),
  threshold: platformBased('threshold', ['binary_sensor']),
  trend: platformBased('trend', ['binary_sensor']),
  history_stats: platformBased('history_stats', ['sensor']),
  generic_thermostat: platformBased('generic_thermostat', ['climate']),
  generic_hygrostat: platformBased('generic_hygrostat', ['humidifier']),
  manual_alarm_control_panel: platformBased('manual', ['alarm_control_panel']),
  min_max: platformBased('min_max', ['sensor']),
  // Old-style groups live in `group`; UI group helpers in the member domain
  group: {
    entityDomains: ['group', 'binary_sensor', 'cover', 'event', 'fan', 'light', 'lock', 'media_player', 'notify', 'sensor', 'switch'],
    platform: 'group',
    templateType: false,
    removal: 'manual',
  },
  switch_as_x: platformBased('switch_as_x', ['cover', 'fan', 'light', 'lock', 'siren', 'valve']),
  times_of_the_day: platformBased('tod', ['binary_sensor']),
  mold_indicator: platformBased('mold_indicator', ['sensor']),
} satisfies Record<HelperDomain, HelperDescriptor>;

export function getHelperDescriptor(domain: HelperDomain): HelperDescriptor {
  return HELPER_DESCRIPTORS[domain];
}

export function isTemplateType(domain: HelperDomain): boolean {
  return HELPER_DESCRIPTORS[domain].templateType;
}

export function isHelperDomain(value: string): value is HelperDomain {
  return HELPER_DOMAINS.some((d) => d === value);
}

/** Distinct entity domains to query for the given helper types, sorted. */
export function entityDomainsFor(domains: readonly HelperDomain[]): string[] {
  const set = new Set<string>();
  for (const domain of domains) {
    for (const entityDomain of HELPER_DESCRIPTORS[domain].entityDomains) set.add(entityDomain);
  }
  return [...set].sort();
}

/** Registry platforms that belong to helper integrations */
export const HELPER_PLATFORMS: ReadonlySet<string> = new Set(
  HELPER_DOMAINS.flatMap((d) => {
    const platform = HELPER_DESCRIPTORS[d].platform;
    return platform ? [platform] : [];
  }),
);
