// tests/unit/discovery/identify.test.ts

import { describe, expect, it } from 'vitest';
import { HELPER_DOMAINS } from '../../../src/discovery/domains.js';
import { identifyHelper, looksLikeTemplateHelper } from '../../../src/discovery/identify.js';
import type { EntitySnapshot } from '../../../src/types/index.js';

const ALL = { domains: HELPER_DOMAINS, inferTemplateFromAttributes: true };

function snapshot(
  entityId: string,
  attributes: Record<string, unknown> = {},
  platform: string | null = null,
): EntitySnapshot {
  return { entityId, state: 'on', attributes, platform };
}

describe('looksLikeTemplateHelper', () => {
  it('matches a bare template sensor signature', () => {
    expect(looksLikeTemplateHelper({ friendly_name: 'Power', device_class: 'power' })).toBe(true);
    expect(looksLikeTemplateHelper({ friendly_name: 'Power', icon: 'mdi:flash' })).toBe(true);
  });

  it('rejects integration attributes and incomplete signatures', () => {
    expect(looksLikeTemplateHelper({})).toBe(false);
    expect(looksLikeTemplateHelper({ friendly_name: 'Power' })).toBe(false);
    expect(
      looksLikeTemplateHelper({ friendly_name: 'Power', device_class: 'power', unit_of_measurement: 'W' }),
    ).toBe(false);
  });
});

describe('identifyHelper', () => {
  it('maps dedicated helper domains directly', () => {
    expect(identifyHelper(snapshot('input_boolean.guest_mode', { friendly_name: 'Guest mode' }), ALL)).toEqual({
      entityId: 'input_boolean.guest_mode',
      domain: 'input_boolean',
      entityDomain: 'input_boolean',
      objectId: 'guest_mode',
      friendlyName: 'Guest mode',
      currentState: 'on',
      attributes: { friendly_name: 'Guest mode' },
      platform: null,
    });
  });

  it('falls back to the entity id for the friendly name', () => {
    expect(identifyHelper(snapshot('counter.cups'), ALL)?.friendlyName).toBe('counter.cups');
  });

  it('resolves platform-based helpers from the snapshot platform', () => {
    expect(identifyHelper(snapshot('sensor.energy_daily', {}, 'utility_meter'), ALL)?.domain).toBe('utility_meter');
    expect(identifyHelper(snapshot('sensor.power_x2', {}, 'template'), ALL)?.domain).toBe('template_sensor');
    expect(identifyHelper(snapshot('binary_sensor.dark', {}, 'tod'), ALL)?.domain).toBe('times_of_the_day');
    expect(identifyHelper(snapshot('light.all_lights', {}, 'group'), ALL)?.domain).toBe('group');
    expect(identifyHelper(snapshot('switch.fake', {}, 'template'), ALL)?.domain).toBe('template_entity');
  });

  it('consults the registry platform map', () => {
    const platforms = new Map([['sensor.kwh_integral', 'integration']]);
    const helper = identifyHelper(snapshot('sensor.kwh_integral'), { ...ALL, platforms });
    expect(helper?.domain).toBe('integral');
    expect(helper?.platform).toBe('integration');
  });

  it('ignores entities owned by other integrations', () => {
    expect(identifyHelper(snapshot('sensor.outdoor', {}, 'hue'), ALL)).toBeNull();
    expect(identifyHelper(snapshot('light.kitchen'), ALL)).toBeNull();
  });

  it('infers template sensors from attributes only when enabled', () => {
    const row = snapshot('sensor.power', { friendly_name: 'Power', device_class: 'power' });
    expect(identifyHelper(row, ALL)?.domain).toBe('template_sensor');
    expect(identifyHelper(row, { ...ALL, inferTemplateFromAttributes: false })).toBeNull();
  });

  it('skips disabled helper types', () => {
    expect(identifyHelper(snapshot('input_boolean.x'), { ...ALL, domains: ['counter'] })).toBeNull();
    expect(
      identifyHelper(snapshot('sensor.power_x2', {}, 'template'), { ...ALL, domains: ['utility_meter'] }),
    ).toBeNull();
  });
});
