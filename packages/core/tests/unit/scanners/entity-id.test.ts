// tests/unit/scanners/entity-id.test.ts

import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import {
  createScanContext,
  excerptAround,
  findEntityIdTokens,
  formatExcerpt,
  isValidEntityId,
  splitEntityId,
} from '../../../src/scanners/entity-id.js';

const ctx = createScanContext({ excerptLength: 120, confidence: DEFAULT_CONFIG.confidence });

describe('isValidEntityId', () => {
  it('accepts domain.object_id', () => {
    expect(isValidEntityId('input_boolean.guest_mode')).toBe(true);
    expect(isValidEntityId('sensor.temp_2')).toBe(true);
  });

  it('rejects upper case, missing parts and extra dots', () => {
    expect(isValidEntityId('Light.kitchen')).toBe(false);
    expect(isValidEntityId('light.')).toBe(false);
    expect(isValidEntityId('kitchen')).toBe(false);
    expect(isValidEntityId('sensor.a.b')).toBe(false);
  });
});

describe('splitEntityId', () => {
  it('splits on the first dot', () => {
    expect(splitEntityId('counter.daily_count')).toEqual({ domain: 'counter', objectId: 'daily_count' });
  });
});

describe('findEntityIdTokens', () => {
  it('finds bare and quoted ids of known domains in offset order', () => {
    const text = `turn on light.kitchen and "input_boolean.guest_mode"`;
    expect(findEntityIdTokens(text, ctx.knownDomains)).toEqual([
      { entityId: 'light.kitchen', index: 8 },
      { entityId: 'input_boolean.guest_mode', index: 27 },
    ]);
  });

  it('ignores unknown domains', () => {
    expect(findEntityIdTokens('config.yaml and foo.bar', ctx.knownDomains)).toEqual([]);
  });

  it('accepts extra domains from the scan context', () => {
    const custom = createScanContext({
      extraDomains: ['my_integration'],
      excerptLength: 120,
      confidence: DEFAULT_CONFIG.confidence,
    });
    expect(findEntityIdTokens('my_integration.thing', custom.knownDomains)).toEqual([
      { entityId: 'my_integration.thing', index: 0 },
    ]);
  });

  it('skips service calls and dotted paths', () => {
    expect(findEntityIdTokens('light.turn_on(x)', ctx.knownDomains)).toEqual([]);
    expect(findEntityIdTokens('homeassistant.light.kitchen', ctx.knownDomains)).toEqual([]);
  });

  it('keeps the first occurrence of a repeated id', () => {
    expect(findEntityIdTokens('timer.tea, timer.tea', ctx.knownDomains)).toEqual([
      { entityId: 'timer.tea', index: 0 },
    ]);
  });
});

describe('excerptAround', () => {
  it('returns short text with whitespace collapsed', () => {
    expect(excerptAround('  entity_id:\n   light.a  ', 0, 120)).toBe('entity_id: light.a');
  });

  it('windows long text around the match', () => {
    const text = `${'x'.repeat(100)} light.a ${'y'.repeat(100)}`;
    expect(excerptAround(text, 101, 20)).toBe('xxxxxxxxx light.a yy');
  });

  it('clamps the window at the start of the text', () => {
    const text = `light.a ${'y'.repeat(100)}`;
    expect(excerptAround(text, 0, 10)).toBe('light.a yy');
  });
});

describe('formatExcerpt', () => {
  it('prefixes the key path', () => {
    expect(formatExcerpt(['action', 0, 'target', 'entity_id'], 'light.a', 0, 120)).toBe(
      'action.0.target.entity_id: light.a',
    );
  });

  it('omits the prefix at the root', () => {
    expect(formatExcerpt([], 'light.a', 0, 120)).toBe('light.a');
  });

  it('truncates when the key path alone exceeds the limit', () => {
    expect(formatExcerpt(['abcdefghij'], 'light.a', 0, 8)).toBe('abcdefgh');
  });
});
