// tests/unit/engine/classifier.test.ts

import { describe, expect, it } from 'vitest';
import { classifyAll, classifyHelper, summarizeCounts } from '../../../src/engine/classifier.js';
import { buildReferenceIndex } from '../../../src/engine/reference-index.js';
import type { HelperDomain, HelperEntity, ReferenceHit, SourceKind } from '../../../src/types/index.js';
import { ClassificationInvariantViolation } from '../../../src/utils/errors.js';

function helper(entityId: string, domain: HelperDomain = 'input_boolean'): HelperEntity {
  const [entityDomain, objectId] = entityId.split('.');
  return {
    entityId,
    domain,
    entityDomain,
    objectId,
    friendlyName: entityId,
    currentState: null,
    attributes: {},
    platform: null,
  };
}

function hit(entityId: string, sourceKind: SourceKind, sourcePath = 'x.yaml'): ReferenceHit {
  return { entityId, sourceKind, sourcePath, excerpt: entityId, confidence: 1 };
}

describe('buildReferenceIndex', () => {
  it('groups hits per entity in discovery order without deduplicating', () => {
    const index = buildReferenceIndex([
      hit('counter.a', 'dashboard', 'd1'),
      hit('timer.b', 'template'),
      hit('counter.a', 'dashboard', 'd1'),
    ]);
    expect([...index.keys()]).toEqual(['counter.a', 'timer.b']);
    expect(index.get('counter.a')).toHaveLength(2);
  });
});

describe('classifyHelper', () => {
  it('classifies a helper without hits as truly orphaned', () => {
    const result = classifyHelper(helper('input_text.scratch_pad'), undefined);
    expect(result.classification).toBe('truly_orphaned');
    expect(result.sourceKinds).toEqual([]);
    expect(result.hits).toEqual([]);
  });

  it('classifies dashboard-only evidence as dashboard only', () => {
    const result = classifyHelper(helper('counter.daily_count', 'counter'), [
      hit('counter.daily_count', 'dashboard'),
      hit('counter.daily_count', 'dashboard', 'ui-lovelace.yaml'),
    ]);
    expect(result.classification).toBe('dashboard_only');
    expect(result.sourceKinds).toEqual(['dashboard']);
  });

  it('promotes any structural hit to actively used', () => {
    const result = classifyHelper(helper('input_boolean.guest_mode'), [
      hit('input_boolean.guest_mode', 'dashboard'),
      hit('input_boolean.guest_mode', 'yaml_structural'),
    ]);
    expect(result.classification).toBe('actively_used');
    expect(result.sourceKinds).toEqual(['dashboard', 'yaml_structural']);
  });

  it('counts template and naming evidence as use', () => {
    expect(classifyHelper(helper('timer.tea', 'timer'), [hit('timer.tea', 'template')]).classification).toBe(
      'actively_used',
    );
    expect(
      classifyHelper(helper('timer.tea', 'timer'), [hit('timer.tea', 'naming_pattern')]).classification,
    ).toBe('actively_used');
  });

  it('flags template-type helpers for manual removal', () => {
    expect(classifyHelper(helper('sensor.power', 'template_sensor'), undefined).requiresManualRemoval).toBe(true);
    expect(classifyHelper(helper('sensor.kwh', 'utility_meter'), undefined).requiresManualRemoval).toBe(false);
  });
});

describe('classifyAll', () => {
  it('classifies each helper once, sorted by entity id', () => {
    const index = buildReferenceIndex([hit('timer.tea', 'template')]);
    const result = classifyAll([helper('timer.tea', 'timer'), helper('counter.cups', 'counter')], index);
    expect(result.map((c) => [c.helper.entityId, c.classification])).toEqual([
      ['counter.cups', 'truly_orphaned'],
      ['timer.tea', 'actively_used'],
    ]);
  });

  it('aborts on a helper listed twice', () => {
    const index = buildReferenceIndex([]);
    expect(() => classifyAll([helper('counter.cups', 'counter'), helper('counter.cups', 'counter')], index)).toThrow(
      ClassificationInvariantViolation,
    );
    expect(() => classifyAll([helper('counter.cups', 'counter'), helper('counter.cups', 'counter')], index)).toThrow(
      'counter.cups would be classified more than once',
    );
  });

  it('ignores hits for entities that are not helpers', () => {
    const index = buildReferenceIndex([hit('light.kitchen', 'yaml_structural')]);
    expect(classifyAll([helper('counter.cups', 'counter')], index)[0].classification).toBe('truly_orphaned');
  });
});

describe('summarizeCounts', () => {
  it('totals by classification and by sorted helper domain', () => {
    const index = buildReferenceIndex([hit('timer.tea', 'template'), hit('counter.b', 'dashboard')]);
    const counts = summarizeCounts(
      classifyAll(
        [helper('timer.tea', 'timer'), helper('counter.b', 'counter'), helper('counter.a', 'counter')],
        index,
      ),
    );
    expect(counts).toEqual({
      total: 3,
      byDomain: { counter: 2, timer: 1 },
      byClassification: { actively_used: 1, dashboard_only: 1, truly_orphaned: 1 },
    });
    expect(Object.keys(counts.byDomain)).toEqual(['counter', 'timer']);
  });
});
