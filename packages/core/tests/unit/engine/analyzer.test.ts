// tests/unit/engine/analyzer.test.ts

import { randomUUID } from 'node:crypto';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import type { RegistryDataSource } from '../../../src/discovery/data-source.js';
import { SnapshotRegistrySource } from '../../../src/discovery/snapshot-source.js';
import { runAnalysis } from '../../../src/engine/analyzer.js';
import type { AnalysisResult, EntitySnapshot } from '../../../src/types/index.js';
import { createLogger } from '../../../src/utils/logger.js';

const FIXED_NOW = (): Date => new Date('2026-01-02T03:04:05.000Z');
const logger = createLogger('silent');

const AUTOMATIONS = `- id: evening_arrival
  alias: Evening arrival
  trigger:
    - platform: state
      entity_id: person.guest
  action:
    - service: input_boolean.turn_on
      target:
        entity_id: input_boolean.guest_mode
`;

const SCRIPTS = `warm_house:
  alias: Warm house
  sequence:
    - service: climate.set_temperature
      data:
        temperature: "{{ states('input_number.target_temp') }}"
`;

const LOVELACE = {
  version: 1,
  key: 'lovelace',
  data: { config: { views: [{ cards: [{ type: 'entities', entities: ['counter.daily_count'] }] }] } },
};

const STATES = [
  { entity_id: 'input_boolean.guest_mode', state: 'off', attributes: { friendly_name: 'Guest mode' } },
  { entity_id: 'counter.daily_count', state: '4', attributes: { friendly_name: 'Daily count' } },
  { entity_id: 'input_text.scratch_pad', state: '', attributes: { friendly_name: 'Scratch pad' } },
  { entity_id: 'input_number.target_temp', state: '21', attributes: { friendly_name: 'Target temp' } },
  {
    entity_id: 'sensor.template_power',
    state: '120',
    attributes: { friendly_name: 'Template power', unit_of_measurement: 'W' },
    platform: 'template',
  },
  { entity_id: 'light.kitchen', state: 'on', attributes: {} },
];

function createTmpDir(): string {
  const dir = join(tmpdir(), `helpersweep-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

function writeFile(dir: string, path: string, content: string): void {
  const full = join(dir, path);
  mkdirSync(join(full, '..'), { recursive: true });
  writeFileSync(full, content, 'utf-8');
}

function classificationOf(result: AnalysisResult, entityId: string): string | undefined {
  return result.helpers.find((c) => c.helper.entityId === entityId)?.classification;
}

describe('runAnalysis', () => {
  let root: string;

  beforeEach(() => {
    root = createTmpDir();
    writeFile(root, 'automations.yaml', AUTOMATIONS);
    writeFile(root, 'scripts.yaml', SCRIPTS);
    writeFile(root, '.storage/lovelace', JSON.stringify(LOVELACE));
  });
  afterEach(() => { rmSync(root, { recursive: true, force: true }); });

  function analyze(source: RegistryDataSource = new SnapshotRegistrySource(STATES)): Promise<AnalysisResult> {
    return runAnalysis({ configRoot: root, config: DEFAULT_CONFIG, source, logger, now: FIXED_NOW });
  }

  it('classifies a helper named under an action entity_id as actively used', async () => {
    const result = await analyze();
    const guest = result.helpers.find((c) => c.helper.entityId === 'input_boolean.guest_mode');
    expect(guest?.classification).toBe('actively_used');
    expect(guest?.hits).toEqual([
      {
        entityId: 'input_boolean.guest_mode',
        sourceKind: 'yaml_structural',
        sourcePath: 'automations.yaml',
        excerpt: '0.action.0.target.entity_id: input_boolean.guest_mode',
        confidence: 1,
      },
    ]);
  });

  it('classifies a helper only found in a dashboard store as dashboard only', async () => {
    const result = await analyze();
    const counter = result.helpers.find((c) => c.helper.entityId === 'counter.daily_count');
    expect(counter?.classification).toBe('dashboard_only');
    expect(counter?.hits).toHaveLength(1);
    expect(counter?.hits[0]).toMatchObject({ sourceKind: 'dashboard', sourcePath: '.storage/lovelace' });
  });

  it('classifies an unreferenced helper as truly orphaned', async () => {
    const result = await analyze();
    const scratch = result.helpers.find((c) => c.helper.entityId === 'input_text.scratch_pad');
    expect(scratch?.classification).toBe('truly_orphaned');
    expect(scratch?.hits).toEqual([]);
  });

  it('counts a template reference in a script as use at 0.6 confidence', async () => {
    const result = await analyze();
    const target = result.helpers.find((c) => c.helper.entityId === 'input_number.target_temp');
    expect(target?.classification).toBe('actively_used');
    expect(target?.hits).toHaveLength(1);
    expect(target?.hits[0]).toMatchObject({ sourceKind: 'template', sourcePath: 'scripts.yaml', confidence: 0.6 });
  });

  it('summarizes the run', async () => {
    const result = await analyze();
    expect(result.timestamp).toBe('2026-01-02T03:04:05.000Z');
    expect(result.helpers.map((c) => c.helper.entityId)).toEqual([
      'counter.daily_count',
      'input_boolean.guest_mode',
      'input_number.target_temp',
      'input_text.scratch_pad',
      'sensor.template_power',
    ]);
    expect(result.counts).toEqual({
      total: 5,
      byDomain: { counter: 1, input_boolean: 1, input_number: 1, input_text: 1, template_sensor: 1 },
      byClassification: { actively_used: 2, dashboard_only: 1, truly_orphaned: 2 },
    });
    expect(result.helpers[4].requiresManualRemoval).toBe(true);
    expect(result.sources).toEqual({
      configFiles: ['automations.yaml', 'scripts.yaml'],
      dashboardFiles: ['.storage/lovelace'],
    });
    expect(result.loadErrors).toEqual([]);
    expect(result.lookupErrors).toEqual([]);
  });

  it('produces identical output for an unchanged corpus and registry', async () => {
    const first = JSON.stringify(await analyze());
    const second = JSON.stringify(await analyze());
    expect(second).toBe(first);
  });

  it('records a malformed file and keeps scanning the rest', async () => {
    writeFile(root, 'broken.yaml', 'a: [1, 2\n');
    const result = await analyze();
    expect(result.loadErrors).toHaveLength(1);
    expect(result.loadErrors[0]).toMatchObject({ path: 'broken.yaml', phase: 'parse' });
    expect(result.sources.configFiles).toEqual(['automations.yaml', 'scripts.yaml']);
    expect(classificationOf(result, 'input_boolean.guest_mode')).toBe('actively_used');
  });

  it('treats YAML-mode dashboards as dashboard evidence', async () => {
    writeFile(root, 'ui-lovelace.yaml', 'views:\n  - cards:\n      - entity: input_text.scratch_pad\n');
    const result = await analyze();
    expect(classificationOf(result, 'input_text.scratch_pad')).toBe('dashboard_only');
    expect(result.sources.dashboardFiles).toEqual(['ui-lovelace.yaml', '.storage/lovelace']);
  });

  it('does not read its own report directory', async () => {
    writeFile(root, 'helper_analysis/dashboard_review_cards.yaml', 'entities:\n  - input_text.scratch_pad\n');
    const result = await analyze();
    expect(classificationOf(result, 'input_text.scratch_pad')).toBe('truly_orphaned');
  });

  it('counts helpers read by templated service and action names as used', async () => {
    writeFile(
      root,
      'scripts.yaml',
      `holiday_lights:
  sequence:
    - service: "{{ 'light.turn_off' if is_state('input_text.scratch_pad', 'away') else 'light.turn_on' }}"
    - action: "{{ 'climate.turn_on' if states('input_number.target_temp') | int > 18 else 'climate.turn_off' }}"
`,
    );
    const result = await analyze();
    const summary = ['input_text.scratch_pad', 'input_number.target_temp'].map((id) => {
      const c = result.helpers.find((h) => h.helper.entityId === id);
      return [id, c?.classification, c?.hits.length, c?.hits[0]?.sourceKind];
    });
    expect(summary).toEqual([
      ['input_text.scratch_pad', 'actively_used', 1, 'template'],
      ['input_number.target_temp', 'actively_used', 1, 'template'],
    ]);
  });

  it('links helpers to scripts sharing name tokens', async () => {
    writeFile(root, 'scripts.yaml', `${SCRIPTS}scratch_cleanup:\n  sequence: []\n`);
    const result = await analyze();
    const scratch = result.helpers.find((c) => c.helper.entityId === 'input_text.scratch_pad');
    expect(scratch?.classification).toBe('actively_used');
    expect(scratch?.sourceKinds).toEqual(['naming_pattern']);
    expect(scratch?.hits[0]).toMatchObject({
      sourcePath: 'scripts.yaml',
      excerpt: 'script scratch_cleanup (shares: scratch)',
      confidence: 0.3,
    });
  });

  it('reports a failing registry domain and classifies the rest', async () => {
    const inner = new SnapshotRegistrySource(STATES);
    const flaky: RegistryDataSource = {
      listByDomain: async (entityDomain: string): Promise<EntitySnapshot[]> => {
        if (entityDomain === 'counter') throw new Error('registry unavailable');
        return inner.listByDomain(entityDomain);
      },
      get: (entityId: string) => inner.get(entityId),
    };
    const result = await analyze(flaky);
    expect(result.lookupErrors).toEqual([{ target: 'counter', message: 'registry unavailable' }]);
    expect(result.counts.total).toBe(4);
  });
});
