// tests/fixtures.ts — Shared configuration-root fixture for command tests

import { randomUUID } from 'node:crypto';
import { mkdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

export const FIXED_NOW = (): Date => new Date('2026-03-04T05:06:07.000Z');

export function createTmpDir(): string {
  const dir = join(tmpdir(), `helpersweep-cli-test-${randomUUID()}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function writeFile(dir: string, relPath: string, content: string): void {
  const full = join(dir, relPath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
}

export const STATES = [
  { entity_id: 'input_boolean.guest_mode', state: 'off', attributes: { friendly_name: 'Guest mode' } },
  { entity_id: 'input_boolean.old_flag', state: 'off', attributes: { friendly_name: 'Old flag' } },
  { entity_id: 'counter.visits', state: '3', attributes: { friendly_name: 'Visits' } },
  { entity_id: 'light.porch', state: 'on', attributes: { friendly_name: 'Porch' } },
];

/**
 * Working directory with `.helpersweep.yml` pointing at `config/`, where
 * guest_mode is used by an automation, visits only shows on a dashboard and
 * old_flag is referenced nowhere.
 */
export function createProject(): string {
  const cwd = createTmpDir();
  writeFile(cwd, '.helpersweep.yml', 'configRoot: config\nhost:\n  url: http://ha.test:8123\n');
  writeFile(cwd, 'config/configuration.yaml', 'homeassistant:\n  name: Home\nautomation: !include automations.yaml\n');
  writeFile(
    cwd,
    'config/automations.yaml',
    `- id: arrival
  alias: Arrival
  trigger:
    - platform: state
      entity_id: input_boolean.guest_mode
      to: "on"
  action:
    - service: light.turn_on
      target:
        entity_id: light.porch
`,
  );
  writeFile(
    cwd,
    'config/.storage/lovelace',
    JSON.stringify({
      version: 1,
      key: 'lovelace',
      data: { config: { views: [{ cards: [{ type: 'entities', entities: ['counter.visits'] }] }] } },
    }),
  );
  writeFile(cwd, 'states.json', JSON.stringify(STATES));
  return cwd;
}
