import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createIgnoreFilter, createPathMatcher } from '../../../src/config/ignore.js';

const TEST_DIR = join(tmpdir(), `helpersweep-ignore-test-${Date.now()}`);

beforeEach(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

describe('createIgnoreFilter', () => {
  it('ignores runtime state and secrets by default', () => {
    const ig = createIgnoreFilter(TEST_DIR);
    expect(ig.ignores('.storage/core.entity_registry')).toBe(true);
    expect(ig.ignores('secrets.yaml')).toBe(true);
    expect(ig.ignores('home-assistant_v2.db')).toBe(true);
    expect(ig.ignores('custom_components/hacs/manifest.json')).toBe(true);
  });

  it('keeps regular configuration files', () => {
    const ig = createIgnoreFilter(TEST_DIR);
    expect(ig.ignores('automations.yaml')).toBe(false);
    expect(ig.ignores('packages/heating.yaml')).toBe(false);
  });

  it('applies extra patterns such as the report directory', () => {
    const ig = createIgnoreFilter(TEST_DIR, { extraPatterns: ['helper_analysis/'] });
    expect(ig.ignores('helper_analysis/helper_summary.txt')).toBe(true);
  });

  it('reads .gitignore unless skipped', () => {
    writeFileSync(join(TEST_DIR, '.gitignore'), 'old/\n', 'utf-8');
    expect(createIgnoreFilter(TEST_DIR).ignores('old/scripts.yaml')).toBe(true);
    expect(createIgnoreFilter(TEST_DIR, { skipGitignore: true }).ignores('old/scripts.yaml')).toBe(
      false,
    );
  });

  it('lets .helpersweepignore re-include a builtin', () => {
    writeFileSync(join(TEST_DIR, '.helpersweepignore'), '!www\n', 'utf-8');
    expect(createIgnoreFilter(TEST_DIR).ignores('www')).toBe(false);
  });
});

describe('createPathMatcher', () => {
  it('matches gitignore-style dashboard patterns', () => {
    const matches = createPathMatcher(['/ui-lovelace.yaml', '/dashboards/']);
    expect(matches('ui-lovelace.yaml')).toBe(true);
    expect(matches('dashboards/energy.yaml')).toBe(true);
    expect(matches('packages/ui-lovelace.yaml')).toBe(false);
  });

  it('matches nothing without patterns', () => {
    expect(createPathMatcher([])('ui-lovelace.yaml')).toBe(false);
  });
});
