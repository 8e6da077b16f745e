// tests/delete-command.test.ts — delete gate, dry run and execution

import { existsSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError, DeletionStore, openDatabase, parseAnalysisResult } from '@helpersweep/core';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { analyzeCommand } from '../src/commands/analyze.js';
import { deleteCommand } from '../src/commands/delete.js';
import { getDbPath } from '../src/utils.js';
import { FIXED_NOW, STATES, createProject, writeFile } from './fixtures.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('deleteCommand', () => {
  let cwd: string;
  let reportDir: string;

  beforeEach(async () => {
    cwd = createProject();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    ({ reportDir } = await analyzeCommand(undefined, {
      states: 'states.json',
      quiet: true,
      cwd,
      env: {},
      now: FIXED_NOW,
    }));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    rmSync(cwd, { recursive: true, force: true });
  });

  it('plans the orphan list from the last analysis in a dry run', async () => {
    const { report, records } = await deleteCommand({ states: 'states.json', json: true, cwd, env: {}, now: FIXED_NOW });

    expect(report.dryRun).toBe(true);
    expect(report.outcomes).toEqual([
      { entityId: 'input_boolean.old_flag', status: 'planned', manual: false, message: 'would call input_boolean.remove' },
    ]);
    expect(records).toEqual([
      {
        entityId: 'input_boolean.old_flag',
        preDeleteStateSnapshot: {
          domain: 'input_boolean',
          friendlyName: 'Old flag',
          state: 'off',
          attributes: { friendly_name: 'Old flag' },
        },
        requestedAt: '2026-03-04T05:06:07.000Z',
      },
    ]);

    const backup: unknown = JSON.parse(readFileSync(join(reportDir, 'deletion_backup.json'), 'utf-8'));
    expect(backup).toEqual(records);
    expect(readFileSync(join(reportDir, 'deletion_report.txt'), 'utf-8')).toContain(
      '  [planned] input_boolean.old_flag - would call input_boolean.remove',
    );
  });

  it('persists a pre-delete snapshot with the planned outcome', async () => {
    const { report } = await deleteCommand({ states: 'states.json', json: true, cwd, env: {} });

    const db = openDatabase(getDbPath(cwd));
    try {
      const stored = new DeletionStore(db).listForRun(report.runId);
      expect(stored).toHaveLength(1);
      expect(stored[0]).toMatchObject({
        dryRun: true,
        status: 'planned',
        record: { entityId: 'input_boolean.old_flag' },
      });
    } finally {
      db.close();
    }
  });

  it('gates a hand-edited list line by line', async () => {
    writeFile(
      cwd,
      'review.txt',
      [
        'input_boolean.guest_mode',
        '# input_boolean.old_flag  # Old flag (state: off)',
        'counter.visits  # Visits (state: 3) [dashboard only]',
        'not an id',
        'input_boolean.gone',
      ].join('\n'),
    );

    const { report } = await deleteCommand({ list: 'review.txt', states: 'states.json', json: true, cwd, env: {} });

    expect(report.outcomes.map((o) => [o.entityId, o.status])).toEqual([['counter.visits', 'planned']]);
    expect(report.alreadyAbsent).toEqual(['input_boolean.gone']);
    expect(report.rejected.map((r) => [r.lineNumber, r.reason])).toEqual([
      [1, 'not_orphaned'],
      [4, 'malformed_entity_id'],
    ]);
  });

  it('falls back to the JSON report when no run was saved', async () => {
    rmSync(join(cwd, '.helpersweep'), { recursive: true, force: true });
    const { report } = await deleteCommand({ states: 'states.json', json: true, cwd, env: {} });
    expect(report.planned).toBe(1);
  });

  it('gates against a newer unsaved analysis rather than the last saved run', async () => {
    writeFile(
      cwd,
      'config/scripts.yaml',
      'flag_reset:\n  sequence:\n    - service: input_boolean.turn_off\n      target:\n        entity_id: input_boolean.old_flag\n',
    );
    const { result } = await analyzeCommand(undefined, {
      states: 'states.json',
      save: false,
      quiet: true,
      cwd,
      env: {},
      now: () => new Date('2026-03-05T00:00:00.000Z'),
    });
    expect(result.helpers.find((c) => c.helper.entityId === 'input_boolean.old_flag')?.classification).toBe(
      'actively_used',
    );
    writeFile(cwd, 'review.txt', 'input_boolean.old_flag\n');

    const { report } = await deleteCommand({ list: 'review.txt', states: 'states.json', json: true, cwd, env: {} });

    expect(report.outcomes).toEqual([]);
    expect(report.rejected.map((r) => [r.entityId, r.reason])).toEqual([['input_boolean.old_flag', 'not_orphaned']]);
  });

  it('keeps the saved run when it is newer than the report on disk', async () => {
    const path = join(reportDir, 'helper_analysis.json');
    const stale = parseAnalysisResult(JSON.parse(readFileSync(path, 'utf-8')), path);
    writeFile(
      cwd,
      'config/helper_analysis/helper_analysis.json',
      JSON.stringify({ ...stale, timestamp: '2026-01-01T00:00:00.000Z', helpers: [] }),
    );

    const { report } = await deleteCommand({ states: 'states.json', json: true, cwd, env: {} });

    expect(report.outcomes.map((o) => o.entityId)).toEqual(['input_boolean.old_flag']);
  });

  it('fails without any analysis to gate against', async () => {
    rmSync(join(cwd, '.helpersweep'), { recursive: true, force: true });
    rmSync(join(reportDir, 'helper_analysis.json'));
    await expect(deleteCommand({ states: 'states.json', json: true, cwd, env: {} })).rejects.toThrow(
      `No analysis found for ${join(cwd, 'config')}; run helpersweep analyze first`,
    );
  });

  it('refuses --execute against a states dump', async () => {
    await expect(
      deleteCommand({ execute: true, states: 'states.json', json: true, cwd, env: {} }),
    ).rejects.toBeInstanceOf(ConfigError);
    expect(existsSync(join(reportDir, 'deletion_report.txt'))).toBe(false);
  });

  it('removes passing helpers through the host API with --execute', async () => {
    const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
      const url = String(input);
      if (url === 'http://ha.test:8123/api/states/input_boolean.old_flag') return jsonResponse(STATES[1]);
      if (url === 'http://ha.test:8123/api/services/input_boolean/remove' && init?.method === 'POST') {
        return jsonResponse([]);
      }
      return new Response('not found', { status: 404 });
    });
    vi.stubGlobal('fetch', fetchMock);

    const { report } = await deleteCommand({ execute: true, json: true, cwd, env: { HASS_TOKEN: 'test-token' } });

    expect(report.dryRun).toBe(false);
    expect(report.outcomes).toEqual([
      { entityId: 'input_boolean.old_flag', status: 'deleted', manual: false, message: 'called input_boolean.remove' },
    ]);
    const removeCall = fetchMock.mock.calls.find(([input]) => String(input).endsWith('/remove'));
    expect(removeCall?.[1]?.body).toBe(JSON.stringify({ entity_id: 'input_boolean.old_flag' }));
  });
});
