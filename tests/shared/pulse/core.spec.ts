import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DocumentStore, createMemoryBackend } from '@shared/core/pstore';
import { unwrap } from '@shared/core/result';
import { openPulseCore } from '@shared/pulse/core';

import { FIXED_NOW, errorCode, testCore } from '../fixtures';

describe('pulse core', () => {
  it('computes rollups against the injected clock', () => {
    const core = testCore();
    const records = [
      { date: '2024-02-21', amount: 50 },
      { date: '2024-02-19', amount: 25 },
      { date: '2024-02-01', amount: 500 },
    ];
    expect(core.weeklyTotal(records)).toBe(75);
    expect(core.weeklyTotal(records, new Date(2024, 1, 1))).toBe(500);
    expect(Object.keys(core.monthlyGrid([{ tag: 'ann', records }], 2024, 2))).toHaveLength(29);
  });

  it('raises load alerts with the configured thresholds', () => {
    const core = testCore({ config: { loadThresholds: { dailyMinutes: 30, weeklyMinutes: 1000 } } });
    expect(core.loadAlerts([{ date: '2024-02-21', amount: 31 }])).toEqual([
      { kind: 'high-daily', severity: 'red', total: 31, threshold: 30 },
    ]);
  });

  it('runs an athlete from registration to a shared week', () => {
    const core = testCore();
    unwrap(core.register('Jo Ann', 'test-pin', { confirmPin: 'test-pin' }));
    expect(unwrap(core.authenticate('joann', 'test-pin')).createdAt).toBe(FIXED_NOW.toISOString());

    const team = unwrap(core.createTeam('Hawks', 'kim'));
    unwrap(core.joinTeam('Jo Ann', team));
    const family = unwrap(core.createFamily('Ann household'));
    unwrap(core.linkChild(family, 'Jo Ann'));
    unwrap(core.updateFamilyContact('joann', { parentName: 'Pat', parentEmail: 'pat@example.test' }));
    unwrap(core.appendRecord('joann', 'training', { date: '2024-02-20', amount: 45 }));

    const share = unwrap(core.createSnapshot('joann', ['training']));
    expect(unwrap(core.resolveSnapshot(share)).weeklyTotals).toEqual({ training: 45 });
    expect(unwrap(core.teamOverview(team)).rows).toEqual([
      { identity: 'joann', color: '#2E8B57', weeklyTotal: 45, found: true },
    ]);
    expect(unwrap(core.familyWeek(family)).children[0]?.weeklyTotal).toBe(45);
    expect(unwrap(core.athletes.get('joann')).teams).toEqual([team]);
  });

  it('keeps coaches and the staffroom on the same store', () => {
    const core = testCore();
    unwrap(core.registerCoach('kim', 'test-pin'));
    expect(errorCode(core.authenticateCoach('kim', 'nope'))).toBe('InvalidInput');
    unwrap(core.postMessage('kim', 'Practice moved'));
    expect(core.listMessages().map((message) => message.author)).toEqual(['kim']);
  });
});

describe('storage failures', () => {
  it('come back as results from every writing operation', () => {
    const backend = createMemoryBackend();
    let failing = false;
    const store = new DocumentStore({
      getItem: (key) => backend.getItem(key),
      setItem: (key, value) => {
        if (failing) {
          throw new Error('disk full');
        }
        backend.setItem(key, value);
      },
    });
    const core = testCore({ store });
    unwrap(core.register('bob', 'test-pin'));
    unwrap(core.registerCoach('kim', 'test-pin'));
    const team = unwrap(core.createTeam('Hawks'));
    const family = unwrap(core.createFamily());

    failing = true;
    expect(errorCode(core.register('ann', 'test-pin'))).toBe('StorageFailed');
    expect(errorCode(core.appendRecord('bob', 'training', { date: '2024-02-20', amount: 30 }))).toBe('StorageFailed');
    expect(errorCode(core.joinTeam('bob', team))).toBe('StorageFailed');
    expect(errorCode(core.linkChild(family, 'bob'))).toBe('StorageFailed');
    expect(errorCode(core.ensureFamily('smith-fam'))).toBe('StorageFailed');
    expect(errorCode(core.createTeam('Owls'))).toBe('StorageFailed');
    expect(errorCode(core.createSnapshot('bob', ['training']))).toBe('StorageFailed');
    expect(errorCode(core.postMessage('kim', 'hello'))).toBe('StorageFailed');
    expect(errorCode(core.assignPlan('kim', { type: 'athlete', identity: 'bob' }, { file: 'a.pdf' }))).toBe('StorageFailed');

    failing = false;
    expect(unwrap(core.athletes.get('bob')).logs).toEqual({});
    expect(unwrap(core.getTeam(team)).roster).toEqual([]);
    expect(errorCode(core.authenticate('ann', 'test-pin'))).toBe('NotFound');
  });
});

describe('openPulseCore', () => {
  let dir = '';

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'pulse-core-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('persists documents in the configured data directory', () => {
    const env = { PULSE_DATA_DIR: dir, PULSE_LOG_LEVEL: 'error' };
    const first = openPulseCore(env);
    unwrap(first.register('Bob', 'test-pin'));
    const team = unwrap(first.createTeam('Hawks'));
    unwrap(first.joinTeam('bob', team));

    expect(existsSync(path.join(dir, 'athlete%3Abob.json'))).toBe(true);
    expect(existsSync(path.join(dir, `team%3A${team}.json`))).toBe(true);
    expect(existsSync(path.join(dir, 'codes%3Ateam.json'))).toBe(true);

    const second = openPulseCore(env);
    expect(unwrap(second.authenticate('BOB', 'test-pin')).teams).toEqual([team]);
    expect(unwrap(second.getTeam(team)).roster).toEqual(['bob']);
    expect(second.ctx.config.dataDir).toBe(dir);
  });

  it('registers identities too long for a plain file name', () => {
    const core = openPulseCore({ PULSE_DATA_DIR: dir, PULSE_LOG_LEVEL: 'error' });
    const identity = 'a'.repeat(300);
    expect(unwrap(core.register(identity, 'test-pin')).identity).toBe(identity);
    unwrap(core.appendRecord(identity, 'training', { date: '2024-02-20', amount: 30 }));
    expect(unwrap(openPulseCore({ PULSE_DATA_DIR: dir, PULSE_LOG_LEVEL: 'error' }).authenticate(identity, 'test-pin')).logs).toEqual({
      training: [{ date: '2024-02-20', amount: 30 }],
    });
  });

  it('lets overrides beat the environment', () => {
    const core = openPulseCore({ PULSE_DATA_DIR: dir, PULSE_LOG_LEVEL: 'error' }, { shareCodeLength: 10 });
    unwrap(core.register('bob', 'test-pin'));
    expect(unwrap(core.createSnapshot('bob', ['training']))).toMatch(/^[A-Z0-9]{10}$/);
  });
});
