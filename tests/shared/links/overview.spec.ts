import { describe, expect, it } from 'vitest';

import { teamKey } from '@shared/core/keys';
import { unwrap } from '@shared/core/result';

import { errorCode, testCore } from '../fixtures';

function seededCore() {
  const core = testCore();
  unwrap(core.register('Ann', 'test-pin'));
  unwrap(core.register('Ben', 'test-pin', { seed: { color: '#1E90FF' } }));
  unwrap(core.appendRecord('ann', 'training', { date: '2024-02-19', amount: 25 }));
  unwrap(core.appendRecord('ann', 'training', { date: '2024-02-20', amount: 15 }));
  unwrap(core.appendRecord('ann', 'training', { date: '2024-02-12', amount: 90 }));
  unwrap(core.appendRecord('ann', 'gym', { date: '2024-02-20', amount: 60 }));
  unwrap(core.appendRecord('ben', 'training', { date: '2024-02-20', amount: 30 }));
  return core;
}

describe('team overview', () => {
  it('lists each rostered athlete with this week\'s training total', () => {
    const core = seededCore();
    const code = unwrap(core.createTeam('Hawks'));
    unwrap(core.joinTeam('ann', code));
    unwrap(core.joinTeam('ben', code));

    expect(unwrap(core.teamOverview(code))).toEqual({
      code,
      name: 'Hawks',
      week: '2024-W08',
      rows: [
        { identity: 'ann', color: '#2E8B57', weeklyTotal: 40, found: true },
        { identity: 'ben', color: '#1E90FF', weeklyTotal: 30, found: true },
      ],
    });
  });

  it('shows roster entries whose profile is gone', () => {
    const core = seededCore();
    const code = unwrap(core.createTeam('Hawks'));
    core.ctx.store.put(teamKey(code), { code, name: 'Hawks', roster: ['ghost'] });

    expect(unwrap(core.teamOverview(code)).rows).toEqual([
      { identity: 'ghost', color: null, weeklyTotal: 0, found: false },
    ]);
  });

  it('uses the given reference week', () => {
    const core = seededCore();
    const code = unwrap(core.createTeam('Hawks'));
    unwrap(core.joinTeam('ann', code));
    const overview = unwrap(core.teamOverview(code, new Date(2024, 1, 14)));
    expect(overview.week).toBe('2024-W07');
    expect(overview.rows[0]?.weeklyTotal).toBe(90);
  });

  it('fails for unknown teams', () => {
    expect(errorCode(testCore().teamOverview('NOPE'))).toBe('NotFound');
  });
});

describe('family week', () => {
  it('totals each child and fills the month grid', () => {
    const core = seededCore();
    const code = unwrap(core.createFamily('Rivera'));
    unwrap(core.linkChild(code, 'ann'));
    unwrap(core.linkChild(code, 'ben'));
    unwrap(core.linkChild(code, 'ghost'));

    const week = unwrap(core.familyWeek(code));
    expect(week.code).toBe(code);
    expect(week.name).toBe('Rivera');
    expect(week.week).toBe('2024-W08');
    expect(week.children).toEqual([
      { identity: 'ann', color: '#2E8B57', weeklyTotal: 40, found: true },
      { identity: 'ben', color: '#1E90FF', weeklyTotal: 30, found: true },
      { identity: 'ghost', color: '#FF6347', weeklyTotal: 0, found: false },
    ]);
    expect(Object.keys(week.month)).toHaveLength(29);
    expect(week.month[12]).toEqual({ date: '2024-02-12', total: 90, tags: ['ann'] });
    expect(week.month[20]).toEqual({ date: '2024-02-20', total: 45, tags: ['ann', 'ben'] });
    expect(week.month[21]).toEqual({ date: '2024-02-21', total: 0, tags: [] });
  });

  it('fails for unknown families', () => {
    expect(errorCode(testCore().familyWeek('NOPE'))).toBe('NotFound');
  });
});

