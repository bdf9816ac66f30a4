import { describe, expect, it } from 'vitest';

import { CodeIndexSchema } from '@shared/codes/types';
import { ATHLETE_PALETTE } from '@shared/core/config';
import { codeIndexKey } from '@shared/core/keys';
import { unwrap } from '@shared/core/result';
import { pickChildColor } from '@shared/links/families';

import { errorCode, testCore } from '../fixtures';

describe('pickChildColor', () => {
  it('takes the first color no sibling uses', () => {
    const siblings = [
      { identity: 'ann', color: '#2E8B57' },
      { identity: 'ben', color: '#FF6347' },
    ];
    expect(pickChildColor(siblings, ATHLETE_PALETTE, () => 0)).toBe('#1E90FF');
  });

  it('picks at random once the palette is used up', () => {
    const siblings = ATHLETE_PALETTE.map((color, index) => ({ identity: `kid${index}`, color }));
    expect(pickChildColor(siblings, ATHLETE_PALETTE, () => 0.99)).toBe('#7FFF00');
  });
});

describe('family directory', () => {
  it('creates families with a default name', () => {
    const core = testCore();
    const code = unwrap(core.createFamily());
    expect(code).toMatch(/^[A-Z0-9]{6}$/);
    expect(unwrap(core.getFamily(code))).toMatchObject({ code, name: 'Family', children: [] });
    expect(unwrap(core.getFamily(unwrap(core.createFamily(' Rivera ')))).name).toBe('Rivera');
  });

  it('gives siblings distinct colors in palette order, then random ones', () => {
    const core = testCore({ random: () => 0.5 });
    const code = unwrap(core.createFamily('Big'));
    const colors: string[] = [];
    for (let i = 0; i < 11; i += 1) {
      colors.push(unwrap(core.linkChild(code, `kid${i}`)).color);
    }
    expect(colors.slice(0, 10)).toEqual([...ATHLETE_PALETTE]);
    expect(colors[10]).toBe('#00CED1');
  });

  it('does not relink a child', () => {
    const core = testCore();
    const code = unwrap(core.createFamily());
    const first = unwrap(core.linkChild(code, 'Ann'));
    const again = unwrap(core.linkChild(code.toLowerCase(), 'ANN'));
    expect(again).toEqual(first);
    expect(unwrap(core.getFamily(code)).children).toEqual([{ identity: 'ann', color: '#2E8B57' }]);
  });

  it('fails to link into unknown families or without an identity', () => {
    const core = testCore();
    const code = unwrap(core.createFamily());
    expect(errorCode(core.linkChild('NOPE', 'ann'))).toBe('NotFound');
    expect(errorCode(core.linkChild(code, '!!!'))).toBe('InvalidInput');
  });

  it('ensures a family under a caller-chosen code', () => {
    const core = testCore();
    const created = unwrap(core.ensureFamily(' smith-fam ', 'The Smiths'));
    expect(created).toMatchObject({ code: 'SMITH-FAM', name: 'The Smiths', children: [] });

    unwrap(core.linkChild('smith-fam', 'ann'));
    const again = unwrap(core.ensureFamily('SMITH-FAM', 'Other'));
    expect(again.name).toBe('The Smiths');
    expect(again.children).toHaveLength(1);

    const index = core.ctx.store.get(codeIndexKey('family'), CodeIndexSchema, { codes: [] });
    expect(index.codes).toEqual(['SMITH-FAM']);
  });

  it('rejects codes with spaces or symbols', () => {
    const core = testCore();
    expect(errorCode(core.ensureFamily('smith fam'))).toBe('InvalidInput');
    expect(errorCode(core.ensureFamily('   '))).toBe('InvalidInput');
    expect(errorCode(core.ensureFamily('a/b'))).toBe('InvalidInput');
  });
});
