import { describe, it, expect } from 'vitest';
import { createMatchConfig, guideStatusName, loadMatchTables } from '../src/matching/config.js';

describe('match configuration', () => {
  const tables = loadMatchTables();

  it('loads the bundled tables', () => {
    expect(tables.statusEffectRenames['Dark Sigil']).toBe('Dark Sigil [temp]');
    expect(tables.elementStatuses.Arcane).toEqual(['Burning', 'Frozen', 'Rot', 'Paralyzed']);
    expect(tables.weaponItemType).toBe('Weapon');
    expect(tables.guideOnlySkillTypes).toEqual(['Passive']);
  });

  it('freezes the config and copies the tables', () => {
    const config = createMatchConfig(tables, true);
    expect(config.fix).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.elementStatuses.Fire)).toBe(true);
    expect(config.elementStatuses.Fire).not.toBe(tables.elementStatuses.Fire);
  });

  it('maps renamed status effects to their guide names', () => {
    const config = createMatchConfig(tables, false);
    expect(guideStatusName(config, 'Brynhild')).toBe('Call of Brynhild');
    expect(guideStatusName(config, 'Blind')).toBe('Blind');
  });
});
