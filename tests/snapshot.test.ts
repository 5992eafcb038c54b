import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  loadLocaleDb,
  loadManualLocaleDb,
  loadOrnaData,
  ornaDataFromDocuments,
  saveLocaleDb,
  saveManualLocaleDb,
  saveOrnaData,
} from '../src/data/snapshot.js';
import { LocaleStringsSchema } from '../src/data/schemas.js';
import { mergeLocaleDb, translateOrnaData, withManualOverrides } from '../src/translation.js';
import { adminItem, adminMonster, codexItem, codexMonster, effect, ornaData } from './fixtures.js';

describe('snapshot directories', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'snapshot-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one document per collection and reads them back', () => {
    const data = ornaData({
      codex: { items: [codexItem({ slug: 'a', name: 'A' })] },
      guide: { items: [adminItem({ id: 1, name: 'A', codexUri: '/codex/items/a/' })] },
      static: { statusEffects: [{ id: 1, name: 'Blind' }] },
    });
    saveOrnaData(dir, data);

    expect(existsSync(join(dir, 'codex_items.json'))).toBe(true);
    expect(JSON.parse(readFileSync(join(dir, 'guide_status_effects.json'), 'utf-8'))).toEqual([{ id: 1, name: 'Blind' }]);
    expect(loadOrnaData(dir)).toEqual(data);
  });

  it('treats an empty directory as an empty snapshot', () => {
    expect(loadOrnaData(dir)).toEqual(ornaData());
  });

  it('keeps fetched and manual locales apart', () => {
    saveLocaleDb(dir, { locales: { fr: LocaleStringsSchema.parse({ locale: 'fr', statuses: { Blind: 'Aveugle' } }) } });
    saveManualLocaleDb(dir, { locales: { de: LocaleStringsSchema.parse({ locale: 'de' }) } });
    expect(Object.keys(loadLocaleDb(dir).locales)).toEqual(['fr']);
    expect(Object.keys(loadManualLocaleDb(dir).locales)).toEqual(['de']);
    expect(existsSync(join(dir, 'i18n', 'manual', 'de.json'))).toBe(true);
  });
});

describe('ornaDataFromDocuments', () => {
  it('names the file and path of an invalid entry', () => {
    expect(() => ornaDataFromDocuments({ 'guide_items.json': [{ id: 'x', name: 'A', tier: 1 }] }))
      .toThrow('Invalid guide_items.json: 0.id: ');
  });
});

describe('locale overlays', () => {
  const auto = {
    locales: {
      fr: LocaleStringsSchema.parse({ locale: 'fr', items: { a: { name: 'Épée' }, b: { name: 'Bouclier' } } }),
    },
  };
  const manual = {
    locales: {
      fr: LocaleStringsSchema.parse({ locale: 'fr', items: { a: { name: 'Épée de fer', description: 'Tranchante.' } } }),
      es: LocaleStringsSchema.parse({ locale: 'es' }),
    },
  };

  it('lets manual strings override fetched ones per key', () => {
    const merged = withManualOverrides(auto, manual);
    expect(merged.locales.fr.items).toEqual({
      a: { name: 'Épée de fer', description: 'Tranchante.' },
      b: { name: 'Bouclier' },
    });
    expect(Object.keys(merged.locales).sort()).toEqual(['es', 'fr']);
  });

  it('leaves locales present on one side only untouched', () => {
    expect(mergeLocaleDb(auto, { locales: {} }).locales.fr).toBe(auto.locales.fr);
  });

  it('translates a copy of the snapshot', () => {
    const data = ornaData({
      codex: {
        items: [codexItem({ slug: 'a', name: 'Iron Sword', description: 'Sharp.', causes: [effect('Blind')] })],
        monsters: [codexMonster({ slug: 'goblin', name: 'Goblin', events: ['Harvest'] })],
      },
      guide: {
        items: [adminItem({ id: 1, name: 'Iron Sword', codexUri: '/codex/items/a/' })],
        monsters: [adminMonster({ id: 2, name: 'Goblin', codexUri: '/codex/monsters/goblin/' })],
      },
      static: { statusEffects: [{ id: 1, name: 'Blind' }] },
    });
    const strings = LocaleStringsSchema.parse({
      locale: 'fr',
      items: { a: { name: 'Épée de fer', description: 'Tranchante.' } },
      statuses: { Blind: 'Aveugle' },
      events: { Harvest: 'Moisson' },
    });

    const fr = translateOrnaData(data, strings);
    expect(fr.codex.items[0]).toMatchObject({ name: 'Épée de fer', description: 'Tranchante.' });
    expect(fr.codex.items[0].causes[0].name).toBe('Aveugle');
    expect(fr.codex.monsters[0]).toMatchObject({ name: 'Goblin', events: ['Moisson'] });
    expect(fr.guide.items[0].name).toBe('Épée de fer');
    expect(fr.guide.monsters[0].name).toBe('Goblin');
    expect(fr.guide.static.statusEffects).toEqual([{ id: 1, name: 'Aveugle' }]);
    expect(data.codex.items[0].name).toBe('Iron Sword');
  });
});
