import { describe, it, expect } from 'vitest';
import { matchItems } from '../src/matching/items.js';
import {
  adminItem,
  adminMonster,
  codexItem,
  effect,
  itemStats,
  matcherContext,
  ornaData,
  ref,
} from './fixtures.js';

const sword = codexItem({ slug: 'iron-sword', name: 'Iron Sword', description: 'A sharp blade.' });
const swordOnGuide = adminItem({ id: 1, name: 'Iron Sword', codexUri: '/codex/items/iron-sword/', description: 'A sharp blade.' });

describe('matchItems', () => {
  it('counts an item that agrees on every field as matched', async () => {
    const ctx = matcherContext(ornaData({ codex: { items: [sword] }, guide: { items: [swordOnGuide] } }));
    const result = await matchItems(ctx);
    expect(result).toMatchObject({ checked: 1, matched: 1, mismatches: [], errors: [] });
    expect(ctx.guide.calls).toEqual([]);
  });

  it('reports stat differences with both values', async () => {
    const codex = codexItem({ slug: 'iron-sword', name: 'Iron Sword', description: 'A sharp blade.', stats: itemStats({ attack: 10 }) });
    const guide = adminItem({ ...swordOnGuide, attack: 8 });
    const ctx = matcherContext(ornaData({ codex: { items: [codex] }, guide: { items: [guide] } }));

    const result = await matchItems(ctx);
    expect(result.mismatches).toEqual([
      { entity: 'Iron Sword', id: 1, field: 'attack', codex: '10', guide: '8', fixed: false },
    ]);
    expect(result).toMatchObject({ checked: 1, matched: 0, fixed: 0 });
  });

  it('fixes a field from a fresh copy and confirms it', async () => {
    const guide = adminItem({ ...swordOnGuide, description: 'Old text' });
    const ctx = matcherContext(ornaData({ codex: { items: [sword] }, guide: { items: [guide] } }), true);

    const result = await matchItems(ctx);
    expect(ctx.guide.calls).toEqual(['fetch items #1', 'save items #1', 'fetch items #1']);
    expect(ctx.guide.get('items', 1)?.description).toBe('A sharp blade.');
    expect(ctx.store.guide.items.getById(1).description).toBe('A sharp blade.');
    expect(result.fixed).toBe(1);
    expect(result.errors).toEqual([]);
  });

  it('records a fix that did not persist and carries on', async () => {
    const guide = adminItem({ ...swordOnGuide, description: 'Old text' });
    const shield = codexItem({ slug: 'wooden-shield', name: 'Wooden Shield' });
    const shieldOnGuide = adminItem({ id: 2, name: 'Wooden Shield', codexUri: '/codex/items/wooden-shield/' });
    const ctx = matcherContext(ornaData({ codex: { items: [sword, shield] }, guide: { items: [guide, shieldOnGuide] } }), true);
    ctx.guide.dropSaves = true;

    const result = await matchItems(ctx);
    expect(result.errors).toEqual([
      { entity: 'Iron Sword', message: 'Fix of Iron Sword.description did not persist on the guide' },
    ]);
    expect(result).toMatchObject({ checked: 1, matched: 1, fixed: 0 });
  });

  it('adds element statuses to a weapon\'s causes', async () => {
    const codex = codexItem({
      slug: 'iron-sword',
      name: 'Iron Sword',
      description: 'A sharp blade.',
      stats: itemStats({ element: 'Fire' }),
      causes: [effect('Blind')],
    });
    const guide = adminItem({ ...swordOnGuide, type: 1, element: 1, causes: [2] });
    const ctx = matcherContext(ornaData({
      codex: { items: [codex] },
      guide: { items: [guide] },
      static: {
        itemTypes: [{ id: 1, name: 'Weapon' }],
        elements: [{ id: 1, name: 'Fire' }],
        statusEffects: [{ id: 1, name: 'Burning' }, { id: 2, name: 'Blind' }],
      },
    }));

    const result = await matchItems(ctx);
    expect(result.mismatches).toEqual([
      { entity: 'Iron Sword', id: 1, field: 'causes', codex: '[Burning, Blind]', guide: '[Blind]', fixed: false },
    ]);
  });

  it('fixes dropped-by on the monsters that hold the drop', async () => {
    const codex = codexItem({
      slug: 'iron-sword',
      name: 'Iron Sword',
      description: 'A sharp blade.',
      droppedBy: [ref('Goblin', '/codex/monsters/goblin/')],
    });
    const ctx = matcherContext(ornaData({
      codex: { items: [codex] },
      guide: {
        items: [swordOnGuide],
        monsters: [
          adminMonster({ id: 10, name: 'Goblin', codexUri: '/codex/monsters/goblin/' }),
          adminMonster({ id: 11, name: 'Orc', codexUri: '/codex/monsters/orc/', drops: [1] }),
          adminMonster({ id: 12, name: 'Training Dummy', drops: [1] }),
        ],
      },
    }), true);

    const result = await matchItems(ctx);
    expect(result.mismatches[0]).toMatchObject({ field: 'dropped_by', codex: '[Goblin]', guide: '[Orc]', fixed: true });
    expect(ctx.guide.calls).toEqual([
      'fetch monsters #11', 'save monsters #11', 'fetch monsters #11',
      'fetch monsters #10', 'save monsters #10', 'fetch monsters #10',
    ]);
    expect(ctx.guide.get('monsters', 10)?.drops).toEqual([1]);
    expect(ctx.guide.get('monsters', 11)?.drops).toEqual([]);
    expect(ctx.store.guide.monsters.getById(10).drops).toEqual([1]);
    expect(ctx.guide.get('monsters', 12)?.drops).toEqual([1]);
  });

  it('creates missing items and leaves them out of this pass', async () => {
    const axe = codexItem({ slug: 'steel-axe', name: 'Steel Axe', tier: 3, stats: itemStats({ attack: 40, adornmentSlots: 2 }) });
    const ctx = matcherContext(ornaData({ codex: { items: [sword, axe] }, guide: { items: [swordOnGuide] } }), true);

    const result = await matchItems(ctx);
    expect(result.missingOnGuide).toEqual(['Steel Axe (/codex/items/steel-axe/)']);
    expect(result.created).toEqual(['Steel Axe']);
    expect(result.checked).toBe(1);
    expect(ctx.guide.calls).toEqual(['add items Steel Axe', 'list items', 'fetch items #1000']);

    const added = ctx.store.guide.items.getByUri('/codex/items/steel-axe/');
    expect(added).toMatchObject({ id: 1000, name: 'Steel Axe', tier: 3, attack: 40, baseAdornmentSlots: 2, hasSlots: true });
  });

  it('only lists missing items outside fix mode', async () => {
    const axe = codexItem({ slug: 'steel-axe', name: 'Steel Axe' });
    const ctx = matcherContext(ornaData({ codex: { items: [sword, axe] }, guide: { items: [swordOnGuide] } }));
    const result = await matchItems(ctx);
    expect(result.missingOnGuide).toEqual(['Steel Axe (/codex/items/steel-axe/)']);
    expect(result.created).toEqual([]);
    expect(ctx.guide.calls).toEqual([]);
  });

  it('records ambiguous and dangling guide entries as errors', async () => {
    const ctx = matcherContext(ornaData({
      codex: { items: [sword] },
      guide: {
        items: [
          swordOnGuide,
          adminItem({ id: 2, name: 'Iron Sword (copy)', codexUri: '/codex/items/iron-sword/' }),
          adminItem({ id: 3, name: 'Ghost', codexUri: '/codex/items/ghost/' }),
          adminItem({ id: 4, name: 'Guide Only' }),
        ],
      },
    }));

    const result = await matchItems(ctx);
    expect(result.notOnCodex).toEqual(['Ghost (#3) → /codex/items/ghost/']);
    expect(result.unmatched).toEqual(['Guide Only (#4)']);
    expect(result.errors).toEqual([
      { entity: 'Ghost (#3)', message: 'No codex entity found for "/codex/items/ghost/"' },
      { entity: 'Iron Sword', message: 'Ambiguous guide items entry for "/codex/items/iron-sword/": 2 matches' },
    ]);
    expect(result.checked).toBe(0);
  });
});
