import { describe, it, expect } from 'vitest';
import {
  CODEX_PARSERS,
  iconPath,
  parseCodexFollower,
  parseCodexItem,
  parseCodexList,
  parseCodexMonster,
  parseCodexSkill,
  parseItemStats,
  parseNameAndChance,
  parseTier,
} from '../src/sources/codexPages.js';
import { HtmlParseError } from '../src/errors.js';
import { codexFollower, codexItem, codexMonster, codexSkill, itemStats } from './fixtures.js';

const page = (body: string, icon = '/static/img/x.png') => `
<html><body>
<div class="codex-page">
  <h1 class="herotext">${body.match(/data-name="([^"]+)"/)?.[1] ?? 'Unnamed'}</h1>
  <div class="codex-page-icon"><img src="${icon}"></div>
  ${body}
</div>
</body></html>`;

describe('helpers', () => {
  it('reduces icon URLs to their image path', () => {
    expect(iconPath('https://playorna.com/static/img/items/iron_sword.png')).toBe('items/iron_sword.png');
    expect(iconPath('/static/img/monsters/goblin.png')).toBe('monsters/goblin.png');
    expect(iconPath('other/pic.png')).toBe('other/pic.png');
  });

  it('reads tiers with or without a label', () => {
    expect(parseTier('★7', 'test')).toBe(7);
    expect(parseTier('Tier: ★10', 'test')).toBe(10);
    expect(() => parseTier('Tier: ?', 'test')).toThrow(HtmlParseError);
  });

  it('splits a name from its chance', () => {
    expect(parseNameAndChance('Blind (20%)', 'test')).toEqual(['Blind', 20]);
    expect(parseNameAndChance('  Attack ↑  (12.5%) ', 'test')).toEqual(['Attack ↑', 12.5]);
    expect(() => parseNameAndChance('Blind', 'test')).toThrow('test: Expected "Name (N%)", got "Blind"');
  });

  it('parses item stat lines', () => {
    expect(parseItemStats(['Attack: 42 / Crit: +5', 'Fire', 'Luck: 3', 'Two handed'], 'test')).toEqual({
      attack: 42,
      crit: 5,
      element: 'Fire',
    });
    expect(() => parseItemStats(['Shiny'], 'test')).toThrow('test: Unknown stat "Shiny"');
  });
});

describe('parseCodexList', () => {
  it('reads entries from both link layouts and the next-page marker', () => {
    const html = `
      <div class="codex-entries">
        <a class="codex-entries-entry" href="/codex/items/iron-sword/">
          <img src="/static/img/items/iron_sword.png">
          <div>Iron Sword</div>
          <div class="codex-entries-entry-meta">Weapon</div>
          <div>★3</div>
        </a>
        <div class="codex-entries-entry">
          <img src="/static/img/items/wooden_shield.png">
          <div><a href="/codex/items/wooden-shield/">Wooden Shield</a></div>
          <div>Tier: ★1</div>
        </div>
      </div>
      <div class="pagination"><a href="?p=2">Next page</a></div>`;

    expect(parseCodexList(html)).toEqual({
      entries: [
        { slug: 'iron-sword', name: 'Iron Sword', tier: 3, uri: '/codex/items/iron-sword/' },
        { slug: 'wooden-shield', name: 'Wooden Shield', tier: 1, uri: '/codex/items/wooden-shield/' },
      ],
      hasNextPage: true,
    });
  });

  it('reports the last page', () => {
    expect(parseCodexList('<div class="codex-entries"></div>')).toEqual({ entries: [], hasNextPage: false });
  });

  it('rejects a page without entries', () => {
    expect(() => parseCodexList('<p>Maintenance</p>')).toThrow('codex list: No .codex-entries');
  });
});

describe('parseCodexItem', () => {
  const html = page(`
    <div class="codex-page-description" data-name="Iron Sword">A sharp blade.</div>
    <div class="codex-page-meta">Tier: ★3</div>
    <div class="codex-page-meta">Rarity: Ornate</div>
    <div class="codex-page-meta">Type: Weapon</div>
    <div class="codex-page-meta"><span class="exotic">Exotic</span></div>
    <div class="codex-page-tag">✓ Found in shops</div>
    <div class="codex-stats">
      <div class="codex-stat">Attack: 42 / Crit: +5</div>
      <div class="codex-stat">Fire</div>
    </div>
    <div>Ability: Cleave</div>
    <div class="codex-page-description">Hits twice.</div>
    <h4>Causes:</h4>
    <div><img src="/static/img/statuses/burning.png"> Burning</div>
    <hr>
    <h4>Gives:</h4>
    <div>Attack ↑ (15%)</div>
    <h4>Dropped by:</h4>
    <div><a href="/codex/monsters/goblin/"><img src="/static/img/monsters/goblin.png"> Goblin</a></div>
  `, 'https://playorna.com/static/img/items/iron_sword.png');

  it('reads every field of an item page', () => {
    expect(parseCodexItem(html, 'iron-sword')).toEqual(codexItem({
      slug: 'iron-sword',
      name: 'Iron Sword',
      icon: 'items/iron_sword.png',
      description: 'A sharp blade.',
      tier: 3,
      rarity: 'Ornate',
      itemType: 'Weapon',
      tags: ['Found in shops'],
      stats: itemStats({ attack: 42, crit: 5, element: 'Fire' }),
      ability: { name: 'Cleave', description: 'Hits twice.' },
      causes: [{ name: 'Burning', icon: 'statuses/burning.png', chance: null }],
      gives: [{ name: 'Attack ↑', icon: '', chance: 15 }],
      droppedBy: [{ name: 'Goblin', uri: '/codex/monsters/goblin/', icon: 'monsters/goblin.png' }],
    }));
  });

  it('refuses sections it does not know', () => {
    const withLore = page(`
      <div class="codex-page-description" data-name="Odd Ring">Odd.</div>
      <div class="codex-page-meta">Tier: ★1</div>
      <h4>Lore:</h4>
      <div>Once upon a time</div>
    `);
    expect(() => parseCodexItem(withLore, 'odd-ring')).toThrow('codex item odd-ring: Unknown section "Lore:"');
  });

  it('refuses pages that are not codex pages', () => {
    expect(() => parseCodexItem('<html><body><p>404</p></body></html>', 'gone')).toThrow('codex item gone: Not a codex page');
  });
});

describe('parseCodexMonster', () => {
  it('reads events, family, rarity, abilities and drops', () => {
    const html = page(`
      <div class="codex-page-meta" data-name="Goblin">Tier: ★2</div>
      <div class="codex-page-description codex-page-description-highlight">Events: Harvest / Frostfall</div>
      <div class="codex-page-description">Family: Goblinoid</div>
      <div class="codex-page-description">Rarity: Common</div>
      <h4>Abilities:</h4>
      <div><a href="/codex/spells/stab/"><img src="/static/img/skills/stab.png"> Stab</a></div>
      <h4>Drops:</h4>
      <div><a href="/codex/items/iron-sword/">Iron Sword</a></div>
    `, '/static/img/monsters/goblin.png');

    expect(parseCodexMonster(html, 'goblin')).toEqual(codexMonster({
      slug: 'goblin',
      name: 'Goblin',
      icon: 'monsters/goblin.png',
      tier: 2,
      family: 'Goblinoid',
      rarity: 'Common',
      events: ['Frostfall', 'Harvest'],
      abilities: [{ name: 'Stab', uri: '/codex/spells/stab/', icon: 'skills/stab.png' }],
      drops: [{ name: 'Iron Sword', uri: '/codex/items/iron-sword/', icon: '' }],
    }));
  });
});

describe('parseCodexSkill', () => {
  it('reads effects from the row span and ignores summons', () => {
    const html = page(`
      <div class="codex-page-description" data-name="Hex">Curses the target.</div>
      <div class="codex-page-meta">Tier: ★4</div>
      <div class="codex-page-tag">✓ Found in Arcanists</div>
      <h4>Causes:</h4>
      <div><img src="/static/img/statuses/blind.png"><span>Blind (20%)</span></div>
      <h4>Summons:</h4>
      <div>Imp</div>
    `);

    expect(parseCodexSkill(html, 'hex')).toEqual(codexSkill({
      slug: 'hex',
      name: 'Hex',
      icon: 'x.png',
      description: 'Curses the target.',
      tier: 4,
      tags: ['Found in Arcanists'],
      causes: [{ effect: 'Blind', chance: 20 }],
    }));
  });
});

describe('parseCodexFollower', () => {
  it('requires a rarity line', () => {
    const html = page(`
      <div class="codex-page-description" data-name="Wolf">Loyal.</div>
      <div class="codex-page-description">Rarity: Rare</div>
      <div class="codex-page-meta">Tier: ★2</div>
      <h4>Abilities:</h4>
      <div><a href="/codex/spells/bite/">Bite</a></div>
    `);

    expect(parseCodexFollower(html, 'wolf')).toEqual(codexFollower({
      slug: 'wolf',
      name: 'Wolf',
      icon: 'x.png',
      description: 'Loyal.',
      tier: 2,
      rarity: 'Rare',
      abilities: [{ name: 'Bite', uri: '/codex/spells/bite/', icon: '' }],
    }));
    expect(() => parseCodexFollower(page('<div class="codex-page-description" data-name="Wolf">Loyal.</div>'), 'wolf'))
      .toThrow('codex follower wolf: No rarity');
  });
});

describe('CODEX_PARSERS', () => {
  it('maps the spells section to the skill parser', () => {
    expect(CODEX_PARSERS.spells).toBe(parseCodexSkill);
    expect(CODEX_PARSERS.monsters).toBe(parseCodexMonster);
  });
});
