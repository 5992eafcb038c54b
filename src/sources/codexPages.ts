/**
 * Codex HTML
 * Parsers for the public codex: list pages and the entity pages of every
 * section. Pages are read into a neutral shape first, then each kind picks
 * what it needs and validates through its zod schema.
 */

import * as cheerio from 'cheerio';
import { parseCodexUri } from '../codex/uri.js';
import {
  CodexFollowerSchema,
  CodexItemSchema,
  CodexMonsterSchema,
  CodexRaidSchema,
  CodexSkillSchema,
} from '../data/schemas.js';
import { HtmlParseError } from '../errors.js';
import type {
  CodexEntityMap,
  CodexFollower,
  CodexItem,
  CodexKind,
  CodexListEntry,
  CodexMonster,
  CodexRaid,
  CodexSkill,
} from '../types.js';

// =============================================================================
// Helpers
// =============================================================================

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** `https://host/static/img/items/x.png` -> `items/x.png` */
export function iconPath(src: string): string {
  let path = /^[a-z]+:\/\//i.test(src) ? new URL(src).pathname : src;
  if (path.startsWith('/static/img')) path = path.slice('/static/img'.length);
  return path.replace(/^\/+/, '');
}

/** `★7` or `Tier: ★7` -> 7 */
export function parseTier(text: string, context: string): number {
  const value = text.includes(':') ? text.slice(text.indexOf(':') + 1) : text;
  const tier = Number.parseInt(value.trim().replace(/^★/, ''), 10);
  if (Number.isNaN(tier)) throw new HtmlParseError(context, `Invalid tier "${text}"`);
  return tier;
}

/** `Blind (20%)` -> ['Blind', 20] */
export function parseNameAndChance(text: string, context: string): [string, number] {
  const match = clean(text).match(/^(.*?)\s*\((-?\d+(?:\.\d+)?)%?\)$/);
  if (!match) throw new HtmlParseError(context, `Expected "Name (N%)", got "${clean(text)}"`);
  return [match[1], Number(match[2])];
}

/** Right side of `Label: value`, or null without a colon. */
function afterColon(text: string): string | null {
  const pos = text.indexOf(':');
  return pos === -1 ? null : text.slice(pos + 1).trim();
}

// =============================================================================
// List pages
// =============================================================================

export interface CodexListPage {
  entries: CodexListEntry[];
  hasNextPage: boolean;
}

export function parseCodexList(html: string): CodexListPage {
  const $ = cheerio.load(html);
  if ($('.codex-entries').length === 0) throw new HtmlParseError('codex list', 'No .codex-entries');

  const entries: CodexListEntry[] = [];
  $('.codex-entries .codex-entries-entry').each((_, el) => {
    const entry = $(el);
    const uri = entry.is('a') ? entry.attr('href') : entry.find('a').first().attr('href');
    const parts = uri ? parseCodexUri(uri) : null;
    if (!uri || !parts) throw new HtmlParseError('codex list', `Entry without a codex link: "${clean(entry.text())}"`);

    // Children: icon, name, optional meta, tier.
    const children = entry.children().not('img').toArray().map(child => $(child));
    const text = children.filter(child => !child.hasClass('codex-entries-entry-meta')).map(child => clean(child.text()));
    const [name, tierText] = text;
    if (!name || !tierText) throw new HtmlParseError('codex list', `Incomplete entry for ${uri}`);

    entries.push({ slug: parts.slug, name, tier: parseTier(tierText, `codex list ${uri}`), uri });
  });

  return { entries, hasNextPage: $('.pagination').text().includes('Next page') };
}

// =============================================================================
// Entity pages
// =============================================================================

/** One div under an `<h4>` section header. */
export interface SectionRow {
  text: string;
  /** Text of the first span, where the row has one. */
  span: string | null;
  href: string | null;
  icon: string;
}

interface Description {
  text: string;
  highlight: boolean;
  /** Text of the element right before this one. */
  previous: string;
}

export interface CodexPage {
  name: string;
  icon: string;
  descriptions: Description[];
  meta: string[];
  tags: string[];
  stats: string[] | null;
  sections: Map<string, SectionRow[]>;
}

export function readCodexPage(html: string, context: string): CodexPage {
  const $ = cheerio.load(html);
  const page = $('.codex-page').first();
  const name = clean($('.herotext').first().text());
  if (page.length === 0 || !name) throw new HtmlParseError(context, 'Not a codex page');

  const iconSrc = page.find('.codex-page-icon img').first().attr('src');
  if (!iconSrc) throw new HtmlParseError(context, 'No page icon');

  const descriptions: Description[] = [];
  page.find('.codex-page-description').each((_, el) => {
    const node = $(el);
    descriptions.push({
      text: clean(node.text()),
      highlight: node.hasClass('codex-page-description-highlight'),
      previous: clean(node.prev().text()),
    });
  });

  const meta: string[] = [];
  page.find('.codex-page-meta').each((_, el) => {
    const node = $(el);
    // The exotic marker carries no label.
    if (node.find('.exotic').length === 0) meta.push(clean(node.text()));
  });

  const tags: string[] = [];
  page.find('.codex-page-tag').each((_, el) => {
    tags.push(clean($(el).text()).replace(/^✓\s*/, ''));
  });

  const statsRoot = page.find('.codex-stats').first();
  const stats = statsRoot.length === 0 ? null : statsRoot.find('.codex-stat').toArray().map(el => clean($(el).text()));

  const sections = new Map<string, SectionRow[]>();
  page.find('h4').each((_, el) => {
    const header = clean($(el).text());
    const rows: SectionRow[] = [];
    $(el).nextAll().each((_, sibling) => {
      const node = $(sibling);
      if (node.is('h4') || node.is('hr')) return false;
      if (!node.is('div')) throw new HtmlParseError(context, `Unexpected <${sibling.tagName}> under "${header}"`);
      const span = node.find('span').first();
      const src = node.find('img').first().attr('src');
      rows.push({
        text: clean(node.text()),
        span: span.length > 0 ? clean(span.text()) : null,
        href: node.find('a').first().attr('href') ?? null,
        icon: src ? iconPath(src) : '',
      });
      return undefined;
    });
    sections.set(header, rows);
  });

  return { name, icon: iconPath(iconSrc), descriptions, meta, tags, stats, sections };
}

function checkSections(page: CodexPage, known: readonly string[], context: string): void {
  for (const header of page.sections.keys()) {
    if (!known.includes(header)) throw new HtmlParseError(context, `Unknown section "${header}"`);
  }
}

function refs(page: CodexPage, header: string, context: string) {
  return (page.sections.get(header) ?? []).map(row => {
    if (!row.href) throw new HtmlParseError(context, `"${row.text}" under "${header}" has no link`);
    return { name: row.text, uri: row.href, icon: row.icon };
  });
}

function metaValue(page: CodexPage, label: string): string | null {
  const line = page.meta.find(text => text.startsWith(`${label}:`));
  return line === undefined ? null : afterColon(line);
}

function pageTier(page: CodexPage, context: string): number {
  const tier = metaValue(page, 'Tier');
  if (tier === null) throw new HtmlParseError(context, 'No tier');
  return parseTier(tier, context);
}

/** Events line (`Events: A / B`), sorted. */
function parseEvents(text: string): string[] {
  return (afterColon(text) ?? '').split('/').map(ev => ev.trim()).filter(Boolean).sort();
}

// =============================================================================
// Items
// =============================================================================

const ITEM_STATS: Record<string, string> = {
  'Attack:': 'attack',
  'Magic:': 'magic',
  'HP:': 'hp',
  'Mana:': 'mana',
  'Defense:': 'defense',
  'Resistance:': 'resistance',
  'Ward:': 'ward',
  'Dexterity:': 'dexterity',
  'Crit:': 'crit',
  'Foresight:': 'foresight',
  'Adornment Slots:': 'adornmentSlots',
};

const ELEMENTS = ['Fire', 'Water', 'Earthen', 'Lightning', 'Holy', 'Dark', 'Arcane', 'Dragon', 'Physical'];

export function parseItemStats(lines: readonly string[], context: string): Record<string, number | string> {
  const stats: Record<string, number | string> = {};
  for (const stat of lines.flatMap(line => line.split(' / ')).map(clean)) {
    const pos = stat.indexOf(':');
    if (pos === -1) {
      if (ELEMENTS.includes(stat)) stats.element = stat;
      else if (stat !== 'Two handed') throw new HtmlParseError(context, `Unknown stat "${stat}"`);
      continue;
    }
    const key = ITEM_STATS[stat.slice(0, pos + 1)];
    // Stats the guide has no field for are skipped.
    if (!key) continue;
    const value = Number(stat.slice(pos + 1).trim().replace(/%$/, '').replace(/^\+/, ''));
    if (Number.isNaN(value)) throw new HtmlParseError(context, `Invalid stat value "${stat}"`);
    stats[key] = value;
  }
  return stats;
}

const ITEM_SECTIONS = ['Causes:', 'Gives:', 'Cures:', 'Immunities:', 'Dropped by:', 'Upgrade materials:'];

export function parseCodexItem(html: string, slug: string): CodexItem {
  const context = `codex item ${slug}`;
  const page = readCodexPage(html, context);
  checkSections(page, ITEM_SECTIONS, context);

  const [description, abilityNode] = page.descriptions;
  if (!description) throw new HtmlParseError(context, 'No description');

  let ability: { name: string; description: string } | null = null;
  if (abilityNode) {
    if (!abilityNode.previous.startsWith('Ability:')) {
      throw new HtmlParseError(context, `Expected "Ability:", got "${abilityNode.previous}"`);
    }
    ability = { name: afterColon(abilityNode.previous) ?? '', description: abilityNode.text };
  }

  const effects = (header: string) =>
    (page.sections.get(header) ?? []).map(row => ({ name: row.text, icon: row.icon }));

  return CodexItemSchema.parse({
    slug,
    name: page.name,
    icon: page.icon,
    description: description.text,
    tier: pageTier(page, context),
    rarity: metaValue(page, 'Rarity'),
    itemType: metaValue(page, 'Type'),
    tags: page.tags,
    stats: page.stats === null ? null : parseItemStats(page.stats, context),
    ability,
    causes: effects('Causes:'),
    cures: effects('Cures:'),
    immunities: effects('Immunities:'),
    gives: (page.sections.get('Gives:') ?? []).map(row => {
      const [name, chance] = parseNameAndChance(row.text, context);
      return { name, icon: row.icon, chance };
    }),
    droppedBy: refs(page, 'Dropped by:', context),
    upgradeMaterials: refs(page, 'Upgrade materials:', context),
  });
}

// =============================================================================
// Monsters, bosses, raids
// =============================================================================

interface MonsterDescription {
  description: string | null;
  events: string[];
  family: string | null;
  rarity: string | null;
}

/**
 * Description blocks of monster-like pages: an optional description, an
 * optional highlighted events line, then family and rarity.
 */
function monsterDescription(page: CodexPage, hasDescription: boolean, context: string): MonsterDescription {
  const nodes = [...page.descriptions];
  const description = hasDescription ? nodes.shift()?.text ?? null : null;

  let events: string[] = [];
  if (nodes[0]?.highlight && nodes[0].text.includes(':')) {
    events = parseEvents(nodes[0].text);
    nodes.shift();
  }

  if (nodes.length === 2) {
    const [family, rarity] = nodes.map(node => afterColon(node.text));
    if (family === null || rarity === null) throw new HtmlParseError(context, 'Family or rarity without a colon');
    return { description, events, family, rarity };
  }
  return { description, events, family: null, rarity: null };
}

const MONSTER_SECTIONS = ['Abilities:', 'Drops:'];

function parseMonsterPage(html: string, slug: string, kind: string): CodexMonster {
  const context = `codex ${kind} ${slug}`;
  const page = readCodexPage(html, context);
  checkSections(page, MONSTER_SECTIONS, context);
  const { events, family, rarity } = monsterDescription(page, false, context);

  return CodexMonsterSchema.parse({
    slug,
    name: page.name,
    icon: page.icon,
    tier: pageTier(page, context),
    family,
    rarity,
    events,
    tags: page.tags,
    abilities: refs(page, 'Abilities:', context),
    drops: refs(page, 'Drops:', context),
  });
}

export function parseCodexMonster(html: string, slug: string): CodexMonster {
  return parseMonsterPage(html, slug, 'monster');
}

export function parseCodexBoss(html: string, slug: string): CodexMonster {
  return parseMonsterPage(html, slug, 'boss');
}

export function parseCodexRaid(html: string, slug: string): CodexRaid {
  const context = `codex raid ${slug}`;
  const page = readCodexPage(html, context);
  checkSections(page, MONSTER_SECTIONS, context);
  const { description, events } = monsterDescription(page, true, context);

  return CodexRaidSchema.parse({
    slug,
    name: page.name,
    description: description ?? '',
    icon: page.icon,
    tier: pageTier(page, context),
    events,
    tags: page.tags,
    abilities: refs(page, 'Abilities:', context),
    drops: refs(page, 'Drops:', context),
  });
}

// =============================================================================
// Skills
// =============================================================================

export function parseCodexSkill(html: string, slug: string): CodexSkill {
  const context = `codex spell ${slug}`;
  const page = readCodexPage(html, context);
  checkSections(page, ['Causes:', 'Gives:', 'Summons:'], context);

  const [description] = page.descriptions;
  if (!description) throw new HtmlParseError(context, 'No description');

  const effects = (header: string) =>
    (page.sections.get(header) ?? []).map(row => {
      const [effect, chance] = parseNameAndChance(row.span ?? row.text, context);
      return { effect, chance };
    });

  return CodexSkillSchema.parse({
    slug,
    name: page.name,
    icon: page.icon,
    description: description.text,
    tier: pageTier(page, context),
    tags: page.tags,
    causes: effects('Causes:'),
    gives: effects('Gives:'),
  });
}

// =============================================================================
// Followers
// =============================================================================

export function parseCodexFollower(html: string, slug: string): CodexFollower {
  const context = `codex follower ${slug}`;
  const page = readCodexPage(html, context);
  checkSections(page, ['Abilities:'], context);

  const nodes = [...page.descriptions];
  const description = nodes.shift();
  if (!description) throw new HtmlParseError(context, 'No description');
  let events: string[] = [];
  if (nodes[0]?.highlight && nodes[0].text.includes(':')) {
    events = parseEvents(nodes[0].text);
    nodes.shift();
  }
  const rarityNode = nodes.shift();
  const rarity = rarityNode ? afterColon(rarityNode.text) : null;
  if (rarity === null) throw new HtmlParseError(context, 'No rarity');

  return CodexFollowerSchema.parse({
    slug,
    name: page.name,
    icon: page.icon,
    description: description.text,
    tier: pageTier(page, context),
    rarity,
    events,
    abilities: refs(page, 'Abilities:', context),
  });
}

// =============================================================================
// By kind
// =============================================================================

type CodexParsers = { [K in CodexKind]: (html: string, slug: string) => CodexEntityMap[K] };

export const CODEX_PARSERS: CodexParsers = {
  items: parseCodexItem,
  monsters: parseCodexMonster,
  bosses: parseCodexBoss,
  raids: parseCodexRaid,
  spells: parseCodexSkill,
  followers: parseCodexFollower,
};
