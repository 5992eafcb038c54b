/**
 * Locale overlays
 * Merging of locale dictionaries and translated copies of a snapshot.
 */

import { parseCodexUri } from './codex/uri.js';
import type { CodexKind, LocaleDb, LocaleStrings, OrnaData, StaticEntry } from './types.js';

type TextMap = LocaleStrings['items'];
type TranslatedText = TextMap[string];

// =============================================================================
// Merging
// =============================================================================

/** Per-key union of two locale dictionaries; `b` wins on conflicts. */
export function mergeLocaleStrings(a: LocaleStrings, b: LocaleStrings): LocaleStrings {
  return {
    locale: b.locale,
    items: { ...a.items, ...b.items },
    monsters: { ...a.monsters, ...b.monsters },
    bosses: { ...a.bosses, ...b.bosses },
    raids: { ...a.raids, ...b.raids },
    skills: { ...a.skills, ...b.skills },
    followers: { ...a.followers, ...b.followers },
    statuses: { ...a.statuses, ...b.statuses },
    events: { ...a.events, ...b.events },
    spawns: { ...a.spawns, ...b.spawns },
    families: { ...a.families, ...b.families },
    rarities: { ...a.rarities, ...b.rarities },
  };
}

/** Merge by locale, then by slug. Locales only in one side are kept as they are. */
export function mergeLocaleDb(a: LocaleDb, b: LocaleDb): LocaleDb {
  const locales: Record<string, LocaleStrings> = { ...a.locales };
  for (const [locale, strings] of Object.entries(b.locales)) {
    const older = locales[locale];
    locales[locale] = older ? mergeLocaleStrings(older, strings) : strings;
  }
  return { locales };
}

/** Hand-written strings take precedence over fetched ones. */
export function withManualOverrides(auto: LocaleDb, manual: LocaleDb): LocaleDb {
  return mergeLocaleDb(auto, manual);
}

// =============================================================================
// Translation
// =============================================================================

function textFor(strings: LocaleStrings, kind: CodexKind, slug: string): TranslatedText | undefined {
  switch (kind) {
    case 'items': return strings.items[slug];
    case 'monsters': return strings.monsters[slug];
    case 'bosses': return strings.bosses[slug];
    case 'raids': return strings.raids[slug];
    case 'spells': return strings.skills[slug];
    case 'followers': return strings.followers[slug];
  }
}

function translateText(entity: { name: string; description?: string }, text: TranslatedText | undefined): void {
  if (!text) return;
  entity.name = text.name;
  if (text.description !== undefined && entity.description !== undefined) entity.description = text.description;
}

function translateStatics(entries: StaticEntry[], names: Record<string, string>): void {
  for (const entry of entries) entry.name = names[entry.name] ?? entry.name;
}

/**
 * Deep copy of `data` with names and descriptions replaced from `strings`.
 * Entries without a translation keep their original text; `data` itself is
 * left untouched.
 */
export function translateOrnaData(data: OrnaData, strings: LocaleStrings): OrnaData {
  const copy = structuredClone(data);
  const { codex, guide } = copy;
  const status = (name: string) => strings.statuses[name] ?? name;

  for (const item of codex.items) {
    translateText(item, strings.items[item.slug]);
    for (const effect of [...item.causes, ...item.cures, ...item.gives, ...item.immunities]) {
      effect.name = status(effect.name);
    }
    if (item.rarity !== null) item.rarity = strings.rarities[item.rarity] ?? item.rarity;
  }
  for (const [monsters, texts] of [[codex.monsters, strings.monsters], [codex.bosses, strings.bosses]] as const) {
    for (const monster of monsters) {
      translateText(monster, texts[monster.slug]);
      if (monster.family !== null) monster.family = strings.families[monster.family] ?? monster.family;
      monster.events = monster.events.map(e => strings.events[e] ?? e);
    }
  }
  for (const raid of codex.raids) {
    translateText(raid, strings.raids[raid.slug]);
    raid.events = raid.events.map(e => strings.events[e] ?? e);
  }
  for (const skill of codex.skills) {
    translateText(skill, strings.skills[skill.slug]);
    for (const effect of [...skill.causes, ...skill.gives]) effect.effect = status(effect.effect);
  }
  for (const follower of codex.followers) {
    translateText(follower, strings.followers[follower.slug]);
    follower.events = follower.events.map(e => strings.events[e] ?? e);
  }

  for (const entity of [...guide.items, ...guide.monsters, ...guide.skills, ...guide.pets]) {
    const parts = parseCodexUri(entity.codexUri);
    const text = parts ? textFor(strings, parts.kind, parts.slug) : undefined;
    if (text) entity.name = text.name;
  }
  translateStatics(guide.static.statusEffects, strings.statuses);
  translateStatics(guide.static.spawns, strings.spawns);
  translateStatics(guide.static.monsterFamilies, strings.families);

  return copy;
}
