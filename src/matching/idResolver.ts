/**
 * Id Resolver
 * Turns codex-side references (URIs, effect names, event names) into guide ids.
 *
 * Conversions never throw on a broken reference. The result carries both the
 * ids that resolved and the keys that did not; callers decide whether to keep
 * the resolved subset (`useResolved`) or refuse it (`requireComplete`).
 */

import { PartialConversionError } from '../errors.js';
import { monsterAbilities } from '../codex/genericMonster.js';
import { guideStatusName, type MatchConfig } from './config.js';
import type { GuideStore, StaticCollection } from '../data/store.js';
import type { CodexFollower, CodexGenericMonster, CodexItem, CodexRef, CodexSkill } from '../types.js';

export type ConversionCategory =
  | 'droppedBy'
  | 'upgradeMaterials'
  | 'abilities'
  | 'events'
  | 'statusEffects'
  | 'spawns'
  | 'element'
  | 'family';

export interface Conversion {
  category: ConversionCategory;
  /** Resolved ids, in input order. */
  ids: number[];
  /** Keys that did not resolve, in input order. */
  failures: string[];
}

export function resolveIds<T>(
  category: ConversionCategory,
  refs: readonly T[],
  keyOf: (ref: T) => string,
  lookup: (key: string) => number | undefined,
): Conversion {
  const ids: number[] = [];
  const failures: string[] = [];
  for (const ref of refs) {
    const key = keyOf(ref);
    const id = lookup(key);
    if (id === undefined) failures.push(key);
    else ids.push(id);
  }
  return { category, ids, failures };
}

export function isPartial(conversion: Conversion): boolean {
  return conversion.failures.length > 0;
}

/** Keep what resolved; report the rest through `onFailures`. */
export function useResolved(
  conversion: Conversion,
  onFailures: (category: ConversionCategory, failures: readonly string[]) => void,
): number[] {
  if (isPartial(conversion)) onFailures(conversion.category, conversion.failures);
  return conversion.ids;
}

export function requireComplete(conversion: Conversion): number[] {
  if (isPartial(conversion)) {
    throw new PartialConversionError(conversion.category, conversion.ids, conversion.failures);
  }
  return conversion.ids;
}

// =============================================================================
// Name helpers
// =============================================================================

const EVENT_PREFIXES = ['Event: ', 'Past Event: '];

/** Event name of an event spawn (`Event: X` / `Past Event: X`), or null. */
export function eventName(spawnName: string): string | null {
  for (const prefix of EVENT_PREFIXES) {
    if (spawnName.startsWith(prefix)) return spawnName.slice(prefix.length);
  }
  return null;
}

/**
 * Guide names carry annotations such as `Foo [off-hand]` or `Bar [temp]`;
 * strip them for comparisons against the codex.
 */
export function sanitizeGuideName(name: string): string {
  const pos = name.indexOf(' [');
  return pos === -1 ? name : name.slice(0, pos);
}

// =============================================================================
// Reference conversions
// =============================================================================

function guideIdByUri<T extends { id: number }>(
  find: (uri: string) => T | undefined,
): (uri: string) => number | undefined {
  return uri => find(uri)?.id;
}

/** Codex "dropped by" list → guide monster ids. */
export function itemDroppedByIds(item: CodexItem, guide: GuideStore): Conversion {
  return resolveIds('droppedBy', item.droppedBy, ref => ref.uri, guideIdByUri(uri => guide.monsters.findByUri(uri)));
}

/** Codex upgrade materials → guide item ids. */
export function itemUpgradeMaterialIds(item: CodexItem, guide: GuideStore): Conversion {
  return resolveIds('upgradeMaterials', item.upgradeMaterials, ref => ref.uri, guideIdByUri(uri => guide.items.findByUri(uri)));
}

/** Ability references → guide skill ids. */
export function abilityIds(abilities: readonly CodexRef[], guide: GuideStore): Conversion {
  return resolveIds('abilities', abilities, ref => ref.uri, guideIdByUri(uri => guide.skills.findByUri(uri)));
}

export function monsterAbilityIds(monster: CodexGenericMonster, guide: GuideStore): Conversion {
  return abilityIds(monsterAbilities(monster), guide);
}

export function followerAbilityIds(follower: CodexFollower, guide: GuideStore): Conversion {
  return abilityIds(follower.abilities, guide);
}

/** Codex event names → ids of the matching guide event spawns. */
export function eventSpawnIds(events: readonly string[], spawns: StaticCollection): Conversion {
  const byEvent = new Map<string, number>();
  for (const spawn of spawns.entries) {
    const name = eventName(spawn.name);
    // `Event: X` wins over `Past Event: X`.
    if (name !== null && (!byEvent.has(name) || spawn.name.startsWith('Event: '))) {
      byEvent.set(name, spawn.id);
    }
  }
  return resolveIds('events', events, event => event, event => byEvent.get(event));
}

/** Codex status effect names → guide status effect ids, through the rename table. */
export function statusEffectIds(
  names: readonly string[],
  statusEffects: StaticCollection,
  config: MatchConfig,
): Conversion {
  return resolveIds(
    'statusEffects',
    names,
    name => guideStatusName(config, name),
    name => statusEffects.findByName(name)?.id,
  );
}

export function skillCausesIds(skill: CodexSkill, guide: GuideStore, config: MatchConfig): Conversion {
  return statusEffectIds(skill.causes.map(c => c.effect), guide.static.statusEffects, config);
}

export function skillGivesIds(skill: CodexSkill, guide: GuideStore, config: MatchConfig): Conversion {
  return statusEffectIds(skill.gives.map(g => g.effect), guide.static.statusEffects, config);
}

export function spawnIdsByName(names: readonly string[], spawns: StaticCollection): Conversion {
  return resolveIds('spawns', names, name => name, name => spawns.findByName(name)?.id);
}

/** Single optional reference by name; `null` passes through as "no value". */
export function optionalStaticId(
  category: ConversionCategory,
  name: string | null,
  collection: StaticCollection,
): Conversion {
  return resolveIds(category, name === null ? [] : [name], n => n, n => collection.findByName(n)?.id);
}
