/**
 * Generic codex monster
 * One accessor set over monsters, bosses and raids.
 */

import type { CodexGenericMonster, CodexRef } from '../types.js';
import { codexUri } from './uri.js';

/** Spawn names on the guide for raid tags on the codex. */
export const RAID_SPAWNS: Readonly<Partial<Record<string, string>>> = {
  'Kingdom Raid': 'Kingdom Raid',
  'World Raid': 'World Raid',
  'Other Realms Raid': 'Other Realms Raid',
};

export function monsterSlug(m: CodexGenericMonster): string {
  return m.kind === 'raids' ? m.raid.slug : m.monster.slug;
}

export function monsterUri(m: CodexGenericMonster): string {
  return codexUri(m.kind, monsterSlug(m));
}

export function monsterName(m: CodexGenericMonster): string {
  return m.kind === 'raids' ? m.raid.name : m.monster.name;
}

export function monsterIcon(m: CodexGenericMonster): string {
  return m.kind === 'raids' ? m.raid.icon : m.monster.icon;
}

/** Raids have no family. */
export function monsterFamily(m: CodexGenericMonster): string | null {
  return m.kind === 'raids' ? null : m.monster.family;
}

export function monsterEvents(m: CodexGenericMonster): string[] {
  return m.kind === 'raids' ? m.raid.events : m.monster.events;
}

export function monsterAbilities(m: CodexGenericMonster): CodexRef[] {
  return m.kind === 'raids' ? m.raid.abilities : m.monster.abilities;
}

export function monsterTags(m: CodexGenericMonster): string[] {
  return m.kind === 'raids' ? m.raid.tags : m.monster.tags;
}

/** Guide spawn names implied by the monster's raid tags, sorted. */
export function raidSpawnNames(m: CodexGenericMonster): string[] {
  return monsterTags(m)
    .map(tag => RAID_SPAWNS[tag])
    .filter((name): name is string => name !== undefined)
    .sort();
}
