/**
 * Backup merger
 * Folds chronologically ordered backups into one snapshot. A later entity
 * replaces an earlier one with the same key wholesale; nothing is merged
 * field by field.
 */

import { emptyOrnaData } from '../data/store.js';
import { mergeLocaleDb } from '../translation.js';
import type { Backup } from './archive.js';
import type { CodexData, GuideData, GuideStatic, StaticEntry } from '../types.js';

/**
 * Union of both lists keyed by `keyOf`, newer entries winning. Entries keep
 * the position of their first appearance.
 */
export function mergeByKey<T, K>(older: readonly T[], newer: readonly T[], keyOf: (entry: T) => K): T[] {
  const merged = new Map<K, T>();
  for (const entry of older) merged.set(keyOf(entry), entry);
  for (const entry of newer) merged.set(keyOf(entry), entry);
  return [...merged.values()];
}

const bySlug = (entry: { slug: string }) => entry.slug;
const byId = (entry: { id: number }) => entry.id;

function mergeCodex(older: CodexData, newer: CodexData): CodexData {
  return {
    items: mergeByKey(older.items, newer.items, bySlug),
    monsters: mergeByKey(older.monsters, newer.monsters, bySlug),
    bosses: mergeByKey(older.bosses, newer.bosses, bySlug),
    raids: mergeByKey(older.raids, newer.raids, bySlug),
    skills: mergeByKey(older.skills, newer.skills, bySlug),
    followers: mergeByKey(older.followers, newer.followers, bySlug),
  };
}

function mergeStatic(older: GuideStatic, newer: GuideStatic): GuideStatic {
  const merge = (a: StaticEntry[], b: StaticEntry[]) => mergeByKey(a, b, byId);
  return {
    spawns: merge(older.spawns, newer.spawns),
    itemCategories: merge(older.itemCategories, newer.itemCategories),
    itemTypes: merge(older.itemTypes, newer.itemTypes),
    monsterFamilies: merge(older.monsterFamilies, newer.monsterFamilies),
    statusEffects: merge(older.statusEffects, newer.statusEffects),
    elements: merge(older.elements, newer.elements),
    equippedBys: merge(older.equippedBys, newer.equippedBys),
    skillTypes: merge(older.skillTypes, newer.skillTypes),
  };
}

function mergeGuide(older: GuideData, newer: GuideData): GuideData {
  return {
    items: mergeByKey(older.items, newer.items, byId),
    monsters: mergeByKey(older.monsters, newer.monsters, byId),
    skills: mergeByKey(older.skills, newer.skills, byId),
    pets: mergeByKey(older.pets, newer.pets, byId),
    static: mergeStatic(older.static, newer.static),
  };
}

export class BackupMerger {
  private current: Backup = {
    data: emptyOrnaData(),
    locales: { locales: {} },
    manualLocales: { locales: {} },
  };

  /** Fold in the next backup; it must be newer than everything added so far. */
  add(backup: Backup): this {
    this.current = {
      data: {
        codex: mergeCodex(this.current.data.codex, backup.data.codex),
        guide: mergeGuide(this.current.data.guide, backup.data.guide),
      },
      locales: mergeLocaleDb(this.current.locales, backup.locales),
      manualLocales: mergeLocaleDb(this.current.manualLocales, backup.manualLocales),
    };
    return this;
  }

  result(): Backup {
    return this.current;
  }
}

export function mergeBackups(backups: Iterable<Backup>): Backup {
  const merger = new BackupMerger();
  for (const backup of backups) merger.add(backup);
  return merger.result();
}
