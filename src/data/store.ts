/**
 * Entity Store
 * In-memory collections over a snapshot, with slug/id/URI lookup indices.
 * The matchers mutate these in place while fixing.
 */

import { LookupError } from '../errors.js';
import { codexKey, codexKeyOfUri, parseCodexUri } from '../codex/uri.js';
import type {
  AdminItem,
  AdminMonster,
  AdminPet,
  AdminSkill,
  CodexBoss,
  CodexData,
  CodexFollower,
  CodexGenericMonster,
  CodexItem,
  CodexKind,
  CodexMonster,
  CodexRaid,
  CodexSkill,
  GuideData,
  GuideStatic,
  OrnaData,
  StaticEntry,
  StaticKind,
} from '../types.js';

// =============================================================================
// Codex
// =============================================================================

export class CodexCollection<T extends { slug: string }> {
  private bySlug = new Map<string, T>();
  private list: T[];

  constructor(public readonly kind: CodexKind, entries: readonly T[]) {
    this.list = [...entries];
    for (const entry of this.list) this.bySlug.set(entry.slug, entry);
  }

  get entries(): readonly T[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  findBySlug(slug: string): T | undefined {
    return this.bySlug.get(slug);
  }

  getBySlug(slug: string): T {
    const entry = this.bySlug.get(slug);
    if (!entry) throw new LookupError(`codex ${this.kind} entry`, slug);
    return entry;
  }

  /** Undefined when the URI belongs to another codex section. */
  findByUri(uri: string): T | undefined {
    const parts = parseCodexUri(uri);
    if (!parts || parts.kind !== this.kind) return undefined;
    return this.bySlug.get(parts.slug);
  }

  getByUri(uri: string): T {
    const entry = this.findByUri(uri);
    if (!entry) throw new LookupError(`codex ${this.kind} entry`, uri);
    return entry;
  }

  /** Insert or replace by slug. */
  upsert(entry: T): void {
    const index = this.list.findIndex(e => e.slug === entry.slug);
    if (index === -1) this.list.push(entry);
    else this.list[index] = entry;
    this.bySlug.set(entry.slug, entry);
  }
}

export class CodexStore {
  readonly items: CodexCollection<CodexItem>;
  readonly monsters: CodexCollection<CodexMonster>;
  readonly bosses: CodexCollection<CodexBoss>;
  readonly raids: CodexCollection<CodexRaid>;
  readonly skills: CodexCollection<CodexSkill>;
  readonly followers: CodexCollection<CodexFollower>;

  constructor(data: CodexData) {
    this.items = new CodexCollection('items', data.items);
    this.monsters = new CodexCollection('monsters', data.monsters);
    this.bosses = new CodexCollection('bosses', data.bosses);
    this.raids = new CodexCollection('raids', data.raids);
    this.skills = new CodexCollection('spells', data.skills);
    this.followers = new CodexCollection('followers', data.followers);
  }

  /** Monsters, then bosses, then raids. */
  *iterAllMonsters(): Generator<CodexGenericMonster> {
    for (const monster of this.monsters.entries) yield { kind: 'monsters', monster };
    for (const monster of this.bosses.entries) yield { kind: 'bosses', monster };
    for (const raid of this.raids.entries) yield { kind: 'raids', raid };
  }

  findGenericMonsterByUri(uri: string): CodexGenericMonster | undefined {
    const parts = parseCodexUri(uri);
    if (!parts) return undefined;
    switch (parts.kind) {
      case 'monsters': {
        const monster = this.monsters.findBySlug(parts.slug);
        return monster ? { kind: 'monsters', monster } : undefined;
      }
      case 'bosses': {
        const monster = this.bosses.findBySlug(parts.slug);
        return monster ? { kind: 'bosses', monster } : undefined;
      }
      case 'raids': {
        const raid = this.raids.findBySlug(parts.slug);
        return raid ? { kind: 'raids', raid } : undefined;
      }
      default:
        return undefined;
    }
  }

  /** Whether any codex collection holds the entity the URI points at. */
  resolves(uri: string): boolean {
    const parts = parseCodexUri(uri);
    if (!parts) return false;
    switch (parts.kind) {
      case 'items': return this.items.findBySlug(parts.slug) !== undefined;
      case 'spells': return this.skills.findBySlug(parts.slug) !== undefined;
      case 'followers': return this.followers.findBySlug(parts.slug) !== undefined;
      default: return this.findGenericMonsterByUri(uri) !== undefined;
    }
  }

  toData(): CodexData {
    return {
      items: [...this.items.entries],
      monsters: [...this.monsters.entries],
      bosses: [...this.bosses.entries],
      raids: [...this.raids.entries],
      skills: [...this.skills.entries],
      followers: [...this.followers.entries],
    };
  }
}

// =============================================================================
// Guide
// =============================================================================

export class GuideCollection<T extends { id: number; codexUri: string }> {
  private byId = new Map<number, T>();
  private byCodexKey = new Map<string, T[]>();
  private list: T[];

  constructor(public readonly kind: string, entries: readonly T[]) {
    this.list = [...entries];
    this.reindex();
  }

  get entries(): readonly T[] {
    return this.list;
  }

  get size(): number {
    return this.list.length;
  }

  findById(id: number): T | undefined {
    return this.byId.get(id);
  }

  getById(id: number): T {
    const entry = this.byId.get(id);
    if (!entry) throw new LookupError(`guide ${this.kind} entry`, `#${id}`);
    return entry;
  }

  findAllByUri(uri: string): readonly T[] {
    const key = codexKeyOfUri(uri);
    return key ? this.byCodexKey.get(key) ?? [] : [];
  }

  findAllBySlug(kind: CodexKind, slug: string): readonly T[] {
    return this.byCodexKey.get(codexKey(kind, slug)) ?? [];
  }

  /**
   * The single entry pointing at `uri`. Undefined if none; throws when
   * several guide entries claim the same codex entity.
   */
  findByUri(uri: string): T | undefined {
    const matches = this.findAllByUri(uri);
    if (matches.length > 1) {
      throw new LookupError(`guide ${this.kind} entry`, uri, matches.length);
    }
    return matches[0];
  }

  getByUri(uri: string): T {
    const entry = this.findByUri(uri);
    if (!entry) throw new LookupError(`guide ${this.kind} entry`, uri);
    return entry;
  }

  upsert(entry: T): void {
    const index = this.list.findIndex(e => e.id === entry.id);
    if (index === -1) this.list.push(entry);
    else this.list[index] = entry;
    this.reindex();
  }

  replace(entry: T): void {
    this.getById(entry.id);
    this.upsert(entry);
  }

  private reindex(): void {
    this.byId.clear();
    this.byCodexKey.clear();
    for (const entry of this.list) {
      this.byId.set(entry.id, entry);
      const key = codexKeyOfUri(entry.codexUri);
      if (!key) continue;
      const bucket = this.byCodexKey.get(key);
      if (bucket) bucket.push(entry);
      else this.byCodexKey.set(key, [entry]);
    }
  }
}

export class StaticCollection {
  private byId = new Map<number, StaticEntry>();
  private byName = new Map<string, StaticEntry>();
  private list: StaticEntry[] = [];

  constructor(public readonly kind: StaticKind, entries: readonly StaticEntry[]) {
    this.replaceAll(entries);
  }

  get entries(): readonly StaticEntry[] {
    return this.list;
  }

  findById(id: number): StaticEntry | undefined {
    return this.byId.get(id);
  }

  getById(id: number): StaticEntry {
    const entry = this.byId.get(id);
    if (!entry) throw new LookupError(this.kind, `#${id}`);
    return entry;
  }

  findByName(name: string): StaticEntry | undefined {
    return this.byName.get(name);
  }

  getByName(name: string): StaticEntry {
    const entry = this.byName.get(name);
    if (!entry) throw new LookupError(this.kind, name);
    return entry;
  }

  /** Swap in a freshly listed set, e.g. after the guide assigned a new id. */
  replaceAll(entries: readonly StaticEntry[]): void {
    this.list = [...entries];
    this.byId = new Map(this.list.map(e => [e.id, e]));
    this.byName = new Map(this.list.map(e => [e.name, e]));
  }
}

export type StaticStore = Record<StaticKind, StaticCollection>;

export class GuideStore {
  readonly items: GuideCollection<AdminItem>;
  readonly monsters: GuideCollection<AdminMonster>;
  readonly skills: GuideCollection<AdminSkill>;
  readonly pets: GuideCollection<AdminPet>;
  readonly static: StaticStore;

  constructor(data: GuideData) {
    this.items = new GuideCollection('items', data.items);
    this.monsters = new GuideCollection('monsters', data.monsters);
    this.skills = new GuideCollection('skills', data.skills);
    this.pets = new GuideCollection('pets', data.pets);
    this.static = {
      spawns: new StaticCollection('spawns', data.static.spawns),
      itemCategories: new StaticCollection('itemCategories', data.static.itemCategories),
      itemTypes: new StaticCollection('itemTypes', data.static.itemTypes),
      monsterFamilies: new StaticCollection('monsterFamilies', data.static.monsterFamilies),
      statusEffects: new StaticCollection('statusEffects', data.static.statusEffects),
      elements: new StaticCollection('elements', data.static.elements),
      equippedBys: new StaticCollection('equippedBys', data.static.equippedBys),
      skillTypes: new StaticCollection('skillTypes', data.static.skillTypes),
    };
  }

  toData(): GuideData {
    const staticData: GuideStatic = {
      spawns: [...this.static.spawns.entries],
      itemCategories: [...this.static.itemCategories.entries],
      itemTypes: [...this.static.itemTypes.entries],
      monsterFamilies: [...this.static.monsterFamilies.entries],
      statusEffects: [...this.static.statusEffects.entries],
      elements: [...this.static.elements.entries],
      equippedBys: [...this.static.equippedBys.entries],
      skillTypes: [...this.static.skillTypes.entries],
    };
    return {
      items: [...this.items.entries],
      monsters: [...this.monsters.entries],
      skills: [...this.skills.entries],
      pets: [...this.pets.entries],
      static: staticData,
    };
  }
}

// =============================================================================
// Root
// =============================================================================

export class OrnaStore {
  readonly codex: CodexStore;
  readonly guide: GuideStore;

  constructor(data: OrnaData) {
    this.codex = new CodexStore(data.codex);
    this.guide = new GuideStore(data.guide);
  }

  toData(): OrnaData {
    return { codex: this.codex.toData(), guide: this.guide.toData() };
  }
}

export function emptyCodexData(): CodexData {
  return { items: [], monsters: [], bosses: [], raids: [], skills: [], followers: [] };
}

export function emptyGuideData(): GuideData {
  return {
    items: [],
    monsters: [],
    skills: [],
    pets: [],
    static: {
      spawns: [],
      itemCategories: [],
      itemTypes: [],
      monsterFamilies: [],
      statusEffects: [],
      elements: [],
      equippedBys: [],
      skillTypes: [],
    },
  };
}

export function emptyOrnaData(): OrnaData {
  return { codex: emptyCodexData(), guide: emptyGuideData() };
}
