/**
 * Snapshot persistence
 * One JSON document per collection in a directory, plus locale overlays
 * under i18n/ and i18n/manual/.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { z } from 'zod';
import {
  AdminItemSchema,
  AdminMonsterSchema,
  AdminPetSchema,
  AdminSkillSchema,
  CodexBossSchema,
  CodexFollowerSchema,
  CodexItemSchema,
  CodexMonsterSchema,
  CodexRaidSchema,
  CodexSkillSchema,
  LocaleStringsSchema,
  StaticEntrySchema,
} from './schemas.js';
import {
  GUIDE_KINDS,
  STATIC_KINDS,
  type CodexData,
  type GuideData,
  type GuideStatic,
  type LocaleDb,
  type LocaleStrings,
  type OrnaData,
  type StaticKind,
} from '../types.js';

// =============================================================================
// Layout
// =============================================================================

export const CODEX_KEYS = ['items', 'monsters', 'bosses', 'raids', 'skills', 'followers'] as const satisfies readonly (keyof CodexData)[];

export const CODEX_FILES = {
  items: 'codex_items.json',
  monsters: 'codex_monsters.json',
  bosses: 'codex_bosses.json',
  raids: 'codex_raids.json',
  skills: 'codex_skills.json',
  followers: 'codex_followers.json',
} as const satisfies Record<keyof CodexData, string>;

export const GUIDE_FILES = {
  items: 'guide_items.json',
  monsters: 'guide_monsters.json',
  skills: 'guide_skills.json',
  pets: 'guide_pets.json',
} as const satisfies Record<Exclude<keyof GuideData, 'static'>, string>;

export const STATIC_FILES = {
  spawns: 'guide_spawns.json',
  itemCategories: 'guide_item_categories.json',
  itemTypes: 'guide_item_types.json',
  monsterFamilies: 'guide_monster_families.json',
  statusEffects: 'guide_status_effects.json',
  elements: 'guide_elements.json',
  equippedBys: 'guide_equipped_bys.json',
  skillTypes: 'guide_skill_types.json',
} as const satisfies Record<StaticKind, string>;

const LOCALE_DIR = 'i18n';
const MANUAL_LOCALE_DIR = join('i18n', 'manual');

/** A whole snapshot as `file name → parsed JSON`, the shape backups are bundled in. */
export type SnapshotDocuments = Record<string, unknown>;

// =============================================================================
// Decoding
// =============================================================================

const codexSchemas = {
  items: z.array(CodexItemSchema),
  monsters: z.array(CodexMonsterSchema),
  bosses: z.array(CodexBossSchema),
  raids: z.array(CodexRaidSchema),
  skills: z.array(CodexSkillSchema),
  followers: z.array(CodexFollowerSchema),
};

const guideSchemas = {
  items: z.array(AdminItemSchema),
  monsters: z.array(AdminMonsterSchema),
  skills: z.array(AdminSkillSchema),
  pets: z.array(AdminPetSchema),
};

const staticSchema = z.array(StaticEntrySchema);

function parseDocument<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, file: string, value: unknown): T {
  const result = schema.safeParse(value ?? []);
  if (!result.success) {
    throw new Error(`Invalid ${file}: ${result.error.issues.slice(0, 3).map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return result.data;
}

/** Build OrnaData from documents keyed by file name; absent files are empty collections. */
export function ornaDataFromDocuments(docs: SnapshotDocuments): OrnaData {
  const codex: CodexData = {
    items: parseDocument(codexSchemas.items, CODEX_FILES.items, docs[CODEX_FILES.items]),
    monsters: parseDocument(codexSchemas.monsters, CODEX_FILES.monsters, docs[CODEX_FILES.monsters]),
    bosses: parseDocument(codexSchemas.bosses, CODEX_FILES.bosses, docs[CODEX_FILES.bosses]),
    raids: parseDocument(codexSchemas.raids, CODEX_FILES.raids, docs[CODEX_FILES.raids]),
    skills: parseDocument(codexSchemas.skills, CODEX_FILES.skills, docs[CODEX_FILES.skills]),
    followers: parseDocument(codexSchemas.followers, CODEX_FILES.followers, docs[CODEX_FILES.followers]),
  };
  const readStatic = (kind: StaticKind) => parseDocument(staticSchema, STATIC_FILES[kind], docs[STATIC_FILES[kind]]);
  const staticData: GuideStatic = {
    spawns: readStatic('spawns'),
    itemCategories: readStatic('itemCategories'),
    itemTypes: readStatic('itemTypes'),
    monsterFamilies: readStatic('monsterFamilies'),
    statusEffects: readStatic('statusEffects'),
    elements: readStatic('elements'),
    equippedBys: readStatic('equippedBys'),
    skillTypes: readStatic('skillTypes'),
  };
  const guide: GuideData = {
    items: parseDocument(guideSchemas.items, GUIDE_FILES.items, docs[GUIDE_FILES.items]),
    monsters: parseDocument(guideSchemas.monsters, GUIDE_FILES.monsters, docs[GUIDE_FILES.monsters]),
    skills: parseDocument(guideSchemas.skills, GUIDE_FILES.skills, docs[GUIDE_FILES.skills]),
    pets: parseDocument(guideSchemas.pets, GUIDE_FILES.pets, docs[GUIDE_FILES.pets]),
    static: staticData,
  };
  return { codex, guide };
}

export function ornaDataToDocuments(data: OrnaData): SnapshotDocuments {
  const docs: SnapshotDocuments = {};
  for (const key of CODEX_KEYS) docs[CODEX_FILES[key]] = data.codex[key];
  for (const kind of GUIDE_KINDS) docs[GUIDE_FILES[kind]] = data.guide[kind];
  for (const kind of STATIC_KINDS) docs[STATIC_FILES[kind]] = data.guide.static[kind];
  return docs;
}

// =============================================================================
// Directory I/O
// =============================================================================

function readJson(path: string): unknown {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

function writeJson(path: string, value: unknown): void {
  writeFileSync(path, JSON.stringify(value, null, 2) + '\n');
}

export function loadOrnaData(dir: string): OrnaData {
  const docs: SnapshotDocuments = {};
  for (const file of [...Object.values(CODEX_FILES), ...Object.values(GUIDE_FILES), ...Object.values(STATIC_FILES)]) {
    const path = join(dir, file);
    if (existsSync(path)) docs[file] = readJson(path);
  }
  return ornaDataFromDocuments(docs);
}

export function saveOrnaData(dir: string, data: OrnaData): void {
  mkdirSync(dir, { recursive: true });
  for (const [file, value] of Object.entries(ornaDataToDocuments(data))) {
    writeJson(join(dir, file), value);
  }
}

// =============================================================================
// Locales
// =============================================================================

export function parseLocaleStrings(file: string, value: unknown): LocaleStrings {
  return parseDocument(LocaleStringsSchema, file, value);
}

function loadLocaleDir(dir: string): LocaleDb {
  const db: LocaleDb = { locales: {} };
  if (!existsSync(dir)) return db;
  for (const file of readdirSync(dir).filter(f => f.endsWith('.json')).sort()) {
    const strings = parseLocaleStrings(file, readJson(join(dir, file)));
    db.locales[strings.locale] = strings;
  }
  return db;
}

/** Auto-fetched translations, `i18n/<locale>.json`. */
export function loadLocaleDb(dir: string): LocaleDb {
  return loadLocaleDir(join(dir, LOCALE_DIR));
}

/** Hand-written overrides, `i18n/manual/<locale>.json`. */
export function loadManualLocaleDb(dir: string): LocaleDb {
  return loadLocaleDir(join(dir, MANUAL_LOCALE_DIR));
}

function saveLocaleDir(dir: string, db: LocaleDb): void {
  mkdirSync(dir, { recursive: true });
  for (const [locale, strings] of Object.entries(db.locales)) {
    writeJson(join(dir, `${locale}.json`), strings);
  }
}

export function saveLocaleDb(dir: string, db: LocaleDb): void {
  saveLocaleDir(join(dir, LOCALE_DIR), db);
}

export function saveManualLocaleDb(dir: string, db: LocaleDb): void {
  saveLocaleDir(join(dir, MANUAL_LOCALE_DIR), db);
}

export function localeDocumentName(locale: string, manual: boolean): string {
  return manual ? `${LOCALE_DIR}/manual/${locale}.json` : `${LOCALE_DIR}/${locale}.json`;
}
