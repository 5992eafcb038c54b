/**
 * Type Definitions
 */

import type { z } from 'zod';
import type {
  AdminItemSchema,
  AdminMonsterSchema,
  AdminPetSchema,
  AdminSkillSchema,
  CodexBossSchema,
  CodexEffectSchema,
  CodexFollowerSchema,
  CodexItemSchema,
  CodexMonsterSchema,
  CodexRaidSchema,
  CodexRefSchema,
  CodexSkillEffectSchema,
  CodexSkillSchema,
  LocaleStringsSchema,
  StaticEntrySchema,
} from './data/schemas.js';

// =============================================================================
// Codex (public, slug-addressed)
// =============================================================================

export type CodexRef = z.infer<typeof CodexRefSchema>;
export type CodexEffect = z.infer<typeof CodexEffectSchema>;
export type CodexSkillEffect = z.infer<typeof CodexSkillEffectSchema>;
export type CodexItem = z.infer<typeof CodexItemSchema>;
export type CodexMonster = z.infer<typeof CodexMonsterSchema>;
export type CodexBoss = z.infer<typeof CodexBossSchema>;
export type CodexRaid = z.infer<typeof CodexRaidSchema>;
export type CodexSkill = z.infer<typeof CodexSkillSchema>;
export type CodexFollower = z.infer<typeof CodexFollowerSchema>;

/** Path segment of each codex section: `/codex/{kind}/{slug}/`. */
export const CODEX_KINDS = ['items', 'monsters', 'bosses', 'raids', 'spells', 'followers'] as const;
export type CodexKind = (typeof CODEX_KINDS)[number];

export interface CodexEntityMap {
  items: CodexItem;
  monsters: CodexMonster;
  bosses: CodexBoss;
  raids: CodexRaid;
  spells: CodexSkill;
  followers: CodexFollower;
}

/**
 * Anything that shows up under one of the monster-like codex sections.
 * The kind set is closed; accessors live in codex/genericMonster.ts.
 */
export type CodexGenericMonster =
  | { kind: 'monsters'; monster: CodexMonster }
  | { kind: 'bosses'; monster: CodexBoss }
  | { kind: 'raids'; raid: CodexRaid };

export interface CodexData {
  items: CodexItem[];
  monsters: CodexMonster[];
  bosses: CodexBoss[];
  raids: CodexRaid[];
  skills: CodexSkill[];
  followers: CodexFollower[];
}

/** A row of a codex list page. */
export interface CodexListEntry {
  slug: string;
  name: string;
  tier: number;
  uri: string;
}

// =============================================================================
// Guide (private, id-addressed)
// =============================================================================

export type AdminItem = z.infer<typeof AdminItemSchema>;
export type AdminMonster = z.infer<typeof AdminMonsterSchema>;
export type AdminSkill = z.infer<typeof AdminSkillSchema>;
export type AdminPet = z.infer<typeof AdminPetSchema>;
export type StaticEntry = z.infer<typeof StaticEntrySchema>;

export const GUIDE_KINDS = ['items', 'monsters', 'skills', 'pets'] as const;
export type GuideKind = (typeof GUIDE_KINDS)[number];

export interface GuideEntityMap {
  items: AdminItem;
  monsters: AdminMonster;
  skills: AdminSkill;
  pets: AdminPet;
}

export type GuideEntity = GuideEntityMap[GuideKind];

export const STATIC_KINDS = [
  'spawns',
  'itemCategories',
  'itemTypes',
  'monsterFamilies',
  'statusEffects',
  'elements',
  'equippedBys',
  'skillTypes',
] as const;
export type StaticKind = (typeof STATIC_KINDS)[number];

/** Static resources the guide lets us create. */
export type AddableStaticKind = Extract<StaticKind, 'spawns' | 'statusEffects'>;

export type GuideStatic = Record<StaticKind, StaticEntry[]>;

export interface GuideData {
  items: AdminItem[];
  monsters: AdminMonster[];
  skills: AdminSkill[];
  pets: AdminPet[];
  static: GuideStatic;
}

/** A row of an admin list page. */
export interface GuideListEntry {
  id: number;
  name: string;
}

// =============================================================================
// Aggregates
// =============================================================================

export interface OrnaData {
  codex: CodexData;
  guide: GuideData;
}

export type LocaleStrings = z.infer<typeof LocaleStringsSchema>;

export interface LocaleDb {
  locales: Record<string, LocaleStrings>;
}

// =============================================================================
// Matching results
// =============================================================================

export type MatchKind = 'items' | 'monsters' | 'skills' | 'pets' | 'statusEffects';

export interface Mismatch {
  entity: string;
  id: number | null;
  field: string;
  codex: string;
  guide: string;
  fixed: boolean;
}

export interface MatchFailure {
  entity: string;
  message: string;
}

export interface MatchResult {
  kind: MatchKind;
  checked: number;
  matched: number;
  fixed: number;
  mismatches: Mismatch[];
  missingOnGuide: string[];
  notOnCodex: string[];
  unmatched: string[];
  created: string[];
  errors: MatchFailure[];
}
