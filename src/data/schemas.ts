/**
 * Snapshot Schemas
 * zod schemas for every JSON document the sync reads from disk.
 * Entity types in types.ts are inferred from these.
 */

import { z } from 'zod';

// =============================================================================
// Codex
// =============================================================================

/** A link to another codex page: a drop, an ability, a "dropped by" entry. */
export const CodexRefSchema = z.object({
  name: z.string(),
  uri: z.string(),
  icon: z.string().default(''),
});

/** A status effect as shown on item pages. */
export const CodexEffectSchema = z.object({
  name: z.string(),
  icon: z.string().default(''),
  chance: z.number().nullable().default(null),
});

/** A status effect as shown on skill pages. */
export const CodexSkillEffectSchema = z.object({
  effect: z.string(),
  chance: z.number(),
});

const optionalStat = z.number().nullable().default(null);

export const CodexItemStatsSchema = z.object({
  attack: optionalStat,
  magic: optionalStat,
  hp: optionalStat,
  mana: optionalStat,
  defense: optionalStat,
  resistance: optionalStat,
  ward: optionalStat,
  dexterity: optionalStat,
  crit: optionalStat,
  foresight: optionalStat,
  adornmentSlots: optionalStat,
  element: z.string().nullable().default(null),
});

export const CodexItemSchema = z.object({
  slug: z.string(),
  name: z.string(),
  icon: z.string().default(''),
  description: z.string().default(''),
  tier: z.number().int(),
  rarity: z.string().nullable().default(null),
  itemType: z.string().nullable().default(null),
  tags: z.array(z.string()).default([]),
  stats: CodexItemStatsSchema.nullable().default(null),
  ability: z.object({ name: z.string(), description: z.string().default('') }).nullable().default(null),
  causes: z.array(CodexEffectSchema).default([]),
  cures: z.array(CodexEffectSchema).default([]),
  gives: z.array(CodexEffectSchema).default([]),
  immunities: z.array(CodexEffectSchema).default([]),
  droppedBy: z.array(CodexRefSchema).default([]),
  upgradeMaterials: z.array(CodexRefSchema).default([]),
});

export const CodexMonsterSchema = z.object({
  slug: z.string(),
  name: z.string(),
  icon: z.string().default(''),
  tier: z.number().int(),
  family: z.string().nullable().default(null),
  rarity: z.string().nullable().default(null),
  events: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  abilities: z.array(CodexRefSchema).default([]),
  drops: z.array(CodexRefSchema).default([]),
});

/** Bosses share the monster page layout. */
export const CodexBossSchema = CodexMonsterSchema;

export const CodexRaidSchema = z.object({
  slug: z.string(),
  name: z.string(),
  description: z.string().default(''),
  icon: z.string().default(''),
  tier: z.number().int(),
  events: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  abilities: z.array(CodexRefSchema).default([]),
  drops: z.array(CodexRefSchema).default([]),
});

export const CodexSkillSchema = z.object({
  slug: z.string(),
  name: z.string(),
  icon: z.string().default(''),
  description: z.string().default(''),
  tier: z.number().int(),
  tags: z.array(z.string()).default([]),
  causes: z.array(CodexSkillEffectSchema).default([]),
  gives: z.array(CodexSkillEffectSchema).default([]),
});

export const CodexFollowerSchema = z.object({
  slug: z.string(),
  name: z.string(),
  icon: z.string().default(''),
  description: z.string().default(''),
  tier: z.number().int(),
  rarity: z.string().nullable().default(null),
  events: z.array(z.string()).default([]),
  abilities: z.array(CodexRefSchema).default([]),
});

// =============================================================================
// Guide
// =============================================================================

const id = z.number().int();
const ids = z.array(id).default([]);
const maybeId = id.nullable().default(null);

export const AdminItemSchema = z.object({
  id,
  codexUri: z.string().default(''),
  name: z.string(),
  tier: z.number().int(),
  type: maybeId,
  imageName: z.string().default(''),
  description: z.string().default(''),
  notes: z.string().default(''),
  hp: z.number().default(0),
  mana: z.number().default(0),
  attack: z.number().default(0),
  magic: z.number().default(0),
  defense: z.number().default(0),
  resistance: z.number().default(0),
  dexterity: z.number().default(0),
  ward: z.number().default(0),
  crit: z.number().default(0),
  foresight: z.number().default(0),
  hasSlots: z.boolean().default(false),
  baseAdornmentSlots: z.number().int().default(0),
  rarity: z.string().default(''),
  element: maybeId,
  equippedBy: ids,
  twoHanded: z.boolean().default(false),
  boss: z.boolean().default(false),
  arena: z.boolean().default(false),
  category: maybeId,
  causes: ids,
  cures: ids,
  gives: ids,
  prevents: ids,
  materials: ids,
  price: z.number().int().default(0),
  ability: maybeId,
});

export const AdminMonsterSchema = z.object({
  id,
  codexUri: z.string().default(''),
  name: z.string(),
  tier: z.number().int(),
  family: maybeId,
  imageName: z.string().default(''),
  boss: z.boolean().default(false),
  level: z.number().int().default(0),
  hp: z.number().int().default(0),
  notes: z.string().default(''),
  spawns: ids,
  weakTo: ids,
  resistantTo: ids,
  immuneTo: ids,
  immuneToStatus: ids,
  drops: ids,
  skills: ids,
});

export const AdminSkillSchema = z.object({
  id,
  codexUri: z.string().default(''),
  name: z.string(),
  tier: z.number().int(),
  type: maybeId,
  isMagic: z.boolean().default(false),
  manaCost: z.number().int().default(0),
  description: z.string().default(''),
  element: maybeId,
  offhand: z.boolean().default(false),
  cost: z.number().int().default(0),
  bought: z.boolean().default(false),
  skillPower: z.number().default(0),
  strikes: z.number().int().default(1),
  modifierMin: z.number().default(0),
  modifierMax: z.number().default(0),
  extra: z.string().default(''),
  buffedBy: ids,
  causes: ids,
  cures: ids,
  gives: ids,
});

export const AdminPetSchema = z.object({
  id,
  codexUri: z.string().default(''),
  name: z.string(),
  tier: z.number().int(),
  imageName: z.string().default(''),
  description: z.string().default(''),
  attack: z.number().int().default(0),
  heal: z.number().int().default(0),
  buff: z.number().int().default(0),
  debuff: z.number().int().default(0),
  spell: z.number().int().default(0),
  protect: z.number().int().default(0),
  cost: z.number().int().default(0),
  costType: z.enum(['Orn', 'Gold']).default('Gold'),
  limited: z.boolean().default(false),
  limitedDetails: z.string().default(''),
  skills: ids,
});

export const StaticEntrySchema = z.object({
  id,
  name: z.string(),
});

// =============================================================================
// Locales
// =============================================================================

const translatedText = z.object({
  name: z.string(),
  description: z.string().optional(),
});

const textMap = z.record(z.string(), translatedText).default({});
const nameMap = z.record(z.string(), z.string()).default({});

export const LocaleStringsSchema = z.object({
  locale: z.string(),
  items: textMap,
  monsters: textMap,
  bosses: textMap,
  raids: textMap,
  skills: textMap,
  followers: textMap,
  statuses: nameMap,
  events: nameMap,
  spawns: nameMap,
  families: nameMap,
  rarities: nameMap,
});
