/**
 * Backup changes
 * Hand-maintained corrections applied on top of a merged backup: entities to
 * drop and whole-entity replacements.
 */

import { existsSync, readFileSync } from 'fs';
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
} from '../data/schemas.js';
import { mergeByKey } from './merger.js';
import type { OrnaData } from '../types.js';

const slugs = z.array(z.string()).default([]);
const ids = z.array(z.number().int()).default([]);

const RemovalsSchema = z.object({
  codex: z.object({
    items: slugs,
    monsters: slugs,
    bosses: slugs,
    raids: slugs,
    skills: slugs,
    followers: slugs,
  }).default({}),
  guide: z.object({
    items: ids,
    monsters: ids,
    skills: ids,
    pets: ids,
  }).default({}),
});

const OverridesSchema = z.object({
  codex: z.object({
    items: z.array(CodexItemSchema).default([]),
    monsters: z.array(CodexMonsterSchema).default([]),
    bosses: z.array(CodexBossSchema).default([]),
    raids: z.array(CodexRaidSchema).default([]),
    skills: z.array(CodexSkillSchema).default([]),
    followers: z.array(CodexFollowerSchema).default([]),
  }).default({}),
  guide: z.object({
    items: z.array(AdminItemSchema).default([]),
    monsters: z.array(AdminMonsterSchema).default([]),
    skills: z.array(AdminSkillSchema).default([]),
    pets: z.array(AdminPetSchema).default([]),
  }).default({}),
});

export const BackupChangesSchema = z.object({
  removals: RemovalsSchema.default({}),
  overrides: OverridesSchema.default({}),
});

export type BackupChanges = z.infer<typeof BackupChangesSchema>;

export function emptyBackupChanges(): BackupChanges {
  return BackupChangesSchema.parse({});
}

/** Read the changes file; a missing file means no changes. */
export function loadBackupChanges(path: string): BackupChanges {
  if (!existsSync(path)) return emptyBackupChanges();
  const result = BackupChangesSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown format'}`);
  }
  return result.data;
}

function apply<T, K>(entries: readonly T[], keyOf: (entry: T) => K, removals: readonly K[], overrides: readonly T[]): T[] {
  const kept = entries.filter(entry => !removals.includes(keyOf(entry)));
  return mergeByKey(kept, overrides, keyOf);
}

/** Removals first, then overrides. Returns a new aggregate. */
export function applyBackupChanges(data: OrnaData, changes: BackupChanges): OrnaData {
  const { removals, overrides } = changes;
  const slug = (entry: { slug: string }) => entry.slug;
  const id = (entry: { id: number }) => entry.id;

  return {
    codex: {
      items: apply(data.codex.items, slug, removals.codex.items, overrides.codex.items),
      monsters: apply(data.codex.monsters, slug, removals.codex.monsters, overrides.codex.monsters),
      bosses: apply(data.codex.bosses, slug, removals.codex.bosses, overrides.codex.bosses),
      raids: apply(data.codex.raids, slug, removals.codex.raids, overrides.codex.raids),
      skills: apply(data.codex.skills, slug, removals.codex.skills, overrides.codex.skills),
      followers: apply(data.codex.followers, slug, removals.codex.followers, overrides.codex.followers),
    },
    guide: {
      items: apply(data.guide.items, id, removals.guide.items, overrides.guide.items),
      monsters: apply(data.guide.monsters, id, removals.guide.monsters, overrides.guide.monsters),
      skills: apply(data.guide.skills, id, removals.guide.skills, overrides.guide.skills),
      pets: apply(data.guide.pets, id, removals.guide.pets, overrides.guide.pets),
      static: data.guide.static,
    },
  };
}
