/**
 * Test data builders
 * Entities go through their zod schemas so every default is filled in.
 */

import {
  AdminItemSchema,
  AdminMonsterSchema,
  AdminPetSchema,
  AdminSkillSchema,
  CodexFollowerSchema,
  CodexItemSchema,
  CodexItemStatsSchema,
  CodexMonsterSchema,
  CodexRaidSchema,
  CodexSkillSchema,
} from '../src/data/schemas.js';
import { emptyOrnaData, OrnaStore } from '../src/data/store.js';
import { createMatchConfig, loadMatchTables } from '../src/matching/config.js';
import type { MatcherContext } from '../src/matching/common.js';
import type {
  AdminItem,
  AdminMonster,
  AdminPet,
  AdminSkill,
  CodexData,
  CodexFollower,
  CodexItem,
  CodexMonster,
  CodexRaid,
  CodexSkill,
  GuideData,
  GuideStatic,
  OrnaData,
} from '../src/types.js';
import { FakeAdminGuide } from './fakeGuide.js';

type With<T, K extends keyof T> = Partial<T> & Pick<T, K>;

export const codexItem = (fields: With<CodexItem, 'slug' | 'name'>): CodexItem =>
  CodexItemSchema.parse({ tier: 1, ...fields });

export const itemStats = (fields: Partial<NonNullable<CodexItem['stats']>>): NonNullable<CodexItem['stats']> =>
  CodexItemStatsSchema.parse(fields);

export const effect = (name: string, chance: number | null = null): CodexItem['causes'][number] =>
  ({ name, icon: '', chance });

export const ref = (name: string, uri: string): CodexItem['droppedBy'][number] => ({ name, uri, icon: '' });

export const codexMonster = (fields: With<CodexMonster, 'slug' | 'name'>): CodexMonster =>
  CodexMonsterSchema.parse({ tier: 1, ...fields });

export const codexRaid = (fields: With<CodexRaid, 'slug' | 'name'>): CodexRaid =>
  CodexRaidSchema.parse({ tier: 1, ...fields });

export const codexSkill = (fields: With<CodexSkill, 'slug' | 'name'>): CodexSkill =>
  CodexSkillSchema.parse({ tier: 1, ...fields });

export const codexFollower = (fields: With<CodexFollower, 'slug' | 'name'>): CodexFollower =>
  CodexFollowerSchema.parse({ tier: 1, ...fields });

export const adminItem = (fields: With<AdminItem, 'id' | 'name'>): AdminItem =>
  AdminItemSchema.parse({ tier: 1, ...fields });

export const adminMonster = (fields: With<AdminMonster, 'id' | 'name'>): AdminMonster =>
  AdminMonsterSchema.parse({ tier: 1, ...fields });

export const adminSkill = (fields: With<AdminSkill, 'id' | 'name'>): AdminSkill =>
  AdminSkillSchema.parse({ tier: 1, ...fields });

export const adminPet = (fields: With<AdminPet, 'id' | 'name'>): AdminPet =>
  AdminPetSchema.parse({ tier: 1, ...fields });

export interface DataParts {
  codex?: Partial<CodexData>;
  guide?: Partial<Omit<GuideData, 'static'>>;
  static?: Partial<GuideStatic>;
}

export function ornaData(parts: DataParts = {}): OrnaData {
  const empty = emptyOrnaData();
  return {
    codex: { ...empty.codex, ...parts.codex },
    guide: {
      ...empty.guide,
      ...parts.guide,
      static: { ...empty.guide.static, ...parts.static },
    },
  };
}

export interface TestContext extends MatcherContext {
  guide: FakeAdminGuide;
}

/** Store and fake guide start from separate copies of the same data. */
export function matcherContext(data: OrnaData, fix = false): TestContext {
  return {
    store: new OrnaStore(structuredClone(data)),
    guide: new FakeAdminGuide(data.guide),
    config: createMatchConfig(loadMatchTables(), fix),
  };
}
