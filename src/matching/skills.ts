/**
 * Skill matcher
 * Codex spells ↔ guide skills.
 */

import { codexUri } from '../codex/uri.js';
import { hasTag, TAG_FOUND_IN_ARCANISTS, TAG_OFF_HAND_ABILITY } from '../codex/tags.js';
import { checkAll, checkerFor, listMissing, nameOf, partialLogger, pullNewEntities, type MatcherContext } from './common.js';
import { guideStatusName, type MatchConfig } from './config.js';
import { sortedUnique } from './diff.js';
import { skillCausesIds, skillGivesIds, useResolved } from './idResolver.js';
import { MatchReport } from './report.js';
import { AdminSkillSchema } from '../data/schemas.js';
import type { AdminSkill, CodexSkill, MatchResult } from '../types.js';

const skillSide = {
  name: (skill: CodexSkill) => skill.name,
  uri: (skill: CodexSkill) => codexUri('spells', skill.slug),
};

/** The guide rejects empty descriptions. */
export function guideDescription(description: string): string {
  return description === '' ? '.' : description;
}

export async function matchSkills(ctx: MatcherContext): Promise<MatchResult> {
  const report = new MatchReport('skills');
  const { store, config } = ctx;
  const skillTypes = store.guide.static.skillTypes;
  const guideOnly = (skill: AdminSkill) =>
    skill.type !== null && config.guideOnlySkillTypes.includes(skillTypes.findById(skill.type)?.name ?? '');

  const missing = listMissing(report, store.codex.skills.entries, skillSide, store.guide.skills,
    uri => store.codex.skills.findByUri(uri) !== undefined, guideOnly);
  const created = config.fix && missing.length > 0 ? await createMissingSkills(ctx, report, missing) : new Set<string>();

  await checkAll(report, store.codex.skills.entries, skillSide, store.guide.skills,
    (skill, admin) => checkSkill(ctx, report, skill, admin), created);

  report.printSummary();
  return report.toResult();
}

async function checkSkill(ctx: MatcherContext, report: MatchReport, skill: CodexSkill, admin: AdminSkill): Promise<boolean> {
  const { store, config } = ctx;
  const check = checkerFor(ctx, report, 'skills', admin, store.guide.skills);
  const onPartial = partialLogger(report, skill.name);
  const statusName = nameOf(store.guide.static.statusEffects);

  await check.scalar('description', guideDescription(skill.description), admin.description,
    (e, v) => { e.description = v; }, e => e.description);
  await check.scalar('tier', skill.tier, admin.tier, (e, v) => { e.tier = v; }, e => e.tier);
  await check.scalar('bought', hasTag(skill, TAG_FOUND_IN_ARCANISTS), admin.bought,
    (e, v) => { e.bought = v; }, e => e.bought);

  await check.list('causes', sortedUnique(useResolved(skillCausesIds(skill, store.guide, config), onPartial)),
    admin.causes, statusName, { get: e => e.causes, set: (e, ids) => { e.causes = ids; } });
  await check.list('gives', sortedUnique(useResolved(skillGivesIds(skill, store.guide, config), onPartial)),
    admin.gives, statusName, { get: e => e.gives, set: (e, ids) => { e.gives = ids; } });

  return check.allMatched;
}

export function toAdminSkill(ctx: MatcherContext, skill: CodexSkill, report: MatchReport): AdminSkill {
  const { store, config } = ctx;
  const onPartial = partialLogger(report, skill.name);
  const offhand = hasTag(skill, TAG_OFF_HAND_ABILITY);

  return AdminSkillSchema.parse({
    id: 0,
    codexUri: codexUri('spells', skill.slug),
    name: offhand ? `${skill.name} [off-hand]` : skill.name,
    tier: skill.tier,
    description: guideDescription(skill.description),
    offhand,
    bought: hasTag(skill, TAG_FOUND_IN_ARCANISTS),
    causes: sortedUnique(useResolved(skillCausesIds(skill, store.guide, config), onPartial)),
    gives: sortedUnique(useResolved(skillGivesIds(skill, store.guide, config), onPartial)),
  });
}

async function createMissingSkills(ctx: MatcherContext, report: MatchReport, missing: CodexSkill[]): Promise<Set<string>> {
  const created = new Set<string>();
  for (const skill of missing) {
    try {
      await ctx.guide.add('skills', toAdminSkill(ctx, skill, report));
      created.add(skillSide.uri(skill));
      report.created(skill.name);
      console.log(`➕ Added skill ${skill.name}`);
    } catch (error) {
      report.error(skill.name, error);
    }
  }
  if (created.size > 0) await pullNewEntities(ctx, 'skills', ctx.store.guide.skills);
  return created;
}

export function skillStatusNames(skill: CodexSkill, config: MatchConfig): string[] {
  return [...skill.causes, ...skill.gives].map(e => guideStatusName(config, e.effect));
}
