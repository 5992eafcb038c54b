/**
 * Pet matcher
 * Codex followers ↔ guide pets.
 */

import { codexUri } from '../codex/uri.js';
import { checkAll, checkerFor, listMissing, nameOf, partialLogger, type MatcherContext } from './common.js';
import { sortedUnique } from './diff.js';
import { followerAbilityIds, useResolved } from './idResolver.js';
import { MatchReport } from './report.js';
import { guideDescription } from './skills.js';
import type { AdminPet, CodexFollower, MatchResult } from '../types.js';

const followerSide = {
  name: (follower: CodexFollower) => follower.name,
  uri: (follower: CodexFollower) => codexUri('followers', follower.slug),
};

export async function matchPets(ctx: MatcherContext): Promise<MatchResult> {
  const report = new MatchReport('pets');
  const { store } = ctx;

  listMissing(report, store.codex.followers.entries, followerSide, store.guide.pets,
    uri => store.codex.followers.findByUri(uri) !== undefined);
  await checkAll(report, store.codex.followers.entries, followerSide, store.guide.pets,
    (follower, pet) => checkPet(ctx, report, follower, pet));

  report.printSummary();
  return report.toResult();
}

async function checkPet(ctx: MatcherContext, report: MatchReport, follower: CodexFollower, pet: AdminPet): Promise<boolean> {
  const { store } = ctx;
  const check = checkerFor(ctx, report, 'pets', pet, store.guide.pets);
  const onPartial = partialLogger(report, follower.name);

  await check.scalar('name', follower.name, pet.name, (e, v) => { e.name = v; }, e => e.name);
  await check.scalar('image_name', follower.icon, pet.imageName, (e, v) => { e.imageName = v; }, e => e.imageName);
  await check.scalar('description', guideDescription(follower.description), pet.description,
    (e, v) => { e.description = v; }, e => e.description);
  await check.scalar('tier', follower.tier, pet.tier, (e, v) => { e.tier = v; }, e => e.tier);

  const abilityIds = sortedUnique(useResolved(followerAbilityIds(follower, store.guide), onPartial));
  const guideAbilityIds = pet.skills.filter(id => {
    const skill = store.guide.skills.findById(id);
    return skill !== undefined && skill.codexUri !== '';
  });
  await check.list('skills', abilityIds, guideAbilityIds, nameOf(store.guide.skills),
    { get: e => e.skills, set: (e, ids) => { e.skills = ids; } });

  return check.allMatched;
}
