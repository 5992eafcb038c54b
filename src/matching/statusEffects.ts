/**
 * Status effect matcher
 * Every effect name the codex mentions (items and skills) must exist in the
 * guide's status effect list, after renaming.
 */

import { LookupError } from '../errors.js';
import { retryOnce } from '../utils/resilience.js';
import type { MatcherContext } from './common.js';
import { diffSorted, sortedUnique } from './diff.js';
import { itemStatusNames } from './items.js';
import { MatchReport } from './report.js';
import { skillStatusNames } from './skills.js';
import type { MatchResult } from '../types.js';

/** Renamed, deduplicated and sorted effect names found on the codex. */
export function codexStatusEffectNames(ctx: MatcherContext): string[] {
  const { store, config } = ctx;
  return sortedUnique([
    ...store.codex.items.entries.flatMap(item => itemStatusNames(item, config)),
    ...store.codex.skills.entries.flatMap(skill => skillStatusNames(skill, config)),
  ]);
}

export async function matchStatusEffects(ctx: MatcherContext): Promise<MatchResult> {
  const report = new MatchReport('statusEffects');
  const statusEffects = ctx.store.guide.static.statusEffects;

  const codexNames = codexStatusEffectNames(ctx);
  const guideNames = sortedUnique(statusEffects.entries.map(s => s.name));
  const [missing, extra] = diffSorted(codexNames, guideNames);

  for (const name of codexNames) report.entityChecked(!missing.includes(name));
  for (const name of missing) report.missingOnGuide(name);
  for (const name of extra) report.notOnCodex(name);

  if (ctx.config.fix && missing.length > 0) {
    for (const name of missing) {
      try {
        await ctx.guide.addStatic('statusEffects', name);
        report.created(name);
        console.log(`➕ Added status effect ${name}`);
      } catch (error) {
        report.error(name, error);
      }
    }

    // The guide assigned ids we don't know yet.
    statusEffects.replaceAll(await retryOnce(() => ctx.guide.listStatic('statusEffects'), 'list status effects'));
    for (const name of report.toResult().created) {
      if (!statusEffects.findByName(name)) report.error(name, new LookupError('status effect', name));
    }
  }

  report.printSummary();
  return report.toResult();
}
