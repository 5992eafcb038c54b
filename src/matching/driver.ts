/**
 * Reconciliation driver
 * Runs the matchers over one snapshot in a fixed order. Later matchers read
 * ids that earlier ones may have just fixed or created (monster abilities use
 * the skill table, and so on), so the order is not negotiable.
 */

import { errorMessage } from '../errors.js';
import { matchItems } from './items.js';
import { matchMonsters } from './monsters.js';
import { matchPets } from './pets.js';
import { matchSkills } from './skills.js';
import { matchStatusEffects } from './statusEffects.js';
import type { MatcherContext } from './common.js';
import type { MatchKind, MatchResult } from '../types.js';

export const MATCH_ORDER: readonly MatchKind[] = ['items', 'monsters', 'skills', 'pets', 'statusEffects'];

/** Status effects only run when asked for. */
export const DEFAULT_MATCH_KINDS: readonly MatchKind[] = ['items', 'monsters', 'skills', 'pets'];

const MATCHERS: Record<MatchKind, (ctx: MatcherContext) => Promise<MatchResult>> = {
  items: matchItems,
  monsters: matchMonsters,
  skills: matchSkills,
  pets: matchPets,
  statusEffects: matchStatusEffects,
};

export interface MatchRun {
  ok: boolean;
  fix: boolean;
  kinds: MatchKind[];
  startedAt: string;
  finishedAt: string;
  results: MatchResult[];
}

function failedResult(kind: MatchKind, error: unknown): MatchResult {
  return {
    kind,
    checked: 0,
    matched: 0,
    fixed: 0,
    mismatches: [],
    missingOnGuide: [],
    notOnCodex: [],
    unmatched: [],
    created: [],
    errors: [{ entity: kind, message: errorMessage(error) }],
  };
}

/**
 * Run the requested matchers, in MATCH_ORDER whatever order they were asked
 * in. `ok` is false as soon as one matcher recorded an error; mismatches
 * alone don't count.
 */
export async function runMatch(ctx: MatcherContext, kinds: readonly MatchKind[] = DEFAULT_MATCH_KINDS): Promise<MatchRun> {
  const selected = MATCH_ORDER.filter(kind => kinds.includes(kind));
  const startedAt = new Date().toISOString();
  const results: MatchResult[] = [];

  for (const kind of selected) {
    console.log(`\n${'─'.repeat(50)}\n🔎 Matching ${kind}${ctx.config.fix ? ' (fix mode)' : ''}\n${'─'.repeat(50)}`);
    try {
      results.push(await MATCHERS[kind](ctx));
    } catch (error) {
      console.error(`[Match:${kind}] aborted:`, errorMessage(error));
      results.push(failedResult(kind, error));
    }
  }

  return {
    ok: results.every(r => r.errors.length === 0),
    fix: ctx.config.fix,
    kinds: selected,
    startedAt,
    finishedAt: new Date().toISOString(),
    results,
  };
}

export function parseMatchKind(value: string): MatchKind | null {
  switch (value) {
    case 'items':
    case 'monsters':
    case 'skills':
    case 'pets':
      return value;
    case 'status_effects':
    case 'statusEffects':
      return 'statusEffects';
    default:
      return null;
  }
}
