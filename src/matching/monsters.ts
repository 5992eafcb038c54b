/**
 * Monster matcher
 * Codex monsters, bosses and raids ↔ guide monsters.
 */

import {
  monsterEvents,
  monsterFamily,
  monsterIcon,
  monsterName,
  monsterUri,
  raidSpawnNames,
  RAID_SPAWNS,
} from '../codex/genericMonster.js';
import { retryOnce } from '../utils/resilience.js';
import { checkAll, checkerFor, listMissing, nameOf, partialLogger, type MatcherContext } from './common.js';
import { sortedUnique } from './diff.js';
import {
  eventName,
  eventSpawnIds,
  monsterAbilityIds,
  spawnIdsByName,
  useResolved,
} from './idResolver.js';
import { MatchReport } from './report.js';
import type { AdminMonster, CodexGenericMonster, MatchResult } from '../types.js';

const monsterSide = {
  name: monsterName,
  uri: monsterUri,
};

const RAID_SPAWN_NAMES = new Set(Object.values(RAID_SPAWNS));

export async function matchMonsters(ctx: MatcherContext): Promise<MatchResult> {
  const report = new MatchReport('monsters');
  const { store } = ctx;
  const all = [...store.codex.iterAllMonsters()];

  listMissing(report, all, monsterSide, store.guide.monsters, uri => store.codex.findGenericMonsterByUri(uri) !== undefined);
  if (ctx.config.fix) await addMissingEventSpawns(ctx, report, all);

  await checkAll(report, all, monsterSide, store.guide.monsters, (monster, admin) => checkMonster(ctx, report, monster, admin));

  report.printSummary();
  return report.toResult();
}

async function checkMonster(
  ctx: MatcherContext,
  report: MatchReport,
  monster: CodexGenericMonster,
  admin: AdminMonster,
): Promise<boolean> {
  const { store } = ctx;
  const statics = store.guide.static;
  const check = checkerFor(ctx, report, 'monsters', admin, store.guide.monsters);
  const onPartial = partialLogger(report, monsterName(monster));
  const spawnName = nameOf(statics.spawns);
  const spawns = {
    get: (e: AdminMonster) => e.spawns,
    set: (e: AdminMonster, ids: number[]) => { e.spawns = ids; },
  };

  await check.scalar('image_name', monsterIcon(monster), admin.imageName, (e, v) => { e.imageName = v; }, e => e.imageName);

  const familyName = (id: number | null) => (id === null ? null : statics.monsterFamilies.findById(id)?.name ?? `#${id}`);
  await check.scalar(
    'family',
    monsterFamily(monster),
    familyName(admin.family),
    (e, v) => { e.family = v === null ? null : statics.monsterFamilies.getByName(v).id; },
    e => familyName(e.family),
  );

  // Spawns hold events, raid markers and plain locations; each part is
  // compared on its own so the others are left alone.
  const eventIds = sortedUnique(useResolved(eventSpawnIds(monsterEvents(monster), statics.spawns), onPartial));
  const guideEventIds = admin.spawns.filter(id => {
    const spawn = statics.spawns.findById(id);
    return spawn !== undefined && eventName(spawn.name) !== null;
  });
  await check.list('events', eventIds, guideEventIds, spawnName, spawns);

  const raidIds = sortedUnique(useResolved(spawnIdsByName(raidSpawnNames(monster), statics.spawns), onPartial));
  const guideRaidIds = admin.spawns.filter(id => {
    const spawn = statics.spawns.findById(id);
    return spawn !== undefined && RAID_SPAWN_NAMES.has(spawn.name);
  });
  await check.list('raid_spawns', raidIds, guideRaidIds, spawnName, spawns);

  // Skills without a codex URI only exist on the guide; keep them out of the comparison.
  const abilityIds = sortedUnique(useResolved(monsterAbilityIds(monster, store.guide), onPartial));
  const guideAbilityIds = admin.skills.filter(id => {
    const skill = store.guide.skills.findById(id);
    return skill !== undefined && skill.codexUri !== '';
  });
  await check.list('abilities', abilityIds, guideAbilityIds, nameOf(store.guide.skills),
    { get: e => e.skills, set: (e, ids) => { e.skills = ids; } });

  return check.allMatched;
}

/**
 * Create an `Event: <name>` spawn for every codex event the guide doesn't
 * know, then refresh the spawn list to learn the new ids.
 */
async function addMissingEventSpawns(ctx: MatcherContext, report: MatchReport, monsters: CodexGenericMonster[]): Promise<void> {
  const spawns = ctx.store.guide.static.spawns;
  const known = new Set(spawns.entries.map(s => eventName(s.name)).filter((n): n is string => n !== null));
  const missing = sortedUnique(monsters.flatMap(monsterEvents)).filter(event => !known.has(event));
  if (missing.length === 0) return;

  for (const event of missing) {
    try {
      await ctx.guide.addStatic('spawns', `Event: ${event}`);
      report.created(`Event: ${event}`);
      console.log(`➕ Added spawn "Event: ${event}"`);
    } catch (error) {
      report.error(`Event: ${event}`, error);
    }
  }
  spawns.replaceAll(await retryOnce(() => ctx.guide.listStatic('spawns'), 'list spawns'));
}
