/**
 * Item matcher
 * Codex items ↔ guide items. Also owns the "dropped by" relation, which the
 * guide stores on monsters.
 */

import { codexUri } from '../codex/uri.js';
import { LookupError } from '../errors.js';
import { checkAll, checkerFor, listMissing, nameOf, partialLogger, pullNewEntities, type MatcherContext } from './common.js';
import { fixOther, type Checker } from './checker.js';
import { guideStatusName, type MatchConfig } from './config.js';
import { sortedUnique } from './diff.js';
import {
  itemDroppedByIds,
  itemUpgradeMaterialIds,
  optionalStaticId,
  sanitizeGuideName,
  statusEffectIds,
  useResolved,
} from './idResolver.js';
import { MatchReport } from './report.js';
import { AdminItemSchema } from '../data/schemas.js';
import type { AdminItem, AdminSkill, CodexItem, MatchResult } from '../types.js';

/** Stats compared one-to-one; a stat missing on the codex counts as 0. */
export const ITEM_STATS = [
  'attack',
  'magic',
  'hp',
  'mana',
  'defense',
  'resistance',
  'ward',
  'dexterity',
  'crit',
  'foresight',
] as const;

const itemSide = {
  name: (item: CodexItem) => item.name,
  uri: (item: CodexItem) => codexUri('items', item.slug),
};

export async function matchItems(ctx: MatcherContext): Promise<MatchResult> {
  const report = new MatchReport('items');
  const { store } = ctx;

  const missing = listMissing(report, store.codex.items.entries, itemSide, store.guide.items, uri => store.codex.items.findByUri(uri) !== undefined);
  const created = ctx.config.fix && missing.length > 0 ? await createMissingItems(ctx, report, missing) : new Set<string>();

  const offhands = offhandSkillsByName(store.guide.skills.entries);
  await checkAll(report, store.codex.items.entries, itemSide, store.guide.items,
    (item, admin) => checkItem(ctx, report, item, admin, offhands), created);

  report.printSummary();
  return report.toResult();
}

// =============================================================================
// Field checks
// =============================================================================

async function checkItem(
  ctx: MatcherContext,
  report: MatchReport,
  item: CodexItem,
  admin: AdminItem,
  offhands: Map<string, AdminSkill[]>,
): Promise<boolean> {
  const { store, config } = ctx;
  const statics = store.guide.static;
  const check = checkerFor(ctx, report, 'items', admin, store.guide.items);
  const onPartial = partialLogger(report, item.name);
  const statusName = nameOf(statics.statusEffects);

  await check.scalar('image_name', item.icon, admin.imageName, (e, v) => { e.imageName = v; }, e => e.imageName);
  await check.scalar('description', item.description, admin.description, (e, v) => { e.description = v; }, e => e.description);

  for (const stat of ITEM_STATS) {
    await check.scalar(stat, item.stats?.[stat] ?? 0, admin[stat], (e, v) => { e[stat] = v; }, e => e[stat]);
  }

  await check.scalar(
    'base_adornment_slots',
    item.stats?.adornmentSlots ?? 0,
    admin.baseAdornmentSlots,
    (e, v) => {
      e.baseAdornmentSlots = v;
      e.hasSlots = v > 0;
    },
    e => e.baseAdornmentSlots,
  );

  const codexElement = item.stats?.element ?? null;
  await check.scalar(
    'element',
    codexElement,
    admin.element === null ? null : statics.elements.findById(admin.element)?.name ?? null,
    (e, v) => { e.element = v === null ? null : statics.elements.getByName(v).id; },
    e => (e.element === null ? null : statics.elements.findById(e.element)?.name ?? null),
  );

  const skillName = (id: number | null) => {
    if (id === null) return null;
    const skill = store.guide.skills.findById(id);
    return skill ? sanitizeGuideName(skill.name) : `#${id}`;
  };
  await check.scalar(
    'ability',
    item.ability?.name ?? null,
    skillName(admin.ability),
    (e, v) => { e.ability = v === null ? null : findOffhand(offhands, v).id; },
    e => skillName(e.ability),
  );

  // Weapons inflict their element's statuses on top of the listed ones.
  const isWeapon = admin.type !== null && statics.itemTypes.findById(admin.type)?.name === config.weaponItemType;
  const causesNames = item.causes.map(c => c.name);
  if (isWeapon && codexElement !== null) causesNames.push(...(config.elementStatuses[codexElement] ?? []));
  const effects = (names: string[]) =>
    sortedUnique(useResolved(statusEffectIds(names, statics.statusEffects, config), onPartial));

  await check.list('causes', effects(causesNames), admin.causes, statusName,
    { get: e => e.causes, set: (e, ids) => { e.causes = ids; } });
  await check.list('cures', effects(item.cures.map(c => c.name)), admin.cures, statusName,
    { get: e => e.cures, set: (e, ids) => { e.cures = ids; } });
  await check.list('gives', effects(item.gives.map(g => g.name)), admin.gives, statusName,
    { get: e => e.gives, set: (e, ids) => { e.gives = ids; } });
  await check.list('prevents', effects(item.immunities.map(i => i.name)), admin.prevents, statusName,
    { get: e => e.prevents, set: (e, ids) => { e.prevents = ids; } });

  await checkDroppedBy(ctx, check, item, admin, onPartial);

  await check.list(
    'materials',
    useResolved(itemUpgradeMaterialIds(item, store.guide), onPartial),
    admin.materials,
    nameOf(store.guide.items),
    { get: e => e.materials, set: (e, ids) => { e.materials = ids; } },
  );

  return check.allMatched;
}

/**
 * The guide has no "dropped by" on items: it is every monster whose drops
 * hold the item. Monsters without a codex URI are guide-only and ignored.
 */
async function checkDroppedBy(
  ctx: MatcherContext,
  check: Checker<AdminItem>,
  item: CodexItem,
  admin: AdminItem,
  onPartial: (category: string, failures: readonly string[]) => void,
): Promise<boolean> {
  const monsters = ctx.store.guide.monsters;
  const guideIds = monsters.entries
    .filter(m => m.codexUri !== '' && m.drops.includes(admin.id))
    .map(m => m.id);
  const codexIds = useResolved(itemDroppedByIds(item, ctx.store.guide), onPartial);

  return check.external('dropped_by', codexIds, guideIds, nameOf(monsters), async (toAdd, toRemove) => {
    const edit = async (monsterId: number, add: boolean) => {
      const label = `${nameOf(monsters)(monsterId)} (#${monsterId})`;
      const confirmed = await fixOther(
        label,
        () => ctx.guide.fetch('monsters', monsterId),
        live => ctx.guide.save('monsters', live),
        live => {
          const has = live.drops.includes(admin.id);
          if (has === add) return false;
          live.drops = add ? [...live.drops, admin.id] : live.drops.filter(id => id !== admin.id);
          return true;
        },
        live => live.drops.includes(admin.id) === add,
      );
      if (confirmed) monsters.replace(confirmed);
    };
    for (const id of toRemove) await edit(id, false);
    for (const id of toAdd) await edit(id, true);
  });
}

// =============================================================================
// Off-hand abilities
// =============================================================================

function offhandSkillsByName(skills: readonly AdminSkill[]): Map<string, AdminSkill[]> {
  const byName = new Map<string, AdminSkill[]>();
  for (const skill of skills) {
    if (!skill.offhand) continue;
    const name = sanitizeGuideName(skill.name);
    const bucket = byName.get(name);
    if (bucket) bucket.push(skill);
    else byName.set(name, [skill]);
  }
  return byName;
}

function findOffhand(offhands: Map<string, AdminSkill[]>, name: string): AdminSkill {
  const matches = offhands.get(name) ?? [];
  if (matches.length !== 1) throw new LookupError('off-hand skill', name, matches.length);
  return matches[0];
}

// =============================================================================
// Creation
// =============================================================================

/** Guide item built from a codex item; cross-references that don't resolve are dropped. */
export function toAdminItem(ctx: MatcherContext, item: CodexItem, report: MatchReport): AdminItem {
  const { store, config } = ctx;
  const statics = store.guide.static;
  const onPartial = partialLogger(report, item.name);
  const effects = (names: string[]) =>
    sortedUnique(useResolved(statusEffectIds(names, statics.statusEffects, config), onPartial));
  const element = useResolved(optionalStaticId('element', item.stats?.element ?? null, statics.elements), onPartial);
  const slots = item.stats?.adornmentSlots ?? 0;

  return AdminItemSchema.parse({
    id: 0,
    codexUri: codexUri('items', item.slug),
    name: item.name,
    tier: item.tier,
    imageName: item.icon,
    description: item.description,
    rarity: item.rarity ?? '',
    attack: item.stats?.attack ?? 0,
    magic: item.stats?.magic ?? 0,
    hp: item.stats?.hp ?? 0,
    mana: item.stats?.mana ?? 0,
    defense: item.stats?.defense ?? 0,
    resistance: item.stats?.resistance ?? 0,
    ward: item.stats?.ward ?? 0,
    dexterity: item.stats?.dexterity ?? 0,
    crit: item.stats?.crit ?? 0,
    foresight: item.stats?.foresight ?? 0,
    baseAdornmentSlots: slots,
    hasSlots: slots > 0,
    element: element[0] ?? null,
    causes: effects(item.causes.map(c => c.name)),
    cures: effects(item.cures.map(c => c.name)),
    gives: effects(item.gives.map(g => g.name)),
    prevents: effects(item.immunities.map(i => i.name)),
    materials: useResolved(itemUpgradeMaterialIds(item, store.guide), onPartial),
  });
}

/**
 * Add the missing items to the guide, then pull them back to learn their ids.
 * Returns the codex URIs created this pass; they aren't field-checked until the next one.
 */
async function createMissingItems(ctx: MatcherContext, report: MatchReport, missing: CodexItem[]): Promise<Set<string>> {
  const created = new Set<string>();
  for (const item of missing) {
    try {
      await ctx.guide.add('items', toAdminItem(ctx, item, report));
      created.add(itemSide.uri(item));
      report.created(item.name);
      console.log(`➕ Added item ${item.name}`);
    } catch (error) {
      report.error(item.name, error);
    }
  }
  if (created.size > 0) await pullNewEntities(ctx, 'items', ctx.store.guide.items);
  return created;
}

/** Exposed for the status effect matcher: every effect name an item mentions, renamed. */
export function itemStatusNames(item: CodexItem, config: MatchConfig): string[] {
  return [...item.causes, ...item.cures, ...item.immunities, ...item.gives].map(e => guideStatusName(config, e.name));
}
