/**
 * Shared matcher plumbing: context, locate, missing listings, display names.
 */

import { LookupError } from '../errors.js';
import { retryOnce } from '../utils/resilience.js';
import { Checker } from './checker.js';
import type { MatchConfig } from './config.js';
import type { MatchReport } from './report.js';
import type { GuideCollection, OrnaStore } from '../data/store.js';
import type { AdminGuide } from '../sources/adminGuide.js';
import type { GuideEntityMap, GuideKind } from '../types.js';

export interface MatcherContext {
  store: OrnaStore;
  guide: AdminGuide;
  config: MatchConfig;
}

export interface CodexSide<C> {
  name: (entity: C) => string;
  uri: (entity: C) => string;
}

// =============================================================================
// Listings
// =============================================================================

/**
 * Report codex entities nobody on the guide points at, and guide entities
 * pointing nowhere. Returns the codex entities missing on the guide.
 */
export function listMissing<C, G extends { id: number; name: string; codexUri: string }>(
  report: MatchReport,
  codexEntities: Iterable<C>,
  side: CodexSide<C>,
  collection: GuideCollection<G>,
  codexResolves: (uri: string) => boolean,
  ignoreGuideEntity: (entity: G) => boolean = () => false,
): C[] {
  const missing: C[] = [];
  for (const entity of codexEntities) {
    if (collection.findAllByUri(side.uri(entity)).length === 0) {
      missing.push(entity);
      report.missingOnGuide(`${side.name(entity)} (${side.uri(entity)})`);
    }
  }

  for (const entity of collection.entries) {
    if (ignoreGuideEntity(entity)) continue;
    const label = `${entity.name} (#${entity.id})`;
    if (entity.codexUri === '') {
      report.unmatched(label);
    } else if (!codexResolves(entity.codexUri)) {
      report.notOnCodex(`${label} → ${entity.codexUri}`);
      report.error(label, new LookupError('codex entity', entity.codexUri));
    }
  }
  return missing;
}

/**
 * Pair every codex entity with its guide entity and run `check` on the pair.
 * Missing pairs were already listed; ambiguous ones and failed checks are
 * recorded as errors without stopping the loop.
 */
export async function checkAll<C, G extends { id: number; codexUri: string }>(
  report: MatchReport,
  codexEntities: Iterable<C>,
  side: CodexSide<C>,
  collection: GuideCollection<G>,
  check: (codex: C, guide: G) => Promise<boolean>,
  skipUris: ReadonlySet<string> = new Set(),
): Promise<void> {
  for (const entity of codexEntities) {
    const uri = side.uri(entity);
    if (skipUris.has(uri)) continue;
    const name = side.name(entity);
    try {
      const match = collection.findByUri(uri);
      if (!match) continue;
      report.entityChecked(await check(entity, match));
    } catch (error) {
      report.error(name, error);
    }
  }
}

/** Checker bound to one guide entity, writing confirmed fixes back to the store. */
export function checkerFor<K extends GuideKind>(
  ctx: MatcherContext,
  report: MatchReport,
  kind: K,
  entity: GuideEntityMap[K],
  collection: GuideCollection<GuideEntityMap[K]>,
): Checker<GuideEntityMap[K]> {
  return new Checker<GuideEntityMap[K]>({
    report,
    entityName: entity.name,
    entityId: entity.id,
    fix: ctx.config.fix,
    retrieve: () => ctx.guide.fetch(kind, entity.id),
    save: live => ctx.guide.save(kind, live),
    onConfirmed: confirmed => collection.replace(confirmed),
  });
}

/**
 * After `add` calls, re-list the kind, fetch every id the store doesn't know
 * yet and add it. Returns the new entities.
 */
export async function pullNewEntities<K extends GuideKind>(
  ctx: MatcherContext,
  kind: K,
  collection: GuideCollection<GuideEntityMap[K]>,
): Promise<GuideEntityMap[K][]> {
  const rows = await retryOnce(() => ctx.guide.list(kind), `list ${kind}`);
  const added: GuideEntityMap[K][] = [];
  for (const row of rows) {
    if (collection.findById(row.id)) continue;
    const entity = await retryOnce(() => ctx.guide.fetch(kind, row.id), `retrieve ${kind} #${row.id}`);
    collection.upsert(entity);
    added.push(entity);
  }
  return added;
}

// =============================================================================
// Display
// =============================================================================

export function nameOf(collection: { findById(id: number): { name: string } | undefined }): (id: number) => string {
  return id => collection.findById(id)?.name ?? `#${id}`;
}

/** `log` for partial conversions, bound to an entity. */
export function partialLogger(report: MatchReport, entity: string) {
  return (category: string, failures: readonly string[]) => report.partial(entity, category, failures);
}
