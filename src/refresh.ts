/**
 * Bulk refresh
 * Pulls every entity from the guide or the codex into a fresh snapshot.
 *
 * With no delay configured, fetches run in a bounded pool. With a delay,
 * they run one at a time with the delay between them. Cancellation is
 * checked before each fetch, never mid-request.
 */

import pLimit from 'p-limit';
import { RefreshCancelledError } from './errors.js';
import { retryOnce, sleep } from './utils/resilience.js';
import type { AdminGuide } from './sources/adminGuide.js';
import type { Codex } from './sources/codex.js';
import type {
  CodexData,
  CodexEntityMap,
  CodexKind,
  GuideData,
  GuideEntityMap,
  GuideKind,
  GuideStatic,
  StaticKind,
} from './types.js';

export interface RefreshOptions {
  /** Delay between fetches. Anything above 0 makes the refresh serial. */
  sleepSeconds: number;
  /** Pool size when there is no delay. */
  concurrency: number;
  signal?: AbortSignal;
}

const PROGRESS_EVERY = 25;

/**
 * Fetch one entity per row. Results keep the order of `rows`.
 * Throws RefreshCancelledError once `signal` is aborted.
 */
export async function fetchAll<T, R>(
  label: string,
  rows: readonly T[],
  fetchOne: (row: T) => Promise<R>,
  options: RefreshOptions,
): Promise<R[]> {
  const total = rows.length;
  let done = 0;

  const step = async (row: T): Promise<R> => {
    if (options.signal?.aborted) throw new RefreshCancelledError(done, total);
    const result = await retryOnce(() => fetchOne(row), label);
    done++;
    if (done % PROGRESS_EVERY === 0 || done === total) {
      console.log(`[Refresh] ${label}: ${done}/${total}`);
    }
    return result;
  };

  if (options.sleepSeconds > 0) {
    const results: R[] = [];
    for (const [index, row] of rows.entries()) {
      if (index > 0) await sleep(options.sleepSeconds * 1000);
      results.push(await step(row));
    }
    return results;
  }

  const limit = pLimit(Math.max(1, options.concurrency));
  try {
    return await Promise.all(rows.map(row => limit(() => step(row))));
  } catch (error) {
    limit.clearQueue();
    throw error;
  }
}

// =============================================================================
// Guide
// =============================================================================

async function refreshGuideKind<K extends GuideKind>(
  guide: AdminGuide,
  kind: K,
  options: RefreshOptions,
): Promise<GuideEntityMap[K][]> {
  const rows = await retryOnce(() => guide.list(kind), `list ${kind}`);
  console.log(`[Refresh] Guide ${kind}: ${rows.length} listed`);
  return fetchAll(`guide ${kind}`, rows, row => guide.fetch(kind, row.id), options);
}

export async function refreshGuideStatic(guide: AdminGuide): Promise<GuideStatic> {
  const list = (kind: StaticKind) => retryOnce(() => guide.listStatic(kind), `list ${kind}`);
  return {
    spawns: await list('spawns'),
    itemCategories: await list('itemCategories'),
    itemTypes: await list('itemTypes'),
    monsterFamilies: await list('monsterFamilies'),
    statusEffects: await list('statusEffects'),
    elements: await list('elements'),
    equippedBys: await list('equippedBys'),
    skillTypes: await list('skillTypes'),
  };
}

export async function refreshGuide(guide: AdminGuide, options: RefreshOptions): Promise<GuideData> {
  console.log(`[Refresh] Guide: ${options.sleepSeconds > 0 ? `serial, ${options.sleepSeconds}s apart` : `${options.concurrency} at a time`}`);
  const data: GuideData = {
    items: await refreshGuideKind(guide, 'items', options),
    monsters: await refreshGuideKind(guide, 'monsters', options),
    skills: await refreshGuideKind(guide, 'skills', options),
    pets: await refreshGuideKind(guide, 'pets', options),
    static: await refreshGuideStatic(guide),
  };
  console.log(`[Refresh] ✅ Guide done: ${data.items.length} items, ${data.monsters.length} monsters, ${data.skills.length} skills, ${data.pets.length} pets`);
  return data;
}

// =============================================================================
// Codex
// =============================================================================

async function refreshCodexKind<K extends CodexKind>(
  codex: Codex,
  kind: K,
  options: RefreshOptions,
): Promise<CodexEntityMap[K][]> {
  const rows = await retryOnce(() => codex.list(kind), `list codex ${kind}`);
  console.log(`[Refresh] Codex ${kind}: ${rows.length} listed`);
  return fetchAll(`codex ${kind}`, rows, row => codex.fetch(kind, row.slug), options);
}

export async function refreshCodex(codex: Codex, options: RefreshOptions): Promise<CodexData> {
  const data: CodexData = {
    items: await refreshCodexKind(codex, 'items', options),
    monsters: await refreshCodexKind(codex, 'monsters', options),
    bosses: await refreshCodexKind(codex, 'bosses', options),
    raids: await refreshCodexKind(codex, 'raids', options),
    skills: await refreshCodexKind(codex, 'spells', options),
    followers: await refreshCodexKind(codex, 'followers', options),
  };
  console.log(`[Refresh] ✅ Codex done: ${data.items.length} items, ${data.skills.length} spells, ${data.followers.length} followers`);
  return data;
}
