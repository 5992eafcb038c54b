/**
 * Admin guide capability
 * What the matchers and the refresh need from the guide. HttpAdminGuide is
 * the real implementation; tests use an in-memory one.
 */

import type {
  AddableStaticKind,
  GuideEntityMap,
  GuideKind,
  GuideListEntry,
  StaticEntry,
  StaticKind,
} from '../types.js';

export interface AdminGuide {
  list(kind: GuideKind): Promise<GuideListEntry[]>;
  fetch<K extends GuideKind>(kind: K, id: number): Promise<GuideEntityMap[K]>;
  /** Full overwrite of the stored entity. */
  save<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void>;
  /** The guide assigns the id; re-list to learn it. `entity.id` is ignored. */
  add<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void>;
  listStatic(kind: StaticKind): Promise<StaticEntry[]>;
  addStatic(kind: AddableStaticKind, name: string): Promise<void>;
}
