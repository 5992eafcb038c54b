/**
 * In-memory admin guide
 * Holds its own copy of the guide data, hands out clones, assigns ids on add
 * and records every call.
 */

import { HttpStatusError } from '../src/errors.js';
import type { AdminGuide } from '../src/sources/adminGuide.js';
import type {
  AddableStaticKind,
  GuideData,
  GuideEntityMap,
  GuideKind,
  GuideListEntry,
  StaticEntry,
  StaticKind,
} from '../src/types.js';

type Tables = { [K in GuideKind]: GuideEntityMap[K][] };
type Method = 'list' | 'fetch' | 'save' | 'add' | 'listStatic' | 'addStatic';

export class FakeAdminGuide implements AdminGuide {
  readonly data: GuideData;
  readonly calls: string[] = [];
  /** save() answers normally but stores nothing. */
  dropSaves = false;
  private readonly tables: Tables;
  private readonly failures = new Map<Method, number>();
  private nextId: number;

  constructor(data: GuideData, nextId = 1000) {
    this.data = structuredClone(data);
    this.tables = this.data;
    this.nextId = nextId;
  }

  /** Make the next `times` calls of `method` throw. */
  failNext(method: Method, times = 1): void {
    this.failures.set(method, times);
  }

  private enter(method: Method, detail: string): void {
    this.calls.push(`${method} ${detail}`);
    const left = this.failures.get(method) ?? 0;
    if (left > 0) {
      this.failures.set(method, left - 1);
      throw new HttpStatusError(method.toUpperCase(), `fake:${detail}`, 503);
    }
  }

  async list(kind: GuideKind): Promise<GuideListEntry[]> {
    this.enter('list', kind);
    const rows: { id: number; name: string }[] = this.tables[kind];
    return rows.map(e => ({ id: e.id, name: e.name }));
  }

  async fetch<K extends GuideKind>(kind: K, id: number): Promise<GuideEntityMap[K]> {
    this.enter('fetch', `${kind} #${id}`);
    const entity = this.tables[kind].find(e => e.id === id);
    if (!entity) throw new HttpStatusError('GET', `fake:${kind}/${id}`, 404);
    return structuredClone(entity);
  }

  async save<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void> {
    this.enter('save', `${kind} #${entity.id}`);
    const table = this.tables[kind];
    const index = table.findIndex(e => e.id === entity.id);
    if (index === -1) throw new HttpStatusError('POST', `fake:${kind}/${entity.id}`, 404);
    if (!this.dropSaves) table[index] = structuredClone(entity);
  }

  async add<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void> {
    this.enter('add', `${kind} ${entity.name}`);
    const added = structuredClone(entity);
    added.id = this.nextId++;
    this.tables[kind].push(added);
  }

  async listStatic(kind: StaticKind): Promise<StaticEntry[]> {
    this.enter('listStatic', kind);
    return structuredClone(this.data.static[kind]);
  }

  async addStatic(kind: AddableStaticKind, name: string): Promise<void> {
    this.enter('addStatic', `${kind} ${name}`);
    this.data.static[kind].push({ id: this.nextId++, name });
  }

  /** Current guide copy of an entity, for assertions. */
  get<K extends GuideKind>(kind: K, id: number): GuideEntityMap[K] | undefined {
    return this.tables[kind].find(e => e.id === id);
  }
}
