/**
 * Admin guide client
 * Reads and writes guide entities through the admin panel's HTML forms.
 * Auth is the session cookie of a logged-in admin.
 */

import { guideCircuitBreaker } from '../circuitBreaker.js';
import { config } from '../config.js';
import { ConfigError } from '../errors.js';
import {
  GUIDE_FORMS,
  checkFormFields,
  checkPostResponse,
  decodeGuideEntity,
  encodeGuideEntity,
  formFieldNames,
  parseAdminList,
  parseGuideForm,
  parseSelectOptions,
} from './guideForms.js';
import { HtmlClient } from './http.js';
import type { AdminGuide } from './adminGuide.js';
import type {
  AddableStaticKind,
  GuideEntityMap,
  GuideKind,
  GuideListEntry,
  StaticEntry,
  StaticKind,
} from '../types.js';

/** Static kinds with their own admin changelist. */
const STATIC_LISTS = {
  spawns: '/admin/orna/spawn',
  itemCategories: '/admin/items/category',
  itemTypes: '/admin/items/type',
  monsterFamilies: '/admin/monsters/family',
  statusEffects: '/admin/orna/statuseffect',
  skillTypes: '/admin/skills/skilltype',
} as const;

/** Static kinds only visible as the options of an item form select. */
const STATIC_SELECTS = {
  elements: 'element',
  equippedBys: 'equipped_by',
} as const;

const STATIC_ADD_FORMS: Record<AddableStaticKind, { root: string; field: string }> = {
  spawns: { root: '#spawn_form', field: 'description' },
  statusEffects: { root: '#statuseffect_form', field: 'name' },
};

export interface HttpAdminGuideOptions {
  host: string;
  cookie: string;
  sleepSeconds: number;
  timeout: number;
}

export class HttpAdminGuide implements AdminGuide {
  private readonly http: HtmlClient;

  constructor(options: HttpAdminGuideOptions) {
    if (!options.cookie) throw new ConfigError('GUIDE_COOKIE', 'a session cookie is required to use the admin guide');
    this.http = new HtmlClient({
      host: options.host,
      timeout: options.timeout,
      sleepSeconds: options.sleepSeconds,
      breaker: guideCircuitBreaker,
      headers: { Cookie: options.cookie },
    });
  }

  /** Every row of a changelist, following the paginator. */
  private async listAll(path: string): Promise<GuideListEntry[]> {
    const first = parseAdminList(await this.http.get(`${path}/`));
    const entries = [...first.entries];
    // Page 0 is the bare URL; `?p=1` is the second page.
    for (let page = 1; entries.length < first.total; page++) {
      const next = parseAdminList(await this.http.get(`${path}/?p=${page}`));
      if (next.entries.length === 0) break;
      entries.push(...next.entries);
    }
    return entries;
  }

  list(kind: GuideKind): Promise<GuideListEntry[]> {
    return this.listAll(GUIDE_FORMS[kind].path);
  }

  async fetch<K extends GuideKind>(kind: K, id: number): Promise<GuideEntityMap[K]> {
    const def = GUIDE_FORMS[kind];
    const html = await this.http.get(`${def.path}/${id}/change/`);
    return decodeGuideEntity(kind, id, parseGuideForm(html, def.root, formFieldNames(kind)));
  }

  /** GET the form for a fresh csrf token, check its fields, then POST. */
  private async submit(path: string, root: string, pairs: [string, string][], managed: readonly string[]): Promise<void> {
    const live = parseGuideForm(await this.http.get(path), root, []);
    checkFormFields(root, live, pairs, managed);
    console.log(`[Guide] POST ${path}`);
    const response = await this.http.post(path, [
      ...pairs,
      ['csrfmiddlewaretoken', live.csrfToken],
      ['_save', 'Save'],
    ]);
    checkPostResponse(this.http.url(path), response, root);
  }

  save<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void> {
    const def = GUIDE_FORMS[kind];
    return this.submit(`${def.path}/${entity.id}/change/`, def.root, encodeGuideEntity(kind, entity), formFieldNames(kind));
  }

  add<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): Promise<void> {
    const def = GUIDE_FORMS[kind];
    return this.submit(`${def.path}/add/`, def.root, encodeGuideEntity(kind, entity), formFieldNames(kind));
  }

  async listStatic(kind: StaticKind): Promise<StaticEntry[]> {
    switch (kind) {
      case 'elements':
      case 'equippedBys': {
        const items = GUIDE_FORMS.items;
        return parseSelectOptions(await this.http.get(`${items.path}/add/`), items.root, STATIC_SELECTS[kind]);
      }
      default: {
        const rows = await this.listAll(STATIC_LISTS[kind]);
        return rows.map(row => ({ id: row.id, name: row.name }));
      }
    }
  }

  addStatic(kind: AddableStaticKind, name: string): Promise<void> {
    const { root, field } = STATIC_ADD_FORMS[kind];
    return this.submit(`${STATIC_LISTS[kind]}/add/`, root, [[field, name]], [field]);
  }
}

export function createAdminGuide(options: HttpAdminGuideOptions = config.guide): HttpAdminGuide {
  return new HttpAdminGuide(options);
}
