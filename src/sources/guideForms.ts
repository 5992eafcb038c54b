/**
 * Admin guide HTML
 * Change forms, list pages and POST error pages of the admin panel, and the
 * mapping between form fields and guide entities.
 */

import * as cheerio from 'cheerio';
import type { z } from 'zod';
import { AdminItemSchema, AdminMonsterSchema, AdminPetSchema, AdminSkillSchema } from '../data/schemas.js';
import { ConfigError, GuideFormError, GuidePostError, HtmlParseError } from '../errors.js';
import type { GuideEntityMap, GuideKind, GuideListEntry, StaticEntry } from '../types.js';

// =============================================================================
// Form definitions
// =============================================================================

/**
 * How a value travels through the form:
 * - `text`/`int`/`number`: one input or textarea
 * - `bool`: checkbox, sent as `on` only when set
 * - `id?`: single select, empty for none
 * - `ids`: multi-select, one pair per selected id
 * - `costType`: pet cost select, `1` for orns
 */
export type FieldType = 'text' | 'int' | 'number' | 'bool' | 'id?' | 'ids' | 'costType';

export type FieldTable<E> = readonly (readonly [formName: string, key: Extract<keyof E, string>, type: FieldType])[];

export interface GuideFormDef<E> {
  /** Root element of the form, e.g. `#item_form`. */
  root: string;
  /** Admin path of the kind, e.g. `/admin/items/item`. */
  path: string;
  fields: FieldTable<E>;
  schema: z.ZodType<E, z.ZodTypeDef, unknown>;
}

type GuideForms = { [K in GuideKind]: GuideFormDef<GuideEntityMap[K]> };

export const GUIDE_FORMS: GuideForms = {
  items: {
    root: '#item_form',
    path: '/admin/items/item',
    schema: AdminItemSchema,
    fields: [
      ['codex', 'codexUri', 'text'],
      ['name', 'name', 'text'],
      ['tier', 'tier', 'int'],
      ['type', 'type', 'id?'],
      ['image_name', 'imageName', 'text'],
      ['description', 'description', 'text'],
      ['notes', 'notes', 'text'],
      ['hp', 'hp', 'number'],
      ['mana', 'mana', 'number'],
      ['attack', 'attack', 'number'],
      ['magic', 'magic', 'number'],
      ['defense', 'defense', 'number'],
      ['resistance', 'resistance', 'number'],
      ['dexterity', 'dexterity', 'number'],
      ['ward', 'ward', 'number'],
      ['crit', 'crit', 'number'],
      ['foresight', 'foresight', 'number'],
      ['has_slots', 'hasSlots', 'bool'],
      ['base_adornment_slots', 'baseAdornmentSlots', 'int'],
      ['rarity', 'rarity', 'text'],
      ['element', 'element', 'id?'],
      ['equipped_by', 'equippedBy', 'ids'],
      ['two_handed', 'twoHanded', 'bool'],
      ['boss', 'boss', 'bool'],
      ['arena', 'arena', 'bool'],
      ['category', 'category', 'id?'],
      ['causes', 'causes', 'ids'],
      ['cures', 'cures', 'ids'],
      ['gives', 'gives', 'ids'],
      ['prevents', 'prevents', 'ids'],
      ['materials', 'materials', 'ids'],
      ['price', 'price', 'int'],
      ['ability', 'ability', 'id?'],
    ],
  },
  monsters: {
    root: '#monster_form',
    path: '/admin/monsters/monster',
    schema: AdminMonsterSchema,
    fields: [
      ['codex', 'codexUri', 'text'],
      ['name', 'name', 'text'],
      ['tier', 'tier', 'int'],
      ['family', 'family', 'id?'],
      ['image_name', 'imageName', 'text'],
      ['boss', 'boss', 'bool'],
      ['level', 'level', 'int'],
      ['hp', 'hp', 'int'],
      ['notes', 'notes', 'text'],
      ['spawns', 'spawns', 'ids'],
      ['weak_to', 'weakTo', 'ids'],
      ['resistant_to', 'resistantTo', 'ids'],
      ['immune_to', 'immuneTo', 'ids'],
      ['immune_to_status', 'immuneToStatus', 'ids'],
      ['drops', 'drops', 'ids'],
      ['skills', 'skills', 'ids'],
    ],
  },
  skills: {
    root: '#skill_form',
    path: '/admin/skills/skill',
    schema: AdminSkillSchema,
    fields: [
      ['codex', 'codexUri', 'text'],
      ['name', 'name', 'text'],
      ['tier', 'tier', 'int'],
      ['type', 'type', 'id?'],
      ['is_magic', 'isMagic', 'bool'],
      ['mana_cost', 'manaCost', 'int'],
      ['description', 'description', 'text'],
      ['element', 'element', 'id?'],
      ['offhand', 'offhand', 'bool'],
      ['cost', 'cost', 'int'],
      ['bought', 'bought', 'bool'],
      ['skill_power', 'skillPower', 'number'],
      ['strikes', 'strikes', 'int'],
      ['modifier_min', 'modifierMin', 'number'],
      ['modifier_max', 'modifierMax', 'number'],
      ['extra', 'extra', 'text'],
      ['buffed_by', 'buffedBy', 'ids'],
      ['causes', 'causes', 'ids'],
      ['cures', 'cures', 'ids'],
      ['gives', 'gives', 'ids'],
    ],
  },
  pets: {
    root: '#pet_form',
    path: '/admin/pets/pet',
    schema: AdminPetSchema,
    fields: [
      ['codex', 'codexUri', 'text'],
      ['name', 'name', 'text'],
      ['tier', 'tier', 'int'],
      ['image_name', 'imageName', 'text'],
      ['description', 'description', 'text'],
      ['attack', 'attack', 'int'],
      ['heal', 'heal', 'int'],
      ['buff', 'buff', 'int'],
      ['debuff', 'debuff', 'int'],
      ['spell', 'spell', 'int'],
      ['protect', 'protect', 'int'],
      ['cost', 'cost', 'int'],
      ['cost_type', 'costType', 'costType'],
      ['limited', 'limited', 'bool'],
      ['limited_details', 'limitedDetails', 'text'],
      ['skills', 'skills', 'ids'],
    ],
  },
};

export function formFieldNames(kind: GuideKind): string[] {
  return GUIDE_FORMS[kind].fields.map(([name]) => name);
}

// =============================================================================
// Parsing
// =============================================================================

export interface ParsedForm {
  csrfToken: string;
  /** Every `#id_*` control of the form, selected or not. */
  controls: Set<string>;
  /** Values of the requested fields, in form order. Multi-selects repeat their name. */
  fields: [string, string][];
}

/** The admin login page, served in place of any page once the session cookie has expired. */
function isLoginPage($: cheerio.CheerioAPI): boolean {
  return $('#login-form').length > 0 || $('form[action*="/login/"] input[name="password"]').length > 0;
}

function sessionRejected(where: string): ConfigError {
  return new ConfigError('GUIDE_COOKIE', `session rejected, ${where} answered with the login page`);
}

/**
 * Read a form and the values of `fieldNames`. A requested field absent from
 * the form is a GuideFormError: the guide's model changed under us.
 */
export function parseGuideForm(html: string, root: string, fieldNames: readonly string[]): ParsedForm {
  const $ = cheerio.load(html);
  const form = $(root).first();
  if (form.length === 0) {
    if (isLoginPage($)) throw sessionRejected(`the ${root} page`);
    throw new HtmlParseError('guide form', `no ${root} in page`);
  }

  const csrfToken = form.find('[name="csrfmiddlewaretoken"]').attr('value');
  if (csrfToken === undefined) throw new HtmlParseError('guide form', `no csrf token in ${root}`);

  const controls = new Set<string>();
  form.find('[id^="id_"]').each((_, el) => {
    const id = $(el).attr('id');
    if (id) controls.add(id.slice('id_'.length));
  });

  const fields: [string, string][] = [];
  for (const name of fieldNames) {
    const control = form.find(`#id_${name}`).first();
    if (control.length === 0) throw new GuideFormError(root, name, 'missing from the form');

    if (control.is('input')) {
      const type = (control.attr('type') ?? 'text').toLowerCase();
      if (type !== 'checkbox') fields.push([name, control.attr('value') ?? '']);
      else if (control.attr('checked') !== undefined) fields.push([name, 'on']);
    } else if (control.is('select')) {
      control.find('option[selected]').each((_, option) => {
        fields.push([name, $(option).attr('value') ?? '']);
      });
    } else if (control.is('textarea')) {
      fields.push([name, control.text()]);
    } else {
      throw new HtmlParseError('guide form', `#id_${name} is not an input, select or textarea`);
    }
  }
  return { csrfToken, controls, fields };
}

/** Options of a select control, e.g. the element list of the item form. */
export function parseSelectOptions(html: string, root: string, fieldName: string): StaticEntry[] {
  const $ = cheerio.load(html);
  const select = $(root).find(`select#id_${fieldName}`).first();
  if (select.length === 0) throw new GuideFormError(root, fieldName, 'missing from the form');

  const entries: StaticEntry[] = [];
  select.find('option').each((_, option) => {
    const value = $(option).attr('value') ?? '';
    if (value === '') return;
    entries.push({ id: Number(value), name: $(option).text().trim() });
  });
  return entries;
}

export interface ParsedList {
  entries: GuideListEntry[];
  /** Total across all pages, from the paginator. */
  total: number;
}

function idFromChangeHref(href: string): number {
  const path = href.split('?')[0];
  const match = /\/(\d+)\/change\/$/.exec(path);
  if (!match) throw new HtmlParseError('admin list', `unexpected row link ${href}`);
  return Number(match[1]);
}

/** One page of an admin changelist. */
export function parseAdminList(html: string): ParsedList {
  const $ = cheerio.load(html);
  const table = $('#result_list');
  if (table.length === 0) throw new HtmlParseError('admin list', 'no #result_list');

  const entries: GuideListEntry[] = [];
  table.find('tbody tr').each((_, tr) => {
    const link = $(tr).find('a').first();
    const href = link.attr('href');
    if (href === undefined) throw new HtmlParseError('admin list', 'row without link');
    entries.push({ id: idFromChangeHref(href), name: link.text().trim() });
  });

  // "1 2 … 7 312 items": the count is the last number before the label.
  let total: number | null = null;
  for (const token of $('.paginator').first().text().split(/\s+/).filter(Boolean)) {
    if (token === '...' || token === '…') continue;
    const value = Number(token);
    if (!Number.isInteger(value)) break;
    total = value;
  }
  if (total === null) throw new HtmlParseError('admin list', 'no entry count in paginator');
  return { entries, total };
}

/**
 * After a POST, the guide redirects on success and re-renders the form on
 * failure. Throws GuidePostError when the form is back with error notes, and
 * ConfigError when the redirect went to the login page instead.
 */
export function checkPostResponse(url: string, html: string, root: string): void {
  const $ = cheerio.load(html);
  if (isLoginPage($)) throw sessionRejected(`POST ${url}`);
  const form = $(root);
  if (form.length === 0) return;

  const note = form.find('.errornote').first().text().trim();
  const fieldErrors: string[] = [];
  form.find('.errors').each((_, node) => {
    const fieldNames = ($(node).attr('class') ?? '')
      .split(/\s+/)
      .filter(c => c.startsWith('field-'))
      .map(c => c.slice('field-'.length));
    const messages = $(node).find('.errorlist li').map((_, li) => $(li).text().trim()).get();
    for (const field of fieldNames) {
      for (const message of messages) fieldErrors.push(`${field}: ${message}`);
    }
  });
  throw new GuidePostError(url, note || 'form re-rendered', fieldErrors);
}

// =============================================================================
// Entity mapping
// =============================================================================

function singleValue(values: readonly string[]): string {
  return values[0] ?? '';
}

function decodeValue(type: FieldType, values: readonly string[]): unknown {
  const value = singleValue(values);
  switch (type) {
    case 'text':
      return value;
    case 'int':
    case 'number':
      return value.trim() === '' ? 0 : Number(value);
    case 'bool':
      return value === 'on';
    case 'id?':
      return value === '' ? null : Number(value);
    case 'ids':
      return values.filter(v => v !== '').map(Number);
    case 'costType':
      return value === '1' ? 'Orn' : 'Gold';
  }
}

/** Guide entity from a parsed change form. Values are validated by the kind's schema. */
export function decodeGuideEntity<K extends GuideKind>(kind: K, id: number, form: ParsedForm): GuideEntityMap[K] {
  const def = GUIDE_FORMS[kind];
  const values = new Map<string, string[]>();
  for (const [name, value] of form.fields) {
    const bucket = values.get(name);
    if (bucket) bucket.push(value);
    else values.set(name, [value]);
  }

  const raw: Record<string, unknown> = { id };
  for (const [name, key, type] of def.fields) {
    raw[key] = decodeValue(type, values.get(name) ?? []);
  }
  const result = def.schema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new GuideFormError(def.root, issue?.path.join('.') ?? '?', issue?.message ?? 'invalid value');
  }
  return result.data;
}

function encodeValue(root: string, name: string, type: FieldType, value: unknown): [string, string][] {
  switch (type) {
    case 'text':
      if (typeof value === 'string') return [[name, value]];
      break;
    case 'int':
    case 'number':
      if (typeof value === 'number') return [[name, String(value)]];
      break;
    case 'bool':
      if (typeof value === 'boolean') return value ? [[name, 'on']] : [];
      break;
    case 'id?':
      if (value === null) return [[name, '']];
      if (typeof value === 'number') return [[name, String(value)]];
      break;
    case 'ids':
      if (Array.isArray(value)) return value.map((id): [string, string] => [name, String(id)]);
      break;
    case 'costType':
      if (value === 'Orn' || value === 'Gold') return [[name, value === 'Orn' ? '1' : '0']];
      break;
  }
  throw new GuideFormError(root, name, `cannot encode ${JSON.stringify(value)} as ${type}`);
}

/** Form pairs for an entity, csrf token excluded. */
export function encodeGuideEntity<K extends GuideKind>(kind: K, entity: GuideEntityMap[K]): [string, string][] {
  const def = GUIDE_FORMS[kind];
  const pairs: [string, string][] = [];
  for (const [name, key, type] of def.fields) {
    pairs.push(...encodeValue(def.root, name, type, entity[key]));
  }
  return pairs;
}

/**
 * Refuse to post a field the live form doesn't have, or to leave out one it
 * has among the fields we manage.
 */
export function checkFormFields(root: string, form: ParsedForm, pairs: readonly [string, string][], managed: readonly string[]): void {
  for (const [name] of pairs) {
    if (!form.controls.has(name)) throw new GuideFormError(root, name, 'not in the live form');
  }
  for (const name of managed) {
    if (!form.controls.has(name)) throw new GuideFormError(root, name, 'missing from the live form');
  }
}
