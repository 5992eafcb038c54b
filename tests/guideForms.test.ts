import { describe, it, expect } from 'vitest';
import {
  checkFormFields,
  checkPostResponse,
  decodeGuideEntity,
  encodeGuideEntity,
  formFieldNames,
  parseAdminList,
  parseGuideForm,
  parseSelectOptions,
} from '../src/sources/guideForms.js';
import { ConfigError, GuideFormError, GuidePostError } from '../src/errors.js';
import { adminPet } from './fixtures.js';

const petForm = `
<html><body>
<form id="pet_form" method="post">
  <input type="hidden" name="csrfmiddlewaretoken" value="test-token">
  <input id="id_codex" type="text" value="/codex/followers/wolf/">
  <input id="id_name" type="text" value="Wolf">
  <input id="id_tier" type="number" value="2">
  <input id="id_image_name" type="text" value="followers/wolf.png">
  <textarea id="id_description">Loyal.</textarea>
  <input id="id_attack" type="number" value="10">
  <input id="id_heal" type="number" value="0">
  <input id="id_buff" type="number" value="0">
  <input id="id_debuff" type="number" value="0">
  <input id="id_spell" type="number" value="0">
  <input id="id_protect" type="number" value="0">
  <input id="id_cost" type="number" value="">
  <select id="id_cost_type">
    <option value="0">Gold</option>
    <option value="1" selected>Orn</option>
  </select>
  <input id="id_limited" type="checkbox" checked>
  <input id="id_limited_details" type="text" value="">
  <select id="id_skills" multiple>
    <option value="1" selected>Bite</option>
    <option value="2">Howl</option>
    <option value="3" selected>Pack Hunt</option>
  </select>
</form>
</body></html>`;

const loginPage = `
<form action="/admin/login/?next=/admin/pets/pet/5/change/" method="post" id="login-form">
  <input type="hidden" name="csrfmiddlewaretoken" value="test-token">
  <input type="text" name="username" id="id_username">
  <input type="password" name="password" id="id_password">
</form>`;

const wolf = adminPet({
  id: 5,
  codexUri: '/codex/followers/wolf/',
  name: 'Wolf',
  tier: 2,
  imageName: 'followers/wolf.png',
  description: 'Loyal.',
  attack: 10,
  costType: 'Orn',
  limited: true,
  skills: [1, 3],
});

describe('parseGuideForm', () => {
  it('reads the token, every control and the requested values', () => {
    const form = parseGuideForm(petForm, '#pet_form', ['name', 'limited', 'skills', 'description']);
    expect(form.csrfToken).toBe('test-token');
    expect(form.controls.has('cost_type')).toBe(true);
    expect(form.controls.size).toBe(16);
    expect(form.fields).toEqual([
      ['name', 'Wolf'],
      ['limited', 'on'],
      ['skills', '1'],
      ['skills', '3'],
      ['description', 'Loyal.'],
    ]);
  });

  it('fails on a field the form lacks', () => {
    expect(() => parseGuideForm(petForm, '#pet_form', ['loyalty'])).toThrow(
      new GuideFormError('#pet_form', 'loyalty', 'missing from the form'),
    );
  });

  it('reports an expired session when the login page comes back', () => {
    expect(() => parseGuideForm(loginPage, '#pet_form', [])).toThrow(
      new ConfigError('GUIDE_COOKIE', 'session rejected, the #pet_form page answered with the login page'),
    );
  });

  it('fails when the form is not on the page', () => {
    expect(() => parseGuideForm(petForm, '#item_form', [])).toThrow('guide form: no #item_form in page');
  });
});

describe('decodeGuideEntity', () => {
  it('builds a pet from its change form', () => {
    const form = parseGuideForm(petForm, '#pet_form', formFieldNames('pets'));
    expect(decodeGuideEntity('pets', 5, form)).toEqual(wolf);
  });
});

describe('encodeGuideEntity', () => {
  it('writes one pair per value and one per selected id', () => {
    expect(encodeGuideEntity('pets', wolf)).toEqual([
      ['codex', '/codex/followers/wolf/'],
      ['name', 'Wolf'],
      ['tier', '2'],
      ['image_name', 'followers/wolf.png'],
      ['description', 'Loyal.'],
      ['attack', '10'],
      ['heal', '0'],
      ['buff', '0'],
      ['debuff', '0'],
      ['spell', '0'],
      ['protect', '0'],
      ['cost', '0'],
      ['cost_type', '1'],
      ['limited', 'on'],
      ['limited_details', ''],
      ['skills', '1'],
      ['skills', '3'],
    ]);
  });

  it('leaves unchecked boxes out', () => {
    const pairs = encodeGuideEntity('pets', adminPet({ ...wolf, limited: false }));
    expect(pairs.some(([name]) => name === 'limited')).toBe(false);
  });
});

describe('parseSelectOptions', () => {
  it('lists the options of a select', () => {
    expect(parseSelectOptions(petForm, '#pet_form', 'skills')).toEqual([
      { id: 1, name: 'Bite' },
      { id: 2, name: 'Howl' },
      { id: 3, name: 'Pack Hunt' },
    ]);
  });
});

describe('checkFormFields', () => {
  const form = parseGuideForm(petForm, '#pet_form', []);

  it('accepts pairs the live form knows', () => {
    expect(() => checkFormFields('#pet_form', form, [['name', 'Wolf']], ['skills'])).not.toThrow();
  });

  it('refuses pairs the live form lacks', () => {
    expect(() => checkFormFields('#pet_form', form, [['loyalty', '3']], [])).toThrow(
      'Form #pet_form, field "loyalty": not in the live form',
    );
  });
});

describe('parseAdminList', () => {
  it('reads ids, names and the total count', () => {
    const html = `
      <table id="result_list"><tbody>
        <tr><th><a href="/admin/items/item/12/change/?_changelist_filters=o%3D1">Iron Sword</a></th></tr>
        <tr><th><a href="/admin/items/item/7/change/">Wooden Shield</a></th></tr>
      </tbody></table>
      <p class="paginator">1 2 … 7 312 items</p>`;
    expect(parseAdminList(html)).toEqual({
      entries: [{ id: 12, name: 'Iron Sword' }, { id: 7, name: 'Wooden Shield' }],
      total: 312,
    });
  });

  it('needs a count in the paginator', () => {
    const html = '<table id="result_list"><tbody></tbody></table><p class="paginator">items</p>';
    expect(() => parseAdminList(html)).toThrow('admin list: no entry count in paginator');
  });
});

describe('checkPostResponse', () => {
  it('passes a redirect target without the form', () => {
    expect(() => checkPostResponse('/admin/items/item/add/', '<p>Saved</p>', '#item_form')).not.toThrow();
  });

  it('treats a redirect to the login page as an expired session', () => {
    expect(() => checkPostResponse('/admin/pets/pet/5/change/', loginPage, '#pet_form')).toThrow(
      new ConfigError('GUIDE_COOKIE', 'session rejected, POST /admin/pets/pet/5/change/ answered with the login page'),
    );
  });

  it('throws the error note and field errors of a re-rendered form', () => {
    const html = `
      <form id="item_form">
        <p class="errornote">Please correct the error below.</p>
        <div class="form-row errors field-name"><ul class="errorlist"><li>This field is required.</li></ul></div>
      </form>`;
    expect(() => checkPostResponse('/admin/items/item/add/', html, '#item_form')).toThrow(
      new GuidePostError('/admin/items/item/add/', 'Please correct the error below.', ['name: This field is required.']),
    );
  });
});
