/**
 * FieldExtractor unit tests.
 *
 * Classification, grouping, label resolution and the populated-field filter,
 * all against MockFormPage.
 */

import { describe, expect, test } from 'vitest';
import { buildDescriptors, cleanLabel, extractFields } from '../../../src/engine/FieldExtractor';
import { StaleDocumentError } from '../../../src/engine/errors';
import { MockFormPage, type MockElementInit } from '../../../src/adapters/mock';

const APPLICATION_FORM: MockElementInit[] = [
  { tag: 'input', type: 'text', id: 'full_name', labelText: 'Full Name *', required: true },
  { tag: 'input', type: 'text', name: 'contactEmail', placeholder: 'you@example.com' },
  { tag: 'input', type: 'hidden', name: 'csrf', value: 'test-token' },
  { tag: 'input', type: 'text', id: 'locked', labelText: 'Locked', disabled: true },
  { tag: 'input', type: 'text', id: 'city', labelText: 'City', value: 'Springfield' },
  { tag: 'input', type: 'radio', id: 'deg_bs', name: 'degree', value: 'bs', labelText: "Bachelor's", groupLabel: 'Highest degree' },
  { tag: 'input', type: 'radio', id: 'deg_ms', name: 'degree', value: 'ms', labelText: "Master's", required: true },
  { tag: 'input', type: 'checkbox', id: 'sk_ts', name: 'skills', value: 'ts', labelText: 'TypeScript', groupLabel: 'Skills' },
  { tag: 'input', type: 'checkbox', id: 'sk_go', name: 'skills', value: 'go', labelText: 'Go' },
  { tag: 'input', type: 'checkbox', id: 'agree', name: 'agree', value: 'yes', labelText: 'I agree' },
  {
    tag: 'select',
    id: 'country',
    labelText: 'Country',
    options: [
      { value: '', text: 'Select...' },
      { value: 'us', text: 'United States' },
      { value: 'ca', text: 'Canada', disabled: true },
    ],
  },
  { tag: 'input', type: 'date', id: 'available', labelText: 'Available from' },
  { tag: 'input', type: 'month', id: 'grad', labelText: 'Graduation' },
  { tag: 'input', type: 'file', id: 'resume', labelText: 'Resume' },
  { tag: 'input', type: 'text', name: 'start_date', placeholder: 'MM/DD/YYYY' },
  { tag: 'textarea', id: 'about', ariaLabel: 'About you (optional)', maxLength: 200 },
];

describe('cleanLabel', () => {
  test('strips required markers and trailing colons', () => {
    expect(cleanLabel('Full Name *')).toBe('Full Name');
    expect(cleanLabel('  Email Address (optional) ')).toBe('Email Address');
    expect(cleanLabel('Phone: *')).toBe('Phone');
    expect(cleanLabel('Required Full   Name')).toBe('Full Name');
    expect(cleanLabel(undefined)).toBe('');
  });
});

describe('buildDescriptors', () => {
  const page = new MockFormPage(APPLICATION_FORM);

  test('keeps fillable elements in document order', async () => {
    const fields = buildDescriptors(await page.scan());
    expect(fields.map((f) => [f.id, f.kind])).toEqual([
      ['full_name', 'text'],
      ['el-1', 'email'],
      ['deg_bs', 'radioGroup'],
      ['sk_ts', 'multiSelect'],
      ['agree', 'checkbox'],
      ['country', 'singleSelect'],
      ['available', 'date'],
      ['grad', 'date'],
      ['el-14', 'date'],
      ['about', 'textarea'],
    ]);
    expect(fields.map((f) => f.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  test('resolves labels by caption, aria-label, then placeholder', async () => {
    const fields = buildDescriptors(await page.scan());
    expect(fields.map((f) => f.label)).toEqual([
      'Full Name',
      'you@example.com',
      'Highest degree',
      'Skills',
      'I agree',
      'Country',
      'Available from',
      'Graduation',
      'MM/DD/YYYY',
      'About you',
    ]);
  });

  test('groups radios and checkboxes by name', async () => {
    const [, , degree, skills] = buildDescriptors(await page.scan());

    expect(degree.options).toEqual([
      { value: 'bs', displayText: "Bachelor's" },
      { value: 'ms', displayText: "Master's" },
    ]);
    expect(degree.required).toBe(true);
    expect(skills.options.map((o) => o.value)).toEqual(['ts', 'go']);
  });

  test('drops placeholder and disabled options', async () => {
    const country = buildDescriptors(await page.scan()).find((f) => f.id === 'country');
    expect(country?.options).toEqual([{ value: 'us', displayText: 'United States' }]);
  });

  test('carries date layout and length hints', async () => {
    const fields = buildDescriptors(await page.scan());
    const byId = new Map(fields.map((f) => [f.id, f]));

    expect(byId.get('available')?.dateFormat).toBe('YYYY-MM-DD');
    expect(byId.get('grad')?.dateFormat).toBe('YYYY-MM');
    expect(byId.get('el-14')?.dateFormat).toBe('MM/DD/YYYY');
    expect(byId.get('about')?.maxLength).toBe(200);
  });

  test('populated elements come back only when asked for', async () => {
    const fields = buildDescriptors(await page.scan(), { includePrefilled: true });
    expect(fields.map((f) => f.id)).toContain('city');
    expect(fields).toHaveLength(11);
  });

  test('a select with a real choice already made counts as populated', () => {
    const fields = buildDescriptors([
      {
        handle: 's',
        tag: 'select',
        hidden: false,
        disabled: false,
        readOnly: false,
        required: false,
        value: 'ca',
        options: [
          { value: '', text: 'Select...', selected: false, disabled: false },
          { value: 'ca', text: 'Canada', selected: true, disabled: false },
        ],
      },
    ]);
    expect(fields).toEqual([]);
  });

  test('descriptors are frozen', async () => {
    const [first] = buildDescriptors(await page.scan());
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe('extractFields', () => {
  test('reads a live page without changing it', async () => {
    const page = new MockFormPage(APPLICATION_FORM);
    const fields = await extractFields(page, { timeoutMs: 100 });

    expect(fields).toHaveLength(10);
    expect(page.events).toEqual([]);
  });

  test('a detached page is a StaleDocument', async () => {
    const page = new MockFormPage(APPLICATION_FORM);
    page.detach();
    await expect(extractFields(page, { timeoutMs: 100 })).rejects.toBeInstanceOf(StaleDocumentError);
  });

  test('a page that never becomes ready is a StaleDocument', async () => {
    const page = new MockFormPage(APPLICATION_FORM, { notReady: true });
    await expect(extractFields(page, { timeoutMs: 20 })).rejects.toBeInstanceOf(StaleDocumentError);
    expect(page.scans).toBe(0);
  });
});
