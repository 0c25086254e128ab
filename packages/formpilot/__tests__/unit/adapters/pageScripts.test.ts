/**
 * In-page script unit tests.
 *
 * Runs the scan/apply/read scripts against a jsdom document. jsdom does no
 * layout, so `hidden` is not asserted here.
 *
 * @vitest-environment jsdom
 */

import { beforeEach, describe, expect, test } from 'vitest';
import { SCAN_SCRIPT, applyScript, fieldStateSchema, readScript, scanResultSchema } from '../../../src/adapters/pageScripts';
import type { ApplyInstruction } from '../../../src/adapters/types';

const run = (script: string): unknown => (0, eval)(script);

const scan = () => scanResultSchema.parse(run(SCAN_SCRIPT));
const read = (handle: string) => fieldStateSchema.parse(run(readScript(handle)));
const apply = (handle: string, instruction: ApplyInstruction) => run(applyScript(handle, instruction));

function recordEvents(el: Element): string[] {
  const seen: string[] = [];
  for (const type of ['input', 'change', 'blur']) el.addEventListener(type, () => seen.push(type));
  return seen;
}

function byTestId(testId: string): Element {
  const el = document.querySelector(`[data-testid="${testId}"]`);
  if (!el) throw new Error(`missing ${testId}`);
  return el;
}

beforeEach(() => {
  document.body.innerHTML = '';
  Reflect.deleteProperty(window, '__formpilotNextIdx');
});

describe('scan handles', () => {
  test('a field inserted before a stamped one gets a fresh handle', () => {
    document.body.innerHTML = '<form><input placeholder="Last name"></form>';
    const [last] = scan();
    expect(last.handle).toBe('[data-fp-idx="0"]');

    const form = document.querySelector('form');
    if (!form) throw new Error('missing form');
    const first = document.createElement('input');
    first.setAttribute('placeholder', 'First name');
    form.insertBefore(first, form.firstChild);

    expect(scan().map((r) => [r.placeholder, r.handle])).toEqual([
      ['First name', '[data-fp-idx="1"]'],
      ['Last name', '[data-fp-idx="0"]'],
    ]);

    apply(last.handle, { type: 'text', value: 'Doe' });
    expect(first.value).toBe('');
    expect(read(last.handle).value).toBe('Doe');
  });

  test('a copied stamp is replaced on the later element', () => {
    document.body.innerHTML = '<div><input placeholder="Skill 1"></div>';
    scan();

    const copy = document.createElement('input');
    copy.setAttribute('placeholder', 'Skill 2');
    copy.setAttribute('data-fp-idx', '0');
    document.querySelector('div')?.appendChild(copy);

    expect(scan().map((r) => [r.placeholder, r.handle])).toEqual([
      ['Skill 1', '[data-fp-idx="0"]'],
      ['Skill 2', '[data-fp-idx="1"]'],
    ]);
  });

  test('a unique data-testid is used as the handle', () => {
    document.body.innerHTML = '<input data-testid="city" placeholder="City">';
    expect(scan()[0].handle).toBe('[data-testid="city"]');
    expect(document.querySelector('[data-fp-idx]')).toBeNull();
  });
});

describe('apply and read', () => {
  test('a role="textbox" element takes the text as its content', () => {
    document.body.innerHTML = '<div role="textbox" contenteditable="true" data-testid="bio" aria-label="Bio"></div>';
    const [record] = scan();
    expect(record).toMatchObject({ handle: '[data-testid="bio"]', tag: 'div', role: 'textbox', ariaLabel: 'Bio', value: '' });

    const events = recordEvents(byTestId('bio'));
    apply(record.handle, { type: 'text', value: 'Builds tools.' });

    expect(byTestId('bio').textContent).toBe('Builds tools.');
    expect(events).toEqual(['input', 'change', 'blur']);
    expect(read(record.handle)).toEqual({ value: 'Builds tools.', values: ['Builds tools.'], checked: false });
  });

  test('a textarea is set through its value', () => {
    document.body.innerHTML = '<textarea data-testid="summary"></textarea>';
    const events = recordEvents(byTestId('summary'));

    apply('[data-testid="summary"]', { type: 'text', value: 'Hello' });

    expect(read('[data-testid="summary"]')).toEqual({ value: 'Hello', values: ['Hello'], checked: false });
    expect(events).toEqual(['input', 'change', 'blur']);
  });

  test('choosing the option a select already shows still notifies the page', () => {
    document.body.innerHTML =
      '<select data-testid="degree"><option value="bs">Bachelor\'s</option><option value="ms">Master\'s</option></select>';
    const events = recordEvents(byTestId('degree'));

    apply('[data-testid="degree"]', { type: 'choose', values: ['bs'] });

    expect(events).toEqual(['input', 'change', 'blur']);
    expect(read('[data-testid="degree"]')).toEqual({ value: 'bs', values: ['bs'], checked: false });
  });
});
