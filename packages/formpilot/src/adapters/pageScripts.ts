/**
 * Scripts PlaywrightFormPage runs inside the page, plus the zod schemas their
 * results are checked against.
 *
 * Scripts are plain strings so no bundler helpers leak into them. Handles are
 * CSS selectors: `#id` when the element has a unique one, then a unique
 * `[data-testid]`, then a `data-fp-idx` stamp. Stamps come from a counter kept
 * on `window`, so they stay unique across rescans of a re-rendered form.
 */

import { z } from 'zod';
import type { ApplyInstruction } from './types';

const rawOptionSchema = z.object({
  value: z.string(),
  text: z.string(),
  selected: z.boolean(),
  disabled: z.boolean(),
});

const rawElementSchema = z.object({
  handle: z.string(),
  tag: z.string(),
  type: z.string().optional(),
  role: z.string().optional(),
  name: z.string().optional(),
  id: z.string().optional(),
  placeholder: z.string().optional(),
  ariaLabel: z.string().optional(),
  labelText: z.string().optional(),
  groupLabel: z.string().optional(),
  precedingText: z.string().optional(),
  hidden: z.boolean(),
  disabled: z.boolean(),
  readOnly: z.boolean(),
  required: z.boolean(),
  value: z.string(),
  checked: z.boolean().optional(),
  multiple: z.boolean().optional(),
  options: z.array(rawOptionSchema).optional(),
  maxLength: z.number().optional(),
  dateHint: z.string().optional(),
});

export const scanResultSchema = z.array(rawElementSchema);

export const fieldStateSchema = z.object({
  value: z.string(),
  values: z.array(z.string()),
  checked: z.boolean(),
});

// Empty strings and nulls from the page become absent keys.
export const SCAN_SCRIPT = `
  (() => {
    var out = [];
    var nodes = document.querySelectorAll('input, textarea, select, [role="textbox"], [role="combobox"], [role="listbox"]');

    function text(node) {
      return node ? (node.textContent || '').replace(/\\s+/g, ' ').trim() : '';
    }

    function isHidden(el) {
      if (el.type === 'hidden') return true;
      var style = window.getComputedStyle(el);
      if (style.display === 'none' || style.visibility === 'hidden') return true;
      if (el.getAttribute('aria-hidden') === 'true') return true;
      // radios and checkboxes are often styled away behind a visible label
      if (el.type === 'radio' || el.type === 'checkbox') return false;
      var rect = el.getBoundingClientRect();
      return rect.width === 0 && rect.height === 0;
    }

    function handleFor(el) {
      if (el.id && document.querySelectorAll('#' + CSS.escape(el.id)).length === 1) return '#' + CSS.escape(el.id);
      var testId = el.getAttribute('data-testid');
      if (testId && document.querySelectorAll('[data-testid="' + testId + '"]').length === 1) {
        return '[data-testid="' + testId + '"]';
      }
      var existing = el.getAttribute('data-fp-idx');
      if (existing && document.querySelector('[data-fp-idx="' + existing + '"]') === el) {
        return '[data-fp-idx="' + existing + '"]';
      }
      var next = window.__formpilotNextIdx || 0;
      window.__formpilotNextIdx = next + 1;
      el.setAttribute('data-fp-idx', String(next));
      return '[data-fp-idx="' + next + '"]';
    }

    function labelText(el) {
      if (el.labels && el.labels.length > 0) {
        for (var i = 0; i < el.labels.length; i++) {
          var t = text(el.labels[i]);
          if (t) return t;
        }
      }
      if (el.id) {
        var forLabel = document.querySelector('label[for="' + CSS.escape(el.id) + '"]');
        if (forLabel) return text(forLabel);
      }
      var labelledBy = el.getAttribute('aria-labelledby');
      if (labelledBy) {
        var parts = [];
        labelledBy.split(/\\s+/).forEach(function (id) {
          var ref = document.getElementById(id);
          if (ref && text(ref)) parts.push(text(ref));
        });
        if (parts.length > 0) return parts.join(' ');
      }
      return '';
    }

    function groupLabel(el) {
      var fieldset = el.closest('fieldset');
      if (fieldset) {
        var legend = fieldset.querySelector('legend');
        if (legend && text(legend)) return text(legend);
      }
      var group = el.closest('[role="radiogroup"], [role="group"]');
      if (group) {
        var aria = group.getAttribute('aria-label');
        if (aria) return aria;
        var by = group.getAttribute('aria-labelledby');
        if (by) {
          var ref = document.getElementById(by.split(/\\s+/)[0]);
          if (ref) return text(ref);
        }
      }
      return '';
    }

    function precedingText(el) {
      var prev = el.previousElementSibling;
      if (!prev && el.parentElement) prev = el.parentElement.previousElementSibling;
      if (!prev) return '';
      var tag = (prev.tagName || '').toLowerCase();
      if (tag !== 'label' && tag !== 'span' && tag !== 'div' && tag !== 'p' && tag !== 'legend') return '';
      var t = text(prev);
      return t.length < 200 ? t : '';
    }

    function put(rec, key, value) {
      if (value !== null && value !== undefined && value !== '') rec[key] = value;
    }

    for (var n = 0; n < nodes.length; n++) {
      var el = nodes[n];
      var tag = el.tagName.toLowerCase();
      var rec = {
        handle: handleFor(el),
        tag: tag,
        hidden: isHidden(el),
        disabled: !!el.disabled || el.getAttribute('aria-disabled') === 'true',
        readOnly: !!el.readOnly || el.getAttribute('aria-readonly') === 'true',
        required: !!el.required || el.getAttribute('aria-required') === 'true',
        value: typeof el.value === 'string' ? el.value : text(el),
      };
      if (tag === 'input') put(rec, 'type', (el.getAttribute('type') || 'text').toLowerCase());
      put(rec, 'role', el.getAttribute('role'));
      put(rec, 'name', el.getAttribute('name'));
      put(rec, 'id', el.id);
      put(rec, 'placeholder', el.getAttribute('placeholder'));
      put(rec, 'ariaLabel', el.getAttribute('aria-label'));
      put(rec, 'labelText', labelText(el));
      put(rec, 'groupLabel', groupLabel(el));
      put(rec, 'precedingText', precedingText(el));
      put(rec, 'dateHint', el.getAttribute('data-date-format') || el.getAttribute('pattern'));
      if (el.type === 'checkbox' || el.type === 'radio') rec.checked = !!el.checked;
      if (tag === 'select') {
        rec.multiple = !!el.multiple;
        rec.options = Array.prototype.map.call(el.options, function (o) {
          return { value: o.value, text: text(o), selected: !!o.selected, disabled: !!o.disabled };
        });
      } else if (el.getAttribute('role') === 'listbox' || el.getAttribute('role') === 'combobox') {
        var opts = el.querySelectorAll('[role="option"]');
        rec.options = Array.prototype.map.call(opts, function (o) {
          return {
            value: o.getAttribute('data-value') || text(o),
            text: text(o),
            selected: o.getAttribute('aria-selected') === 'true',
            disabled: o.getAttribute('aria-disabled') === 'true',
          };
        });
      }
      if (typeof el.maxLength === 'number' && el.maxLength > 0) rec.maxLength = el.maxLength;
      out.push(rec);
    }
    return out;
  })()
`;

const PAGE_HELPERS = `
  function lookup(handle) {
    var el = document.querySelector(handle);
    if (!el) throw new Error('Element ' + handle + ' is not attached to the DOM');
    return el;
  }
  function groupOf(el) {
    if (!el.name) return [el];
    var root = el.form || document;
    return Array.prototype.slice.call(
      root.querySelectorAll('input[type="' + el.type + '"][name="' + CSS.escape(el.name) + '"]')
    );
  }
  function roleOptions(el) {
    return Array.prototype.slice.call(el.querySelectorAll('[role="option"]'));
  }
  function optionValue(o) {
    return o.getAttribute('data-value') || (o.textContent || '').replace(/\\s+/g, ' ').trim();
  }
  function fire(el) {
    el.dispatchEvent(new Event('input', { bubbles: true }));
    el.dispatchEvent(new Event('change', { bubbles: true }));
    el.dispatchEvent(new Event('blur', { bubbles: true }));
  }
`;

export function applyScript(handle: string, instruction: ApplyInstruction): string {
  return `
    (() => {
      ${PAGE_HELPERS}
      var el = lookup(${JSON.stringify(handle)});
      var ins = ${JSON.stringify(instruction)};
      el.focus && el.focus();
      if (ins.type === 'text') {
        if (el.tagName === 'INPUT' || el.tagName === 'TEXTAREA') {
          var proto = el.tagName === 'TEXTAREA' ? HTMLTextAreaElement.prototype : HTMLInputElement.prototype;
          var desc = Object.getOwnPropertyDescriptor(proto, 'value');
          if (desc && desc.set) desc.set.call(el, ins.value);
          else el.value = ins.value;
        } else {
          // role="textbox" / contenteditable
          el.textContent = ins.value;
        }
        fire(el);
      } else if (ins.type === 'check') {
        el.checked = ins.checked;
        fire(el);
      } else if (el.type === 'radio') {
        var target = groupOf(el).filter(function (r) { return r.value === ins.values[0]; })[0];
        if (!target) throw new Error('Radio group has no option ' + ins.values[0]);
        target.checked = true;
        fire(target);
      } else if (el.type === 'checkbox') {
        groupOf(el).forEach(function (box) {
          var want = ins.values.indexOf(box.value) !== -1;
          if (box.checked !== want) {
            box.checked = want;
            fire(box);
          }
        });
      } else if (el.tagName === 'SELECT') {
        for (var i = 0; i < el.options.length; i++) {
          el.options[i].selected = ins.values.indexOf(el.options[i].value) !== -1;
        }
        fire(el);
      } else {
        roleOptions(el).forEach(function (o) {
          if (ins.values.indexOf(optionValue(o)) !== -1) o.click();
        });
        fire(el);
      }
    })()
  `;
}

export function readScript(handle: string): string {
  return `
    (() => {
      ${PAGE_HELPERS}
      var el = lookup(${JSON.stringify(handle)});
      if (el.type === 'radio' || el.type === 'checkbox') {
        var group = groupOf(el);
        if (el.type === 'radio' || group.length > 1) {
          var values = group.filter(function (b) { return b.checked; }).map(function (b) { return b.value; });
          return { value: values[0] || '', values: values, checked: values.length > 0 };
        }
        return { value: el.checked ? el.value : '', values: el.checked ? [el.value] : [], checked: !!el.checked };
      }
      if (el.tagName === 'SELECT') {
        var selected = Array.prototype.filter.call(el.options, function (o) { return o.selected; })
          .map(function (o) { return o.value; });
        return { value: selected[0] || '', values: selected, checked: false };
      }
      if (el.getAttribute('role') === 'listbox' || el.getAttribute('role') === 'combobox') {
        var picked = roleOptions(el).filter(function (o) { return o.getAttribute('aria-selected') === 'true'; })
          .map(optionValue);
        if (picked.length > 0 || typeof el.value !== 'string') {
          return { value: picked[0] || '', values: picked, checked: false };
        }
      }
      var v = typeof el.value === 'string' ? el.value : (el.textContent || '');
      return { value: v, values: v ? [v] : [], checked: false };
    })()
  `;
}
