/**
 * FieldExtractor turns a page's raw element records into FieldDescriptors.
 *
 * Kind comes from the element's type attribute first; generic text inputs
 * fall back to name/id/placeholder tokens. Radios sharing a name become one
 * radioGroup, checkboxes sharing a name become one multiSelect. Hidden,
 * disabled, read-only and already-populated elements are left out.
 */

import type { FormPage, RawFormElement, RawOption } from '../adapters/types';
import type { DateFormat, FieldDescriptor, FieldKind, FieldOption } from './types';
import { StaleDocumentError, errorMessage, isDetachedError } from './errors';
import { inferDateFormat } from './dates';
import { tokenize } from './textMatch';
import { getLogger } from '../monitoring/logger';

export interface ExtractOptions {
  timeoutMs: number;
  /** Keep elements the page has already populated (re-fill runs). */
  includePrefilled?: boolean;
}

const GENERIC_INPUT_TYPES = new Set(['', 'text', 'search']);
const SKIPPED_INPUT_TYPES = new Set([
  'hidden',
  'password',
  'file',
  'submit',
  'button',
  'reset',
  'image',
  'range',
  'color',
]);

const EMAIL_TOKENS = new Set(['email', 'mail']);
const TEL_TOKENS = new Set(['phone', 'tel', 'telephone', 'mobile', 'cell']);
const DATE_TOKENS = new Set(['date', 'dob', 'birthday', 'birthdate']);

// ── Label helpers ─────────────────────────────────────────────────────

/** Strip `*`, "required", "(optional)" and collapse whitespace. */
export function cleanLabel(label: string | undefined): string {
  if (!label) return '';
  return label
    .replace(/\*/g, '')
    .replace(/\(optional\)/gi, '')
    .replace(/\brequired\b/gi, '')
    .replace(/\s+/g, ' ')
    .replace(/[\s:]+$/, '')
    .trim();
}

/** caption element → aria-label → placeholder → preceding text */
function resolveLabel(el: RawFormElement): string {
  const candidates = [el.labelText, el.ariaLabel, el.placeholder, el.precedingText];
  for (const candidate of candidates) {
    const cleaned = cleanLabel(candidate);
    if (cleaned) return cleaned;
  }
  return '';
}

// ── Classification ────────────────────────────────────────────────────

function inferFromTokens(el: RawFormElement): FieldKind {
  const tokens = [...tokenize(el.name ?? ''), ...tokenize(el.id ?? ''), ...tokenize(el.placeholder ?? '')];
  if (tokens.some((t) => EMAIL_TOKENS.has(t))) return 'email';
  if (tokens.some((t) => TEL_TOKENS.has(t))) return 'tel';
  if (tokens.some((t) => DATE_TOKENS.has(t))) return 'date';
  return 'text';
}

/** Kind of a single (non-grouped) element, or null when it is not fillable. */
export function classifyElement(el: RawFormElement): FieldKind | null {
  const tag = el.tag.toLowerCase();
  if (tag === 'textarea') return 'textarea';
  if (tag === 'select') return el.multiple ? 'multiSelect' : 'singleSelect';

  if (tag === 'input') {
    const type = (el.type ?? '').toLowerCase();
    if (SKIPPED_INPUT_TYPES.has(type)) return null;
    if (type === 'email') return 'email';
    if (type === 'tel') return 'tel';
    if (type === 'date' || type === 'month') return 'date';
    if (type === 'checkbox') return 'checkbox';
    if (type === 'radio') return 'radioGroup';
    if (GENERIC_INPUT_TYPES.has(type) || type === 'url' || type === 'number') return inferFromTokens(el);
    return null;
  }

  if (el.role === 'textbox') return inferFromTokens(el);
  if (el.role === 'combobox' || el.role === 'listbox') {
    return el.options && el.options.length > 0 ? 'singleSelect' : null;
  }
  return null;
}

function dateFormatFor(el: RawFormElement): DateFormat | undefined {
  const type = (el.type ?? '').toLowerCase();
  if (type === 'date') return 'YYYY-MM-DD';
  if (type === 'month') return 'YYYY-MM';
  return inferDateFormat(el.dateHint) ?? inferDateFormat(el.placeholder);
}

function toOptions(raw: RawOption[] | undefined): FieldOption[] {
  return (raw ?? [])
    .filter((o) => !o.disabled && o.value !== '')
    .map((o) => ({ value: o.value, displayText: o.text.trim() || o.value }));
}

function hasText(value: string): boolean {
  return value.trim().length > 0;
}

/**
 * A single select counts as populated only when something past the first
 * option is selected; browsers select the first option by default.
 */
function selectIsPopulated(el: RawFormElement): boolean {
  const options = el.options ?? [];
  if (el.multiple) return options.some((o) => o.selected && o.value !== '');
  return options.some((o, i) => i > 0 && o.selected && o.value !== '');
}

function isUsable(el: RawFormElement): boolean {
  return !el.hidden && !el.disabled && !el.readOnly;
}

// ── Pure classification over a whole scan ─────────────────────────────

interface PendingDescriptor extends Omit<FieldDescriptor, 'index'> {
  populated: boolean;
}

/**
 * Build descriptors from raw records in document order. Pure, so it can be
 * exercised without a page.
 */
export function buildDescriptors(
  raw: RawFormElement[],
  options: { includePrefilled?: boolean } = {},
): FieldDescriptor[] {
  const checkboxCounts = new Map<string, number>();
  for (const el of raw) {
    if (el.tag === 'input' && el.type === 'checkbox' && el.name && isUsable(el)) {
      checkboxCounts.set(el.name, (checkboxCounts.get(el.name) ?? 0) + 1);
    }
  }

  const pending: PendingDescriptor[] = [];
  const groups = new Map<string, PendingDescriptor>();

  for (const el of raw) {
    if (!isUsable(el)) continue;
    const kind = classifyElement(el);
    if (!kind) continue;

    const groupedCheckbox = kind === 'checkbox' && !!el.name && (checkboxCounts.get(el.name) ?? 0) > 1;

    if (kind === 'radioGroup' || groupedCheckbox) {
      const groupKind: FieldKind = kind === 'radioGroup' ? 'radioGroup' : 'multiSelect';
      const key = `${groupKind}:${el.name ?? el.handle}`;
      const option: FieldOption = {
        value: el.value,
        displayText: cleanLabel(el.labelText) || cleanLabel(el.ariaLabel) || el.value,
      };
      const existing = groups.get(key);
      if (existing) {
        existing.options.push(option);
        existing.required = existing.required || el.required;
        existing.populated = existing.populated || !!el.checked;
        continue;
      }
      const caption = cleanLabel(el.groupLabel) || cleanLabel(el.precedingText);
      const group: PendingDescriptor = {
        id: el.handle,
        kind: groupKind,
        label: caption || cleanLabel(el.name),
        placeholder: '',
        name: el.name ?? '',
        domId: el.id ?? '',
        required: el.required,
        options: [option],
        populated: !!el.checked,
      };
      groups.set(key, group);
      pending.push(group);
      continue;
    }

    let populated: boolean;
    if (kind === 'checkbox') populated = !!el.checked;
    else if (kind === 'singleSelect' || kind === 'multiSelect') populated = selectIsPopulated(el);
    else populated = hasText(el.value);

    const descriptor: PendingDescriptor = {
      id: el.handle,
      kind,
      label: resolveLabel(el),
      placeholder: el.placeholder ?? '',
      name: el.name ?? '',
      domId: el.id ?? '',
      required: el.required,
      options: kind === 'singleSelect' || kind === 'multiSelect' ? toOptions(el.options) : [],
      populated,
    };
    if (el.maxLength !== undefined && el.maxLength > 0) descriptor.maxLength = el.maxLength;
    if (kind === 'date') {
      const format = dateFormatFor(el);
      if (format) descriptor.dateFormat = format;
    }
    pending.push(descriptor);
  }

  return pending
    .filter((d) => options.includePrefilled || !d.populated)
    .map(({ populated: _populated, ...rest }, index) => {
      const descriptor: FieldDescriptor = { ...rest, index, options: rest.options.map((o) => Object.freeze({ ...o })) };
      return Object.freeze(descriptor);
    });
}

// ── FieldExtractor ────────────────────────────────────────────────────

export class FieldExtractor {
  private logger = getLogger({ service: 'FieldExtractor' });

  constructor(private page: FormPage) {}

  /**
   * Scan the page and classify every fillable element. Read-only.
   * Throws StaleDocumentError when the page is detached or never becomes
   * ready within `timeoutMs`.
   */
  async extract(options: ExtractOptions): Promise<FieldDescriptor[]> {
    if (!(await this.page.isAttached())) {
      throw new StaleDocumentError(`Page ${this.page.pageId} is detached`);
    }

    let raw: RawFormElement[];
    try {
      await this.page.waitForReady(options.timeoutMs);
      raw = await this.page.scan();
    } catch (err) {
      if (err instanceof StaleDocumentError) throw err;
      const attached = await this.page.isAttached().catch(() => false);
      if (!attached || isDetachedError(err)) {
        throw new StaleDocumentError(`Page ${this.page.pageId} detached during extraction`, errorMessage(err));
      }
      throw new StaleDocumentError(`Page ${this.page.pageId} was not ready for extraction: ${errorMessage(err)}`, err);
    }

    const descriptors = buildDescriptors(raw, { includePrefilled: options.includePrefilled });

    this.logger.info('Field extraction complete', {
      pageId: this.page.pageId,
      rawElements: raw.length,
      fieldCount: descriptors.length,
      requiredCount: descriptors.filter((d) => d.required).length,
    });

    return descriptors;
  }
}

/** One-shot form of `new FieldExtractor(page).extract(options)`. */
export function extractFields(page: FormPage, options: ExtractOptions): Promise<FieldDescriptor[]> {
  return new FieldExtractor(page).extract(options);
}
