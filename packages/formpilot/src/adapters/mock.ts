import type { ApplyInstruction, FieldState, FormPage, RawFormElement, RawOption } from './types';
import { FieldTimeoutError } from '../engine/errors';

export interface MockOptionInit {
  value: string;
  text?: string;
  selected?: boolean;
  disabled?: boolean;
}

export interface MockElementInit {
  /** Defaults to `id`, then `el-<position>`. */
  handle?: string;
  tag: string;
  type?: string;
  role?: string;
  name?: string;
  id?: string;
  placeholder?: string;
  ariaLabel?: string;
  labelText?: string;
  groupLabel?: string;
  precedingText?: string;
  hidden?: boolean;
  disabled?: boolean;
  readOnly?: boolean;
  required?: boolean;
  value?: string;
  checked?: boolean;
  multiple?: boolean;
  options?: MockOptionInit[];
  maxLength?: number;
  dateHint?: string;
  /** Stays non-interactable for this long after the page is created. */
  interactableAfterMs?: number;
  neverInteractable?: boolean;
  /** Thrown from apply() instead of changing anything. */
  throwOnApply?: Error;
}

export interface MockElement {
  readonly handle: string;
  readonly init: MockElementInit;
  value: string;
  checked: boolean;
  options: RawOption[];
}

export type MockDomEvent = 'input' | 'change' | 'blur';

export interface MockFormPageOptions {
  pageId?: string;
  /** waitForReady() never resolves; it rejects once its timeout elapses. */
  notReady?: boolean;
  pollIntervalMs?: number;
  /**
   * Stand-in for the page's own scripts: called for every dispatched event
   * after the value has been set, and may mutate the element or the page.
   */
  onEvent?: (event: MockDomEvent, element: MockElement, page: MockFormPage) => void;
}

export interface DispatchedEvent {
  handle: string;
  event: MockDomEvent;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * In-memory FormPage for tests and for callers who already hold a document
 * model. Mirrors the browser behaviors the engine relies on: grouped radios
 * and checkboxes by name, implicit first-option selection, input/change/blur
 * notifications, detached documents.
 */
export class MockFormPage implements FormPage {
  readonly pageId: string;
  readonly events: DispatchedEvent[] = [];
  private readonly elements: MockElement[];
  private readonly createdAt = Date.now();
  private readonly applyCounts = new Map<string, number>();
  private attached = true;
  private scanCount = 0;

  constructor(
    inits: MockElementInit[],
    private readonly options: MockFormPageOptions = {},
  ) {
    this.pageId = options.pageId ?? 'mock-page';
    this.elements = inits.map((init, i) => ({
      handle: init.handle ?? init.id ?? `el-${i}`,
      init,
      value: init.value ?? '',
      checked: init.checked ?? false,
      options: (init.options ?? []).map((o) => ({
        value: o.value,
        text: o.text ?? o.value,
        selected: o.selected ?? false,
        disabled: o.disabled ?? false,
      })),
    }));
  }

  // ── Test controls ───────────────────────────────────────────────────

  detach(): void {
    this.attached = false;
  }

  element(handle: string): MockElement {
    const el = this.elements.find((e) => e.handle === handle);
    if (!el) throw new Error(`No element with handle ${handle}`);
    return el;
  }

  /** Number of apply() calls that reached `handle`. */
  applyCount(handle: string): number {
    return this.applyCounts.get(handle) ?? 0;
  }

  get scans(): number {
    return this.scanCount;
  }

  // ── FormPage ────────────────────────────────────────────────────────

  async isAttached(): Promise<boolean> {
    return this.attached;
  }

  async waitForReady(timeoutMs: number): Promise<void> {
    this.assertAttached();
    if (this.options.notReady) {
      await sleep(timeoutMs);
      throw new Error(`Document not ready after ${timeoutMs}ms`);
    }
  }

  async scan(): Promise<RawFormElement[]> {
    this.assertAttached();
    this.scanCount++;
    return this.elements.map((el) => this.toRaw(el));
  }

  async read(handle: string): Promise<FieldState> {
    this.assertAttached();
    const el = this.find(handle);
    const type = el.init.type ?? '';

    if (el.init.tag === 'input' && (type === 'radio' || type === 'checkbox')) {
      const group = this.groupOf(el);
      if (type === 'radio' || group.length > 1) {
        const values = group.filter((m) => m.checked).map((m) => m.value);
        return { value: values[0] ?? '', values, checked: values.length > 0 };
      }
      return { value: el.checked ? el.value : '', values: el.checked ? [el.value] : [], checked: el.checked };
    }

    if (el.init.tag === 'select' || el.options.length > 0) {
      const values = this.selectedValues(el);
      return { value: values[0] ?? '', values, checked: false };
    }

    return { value: el.value, values: el.value ? [el.value] : [], checked: false };
  }

  async waitForInteractable(handle: string, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    const interval = this.options.pollIntervalMs ?? 5;
    for (;;) {
      this.assertAttached();
      const el = this.find(handle);
      if (this.isInteractable(el)) return;
      if (Date.now() >= deadline) throw new FieldTimeoutError(handle, timeoutMs);
      await sleep(Math.min(interval, Math.max(1, deadline - Date.now())));
    }
  }

  async apply(handle: string, instruction: ApplyInstruction): Promise<void> {
    this.assertAttached();
    const el = this.find(handle);
    this.applyCounts.set(handle, this.applyCount(handle) + 1);
    if (el.init.throwOnApply) throw el.init.throwOnApply;
    if (!this.isInteractable(el)) throw new Error(`Element ${handle} is not visible or not enabled`);

    switch (instruction.type) {
      case 'text':
        el.value = instruction.value;
        this.dispatch(el);
        return;
      case 'check':
        el.checked = instruction.checked;
        this.dispatch(el);
        return;
      case 'choose':
        this.choose(el, instruction.values);
        return;
    }
  }

  // ── Internals ───────────────────────────────────────────────────────

  private assertAttached(): void {
    if (!this.attached) throw new Error('Target page, context or browser has been closed');
  }

  private find(handle: string): MockElement {
    const el = this.elements.find((e) => e.handle === handle);
    if (!el) throw new Error(`Element ${handle} is not attached to the DOM`);
    return el;
  }

  private isInteractable(el: MockElement): boolean {
    const { init } = el;
    if (init.neverInteractable || init.hidden || init.disabled) return false;
    if (init.interactableAfterMs !== undefined) return Date.now() - this.createdAt >= init.interactableAfterMs;
    return true;
  }

  private choose(el: MockElement, values: string[]): void {
    const type = el.init.type ?? '';
    if (el.init.tag === 'input' && type === 'radio') {
      const target = this.groupOf(el).find((m) => m.value === values[0]);
      if (!target) throw new Error(`Radio group ${el.handle} has no option "${values[0] ?? ''}"`);
      for (const member of this.groupOf(el)) member.checked = member === target;
      this.dispatch(target);
      return;
    }
    if (el.init.tag === 'input' && type === 'checkbox') {
      for (const member of this.groupOf(el)) {
        const want = values.includes(member.value);
        if (member.checked !== want) {
          member.checked = want;
          this.dispatch(member);
        }
      }
      return;
    }
    for (const option of el.options) option.selected = values.includes(option.value);
    el.value = values[0] ?? '';
    this.dispatch(el);
  }

  private groupOf(el: MockElement): MockElement[] {
    if (!el.init.name) return [el];
    return this.elements.filter(
      (m) => m.init.tag === el.init.tag && m.init.type === el.init.type && m.init.name === el.init.name,
    );
  }

  private selectedValues(el: MockElement): string[] {
    const selected = el.options.filter((o) => o.selected).map((o) => o.value);
    if (selected.length > 0 || el.init.multiple) return selected;
    const first = el.options[0];
    return first ? [first.value] : [];
  }

  private dispatch(el: MockElement): void {
    for (const event of ['input', 'change', 'blur'] as const) {
      this.events.push({ handle: el.handle, event });
      this.options.onEvent?.(event, el, this);
    }
  }

  private toRaw(el: MockElement): RawFormElement {
    const { init } = el;
    const options = el.options.map((o) => ({ ...o }));
    if (init.tag === 'select' && !init.multiple && options.length > 0 && !options.some((o) => o.selected)) {
      options[0].selected = true;
    }
    const raw: RawFormElement = {
      handle: el.handle,
      tag: init.tag,
      hidden: init.hidden ?? false,
      disabled: init.disabled ?? false,
      readOnly: init.readOnly ?? false,
      required: init.required ?? false,
      value: el.value,
    };
    if (init.type !== undefined) raw.type = init.type;
    if (init.role !== undefined) raw.role = init.role;
    if (init.name !== undefined) raw.name = init.name;
    if (init.id !== undefined) raw.id = init.id;
    if (init.placeholder !== undefined) raw.placeholder = init.placeholder;
    if (init.ariaLabel !== undefined) raw.ariaLabel = init.ariaLabel;
    if (init.labelText !== undefined) raw.labelText = init.labelText;
    if (init.groupLabel !== undefined) raw.groupLabel = init.groupLabel;
    if (init.precedingText !== undefined) raw.precedingText = init.precedingText;
    if (init.type === 'checkbox' || init.type === 'radio') raw.checked = el.checked;
    if (init.multiple !== undefined) raw.multiple = init.multiple;
    if (options.length > 0) raw.options = options;
    if (init.maxLength !== undefined) raw.maxLength = init.maxLength;
    if (init.dateHint !== undefined) raw.dateHint = init.dateHint;
    return raw;
  }
}
