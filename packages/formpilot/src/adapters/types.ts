/**
 * Page-handle abstraction.
 *
 * The engine never touches a browser directly: extraction, value application
 * and readback all go through a FormPage supplied by the caller, who owns
 * navigation and the browser lifecycle.
 */
export interface FormPage {
  /** Identifier used in logs and PageBusy errors. */
  readonly pageId: string;

  // -- Lifecycle --

  /** False once the page/document has been closed or navigated away. */
  isAttached(): Promise<boolean>;

  /** Resolve once the document can be scanned; reject after `timeoutMs`. */
  waitForReady(timeoutMs: number): Promise<void>;

  // -- Inspection --

  /** Raw records for every input/textarea/select, in document order. */
  scan(): Promise<RawFormElement[]>;

  /** Current value/selection of the element (or its group) behind `handle`. */
  read(handle: string): Promise<FieldState>;

  // -- Mutation --

  /**
   * Resolve once `handle` is visible and enabled. Rejects with
   * FieldTimeoutError when `timeoutMs` elapses first.
   */
  waitForInteractable(handle: string, timeoutMs: number): Promise<void>;

  /**
   * Set the value and dispatch the input/change/blur notifications the
   * page's own scripts listen for.
   */
  apply(handle: string, instruction: ApplyInstruction): Promise<void>;
}

export interface RawOption {
  value: string;
  text: string;
  selected: boolean;
  disabled: boolean;
}

/**
 * Free-form attribute record for one element, as the page reports it.
 * Classification into a FieldDescriptor happens once, in the extractor.
 */
export interface RawFormElement {
  /** Opaque handle the same FormPage accepts in read/apply. */
  handle: string;
  /** Lowercase tag name: input, textarea, select, or a custom element. */
  tag: string;
  type?: string;
  role?: string;
  name?: string;
  id?: string;
  placeholder?: string;
  ariaLabel?: string;
  /** Text of the associated caption element (<label for>, wrapping <label>). */
  labelText?: string;
  /** Caption of the enclosing group (fieldset legend, radiogroup label). */
  groupLabel?: string;
  /** Nearest preceding text within the same visual group. */
  precedingText?: string;
  hidden: boolean;
  disabled: boolean;
  readOnly: boolean;
  required: boolean;
  value: string;
  checked?: boolean;
  multiple?: boolean;
  options?: RawOption[];
  maxLength?: number;
  /** data-date-format, pattern, or any other layout hint. */
  dateHint?: string;
}

/**
 * What to do to an element. `choose` covers selects, radio groups and
 * checkbox groups alike: the page knows which one the handle points at.
 */
export type ApplyInstruction =
  | { type: 'text'; value: string }
  | { type: 'choose'; values: string[] }
  | { type: 'check'; checked: boolean };

export interface FieldState {
  /** Text value, or the (first) selected option/radio value. */
  value: string;
  /** Every selected option/checked box value, in document order. */
  values: string[];
  checked: boolean;
}
