/**
 * FormPilot engine types.
 *
 * Descriptors are classified once at extraction time; nothing downstream
 * re-inspects raw element attributes.
 */

import type { AttributePath } from '../profile/attributes';

// ── Field descriptors ───────────────────────────────────────────────────

export type FieldKind =
  | 'text'
  | 'email'
  | 'tel'
  | 'textarea'
  | 'date'
  | 'singleSelect'
  | 'multiSelect'
  | 'checkbox'
  | 'radioGroup';

export const CHOICE_KINDS: ReadonlySet<FieldKind> = new Set<FieldKind>([
  'singleSelect',
  'multiSelect',
  'radioGroup',
]);

export function isChoiceKind(kind: FieldKind): boolean {
  return CHOICE_KINDS.has(kind);
}

export interface FieldOption {
  value: string;
  displayText: string;
}

/** Date layouts the coercer can produce. */
export type DateFormat = 'YYYY-MM-DD' | 'YYYY-MM' | 'MM/DD/YYYY' | 'DD/MM/YYYY' | 'MM/YYYY' | 'YYYY';

export interface FieldDescriptor {
  /** Opaque handle understood by the FormPage that produced it. */
  id: string;
  kind: FieldKind;
  label: string;
  placeholder: string;
  name: string;
  domId: string;
  required: boolean;
  options: FieldOption[];
  /** Position in document order, 0-based. */
  index: number;
  maxLength?: number;
  dateFormat?: DateFormat;
}

// ── Matching ────────────────────────────────────────────────────────────

export type StrategyName = 'name_token' | 'label' | 'placeholder';

export interface MatchCandidate {
  profileAttributePath: AttributePath;
  fieldDescriptorId: string;
  score: number;
  strategyName: StrategyName;
}

export type CoercedValue =
  | { type: 'text'; value: string }
  | { type: 'option'; value: string; displayText: string }
  | { type: 'options'; values: string[]; displayTexts: string[] }
  | { type: 'checked'; value: boolean };

export interface AssignedEntry {
  kind: 'assigned';
  fieldDescriptorId: string;
  coercedValue: CoercedValue;
  sourceAttributePath: AttributePath;
  score: number;
  strategyName: StrategyName;
}

export interface UnmatchedEntry {
  kind: 'unmatched';
  fieldDescriptorId: string;
}

/** Best candidate existed but its value could not be shaped for the field. */
export interface IncoercibleEntry {
  kind: 'incoercible';
  fieldDescriptorId: string;
  sourceAttributePath: AttributePath;
  errorCode: string;
  error: string;
}

export type FillPlanEntry = AssignedEntry | UnmatchedEntry | IncoercibleEntry;

export interface FillPlan {
  entries: FillPlanEntry[];
  unassignedAttributes: AttributePath[];
  candidates: MatchCandidate[];
}

// ── Outcomes ────────────────────────────────────────────────────────────

export type FailureCause = 'timeout' | 'stale_element' | 'not_interactable' | 'unknown';

export type FillOutcome =
  | { status: 'filled'; fieldDescriptorId: string; sourceAttributePath: AttributePath; retried: boolean }
  | { status: 'skippedUnmatched'; fieldDescriptorId: string }
  | {
      status: 'verificationFailed';
      fieldDescriptorId: string;
      sourceAttributePath: AttributePath;
      expected: string;
      observed: string;
    }
  | {
      status: 'executionFailed';
      fieldDescriptorId: string;
      sourceAttributePath: AttributePath;
      cause: FailureCause;
      message: string;
    }
  | { status: 'incoercible'; fieldDescriptorId: string; sourceAttributePath: AttributePath; error: string }
  | { status: 'notAttempted'; fieldDescriptorId: string };

export type FillStatus = FillOutcome['status'];
