import type { FieldState, FormPage } from '../adapters/types';
import type { CoercedValue, FieldKind } from './types';
import { describeCoercedValue } from './ValueCoercer';
import { getLogger } from '../monitoring/logger';

const logger = getLogger({ service: 'verification-engine' });

export interface VerificationResult {
  passed: boolean;
  expected: string;
  observed: string;
}

/**
 * Normalize a text value for comparison. Phone and date fields compare
 * digits only, since pages reformat them freely.
 */
export function normalizeForComparison(value: string, kind: FieldKind): string {
  if (kind === 'tel' || kind === 'date') return value.replace(/\D/g, '');
  return value.replace(/\s+/g, ' ').trim().toLowerCase();
}

function sameSet(a: string[], b: string[]): boolean {
  const left = new Set(a);
  const right = new Set(b);
  return left.size === right.size && [...left].every((v) => right.has(v));
}

/** True when what the page reports is what was applied. */
export function matchesReadback(expected: CoercedValue, observed: FieldState, kind: FieldKind): boolean {
  switch (expected.type) {
    case 'text':
      return normalizeForComparison(expected.value, kind) === normalizeForComparison(observed.value, kind);
    case 'option':
      return observed.value === expected.value;
    case 'options':
      return sameSet(expected.values, observed.values);
    case 'checked':
      return observed.checked === expected.value;
  }
}

export function describeObserved(observed: FieldState, expected: CoercedValue): string {
  switch (expected.type) {
    case 'checked':
      return observed.checked ? 'checked' : 'unchecked';
    case 'options':
      return observed.values.join(', ');
    default:
      return observed.value;
  }
}

/**
 * DOM readback verification: after a value is applied, read the field back
 * through the page handle and compare it to the coerced value.
 */
export class VerificationEngine {
  constructor(private page: FormPage) {}

  async verify(handle: string, kind: FieldKind, expected: CoercedValue): Promise<VerificationResult> {
    const observed = await this.page.read(handle);
    const passed = matchesReadback(expected, observed, kind);
    const result: VerificationResult = {
      passed,
      expected: describeCoercedValue(expected),
      observed: describeObserved(observed, expected),
    };

    if (passed) {
      logger.debug('Verification passed', { fieldId: handle, kind });
    } else {
      logger.warn('Verification failed', {
        fieldId: handle,
        kind,
        expected: result.expected,
        observed: result.observed,
      });
    }
    return result;
  }
}
