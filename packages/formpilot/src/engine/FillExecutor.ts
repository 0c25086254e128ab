/**
 * FillExecutor applies a FillPlan to a page, one field at a time.
 *
 * Per assigned field: wait until interactable, apply, read back, re-apply
 * once on mismatch. Every apply dispatches input/change/blur, even when the
 * field already showed the planned value. Any error thrown for a field is
 * folded into that field's outcome; the run moves on to the next field.
 */

import type { ApplyInstruction, FormPage } from '../adapters/types';
import type { AssignedEntry, CoercedValue, FailureCause, FieldDescriptor, FillOutcome, FillPlan } from './types';
import { FieldTimeoutError, PageBusyError, errorMessage, isDetachedError } from './errors';
import { VerificationEngine, type VerificationResult } from './VerificationEngine';
import { getLogger } from '../monitoring/logger';

export interface ExecuteOptions {
  fieldTimeoutMs: number;
  /** Checked between fields; once aborted, remaining assignments are not attempted. */
  signal?: AbortSignal;
  /** Called as soon as each outcome is recorded. */
  onOutcome?: (outcome: FillOutcome) => void;
}

// ── Page lock ─────────────────────────────────────────────────────────

const lockedPages = new WeakSet<FormPage>();

/**
 * Run `fn` while holding the page's exclusive lock. A second caller on the
 * same page fails immediately with PageBusyError instead of waiting.
 */
export async function withPageLock<T>(page: FormPage, fn: () => Promise<T>): Promise<T> {
  if (lockedPages.has(page)) throw new PageBusyError(page.pageId);
  lockedPages.add(page);
  try {
    return await fn();
  } finally {
    lockedPages.delete(page);
  }
}

export function isPageLocked(page: FormPage): boolean {
  return lockedPages.has(page);
}

// ── Helpers ───────────────────────────────────────────────────────────

export function classifyFailure(err: unknown): FailureCause {
  if (err instanceof FieldTimeoutError) return 'timeout';
  const msg = errorMessage(err);
  if (isDetachedError(err) || /not attached|stale|no longer/i.test(msg)) return 'stale_element';
  if (/not visible|not enabled|not interactable|disabled|intercepts pointer|outside of the viewport/i.test(msg)) {
    return 'not_interactable';
  }
  if (/timeout|timed out/i.test(msg)) return 'timeout';
  return 'unknown';
}

export function toInstruction(value: CoercedValue): ApplyInstruction {
  switch (value.type) {
    case 'text':
      return { type: 'text', value: value.value };
    case 'option':
      return { type: 'choose', values: [value.value] };
    case 'options':
      return { type: 'choose', values: value.values };
    case 'checked':
      return { type: 'check', checked: value.value };
  }
}

// ── Executor ──────────────────────────────────────────────────────────

export class FillExecutor {
  private logger = getLogger({ service: 'FillExecutor' });
  private verifier: VerificationEngine;

  constructor(
    private page: FormPage,
    private options: ExecuteOptions,
  ) {
    this.verifier = new VerificationEngine(page);
  }

  /** One outcome per plan entry, in document order. Does not take the page lock. */
  async execute(plan: FillPlan, descriptors: FieldDescriptor[]): Promise<FillOutcome[]> {
    const byId = new Map(descriptors.map((d) => [d.id, d]));
    const ordered = [...plan.entries].sort(
      (a, b) => (byId.get(a.fieldDescriptorId)?.index ?? 0) - (byId.get(b.fieldDescriptorId)?.index ?? 0),
    );

    const outcomes: FillOutcome[] = [];
    let cancelled = false;

    for (const entry of ordered) {
      let outcome: FillOutcome;

      if (entry.kind === 'unmatched') {
        outcome = { status: 'skippedUnmatched', fieldDescriptorId: entry.fieldDescriptorId };
      } else if (entry.kind === 'incoercible') {
        outcome = {
          status: 'incoercible',
          fieldDescriptorId: entry.fieldDescriptorId,
          sourceAttributePath: entry.sourceAttributePath,
          error: entry.error,
        };
      } else {
        if (!cancelled && this.options.signal?.aborted) {
          cancelled = true;
          this.logger.info('Run cancelled; remaining fields not attempted', { fieldId: entry.fieldDescriptorId });
        }
        const descriptor = byId.get(entry.fieldDescriptorId);
        if (cancelled) {
          outcome = { status: 'notAttempted', fieldDescriptorId: entry.fieldDescriptorId };
        } else if (!descriptor) {
          outcome = {
            status: 'executionFailed',
            fieldDescriptorId: entry.fieldDescriptorId,
            sourceAttributePath: entry.sourceAttributePath,
            cause: 'stale_element',
            message: `No descriptor for field ${entry.fieldDescriptorId}`,
          };
        } else {
          outcome = await this.fillField(entry, descriptor);
        }
      }

      const frozen = Object.freeze(outcome);
      outcomes.push(frozen);
      this.options.onOutcome?.(frozen);
    }

    return outcomes;
  }

  private async fillField(entry: AssignedEntry, descriptor: FieldDescriptor): Promise<FillOutcome> {
    const id = descriptor.id;
    const instruction = toInstruction(entry.coercedValue);

    try {
      await this.page.waitForInteractable(id, this.options.fieldTimeoutMs);

      let last: VerificationResult | null = null;
      for (let attempt = 0; attempt < 2; attempt++) {
        await this.page.apply(id, instruction);
        last = await this.verifier.verify(id, descriptor.kind, entry.coercedValue);
        if (last.passed) {
          return {
            status: 'filled',
            fieldDescriptorId: id,
            sourceAttributePath: entry.sourceAttributePath,
            retried: attempt > 0,
          };
        }
        if (attempt === 0) this.logger.debug('Readback mismatch, re-applying once', { fieldId: id });
      }

      return {
        status: 'verificationFailed',
        fieldDescriptorId: id,
        sourceAttributePath: entry.sourceAttributePath,
        expected: last?.expected ?? '',
        observed: last?.observed ?? '',
      };
    } catch (err) {
      const cause = classifyFailure(err);
      this.logger.warn('Field execution failed', { fieldId: id, cause, error: errorMessage(err) });
      return {
        status: 'executionFailed',
        fieldDescriptorId: id,
        sourceAttributePath: entry.sourceAttributePath,
        cause,
        message: errorMessage(err),
      };
    }
  }
}

/** Execute a plan under the page's exclusive lock. */
export function executeFillPlan(
  page: FormPage,
  plan: FillPlan,
  descriptors: FieldDescriptor[],
  options: ExecuteOptions,
): Promise<FillOutcome[]> {
  return withPageLock(page, () => new FillExecutor(page, options).execute(plan, descriptors));
}
