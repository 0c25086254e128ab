/**
 * FormFillEngine: one entry point for a whole fill run.
 *
 * Validate profile → extract fields → plan → execute → report. The engine
 * holds configuration only; everything a run touches is local to that run,
 * so one engine can serve concurrent runs on different pages.
 *
 * Progress is published as typed events:
 *   engine.on('field:outcome', ({ outcome }) => ...)
 */

import EventEmitter from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import type { FormPage } from '../adapters/types';
import { parseProfile } from '../profile/schema';
import { resolveEngineConfig, type EngineConfig, type EngineConfigInput } from '../config/matching';
import type { FieldDescriptor, FieldKind, FillOutcome, FillPlan } from './types';
import { extractFields } from './FieldExtractor';
import { buildFillPlan } from './FieldMatcher';
import { FillExecutor, withPageLock } from './FillExecutor';
import { buildRunReport, type RunReport } from './RunReport';
import { getLogger } from '../monitoring/logger';

export interface FormFillEvents {
  'run:started': (event: { runId: string; pageId: string }) => void;
  'fields:extracted': (event: { runId: string; fields: FieldDescriptor[] }) => void;
  'plan:ready': (event: { runId: string; plan: FillPlan }) => void;
  'field:outcome': (event: { runId: string; outcome: FillOutcome }) => void;
  'run:completed': (event: { runId: string; report: RunReport }) => void;
}

export interface PlanOptions {
  /** Plan required fields only. */
  requiredOnly?: boolean;
  /** Keep fields the page has already populated, so a re-run can confirm them. */
  includePrefilled?: boolean;
}

export interface RunOptions extends PlanOptions {
  signal?: AbortSignal;
}

export interface PlanResult {
  fields: FieldDescriptor[];
  plan: FillPlan;
}

export interface FormQuestion {
  id: string;
  label: string;
  kind: FieldKind;
  required: boolean;
  options: string[];
}

export class FormFillEngine extends EventEmitter<FormFillEvents> {
  readonly config: EngineConfig;
  private logger = getLogger({ service: 'FormFillEngine' });

  constructor(config: EngineConfigInput = {}) {
    super();
    this.config = resolveEngineConfig(config);
  }

  /**
   * Fill `page` from `profileInput`.
   *
   * Rejects with InvalidProfileError before touching the page, with
   * PageBusyError when another run holds the page, and with
   * StaleDocumentError when the page is gone. Everything that goes wrong for
   * a single field is reported in the RunReport instead.
   */
  async run(profileInput: unknown, page: FormPage, options: RunOptions = {}): Promise<RunReport> {
    const profile = parseProfile(profileInput);

    return withPageLock(page, async () => {
      const runId = randomUUID();
      const log = this.logger.child({ runId, pageId: page.pageId });
      const started = Date.now();

      log.info('Fill run started', { requiredOnly: !!options.requiredOnly });
      this.emit('run:started', { runId, pageId: page.pageId });

      const fields = await extractFields(page, {
        timeoutMs: this.config.extractionTimeoutMs,
        includePrefilled: options.includePrefilled,
      });
      this.emit('fields:extracted', { runId, fields });

      const plan = buildFillPlan(profile, fields, this.config, { requiredOnly: options.requiredOnly });
      this.emit('plan:ready', { runId, plan });

      const executor = new FillExecutor(page, {
        fieldTimeoutMs: this.config.fieldTimeoutMs,
        signal: options.signal,
        onOutcome: (outcome) => this.emit('field:outcome', { runId, outcome }),
      });
      const outcomes = await executor.execute(plan, fields);

      const report = buildRunReport(outcomes, fields, plan.unassignedAttributes);
      log.info('Fill run completed', {
        durationMs: Date.now() - started,
        totalFields: report.totalFields,
        filled: report.filledCount,
        unmatched: report.unmatchedCount,
        failed: report.failedCount,
        notAttempted: report.notAttemptedCount,
      });
      this.emit('run:completed', { runId, report });
      return report;
    });
  }

  /** Dry run: extract and plan without touching any field. */
  async plan(profileInput: unknown, page: FormPage, options: PlanOptions = {}): Promise<PlanResult> {
    const profile = parseProfile(profileInput);
    const fields = await extractFields(page, {
      timeoutMs: this.config.extractionTimeoutMs,
      includePrefilled: options.includePrefilled,
    });
    const plan = buildFillPlan(profile, fields, this.config, { requiredOnly: options.requiredOnly });
    return { fields, plan };
  }

  /** The form's questions as a caller would show them to a person. */
  async describeForm(page: FormPage, options: { requiredOnly?: boolean } = {}): Promise<FormQuestion[]> {
    const fields = await extractFields(page, {
      timeoutMs: this.config.extractionTimeoutMs,
      includePrefilled: true,
    });
    return fields
      .filter((f) => !options.requiredOnly || f.required)
      .map((f) => ({
        id: f.id,
        label: f.label || f.name || f.domId,
        kind: f.kind,
        required: f.required,
        options: f.options.map((o) => o.displayText),
      }));
  }
}
