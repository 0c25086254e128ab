/**
 * PlaywrightFormPage: FormPage over a live Playwright Page.
 *
 * All DOM work happens inside page.evaluate() through the scripts in
 * pageScripts.ts; their results are validated with zod on the way back since
 * the browser side is untyped.
 */

import { errors, type Page } from 'playwright';
import type { ApplyInstruction, FieldState, FormPage, RawFormElement } from './types';
import { FieldTimeoutError } from '../engine/errors';
import { SCAN_SCRIPT, applyScript, fieldStateSchema, readScript, scanResultSchema } from './pageScripts';

export class PlaywrightFormPage implements FormPage {
  readonly pageId: string;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly page: Page,
    options: { pageId?: string; pollIntervalMs?: number } = {},
  ) {
    this.pageId = options.pageId ?? page.url();
    this.pollIntervalMs = options.pollIntervalMs ?? 50;
  }

  async isAttached(): Promise<boolean> {
    return !this.page.isClosed();
  }

  async waitForReady(timeoutMs: number): Promise<void> {
    await this.page.waitForLoadState('domcontentloaded', { timeout: timeoutMs });
  }

  async scan(): Promise<RawFormElement[]> {
    const result = await this.page.evaluate(SCAN_SCRIPT);
    return scanResultSchema.parse(result);
  }

  async read(handle: string): Promise<FieldState> {
    const result = await this.page.evaluate(readScript(handle));
    return fieldStateSchema.parse(result);
  }

  async waitForInteractable(handle: string, timeoutMs: number): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    const locator = this.page.locator(handle).first();
    try {
      await locator.waitFor({ state: 'attached', timeout: timeoutMs });
      const type = await locator.getAttribute('type', { timeout: Math.max(1, deadline - Date.now()) });
      // Styled radios/checkboxes are usually invisible behind their label.
      if (type !== 'radio' && type !== 'checkbox') {
        await locator.waitFor({ state: 'visible', timeout: Math.max(1, deadline - Date.now()) });
      }
    } catch (err) {
      if (err instanceof errors.TimeoutError) throw new FieldTimeoutError(handle, timeoutMs);
      throw err;
    }

    while (!(await locator.isEnabled())) {
      if (Date.now() >= deadline) throw new FieldTimeoutError(handle, timeoutMs);
      await this.page.waitForTimeout(this.pollIntervalMs);
    }
  }

  async apply(handle: string, instruction: ApplyInstruction): Promise<void> {
    await this.page.evaluate(applyScript(handle, instruction));
  }
}
