/**
 * fill-form.ts
 *
 * Opens a form in Chromium and fills it from a profile JSON file.
 *
 * Usage:
 *   npx tsx src/scripts/fill-form.ts --url=<url> --profile=<profile.json>
 *
 * Flags:
 *   --url=<url>          Form to open (http(s) URL or file:// path)
 *   --profile=<path>     Profile JSON file
 *   --dry-run            Print the fill plan without touching the form
 *   --questions          Print the form's questions and exit
 *   --required-only      Plan and fill required fields only
 *   --refill             Include fields the page already populated
 *   --headless=false     Show the browser window
 */

import { chromium } from 'playwright';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FormFillEngine } from '../engine/FormFillEngine';
import { formatRunReport } from '../engine/RunReport';
import { describeCoercedValue } from '../engine/ValueCoercer';
import { FormPilotError, errorMessage } from '../engine/errors';
import { PlaywrightFormPage } from '../adapters/playwright';
import { getEnv } from '../config/env';
import { getLogger } from '../monitoring/logger';

const logger = getLogger({ service: 'fill-form' });

function parseArg(flag: string): string | null {
  const arg = process.argv.find((a) => a.startsWith(`--${flag}=`));
  if (!arg) return null;
  const value = arg.split('=').slice(1).join('=');
  return value || null;
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(`--${flag}`);
}

function usage(): void {
  console.error('Usage:');
  console.error('  npx tsx src/scripts/fill-form.ts --url=<url> --profile=<profile.json>');
  console.error('');
  console.error('Flags:');
  console.error('  --dry-run          Print the fill plan only');
  console.error('  --questions        Print the form questions only');
  console.error('  --required-only    Required fields only');
  console.error('  --refill           Include already-populated fields');
  console.error('  --headless=false   Show the browser');
}

async function main(): Promise<number> {
  const url = parseArg('url');
  const profilePath = parseArg('profile');
  const questionsOnly = hasFlag('questions');

  if (!url || (!profilePath && !questionsOnly)) {
    usage();
    return 2;
  }

  const headlessArg = parseArg('headless');
  const headless = headlessArg === null ? getEnv().FORMPILOT_HEADLESS : headlessArg !== 'false';
  const requiredOnly = hasFlag('required-only');
  const includePrefilled = hasFlag('refill');

  const engine = new FormFillEngine();
  engine.on('field:outcome', ({ outcome }) => {
    logger.debug('Field outcome', { fieldId: outcome.fieldDescriptorId, status: outcome.status });
  });

  const browser = await chromium.launch({ headless });
  try {
    const page = await browser.newPage();
    await page.goto(url, { waitUntil: 'domcontentloaded' });
    const formPage = new PlaywrightFormPage(page, { pageId: url });

    if (questionsOnly) {
      const questions = await engine.describeForm(formPage, { requiredOnly });
      questions.forEach((q, i) => {
        const marker = q.required ? ' *' : '';
        const options = q.options.length > 0 ? ` [${q.options.join(' | ')}]` : '';
        console.log(`${i + 1}. ${q.label}${marker} (${q.kind})${options}`);
      });
      return 0;
    }

    const profileFile = path.resolve(process.cwd(), profilePath ?? '');
    const profile: unknown = JSON.parse(await fs.readFile(profileFile, 'utf8'));

    if (hasFlag('dry-run')) {
      const { fields, plan } = await engine.plan(profile, formPage, { requiredOnly, includePrefilled });
      const byId = new Map(fields.map((f) => [f.id, f]));
      for (const entry of plan.entries) {
        const label = byId.get(entry.fieldDescriptorId)?.label || entry.fieldDescriptorId;
        if (entry.kind === 'assigned') {
          console.log(
            `${label} <- ${entry.sourceAttributePath} = "${describeCoercedValue(entry.coercedValue)}"` +
              ` (${entry.strategyName}, ${entry.score.toFixed(2)})`,
          );
        } else if (entry.kind === 'incoercible') {
          console.log(`${label} !! ${entry.sourceAttributePath}: ${entry.error}`);
        } else {
          console.log(`${label} -- unmatched`);
        }
      }
      if (plan.unassignedAttributes.length > 0) {
        console.log(`Unused profile attributes: ${plan.unassignedAttributes.join(', ')}`);
      }
      return 0;
    }

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const report = await engine.run(profile, formPage, {
      requiredOnly,
      includePrefilled,
      signal: controller.signal,
    });
    console.log(formatRunReport(report));
    return report.failedCount > 0 ? 1 : 0;
  } finally {
    await browser.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof FormPilotError) {
      logger.error('Fill failed', { code: err.code, error: err.message });
    } else {
      logger.error('Fill crashed', { error: errorMessage(err) });
    }
    process.exitCode = 1;
  });
