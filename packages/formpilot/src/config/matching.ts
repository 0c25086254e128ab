/**
 * Engine configuration: alias table, score floors, timeouts.
 *
 * Every knob is optional; callers pass only what they override. The default
 * alias table lives in aliases.json so it can be extended without code.
 */

import { z } from 'zod';
import aliasDefaults from './aliases.json';
import { ATTRIBUTE_PATHS, isAttributePath, type AttributePath } from '../profile/attributes';
import type { FieldKind } from '../engine/types';
import { InvalidConfigError } from '../engine/errors';
import { getEnv } from './env';

const FIELD_KINDS = [
  'text',
  'email',
  'tel',
  'textarea',
  'date',
  'singleSelect',
  'multiSelect',
  'checkbox',
  'radioGroup',
] as const satisfies readonly FieldKind[];

const DEFAULT_FIELD_TIMEOUT_MS = 5_000;

export const DEFAULT_SCORE_FLOORS: Record<FieldKind, number> = {
  text: 0.5,
  email: 0.5,
  tel: 0.5,
  textarea: 0.5,
  date: 0.5,
  checkbox: 0.5,
  singleSelect: 0.6,
  multiSelect: 0.6,
  radioGroup: 0.6,
};

// ── Schemas ─────────────────────────────────────────────────────────────

const aliasListSchema = z.array(z.string().trim().min(1));

const aliasTableSchema = z.record(z.string(), aliasListSchema).superRefine((table, ctx) => {
  for (const key of Object.keys(table)) {
    if (!isAttributePath(key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `unknown profile attribute "${key}"`,
        path: [key],
      });
    }
  }
});

const degreeLevelsSchema = z.record(z.string(), aliasListSchema);

const defaultsFileSchema = z.object({
  aliases: aliasTableSchema,
  degreeLevels: degreeLevelsSchema,
});

const unitInterval = z.number().min(0).max(1);

export const EngineConfigSchema = z.object({
  /** Extra aliases per profile attribute, merged over the defaults. */
  aliases: aliasTableSchema.optional(),
  /** When true, attributes named in `aliases` drop their default aliases. */
  replaceAliases: z.boolean().default(false),
  scoreFloors: z.record(z.enum(FIELD_KINDS), unitInterval).optional(),
  labelFloor: unitInterval.default(0.5),
  placeholderCeiling: unitInterval.default(0.6),
  optionFloor: unitInterval.default(0.6),
  degreeLevels: degreeLevelsSchema.optional(),
  fieldTimeoutMs: z.number().int().positive().optional(),
  extractionTimeoutMs: z.number().int().positive().default(10_000),
});

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export interface EngineConfig {
  aliases: ReadonlyMap<AttributePath, string[]>;
  scoreFloors: Record<FieldKind, number>;
  labelFloor: number;
  placeholderCeiling: number;
  optionFloor: number;
  degreeLevels: Record<string, string[]>;
  fieldTimeoutMs: number;
  extractionTimeoutMs: number;
}

// ── Defaults ────────────────────────────────────────────────────────────

interface Defaults {
  aliases: Map<AttributePath, string[]>;
  degreeLevels: Record<string, string[]>;
}

let _defaults: Defaults | null = null;

function loadDefaults(): Defaults {
  if (!_defaults) {
    const file = defaultsFileSchema.parse(aliasDefaults);
    const aliases = new Map<AttributePath, string[]>();
    for (const path of ATTRIBUTE_PATHS) {
      aliases.set(path, file.aliases[path] ?? []);
    }
    _defaults = { aliases, degreeLevels: file.degreeLevels };
  }
  return _defaults;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

/** Validate caller overrides and fill in every default. */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      parsed.error.issues,
    );
  }
  const cfg = parsed.data;
  const defaults = loadDefaults();

  const aliases = new Map<AttributePath, string[]>();
  for (const path of ATTRIBUTE_PATHS) {
    const extra = cfg.aliases?.[path];
    if (extra && cfg.replaceAliases) {
      aliases.set(path, unique(extra));
    } else {
      aliases.set(path, unique([...(defaults.aliases.get(path) ?? []), ...(extra ?? [])]));
    }
  }

  return {
    aliases,
    scoreFloors: { ...DEFAULT_SCORE_FLOORS, ...cfg.scoreFloors },
    labelFloor: cfg.labelFloor,
    placeholderCeiling: cfg.placeholderCeiling,
    optionFloor: cfg.optionFloor,
    degreeLevels: cfg.degreeLevels ?? defaults.degreeLevels,
    fieldTimeoutMs: cfg.fieldTimeoutMs ?? getEnv().FORMPILOT_FIELD_TIMEOUT_MS ?? DEFAULT_FIELD_TIMEOUT_MS,
    extractionTimeoutMs: cfg.extractionTimeoutMs,
  };
}
