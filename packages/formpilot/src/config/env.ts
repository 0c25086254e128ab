import { z } from 'zod';

const booleanish = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  FORMPILOT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  FORMPILOT_FIELD_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  FORMPILOT_HEADLESS: booleanish.default('true'),
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
