/**
 * Engine config unit tests.
 *
 * Alias merging, floor overrides and the cached environment.
 */

import { afterEach, describe, expect, test } from 'vitest';
import { resolveEngineConfig } from '../../../src/config/matching';
import { getEnv, resetEnv } from '../../../src/config/env';
import { InvalidConfigError } from '../../../src/engine/errors';

describe('resolveEngineConfig', () => {
  afterEach(() => {
    delete process.env.FORMPILOT_FIELD_TIMEOUT_MS;
    resetEnv();
  });

  test('fills every default', () => {
    const config = resolveEngineConfig();

    expect(config.fieldTimeoutMs).toBe(5000);
    expect(config.extractionTimeoutMs).toBe(10000);
    expect(config.labelFloor).toBe(0.5);
    expect(config.placeholderCeiling).toBe(0.6);
    expect(config.optionFloor).toBe(0.6);
    expect(config.scoreFloors.text).toBe(0.5);
    expect(config.scoreFloors.singleSelect).toBe(0.6);
    expect(config.scoreFloors.radioGroup).toBe(0.6);
    expect(config.aliases.get('email')).toContain('email address');
    expect(Object.keys(config.degreeLevels)).toEqual(['doctorate', 'master', 'bachelor', 'associate', 'highSchool']);
  });

  test('extra aliases merge over the defaults', () => {
    const config = resolveEngineConfig({ aliases: { email: ['correo'] } });
    const aliases = config.aliases.get('email') ?? [];

    expect(aliases).toContain('email');
    expect(aliases[aliases.length - 1]).toBe('correo');
    expect(config.aliases.get('phone')).toContain('phone number');
  });

  test('replaceAliases swaps out only the attributes it names', () => {
    const config = resolveEngineConfig({ aliases: { email: ['correo'] }, replaceAliases: true });

    expect(config.aliases.get('email')).toEqual(['correo']);
    expect(config.aliases.get('phone')).toContain('phone');
  });

  test('per-kind floors override individually', () => {
    const config = resolveEngineConfig({ scoreFloors: { text: 0.7 } });
    expect(config.scoreFloors.text).toBe(0.7);
    expect(config.scoreFloors.email).toBe(0.5);
  });

  test('unknown attributes are rejected', () => {
    expect(() => resolveEngineConfig({ aliases: { favoriteColor: ['color'] } })).toThrow(InvalidConfigError);
  });

  test('out-of-range thresholds are rejected', () => {
    expect(() => resolveEngineConfig({ labelFloor: 2 })).toThrow(InvalidConfigError);
    expect(() => resolveEngineConfig({ fieldTimeoutMs: -1 })).toThrow(InvalidConfigError);
  });

  test('field timeout falls back to the environment', () => {
    process.env.FORMPILOT_FIELD_TIMEOUT_MS = '1234';
    resetEnv();

    expect(getEnv().FORMPILOT_FIELD_TIMEOUT_MS).toBe(1234);
    expect(resolveEngineConfig().fieldTimeoutMs).toBe(1234);
    expect(resolveEngineConfig({ fieldTimeoutMs: 99 }).fieldTimeoutMs).toBe(99);
  });
});
