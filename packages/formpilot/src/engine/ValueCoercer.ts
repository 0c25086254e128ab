import type { ProfileAttribute } from '../profile/attributes';
import type { EngineConfig } from '../config/matching';
import type { CoercedValue, FieldDescriptor, FieldOption } from './types';
import { IncoercibleValueError, NoMatchingOptionError, UnknownDateFormatError } from './errors';
import { formatDate, parseProfileDate } from './dates';
import { scoreOption } from './textMatch';

export type CoercionConfig = Pick<EngineConfig, 'optionFloor' | 'degreeLevels'>;

const TRUTHY = new Set(['true', 'yes', 'y', '1', 'on', 'checked']);
const FALSY = new Set(['false', 'no', 'n', '0', 'off', 'unchecked']);

function truncate(value: string, maxLength: number | undefined): string {
  return maxLength !== undefined && value.length > maxLength ? value.slice(0, maxLength) : value;
}

function bestOption(
  value: string,
  options: FieldOption[],
  degreeLevels: Record<string, string[]> | undefined,
): { option: FieldOption | null; score: number } {
  let best: FieldOption | null = null;
  let bestScore = 0;
  for (const option of options) {
    const score = scoreOption(value, option, degreeLevels);
    // strict: ties keep the earlier option
    if (score > bestScore) {
      best = option;
      bestScore = score;
    }
  }
  return { option: best, score: bestScore };
}

function coerceText(attribute: ProfileAttribute, descriptor: FieldDescriptor): CoercedValue {
  let value = attribute.value;

  if (descriptor.kind === 'email') {
    value = value.trim().toLowerCase();
  } else if (descriptor.kind === 'tel') {
    value = value.replace(/[^0-9+()\-. ]/g, '').trim();
    if (!/\d/.test(value)) {
      throw new IncoercibleValueError(`Value of ${attribute.path} has no phone digits`);
    }
  }

  return { type: 'text', value: truncate(value, descriptor.maxLength) };
}

function coerceDate(attribute: ProfileAttribute, descriptor: FieldDescriptor): CoercedValue {
  if (attribute.semanticType !== 'date') {
    throw new IncoercibleValueError(`${attribute.path} is not a date and cannot fill date field ${descriptor.id}`);
  }
  const parts = parseProfileDate(attribute.value);
  if (!parts) throw new UnknownDateFormatError(attribute.value);
  return { type: 'text', value: formatDate(parts, descriptor.dateFormat ?? 'YYYY-MM-DD') };
}

function coerceChoice(attribute: ProfileAttribute, descriptor: FieldDescriptor, config: CoercionConfig): CoercedValue {
  const levels = attribute.semanticType === 'degree' ? config.degreeLevels : undefined;
  const { option, score } = bestOption(attribute.value, descriptor.options, levels);
  if (!option || score < config.optionFloor) {
    throw new NoMatchingOptionError(descriptor.id, score);
  }
  return { type: 'option', value: option.value, displayText: option.displayText };
}

function coerceMulti(attribute: ProfileAttribute, descriptor: FieldDescriptor, config: CoercionConfig): CoercedValue {
  const levels = attribute.semanticType === 'degree' ? config.degreeLevels : undefined;
  const picked: FieldOption[] = [];
  let bestScore = 0;

  for (const option of descriptor.options) {
    let optionScore = 0;
    for (const value of attribute.values) {
      optionScore = Math.max(optionScore, scoreOption(value, option, levels));
    }
    bestScore = Math.max(bestScore, optionScore);
    if (optionScore >= config.optionFloor) picked.push(option);
  }

  if (picked.length === 0) throw new NoMatchingOptionError(descriptor.id, bestScore);
  return {
    type: 'options',
    values: picked.map((o) => o.value),
    displayTexts: picked.map((o) => o.displayText),
  };
}

function coerceCheckbox(attribute: ProfileAttribute): CoercedValue {
  const key = attribute.value.trim().toLowerCase();
  if (TRUTHY.has(key)) return { type: 'checked', value: true };
  if (FALSY.has(key)) return { type: 'checked', value: false };
  throw new IncoercibleValueError(`${attribute.path} is not a yes/no value`);
}

/**
 * Shape a profile attribute for one field.
 *
 * Throws IncoercibleValueError (or its UnknownDateFormatError /
 * NoMatchingOptionError subclasses) when the value has no representation
 * the field accepts.
 */
export function coerceValue(
  attribute: ProfileAttribute,
  descriptor: FieldDescriptor,
  config: CoercionConfig,
): CoercedValue {
  switch (descriptor.kind) {
    case 'text':
    case 'textarea':
    case 'email':
    case 'tel':
      return coerceText(attribute, descriptor);
    case 'date':
      return coerceDate(attribute, descriptor);
    case 'singleSelect':
    case 'radioGroup':
      return coerceChoice(attribute, descriptor, config);
    case 'multiSelect':
      return coerceMulti(attribute, descriptor, config);
    case 'checkbox':
      return coerceCheckbox(attribute);
  }
}

/** Human-readable form of a coerced value, for reports and verification messages. */
export function describeCoercedValue(value: CoercedValue): string {
  switch (value.type) {
    case 'text':
      return value.value;
    case 'option':
      return value.displayText;
    case 'options':
      return value.displayTexts.join(', ');
    case 'checked':
      return value.value ? 'checked' : 'unchecked';
  }
}
