/**
 * Flattens a Profile into the units the matcher assigns to fields.
 *
 * Sequence-valued attributes keep the whole sequence in `values`; `value` is
 * the first element, which is the "most recent" slot on short forms.
 */

import type { Profile } from './schema';

export type SemanticType = 'name' | 'email' | 'phone' | 'text' | 'longText' | 'date' | 'degree' | 'skillSet';

export const ATTRIBUTE_PATHS = [
  'fullName',
  'firstName',
  'lastName',
  'email',
  'phone',
  'address',
  'education.institution',
  'education.degree',
  'education.field',
  'education.startDate',
  'education.endDate',
  'experience.employer',
  'experience.title',
  'experience.startDate',
  'experience.endDate',
  'experience.description',
  'skills',
] as const;

export type AttributePath = (typeof ATTRIBUTE_PATHS)[number];

export function isAttributePath(value: string): value is AttributePath {
  const paths: readonly string[] = ATTRIBUTE_PATHS;
  return paths.includes(value);
}

export const SEMANTIC_TYPES: Record<AttributePath, SemanticType> = {
  fullName: 'name',
  firstName: 'name',
  lastName: 'name',
  email: 'email',
  phone: 'phone',
  address: 'text',
  'education.institution': 'text',
  'education.degree': 'degree',
  'education.field': 'text',
  'education.startDate': 'date',
  'education.endDate': 'date',
  'experience.employer': 'text',
  'experience.title': 'text',
  'experience.startDate': 'date',
  'experience.endDate': 'date',
  'experience.description': 'longText',
  skills: 'skillSet',
};

export interface ProfileAttribute {
  path: AttributePath;
  semanticType: SemanticType;
  /** Scalar form: the value itself, or the first element of a sequence. */
  value: string;
  /** Every non-empty value, in source order. */
  values: string[];
  /** Declaration order, used as the last tie-break. */
  order: number;
}

function splitName(fullName: string): { first: string; last: string } {
  const parts = fullName.split(/\s+/).filter(Boolean);
  return {
    first: parts[0] ?? '',
    last: parts.slice(1).join(' '),
  };
}

function compact(values: Array<string | undefined>): string[] {
  return values.filter((v): v is string => typeof v === 'string' && v.length > 0);
}

function rawValues(profile: Profile, path: AttributePath): string[] {
  const { first, last } = splitName(profile.fullName);
  switch (path) {
    case 'fullName':
      return compact([profile.fullName]);
    case 'firstName':
      return compact([first]);
    case 'lastName':
      return compact([last]);
    case 'email':
      return compact([profile.email]);
    case 'phone':
      return compact([profile.phone]);
    case 'address':
      return compact([profile.address]);
    case 'education.institution':
      return compact(profile.education.map((e) => e.institution));
    case 'education.degree':
      return compact(profile.education.map((e) => e.degree));
    case 'education.field':
      return compact(profile.education.map((e) => e.field));
    case 'education.startDate':
      return compact(profile.education.map((e) => e.startDate));
    case 'education.endDate':
      return compact(profile.education.map((e) => e.endDate));
    case 'experience.employer':
      return compact(profile.experience.map((e) => e.employer));
    case 'experience.title':
      return compact(profile.experience.map((e) => e.title));
    case 'experience.startDate':
      return compact(profile.experience.map((e) => e.startDate));
    case 'experience.endDate':
      return compact(profile.experience.map((e) => e.endDate));
    case 'experience.description':
      return compact(profile.experience.map((e) => e.description));
    case 'skills':
      return profile.skills;
  }
}

/** Every attribute with at least one non-empty value, in declaration order. */
export function flattenProfile(profile: Profile): ProfileAttribute[] {
  const attributes: ProfileAttribute[] = [];
  ATTRIBUTE_PATHS.forEach((path, order) => {
    const values = rawValues(profile, path);
    if (values.length === 0) return;
    const semanticType = SEMANTIC_TYPES[path];
    attributes.push({
      path,
      semanticType,
      value: semanticType === 'skillSet' ? values.join(', ') : values[0],
      values,
      order,
    });
  });
  return attributes;
}
