/**
 * FieldMatcher unit tests.
 *
 * Strategy cascade, kind veto, floors and greedy resolution of the fill plan.
 */

import { describe, expect, test } from 'vitest';
import { FieldMatcher, buildFillPlan, isKindCompatible } from '../../../src/engine/FieldMatcher';
import { resolveEngineConfig } from '../../../src/config/matching';
import { parseProfile } from '../../../src/profile/schema';
import { flattenProfile } from '../../../src/profile/attributes';
import { JANE, JANE_FULL, descriptor, inOrder } from '../../fixtures/formFixtures';

const config = resolveEngineConfig();
const jane = parseProfile(JANE);
const janeFull = parseProfile(JANE_FULL);

const CONTACT_FIELDS = inOrder([
  descriptor({ id: 'name', name: 'name', label: 'Full Name' }),
  descriptor({ id: 'contact_email', kind: 'email', name: 'contact_email', label: 'Email Address', required: true }),
  descriptor({ id: 'q1', name: 'q1', label: 'Favorite color' }),
]);

const DEGREE_FIELD = descriptor({
  id: 'q7',
  kind: 'singleSelect',
  label: 'Degree',
  options: [
    { value: 'bs', displayText: "Bachelor's" },
    { value: 'ms', displayText: "Master's" },
  ],
});

describe('isKindCompatible', () => {
  test('vetoes pairs the field kind cannot hold', () => {
    expect(isKindCompatible('name', 'text')).toBe(true);
    expect(isKindCompatible('name', 'email')).toBe(false);
    expect(isKindCompatible('date', 'singleSelect')).toBe(false);
    expect(isKindCompatible('skillSet', 'multiSelect')).toBe(true);
  });
});

describe('buildFillPlan', () => {
  test('assigns by name tokens and leaves unknown questions unmatched', () => {
    const plan = buildFillPlan(jane, CONTACT_FIELDS, config);

    expect(plan.entries).toEqual([
      {
        kind: 'assigned',
        fieldDescriptorId: 'name',
        coercedValue: { type: 'text', value: 'Jane Doe' },
        sourceAttributePath: 'fullName',
        score: 1,
        strategyName: 'name_token',
      },
      {
        kind: 'assigned',
        fieldDescriptorId: 'contact_email',
        coercedValue: { type: 'text', value: 'jane@x.com' },
        sourceAttributePath: 'email',
        score: 1,
        strategyName: 'name_token',
      },
      { kind: 'unmatched', fieldDescriptorId: 'q1' },
    ]);
    expect(plan.unassignedAttributes).toEqual(['firstName', 'lastName', 'phone']);
  });

  test('covers every descriptor exactly once, in document order', () => {
    const plan = buildFillPlan(janeFull, CONTACT_FIELDS, config);
    expect(plan.entries.map((e) => e.fieldDescriptorId)).toEqual(['name', 'contact_email', 'q1']);
  });

  test('never uses a field or an attribute twice', () => {
    const fields = inOrder([
      descriptor({ id: 'a', label: 'Full Name' }),
      descriptor({ id: 'b', label: 'Your name' }),
      descriptor({ id: 'c', label: 'Name' }),
    ]);
    const plan = buildFillPlan(jane, fields, config);
    const assigned = plan.entries.filter((e) => e.kind === 'assigned');

    expect(assigned).toHaveLength(1);
    expect(assigned[0]).toMatchObject({ fieldDescriptorId: 'a', sourceAttributePath: 'fullName', score: 0.95 });
  });

  test('is deterministic', () => {
    const fields = inOrder([...CONTACT_FIELDS, DEGREE_FIELD]);
    expect(buildFillPlan(janeFull, fields, config)).toEqual(buildFillPlan(janeFull, fields, config));
  });

  test('selects a degree option by level', () => {
    const plan = buildFillPlan(janeFull, [DEGREE_FIELD], config);
    expect(plan.entries).toEqual([
      {
        kind: 'assigned',
        fieldDescriptorId: 'q7',
        coercedValue: { type: 'option', value: 'bs', displayText: "Bachelor's" },
        sourceAttributePath: 'education.degree',
        score: 0.95,
        strategyName: 'label',
      },
    ]);
  });

  test('a choice field whose options do not fit stays unmatched', () => {
    const colors = descriptor({
      id: 'q8',
      kind: 'singleSelect',
      label: 'Degree',
      options: [{ value: 'red', displayText: 'Red' }],
    });
    expect(buildFillPlan(janeFull, [colors], config).entries).toEqual([{ kind: 'unmatched', fieldDescriptorId: 'q8' }]);
  });

  test('placeholder opinions are capped', () => {
    const field = descriptor({ id: 'contact', kind: 'tel', label: 'Contact', placeholder: 'Phone number' });
    const plan = buildFillPlan(jane, [field], config);
    expect(plan.entries[0]).toMatchObject({
      kind: 'assigned',
      sourceAttributePath: 'phone',
      score: 0.6,
      strategyName: 'placeholder',
    });
  });

  test('kind veto beats a matching caption', () => {
    const field = descriptor({ id: 'x', kind: 'email', label: 'Full Name' });
    expect(buildFillPlan(jane, [field], config).entries).toEqual([{ kind: 'unmatched', fieldDescriptorId: 'x' }]);
  });

  test('an incoercible best candidate settles the field and frees the attribute', () => {
    const fields = inOrder([
      descriptor({ id: 'end', kind: 'date', label: 'End Date' }),
      descriptor({ id: 'until', label: 'End date' }),
    ]);
    const plan = buildFillPlan(janeFull, fields, config);

    expect(plan.entries).toEqual([
      {
        kind: 'incoercible',
        fieldDescriptorId: 'end',
        sourceAttributePath: 'experience.endDate',
        errorCode: 'unknown_date_format',
        error: 'Cannot interpret "Present" as a date',
      },
      {
        kind: 'assigned',
        fieldDescriptorId: 'until',
        coercedValue: { type: 'text', value: 'Present' },
        sourceAttributePath: 'experience.endDate',
        score: 0.95,
        strategyName: 'label',
      },
    ]);
    expect(plan.unassignedAttributes).not.toContain('experience.endDate');
  });

  test('requiredOnly leaves optional fields unmatched', () => {
    const plan = buildFillPlan(jane, CONTACT_FIELDS, config, { requiredOnly: true });
    expect(plan.entries.map((e) => e.kind)).toEqual(['unmatched', 'assigned', 'unmatched']);
    expect(plan.unassignedAttributes).toEqual(['fullName', 'firstName', 'lastName', 'phone']);
  });

  test('plan entries are frozen', () => {
    const plan = buildFillPlan(jane, CONTACT_FIELDS, config);
    expect(plan.entries.every((e) => Object.isFrozen(e))).toBe(true);
  });

  test('custom aliases reach fields the defaults miss', () => {
    const custom = resolveEngineConfig({ aliases: { phone: ['favorite color'] } });
    const plan = buildFillPlan(jane, CONTACT_FIELDS, custom);
    expect(plan.entries[2]).toEqual({
      kind: 'assigned',
      fieldDescriptorId: 'q1',
      coercedValue: { type: 'text', value: '555-1234' },
      sourceAttributePath: 'phone',
      score: 0.95,
      strategyName: 'label',
    });
  });
});

describe('FieldMatcher.rankCandidates', () => {
  test('orders by score, then field position, then attribute order', () => {
    const matcher = new FieldMatcher(config);
    const ranked = matcher.rankCandidates(flattenProfile(jane), CONTACT_FIELDS);

    expect(ranked.map((c) => [c.fieldDescriptorId, c.profileAttributePath, c.score])).toEqual([
      ['name', 'fullName', 1],
      ['contact_email', 'email', 1],
    ]);
  });
});
