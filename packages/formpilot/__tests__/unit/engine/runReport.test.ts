/**
 * RunReport unit tests.
 */

import { describe, expect, test } from 'vitest';
import { buildRunReport, formatRunReport } from '../../../src/engine/RunReport';
import type { FillOutcome } from '../../../src/engine/types';
import { descriptor, inOrder } from '../../fixtures/formFixtures';

const FIELDS = inOrder([
  descriptor({ id: 'name', label: 'Full Name' }),
  descriptor({ id: 'contact_email', kind: 'email', label: 'Email Address' }),
  descriptor({ id: 'q1', label: 'Favorite color' }),
  descriptor({ id: 'phone', kind: 'tel', label: 'Phone' }),
  descriptor({ id: 'start', kind: 'date', label: 'Start Date' }),
  descriptor({ id: 'x' }),
]);

const OUTCOMES: FillOutcome[] = [
  { status: 'filled', fieldDescriptorId: 'name', sourceAttributePath: 'fullName', retried: false },
  { status: 'filled', fieldDescriptorId: 'contact_email', sourceAttributePath: 'email', retried: true },
  { status: 'skippedUnmatched', fieldDescriptorId: 'q1' },
  {
    status: 'executionFailed',
    fieldDescriptorId: 'phone',
    sourceAttributePath: 'phone',
    cause: 'timeout',
    message: 'Field phone not interactable after 30ms',
  },
  {
    status: 'incoercible',
    fieldDescriptorId: 'start',
    sourceAttributePath: 'experience.startDate',
    error: 'Cannot interpret "Present" as a date',
  },
  { status: 'notAttempted', fieldDescriptorId: 'x' },
];

describe('buildRunReport', () => {
  test('counts each status', () => {
    const report = buildRunReport(OUTCOMES, FIELDS, ['firstName', 'lastName']);

    expect(report).toMatchObject({
      totalFields: 6,
      filledCount: 2,
      unmatchedCount: 1,
      failedCount: 2,
      notAttemptedCount: 1,
      cancelled: true,
      unassignedAttributes: ['firstName', 'lastName'],
    });
    expect(report.unmatchedFields.map((f) => f.id)).toEqual(['q1']);
  });

  test('one line per field with source and detail', () => {
    const report = buildRunReport(OUTCOMES, FIELDS, []);

    expect(report.fields[1]).toEqual({
      fieldDescriptorId: 'contact_email',
      label: 'Email Address',
      status: 'filled',
      sourceAttributePath: 'email',
      detail: 'filled after retry',
    });
    expect(report.fields[2]).toEqual({ fieldDescriptorId: 'q1', label: 'Favorite color', status: 'skippedUnmatched' });
    expect(report.fields[3].detail).toBe('timeout: Field phone not interactable after 30ms');
  });

  test('a run with nothing left unattempted is not cancelled', () => {
    const report = buildRunReport(OUTCOMES.slice(0, 3), FIELDS, []);
    expect(report.cancelled).toBe(false);
    expect(report.failedCount).toBe(0);
  });
});

describe('formatRunReport', () => {
  test('renders a fixed-width table', () => {
    const text = formatRunReport(buildRunReport(OUTCOMES, FIELDS, ['firstName', 'lastName']));

    expect(text.split('\n')).toEqual([
      'Fields: 6 | filled: 2 | unmatched: 1 | failed: 2 | not attempted: 1',
      'Run was cancelled before every field was attempted.',
      '  Full Name       FILLED        <- fullName',
      '  Email Address   FILLED        <- email (filled after retry)',
      '  Favorite color  UNMATCHED',
      '  Phone           ERROR         <- phone (timeout: Field phone not interactable after 30ms)',
      '  Start Date      INCOERCIBLE   <- experience.startDate (Cannot interpret "Present" as a date)',
      '  x               NOT ATTEMPTED',
      'Unused profile attributes: firstName, lastName',
    ]);
  });

  test('an empty run is just the header', () => {
    expect(formatRunReport(buildRunReport([], [], []))).toBe(
      'Fields: 0 | filled: 0 | unmatched: 0 | failed: 0 | not attempted: 0',
    );
  });
});
