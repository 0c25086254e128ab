import type { AttributePath } from '../profile/attributes';
import type { FieldDescriptor, FillOutcome, FillStatus } from './types';

export interface FieldReportLine {
  fieldDescriptorId: string;
  label: string;
  status: FillStatus;
  sourceAttributePath?: AttributePath;
  detail?: string;
}

export interface RunReport {
  totalFields: number;
  filledCount: number;
  unmatchedCount: number;
  /** verificationFailed + executionFailed + incoercible */
  failedCount: number;
  notAttemptedCount: number;
  cancelled: boolean;
  fields: FieldReportLine[];
  unmatchedFields: FieldDescriptor[];
  unassignedAttributes: AttributePath[];
}

const FAILED: ReadonlySet<FillStatus> = new Set<FillStatus>(['verificationFailed', 'executionFailed', 'incoercible']);

function detailOf(outcome: FillOutcome): string | undefined {
  switch (outcome.status) {
    case 'filled':
      return outcome.retried ? 'filled after retry' : undefined;
    case 'verificationFailed':
      return 'value did not stick after retry';
    case 'executionFailed':
      return `${outcome.cause}: ${outcome.message}`;
    case 'incoercible':
      return outcome.error;
    default:
      return undefined;
  }
}

/** Summarize one run. Pure: the same outcomes always give the same report. */
export function buildRunReport(
  outcomes: FillOutcome[],
  descriptors: FieldDescriptor[],
  unassignedAttributes: AttributePath[],
): RunReport {
  const byId = new Map(descriptors.map((d) => [d.id, d]));
  const count = (predicate: (o: FillOutcome) => boolean) => outcomes.filter(predicate).length;

  const fields = outcomes.map((outcome): FieldReportLine => {
    const line: FieldReportLine = {
      fieldDescriptorId: outcome.fieldDescriptorId,
      label: byId.get(outcome.fieldDescriptorId)?.label ?? '',
      status: outcome.status,
    };
    if ('sourceAttributePath' in outcome) line.sourceAttributePath = outcome.sourceAttributePath;
    const detail = detailOf(outcome);
    if (detail) line.detail = detail;
    return line;
  });

  const unmatchedIds = new Set(
    outcomes.filter((o) => o.status === 'skippedUnmatched').map((o) => o.fieldDescriptorId),
  );
  const notAttemptedCount = count((o) => o.status === 'notAttempted');

  return {
    totalFields: outcomes.length,
    filledCount: count((o) => o.status === 'filled'),
    unmatchedCount: unmatchedIds.size,
    failedCount: count((o) => FAILED.has(o.status)),
    notAttemptedCount,
    cancelled: notAttemptedCount > 0,
    fields,
    unmatchedFields: descriptors.filter((d) => unmatchedIds.has(d.id)),
    unassignedAttributes: [...unassignedAttributes],
  };
}

const STATUS_LABEL: Record<FillStatus, string> = {
  filled: 'FILLED',
  skippedUnmatched: 'UNMATCHED',
  verificationFailed: 'VERIFY FAILED',
  executionFailed: 'ERROR',
  incoercible: 'INCOERCIBLE',
  notAttempted: 'NOT ATTEMPTED',
};

/** Plain-text table for terminals and chat surfaces. */
export function formatRunReport(report: RunReport): string {
  const lines: string[] = [];
  lines.push(
    `Fields: ${report.totalFields} | filled: ${report.filledCount} | unmatched: ${report.unmatchedCount}` +
      ` | failed: ${report.failedCount} | not attempted: ${report.notAttemptedCount}`,
  );
  if (report.cancelled) lines.push('Run was cancelled before every field was attempted.');

  const width = Math.max(5, ...report.fields.map((f) => (f.label || f.fieldDescriptorId).length));
  for (const field of report.fields) {
    const name = (field.label || field.fieldDescriptorId).padEnd(width);
    const status = STATUS_LABEL[field.status].padEnd(13);
    const source = field.sourceAttributePath ? ` <- ${field.sourceAttributePath}` : '';
    const detail = field.detail ? ` (${field.detail})` : '';
    lines.push(`  ${name}  ${status}${source}${detail}`.trimEnd());
  }

  if (report.unassignedAttributes.length > 0) {
    lines.push(`Unused profile attributes: ${report.unassignedAttributes.join(', ')}`);
  }
  return lines.join('\n');
}
