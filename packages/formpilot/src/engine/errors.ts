// --------------------------------------------------------------------------
// Error types
// --------------------------------------------------------------------------

export class FormPilotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'FormPilotError';
  }
}

/** The page handle is detached, closed, or never became ready. Fatal. */
export class StaleDocumentError extends FormPilotError {
  constructor(message = 'Form document is detached or no longer available', details?: unknown) {
    super(message, 'stale_document', details);
    this.name = 'StaleDocumentError';
  }
}

export interface ProfileIssue {
  path: string;
  message: string;
}

/** Raised before any page interaction. Fatal. */
export class InvalidProfileError extends FormPilotError {
  constructor(public readonly issues: ProfileIssue[]) {
    super(
      `Invalid profile: ${issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ')}`,
      'invalid_profile',
      issues,
    );
    this.name = 'InvalidProfileError';
  }
}

/** Caller-supplied engine configuration failed validation. */
export class InvalidConfigError extends FormPilotError {
  constructor(message: string, details?: unknown) {
    super(`Invalid engine config: ${message}`, 'invalid_config', details);
    this.name = 'InvalidConfigError';
  }
}

/** Another fill run already owns this page handle. */
export class PageBusyError extends FormPilotError {
  constructor(pageId: string) {
    super(`Page ${pageId} is already being filled by another run`, 'page_busy');
    this.name = 'PageBusyError';
  }
}

export class IncoercibleValueError extends FormPilotError {
  constructor(message: string, code = 'incoercible_value', details?: unknown) {
    super(message, code, details);
    this.name = 'IncoercibleValueError';
  }
}

export class UnknownDateFormatError extends IncoercibleValueError {
  constructor(public readonly input: string) {
    super(`Cannot interpret "${input}" as a date`, 'unknown_date_format');
    this.name = 'UnknownDateFormatError';
  }
}

export class NoMatchingOptionError extends IncoercibleValueError {
  constructor(
    public readonly fieldId: string,
    public readonly bestScore: number,
  ) {
    super(
      `No option of field ${fieldId} is close enough (best score ${bestScore.toFixed(2)})`,
      'no_matching_option',
    );
    this.name = 'NoMatchingOptionError';
  }
}

/** Element did not become interactable within the per-field wait. */
export class FieldTimeoutError extends FormPilotError {
  constructor(fieldId: string, timeoutMs: number) {
    super(`Field ${fieldId} not interactable after ${timeoutMs}ms`, 'timeout');
    this.name = 'FieldTimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Browser-level failures that mean the page itself is gone rather than one
 * element misbehaving.
 */
export function isDetachedError(err: unknown): boolean {
  return /target closed|browser has been closed|execution context was destroyed|page closed|detached/i.test(
    errorMessage(err),
  );
}
