export type SchedulingErrorCode =
  | 'PARSE_ERROR'
  | 'VALIDATION_ERROR'
  | 'NO_AVAILABILITY'
  | 'STORE_FAILURE';

export class SchedulingError extends Error {
  public readonly code: SchedulingErrorCode;
  public readonly isOperational: boolean;

  constructor(message: string, code: SchedulingErrorCode, isOperational: boolean = true) {
    super(message);
    this.name = 'SchedulingError';
    this.code = code;
    this.isOperational = isOperational;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised inside a field extractor. Never escapes the parser:
 * the field degrades to absent.
 */
export class ParseError extends SchedulingError {
  constructor(
    public readonly field: string,
    public readonly cause?: unknown
  ) {
    super(`Failed to extract ${field}: ${describeError(cause)}`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

export class ValidationError extends SchedulingError {
  constructor(message: string, public readonly value?: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class NoAvailabilityFoundError extends SchedulingError {
  constructor(
    public readonly startDate: string,
    public readonly horizonDays: number
  ) {
    super(
      `No common free slot found in ${horizonDays} day(s) starting ${startDate}`,
      'NO_AVAILABILITY'
    );
    this.name = 'NoAvailabilityFoundError';
  }
}

export class StoreFailureError extends SchedulingError {
  constructor(
    public readonly draftId: string,
    public readonly detail?: string
  ) {
    super(`Failed to save meeting ${draftId}${detail ? `: ${detail}` : ''}`, 'STORE_FAILURE');
    this.name = 'StoreFailureError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
