export type ErrorKind =
  | 'validation'
  | 'not_found'
  | 'invalid_transition'
  | 'timing_violation'
  | 'hard_publish_failure'
  | 'quota_exceeded'
  | 'internal';

export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string) {
    super('invalid_transition', message);
    this.name = 'InvalidTransitionError';
  }
}

// Raised when an account's own pacing rules reject a publish. Never terminal.
export class TimingViolationError extends AppError {
  constructor(message: string) {
    super('timing_violation', message);
    this.name = 'TimingViolationError';
  }
}

export class HardPublishFailure extends AppError {
  constructor(message: string) {
    super('hard_publish_failure', message);
    this.name = 'HardPublishFailure';
  }
}

export class QuotaExceededError extends AppError {
  constructor(message: string) {
    super('quota_exceeded', message);
    this.name = 'QuotaExceededError';
  }
}

const TIMING_MARKER = /too soon|\bwait\b/i;

/**
 * Publishing collaborators report pacing rejections only through the message,
 * so anything saying "too soon" or "wait" counts as a soft failure.
 */
export function isTimingViolation(err: unknown): boolean {
  if (err instanceof TimingViolationError) return true;
  return TIMING_MARKER.test(errorMessage(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

const HTTP_STATUS: Record<ErrorKind, number> = {
  validation: 400,
  not_found: 404,
  invalid_transition: 409,
  timing_violation: 409,
  hard_publish_failure: 502,
  quota_exceeded: 429,
  internal: 500,
};

export interface Failure {
  success: false;
  kind: ErrorKind;
  error: string;
}

export function toFailure(err: unknown): { status: number; body: Failure } {
  const kind: ErrorKind = err instanceof AppError ? err.kind : 'internal';
  return {
    status: HTTP_STATUS[kind],
    body: { success: false, kind, error: errorMessage(err) },
  };
}
