export type RunnerErrorKind =
  | 'request-construction'
  | 'transport'
  | 'timeout'
  | 'cancelled'
  | 'authentication'
  | 'snapshot-missing'
  | 'snapshot-corrupt'
  | 'schema-validation'
  | 'assertion-evaluation'
  | 'variable-extraction';

export class RunnerError extends Error {
  readonly kind: RunnerErrorKind;

  constructor(kind: RunnerErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Malformed method, URL or body; never retried. */
export class RequestConstructionError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('request-construction', message, options);
  }
}

/** Network failure that survived every retry. */
export class TransportError extends RunnerError {
  readonly attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.attempts = attempts;
  }
}

/** A single attempt ran past its timeout. */
export class TimeoutError extends RunnerError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('timeout', `Request timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends RunnerError {
  constructor(message = 'Run cancelled') {
    super('cancelled', message);
  }
}

export class AuthenticationError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options);
  }
}

export class SnapshotMissingError extends RunnerError {
  readonly snapshotPath: string;

  constructor(snapshotPath: string) {
    super('snapshot-missing', `Snapshot not found: ${snapshotPath}`);
    this.snapshotPath = snapshotPath;
  }
}

export class SnapshotCorruptError extends RunnerError {
  readonly snapshotPath: string;

  constructor(snapshotPath: string, reason: string, options?: { cause?: unknown }) {
    super('snapshot-corrupt', `Snapshot ${snapshotPath} is unreadable: ${reason}`, options);
    this.snapshotPath = snapshotPath;
  }
}

/** The validator could not run; a response that fails validation is not an error. */
export class SchemaValidationError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('schema-validation', message, options);
  }
}

/** The evaluator could not run; a failing assertion is not an error. */
export class AssertionEvaluationError extends RunnerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('assertion-evaluation', message, options);
  }
}

export class VariableExtractionError extends RunnerError {
  readonly variable: string;

  constructor(variable: string, reason: string, options?: { cause?: unknown }) {
    super('variable-extraction', `Failed to extract required variable ${variable}: ${reason}`, options);
    this.variable = variable;
  }
}

export function isRunnerError(value: unknown, kind?: RunnerErrorKind): value is RunnerError {
  return value instanceof RunnerError && (kind === undefined || value.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
