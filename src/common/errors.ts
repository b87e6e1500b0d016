export interface InvalidParamDetails {
  field?: string;
  expected?: string;
  actual?: unknown;
}

/**
 * The only failure the anonymizer core reports. It always describes bad
 * caller input, never a transient condition.
 */
export class InvalidParamError extends Error {
  readonly field?: string;
  readonly expected?: string;
  readonly actual?: unknown;

  constructor(message: string, details: InvalidParamDetails = {}) {
    super(message);
    this.name = 'InvalidParamError';
    this.field = details.field;
    this.expected = details.expected;
    this.actual = details.actual;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      field: this.field,
      expected: this.expected,
    };
  }
}

export type Result<T> = { ok: true; value: T } | { ok: false; error: InvalidParamError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(message: string, details: InvalidParamDetails = {}): Result<T> {
  return { ok: false, error: new InvalidParamError(message, details) };
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
