function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export class ImmutableFieldViolation extends Error {
  constructor(
    public readonly field: string,
    public readonly currentValue: unknown,
    public readonly attemptedValue: unknown
  ) {
    super(
      `Field "${field}" is immutable once set (current: ${describeValue(currentValue)}, attempted: ${describeValue(attemptedValue)})`
    );
    this.name = 'ImmutableFieldViolation';
  }
}

export class InvariantViolation extends Error {
  constructor(
    public readonly hookId: string,
    message: string,
    public readonly fields: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export class ConstructionFailure extends Error {
  constructor(
    public readonly entityName: string,
    public readonly violation: Error
  ) {
    super(`Failed to construct ${entityName}: ${violation.message}`);
    this.name = 'ConstructionFailure';
  }
}

export class DerivedFieldViolation extends Error {
  constructor(public readonly field: string) {
    super(`Field "${field}" is maintained by hooks and cannot be written directly`);
    this.name = 'DerivedFieldViolation';
  }
}

export class HookRegistrationError extends Error {
  constructor(
    public readonly scope: string,
    message: string
  ) {
    super(`${scope}: ${message}`);
    this.name = 'HookRegistrationError';
  }
}

export class UnknownFieldError extends Error {
  constructor(
    public readonly entityName: string,
    public readonly field: string
  ) {
    super(`${entityName} has no field "${field}"`);
    this.name = 'UnknownFieldError';
  }
}

export class MissingFieldError extends Error {
  constructor(
    public readonly entityName: string,
    public readonly field: string
  ) {
    super(`${entityName} requires a value for "${field}"`);
    this.name = 'MissingFieldError';
  }
}

export type FieldWriteError =
  | ImmutableFieldViolation
  | DerivedFieldViolation
  | InvariantViolation
  | UnknownFieldError;

export function isFieldWriteError(error: unknown): error is FieldWriteError {
  return (
    error instanceof ImmutableFieldViolation ||
    error instanceof DerivedFieldViolation ||
    error instanceof InvariantViolation ||
    error instanceof UnknownFieldError
  );
}
