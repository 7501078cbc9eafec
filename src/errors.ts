/**
 * Contract errors. These signal a caller bug and are thrown, never retried.
 * Transient I/O failures are logged and recovered where they happen instead.
 */

export type EngineErrorCode = 'UNKNOWN_FIELD' | 'INVALID_FIELD_VALUE' | 'INVARIANT_VIOLATION';

export class EngineError extends Error {
  readonly code: EngineErrorCode;

  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnknownFieldError extends EngineError {
  readonly field: string;

  constructor(field: string) {
    super('UNKNOWN_FIELD', `Session state has no field '${field}'`);
    this.field = field;
  }
}

export class InvalidFieldValueError extends EngineError {
  readonly field: string;

  constructor(field: string, detail: string) {
    super('INVALID_FIELD_VALUE', `Invalid value for '${field}': ${detail}`);
    this.field = field;
  }
}

export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
  }
}
