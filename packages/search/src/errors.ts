/** Typed error hierarchy for @sift/search. */

export class SiftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SiftError';
  }
}

/** A value that is not a query was used where a condition is expected. */
export class BadOperatorError extends SiftError {
  constructor(received?: unknown) {
    super(
      received === undefined
        ? 'Invalid operator'
        : `Invalid operator: expected a query condition, got ${describeValue(received)}`,
    );
    this.name = 'BadOperatorError';
  }
}

export class FieldConflictError extends SiftError {
  constructor(public readonly field: string) {
    super(`Field name \`${field}\` conflicts with a namespace in the mapping`);
    this.name = 'FieldConflictError';
  }
}

export class MissingMappingError extends SiftError {
  constructor(public readonly index: string) {
    super(`No mapping found for index \`${index}\``);
    this.name = 'MissingMappingError';
  }
}

export class MissingQueryError extends SiftError {
  constructor() {
    super('No query found for operation');
    this.name = 'MissingQueryError';
  }
}

export class InvalidQueryError extends SiftError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

export class UnknownFieldError extends SiftError {
  constructor(public readonly path: string) {
    super(`No field or namespace \`${path}\` in the mapping`);
    this.name = 'UnknownFieldError';
  }
}

export class FieldTypeError extends SiftError {
  constructor(
    public readonly path: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Field \`${path}\` is ${actual}, expected ${expected}`);
    this.name = 'FieldTypeError';
  }
}

export class UnexpectedResponseError extends SiftError {
  constructor(
    public readonly what: string,
    public readonly issues: string[],
  ) {
    super(`Unexpected ${what} response: ${issues.join('; ')}`);
    this.name = 'UnexpectedResponseError';
  }
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
