export type ValidationIssue = {
  field: string;
  message: string;
};

export class ValidationError extends Error {
  constructor(public readonly issues: ValidationIssue[]) {
    super(
      issues.length === 1
        ? `Invalid ${issues[0].field}: ${issues[0].message}`
        : `Invalid parameters: ${issues.map((issue) => issue.field).join(', ')}`
    );
    this.name = 'ValidationError';
  }

  static forField(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class UnknownSourceKindError extends Error {
  constructor(
    public readonly identifier: string,
    public readonly prefix: string | null
  ) {
    super(
      prefix === null
        ? `Identifier "${identifier}" has no source prefix`
        : `Unsupported source prefix "${prefix}" in identifier "${identifier}"`
    );
    this.name = 'UnknownSourceKindError';
  }
}

export class RecordNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecordNotFoundError';
  }
}

export class DatabaseUnavailableError extends Error {
  readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DatabaseUnavailableError';
  }
}
