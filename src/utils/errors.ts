/**
 * Errors the API turns into a response. Anything that is not an AppError
 * ends up as a 500.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(message: string, code: string, status: number, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.details = details;
  }
}

/**
 * A column an operation needs is not in the dataset at all. Distinct from
 * "no rows matched", which is never an error.
 */
export class MissingColumnError extends AppError {
  readonly column: string;

  constructor(column: string, operation: string) {
    super(`Column "${column}" is not present in the dataset (required by ${operation})`, 'MISSING_COLUMN', 422, {
      column,
      operation,
    });
    this.column = column;
  }
}

export class InvalidQueryError extends AppError {
  constructor(details: string[]) {
    super('Invalid query parameters', 'INVALID_QUERY', 400, details);
  }
}

export class DatasetUnavailableError extends AppError {
  constructor(source: string, cause: unknown) {
    super(`Dataset could not be loaded from ${source}`, 'DATASET_UNAVAILABLE', 503, cause instanceof Error ? cause.message : undefined);
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', 500, details);
  }
}
