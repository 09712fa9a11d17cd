export class AppError extends Error {
  constructor(
    public readonly message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export interface FieldIssue {
  field: string;
  message: string;
}

function describeFields(details: FieldIssue[]): string {
  return [...new Set(details.map((issue) => issue.field))].join(', ');
}

export class ValidationError extends AppError {
  constructor(
    public readonly details: FieldIssue[],
    cause?: Error
  ) {
    super(`Validation failed for field(s): ${describeFields(details)}`, 422, 'VALIDATION_ERROR', cause);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'User not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * Email duplicado. Respondido com 400 (e não 409).
 */
export class ConflictError extends AppError {
  constructor(message: string = 'Email already registered') {
    super(message, 400, 'CONFLICT');
  }
}

export class InternalServerError extends AppError {
  constructor(message: string = 'Internal server error', cause?: Error) {
    super(message, 500, 'INTERNAL_ERROR', cause);
  }
}
