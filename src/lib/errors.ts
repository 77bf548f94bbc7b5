/**
 * Base application error class.
 * All custom errors should extend this class.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * Error for HTTP or transport failures talking to an external API.
 */
export class APIError extends AppError {
  constructor(message: string, statusCode: number = 502) {
    super(message, 'API_ERROR', statusCode);
    this.name = 'APIError';
  }
}

/**
 * Error for a 200 response that carries a GraphQL `errors` array.
 */
export class GraphQLError extends AppError {
  constructor(message: string) {
    super(message, 'GRAPHQL_ERROR', 502);
    this.name = 'GraphQLError';
  }
}

/**
 * Error for validation failures (400).
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

/**
 * Type guard to check if an error is an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * True for the rejection produced by an aborted fetch or AbortSignal.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Create the error thrown when a cooperative abort check trips.
 */
export function createAbortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}
