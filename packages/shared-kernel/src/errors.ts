export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(details: unknown) {
    super(400, 'VALIDATION_ERROR', 'Validation failed', details);
  }
}

/** Raised when a collaborator (complaint API, answer service) call fails; callers may retry. */
export class BackendFailureError extends AppError {
  constructor(service: string, message: string, details?: unknown) {
    super(502, 'BACKEND_FAILURE', `${service}: ${message}`, details);
  }
}

/** Missing or inconsistent settings. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'CONFIGURATION_ERROR', message, details);
  }
}
