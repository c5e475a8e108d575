/**
 * Application errors carry the HTTP status and machine-readable code
 * the error handler responds with.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Session not found') {
    super(message, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

/**
 * Raised for activity reports against an ended session, only when the
 * service is configured to reject them.
 */
export class SessionEndedError extends AppError {
  constructor(message: string = 'Session has ended') {
    super(message, 409, 'SESSION_ENDED');
    this.name = 'SessionEndedError';
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message: string = 'Database is not available') {
    super(message, 503, 'STORE_UNAVAILABLE');
    this.name = 'StoreUnavailableError';
  }
}

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Environment validation failed: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
